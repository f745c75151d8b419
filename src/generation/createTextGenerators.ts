import type { Logger } from 'pino';
import type { Config } from '../config.js';
import { AppError } from '../errors/AppError.js';
import { OpenAiClient } from '../openai/OpenAiClient.js';
import { MockTextGenerator } from './MockTextGenerator.js';
import type { TextGenerator } from './TextGenerator.js';

/**
 * The live generator (absent when no API key is configured) and the mock.
 */
export interface TextGenerators {
  live: TextGenerator | null;
  mock: TextGenerator;
}

export function createTextGenerators(config: Config, logger?: Logger): TextGenerators {
  const { apiKey } = config.openai;

  const live = apiKey
    ? new OpenAiClient({
        apiKey,
        model: config.openai.model,
        temperature: config.openai.temperature,
        maxTokens: config.openai.maxTokens,
        timeoutMs: config.openai.timeoutMs,
        maxRetries: config.openai.maxRetries,
        logger: logger?.child({ component: 'OpenAiClient' }),
      })
    : null;

  if (!live) {
    logger?.warn('OPENAI_API_KEY is not set - only mock generation is available');
  }

  return { live, mock: new MockTextGenerator() };
}

/**
 * Pick the generator for a run, failing when live generation is requested but not configured.
 */
export function selectGenerator(generators: TextGenerators, useMock: boolean): TextGenerator {
  if (useMock) {
    return generators.mock;
  }
  if (!generators.live) {
    throw AppError.llmUnavailable();
  }
  return generators.live;
}
