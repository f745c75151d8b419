import OpenAI from 'openai';
import pino, { type Logger } from 'pino';
import type { TextGenerator } from '../generation/TextGenerator.js';

export interface OpenAiClientOptions {
  apiKey: string;
  model?: string;
  temperature?: number;
  maxTokens?: number;
  /** Per-request timeout in milliseconds */
  timeoutMs?: number;
  /** Transport-level retries performed by the SDK */
  maxRetries?: number;
  logger?: Logger;
}

/**
 * Thin wrapper around the OpenAI chat completions API.
 *
 * Transport retries and timeouts are delegated to the SDK. Content-level retries
 * (empty or malformed output) belong to the calling component.
 */
export class OpenAiClient implements TextGenerator {
  private readonly client: OpenAI;
  private readonly model: string;
  private readonly temperature: number;
  private readonly maxTokens: number;
  private readonly timeoutMs: number;
  private readonly maxRetries: number;
  private readonly logger: Logger;

  constructor(options: OpenAiClientOptions) {
    this.model = options.model ?? 'gpt-4o-mini';
    this.temperature = options.temperature ?? 0.7;
    this.maxTokens = options.maxTokens ?? 300;
    this.timeoutMs = options.timeoutMs ?? 60000;
    this.maxRetries = options.maxRetries ?? 2;
    this.logger = options.logger ?? pino({ name: 'OpenAiClient' });

    this.client = new OpenAI({
      apiKey: options.apiKey,
      timeout: this.timeoutMs,
      maxRetries: this.maxRetries,
    });

    this.logger.debug({
      model: this.model,
      timeoutMs: this.timeoutMs,
      maxRetries: this.maxRetries,
    }, 'OpenAI client initialized');
  }

  /**
   * Run a single system + user chat completion and return the trimmed text.
   * Returns an empty string when the model produced no content.
   */
  async generate(prompt: string, systemMessage: string): Promise<string> {
    const startTime = Date.now();

    try {
      const response = await this.client.chat.completions.create({
        model: this.model,
        messages: [
          { role: 'system', content: systemMessage },
          { role: 'user', content: prompt },
        ],
        temperature: this.temperature,
        max_tokens: this.maxTokens,
      });

      const choice = response.choices[0];

      this.logger.debug({
        elapsedMs: Date.now() - startTime,
        finishReason: choice?.finish_reason,
      }, 'OpenAI request completed');

      return choice?.message?.content?.trim() ?? '';
    } catch (error) {
      // Log error details without sensitive data
      const errorInfo = error instanceof Error ? {
        name: error.name,
        message: error.message,
        status: 'status' in error ? error.status : undefined,
      } : { message: String(error) };

      this.logger.error({
        elapsedMs: Date.now() - startTime,
        model: this.model,
        error: errorInfo,
      }, 'OpenAI request failed');

      throw error;
    }
  }
}
