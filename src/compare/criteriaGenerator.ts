import pino, { type Logger } from 'pino';
import { CriteriaGenerationError } from '../errors/AppError.js';
import { DEFAULT_PROMPTS, type PromptTemplate } from '../generation/prompts.js';
import { NO_BACKOFF, retryUntil, type RetryBackoff } from '../generation/retry.js';
import { isGenerationRetryable } from '../generation/retryPolicy.js';
import { renderTemplate } from '../generation/template.js';
import type { TextGenerator } from '../generation/TextGenerator.js';
import { CRITERIA_COUNT, type ComparisonCriterion, type ProductTriple } from './compareTypes.js';
import { formatProductsForPrompt } from './productPromptBlock.js';

const LIST_PREFIX = /^\s*(?:\d+\s*[.):]\s*|[-*•]\s*)/;

/**
 * Parse a criteria response into indexed criteria.
 *
 * Strips list numbering, bullets and bold markers, drops blank lines and
 * header lines ending in ":". At most `count` criteria are returned, indexed from 1.
 */
export function parseCriteria(raw: string, count: number = CRITERIA_COUNT): ComparisonCriterion[] {
  return raw
    .split(/\r?\n/)
    .map((line) => line.replace(/\*\*/g, '').replace(LIST_PREFIX, '').trim())
    .filter((line) => line.length > 0 && !line.endsWith(':'))
    .slice(0, count)
    .map((text, position) => ({ index: position + 1, text }));
}

export interface CriteriaGeneratorOptions {
  generator: TextGenerator;
  /** Number of criteria to request (default 5) */
  count?: number;
  /** Retries after the first attempt (default 1) */
  retries?: number;
  backoff?: RetryBackoff;
  prompt?: PromptTemplate;
  logger?: Logger;
}

/**
 * Asks the model for comparison questions covering the selected products.
 */
export class CriteriaGenerator {
  private readonly generator: TextGenerator;
  private readonly count: number;
  private readonly retries: number;
  private readonly backoff: RetryBackoff;
  private readonly prompt: PromptTemplate;
  private readonly logger: Logger;

  constructor(options: CriteriaGeneratorOptions) {
    this.generator = options.generator;
    this.count = options.count ?? CRITERIA_COUNT;
    this.retries = options.retries ?? 1;
    this.backoff = options.backoff ?? NO_BACKOFF;
    this.prompt = options.prompt ?? DEFAULT_PROMPTS.criteria;
    this.logger = options.logger ?? pino({ name: 'CriteriaGenerator' });
  }

  /**
   * @throws CriteriaGenerationError when fewer than `count` criteria are produced after retrying
   */
  async generateCriteria(products: ProductTriple): Promise<ComparisonCriterion[]> {
    const prompt = renderTemplate(this.prompt.template, {
      products: formatProductsForPrompt(products),
      count: String(this.count),
    });

    const { value, attempts } = await retryUntil(
      async () => parseCriteria(await this.generator.generate(prompt, this.prompt.system), this.count),
      {
        retries: this.retries,
        baseDelayMs: this.backoff.baseDelayMs,
        jitter: this.backoff.jitterMs,
        accept: (criteria) => criteria.length === this.count,
        onExhausted: (last, lastError) => {
          const received = last?.length ?? 0;
          this.logger.error({ expected: this.count, received }, 'Criteria generation failed');
          throw new CriteriaGenerationError(
            this.count,
            received,
            lastError instanceof Error ? lastError : undefined
          );
        },
        shouldRetry: isGenerationRetryable,
        label: 'criteria',
        logger: this.logger,
      }
    );

    this.logger.info({ count: value.length, attempts }, 'Comparison criteria generated');
    return value;
  }
}
