import pino, { type Logger } from 'pino';
import { DEFAULT_PROMPTS, type PromptTemplate } from '../generation/prompts.js';
import { NO_BACKOFF, retryUntil, type RetryBackoff } from '../generation/retry.js';
import { isGenerationRetryable } from '../generation/retryPolicy.js';
import { renderTemplate } from '../generation/template.js';
import type { TextGenerator } from '../generation/TextGenerator.js';
import {
  toSlot,
  type ComparisonCriterion,
  type CriterionVerdict,
  type ProductTriple,
  type Slot,
} from './compareTypes.js';
import { formatProductsForPrompt } from './productPromptBlock.js';

export const UNRESOLVED_RATIONALE = 'No verdict could be generated for this criterion.';

const WINNER_PATTERN = /product\s+([1-3])/i;
// After terminal punctuation, or at any line break
const SENTENCE_BREAK = /(?<=[.!?])\s+|\s*\n\s*/;

export interface ParsedVerdict {
  winnerSlot: Slot | null;
  rationale: string;
}

/**
 * Extract the winning slot and rationale from a verdict response.
 *
 * The winner is the first "Product N" mentioned anywhere in the text. A rationale
 * that names a losing product before the winner is therefore mis-attributed.
 * The sentence or line carrying the winner declaration is removed from the
 * rationale, unless nothing would remain.
 */
export function parseVerdict(raw: string): ParsedVerdict {
  const text = raw.trim();
  const match = WINNER_PATTERN.exec(text);
  const winnerSlot = match ? toSlot(Number(match[1])) : null;

  if (winnerSlot === null) {
    return { winnerSlot, rationale: text };
  }

  const sentences = text
    .split(SENTENCE_BREAK)
    .map((sentence) => sentence.trim())
    .filter((sentence) => sentence.length > 0);
  const declaration = sentences.findIndex((sentence) => WINNER_PATTERN.test(sentence));
  const rest = sentences
    .filter((_, position) => position !== declaration)
    .join(' ')
    .trim();

  return { winnerSlot, rationale: rest.length > 0 ? rest : text };
}

export interface CriterionResolverOptions {
  generator: TextGenerator;
  /** Retries after the first attempt for empty or failed responses (default 2) */
  retries?: number;
  backoff?: RetryBackoff;
  prompt?: PromptTemplate;
  logger?: Logger;
}

/**
 * Decides which of the compared products wins each criterion.
 * Failures stay local to one criterion and produce an unresolved verdict.
 */
export class CriterionResolver {
  private readonly generator: TextGenerator;
  private readonly retries: number;
  private readonly backoff: RetryBackoff;
  private readonly prompt: PromptTemplate;
  private readonly logger: Logger;

  constructor(options: CriterionResolverOptions) {
    this.generator = options.generator;
    this.retries = options.retries ?? 2;
    this.backoff = options.backoff ?? NO_BACKOFF;
    this.prompt = options.prompt ?? DEFAULT_PROMPTS.verdict;
    this.logger = options.logger ?? pino({ name: 'CriterionResolver' });
  }

  async resolve(criterion: ComparisonCriterion, products: ProductTriple): Promise<CriterionVerdict> {
    const prompt = renderTemplate(this.prompt.template, {
      criterion: criterion.text,
      products: formatProductsForPrompt(products),
    });

    const { value, exhausted } = await retryUntil(
      async () => (await this.generator.generate(prompt, this.prompt.system)).trim(),
      {
        retries: this.retries,
        baseDelayMs: this.backoff.baseDelayMs,
        jitter: this.backoff.jitterMs,
        accept: (text) => text.length > 0,
        onExhausted: () => '',
        shouldRetry: isGenerationRetryable,
        label: `verdict:${criterion.index}`,
        logger: this.logger,
      }
    );

    if (exhausted) {
      this.logger.warn({ criterionIndex: criterion.index }, 'No verdict generated, leaving criterion unresolved');
      return { criterionIndex: criterion.index, winnerSlot: null, rationale: UNRESOLVED_RATIONALE };
    }

    const { winnerSlot, rationale } = parseVerdict(value);
    if (winnerSlot === null) {
      this.logger.warn({ criterionIndex: criterion.index }, 'Verdict names no product, leaving criterion unresolved');
    }

    return { criterionIndex: criterion.index, winnerSlot, rationale };
  }

  /**
   * Resolve criteria one after another, returning verdicts in criterion order.
   */
  async resolveAll(
    criteria: readonly ComparisonCriterion[],
    products: ProductTriple
  ): Promise<CriterionVerdict[]> {
    const verdicts: CriterionVerdict[] = [];
    for (const criterion of criteria) {
      verdicts.push(await this.resolve(criterion, products));
    }
    return verdicts;
  }
}
