import pino, { type Logger } from 'pino';
import { isEnriched, type EnrichedProduct, type Product } from '../catalog/productTypes.js';
import {
  DEFAULT_PROMPTS,
  NO_DESCRIPTION_PLACEHOLDER,
  NO_FEATURES_PLACEHOLDER,
  type PromptTemplate,
} from '../generation/prompts.js';
import { NO_BACKOFF, retryUntil, type RetryBackoff } from '../generation/retry.js';
import { isGenerationRetryable } from '../generation/retryPolicy.js';
import { formatFeatureList, renderTemplate } from '../generation/template.js';
import type { TextGenerator } from '../generation/TextGenerator.js';
import { parseTaglineAndHighlights, type TaglineAndHighlights } from './parseTaglineHighlights.js';

export const FALLBACK_SUMMARY = 'Product summary unavailable.';
export const FALLBACK_TAGLINE = 'Product tagline unavailable.';
export const FALLBACK_HIGHLIGHT = 'Product highlights unavailable.';

export interface ContentGeneratorOptions {
  generator: TextGenerator;
  /** Retries after the first attempt, per field group (default 2) */
  retries?: number;
  /** Delay between retries (default none) */
  backoff?: RetryBackoff;
  prompts?: {
    summary?: PromptTemplate;
    tagline?: PromptTemplate;
  };
  logger?: Logger;
}

const EMPTY_TAGLINE: TaglineAndHighlights = { tagline: '', highlights: [] };

/**
 * A response is usable when it is non-empty and is not an error message echoed by the model.
 */
function isUsableResponse(text: string): boolean {
  return text.length > 0 && !text.toLowerCase().startsWith('error');
}

/**
 * Generates marketing copy (summary, tagline, highlights) for a product.
 *
 * Generation failures never propagate: after the retry budget is spent each
 * field falls back to a fixed placeholder and the degradation is logged.
 */
export class ContentGenerator {
  private readonly generator: TextGenerator;
  private readonly retries: number;
  private readonly backoff: RetryBackoff;
  private readonly summaryPrompt: PromptTemplate;
  private readonly taglinePrompt: PromptTemplate;
  private readonly logger: Logger;

  constructor(options: ContentGeneratorOptions) {
    this.generator = options.generator;
    this.retries = options.retries ?? 2;
    this.backoff = options.backoff ?? NO_BACKOFF;
    this.summaryPrompt = options.prompts?.summary ?? DEFAULT_PROMPTS.summary;
    this.taglinePrompt = options.prompts?.tagline ?? DEFAULT_PROMPTS.tagline;
    this.logger = options.logger ?? pino({ name: 'ContentGenerator' });
  }

  /**
   * Return the product with summary, tagline and highlights filled in.
   * Already-enriched products are returned unchanged. The input is never mutated.
   */
  async enrich(product: Product): Promise<EnrichedProduct> {
    if (isEnriched(product)) {
      this.logger.info({ productId: product.id }, 'Product already enriched, skipping');
      return product;
    }

    const summary = await this.generateSummary(product);
    const { tagline, highlights } = await this.generateTaglineAndHighlights(product);

    this.logger.info({
      productId: product.id,
      summaryLength: summary.length,
      taglineLength: tagline.length,
      highlightCount: highlights.length,
    }, 'Product enriched');

    return { ...product, summary, tagline, highlights };
  }

  async generateSummary(product: Product): Promise<string> {
    const prompt = renderTemplate(this.summaryPrompt.template, promptValues(product));

    const outcome = await retryUntil(
      async () => (await this.generator.generate(prompt, this.summaryPrompt.system)).trim(),
      {
        retries: this.retries,
        baseDelayMs: this.backoff.baseDelayMs,
        jitter: this.backoff.jitterMs,
        accept: isUsableResponse,
        onExhausted: () => FALLBACK_SUMMARY,
        shouldRetry: isGenerationRetryable,
        label: `summary:${product.id}`,
        logger: this.logger,
      }
    );

    if (outcome.exhausted) {
      this.logger.error(
        { productId: product.id, attempts: outcome.attempts },
        'Failed to generate summary, using fallback'
      );
    }

    return outcome.value;
  }

  async generateTaglineAndHighlights(product: Product): Promise<TaglineAndHighlights> {
    const prompt = renderTemplate(this.taglinePrompt.template, promptValues(product));

    const outcome = await retryUntil(
      async () => {
        const text = (await this.generator.generate(prompt, this.taglinePrompt.system)).trim();
        return isUsableResponse(text) ? parseTaglineAndHighlights(text) : EMPTY_TAGLINE;
      },
      {
        retries: this.retries,
        baseDelayMs: this.backoff.baseDelayMs,
        jitter: this.backoff.jitterMs,
        accept: (result) => result.tagline.length > 0 && result.highlights.length > 0,
        onExhausted: (last) => ({
          tagline: last && last.tagline.length > 0 ? last.tagline : FALLBACK_TAGLINE,
          highlights: last && last.highlights.length > 0 ? last.highlights : [FALLBACK_HIGHLIGHT],
        }),
        shouldRetry: isGenerationRetryable,
        label: `tagline:${product.id}`,
        logger: this.logger,
      }
    );

    if (outcome.exhausted) {
      this.logger.error({
        productId: product.id,
        attempts: outcome.attempts,
        taglineFallback: outcome.value.tagline === FALLBACK_TAGLINE,
        highlightsFallback: outcome.value.highlights[0] === FALLBACK_HIGHLIGHT,
      }, 'Failed to generate tagline or highlights, using fallback');
    }

    return outcome.value;
  }
}

function promptValues(product: Product): Record<string, string> {
  const description = product.description.trim();
  return {
    title: product.title.trim() || 'the product',
    description: description || NO_DESCRIPTION_PLACEHOLDER,
    features: formatFeatureList(product.features, NO_FEATURES_PLACEHOLDER),
  };
}
