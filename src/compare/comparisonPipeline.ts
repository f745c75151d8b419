import pino, { type Logger } from 'pino';
import type { Product } from '../catalog/productTypes.js';
import type { PromptTemplates } from '../generation/prompts.js';
import type { RetryBackoff } from '../generation/retry.js';
import type { TextGenerator } from '../generation/TextGenerator.js';
import { aggregateComparison } from './aggregateComparison.js';
import { CRITERIA_COUNT, type ComparisonDocument } from './compareTypes.js';
import { CriteriaGenerator } from './criteriaGenerator.js';
import { CriterionResolver } from './criterionResolver.js';
import { selectComparisonTriple } from './selectTopRated.js';

export interface ComparisonPipelineOptions {
  generator: TextGenerator;
  /** Retries per verdict after the first attempt (default 2) */
  retries?: number;
  /** Delay between retries of every generation call (default none) */
  backoff?: RetryBackoff;
  criteriaCount?: number;
  prompts?: Partial<Pick<PromptTemplates, 'criteria' | 'verdict'>>;
  logger?: Logger;
  now?: () => Date;
}

/**
 * Run one comparison: select → criteria → verdicts → aggregate.
 *
 * Structural failures (too few products, too few criteria) propagate and no
 * document is produced. Per-criterion failures only leave that criterion unresolved.
 */
export async function runComparisonPipeline(
  catalog: readonly Product[],
  options: ComparisonPipelineOptions
): Promise<ComparisonDocument> {
  const logger = options.logger ?? pino({ name: 'comparisonPipeline' });

  const products = selectComparisonTriple(catalog);
  logger.info({ productIds: products.map((p) => p.id) }, 'Selected products for comparison');

  const criteria = await new CriteriaGenerator({
    generator: options.generator,
    count: options.criteriaCount ?? CRITERIA_COUNT,
    backoff: options.backoff,
    prompt: options.prompts?.criteria,
    logger,
  }).generateCriteria(products);

  const verdicts = await new CriterionResolver({
    generator: options.generator,
    retries: options.retries,
    backoff: options.backoff,
    prompt: options.prompts?.verdict,
    logger,
  }).resolveAll(criteria, products);

  const document = aggregateComparison(products, criteria, verdicts, options.now);

  if (document.degraded) {
    logger.warn({ criteria: criteria.length }, 'No criterion could be resolved, comparison is degraded');
  } else {
    logger.info({
      overallWinnerSlot: document.overallWinnerSlot,
      tally: document.tally,
    }, 'Comparison assembled');
  }

  return document;
}
