/**
 * Product comparison module exports.
 */

export { COMPARE_SIZE, CRITERIA_COUNT, SLOTS, comparisonDocumentSchema, toSlot } from './compareTypes.js';
export type {
  ComparedProduct,
  ComparisonCriterion,
  ComparisonDocument,
  CriterionVerdict,
  ProductTriple,
  Slot,
  SlotTally,
} from './compareTypes.js';

export { parseRating, selectTopRated, selectComparisonTriple } from './selectTopRated.js';
export { formatProductsForPrompt } from './productPromptBlock.js';
export { parseCriteria, CriteriaGenerator } from './criteriaGenerator.js';
export { parseVerdict, CriterionResolver, UNRESOLVED_RATIONALE } from './criterionResolver.js';
export { aggregateComparison, pickOverallWinner, tallyVerdicts, toComparedProduct } from './aggregateComparison.js';
export { runComparisonPipeline } from './comparisonPipeline.js';
export { ComparisonService } from './ComparisonService.js';
