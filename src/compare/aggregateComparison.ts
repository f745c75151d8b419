import type { Product } from '../catalog/productTypes.js';
import {
  SLOTS,
  type ComparedProduct,
  type ComparisonCriterion,
  type ComparisonDocument,
  type CriterionVerdict,
  type ProductTriple,
  type Slot,
  type SlotTally,
} from './compareTypes.js';
import { parseRating } from './selectTopRated.js';

/**
 * Count criterion wins per slot. Unresolved verdicts are not counted.
 */
export function tallyVerdicts(verdicts: readonly CriterionVerdict[]): SlotTally[] {
  return SLOTS.map((slot) => ({
    slot,
    wins: verdicts.filter((verdict) => verdict.winnerSlot === slot).length,
  }));
}

/**
 * Slot with the most wins; ties go to the lower slot.
 * `degraded` is set when no slot won anything, in which case slot 1 is returned.
 */
export function pickOverallWinner(tally: readonly SlotTally[]): { winnerSlot: Slot; degraded: boolean } {
  let winnerSlot: Slot = 1;
  let best = -1;
  for (const entry of tally) {
    if (entry.wins > best) {
      best = entry.wins;
      winnerSlot = entry.slot;
    }
  }
  if (best <= 0) {
    return { winnerSlot: 1, degraded: true };
  }
  return { winnerSlot, degraded: false };
}

export function toComparedProduct(product: Product, slot: Slot): ComparedProduct {
  const compared: ComparedProduct = {
    slot,
    id: product.id,
    title: product.title,
    rating: product.rating ?? null,
    ratingValue: parseRating(product.rating),
  };
  if (product.summary) {
    compared.summary = product.summary;
  }
  if (product.tagline) {
    compared.tagline = product.tagline;
  }
  return compared;
}

/**
 * Assemble the comparison document from the pipeline's intermediate results.
 */
export function aggregateComparison(
  products: ProductTriple,
  criteria: readonly ComparisonCriterion[],
  verdicts: readonly CriterionVerdict[],
  now: () => Date = () => new Date()
): ComparisonDocument {
  const tally = tallyVerdicts(verdicts);
  const { winnerSlot, degraded } = pickOverallWinner(tally);

  return {
    products: SLOTS.map((slot) => toComparedProduct(products[slot - 1], slot)),
    criteria: [...criteria],
    verdicts: [...verdicts],
    tally,
    overallWinnerSlot: winnerSlot,
    degraded,
    generatedAt: now().toISOString(),
  };
}
