import { describe, it, expect } from 'vitest';
import type { Product } from '../catalog/productTypes.js';
import {
  aggregateComparison,
  comparisonDocumentSchema,
  pickOverallWinner,
  tallyVerdicts,
  type CriterionVerdict,
  type ProductTriple,
  type Slot,
} from '../compare/index.js';

function verdicts(winners: (Slot | null)[]): CriterionVerdict[] {
  return winners.map((winnerSlot, index) => ({
    criterionIndex: index + 1,
    winnerSlot,
    rationale: `Rationale ${index + 1}`,
  }));
}

const products: ProductTriple = [
  { id: '4', title: 'Headlamp', description: '', features: [], rating: '4.8', summary: 'Bright.', tagline: 'See more' },
  { id: '1', title: 'Backpack', description: '', features: [], rating: '4.5 out of 5' },
  { id: '5', title: 'Chair', description: '', features: [], rating: 4 },
];

const criteria = [1, 2, 3, 4, 5].map((index) => ({ index, text: `Question ${index}?` }));

describe('tallyVerdicts', () => {
  it('should count wins per slot, ignoring unresolved verdicts', () => {
    expect(tallyVerdicts(verdicts([1, 2, null, 2, 1]))).toEqual([
      { slot: 1, wins: 2 },
      { slot: 2, wins: 2 },
      { slot: 3, wins: 0 },
    ]);
  });
});

describe('pickOverallWinner', () => {
  it('should break ties in favour of the lower slot', () => {
    expect(pickOverallWinner(tallyVerdicts(verdicts([1, 1, 2, 2, 3])))).toEqual({ winnerSlot: 1, degraded: false });
    expect(pickOverallWinner(tallyVerdicts(verdicts([3, 2, 3, 2, null])))).toEqual({ winnerSlot: 2, degraded: false });
  });

  it('should pick the slot with the most wins', () => {
    expect(pickOverallWinner(tallyVerdicts(verdicts([3, 3, 1, 3, 2])))).toEqual({ winnerSlot: 3, degraded: false });
  });

  it('should mark an all-unresolved comparison as degraded with slot 1', () => {
    expect(pickOverallWinner(tallyVerdicts(verdicts([null, null, null])))).toEqual({ winnerSlot: 1, degraded: true });
  });
});

describe('aggregateComparison', () => {
  const now = () => new Date('2026-01-02T03:04:05.000Z');

  it('should assemble a schema-valid document', () => {
    const document = aggregateComparison(products, criteria, verdicts([2, 1, 2, 3, null]), now);

    expect(document.products).toEqual([
      { slot: 1, id: '4', title: 'Headlamp', rating: '4.8', ratingValue: 4.8, summary: 'Bright.', tagline: 'See more' },
      { slot: 2, id: '1', title: 'Backpack', rating: '4.5 out of 5', ratingValue: 4.5 },
      { slot: 3, id: '5', title: 'Chair', rating: 4, ratingValue: 4 },
    ]);
    expect(document.criteria).toEqual(criteria);
    expect(document.verdicts.map((v) => v.winnerSlot)).toEqual([2, 1, 2, 3, null]);
    expect(document.tally).toEqual([
      { slot: 1, wins: 1 },
      { slot: 2, wins: 2 },
      { slot: 3, wins: 1 },
    ]);
    expect(document.overallWinnerSlot).toBe(2);
    expect(document.degraded).toBe(false);
    expect(document.generatedAt).toBe('2026-01-02T03:04:05.000Z');
    expect(comparisonDocumentSchema.parse(document)).toEqual(document);
  });

  it('should omit generated copy the product does not have', () => {
    const document = aggregateComparison(products, criteria, verdicts([1, 1, 1, 1, 1]), now);

    expect('summary' in document.products[1]).toBe(false);
    expect('tagline' in document.products[1]).toBe(false);
  });

  it('should produce a degraded document when nothing resolved', () => {
    const document = aggregateComparison(products, criteria, verdicts([null, null, null, null, null]), now);

    expect(document.degraded).toBe(true);
    expect(document.overallWinnerSlot).toBe(1);
    expect(document.tally.every((entry) => entry.wins === 0)).toBe(true);
  });
});
