/**
 * Type definitions and persisted-document schema for product comparison.
 */
import { z } from 'zod';
import type { Product } from '../catalog/productTypes.js';

/**
 * Number of products compared at once. Slots are numbered 1..COMPARE_SIZE.
 */
export const COMPARE_SIZE = 3;

/**
 * Number of comparison criteria requested from the model.
 */
export const CRITERIA_COUNT = 5;

export const SLOTS = [1, 2, 3] as const;

export const slotSchema = z.union([z.literal(1), z.literal(2), z.literal(3)]);

/**
 * Position of a product in the compared triple (not its catalog id).
 */
export type Slot = z.infer<typeof slotSchema>;

/**
 * The selected products, in slot order (slot 1 = highest rated).
 */
export type ProductTriple = readonly [Product, Product, Product];

export const comparisonCriterionSchema = z.object({
  index: z.number().int().positive(),
  text: z.string(),
});

export type ComparisonCriterion = z.infer<typeof comparisonCriterionSchema>;

export const criterionVerdictSchema = z.object({
  criterionIndex: z.number().int().positive(),
  /** null when no winner could be parsed from the response */
  winnerSlot: slotSchema.nullable(),
  rationale: z.string(),
});

export type CriterionVerdict = z.infer<typeof criterionVerdictSchema>;

export const comparedProductSchema = z.object({
  slot: slotSchema,
  id: z.string(),
  title: z.string(),
  /** Rating exactly as it appears in the catalog */
  rating: z.union([z.string(), z.number()]).nullable(),
  /** Parsed rating, null when unrated */
  ratingValue: z.number().nullable(),
  summary: z.string().optional(),
  tagline: z.string().optional(),
});

export type ComparedProduct = z.infer<typeof comparedProductSchema>;

export const slotTallySchema = z.object({
  slot: slotSchema,
  wins: z.number().int().nonnegative(),
});

export type SlotTally = z.infer<typeof slotTallySchema>;

/**
 * The persisted comparison artifact. Field order here is the serialization order.
 */
export const comparisonDocumentSchema = z.object({
  products: z.array(comparedProductSchema).length(COMPARE_SIZE),
  criteria: z.array(comparisonCriterionSchema),
  verdicts: z.array(criterionVerdictSchema),
  tally: z.array(slotTallySchema),
  overallWinnerSlot: slotSchema,
  /** True when no criterion verdict could be resolved */
  degraded: z.boolean(),
  generatedAt: z.string(),
});

export type ComparisonDocument = z.infer<typeof comparisonDocumentSchema>;

export function toSlot(value: number): Slot | null {
  return value === 1 || value === 2 || value === 3 ? value : null;
}
