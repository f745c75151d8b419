import { z } from 'zod';

/**
 * Raw rating as scraped: a number, a numeric string, or a sentinel such as "Not rated".
 */
export const ratingSchema = z.union([z.string(), z.number()]).nullable().optional();

/**
 * Product as written by the scraper.
 *
 * Unknown fields (category, price, url, source, ...) pass through untouched.
 * Numeric ids are coerced to strings.
 */
export const productSchema = z
  .object({
    id: z.union([z.string().min(1), z.number()]).transform((id) => String(id)),
    title: z.string().default(''),
    description: z.string().default(''),
    features: z.array(z.string()).default([]),
    rating: ratingSchema,
    category: z.string().optional(),
    summary: z.string().optional(),
    tagline: z.string().optional(),
    highlights: z.array(z.string()).optional(),
  })
  .passthrough();

export type Product = z.infer<typeof productSchema>;

/**
 * Product with generated marketing copy.
 */
export type EnrichedProduct = Product & {
  summary: string;
  tagline: string;
  highlights: string[];
};

/**
 * A product counts as enriched once all three generated fields are non-empty.
 * Enriched products are never regenerated automatically.
 */
export function isEnriched(product: Product): product is EnrichedProduct {
  return (
    typeof product.summary === 'string' && product.summary.length > 0 &&
    typeof product.tagline === 'string' && product.tagline.length > 0 &&
    Array.isArray(product.highlights) && product.highlights.length > 0
  );
}
