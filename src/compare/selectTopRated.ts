/**
 * Top-rated product selection.
 */

import type { Product } from '../catalog/productTypes.js';
import { InsufficientDataError } from '../errors/AppError.js';
import { COMPARE_SIZE, type ProductTriple } from './compareTypes.js';

/**
 * Parse a scraped rating into a number.
 *
 * Uses the leading float of a string ("4.5 out of 5" -> 4.5). Missing values,
 * sentinels such as "Not rated" and non-finite numbers yield null.
 */
export function parseRating(raw: unknown): number | null {
  if (typeof raw === 'number') {
    return Number.isFinite(raw) ? raw : null;
  }
  if (typeof raw !== 'string') {
    return null;
  }
  const value = Number.parseFloat(raw.trim());
  return Number.isFinite(value) ? value : null;
}

/**
 * Selects the top `n` products by rating.
 *
 * Ordering:
 * 1. Rated products, highest rating first
 * 2. Unrated products, only when fewer than `n` products carry a rating
 * Ties keep catalog order, so the same catalog always yields the same selection.
 *
 * @throws InsufficientDataError when the catalog has fewer than `n` products
 */
export function selectTopRated(products: readonly Product[], n: number = COMPARE_SIZE): Product[] {
  if (products.length < n) {
    throw new InsufficientDataError(n, products.length);
  }

  const ranked = products.map((product, position) => ({
    product,
    position,
    rating: parseRating(product.rating),
  }));

  ranked.sort((a, b) => {
    if (a.rating === null && b.rating === null) return a.position - b.position;
    if (a.rating === null) return 1;
    if (b.rating === null) return -1;
    return b.rating - a.rating || a.position - b.position;
  });

  return ranked.slice(0, n).map((entry) => entry.product);
}

/**
 * Select the comparison triple, slot 1 being the highest rated.
 */
export function selectComparisonTriple(products: readonly Product[]): ProductTriple {
  const [first, second, third] = selectTopRated(products, COMPARE_SIZE);
  return [first, second, third];
}
