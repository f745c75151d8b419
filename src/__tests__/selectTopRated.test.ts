import { describe, it, expect } from 'vitest';
import type { Product } from '../catalog/productTypes.js';
import { parseRating, selectComparisonTriple, selectTopRated } from '../compare/index.js';
import { InsufficientDataError } from '../errors/index.js';

function catalog(ratings: Product['rating'][]): Product[] {
  return ratings.map((rating, index) => ({
    id: String(index + 1),
    title: `Product ${index + 1}`,
    description: '',
    features: [],
    rating,
  }));
}

describe('parseRating', () => {
  it('should read numbers and leading floats', () => {
    expect(parseRating(3)).toBe(3);
    expect(parseRating('4.8')).toBe(4.8);
    expect(parseRating('4.5 out of 5')).toBe(4.5);
    expect(parseRating(' 3 stars')).toBe(3);
  });

  it('should treat missing and non-numeric ratings as unrated', () => {
    expect(parseRating(undefined)).toBeNull();
    expect(parseRating(null)).toBeNull();
    expect(parseRating('')).toBeNull();
    expect(parseRating('Not rated')).toBeNull();
    expect(parseRating(Number.NaN)).toBeNull();
    expect(parseRating(Number.POSITIVE_INFINITY)).toBeNull();
  });
});

describe('selectTopRated', () => {
  it('should return the three highest rated products, best first', () => {
    const selected = selectTopRated(catalog([4.5, 3.0, 'Not rated', 4.8, 4.0]));

    expect(selected.map((p) => p.id)).toEqual(['4', '1', '5']);
  });

  it('should keep catalog order for ties', () => {
    const selected = selectTopRated(catalog([4, 5, 4, 4]));

    expect(selected.map((p) => p.id)).toEqual(['2', '1', '3']);
  });

  it('should fill remaining slots with unrated products in catalog order', () => {
    const selected = selectTopRated(catalog([null, 'Not rated', 3, undefined]));

    expect(selected.map((p) => p.id)).toEqual(['3', '1', '2']);
  });

  it('should honour a custom n', () => {
    expect(selectTopRated(catalog([1, 2, 3]), 2).map((p) => p.id)).toEqual(['3', '2']);
  });

  it('should throw InsufficientDataError for a catalog smaller than n', () => {
    let caught: unknown;
    try {
      selectTopRated(catalog([4.5, 4.0]));
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(InsufficientDataError);
    expect(caught).toMatchObject({
      code: 'COMPARISON_INSUFFICIENT_DATA',
      required: 3,
      available: 2,
    });
  });

  it('should not reorder the input array', () => {
    const products = catalog([1, 5, 3]);

    selectTopRated(products);

    expect(products.map((p) => p.id)).toEqual(['1', '2', '3']);
  });
});

describe('selectComparisonTriple', () => {
  it('should return a triple in slot order', () => {
    const [first, second, third] = selectComparisonTriple(catalog([2, 9, 5, 7]));

    expect([first.id, second.id, third.id]).toEqual(['2', '4', '3']);
  });
});
