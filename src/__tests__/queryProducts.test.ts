import { describe, it, expect } from 'vitest';
import type { Product } from '../catalog/productTypes.js';
import { findProductById, matchesCategory, queryProducts } from '../catalog/queryProducts.js';

const products: Product[] = [
  { id: '1', title: 'Backpack', description: '', features: [], category: 'Outdoor' },
  { id: '2', title: 'Bottle', description: '', features: [], category: 'outdoor' },
  { id: '3', title: 'Headlamp', description: '', features: [], category: 'Lighting' },
  { id: '4', title: 'Towel', description: '', features: [] },
];

describe('matchesCategory', () => {
  it('should compare categories case-insensitively', () => {
    expect(matchesCategory(products[0], 'OUTDOOR')).toBe(true);
    expect(matchesCategory(products[2], 'outdoor')).toBe(false);
    expect(matchesCategory(products[3], 'outdoor')).toBe(false);
  });
});

describe('queryProducts', () => {
  it('should paginate the whole catalog when no category is given', () => {
    const page = queryProducts(products, { limit: 2, offset: 1 });

    expect(page.products.map((p) => p.id)).toEqual(['2', '3']);
    expect(page.metadata).toEqual({ totalCount: 4, limit: 2, offset: 1, count: 2 });
  });

  it('should filter before paginating', () => {
    const page = queryProducts(products, { category: 'Outdoor', limit: 10, offset: 0 });

    expect(page.products.map((p) => p.id)).toEqual(['1', '2']);
    expect(page.metadata).toEqual({ totalCount: 2, limit: 10, offset: 0, count: 2 });
  });

  it('should return an empty page past the end', () => {
    const page = queryProducts(products, { limit: 10, offset: 10 });

    expect(page.products).toEqual([]);
    expect(page.metadata.count).toBe(0);
    expect(page.metadata.totalCount).toBe(4);
  });
});

describe('findProductById', () => {
  it('should find a product by id', () => {
    expect(findProductById(products, '3')?.title).toBe('Headlamp');
    expect(findProductById(products, '99')).toBeUndefined();
  });
});
