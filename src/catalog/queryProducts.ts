import type { Product } from './productTypes.js';

export interface ProductQuery {
  category?: string;
  limit: number;
  offset: number;
}

export interface ProductPage {
  products: Product[];
  metadata: {
    totalCount: number;
    limit: number;
    offset: number;
    count: number;
  };
}

/**
 * Case-insensitive category match. Products without a category never match.
 */
export function matchesCategory(product: Product, category: string): boolean {
  return (product.category ?? '').toLowerCase() === category.toLowerCase();
}

/**
 * Filter by category (when given), then slice a page out of the result.
 * `totalCount` is the number of matches before pagination.
 */
export function queryProducts(products: Product[], query: ProductQuery): ProductPage {
  const filtered = query.category
    ? products.filter((product) => matchesCategory(product, query.category ?? ''))
    : products;

  const page = filtered.slice(query.offset, query.offset + query.limit);

  return {
    products: page,
    metadata: {
      totalCount: filtered.length,
      limit: query.limit,
      offset: query.offset,
      count: page.length,
    },
  };
}

export function findProductById(products: Product[], productId: string): Product | undefined {
  return products.find((product) => product.id === productId);
}
