import type { Product } from '../catalog/productTypes.js';
import { NO_DESCRIPTION_PLACEHOLDER, NO_FEATURES_PLACEHOLDER } from '../generation/prompts.js';
import { formatFeatureList } from '../generation/template.js';
import type { ProductTriple } from './compareTypes.js';

function formatRating(rating: Product['rating']): string {
  if (rating === null || rating === undefined || String(rating).trim() === '') {
    return 'Not rated';
  }
  return String(rating);
}

/**
 * Render the triple as "Product 1 / Product 2 / Product 3" blocks.
 * The labels are what verdict parsing looks for, so they must stay in this form.
 */
export function formatProductsForPrompt(products: ProductTriple): string {
  return products
    .map((product, index) =>
      [
        `Product ${index + 1}: ${product.title || product.id}`,
        `Rating: ${formatRating(product.rating)}`,
        `Description: ${product.description.trim() || NO_DESCRIPTION_PLACEHOLDER}`,
        'Features:',
        formatFeatureList(product.features, NO_FEATURES_PLACEHOLDER),
      ].join('\n')
    )
    .join('\n\n');
}
