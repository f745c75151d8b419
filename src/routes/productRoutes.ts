import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import type { CatalogReader } from '../catalog/CatalogReader.js';
import { findProductById, queryProducts } from '../catalog/queryProducts.js';
import { AppError } from '../errors/index.js';
import { sendError } from '../http/errorReply.js';

export interface ProductRouteOptions {
  reader: CatalogReader;
  debug?: boolean;
}

export const paginationQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(10),
  offset: z.coerce.number().int().min(0).default(0),
});

const productsQuerySchema = paginationQuerySchema.extend({
  category: z.string().trim().optional(),
});

const productParamsSchema = z.object({
  productId: z.string().min(1),
});

const categoryParamsSchema = z.object({
  category: z.string().trim().min(1),
});

const ENDPOINTS = [
  { method: 'GET', path: '/products', description: 'List products (limit, offset, category)' },
  { method: 'GET', path: '/products/:productId', description: 'Get one product' },
  { method: 'GET', path: '/products/category/:category', description: 'List products in a category' },
  { method: 'GET', path: '/comparison', description: 'Product comparison (refresh, mock)' },
  { method: 'GET', path: '/health', description: 'Health check' },
];

/**
 * Read-only catalog endpoints. The catalog is re-read on every request so
 * a fresh enrichment run is served without a restart.
 */
export async function productRoutes(fastify: FastifyInstance, options: ProductRouteOptions) {
  const { reader, debug = false } = options;

  fastify.get('/', async () => ({
    name: 'Product Copy & Comparison API',
    endpoints: ENDPOINTS,
  }));

  fastify.get('/health', async () => ({ status: 'ok' }));

  fastify.get('/products', async (request, reply) => {
    try {
      const query = productsQuerySchema.parse(request.query);
      const products = await reader.loadProducts();
      return queryProducts(products, {
        category: query.category || undefined,
        limit: query.limit,
        offset: query.offset,
      });
    } catch (error) {
      return sendError(request, reply, error, { debug });
    }
  });

  fastify.get('/products/category/:category', async (request, reply) => {
    try {
      const { category } = categoryParamsSchema.parse(request.params);
      const query = paginationQuerySchema.parse(request.query);
      const products = await reader.loadProducts();
      return {
        category,
        ...queryProducts(products, { category, limit: query.limit, offset: query.offset }),
      };
    } catch (error) {
      return sendError(request, reply, error, { debug });
    }
  });

  fastify.get('/products/:productId', async (request, reply) => {
    try {
      const { productId } = productParamsSchema.parse(request.params);
      const products = await reader.loadProducts();
      const product = findProductById(products, productId);
      if (!product) {
        throw AppError.notFound(`Product not found: ${productId}`, { productId });
      }
      return product;
    } catch (error) {
      return sendError(request, reply, error, { debug });
    }
  });
}
