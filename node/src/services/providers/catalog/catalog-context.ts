// Reshapes catalog matches into product context items for answer synthesis.
import { childLogger, errorMessage } from '@/services/logger';
import { isAbortError } from '@/utils/errors';
import { type ContextItem, contextItemSchema, MAX_PRODUCT_CONTEXT_ITEMS } from '../retrieval-types';
import { type CatalogProvider, hasActiveFilters, type Product, type ProductFilters } from './catalog-provider';

const log = childLogger('catalog-context');

export function summarizeProduct(product: Product): string {
  return [
    `Brand: ${product.brand}`,
    `Category: ${product.category}`,
    `Materials: ${product.materials}`,
    `Care: ${product.care}`,
    `Sizes: ${product.sizes.length ? product.sizes.join(', ') : 'N/A'}`,
    `Tags: ${product.tags.length ? product.tags.join(', ') : 'None'}`,
  ].join('\n');
}

export function productToContextItem(product: Product, source = 'catalog'): ContextItem {
  return contextItemSchema.parse({
    type: 'product',
    id: product.productId,
    title: product.name,
    text: summarizeProduct(product),
    score: null,
    source,
    metadata: {
      brand: product.brand,
      category: product.category,
      price: product.price,
      sizes: product.sizes,
      tags: product.tags,
      ...(product.color ? { color: product.color } : {}),
    },
  });
}

/**
 * Exact-match search when any filter is set, free-text lookup on the question otherwise.
 * A missing or failing catalog yields no product context rather than an error.
 */
export async function findProductContext(
  catalog: CatalogProvider | null,
  question: string,
  filters: ProductFilters | undefined,
  limit = MAX_PRODUCT_CONTEXT_ITEMS,
): Promise<ContextItem[]> {
  if (!catalog) return [];
  let matches: Product[];
  try {
    matches = hasActiveFilters(filters) && filters
      ? await catalog.search(filters)
      : await catalog.lookupFromText(question);
  } catch (err) {
    if (isAbortError(err)) throw err;
    log.warn('catalog:lookup_failed', { error: errorMessage(err) });
    return [];
  }
  return matches.slice(0, Math.max(0, limit)).map((p) => productToContextItem(p, catalog.name));
}
