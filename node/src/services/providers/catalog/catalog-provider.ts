// src/services/providers/catalog/catalog-provider.ts
// Canonical product shape for the fashion catalog and the read-only lookup contract the pipeline uses.
import { z } from 'zod';

/** One JSONL line of the product data file (snake_case on disk). */
export const productRecordSchema = z.object({
  product_id: z.string().min(1),
  name: z.string(),
  brand: z.string(),
  category: z.string(),
  materials: z.string(),
  description: z.string(),
  care: z.string(),
  price: z.number(),
  sizes: z.array(z.string()).default([]),
  color: z.string().nullish(),
  tags: z.array(z.string()).default([]),
});

export type ProductRecord = z.infer<typeof productRecordSchema>;

export interface Product {
  productId: string;
  name: string;
  brand: string;
  category: string;
  materials: string;
  description: string;
  /** Care instructions. */
  care: string;
  price: number;
  sizes: string[];
  color?: string;
  tags: string[];
}

export interface ProductFilters {
  brand?: string;
  category?: string;
  tag?: string;
  size?: string;
  /** Substring match over name, description, materials, care and brand. */
  query?: string;
}

export interface CatalogProvider {
  readonly name: string;
  get(productId: string): Promise<Product | null>;
  /** Exact (case-insensitive) match on every filter given; catalog order. */
  search(filters: ProductFilters): Promise<Product[]>;
  /** Products a free-text question refers to; catalog order. */
  lookupFromText(text: string): Promise<Product[]>;
}

export function productFromRecord(record: ProductRecord): Product {
  return {
    productId: record.product_id,
    name: record.name,
    brand: record.brand,
    category: record.category,
    materials: record.materials,
    description: record.description,
    care: record.care,
    price: record.price,
    sizes: record.sizes,
    ...(record.color ? { color: record.color } : {}),
    tags: record.tags,
  };
}

export function productToRecord(product: Product): ProductRecord {
  return {
    product_id: product.productId,
    name: product.name,
    brand: product.brand,
    category: product.category,
    materials: product.materials,
    description: product.description,
    care: product.care,
    price: product.price,
    sizes: product.sizes,
    color: product.color ?? null,
    tags: product.tags,
  };
}

export function hasActiveFilters(filters: ProductFilters | undefined): boolean {
  if (!filters) return false;
  return Object.values(filters).some((v) => typeof v === 'string' && v.trim().length > 0);
}
