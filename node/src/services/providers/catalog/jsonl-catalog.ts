// In-memory product catalog loaded once from a JSONL file.
import fs from 'node:fs/promises';
import path from 'node:path';
import { readJsonl } from '@/etl/loaders';
import { childLogger } from '@/services/logger';
import { CatalogUnavailableError } from '@/utils/errors';
import {
  type CatalogProvider,
  type Product,
  type ProductFilters,
  productFromRecord,
  productRecordSchema,
} from './catalog-provider';

const log = childLogger('catalog');

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** Whole-word, case-insensitive phrase match. */
function mentions(text: string, phrase: string): boolean {
  const needle = phrase.trim().toLowerCase();
  if (!needle) return false;
  return new RegExp(`(^|[^a-z0-9])${escapeRegExp(needle)}($|[^a-z0-9])`).test(text);
}

function equalsIgnoreCase(a: string, b: string): boolean {
  return a.toLowerCase() === b.toLowerCase();
}

async function exists(candidate: string): Promise<boolean> {
  try {
    await fs.access(candidate);
    return true;
  } catch {
    return false;
  }
}

/** Absolute paths are used as-is; relative ones are tried against each root in order. */
export async function resolveDataPath(file: string, roots: string[] = [process.cwd()]): Promise<string> {
  if (path.isAbsolute(file)) return file;
  for (const root of roots) {
    const candidate = path.resolve(root, file);
    if (await exists(candidate)) return candidate;
  }
  return path.resolve(roots[0] ?? process.cwd(), file);
}

export class JsonlCatalogProvider implements CatalogProvider {
  readonly name = 'catalog';
  private readonly products: readonly Product[];

  constructor(products: Iterable<Product>) {
    this.products = Array.from(products);
  }

  /** Throws CatalogUnavailableError when the file is missing; invalid lines fail loudly. */
  static async load(file: string, roots?: string[]): Promise<JsonlCatalogProvider> {
    const resolved = await resolveDataPath(file, roots);
    if (!(await exists(resolved))) {
      throw new CatalogUnavailableError(`Product data file not found at ${resolved}`);
    }
    const rows = await readJsonl(resolved);
    const products = rows.map((row) => productFromRecord(productRecordSchema.parse(row)));
    log.info('catalog:loaded', { path: resolved, count: products.length });
    return new JsonlCatalogProvider(products);
  }

  get size(): number {
    return this.products.length;
  }

  async get(productId: string): Promise<Product | null> {
    return this.products.find((p) => equalsIgnoreCase(p.productId, productId)) ?? null;
  }

  async search(filters: ProductFilters): Promise<Product[]> {
    let candidates = [...this.products];
    const { brand, category, tag, size, query } = filters;
    if (brand) candidates = candidates.filter((p) => equalsIgnoreCase(p.brand, brand));
    if (category) candidates = candidates.filter((p) => equalsIgnoreCase(p.category, category));
    if (tag) candidates = candidates.filter((p) => p.tags.some((t) => equalsIgnoreCase(t, tag)));
    if (size) candidates = candidates.filter((p) => p.sizes.some((s) => equalsIgnoreCase(s, size)));
    if (query) {
      const q = query.toLowerCase();
      candidates = candidates.filter((p) =>
        [p.name, p.description, p.materials, p.care, p.brand].some((field) => field.toLowerCase().includes(q)),
      );
    }
    return candidates;
  }

  /**
   * A product matches when the text names its id, name, brand, category or one of its tags as a
   * whole phrase, or when the whole text occurs inside one of its descriptive fields.
   */
  async lookupFromText(text: string): Promise<Product[]> {
    const haystack = text.trim().toLowerCase();
    if (!haystack) return [];
    const substringMatches = new Set(await this.search({ query: haystack }));
    return this.products.filter(
      (p) =>
        substringMatches.has(p) ||
        [p.productId, p.name, p.brand, p.category, ...p.tags].some((phrase) => mentions(haystack, phrase)),
    );
  }
}
