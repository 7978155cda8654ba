import type { Result } from '../../domain/errors.js';
import type { Category, ProductAddRequest } from '../../domain/types.js';
import { CategoryResolver } from '../categories.js';
import { OptionManager } from '../options.js';
import { ProductOrchestrator } from '../orchestrator/index.js';
import { InMemoryProductStore } from '../store.js';

export const flowers: Category = {
  id: 1,
  name: 'Flowers',
  color: '#f06292',
  imageUrl: 'https://example.com/categories/flowers.png',
  description: 'Bouquets',
};

export const sweets: Category = {
  id: 2,
  name: 'Sweets',
  color: '#8d6e63',
  imageUrl: 'https://example.com/categories/sweets.png',
  description: 'Chocolates',
};

export function addRequest(overrides: Partial<ProductAddRequest> = {}): ProductAddRequest {
  return {
    name: 'Rose Bouquet',
    price: 30000,
    imageUrl: 'https://example.com/rose.png',
    categoryId: flowers.id,
    options: [{ name: 'Red', quantity: 10 }],
    ...overrides,
  };
}

export function buildCatalog() {
  const store = new InMemoryProductStore();
  const categories = new CategoryResolver([flowers, sweets]);
  const options = new OptionManager(store);
  const orch = new ProductOrchestrator({ store, categories, options });
  return { store, categories, options, orch };
}

/** Error kind of a failed result, `undefined` when it succeeded. */
export function kindOf<T>(result: Result<T>) {
  return result.ok ? undefined : result.error.kind;
}

/** Unwrap a result the test expects to succeed. */
export function unwrap<T>(result: Result<T>): T {
  if (!result.ok) throw new Error(`unexpected failure: ${result.error.code}`);
  return result.data;
}
