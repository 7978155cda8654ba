import { fail, ok } from '../domain/errors.js';
import type { Result } from '../domain/errors.js';
import type { CategoryLookup } from '../domain/product.js';
import type { Category } from '../domain/types.js';

/**
 * Resolves category ids for listings and product construction.
 *
 * A `null` id is the "every category" filter of product listings and resolves
 * to `null`; any other id must name a registered category.
 */
export class CategoryResolver implements CategoryLookup {
  private categories = new Map<number, Category>();

  constructor(seed: Category[] = []) {
    for (const c of seed) this.register(c);
  }

  register(category: Category) { this.categories.set(category.id, category); }

  list() {
    return Array.from(this.categories.values()).sort((a, b) => a.id - b.id);
  }

  findById(categoryId: number): Result<Category>;
  findById(categoryId: number | null): Result<Category | null>;
  findById(categoryId: number | null): Result<Category | null> {
    if (categoryId === null) return ok(null);
    const category = this.categories.get(categoryId);
    return category ? ok(category) : fail('CategoryNotFound');
  }
}
