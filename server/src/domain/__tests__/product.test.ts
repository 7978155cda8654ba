import { describe, it, expect, vi } from 'vitest';
import { fail, ok } from '../errors.js';
import type { Result } from '../errors.js';
import {
  applyProductUpdate,
  createProduct,
  sameContents,
  toOptionSummary,
  toProductSummaryWithCategory,
} from '../product.js';
import type { Category, Product } from '../types.js';

const flowers: Category = { id: 1, name: 'Flowers', color: '#f06292', imageUrl: '', description: '' };
const sweets: Category = { id: 2, name: 'Sweets', color: '#8d6e63', imageUrl: '', description: '' };

function lookup() {
  const byId = new Map([flowers, sweets].map(c => [c.id, c]));
  return {
    findById: vi.fn((id: number): Result<Category> => {
      const c = byId.get(id);
      return c ? ok(c) : fail('CategoryNotFound');
    }),
  };
}

const mkProduct = (): Product => ({
  id: 7,
  name: 'Rose Bouquet',
  price: 30000,
  imageUrl: 'https://example.com/rose.png',
  category: flowers,
  options: [{ id: 3, name: 'Red', quantity: 10, productId: 7 }],
});

describe('createProduct', () => {
  it('resolves the category and starts without options', () => {
    const res = createProduct(
      { name: ' Rose Bouquet ', price: 30000, imageUrl: 'https://example.com/rose.png', categoryId: 1, options: [] },
      lookup(),
    );
    expect(res).toEqual({
      ok: true,
      data: {
        name: 'Rose Bouquet',
        price: 30000,
        imageUrl: 'https://example.com/rose.png',
        category: flowers,
        options: [],
      },
    });
  });

  it('fails on an unknown category', () => {
    const res = createProduct(
      { name: 'Rose', price: 1, imageUrl: 'https://example.com/r.png', categoryId: 9, options: [] },
      lookup(),
    );
    expect(res.ok).toBe(false);
    if (!res.ok) expect(res.error.kind).toBe('CategoryNotFound');
  });
});

describe('applyProductUpdate', () => {
  it('keeps the category without a lookup when its id is unchanged', () => {
    const categories = lookup();
    const product = mkProduct();
    const res = applyProductUpdate(
      product,
      { name: 'Rose Deluxe', price: 45000, imageUrl: 'https://example.com/deluxe.png', categoryId: 1 },
      categories,
    );
    expect(res.ok).toBe(true);
    expect(categories.findById).not.toHaveBeenCalled();
    expect(product.name).toBe('Rose Deluxe');
    expect(product.price).toBe(45000);
    expect(product.imageUrl).toBe('https://example.com/deluxe.png');
    expect(product.options).toHaveLength(1);
  });

  it('re-resolves a changed category', () => {
    const product = mkProduct();
    applyProductUpdate(product, { name: 'Candy Box', price: 9000, imageUrl: 'https://example.com/c.png', categoryId: 2 }, lookup());
    expect(product.category).toBe(sweets);
  });

  it('leaves the product untouched when the new category is unknown', () => {
    const product = mkProduct();
    const res = applyProductUpdate(product, { name: 'Other', price: 1, imageUrl: 'https://example.com/o.png', categoryId: 9 }, lookup());
    expect(res.ok).toBe(false);
    expect(product).toEqual(mkProduct());
  });
});

describe('content equivalence and summaries', () => {
  it('compares trimmed names with price, image and category', () => {
    const base = { name: 'Rose', price: 100, imageUrl: 'https://example.com/r.png', categoryId: 1 };
    expect(sameContents(base, { ...base, name: ' Rose ' })).toBe(true);
    expect(sameContents(base, { ...base, price: 101 })).toBe(false);
    expect(sameContents(base, { ...base, categoryId: 2 })).toBe(false);
  });

  it('flattens product and option', () => {
    const product = mkProduct();
    expect(toProductSummaryWithCategory(product)).toEqual({
      id: 7,
      name: 'Rose Bouquet',
      price: 30000,
      imageUrl: 'https://example.com/rose.png',
      categoryId: 1,
    });
    expect(toOptionSummary(product.options[0])).toEqual({ id: 3, name: 'Red', quantity: 10 });
  });
});
