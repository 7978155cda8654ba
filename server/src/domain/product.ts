/**
 * Low-level helpers that build and mutate a single catalog product.
 *
 * Terminology:
 *   - A "product" is the gift a customer picks; it belongs to one category.
 *   - "Options" are the purchasable variants of that product. They are added by
 *     the option manager once the product itself has been saved.
 *   - "Summaries" are the flat shapes returned to clients.
 */
import { ok } from './errors.js';
import type { Result } from './errors.js';
import type {
  Category,
  NewProduct,
  Option,
  OptionSummary,
  Product,
  ProductAddRequest,
  ProductContents,
  ProductSummary,
  ProductSummaryWithCategory,
  ProductUpdateRequest,
} from './types.js';

/** Anything able to turn a category id into a category. */
export interface CategoryLookup {
  findById(categoryId: number): Result<Category>;
}

/**
 * Build a product entity from an add request.
 *
 * The category is resolved here so an unknown id fails before anything is
 * saved. Options start empty: they are attached after the product has an id.
 */
export function createProduct(request: ProductAddRequest, categories: CategoryLookup): Result<NewProduct> {
  const category = categories.findById(request.categoryId);
  if (!category.ok) return category;
  return ok({
    name: request.name.trim(),
    price: request.price,
    imageUrl: request.imageUrl,
    category: category.data,
    options: [],
  });
}

/**
 * Overwrite the content fields of an existing product.
 *
 * The category is only looked up again when the id changes. Nothing is
 * touched when that lookup fails.
 */
export function applyProductUpdate(
  product: Product,
  request: ProductUpdateRequest,
  categories: CategoryLookup,
): Result<Product> {
  if (product.category.id !== request.categoryId) {
    const category = categories.findById(request.categoryId);
    if (!category.ok) return category;
    product.category = category.data;
  }
  product.name = request.name.trim();
  product.price = request.price;
  product.imageUrl = request.imageUrl;
  return ok(product);
}

export function contentsOf(product: Product | NewProduct): ProductContents {
  return {
    name: product.name,
    price: product.price,
    imageUrl: product.imageUrl,
    categoryId: product.category.id,
  };
}

export function sameContents(a: ProductContents, b: ProductContents): boolean {
  return (
    a.name.trim() === b.name.trim() &&
    a.price === b.price &&
    a.imageUrl === b.imageUrl &&
    a.categoryId === b.categoryId
  );
}

export function toProductSummary(product: Product): ProductSummary {
  return { id: product.id, name: product.name, price: product.price, imageUrl: product.imageUrl };
}

export function toProductSummaryWithCategory(product: Product): ProductSummaryWithCategory {
  return { ...toProductSummary(product), categoryId: product.category.id };
}

export function toOptionSummary(option: Option): OptionSummary {
  return { id: option.id, name: option.name, quantity: option.quantity };
}
