/**
 * Shared TypeScript types that describe the in-memory shape of the catalog.
 *
 * Reading tip:
 *   - A `Product` is something a customer can buy as a gift. It always sits in
 *     exactly one `Category` and offers one or more purchasable `Option`s
 *     (colour, size, bundle...).
 *   - The store keeps `Product` objects whole, options included, so the
 *     orchestrator can mutate an entity in place and let the store persist it.
 *   - HTTP responses never expose the entity itself: they go through the
 *     summary shapes at the bottom of this file.
 */

export interface Category {
  id: number;
  name: string;
  /** Hex colour used by clients to render the category badge. */
  color: string;
  imageUrl: string;
  description: string;
}

export interface Option {
  id: number;
  name: string;
  /** Units still available for this option. */
  quantity: number;
  /** Back-reference to the owning product. */
  productId: number;
}

export interface Product {
  id: number;
  name: string;
  price: number;
  imageUrl: string;
  category: Category;
  /** Ordered as they were added. */
  options: Option[];
}

/** Product before the store assigned it an id. */
export type NewProduct = Omit<Product, 'id'> & { id?: undefined };

/** Fields compared when looking for a content-equivalent product. */
export type ProductContents = Pick<Product, 'name' | 'price' | 'imageUrl'> & {
  categoryId: number;
};

export type SortDirection = 'asc' | 'desc';

export interface SortSpec {
  field: ProductField;
  direction: SortDirection;
}

/** Declared attribute names of `Product`, the only valid sort fields. */
export const PRODUCT_FIELDS = ['id', 'name', 'price', 'imageUrl', 'category', 'options'] as const;

export type ProductField = (typeof PRODUCT_FIELDS)[number];

// Requests

export interface OptionRequest {
  name: string;
  quantity: number;
}

export interface ProductAddRequest extends ProductContents {
  options: OptionRequest[];
}

export type ProductUpdateRequest = ProductContents;

// Summaries

export interface ProductSummary {
  id: number;
  name: string;
  price: number;
  imageUrl: string;
}

export interface ProductSummaryWithCategory extends ProductSummary {
  categoryId: number;
}

export interface OptionSummary {
  id: number;
  name: string;
  quantity: number;
}
