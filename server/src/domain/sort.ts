/**
 * Sorting rules for product listings.
 *
 * Clients ask for an order with a compact `"<field>,<direction>"` string such
 * as `price,desc` or `image_url,asc`. The field must name one of the attributes
 * a product declares; anything else is rejected before the store is queried.
 */
import { fail, ok } from './errors.js';
import type { Result } from './errors.js';
import { PRODUCT_FIELDS } from './types.js';
import type { Product, ProductField, SortDirection, SortSpec } from './types.js';
import { snakeToCamel } from './utils.js';

const VALID_FIELDS: ReadonlySet<string> = new Set<string>(PRODUCT_FIELDS);

function isProductField(field: string): field is ProductField {
  return VALID_FIELDS.has(field);
}

function toDirection(token: string): Result<SortDirection> {
  switch (token) {
    case 'asc':
      return ok('asc');
    case 'desc':
      return ok('desc');
    default:
      return fail('InvalidSortDirection');
  }
}

/**
 * Parse a raw sort string.
 *
 * Only the first comma splits: `name,asc,extra` carries the direction
 * `asc,extra` and fails. A missing comma leaves an empty direction, which fails
 * the same way. The direction is checked before the field.
 */
export function parseSort(sortParams: string): Result<SortSpec> {
  const comma = sortParams.indexOf(',');
  const fieldToken = comma === -1 ? sortParams : sortParams.slice(0, comma);
  const directionToken = comma === -1 ? '' : sortParams.slice(comma + 1);

  const direction = toDirection(directionToken);
  if (!direction.ok) return direction;

  const field = snakeToCamel(fieldToken);
  if (!isProductField(field)) return fail('InvalidSortField');

  return ok({ field, direction: direction.data });
}

const compareText = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0);

function compareField(a: Product, b: Product, field: ProductField): number {
  switch (field) {
    case 'id':
      return a.id - b.id;
    case 'price':
      return a.price - b.price;
    case 'name':
      return compareText(a.name, b.name);
    case 'imageUrl':
      return compareText(a.imageUrl, b.imageUrl);
    // Associations order by their key: the category id, the option count.
    case 'category':
      return a.category.id - b.category.id;
    case 'options':
      return a.options.length - b.options.length;
  }
}

/**
 * Build a comparator for `Array.prototype.sort`. Ties fall back to ascending
 * id so listings stay stable whatever the direction.
 *
 * Text fields compare by UTF-16 code unit, case-sensitively and without
 * locale rules (`Zebra` before `apple`). A store backed by a database must
 * order them with a binary collation to return the same listings.
 */
export function productComparator(spec: SortSpec): (a: Product, b: Product) => number {
  const sign = spec.direction === 'asc' ? 1 : -1;
  return (a, b) => sign * compareField(a, b, spec.field) || a.id - b.id;
}
