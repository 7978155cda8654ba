/**
 * Catalog failures are returned, not thrown.
 *
 * Every fallible call hands back a `Result`: the HTTP layer reads `ok` and
 * maps `error.kind` to a status code. The `code` doubles as the error message
 * and is what clients receive in the `{ ok: false, error }` envelope.
 */

export type CatalogErrorKind =
  | 'NotFound'
  | 'AlreadyExists'
  | 'EmptyOptions'
  | 'InvalidSortDirection'
  | 'InvalidSortField'
  | 'CategoryNotFound'
  | 'OptionNotFound'
  | 'OptionAlreadyExists';

const CODES: Record<CatalogErrorKind, string> = {
  NotFound: 'product_not_found',
  AlreadyExists: 'product_already_exists',
  EmptyOptions: 'product_options_empty',
  InvalidSortDirection: 'sort_direction_illegal',
  InvalidSortField: 'sort_field_illegal',
  CategoryNotFound: 'category_not_found',
  OptionNotFound: 'option_not_found',
  OptionAlreadyExists: 'option_already_exists',
};

export class CatalogError extends Error {
  readonly kind: CatalogErrorKind;
  readonly code: string;

  constructor(kind: CatalogErrorKind) {
    super(CODES[kind]);
    this.name = 'CatalogError';
    this.kind = kind;
    this.code = CODES[kind];
  }
}

export type Result<T> = { ok: true; data: T } | { ok: false; error: CatalogError };

export function ok<T>(data: T): Result<T> {
  return { ok: true, data };
}

export function fail<T = never>(kind: CatalogErrorKind): Result<T> {
  return { ok: false, error: new CatalogError(kind) };
}
