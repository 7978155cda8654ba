import { fail, ok } from "../../domain/errors.js";
import type { Result } from "../../domain/errors.js";
import type { Product } from "../../domain/types.js";
import type { OrchestratorContext } from "./context.js";

export function mustGet(ctx: OrchestratorContext, productId: number): Result<Product> {
  const product = ctx.store.findById(productId);
  return product ? ok(product) : fail("NotFound");
}

/**
 * Run a mutating operation inside one store transaction and log its outcome.
 * A failed result rolls the store back before it is returned.
 */
export function mutate<T>(
  ctx: OrchestratorContext,
  operation: string,
  productId: number | undefined,
  fn: () => Result<T>,
): Result<T> {
  const result = ctx.store.transaction(fn);
  if (!result.ok) {
    ctx.rejected(productId, operation, `${operation}.rejected`, { error: result.error.code });
  }
  return result;
}

/** Apply `fn` to the product when it exists, propagate the failure otherwise. */
export function withProduct<T>(
  ctx: OrchestratorContext,
  productId: number,
  fn: (product: Product) => Result<T>,
): Result<T> {
  const product = mustGet(ctx, productId);
  if (!product.ok) return product;
  return fn(product.data);
}

export function map<T, U>(result: Result<T>, fn: (data: T) => U): Result<U> {
  return result.ok ? ok(fn(result.data)) : result;
}
