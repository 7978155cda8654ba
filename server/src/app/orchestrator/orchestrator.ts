import { fail, ok } from "../../domain/errors.js";
import type { Result } from "../../domain/errors.js";
import {
  createProduct,
  applyProductUpdate,
  toOptionSummary,
  toProductSummary,
  toProductSummaryWithCategory,
} from "../../domain/product.js";
import { parseSort } from "../../domain/sort.js";
import type {
  Category,
  OptionRequest,
  OptionSummary,
  Product,
  ProductAddRequest,
  ProductSummary,
  ProductSummaryWithCategory,
  ProductUpdateRequest,
} from "../../domain/types.js";
import { createContext } from "./context.js";
import type { OrchestratorContext, OrchestratorDeps } from "./context.js";
import { map, mustGet, mutate, withProduct } from "./utils.js";

/**
 * Entry point for every catalog operation.
 *
 * Reads go straight to the store. Writes run inside one store transaction
 * each, so `addProduct` never leaves a product behind when its options are
 * refused. Failures come back as `Result` values and are never retried here.
 */
export class ProductOrchestrator {
  private ctx: OrchestratorContext;

  constructor(deps: OrchestratorDeps) {
    this.ctx = createContext(deps);
  }

  getProductById(id: number): Result<Product> {
    return this.observe("product.get", id, mustGet(this.ctx, id));
  }

  /**
   * List products of one category (`null` for all) in the order asked by a
   * `"<field>,<direction>"` string. The field may be snake case (`image_url`).
   */
  getAllProducts(sortParams: string, categoryId: number | null): Result<ProductSummary[]> {
    return this.observe("product.list", undefined, this.listProducts(sortParams, categoryId));
  }

  getOptionsByProductId(id: number): Result<OptionSummary[]> {
    return map(this.getProductById(id), (product) => product.options.map(toOptionSummary));
  }

  listCategories(): Category[] {
    return this.ctx.categories.list();
  }

  addProduct(request: ProductAddRequest): Result<ProductSummaryWithCategory> {
    return mutate<ProductSummaryWithCategory>(this.ctx, "product.add", undefined, () => {
      if (this.ctx.store.findByContents(request)) return fail("AlreadyExists");
      if (request.options.length === 0) return fail("EmptyOptions");

      const entity = createProduct(request, this.ctx.categories);
      if (!entity.ok) return entity;
      const product = this.ctx.store.save(entity.data);

      const options = this.ctx.options.addOptions(product, request.options);
      if (!options.ok) return options;

      this.ctx.log(product.id, "product.add", "product.created", {
        categoryId: product.category.id,
        options: options.data.length,
      });
      return ok(toProductSummaryWithCategory(product));
    });
  }

  addProductOption(productId: number, request: OptionRequest): Result<OptionSummary> {
    return mutate<OptionSummary>(this.ctx, "option.add", productId, () =>
      withProduct(this.ctx, productId, (product) => {
        const option = this.ctx.options.addOption(product, request);
        if (!option.ok) return option;
        this.ctx.log(productId, "option.add", "option.created", { optionId: option.data.id });
        return ok(toOptionSummary(option.data));
      }),
    );
  }

  /**
   * Overwrite a product's content fields. Unlike `addProduct` this does not
   * look for a content-equivalent product first.
   */
  updateProductById(id: number, request: ProductUpdateRequest): Result<ProductSummary> {
    return mutate<ProductSummary>(this.ctx, "product.update", id, () =>
      withProduct(this.ctx, id, (product) => {
        const updated = applyProductUpdate(product, request, this.ctx.categories);
        if (!updated.ok) return updated;
        this.ctx.store.save(updated.data);
        this.ctx.log(id, "product.update", "product.updated", { categoryId: updated.data.category.id });
        return ok(toProductSummary(updated.data));
      }),
    );
  }

  updateProductOptionById(
    productId: number,
    optionId: number,
    request: OptionRequest,
  ): Result<OptionSummary> {
    return mutate<OptionSummary>(this.ctx, "option.update", productId, () =>
      withProduct(this.ctx, productId, (product) => {
        const option = this.ctx.options.updateOptionById(product, optionId, request);
        if (!option.ok) return option;
        this.ctx.log(productId, "option.update", "option.updated", { optionId });
        return ok(toOptionSummary(option.data));
      }),
    );
  }

  deleteProduct(id: number): Result<void> {
    return mutate<void>(this.ctx, "product.delete", id, () =>
      withProduct(this.ctx, id, (product) => {
        this.ctx.store.delete(product);
        this.ctx.log(id, "product.delete", "product.deleted");
        return ok(undefined);
      }),
    );
  }

  deleteProductOption(productId: number, optionId: number): Result<void> {
    return mutate<void>(this.ctx, "option.delete", productId, () =>
      withProduct(this.ctx, productId, (product) => {
        const removed = this.ctx.options.deleteOptionById(product, optionId);
        if (!removed.ok) return removed;
        this.ctx.log(productId, "option.delete", "option.deleted", { optionId });
        return removed;
      }),
    );
  }

  private listProducts(sortParams: string, categoryId: number | null): Result<ProductSummary[]> {
    const sort = parseSort(sortParams);
    if (!sort.ok) return sort;
    const category = this.ctx.categories.findById(categoryId);
    if (!category.ok) return category;
    return ok(this.ctx.store.findAllByCategory(category.data, sort.data).map(toProductSummary));
  }

  private observe<T>(operation: string, productId: number | undefined, result: Result<T>): Result<T> {
    if (!result.ok) {
      this.ctx.rejected(productId, operation, `${operation}.rejected`, { error: result.error.code });
    }
    return result;
  }
}
