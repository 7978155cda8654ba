import { fail, ok } from '../domain/errors.js';
import type { Result } from '../domain/errors.js';
import type { Option, OptionRequest, Product } from '../domain/types.js';
import { nameKey } from '../domain/utils.js';
import type { ProductStore } from './store.js';

/**
 * Owns the options of already-saved products.
 *
 * Option names are unique inside one product (compared case-insensitively,
 * surrounding spaces ignored). Every change is written back through the store
 * so it lands in the caller's transaction.
 */
export class OptionManager {
  constructor(private readonly store: ProductStore) {}

  addOptions(product: Product, requests: OptionRequest[]): Result<Option[]> {
    const taken = new Set(product.options.map(o => nameKey(o.name)));
    for (const r of requests) {
      const key = nameKey(r.name);
      if (taken.has(key)) return fail('OptionAlreadyExists');
      taken.add(key);
    }
    const created = requests.map(r => this.attach(product, r));
    this.store.save(product);
    return ok(created);
  }

  addOption(product: Product, request: OptionRequest): Result<Option> {
    if (this.nameTaken(product, request.name)) return fail('OptionAlreadyExists');
    const option = this.attach(product, request);
    this.store.save(product);
    return ok(option);
  }

  updateOptionById(product: Product, optionId: number, request: OptionRequest): Result<Option> {
    const option = product.options.find(o => o.id === optionId);
    if (!option) return fail('OptionNotFound');
    if (this.nameTaken(product, request.name, optionId)) return fail('OptionAlreadyExists');
    option.name = request.name.trim();
    option.quantity = request.quantity;
    this.store.save(product);
    return ok(option);
  }

  deleteOptionById(product: Product, optionId: number): Result<void> {
    const index = product.options.findIndex(o => o.id === optionId);
    if (index === -1) return fail('OptionNotFound');
    product.options.splice(index, 1);
    this.store.save(product);
    return ok(undefined);
  }

  private nameTaken(product: Product, name: string, exceptId?: number) {
    const key = nameKey(name);
    return product.options.some(o => o.id !== exceptId && nameKey(o.name) === key);
  }

  private attach(product: Product, request: OptionRequest): Option {
    const option: Option = {
      id: this.store.nextOptionId(),
      name: request.name.trim(),
      quantity: request.quantity,
      productId: product.id,
    };
    product.options.push(option);
    return option;
  }
}
