import type { Result } from '../domain/errors.js';
import { contentsOf, sameContents } from '../domain/product.js';
import { productComparator } from '../domain/sort.js';
import type { Category, NewProduct, Product, ProductContents, SortSpec } from '../domain/types.js';

/** Persistence contract the orchestrator and the option manager rely on. */
export interface ProductStore {
  findById(id: number): Product | undefined;
  /** `null` category lists every product. */
  findAllByCategory(category: Category | null, sort: SortSpec): Product[];
  findByContents(contents: ProductContents): Product | undefined;
  save(product: Product | NewProduct): Product;
  /** Removes the product together with its options. */
  delete(product: Product): void;
  nextOptionId(): number;
  /**
   * Run `fn` atomically: a failed result or a thrown error undoes every write
   * made inside it. Nested calls join the outer transaction.
   */
  transaction<T>(fn: () => Result<T>): Result<T>;
}

type Snapshot = {
  products: Map<number, Product>;
  productSeq: number;
  optionSeq: number;
};

export class InMemoryProductStore implements ProductStore {
  private products = new Map<number, Product>();
  private productSeq = 0;
  private optionSeq = 0;
  private depth = 0;

  findById(id: number) { return this.products.get(id); }

  findAllByCategory(category: Category | null, sort: SortSpec) {
    return Array.from(this.products.values())
      .filter(p => category === null || p.category.id === category.id)
      .sort(productComparator(sort));
  }

  findByContents(contents: ProductContents) {
    for (const p of this.products.values()) {
      if (sameContents(contentsOf(p), contents)) return p;
    }
    return undefined;
  }

  save(product: Product | NewProduct): Product {
    const saved: Product = product.id === undefined
      ? { ...product, id: ++this.productSeq }
      : product;
    this.products.set(saved.id, saved);
    return saved;
  }

  delete(product: Product) { this.products.delete(product.id); }

  nextOptionId() { return ++this.optionSeq; }

  all() { return Array.from(this.products.values()); }

  transaction<T>(fn: () => Result<T>): Result<T> {
    if (this.depth > 0) return fn();
    const before = this.snapshot();
    this.depth += 1;
    try {
      const result = fn();
      if (!result.ok) this.restore(before);
      return result;
    } catch (err) {
      this.restore(before);
      throw err;
    } finally {
      this.depth -= 1;
    }
  }

  private snapshot(): Snapshot {
    return {
      products: structuredClone(this.products),
      productSeq: this.productSeq,
      optionSeq: this.optionSeq,
    };
  }

  private restore(s: Snapshot) {
    this.products = s.products;
    this.productSeq = s.productSeq;
    this.optionSeq = s.optionSeq;
  }
}
