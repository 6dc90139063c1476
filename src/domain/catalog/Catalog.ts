import type { Product } from '../models.js';
import { ValidationError } from '../errors/index.js';

export const DEFAULT_PRODUCTS: readonly Product[] = [
  { id: 1, name: 'Laptop', price: 120000 },
  { id: 2, name: 'Smartphone', price: 60000 },
  { id: 3, name: 'Headphones', price: 5000 },
  { id: 4, name: 'Keyboard', price: 2500 },
  { id: 5, name: 'Mouse', price: 1500 },
];

// read-only after construction, safe to share across sessions
export class Catalog {
  private readonly products: ReadonlyMap<number, Product>;
  private readonly ordered: readonly Product[];

  constructor(products: readonly Product[]) {
    const byId = new Map<number, Product>();

    for (const product of products) {
      this.validateProduct(product);
      if (byId.has(product.id)) {
        throw new ValidationError(`Duplicate product ID: ${product.id}`);
      }
      byId.set(product.id, Object.freeze({ id: product.id, name: product.name, price: product.price }));
    }

    this.products = byId;
    this.ordered = Object.freeze([...byId.values()].sort((a, b) => a.id - b.id));
  }

  get size(): number {
    return this.products.size;
  }

  get(productId: number): Product | undefined {
    return this.products.get(productId);
  }

  has(productId: number): boolean {
    return this.products.has(productId);
  }

  list(): Product[] {
    return [...this.ordered];
  }

  private validateProduct(product: Product): void {
    if (!Number.isInteger(product.id) || product.id <= 0) {
      throw new ValidationError(`Product ID must be a positive integer: ${product.id}`);
    }
    if (product.name.trim() === '') {
      throw new ValidationError(`Product ${product.id} needs a name.`);
    }
    if (!Number.isInteger(product.price) || product.price < 0) {
      throw new ValidationError(`Product ${product.id} price must be a non-negative integer.`);
    }
  }
}

export function createDefaultCatalog(): Catalog {
  return new Catalog(DEFAULT_PRODUCTS);
}
