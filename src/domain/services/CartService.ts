import type { Bill, Cart, CartLine, CartResult, LineDetail, Product } from '../models.js';
import type { Catalog } from '../catalog/Catalog.js';
import {
  InvalidProductError,
  InvalidQuantityError,
  ItemNotFoundError,
} from '../errors/index.js';

// pure cart operations - the caller owns the cart, nothing here throws or does I/O
export class CartService {
  private maxQty: number;

  constructor(
    private readonly catalog: Catalog,
    config?: {
      maxQuantity?: number;
    }
  ) {
    this.maxQty = config?.maxQuantity ?? 99;
  }

  listProducts(): Product[] {
    return this.catalog.list();
  }

  // merges quantities if product already exists
  addToCart(cart: Cart, productId: number, quantity: number): CartResult {
    if (!this.catalog.has(productId)) {
      return { success: false, error: new InvalidProductError(productId) };
    }
    if (!this.isValidQuantity(quantity)) {
      return { success: false, error: new InvalidQuantityError(quantity) };
    }
    if (quantity > this.maxQty) {
      return {
        success: false,
        error: new InvalidQuantityError(quantity, `Quantity must be between 1 and ${this.maxQty}.`),
      };
    }

    const existing = this.findLine(cart, productId);
    if (existing && existing.quantity + quantity > this.maxQty) {
      return {
        success: false,
        error: new InvalidQuantityError(
          quantity,
          `Total quantity for Product ID ${productId} would exceed maximum of ${this.maxQty}.`
        ),
      };
    }

    if (existing) {
      existing.quantity += quantity;
    } else {
      cart.lines.push({ productId, quantity });
    }

    return { success: true };
  }

  // removing at least the held quantity drops the line entirely
  removeFromCart(cart: Cart, productId: number, quantity: number): CartResult {
    const existing = this.findLine(cart, productId);
    if (!existing) {
      return { success: false, error: new ItemNotFoundError(productId) };
    }
    if (!this.isValidQuantity(quantity)) {
      return { success: false, error: new InvalidQuantityError(quantity) };
    }

    if (quantity >= existing.quantity) {
      cart.lines.splice(cart.lines.indexOf(existing), 1);
    } else {
      existing.quantity -= quantity;
    }

    return { success: true };
  }

  viewCart(cart: Cart): LineDetail[] {
    const details: LineDetail[] = [];

    for (const line of cart.lines) {
      const product = this.catalog.get(line.productId);
      if (!product) continue;

      details.push({
        productId: product.id,
        name: product.name,
        price: product.price,
        quantity: line.quantity,
        subtotal: product.price * line.quantity,
      });
    }

    return details;
  }

  calculateTotal(cart: Cart): number {
    return cart.lines.reduce((sum, line) => {
      const product = this.catalog.get(line.productId);
      return product ? sum + product.price * line.quantity : sum;
    }, 0);
  }

  computeBill(cart: Cart): Bill {
    return {
      lines: this.viewCart(cart),
      total: this.calculateTotal(cart),
    };
  }

  checkout(cart: Cart): number {
    const total = this.calculateTotal(cart);
    cart.lines.length = 0;
    return total;
  }

  private findLine(cart: Cart, productId: number): CartLine | undefined {
    return cart.lines.find(line => line.productId === productId);
  }

  private isValidQuantity(quantity: number): boolean {
    return Number.isSafeInteger(quantity) && quantity > 0;
  }
}
