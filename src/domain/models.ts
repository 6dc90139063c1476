import type { CartError } from './errors/index.js';

export interface Product {
  readonly id: number;
  readonly name: string;
  readonly price: number;
}

export interface CartLine {
  productId: number;
  quantity: number; // always > 0, zero lines are removed
}

export interface Cart {
  lines: CartLine[];
}

export interface LineDetail {
  productId: number;
  name: string;
  price: number;
  quantity: number;
  subtotal: number;
}

// checkout preview - nothing is cleared
export interface Bill {
  lines: LineDetail[];
  total: number;
}

export type CartResult =
  | { success: true }
  | { success: false; error: CartError };

export interface Session {
  sessionId: string;
  cart: Cart;
  createdAt: Date;
  expiresAt: Date;
}

export interface AddToCartRequest {
  productId: number;
  quantity?: number;
}

export interface RemoveFromCartQuery {
  quantity?: number;
}

export function createCart(): Cart {
  return { lines: [] };
}

export function cloneCart(cart: Cart): Cart {
  return { lines: cart.lines.map(line => ({ ...line })) };
}
