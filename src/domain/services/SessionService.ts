import { v4 as uuidv4 } from 'uuid';
import { Bill, CartLine, CartResult, Product, Session, createCart } from '../models.js';
import { ISessionStore } from '../../infrastructure/stores/ISessionStore.js';
import { CartService } from './CartService.js';
import { ValidationError, ResourceNotFoundError, ItemNotFoundError } from '../errors/index.js';
import { EMPTY_CART_REMOVE_MESSAGE } from '../messages.js';

// owns the session lifecycle and hands each session's cart to CartService
export class SessionService {
  private ttlMinutes: number;

  constructor(
    private readonly store: ISessionStore,
    private readonly carts: CartService,
    config?: {
      sessionTtlMinutes?: number;
    }
  ) {
    this.ttlMinutes = config?.sessionTtlMinutes ?? 30;
  }

  async createSession(): Promise<Session> {
    const now = new Date();
    const expiresAt = new Date(now.getTime() + this.ttlMinutes * 60 * 1000);

    return this.store.createSession({
      sessionId: uuidv4(),
      cart: createCart(),
      createdAt: now,
      expiresAt,
    });
  }

  async getSession(sessionId: string): Promise<Session> {
    this.validateSessionId(sessionId);
    const session = await this.store.getSession(sessionId);
    if (!session) throw new ResourceNotFoundError('Session', sessionId);
    return session;
  }

  listProducts(): Product[] {
    return this.carts.listProducts();
  }

  async viewCart(sessionId: string): Promise<Bill> {
    const session = await this.getSession(sessionId);
    return this.carts.computeBill(session.cart);
  }

  async computeBill(sessionId: string): Promise<Bill> {
    return this.viewCart(sessionId);
  }

  async getRawCart(sessionId: string): Promise<CartLine[]> {
    const session = await this.getSession(sessionId);
    return session.cart.lines;
  }

  async addToCart(sessionId: string, productId: number, quantity: number): Promise<Bill> {
    const session = await this.getSession(sessionId);
    this.unwrap(this.carts.addToCart(session.cart, productId, quantity));

    const saved = await this.store.updateSession(session);
    return this.carts.computeBill(saved.cart);
  }

  async removeFromCart(sessionId: string, productId: number, quantity: number): Promise<Bill> {
    const session = await this.getSession(sessionId);
    if (session.cart.lines.length === 0) {
      throw new ItemNotFoundError(productId, EMPTY_CART_REMOVE_MESSAGE);
    }
    this.unwrap(this.carts.removeFromCart(session.cart, productId, quantity));

    const saved = await this.store.updateSession(session);
    return this.carts.computeBill(saved.cart);
  }

  async checkout(sessionId: string): Promise<number> {
    const session = await this.getSession(sessionId);
    const total = this.carts.checkout(session.cart);
    await this.store.updateSession(session);
    return total;
  }

  async deleteSession(sessionId: string): Promise<void> {
    this.validateSessionId(sessionId);
    await this.store.deleteSession(sessionId);
  }

  // a failed cart result surfaces as its domain error for the HTTP layer
  private unwrap(result: CartResult): void {
    if (!result.success) throw result.error;
  }

  private validateSessionId(sessionId: string): void {
    const uuidRegex = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/i;
    if (!uuidRegex.test(sessionId)) {
      throw new ValidationError('Invalid session ID format. Expected UUID v4.');
    }
  }
}
