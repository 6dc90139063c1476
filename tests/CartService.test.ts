import { describe, it, expect, beforeEach } from 'vitest';
import { CartService } from '../src/domain/services/CartService.js';
import { Catalog, createDefaultCatalog } from '../src/domain/catalog/Catalog.js';
import {
  InvalidProductError,
  InvalidQuantityError,
  ItemNotFoundError,
} from '../src/domain/errors/index.js';
import { Cart, cloneCart, createCart } from '../src/domain/models.js';

describe('CartService', () => {
  let cartService: CartService;
  let cart: Cart;

  beforeEach(() => {
    cartService = new CartService(createDefaultCatalog());
    cart = createCart();
  });

  describe('listProducts', () => {
    it('lists the whole catalog by ascending id', () => {
      const products = cartService.listProducts();

      expect(products.map(p => p.id)).toEqual([1, 2, 3, 4, 5]);
      expect(products[0]).toEqual({ id: 1, name: 'Laptop', price: 120000 });
    });

    it('sorts a catalog declared out of order', () => {
      const service = new CartService(new Catalog([
        { id: 9, name: 'Cable', price: 300 },
        { id: 2, name: 'Charger', price: 900 },
      ]));

      expect(service.listProducts().map(p => p.id)).toEqual([2, 9]);
    });
  });

  describe('addToCart', () => {
    it('adds a new product to an empty cart as one line', () => {
      const result = cartService.addToCart(cart, 2, 3);

      expect(result).toEqual({ success: true });
      expect(cart.lines).toEqual([{ productId: 2, quantity: 3 }]);
    });

    it('merges quantities for same product', () => {
      cartService.addToCart(cart, 4, 2);
      cartService.addToCart(cart, 4, 5);

      expect(cart.lines).toEqual([{ productId: 4, quantity: 7 }]);
    });

    it.each([0, -1, -10, 1.5])('rejects quantity %s and leaves the cart unchanged', (quantity) => {
      cartService.addToCart(cart, 1, 1);

      const result = cartService.addToCart(cart, 1, quantity);

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error).toBeInstanceOf(InvalidQuantityError);
        expect(result.error.message).toBe('Quantity must be at least 1');
      }
      expect(cart.lines).toEqual([{ productId: 1, quantity: 1 }]);
    });

    it('rejects an unknown product and leaves the cart unchanged', () => {
      const result = cartService.addToCart(cart, 42, 1);

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error).toBeInstanceOf(InvalidProductError);
        expect(result.error.code).toBe('INVALID_PRODUCT');
        expect(result.error.message).toBe('Invalid Product ID');
      }
      expect(cart.lines).toEqual([]);
    });

    it('rejects a quantity above the maximum', () => {
      const result = cartService.addToCart(cart, 5, 100);

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error).toBeInstanceOf(InvalidQuantityError);
        expect(result.error.message).toBe('Quantity must be between 1 and 99.');
      }
      expect(cart.lines).toEqual([]);
    });

    it('rejects a merge that would pass the maximum', () => {
      cartService.addToCart(cart, 5, 60);

      const result = cartService.addToCart(cart, 5, 40);

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.message).toBe('Total quantity for Product ID 5 would exceed maximum of 99.');
      }
      expect(cart.lines).toEqual([{ productId: 5, quantity: 60 }]);
    });

    it('honours a configured maximum', () => {
      const small = new CartService(createDefaultCatalog(), { maxQuantity: 5 });

      expect(small.addToCart(cart, 1, 5)).toEqual({ success: true });
      expect(small.addToCart(cart, 1, 1).success).toBe(false);
      expect(cart.lines).toEqual([{ productId: 1, quantity: 5 }]);
    });

    it('rejects quantities beyond safe integer range even with a huge maximum', () => {
      const unbounded = new CartService(createDefaultCatalog(), { maxQuantity: Number.MAX_SAFE_INTEGER });
      unbounded.addToCart(cart, 5, 1);

      const added = unbounded.addToCart(cart, 5, 2 ** 53);
      const removed = unbounded.removeFromCart(cart, 5, 2 ** 53);

      expect(added.success).toBe(false);
      if (!added.success) {
        expect(added.error).toBeInstanceOf(InvalidQuantityError);
      }
      expect(removed.success).toBe(false);
      expect(cart.lines).toEqual([{ productId: 5, quantity: 1 }]);
    });

    it('reports the unknown product before a bad quantity', () => {
      const result = cartService.addToCart(cart, 42, 0);

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error).toBeInstanceOf(InvalidProductError);
      }
    });

    it('keeps insertion order when an existing line is incremented', () => {
      cartService.addToCart(cart, 3, 1);
      cartService.addToCart(cart, 1, 1);
      cartService.addToCart(cart, 2, 1);
      cartService.addToCart(cart, 1, 4);

      expect(cartService.viewCart(cart).map(line => line.productId)).toEqual([3, 1, 2]);
      expect(cart.lines[1]).toEqual({ productId: 1, quantity: 5 });
    });
  });

  describe('removeFromCart', () => {
    beforeEach(() => {
      cartService.addToCart(cart, 1, 2);
      cartService.addToCart(cart, 3, 4);
      cartService.addToCart(cart, 5, 1);
    });

    it('decrements when removing less than held', () => {
      const result = cartService.removeFromCart(cart, 3, 3);

      expect(result).toEqual({ success: true });
      expect(cart.lines).toEqual([
        { productId: 1, quantity: 2 },
        { productId: 3, quantity: 1 },
        { productId: 5, quantity: 1 },
      ]);
    });

    it('drops the line when removing exactly what is held', () => {
      cartService.removeFromCart(cart, 3, 4);

      expect(cart.lines).toEqual([
        { productId: 1, quantity: 2 },
        { productId: 5, quantity: 1 },
      ]);
    });

    it('drops the line when removing more than held', () => {
      cartService.removeFromCart(cart, 1, 10);

      expect(cart.lines.map(line => line.productId)).toEqual([3, 5]);
    });

    it('fails with ItemNotFound for a product not in the cart', () => {
      const result = cartService.removeFromCart(cart, 2, 1);

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error).toBeInstanceOf(ItemNotFoundError);
        expect(result.error.message).toBe('Item not found in cart');
      }
      expect(cart.lines).toHaveLength(3);
    });

    it('reports a missing item before a bad quantity', () => {
      const result = cartService.removeFromCart(cart, 2, -1);

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error).toBeInstanceOf(ItemNotFoundError);
      }
    });

    it('rejects a non-positive quantity for a held item', () => {
      const result = cartService.removeFromCart(cart, 1, 0);

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error).toBeInstanceOf(InvalidQuantityError);
      }
      expect(cart.lines[0]).toEqual({ productId: 1, quantity: 2 });
    });
  });

  describe('add then remove', () => {
    it('restores a cart that did not hold the product', () => {
      cartService.addToCart(cart, 2, 1);
      const before = cloneCart(cart);

      cartService.addToCart(cart, 4, 3);
      cartService.removeFromCart(cart, 4, 3);

      expect(cart).toEqual(before);
    });

    it('restores a cart that already held the product', () => {
      cartService.addToCart(cart, 2, 1);
      cartService.addToCart(cart, 4, 2);
      const before = cloneCart(cart);

      cartService.addToCart(cart, 4, 3);
      cartService.removeFromCart(cart, 4, 3);

      expect(cart).toEqual(before);
    });
  });

  describe('viewCart', () => {
    it('returns line details with subtotals in cart order', () => {
      cartService.addToCart(cart, 3, 2);
      cartService.addToCart(cart, 1, 1);

      expect(cartService.viewCart(cart)).toEqual([
        { productId: 3, name: 'Headphones', price: 5000, quantity: 2, subtotal: 10000 },
        { productId: 1, name: 'Laptop', price: 120000, quantity: 1, subtotal: 120000 },
      ]);
    });

    it('returns nothing for an empty cart', () => {
      expect(cartService.viewCart(cart)).toEqual([]);
    });

    it('skips lines whose product no longer resolves', () => {
      const stale: Cart = {
        lines: [
          { productId: 77, quantity: 1 },
          { productId: 5, quantity: 2 },
        ],
      };

      expect(cartService.viewCart(stale)).toEqual([
        { productId: 5, name: 'Mouse', price: 1500, quantity: 2, subtotal: 3000 },
      ]);
    });
  });

  describe('calculateTotal', () => {
    it('is 0 for an empty cart', () => {
      expect(cartService.calculateTotal(cart)).toBe(0);
    });

    it('sums price * quantity over all lines', () => {
      cartService.addToCart(cart, 2, 1);
      cartService.addToCart(cart, 4, 3);
      cartService.addToCart(cart, 5, 2);

      // 60000 + 7500 + 3000
      expect(cartService.calculateTotal(cart)).toBe(70500);
    });

    it('ignores lines whose product no longer resolves', () => {
      const stale: Cart = { lines: [{ productId: 77, quantity: 3 }, { productId: 4, quantity: 1 }] };
      expect(cartService.calculateTotal(stale)).toBe(2500);
    });
  });

  describe('computeBill', () => {
    it('summarises without clearing the cart', () => {
      cartService.addToCart(cart, 5, 2);

      const bill = cartService.computeBill(cart);

      expect(bill.total).toBe(3000);
      expect(bill.lines).toHaveLength(1);
      expect(cart.lines).toEqual([{ productId: 5, quantity: 2 }]);
    });
  });

  describe('checkout', () => {
    it('returns the total and empties the cart', () => {
      cartService.addToCart(cart, 1, 2);
      cartService.addToCart(cart, 3, 1);

      expect(cartService.checkout(cart)).toBe(245000);
      expect(cart.lines).toEqual([]);
    });

    it('returns 0 when called again right away', () => {
      cartService.addToCart(cart, 1, 2);
      cartService.checkout(cart);

      expect(cartService.checkout(cart)).toBe(0);
    });

    it('clears the same cart object the caller holds', () => {
      const lines = cart.lines;
      cartService.addToCart(cart, 2, 1);

      cartService.checkout(cart);

      expect(lines).toHaveLength(0);
    });
  });
});
