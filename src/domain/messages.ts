export function formatAmount(amount: number, currency: string): string {
  return `${currency} ${amount}`;
}

export function addedMessage(productId: number, quantity: number): string {
  return `${quantity} unit(s) of Product ID ${productId} added to cart!`;
}

export function removedMessage(productId: number, quantity: number): string {
  return `${quantity} unit(s) of Product ID ${productId} removed from cart.`;
}

export function checkoutMessage(total: number, currency: string): string {
  return `Checkout successful! Your final bill is ${formatAmount(total, currency)}.`;
}

export const EMPTY_CART_MESSAGE = 'Your cart is empty.';
export const EMPTY_CART_CHECKOUT_MESSAGE = 'Your cart is empty. Please add items before checkout.';
export const EMPTY_CART_REMOVE_MESSAGE = 'Your cart is empty. Nothing to remove.';
