// Base class for domain errors - includes HTTP status for easy mapping
export abstract class DomainError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly statusCode: number
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

// 410 Gone - session existed but expired
export class SessionExpiredError extends DomainError {
  constructor(sessionId: string) {
    super(
      `Shop session '${sessionId}' has expired. Please start a new session.`,
      'SESSION_EXPIRED',
      410
    );
  }
}

export class ResourceNotFoundError extends DomainError {
  constructor(resource: string, identifier: string) {
    super(
      `${resource} with identifier '${identifier}' not found.`,
      'RESOURCE_NOT_FOUND',
      404
    );
  }
}

export class ValidationError extends DomainError {
  constructor(message: string) {
    super(message, 'VALIDATION_ERROR', 400);
  }
}

// cart errors are returned by CartService, not thrown
export class InvalidProductError extends DomainError {
  constructor(public readonly productId: number) {
    super('Invalid Product ID', 'INVALID_PRODUCT', 404);
  }
}

export class InvalidQuantityError extends DomainError {
  constructor(public readonly quantity: number, message = 'Quantity must be at least 1') {
    super(message, 'INVALID_QUANTITY', 400);
  }
}

export class ItemNotFoundError extends DomainError {
  constructor(public readonly productId: number, message = 'Item not found in cart') {
    super(message, 'ITEM_NOT_FOUND', 404);
  }
}

export type CartError = InvalidProductError | InvalidQuantityError | ItemNotFoundError;
