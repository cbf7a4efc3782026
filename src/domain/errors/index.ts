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

// raised at creation time only - selection assumes stored coupons are valid
export class InvalidCouponDefinitionError extends DomainError {
  constructor(message: string) {
    super(message, 'INVALID_COUPON_DEFINITION', 400);
  }
}

export class InvalidCartOrUserError extends DomainError {
  constructor(message: string) {
    super(message, 'INVALID_CART_OR_USER', 400);
  }
}
