// Custom error classes for domain-specific errors

export class DomainError extends Error {
     constructor(
          message: string,
          public readonly code: string,
          public readonly statusCode: number = 400
     ) {
          super(message);
          this.name = this.constructor.name;
          Error.captureStackTrace(this, this.constructor);
     }
}

export class InvalidQuantityError extends DomainError {
     constructor(
          message: string,
          public readonly itemId?: string
     ) {
          super(message, 'INVALID_QUANTITY', 400);
     }
}

export class InvalidCostError extends DomainError {
     constructor(
          message: string,
          public readonly itemId?: string
     ) {
          super(message, 'INVALID_COST', 400);
     }
}

export class InvalidItemError extends DomainError {
     constructor(message: string) {
          super(message, 'INVALID_ITEM', 400);
     }
}

export class InvalidConfigurationError extends DomainError {
     constructor(
          public readonly setting: string,
          message: string
     ) {
          super(message, 'INVALID_CONFIGURATION', 500);
     }
}
