/**
 * Application-level errors for HTTP layer mapping.
 * These extend Error and are used for consistent error handling.
 */
export class NotFoundError extends Error {
  constructor(message = 'Resource not found') {
    super(message);
    this.name = 'NotFoundError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class UnauthorizedError extends Error {
  constructor(message = 'Unauthorized') {
    super(message);
    this.name = 'UnauthorizedError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Raised on routes that require a bearer token when none (or no valid one) was sent.
 * Mapped to 401 with a `WWW-Authenticate: Bearer` challenge.
 */
export class AuthenticationRequiredError extends UnauthorizedError {
  constructor(message = 'Not authenticated') {
    super(message);
    this.name = 'AuthenticationRequiredError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class ForbiddenError extends Error {
  constructor(message = 'Forbidden') {
    super(message);
    this.name = 'ForbiddenError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export type UniqueUserField = 'username' | 'email';

export class DuplicateFieldError extends Error {
  constructor(
    public readonly field: UniqueUserField,
    message = field === 'email' ? 'Email already registered' : 'Username already taken'
  ) {
    super(message);
    this.name = 'DuplicateFieldError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Storage-neutral unique constraint violation. Repositories translate their
 * driver's error into this so use cases can react without knowing the database.
 */
export class DuplicateKeyError extends Error {
  constructor(public readonly constraint: string) {
    super(`Duplicate key violates unique constraint "${constraint}"`);
    this.name = 'DuplicateKeyError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export type TokenFailureReason = 'expired' | 'invalid' | 'malformed';

export class InvalidTokenError extends Error {
  constructor(
    public readonly reason: TokenFailureReason,
    message = `Token is ${reason}`
  ) {
    super(message);
    this.name = 'InvalidTokenError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
