/**
 * Application-level errors for HTTP layer mapping.
 * Use cases throw these; the error handler turns each into a status and body.
 */
export class ApplicationError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ApplicationError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * A payload that is well-formed JSON but fails a field rule.
 * `category` is the short label clients branch on ("Missing Data", "Invalid Email", ...).
 */
export class ValidationError extends ApplicationError {
  constructor(
    public readonly category: string,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ValidationError';
  }
}

export class MalformedRequestError extends ApplicationError {
  constructor(message = 'Request body must be valid JSON.') {
    super(message);
    this.name = 'MalformedRequestError';
  }
}

export class NotFoundError extends ApplicationError {
  constructor(message = 'User not found') {
    super(message);
    this.name = 'NotFoundError';
  }
}

export class ConflictError extends ApplicationError {
  constructor(message = 'Conflict') {
    super(message);
    this.name = 'ConflictError';
  }
}

export class AuthError extends ApplicationError {
  constructor(message = 'Invalid email or password.') {
    super(message);
    this.name = 'AuthError';
  }
}

/**
 * The store failed. `message` is safe to show to clients; `cause` holds the driver error.
 */
export class StoreError extends ApplicationError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'StoreError';
  }
}
