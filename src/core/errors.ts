/**
 * Base error class for the server
 * Carries a machine-readable code alongside the human message
 */
export class BaseError extends Error {
  constructor(
    message: string,
    public code: string,
    public details?: unknown
  ) {
    super(message);
    this.name = 'BaseError';
    // Keep the prototype chain intact for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Startup configuration errors (missing credential, invalid settings)
 */
export class ConfigError extends BaseError {
  constructor(message: string, details?: unknown) {
    super(message, 'CONFIG_ERROR', details);
    this.name = 'ConfigError';
  }
}

/**
 * Caller input that does not match a declared shape
 */
export class ValidationError extends BaseError {
  constructor(message: string, details?: unknown) {
    super(message, 'VALIDATION_ERROR', details);
    this.name = 'ValidationError';
  }
}

/**
 * Unknown prompt or resource identifier
 */
export class NotFoundError extends BaseError {
  constructor(message: string, details?: unknown) {
    super(message, 'NOT_FOUND', details);
    this.name = 'NotFoundError';
  }
}
