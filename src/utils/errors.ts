// src/utils/errors.ts

/**
 * Base class for every error that should reach the client with a known
 * status code. Anything else is rendered as a 500 by the error middleware.
 */
export class AppError extends Error {
  public readonly statusCode: number;
  public readonly code: string;

  constructor(message: string, statusCode: number, code: string) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.code = code;
  }
}

export interface FieldError {
  field: string;
  message: string;
}

/**
 * Malformed input, rejected before it reaches any service.
 */
export class ValidationError extends AppError {
  public readonly errors: FieldError[];

  constructor(errors: FieldError[], message = 'Validation failed') {
    super(message, 400, 'ValidationError');
    this.errors = errors;
  }
}

/**
 * No outstanding passcode matches the submitted identifier and code.
 * Deliberately says nothing about whether a code was ever requested.
 */
export class InvalidCodeError extends AppError {
  constructor() {
    super('Invalid code', 400, 'InvalidCode');
  }
}

export class CodeExpiredError extends AppError {
  constructor() {
    super('Code expired', 400, 'CodeExpired');
  }
}

/**
 * Missing header, wrong scheme, bad signature, malformed or expired token:
 * all of them collapse into this one outcome.
 */
export class UnauthenticatedError extends AppError {
  constructor() {
    super('Not authenticated', 401, 'Unauthenticated');
  }
}

export class ForbiddenError extends AppError {
  constructor(message = 'Forbidden') {
    super(message, 403, 'Forbidden');
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(message, 404, 'NotFound');
  }
}

/**
 * The payment provider rejected the request.
 */
export class PaymentError extends AppError {
  constructor(message: string) {
    super(message, 400, 'PaymentError');
  }
}

/**
 * Store, mailer, signing or payment subsystem unreachable or misconfigured.
 */
export class ServiceUnavailableError extends AppError {
  constructor(message: string) {
    super(message, 500, 'ServiceUnavailable');
  }
}

/**
 * Thrown at startup only, never from a request handler.
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}
