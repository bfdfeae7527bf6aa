/**
 * Custom Error Classes
 * ====================
 * Error taxonomy shared by the client and the interchange codec.
 * Every error is surfaced to the caller as-is; nothing here retries.
 */

export type ErrorContext = Record<string, unknown>;

/**
 * Base application error class
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly context?: ErrorContext;
  public readonly isOperational: boolean;

  constructor(
    message: string,
    code: string = 'APP_ERROR',
    statusCode: number = 500,
    context?: ErrorContext,
    isOperational: boolean = true
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.statusCode = statusCode;
    this.context = context;
    this.isOperational = isOperational;

    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert error to JSON for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      statusCode: this.statusCode,
      context: this.context,
      isOperational: this.isOperational,
      stack: this.stack,
    };
  }
}

/**
 * Credential exchange against the token endpoint failed
 */
export class AuthenticationError extends AppError {
  public readonly status?: number;
  public readonly body?: string;

  constructor(message: string = 'Authentication failed', status?: number, body?: string, context?: ErrorContext) {
    super(message, 'AUTHENTICATION_ERROR', 401, { status, ...context });
    this.status = status;
    this.body = body;
  }
}

/**
 * An action was attempted before the state it needs exists (no session, deleted resource)
 */
export class PreconditionError extends AppError {
  constructor(message: string, context?: ErrorContext) {
    super(message, 'PRECONDITION_ERROR', 412, context);
  }
}

/**
 * The server answered with a status other than the one the operation expects
 */
export class RemoteError extends AppError {
  public readonly uri: string;
  public readonly expectedStatus: number;
  public readonly actualStatus: number;
  public readonly body: string;

  constructor(uri: string, expectedStatus: number, actualStatus: number, body: string, context?: ErrorContext) {
    super(
      `Unexpected status from ${uri}: expected=${expectedStatus}, actual=${actualStatus}. body=${body}`,
      'REMOTE_ERROR',
      502,
      { uri, expectedStatus, actualStatus, ...context }
    );
    this.uri = uri;
    this.expectedStatus = expectedStatus;
    this.actualStatus = actualStatus;
    this.body = body;
  }
}

/**
 * Validation error - caller-supplied input is malformed
 */
export class ValidationError extends AppError {
  constructor(message: string, context?: ErrorContext) {
    super(message, 'VALIDATION_ERROR', 400, context);
  }
}

/**
 * Data received or converted does not follow the interchange or wire format
 */
export class FormatError extends AppError {
  constructor(message: string, context?: ErrorContext) {
    super(message, 'FORMAT_ERROR', 422, context);
  }
}

/**
 * Configuration error - for configuration issues
 */
export class ConfigurationError extends AppError {
  constructor(message: string, configKey?: string, context?: ErrorContext) {
    super(message, 'CONFIGURATION_ERROR', 500, { configKey, ...context });
  }
}

/**
 * The request never produced an HTTP response (DNS, refused connection, timeout)
 */
export class TransportError extends AppError {
  constructor(message: string, context?: ErrorContext) {
    super(message, 'TRANSPORT_ERROR', 503, context);
  }
}

/**
 * Check if error is an operational error (expected errors that should be handled)
 */
export function isOperationalError(error: unknown): boolean {
  if (error instanceof AppError) {
    return error.isOperational;
  }
  return false;
}
