export class AppError extends Error {
  constructor(
    public statusCode: number,
    public message: string,
    public isOperational: boolean = true
  ) {
    super(message);
    Object.setPrototypeOf(this, AppError.prototype);
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super(400, message, true);
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(404, message, true);
    Object.setPrototypeOf(this, NotFoundError.prototype);
  }
}

/** Missing or invalid process configuration. Fatal at start, never raised per event. */
export class ConfigurationError extends Error {
  constructor(public issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}

export class ServiceError extends Error {
  constructor(
    public service: string,
    public operation: string,
    public originalError: Error,
    public retryable: boolean = true
  ) {
    super(`${service}.${operation} failed: ${originalError.message}`);
    Object.setPrototypeOf(this, ServiceError.prototype);
  }
}

/** Network error, timeout, 5xx or 429. */
export class TransientUpstreamFailure extends ServiceError {
  constructor(
    service: string,
    operation: string,
    originalError: Error,
    public status?: number,
    public retryAfterMs?: number
  ) {
    super(service, operation, originalError, true);
    Object.setPrototypeOf(this, TransientUpstreamFailure.prototype);
  }
}

/** 4xx other than 429, or a response that could not be understood. */
export class PermanentUpstreamFailure extends ServiceError {
  constructor(
    service: string,
    operation: string,
    originalError: Error,
    public status?: number
  ) {
    super(service, operation, originalError, false);
    Object.setPrototypeOf(this, PermanentUpstreamFailure.prototype);
  }
}

export class RetryExhaustedError extends ServiceError {
  constructor(
    service: string,
    operation: string,
    public attempts: number,
    public lastFailure: TransientUpstreamFailure
  ) {
    super(service, operation, lastFailure.originalError, false);
    this.message = `${service}.${operation} failed after ${attempts} attempts: ${lastFailure.originalError.message}`;
    Object.setPrototypeOf(this, RetryExhaustedError.prototype);
  }
}

/** Session store read or write failed. Fatal to the event being processed. */
export class PersistenceFailure extends Error {
  constructor(
    public operation: 'load' | 'save',
    public conversationId: string,
    public originalError: Error
  ) {
    super(`Session ${operation} failed for ${conversationId}: ${originalError.message}`);
    Object.setPrototypeOf(this, PersistenceFailure.prototype);
  }
}

/** Non-2xx HTTP response from an upstream API. */
export class HttpStatusError extends Error {
  constructor(
    public status: number,
    public body: string,
    public retryAfterMs?: number
  ) {
    super(`HTTP ${status}: ${body.substring(0, 200)}`);
    Object.setPrototypeOf(this, HttpStatusError.prototype);
  }
}

export function toError(value: unknown): Error {
  if (value instanceof Error) return value;
  return new Error(String(value));
}

export function errorMessage(value: unknown): string {
  return toError(value).message;
}
