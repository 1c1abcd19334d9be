/**
 * Error taxonomy for the ClickUp transport and services.
 *
 * ValidationError, DecodeError and SourceReadError are local failures,
 * TransportError means no response was received, ApiError carries a remote
 * status >= 400.
 */

export class ApiError extends Error {
  constructor(public readonly statusCode: number, message: string) {
    super(message);
    this.name = 'ApiError';
  }

  override toString(): string {
    return `API error (${this.statusCode}): ${this.message}`;
  }
}

export class TransportError extends Error {
  constructor(
    message: string,
    public readonly timedOut: boolean = false,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = 'TransportError';
  }
}

export class ValidationError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ValidationError';
  }
}

export class DecodeError extends Error {
  constructor(message: string, public readonly statusCode: number, options?: ErrorOptions) {
    super(message, options);
    this.name = 'DecodeError';
  }
}

/**
 * The caller's byte source failed while an upload was reading it.
 */
export class SourceReadError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'SourceReadError';
  }
}

/**
 * Wraps a failure with the label of the service operation that produced it.
 * The original error stays reachable through `cause`.
 */
export class OperationError extends Error {
  constructor(public readonly operation: string, cause: unknown) {
    super(`${operation}: ${describe(cause)}`, { cause });
    this.name = 'OperationError';
  }
}

function describe(error: unknown): string {
  if (error instanceof ApiError) {
    return error.toString();
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

type ErrorClass<E extends Error> = abstract new (...args: never[]) => E;

/**
 * Walk an error's cause chain and return the first link that is an instance of
 * `type`.
 */
export function findError<E extends Error>(error: unknown, type: ErrorClass<E>): E | undefined {
  const seen = new Set<unknown>();
  let current: unknown = error;

  while (current instanceof Error && !seen.has(current)) {
    if (current instanceof type) {
      return current;
    }
    seen.add(current);
    current = current.cause;
  }

  return undefined;
}

export function findApiError(error: unknown): ApiError | undefined {
  return findError(error, ApiError);
}

export function isApiError(error: unknown): error is ApiError {
  return error instanceof ApiError;
}

export function isTransportError(error: unknown): error is TransportError {
  return error instanceof TransportError;
}
