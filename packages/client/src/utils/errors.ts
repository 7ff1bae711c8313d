export interface GatewayErrorOptions {
  status?: number;
  retryable?: boolean;
  details?: unknown;
  cause?: unknown;
}

/**
 * Base of every error the client surfaces. `retryable` is the classification
 * callers and the poller act on: only transient failures carry `true`.
 */
export class GatewayError extends Error {
  public readonly code: string;
  public readonly status?: number;
  public readonly retryable: boolean;
  public readonly details?: unknown;

  constructor(message: string, code: string, options: GatewayErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'GatewayError';
    this.code = code;
    this.status = options.status;
    this.retryable = options.retryable ?? false;
    this.details = options.details;
  }
}

export class ValidationError extends GatewayError {
  constructor(message: string, details?: unknown, status?: number) {
    super(message, 'VALIDATION_ERROR', { status, details });
    this.name = 'ValidationError';
  }
}

export class AuthError extends GatewayError {
  constructor(message: string = 'Authentication failed', status?: number, details?: unknown) {
    super(message, 'AUTH_ERROR', { status, details });
    this.name = 'AuthError';
  }
}

export class NotFoundError extends GatewayError {
  constructor(message: string = 'Resource not found', details?: unknown) {
    super(message, 'NOT_FOUND', { status: 404, details });
    this.name = 'NotFoundError';
  }
}

export class RateLimitedError extends GatewayError {
  public readonly retryAfterMs?: number;

  constructor(message: string = 'Rate limit exceeded', retryAfterMs?: number, details?: unknown) {
    super(message, 'RATE_LIMITED', { status: 429, retryable: true, details });
    this.name = 'RateLimitedError';
    this.retryAfterMs = retryAfterMs;
  }
}

export class ServerError extends GatewayError {
  constructor(message: string, status: number = 500, details?: unknown) {
    super(message, 'SERVER_ERROR', { status, details });
    this.name = 'ServerError';
  }
}

export class NetworkError extends GatewayError {
  constructor(message: string = 'Network request failed', code: string = 'NETWORK_ERROR', cause?: unknown) {
    super(message, code, { retryable: true, cause });
    this.name = 'NetworkError';
  }
}

export class ProtocolError extends GatewayError {
  constructor(message: string, details?: unknown) {
    super(message, 'PROTOCOL_ERROR', { details });
    this.name = 'ProtocolError';
  }
}
