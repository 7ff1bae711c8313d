import { isAxiosError } from 'axios';
import { ZodError } from 'zod';
import {
  AuthError,
  GatewayError,
  NetworkError,
  NotFoundError,
  RateLimitedError,
  ServerError,
  ValidationError,
} from '../../utils/errors';

interface GatewayErrorBody {
  code?: string;
  message?: string;
}

export class ErrorClassifier {
  private static readonly NETWORK_ERROR_CODES = new Set([
    'ECONNRESET',
    'ECONNREFUSED',
    'ENOTFOUND',
    'ETIMEDOUT',
    'ECONNABORTED',
    'ENETUNREACH',
    'ENETDOWN',
    'EHOSTUNREACH',
    'EHOSTDOWN',
    'EPIPE',
    'EAI_AGAIN',
    'ERR_NETWORK',
    'ERR_CANCELED',
  ]);

  /**
   * Convert anything thrown while talking to the gateway into the typed
   * taxonomy. Errors that are already classified pass through untouched.
   */
  static classify(error: unknown): GatewayError {
    if (error instanceof GatewayError) {
      return error;
    }

    if (error instanceof ZodError) {
      return new ValidationError('Invalid payment details', error.flatten().fieldErrors);
    }

    if (isAxiosError(error)) {
      if (error.response) {
        return this.classifyHttpError(
          error.response.status,
          error.response.data,
          this.readRetryAfter(error.response.headers['retry-after'])
        );
      }
      return new NetworkError(
        error.message || 'Network request failed',
        error.code || 'NETWORK_ERROR',
        error
      );
    }

    if (error instanceof Error) {
      const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
      if (code && this.NETWORK_ERROR_CODES.has(code)) {
        return new NetworkError(error.message, code, error);
      }
      return new GatewayError(error.message, 'UNKNOWN_ERROR', { cause: error });
    }

    return new GatewayError(`Unknown error: ${String(error)}`, 'UNKNOWN_ERROR');
  }

  /**
   * Map a non-2xx status and its body onto an error class
   */
  static classifyHttpError(status: number, data: unknown, retryAfterMs?: number): GatewayError {
    const body = this.extractErrorBody(data);
    const message = body.message || `Gateway responded with HTTP ${status}`;
    const details = body.code ? { code: body.code } : undefined;

    if (status === 401 || status === 403) {
      return new AuthError(message, status, details);
    }
    if (status === 404) {
      return new NotFoundError(message, details);
    }
    if (status === 429) {
      return new RateLimitedError(message, retryAfterMs, details);
    }
    if (status >= 500) {
      return new ServerError(message, status, details);
    }
    return new ValidationError(message, details, status);
  }

  static isRetryable(error: unknown): boolean {
    return this.classify(error).retryable;
  }

  // Accepts `{ error: { code, message } }` as well as a flat `{ code, message }`
  private static extractErrorBody(data: unknown): GatewayErrorBody {
    let payload: unknown = data;
    if (typeof payload === 'string') {
      try {
        payload = JSON.parse(payload);
      } catch {
        return {};
      }
    }
    if (!payload || typeof payload !== 'object') {
      return {};
    }

    const nested = 'error' in payload ? payload.error : undefined;
    const source: object = nested && typeof nested === 'object' ? nested : payload;
    const code = 'code' in source && typeof source.code === 'string' ? source.code : undefined;
    const message = 'message' in source && typeof source.message === 'string' ? source.message : undefined;
    return { code, message };
  }

  // Retry-After is either delta-seconds or an HTTP date
  private static readRetryAfter(header: unknown): number | undefined {
    if (typeof header !== 'string' && typeof header !== 'number') {
      return undefined;
    }
    const seconds = Number(header);
    if (Number.isFinite(seconds)) {
      return Math.max(0, seconds * 1000);
    }
    const date = Date.parse(String(header));
    return Number.isNaN(date) ? undefined : Math.max(0, date - Date.now());
  }
}
