import { gatewayLogger } from '../../utils/logger';
import { GatewayError, RateLimitedError } from '../../utils/errors';
import { ErrorClassifier } from './ErrorClassifier';

export interface RetryConfig {
  maxRetries: number;
  baseDelay: number;
  maxDelay: number;
}

export type RetryResult<T> =
  | { success: true; data: T; attempts: number; totalTime: number }
  | { success: false; error: GatewayError; attempts: number; totalTime: number };

export class RetryManager {
  private readonly config: RetryConfig;

  constructor(config: RetryConfig) {
    this.config = config;
  }

  /**
   * Execute a function with retry logic and exponential backoff. Only errors
   * classified as retryable are attempted again.
   */
  async execute<T>(
    operation: () => Promise<T>,
    operationName: string = 'operation',
    maxRetries: number = this.config.maxRetries
  ): Promise<RetryResult<T>> {
    const startTime = Date.now();
    let attempts = 0;

    for (;;) {
      attempts++;
      try {
        const data = await operation();

        if (attempts > 1) {
          gatewayLogger.info(`${operationName} succeeded after retries`, {
            attempts,
            totalTime: Date.now() - startTime,
          });
        }

        return { success: true, data, attempts, totalTime: Date.now() - startTime };
      } catch (caught) {
        const error = ErrorClassifier.classify(caught);

        if (!error.retryable || attempts > maxRetries) {
          gatewayLogger.warn(`${operationName} failed`, {
            attempts,
            code: error.code,
            status: error.status,
            retryable: error.retryable,
          });
          return { success: false, error, attempts, totalTime: Date.now() - startTime };
        }

        const delay = this.calculateDelay(attempts - 1, error);
        gatewayLogger.debug(`Retrying ${operationName} after delay`, {
          nextAttempt: attempts + 1,
          delayMs: delay,
          code: error.code,
        });
        await this.sleep(delay);
      }
    }
  }

  /**
   * Exponential backoff with jitter, capped at maxDelay. A Retry-After from
   * the gateway takes precedence.
   */
  calculateDelay(attempt: number, error?: GatewayError): number {
    if (error instanceof RateLimitedError && error.retryAfterMs !== undefined) {
      return Math.min(error.retryAfterMs, this.config.maxDelay);
    }

    const exponentialDelay = this.config.baseDelay * Math.pow(2, attempt);
    const jitter = exponentialDelay * 0.25 * (Math.random() * 2 - 1);
    return Math.max(0, Math.min(exponentialDelay + jitter, this.config.maxDelay));
  }

  getConfig(): RetryConfig {
    return { ...this.config };
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}
