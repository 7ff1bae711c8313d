import { Payment, isTerminalStatus } from '@kioskpay/shared';
import { PollStopReason, Scheduler } from '../types';
import { GatewayError, RateLimitedError } from '../utils/errors';
import { pollerLogger } from '../utils/logger';
import { ErrorClassifier } from './resilience/ErrorClassifier';
import { PaymentSession } from './paymentSession';

export interface StatusPollerOptions {
  fetchPayment: (paymentId: string) => Promise<Payment>;
  maxIntervalMs: number;
  scheduler?: Scheduler;
  now?: () => number;
  onError?: (error: GatewayError) => void;
  onStop?: (reason: PollStopReason) => void;
}

export const timerScheduler: Scheduler = {
  schedule(callback, delayMs) {
    const timer = setTimeout(callback, delayMs);
    return () => clearTimeout(timer);
  },
};

/**
 * Periodically refreshes a session from the gateway until it goes terminal,
 * expires, hits its polling deadline or is stopped.
 *
 * Transient failures (network, rate limiting) double the interval up to
 * `maxIntervalMs`; a successful poll resets it. Anything else stops polling
 * and is reported through `onError`.
 */
export class StatusPoller {
  private readonly options: StatusPollerOptions;
  private readonly scheduler: Scheduler;
  private readonly now: () => number;
  private controller: AbortController | null = null;
  private cancelTimer: (() => void) | null = null;
  private unsubscribe: (() => void) | null = null;
  private baseIntervalMs = 0;
  private currentIntervalMs = 0;
  private deadlineAt = 0;
  private polls = 0;
  private stopReason: PollStopReason | null = null;

  constructor(options: StatusPollerOptions) {
    this.options = options;
    this.scheduler = options.scheduler ?? timerScheduler;
    this.now = options.now ?? Date.now;
  }

  get isRunning(): boolean {
    return this.controller !== null && !this.controller.signal.aborted;
  }

  get pollCount(): number {
    return this.polls;
  }

  get intervalMs(): number {
    return this.currentIntervalMs;
  }

  get lastStopReason(): PollStopReason | null {
    return this.stopReason;
  }

  /**
   * @param deadlineMs measured from the session's `createdAt`
   */
  start(session: PaymentSession, intervalMs: number, deadlineMs: number): void {
    if (this.isRunning) {
      throw new Error(`Poller for payment ${session.paymentId} is already running`);
    }
    if (!Number.isFinite(intervalMs) || intervalMs <= 0) {
      throw new RangeError('Poll interval must be a positive number of milliseconds');
    }

    const controller = new AbortController();
    this.controller = controller;
    this.stopReason = null;
    this.baseIntervalMs = intervalMs;
    this.currentIntervalMs = intervalMs;
    this.deadlineAt = session.createdAt.getTime() + deadlineMs;

    controller.signal.addEventListener('abort', () => {
      this.cancelTimer?.();
      this.cancelTimer = null;
      this.unsubscribe?.();
      this.unsubscribe = null;
    });

    this.unsubscribe = session.onStatusChange((change) => {
      if (isTerminalStatus(change.to)) {
        this.finish(session, change.source === 'expiry' ? 'expired' : 'terminal');
      }
    });

    if (!session.isLive) {
      this.finish(session, 'discarded');
      return;
    }
    if (session.isTerminal) {
      this.finish(session, 'terminal');
      return;
    }

    pollerLogger.debug('Polling started', {
      paymentId: session.paymentId,
      intervalMs,
      deadline: new Date(this.deadlineAt).toISOString(),
    });
    this.scheduleNext(session, controller.signal);
  }

  /**
   * Idempotent; a response still in flight is discarded when it lands.
   */
  stop(): void {
    if (!this.isRunning) return;
    this.stopReason = 'stopped';
    this.controller?.abort();
    pollerLogger.debug('Polling stopped');
    this.options.onStop?.('stopped');
  }

  private finish(session: PaymentSession, reason: PollStopReason): void {
    if (!this.controller || this.controller.signal.aborted) return;

    this.stopReason = reason;
    this.controller.abort();
    pollerLogger.debug('Polling finished', {
      paymentId: session.paymentId,
      reason,
      polls: this.polls,
    });
    this.options.onStop?.(reason);
  }

  private scheduleNext(session: PaymentSession, signal: AbortSignal): void {
    const now = this.now();
    const untilExpiry = Math.max(0, session.expiresAt.getTime() - now);
    const untilDeadline = Math.max(0, this.deadlineAt - now);
    const delay = Math.min(this.currentIntervalMs, untilExpiry, untilDeadline);

    this.cancelTimer = this.scheduler.schedule(() => {
      this.cancelTimer = null;
      this.tick(session, signal).catch((error: unknown) => {
        this.fail(session, ErrorClassifier.classify(error));
      });
    }, delay);
  }

  private async tick(session: PaymentSession, signal: AbortSignal): Promise<void> {
    if (signal.aborted) return;

    if (!session.isLive) {
      this.finish(session, 'discarded');
      return;
    }

    // A terminal transition here notifies our listener, which stops the poller
    const now = this.now();
    session.checkExpiry(now);
    if (signal.aborted) return;

    if (now >= this.deadlineAt) {
      this.finish(session, 'deadline');
      return;
    }

    try {
      this.polls++;
      const payment = await this.options.fetchPayment(session.paymentId);
      if (signal.aborted) {
        pollerLogger.debug('Discarding late poll response', { paymentId: session.paymentId });
        return;
      }
      session.apply(payment, 'poll');
      this.currentIntervalMs = this.baseIntervalMs;
    } catch (caught) {
      if (signal.aborted) return;

      const error = ErrorClassifier.classify(caught);
      if (!error.retryable) {
        this.fail(session, error);
        return;
      }

      this.currentIntervalMs = this.backoff(error);
      pollerLogger.warn('Transient polling failure, backing off', {
        paymentId: session.paymentId,
        code: error.code,
        nextIntervalMs: this.currentIntervalMs,
      });
    }

    if (!signal.aborted) {
      this.scheduleNext(session, signal);
    }
  }

  private backoff(error: GatewayError): number {
    let next = Math.min(this.currentIntervalMs * 2, this.options.maxIntervalMs);
    if (error instanceof RateLimitedError && error.retryAfterMs !== undefined) {
      next = Math.max(next, Math.min(error.retryAfterMs, this.options.maxIntervalMs));
    }
    return next;
  }

  private fail(session: PaymentSession, error: GatewayError): void {
    pollerLogger.error('Polling failed', {
      paymentId: session.paymentId,
      code: error.code,
      error: error.message,
    });
    this.finish(session, 'error');
    this.options.onError?.(error);
  }
}
