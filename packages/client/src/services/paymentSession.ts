import { Payment, PaymentStatus, isTerminalStatus, statusRank } from '@kioskpay/shared';
import {
  IgnoredReason,
  OperationResult,
  Scheduler,
  StatusChange,
  StatusChangeListener,
  TransitionResult,
  TransitionSource,
} from '../types';
import { GatewayError } from '../utils/errors';
import { logPaymentEvent, sessionLogger } from '../utils/logger';
import { ErrorClassifier } from './resilience/ErrorClassifier';
import type { GatewayClient } from './gatewayClient';

export type PaymentCanceller = Pick<GatewayClient, 'cancelPayment'>;

export interface PaymentSessionOptions {
  gateway: PaymentCanceller;
  now?: () => number;
  /** When set, the session expires itself at `expiresAt` without a poller */
  scheduler?: Scheduler;
}

const clonePayment = (payment: Payment): Payment => ({
  ...payment,
  createdAt: new Date(payment.createdAt.getTime()),
  updatedAt: new Date(payment.updatedAt.getTime()),
  expiresAt: new Date(payment.expiresAt.getTime()),
  metadata: payment.metadata ? { ...payment.metadata } : undefined,
});

/**
 * Client-side view of one payment. Owns the status state machine:
 *
 *   created -> pending -> completed | cancelled | expired
 *
 * Terminal statuses absorb every later update, and updates never move the
 * status backwards. Listeners hear about each applied transition exactly once,
 * whichever source (poll, webhook, cancel, local expiry) delivered it.
 */
export class PaymentSession {
  private payment: Payment;
  private live = true;
  private readonly listeners = new Set<StatusChangeListener>();
  private readonly gateway: PaymentCanceller;
  private readonly now: () => number;
  private readonly scheduler?: Scheduler;
  private cancelExpiryTimer: (() => void) | null = null;

  constructor(payment: Payment, options: PaymentSessionOptions) {
    this.payment = clonePayment(payment);
    this.gateway = options.gateway;
    this.now = options.now ?? Date.now;
    this.scheduler = options.scheduler;
    this.armExpiryTimer();
  }

  get paymentId(): string {
    return this.payment.id;
  }

  get status(): PaymentStatus {
    return this.payment.status;
  }

  get isTerminal(): boolean {
    return isTerminalStatus(this.payment.status);
  }

  get isLive(): boolean {
    return this.live;
  }

  get createdAt(): Date {
    return new Date(this.payment.createdAt.getTime());
  }

  get expiresAt(): Date {
    return new Date(this.payment.expiresAt.getTime());
  }

  snapshot(): Readonly<Payment> {
    return Object.freeze(clonePayment(this.payment));
  }

  onStatusChange(listener: StatusChangeListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Merge a fresh payment from the gateway into the session
   */
  apply(incoming: Payment, source: TransitionSource): TransitionResult {
    if (!this.live) return this.ignore('discarded');
    if (this.isTerminal) return this.ignore('terminal');

    if (incoming.id !== this.payment.id) {
      sessionLogger.warn('Ignoring update for a different payment', {
        paymentId: this.payment.id,
        incomingId: incoming.id,
        source,
      });
      return this.ignore('mismatch');
    }

    // Past expiresAt only a terminal status from the gateway beats local expiry
    if (!isTerminalStatus(incoming.status) && this.checkExpiry().applied) {
      return this.ignore('terminal');
    }

    if (incoming.status === this.payment.status) return this.ignore('unchanged');
    if (statusRank(incoming.status) <= statusRank(this.payment.status)) {
      sessionLogger.debug('Ignoring status regression', {
        paymentId: this.payment.id,
        from: this.payment.status,
        to: incoming.status,
        source,
      });
      return this.ignore('regression');
    }

    const updatedAt =
      incoming.updatedAt.getTime() > this.payment.updatedAt.getTime() ? incoming.updatedAt : new Date(this.now());

    return this.transition({ ...this.payment, ...clonePayment(incoming), updatedAt }, source);
  }

  /**
   * Expire the session locally once its deadline has passed, regardless of
   * what the gateway last reported.
   */
  checkExpiry(now: number = this.now()): TransitionResult {
    if (!this.live) return this.ignore('discarded');
    if (this.isTerminal) return this.ignore('terminal');
    if (now < this.payment.expiresAt.getTime()) return this.ignore('unchanged');

    return this.transition({ ...this.payment, status: 'expired', updatedAt: new Date(now) }, 'expiry');
  }

  /**
   * Ask the gateway to cancel. A session that is already terminal reports its
   * current state without a network call.
   */
  async cancel(): Promise<OperationResult<Readonly<Payment>>> {
    if (!this.live) {
      return {
        success: false,
        error: new GatewayError('Payment session has been released', 'SESSION_RELEASED'),
      };
    }
    if (this.isTerminal) {
      return { success: true, data: this.snapshot() };
    }

    try {
      const payment = await this.gateway.cancelPayment(this.payment.id);
      this.apply(payment, 'cancel');
      logPaymentEvent(this.payment.id, 'cancel', true, { status: this.payment.status });
      return { success: true, data: this.snapshot() };
    } catch (caught) {
      const error = ErrorClassifier.classify(caught);
      logPaymentEvent(this.payment.id, 'cancel', false, { code: error.code }, error);
      return { success: false, error };
    }
  }

  /**
   * Stop accepting updates and drop every listener. Idempotent.
   */
  discard(): void {
    if (!this.live) return;
    this.live = false;
    this.clearExpiryTimer();
    this.listeners.clear();
    sessionLogger.debug('Payment session discarded', { paymentId: this.payment.id });
  }

  private armExpiryTimer(): void {
    this.clearExpiryTimer();
    if (!this.scheduler || !this.live || this.isTerminal) return;

    const delay = Math.max(0, this.payment.expiresAt.getTime() - this.now());
    this.cancelExpiryTimer = this.scheduler.schedule(() => {
      this.cancelExpiryTimer = null;
      // A clock that lags the scheduler gets another wait
      if (!this.checkExpiry().applied) this.armExpiryTimer();
    }, delay);
  }

  private clearExpiryTimer(): void {
    this.cancelExpiryTimer?.();
    this.cancelExpiryTimer = null;
  }

  private ignore(reason: IgnoredReason): TransitionResult {
    return { applied: false, reason, status: this.payment.status };
  }

  private transition(next: Payment, source: TransitionSource): TransitionResult {
    const from = this.payment.status;
    const expiresAtChanged = next.expiresAt.getTime() !== this.payment.expiresAt.getTime();
    this.payment = next;
    if (this.isTerminal) {
      this.clearExpiryTimer();
    } else if (expiresAtChanged) {
      this.armExpiryTimer();
    }

    const change: StatusChange = {
      paymentId: next.id,
      from,
      to: next.status,
      source,
      payment: this.snapshot(),
    };

    logPaymentEvent(next.id, 'status_change', true, { from, to: next.status, source });

    // Copy first: a listener may unsubscribe itself while we iterate
    for (const listener of [...this.listeners]) {
      try {
        listener(change);
      } catch (error) {
        sessionLogger.error('Status change listener failed', {
          paymentId: next.id,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }

    return { applied: true, change };
  }
}
