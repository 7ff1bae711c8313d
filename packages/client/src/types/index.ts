import type { Payment, PaymentStatus } from '@kioskpay/shared';
import type { GatewayError } from '../utils/errors';

export type OperationResult<T> = { success: true; data: T } | { success: false; error: GatewayError };

export type TransitionSource = 'poll' | 'webhook' | 'cancel' | 'expiry';

export interface StatusChange {
  paymentId: string;
  from: PaymentStatus;
  to: PaymentStatus;
  source: TransitionSource;
  payment: Readonly<Payment>;
}

export type IgnoredReason = 'discarded' | 'terminal' | 'mismatch' | 'unchanged' | 'regression';

export type TransitionResult =
  | { applied: true; change: StatusChange }
  | { applied: false; reason: IgnoredReason; status: PaymentStatus };

export type StatusChangeListener = (change: StatusChange) => void;

export type PollStopReason = 'stopped' | 'terminal' | 'deadline' | 'expired' | 'discarded' | 'error';

export interface SessionHandlers {
  /** Called once per applied transition */
  onStatusChange?: StatusChangeListener;
  /** Called once, when the session reaches completed, cancelled or expired */
  onTerminal?: (payment: Readonly<Payment>) => void;
  /** Non-retryable polling failures; the poller has already stopped */
  onError?: (error: GatewayError) => void;
}

export interface TrackOptions extends SessionHandlers {
  autoPoll?: boolean;
  pollIntervalMs?: number;
  pollDeadlineMs?: number;
}

export type WebhookOutcome =
  | { kind: 'applied'; payment: Readonly<Payment>; change: StatusChange }
  | { kind: 'ignored'; payment: Readonly<Payment>; reason: IgnoredReason }
  | { kind: 'orphan'; payment: Readonly<Payment> };

/**
 * Anything that can run a callback later. Returns a function that cancels the
 * pending callback.
 */
export interface Scheduler {
  schedule(callback: () => void, delayMs: number): () => void;
}
