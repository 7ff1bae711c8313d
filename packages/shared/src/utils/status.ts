import { PAYMENT_STATUSES, PaymentStatus } from '../types/payment';

const KNOWN_STATUSES: ReadonlySet<string> = new Set(PAYMENT_STATUSES);

const TERMINAL_STATUSES: ReadonlySet<PaymentStatus> = new Set<PaymentStatus>([
  'completed',
  'cancelled',
  'expired',
]);

function isPaymentStatus(value: string): value is PaymentStatus {
  return KNOWN_STATUSES.has(value);
}

/**
 * Map a wire status onto the closed enumeration. Values the gateway may add
 * later fall back to `created` instead of failing the parse.
 */
export function parsePaymentStatus(value: unknown): PaymentStatus {
  if (typeof value !== 'string') {
    return 'created';
  }
  const normalized = value.trim().toLowerCase();
  return isPaymentStatus(normalized) ? normalized : 'created';
}

export function isTerminalStatus(status: PaymentStatus): boolean {
  return TERMINAL_STATUSES.has(status);
}

// Position along created -> pending -> terminal; transitions only move forward.
export function statusRank(status: PaymentStatus): number {
  switch (status) {
    case 'created':
      return 0;
    case 'pending':
      return 1;
    default:
      return 2;
  }
}
