import { isTerminalStatus, parsePaymentStatus, statusRank } from '../status';

describe('payment status helpers', () => {
  it('should normalize case and whitespace', () => {
    expect(parsePaymentStatus('PENDING')).toBe('pending');
    expect(parsePaymentStatus(' completed ')).toBe('completed');
  });

  it('should fall back to created for unknown values', () => {
    expect(parsePaymentStatus('refunded')).toBe('created');
    expect(parsePaymentStatus(42)).toBe('created');
    expect(parsePaymentStatus(null)).toBe('created');
    expect(parsePaymentStatus(undefined)).toBe('created');
  });

  it('should treat completed, cancelled and expired as terminal', () => {
    expect(isTerminalStatus('completed')).toBe(true);
    expect(isTerminalStatus('cancelled')).toBe(true);
    expect(isTerminalStatus('expired')).toBe(true);
    expect(isTerminalStatus('created')).toBe(false);
    expect(isTerminalStatus('pending')).toBe(false);
  });

  it('should rank statuses along the lifecycle', () => {
    expect(statusRank('created')).toBeLessThan(statusRank('pending'));
    expect(statusRank('pending')).toBeLessThan(statusRank('completed'));
    expect(statusRank('cancelled')).toBe(statusRank('expired'));
  });
});
