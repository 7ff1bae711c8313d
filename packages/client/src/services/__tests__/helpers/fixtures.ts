import { Payment } from '@kioskpay/shared';

export const BASE_TIME = Date.parse('2026-03-01T10:00:00.000Z');
export const FIFTEEN_MINUTES = 15 * 60 * 1000;

export const makePayment = (overrides: Partial<Payment> = {}): Payment => ({
  id: 'pay_1',
  merchantId: 'merchant-test',
  amount: '10.50000000',
  currency: 'MYR',
  cryptoAmount: '0.00016000',
  cryptoCurrency: 'BTC',
  description: '',
  address: 'bc1qfakeaddress',
  qrCodeUrl: 'https://gateway.test/qr/pay_1.png',
  status: 'created',
  createdAt: new Date(BASE_TIME),
  updatedAt: new Date(BASE_TIME),
  expiresAt: new Date(BASE_TIME + FIFTEEN_MINUTES),
  ...overrides,
});

export const later = (status: Payment['status'], offsetMs: number, overrides: Partial<Payment> = {}): Payment =>
  makePayment({ status, updatedAt: new Date(BASE_TIME + offsetMs), ...overrides });
