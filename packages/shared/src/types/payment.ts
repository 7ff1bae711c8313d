import { COUNTRY_CODES } from '../utils/constants';

export const PAYMENT_STATUSES = ['created', 'pending', 'completed', 'cancelled', 'expired'] as const;

export type PaymentStatus = (typeof PAYMENT_STATUSES)[number];

export type CountryCode = (typeof COUNTRY_CODES)[number];

/**
 * Validated, frozen request for a new payment. `amount` always holds exactly
 * eight fractional digits.
 */
export interface PaymentDetails {
  readonly amount: string;
  readonly currency: string;
  readonly cryptoCurrency: string;
  readonly description: string;
  readonly orderId?: string;
  readonly customerEmail?: string;
  readonly customerName?: string;
  readonly callbackUrl?: string;
  readonly successUrl?: string;
  readonly cancelUrl?: string;
  readonly metadata?: Readonly<Record<string, unknown>>;
}

export interface PaymentDetailsInput {
  amount: string | number;
  currency: string;
  cryptoCurrency: string;
  description?: string;
  orderId?: string;
  customerEmail?: string;
  customerName?: string;
  callbackUrl?: string;
  successUrl?: string;
  cancelUrl?: string;
  metadata?: Record<string, unknown>;
}

export interface PaymentDetailsWire {
  amount: string;
  currency: string;
  crypto_currency: string;
  description: string;
  order_id?: string;
  customer_email?: string;
  customer_name?: string;
  callback_url?: string;
  success_url?: string;
  cancel_url?: string;
  metadata?: Record<string, unknown>;
}

export interface Payment {
  id: string;
  merchantId: string;
  amount: string;
  currency: string;
  cryptoAmount: string;
  cryptoCurrency: string;
  description: string;
  orderId?: string;
  customerEmail?: string;
  customerName?: string;
  address: string;
  qrCodeUrl: string;
  status: PaymentStatus;
  createdAt: Date;
  updatedAt: Date;
  expiresAt: Date;
  metadata?: Record<string, unknown>;
}

export interface PaymentWire {
  id: string;
  merchant_id: string;
  amount: string;
  currency: string;
  crypto_amount: string;
  crypto_currency: string;
  description: string;
  order_id?: string;
  customer_email?: string;
  customer_name?: string;
  address: string;
  qr_code_url: string;
  status: PaymentStatus;
  created_at: string;
  updated_at: string;
  expires_at: string;
  metadata?: Record<string, unknown>;
}

export interface PaymentListFilters {
  status?: PaymentStatus;
  fromDate?: Date;
  toDate?: Date;
  limit?: number;
  offset?: number;
}

export interface PaymentPage {
  payments: Payment[];
  total: number;
  limit: number;
  offset: number;
}

export interface ExchangeRates {
  baseCurrency: string;
  rates: Record<string, string>;
  updatedAt: Date;
}
