import { z } from 'zod';
import {
  ExchangeRates,
  Payment,
  PaymentDetails,
  PaymentDetailsInput,
  PaymentDetailsWire,
  PaymentPage,
  PaymentWire,
} from '../types/payment';
import { isPositiveAmount, toFixedAmount } from '../utils/amount';
import { DEFAULT_SUPPORTED_CRYPTOCURRENCIES } from '../utils/constants';
import { parsePaymentStatus } from '../utils/status';
import { validateCryptoCurrency, validateFiatCurrency } from '../utils/validation';

// Empty strings count as "not provided", matching how the gateway omits them.
const optionalText = <T extends z.ZodTypeAny>(schema: T) =>
  z.preprocess((value) => (value === '' || value === null ? undefined : value), schema.optional());

export const amountSchema = z.union([z.string(), z.number()]).transform((value, ctx) => {
  try {
    return toFixedAmount(value);
  } catch {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid decimal amount: ${String(value)}` });
    return z.NEVER;
  }
});

export const timestampSchema = z
  .string()
  .datetime({ offset: true })
  .transform((value) => new Date(value));

export const paymentStatusSchema = z.string().transform(parsePaymentStatus);

export const metadataSchema = z.record(z.unknown());

export interface PaymentDetailsOptions {
  supportedCryptocurrencies?: readonly string[];
}

export const buildPaymentDetailsSchema = (options: PaymentDetailsOptions = {}) => {
  const supported = options.supportedCryptocurrencies ?? DEFAULT_SUPPORTED_CRYPTOCURRENCIES;

  return z.object({
    amount: z
      .union([z.string(), z.number()])
      .refine(isPositiveAmount, { message: 'Amount must be a positive decimal' })
      .transform((value) => toFixedAmount(value)),
    currency: z
      .string()
      .trim()
      .toUpperCase()
      .refine(validateFiatCurrency, { message: 'Unknown fiat currency code' }),
    cryptoCurrency: z
      .string()
      .trim()
      .toUpperCase()
      .refine((code) => validateCryptoCurrency(code, supported), {
        message: `Unsupported cryptocurrency. Must be one of: ${supported.join(', ')}`,
      }),
    description: z.string().max(255).default(''),
    orderId: optionalText(z.string().trim().min(1).max(64)),
    customerEmail: optionalText(z.string().email()),
    customerName: optionalText(z.string().max(128)),
    callbackUrl: optionalText(z.string().url()),
    successUrl: optionalText(z.string().url()),
    cancelUrl: optionalText(z.string().url()),
    metadata: metadataSchema.optional(),
  });
};

const paymentWireSchema = z.object({
  id: z.string().min(1),
  merchant_id: z.string(),
  amount: amountSchema,
  currency: z.string(),
  crypto_amount: amountSchema,
  crypto_currency: z.string(),
  description: z.string().nullish(),
  order_id: z.string().nullish(),
  customer_email: z.string().nullish(),
  customer_name: z.string().nullish(),
  address: z.string(),
  qr_code_url: z.string(),
  status: paymentStatusSchema,
  created_at: timestampSchema,
  updated_at: timestampSchema,
  expires_at: timestampSchema,
  metadata: metadataSchema.nullish(),
});

export const paymentSchema = paymentWireSchema.transform(
  (wire): Payment => ({
    id: wire.id,
    merchantId: wire.merchant_id,
    amount: wire.amount,
    currency: wire.currency,
    cryptoAmount: wire.crypto_amount,
    cryptoCurrency: wire.crypto_currency,
    description: wire.description ?? '',
    orderId: wire.order_id || undefined,
    customerEmail: wire.customer_email || undefined,
    customerName: wire.customer_name || undefined,
    address: wire.address,
    qrCodeUrl: wire.qr_code_url,
    status: wire.status,
    createdAt: wire.created_at,
    updatedAt: wire.updated_at,
    expiresAt: wire.expires_at,
    metadata: wire.metadata ?? undefined,
  })
);

export const paymentPageSchema = z
  .object({
    payments: z.array(paymentSchema),
    total: z.number().int().nonnegative(),
    limit: z.number().int().nonnegative(),
    offset: z.number().int().nonnegative(),
  })
  .transform((page): PaymentPage => page);

export const exchangeRatesSchema = z
  .object({
    base_currency: z.string(),
    rates: z.record(amountSchema),
    updated_at: timestampSchema,
  })
  .transform(
    (wire): ExchangeRates => ({
      baseCurrency: wire.base_currency,
      rates: wire.rates,
      updatedAt: wire.updated_at,
    })
  );

/**
 * Validate caller input and freeze it. Throws `ZodError` listing every
 * offending field.
 */
export function createPaymentDetails(input: unknown, options: PaymentDetailsOptions = {}): PaymentDetails {
  const parsed = buildPaymentDetailsSchema(options).parse(input);
  return Object.freeze({
    ...parsed,
    metadata: parsed.metadata ? Object.freeze({ ...parsed.metadata }) : undefined,
  });
}

/**
 * Immutable builder for payment details. Every `withX()` returns a new builder;
 * validation happens once, in `build()`.
 */
export class PaymentDetailsBuilder {
  private readonly fields: Partial<PaymentDetailsInput>;

  constructor(fields: Partial<PaymentDetailsInput> = {}) {
    this.fields = Object.freeze({ ...fields });
  }

  withAmount(amount: string | number, currency: string): PaymentDetailsBuilder {
    return this.with({ amount, currency });
  }

  withCryptoCurrency(cryptoCurrency: string): PaymentDetailsBuilder {
    return this.with({ cryptoCurrency });
  }

  withDescription(description: string): PaymentDetailsBuilder {
    return this.with({ description });
  }

  withOrderId(orderId: string): PaymentDetailsBuilder {
    return this.with({ orderId });
  }

  withCustomer(customerEmail?: string, customerName?: string): PaymentDetailsBuilder {
    return this.with({ customerEmail, customerName });
  }

  withRedirects(urls: { callbackUrl?: string; successUrl?: string; cancelUrl?: string }): PaymentDetailsBuilder {
    return this.with(urls);
  }

  withMetadata(metadata: Record<string, unknown>): PaymentDetailsBuilder {
    return this.with({ metadata: { ...this.fields.metadata, ...metadata } });
  }

  build(options: PaymentDetailsOptions = {}): PaymentDetails {
    return createPaymentDetails(this.fields, options);
  }

  private with(patch: Partial<PaymentDetailsInput>): PaymentDetailsBuilder {
    return new PaymentDetailsBuilder({ ...this.fields, ...patch });
  }
}

export function paymentDetailsToWire(details: PaymentDetails): PaymentDetailsWire {
  const wire: PaymentDetailsWire = {
    amount: details.amount,
    currency: details.currency,
    crypto_currency: details.cryptoCurrency,
    description: details.description,
  };

  if (details.orderId) wire.order_id = details.orderId;
  if (details.customerEmail) wire.customer_email = details.customerEmail;
  if (details.customerName) wire.customer_name = details.customerName;
  if (details.callbackUrl) wire.callback_url = details.callbackUrl;
  if (details.successUrl) wire.success_url = details.successUrl;
  if (details.cancelUrl) wire.cancel_url = details.cancelUrl;
  if (details.metadata && Object.keys(details.metadata).length > 0) {
    wire.metadata = { ...details.metadata };
  }

  return wire;
}

export function parsePayment(json: unknown): Payment {
  return paymentSchema.parse(json);
}

export function paymentToWire(payment: Payment): PaymentWire {
  const wire: PaymentWire = {
    id: payment.id,
    merchant_id: payment.merchantId,
    amount: payment.amount,
    currency: payment.currency,
    crypto_amount: payment.cryptoAmount,
    crypto_currency: payment.cryptoCurrency,
    description: payment.description,
    address: payment.address,
    qr_code_url: payment.qrCodeUrl,
    status: payment.status,
    created_at: payment.createdAt.toISOString(),
    updated_at: payment.updatedAt.toISOString(),
    expires_at: payment.expiresAt.toISOString(),
  };

  if (payment.orderId) wire.order_id = payment.orderId;
  if (payment.customerEmail) wire.customer_email = payment.customerEmail;
  if (payment.customerName) wire.customer_name = payment.customerName;
  if (payment.metadata && Object.keys(payment.metadata).length > 0) {
    wire.metadata = { ...payment.metadata };
  }

  return wire;
}
