import axios, { AxiosInstance, CreateAxiosDefaults, InternalAxiosRequestConfig, Method } from 'axios';
import { ZodType, ZodTypeDef } from 'zod';
import {
  ExchangeRates,
  GATEWAY_ENDPOINTS,
  GATEWAY_HEADERS,
  Payment,
  PaymentDetails,
  PaymentListFilters,
  PaymentPage,
  exchangeRatesSchema,
  paymentDetailsToWire,
  paymentPageSchema,
  paymentSchema,
} from '@kioskpay/shared';
import { GatewayClientConfig } from '../config/gateway';
import { ProtocolError, ValidationError } from '../utils/errors';
import { gatewayLogger, logGatewayCall } from '../utils/logger';
import { stableStringify } from '../utils/serialization';
import { ErrorClassifier } from './resilience/ErrorClassifier';
import { RetryManager } from './resilience/RetryManager';
import { RequestSigner } from './requestSigner';

export interface GatewayClientOptions {
  signer?: RequestSigner;
  retryManager?: RetryManager;
  /** Overrides for the underlying axios instance, e.g. a custom adapter */
  axiosConfig?: CreateAxiosDefaults;
}

export interface RequestOptions {
  maxRetries?: number;
}

interface SendOptions<T> {
  method: Method;
  path: string;
  schema: ZodType<T, ZodTypeDef, unknown>;
  operation: string;
  body?: string;
  headers?: Record<string, string>;
  maxRetries: number;
}

/**
 * Signed HTTP transport for the payment gateway. Every method resolves with a
 * parsed model or rejects with a classified `GatewayError`.
 */
export class GatewayClient {
  private readonly client: AxiosInstance;
  private readonly config: GatewayClientConfig;
  private readonly signer: RequestSigner;
  private readonly retryManager: RetryManager;

  constructor(config: GatewayClientConfig, options: GatewayClientOptions = {}) {
    this.config = config;
    this.signer = options.signer ?? new RequestSigner(config.secretKey);
    this.retryManager =
      options.retryManager ??
      new RetryManager({
        maxRetries: config.maxRetries,
        baseDelay: 500,
        maxDelay: 5000,
      });

    this.client = axios.create({
      baseURL: config.apiUrl,
      timeout: config.timeoutMs,
      responseType: 'text',
      // Bodies are serialized before signing and parsed after classification
      transformRequest: [(data: unknown) => data],
      transformResponse: [(data: unknown) => data],
      ...options.axiosConfig,
      headers: {
        'Content-Type': 'application/json',
        Accept: 'application/json',
        'User-Agent': 'KioskPay-Client/1.0.0',
        [GATEWAY_HEADERS.MERCHANT_ID]: config.merchantId,
        [GATEWAY_HEADERS.API_KEY]: config.apiKey,
        [GATEWAY_HEADERS.COUNTRY_CODE]: config.countryCode,
        [GATEWAY_HEADERS.TEST_MODE]: config.testMode ? 'true' : 'false',
      },
    });

    this.client.interceptors.request.use(
      (request) => this.signRequest(request),
      (error: unknown) => {
        gatewayLogger.error('Gateway request error', { error });
        return Promise.reject(error);
      }
    );

    this.client.interceptors.response.use(
      (response) => response,
      (error: unknown) => Promise.reject(ErrorClassifier.classify(error))
    );
  }

  /**
   * Create a payment. Without a client-supplied order id the gateway cannot
   * deduplicate, so the call is attempted exactly once.
   */
  async createPayment(details: PaymentDetails): Promise<Payment> {
    const headers: Record<string, string> = {};
    if (details.orderId) {
      headers[GATEWAY_HEADERS.IDEMPOTENCY_KEY] = details.orderId;
    }

    return this.send({
      method: 'POST',
      path: GATEWAY_ENDPOINTS.PAYMENTS,
      schema: paymentSchema,
      operation: 'createPayment',
      body: stableStringify(paymentDetailsToWire(details)),
      headers,
      maxRetries: details.orderId ? this.config.maxRetries : 0,
    });
  }

  async getPayment(paymentId: string, options: RequestOptions = {}): Promise<Payment> {
    return this.send({
      method: 'GET',
      path: this.paymentPath(paymentId),
      schema: paymentSchema,
      operation: 'getPayment',
      maxRetries: options.maxRetries ?? this.config.maxRetries,
    });
  }

  async cancelPayment(paymentId: string): Promise<Payment> {
    return this.send({
      method: 'POST',
      path: `${this.paymentPath(paymentId)}/cancel`,
      schema: paymentSchema,
      operation: 'cancelPayment',
      body: '',
      maxRetries: this.config.maxRetries,
    });
  }

  async listPayments(filters: PaymentListFilters = {}): Promise<PaymentPage> {
    const query = new URLSearchParams();
    if (filters.status) query.append('status', filters.status);
    if (filters.fromDate) query.append('from_date', filters.fromDate.toISOString());
    if (filters.toDate) query.append('to_date', filters.toDate.toISOString());
    if (filters.limit !== undefined) query.append('limit', filters.limit.toString());
    if (filters.offset !== undefined) query.append('offset', filters.offset.toString());

    const search = query.toString();
    return this.send({
      method: 'GET',
      path: search ? `${GATEWAY_ENDPOINTS.PAYMENTS}?${search}` : GATEWAY_ENDPOINTS.PAYMENTS,
      schema: paymentPageSchema,
      operation: 'listPayments',
      maxRetries: this.config.maxRetries,
    });
  }

  async getExchangeRates(
    baseCurrency: string = 'USD',
    cryptoCurrencies: readonly string[] = this.config.supportedCryptocurrencies
  ): Promise<ExchangeRates> {
    const query = new URLSearchParams();
    query.append('base_currency', baseCurrency.toUpperCase());
    query.append('currencies', cryptoCurrencies.join(','));

    return this.send({
      method: 'GET',
      path: `${GATEWAY_ENDPOINTS.EXCHANGE_RATES}?${query.toString()}`,
      schema: exchangeRatesSchema,
      operation: 'getExchangeRates',
      maxRetries: this.config.maxRetries,
    });
  }

  private paymentPath(paymentId: string): string {
    if (!paymentId || !paymentId.trim()) {
      throw new ValidationError('Payment ID is required');
    }
    return `${GATEWAY_ENDPOINTS.PAYMENTS}/${encodeURIComponent(paymentId.trim())}`;
  }

  private async send<T>(options: SendOptions<T>): Promise<T> {
    const result = await this.retryManager.execute(
      async () => {
        const startTime = Date.now();
        try {
          const response = await this.client.request<unknown>({
            method: options.method,
            url: options.path,
            data: options.body,
            headers: options.headers,
          });
          logGatewayCall(options.path, options.method, true, Date.now() - startTime);
          return this.parseBody(response.data, options.schema, options.operation);
        } catch (error) {
          logGatewayCall(options.path, options.method, false, Date.now() - startTime, error);
          throw error;
        }
      },
      options.operation,
      options.maxRetries
    );

    if (!result.success) {
      throw result.error;
    }
    return result.data;
  }

  private parseBody<T>(data: unknown, schema: ZodType<T, ZodTypeDef, unknown>, operation: string): T {
    let json: unknown = data;
    if (typeof data === 'string') {
      try {
        json = JSON.parse(data);
      } catch {
        throw new ProtocolError(`Malformed JSON in ${operation} response`, { body: data.slice(0, 200) });
      }
    }

    const parsed = schema.safeParse(json);
    if (!parsed.success) {
      throw new ProtocolError(`Unexpected ${operation} response shape`, parsed.error.flatten());
    }
    return parsed.data;
  }

  /**
   * Attach signature, timestamp and nonce headers. The canonical path is the
   * one the gateway sees, base URL prefix and query string included.
   */
  private signRequest(request: InternalAxiosRequestConfig): InternalAxiosRequestConfig {
    const method = (request.method || 'GET').toUpperCase();
    const body = typeof request.data === 'string' ? request.data : '';
    const signed = this.signer.signRequest(method, this.canonicalPath(request), body);

    request.headers.set(GATEWAY_HEADERS.SIGNATURE, signed.signature);
    request.headers.set(GATEWAY_HEADERS.TIMESTAMP, signed.timestamp);
    request.headers.set(GATEWAY_HEADERS.NONCE, signed.nonce);

    return request;
  }

  private canonicalPath(request: InternalAxiosRequestConfig): string {
    const base = (request.baseURL || this.config.apiUrl).replace(/\/+$/, '');
    const url = new URL(`${base}${request.url || ''}`);
    return `${url.pathname}${url.search}`;
  }
}
