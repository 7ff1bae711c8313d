import {
  ExchangeRates,
  GATEWAY_HEADERS,
  Payment,
  PaymentDetails,
  PaymentDetailsInput,
  PaymentListFilters,
  PaymentPage,
  createPaymentDetails,
  isTerminalStatus,
} from '@kioskpay/shared';
import {
  GatewayClientConfig,
  GatewayClientConfigInput,
  loadGatewayConfig,
  validateGatewayConfig,
} from '../config/gateway';
import { OperationResult, Scheduler, TrackOptions, WebhookOutcome } from '../types';
import { ValidationError } from '../utils/errors';
import { logger, logPaymentEvent } from '../utils/logger';
import { GatewayClient, GatewayClientOptions } from './gatewayClient';
import { PaymentSession } from './paymentSession';
import { ErrorClassifier } from './resilience/ErrorClassifier';
import { RequestSigner } from './requestSigner';
import { StatusPoller, timerScheduler } from './statusPoller';
import { WebhookVerifier } from './webhookVerifier';

export interface KioskPaymentClientOptions extends GatewayClientOptions {
  gateway?: GatewayClient;
  scheduler?: Scheduler;
  now?: () => number;
  onOrphan?: (payment: Readonly<Payment>) => void;
}

export type WebhookHeaders = Record<string, string | string[] | undefined>;

interface TrackedSession {
  session: PaymentSession;
  poller: StatusPoller;
}

const fail = <T>(error: unknown): OperationResult<T> => ({
  success: false,
  error: ErrorClassifier.classify(error),
});

const isPositiveDuration = (value: number | undefined): boolean =>
  value === undefined || (Number.isFinite(value) && value > 0);

const checkTrackOptions = (options: TrackOptions): ValidationError | undefined => {
  const invalid = (['pollIntervalMs', 'pollDeadlineMs'] as const).filter(
    (key) => !isPositiveDuration(options[key])
  );
  if (invalid.length === 0) return undefined;
  return new ValidationError(
    'Polling options must be positive numbers of milliseconds',
    Object.fromEntries(invalid.map((key) => [key, options[key]]))
  );
};

const readHeader = (headers: WebhookHeaders, name: string): string | undefined => {
  const wanted = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === wanted) {
      return Array.isArray(value) ? value[0] : value;
    }
  }
  return undefined;
};

/**
 * Entry point for kiosk integrations: creates and tracks payment sessions,
 * routes verified webhooks to them, and exposes the read-only gateway calls.
 * No method throws; failures come back as `OperationResult`.
 */
export class KioskPaymentClient {
  readonly config: GatewayClientConfig;
  private readonly gateway: GatewayClient;
  private readonly verifier: WebhookVerifier;
  private readonly scheduler: Scheduler;
  private readonly now: () => number;
  private readonly sessions = new Map<string, TrackedSession>();

  constructor(config: GatewayClientConfigInput, options: KioskPaymentClientOptions = {}) {
    this.config = validateGatewayConfig(config);
    this.now = options.now ?? Date.now;
    this.scheduler = options.scheduler ?? timerScheduler;

    const signer = options.signer ?? new RequestSigner(this.config.secretKey, this.now);
    this.gateway =
      options.gateway ??
      new GatewayClient(this.config, {
        signer,
        retryManager: options.retryManager,
        axiosConfig: options.axiosConfig,
      });
    this.verifier = new WebhookVerifier(signer, {
      path: this.config.webhook.path,
      toleranceSeconds: this.config.webhook.toleranceSeconds,
      now: this.now,
      sessions: { get: (paymentId) => this.sessions.get(paymentId)?.session },
      onOrphan: options.onOrphan,
    });
  }

  static fromEnv(env: NodeJS.ProcessEnv = process.env, options: KioskPaymentClientOptions = {}): KioskPaymentClient {
    return new KioskPaymentClient(loadGatewayConfig(env), options);
  }

  get activeSessionCount(): number {
    return this.sessions.size;
  }

  /**
   * Validate, create the payment and start tracking it. Invalid details or
   * polling options are rejected before any network call.
   */
  async createSession(
    input: PaymentDetailsInput | PaymentDetails,
    options: TrackOptions = {}
  ): Promise<OperationResult<PaymentSession>> {
    const optionsError = checkTrackOptions(options);
    if (optionsError) {
      return { success: false, error: optionsError };
    }

    let details: PaymentDetails;
    try {
      details = createPaymentDetails(input, {
        supportedCryptocurrencies: this.config.supportedCryptocurrencies,
      });
    } catch (error) {
      return fail(error);
    }

    try {
      const payment = await this.gateway.createPayment(details);
      logPaymentEvent(payment.id, 'create', true, {
        amount: payment.amount,
        currency: payment.currency,
        cryptoCurrency: payment.cryptoCurrency,
      });
      return { success: true, data: this.track(payment, options) };
    } catch (error) {
      const result = fail<PaymentSession>(error);
      logPaymentEvent(details.orderId ?? 'unassigned', 'create', false, undefined, error);
      return result;
    }
  }

  /**
   * Track a payment created elsewhere, e.g. after a kiosk restart
   */
  async attachSession(paymentId: string, options: TrackOptions = {}): Promise<OperationResult<PaymentSession>> {
    const optionsError = checkTrackOptions(options);
    if (optionsError) {
      return { success: false, error: optionsError };
    }

    const existing = this.sessions.get(paymentId);
    if (existing) {
      return { success: true, data: existing.session };
    }

    try {
      const payment = await this.gateway.getPayment(paymentId);
      return { success: true, data: this.track(payment, options) };
    } catch (error) {
      return fail(error);
    }
  }

  async cancelPayment(paymentId: string): Promise<OperationResult<Readonly<Payment>>> {
    const tracked = this.sessions.get(paymentId);
    if (tracked) {
      return tracked.session.cancel();
    }

    try {
      const payment = await this.gateway.cancelPayment(paymentId);
      logPaymentEvent(payment.id, 'cancel', true, { status: payment.status, tracked: false });
      return { success: true, data: Object.freeze(payment) };
    } catch (error) {
      return fail(error);
    }
  }

  handleWebhook(rawBody: string | Buffer, headers: WebhookHeaders): OperationResult<WebhookOutcome> {
    try {
      const outcome = this.verifier.receive(
        rawBody,
        readHeader(headers, GATEWAY_HEADERS.SIGNATURE),
        readHeader(headers, GATEWAY_HEADERS.TIMESTAMP)
      );
      return { success: true, data: outcome };
    } catch (error) {
      return fail(error);
    }
  }

  async listPayments(filters: PaymentListFilters = {}): Promise<OperationResult<PaymentPage>> {
    try {
      return { success: true, data: await this.gateway.listPayments(filters) };
    } catch (error) {
      return fail(error);
    }
  }

  async getExchangeRates(
    baseCurrency?: string,
    cryptoCurrencies?: readonly string[]
  ): Promise<OperationResult<ExchangeRates>> {
    try {
      return { success: true, data: await this.gateway.getExchangeRates(baseCurrency, cryptoCurrencies) };
    } catch (error) {
      return fail(error);
    }
  }

  getSession(paymentId: string): PaymentSession | undefined {
    return this.sessions.get(paymentId)?.session;
  }

  /**
   * Stop polling and forget the session. Returns false if it was not tracked.
   */
  release(paymentId: string): boolean {
    const tracked = this.sessions.get(paymentId);
    if (!tracked) return false;

    tracked.poller.stop();
    tracked.session.discard();
    this.sessions.delete(paymentId);
    return true;
  }

  shutdown(): void {
    const count = this.sessions.size;
    for (const paymentId of [...this.sessions.keys()]) {
      this.release(paymentId);
    }
    logger.info('Payment client shut down', { releasedSessions: count });
  }

  private track(payment: Payment, options: TrackOptions): PaymentSession {
    const session = new PaymentSession(payment, {
      gateway: this.gateway,
      now: this.now,
      scheduler: this.scheduler,
    });

    session.onStatusChange((change) => {
      options.onStatusChange?.(change);
      if (isTerminalStatus(change.to)) {
        options.onTerminal?.(change.payment);
      }
    });

    const poller = new StatusPoller({
      // One attempt per tick; backoff lives in the poller
      fetchPayment: (paymentId) => this.gateway.getPayment(paymentId, { maxRetries: 0 }),
      maxIntervalMs: this.config.polling.maxIntervalMs,
      scheduler: this.scheduler,
      now: this.now,
      onError: options.onError,
    });

    this.sessions.set(payment.id, { session, poller });

    if (options.autoPoll !== false && !session.isTerminal) {
      poller.start(
        session,
        options.pollIntervalMs ?? this.config.polling.intervalMs,
        options.pollDeadlineMs ?? this.config.polling.deadlineMs
      );
    }

    return session;
  }
}
