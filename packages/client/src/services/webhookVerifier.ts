import { Payment, paymentSchema } from '@kioskpay/shared';
import { WebhookOutcome } from '../types';
import { AuthError, ProtocolError } from '../utils/errors';
import { webhookLogger } from '../utils/logger';
import { PaymentSession } from './paymentSession';
import { RequestSigner } from './requestSigner';

export interface SessionLookup {
  get(paymentId: string): PaymentSession | undefined;
}

export interface WebhookVerifierOptions {
  /** Path the gateway delivers to; part of the signed canonical string */
  path: string;
  toleranceSeconds: number;
  sessions?: SessionLookup;
  now?: () => number;
  onOrphan?: (payment: Readonly<Payment>) => void;
}

const TIMESTAMP_PATTERN = /^\d+$/;

export class WebhookVerifier {
  private readonly signer: RequestSigner;
  private readonly options: WebhookVerifierOptions;
  private readonly now: () => number;

  constructor(signer: RequestSigner, options: WebhookVerifierOptions) {
    this.signer = signer;
    this.options = options;
    this.now = options.now ?? Date.now;
  }

  /**
   * Authenticate a delivery and parse its payment. The body must be the exact
   * bytes received; re-serialized JSON will not verify.
   */
  verify(rawBody: string | Buffer, signature: string | undefined, timestamp: string | undefined): Payment {
    if (!signature || !timestamp) {
      webhookLogger.warn('Webhook rejected: missing signature headers', {
        hasSignature: Boolean(signature),
        hasTimestamp: Boolean(timestamp),
      });
      throw new AuthError('Missing webhook signature or timestamp', 401);
    }

    const trimmedTimestamp = timestamp.trim();
    if (!TIMESTAMP_PATTERN.test(trimmedTimestamp)) {
      throw new AuthError('Malformed webhook timestamp', 401);
    }

    const skewSeconds = Math.abs(Math.floor(this.now() / 1000) - Number(trimmedTimestamp));
    if (skewSeconds > this.options.toleranceSeconds) {
      webhookLogger.warn('Webhook rejected: timestamp outside tolerance', {
        skewSeconds,
        toleranceSeconds: this.options.toleranceSeconds,
      });
      throw new AuthError('Webhook timestamp outside the allowed window', 401);
    }

    const expected = this.signer.sign('POST', this.options.path, rawBody, trimmedTimestamp, '');
    if (!RequestSigner.safeEqual(expected, signature)) {
      webhookLogger.warn('Webhook rejected: signature mismatch');
      throw new AuthError('Invalid webhook signature', 401);
    }

    return this.parse(rawBody);
  }

  /**
   * Verify, then route the payment to its tracked session
   */
  receive(rawBody: string | Buffer, signature: string | undefined, timestamp: string | undefined): WebhookOutcome {
    const payment = this.verify(rawBody, signature, timestamp);
    const session = this.options.sessions?.get(payment.id);

    if (!session) {
      webhookLogger.info('Webhook for untracked payment', {
        paymentId: payment.id,
        status: payment.status,
      });
      this.options.onOrphan?.(payment);
      return { kind: 'orphan', payment };
    }

    const result = session.apply(payment, 'webhook');
    if (result.applied) {
      return { kind: 'applied', payment: session.snapshot(), change: result.change };
    }

    webhookLogger.debug('Webhook update ignored', {
      paymentId: payment.id,
      reason: result.reason,
      status: result.status,
    });
    return { kind: 'ignored', payment: session.snapshot(), reason: result.reason };
  }

  private parse(rawBody: string | Buffer): Payment {
    const text = typeof rawBody === 'string' ? rawBody : rawBody.toString('utf8');

    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch {
      throw new ProtocolError('Webhook body is not valid JSON');
    }

    const parsed = paymentSchema.safeParse(json);
    if (!parsed.success) {
      throw new ProtocolError('Webhook body is not a payment', parsed.error.flatten());
    }
    return parsed.data;
  }
}
