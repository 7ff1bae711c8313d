import crypto from 'crypto';

// Shared by every signer in the process
let nonceCounter = 0;

const SIGNATURE_PATTERN = /^[0-9a-f]{64}$/;

export interface SignatureContext {
  method: string;
  path: string;
  timestamp: string;
  nonce: string;
  bodyDigest: string;
}

export interface SignedRequest extends SignatureContext {
  signature: string;
}

/**
 * HMAC-SHA256 request signing shared by outbound calls and inbound webhooks.
 *
 * Canonical string, one field per line:
 *
 *   METHOD
 *   PATH (with query string)
 *   TIMESTAMP (unix seconds)
 *   NONCE
 *   hex SHA-256 of the body
 *
 * The field order is part of the gateway contract.
 */
export class RequestSigner {
  private readonly secretKey: string;
  private readonly now: () => number;

  constructor(secretKey: string, now: () => number = Date.now) {
    if (!secretKey) {
      throw new Error('A secret key is required to sign gateway requests');
    }
    this.secretKey = secretKey;
    this.now = now;
  }

  static digestBody(body: string | Buffer): string {
    return crypto.createHash('sha256').update(body).digest('hex');
  }

  static canonicalize(context: SignatureContext): string {
    return [context.method.toUpperCase(), context.path, context.timestamp, context.nonce, context.bodyDigest].join(
      '\n'
    );
  }

  /**
   * Random prefix plus a process-wide counter: two requests issued in the same
   * second can never share a nonce.
   */
  nextNonce(): string {
    nonceCounter = (nonceCounter + 1) % 0x100000000;
    return `${crypto.randomBytes(8).toString('hex')}${nonceCounter.toString(16).padStart(8, '0')}`;
  }

  currentTimestamp(): string {
    return Math.floor(this.now() / 1000).toString();
  }

  sign(method: string, path: string, body: string | Buffer, timestamp: string, nonce: string): string {
    const canonical = RequestSigner.canonicalize({
      method,
      path,
      timestamp,
      nonce,
      bodyDigest: RequestSigner.digestBody(body),
    });

    return crypto.createHmac('sha256', this.secretKey).update(canonical).digest('hex');
  }

  /**
   * Build a fresh signature context (timestamp and nonce) for an outbound call
   */
  signRequest(method: string, path: string, body: string): SignedRequest {
    const timestamp = this.currentTimestamp();
    const nonce = this.nextNonce();

    return {
      method: method.toUpperCase(),
      path,
      timestamp,
      nonce,
      bodyDigest: RequestSigner.digestBody(body),
      signature: this.sign(method, path, body, timestamp, nonce),
    };
  }

  /**
   * Constant-time comparison of two hex signatures
   */
  static safeEqual(expected: string, supplied: string): boolean {
    const normalized = supplied.trim().toLowerCase();
    // Buffer.from(..., 'hex') silently stops at the first non-hex character
    if (!SIGNATURE_PATTERN.test(expected) || !SIGNATURE_PATTERN.test(normalized)) {
      return false;
    }
    return crypto.timingSafeEqual(Buffer.from(expected, 'hex'), Buffer.from(normalized, 'hex'));
  }
}
