import { GATEWAY_HEADERS, createPaymentDetails } from '@kioskpay/shared';
import {
  AuthError,
  NetworkError,
  NotFoundError,
  ProtocolError,
  RateLimitedError,
  ServerError,
  ValidationError,
} from '../../utils/errors';
import { GatewayClient } from '../gatewayClient';
import { RetryManager } from '../resilience/RetryManager';
import { FakeGateway, buildTestConfig } from './helpers/fakeGateway';

const details = createPaymentDetails({ amount: 10.5, currency: 'MYR', cryptoCurrency: 'BTC' });

describe('GatewayClient', () => {
  let gateway: FakeGateway;
  let client: GatewayClient;

  const buildClient = (secretKey?: string) =>
    new GatewayClient(buildTestConfig(secretKey ? { secretKey } : {}), {
      axiosConfig: { adapter: gateway.adapter },
      retryManager: new RetryManager({ maxRetries: 2, baseDelay: 0, maxDelay: 0 }),
    });

  beforeEach(() => {
    gateway = new FakeGateway();
    client = buildClient();
  });

  describe('createPayment', () => {
    it('should create a payment with a fixed-point amount', async () => {
      const payment = await client.createPayment(details);

      expect(payment.status).toBe('created');
      expect(payment.amount).toBe('10.50000000');
      expect(payment.currency).toBe('MYR');
      expect(payment.cryptoCurrency).toBe('BTC');
      expect(payment.address).toBe('bc1qfakeaddress');
    });

    it('should send a deterministic body and the merchant headers', async () => {
      await client.createPayment(details);

      const [request] = gateway.requests;
      expect(request?.method).toBe('POST');
      expect(request?.path).toBe('/payments');
      expect(request?.body).toBe('{"amount":"10.50000000","crypto_currency":"BTC","currency":"MYR","description":""}');
      expect(request?.headers[GATEWAY_HEADERS.MERCHANT_ID]).toBe('merchant-test');
      expect(request?.headers[GATEWAY_HEADERS.API_KEY]).toBe('test-api-key');
      expect(request?.headers[GATEWAY_HEADERS.COUNTRY_CODE]).toBe('MY');
      expect(request?.headers[GATEWAY_HEADERS.TEST_MODE]).toBe('false');
      expect(request?.headers[GATEWAY_HEADERS.SIGNATURE]).toMatch(/^[0-9a-f]{64}$/);
      expect(request?.headers[GATEWAY_HEADERS.NONCE]).toMatch(/^[0-9a-f]{24}$/);
      expect(request?.headers[GATEWAY_HEADERS.IDEMPOTENCY_KEY]).toBeUndefined();
    });

    it('should not retry a payment without an order id', async () => {
      gateway.enqueue({ kind: 'network', code: 'ECONNREFUSED' });

      await expect(client.createPayment(details)).rejects.toBeInstanceOf(NetworkError);
      expect(gateway.requests).toHaveLength(1);
    });

    it('should retry with an idempotency key when an order id is present', async () => {
      const withOrder = createPaymentDetails({ amount: 10.5, currency: 'MYR', cryptoCurrency: 'BTC', orderId: 'ORD-42' });
      gateway.enqueue({ kind: 'network', code: 'ECONNRESET' });
      gateway.enqueue({ kind: 'network', code: 'ETIMEDOUT' });

      const payment = await client.createPayment(withOrder);

      expect(payment.orderId).toBe('ORD-42');
      expect(gateway.requests).toHaveLength(3);
      expect(gateway.requests.map((request) => request.headers[GATEWAY_HEADERS.IDEMPOTENCY_KEY])).toEqual([
        'ORD-42',
        'ORD-42',
        'ORD-42',
      ]);
    });

    it('should use a fresh nonce for every attempt', async () => {
      const withOrder = createPaymentDetails({ amount: 1, currency: 'MYR', cryptoCurrency: 'BTC', orderId: 'ORD-43' });
      gateway.enqueue({ kind: 'network', code: 'ECONNRESET' });

      await client.createPayment(withOrder);

      const nonces = gateway.requests.map((request) => request.headers[GATEWAY_HEADERS.NONCE]);
      expect(new Set(nonces).size).toBe(2);
    });
  });

  describe('getPayment', () => {
    it('should fetch the current status', async () => {
      const seeded = gateway.seed({ status: 'pending' });

      const payment = await client.getPayment(seeded.id);

      expect(payment.id).toBe(seeded.id);
      expect(payment.status).toBe('pending');
      expect(gateway.requests[0]?.path).toBe(`/payments/${seeded.id}`);
    });

    it('should URL-encode the payment id', async () => {
      await expect(client.getPayment('pay 1')).rejects.toBeInstanceOf(NotFoundError);
      expect(gateway.requests[0]?.path).toBe('/payments/pay%201');
    });

    it('should reject an empty id before any request', async () => {
      await expect(client.getPayment('  ')).rejects.toBeInstanceOf(ValidationError);
      expect(gateway.requests).toHaveLength(0);
    });

    it('should retry transient failures', async () => {
      const seeded = gateway.seed();
      gateway.enqueue({ kind: 'network', code: 'ECONNRESET' });

      const payment = await client.getPayment(seeded.id);

      expect(payment.id).toBe(seeded.id);
      expect(gateway.requests).toHaveLength(2);
    });

    it('should honour an explicit retry budget', async () => {
      gateway.enqueue({ kind: 'network', code: 'ECONNRESET' });

      await expect(client.getPayment('pay_1', { maxRetries: 0 })).rejects.toBeInstanceOf(NetworkError);
      expect(gateway.requests).toHaveLength(1);
    });
  });

  describe('error mapping', () => {
    it('should map 401 to AuthError', async () => {
      gateway.enqueue({ kind: 'response', status: 401, body: { error: { code: 'BAD_KEY', message: 'Unknown API key' } } });

      const error: unknown = await client.getPayment('pay_1').catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(AuthError);
      expect(error).toMatchObject({ message: 'Unknown API key', status: 401, details: { code: 'BAD_KEY' } });
    });

    it('should map 404 to NotFoundError', async () => {
      await expect(client.getPayment('missing')).rejects.toMatchObject({
        code: 'NOT_FOUND',
        message: 'Payment not found',
      });
    });

    it('should map 422 to ValidationError', async () => {
      gateway.enqueue({ kind: 'response', status: 422, body: { code: 'AMOUNT_TOO_LOW', message: 'Amount below minimum' } });

      await expect(client.createPayment(details)).rejects.toMatchObject({
        name: 'ValidationError',
        status: 422,
        message: 'Amount below minimum',
      });
    });

    it('should map 429 to RateLimitedError with Retry-After', async () => {
      gateway.enqueue({ kind: 'response', status: 429, body: {}, headers: { 'retry-after': '2' } });

      const error: unknown = await client.getPayment('pay_1', { maxRetries: 0 }).catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(RateLimitedError);
      expect(error).toMatchObject({ retryable: true, retryAfterMs: 2000 });
    });

    it('should map 5xx to a non-retryable ServerError', async () => {
      gateway.enqueue({ kind: 'response', status: 503, body: 'upstream down' });

      await expect(client.getPayment('pay_1')).rejects.toBeInstanceOf(ServerError);
      expect(gateway.requests).toHaveLength(1);
    });

    it('should reject responses signed with the wrong secret', async () => {
      const impostor = buildClient('wrong-secret-0123456789');

      await expect(impostor.createPayment(details)).rejects.toMatchObject({
        name: 'AuthError',
        message: 'Signature mismatch',
      });
    });

    it('should surface malformed JSON as ProtocolError', async () => {
      gateway.enqueue({ kind: 'response', status: 200, body: 'not json' });

      await expect(client.getPayment('pay_1')).rejects.toBeInstanceOf(ProtocolError);
    });

    it('should surface missing fields as ProtocolError', async () => {
      gateway.enqueue({ kind: 'response', status: 200, body: { id: 'pay_1', status: 'pending' } });

      await expect(client.getPayment('pay_1')).rejects.toMatchObject({
        code: 'PROTOCOL_ERROR',
        message: 'Unexpected getPayment response shape',
      });
    });
  });

  describe('cancelPayment', () => {
    it('should cancel with a signed empty body', async () => {
      const seeded = gateway.seed({ status: 'pending' });

      const payment = await client.cancelPayment(seeded.id);

      expect(payment.status).toBe('cancelled');
      expect(gateway.requests[0]?.path).toBe(`/payments/${seeded.id}/cancel`);
      expect(gateway.requests[0]?.body).toBe('');
    });

    it('should report a conflict for finalized payments', async () => {
      const seeded = gateway.seed({ status: 'completed' });

      await expect(client.cancelPayment(seeded.id)).rejects.toMatchObject({ name: 'ValidationError', status: 409 });
    });
  });

  describe('listPayments', () => {
    it('should pass filters as query parameters', async () => {
      gateway.seed({ status: 'created' });
      gateway.seed({ status: 'completed' });
      gateway.seed({ status: 'created' });

      const page = await client.listPayments({ status: 'created', limit: 10 });

      expect(gateway.requests[0]?.path).toBe('/payments?status=created&limit=10');
      expect(page.total).toBe(2);
      expect(page.payments.map((payment) => payment.status)).toEqual(['created', 'created']);
    });

    it('should format date filters as ISO timestamps', async () => {
      await client.listPayments({ fromDate: new Date('2026-01-01T00:00:00Z'), offset: 5 });

      expect(gateway.requests[0]?.path).toBe('/payments?from_date=2026-01-01T00%3A00%3A00.000Z&offset=5');
    });
  });

  describe('getExchangeRates', () => {
    it('should request the given currencies', async () => {
      const rates = await client.getExchangeRates('usd', ['BTC', 'ETH']);

      expect(gateway.requests[0]?.path).toBe('/exchange-rates?base_currency=USD&currencies=BTC%2CETH');
      expect(rates.baseCurrency).toBe('USD');
      expect(rates.rates).toEqual({ BTC: '0.00001500', ETH: '0.00001500' });
    });

    it('should default to the configured cryptocurrencies', async () => {
      await client.getExchangeRates();

      expect(gateway.requests[0]?.path).toBe(
        '/exchange-rates?base_currency=USD&currencies=BTC%2CETH%2CUSDT%2CUSDC%2CBNB'
      );
    });
  });
});
