import { Payment } from '@kioskpay/shared';
import { PollStopReason, StatusChange } from '../../types';
import { AuthError, GatewayError, NetworkError, RateLimitedError } from '../../utils/errors';
import { PaymentSession } from '../paymentSession';
import { StatusPoller } from '../statusPoller';
import { BASE_TIME, later, makePayment } from './helpers/fixtures';

describe('StatusPoller', () => {
  let fetchPayment: jest.Mock<Promise<Payment>, [string]>;
  let onError: jest.Mock<void, [GatewayError]>;
  let onStop: jest.Mock<void, [PollStopReason]>;
  let poller: StatusPoller;
  let changes: StatusChange[];

  const buildSession = (overrides: Partial<Payment> = {}) => {
    const session = new PaymentSession(makePayment(overrides), { gateway: { cancelPayment: jest.fn() } });
    session.onStatusChange((change) => changes.push(change));
    return session;
  };

  beforeEach(() => {
    jest.useFakeTimers();
    jest.setSystemTime(BASE_TIME);

    fetchPayment = jest.fn<Promise<Payment>, [string]>().mockResolvedValue(makePayment());
    onError = jest.fn<void, [GatewayError]>();
    onStop = jest.fn<void, [PollStopReason]>();
    poller = new StatusPoller({ fetchPayment, maxIntervalMs: 3000, onError, onStop });
    changes = [];
  });

  afterEach(() => {
    poller.stop();
    jest.useRealTimers();
  });

  it('should notify twice for pending, pending, completed and then stop', async () => {
    fetchPayment
      .mockResolvedValueOnce(later('pending', 3000))
      .mockResolvedValueOnce(later('pending', 6000))
      .mockResolvedValueOnce(later('completed', 9000));
    const session = buildSession();

    poller.start(session, 3000, 60_000);
    await jest.advanceTimersByTimeAsync(9000);

    expect(fetchPayment).toHaveBeenCalledTimes(3);
    expect(fetchPayment).toHaveBeenCalledWith('pay_1');
    expect(changes.map((change) => change.to)).toEqual(['pending', 'completed']);
    expect(poller.isRunning).toBe(false);
    expect(onStop).toHaveBeenCalledWith('terminal');

    await jest.advanceTimersByTimeAsync(30_000);
    expect(fetchPayment).toHaveBeenCalledTimes(3);
  });

  it('should double the interval on transient failures and reset on success', async () => {
    fetchPayment
      .mockRejectedValueOnce(new NetworkError('socket hang up', 'ECONNRESET'))
      .mockRejectedValueOnce(new NetworkError('socket hang up', 'ECONNRESET'));
    poller.start(buildSession(), 1000, 60_000);

    await jest.advanceTimersByTimeAsync(1000);
    expect(fetchPayment).toHaveBeenCalledTimes(1);
    expect(poller.intervalMs).toBe(2000);

    await jest.advanceTimersByTimeAsync(2000);
    expect(fetchPayment).toHaveBeenCalledTimes(2);
    expect(poller.intervalMs).toBe(3000);

    await jest.advanceTimersByTimeAsync(3000);
    expect(fetchPayment).toHaveBeenCalledTimes(3);
    expect(poller.intervalMs).toBe(1000);

    await jest.advanceTimersByTimeAsync(1000);
    expect(fetchPayment).toHaveBeenCalledTimes(4);
    expect(onError).not.toHaveBeenCalled();
  });

  it('should let a longer Retry-After win over the doubled interval', async () => {
    poller = new StatusPoller({ fetchPayment, maxIntervalMs: 30_000, onError, onStop });
    fetchPayment.mockRejectedValueOnce(new RateLimitedError('Slow down', 10_000));
    poller.start(buildSession(), 1000, 120_000);

    await jest.advanceTimersByTimeAsync(1000);

    expect(poller.intervalMs).toBe(10_000);
    await jest.advanceTimersByTimeAsync(9999);
    expect(fetchPayment).toHaveBeenCalledTimes(1);
    await jest.advanceTimersByTimeAsync(1);
    expect(fetchPayment).toHaveBeenCalledTimes(2);
  });

  it('should stop and report non-retryable errors', async () => {
    const failure = new AuthError('Invalid signature', 401);
    fetchPayment.mockRejectedValueOnce(failure);
    poller.start(buildSession(), 1000, 60_000);

    await jest.advanceTimersByTimeAsync(1000);

    expect(onError).toHaveBeenCalledWith(failure);
    expect(onStop).toHaveBeenCalledWith('error');
    expect(poller.lastStopReason).toBe('error');

    await jest.advanceTimersByTimeAsync(10_000);
    expect(fetchPayment).toHaveBeenCalledTimes(1);
  });

  it('should expire the session on time and stop polling', async () => {
    const session = buildSession({ expiresAt: new Date(BASE_TIME + 5000) });
    poller.start(session, 3000, 60_000);

    await jest.advanceTimersByTimeAsync(5000);

    expect(fetchPayment).toHaveBeenCalledTimes(1);
    expect(session.status).toBe('expired');
    expect(changes).toHaveLength(1);
    expect(changes[0]?.source).toBe('expiry');
    expect(onStop).toHaveBeenCalledWith('expired');
  });

  it('should stop at the polling deadline', async () => {
    const session = buildSession();
    poller.start(session, 3000, 7000);

    await jest.advanceTimersByTimeAsync(7000);

    expect(fetchPayment).toHaveBeenCalledTimes(2);
    expect(onStop).toHaveBeenCalledWith('deadline');
    expect(session.status).toBe('created');
  });

  it('should discard a response that lands after a webhook finished the session', async () => {
    let resolveFetch: (payment: Payment) => void = () => undefined;
    fetchPayment.mockImplementation(
      () =>
        new Promise<Payment>((resolve) => {
          resolveFetch = resolve;
        })
    );
    const session = buildSession();
    poller.start(session, 1000, 60_000);
    await jest.advanceTimersByTimeAsync(1000);

    session.apply(later('completed', 1500), 'webhook');
    resolveFetch(later('cancelled', 1200));
    await jest.advanceTimersByTimeAsync(5000);

    expect(session.status).toBe('completed');
    expect(changes.map((change) => change.source)).toEqual(['webhook']);
    expect(fetchPayment).toHaveBeenCalledTimes(1);
    expect(poller.lastStopReason).toBe('terminal');
  });

  it('should treat stop as idempotent', async () => {
    poller.start(buildSession(), 1000, 60_000);

    poller.stop();
    poller.stop();
    await jest.advanceTimersByTimeAsync(5000);

    expect(onStop).toHaveBeenCalledTimes(1);
    expect(onStop).toHaveBeenCalledWith('stopped');
    expect(fetchPayment).not.toHaveBeenCalled();
  });

  it('should not poll a session that is already terminal', () => {
    poller.start(buildSession({ status: 'completed' }), 1000, 60_000);

    expect(poller.isRunning).toBe(false);
    expect(onStop).toHaveBeenCalledWith('terminal');
  });

  it('should stop once the session is discarded', async () => {
    const session = buildSession();
    poller.start(session, 1000, 60_000);

    session.discard();
    await jest.advanceTimersByTimeAsync(1000);

    expect(fetchPayment).not.toHaveBeenCalled();
    expect(onStop).toHaveBeenCalledWith('discarded');
  });

  it('should refuse to start twice', () => {
    const session = buildSession();
    poller.start(session, 1000, 60_000);

    expect(() => poller.start(session, 1000, 60_000)).toThrow('already running');
  });

  it('should reject a non-positive interval', () => {
    expect(() => poller.start(buildSession(), 0, 60_000)).toThrow(RangeError);
  });
});
