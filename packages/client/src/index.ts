export { KioskPaymentClient, type KioskPaymentClientOptions, type WebhookHeaders } from './services/paymentClient';
export { GatewayClient, type GatewayClientOptions, type RequestOptions } from './services/gatewayClient';
export { PaymentSession, type PaymentCanceller, type PaymentSessionOptions } from './services/paymentSession';
export { StatusPoller, timerScheduler, type StatusPollerOptions } from './services/statusPoller';
export { WebhookVerifier, type SessionLookup, type WebhookVerifierOptions } from './services/webhookVerifier';
export { RequestSigner, type SignatureContext, type SignedRequest } from './services/requestSigner';
export * from './services/resilience';
export * from './config/gateway';
export * from './types';
export * from './utils/errors';
export { logger, gatewayLogger, sessionLogger, pollerLogger, webhookLogger } from './utils/logger';
export { stableStringify } from './utils/serialization';
export * from '@kioskpay/shared';
