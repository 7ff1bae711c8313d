import dotenv from 'dotenv';
import Joi from 'joi';
import {
  COUNTRY_CODES,
  CountryCode,
  DEFAULT_SUPPORTED_CRYPTOCURRENCIES,
  KNOWN_CRYPTOCURRENCIES,
} from '@kioskpay/shared';
import { logger } from '../utils/logger';

dotenv.config();

export interface PollingConfig {
  intervalMs: number;
  maxIntervalMs: number;
  deadlineMs: number;
}

export interface WebhookConfig {
  path: string;
  toleranceSeconds: number;
}

export interface GatewayClientConfig {
  apiUrl: string;
  merchantId: string;
  apiKey: string;
  secretKey: string;
  countryCode: CountryCode;
  testMode: boolean;
  supportedCryptocurrencies: string[];
  timeoutMs: number;
  maxRetries: number;
  polling: PollingConfig;
  webhook: WebhookConfig;
}

export type GatewayClientConfigInput = Pick<GatewayClientConfig, 'merchantId' | 'apiKey' | 'secretKey' | 'countryCode'> &
  Partial<Omit<GatewayClientConfig, 'polling' | 'webhook'>> & {
    polling?: Partial<PollingConfig>;
    webhook?: Partial<WebhookConfig>;
  };

export const DEFAULT_API_URL = 'https://api.asiancryptopay.com';

const configSchema = Joi.object<GatewayClientConfig>({
  apiUrl: Joi.string().uri({ scheme: ['http', 'https'] }).default(DEFAULT_API_URL),
  merchantId: Joi.string().trim().required(),
  apiKey: Joi.string().trim().required(),
  secretKey: Joi.string().min(16).required(),
  countryCode: Joi.string()
    .uppercase()
    .valid(...COUNTRY_CODES)
    .required(),
  testMode: Joi.boolean().default(false),
  supportedCryptocurrencies: Joi.array()
    .items(
      Joi.string()
        .uppercase()
        .valid(...KNOWN_CRYPTOCURRENCIES)
    )
    .min(1)
    .default([...DEFAULT_SUPPORTED_CRYPTOCURRENCIES]),
  timeoutMs: Joi.number().integer().min(1000).default(15000),
  maxRetries: Joi.number().integer().min(0).max(10).default(2),
  polling: Joi.object<PollingConfig>({
    intervalMs: Joi.number().integer().min(250).default(3000),
    maxIntervalMs: Joi.number().integer().min(Joi.ref('intervalMs')).default(30000),
    deadlineMs: Joi.number().integer().min(1000).default(30 * 60 * 1000),
  }).default(),
  webhook: Joi.object<WebhookConfig>({
    path: Joi.string().pattern(/^\//).default('/webhooks/payments'),
    toleranceSeconds: Joi.number().integer().min(1).default(300),
  }).default(),
});

const splitList = (value: string | undefined): string[] | undefined => {
  if (!value) return undefined;
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
};

function validateWith(raw: unknown, failureLabel: string): GatewayClientConfig {
  const { error, value } = configSchema.validate(raw, {
    abortEarly: false,
    convert: true,
  });

  if (error) {
    const errorMessages = error.details.map((detail) => {
      const key = detail.path.join('.');
      return `${key}: ${detail.message}`;
    });

    logger.error(`${failureLabel}:`, { errors: errorMessages });
    throw new Error(`${failureLabel}:\n${errorMessages.join('\n')}`);
  }

  return value;
}

/**
 * Validate a programmatic configuration, filling in defaults. Throws with one
 * line per offending field.
 */
export function validateGatewayConfig(input: GatewayClientConfigInput): GatewayClientConfig {
  return validateWith(input, 'Gateway configuration validation failed');
}

/**
 * Build the configuration from KIOSKPAY_* environment variables.
 */
export function loadGatewayConfig(env: NodeJS.ProcessEnv = process.env): GatewayClientConfig {
  const raw = {
    apiUrl: env.KIOSKPAY_API_URL,
    merchantId: env.KIOSKPAY_MERCHANT_ID,
    apiKey: env.KIOSKPAY_API_KEY,
    secretKey: env.KIOSKPAY_SECRET_KEY,
    countryCode: env.KIOSKPAY_COUNTRY_CODE,
    testMode: env.KIOSKPAY_TEST_MODE,
    supportedCryptocurrencies: splitList(env.KIOSKPAY_SUPPORTED_CRYPTOS),
    timeoutMs: env.KIOSKPAY_TIMEOUT_MS,
    maxRetries: env.KIOSKPAY_MAX_RETRIES,
    polling: {
      intervalMs: env.KIOSKPAY_POLL_INTERVAL_MS,
      maxIntervalMs: env.KIOSKPAY_POLL_MAX_INTERVAL_MS,
      deadlineMs: env.KIOSKPAY_POLL_DEADLINE_MS,
    },
    webhook: {
      path: env.KIOSKPAY_WEBHOOK_PATH,
      toleranceSeconds: env.KIOSKPAY_WEBHOOK_TOLERANCE_SECONDS,
    },
  };

  const value = validateWith(raw, 'Environment validation failed');

  logger.info('Gateway configuration loaded', {
    apiUrl: value.apiUrl,
    merchantId: value.merchantId,
    countryCode: value.countryCode,
    testMode: value.testMode,
  });

  return value;
}
