export const COUNTRY_CODES = ['MY', 'SG', 'ID', 'TH', 'BN', 'KH', 'VN', 'LA'] as const;

export const FIAT_CURRENCIES = ['MYR', 'SGD', 'IDR', 'THB', 'BND', 'KHR', 'VND', 'LAK', 'USD'] as const;

export const KNOWN_CRYPTOCURRENCIES = ['BTC', 'ETH', 'USDT', 'USDC', 'BNB', 'LTC', 'TRX', 'SOL'] as const;

export const DEFAULT_SUPPORTED_CRYPTOCURRENCIES = ['BTC', 'ETH', 'USDT', 'USDC', 'BNB'] as const;

export const GATEWAY_ENDPOINTS = {
  PAYMENTS: '/payments',
  EXCHANGE_RATES: '/exchange-rates',
} as const;

export const GATEWAY_HEADERS = {
  SIGNATURE: 'X-Signature',
  TIMESTAMP: 'X-Timestamp',
  NONCE: 'X-Nonce',
  MERCHANT_ID: 'X-Merchant-ID',
  API_KEY: 'X-API-Key',
  COUNTRY_CODE: 'X-Country-Code',
  TEST_MODE: 'X-Test-Mode',
  IDEMPOTENCY_KEY: 'Idempotency-Key',
} as const;

// Fractional digits carried by every amount on the wire.
export const AMOUNT_SCALE = 8;
