import {
  COUNTRY_CODES,
  DEFAULT_SUPPORTED_CRYPTOCURRENCIES,
  FIAT_CURRENCIES,
  KNOWN_CRYPTOCURRENCIES,
} from './constants';
import { CountryCode } from '../types/payment';

const COUNTRY_CODE_SET: ReadonlySet<string> = new Set(COUNTRY_CODES);
const FIAT_CURRENCY_SET: ReadonlySet<string> = new Set(FIAT_CURRENCIES);
const KNOWN_CRYPTO_SET: ReadonlySet<string> = new Set(KNOWN_CRYPTOCURRENCIES);

export const validateCountryCode = (code: string): code is CountryCode => {
  return COUNTRY_CODE_SET.has(code);
};

export const validateFiatCurrency = (code: string): boolean => {
  return FIAT_CURRENCY_SET.has(code.toUpperCase());
};

export const validateCryptoCurrency = (
  code: string,
  supported: readonly string[] = DEFAULT_SUPPORTED_CRYPTOCURRENCIES
): boolean => {
  const upper = code.toUpperCase();
  return KNOWN_CRYPTO_SET.has(upper) && supported.includes(upper);
};
