import { AMOUNT_SCALE } from './constants';

const SCALE_FACTOR = BigInt(10) ** BigInt(AMOUNT_SCALE);
const DECIMAL_PATTERN = /^(\d+)(?:\.(\d+))?$/;

/**
 * Convert a decimal amount into integer units of 10^-8, rounding half-up on
 * the ninth fractional digit. Numbers are expanded through `toFixed` so binary
 * noise past the tenth digit never reaches the result.
 */
export function amountToUnits(value: string | number): bigint {
  const text = typeof value === 'number' ? expandNumber(value) : value.trim();
  const match = DECIMAL_PATTERN.exec(text);
  if (!match) {
    throw new RangeError(`Invalid decimal amount: ${String(value)}`);
  }

  const whole = match[1] ?? '0';
  const fraction = match[2] ?? '';
  let units =
    BigInt(whole) * SCALE_FACTOR + BigInt(fraction.slice(0, AMOUNT_SCALE).padEnd(AMOUNT_SCALE, '0'));

  if (fraction.length > AMOUNT_SCALE && Number(fraction.charAt(AMOUNT_SCALE)) >= 5) {
    units += BigInt(1);
  }
  return units;
}

export function unitsToAmount(units: bigint): string {
  const whole = units / SCALE_FACTOR;
  const fraction = (units % SCALE_FACTOR).toString().padStart(AMOUNT_SCALE, '0');
  return `${whole.toString()}.${fraction}`;
}

/**
 * Normalize an amount to its wire form: a plain decimal string with exactly
 * eight fractional digits, e.g. `10.5` -> `"10.50000000"`.
 */
export function toFixedAmount(value: string | number): string {
  return unitsToAmount(amountToUnits(value));
}

export function isPositiveAmount(value: string | number): boolean {
  try {
    return amountToUnits(value) > BigInt(0);
  } catch {
    return false;
  }
}

function expandNumber(value: number): string {
  if (!Number.isFinite(value)) {
    throw new RangeError(`Invalid decimal amount: ${value}`);
  }
  return value.toFixed(AMOUNT_SCALE + 2);
}
