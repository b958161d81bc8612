/**
 * Money Utilities
 * Monetary values are held as integer cents so that sums and products stay exact.
 */

/** An exact amount in minor units (cents) */
export type Cents = number;

// Optional sign, whole part, up to two fractional digits
const MONEY_PATTERN = /^(-)?(\d+)(?:\.(\d{1,2}))?$/;

/**
 * Parse a decimal amount into cents.
 * Accepts strings such as "12.50" and JSON numbers such as 12.5.
 * Returns null for anything with more than two fractional digits,
 * exponent notation, or a value outside the safe integer range.
 */
export function parseMoney(value: string | number): Cents | null {
  if (typeof value === 'number' && !Number.isFinite(value)) {
    return null;
  }

  const match = MONEY_PATTERN.exec(String(value).trim());
  if (!match) {
    return null;
  }

  const [, sign, whole, fraction = ''] = match;
  const cents = Number(whole) * 100 + Number(fraction.padEnd(2, '0'));
  if (!Number.isSafeInteger(cents)) {
    return null;
  }

  return sign && cents !== 0 ? -cents : cents;
}

/**
 * Render cents with exactly two fractional digits, e.g. 1799 -> "17.99"
 */
export function formatMoney(cents: Cents): string {
  const sign = cents < 0 ? '-' : '';
  const absolute = Math.abs(cents);
  const whole = Math.floor(absolute / 100);
  const fraction = String(absolute % 100).padStart(2, '0');
  return `${sign}${whole}.${fraction}`;
}

function assertExact(cents: Cents): Cents {
  if (!Number.isSafeInteger(cents)) {
    throw new RangeError(`Amount out of exact range: ${cents} cents`);
  }
  return cents;
}

/**
 * Multiply an amount by a whole quantity.
 * Throws a RangeError when the product leaves the safe integer range.
 */
export function multiplyMoney(cents: Cents, quantity: number): Cents {
  return assertExact(cents * quantity);
}

/**
 * Sum amounts exactly. Throws a RangeError past the safe integer range.
 */
export function sumMoney(amounts: readonly Cents[]): Cents {
  return amounts.reduce((total, amount) => assertExact(total + amount), 0);
}
