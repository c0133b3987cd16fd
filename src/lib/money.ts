/**
 * Money arithmetic in integer paise (1 rupee = 100 paise).
 *
 * Convention:
 * - Amounts travel and are stored as decimal strings with exactly two
 *   fraction digits, e.g. "1250.50".
 * - Calculations convert to paise (a safe integer) first, so no binary
 *   floating point ever touches a sum or a product.
 * - Inputs with more than two fraction digits are rounded half-to-even.
 */
import { ValueTransformer } from 'typeorm';
import { ValidationError } from './errors';

export type Money = string;

const PAISE_PER_RUPEE = 100;
const DECIMAL_PATTERN = /^([+-])?(\d+)(?:\.(\d+))?$/;

export const ZERO: Money = '0.00';

// Largest value a DECIMAL(10,2) column holds
const MAX_STORED_PAISE = 9999999999;
export const MAX_AMOUNT: Money = '99999999.99';

/**
 * Parses a decimal string or a number into paise.
 * Numbers are read through their fixed-point rendering, so 0.1 is 10 paise.
 */
export function toPaise(value: Money | number, field = 'Amount'): number {
  let text: string;
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      throw new ValidationError(`${field} must be a finite number`);
    }
    text = value.toFixed(6);
  } else {
    text = value.trim();
  }

  const match = DECIMAL_PATTERN.exec(text);
  if (!match) {
    throw new ValidationError(`${field} must be a decimal number`);
  }
  const [, sign, whole, fraction = ''] = match;
  const kept = (fraction + '00').slice(0, 2);
  const rest = fraction.slice(2);

  let paise = Number(whole) * PAISE_PER_RUPEE + Number(kept);
  if (/[1-9]/.test(rest)) {
    const first = rest[0];
    const tailNonZero = /[1-9]/.test(rest.slice(1));
    if (first > '5' || (first === '5' && (tailNonZero || paise % 2 === 1))) {
      paise += 1;
    }
  }
  if (!Number.isSafeInteger(paise)) {
    throw new ValidationError(`${field} is out of range`);
  }
  return sign === '-' && paise !== 0 ? -paise : paise;
}

export function fromPaise(paise: number): Money {
  const abs = Math.abs(paise);
  const rupees = Math.floor(abs / PAISE_PER_RUPEE);
  const rest = abs % PAISE_PER_RUPEE;
  return `${paise < 0 ? '-' : ''}${rupees}.${String(rest).padStart(2, '0')}`;
}

/**
 * Normalizes any accepted input to the canonical two-digit form. Values a
 * money column cannot hold are rejected.
 */
export function roundMoney(value: Money | number, field = 'Amount'): Money {
  return storableMoney(fromPaise(toPaise(value, field)), field);
}

export function storableMoney(value: Money, field = 'Amount'): Money {
  if (Math.abs(toPaise(value, field)) > MAX_STORED_PAISE) {
    throw new ValidationError(`${field} cannot exceed ${MAX_AMOUNT}`);
  }
  return value;
}

export function sumMoney(values: Array<Money | number>): Money {
  return fromPaise(values.reduce<number>((acc, value) => acc + toPaise(value), 0));
}

export function addMoney(...values: Array<Money | number>): Money {
  return sumMoney(values);
}

export function subtractMoney(a: Money | number, b: Money | number): Money {
  return fromPaise(toPaise(a) - toPaise(b));
}

/** rate × quantity for an integral quantity; exact in paise. */
export function multiplyMoney(rate: Money | number, quantity: number): Money {
  if (!Number.isInteger(quantity)) {
    throw new ValidationError('Quantity must be a whole number');
  }
  return fromPaise(toPaise(rate) * quantity);
}

export function compareMoney(a: Money | number, b: Money | number): number {
  return Math.sign(toPaise(a) - toPaise(b));
}

export function isNegative(value: Money | number): boolean {
  return toPaise(value) < 0;
}

/**
 * Column transformer for DECIMAL(10,2) columns. PostgreSQL hands decimals back
 * as strings, SQLite as numbers; both come out as canonical Money.
 */
export const moneyTransformer: ValueTransformer = {
  to: (value: Money | number | null | undefined) =>
    value === null || value === undefined ? value : roundMoney(value),
  from: (value: string | number | null) =>
    value === null ? value : roundMoney(value)
};
