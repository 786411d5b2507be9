import Decimal from 'decimal.js';
import { MONEY_RULES } from '@/config/businessRules';

/**
 * Plain decimal notation, optionally signed. Anything else (exponents, NaN,
 * Infinity, hex, empty) is not a number for the ledger.
 */
const DECIMAL_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)$/;

/**
 * Parse a decimal string without throwing
 * @returns null when the text is not a plain decimal number
 */
export function parseDecimal(raw: string): Decimal | null {
  const trimmed = raw.trim();
  if (!DECIMAL_PATTERN.test(trimmed)) {
    return null;
  }
  return new Decimal(trimmed);
}

/**
 * Canonical money string with two decimals ("100.00")
 */
export function toMoney(value: Decimal.Value): string {
  return new Decimal(value).toFixed(MONEY_RULES.CURRENCY_DECIMALS);
}

/**
 * Display format for reports: symbol, thousands separators, two decimals.
 * Negative values keep the sign after the symbol ("$-5.00").
 */
export function formatCurrency(value: Decimal.Value): string {
  const fixed = toMoney(value);
  const negative = fixed.startsWith('-');
  const [whole, fraction] = (negative ? fixed.slice(1) : fixed).split('.');
  const grouped = whole.replace(/\B(?=(\d{3})+(?!\d))/g, ',');

  return `${MONEY_RULES.CURRENCY_SYMBOL}${negative ? '-' : ''}${grouped}.${fraction}`;
}

/**
 * Interest rate as an annual percentage ("1.50% p.a.")
 */
export function formatRate(rate: number): string {
  return `${new Decimal(rate).times(100).toFixed(2)}% p.a.`;
}
