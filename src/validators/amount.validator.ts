import { z } from 'zod';
import Decimal from 'decimal.js';
import { ACCOUNT_RULES, MONEY_RULES } from '@/config/businessRules';
import { formatCurrency, parseDecimal } from '@/utils/money';

function toDecimal(value: number | string): Decimal | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? new Decimal(value) : null;
  }
  return parseDecimal(value);
}

/**
 * Money amount schema factory
 *
 * Accepts numbers or decimal strings and yields a Decimal. Amounts with more
 * than CURRENCY_DECIMALS fractional digits are rejected, never rounded.
 */
function moneyAmount(isAllowed: (amount: Decimal) => boolean, message: string) {
  return z.union([z.number(), z.nan(), z.string()]).transform((value, ctx) => {
    const amount = toDecimal(value);
    if (!amount) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Amount must be a number (e.g., 50.00)' });
      return z.NEVER;
    }
    if (amount.decimalPlaces() > MONEY_RULES.CURRENCY_DECIMALS) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Amount cannot have more than ${MONEY_RULES.CURRENCY_DECIMALS} decimal places`,
      });
      return z.NEVER;
    }
    if (!isAllowed(amount)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message });
      return z.NEVER;
    }
    return amount;
  });
}

/**
 * Deposit, withdrawal and transfer amounts
 */
export const positiveAmountSchema = moneyAmount(
  (amount) => amount.greaterThan(0),
  'Amount must be positive'
);

/**
 * Opening balance; zero is allowed
 */
export const initialDepositSchema = moneyAmount(
  (amount) => amount.greaterThanOrEqualTo(ACCOUNT_RULES.MIN_INITIAL_DEPOSIT),
  `Initial deposit must be at least ${formatCurrency(ACCOUNT_RULES.MIN_INITIAL_DEPOSIT)}`
);

/**
 * Interest rate as a fraction (0.015 = 1.5%)
 */
export const interestRateSchema = z
  .number()
  .finite({ message: 'Interest rate must be a finite number' })
  .nonnegative({ message: 'Interest rate cannot be negative' });
