/**
 * Business Rules Configuration
 *
 * Centralized configuration for the ledger's rules and limits.
 * These values can be adjusted without touching validation schemas or service logic.
 *
 * IMPORTANT: The counter start and the delimiters are part of the on-disk
 * format. Changing them affects files written by earlier runs.
 */

/**
 * Password Policy
 */
export const PASSWORD_POLICY = {
  /**
   * Minimum number of characters
   */
  MIN_LENGTH: 6,
} as const;

/**
 * Authentication Limits
 *
 * A login flow gets a fixed number of password attempts. Exhausting them
 * fails that flow only; the caller may start a new one.
 */
export const AUTH_LIMITS = {
  MAX_ATTEMPTS: 3,
} as const;

/**
 * Account Rules
 */
export const ACCOUNT_RULES = {
  /**
   * Counter value used on first run and when the counter file is unreadable
   */
  FIRST_ACCOUNT_NUMBER: 1001,

  /**
   * Smallest initial deposit accepted by openAccount
   * 0 allows opening an empty account
   */
  MIN_INITIAL_DEPOSIT: 0,
} as const;

/**
 * Money Handling
 *
 * All balances and amounts are fixed-point with CURRENCY_DECIMALS digits.
 * Amounts with more precision are rejected rather than rounded.
 */
export const MONEY_RULES = {
  CURRENCY_DECIMALS: 2,
  CURRENCY_SYMBOL: '$',
} as const;

/**
 * Interest Configuration
 */
export const INTEREST_RULES = {
  /**
   * Default annual rate (1.5%), overridable through INTEREST_RATE
   */
  DEFAULT_RATE: 0.015,
} as const;

/**
 * Type exports for TypeScript safety
 */
export type PasswordPolicy = typeof PASSWORD_POLICY;
export type AuthLimits = typeof AUTH_LIMITS;
export type AccountRules = typeof ACCOUNT_RULES;
export type MoneyRules = typeof MONEY_RULES;
export type InterestRules = typeof INTEREST_RULES;
