/**
 * Business Rules Configuration
 *
 * Centralized limits for amounts, PINs and account numbers.
 * Validators and the shell read these; nothing else hardcodes them.
 */

/**
 * Amount Limits
 *
 * Applied uniformly to deposits, withdrawals and transfers:
 * - MAX_AMOUNT: per-operation ceiling (inclusive)
 * - MAX_FRACTION_DIGITS: cents precision
 *
 * There is no ceiling on the cumulative balance.
 */
export const AMOUNT_LIMITS = {
  MAX_AMOUNT: '10000.00',
  MAX_FRACTION_DIGITS: 2,
} as const;

/**
 * Credential Rules
 */
export const CREDENTIAL_RULES = {
  /**
   * PINs are exactly this many ASCII digits
   */
  PIN_LENGTH: 4,

  /**
   * Account numbers are exactly this many ASCII digits
   */
  ACCOUNT_NUMBER_LENGTH: 9,

  /**
   * PIN attempts per login (and per PIN change) before the shell gives up
   */
  MAX_PIN_ATTEMPTS: 3,
} as const;

/**
 * Type exports for TypeScript safety
 */
export type AmountLimits = typeof AMOUNT_LIMITS;
export type CredentialRules = typeof CREDENTIAL_RULES;
