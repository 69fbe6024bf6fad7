import Decimal from 'decimal.js';
import { z } from 'zod';
import { AMOUNT_LIMITS, CREDENTIAL_RULES } from '@/config/businessRules';
import { ValidationError } from '@/errors';

/**
 * Plain decimal with up to two fractional digits: "10", "10.5", "10.50"
 * Signs, exponents and thousands separators are rejected.
 */
export const AMOUNT_PATTERN = new RegExp(
  `^\\d+(\\.\\d{1,${AMOUNT_LIMITS.MAX_FRACTION_DIGITS}})?$`
);

export const PIN_PATTERN = new RegExp(`^\\d{${CREDENTIAL_RULES.PIN_LENGTH}}$`);

export const ACCOUNT_NUMBER_PATTERN = new RegExp(
  `^\\d{${CREDENTIAL_RULES.ACCOUNT_NUMBER_LENGTH}}$`
);

export const amountSchema = z
  .string()
  .trim()
  .regex(AMOUNT_PATTERN, {
    message: 'Invalid amount format. Use numbers (e.g., 10 or 10.50).',
  });

export const pinSchema = z.string().regex(PIN_PATTERN, {
  message: `PIN must be ${CREDENTIAL_RULES.PIN_LENGTH} digits.`,
});

export const accountNumberSchema = z.string().regex(ACCOUNT_NUMBER_PATTERN, {
  message: `Account number must be ${CREDENTIAL_RULES.ACCOUNT_NUMBER_LENGTH} digits.`,
});

/**
 * Parse a deposit, withdrawal or transfer amount
 *
 * Rules (in order):
 * - FORMAT: must match AMOUNT_PATTERN after trimming
 * - NON_POSITIVE: must be greater than zero
 * - TOO_LARGE: must not exceed AMOUNT_LIMITS.MAX_AMOUNT
 *
 * Numbers are accepted for programmatic callers and go through the same
 * string check, so 1e21 or 0.1 + 0.2 are rejected as FORMAT.
 */
export function parseAmount(input: string | number): Decimal {
  const raw = typeof input === 'number' ? String(input) : input;
  const result = amountSchema.safeParse(raw);

  if (!result.success) {
    throw new ValidationError(
      'FORMAT',
      result.error.issues[0]?.message ?? 'Invalid amount format.',
      result.error.issues
    );
  }

  const amount = new Decimal(result.data);

  if (amount.lessThanOrEqualTo(0)) {
    throw new ValidationError('NON_POSITIVE', 'Amount must be positive.');
  }

  if (amount.greaterThan(AMOUNT_LIMITS.MAX_AMOUNT)) {
    throw new ValidationError(
      'TOO_LARGE',
      `Amount exceeds limit (${AMOUNT_LIMITS.MAX_AMOUNT}).`
    );
  }

  return amount;
}

/**
 * Throws ValidationError{BAD_PIN_FORMAT} unless pin is exactly PIN_LENGTH digits
 */
export function assertValidPin(pin: string): void {
  const result = pinSchema.safeParse(pin);

  if (!result.success) {
    throw new ValidationError(
      'BAD_PIN_FORMAT',
      result.error.issues[0]?.message ?? 'Invalid PIN.',
      result.error.issues
    );
  }
}

export function isValidAccountNumber(accountNumber: string): boolean {
  return accountNumberSchema.safeParse(accountNumber).success;
}
