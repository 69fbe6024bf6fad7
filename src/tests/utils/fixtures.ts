import Decimal from 'decimal.js';
import { Account } from '@/models';
import { formatMoney } from '@/utils/money';
import { hashPin } from '@/utils/pinHasher';

/**
 * Fixed clock for deterministic log timestamps (local time)
 */
export const FIXED_NOW = new Date(2026, 0, 15, 9, 30, 5);
export const FIXED_TIMESTAMP = '2026-01-15 09:30:05';
export const fixedClock = (): Date => FIXED_NOW;

export function buildAccount(overrides: Partial<Account> = {}): Account {
  return {
    accountNumber: '123456789',
    name: 'Test User',
    pinHash: hashPin('5678'),
    address: '1 Test Street',
    balance: '0.00',
    isDeleted: false,
    ...overrides,
  };
}

/**
 * Run fn and return what it threw
 */
export function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected function to throw');
}

/**
 * Sum of balances, for conservation checks
 */
export function sumMoney(values: readonly Decimal.Value[]): string {
  return formatMoney(values.reduce<Decimal>((total, value) => total.plus(value), new Decimal(0)));
}
