import { z } from 'zod';
import { DELETED_FLAGS, DIRECTIONS, TRANSACTION_TYPES } from '@/constants/records';
import { Account, Transaction } from '@/models';
import { formatMoney } from '@/utils/money';
import { TIMESTAMP_PATTERN } from '@/utils/timestamp';
import { ACCOUNT_NUMBER_PATTERN } from './account.validator';

/**
 * Schemas for rows read back from the CSV tables
 *
 * Keys are the on-disk column names. A row failing these schemas is a
 * corrupt table, reported by the record store as a StorageError.
 */

const STORED_DECIMAL_PATTERN = /^\d+(\.\d+)?$/;
const PIN_HASH_PATTERN = /^[0-9a-f]{64}$/;

export const accountRowSchema = z
  .object({
    account_number: z.string().regex(ACCOUNT_NUMBER_PATTERN, {
      message: 'account_number must be a fixed-length numeric string',
    }),
    name: z.string(),
    pin_hash: z.string().regex(PIN_HASH_PATTERN, {
      message: 'pin_hash must be a SHA-256 hex digest',
    }),
    address: z.string(),
    balance: z.string().regex(STORED_DECIMAL_PATTERN, {
      message: 'balance must be a non-negative decimal',
    }),
    is_deleted: z.enum([DELETED_FLAGS.ACTIVE, DELETED_FLAGS.DELETED]),
  })
  .transform(
    (row): Account => ({
      accountNumber: row.account_number,
      name: row.name,
      pinHash: row.pin_hash,
      address: row.address,
      balance: formatMoney(row.balance),
      isDeleted: row.is_deleted === DELETED_FLAGS.DELETED,
    })
  );

export const transactionRowSchema = z
  .object({
    timestamp: z.string().regex(TIMESTAMP_PATTERN, {
      message: 'timestamp must use YYYY-MM-DD HH:MM:SS',
    }),
    account_number: z.string().min(1),
    type: z.enum([
      TRANSACTION_TYPES.DEPOSIT,
      TRANSACTION_TYPES.WITHDRAWAL,
      TRANSACTION_TYPES.TRANSFER,
    ]),
    amount: z.string().regex(STORED_DECIMAL_PATTERN, {
      message: 'amount must be a non-negative decimal',
    }),
    counterparty_account: z.string(),
    direction: z.enum([DIRECTIONS.CREDIT, DIRECTIONS.DEBIT]),
  })
  .transform(
    (row): Transaction => ({
      timestamp: row.timestamp,
      accountNumber: row.account_number,
      type: row.type,
      amount: formatMoney(row.amount),
      counterpartyAccount: row.counterparty_account,
      direction: row.direction,
    })
  );

/**
 * Flatten zod issues into "field: message" strings for error reporting
 */
export function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || 'row'}: ${issue.message}`)
    .join('; ');
}
