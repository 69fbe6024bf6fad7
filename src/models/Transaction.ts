import { Direction, TransactionType } from '@/constants/records';

/**
 * Transaction model
 * One row of the append-only transactions log
 *
 * timestamp uses "YYYY-MM-DD HH:MM:SS" (local time), amount is a 2-decimal
 * string, counterpartyAccount is empty for deposits and withdrawals.
 */
export interface Transaction {
  timestamp: string;
  accountNumber: string;
  type: TransactionType;
  amount: string;
  counterpartyAccount: string;
  direction: Direction;
}
