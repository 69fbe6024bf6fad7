/**
 * Account model
 * One row of the accounts table
 *
 * balance is a 2-decimal string ("25.00"); use Decimal.js for arithmetic.
 * pinHash is the hex SHA-256 digest of the PIN; raw PINs never reach this type.
 */
export interface Account {
  accountNumber: string;
  name: string;
  pinHash: string;
  address: string;
  balance: string;
  isDeleted: boolean;
}

/**
 * Seed input for demo accounts
 * Carries the raw PIN, which the bootstrap hashes before anything is stored
 */
export interface SeedAccountInput {
  accountNumber: string;
  name: string;
  pin: string;
  address: string;
  balance: string;
}
