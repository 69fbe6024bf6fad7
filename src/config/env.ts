import { cleanEnv, str, bool } from 'envalid';
import dotenv from 'dotenv';

// Load .env file
dotenv.config();

/**
 * Validated environment variables
 *
 * Using envalid for runtime validation and type safety:
 * - Validates types (string, boolean)
 * - Enforces choices for enums
 * - Fails fast on startup if a value is malformed
 *
 * File paths are resolved against the working directory.
 */
export const env = cleanEnv(process.env, {
  // ==========================================
  // Runtime
  // ==========================================
  NODE_ENV: str({
    choices: ['development', 'test', 'production'],
    default: 'development',
    desc: 'Application environment',
  }),

  // ==========================================
  // Storage
  // ==========================================
  ACCOUNTS_FILE: str({
    default: 'accounts.csv',
    desc: 'Path of the accounts table',
    example: 'data/accounts.csv',
  }),
  TRANSACTIONS_FILE: str({
    default: 'transactions.csv',
    desc: 'Path of the append-only transactions log',
    example: 'data/transactions.csv',
  }),
  SEED_DEMO_ACCOUNTS: bool({
    default: true,
    desc: 'Seed the two demo accounts when the accounts table is first created',
  }),

  // ==========================================
  // Logging Configuration
  // ==========================================
  LOG_LEVEL: str({
    choices: ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'],
    default: 'warn',
    desc: 'Minimum log level to output (logs go to stderr)',
  }),
  LOG_PRETTY: bool({
    default: false,
    desc: 'Pretty-print logs with pino-pretty',
  }),
});

export type Env = typeof env;
