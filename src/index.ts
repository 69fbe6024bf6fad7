#!/usr/bin/env node
import { env } from '@/config/env';
import { logger } from '@/adapters/logging/LoggerFactory';
import { AppError } from '@/errors';
import { createApp } from '@/app';
import { AtmShell, FAREWELL } from '@/cli/atm.shell';
import { ReadlinePrompter } from '@/cli/prompter';

/**
 * CLI Entry Point
 * Prepares storage, then runs the interactive shell on stdin/stdout
 */

async function main(): Promise<void> {
  const app = createApp({
    accountsFile: env.ACCOUNTS_FILE,
    transactionsFile: env.TRANSACTIONS_FILE,
    seedDemoAccounts: env.SEED_DEMO_ACCOUNTS,
  });

  try {
    await app.initialize();
  } catch (error) {
    // Only startup storage failures may end the process
    logger.fatal({ error }, 'Failed to initialize storage');
    console.error(error instanceof AppError ? error.message : 'Failed to initialize storage');
    process.exit(1);
  }

  const prompter = new ReadlinePrompter();
  const shell = new AtmShell(app.accountService, prompter);

  process.on('SIGINT', () => {
    logger.info('SIGINT received, exiting');
    console.log(`\n${FAREWELL}`);
    prompter.close();
    process.exit(0);
  });

  try {
    await shell.run();
  } finally {
    prompter.close();
  }
}

/**
 * Process event handlers
 */
process.on('unhandledRejection', (reason) => {
  logger.error({ reason }, 'Unhandled Promise Rejection');
});

process.on('uncaughtException', (error) => {
  logger.fatal({ error }, 'Uncaught Exception');
  process.exit(1);
});

main().catch((error: unknown) => {
  logger.fatal({ error }, 'ATM stopped unexpectedly');
  process.exit(1);
});
