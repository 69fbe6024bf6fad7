import path from 'path';
import { DEMO_ACCOUNTS } from '@/constants/demoAccounts';
import { Account, SeedAccountInput } from '@/models';
import { InitializeResult } from '@/repositories/interfaces';
import { CsvRecordStore } from '@/repositories/record.store';
import { AccountService } from '@/services/account.service';
import { createLogger } from '@/adapters/logging/LoggerFactory';
import { hashPin } from '@/utils/pinHasher';
import { formatMoney } from '@/utils/money';
import { assertValidPin } from '@/validators/account.validator';

const logger = createLogger('Bootstrap');

export interface AppConfig {
  accountsFile: string;
  transactionsFile: string;
  seedDemoAccounts: boolean;
}

/**
 * Application container
 * Owns the record store and the service built on it for one process run
 */
export interface AtmApp {
  recordStore: CsvRecordStore;
  accountService: AccountService;
  /**
   * Create both tables if needed and seed demo accounts on first run
   */
  initialize(): Promise<InitializeResult>;
}

export function createApp(config: AppConfig, clock?: () => Date): AtmApp {
  const recordStore = new CsvRecordStore({
    accountsFile: path.resolve(config.accountsFile),
    transactionsFile: path.resolve(config.transactionsFile),
  });
  const accountService = new AccountService(recordStore, clock);

  return {
    recordStore,
    accountService,
    initialize: async () => {
      const result = await recordStore.initialize();

      if (result.accountsCreated && config.seedDemoAccounts) {
        await recordStore.saveAccounts(DEMO_ACCOUNTS.map(toSeedAccount));
        logger.info({ accounts: DEMO_ACCOUNTS.length }, 'Demo accounts seeded');
      }

      return result;
    },
  };
}

export function toSeedAccount(input: SeedAccountInput): Account {
  assertValidPin(input.pin);

  return {
    accountNumber: input.accountNumber,
    name: input.name,
    pinHash: hashPin(input.pin),
    address: input.address,
    balance: formatMoney(input.balance),
    isDeleted: false,
  };
}
