import { SeedAccountInput } from '@/models';

/**
 * Demonstration accounts written when the accounts table is first created
 */
export const DEMO_ACCOUNTS: readonly SeedAccountInput[] = [
  {
    accountNumber: '987654321',
    name: 'Sara Rahman',
    pin: '1234',
    address: '123 Main St, Karachi',
    balance: '0.00',
  },
  {
    accountNumber: '123456789',
    name: 'Ahmed Khan',
    pin: '5678',
    address: '456 Gulshan Ave, Lahore',
    balance: '0.00',
  },
];
