/**
 * Central export point for all models
 * Allows clean imports: import { Account, Transaction } from '@/models'
 */

export * from './Account';
export * from './Transaction';
