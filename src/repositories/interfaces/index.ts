/**
 * Repository Interfaces
 * Barrel export for all repository interface contracts
 */

export * from './IRecordStore';
