/**
 * Central export point for all custom errors
 */
export * from './AppError';
export * from './ValidationError';
export * from './AuthError';
export * from './NotFoundError';
export * from './AccountNotFoundError';
export * from './BusinessRuleError';
export * from './InsufficientFundsError';
export * from './StorageError';
