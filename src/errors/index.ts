/**
 * Central export point for all custom errors
 */
export * from './AppError';
export * from './ValidationError';
export * from './NotFoundError';
export * from './DuplicateError';
export * from './AuthFailureError';
export * from './BusinessRuleError';
export * from './InsufficientFundsError';
export * from './PersistenceError';
