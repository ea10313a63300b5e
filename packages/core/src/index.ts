export * from './errors/index.js';
export * from './schemas/index.js';
export * from './types/security.js';
export * from './types/transaction.js';
export * from './utils/date-utils.js';
export * from './utils/decimal-utils.js';
export * from './utils/order-sequence.js';
export * from './utils/order-utils.js';
export * from './utils/tax-year-utils.js';
export * from './utils/transaction-utils.js';
export * from './utils/type-guard-utils.js';
export * from './utils/zod-utils.js';
export * from './value-objects/currency.js';
export * from './value-objects/fees.js';
export * from './value-objects/money.js';
