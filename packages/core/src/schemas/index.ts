export * from './money.js';
export * from './transaction.js';
