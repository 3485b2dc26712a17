export * from './intent.js';
export * from './ledger.js';
export * from './verification.js';
export * from './audit.js';
export * from './protocol.js';
