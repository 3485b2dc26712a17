// Trust ledger
export {
  TrustLedger,
  DEFAULT_DATA_DIR_NAME,
  LEDGER_FILE_NAME,
  passesTrustGate,
  type LedgerOptions,
  type VerificationDetails,
} from './trust-ledger.js';
export { calculateConfidence } from './confidence.js';

// Audit log
export { AuditLog, AUDIT_LOG_FILE_NAME, truncateString } from './audit-log.js';

// Persistence helpers
export { appendJsonLine, fileExists, readJsonFile, writeJsonFileAtomic } from './files.js';
export {
  documentToState,
  entryToRecord,
  recordToEntry,
  stateToDocument,
  type LedgerState,
} from './mapper.js';
