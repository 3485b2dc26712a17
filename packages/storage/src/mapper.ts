import type {
  CommandEntry,
  CommandRecord,
  DetectedRecord,
  LedgerDocument,
  ProjectFacts,
  RejectedCommand,
  RejectedRecord,
  VerificationInfo,
  VerificationRecord,
} from '@cmdtrust/shared';

// ============================================================================
// Persisted (snake_case) <-> domain (camelCase)
// ============================================================================

export interface LedgerState {
  version: string;
  projectId: string;
  created: string;
  lastUpdated: string;
  lastUpdatedBy: string;
  detected: ProjectFacts;
  commands: Map<string, CommandEntry>;
  rejected: RejectedCommand[];
  environment: Record<string, unknown>;
}

function recordToVerification(record: VerificationRecord): VerificationInfo {
  const { method, verified_at, duration_ms, ...details } = record;
  return {
    method,
    verifiedAt: verified_at,
    durationMs: duration_ms,
    details: Object.keys(details).length > 0 ? details : undefined,
  };
}

function verificationToRecord(info: VerificationInfo): VerificationRecord {
  return {
    ...info.details,
    method: info.method,
    verified_at: info.verifiedAt,
    duration_ms: info.durationMs,
  };
}

export function recordToEntry(record: CommandRecord): CommandEntry {
  return {
    command: record.command,
    learnedAt: record.learned_at,
    learnedFrom: record.learned_from,
    verified: record.verified,
    successCount: record.success_count,
    failureCount: record.failure_count,
    confidence: record.confidence,
    lastSuccess: record.last_success,
    lastFailure: record.last_failure,
    typicalDurationMs: record.typical_duration_ms,
    verification: record.verification ? recordToVerification(record.verification) : undefined,
  };
}

export function entryToRecord(entry: CommandEntry): CommandRecord {
  return {
    command: entry.command,
    learned_at: entry.learnedAt,
    learned_from: entry.learnedFrom,
    verified: entry.verified,
    success_count: entry.successCount,
    failure_count: entry.failureCount,
    confidence: entry.confidence,
    last_success: entry.lastSuccess,
    last_failure: entry.lastFailure,
    typical_duration_ms: entry.typicalDurationMs,
    verification: entry.verification ? verificationToRecord(entry.verification) : undefined,
  };
}

function recordToRejected(record: RejectedRecord): RejectedCommand {
  return {
    command: record.command,
    source: record.suggested_by,
    reason: record.reason,
    rejectedAt: record.rejected_at,
  };
}

function rejectedToRecord(rejected: RejectedCommand): RejectedRecord {
  return {
    command: rejected.command,
    suggested_by: rejected.source,
    reason: rejected.reason,
    rejected_at: rejected.rejectedAt,
  };
}

function recordToFacts(record: DetectedRecord): ProjectFacts {
  return {
    language: record.language,
    framework: record.framework,
    packageManager: record.package_manager,
    testFramework: record.test_framework,
  };
}

function factsToRecord(facts: ProjectFacts): DetectedRecord {
  return {
    language: facts.language,
    framework: facts.framework,
    package_manager: facts.packageManager,
    test_framework: facts.testFramework,
  };
}

export function documentToState(document: LedgerDocument): LedgerState {
  return {
    version: document.version,
    projectId: document.project_id,
    created: document.created,
    lastUpdated: document.last_updated,
    lastUpdatedBy: document.last_updated_by,
    detected: recordToFacts(document.detected),
    commands: new Map(
      Object.entries(document.commands).map(([type, record]) => [type, recordToEntry(record)]),
    ),
    rejected: document.rejected_commands.map(recordToRejected),
    environment: { ...document.environment },
  };
}

export function stateToDocument(state: LedgerState): LedgerDocument {
  return {
    version: state.version,
    project_id: state.projectId,
    created: state.created,
    last_updated: state.lastUpdated,
    last_updated_by: state.lastUpdatedBy,
    detected: factsToRecord(state.detected),
    commands: Object.fromEntries(
      [...state.commands].map(([type, entry]) => [type, entryToRecord(entry)]),
    ),
    rejected_commands: state.rejected.map(rejectedToRecord),
    environment: { ...state.environment },
  };
}
