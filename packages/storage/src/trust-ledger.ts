// Copyright (c) 2026 Naresh. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

import { join, resolve } from 'path';
import {
  LEDGER_VERSION,
  LedgerDocumentSchema,
  MAX_REJECTED_COMMANDS,
  StorageError,
  TRUST_THRESHOLD,
  generateProjectId,
  getErrorMessage,
  toCommandType,
} from '@cmdtrust/shared';
import type { CommandEntry, ProjectFacts, RejectedCommand } from '@cmdtrust/shared';
import { AUDIT_LOG_FILE_NAME, AuditLog } from './audit-log.js';
import { calculateConfidence } from './confidence.js';
import { readJsonFile, writeJsonFileAtomic } from './files.js';
import { documentToState, stateToDocument, type LedgerState } from './mapper.js';

export const DEFAULT_DATA_DIR_NAME = '.cmdtrust';
export const LEDGER_FILE_NAME = 'ledger.json';

export interface LedgerOptions {
  /** Directory under the project root holding the ledger and audit log. */
  dataDirName?: string;
  maxRejected?: number;
  clock?: () => Date;
}

/** Extra facts recorded with a verification; `durationMs` is kept as its own field. */
export interface VerificationDetails {
  durationMs?: number;
  [key: string]: unknown;
}

export function passesTrustGate(entry: CommandEntry): boolean {
  return entry.verified && entry.confidence >= TRUST_THRESHOLD;
}

function copyEntry(entry: CommandEntry): CommandEntry {
  return {
    ...entry,
    verification: entry.verification
      ? {
          ...entry.verification,
          details: entry.verification.details ? { ...entry.verification.details } : undefined,
        }
      : undefined,
  };
}

// ============================================================================
// Trust Ledger
// ============================================================================

/**
 * Durable per-project record of learned commands. State lives in memory;
 * every mutation rewrites the JSON document and appends one audit line.
 * Writes from one process are serialized; concurrent processes are not
 * coordinated (last writer wins).
 */
export class TrustLedger {
  private readonly state: LedgerState;
  private readonly ledgerPath: string;
  private readonly audit: AuditLog;
  private readonly maxRejected: number;
  private readonly clock: () => Date;
  private writeQueue: Promise<void> = Promise.resolve();

  private constructor(
    state: LedgerState,
    ledgerPath: string,
    audit: AuditLog,
    maxRejected: number,
    clock: () => Date,
  ) {
    this.state = state;
    this.ledgerPath = ledgerPath;
    this.audit = audit;
    this.maxRejected = maxRejected;
    this.clock = clock;
  }

  /**
   * Load the ledger for a project root. A missing, unreadable or malformed
   * document is replaced by a fresh one.
   */
  static async open(projectRoot: string, options: LedgerOptions = {}): Promise<TrustLedger> {
    const clock = options.clock ?? (() => new Date());
    const dataDir = join(resolve(projectRoot), options.dataDirName ?? DEFAULT_DATA_DIR_NAME);
    const ledgerPath = join(dataDir, LEDGER_FILE_NAME);
    const audit = new AuditLog(join(dataDir, AUDIT_LOG_FILE_NAME), clock);

    const state = await TrustLedger.load(ledgerPath, clock);
    return new TrustLedger(state, ledgerPath, audit, options.maxRejected ?? MAX_REJECTED_COMMANDS, clock);
  }

  private static async load(ledgerPath: string, clock: () => Date): Promise<LedgerState> {
    let raw: unknown;
    try {
      raw = await readJsonFile(ledgerPath);
    } catch (error) {
      const loadError = StorageError.loadFailed(ledgerPath, getErrorMessage(error));
      console.warn(`[TrustLedger] ${loadError.message}; starting fresh`);
      return TrustLedger.createEmpty(clock);
    }

    if (raw === undefined) {
      return TrustLedger.createEmpty(clock);
    }

    const parsed = LedgerDocumentSchema.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const loadError = StorageError.loadFailed(
        ledgerPath,
        issue ? `${issue.path.join('.')}: ${issue.message}` : 'invalid ledger document',
      );
      console.warn(`[TrustLedger] ${loadError.message}; starting fresh`);
      return TrustLedger.createEmpty(clock);
    }

    return documentToState(parsed.data);
  }

  private static createEmpty(clock: () => Date): LedgerState {
    const timestamp = clock().toISOString();
    return {
      version: LEDGER_VERSION,
      projectId: generateProjectId(),
      created: timestamp,
      lastUpdated: timestamp,
      lastUpdatedBy: 'unknown',
      detected: {},
      commands: new Map(),
      rejected: [],
      environment: {},
    };
  }

  // ==========================================================================
  // Queries
  // ==========================================================================

  /**
   * The stored command for an intent type, but only when it is verified and
   * at or above the trust threshold.
   */
  async getCommand(intentType: string): Promise<string | undefined> {
    const type = toCommandType(intentType);
    const entry = this.state.commands.get(type);
    if (!entry || !passesTrustGate(entry)) {
      return undefined;
    }

    await this.enqueue(() =>
      this.audit.log('USE_LEARNED_CMD', {
        type,
        command: entry.command,
        confidence: entry.confidence,
      }),
    );
    return entry.command;
  }

  getEntry(intentType: string): CommandEntry | undefined {
    const entry = this.state.commands.get(toCommandType(intentType));
    return entry ? copyEntry(entry) : undefined;
  }

  getAllEntries(): Record<string, CommandEntry> {
    return Object.fromEntries([...this.state.commands].map(([type, entry]) => [type, copyEntry(entry)]));
  }

  /** Intent type -> command for every entry that passes the trust gate. */
  getKnownCommands(): Record<string, string> {
    const known: Record<string, string> = {};
    for (const [type, entry] of this.state.commands) {
      if (passesTrustGate(entry)) {
        known[type] = entry.command;
      }
    }
    return known;
  }

  getRejectedCommands(): RejectedCommand[] {
    return [...this.state.rejected];
  }

  getProjectFacts(): ProjectFacts {
    return { ...this.state.detected };
  }

  getEnvironment(): Record<string, unknown> {
    return { ...this.state.environment };
  }

  getProjectId(): string {
    return this.state.projectId;
  }

  getLedgerPath(): string {
    return this.ledgerPath;
  }

  getAuditLogPath(): string {
    return this.audit.getPath();
  }

  // ==========================================================================
  // Mutations
  // ==========================================================================

  /**
   * Store a command for an intent type, replacing any previous entry. The
   * new entry starts unverified with zeroed counters.
   */
  async learnCommand(intentType: string, command: string, source: string): Promise<void> {
    const type = toCommandType(intentType);
    this.state.commands.set(type, {
      command,
      learnedAt: this.timestamp(),
      learnedFrom: source,
      verified: false,
      successCount: 0,
      failureCount: 0,
      confidence: 0,
    });

    await this.commit(source, () =>
      this.audit.log('LEARN_CMD', { type, command, source, verified: false }),
    );
  }

  /**
   * Record the outcome of a run and recompute confidence. Unknown intent
   * types are ignored.
   */
  async updateResult(intentType: string, success: boolean, durationMs?: number): Promise<void> {
    const type = toCommandType(intentType);
    const entry = this.state.commands.get(type);
    if (!entry) {
      return;
    }

    if (success) {
      entry.successCount += 1;
      entry.lastSuccess = this.timestamp();
      if (durationMs && entry.typicalDurationMs === undefined) {
        entry.typicalDurationMs = durationMs;
      }
    } else {
      entry.failureCount += 1;
      entry.lastFailure = this.timestamp();
    }
    entry.confidence = calculateConfidence(entry.successCount, entry.failureCount);

    await this.commit('unknown', () =>
      this.audit.log('EXEC_CMD', {
        type,
        command: entry.command,
        result: success ? 'success' : 'failure',
        duration_ms: durationMs,
        confidence: entry.confidence,
      }),
    );
  }

  /**
   * Mark an entry verified and raise its confidence to at least the trust
   * threshold. Confidence is never lowered here.
   */
  async markVerified(intentType: string, method: string, details: VerificationDetails = {}): Promise<void> {
    const type = toCommandType(intentType);
    const entry = this.state.commands.get(type);
    if (!entry) {
      return;
    }

    const { durationMs, ...extra } = details;
    entry.verified = true;
    entry.verification = {
      method,
      verifiedAt: this.timestamp(),
      durationMs,
      details: Object.keys(extra).length > 0 ? extra : undefined,
    };
    entry.confidence = Math.max(entry.confidence, TRUST_THRESHOLD);

    await this.commit('unknown', () =>
      this.audit.log('VERIFY_CMD', {
        type,
        command: entry.command,
        method,
        result: 'verified',
      }),
    );
  }

  /**
   * Remember a refused command. Only the most recent `maxRejected` are kept.
   */
  async reject(command: string, source: string, reason: string): Promise<void> {
    this.state.rejected.push({ command, source, reason, rejectedAt: this.timestamp() });
    if (this.state.rejected.length > this.maxRejected) {
      this.state.rejected.splice(0, this.state.rejected.length - this.maxRejected);
    }

    await this.commit('unknown', () => this.audit.log('REJECT_CMD', { command, source, reason }));
  }

  /** Forget an entry so it must be taught again. Returns whether one existed. */
  async clear(intentType: string): Promise<boolean> {
    const type = toCommandType(intentType);
    if (!this.state.commands.delete(type)) {
      return false;
    }

    await this.commit('unknown', () => this.audit.log('CLEAR_CMD', { type }));
    return true;
  }

  /**
   * Merge detected project facts. Empty values never overwrite; nothing is
   * written when the merge changes nothing. Returns whether it did.
   */
  async setProjectFacts(facts: ProjectFacts, updatedBy = 'detector'): Promise<boolean> {
    const merged: ProjectFacts = { ...this.state.detected };
    let changed = false;
    for (const key of ['language', 'framework', 'packageManager', 'testFramework'] as const) {
      const value = facts[key];
      if (value && merged[key] !== value) {
        merged[key] = value;
        changed = true;
      }
    }
    if (!changed) {
      return false;
    }

    this.state.detected = merged;
    const detected: Record<string, string> = {};
    for (const [key, value] of Object.entries(merged)) {
      if (value !== undefined) detected[key] = value;
    }

    await this.commit(updatedBy, () => this.audit.log('SET_PROJECT_INFO', { detected }));
    return true;
  }

  async setEnvironment(environment: Record<string, unknown>, updatedBy = 'unknown'): Promise<void> {
    this.state.environment = { ...this.state.environment, ...environment };
    await this.commit(updatedBy);
  }

  // ==========================================================================
  // Persistence
  // ==========================================================================

  private timestamp(): string {
    return this.clock().toISOString();
  }

  /**
   * Stamp the document, then queue the save and its audit line.
   */
  private commit(updatedBy: string, auditLine?: () => Promise<void>): Promise<void> {
    this.state.lastUpdated = this.timestamp();
    this.state.lastUpdatedBy = updatedBy;

    return this.enqueue(async () => {
      await this.save();
      if (auditLine) {
        await auditLine();
      }
    });
  }

  private async save(): Promise<void> {
    try {
      await writeJsonFileAtomic(this.ledgerPath, stateToDocument(this.state));
    } catch (error) {
      throw StorageError.saveFailed('trust ledger', getErrorMessage(error));
    }
  }

  private enqueue(task: () => Promise<void>): Promise<void> {
    const run = this.writeQueue.then(task);
    this.writeQueue = run.catch((error: unknown) => {
      console.error('[TrustLedger] Write failed:', error);
    });
    return run;
  }
}
