// Copyright (c) 2026 Naresh. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

// ============================================================================
// Base Error Class
// ============================================================================

export abstract class CmdtrustError extends Error {
  abstract readonly code: string;
  readonly timestamp: number;
  readonly context?: Record<string, unknown>;

  constructor(message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    this.timestamp = Date.now();
    this.context = context;

    // Maintains proper stack trace for where our error was thrown
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toJSON() {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      timestamp: this.timestamp,
      context: this.context,
      stack: this.stack,
    };
  }
}

// ============================================================================
// Execution Errors
// ============================================================================

export class ExecutionError extends CmdtrustError {
  readonly code = 'EXECUTION_ERROR';
  readonly command: string;

  constructor(command: string, message: string, context?: Record<string, unknown>) {
    super(message, context);
    this.command = command;
  }

  static executionFailed(command: string, reason?: string): ExecutionError {
    return new ExecutionError(command, `Command execution failed${reason ? `: ${reason}` : ''}`);
  }
}

// ============================================================================
// Storage Errors
// ============================================================================

export class StorageError extends CmdtrustError {
  readonly code = 'STORAGE_ERROR';

  static loadFailed(entity: string, reason?: string): StorageError {
    return new StorageError(`Failed to load ${entity}${reason ? `: ${reason}` : ''}`, { entity });
  }

  static saveFailed(entity: string, reason?: string): StorageError {
    return new StorageError(`Failed to save ${entity}${reason ? `: ${reason}` : ''}`, { entity });
  }
}

// ============================================================================
// Validation Errors
// ============================================================================

export class ValidationError extends CmdtrustError {
  readonly code = 'VALIDATION_ERROR';
  readonly field?: string;

  constructor(message: string, field?: string, context?: Record<string, unknown>) {
    super(message, context);
    this.field = field;
  }

  static invalid(field: string, reason?: string): ValidationError {
    return new ValidationError(`Invalid ${field}${reason ? `: ${reason}` : ''}`, field);
  }
}

// ============================================================================
// Error Type Guards
// ============================================================================

export function isCmdtrustError(error: unknown): error is CmdtrustError {
  return error instanceof CmdtrustError;
}

// ============================================================================
// Error Wrapping
// ============================================================================

class UnknownError extends CmdtrustError {
  readonly code = 'UNKNOWN_ERROR';
}

export function wrapError(error: unknown, fallbackMessage = 'An unexpected error occurred'): CmdtrustError {
  if (isCmdtrustError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return new UnknownError(error.message || fallbackMessage, { originalError: error.name });
  }

  return new UnknownError(String(error) || fallbackMessage);
}

export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
