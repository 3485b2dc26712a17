import { randomUUID } from 'crypto';

// ============================================================================
// ID Generation
// ============================================================================

export function generateProjectId(): string {
  return randomUUID();
}

// ============================================================================
// String Utilities
// ============================================================================

/** Leading excerpt without a marker. */
export function head(str: string, length: number): string {
  return str.length <= length ? str : str.slice(0, length);
}

/** Trailing excerpt without a marker. */
export function tail(str: string, length: number): string {
  return str.length <= length ? str : str.slice(str.length - length);
}

// ============================================================================
// Object Utilities
// ============================================================================

/** Copy of `obj` without keys whose value is `undefined`. */
export function compact<T extends object>(obj: T): T {
  const result = { ...obj };
  for (const key of Object.keys(result)) {
    if (Reflect.get(result, key) === undefined) {
      Reflect.deleteProperty(result, key);
    }
  }
  return result;
}
