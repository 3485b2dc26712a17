import { readdir, stat } from 'fs/promises';
import { join, relative, sep } from 'path';

/** `relative/path:mtimeMs` for every regular file. */
export type FileSnapshot = ReadonlySet<string>;

const SKIPPABLE_CODES = new Set(['ENOENT', 'EACCES', 'EPERM']);

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

function isHidden(name: string): boolean {
  return name.startsWith('.');
}

/**
 * Record every regular file under `root` by path and modification time,
 * skipping dot-files and dot-directories. Read-only; takes no lock.
 */
export async function takeFileSnapshot(root: string): Promise<FileSnapshot> {
  const snapshot = new Set<string>();
  const pending: string[] = [root];

  while (pending.length > 0) {
    const dir = pending.pop();
    if (dir === undefined) break;

    // The root itself must be readable; vanished or locked subdirectories are skipped.
    const entries = await readdir(dir, { withFileTypes: true }).catch((error: unknown) => {
      if (dir !== root && SKIPPABLE_CODES.has(errorCode(error) ?? '')) return null;
      throw error;
    });
    if (!entries) continue;

    for (const entry of entries) {
      if (isHidden(entry.name)) continue;
      const fullPath = join(dir, entry.name);

      if (entry.isDirectory()) {
        pending.push(fullPath);
      } else if (entry.isFile()) {
        try {
          const stats = await stat(fullPath);
          snapshot.add(`${relative(root, fullPath).split(sep).join('/')}:${stats.mtimeMs}`);
        } catch (error) {
          if (!SKIPPABLE_CODES.has(errorCode(error) ?? '')) throw error;
        }
      }
    }
  }

  return snapshot;
}

/**
 * Size of the symmetric difference of two snapshots. A file whose mtime
 * changed counts twice (old and new entry); created and deleted files once.
 */
export function countSnapshotChanges(before: FileSnapshot, after: FileSnapshot): number {
  let changes = 0;
  for (const entry of before) {
    if (!after.has(entry)) changes += 1;
  }
  for (const entry of after) {
    if (!before.has(entry)) changes += 1;
  }
  return changes;
}
