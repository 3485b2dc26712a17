import { promises as fs } from 'fs';
import * as path from 'path';

/**
 * Check if a file exists
 */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Read and parse a JSON file. Resolves `undefined` when the file does not
 * exist; parse and permission errors are thrown.
 */
export async function readJsonFile(filePath: string): Promise<unknown> {
  try {
    const content = await fs.readFile(filePath, 'utf-8');
    const parsed: unknown = JSON.parse(content);
    return parsed;
  } catch (err) {
    if (isMissingFile(err)) {
      return undefined;
    }
    throw err;
  }
}

/**
 * Write JSON file atomically (write to temp, then rename). The previous
 * version is kept next to it as `.bak`.
 */
export async function writeJsonFileAtomic(filePath: string, data: unknown): Promise<void> {
  const tempPath = `${filePath}.tmp`;
  const backupPath = `${filePath}.bak`;

  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(tempPath, JSON.stringify(data, null, 2), 'utf-8');

  if (await fileExists(filePath)) {
    await fs.copyFile(filePath, backupPath);
  }

  await fs.rename(tempPath, filePath);
}

/**
 * Append line to JSONL file
 */
export async function appendJsonLine(
  filePath: string,
  data: unknown,
  replacer?: (key: string, value: unknown) => unknown,
): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.appendFile(filePath, JSON.stringify(data, replacer) + '\n', 'utf-8');
}
