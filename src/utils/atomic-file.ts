/**
 * ABOUTME: Atomic file writes via write-temp-then-rename.
 * A reader of the target path sees either the previous complete file or the
 * new complete file, never a partial write.
 */

import { mkdir, rename, unlink, writeFile } from 'node:fs/promises';
import { basename, dirname, join } from 'node:path';
import { randomBytes } from 'node:crypto';

/**
 * Build a temp path beside the target so the rename stays on one filesystem.
 * The pid and random suffix keep concurrent writers from sharing a temp file.
 */
function tempPathFor(path: string): string {
  const suffix = `${process.pid}.${randomBytes(4).toString('hex')}`;
  return join(dirname(path), `.${basename(path)}.${suffix}.tmp`);
}

/**
 * Write text to `path` atomically, creating parent directories as needed.
 */
export async function writeFileAtomic(path: string, content: string): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  const tempPath = tempPathFor(path);

  try {
    await writeFile(tempPath, content, 'utf-8');
    await rename(tempPath, path);
  } catch (err) {
    await unlink(tempPath).catch(() => undefined);
    throw err;
  }
}

/**
 * Serialize `data` as pretty JSON and write it atomically.
 */
export async function writeJsonAtomic(path: string, data: unknown): Promise<void> {
  await writeFileAtomic(path, `${JSON.stringify(data, null, 2)}\n`);
}
