/**
 * ABOUTME: Resolve the running taskloop package version.
 */

import { dirname, join } from 'node:path';
import { readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

export const PACKAGE_NAME = 'taskloop';

const PackageJsonSchema = z.object({
  name: z.string().optional(),
  version: z.string().optional(),
});

/**
 * Path to package.json from this module's directory. The compiled tree
 * mirrors src/, so both src/utils/ and dist/utils/ sit two levels down.
 */
export function computePackageJsonPath(currentDir: string): string {
  return join(currentDir, '..', '..', 'package.json');
}

/**
 * Get the taskloop version from package.json, or 'unknown'.
 */
export async function getAppVersion(): Promise<string> {
  const packageJsonPath = computePackageJsonPath(dirname(fileURLToPath(import.meta.url)));
  let content: string;
  try {
    content = await readFile(packageJsonPath, 'utf-8');
  } catch (err) {
    console.warn(`[version] Cannot read ${packageJsonPath}: ${err instanceof Error ? err.message : String(err)}`);
    return 'unknown';
  }

  let document: unknown;
  try {
    document = JSON.parse(content);
  } catch {
    return 'unknown';
  }
  const parsed = PackageJsonSchema.safeParse(document);
  if (parsed.success && parsed.data.name === PACKAGE_NAME && parsed.data.version) {
    return parsed.data.version;
  }
  return 'unknown';
}
