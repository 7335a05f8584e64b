/**
 * File Scanner Utility
 *
 * Recursively lists the entries under a library root and writes files
 * all-or-nothing (temporary file, then rename).
 */

import * as fs from 'fs';
import * as path from 'path';
import { ClassificationError } from '../services/errors';

/** Prefix of temporary files created by writeFileAtomic */
export const TEMP_FILE_PREFIX = '.sidecar-tmp-';

/**
 * Checks whether a directory or file name is hidden (dot-prefixed).
 */
export function isHiddenName(name: string): boolean {
  return name.startsWith('.');
}

/**
 * Recursively scans a library root and returns every non-hidden entry that is
 * not a directory, sorted. Hidden directories are not descended into.
 *
 * Directories that cannot be read are reported through `onError` and skipped;
 * they never abort the walk.
 *
 * @param rootPath - Library root to scan
 * @param onError - Receives one ClassificationError per unreadable directory
 * @returns Absolute paths of the entries found
 */
export async function walkLibrary(
  rootPath: string,
  onError?: (error: ClassificationError) => void,
): Promise<string[]> {
  const found: string[] = [];

  async function scanRecursive(currentPath: string): Promise<void> {
    let entries: fs.Dirent[];
    try {
      entries = await fs.promises.readdir(currentPath, { withFileTypes: true });
    } catch (error: unknown) {
      onError?.(
        new ClassificationError(`Cannot read directory: ${currentPath}`, {
          filePath: currentPath,
          step: 'walking',
          cause: error instanceof Error ? error : undefined,
        }),
      );
      return;
    }

    for (const entry of entries) {
      if (isHiddenName(entry.name)) continue;

      const fullPath = path.join(currentPath, entry.name);
      if (entry.isDirectory()) {
        await scanRecursive(fullPath);
      } else {
        found.push(fullPath);
      }
    }
  }

  await scanRecursive(path.resolve(rootPath));
  return found.sort();
}

/**
 * Writes `data` to `targetPath` so that readers only ever see the old content or
 * the complete new content: the bytes go to a temporary file in the same
 * directory, which is then renamed over the target. The temporary file is
 * removed if anything fails.
 *
 * @param targetPath - Final file path
 * @param data - File content (strings are written as UTF-8)
 * @param options - `mode` applied to the new file before it replaces the target
 */
export async function writeFileAtomic(
  targetPath: string,
  data: string | Buffer,
  options: { mode?: number } = {},
): Promise<void> {
  const dir = path.dirname(targetPath);
  const tempPath = path.join(
    dir,
    `${TEMP_FILE_PREFIX}${process.pid}-${Date.now()}-${Math.random().toString(36).slice(2, 8)}-${path.basename(targetPath)}`,
  );

  try {
    await fs.promises.writeFile(tempPath, data);
    if (options.mode !== undefined) {
      await fs.promises.chmod(tempPath, options.mode);
    }
    await fs.promises.rename(tempPath, targetPath);
  } catch (error: unknown) {
    await fs.promises.rm(tempPath, { force: true });
    throw error;
  }
}
