/**
 * Path Classifier
 *
 * Decides whether a library entry is an audio track, a STRM pointer or
 * something to ignore, and extracts the folder chain and filename stem the
 * identity resolver works from.
 */

import * as fs from 'fs';
import * as path from 'path';
import {
  COVER_FILENAME,
  STRM_EXTENSION,
  SUPPORTED_EXTENSIONS,
  TrackCandidate,
  TrackKind,
} from '../../shared/types';
import { ClassificationError } from './errors';
import { isHiddenName, TEMP_FILE_PREFIX } from '../utils/fileScanner';

/** Why an entry was not turned into a candidate */
export type SkipReason = 'directory' | 'excluded' | 'unsupported_extension' | 'outside_root' | 'unreadable';

export type ClassificationResult =
  | { outcome: 'candidate'; candidate: TrackCandidate }
  | { outcome: 'skip'; reason: SkipReason; error?: ClassificationError };

/** Filenames never treated as tracks, compared case-insensitively */
const EXCLUDED_FILENAMES: ReadonlySet<string> = new Set([COVER_FILENAME, 'folder.jpg']);

/**
 * Maps a filename to its track kind by extension, or null when it is neither an
 * audio container nor a STRM pointer.
 */
export function getTrackKind(filePath: string): TrackKind | null {
  const ext = path.extname(filePath).toLowerCase();
  if (ext === STRM_EXTENSION) return 'strmFile';
  if (SUPPORTED_EXTENSIONS.includes(ext)) return 'audioFile';
  return null;
}

/**
 * Returns the directory names between `libraryRoot` (exclusive) and the
 * entry's parent (inclusive), or null when the entry is not under the root.
 */
export function getFolderChain(absolutePath: string, libraryRoot: string): string[] | null {
  const relative = path.relative(path.resolve(libraryRoot), path.dirname(path.resolve(absolutePath)));
  if (relative.startsWith('..') || path.isAbsolute(relative)) return null;
  if (relative === '') return [];
  return relative.split(path.sep);
}

/**
 * Classifies one library entry by name only. Pure; performs no I/O.
 */
export function classifyName(absolutePath: string, libraryRoot: string): ClassificationResult {
  const fileName = path.basename(absolutePath);

  if (
    isHiddenName(fileName) ||
    fileName.startsWith(TEMP_FILE_PREFIX) ||
    EXCLUDED_FILENAMES.has(fileName.toLowerCase())
  ) {
    return { outcome: 'skip', reason: 'excluded' };
  }

  const kind = getTrackKind(fileName);
  if (kind === null) {
    return { outcome: 'skip', reason: 'unsupported_extension' };
  }

  const folderChain = getFolderChain(absolutePath, libraryRoot);
  if (folderChain === null) {
    return { outcome: 'skip', reason: 'outside_root' };
  }

  return {
    outcome: 'candidate',
    candidate: Object.freeze({
      absolutePath: path.resolve(absolutePath),
      kind,
      libraryRoot: path.resolve(libraryRoot),
      folderChain: Object.freeze(folderChain),
      rawFilenameStem: path.basename(fileName, path.extname(fileName)),
    }),
  };
}

/**
 * Classifies a library entry, confirming with a stat that a name-matched entry
 * is a readable regular file. An unreadable entry is reported as a skip with a
 * ClassificationError attached; it is never thrown.
 */
export async function classifyPath(
  absolutePath: string,
  libraryRoot: string,
): Promise<ClassificationResult> {
  const byName = classifyName(absolutePath, libraryRoot);
  if (byName.outcome === 'skip') return byName;

  let stats: fs.Stats;
  try {
    stats = await fs.promises.stat(absolutePath);
  } catch (error: unknown) {
    return {
      outcome: 'skip',
      reason: 'unreadable',
      error: new ClassificationError(`Cannot inspect entry: ${absolutePath}`, {
        filePath: absolutePath,
        cause: error instanceof Error ? error : undefined,
      }),
    };
  }

  if (stats.isDirectory()) {
    return { outcome: 'skip', reason: 'directory' };
  }

  return byName;
}
