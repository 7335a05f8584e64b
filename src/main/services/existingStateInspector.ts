/**
 * Existing State Inspector
 *
 * Inspects, read-only, what a track already has on disk and in its tags, and
 * derives the fetch plan from that state and the configured toggles. Nothing is
 * persisted between runs: a second run over an unchanged library derives the
 * same state, finds everything present, and plans no fetches.
 */

import * as fs from 'fs';
import * as path from 'path';
import {
  AppSettings,
  COVER_FILENAME,
  EmbeddedTags,
  ExistingState,
  FetchPlan,
  LYRICS_EXTENSION,
  TrackCandidate,
  TrackIdentity,
} from '../../shared/types';
import { canWriteTags } from './tagWriter';

/** Toggles the fetch plan depends on */
export type FetchPolicy = Pick<
  AppSettings,
  | 'downloadLyrics'
  | 'downloadCover'
  | 'overwriteLyrics'
  | 'overwriteCover'
  | 'updateLyrics'
  | 'updateCover'
  | 'updateBasicInfo'
>;

/**
 * `<dir>/<stem>.lrc` beside the track.
 */
export function getLyricsSidecarPath(trackPath: string): string {
  const ext = path.extname(trackPath);
  return path.join(path.dirname(trackPath), path.basename(trackPath, ext) + LYRICS_EXTENSION);
}

/**
 * `<dir>/cover.jpg` in the track's album directory.
 */
export function getCoverSidecarPath(trackPath: string): string {
  return path.join(path.dirname(trackPath), COVER_FILENAME);
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    const stats = await fs.promises.stat(filePath);
    return stats.isFile();
  } catch {
    return false;
  }
}

const BASIC_FIELDS = ['title', 'artist', 'album'] as const;

/**
 * Basic info is complete when every field the resolved identity can name is
 * already tagged. A field no source knows (e.g. the album of an `Artist/Song`
 * track) cannot be filled locally and does not count as missing.
 */
export function hasCompleteBasicInfo(tags: EmbeddedTags | null, identity: TrackIdentity): boolean {
  if (tags === null) return false;
  return BASIC_FIELDS.every((field) => Boolean(tags[field]) || identity[field].length === 0);
}

/**
 * Checks sidecar files and, for audio files, the already-read embedded tags.
 * STRM pointers never report embedded content.
 *
 * @param candidate - Track being inspected
 * @param tags - Embedded tags read for this run (null when unavailable)
 * @param identity - Identity resolved from those tags and the path
 */
export async function inspectExistingState(
  candidate: TrackCandidate,
  tags: EmbeddedTags | null,
  identity: TrackIdentity,
): Promise<ExistingState> {
  const [hasLyricsSidecar, hasCoverSidecar] = await Promise.all([
    fileExists(getLyricsSidecarPath(candidate.absolutePath)),
    fileExists(getCoverSidecarPath(candidate.absolutePath)),
  ]);

  switch (candidate.kind) {
    case 'strmFile':
      return {
        hasLyricsSidecar,
        hasCoverSidecar,
        hasEmbeddedLyrics: false,
        hasEmbeddedCover: false,
        hasEmbeddedBasicInfo: false,
      };
    case 'audioFile':
      return {
        hasLyricsSidecar,
        hasCoverSidecar,
        hasEmbeddedLyrics: tags?.hasLyrics ?? false,
        hasEmbeddedCover: tags?.hasCover ?? false,
        hasEmbeddedBasicInfo: hasCompleteBasicInfo(tags, identity),
      };
    default: {
      const _exhaustive: never = candidate.kind;
      throw new Error(`Unknown track kind: ${String(_exhaustive)}`);
    }
  }
}

/**
 * Computes which fetches a track needs.
 *
 * A consumer (sidecar write or tag update) wants a field when its toggle is on
 * and the field is absent, or present but overwrite is enabled for it. Tag
 * consumers only exist for audio files whose container tags can be written. A field is fetched iff some consumer wants it.
 */
export function computeFetchPlan(
  candidate: TrackCandidate,
  state: ExistingState,
  policy: FetchPolicy,
): FetchPlan {
  const taggable = candidate.kind === 'audioFile' && canWriteTags(candidate.absolutePath);

  const writeLyricsSidecar =
    policy.downloadLyrics && (!state.hasLyricsSidecar || policy.overwriteLyrics);
  const writeCoverSidecar =
    policy.downloadCover && (!state.hasCoverSidecar || policy.overwriteCover);
  const embedLyrics =
    taggable && policy.updateLyrics && (!state.hasEmbeddedLyrics || policy.overwriteLyrics);
  const embedCover =
    taggable && policy.updateCover && (!state.hasEmbeddedCover || policy.overwriteCover);
  const updateBasicInfo = taggable && policy.updateBasicInfo && !state.hasEmbeddedBasicInfo;

  return {
    needLyrics: writeLyricsSidecar || embedLyrics,
    needCover: writeCoverSidecar || embedCover,
    writeLyricsSidecar,
    writeCoverSidecar,
    embedLyrics,
    embedCover,
    updateBasicInfo,
  };
}

/**
 * True when the plan requires no provider access at all.
 */
export function isPlanEmpty(plan: FetchPlan): boolean {
  return !plan.needLyrics && !plan.needCover && !plan.updateBasicInfo;
}
