/**
 * Identity Resolver
 *
 * Produces the canonical (artist, album, title) for a track. Each field is taken
 * from the highest-precedence source that yields a usable value:
 *
 *   1. Embedded tags (audio files only; STRM pointers carry no tags)
 *   2. Folder layout under the library root, when enabled:
 *      Artist/Album/track -> artist + album, Artist/track -> artist only
 *   3. Filename stem as title. For STRM pointers an "Artist - Title" stem is
 *      split at the first " - "; later separators stay in the title
 *   4. Configured default artist
 */

import * as path from 'path';
import type { EmbeddedTags, TrackCandidate, TrackIdentity } from '../../shared/types';
import { ResolutionAmbiguity } from './errors';

/** Settings the resolver reads */
export interface IdentityResolverOptions {
  useFolderStructure: boolean;
  defaultArtist: string;
}

/** Where each identity field came from */
export type IdentitySource = 'tags' | 'folder' | 'filename' | 'default' | 'none';

export interface ResolvedIdentity {
  identity: TrackIdentity;
  sources: {
    artist: IdentitySource;
    album: IdentitySource;
    title: IdentitySource;
  };
  /** Set when the filename split had more than one candidate boundary */
  ambiguity: ResolutionAmbiguity | null;
}

/** Separator between artist and title in "Artist - Title" filenames */
export const ARTIST_TITLE_SEPARATOR = ' - ';

/**
 * Splits "Artist - Title" at the first separator. Returns null when the stem has
 * no separator or either side is blank.
 */
export function splitArtistTitle(
  stem: string,
): { artist: string; title: string; separatorCount: number } | null {
  const index = stem.indexOf(ARTIST_TITLE_SEPARATOR);
  if (index < 0) return null;

  const artist = stem.slice(0, index).trim();
  const title = stem.slice(index + ARTIST_TITLE_SEPARATOR.length).trim();
  if (artist.length === 0 || title.length === 0) return null;

  return {
    artist,
    title,
    separatorCount: stem.split(ARTIST_TITLE_SEPARATOR).length - 1,
  };
}

/**
 * One-line account of each field and where it came from, for debug logs.
 * e.g. `artist="Jay" (folder), album="" (none), title="01" (filename)`
 */
export function describeIdentity(resolved: ResolvedIdentity): string {
  const { identity, sources } = resolved;
  return (['artist', 'album', 'title'] as const)
    .map((field) => `${field}="${identity[field]}" (${sources[field]})`)
    .join(', ');
}

/**
 * Resolves the identity of a track.
 *
 * @param candidate - Classified library entry
 * @param tags - Embedded tags for audio files; ignored for STRM pointers
 * @param options - Folder inference toggle and default artist
 */
export function resolveIdentity(
  candidate: TrackCandidate,
  tags: EmbeddedTags | null,
  options: IdentityResolverOptions,
): ResolvedIdentity {
  let artist = '';
  let album = '';
  let title = '';
  const sources: ResolvedIdentity['sources'] = { artist: 'none', album: 'none', title: 'none' };
  let ambiguity: ResolutionAmbiguity | null = null;

  // 1. Embedded tags
  switch (candidate.kind) {
    case 'audioFile':
      if (tags) {
        if (tags.artist) {
          artist = tags.artist;
          sources.artist = 'tags';
        }
        if (tags.album) {
          album = tags.album;
          sources.album = 'tags';
        }
        if (tags.title) {
          title = tags.title;
          sources.title = 'tags';
        }
      }
      break;
    case 'strmFile':
      break;
    default: {
      const _exhaustive: never = candidate.kind;
      throw new Error(`Unknown track kind: ${String(_exhaustive)}`);
    }
  }

  // 2. Folder layout
  if (options.useFolderStructure) {
    const chain = candidate.folderChain;
    const depth = chain.length;
    if (depth >= 2) {
      if (!album) {
        album = chain[depth - 1];
        sources.album = 'folder';
      }
      if (!artist) {
        artist = chain[depth - 2];
        sources.artist = 'folder';
      }
    } else if (depth === 1 && !artist) {
      artist = chain[0];
      sources.artist = 'folder';
    }
  }

  // 3. Filename stem
  if (!title) {
    const stem = candidate.rawFilenameStem.trim();
    const split = candidate.kind === 'strmFile' ? splitArtistTitle(stem) : null;

    if (split) {
      title = split.title;
      if (!artist) {
        artist = split.artist;
        sources.artist = 'filename';
      }
      if (split.separatorCount > 1) {
        ambiguity = new ResolutionAmbiguity(
          `Filename has ${split.separatorCount} "${ARTIST_TITLE_SEPARATOR.trim()}" separators; ` +
            `using "${split.artist}" as artist and "${split.title}" as title`,
          { filePath: candidate.absolutePath },
        );
      }
    } else {
      title = stem || path.basename(candidate.absolutePath);
    }
    sources.title = 'filename';
  }

  // 4. Default artist
  if (!artist && options.defaultArtist) {
    artist = options.defaultArtist;
    sources.artist = 'default';
  }

  return {
    identity: { artist, album, title },
    sources,
    ambiguity,
  };
}
