/**
 * Tests for Identity Resolver
 */

import * as path from 'path';
import { describe, it, expect } from 'vitest';
import {
  describeIdentity,
  resolveIdentity,
  splitArtistTitle,
  IdentityResolverOptions,
} from '../../../src/main/services/identityResolver';
import { classifyName } from '../../../src/main/services/pathClassifier';
import type { EmbeddedTags, TrackCandidate } from '../../../src/shared/types';

// ─── Test Helpers ────────────────────────────────────────────────────────

const ROOT = path.resolve('/music');

const OPTIONS: IdentityResolverOptions = { useFolderStructure: true, defaultArtist: '' };

function candidate(...segments: string[]): TrackCandidate {
  const result = classifyName(path.join(ROOT, ...segments), ROOT);
  if (result.outcome !== 'candidate') throw new Error('expected a candidate');
  return result.candidate;
}

function tags(overrides: Partial<EmbeddedTags> = {}): EmbeddedTags {
  return { title: null, artist: null, album: null, hasLyrics: false, hasCover: false, ...overrides };
}

// ─── splitArtistTitle ────────────────────────────────────────────────────

describe('splitArtistTitle', () => {
  it('splits at the first separator', () => {
    expect(splitArtistTitle('Jay - Sunny Day')).toEqual({
      artist: 'Jay',
      title: 'Sunny Day',
      separatorCount: 1,
    });
  });

  it('keeps later separators in the title and counts them', () => {
    expect(splitArtistTitle('A - B - C')).toEqual({ artist: 'A', title: 'B - C', separatorCount: 2 });
  });

  it('returns null without a separator or with a blank side', () => {
    expect(splitArtistTitle('Sunny Day')).toBeNull();
    expect(splitArtistTitle('Jay-Sunny')).toBeNull();
    expect(splitArtistTitle(' - Sunny Day')).toBeNull();
  });
});

// ─── resolveIdentity ─────────────────────────────────────────────────────

describe('resolveIdentity', () => {
  it('infers artist and album from an Artist/Album layout', () => {
    const resolved = resolveIdentity(candidate('Jay', 'Fantasy', '01.mp3'), null, OPTIONS);

    expect(resolved.identity).toEqual({ artist: 'Jay', album: 'Fantasy', title: '01' });
    expect(resolved.sources).toEqual({ artist: 'folder', album: 'folder', title: 'filename' });
    expect(resolved.ambiguity).toBeNull();
  });

  it('uses the two nearest directories of deeper layouts', () => {
    const resolved = resolveIdentity(candidate('Pop', 'Jay', 'Fantasy', '01.mp3'), null, OPTIONS);
    expect(resolved.identity).toEqual({ artist: 'Jay', album: 'Fantasy', title: '01' });
  });

  it('takes only the artist from a single directory', () => {
    const resolved = resolveIdentity(candidate('Jay', 'Song.mp3'), null, OPTIONS);
    expect(resolved.identity).toEqual({ artist: 'Jay', album: '', title: 'Song' });
  });

  it('prefers embedded tags over folder names', () => {
    const resolved = resolveIdentity(
      candidate('Jay', 'Fantasy', '01.mp3'),
      tags({ title: 'Love Before Century', artist: 'Jay Chou' }),
      OPTIONS,
    );

    expect(resolved.identity).toEqual({ artist: 'Jay Chou', album: 'Fantasy', title: 'Love Before Century' });
    expect(resolved.sources).toEqual({ artist: 'tags', album: 'folder', title: 'tags' });
  });

  it('ignores folders when folder inference is off', () => {
    const resolved = resolveIdentity(candidate('Jay', 'Fantasy', '01.mp3'), null, {
      useFolderStructure: false,
      defaultArtist: '',
    });
    expect(resolved.identity).toEqual({ artist: '', album: '', title: '01' });
  });

  it('falls back to the default artist', () => {
    const resolved = resolveIdentity(candidate('Song.mp3'), null, {
      useFolderStructure: true,
      defaultArtist: 'Various',
    });

    expect(resolved.identity).toEqual({ artist: 'Various', album: '', title: 'Song' });
    expect(resolved.sources.artist).toBe('default');
  });

  it('splits a STRM stem into artist and title', () => {
    const resolved = resolveIdentity(candidate('Jay - Sunny Day.strm'), null, OPTIONS);

    expect(resolved.identity).toEqual({ artist: 'Jay', album: '', title: 'Sunny Day' });
    expect(resolved.sources.artist).toBe('filename');
  });

  it('keeps a folder artist over the STRM filename artist', () => {
    const resolved = resolveIdentity(candidate('Jay', 'Fantasy', 'Someone - Sunny Day.strm'), null, OPTIONS);
    expect(resolved.identity).toEqual({ artist: 'Jay', album: 'Fantasy', title: 'Sunny Day' });
  });

  it('ignores tags for STRM pointers', () => {
    const resolved = resolveIdentity(candidate('Jay - Sunny Day.strm'), tags({ title: 'Other' }), OPTIONS);
    expect(resolved.identity.title).toBe('Sunny Day');
  });

  it('does not split audio file stems', () => {
    const resolved = resolveIdentity(candidate('Jay - Sunny Day.mp3'), null, OPTIONS);
    expect(resolved.identity).toEqual({ artist: '', album: '', title: 'Jay - Sunny Day' });
  });

  it('reports an ambiguity for several separators but still resolves', () => {
    const pointer = candidate('A - B - C.strm');
    const resolved = resolveIdentity(pointer, null, OPTIONS);

    expect(resolved.identity).toEqual({ artist: 'A', album: '', title: 'B - C' });
    expect(resolved.ambiguity?.category).toBe('ResolutionAmbiguity');
    expect(resolved.ambiguity?.filePath).toBe(pointer.absolutePath);
  });

  it('is deterministic', () => {
    const track = candidate('Jay', 'Fantasy', '01.mp3');
    expect(resolveIdentity(track, null, OPTIONS)).toEqual(resolveIdentity(track, null, OPTIONS));
  });
});

// ─── describeIdentity ────────────────────────────────────────────────────

describe('describeIdentity', () => {
  it('names each field with its source', () => {
    const resolved = resolveIdentity(candidate('Jay', 'Song.mp3'), tags({ title: 'Sunny Day' }), OPTIONS);

    expect(describeIdentity(resolved)).toBe('artist="Jay" (folder), album="" (none), title="Sunny Day" (tags)');
  });
});
