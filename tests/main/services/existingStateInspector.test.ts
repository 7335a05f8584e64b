/**
 * Tests for Existing State Inspector
 *
 * Covers sidecar path derivation, on-disk state inspection and the fetch plan
 * truth table.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  computeFetchPlan,
  FetchPolicy,
  hasCompleteBasicInfo,
  getCoverSidecarPath,
  getLyricsSidecarPath,
  inspectExistingState,
  isPlanEmpty,
} from '../../../src/main/services/existingStateInspector';
import { classifyName } from '../../../src/main/services/pathClassifier';
import type { EmbeddedTags, ExistingState, TrackCandidate, TrackIdentity } from '../../../src/shared/types';

// ─── Test Helpers ────────────────────────────────────────────────────────

const ROOT = path.resolve('/music');

function candidateAt(root: string, ...segments: string[]): TrackCandidate {
  const result = classifyName(path.join(root, ...segments), root);
  if (result.outcome !== 'candidate') throw new Error('expected a candidate');
  return result.candidate;
}

const NOTHING: ExistingState = {
  hasLyricsSidecar: false,
  hasCoverSidecar: false,
  hasEmbeddedLyrics: false,
  hasEmbeddedCover: false,
  hasEmbeddedBasicInfo: false,
};

const EVERYTHING: ExistingState = {
  hasLyricsSidecar: true,
  hasCoverSidecar: true,
  hasEmbeddedLyrics: true,
  hasEmbeddedCover: true,
  hasEmbeddedBasicInfo: true,
};

const SIDECARS_ONLY: FetchPolicy = {
  downloadLyrics: true,
  downloadCover: true,
  overwriteLyrics: false,
  overwriteCover: false,
  updateLyrics: false,
  updateCover: false,
  updateBasicInfo: false,
};

// ─── Sidecar Paths ───────────────────────────────────────────────────────

describe('sidecar paths', () => {
  it('puts the lyrics beside the track with the same stem', () => {
    expect(getLyricsSidecarPath(path.join(ROOT, 'Jay', 'Fantasy', '01.mp3'))).toBe(
      path.join(ROOT, 'Jay', 'Fantasy', '01.lrc'),
    );
    expect(getLyricsSidecarPath(path.join(ROOT, 'Jay - Sunny Day.strm'))).toBe(
      path.join(ROOT, 'Jay - Sunny Day.lrc'),
    );
  });

  it('puts the cover in the album directory', () => {
    expect(getCoverSidecarPath(path.join(ROOT, 'Jay', 'Fantasy', '01.mp3'))).toBe(
      path.join(ROOT, 'Jay', 'Fantasy', 'cover.jpg'),
    );
  });
});

// ─── inspectExistingState ────────────────────────────────────────────────

describe('inspectExistingState', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'inspector-test-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  const fullTags: EmbeddedTags = {
    title: 'T',
    artist: 'A',
    album: 'B',
    hasLyrics: true,
    hasCover: true,
  };
  const identity: TrackIdentity = { title: 'T', artist: 'A', album: 'B' };

  it('reports sidecars that exist as files', async () => {
    fs.writeFileSync(path.join(tempDir, '01.lrc'), 'x');
    fs.writeFileSync(path.join(tempDir, 'cover.jpg'), 'x');

    const state = await inspectExistingState(candidateAt(tempDir, '01.mp3'), null, identity);
    expect(state.hasLyricsSidecar).toBe(true);
    expect(state.hasCoverSidecar).toBe(true);
  });

  it('does not count a directory as a sidecar', async () => {
    fs.mkdirSync(path.join(tempDir, '01.lrc'));

    const state = await inspectExistingState(candidateAt(tempDir, '01.mp3'), null, identity);
    expect(state.hasLyricsSidecar).toBe(false);
  });

  it('reads embedded presence from the tags of audio files', async () => {
    const state = await inspectExistingState(candidateAt(tempDir, '01.mp3'), fullTags, identity);
    expect(state).toEqual({
      hasLyricsSidecar: false,
      hasCoverSidecar: false,
      hasEmbeddedLyrics: true,
      hasEmbeddedCover: true,
      hasEmbeddedBasicInfo: true,
    });
  });

  it('reports basic info as incomplete when a known field is untagged', async () => {
    const state = await inspectExistingState(
      candidateAt(tempDir, '01.mp3'),
      { ...fullTags, album: null },
      identity,
    );
    expect(state.hasEmbeddedBasicInfo).toBe(false);
  });

  it('never reports embedded content for STRM pointers', async () => {
    const state = await inspectExistingState(candidateAt(tempDir, 'Jay - Sunny Day.strm'), fullTags, identity);
    expect(state).toEqual(NOTHING);
  });
});

// ─── hasCompleteBasicInfo ────────────────────────────────────────────────

describe('hasCompleteBasicInfo', () => {
  const tags: EmbeddedTags = { title: 'Song', artist: 'Jay', album: null, hasLyrics: false, hasCover: false };

  it('ignores a field no source can name', () => {
    expect(hasCompleteBasicInfo(tags, { title: 'Song', artist: 'Jay', album: '' })).toBe(true);
  });

  it('flags a field the folder layout could fill', () => {
    expect(hasCompleteBasicInfo(tags, { title: 'Song', artist: 'Jay', album: 'Fantasy' })).toBe(false);
  });

  it('is false when the tags could not be read', () => {
    expect(hasCompleteBasicInfo(null, { title: 'Song', artist: '', album: '' })).toBe(false);
  });
});

// ─── computeFetchPlan ────────────────────────────────────────────────────

describe('computeFetchPlan', () => {
  const mp3 = candidateAt(ROOT, 'Jay', 'Fantasy', '01.mp3');
  const wav = candidateAt(ROOT, 'Jay', 'Fantasy', '01.wav');
  const strm = candidateAt(ROOT, 'Jay - Sunny Day.strm');

  it('fetches both fields for a bare track', () => {
    expect(computeFetchPlan(mp3, NOTHING, SIDECARS_ONLY)).toEqual({
      needLyrics: true,
      needCover: true,
      writeLyricsSidecar: true,
      writeCoverSidecar: true,
      embedLyrics: false,
      embedCover: false,
      updateBasicInfo: false,
    });
  });

  it('plans nothing when every sidecar exists', () => {
    const plan = computeFetchPlan(mp3, EVERYTHING, SIDECARS_ONLY);
    expect(isPlanEmpty(plan)).toBe(true);
  });

  it('refetches present fields when overwrite is on', () => {
    const plan = computeFetchPlan(mp3, EVERYTHING, {
      ...SIDECARS_ONLY,
      overwriteLyrics: true,
      overwriteCover: true,
    });
    expect(plan.writeLyricsSidecar).toBe(true);
    expect(plan.writeCoverSidecar).toBe(true);
  });

  it('needs a field only if some consumer wants it', () => {
    const plan = computeFetchPlan(mp3, { ...NOTHING, hasCoverSidecar: true }, {
      ...SIDECARS_ONLY,
      downloadLyrics: false,
      updateCover: true,
    });

    expect(plan.needLyrics).toBe(false);
    expect(plan.needCover).toBe(true);
    expect(plan.writeCoverSidecar).toBe(false);
    expect(plan.embedCover).toBe(true);
  });

  it('skips embedding fields the tags already hold', () => {
    const plan = computeFetchPlan(mp3, { ...EVERYTHING, hasEmbeddedCover: false }, {
      ...SIDECARS_ONLY,
      updateLyrics: true,
      updateCover: true,
    });

    expect(plan.embedLyrics).toBe(false);
    expect(plan.embedCover).toBe(true);
    expect(plan.needLyrics).toBe(false);
  });

  it('plans basic info updates only when the tags are incomplete', () => {
    const policy = { ...SIDECARS_ONLY, updateBasicInfo: true };
    expect(computeFetchPlan(mp3, EVERYTHING, policy).updateBasicInfo).toBe(false);

    const plan = computeFetchPlan(mp3, { ...EVERYTHING, hasEmbeddedBasicInfo: false }, policy);
    expect(plan.updateBasicInfo).toBe(true);
    expect(isPlanEmpty(plan)).toBe(false);
  });

  it('never plans tag updates for STRM pointers', () => {
    const plan = computeFetchPlan(strm, NOTHING, {
      ...SIDECARS_ONLY,
      updateLyrics: true,
      updateCover: true,
      updateBasicInfo: true,
    });

    expect(plan.embedLyrics).toBe(false);
    expect(plan.embedCover).toBe(false);
    expect(plan.updateBasicInfo).toBe(false);
    expect(plan.writeLyricsSidecar).toBe(true);
  });

  it('never plans tag updates for containers whose tags cannot be written', () => {
    const plan = computeFetchPlan(wav, { ...NOTHING, hasLyricsSidecar: true, hasCoverSidecar: true }, {
      ...SIDECARS_ONLY,
      updateLyrics: true,
      updateCover: true,
      updateBasicInfo: true,
      overwriteLyrics: false,
    });
    expect(isPlanEmpty(plan)).toBe(true);
  });

  it('plans nothing with every toggle off', () => {
    const plan = computeFetchPlan(mp3, NOTHING, {
      ...SIDECARS_ONLY,
      downloadLyrics: false,
      downloadCover: false,
    });
    expect(isPlanEmpty(plan)).toBe(true);
  });
});
