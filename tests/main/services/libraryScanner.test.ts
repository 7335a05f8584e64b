/**
 * Tests for Library Scanner
 *
 * Runs real walks over a temp library with a fake provider and mocked tag I/O.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { LibraryScanner, MAX_TIMER_DELAY_MS, sleep } from '../../../src/main/services/libraryScanner';
import { loadSettingsFromEnv } from '../../../src/main/services/settingsLoader';
import type { ProviderGateway, ProviderMatch } from '../../../src/main/services/providerGateway';
import { readEmbeddedTags } from '../../../src/main/services/audioReader';
import { Logger } from '../../../src/main/services/logger';
import { DEFAULT_SETTINGS } from '../../../src/shared/types';
import type { AppSettings, ScanSummary, TrackIdentity } from '../../../src/shared/types';

const MS_PER_DAY = 24 * 60 * 60 * 1000;

vi.mock('../../../src/main/services/audioReader', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../../../src/main/services/audioReader')>();
  return { ...actual, readEmbeddedTags: vi.fn() };
});

function createFakeProvider(): ProviderGateway {
  return {
    name: 'tunehub',
    searchTrack: vi.fn(async (identity: TrackIdentity): Promise<ProviderMatch | null> => ({
      id: identity.title,
      title: identity.title,
      artist: identity.artist,
      album: identity.album,
      platform: 'netease',
      lyricsUrl: 'https://lyrics.test/1',
      coverUrl: 'https://covers.test/1',
    })),
    fetchLyrics: vi.fn(async (): Promise<string | null> => '[00:01.00]La la'),
    fetchCover: vi.fn(async (): Promise<Buffer | null> => Buffer.from([0xff, 0xd8, 0xff])),
  };
}

describe('LibraryScanner', () => {
  let libraryRoot: string;
  let logger: Logger;

  function createFile(relativePath: string): void {
    const filePath = path.join(libraryRoot, relativePath);
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, 'audio');
  }

  function createScanner(overrides: Partial<AppSettings> = {}, onScanComplete?: (s: ScanSummary) => void) {
    return new LibraryScanner({
      settings: { ...DEFAULT_SETTINGS, libraryRoots: [libraryRoot], ...overrides },
      provider: createFakeProvider(),
      logger,
      onScanComplete,
    });
  }

  beforeEach(() => {
    libraryRoot = fs.mkdtempSync(path.join(os.tmpdir(), 'library-scanner-test-'));
    logger = new Logger({ writeToFile: false });
    vi.mocked(readEmbeddedTags).mockResolvedValue({
      title: null,
      artist: null,
      album: null,
      hasLyrics: false,
      hasCover: false,
    });
  });

  afterEach(() => {
    fs.rmSync(libraryRoot, { recursive: true, force: true });
  });

  describe('collectCandidates', () => {
    it('keeps audio files and STRM pointers only', async () => {
      createFile('Jay/Fantasy/01.mp3');
      createFile('Jay/Fantasy/01.lrc');
      createFile('Jay/Fantasy/cover.jpg');
      createFile('Jay - Sunny Day.strm');
      createFile('.hidden/02.mp3');
      createFile('notes.txt');

      const { candidates, unreadable } = await createScanner().collectCandidates();

      // Sorted by full path: ' ' sorts before the path separator
      expect(candidates.map((c) => path.relative(libraryRoot, c.absolutePath))).toEqual([
        'Jay - Sunny Day.strm',
        path.join('Jay', 'Fantasy', '01.mp3'),
      ]);
      expect(unreadable).toBe(0);
    });

    it('logs a missing root and continues with the others', async () => {
      createFile('A/B/01.mp3');
      const missing = path.join(libraryRoot, 'missing');

      const { candidates, unreadable } = await createScanner({
        libraryRoots: [missing, libraryRoot],
      }).collectCandidates();

      expect(candidates).toHaveLength(1);
      expect(unreadable).toBe(1);
      expect(logger.getSummary().problemsByCategory).toEqual({ ClassificationError: 1 });
    });
  });

  describe('runOnce', () => {
    it('reconciles the library and reports the summary', async () => {
      createFile('Jay/Fantasy/01.mp3');
      createFile('Jay/Fantasy/02.mp3');
      const onScanComplete = vi.fn();

      const summary = await createScanner({}, onScanComplete).runOnce();

      expect(summary).toEqual({
        processed: 2,
        skipped: 0,
        matched: 2,
        unmatched: 0,
        failed: 0,
        lyricsWritten: 2,
        coversWritten: 1,
        tagsUpdated: 0,
        cancelled: 0,
      });
      expect(onScanComplete).toHaveBeenCalledWith(summary);
      expect(fs.readdirSync(path.join(libraryRoot, 'Jay', 'Fantasy')).sort()).toEqual([
        '01.lrc',
        '01.mp3',
        '02.lrc',
        '02.mp3',
        'cover.jpg',
      ]);
    });

    it('does not pick up its own sidecars on the next pass', async () => {
      createFile('Jay/Fantasy/01.mp3');
      const scanner = createScanner();

      await scanner.runOnce();
      const second = await scanner.runOnce();

      expect(second.processed).toBe(1);
      expect(second.skipped).toBe(1);
    });

    it('reports an empty library', async () => {
      const summary = await createScanner().runOnce();
      expect(summary.processed).toBe(0);
    });
  });

  describe('runForever', () => {
    it('performs a single pass when the interval is 0', async () => {
      createFile('Jay/Fantasy/01.mp3');

      const summaries = await createScanner({ scanIntervalDays: 0 }).runForever();

      expect(summaries).toHaveLength(1);
    });

    it('stops waiting as soon as it is aborted', async () => {
      const controller = new AbortController();
      const scanner = createScanner({ scanIntervalDays: 1 }, () => {
        setTimeout(() => controller.abort(), 10);
      });

      const summaries = await scanner.runForever(controller.signal);

      expect(summaries).toHaveLength(1);
    });

    it('waits the full interval of a monthly schedule', async () => {
      vi.useFakeTimers({ toFake: ['setTimeout', 'clearTimeout'] });
      try {
        const settings = loadSettingsFromEnv({ MUSIC_PATH: libraryRoot, SCAN_INTERVAL_DAYS: '30' });
        const controller = new AbortController();
        const onScanComplete = vi.fn();
        const scanner = new LibraryScanner({
          settings,
          provider: createFakeProvider(),
          logger,
          onScanComplete,
        });

        const running = scanner.runForever(controller.signal);
        await vi.waitFor(() => expect(vi.getTimerCount()).toBe(1));
        await vi.advanceTimersByTimeAsync(29 * MS_PER_DAY);

        expect(onScanComplete).toHaveBeenCalledTimes(1);
        controller.abort();
        expect(await running).toHaveLength(1);
        expect(vi.getTimerCount()).toBe(0);
      } finally {
        vi.useRealTimers();
      }
    });

    it('does not scan again once aborted', async () => {
      const controller = new AbortController();
      controller.abort();

      const summaries = await createScanner({ scanIntervalDays: 1 }).runForever(controller.signal);

      expect(summaries).toHaveLength(1);
      expect(summaries[0].processed).toBe(0);
    });
  });
});

describe('sleep', () => {
  it('resolves after the delay', async () => {
    const start = Date.now();
    await sleep(20);
    expect(Date.now() - start).toBeGreaterThanOrEqual(15);
  });

  it('resolves immediately when already aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const start = Date.now();
    await sleep(60_000, controller.signal);
    expect(Date.now() - start).toBeLessThan(1000);
  });

  it('waits out delays longer than a single timer allows', async () => {
    vi.useFakeTimers({ toFake: ['setTimeout', 'clearTimeout'] });
    try {
      const thirtyDays = 30 * MS_PER_DAY;
      let done = false;
      const pending = sleep(thirtyDays).then(() => {
        done = true;
      });

      await vi.advanceTimersByTimeAsync(MAX_TIMER_DELAY_MS);
      expect(done).toBe(false);
      await vi.advanceTimersByTimeAsync(thirtyDays - MAX_TIMER_DELAY_MS - 1);
      expect(done).toBe(false);
      await vi.advanceTimersByTimeAsync(1);
      await pending;
      expect(done).toBe(true);
    } finally {
      vi.useRealTimers();
    }
  });

  it('resolves early on abort', async () => {
    const controller = new AbortController();
    const pending = sleep(60_000, controller.signal);
    controller.abort();
    await expect(pending).resolves.toBeUndefined();
  });
});
