/**
 * Tests for TuneHub Provider
 *
 * The HTTP client is stubbed per test through vi.spyOn.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import {
  MIN_MATCH_SCORE,
  TuneHubProvider,
  findBestMatch,
  parseSearchResponse,
  scoreMatch,
} from '../../../src/main/services/tuneHubProvider';
import { ProviderHttpClient } from '../../../src/main/services/httpClient';
import type { ProviderMatch } from '../../../src/main/services/providerGateway';
import { ProviderError } from '../../../src/main/services/errors';

// ─── Test Helpers ────────────────────────────────────────────────────────────

const PLATFORMS = ['netease', 'kuwo', 'qq'];

function createMatch(overrides: Partial<ProviderMatch> = {}): ProviderMatch {
  return {
    id: '1',
    title: 'Sunny Day',
    artist: 'Jay',
    album: 'Fantasy',
    platform: 'netease',
    lyricsUrl: 'https://lyrics.test/1',
    coverUrl: 'https://covers.test/1',
    ...overrides,
  };
}

function searchBody(results: unknown[]): unknown {
  return { code: 200, data: { results } };
}

// ─── Scoring ─────────────────────────────────────────────────────────────────

describe('scoreMatch', () => {
  it('adds exact title, artist and first-platform scores', () => {
    expect(scoreMatch(createMatch(), 'Jay', 'Sunny Day', PLATFORMS)).toBe(100 + 30 + 10);
  });

  it('compares case-insensitively', () => {
    expect(scoreMatch(createMatch({ title: 'SUNNY DAY', artist: 'JAY' }), 'jay', 'sunny day', [])).toBe(130);
  });

  it('gives a partial title score when the name contains the title', () => {
    const match = createMatch({ title: 'Sunny Day (Live)', platform: 'qq' });
    expect(scoreMatch(match, 'Jay', 'Sunny Day', PLATFORMS)).toBe(50 + 30 + 8);
  });

  it('accepts artist containment in either direction', () => {
    expect(scoreMatch(createMatch({ artist: 'Jay Chou', platform: 'x' }), 'Jay', 'Other', PLATFORMS)).toBe(30);
    expect(scoreMatch(createMatch({ artist: 'Jay', platform: 'x' }), 'Jay Chou', 'Other', PLATFORMS)).toBe(30);
  });

  it('gives nothing for unlisted platforms', () => {
    expect(scoreMatch(createMatch({ platform: 'other', artist: 'Nobody' }), 'Jay', 'Sunny Day', PLATFORMS)).toBe(
      100,
    );
  });
});

describe('findBestMatch', () => {
  it('picks the highest score', () => {
    const partial = createMatch({ id: 'a', title: 'Sunny Day (Live)' });
    const exact = createMatch({ id: 'b', platform: 'kuwo' });

    const best = findBestMatch([partial, exact], 'Jay', 'Sunny Day', PLATFORMS);

    expect(best?.match.id).toBe('b');
    expect(best?.score).toBe(139);
  });

  it('keeps the first candidate on ties', () => {
    const best = findBestMatch(
      [createMatch({ id: 'first' }), createMatch({ id: 'second' })],
      'Jay',
      'Sunny Day',
      PLATFORMS,
    );
    expect(best?.match.id).toBe('first');
  });

  it('returns null below the minimum score', () => {
    const weak = createMatch({ title: 'Unrelated', artist: 'Someone', platform: 'netease' });
    expect(scoreMatch(weak, 'Jay', 'Sunny Day', PLATFORMS)).toBeLessThan(MIN_MATCH_SCORE);
    expect(findBestMatch([weak], 'Jay', 'Sunny Day', PLATFORMS)).toBeNull();
  });

  it('returns null for no candidates', () => {
    expect(findBestMatch([], 'Jay', 'Sunny Day', PLATFORMS)).toBeNull();
  });
});

// ─── Response Parsing ────────────────────────────────────────────────────────

describe('parseSearchResponse', () => {
  it('maps aggregator fields onto matches', () => {
    const matches = parseSearchResponse(
      searchBody([
        {
          id: 186016,
          name: 'Sunny Day',
          artist: 'Jay',
          album: 'Fantasy',
          platform: 'netease',
          lrc: 'https://lyrics.test/186016',
          pic: 'https://covers.test/186016',
        },
      ]),
    );

    expect(matches).toEqual([
      {
        id: '186016',
        title: 'Sunny Day',
        artist: 'Jay',
        album: 'Fantasy',
        platform: 'netease',
        lyricsUrl: 'https://lyrics.test/186016',
        coverUrl: 'https://covers.test/186016',
      },
    ]);
  });

  it('fills missing fields with empty strings and skips non-objects', () => {
    const matches = parseSearchResponse(searchBody([{ name: 'Only Title' }, 'junk', null]));
    expect(matches).toEqual([
      { id: '', title: 'Only Title', artist: '', album: '', platform: '', lyricsUrl: '', coverUrl: '' },
    ]);
  });

  it('returns nothing for error codes or malformed bodies', () => {
    expect(parseSearchResponse({ code: 500, data: { results: [{ name: 'x' }] } })).toEqual([]);
    expect(parseSearchResponse({ code: 200, data: {} })).toEqual([]);
    expect(parseSearchResponse(null)).toEqual([]);
    expect(parseSearchResponse('not json')).toEqual([]);
  });
});

// ─── Provider ────────────────────────────────────────────────────────────────

describe('TuneHubProvider', () => {
  let http: ProviderHttpClient;
  let provider: TuneHubProvider;

  beforeEach(() => {
    http = new ProviderHttpClient({ provider: 'tunehub', timeoutMs: 1000, maxRetries: 0, requestIntervalMs: 0 });
    provider = new TuneHubProvider({ baseUrl: 'https://hub.test', platforms: PLATFORMS }, http);
  });

  describe('searchTrack', () => {
    it('queries the aggregate search and returns the best match', async () => {
      const getJson = vi.spyOn(http, 'getJson').mockResolvedValue(
        searchBody([
          { id: 1, name: 'Sunny Day (Live)', artist: 'Jay', platform: 'netease' },
          { id: 2, name: 'Sunny Day', artist: 'Jay', platform: 'kuwo', lrc: 'https://l.test/2', pic: 'https://p.test/2' },
        ]),
      );

      const match = await provider.searchTrack({ artist: 'Jay', album: 'Fantasy', title: 'Sunny Day' });

      expect(getJson).toHaveBeenCalledWith('https://hub.test/api/', {
        type: 'aggregateSearch',
        keyword: 'Jay Sunny Day',
      });
      expect(match?.id).toBe('2');
      expect(match?.lyricsUrl).toBe('https://l.test/2');
    });

    it('searches by title alone when the artist is unknown', async () => {
      const getJson = vi.spyOn(http, 'getJson').mockResolvedValue(searchBody([]));

      await provider.searchTrack({ artist: '', album: '', title: 'Sunny Day' });

      expect(getJson).toHaveBeenCalledWith('https://hub.test/api/', {
        type: 'aggregateSearch',
        keyword: 'Sunny Day',
      });
    });

    it('returns null when nothing scores well enough', async () => {
      vi.spyOn(http, 'getJson').mockResolvedValue(
        searchBody([{ id: 1, name: 'Different', artist: 'Someone', platform: 'netease' }]),
      );

      expect(await provider.searchTrack({ artist: 'Jay', album: '', title: 'Sunny Day' })).toBeNull();
    });

    it('returns null for a not-found response', async () => {
      vi.spyOn(http, 'getJson').mockResolvedValue(null);
      expect(await provider.searchTrack({ artist: 'Jay', album: '', title: 'Sunny Day' })).toBeNull();
    });

    it('does not query with an empty keyword', async () => {
      const getJson = vi.spyOn(http, 'getJson');
      expect(await provider.searchTrack({ artist: '', album: '', title: ' ' })).toBeNull();
      expect(getJson).not.toHaveBeenCalled();
    });

    it('propagates transport failures', async () => {
      vi.spyOn(http, 'getJson').mockRejectedValue(new ProviderError('down', { provider: 'tunehub' }));
      await expect(provider.searchTrack({ artist: 'Jay', album: '', title: 'Sunny Day' })).rejects.toThrow('down');
    });
  });

  describe('fetchLyrics', () => {
    it('downloads the lyrics URL verbatim', async () => {
      const getText = vi.spyOn(http, 'getText').mockResolvedValue('[00:01.00]Line one\n[00:02.00]Line two');

      expect(await provider.fetchLyrics(createMatch())).toBe('[00:01.00]Line one\n[00:02.00]Line two');
      expect(getText).toHaveBeenCalledWith('https://lyrics.test/1');
    });

    it('rejects empty and JSON error bodies', async () => {
      vi.spyOn(http, 'getText').mockResolvedValueOnce('').mockResolvedValueOnce('{"code":404}');

      expect(await provider.fetchLyrics(createMatch())).toBeNull();
      expect(await provider.fetchLyrics(createMatch())).toBeNull();
    });

    it('returns null without a lyrics URL', async () => {
      const getText = vi.spyOn(http, 'getText');
      expect(await provider.fetchLyrics(createMatch({ lyricsUrl: '' }))).toBeNull();
      expect(getText).not.toHaveBeenCalled();
    });
  });

  describe('fetchCover', () => {
    it('returns image bytes', async () => {
      const bytes = Buffer.from([0xff, 0xd8, 0xff]);
      vi.spyOn(http, 'getBinary').mockResolvedValue({ data: bytes, contentType: 'image/jpeg' });

      expect(await provider.fetchCover(createMatch())).toBe(bytes);
    });

    it('accepts large untyped bodies', async () => {
      const bytes = Buffer.alloc(1001);
      vi.spyOn(http, 'getBinary').mockResolvedValue({ data: bytes, contentType: 'application/octet-stream' });

      expect(await provider.fetchCover(createMatch())).toBe(bytes);
    });

    it('rejects small untyped bodies', async () => {
      vi.spyOn(http, 'getBinary').mockResolvedValue({ data: Buffer.from('nope'), contentType: 'text/html' });
      expect(await provider.fetchCover(createMatch())).toBeNull();
    });

    it('returns null when the cover is missing', async () => {
      vi.spyOn(http, 'getBinary').mockResolvedValue(null);
      expect(await provider.fetchCover(createMatch())).toBeNull();
      expect(await provider.fetchCover(createMatch({ coverUrl: '' }))).toBeNull();
    });
  });
});
