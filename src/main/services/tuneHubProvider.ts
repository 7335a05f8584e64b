/**
 * TuneHub Provider
 *
 * Aggregator that searches several music platforms at once. One search returns
 * candidates from every platform, each with direct lyrics and cover URLs; the
 * best candidate is picked by title/artist similarity and platform priority.
 *
 * Search: GET {base}/api/?type=aggregateSearch&keyword="<artist> <title>"
 * Response: { code: 200, data: { results: [{ id, name, artist, album, platform, lrc, pic }] } }
 */

import type { ProviderName, TrackIdentity } from '../../shared/types';
import type { ProviderGateway, ProviderMatch } from './providerGateway';
import { isAcceptableCover, isUsableLyricsText } from './providerGateway';
import { ProviderHttpClient } from './httpClient';
import { Logger } from './logger';

// ─── Types ───────────────────────────────────────────────────────────────────

export interface TuneHubOptions {
  /** Aggregator base URL, without trailing slash */
  baseUrl: string;
  /** Platform priority, highest first */
  platforms: string[];
}

/** A scored search candidate */
export interface ScoredMatch {
  match: ProviderMatch;
  score: number;
}

// ─── Scoring ─────────────────────────────────────────────────────────────────

/** Candidates scoring below this are not considered a match */
export const MIN_MATCH_SCORE = 30;

const SCORE_EXACT_TITLE = 100;
const SCORE_PARTIAL_TITLE = 50;
const SCORE_ARTIST = 30;
const PLATFORM_PRIORITY_BASE = 10;

/**
 * Scores one candidate against the query:
 * - exact title (case-insensitive): +100, else title contained in the name: +50
 * - either artist string contains the other: +30
 * - platform priority: +(10 - index) for listed platforms
 */
export function scoreMatch(
  match: ProviderMatch,
  artist: string,
  title: string,
  platforms: readonly string[],
): number {
  const artistLower = artist.toLowerCase();
  const titleLower = title.toLowerCase();
  const matchArtist = match.artist.toLowerCase();
  const matchTitle = match.title.toLowerCase();

  let score = 0;

  if (matchTitle === titleLower) {
    score += SCORE_EXACT_TITLE;
  } else if (matchTitle.includes(titleLower)) {
    score += SCORE_PARTIAL_TITLE;
  }

  if (matchArtist.includes(artistLower) || artistLower.includes(matchArtist)) {
    score += SCORE_ARTIST;
  }

  const platformIndex = platforms.indexOf(match.platform);
  if (platformIndex >= 0) {
    score += PLATFORM_PRIORITY_BASE - platformIndex;
  }

  return score;
}

/**
 * Picks the highest-scoring candidate. Ties keep the order the aggregator
 * returned. Returns null when no candidate reaches MIN_MATCH_SCORE.
 */
export function findBestMatch(
  candidates: readonly ProviderMatch[],
  artist: string,
  title: string,
  platforms: readonly string[],
): ScoredMatch | null {
  let best: ScoredMatch | null = null;

  for (const match of candidates) {
    const score = scoreMatch(match, artist, title, platforms);
    if (best === null || score > best.score) {
      best = { match, score };
    }
  }

  if (best === null || best.score < MIN_MATCH_SCORE) return null;
  return best;
}

// ─── Response Parsing ────────────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readString(record: Record<string, unknown>, key: string): string {
  const value = record[key];
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  return '';
}

/**
 * Extracts the candidate list from an aggregate search response. Any response
 * without `code: 200` and a results array yields no candidates.
 */
export function parseSearchResponse(body: unknown): ProviderMatch[] {
  if (!isRecord(body) || body.code !== 200) return [];
  const data = body.data;
  if (!isRecord(data) || !Array.isArray(data.results)) return [];

  const matches: ProviderMatch[] = [];
  for (const entry of data.results) {
    if (!isRecord(entry)) continue;
    matches.push({
      id: readString(entry, 'id'),
      title: readString(entry, 'name'),
      artist: readString(entry, 'artist'),
      album: readString(entry, 'album'),
      platform: readString(entry, 'platform'),
      lyricsUrl: readString(entry, 'lrc'),
      coverUrl: readString(entry, 'pic'),
    });
  }
  return matches;
}

// ─── Provider ────────────────────────────────────────────────────────────────

export class TuneHubProvider implements ProviderGateway {
  readonly name: ProviderName = 'tunehub';

  private readonly options: TuneHubOptions;
  private readonly http: ProviderHttpClient;
  private readonly logger: Logger | undefined;

  constructor(options: TuneHubOptions, http: ProviderHttpClient, logger?: Logger) {
    this.options = options;
    this.http = http;
    this.logger = logger;
  }

  async searchTrack(identity: TrackIdentity): Promise<ProviderMatch | null> {
    const keyword = `${identity.artist} ${identity.title}`.trim();
    if (!keyword) return null;

    this.logger?.debug(`TuneHub search: ${keyword}`, { step: 'searching' });
    const body = await this.http.getJson(`${this.options.baseUrl}/api/`, {
      type: 'aggregateSearch',
      keyword,
    });

    const candidates = parseSearchResponse(body);
    const best = findBestMatch(candidates, identity.artist, identity.title, this.options.platforms);
    if (best === null) {
      this.logger?.debug(
        `TuneHub: no candidate of ${candidates.length} reached score ${MIN_MATCH_SCORE} for "${keyword}"`,
        { step: 'searching' },
      );
      return null;
    }

    this.logger?.debug(
      `TuneHub match: ${best.match.artist} - ${best.match.title} [${best.match.platform}] score ${best.score}`,
      { step: 'searching' },
    );
    return best.match;
  }

  async fetchLyrics(match: ProviderMatch): Promise<string | null> {
    if (!match.lyricsUrl) return null;
    const text = await this.http.getText(match.lyricsUrl);
    return isUsableLyricsText(text) ? text : null;
  }

  async fetchCover(match: ProviderMatch): Promise<Buffer | null> {
    if (!match.coverUrl) return null;
    const response = await this.http.getBinary(match.coverUrl);
    if (response === null) return null;
    return isAcceptableCover(response.data, response.contentType) ? response.data : null;
  }
}
