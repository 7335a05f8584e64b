/**
 * Provider Gateway
 *
 * Common surface over the remote metadata services. The rest of the pipeline
 * only sees `searchTrack` → `fetchLyrics` / `fetchCover`, so providers can be
 * swapped through configuration.
 *
 * Contract:
 * - `searchTrack` returns null when nothing scores well enough
 * - `fetchLyrics` / `fetchCover` return null when the provider has no content
 * - transport failures that outlast the retries surface as ProviderError
 */

import type { ProviderName, TrackIdentity } from '../../shared/types';

// ─── Types ───────────────────────────────────────────────────────────────────

/** A provider's chosen search result */
export interface ProviderMatch {
  /** Provider-side identifier */
  id: string;
  /** Matched song title */
  title: string;
  /** Matched artist */
  artist: string;
  /** Matched album (may be empty) */
  album: string;
  /** Upstream platform the result came from */
  platform: string;
  /** Direct lyrics URL, empty when the provider builds it on fetch */
  lyricsUrl: string;
  /** Direct cover URL, empty when the provider builds it on fetch */
  coverUrl: string;
}

export interface ProviderGateway {
  readonly name: ProviderName;
  searchTrack(identity: TrackIdentity): Promise<ProviderMatch | null>;
  fetchLyrics(match: ProviderMatch): Promise<string | null>;
  fetchCover(match: ProviderMatch): Promise<Buffer | null>;
}

// ─── Content Checks ──────────────────────────────────────────────────────────

/** Covers smaller than this must declare an image content type */
export const MIN_UNTYPED_COVER_BYTES = 1000;

/**
 * Accepts a cover response when the server says it is an image, or when it is
 * large enough to plausibly be one.
 */
export function isAcceptableCover(data: Buffer, contentType: string): boolean {
  return contentType.toLowerCase().includes('image') || data.length > MIN_UNTYPED_COVER_BYTES;
}

/**
 * Rejects empty bodies and JSON error payloads returned with a 200.
 */
export function isUsableLyricsText(text: string | null): text is string {
  return text !== null && text.length > 0 && !text.startsWith('{');
}
