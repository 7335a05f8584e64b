/**
 * LrcApi Provider
 *
 * Self-hosted lyrics/cover service. It has no search endpoint: lyrics and
 * covers are looked up directly by title/artist/album, so `searchTrack` returns
 * a synthetic match carrying the query for the fetches that follow.
 *
 * Endpoints:
 * - GET {base}/lyrics?title&artist          → LRC text
 * - GET {base}/cover?title&album&artist     → image bytes
 *
 * The optional authorization key is sent as the `Authorization` header by the
 * client this provider is given.
 */

import type { ProviderName, TrackIdentity } from '../../shared/types';
import type { ProviderGateway, ProviderMatch } from './providerGateway';
import { isAcceptableCover, isUsableLyricsText } from './providerGateway';
import { ProviderHttpClient, QueryParams } from './httpClient';
import { Logger } from './logger';

export interface LrcApiOptions {
  /** Service base URL, without trailing slash */
  baseUrl: string;
}

export const LRCAPI_PLATFORM = 'lrcapi';

/**
 * Builds query parameters, leaving out empty values.
 */
export function buildQuery(fields: Array<[string, string]>): QueryParams {
  const params: QueryParams = {};
  for (const [key, value] of fields) {
    if (value) params[key] = value;
  }
  return params;
}

/**
 * LRC content must carry at least one `[` tag.
 */
export function isLrcContent(text: string | null): text is string {
  return isUsableLyricsText(text) && text.includes('[');
}

export class LrcApiProvider implements ProviderGateway {
  readonly name: ProviderName = 'lrcapi';

  private readonly options: LrcApiOptions;
  private readonly http: ProviderHttpClient;
  private readonly logger: Logger | undefined;

  constructor(options: LrcApiOptions, http: ProviderHttpClient, logger?: Logger) {
    this.options = options;
    this.http = http;
    this.logger = logger;
  }

  searchTrack(identity: TrackIdentity): Promise<ProviderMatch | null> {
    if (!identity.title) return Promise.resolve(null);

    this.logger?.debug(`LrcApi lookup: ${identity.artist} - ${identity.title}`, { step: 'searching' });
    return Promise.resolve({
      id: `${identity.artist}_${identity.title}_${identity.album}`,
      title: identity.title,
      artist: identity.artist,
      album: identity.album,
      platform: LRCAPI_PLATFORM,
      lyricsUrl: '',
      coverUrl: '',
    });
  }

  async fetchLyrics(match: ProviderMatch): Promise<string | null> {
    const text = await this.http.getText(
      `${this.options.baseUrl}/lyrics`,
      buildQuery([
        ['title', match.title],
        ['artist', match.artist],
      ]),
    );

    if (isLrcContent(text)) return text;
    if (text !== null) {
      this.logger?.debug(`LrcApi returned non-LRC lyrics for ${match.title}`, { step: 'fetching' });
    }
    return null;
  }

  async fetchCover(match: ProviderMatch): Promise<Buffer | null> {
    const response = await this.http.getBinary(
      `${this.options.baseUrl}/cover`,
      buildQuery([
        ['title', match.title],
        ['album', match.album],
        ['artist', match.artist],
      ]),
    );
    if (response === null) return null;

    if (isAcceptableCover(response.data, response.contentType)) return response.data;
    this.logger?.debug(`LrcApi returned non-image cover content for ${match.title}`, { step: 'fetching' });
    return null;
  }
}
