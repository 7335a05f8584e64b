/**
 * Shared type definitions for the music sidecar pipeline.
 * These interfaces are used by every service under src/main.
 */

/** Audio containers whose files are treated as tracks */
export type AudioFormat = 'mp3' | 'flac' | 'm4a' | 'mp4' | 'wav' | 'ogg' | 'wma' | 'ape';

/** Supported audio file extensions (with dot prefix) */
export const SUPPORTED_EXTENSIONS: readonly string[] = [
  '.mp3',
  '.flac',
  '.m4a',
  '.mp4',
  '.wav',
  '.ogg',
  '.wma',
  '.ape',
] as const;

/** Extension of plain-text pointer files that reference remotely streamed audio */
export const STRM_EXTENSION = '.strm';

/** Sidecar cover filename, one per album directory */
export const COVER_FILENAME = 'cover.jpg';

/** Sidecar lyrics extension, stored beside the track with the same stem */
export const LYRICS_EXTENSION = '.lrc';

/** Kind of a classified library entry */
export type TrackKind = 'audioFile' | 'strmFile';

/** A library entry that should be processed as a track */
export interface TrackCandidate {
  /** Absolute path to the track file */
  readonly absolutePath: string;
  /** Whether this is a real audio container or a STRM pointer */
  readonly kind: TrackKind;
  /** Library root this candidate was found under */
  readonly libraryRoot: string;
  /** Ancestor directory names from just below the library root down to the parent */
  readonly folderChain: readonly string[];
  /** Filename without its extension */
  readonly rawFilenameStem: string;
}

/** Canonical identity used to query the provider */
export interface TrackIdentity {
  /** Artist name, empty when no source yields one */
  artist: string;
  /** Album name, may be empty */
  album: string;
  /** Song title, never empty */
  title: string;
}

/** Basic tag fields plus embedded-content presence read from an audio file */
export interface EmbeddedTags {
  title: string | null;
  artist: string | null;
  album: string | null;
  hasLyrics: boolean;
  hasCover: boolean;
}

/** What already exists for a track, derived fresh on every run */
export interface ExistingState {
  hasLyricsSidecar: boolean;
  hasCoverSidecar: boolean;
  hasEmbeddedLyrics: boolean;
  hasEmbeddedCover: boolean;
  hasEmbeddedBasicInfo: boolean;
}

/**
 * Which fetches a track needs and which consumers will use them.
 * `needLyrics` / `needCover` are true iff at least one consumer for that field is.
 */
export interface FetchPlan {
  needLyrics: boolean;
  needCover: boolean;
  writeLyricsSidecar: boolean;
  writeCoverSidecar: boolean;
  embedLyrics: boolean;
  embedCover: boolean;
  updateBasicInfo: boolean;
}

/** What the provider delivered for one track. Absent fields mean "nothing found". */
export interface FetchResult {
  lyricsText?: string;
  coverBytes?: Buffer;
  matchedTitle?: string;
  matchedArtist?: string;
  matchedAlbum?: string;
}

/**
 * Per-track processing states. Terminal: done, skipped, unmatched, write_failed, error.
 * How the fetch phase went is kept separately as a FetchOutcome.
 */
export type ProcessingStatus =
  | 'pending'
  | 'identity_resolved'
  | 'plan_computed'
  | 'skipped'
  | 'searching'
  | 'unmatched'
  | 'fetching'
  | 'writing'
  | 'done'
  | 'write_failed'
  | 'error';

/** Outcome of the fetching phase, kept on the result after the track moves on */
export type FetchOutcome = 'fetched' | 'partial_fetch' | 'fetch_failed';

/** Result of processing a single track */
export interface TrackResult {
  /** Track file path */
  filePath: string;
  /** Track kind */
  kind: TrackKind;
  /** Terminal status */
  status: ProcessingStatus;
  /** Resolved identity (null if resolution never happened) */
  identity: TrackIdentity | null;
  /** Computed plan (null if the track failed before planning) */
  plan: FetchPlan | null;
  /** Outcome of the fetch phase, null when nothing was fetched */
  fetchOutcome: FetchOutcome | null;
  /** Whether a lyrics sidecar was written */
  lyricsWritten: boolean;
  /** Whether this track wrote the album directory's cover sidecar */
  coverWritten: boolean;
  /** Whether embedded tags were updated */
  tagsUpdated: boolean;
  /** Error message for failed or degraded tracks */
  error: string | null;
  /** Step where the error occurred */
  failedStep?: string;
}

/** Counters reported at the end of every scan */
export interface ScanSummary {
  processed: number;
  skipped: number;
  matched: number;
  unmatched: number;
  failed: number;
  lyricsWritten: number;
  coversWritten: number;
  tagsUpdated: number;
  /** Candidates never started because the run was cancelled */
  cancelled: number;
}

/** Metadata provider selection */
export type ProviderName = 'tunehub' | 'lrcapi';

/** Log severity names accepted in configuration */
export type LogLevelSetting = 'ERROR' | 'WARN' | 'INFO' | 'DEBUG';

/** Application settings, loaded once at process start */
export interface AppSettings {
  /** Library root directories */
  libraryRoots: string[];
  /** Which provider implementation to use */
  provider: ProviderName;
  /** Aggregator base URL */
  apiBaseUrl: string;
  /** Aggregator platform priority (highest first) */
  platforms: string[];
  /** Self-hosted provider base URL */
  lrcApiUrl: string;
  /** Self-hosted provider authorization key (empty = none) */
  lrcApiAuth: string;
  /** Write .lrc sidecars */
  downloadLyrics: boolean;
  /** Write cover.jpg sidecars */
  downloadCover: boolean;
  /** Refetch lyrics even when present */
  overwriteLyrics: boolean;
  /** Refetch covers even when present */
  overwriteCover: boolean;
  /** Embed lyrics into audio tags */
  updateLyrics: boolean;
  /** Embed cover into audio tags */
  updateCover: boolean;
  /** Write matched artist/title/album into audio tags */
  updateBasicInfo: boolean;
  /** Infer artist/album from Artist/Album/track layout */
  useFolderStructure: boolean;
  /** Artist used when no other source yields one */
  defaultArtist: string;
  /** Days between scans; 0 = single pass */
  scanIntervalDays: number;
  /** Number of tracks processed concurrently (1-10) */
  concurrency: number;
  /** Per-request timeout in ms */
  requestTimeoutMs: number;
  /** Retries after the first failed provider request */
  maxRetries: number;
  /** Minimum spacing between provider requests in ms */
  requestIntervalMs: number;
  /** Log directory (null = default location) */
  logDir: string | null;
  /** Minimum log level */
  logLevel: LogLevelSetting;
  /** Whether to write daily log files */
  logToFile: boolean;
}

/** Default application settings */
export const DEFAULT_SETTINGS: AppSettings = {
  libraryRoots: ['/music'],
  provider: 'tunehub',
  apiBaseUrl: 'https://music-dl.sayqz.com',
  platforms: ['netease', 'kuwo', 'qq'],
  lrcApiUrl: 'https://api.lrc.cx',
  lrcApiAuth: '',
  downloadLyrics: true,
  downloadCover: true,
  overwriteLyrics: false,
  overwriteCover: false,
  updateLyrics: false,
  updateCover: false,
  updateBasicInfo: false,
  useFolderStructure: true,
  defaultArtist: '',
  scanIntervalDays: 0,
  concurrency: 3,
  requestTimeoutMs: 30_000,
  maxRetries: 2,
  requestIntervalMs: 200,
  logDir: null,
  logLevel: 'INFO',
  logToFile: true,
};
