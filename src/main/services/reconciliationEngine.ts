/**
 * Reconciliation Engine with Concurrency Control
 *
 * Brings every track's sidecars and embedded tags in line with what the
 * configuration asks for, touching the network only for what is missing.
 *
 * Per track: read tags → resolve identity → inspect existing state → plan →
 * (cover from album scope) → search → fetch → write sidecars → write tags.
 *
 * Key design decisions:
 * - Bounded worker pool (1-10 workers) pulling from a shared queue
 * - Per-track error isolation: no track's failure aborts the run
 * - One AlbumCoverScope per run, so siblings share a single cover fetch
 * - Cancellation via AbortSignal, honoured between tracks only
 * - Sidecars are written atomically; tags are written only after every
 *   requested sidecar write for the track succeeded
 * - A failed lyrics write does not stop the cover write, since siblings
 *   rely on the cover owner to write cover.jpg
 */

import * as path from 'path';
import {
  AppSettings,
  EmbeddedTags,
  FetchOutcome,
  FetchPlan,
  FetchResult,
  ScanSummary,
  TrackCandidate,
  TrackIdentity,
  TrackResult,
} from '../../shared/types';
import { readEmbeddedTags } from './audioReader';
import { describeIdentity, resolveIdentity } from './identityResolver';
import {
  computeFetchPlan,
  getCoverSidecarPath,
  getLyricsSidecarPath,
  inspectExistingState,
  isPlanEmpty,
} from './existingStateInspector';
import type { ProviderGateway, ProviderMatch } from './providerGateway';
import { AlbumCoverScope } from './albumCoverScope';
import { detectImageMimeType, writeTags, WriteTagsInput } from './tagWriter';
import { writeFileAtomic } from '../utils/fileScanner';
import { Logger } from './logger';
import { PipelineError, WriteError, wrapError } from './errors';

// ─── Interfaces ──────────────────────────────────────────────────────────────

export interface ReconciliationEngineOptions {
  /** Application settings */
  settings: AppSettings;
  /** Provider used for search and fetches */
  provider: ProviderGateway;
  /** Logger instance for structured logging */
  logger?: Logger;
  /** Callback for individual track completion */
  onTrackComplete?: (result: TrackResult) => void;
}

/** Results of one run, in candidate order */
export interface RunReport {
  results: TrackResult[];
  summary: ScanSummary;
}

/** Result of a track's search, errors included */
interface SearchOutcome {
  match: ProviderMatch | null;
  error: PipelineError | null;
}

// ─── Helpers ─────────────────────────────────────────────────────────────────

/**
 * Runs a search at most once per track, and only if something asks for it.
 */
class LazySearch {
  private pending: Promise<SearchOutcome> | null = null;
  private readonly run: () => Promise<SearchOutcome>;

  constructor(run: () => Promise<SearchOutcome>) {
    this.run = run;
  }

  get started(): boolean {
    return this.pending !== null;
  }

  get(): Promise<SearchOutcome> {
    if (this.pending === null) {
      this.pending = this.run();
    }
    return this.pending;
  }
}

/** An all-zero summary */
export function createEmptySummary(): ScanSummary {
  return {
    processed: 0,
    skipped: 0,
    matched: 0,
    unmatched: 0,
    failed: 0,
    lyricsWritten: 0,
    coversWritten: 0,
    tagsUpdated: 0,
    cancelled: 0,
  };
}

/**
 * Whether a result went through the Matched state (a search hit, or a cover
 * served from the album scope).
 */
export function wasMatched(result: TrackResult): boolean {
  return result.status === 'done' || result.status === 'write_failed';
}

/**
 * Folds one track result into a summary.
 */
export function addToSummary(summary: ScanSummary, result: TrackResult): void {
  summary.processed++;
  switch (result.status) {
    case 'skipped':
      summary.skipped++;
      break;
    case 'unmatched':
      summary.unmatched++;
      break;
    case 'write_failed':
    case 'error':
      summary.failed++;
      break;
    default:
      break;
  }
  if (wasMatched(result)) summary.matched++;
  if (result.lyricsWritten) summary.lyricsWritten++;
  if (result.coverWritten) summary.coversWritten++;
  if (result.tagsUpdated) summary.tagsUpdated++;
}

/**
 * Classifies the fetch phase by how many requested fields arrived.
 */
export function classifyFetchOutcome(requested: number, obtained: number): FetchOutcome {
  if (obtained >= requested) return 'fetched';
  if (obtained > 0) return 'partial_fetch';
  return 'fetch_failed';
}

// ─── Reconciliation Engine ───────────────────────────────────────────────────

export class ReconciliationEngine {
  private readonly concurrency: number;
  private readonly settings: AppSettings;
  private readonly provider: ProviderGateway;
  private readonly logger: Logger | null;
  private readonly onTrackComplete: ((result: TrackResult) => void) | null;

  constructor(options: ReconciliationEngineOptions) {
    this.settings = options.settings;
    this.concurrency = Math.max(1, Math.min(10, options.settings.concurrency));
    this.provider = options.provider;
    this.logger = options.logger ?? null;
    this.onTrackComplete = options.onTrackComplete ?? null;
  }

  /**
   * Processes candidates with bounded concurrency. Once `signal` aborts, no new
   * track is started; tracks already in progress finish.
   *
   * @param candidates - Classified tracks, in the order they should be started
   * @param signal - Cancels the run at track boundaries
   */
  async run(candidates: readonly TrackCandidate[], signal?: AbortSignal): Promise<RunReport> {
    const summary = createEmptySummary();
    if (candidates.length === 0) {
      return { results: [], summary };
    }

    const startTime = Date.now();
    const coverScope = new AlbumCoverScope();
    const resultMap = new Map<number, TrackResult>();

    this.logger?.info(
      `Starting reconciliation: ${candidates.length} tracks, concurrency: ${this.concurrency}`,
    );

    let trackIndex = 0;
    const processNext = async (): Promise<void> => {
      while (trackIndex < candidates.length) {
        if (signal?.aborted) {
          break;
        }

        const currentIndex = trackIndex++;
        const candidate = candidates[currentIndex];

        const result = await this.processTrack(candidate, coverScope);
        resultMap.set(currentIndex, result);
        addToSummary(summary, result);
        this.onTrackComplete?.(result);
      }
    };

    // Launch concurrent workers
    const workers: Promise<void>[] = [];
    for (let i = 0; i < Math.min(this.concurrency, candidates.length); i++) {
      workers.push(processNext());
    }

    await Promise.all(workers);

    const results: TrackResult[] = [];
    for (let i = 0; i < candidates.length; i++) {
      const result = resultMap.get(i);
      if (result) results.push(result);
    }
    summary.cancelled = candidates.length - results.length;

    const elapsed = Date.now() - startTime;
    this.logger?.info(
      `Reconciliation complete: ${summary.processed} processed, ${summary.skipped} skipped, ` +
        `${summary.matched} matched, ${summary.unmatched} unmatched, ${summary.failed} failed` +
        (summary.cancelled > 0 ? `, ${summary.cancelled} cancelled` : '') +
        ` in ${(elapsed / 1000).toFixed(1)}s`,
    );

    return { results, summary };
  }

  /**
   * Processes a single track through the full state machine. Never throws:
   * every failure ends in a terminal status on the returned result.
   *
   * @param candidate - Track to reconcile
   * @param coverScope - Album cover cache shared by the current run
   */
  async processTrack(candidate: TrackCandidate, coverScope: AlbumCoverScope): Promise<TrackResult> {
    const filePath = candidate.absolutePath;
    const result = this.createResult(candidate);

    try {
      // Step 1: Identity
      const tags = await this.readTags(candidate);
      const resolved = resolveIdentity(candidate, tags, this.settings);
      if (resolved.ambiguity) {
        this.logger?.logPipelineError(resolved.ambiguity, 'WARN');
      }
      result.identity = resolved.identity;
      result.status = 'identity_resolved';
      this.logger?.debug(`Identity: ${describeIdentity(resolved)}`, { filePath, step: 'resolving_identity' });

      // Step 2: Plan
      const state = await inspectExistingState(candidate, tags, resolved.identity);
      const plan = computeFetchPlan(candidate, state, this.settings);
      result.plan = plan;
      result.status = 'plan_computed';

      if (isPlanEmpty(plan)) {
        result.status = 'skipped';
        this.logger?.debug('Nothing to fetch', { filePath, step: 'planning' });
        return result;
      }

      // Step 3: Cover from the album scope, then search
      result.status = 'searching';
      const identity = resolved.identity;
      const search = new LazySearch(() => this.search(candidate, identity));
      const fetched: FetchResult = {};
      let coverOwner = false;
      let coverRequested = false;

      if (plan.needCover) {
        coverRequested = true;
        const claim = await coverScope.claim(path.dirname(filePath), async () => {
          const { match } = await search.get();
          if (match === null) return { bytes: null, attempted: false };
          return { bytes: await this.fetchCover(match, filePath), attempted: true };
        });
        coverOwner = claim.owner;
        if (claim.bytes) fetched.coverBytes = claim.bytes;
      }

      let match: ProviderMatch | null = null;
      if (search.started || plan.needLyrics || plan.updateBasicInfo) {
        const outcome = await search.get();
        match = outcome.match;
        if (match === null) {
          result.status = 'unmatched';
          if (outcome.error) result.error = outcome.error.message;
          this.logger?.info(`No match: ${identity.artist} - ${identity.title}`, {
            filePath,
            step: 'searching',
          });
          return result;
        }
        fetched.matchedTitle = match.title;
        fetched.matchedArtist = match.artist;
        fetched.matchedAlbum = match.album;
      }

      // Step 4: Fetch
      result.status = 'fetching';
      if (plan.needLyrics && match !== null) {
        const lyrics = await this.fetchLyrics(match, filePath);
        if (lyrics !== null) fetched.lyricsText = lyrics;
      }

      const requested = (plan.needLyrics ? 1 : 0) + (coverRequested ? 1 : 0);
      const obtained =
        (fetched.lyricsText !== undefined ? 1 : 0) + (fetched.coverBytes !== undefined ? 1 : 0);
      result.fetchOutcome = classifyFetchOutcome(requested, obtained);

      // Step 5: Write
      result.status = 'writing';
      const writeError = await this.writeResults(candidate, plan, fetched, coverOwner, result, {
        tags,
        identity,
      });
      if (writeError) {
        this.logger?.logPipelineError(writeError);
        result.status = 'write_failed';
        result.error = writeError.message;
        result.failedStep = writeError.step;
        return result;
      }

      result.status = 'done';
      this.logger?.info(
        `Reconciled: ${identity.artist} - ${identity.title} (${result.fetchOutcome})`,
        { filePath, step: 'writing' },
      );
      return result;
    } catch (error: unknown) {
      const wrapped = wrapError(error, 'WriteError', { filePath, step: result.status });
      this.logger?.logPipelineError(wrapped);
      result.status = 'error';
      result.error = wrapped.message;
      result.failedStep = wrapped.step;
      return result;
    }
  }

  // ─── Pipeline Steps ──────────────────────────────────────────────────

  private createResult(candidate: TrackCandidate): TrackResult {
    return {
      filePath: candidate.absolutePath,
      kind: candidate.kind,
      status: 'pending',
      identity: null,
      plan: null,
      fetchOutcome: null,
      lyricsWritten: false,
      coverWritten: false,
      tagsUpdated: false,
      error: null,
    };
  }

  /**
   * Reads embedded tags for audio files. Unreadable tags are logged and
   * treated as absent.
   */
  private async readTags(candidate: TrackCandidate): Promise<EmbeddedTags | null> {
    switch (candidate.kind) {
      case 'strmFile':
        return null;
      case 'audioFile':
        try {
          return await readEmbeddedTags(candidate.absolutePath);
        } catch (error: unknown) {
          this.logger?.logPipelineError(
            wrapError(error, 'ClassificationError', {
              filePath: candidate.absolutePath,
              step: 'reading_tags',
            }),
            'WARN',
          );
          return null;
        }
      default: {
        const _exhaustive: never = candidate.kind;
        throw new Error(`Unknown track kind: ${String(_exhaustive)}`);
      }
    }
  }

  /**
   * Searches the provider. A provider failure counts as no match.
   */
  private async search(
    candidate: TrackCandidate,
    identity: TrackIdentity,
  ): Promise<SearchOutcome> {
    try {
      return { match: await this.provider.searchTrack(identity), error: null };
    } catch (error: unknown) {
      const wrapped = wrapError(error, 'ProviderError', {
        filePath: candidate.absolutePath,
        step: 'searching',
      });
      this.logger?.logPipelineError(wrapped, 'WARN');
      return { match: null, error: wrapped };
    }
  }

  /**
   * Fetches lyrics. A provider failure counts as absent.
   */
  private async fetchLyrics(match: ProviderMatch, filePath: string): Promise<string | null> {
    try {
      return await this.provider.fetchLyrics(match);
    } catch (error: unknown) {
      this.logger?.logPipelineError(
        wrapError(error, 'ProviderError', { filePath, step: 'fetching_lyrics' }),
        'WARN',
      );
      return null;
    }
  }

  /**
   * Fetches the cover. A provider failure counts as absent.
   */
  private async fetchCover(match: ProviderMatch, filePath: string): Promise<Buffer | null> {
    try {
      return await this.provider.fetchCover(match);
    } catch (error: unknown) {
      this.logger?.logPipelineError(
        wrapError(error, 'ProviderError', { filePath, step: 'fetching_cover' }),
        'WARN',
      );
      return null;
    }
  }

  /**
   * Writes sidecars, then tags. Both sidecars are attempted; the first failure
   * is returned and tags are not touched unless every sidecar write succeeded.
   */
  private async writeResults(
    candidate: TrackCandidate,
    plan: FetchPlan,
    fetched: FetchResult,
    coverOwner: boolean,
    result: TrackResult,
    current: { tags: EmbeddedTags | null; identity: TrackIdentity },
  ): Promise<WriteError | null> {
    const filePath = candidate.absolutePath;
    let sidecarError: WriteError | null = null;

    // Sidecars
    if (plan.writeLyricsSidecar && fetched.lyricsText !== undefined) {
      const lyricsPath = getLyricsSidecarPath(filePath);
      try {
        await writeFileAtomic(lyricsPath, fetched.lyricsText);
        result.lyricsWritten = true;
      } catch (error: unknown) {
        sidecarError = new WriteError(`Failed to write lyrics sidecar: ${errorMessage(error)}`, {
          filePath: lyricsPath,
          step: 'writing_lyrics',
          cause: error instanceof Error ? error : undefined,
        });
      }
    }

    // Only the track that fetched the directory's cover writes cover.jpg
    if (plan.writeCoverSidecar && coverOwner && fetched.coverBytes !== undefined) {
      const coverPath = getCoverSidecarPath(filePath);
      try {
        await writeFileAtomic(coverPath, fetched.coverBytes);
        result.coverWritten = true;
      } catch (error: unknown) {
        const coverError = new WriteError(`Failed to write cover sidecar: ${errorMessage(error)}`, {
          filePath: coverPath,
          step: 'writing_cover',
          cause: error instanceof Error ? error : undefined,
        });
        if (sidecarError) {
          this.logger?.logPipelineError(coverError);
        } else {
          sidecarError = coverError;
        }
      }
    }

    if (sidecarError) {
      return sidecarError;
    }

    // Embedded tags
    const input: WriteTagsInput = {};
    if (plan.embedLyrics && fetched.lyricsText !== undefined) {
      input.lyrics = fetched.lyricsText;
    }
    if (plan.embedCover && fetched.coverBytes !== undefined) {
      input.albumArt = {
        data: fetched.coverBytes,
        mimeType: detectImageMimeType(fetched.coverBytes),
      };
    }
    if (plan.updateBasicInfo) {
      Object.assign(input, basicInfoChanges(fetched, current.tags, current.identity));
    }

    if (Object.keys(input).length === 0) {
      return null;
    }

    const tagResult = await writeTags(filePath, input);
    if (!tagResult.success) {
      return new WriteError(tagResult.error ?? 'Tag write failed', {
        filePath,
        step: 'writing_tags',
      });
    }
    result.tagsUpdated = true;
    return null;
  }
}

/**
 * Basic fields to write: the matched value, or the resolved identity's when
 * the match left it empty. Values already tagged are left out.
 */
export function basicInfoChanges(
  fetched: FetchResult,
  tags: EmbeddedTags | null,
  identity: TrackIdentity,
): Pick<WriteTagsInput, 'title' | 'artist' | 'album'> {
  const changes: Pick<WriteTagsInput, 'title' | 'artist' | 'album'> = {};
  const candidates = {
    title: fetched.matchedTitle || identity.title,
    artist: fetched.matchedArtist || identity.artist,
    album: fetched.matchedAlbum || identity.album,
  };
  for (const field of ['title', 'artist', 'album'] as const) {
    const value = candidates[field];
    if (value && value !== tags?.[field]) changes[field] = value;
  }
  return changes;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
