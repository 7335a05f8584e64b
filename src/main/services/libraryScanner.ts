/**
 * Library Scanner
 *
 * One scan = walk every library root, classify what was found, and hand the
 * candidates to the reconciliation engine. `runForever` repeats scans on the
 * configured interval until aborted.
 */

import type { AppSettings, ScanSummary, TrackCandidate, TrackResult } from '../../shared/types';
import { walkLibrary } from '../utils/fileScanner';
import { classifyPath } from './pathClassifier';
import { ReconciliationEngine, createEmptySummary } from './reconciliationEngine';
import type { ProviderGateway } from './providerGateway';
import { Logger } from './logger';

// ─── Interfaces ──────────────────────────────────────────────────────────────

export interface LibraryScannerOptions {
  settings: AppSettings;
  provider: ProviderGateway;
  logger?: Logger;
  /** Callback for individual track completion */
  onTrackComplete?: (result: TrackResult) => void;
  /** Callback after every completed scan */
  onScanComplete?: (summary: ScanSummary) => void;
}

/** Candidates found under the library roots, plus how many entries were left out */
export interface CollectedCandidates {
  candidates: TrackCandidate[];
  /** Entries that could not be inspected */
  unreadable: number;
}

const MS_PER_DAY = 24 * 60 * 60 * 1000;

/** Longest delay a single Node.js timer accepts (2^31 - 1 ms, about 24.8 days) */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

/**
 * Resolves after `ms`, or early (without rejecting) once `signal` aborts.
 * Delays beyond MAX_TIMER_DELAY_MS are waited out in consecutive timers.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise<void>((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }

    let remaining = Math.max(0, ms);
    let timer: NodeJS.Timeout | null = null;

    const finish = (): void => {
      if (timer !== null) clearTimeout(timer);
      signal?.removeEventListener('abort', finish);
      resolve();
    };
    const schedule = (): void => {
      const delay = Math.min(remaining, MAX_TIMER_DELAY_MS);
      remaining -= delay;
      timer = setTimeout(() => {
        if (remaining > 0) {
          schedule();
        } else {
          finish();
        }
      }, delay);
    };

    signal?.addEventListener('abort', finish, { once: true });
    schedule();
  });
}

// ─── Scanner ─────────────────────────────────────────────────────────────────

export class LibraryScanner {
  private readonly settings: AppSettings;
  private readonly logger: Logger | null;
  private readonly engine: ReconciliationEngine;
  private readonly onScanComplete: ((summary: ScanSummary) => void) | null;

  constructor(options: LibraryScannerOptions) {
    this.settings = options.settings;
    this.logger = options.logger ?? null;
    this.onScanComplete = options.onScanComplete ?? null;
    this.engine = new ReconciliationEngine({
      settings: options.settings,
      provider: options.provider,
      logger: options.logger,
      onTrackComplete: options.onTrackComplete,
    });
  }

  /**
   * Walks every library root and classifies the entries. Unreadable entries are
   * logged and left out; other non-track entries are dropped silently.
   */
  async collectCandidates(): Promise<CollectedCandidates> {
    const candidates: TrackCandidate[] = [];
    let unreadable = 0;

    for (const root of this.settings.libraryRoots) {
      const entries = await walkLibrary(root, (error) => {
        unreadable++;
        this.logger?.logPipelineError(error, 'WARN');
      });

      for (const entry of entries) {
        const classified = await classifyPath(entry, root);
        if (classified.outcome === 'candidate') {
          candidates.push(classified.candidate);
        } else if (classified.error) {
          unreadable++;
          this.logger?.logPipelineError(classified.error, 'WARN');
        }
      }
    }

    return { candidates, unreadable };
  }

  /**
   * Performs a single scan pass.
   *
   * @param signal - Cancels the pass at track boundaries
   */
  async runOnce(signal?: AbortSignal): Promise<ScanSummary> {
    this.logger?.info(`Scanning ${this.settings.libraryRoots.join(', ')}`);

    const { candidates, unreadable } = await this.collectCandidates();
    this.logger?.info(
      `Found ${candidates.length} tracks` + (unreadable > 0 ? ` (${unreadable} unreadable entries skipped)` : ''),
    );

    const summary = candidates.length > 0
      ? (await this.engine.run(candidates, signal)).summary
      : createEmptySummary();

    this.onScanComplete?.(summary);
    return summary;
  }

  /**
   * Scans, then sleeps for the configured interval and scans again, until
   * `signal` aborts. With an interval of 0 a single scan is performed.
   *
   * @returns The summary of every completed scan
   */
  async runForever(signal?: AbortSignal): Promise<ScanSummary[]> {
    const summaries: ScanSummary[] = [];
    const intervalMs = this.settings.scanIntervalDays * MS_PER_DAY;

    for (;;) {
      summaries.push(await this.runOnce(signal));

      if (intervalMs <= 0 || signal?.aborted) break;

      this.logger?.info(`Next scan in ${this.settings.scanIntervalDays} day(s)`);
      await sleep(intervalMs, signal);
      if (signal?.aborted) break;
    }

    return summaries;
  }
}
