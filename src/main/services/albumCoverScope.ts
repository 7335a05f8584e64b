/**
 * Album Cover Scope
 *
 * Per-run cover cache keyed by absolute album-directory path. The first track
 * of a directory to ask runs the loader; siblings asking while it is in flight
 * await the same promise, and siblings asking later get the settled bytes. At
 * most one cover fetch happens per directory per run.
 *
 * A loader that never reached the cover fetch (its track's search missed or
 * failed) does not settle the directory: the entry is dropped and the next
 * sibling, including any that were waiting, runs its own loader.
 */

import * as path from 'path';

/** What a loader reports back */
export interface CoverLoadOutcome {
  /** Cover bytes, or null when the provider had none */
  bytes: Buffer | null;
  /** Whether a cover fetch was attempted; only attempted outcomes are cached */
  attempted: boolean;
}

/** What a claimer receives */
export interface CoverClaim {
  bytes: Buffer | null;
  /** True for the claimer whose loader produced the settled bytes */
  owner: boolean;
}

export class AlbumCoverScope {
  private readonly entries = new Map<string, Promise<CoverLoadOutcome>>();

  /**
   * Returns the directory's cover, running `loader` only if no settled or
   * in-flight result exists. A rejected loader drops the entry and rethrows to
   * its own caller; waiting siblings retry with their own loaders.
   *
   * @param albumDir - Directory the cover belongs to
   * @param loader - Searches and fetches the cover for the claiming track
   */
  async claim(albumDir: string, loader: () => Promise<CoverLoadOutcome>): Promise<CoverClaim> {
    const key = path.resolve(albumDir);

    for (;;) {
      const existing = this.entries.get(key);
      if (existing === undefined) break;

      const settled = await existing.catch((): null => null);
      if (settled?.attempted) {
        return { bytes: settled.bytes, owner: false };
      }
      // The loader in flight did not settle the directory. If another waiter
      // already replaced the entry, wait on that one instead.
      if (this.entries.get(key) === existing) {
        this.entries.delete(key);
      }
    }

    const pending = loader();
    this.entries.set(key, pending);

    let outcome: CoverLoadOutcome;
    try {
      outcome = await pending;
    } catch (error: unknown) {
      if (this.entries.get(key) === pending) this.entries.delete(key);
      throw error;
    }

    if (!outcome.attempted && this.entries.get(key) === pending) {
      this.entries.delete(key);
    }
    return { bytes: outcome.bytes, owner: outcome.attempted };
  }
}
