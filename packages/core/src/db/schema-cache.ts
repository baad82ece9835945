/**
 * Process-wide holder of the current SchemaSnapshot.
 *
 * Refresh triggers: TTL expiry, an explicit `refresh()`, and
 * `invalidate()` (the session calls it after a schema mismatch, since the
 * snapshot may be stale). Concurrent readers share one in-flight fetch;
 * a failed fetch is not cached. A fetch that started before an
 * invalidation is never shared afterwards and never stored.
 */

import type { SchemaSnapshot } from './types.js';
import { schemaLogger } from '../util/logger.js';

export type SchemaFetcher = () => Promise<SchemaSnapshot>;

export interface SchemaCacheOptions {
  /** Snapshot lifetime. 0 disables expiry. */
  ttlMs: number;
  now?: () => number;
}

export class SchemaCache {
  private snapshot: SchemaSnapshot | null = null;
  private fetchedAt = 0;
  private inFlight: Promise<SchemaSnapshot> | null = null;
  private generation = 0;
  private readonly now: () => number;

  constructor(
    private readonly fetcher: SchemaFetcher,
    private readonly opts: SchemaCacheOptions,
  ) {
    this.now = opts.now ?? Date.now;
  }

  async get(): Promise<SchemaSnapshot> {
    if (this.snapshot && !this.isExpired()) {
      return this.snapshot;
    }
    return this.load();
  }

  /** Force a new fetch, even when the cached snapshot is fresh. */
  async refresh(): Promise<SchemaSnapshot> {
    this.invalidate();
    return this.load();
  }

  invalidate(): void {
    if (this.snapshot) {
      schemaLogger.debug('schema snapshot invalidated');
    }
    this.snapshot = null;
    this.inFlight = null;
    this.generation += 1;
  }

  peek(): SchemaSnapshot | null {
    return this.snapshot;
  }

  private isExpired(): boolean {
    return this.opts.ttlMs > 0 && this.now() - this.fetchedAt >= this.opts.ttlMs;
  }

  private load(): Promise<SchemaSnapshot> {
    if (this.inFlight) return this.inFlight;

    const generation = this.generation;
    const pending: Promise<SchemaSnapshot> = this.fetcher()
      .then((snapshot) => {
        if (generation === this.generation) {
          this.snapshot = snapshot;
          this.fetchedAt = this.now();
        }
        return snapshot;
      })
      .finally(() => {
        if (this.inFlight === pending) this.inFlight = null;
      });
    this.inFlight = pending;
    return pending;
  }
}
