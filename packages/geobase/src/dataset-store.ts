/**
 * Dataset Store
 *
 * Owns the process's copy of the géobase. A snapshot is built once from a
 * downloaded (or durably cached) payload, frozen, and swapped in by reference;
 * readers keep whichever snapshot they grabbed, so a refresh never shows them
 * a mix of old and new segments.
 *
 * Loading strategy:
 * - In-memory snapshot younger than the TTL: served as is.
 * - Cold start: the durable cache is tried first; a fresh payload there
 *   avoids the download entirely.
 * - Otherwise download. Only one download runs at a time; concurrent callers
 *   await the same promise.
 * - A failed download leaves the previous snapshot in place. getSnapshot()
 *   falls back to a stale snapshot and logs; refresh() reports the failure.
 */

import {
  DataUnavailableError,
  createLogger,
  errorMessage,
  type DatasetSnapshot,
  type Logger,
  type SnapshotSource,
  type StreetSegment,
} from '@snowwatch/core';
import type { GeobaseSource } from './geobase-source.js';
import type { PayloadCache } from './geobase-cache.js';
import { parseGeobase } from './geobase-parser.js';

export const DEFAULT_TTL_MS = 24 * 60 * 60 * 1000;

export interface DatasetStoreConfig {
  source: GeobaseSource;
  cache?: PayloadCache;
  /** Freshness horizon in ms. Default: 24h */
  ttlMs?: number;
  now?: () => number;
  cityFilter?: string;
  logger?: Logger;
}

export class DatasetStore {
  private readonly source: GeobaseSource;
  private readonly cache?: PayloadCache;
  private readonly ttlMs: number;
  private readonly now: () => number;
  private readonly cityFilter?: string;
  private readonly logger: Logger;

  private snapshot: DatasetSnapshot | null = null;
  private inflight: Promise<DatasetSnapshot> | null = null;
  private cacheRestored = false;

  constructor(config: DatasetStoreConfig) {
    this.source = config.source;
    this.cache = config.cache;
    this.ttlMs = config.ttlMs ?? DEFAULT_TTL_MS;
    this.now = config.now ?? Date.now;
    this.cityFilter = config.cityFilter;
    this.logger = config.logger ?? createLogger('dataset-store');
  }

  // ---------- Public API ----------

  async getSnapshot(): Promise<DatasetSnapshot> {
    if (!this.snapshot) {
      this.restoreFromCache();
    }

    const current = this.snapshot;
    if (current && this.isFresh(current)) {
      return current;
    }

    try {
      return await this.refresh();
    } catch (err) {
      const stale = this.snapshot;
      if (stale && err instanceof DataUnavailableError) {
        this.logger.warn(
          { err: err.message, fetchedAt: stale.fetchedAt.toISOString() },
          'Geobase refresh failed, serving stale snapshot',
        );
        return stale;
      }
      throw err;
    }
  }

  /**
   * Download and swap in a new snapshot, joining a download already in flight.
   */
  refresh(): Promise<DatasetSnapshot> {
    if (this.inflight) {
      return this.inflight;
    }

    const run = this.download().finally(() => {
      this.inflight = null;
    });
    this.inflight = run;
    return run;
  }

  /** Current snapshot, without triggering any load. */
  peek(): DatasetSnapshot | null {
    return this.snapshot;
  }

  isRefreshing(): boolean {
    return this.inflight !== null;
  }

  // ---------- Loading ----------

  private async download(): Promise<DatasetSnapshot> {
    this.logger.info('Downloading geobase data');

    let payload: string;
    try {
      payload = await this.source.download();
    } catch (err) {
      if (err instanceof DataUnavailableError) throw err;
      throw new DataUnavailableError(`Geobase download failed: ${errorMessage(err)}`, undefined, false, {
        cause: err,
      });
    }

    const segments = this.parsePayload(payload);
    const fetchedAt = new Date(this.now());
    const snapshot = this.buildSnapshot(segments, fetchedAt, 'network');

    this.snapshot = snapshot;
    // Whatever is on disk is older than what we now hold
    this.cacheRestored = true;
    this.persist(payload, fetchedAt);

    this.logger.info({ segments: segments.length }, 'Loaded street segments from geobase');
    return snapshot;
  }

  private parsePayload(payload: string): StreetSegment[] {
    let document: unknown;
    try {
      document = JSON.parse(payload);
    } catch (err) {
      throw new DataUnavailableError('Geobase payload is not valid JSON', undefined, false, { cause: err });
    }

    const { segments, skipped } = parseGeobase(document, { cityFilter: this.cityFilter });
    if (skipped > 0) {
      this.logger.debug({ skipped }, 'Skipped malformed geobase features');
    }
    if (segments.length === 0) {
      throw new DataUnavailableError('Geobase contained no usable street segments');
    }
    return segments;
  }

  private restoreFromCache(): void {
    if (this.cacheRestored || !this.cache) return;
    this.cacheRestored = true;

    try {
      const cached = this.cache.read();
      if (!cached) return;

      const segments = this.parsePayload(cached.payload);
      this.snapshot = this.buildSnapshot(segments, cached.fetchedAt, 'cache');
      this.logger.info(
        { segments: segments.length, fetchedAt: cached.fetchedAt.toISOString() },
        'Restored geobase from local cache',
      );
    } catch (err) {
      this.logger.warn({ err: errorMessage(err) }, 'Failed to read geobase cache');
    }
  }

  private persist(payload: string, fetchedAt: Date): void {
    if (!this.cache) return;
    try {
      this.cache.write(payload, fetchedAt);
    } catch (err) {
      this.logger.warn({ err: errorMessage(err) }, 'Failed to write geobase cache');
    }
  }

  // ---------- Helpers ----------

  private isFresh(snapshot: DatasetSnapshot): boolean {
    return this.now() - snapshot.fetchedAt.getTime() < this.ttlMs;
  }

  private buildSnapshot(segments: StreetSegment[], fetchedAt: Date, source: SnapshotSource): DatasetSnapshot {
    const byId = new Map<number, StreetSegment>();
    for (const segment of segments) {
      if (!byId.has(segment.id)) {
        byId.set(segment.id, segment);
      }
    }

    return Object.freeze({
      segments: Object.freeze([...segments]),
      byId,
      fetchedAt,
      expiresAt: new Date(fetchedAt.getTime() + this.ttlMs),
      source,
    });
  }
}
