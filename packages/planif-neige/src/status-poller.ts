/**
 * Status Poller
 *
 * Polls the scheduling API for one configured street side. A tick that comes
 * due while the previous one is still waiting on the API is skipped, not
 * queued. A failed poll marks the street unavailable but keeps the last
 * known status, so consumers never lose what they last saw.
 */

import {
  UpstreamUnavailableError,
  createLogger,
  errorMessage,
  type Logger,
  type PollerState,
  type SnowRemovalStatus,
} from '@snowwatch/core';
import type { PlanifNeigeAdapter } from './planif-neige-client.js';

// ============================================================================
// Types
// ============================================================================

export const DEFAULT_POLL_INTERVAL_MS = 10 * 60 * 1000;

export type PollerUpdateCallback = (state: PollerState) => void;

export interface StatusPollerConfig {
  streetId: number;
  displayName: string;
  adapter: PlanifNeigeAdapter;
  /** Poll interval in ms. Default: 600000 (10 min) */
  intervalMs?: number;
  logger?: Logger;
  now?: () => number;
}

// ============================================================================
// StatusPoller
// ============================================================================

export class StatusPoller {
  readonly streetId: number;
  readonly displayName: string;
  private readonly adapter: PlanifNeigeAdapter;
  private readonly intervalMs: number;
  private readonly logger: Logger;
  private readonly now: () => number;

  private intervalHandle: ReturnType<typeof setInterval> | null = null;
  private inflight: Promise<void> | null = null;
  private status: SnowRemovalStatus | null = null;
  private available = true;
  private lastPolledAt: Date | null = null;
  private lastSuccessAt: Date | null = null;
  private lastError: string | undefined;
  private callbacks: PollerUpdateCallback[] = [];

  constructor(config: StatusPollerConfig) {
    this.streetId = config.streetId;
    this.displayName = config.displayName;
    this.adapter = config.adapter;
    this.intervalMs = config.intervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.logger = config.logger ?? createLogger('status-poller');
    this.now = config.now ?? Date.now;
  }

  // ---------- Public API ----------

  /**
   * Poll now, then on every interval until stop().
   */
  start(): void {
    if (this.intervalHandle) return;

    this.logger.info({ streetId: this.streetId, intervalMs: this.intervalMs }, 'Starting status poller');
    this.intervalHandle = setInterval(() => {
      this.tick().catch((err) => {
        this.logger.error({ streetId: this.streetId, err: errorMessage(err) }, 'Poll tick failed');
      });
    }, this.intervalMs);

    // Run first tick immediately
    this.tick().catch((err) => {
      this.logger.error({ streetId: this.streetId, err: errorMessage(err) }, 'Initial poll tick failed');
    });
  }

  stop(): void {
    if (this.intervalHandle) {
      clearInterval(this.intervalHandle);
      this.intervalHandle = null;
      this.logger.info({ streetId: this.streetId }, 'Stopped status poller');
    }
  }

  isRunning(): boolean {
    return this.intervalHandle !== null;
  }

  /** One request to the scheduling API, without touching poller state. */
  poll(): Promise<SnowRemovalStatus | null> {
    return this.adapter.getStreetStatus(this.streetId);
  }

  /**
   * Run one poll cycle. Resolves once the state is updated; never rejects.
   * Returns the in-flight cycle when one is already running.
   */
  tick(): Promise<void> {
    if (this.inflight) {
      this.logger.debug({ streetId: this.streetId }, 'Previous poll still in flight, skipping tick');
      return this.inflight;
    }

    const run = this.runCycle().finally(() => {
      this.inflight = null;
    });
    this.inflight = run;
    return run;
  }

  getState(): PollerState {
    return {
      streetId: this.streetId,
      displayName: this.displayName,
      status: this.status,
      available: this.available,
      lastPolledAt: this.lastPolledAt,
      lastSuccessAt: this.lastSuccessAt,
      ...(this.lastError !== undefined ? { lastError: this.lastError } : {}),
    };
  }

  /**
   * Register a callback fired after every completed cycle. Returns an unsubscribe function.
   */
  onUpdate(callback: PollerUpdateCallback): () => void {
    this.callbacks.push(callback);
    return () => {
      this.callbacks = this.callbacks.filter((cb) => cb !== callback);
    };
  }

  // ---------- Internal ----------

  private async runCycle(): Promise<void> {
    try {
      const status = await this.poll();
      const polledAt = new Date(this.now());
      this.status = status;
      this.available = true;
      this.lastError = undefined;
      this.lastPolledAt = polledAt;
      this.lastSuccessAt = polledAt;
      this.logger.debug({ streetId: this.streetId, state: status?.state ?? null }, 'Polled snow-removal status');
    } catch (err) {
      this.lastPolledAt = new Date(this.now());
      this.available = false;
      this.lastError = errorMessage(err);

      if (err instanceof UpstreamUnavailableError) {
        this.logger.warn(
          { streetId: this.streetId, err: err.message, statusCode: err.statusCode, isTimeout: err.isTimeout },
          'Planif-Neige unavailable, keeping last known status',
        );
      } else {
        this.logger.error({ streetId: this.streetId, err: errorMessage(err) }, 'Status poll failed');
      }
    }

    this.notify();
  }

  private notify(): void {
    const state = this.getState();
    for (const callback of this.callbacks) {
      try {
        callback(state);
      } catch (err) {
        this.logger.error({ streetId: this.streetId, err: errorMessage(err) }, 'Poller update callback failed');
      }
    }
  }
}
