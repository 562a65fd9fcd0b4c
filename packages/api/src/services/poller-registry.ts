/**
 * One StatusPoller per configured street side.
 */

import type { Logger, PollerState, ResolvedStreetConfig } from '@snowwatch/core';
import { StatusPoller, type PlanifNeigeAdapter } from '@snowwatch/planif-neige';

export interface PollerRegistryConfig {
  adapter: PlanifNeigeAdapter;
  intervalMs: number;
  logger: Logger;
  now?: () => number;
}

export class PollerRegistry {
  private readonly pollers = new Map<number, StatusPoller>();
  private readonly config: PollerRegistryConfig;

  constructor(config: PollerRegistryConfig) {
    this.config = config;
  }

  /** Create and start the poller for a street side; an existing one is kept. */
  ensure(street: ResolvedStreetConfig): StatusPoller {
    const existing = this.pollers.get(street.streetId);
    if (existing) return existing;

    const poller = new StatusPoller({
      streetId: street.streetId,
      displayName: street.displayName,
      adapter: this.config.adapter,
      intervalMs: this.config.intervalMs,
      logger: this.config.logger,
      now: this.config.now,
    });
    this.pollers.set(street.streetId, poller);
    poller.start();
    return poller;
  }

  get(streetId: number): StatusPoller | undefined {
    return this.pollers.get(streetId);
  }

  state(streetId: number): PollerState | null {
    return this.pollers.get(streetId)?.getState() ?? null;
  }

  remove(streetId: number): boolean {
    const poller = this.pollers.get(streetId);
    if (!poller) return false;
    poller.stop();
    this.pollers.delete(streetId);
    return true;
  }

  stopAll(): void {
    for (const poller of this.pollers.values()) {
      poller.stop();
    }
    this.pollers.clear();
  }

  get size(): number {
    return this.pollers.size;
  }
}
