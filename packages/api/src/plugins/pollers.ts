import fp from 'fastify-plugin';
import type { Logger } from '@snowwatch/core';
import {
  ConsolePlanifNeigeAdapter,
  HttpPlanifNeigeAdapter,
  type PlanifNeigeAdapter,
} from '@snowwatch/planif-neige';
import type { AppConfig } from '../config.js';
import { ConfiguredStreetStore } from '../services/configured-street-store.js';
import { PollerRegistry } from '../services/poller-registry.js';

export interface PollersPluginOptions {
  config: AppConfig['planifNeige'];
  adapter?: PlanifNeigeAdapter;
  now?: () => number;
}

function createAdapter(opts: PollersPluginOptions, logger: Logger): PlanifNeigeAdapter {
  const { config } = opts;
  if (opts.adapter) return opts.adapter;
  if (config.adapter === 'http' && config.apiUrl) {
    return new HttpPlanifNeigeAdapter({ baseUrl: config.apiUrl, timeoutMs: config.timeoutMs });
  }
  return new ConsolePlanifNeigeAdapter(logger);
}

export default fp<PollersPluginOptions>(async (fastify, opts) => {
  const logger = fastify.log.child({ component: 'status-poller' });
  const store = new ConfiguredStreetStore(fastify.db);
  const registry = new PollerRegistry({
    adapter: createAdapter(opts, logger),
    intervalMs: opts.config.pollIntervalMs,
    logger,
    now: opts.now,
  });

  fastify.decorate('configuredStreets', store);
  fastify.decorate('pollers', registry);

  // Resume watching what was configured before the restart
  fastify.addHook('onReady', async () => {
    for (const street of store.list()) {
      registry.ensure(street);
    }
    fastify.log.info({ streets: registry.size }, 'Status pollers started');
  });

  fastify.addHook('onClose', async () => {
    registry.stopAll();
  });
}, { name: 'pollers', dependencies: ['database'] });
