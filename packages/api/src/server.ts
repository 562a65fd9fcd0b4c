import Fastify, { type FastifyError } from 'fastify';
import { config as loadEnv } from 'dotenv';
import { join } from 'node:path';
import { DataUnavailableError, UpstreamUnavailableError } from '@snowwatch/core';
import type { GeobaseSource } from '@snowwatch/geobase';
import type { PlanifNeigeAdapter } from '@snowwatch/planif-neige';
import { getConfig, type AppConfig } from './config.js';

// Plugins
import databasePlugin from './plugins/database.js';
import geobasePlugin from './plugins/geobase.js';
import pollersPlugin from './plugins/pollers.js';

// Routes
import streetRoutes from './routes/streets.js';
import geobaseRoutes from './routes/geobase.js';
import configuredStreetRoutes from './routes/configured-streets.js';

// Side-effect: import types for augmentation
import './types.js';

export interface BuildServerOptions {
  config?: AppConfig;
  /** SQLite file path. Default: `${dataDir}/snowwatch.db` */
  dbPath?: string;
  geobaseSource?: GeobaseSource;
  planifAdapter?: PlanifNeigeAdapter;
  now?: () => number;
}

export async function buildServer(options: BuildServerOptions = {}) {
  const config = options.config ?? getConfig();
  const pretty = !config.server.production && config.server.logLevel !== 'silent';

  const app = Fastify({
    logger: {
      level: config.server.logLevel,
      ...(pretty && {
        transport: {
          target: 'pino-pretty',
          options: { colorize: true, translateTime: 'HH:MM:ss' },
        },
      }),
      serializers: {
        req(req: { method: string; url: string; ip: string }) {
          return {
            method: req.method,
            url: req.url,
            remoteAddress: req.ip,
          };
        },
      },
    },
  });

  // Global error handler
  app.setErrorHandler((error: FastifyError, request, reply) => {
    if (error instanceof DataUnavailableError || error instanceof UpstreamUnavailableError) {
      request.log.warn({ err: error.message, isTimeout: error.isTimeout }, 'Upstream data unavailable');
      return reply.code(503).send({ error: error.message, statusCode: 503 });
    }

    const statusCode = error.statusCode ?? 500;
    if (statusCode >= 500) {
      request.log.error({ err: error, url: request.url, method: request.method });
      return reply.code(statusCode).send({ error: 'Internal Server Error', statusCode });
    }

    return reply.code(statusCode).send({ error: error.message, statusCode });
  });

  // Plugins
  await app.register(databasePlugin, { path: options.dbPath ?? join(config.dataDir, 'snowwatch.db') });
  await app.register(geobasePlugin, { config: config.geobase, source: options.geobaseSource, now: options.now });
  await app.register(pollersPlugin, { config: config.planifNeige, adapter: options.planifAdapter, now: options.now });

  app.get('/health', async () => {
    const snapshot = app.datasetStore.peek();
    return {
      status: 'ok',
      geobase: {
        loaded: snapshot !== null,
        segments: snapshot?.segments.length ?? 0,
        fetchedAt: snapshot?.fetchedAt.toISOString() ?? null,
      },
    };
  });

  // Routes
  await app.register(streetRoutes, { prefix: '/api/v1/streets' });
  await app.register(geobaseRoutes, { prefix: '/api/v1/geobase' });
  await app.register(configuredStreetRoutes, { prefix: '/api/v1/configured-streets' });

  return app;
}

async function start() {
  loadEnv();

  try {
    const config = getConfig();
    const app = await buildServer({ config });
    await app.listen({ port: config.server.port, host: config.server.host });
    app.log.info(`Snowwatch API running on ${config.server.host}:${config.server.port}`);
    app.log.info(`Planif-Neige adapter: ${config.planifNeige.adapter}`);
  } catch (err) {
    console.error('=== STARTUP FAILED ===');
    console.error(err);
    process.exit(1);
  }
}

if (process.env.NODE_ENV !== 'test') {
  void start();
}
