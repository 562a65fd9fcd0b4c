import type Database from 'better-sqlite3';
import type { DatasetStore, StreetResolver } from '@snowwatch/geobase';
import type { ConfiguredStreetStore } from './services/configured-street-store.js';
import type { PollerRegistry } from './services/poller-registry.js';

declare module 'fastify' {
  interface FastifyInstance {
    db: Database.Database;
    datasetStore: DatasetStore;
    streetResolver: StreetResolver;
    configuredStreets: ConfiguredStreetStore;
    pollers: PollerRegistry;
  }
}
