import fp from 'fastify-plugin';
import {
  DatasetStore,
  GeobaseCache,
  HttpGeobaseSource,
  StreetResolver,
  type GeobaseSource,
} from '@snowwatch/geobase';
import type { AppConfig } from '../config.js';

export interface GeobasePluginOptions {
  config: AppConfig['geobase'];
  source?: GeobaseSource;
  now?: () => number;
}

export default fp<GeobasePluginOptions>(async (fastify, opts) => {
  const source =
    opts.source ?? new HttpGeobaseSource({ url: opts.config.url, timeoutMs: opts.config.timeoutMs });

  const store = new DatasetStore({
    source,
    cache: new GeobaseCache(fastify.db),
    ttlMs: opts.config.cacheTtlHours * 60 * 60 * 1000,
    cityFilter: opts.config.cityFilter,
    now: opts.now,
    logger: fastify.log.child({ component: 'dataset-store' }),
  });

  fastify.decorate('datasetStore', store);
  fastify.decorate('streetResolver', new StreetResolver(store));
}, { name: 'geobase', dependencies: ['database'] });
