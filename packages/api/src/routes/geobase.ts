import type { FastifyInstance } from 'fastify';

export default async function geobaseRoutes(app: FastifyInstance) {
  // GET /api/v1/geobase — snapshot info, without loading anything
  app.get('/', async () => {
    const snapshot = app.datasetStore.peek();
    if (!snapshot) {
      return { loaded: false, refreshing: app.datasetStore.isRefreshing() };
    }

    return {
      loaded: true,
      refreshing: app.datasetStore.isRefreshing(),
      segments: snapshot.segments.length,
      source: snapshot.source,
      fetchedAt: snapshot.fetchedAt.toISOString(),
      expiresAt: snapshot.expiresAt.toISOString(),
    };
  });

  // POST /api/v1/geobase/refresh — force a download; 503 when it fails
  app.post('/refresh', async (request) => {
    const snapshot = await app.datasetStore.refresh();
    request.log.info({ segments: snapshot.segments.length }, 'Geobase refreshed on request');

    return {
      count: snapshot.segments.length,
      fetchedAt: snapshot.fetchedAt.toISOString(),
      expiresAt: snapshot.expiresAt.toISOString(),
    };
  });
}
