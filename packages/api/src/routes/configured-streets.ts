import type { FastifyInstance } from 'fastify';
import { DataUnavailableError, type ResolvedStreetConfig } from '@snowwatch/core';
import { describeSegment } from '@snowwatch/geobase';

interface CreateBody {
  streetId?: number;
  displayName?: string;
  streetName?: string;
  civicNumber?: number;
}

interface StreetParams {
  streetId: number;
}

const streetIdParams = {
  type: 'object',
  required: ['streetId'],
  properties: { streetId: { type: 'integer', minimum: 1 } },
} as const;

export default async function configuredStreetRoutes(app: FastifyInstance) {
  function withState(config: ResolvedStreetConfig) {
    return { ...config, state: app.pollers.state(config.streetId) };
  }

  /**
   * Display name for a manually entered id. The geobase is consulted when it
   * can be; an unavailable dataset does not block the setup.
   */
  async function manualDisplayName(streetId: number): Promise<string> {
    try {
      const segment = await app.streetResolver.getById(streetId);
      if (segment) return describeSegment(segment).displayName;
    } catch (err) {
      if (!(err instanceof DataUnavailableError)) throw err;
      app.log.warn({ streetId, err: err.message }, 'Geobase unavailable, using a generic display name');
    }
    return `Street ${streetId}`;
  }

  // GET /api/v1/configured-streets — every watched street side with its poller state
  app.get('/', async () => {
    const streets = app.configuredStreets.list().map(withState);
    return { streets, count: streets.length };
  });

  // POST /api/v1/configured-streets — watch a street side, by id or by resolving a name
  app.post<{ Body: CreateBody }>(
    '/',
    {
      schema: {
        body: {
          type: 'object',
          properties: {
            streetId: { type: 'integer', minimum: 1 },
            displayName: { type: 'string', minLength: 1, maxLength: 200 },
            streetName: { type: 'string', minLength: 1, maxLength: 200 },
            civicNumber: { type: 'integer', minimum: 0 },
          },
        },
      },
    },
    async (request, reply) => {
      const body = request.body;
      let streetId: number;
      let displayName: string;

      if (body.streetId !== undefined) {
        streetId = body.streetId;
        displayName = body.displayName ?? (await manualDisplayName(streetId));
      } else if (body.streetName !== undefined) {
        // DataUnavailableError aborts the setup with 503 through the error handler
        const results = await app.streetResolver.search(body.streetName, body.civicNumber);
        const best = results[0];
        if (!best) {
          return reply.code(404).send({ error: 'No matching street segment', results: [] });
        }
        streetId = best.id;
        displayName = body.displayName ?? describeSegment(best).displayName;
      } else {
        return reply.code(400).send({ error: 'Either streetId or streetName is required' });
      }

      const config: ResolvedStreetConfig = { streetId, displayName, createdAt: new Date() };
      if (!app.configuredStreets.add(config)) {
        return reply.code(409).send({ error: 'Street is already configured', streetId });
      }

      app.pollers.ensure(config);
      request.log.info({ streetId, displayName }, 'Street configured');
      return reply.code(201).send(withState(config));
    },
  );

  // GET /api/v1/configured-streets/:streetId/status — last known status and availability
  app.get<{ Params: StreetParams }>(
    '/:streetId/status',
    { schema: { params: streetIdParams } },
    async (request, reply) => {
      const state = app.pollers.state(request.params.streetId);
      if (!state) {
        return reply.code(404).send({ error: 'Street is not configured' });
      }
      return state;
    },
  );

  // DELETE /api/v1/configured-streets/:streetId — stop watching
  app.delete<{ Params: StreetParams }>(
    '/:streetId',
    { schema: { params: streetIdParams } },
    async (request, reply) => {
      const { streetId } = request.params;
      if (!app.configuredStreets.remove(streetId)) {
        return reply.code(404).send({ error: 'Street is not configured' });
      }

      app.pollers.remove(streetId);
      request.log.info({ streetId }, 'Street removed');
      return reply.code(204).send();
    },
  );
}
