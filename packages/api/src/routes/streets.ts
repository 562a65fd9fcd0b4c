import type { FastifyInstance } from 'fastify';
import { describeSegment } from '@snowwatch/geobase';

interface SearchBody {
  streetName: string;
  civicNumber?: number;
  limit?: number;
}

interface SearchAddressBody {
  address: string;
  limit?: number;
}

interface StreetParams {
  streetId: number;
}

interface CivicParams {
  civicNumber: number;
}

interface CivicQuery {
  hint?: string;
  limit?: number;
}

interface NearestQuery {
  lat: number;
  lon: number;
  streetName?: string;
  civicNumber?: number;
  limit?: number;
}

const limit = { type: 'integer', minimum: 1, maximum: 100 } as const;
const civicNumber = { type: 'integer', minimum: 0 } as const;

export default async function streetRoutes(app: FastifyInstance) {
  // POST /api/v1/streets/search — rank segments for a street name and optional civic number
  app.post<{ Body: SearchBody }>(
    '/search',
    {
      schema: {
        body: {
          type: 'object',
          required: ['streetName'],
          properties: {
            streetName: { type: 'string', minLength: 1, maxLength: 200 },
            civicNumber,
            limit,
          },
        },
      },
    },
    async (request) => {
      const { streetName, civicNumber: civic, limit: max } = request.body;
      const segments = await app.streetResolver.search(streetName, civic, { limit: max });
      const results = segments.map(describeSegment);
      return { results, count: results.length };
    },
  );

  // POST /api/v1/streets/search-address — free-text address such as "1234, rue Saint-Denis"
  app.post<{ Body: SearchAddressBody }>(
    '/search-address',
    {
      schema: {
        body: {
          type: 'object',
          required: ['address'],
          properties: {
            address: { type: 'string', minLength: 1, maxLength: 300 },
            limit,
          },
        },
      },
    },
    async (request) => {
      const segments = await app.streetResolver.searchAddress(request.body.address, { limit: request.body.limit });
      const results = segments.map(describeSegment);
      return { results, count: results.length };
    },
  );

  // GET /api/v1/streets/by-civic/:civicNumber — every segment holding a civic number
  app.get<{ Params: CivicParams; Querystring: CivicQuery }>(
    '/by-civic/:civicNumber',
    {
      schema: {
        params: { type: 'object', required: ['civicNumber'], properties: { civicNumber } },
        querystring: { type: 'object', properties: { hint: { type: 'string', maxLength: 200 }, limit } },
      },
    },
    async (request) => {
      const segments = await app.streetResolver.searchByCivicNumber(
        request.params.civicNumber,
        request.query.hint,
        { limit: request.query.limit },
      );
      const results = segments.map(describeSegment);
      return { results, count: results.length };
    },
  );

  // GET /api/v1/streets/nearest — segments closest to a coordinate
  app.get<{ Querystring: NearestQuery }>(
    '/nearest',
    {
      schema: {
        querystring: {
          type: 'object',
          required: ['lat', 'lon'],
          properties: {
            lat: { type: 'number', minimum: -90, maximum: 90 },
            lon: { type: 'number', minimum: -180, maximum: 180 },
            streetName: { type: 'string', maxLength: 200 },
            civicNumber,
            limit,
          },
        },
      },
    },
    async (request) => {
      const { lat, lon, ...options } = request.query;
      const segments = await app.streetResolver.findNearest(lat, lon, options);
      const results = segments.map(describeSegment);
      return { results, count: results.length };
    },
  );

  // GET /api/v1/streets/:streetId — one segment
  app.get<{ Params: StreetParams }>(
    '/:streetId',
    {
      schema: {
        params: { type: 'object', required: ['streetId'], properties: { streetId: { type: 'integer', minimum: 1 } } },
      },
    },
    async (request, reply) => {
      const segment = await app.streetResolver.getById(request.params.streetId);
      if (!segment) {
        return reply.code(404).send({ error: 'Street segment not found' });
      }
      return describeSegment(segment);
    },
  );
}
