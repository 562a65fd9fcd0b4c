import { describe, it, expect, vi } from 'vitest';
import { SnowState, UpstreamUnavailableError } from '@snowwatch/core';
import { ConsolePlanifNeigeAdapter, HttpPlanifNeigeAdapter, entriesOf } from '../planif-neige-client.js';

const BASE_URL = 'https://planif.example.com/api';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

function createAdapter(fetchFn: typeof fetch) {
  return new HttpPlanifNeigeAdapter({ baseUrl: `${BASE_URL}/`, fetchFn });
}

describe('HttpPlanifNeigeAdapter', () => {
  it('queries by street side id and maps a scheduled entry', async () => {
    const fetchFn = vi.fn<typeof fetch>().mockResolvedValue(
      jsonResponse({
        planifications: [
          {
            cote_rue_id: 10200162,
            etat_deneig: 2,
            date_deb_planif: '2025-01-12T07:00:00',
            date_fin_planif: '2025-01-12T19:00:00',
            date_deb_replanif: null,
            date_fin_replanif: null,
            date_maj: '2025-01-11T22:15:00',
            mun_id: 66023,
          },
        ],
      }),
    );

    const status = await createAdapter(fetchFn).getStreetStatus(10200162);

    expect(fetchFn.mock.calls[0][0]).toBe(`${BASE_URL}/planifications?coteRueId=10200162`);
    expect(status).toMatchObject({
      streetId: 10200162,
      code: 2,
      state: SnowState.SCHEDULED,
      known: true,
      labelFr: 'Planifié',
      labelEn: 'Scheduled',
      replannedStart: null,
      replannedEnd: null,
      municipalityId: 66023,
      parkingRestricted: true,
    });
    expect(status?.plannedStart).toEqual(new Date('2025-01-12T07:00:00'));
    expect(status?.lastUpdated).toEqual(new Date('2025-01-11T22:15:00'));
  });

  it('maps code 5 to in progress', async () => {
    const fetchFn = vi.fn<typeof fetch>().mockResolvedValue(jsonResponse({ coteRueId: 42, etatDeneig: 5 }));

    const status = await createAdapter(fetchFn).getStreetStatus(42);

    expect(status?.state).toBe(SnowState.IN_PROGRESS);
    expect(status?.labelEn).toBe('In progress');
  });

  it('passes an unknown code through', async () => {
    const fetchFn = vi.fn<typeof fetch>().mockResolvedValue(jsonResponse([{ cote_rue_id: '42', etat_deneig: '99' }]));

    const status = await createAdapter(fetchFn).getStreetStatus(42);

    expect(status).toMatchObject({ code: 99, state: 'unknown', known: false, labelFr: 'Inconnu', labelEn: 'Unknown' });
  });

  it('returns null when no entry matches the street', async () => {
    const fetchFn = vi.fn<typeof fetch>().mockResolvedValue(jsonResponse([{ cote_rue_id: 7, etat_deneig: 1 }]));

    await expect(createAdapter(fetchFn).getStreetStatus(42)).resolves.toBeNull();
  });

  it('ignores unreadable dates', async () => {
    const fetchFn = vi.fn<typeof fetch>().mockResolvedValue(
      jsonResponse({ cote_rue_id: 42, etat_deneig: 1, date_maj: 'soon', extra: true }),
    );

    const status = await createAdapter(fetchFn).getStreetStatus(42);

    expect(status?.lastUpdated).toBeNull();
    expect(status?.state).toBe(SnowState.CLEARED);
  });

  it('raises UpstreamUnavailableError on a non-2xx status', async () => {
    const fetchFn = vi.fn<typeof fetch>().mockResolvedValue(new Response('down', { status: 502, statusText: 'Bad Gateway' }));

    await expect(createAdapter(fetchFn).getStreetStatus(42)).rejects.toMatchObject({
      name: 'UpstreamUnavailableError',
      message: 'Planif-Neige API returned 502: Bad Gateway',
      statusCode: 502,
    });
  });

  it('raises UpstreamUnavailableError on a timeout', async () => {
    const timeout = new Error('The operation was aborted due to timeout');
    timeout.name = 'TimeoutError';
    const fetchFn = vi.fn<typeof fetch>().mockRejectedValue(timeout);

    const failure = createAdapter(fetchFn).getStreetStatus(42);
    await expect(failure).rejects.toBeInstanceOf(UpstreamUnavailableError);
    await expect(failure).rejects.toMatchObject({ isTimeout: true });
  });

  it('raises UpstreamUnavailableError on a body that is not JSON', async () => {
    const fetchFn = vi.fn<typeof fetch>().mockResolvedValue(new Response('<html></html>', { status: 200 }));

    await expect(createAdapter(fetchFn).getStreetStatus(42)).rejects.toThrow('Planif-Neige response is not valid JSON');
  });
});

describe('entriesOf', () => {
  it('accepts the three body shapes', () => {
    expect(entriesOf({ cote_rue_id: 1 })).toEqual([{ cote_rue_id: 1 }]);
    expect(entriesOf([{ cote_rue_id: 1 }, 'junk'])).toEqual([{ cote_rue_id: 1 }]);
    expect(entriesOf({ planifications: [{ cote_rue_id: 2 }] })).toEqual([{ cote_rue_id: 2 }]);
    expect(entriesOf(null)).toEqual([]);
  });
});

describe('ConsolePlanifNeigeAdapter', () => {
  it('reports no planification', async () => {
    const logger = { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() };

    await expect(new ConsolePlanifNeigeAdapter(logger).getStreetStatus(42)).resolves.toBeNull();
    expect(logger.info).toHaveBeenCalledTimes(1);
  });
});
