/**
 * Planif-Neige Scheduling Client
 *
 * Fetches the snow-removal planification of a street side (coteRueId) from
 * the city's scheduling API and maps it to a SnowRemovalStatus.
 */

import {
  UpstreamUnavailableError,
  createLogger,
  errorMessage,
  isTimeoutError,
  mapStatusCode,
  type Logger,
  type SnowRemovalStatus,
} from '@snowwatch/core';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface PlanifNeigeAdapter {
  /** Resolves to null when the API has no planification for the street side. */
  getStreetStatus(streetId: number): Promise<SnowRemovalStatus | null>;
}

export interface HttpPlanifNeigeAdapterConfig {
  baseUrl: string;
  /** Request timeout in ms. Default: 30000 */
  timeoutMs?: number;
  fetchFn?: typeof fetch;
}

type Entry = Record<string, unknown>;

// ---------------------------------------------------------------------------
// HttpPlanifNeigeAdapter — production adapter that calls the scheduling API
// ---------------------------------------------------------------------------

export class HttpPlanifNeigeAdapter implements PlanifNeigeAdapter {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchFn: typeof fetch;

  constructor(config: HttpPlanifNeigeAdapterConfig) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, '');
    this.timeoutMs = config.timeoutMs ?? 30_000;
    this.fetchFn = config.fetchFn ?? ((input, init) => fetch(input, init));
  }

  async getStreetStatus(streetId: number): Promise<SnowRemovalStatus | null> {
    const url = `${this.baseUrl}/planifications?coteRueId=${encodeURIComponent(String(streetId))}`;

    let response: Response;
    try {
      response = await this.fetchFn(url, {
        headers: { Accept: 'application/json' },
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err: unknown) {
      if (isTimeoutError(err)) {
        throw new UpstreamUnavailableError(`Planif-Neige request timed out after ${this.timeoutMs}ms`, undefined, true, {
          cause: err,
        });
      }
      throw new UpstreamUnavailableError(`Network error: ${errorMessage(err)}`, undefined, false, { cause: err });
    }

    if (!response.ok) {
      throw new UpstreamUnavailableError(
        `Planif-Neige API returned ${response.status}: ${response.statusText}`.trim(),
        response.status,
      );
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (err: unknown) {
      throw new UpstreamUnavailableError('Planif-Neige response is not valid JSON', response.status, isTimeoutError(err), {
        cause: err,
      });
    }

    const entry = entriesOf(body).find((candidate) => entryStreetId(candidate) === streetId);
    return entry ? parsePlanification(entry, streetId) : null;
  }
}

// ---------------------------------------------------------------------------
// ConsolePlanifNeigeAdapter — dev adapter that reports no planification
// ---------------------------------------------------------------------------

export class ConsolePlanifNeigeAdapter implements PlanifNeigeAdapter {
  private readonly logger: Logger;

  constructor(logger: Logger = createLogger('planif-neige')) {
    this.logger = logger;
  }

  async getStreetStatus(streetId: number): Promise<SnowRemovalStatus | null> {
    this.logger.info({ streetId }, 'ConsolePlanifNeigeAdapter: no planification, returning null');
    return null;
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function isEntry(value: unknown): value is Entry {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * The API answers with a bare entry, an array, or { planifications: [...] }.
 */
export function entriesOf(body: unknown): Entry[] {
  if (Array.isArray(body)) return body.filter(isEntry);
  if (!isEntry(body)) return [];

  const wrapped = body.planifications;
  if (Array.isArray(wrapped)) return wrapped.filter(isEntry);
  return [body];
}

function pick(entry: Entry, ...keys: string[]): unknown {
  for (const key of keys) {
    const value = entry[key];
    if (value !== undefined && value !== null && value !== '') return value;
  }
  return undefined;
}

function toInteger(value: unknown): number | null {
  if (typeof value === 'number' && Number.isInteger(value)) return value;
  if (typeof value === 'string' && /^-?\d+$/.test(value.trim())) return parseInt(value, 10);
  return null;
}

function toDate(value: unknown): Date | null {
  if (typeof value !== 'string' && typeof value !== 'number') return null;
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? null : date;
}

function entryStreetId(entry: Entry): number | null {
  return toInteger(pick(entry, 'cote_rue_id', 'coteRueId'));
}

export function parsePlanification(entry: Entry, streetId: number): SnowRemovalStatus {
  // A missing etat_deneig reads as 0 (snowed), the API's default state
  const code = toInteger(pick(entry, 'etat_deneig', 'etatDeneig')) ?? 0;
  const info = mapStatusCode(code);

  return {
    streetId,
    code: info.code,
    state: info.state,
    known: info.known,
    labelFr: info.labelFr,
    labelEn: info.labelEn,
    plannedStart: toDate(pick(entry, 'date_deb_planif', 'dateDebutPlanif', 'dateDebPlanif')),
    plannedEnd: toDate(pick(entry, 'date_fin_planif', 'dateFinPlanif')),
    replannedStart: toDate(pick(entry, 'date_deb_replanif', 'dateDebutReplanif', 'dateDebReplanif')),
    replannedEnd: toDate(pick(entry, 'date_fin_replanif', 'dateFinReplanif')),
    lastUpdated: toDate(pick(entry, 'date_maj', 'dateMaj')),
    municipalityId: toInteger(pick(entry, 'mun_id', 'munId', 'munid')),
    parkingRestricted: info.parkingRestricted,
  };
}
