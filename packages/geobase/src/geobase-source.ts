/**
 * Geobase Source
 *
 * Downloads the raw géobase payload from Montreal's open-data portal.
 * Every failure surfaces as DataUnavailableError so the dataset store can
 * decide whether a stale copy may be served instead.
 */

import { DataUnavailableError, InvalidConfigError, errorMessage, isTimeoutError } from '@snowwatch/core';

export const DEFAULT_GEOBASE_URL =
  'https://donnees.montreal.ca/dataset/88493b16-220f-4709-b57b-1ea57c5ba405/resource/16f7fa0a-9ce6-4b29-a7fc-00842c593927/download/gbdouble.json';

export interface GeobaseSource {
  download(): Promise<string>;
}

export interface HttpGeobaseSourceConfig {
  url?: string;
  /** Download timeout in ms. Default: 120000 (the file is tens of MB) */
  timeoutMs?: number;
  fetchFn?: typeof fetch;
}

export class HttpGeobaseSource implements GeobaseSource {
  private readonly url: string;
  private readonly timeoutMs: number;
  private readonly fetchFn: typeof fetch;

  constructor(config: HttpGeobaseSourceConfig = {}) {
    const url = config.url ?? DEFAULT_GEOBASE_URL;

    // HTTPS only, except for a local mirror
    let parsed: URL;
    try {
      parsed = new URL(url);
    } catch {
      throw new InvalidConfigError(`Invalid geobase URL: ${url}`, 'GEOBASE_URL');
    }
    const isLocal = parsed.hostname === 'localhost' || parsed.hostname === '127.0.0.1';
    if (parsed.protocol !== 'https:' && !isLocal) {
      throw new InvalidConfigError(
        `Geobase URL must use HTTPS. Got: ${parsed.protocol}//${parsed.hostname}`,
        'GEOBASE_URL',
      );
    }

    this.url = url;
    this.timeoutMs = config.timeoutMs ?? 120_000;
    this.fetchFn = config.fetchFn ?? ((input, init) => fetch(input, init));
  }

  async download(): Promise<string> {
    let response: Response;
    try {
      response = await this.fetchFn(this.url, {
        headers: { Accept: 'application/geo+json, application/json' },
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err: unknown) {
      if (isTimeoutError(err)) {
        throw new DataUnavailableError(
          `Geobase download timed out after ${this.timeoutMs}ms`,
          undefined,
          true,
          { cause: err },
        );
      }
      throw new DataUnavailableError(`Network error: ${errorMessage(err)}`, undefined, false, { cause: err });
    }

    if (!response.ok) {
      throw new DataUnavailableError(
        `Geobase download failed: HTTP ${response.status} ${response.statusText}`.trim(),
        response.status,
      );
    }

    try {
      return await response.text();
    } catch (err: unknown) {
      throw new DataUnavailableError(
        `Geobase download interrupted: ${errorMessage(err)}`,
        undefined,
        isTimeoutError(err),
        { cause: err },
      );
    }
  }
}
