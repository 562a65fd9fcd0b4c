import { InvalidConfigError } from '@snowwatch/core';

export type PlanifAdapterKind = 'http' | 'console';

export interface AppConfig {
  server: {
    port: number;
    host: string;
    logLevel: string;
    production: boolean;
  };
  dataDir: string;
  geobase: {
    url?: string;
    timeoutMs: number;
    cacheTtlHours: number;
    cityFilter?: string;
  };
  planifNeige: {
    adapter: PlanifAdapterKind;
    apiUrl?: string;
    timeoutMs: number;
    pollIntervalMs: number;
  };
}

type Env = Record<string, string | undefined>;

function positiveInt(env: Env, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return fallback;

  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new InvalidConfigError(`${key} must be a positive integer, got "${raw}"`, key);
  }
  return value;
}

function optional(env: Env, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

function planifAdapterKind(env: Env): PlanifAdapterKind {
  const raw = optional(env, 'PLANIF_NEIGE_ADAPTER');
  if (raw === undefined) {
    return optional(env, 'PLANIF_NEIGE_API_URL') ? 'http' : 'console';
  }
  if (raw === 'http' || raw === 'console') return raw;
  throw new InvalidConfigError(`PLANIF_NEIGE_ADAPTER must be "http" or "console", got "${raw}"`, 'PLANIF_NEIGE_ADAPTER');
}

export function getConfig(env: Env = process.env): AppConfig {
  const adapter = planifAdapterKind(env);
  const apiUrl = optional(env, 'PLANIF_NEIGE_API_URL');
  if (adapter === 'http' && !apiUrl) {
    throw new InvalidConfigError('PLANIF_NEIGE_API_URL is required when PLANIF_NEIGE_ADAPTER=http', 'PLANIF_NEIGE_API_URL');
  }

  return {
    server: {
      port: positiveInt(env, 'PORT', 3000),
      host: optional(env, 'HOST') ?? '0.0.0.0',
      logLevel: optional(env, 'LOG_LEVEL') ?? (env.NODE_ENV === 'test' ? 'silent' : 'info'),
      production: env.NODE_ENV === 'production',
    },
    dataDir: optional(env, 'DATA_DIR') ?? './data',
    geobase: {
      url: optional(env, 'GEOBASE_URL'),
      timeoutMs: positiveInt(env, 'GEOBASE_TIMEOUT_MS', 120_000),
      cacheTtlHours: positiveInt(env, 'GEOBASE_CACHE_TTL_HOURS', 24),
      cityFilter: optional(env, 'GEOBASE_CITY_FILTER'),
    },
    planifNeige: {
      adapter,
      apiUrl,
      timeoutMs: positiveInt(env, 'PLANIF_NEIGE_TIMEOUT_MS', 30_000),
      pollIntervalMs: positiveInt(env, 'POLL_INTERVAL_MS', 600_000),
    },
  };
}
