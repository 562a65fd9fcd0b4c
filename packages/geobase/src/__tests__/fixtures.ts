/**
 * Géobase test fixtures: small hand-made feature collections shaped like the
 * city's gbdouble.json, plus a controllable clock.
 */

export interface FeatureInput {
  id: number | string;
  name: string;
  side: 'Gauche' | 'Droit' | string;
  start?: number | string | null;
  end?: number | string | null;
  borough?: string;
  city?: string;
  geometry?: unknown;
}

export function feature(input: FeatureInput): Record<string, unknown> {
  return {
    type: 'Feature',
    properties: {
      COTE_RUE_ID: input.id,
      NOM_VOIE: input.name,
      COTE: input.side,
      DEBUT_ADRESSE: input.start ?? 0,
      FIN_ADRESSE: input.end ?? 0,
      ARR: input.borough ?? 'AHU',
      NOM_VILLE: input.city ?? 'Montréal',
    },
    geometry: input.geometry ?? null,
  };
}

export function geobaseDocument(features: unknown[]): Record<string, unknown> {
  return { type: 'FeatureCollection', features };
}

export function geobasePayload(features: unknown[]): string {
  return JSON.stringify(geobaseDocument(features));
}

export const ACADIE_LEFT = feature({
  id: 10200162,
  name: 'Acadie',
  side: 'Gauche',
  start: 1000,
  end: 1200,
  geometry: { type: 'LineString', coordinates: [[-73.7, 45.55], [-73.7, 45.56]] },
});
export const ACADIE_RIGHT = feature({ id: 10200163, name: 'Acadie', side: 'Droit', start: 1001, end: 1199 });
export const ACADIE_NEXT_BLOCK = feature({ id: 10200170, name: 'Acadie', side: 'Gauche', start: 1202, end: 1400 });
export const SAINT_DENIS_RIGHT = feature({
  id: 13001001,
  name: 'Saint-Denis',
  side: 'Droit',
  start: 3000,
  end: 3100,
  borough: 'PLA',
  geometry: { type: 'Point', coordinates: [-73.57, 45.52] },
});
export const ST_DENIS_LEFT = feature({ id: 13001002, name: 'St-Denis', side: 'Gauche', start: 3001, end: 3099, borough: 'PLA' });
export const SAINT_DENIS_UNBOUNDED = feature({ id: 13001003, name: 'Saint-Denis', side: 'Droit', borough: 'VIM' });
export const SAINTE_CATHERINE = feature({ id: 14000001, name: 'Sainte-Catherine Ouest', side: 'Gauche', start: 1, end: 99, borough: 'VIM' });
export const DE_L_ACADIE = feature({ id: 15000001, name: "de l'Acadie", side: 'Gauche', start: 5000, end: 5100 });

export const ALL_FEATURES = [
  ACADIE_LEFT,
  ACADIE_RIGHT,
  ACADIE_NEXT_BLOCK,
  SAINT_DENIS_RIGHT,
  ST_DENIS_LEFT,
  SAINT_DENIS_UNBOUNDED,
  SAINTE_CATHERINE,
  DE_L_ACADIE,
];

export function createClock(start = '2025-01-10T12:00:00.000Z') {
  let nowMs = Date.parse(start);
  return {
    now: () => nowMs,
    advance(ms: number) {
      nowMs += ms;
    },
  };
}

export const HOUR_MS = 60 * 60 * 1000;
