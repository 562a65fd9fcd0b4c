import { mapStatusCode, type SnowRemovalStatus } from '@snowwatch/core';

function feature(id: number, name: string, side: 'Gauche' | 'Droit', start: number, end: number, borough = 'AHU') {
  return {
    type: 'Feature',
    properties: {
      COTE_RUE_ID: id,
      NOM_VOIE: name,
      COTE: side,
      DEBUT_ADRESSE: start,
      FIN_ADRESSE: end,
      ARR: borough,
      NOM_VILLE: 'Montréal',
    },
    geometry: { type: 'Point', coordinates: [-73.7, 45.55] },
  };
}

export const STREET_FEATURES = [
  feature(10200162, 'Acadie', 'Gauche', 1000, 1200),
  feature(10200163, 'Acadie', 'Droit', 1001, 1199),
  feature(13001001, 'Saint-Denis', 'Droit', 3000, 3100, 'PLA'),
];

export function geobasePayload(features: unknown[]): string {
  return JSON.stringify({ type: 'FeatureCollection', features });
}

export function statusFor(streetId: number, code: number): SnowRemovalStatus {
  const info = mapStatusCode(code);
  return {
    streetId,
    code,
    state: info.state,
    known: info.known,
    labelFr: info.labelFr,
    labelEn: info.labelEn,
    plannedStart: new Date('2025-01-12T07:00:00.000Z'),
    plannedEnd: new Date('2025-01-12T19:00:00.000Z'),
    replannedStart: null,
    replannedEnd: null,
    lastUpdated: null,
    municipalityId: null,
    parkingRestricted: info.parkingRestricted,
  };
}
