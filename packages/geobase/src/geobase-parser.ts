/**
 * Geobase Parser
 *
 * Turns the city's "géobase double" GeoJSON (one feature per street side)
 * into StreetSegment records. A feature missing its id, name or side, or with
 * an address that is not a non-negative integer, is skipped; the caller only
 * fails when nothing at all survives. A missing address is 0, so a range can
 * be known at both ends, at one end, or not at all.
 */

import { resolveBorough, type StreetSegment, type StreetSide } from '@snowwatch/core';
import { centroidOf } from './geo.js';
import { foldText, normalizeStreetName } from './normalize.js';

export interface ParseOptions {
  /** Keep only segments of this city. Segments without a city are kept. */
  cityFilter?: string;
}

export interface ParseResult {
  segments: StreetSegment[];
  skipped: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toInteger(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isInteger(value) ? value : null;
  }
  if (typeof value === 'string' && /^\s*\d+\s*$/.test(value)) {
    return parseInt(value, 10);
  }
  return null;
}

/** Missing addresses are 0; anything present must be a non-negative integer. */
function toAddress(value: unknown): number | null {
  if (value === undefined || value === null || value === '') return 0;
  const n = toInteger(value);
  return n !== null && n >= 0 ? n : null;
}

function toSide(value: unknown): StreetSide | null {
  if (typeof value !== 'string') return null;
  switch (value.trim().toLowerCase()) {
    case 'gauche':
      return 'Left';
    case 'droit':
      return 'Right';
    default:
      return null;
  }
}

function firstText(props: Record<string, unknown>, keys: string[]): string {
  for (const key of keys) {
    const value = props[key];
    if (typeof value === 'string' && value.trim()) return value.trim();
  }
  return '';
}

/** 0 marks an unknown end and stays in place; only a range known at both ends is reordered. */
function normalizeRange(start: number, end: number): [number, number] {
  if (start === 0 || end === 0) return [start, end];
  return start <= end ? [start, end] : [end, start];
}

export function parseFeature(feature: unknown): StreetSegment | null {
  if (!isRecord(feature) || !isRecord(feature.properties)) return null;
  const props = feature.properties;

  const id = toInteger(props.COTE_RUE_ID);
  if (id === null || id <= 0) return null;

  const name = typeof props.NOM_VOIE === 'string' ? props.NOM_VOIE.trim() : '';
  // A name made only of punctuation could never be searched for
  if (!normalizeStreetName(name)) return null;

  const side = toSide(props.COTE);
  if (!side) return null;

  const start = toAddress(props.DEBUT_ADRESSE);
  const end = toAddress(props.FIN_ADRESSE);
  if (start === null || end === null) return null;

  const [addressStart, addressEnd] = normalizeRange(start, end);
  const centroid = centroidOf(feature.geometry);

  return Object.freeze({
    id,
    name,
    side,
    addressStart,
    addressEnd,
    borough: resolveBorough(firstText(props, ['NOM_ARR', 'ARR'])),
    city: firstText(props, ['NOM_VILLE', 'VILLE']),
    latitude: centroid?.latitude ?? null,
    longitude: centroid?.longitude ?? null,
  });
}

export function parseGeobase(document: unknown, options: ParseOptions = {}): ParseResult {
  if (!isRecord(document) || !Array.isArray(document.features)) {
    return { segments: [], skipped: 0 };
  }

  const cityFilter = options.cityFilter ? foldText(options.cityFilter.trim()) : '';
  const segments: StreetSegment[] = [];
  let skipped = 0;

  for (const feature of document.features) {
    const segment = parseFeature(feature);
    if (!segment) {
      skipped++;
      continue;
    }
    if (cityFilter && segment.city && foldText(segment.city) !== cityFilter) {
      continue;
    }
    segments.push(segment);
  }

  return { segments, skipped };
}
