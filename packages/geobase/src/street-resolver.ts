/**
 * Street Resolver
 *
 * Resolves what a user typed (a street name, optionally a civic number, or a
 * free-text address) to géobase street segments. Every lookup reads one
 * snapshot from the dataset store and works on it alone.
 *
 * Ranking of search():
 *   1. exact name and the civic number inside the segment's address range
 *   2. exact name, no range match (no civic number given, or no known range start)
 *   3. fuzzy name matches, by match quality, range matches first
 * Ties: borough, then side (Left before Right), then segment id.
 */

import type { StreetSearchResult, StreetSegment, StreetSide } from '@snowwatch/core';
import type { DatasetStore } from './dataset-store.js';
import { haversineMeters } from './geo.js';
import { levenshtein, normalizeStreetName } from './normalize.js';

export const DEFAULT_SEARCH_LIMIT = 20;

export type NameMatch = 'exact' | 'prefix' | 'word' | 'contains' | 'contained' | 'typo';

const MATCH_QUALITY: Record<NameMatch, number> = {
  exact: 0,
  prefix: 1,
  word: 2,
  contains: 3,
  contained: 4,
  typo: 5,
};

const SIDE_ORDER: Record<StreetSide, number> = { Left: 0, Right: 1 };

export interface SearchOptions {
  limit?: number;
}

export interface NearestOptions {
  streetName?: string;
  civicNumber?: number;
  limit?: number;
}

export interface ParsedAddress {
  civicNumber: number | null;
  streetName: string | null;
}

interface RankedSegment {
  segment: StreetSegment;
  tier: 1 | 2 | 3;
  quality: number;
  inRange: boolean;
}

// ============================================================================
// Pure helpers
// ============================================================================

export function isUnbounded(segment: StreetSegment): boolean {
  return segment.addressStart === 0 && segment.addressEnd === 0;
}

/** Both ends of the address range are known. */
export function isBounded(segment: StreetSegment): boolean {
  return segment.addressStart > 0 && segment.addressEnd > 0;
}

/**
 * A start-only range covers every number from its start on. An end-only or
 * unbounded range covers nothing for certain.
 */
export function rangeContains(segment: StreetSegment, civicNumber: number): boolean {
  if (isBounded(segment)) {
    return segment.addressStart <= civicNumber && civicNumber <= segment.addressEnd;
  }
  return segment.addressStart > 0 && civicNumber >= segment.addressStart;
}

/** No known lower bound: kept whatever the civic number, behind range matches. */
function isCivicFallback(segment: StreetSegment): boolean {
  return segment.addressStart === 0;
}

/**
 * Compare two already-normalized names. Returns null when they do not match.
 */
export function matchStreetName(query: string, candidate: string): NameMatch | null {
  if (!query || !candidate) return null;
  if (candidate === query) return 'exact';
  if (candidate.startsWith(query)) return 'prefix';
  if (candidate.split(' ').includes(query)) return 'word';
  if (candidate.includes(query)) return 'contains';
  if (candidate.length >= 3 && query.includes(candidate)) return 'contained';

  const maxDistance = query.length >= 8 ? 2 : query.length >= 4 ? 1 : 0;
  if (
    maxDistance > 0 &&
    Math.abs(candidate.length - query.length) <= maxDistance &&
    levenshtein(query, candidate) <= maxDistance
  ) {
    return 'typo';
  }

  return null;
}

function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function compareRanked(a: RankedSegment, b: RankedSegment): number {
  return (
    a.tier - b.tier ||
    a.quality - b.quality ||
    Number(b.inRange) - Number(a.inRange) ||
    compareText(a.segment.borough, b.segment.borough) ||
    SIDE_ORDER[a.segment.side] - SIDE_ORDER[b.segment.side] ||
    a.segment.id - b.segment.id
  );
}

/**
 * Split "1234, rue Saint-Denis, Montréal" into civic number and street.
 */
export function parseAddress(address: string): ParsedAddress {
  const match = /^\s*(\d+)\s*[,\s]+(.+?)(?:,|$)/.exec(address);
  if (match) {
    return { civicNumber: parseInt(match[1], 10), streetName: match[2].trim() };
  }

  const cleaned = address
    .replace(/,?\s*(montreal|montréal|qc|quebec|québec|canada)\b.*$/i, '')
    .trim();
  return { civicNumber: null, streetName: cleaned || null };
}

export function formatAddressRange(segment: StreetSegment): string {
  if (isBounded(segment)) return `${segment.addressStart}-${segment.addressEnd}`;
  if (segment.addressStart > 0) return `${segment.addressStart}+`;
  if (segment.addressEnd > 0) return `up to ${segment.addressEnd}`;
  return 'N/A';
}

export function describeSegment(segment: StreetSegment): StreetSearchResult {
  const addressRange = formatAddressRange(segment);
  const sideLetter = segment.side === 'Right' ? 'R' : 'L';

  const parts = [segment.name];
  if (!isUnbounded(segment)) parts.push(`(${addressRange})`);
  parts.push(`- ${segment.side} side`);
  if (segment.borough) parts.push(`[${segment.borough}]`);

  return {
    id: segment.id,
    name: segment.name,
    addressStart: segment.addressStart,
    addressEnd: segment.addressEnd,
    side: segment.side,
    borough: segment.borough,
    addressRange,
    displayName: `${segment.name} (${addressRange}, ${sideLetter})`,
    description: parts.join(' '),
  };
}

function assertCivicNumber(civicNumber: number): void {
  if (!Number.isInteger(civicNumber) || civicNumber < 0) {
    throw new RangeError(`Civic number must be a non-negative integer, got ${civicNumber}`);
  }
}

// ============================================================================
// StreetResolver
// ============================================================================

export class StreetResolver {
  private readonly store: DatasetStore;
  // Segments are frozen and shared by reference, so their normalized name never changes
  private readonly normalizedNames = new WeakMap<StreetSegment, string>();

  constructor(store: DatasetStore) {
    this.store = store;
  }

  async search(streetName: string, civicNumber?: number, options: SearchOptions = {}): Promise<StreetSegment[]> {
    if (civicNumber !== undefined) assertCivicNumber(civicNumber);

    const query = normalizeStreetName(streetName);
    if (!query) return [];

    const { segments } = await this.store.getSnapshot();
    const ranked: RankedSegment[] = [];

    for (const segment of segments) {
      const match = matchStreetName(query, this.normalizedName(segment));
      if (!match) continue;

      let inRange = false;
      if (civicNumber !== undefined) {
        inRange = rangeContains(segment, civicNumber);
        if (!inRange && !isCivicFallback(segment)) continue;
      }

      const tier = match === 'exact' ? (inRange ? 1 : 2) : 3;
      ranked.push({ segment, tier, quality: MATCH_QUALITY[match], inRange });
    }

    ranked.sort(compareRanked);
    return ranked.slice(0, options.limit ?? DEFAULT_SEARCH_LIMIT).map((r) => r.segment);
  }

  /**
   * Free-text address search: "1234 Saint-Denis" or "rue Sherbrooke, Montréal".
   */
  async searchAddress(address: string, options: SearchOptions = {}): Promise<StreetSegment[]> {
    const { civicNumber, streetName } = parseAddress(address);
    if (!streetName) return [];
    return this.search(streetName, civicNumber ?? undefined, options);
  }

  /**
   * Every bounded segment whose range holds the civic number, optionally
   * narrowed to names containing the hint.
   */
  async searchByCivicNumber(
    civicNumber: number,
    streetHint?: string,
    options: SearchOptions = {},
  ): Promise<StreetSegment[]> {
    assertCivicNumber(civicNumber);
    const hint = streetHint ? normalizeStreetName(streetHint) : '';
    const { segments } = await this.store.getSnapshot();

    return segments
      .filter((segment) => isBounded(segment) && rangeContains(segment, civicNumber))
      .filter((segment) => !hint || this.normalizedName(segment).includes(hint))
      .sort(
        (a, b) =>
          compareText(a.name, b.name) || a.addressStart - b.addressStart || a.id - b.id,
      )
      .slice(0, options.limit ?? 15);
  }

  async findNearest(latitude: number, longitude: number, options: NearestOptions = {}): Promise<StreetSegment[]> {
    if (options.civicNumber !== undefined) assertCivicNumber(options.civicNumber);
    const nameFilter = options.streetName ? normalizeStreetName(options.streetName) : '';
    const { segments } = await this.store.getSnapshot();
    const origin = { latitude, longitude };

    const results: Array<{ segment: StreetSegment; distance: number }> = [];
    for (const segment of segments) {
      if (segment.latitude === null || segment.longitude === null) continue;

      if (nameFilter) {
        const name = this.normalizedName(segment);
        if (!name.includes(nameFilter) && !nameFilter.includes(name)) continue;
      }

      const civic = options.civicNumber;
      if (civic !== undefined && !isCivicFallback(segment) && !rangeContains(segment, civic)) continue;

      const distance = haversineMeters(origin, { latitude: segment.latitude, longitude: segment.longitude });
      results.push({ segment, distance });
    }

    results.sort((a, b) => a.distance - b.distance || a.segment.id - b.segment.id);
    return results.slice(0, options.limit ?? 10).map((r) => r.segment);
  }

  async getById(streetId: number): Promise<StreetSegment | null> {
    const snapshot = await this.store.getSnapshot();
    return snapshot.byId.get(streetId) ?? null;
  }

  private normalizedName(segment: StreetSegment): string {
    let name = this.normalizedNames.get(segment);
    if (name === undefined) {
      name = normalizeStreetName(segment.name);
      this.normalizedNames.set(segment, name);
    }
    return name;
  }
}
