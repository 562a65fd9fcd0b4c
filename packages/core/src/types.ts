// Snowwatch Core Types

// ============================================================================
// Geobase Types
// ============================================================================

export type StreetSide = 'Left' | 'Right';

/**
 * One side of one block of a street, as published in the city's geobase.
 * Instances are frozen once parsed and only ever replaced with their snapshot.
 */
export interface StreetSegment {
  id: number;
  name: string;
  side: StreetSide;
  /** 0 marks an unknown end: 0 and 0 is no range at all, 1000 and 0 runs on from 1000. */
  addressStart: number;
  addressEnd: number;
  borough: string;
  city: string;
  latitude: number | null;
  longitude: number | null;
}

export type SnapshotSource = 'network' | 'cache';

export interface DatasetSnapshot {
  segments: readonly StreetSegment[];
  byId: ReadonlyMap<number, StreetSegment>;
  fetchedAt: Date;
  expiresAt: Date;
  source: SnapshotSource;
}

export interface StreetSearchResult {
  id: number;
  name: string;
  addressStart: number;
  addressEnd: number;
  side: StreetSide;
  borough: string;
  addressRange: string;
  displayName: string;
  description: string;
}

// ============================================================================
// Snow Removal Types
// ============================================================================

export enum SnowState {
  SNOWED = 'snowed',
  CLEARED = 'cleared',
  SCHEDULED = 'scheduled',
  RESCHEDULED = 'rescheduled',
  DEFERRED = 'deferred',
  IN_PROGRESS = 'in_progress',
  CLEAR = 'clear',
}

export interface SnowRemovalStatus {
  streetId: number;
  /** Raw etat_deneig value, kept even when it is not a known code. */
  code: number;
  state: SnowState | 'unknown';
  known: boolean;
  labelFr: string;
  labelEn: string;
  plannedStart: Date | null;
  plannedEnd: Date | null;
  replannedStart: Date | null;
  replannedEnd: Date | null;
  lastUpdated: Date | null;
  municipalityId: number | null;
  parkingRestricted: boolean;
}

// ============================================================================
// Configuration Types
// ============================================================================

export interface ResolvedStreetConfig {
  streetId: number;
  displayName: string;
  createdAt: Date;
}

export interface PollerState {
  streetId: number;
  displayName: string;
  status: SnowRemovalStatus | null;
  /** False after a failed poll; cleared by the next successful one. */
  available: boolean;
  lastPolledAt: Date | null;
  lastSuccessAt: Date | null;
  lastError?: string;
}
