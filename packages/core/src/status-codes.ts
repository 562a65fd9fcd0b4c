/**
 * Planif-Neige snow-removal status codes (etat_deneig).
 *
 * The scheduling API reports each street side with one of these codes.
 * Codes outside the table are passed through as 'unknown' so a new upstream
 * value never breaks polling.
 */

import { SnowState } from './types.js';

export interface StatusCodeInfo {
  code: number;
  state: SnowState | 'unknown';
  known: boolean;
  labelFr: string;
  labelEn: string;
  parkingRestricted: boolean;
}

export const STATUS_CODES: Readonly<Record<number, SnowState>> = {
  0: SnowState.SNOWED,
  1: SnowState.CLEARED,
  2: SnowState.SCHEDULED,
  3: SnowState.RESCHEDULED,
  4: SnowState.DEFERRED,
  5: SnowState.IN_PROGRESS,
  10: SnowState.CLEAR,
};

export const STATE_LABELS: Readonly<Record<'fr' | 'en', Record<SnowState, string>>> = {
  fr: {
    [SnowState.SNOWED]: 'Enneigé',
    [SnowState.CLEARED]: 'Déneigé',
    [SnowState.SCHEDULED]: 'Planifié',
    [SnowState.RESCHEDULED]: 'Replanifié',
    [SnowState.DEFERRED]: 'Sera replanifié ultérieurement',
    [SnowState.IN_PROGRESS]: 'En cours',
    [SnowState.CLEAR]: 'Dégagé',
  },
  en: {
    [SnowState.SNOWED]: 'Snowed',
    [SnowState.CLEARED]: 'Cleared',
    [SnowState.SCHEDULED]: 'Scheduled',
    [SnowState.RESCHEDULED]: 'Rescheduled',
    [SnowState.DEFERRED]: 'Deferred',
    [SnowState.IN_PROGRESS]: 'In progress',
    [SnowState.CLEAR]: 'Clear',
  },
};

// Parking is banned once a loading operation is planned and until it ends
const PARKING_RESTRICTED_STATES: ReadonlySet<SnowState> = new Set([
  SnowState.SCHEDULED,
  SnowState.RESCHEDULED,
  SnowState.IN_PROGRESS,
]);

export function mapStatusCode(code: number): StatusCodeInfo {
  const state = Object.prototype.hasOwnProperty.call(STATUS_CODES, code)
    ? STATUS_CODES[code]
    : undefined;

  if (state === undefined) {
    return {
      code,
      state: 'unknown',
      known: false,
      labelFr: 'Inconnu',
      labelEn: 'Unknown',
      parkingRestricted: false,
    };
  }

  return {
    code,
    state,
    known: true,
    labelFr: STATE_LABELS.fr[state],
    labelEn: STATE_LABELS.en[state],
    parkingRestricted: PARKING_RESTRICTED_STATES.has(state),
  };
}
