/**
 * Status Code Tests
 *
 * Tests mapStatusCode() for every known etat_deneig value and the
 * pass-through of codes the table does not know.
 */

import { describe, it, expect } from 'vitest';
import { mapStatusCode, STATUS_CODES } from '../status-codes.js';
import { SnowState } from '../types.js';

describe('mapStatusCode', () => {
  it('maps every known code to its state', () => {
    expect(mapStatusCode(0).state).toBe(SnowState.SNOWED);
    expect(mapStatusCode(1).state).toBe(SnowState.CLEARED);
    expect(mapStatusCode(2).state).toBe(SnowState.SCHEDULED);
    expect(mapStatusCode(3).state).toBe(SnowState.RESCHEDULED);
    expect(mapStatusCode(4).state).toBe(SnowState.DEFERRED);
    expect(mapStatusCode(5).state).toBe(SnowState.IN_PROGRESS);
    expect(mapStatusCode(10).state).toBe(SnowState.CLEAR);
  });

  it('maps code 5 to in progress with both labels', () => {
    expect(mapStatusCode(5)).toEqual({
      code: 5,
      state: SnowState.IN_PROGRESS,
      known: true,
      labelFr: 'En cours',
      labelEn: 'In progress',
      parkingRestricted: true,
    });
  });

  it('passes an unrecognized code through as unknown', () => {
    expect(mapStatusCode(99)).toEqual({
      code: 99,
      state: 'unknown',
      known: false,
      labelFr: 'Inconnu',
      labelEn: 'Unknown',
      parkingRestricted: false,
    });
  });

  it('does not treat inherited object keys as codes', () => {
    expect(mapStatusCode(6).known).toBe(false);
    expect(mapStatusCode(-1).known).toBe(false);
  });

  it('restricts parking only while loading is planned or running', () => {
    const restricted = Object.keys(STATUS_CODES)
      .map(Number)
      .filter((code) => mapStatusCode(code).parkingRestricted);

    expect(restricted).toEqual([2, 3, 5]);
  });
});
