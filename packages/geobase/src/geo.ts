const EARTH_RADIUS_METERS = 6_371_000;

export interface Coordinates {
  latitude: number;
  longitude: number;
}

function isPosition(value: unknown): value is [number, number] {
  return (
    Array.isArray(value) &&
    value.length >= 2 &&
    typeof value[0] === 'number' &&
    typeof value[1] === 'number' &&
    Number.isFinite(value[0]) &&
    Number.isFinite(value[1])
  );
}

function meanOf(positions: unknown[]): Coordinates | null {
  if (positions.length === 0) return null;

  let lonSum = 0;
  let latSum = 0;
  for (const position of positions) {
    if (!isPosition(position)) return null;
    lonSum += position[0];
    latSum += position[1];
  }

  return { latitude: latSum / positions.length, longitude: lonSum / positions.length };
}

/**
 * Centroid of a GeoJSON geometry as the mean of its vertices.
 * Only the shapes the geobase uses are handled; anything else yields null.
 */
export function centroidOf(geometry: unknown): Coordinates | null {
  if (typeof geometry !== 'object' || geometry === null) return null;
  if (!('type' in geometry) || !('coordinates' in geometry)) return null;

  const { type, coordinates } = geometry;
  if (!Array.isArray(coordinates)) return null;

  switch (type) {
    case 'Point':
      return isPosition(coordinates) ? { latitude: coordinates[1], longitude: coordinates[0] } : null;
    case 'LineString':
      return meanOf(coordinates);
    case 'MultiLineString': {
      const flattened: unknown[] = [];
      for (const line of coordinates) {
        if (!Array.isArray(line)) return null;
        flattened.push(...line);
      }
      return meanOf(flattened);
    }
    default:
      return null;
  }
}

export function haversineMeters(from: Coordinates, to: Coordinates): number {
  const toRad = (deg: number) => (deg * Math.PI) / 180;
  const dLat = toRad(to.latitude - from.latitude);
  const dLon = toRad(to.longitude - from.longitude);

  const a =
    Math.sin(dLat / 2) ** 2 +
    Math.cos(toRad(from.latitude)) * Math.cos(toRad(to.latitude)) * Math.sin(dLon / 2) ** 2;

  return EARTH_RADIUS_METERS * 2 * Math.atan2(Math.sqrt(a), Math.sqrt(1 - a));
}
