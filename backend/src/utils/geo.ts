export const EARTH_RADIUS_M = 6371000;

export interface Coordinate {
  readonly lat: number;
  readonly lon: number;
}

export interface BoundingBox {
  minLat: number;
  minLon: number;
  maxLat: number;
  maxLon: number;
}

export type RandomSource = () => number;

const toRadians = (degrees: number) => (degrees * Math.PI) / 180;
const toDegrees = (radians: number) => (radians * 180) / Math.PI;

export const isValidLatitude = (value: number): boolean => Number.isFinite(value) && value >= -90 && value <= 90;
export const isValidLongitude = (value: number): boolean => Number.isFinite(value) && value >= -180 && value <= 180;
// Sampling scales longitude by 1 / cos(latitude), so the poles themselves are excluded.
export const isSamplableLatitude = (value: number): boolean => isValidLatitude(value) && Math.abs(value) < 90;

/**
 * Offsets a center by a polar (angle, distance) pair on a local tangent plane.
 * Longitude spacing is scaled by cos(latitude), which divides by zero at the poles.
 */
export const offsetCoordinate = (center: Coordinate, angleRad: number, distanceMeters: number): Coordinate => {
  const dx = distanceMeters * Math.cos(angleRad);
  const dy = distanceMeters * Math.sin(angleRad);

  const deltaLat = dy / EARTH_RADIUS_M;
  const deltaLon = dx / (EARTH_RADIUS_M * Math.cos(toRadians(center.lat)));

  return {
    lat: center.lat + toDegrees(deltaLat),
    lon: center.lon + toDegrees(deltaLon),
  };
};

interface GenerateLocationsOptions {
  center: Coordinate;
  radiusMeters: number;
  count: number;
  random?: RandomSource;
}

/**
 * Picks `count` points around `center`, each with a uniform angle and a uniform
 * distance in [0, radiusMeters]. Distance is not area-weighted, so points
 * cluster toward the center.
 */
export const generateLocations = ({ center, radiusMeters, count, random = Math.random }: GenerateLocationsOptions): Coordinate[] => {
  const locations: Coordinate[] = [];
  const maxDistance = radiusMeters > 0 ? radiusMeters : 0;

  for (let i = 0; i < count; i += 1) {
    const angle = random() * 2 * Math.PI;
    const distance = random() * maxDistance;
    locations.push(distance === 0 ? { lat: center.lat, lon: center.lon } : offsetCoordinate(center, angle, distance));
  }

  return locations;
};

export const haversineMeters = (from: Coordinate, to: Coordinate): number => {
  const dLat = toRadians(to.lat - from.lat);
  const dLon = toRadians(to.lon - from.lon);
  const a = Math.sin(dLat / 2) ** 2
    + Math.cos(toRadians(from.lat)) * Math.cos(toRadians(to.lat)) * Math.sin(dLon / 2) ** 2;
  return 2 * EARTH_RADIUS_M * Math.atan2(Math.sqrt(a), Math.sqrt(1 - a));
};

// Square region of `spanMeters` on each side, in degrees, around a center.
export const regionBoundingBox = (center: Coordinate, spanMeters: number): BoundingBox => {
  const halfSpan = spanMeters / 2;
  const latDelta = toDegrees(halfSpan / EARTH_RADIUS_M);
  const lonDelta = toDegrees(halfSpan / (EARTH_RADIUS_M * Math.cos(toRadians(center.lat))));
  return {
    minLat: center.lat - latDelta,
    minLon: center.lon - lonDelta,
    maxLat: center.lat + latDelta,
    maxLon: center.lon + lonDelta,
  };
};

export const boundingBoxOf = (points: Coordinate[]): BoundingBox | null => {
  if (!points.length) {
    return null;
  }
  return points.reduce<BoundingBox>(
    (box, point) => ({
      minLat: Math.min(box.minLat, point.lat),
      minLon: Math.min(box.minLon, point.lon),
      maxLat: Math.max(box.maxLat, point.lat),
      maxLon: Math.max(box.maxLon, point.lon),
    }),
    { minLat: points[0].lat, minLon: points[0].lon, maxLat: points[0].lat, maxLon: points[0].lon },
  );
};
