import { BoundingBox, Coordinate, regionBoundingBox } from './geo.js';

export interface UserRegion {
  center: Coordinate;
  latitudinalMeters: number;
  longitudinalMeters: number;
  boundingBox: BoundingBox;
}

export interface LocationProvider {
  getCurrentLocation: () => Coordinate;
  getRegion: () => UserRegion;
}

// Serves a fixed location; a device-backed provider only has to satisfy LocationProvider.
export const createStaticLocationProvider = (location: Coordinate, spanMeters: number): LocationProvider => {
  const current: Coordinate = { lat: location.lat, lon: location.lon };
  const region: UserRegion = {
    center: current,
    latitudinalMeters: spanMeters,
    longitudinalMeters: spanMeters,
    boundingBox: regionBoundingBox(current, spanMeters),
  };

  return {
    getCurrentLocation: () => current,
    getRegion: () => region,
  };
};
