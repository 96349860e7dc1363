const EARTH_RADIUS_KM = 6371;

export interface Coordinates {
  latitude: number;
  longitude: number;
}

const toRadians = (degrees: number) => (degrees * Math.PI) / 180;
const hav = (theta: number) => Math.sin(theta / 2) ** 2;

/** Great-circle distance in kilometres (haversine), rounded to metres. */
export function distanceKm(from: Coordinates, to: Coordinates): number {
  const lat1 = toRadians(from.latitude);
  const lat2 = toRadians(to.latitude);
  const lonDelta = toRadians(to.longitude - from.longitude);
  const d = 2 * EARTH_RADIUS_KM * Math.asin(Math.sqrt(hav(lat2 - lat1) + Math.cos(lat1) * Math.cos(lat2) * hav(lonDelta)));
  return Math.round(d * 1000) / 1000;
}

/** Initial bearing in degrees, normalized to [0, 360) and rounded to 0.1°. */
export function bearingDegrees(from: Coordinates, to: Coordinates): number {
  const lat1 = toRadians(from.latitude);
  const lat2 = toRadians(to.latitude);
  const lonDelta = toRadians(to.longitude - from.longitude);
  const radians = Math.atan2(
    Math.sin(lonDelta) * Math.cos(lat2),
    Math.cos(lat1) * Math.sin(lat2) - Math.sin(lat1) * Math.cos(lat2) * Math.cos(lonDelta),
  );
  const degrees = ((radians * 180) / Math.PI + 360) % 360;
  // Rounding 359.96 up must not produce 360
  const rounded = Math.round(degrees * 10) / 10;
  return rounded >= 360 ? 0 : rounded;
}

export function hasCoordinates(value: { latitude: number | null; longitude: number | null }): value is Coordinates {
  return value.latitude !== null && value.longitude !== null;
}
