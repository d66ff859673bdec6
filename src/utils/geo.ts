import { Point } from "geojson";
import { Location } from "../interfaces/Location";

const EARTH_RADIUS_METERS = 6371000;

/**
 * Convert lat/lng to a GeoJSON Point ([lng, lat])
 */
export function toPoint(location: Location): Point {
  return {
    type: "Point",
    coordinates: [location.lng, location.lat],
  };
}

/**
 * Convert a GeoJSON Point back to lat/lng
 */
export function fromPoint(point: Point): Location {
  const [lng, lat] = point.coordinates;
  return { lat, lng };
}

/**
 * Haversine distance between two locations (meters)
 */
export function haversineDistance(from: Location, to: Location): number {
  const φ1 = (from.lat * Math.PI) / 180;
  const φ2 = (to.lat * Math.PI) / 180;
  const Δφ = ((to.lat - from.lat) * Math.PI) / 180;
  const Δλ = ((to.lng - from.lng) * Math.PI) / 180;

  const a =
    Math.sin(Δφ / 2) * Math.sin(Δφ / 2) +
    Math.cos(φ1) * Math.cos(φ2) * Math.sin(Δλ / 2) * Math.sin(Δλ / 2);

  const c = 2 * Math.atan2(Math.sqrt(a), Math.sqrt(1 - a));

  return EARTH_RADIUS_METERS * c;
}

export function isValidLocation(location: Location): boolean {
  return (
    Number.isFinite(location.lat) &&
    Number.isFinite(location.lng) &&
    location.lat >= -90 &&
    location.lat <= 90 &&
    location.lng >= -180 &&
    location.lng <= 180
  );
}
