/**
 * Plain lat/lng pair used at the API and service boundary.
 * Stored as PostGIS Point geometry (GeoJSON order: [lng, lat]).
 */
export interface Location {
  lat: number;
  lng: number;
}
