/**
 * Formatting utilities for human-readable time, distance and money
 */

/**
 * Format distance in meters to human-readable string
 * @param meters Distance in meters
 * @returns Formatted string (e.g., "1.5 km", "850 m")
 */
export function formatDistance(meters: number): string {
  if (meters < 0) return "0 m";

  if (meters >= 1000) {
    const km = meters / 1000;
    return `${km.toFixed(1)} km`;
  }

  return `${Math.round(meters)} m`;
}

/**
 * Format duration in minutes to human-readable string
 * @param minutes Duration in minutes
 * @returns Formatted string (e.g., "1h 30m", "45 min")
 */
export function formatMinutes(minutes: number): string {
  if (minutes < 0) return "0 min";

  if (minutes < 60) {
    return `${Math.round(minutes)} min`;
  }

  const hours = Math.floor(minutes / 60);
  const rest = Math.round(minutes % 60);

  if (rest === 0) {
    return `${hours}h`;
  }

  return `${hours}h ${rest}m`;
}

/**
 * Format a price with two decimals (e.g., "480.00")
 */
export function formatPrice(amount: number): string {
  return amount.toFixed(2);
}
