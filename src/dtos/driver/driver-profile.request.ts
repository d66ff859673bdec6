/**
 * Request body for updating driver location
 * @example { "lat": 41.8781, "lng": -87.6298 }
 */
export interface UpdateLocationRequest {
  /** Current latitude (-90 to 90) */
  lat: number;
  /** Current longitude (-180 to 180) */
  lng: number;
}

/**
 * @example { "available": false }
 */
export interface UpdateAvailabilityRequest {
  available: boolean;
}

/**
 * @example { "equipmentTypes": ["dry_van", "reefer"], "capacityKg": 20000 }
 */
export interface UpdateEquipmentRequest {
  /** Cargo types the truck can haul; empty means any */
  equipmentTypes?: string[];
  /** Max payload in kilograms; null clears it */
  capacityKg?: number | null;
}
