/**
 * Request body for posting a shipment
 * @example {
 *   "origin": { "lat": 41.8781, "lng": -87.6298 },
 *   "originAddress": "2200 S Halsted St, Chicago, IL",
 *   "destination": { "lat": 39.7684, "lng": -86.1581 },
 *   "destinationAddress": "700 W Washington St, Indianapolis, IN",
 *   "weightKg": 12000,
 *   "cargoType": "dry_van",
 *   "description": "24 pallets of canned goods",
 *   "pickupWindowStart": "2026-11-02T08:00:00Z",
 *   "pickupWindowEnd": "2026-11-02T12:00:00Z",
 *   "deliveryWindowStart": "2026-11-02T16:00:00Z",
 *   "deliveryWindowEnd": "2026-11-02T22:00:00Z",
 *   "reservePrice": 900,
 *   "noBidPolicy": "relist",
 *   "auction": { "durationMinutes": 60 }
 * }
 */
export interface CreateShipmentRequest {
  /** Pickup GPS coordinates */
  origin: {
    lat: number;
    lng: number;
  };

  originAddress: string;

  /** Delivery GPS coordinates */
  destination: {
    lat: number;
    lng: number;
  };

  destinationAddress: string;

  /** Cargo weight in kilograms */
  weightKg: number;

  /** Equipment class needed, e.g. "dry_van", "reefer", "flatbed" */
  cargoType: string;

  description?: string;

  pickupWindowStart: Date;
  pickupWindowEnd: Date;
  deliveryWindowStart: Date;
  deliveryWindowEnd: Date;

  /** Highest price the shipper expects to pay; used as the price reference when ranking */
  reservePrice?: number;

  /** What to do when an auction closes without bids (default: relist) */
  noBidPolicy?: "relist" | "cancel";

  /** Keep the shipment as a draft instead of listing it */
  draft?: boolean;

  auction?: StartAuctionRequest;
}

/**
 * How to run an auction
 * @example { "durationMinutes": 30 }
 */
export interface StartAuctionRequest {
  /** Window length in minutes (default from configuration) */
  durationMinutes?: number;

  /** Start the window later; it is opened by the scheduler */
  opensAt?: Date;

  /** No timer: the shipper closes the auction or accepts a bid */
  explicit?: boolean;
}

export interface CancelShipmentRequest {
  reason?: string;
}
