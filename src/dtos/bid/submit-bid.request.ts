/**
 * Request body for bidding on a shipment
 * @example {
 *   "shipmentId": "550e8400-e29b-41d4-a716-446655440000",
 *   "price": 850,
 *   "etaMinutes": 45,
 *   "location": { "lat": 41.85, "lng": -87.65 },
 *   "message": "Team drivers, can pick up early"
 * }
 */
export interface SubmitBidRequest {
  shipmentId: string;

  /** Offered price */
  price: number;

  /** Minutes until the driver can be at the pickup */
  etaMinutes: number;

  /** Driver position when bidding */
  location?: {
    lat: number;
    lng: number;
  };

  message?: string;
}
