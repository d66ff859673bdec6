import { BidResponse } from "../bid/bid.response";
import { AuctionWindowResponse } from "../bid/auction.response";
import { MatchResponse } from "../dispatch/match.response";

/**
 * Shipment information response
 * @example {
 *   "id": "550e8400-e29b-41d4-a716-446655440000",
 *   "shipperId": "shipper-42",
 *   "origin": { "lat": 41.8781, "lng": -87.6298 },
 *   "originAddress": "2200 S Halsted St, Chicago, IL",
 *   "destination": { "lat": 39.7684, "lng": -86.1581 },
 *   "destinationAddress": "700 W Washington St, Indianapolis, IN",
 *   "weightKg": 12000,
 *   "cargoType": "dry_van",
 *   "pickupWindowStart": "2026-11-02T08:00:00.000Z",
 *   "pickupWindowEnd": "2026-11-02T12:00:00.000Z",
 *   "deliveryWindowStart": "2026-11-02T16:00:00.000Z",
 *   "deliveryWindowEnd": "2026-11-02T22:00:00.000Z",
 *   "reservePrice": 900,
 *   "status": "bidding",
 *   "noBidPolicy": "relist",
 *   "auctionRound": 1,
 *   "createdAt": "2026-11-01T09:00:00.000Z"
 * }
 */
export interface ShipmentResponse {
  id: string;
  shipperId: string;
  origin: { lat: number; lng: number };
  originAddress: string;
  destination: { lat: number; lng: number };
  destinationAddress: string;
  weightKg: number;
  cargoType: string;
  description?: string;
  pickupWindowStart: Date;
  pickupWindowEnd: Date;
  deliveryWindowStart: Date;
  deliveryWindowEnd: Date;
  reservePrice?: number;
  /** 'draft' | 'open' | 'bidding' | 'matched' | 'in_transit' | 'delivered' | 'cancelled' | 'failed' */
  status: string;
  noBidPolicy: string;
  auctionRound: number;
  createdAt: Date;
}

export interface PostShipmentResponse {
  shipment: ShipmentResponse;
  auction?: AuctionWindowResponse;
}

/**
 * Shipment with every bid it received, cheapest first
 */
export interface ShipmentWithBidsResponse {
  shipment: ShipmentResponse;
  bids: BidResponse[];
  bidCount: number;
  auction?: AuctionWindowResponse;
  match?: MatchResponse;
}

export interface ShipmentEventResponse {
  sequence: number;
  from?: string;
  to: string;
  reason?: string;
  occurredAt: Date;
}

export interface BackhaulResponse {
  shipmentId: string;
  origin: { lat: number; lng: number };
  originAddress: string;
  /** Distance from this shipment's destination to the candidate's origin, in meters */
  distanceMeters: number;
  distance: string;
  pickupWindowEnd: Date;
  cargoType: string;
  weightKg: number;
  /** Ranking bonus in [0, 1] */
  bonus: number;
}
