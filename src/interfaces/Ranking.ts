import { Bid } from "../entities/Bid";

/**
 * Per-factor breakdown behind a bid's composite score
 */
export interface ScoreComponents {
  priceScore: number;
  reputation: number;
  proximityScore: number;
  backhaulBonus: number;
}

export interface RankedBid {
  bid: Bid;
  score: number;
  components: ScoreComponents;
  backhaulShipmentId?: string;
}

export interface BackhaulCandidate {
  shipmentId: string;
  origin: { lat: number; lng: number };
  originAddress: string;
  distanceMeters: number;
  pickupWindowEnd: Date;
  cargoType: string;
  weightKg: number;
  bonus: number;
}
