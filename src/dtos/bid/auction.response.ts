import { BidResponse } from "./bid.response";
import { MatchResponse } from "../dispatch/match.response";

export interface AuctionWindowResponse {
  id: string;
  round: number;
  /** 'pending' | 'open' | 'closing' | 'committed' | 'void' */
  state: string;
  opensAt: Date;
  openedAt?: Date;
  /** Absent when the shipper closes explicitly */
  scheduledCloseAt?: Date;
  closed: boolean;
  closedAt?: Date;
  closeTrigger?: string;
  voidReason?: string;
}

export interface RankedBidResponse {
  rank: number;
  score: number;
  priceScore: number;
  reputation: number;
  proximityScore: number;
  backhaulBonus: number;
  backhaulShipmentId?: string;
  bid: BidResponse;
}

/**
 * Result of closing an auction or accepting a bid
 */
export interface AuctionOutcomeResponse {
  shipmentId: string;
  round: number;
  state: string;
  voidReason?: string;
  match?: MatchResponse;
  ranking: RankedBidResponse[];
}

export interface AuctionViewResponse {
  auction?: AuctionWindowResponse;
  ranking: RankedBidResponse[];
  match?: MatchResponse;
}
