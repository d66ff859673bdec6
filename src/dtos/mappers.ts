import { Shipment } from "../entities/Shipment";
import { Bid } from "../entities/Bid";
import { Match } from "../entities/Match";
import { AuctionWindow } from "../entities/AuctionWindow";
import { DriverProfile } from "../entities/DriverProfile";
import { ShipmentEvent } from "../entities/ShipmentEvent";
import { ReputationEvent } from "../entities/ReputationEvent";
import { BackhaulCandidate, RankedBid } from "../interfaces/Ranking";
import { AuctionOutcome, AuctionView } from "../services/auction/auctionCoordinator";
import { ShipmentWithBids } from "../services/shipment/shipment.service";
import { fromPoint } from "../utils/geo";
import { formatDistance } from "../utils/formatters";
import {
  BackhaulResponse,
  ShipmentEventResponse,
  ShipmentResponse,
  ShipmentWithBidsResponse,
} from "./shipment/shipment.response";
import { BidResponse } from "./bid/bid.response";
import {
  AuctionOutcomeResponse,
  AuctionViewResponse,
  AuctionWindowResponse,
  RankedBidResponse,
} from "./bid/auction.response";
import { MatchResponse } from "./dispatch/match.response";
import {
  DriverProfileResponse,
  ReputationEventResponse,
} from "./driver/driver-profile.response";

// PostgreSQL hands back null for empty nullable columns
function opt<T>(value: T | null | undefined): T | undefined {
  return value === null ? undefined : value;
}

export function toShipmentResponse(shipment: Shipment): ShipmentResponse {
  return {
    id: shipment.id,
    shipperId: shipment.shipperId,
    origin: fromPoint(shipment.origin),
    originAddress: shipment.originAddress,
    destination: fromPoint(shipment.destination),
    destinationAddress: shipment.destinationAddress,
    weightKg: shipment.weightKg,
    cargoType: shipment.cargoType,
    description: opt(shipment.description),
    pickupWindowStart: shipment.pickupWindowStart,
    pickupWindowEnd: shipment.pickupWindowEnd,
    deliveryWindowStart: shipment.deliveryWindowStart,
    deliveryWindowEnd: shipment.deliveryWindowEnd,
    reservePrice: opt(shipment.reservePrice),
    status: shipment.status,
    noBidPolicy: shipment.noBidPolicy,
    auctionRound: shipment.auctionRound,
    createdAt: shipment.createdAt,
  };
}

export function toBidResponse(bid: Bid): BidResponse {
  return {
    id: bid.id,
    shipmentId: bid.shipmentId,
    round: bid.round,
    driverId: bid.driverId,
    price: bid.price,
    etaMinutes: bid.etaMinutes,
    location: bid.driverLocation ? fromPoint(bid.driverLocation) : undefined,
    message: opt(bid.message),
    status: bid.status,
    submittedAt: bid.submittedAt,
    resolvedAt: opt(bid.resolvedAt),
  };
}

export function toMatchResponse(match: Match): MatchResponse {
  return {
    id: match.id,
    shipmentId: match.shipmentId,
    round: match.round,
    bidId: match.bidId,
    driverId: match.driverId,
    price: match.price,
    committedAt: match.committedAt,
    executionStatus: match.executionStatus,
    pickupDeadline: match.pickupDeadline,
    pickedUpAt: opt(match.pickedUpAt),
    departedAt: opt(match.departedAt),
    deliveredAt: opt(match.deliveredAt),
    deliveredOnTime: opt(match.deliveredOnTime),
    cancelledAt: opt(match.cancelledAt),
    failedAt: opt(match.failedAt),
    failureReason: opt(match.failureReason),
  };
}

export function toAuctionWindowResponse(window: AuctionWindow): AuctionWindowResponse {
  return {
    id: window.id,
    round: window.round,
    state: window.state,
    opensAt: window.opensAt,
    openedAt: opt(window.openedAt),
    scheduledCloseAt: opt(window.scheduledCloseAt),
    closed: window.closed,
    closedAt: opt(window.closedAt),
    closeTrigger: opt(window.closeTrigger),
    voidReason: opt(window.voidReason),
  };
}

export function toRankedBidResponses(ranking: RankedBid[]): RankedBidResponse[] {
  return ranking.map((entry, index) => ({
    rank: index + 1,
    score: entry.score,
    priceScore: entry.components.priceScore,
    reputation: entry.components.reputation,
    proximityScore: entry.components.proximityScore,
    backhaulBonus: entry.components.backhaulBonus,
    backhaulShipmentId: entry.backhaulShipmentId,
    bid: toBidResponse(entry.bid),
  }));
}

export function toAuctionOutcomeResponse(outcome: AuctionOutcome): AuctionOutcomeResponse {
  return {
    shipmentId: outcome.shipmentId,
    round: outcome.round,
    state: outcome.state,
    voidReason: outcome.voidReason,
    match: outcome.match ? toMatchResponse(outcome.match) : undefined,
    ranking: toRankedBidResponses(outcome.ranking),
  };
}

export function toAuctionViewResponse(view: AuctionView): AuctionViewResponse {
  return {
    auction: view.window ? toAuctionWindowResponse(view.window) : undefined,
    ranking: toRankedBidResponses(view.ranking),
    match: view.match ? toMatchResponse(view.match) : undefined,
  };
}

export function toShipmentWithBidsResponse(entry: ShipmentWithBids): ShipmentWithBidsResponse {
  return {
    shipment: toShipmentResponse(entry.shipment),
    bids: entry.bids.map(toBidResponse),
    bidCount: entry.bidCount,
    auction: entry.window ? toAuctionWindowResponse(entry.window) : undefined,
    match: entry.match ? toMatchResponse(entry.match) : undefined,
  };
}

export function toShipmentEventResponse(event: ShipmentEvent): ShipmentEventResponse {
  return {
    sequence: event.sequence,
    from: opt(event.fromStatus),
    to: event.toStatus,
    reason: opt(event.reason),
    occurredAt: event.occurredAt,
  };
}

export function toBackhaulResponse(candidate: BackhaulCandidate): BackhaulResponse {
  return {
    shipmentId: candidate.shipmentId,
    origin: candidate.origin,
    originAddress: candidate.originAddress,
    distanceMeters: Math.round(candidate.distanceMeters),
    distance: formatDistance(candidate.distanceMeters),
    pickupWindowEnd: candidate.pickupWindowEnd,
    cargoType: candidate.cargoType,
    weightKg: candidate.weightKg,
    bonus: candidate.bonus,
  };
}

export function toDriverProfileResponse(profile: DriverProfile): DriverProfileResponse {
  return {
    id: profile.id,
    reputationScore: profile.reputationScore,
    completedJobs: profile.completedJobs,
    onTimeJobs: profile.onTimeJobs,
    cancellationCount: profile.cancellationCount,
    currentLocation: profile.currentLocation ? fromPoint(profile.currentLocation) : undefined,
    available: profile.available,
    equipmentTypes: profile.equipmentTypes,
    capacityKg: opt(profile.capacityKg),
  };
}

export function toReputationEventResponse(event: ReputationEvent): ReputationEventResponse {
  return {
    kind: event.kind,
    onTime: opt(event.onTime),
    stage: opt(event.stage),
    shipmentId: opt(event.shipmentId),
    scoreBefore: event.scoreBefore,
    scoreAfter: event.scoreAfter,
    occurredAt: event.occurredAt,
  };
}
