import { ShipmentStatus } from "../enums/ShipmentStatus";

export type NotificationType =
  | "auction-opened"
  | "bid-outbid"
  | "auction-won"
  | "auction-lost"
  | "shipment-status-changed";

export interface AuctionOpenedEvent {
  type: "auction-opened";
  shipmentId: string;
  round: number;
  closesAt?: string; // ISO-8601; absent when the shipper closes explicitly
}

export interface BidOutbidEvent {
  type: "bid-outbid";
  shipmentId: string;
  driverId: string;
  bidId: string;
  yourPrice: number;
  lowestPrice: number;
}

export interface AuctionWonEvent {
  type: "auction-won";
  shipmentId: string;
  driverId: string;
  bidId: string;
  matchId: string;
  price: number;
}

export interface AuctionLostEvent {
  type: "auction-lost";
  shipmentId: string;
  driverId: string;
  bidId: string;
}

export interface ShipmentStatusChangedEvent {
  type: "shipment-status-changed";
  shipmentId: string;
  shipperId: string;
  from: ShipmentStatus;
  to: ShipmentStatus;
  reason?: string;
}

export type MarketplaceNotification =
  | AuctionOpenedEvent
  | BidOutbidEvent
  | AuctionWonEvent
  | AuctionLostEvent
  | ShipmentStatusChangedEvent;

/**
 * Outbound push / messaging collaborator. Delivery is best effort.
 */
export interface NotificationPublisher {
  publish(notification: MarketplaceNotification): Promise<void>;
  close?(): Promise<void>;
}
