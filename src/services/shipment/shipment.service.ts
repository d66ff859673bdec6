import { Shipment } from "../../entities/Shipment";
import { Bid } from "../../entities/Bid";
import { Match } from "../../entities/Match";
import { AuctionWindow } from "../../entities/AuctionWindow";
import { ShipmentEvent } from "../../entities/ShipmentEvent";
import { ShipmentStatus } from "../../enums/ShipmentStatus";
import { BackhaulCandidate } from "../../interfaces/Ranking";
import { Clock, systemClock } from "../../interfaces/Collaborators";
import { BiddingConfig } from "../../config/marketplace.config";
import { ForbiddenError } from "../../errors/marketplace.errors";
import { MarketplaceStore } from "../store/marketplaceStore";
import { NewShipment, ShipmentLedger } from "../ledger/shipmentLedger";
import { AuctionCoordinator } from "../auction/auctionCoordinator";
import { BackhaulMatcher } from "../ranking/backhaulMatcher";

export interface AuctionRequest {
  /**
   * Window length; defaults to the configured window
   */
  durationMinutes?: number;
  /**
   * Future start; the window is created PENDING and opened by the scheduler
   */
  opensAt?: Date;
  /**
   * No timer; the shipper closes or accepts a bid
   */
  explicit?: boolean;
}

export interface PostShipmentInput extends NewShipment {
  /**
   * Keep the shipment as DRAFT instead of listing it
   */
  draft?: boolean;
  auction?: AuctionRequest;
}

export interface PostedShipment {
  shipment: Shipment;
  window?: AuctionWindow;
}

export interface ShipmentWithBids {
  shipment: Shipment;
  bids: Bid[];
  bidCount: number;
  window: AuctionWindow | null;
  match: Match | null;
}

/**
 * Sort bids by amount, earliest first on equal amounts
 */
export function sortBidsByAmount(bids: Bid[]): Bid[] {
  return [...bids].sort(
    (a, b) => a.price - b.price || a.submittedAt.getTime() - b.submittedAt.getTime()
  );
}

/**
 * Shipper-facing workflow: post, publish, browse and audit shipments
 */
export class ShipmentService {
  constructor(
    private readonly store: MarketplaceStore,
    private readonly ledger: ShipmentLedger,
    private readonly coordinator: AuctionCoordinator,
    private readonly backhaul: BackhaulMatcher,
    private readonly bidding: BiddingConfig,
    private readonly clock: Clock = systemClock
  ) {}

  /**
   * Create a shipment and, unless kept as draft, list it and start its auction
   */
  async post(input: PostShipmentInput): Promise<PostedShipment> {
    const shipment = await this.ledger.create(input);
    if (input.draft) {
      return { shipment };
    }
    return this.publish(shipment.id, input.shipperId, input.auction);
  }

  /**
   * DRAFT -> OPEN, then open or schedule the first auction
   */
  async publish(shipmentId: string, shipperId: string, auction: AuctionRequest = {}): Promise<PostedShipment> {
    const draft = await this.ownedShipment(shipmentId, shipperId);
    if (draft.status === ShipmentStatus.DRAFT) {
      await this.ledger.transition(shipmentId, ShipmentStatus.DRAFT, ShipmentStatus.OPEN, {
        reason: "published",
      });
    }

    const window = await this.startAuction(shipmentId, shipperId, auction);
    return { shipment: await this.ledger.get(shipmentId), window };
  }

  /**
   * Run another auction on an OPEN (e.g. re-listed) shipment
   */
  async startAuction(shipmentId: string, shipperId: string, auction: AuctionRequest = {}): Promise<AuctionWindow> {
    const durationMinutes = auction.durationMinutes ?? this.bidding.defaultWindowMinutes;

    if (auction.opensAt && auction.opensAt.getTime() > this.clock().getTime()) {
      return this.coordinator.schedule(shipmentId, auction.opensAt, durationMinutes, shipperId);
    }
    if (auction.explicit) {
      return this.coordinator.open(shipmentId, { explicit: true }, shipperId);
    }
    return this.coordinator.open(shipmentId, { durationMinutes }, shipperId);
  }

  async get(shipmentId: string): Promise<Shipment> {
    return this.ledger.get(shipmentId);
  }

  async list(statuses?: ShipmentStatus[], limit?: number): Promise<Shipment[]> {
    return this.ledger.list({ statuses, limit });
  }

  async getWithBids(shipmentId: string): Promise<ShipmentWithBids> {
    const shipment = await this.ledger.get(shipmentId);
    return this.attachBids(shipment);
  }

  async listForShipper(shipperId: string): Promise<ShipmentWithBids[]> {
    const shipments = await this.ledger.list({ shipperId });
    return Promise.all(shipments.map((shipment) => this.attachBids(shipment)));
  }

  async history(shipmentId: string, shipperId?: string): Promise<ShipmentEvent[]> {
    if (shipperId !== undefined) {
      await this.ownedShipment(shipmentId, shipperId);
    }
    return this.ledger.history(shipmentId);
  }

  async backhauls(shipmentId: string, driverId?: string): Promise<BackhaulCandidate[]> {
    const shipment = await this.ledger.get(shipmentId);
    if (driverId === undefined) {
      return this.backhaul.recommend(shipment);
    }
    const profile = await this.store.drivers.findById(driverId);
    return this.backhaul.recommend(shipment, profile);
  }

  private async ownedShipment(shipmentId: string, shipperId: string): Promise<Shipment> {
    const shipment = await this.ledger.get(shipmentId);
    if (shipment.shipperId !== shipperId) {
      throw new ForbiddenError(`Shipment ${shipmentId} belongs to another shipper`);
    }
    return shipment;
  }

  private async attachBids(shipment: Shipment): Promise<ShipmentWithBids> {
    const bids = sortBidsByAmount(await this.store.bids.listByShipment(shipment.id));
    const window = await this.store.windows.findLatest(shipment.id);
    const match = await this.store.matches.findActiveByShipment(shipment.id);

    return { shipment, bids, bidCount: bids.length, window, match };
  }
}
