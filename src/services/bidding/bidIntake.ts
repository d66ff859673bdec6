import { v4 as uuidv4 } from "uuid";
import { Bid } from "../../entities/Bid";
import { AuctionState } from "../../enums/AuctionState";
import { BidStatus } from "../../enums/BidStatus";
import { BidRejectionReason } from "../../enums/BidRejectionReason";
import { CancellationStage } from "../../enums/CancellationStage";
import { ShipmentStatus } from "../../enums/ShipmentStatus";
import { Location } from "../../interfaces/Location";
import { Clock, systemClock } from "../../interfaces/Collaborators";
import { BiddingConfig } from "../../config/marketplace.config";
import {
  AuctionClosedError,
  BidRejectedError,
  ConflictError,
  ForbiddenError,
  NotFoundError,
  ValidationError,
} from "../../errors/marketplace.errors";
import { isValidLocation, toPoint } from "../../utils/geo";
import { componentLogger } from "../../utils/logger";
import { MarketplaceStore } from "../store/marketplaceStore";
import { ShipmentGuard, UnitOfWork } from "../concurrency/shipmentGuard";
import { ShipmentLedger } from "../ledger/shipmentLedger";
import { ReputationScorer } from "../reputation/reputationScorer";
import { DriverProfileService } from "../driver/driverProfile.service";

const log = componentLogger("bids");

export interface SubmitBidInput {
  shipmentId: string;
  driverId: string;
  price: number;
  etaMinutes: number;
  location?: Location;
  message?: string;
}

function reject(reason: BidRejectionReason, message: string, status?: number): never {
  log.debug(`Bid rejected (${reason}): ${message}`);
  throw new BidRejectedError(reason, message, status);
}

/**
 * BID INTAKE
 *
 * Validates, timestamps and stores bids. The check-and-insert runs in the
 * same shipment critical section as `close`, so a bid is either in the
 * round that gets ranked or it is rejected as too late.
 */
export class BidIntake {
  constructor(
    private readonly store: MarketplaceStore,
    private readonly guard: ShipmentGuard,
    private readonly ledger: ShipmentLedger,
    private readonly drivers: DriverProfileService,
    private readonly reputation: ReputationScorer,
    private readonly config: BiddingConfig,
    private readonly clock: Clock = systemClock
  ) {}

  async submit(input: SubmitBidInput): Promise<Bid> {
    if (!Number.isFinite(input.price) || input.price <= 0) {
      reject(BidRejectionReason.PRICE_NOT_POSITIVE, "Bid price must be greater than 0", 400);
    }
    if (input.price < this.config.priceFloor) {
      reject(
        BidRejectionReason.PRICE_BELOW_FLOOR,
        `Bid price ${input.price} is below the floor of ${this.config.priceFloor}`,
        400
      );
    }
    if (!Number.isFinite(input.etaMinutes) || input.etaMinutes < 0) {
      throw new ValidationError("etaMinutes must be a non-negative number");
    }
    if (input.location && !isValidLocation(input.location)) {
      throw new ValidationError("location must be a valid lat/lng");
    }

    // Committed before the shipment section; driver lock is never held while waiting on a shipment
    const profile = await this.drivers.ensureProfile(input.driverId);

    return this.guard.run(input.shipmentId, async (unit) => {
      const { session } = unit;
      const now = this.clock();

      const shipment = await this.ledger.get(input.shipmentId, session, { forUpdate: true });
      const window = await session.windows.findLatest(shipment.id);

      const currentRound = window !== null && window.round === shipment.auctionRound;
      if (
        window &&
        currentRound &&
        (window.closed || (window.scheduledCloseAt !== undefined && window.scheduledCloseAt !== null && now >= window.scheduledCloseAt))
      ) {
        reject(BidRejectionReason.WINDOW_CLOSED, `Auction for shipment ${shipment.id} is closed`);
      }

      if (shipment.status !== ShipmentStatus.BIDDING || !window || window.state !== AuctionState.OPEN) {
        reject(BidRejectionReason.NOT_BIDDING, `Shipment ${shipment.id} is not accepting bids`);
      }

      if (shipment.excludedDriverIds.includes(input.driverId)) {
        reject(
          BidRejectionReason.DRIVER_EXCLUDED,
          `Driver ${input.driverId} cancelled this shipment earlier and may not bid again`,
          403
        );
      }

      if (!profile.available) {
        reject(BidRejectionReason.DRIVER_UNAVAILABLE, `Driver ${input.driverId} is marked unavailable`);
      }

      if (await session.bids.findActive(shipment.id, input.driverId)) {
        reject(
          BidRejectionReason.DUPLICATE_ACTIVE_BID,
          `Driver ${input.driverId} already has an active bid on shipment ${shipment.id}`
        );
      }

      const previous = await session.bids.listByShipment(shipment.id, {
        round: window.round,
        statuses: [BidStatus.ACTIVE],
      });

      const bid = await session.bids.insert({
        id: uuidv4(),
        shipmentId: shipment.id,
        round: window.round,
        driverId: input.driverId,
        price: input.price,
        etaMinutes: input.etaMinutes,
        driverLocation: input.location ? toPoint(input.location) : undefined,
        message: input.message,
        status: BidStatus.ACTIVE,
        submittedAt: now,
        version: 1,
      });

      this.notifyOutbid(unit, previous, bid);
      log.debug(`Bid ${bid.id} accepted: driver ${bid.driverId} offers ${bid.price} on ${shipment.id}`);
      return bid;
    });
  }

  /**
   * Driver pulls an active bid. Counts as a pre-match cancellation.
   */
  async withdraw(bidId: string, driverId: string): Promise<Bid> {
    const existing = await this.store.bids.findById(bidId);
    if (!existing) {
      throw new NotFoundError("Bid", bidId);
    }

    return this.guard.run(existing.shipmentId, async ({ session }) => {
      const bid = await session.bids.findById(bidId);
      if (!bid) {
        throw new NotFoundError("Bid", bidId);
      }
      if (bid.driverId !== driverId) {
        throw new ForbiddenError(`Bid ${bidId} belongs to another driver`);
      }

      const window = await session.windows.findLatest(bid.shipmentId);
      const windowOpen = window !== null && window.round === bid.round && !window.closed;

      if (bid.status === BidStatus.WITHDRAWN) {
        throw new ConflictError(`Bid ${bidId} is already withdrawn`);
      }
      if (bid.status !== BidStatus.ACTIVE || !windowOpen) {
        throw new AuctionClosedError(bid.shipmentId);
      }

      const moved = await session.bids.resolve([bid.id], BidStatus.WITHDRAWN, this.clock());
      if (moved !== 1) {
        throw new ConflictError(`Bid ${bidId} changed concurrently`);
      }

      await this.reputation.recordCancellation(driverId, CancellationStage.PRE_MATCH, {
        session,
        shipmentId: bid.shipmentId,
      });

      const withdrawn = await session.bids.findById(bidId);
      if (!withdrawn) {
        throw new NotFoundError("Bid", bidId);
      }
      log.info(`Bid ${bidId} withdrawn by driver ${driverId}`);
      return withdrawn;
    });
  }

  async listForDriver(driverId: string, limit = 50): Promise<Bid[]> {
    return this.store.bids.listByDriver(driverId, Math.min(Math.max(1, limit), 200));
  }

  private notifyOutbid(unit: UnitOfWork, previous: Bid[], bid: Bid): void {
    if (previous.length === 0) return;

    const lowest = Math.min(...previous.map((b) => b.price));
    if (bid.price >= lowest) return;

    for (const outbid of previous.filter((b) => b.price === lowest && b.driverId !== bid.driverId)) {
      unit.notify({
        type: "bid-outbid",
        shipmentId: bid.shipmentId,
        driverId: outbid.driverId,
        bidId: outbid.id,
        yourPrice: outbid.price,
        lowestPrice: bid.price,
      });
    }
  }
}
