import { v4 as uuidv4 } from "uuid";
import { Shipment } from "../../entities/Shipment";
import { Bid } from "../../entities/Bid";
import { Match } from "../../entities/Match";
import { AuctionWindow } from "../../entities/AuctionWindow";
import { ShipmentStatus } from "../../enums/ShipmentStatus";
import { AuctionState } from "../../enums/AuctionState";
import { BidStatus } from "../../enums/BidStatus";
import { CloseTrigger } from "../../enums/CloseTrigger";
import { ExecutionStatus } from "../../enums/ExecutionStatus";
import { NoBidPolicy } from "../../enums/NoBidPolicy";
import { RankedBid } from "../../interfaces/Ranking";
import { Clock, systemClock } from "../../interfaces/Collaborators";
import { BiddingConfig, DispatchConfig } from "../../config/marketplace.config";
import {
  AuctionClosedError,
  ConflictError,
  ForbiddenError,
  NotFoundError,
  ValidationError,
} from "../../errors/marketplace.errors";
import { componentLogger } from "../../utils/logger";
import { MarketplaceStore } from "../store/marketplaceStore";
import { ShipmentGuard, UnitOfWork } from "../concurrency/shipmentGuard";
import { ShipmentLedger } from "../ledger/shipmentLedger";
import { RankingEngine } from "../ranking/rankingEngine";
import { AuctionTimers } from "./auctionTimers";
import { formatMinutes, formatPrice } from "../../utils/formatters";

const log = componentLogger("auction");

const MINUTE_MS = 60 * 1000;

export type OpenOptions = { durationMinutes: number } | { explicit: true };

export type VoidReason = "no_bids" | "cancelled";

export interface AuctionOutcome {
  shipmentId: string;
  round: number;
  state: AuctionState;
  match?: Match;
  voidReason?: string;
  ranking: RankedBid[];
}

export interface AuctionView {
  window: AuctionWindow | null;
  ranking: RankedBid[];
  match: Match | null;
}

export interface CloseOptions {
  shipperId?: string;
  /**
   * Timer closes carry the round they were armed for; a stale timer is a no-op
   */
  round?: number;
}

export interface CancelOutcome {
  shipment: Shipment;
  cancelledMatch?: Match;
}

export interface AuctionCoordinatorSettings {
  bidding: BiddingConfig;
  dispatch: DispatchConfig;
}

function assertOwner(shipment: Shipment, shipperId: string | undefined): void {
  if (shipperId !== undefined && shipment.shipperId !== shipperId) {
    throw new ForbiddenError(`Shipment ${shipment.id} belongs to another shipper`);
  }
}

function validateDuration(minutes: number): void {
  if (!Number.isFinite(minutes) || minutes <= 0) {
    throw new ValidationError("durationMinutes must be greater than 0");
  }
}

/**
 * AUCTION COORDINATOR
 *
 * Runs auction windows: open, close (timer, shipper or acceptance) and the
 * atomic commit of one winner. Every entry point works inside the
 * shipment's critical section, and `close` is idempotent so timer and
 * shipper closes can race freely.
 */
export class AuctionCoordinator {
  constructor(
    private readonly store: MarketplaceStore,
    private readonly guard: ShipmentGuard,
    private readonly ledger: ShipmentLedger,
    private readonly ranking: RankingEngine,
    private readonly timers: AuctionTimers,
    private readonly settings: AuctionCoordinatorSettings,
    private readonly clock: Clock = systemClock
  ) {}

  /**
   * Start bidding now. Shipment OPEN -> BIDDING with a new round.
   */
  async open(shipmentId: string, options: OpenOptions, shipperId?: string): Promise<AuctionWindow> {
    const durationMinutes = "durationMinutes" in options ? options.durationMinutes : undefined;
    if (durationMinutes !== undefined) {
      validateDuration(durationMinutes);
    }

    return this.guard.run(shipmentId, async (unit) => {
      const shipment = await this.ledger.get(shipmentId, unit.session, { forUpdate: true });
      assertOwner(shipment, shipperId);

      const latest = await unit.session.windows.findLatest(shipmentId);
      if (latest && latest.state === AuctionState.PENDING) {
        // Shipper opens a scheduled window early
        const voided = await unit.session.windows.save({
          ...latest,
          state: AuctionState.VOID,
          closed: true,
          closedAt: this.clock(),
          voidReason: "superseded",
        });
        if (!voided) {
          throw new ConflictError(`Auction window for shipment ${shipmentId} changed concurrently`);
        }
        unit.afterCommit(() => this.timers.cancelAuctionTimers(shipmentId));
      }

      if (shipment.status !== ShipmentStatus.OPEN) {
        throw new ConflictError(
          `Shipment ${shipmentId} is ${shipment.status}; only open shipments can start an auction`
        );
      }

      const round = Math.max(shipment.auctionRound, latest?.round ?? 0) + 1;
      const bidding = await this.ledger.transition(
        shipmentId,
        ShipmentStatus.OPEN,
        ShipmentStatus.BIDDING,
        { unit, reason: "auction_opened", patch: { auctionRound: round } }
      );

      return this.insertOpenWindow(unit, bidding, round, durationMinutes);
    });
  }

  /**
   * Create a PENDING window the scheduler opens at `opensAt`
   */
  async schedule(
    shipmentId: string,
    opensAt: Date,
    durationMinutes: number,
    shipperId?: string
  ): Promise<AuctionWindow> {
    validateDuration(durationMinutes);
    if (Number.isNaN(opensAt.getTime())) {
      throw new ValidationError("opensAt must be a valid date");
    }

    return this.guard.run(shipmentId, async (unit) => {
      const shipment = await this.ledger.get(shipmentId, unit.session, { forUpdate: true });
      assertOwner(shipment, shipperId);

      if (shipment.status !== ShipmentStatus.OPEN) {
        throw new ConflictError(
          `Shipment ${shipmentId} is ${shipment.status}; only open shipments can schedule an auction`
        );
      }

      const latest = await unit.session.windows.findLatest(shipmentId);
      if (latest && latest.state === AuctionState.PENDING) {
        throw new ConflictError(`Shipment ${shipmentId} already has a scheduled auction`);
      }

      const round = Math.max(shipment.auctionRound, latest?.round ?? 0) + 1;
      const window = await unit.session.windows.insert({
        id: uuidv4(),
        shipmentId,
        round,
        state: AuctionState.PENDING,
        opensAt,
        durationMinutes,
        closed: false,
        version: 1,
      });

      unit.afterCommit(() => this.timers.scheduleOpen(shipmentId, round, opensAt));
      log.info(`Auction for shipment ${shipmentId} round ${round} scheduled at ${opensAt.toISOString()}`);
      return window;
    });
  }

  /**
   * Scheduler callback for a PENDING window that is due
   */
  async openScheduled(shipmentId: string, round: number): Promise<AuctionWindow | null> {
    return this.guard.run(shipmentId, async (unit) => {
      const window = await unit.session.windows.findLatest(shipmentId);
      if (!window || window.round !== round || window.state !== AuctionState.PENDING) {
        return null;
      }

      const shipment = await this.ledger.get(shipmentId, unit.session, { forUpdate: true });
      if (shipment.status !== ShipmentStatus.OPEN) {
        await this.saveWindow(unit, {
          ...window,
          state: AuctionState.VOID,
          closed: true,
          closedAt: this.clock(),
          voidReason: "cancelled",
        });
        log.info(`Scheduled auction for shipment ${shipmentId} voided; shipment is ${shipment.status}`);
        return null;
      }

      const now = this.clock();
      const bidding = await this.ledger.transition(
        shipmentId,
        ShipmentStatus.OPEN,
        ShipmentStatus.BIDDING,
        { unit, reason: "auction_opened", patch: { auctionRound: round } }
      );

      const scheduledCloseAt =
        window.durationMinutes !== undefined && window.durationMinutes !== null
          ? new Date(now.getTime() + window.durationMinutes * MINUTE_MS)
          : undefined;

      const opened = await this.saveWindow(unit, {
        ...window,
        state: AuctionState.OPEN,
        openedAt: now,
        scheduledCloseAt,
      });

      this.announceOpen(unit, bidding, opened);
      return opened;
    });
  }

  /**
   * Close the current window and commit the top-ranked bid. Safe to call
   * any number of times; a resolved auction returns its existing outcome.
   */
  async close(
    shipmentId: string,
    trigger: CloseTrigger,
    options: CloseOptions = {}
  ): Promise<AuctionOutcome> {
    return this.guard.run(shipmentId, async (unit) => {
      const shipment = await this.ledger.get(shipmentId, unit.session, { forUpdate: true });
      assertOwner(shipment, options.shipperId);

      const window = await unit.session.windows.findLatest(shipmentId);
      if (!window) {
        throw new ConflictError(`Shipment ${shipmentId} has no auction to close`);
      }

      if (options.round !== undefined && window.round !== options.round) {
        log.debug(`Ignoring stale close for shipment ${shipmentId} round ${options.round}`);
        return this.describe(unit, window);
      }

      switch (window.state) {
        case AuctionState.COMMITTED:
        case AuctionState.VOID:
          return this.describe(unit, window);
        case AuctionState.PENDING:
          throw new ConflictError(`Auction for shipment ${shipmentId} has not opened yet`);
        default:
          break;
      }

      const closing = await this.markClosing(unit, window, trigger);
      const bids = await unit.session.bids.listByShipment(shipmentId, {
        round: closing.round,
        statuses: [BidStatus.ACTIVE],
      });

      if (bids.length === 0) {
        return this.voidAuction(unit, shipment, closing, "no_bids");
      }

      const ranking = await this.ranking.rank(unit.session, shipment, bids);
      return this.commit(unit, shipment, closing, ranking[0].bid, ranking);
    });
  }

  /**
   * Shipper picks a specific active bid; same commit path as `close`
   */
  async accept(bidId: string, shipperId: string): Promise<AuctionOutcome> {
    const bid = await this.store.bids.findById(bidId);
    if (!bid) {
      throw new NotFoundError("Bid", bidId);
    }

    return this.guard.run(bid.shipmentId, async (unit) => {
      const shipment = await this.ledger.get(bid.shipmentId, unit.session, { forUpdate: true });
      assertOwner(shipment, shipperId);

      const window = await unit.session.windows.findLatest(shipment.id);
      if (!window || window.state === AuctionState.PENDING) {
        throw new ConflictError(`Shipment ${shipment.id} has no open auction`);
      }

      if (window.state === AuctionState.COMMITTED) {
        const outcome = await this.describe(unit, window);
        if (outcome.match?.bidId === bidId) {
          return outcome;
        }
        throw new AuctionClosedError(shipment.id);
      }
      if (window.state === AuctionState.VOID || window.round !== bid.round) {
        throw new AuctionClosedError(shipment.id);
      }

      const chosen = await unit.session.bids.findById(bidId);
      if (!chosen || chosen.status !== BidStatus.ACTIVE) {
        throw new ConflictError(`Bid ${bidId} is no longer active`);
      }

      const closing = await this.markClosing(unit, window, CloseTrigger.ACCEPTANCE);
      const bids = await unit.session.bids.listByShipment(shipment.id, {
        round: closing.round,
        statuses: [BidStatus.ACTIVE],
      });
      const ranking = await this.ranking.rank(unit.session, shipment, bids);

      return this.commit(unit, shipment, closing, chosen, ranking);
    });
  }

  /**
   * Shipper withdraws the load. Not possible once it is picked up.
   */
  async cancelShipment(shipmentId: string, shipperId?: string, reason = "shipper_cancelled"): Promise<CancelOutcome> {
    return this.guard.run(shipmentId, async (unit) => {
      const shipment = await this.ledger.get(shipmentId, unit.session, { forUpdate: true });
      assertOwner(shipment, shipperId);

      switch (shipment.status) {
        case ShipmentStatus.DRAFT:
        case ShipmentStatus.OPEN: {
          const window = await unit.session.windows.findLatest(shipmentId);
          if (window && window.state === AuctionState.PENDING) {
            await this.saveWindow(unit, {
              ...window,
              state: AuctionState.VOID,
              closed: true,
              closedAt: this.clock(),
              closeTrigger: CloseTrigger.CANCELLATION,
              voidReason: "cancelled",
            });
          }
          unit.afterCommit(() => this.timers.cancelAuctionTimers(shipmentId));
          const cancelled = await this.ledger.transition(
            shipmentId,
            shipment.status,
            ShipmentStatus.CANCELLED,
            { unit, reason }
          );
          return { shipment: cancelled };
        }

        case ShipmentStatus.BIDDING: {
          const window = await unit.session.windows.findLatest(shipmentId);
          if (!window) {
            throw new ConflictError(`Shipment ${shipmentId} is bidding without an auction window`);
          }
          const closing = await this.markClosing(unit, window, CloseTrigger.CANCELLATION);
          const outcome = await this.voidAuction(unit, shipment, closing, "cancelled", reason);
          log.info(`Shipment ${shipmentId} cancelled during auction round ${outcome.round}`);
          const cancelled = await this.ledger.get(shipmentId, unit.session);
          return { shipment: cancelled };
        }

        case ShipmentStatus.MATCHED: {
          const match = await unit.session.matches.findActiveByShipment(shipmentId);
          let cancelledMatch: Match | undefined;
          if (match) {
            const updated = await unit.session.matches.compareAndSetExecution(
              match.id,
              ExecutionStatus.ASSIGNED,
              ExecutionStatus.CANCELLED,
              { cancelledAt: this.clock(), failureReason: reason }
            );
            if (!updated) {
              throw new ConflictError(`Match ${match.id} is ${match.executionStatus}; cannot cancel`);
            }
            cancelledMatch = updated;
            unit.afterCommit(() => this.timers.cancelPickupDeadline(match.id));
          }
          const cancelled = await this.ledger.transition(
            shipmentId,
            ShipmentStatus.MATCHED,
            ShipmentStatus.CANCELLED,
            { unit, reason }
          );
          log.info(`Matched shipment ${shipmentId} cancelled by shipper, no driver penalty`);
          return { shipment: cancelled, cancelledMatch };
        }

        default:
          throw new ConflictError(`Shipment ${shipmentId} is ${shipment.status} and can no longer be cancelled`);
      }
    });
  }

  /**
   * Put a matched shipment back up for auction after its driver dropped
   * out. Joins the caller's unit; the driver is barred from the new round.
   */
  async reauction(unit: UnitOfWork, shipment: Shipment, droppedDriverId: string, reason: string): Promise<AuctionWindow> {
    const round = shipment.auctionRound + 1;
    const excludedDriverIds = shipment.excludedDriverIds.includes(droppedDriverId)
      ? shipment.excludedDriverIds
      : [...shipment.excludedDriverIds, droppedDriverId];

    const bidding = await this.ledger.transition(
      shipment.id,
      ShipmentStatus.MATCHED,
      ShipmentStatus.BIDDING,
      { unit, reason, patch: { auctionRound: round, excludedDriverIds } }
    );

    log.info(`Shipment ${shipment.id} re-auctioned as round ${round} (${reason})`);
    return this.insertOpenWindow(unit, bidding, round, this.settings.bidding.defaultWindowMinutes);
  }

  /**
   * Current window with the live ranking of its active bids
   */
  async getAuction(shipmentId: string): Promise<AuctionView> {
    const shipment = await this.ledger.get(shipmentId);
    const window = await this.store.windows.findLatest(shipmentId);
    if (!window) {
      return { window: null, ranking: [], match: null };
    }

    const match = await this.store.matches.findByShipmentRound(shipmentId, window.round);
    const bids = await this.store.bids.listByShipment(shipmentId, {
      round: window.round,
      statuses: [BidStatus.ACTIVE],
    });

    return {
      window,
      ranking: await this.ranking.rank(this.store, shipment, bids),
      match,
    };
  }

  private async insertOpenWindow(
    unit: UnitOfWork,
    shipment: Shipment,
    round: number,
    durationMinutes: number | undefined
  ): Promise<AuctionWindow> {
    const now = this.clock();
    const window = await unit.session.windows.insert({
      id: uuidv4(),
      shipmentId: shipment.id,
      round,
      state: AuctionState.OPEN,
      opensAt: now,
      openedAt: now,
      scheduledCloseAt:
        durationMinutes !== undefined ? new Date(now.getTime() + durationMinutes * MINUTE_MS) : undefined,
      durationMinutes,
      closed: false,
      version: 1,
    });

    this.announceOpen(unit, shipment, window);
    return window;
  }

  private announceOpen(unit: UnitOfWork, shipment: Shipment, window: AuctionWindow): void {
    unit.notify({
      type: "auction-opened",
      shipmentId: shipment.id,
      round: window.round,
      closesAt: window.scheduledCloseAt?.toISOString(),
    });

    const closeAt = window.scheduledCloseAt;
    if (closeAt) {
      unit.afterCommit(() => this.timers.scheduleClose(shipment.id, window.round, closeAt));
    }
    log.info(
      `Auction opened for shipment ${shipment.id} round ${window.round}` +
        (closeAt
          ? `, closes at ${closeAt.toISOString()} (${formatMinutes(window.durationMinutes ?? 0)})`
          : ", explicit close")
    );
  }

  private async markClosing(unit: UnitOfWork, window: AuctionWindow, trigger: CloseTrigger): Promise<AuctionWindow> {
    return this.saveWindow(unit, {
      ...window,
      state: AuctionState.CLOSING,
      closed: true,
      closedAt: this.clock(),
      closeTrigger: trigger,
    });
  }

  private async voidAuction(
    unit: UnitOfWork,
    shipment: Shipment,
    window: AuctionWindow,
    voidReason: VoidReason,
    cancelReason?: string
  ): Promise<AuctionOutcome> {
    const now = this.clock();
    const voided = await this.saveWindow(unit, { ...window, state: AuctionState.VOID, voidReason });

    // Bids left on a cancelled auction lose
    const leftovers = await unit.session.bids.listByShipment(shipment.id, {
      round: window.round,
      statuses: [BidStatus.ACTIVE],
    });
    await unit.session.bids.resolve(leftovers.map((b) => b.id), BidStatus.LOST, now);
    for (const bid of leftovers) {
      unit.notify({ type: "auction-lost", shipmentId: shipment.id, driverId: bid.driverId, bidId: bid.id });
    }

    if (voidReason === "cancelled") {
      await this.ledger.transition(shipment.id, ShipmentStatus.BIDDING, ShipmentStatus.CANCELLED, {
        unit,
        reason: cancelReason ?? "shipper_cancelled",
      });
    } else if (shipment.noBidPolicy === NoBidPolicy.CANCEL) {
      await this.ledger.transition(shipment.id, ShipmentStatus.BIDDING, ShipmentStatus.CANCELLED, {
        unit,
        reason: "no_bids",
      });
    } else {
      await this.ledger.transition(shipment.id, ShipmentStatus.BIDDING, ShipmentStatus.OPEN, {
        unit,
        reason: "no_bids",
      });
    }

    unit.afterCommit(() => this.timers.cancelAuctionTimers(shipment.id));
    log.info(`Auction for shipment ${shipment.id} round ${window.round} void (${voidReason})`);

    return {
      shipmentId: shipment.id,
      round: voided.round,
      state: AuctionState.VOID,
      voidReason,
      ranking: [],
    };
  }

  private async commit(
    unit: UnitOfWork,
    shipment: Shipment,
    window: AuctionWindow,
    winner: Bid,
    ranking: RankedBid[]
  ): Promise<AuctionOutcome> {
    const { session } = unit;
    const now = this.clock();

    const match = await session.matches.insert({
      id: uuidv4(),
      shipmentId: shipment.id,
      round: window.round,
      bidId: winner.id,
      driverId: winner.driverId,
      price: winner.price,
      committedAt: now,
      executionStatus: ExecutionStatus.ASSIGNED,
      pickupDeadline: new Date(
        shipment.pickupWindowEnd.getTime() + this.settings.dispatch.pickupGraceMinutes * MINUTE_MS
      ),
      version: 1,
    });

    const active = await session.bids.listByShipment(shipment.id, {
      round: window.round,
      statuses: [BidStatus.ACTIVE],
    });
    const losers = active.filter((bid) => bid.id !== winner.id);

    const won = await session.bids.resolve([winner.id], BidStatus.WON, now);
    if (won !== 1) {
      throw new ConflictError(`Bid ${winner.id} is no longer active`);
    }
    await session.bids.resolve(losers.map((bid) => bid.id), BidStatus.LOST, now);

    await this.saveWindow(unit, { ...window, state: AuctionState.COMMITTED, matchId: match.id });
    await this.ledger.transition(shipment.id, ShipmentStatus.BIDDING, ShipmentStatus.MATCHED, {
      unit,
      reason: window.closeTrigger ? `auction_${window.closeTrigger}` : "auction_committed",
    });

    unit.notify({
      type: "auction-won",
      shipmentId: shipment.id,
      driverId: winner.driverId,
      bidId: winner.id,
      matchId: match.id,
      price: match.price,
    });
    for (const bid of losers) {
      unit.notify({ type: "auction-lost", shipmentId: shipment.id, driverId: bid.driverId, bidId: bid.id });
    }
    unit.settle({
      matchId: match.id,
      shipmentId: shipment.id,
      driverId: match.driverId,
      price: match.price,
      committedAt: match.committedAt,
    });
    unit.afterCommit(() => {
      this.timers.cancelAuctionTimers(shipment.id);
      this.timers.schedulePickupDeadline(match.id, match.pickupDeadline);
    });

    log.info(
      `Match ${match.id} committed: shipment ${shipment.id} round ${window.round} -> driver ${match.driverId} at ${formatPrice(match.price)}`
    );

    return {
      shipmentId: shipment.id,
      round: window.round,
      state: AuctionState.COMMITTED,
      match,
      ranking,
    };
  }

  private async describe(unit: UnitOfWork, window: AuctionWindow): Promise<AuctionOutcome> {
    const match =
      window.state === AuctionState.COMMITTED
        ? await unit.session.matches.findByShipmentRound(window.shipmentId, window.round)
        : null;

    return {
      shipmentId: window.shipmentId,
      round: window.round,
      state: window.state,
      match: match ?? undefined,
      voidReason: window.voidReason ?? undefined,
      ranking: [],
    };
  }

  private async saveWindow(unit: UnitOfWork, window: AuctionWindow): Promise<AuctionWindow> {
    const saved = await unit.session.windows.save(window);
    if (!saved) {
      throw new ConflictError(`Auction window for shipment ${window.shipmentId} changed concurrently`);
    }
    return saved;
  }
}
