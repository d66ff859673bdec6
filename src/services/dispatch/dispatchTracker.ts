import { Match } from "../../entities/Match";
import { ExecutionStatus } from "../../enums/ExecutionStatus";
import { ShipmentStatus } from "../../enums/ShipmentStatus";
import { CancellationStage } from "../../enums/CancellationStage";
import { Clock, systemClock } from "../../interfaces/Collaborators";
import {
  ConflictError,
  ForbiddenError,
  NotFoundError,
  ValidationError,
} from "../../errors/marketplace.errors";
import { componentLogger } from "../../utils/logger";
import { MarketplaceStore, MatchPatch } from "../store/marketplaceStore";
import { ShipmentGuard, UnitOfWork } from "../concurrency/shipmentGuard";
import { ShipmentLedger } from "../ledger/shipmentLedger";
import { ReputationScorer } from "../reputation/reputationScorer";
import { AuctionCoordinator } from "../auction/auctionCoordinator";
import { AuctionTimers } from "../auction/auctionTimers";

const log = componentLogger("dispatch");

export interface UnableToFulfillResult {
  match: Match;
  /**
   * True when the load went back to auction, false when it was escalated
   */
  reauctioned: boolean;
}

/**
 * DISPATCH TRACKER
 *
 * Drives a committed match through pickup, transit and delivery, and
 * turns driver drop-outs into either a fresh auction round (before
 * pickup) or an escalated failure (after pickup).
 */
export class DispatchTracker {
  constructor(
    private readonly store: MarketplaceStore,
    private readonly guard: ShipmentGuard,
    private readonly ledger: ShipmentLedger,
    private readonly coordinator: AuctionCoordinator,
    private readonly reputation: ReputationScorer,
    private readonly timers: AuctionTimers,
    private readonly clock: Clock = systemClock
  ) {}

  async getMatch(matchId: string): Promise<Match> {
    const match = await this.store.matches.findById(matchId);
    if (!match) {
      throw new NotFoundError("Match", matchId);
    }
    return match;
  }

  async listForDriver(driverId: string, limit = 50): Promise<Match[]> {
    return this.store.matches.listByDriver(driverId, Math.min(Math.max(1, limit), 200));
  }

  async reportPickup(matchId: string, driverId: string): Promise<Match> {
    return this.withMatch(matchId, driverId, async (unit, match) => {
      const now = this.clock();
      const picked = await this.advance(unit, match, ExecutionStatus.ASSIGNED, ExecutionStatus.PICKED_UP, {
        pickedUpAt: now,
      });
      await this.ledger.transition(match.shipmentId, ShipmentStatus.MATCHED, ShipmentStatus.IN_TRANSIT, {
        unit,
        reason: "picked_up",
      });
      unit.afterCommit(() => this.timers.cancelPickupDeadline(match.id));

      log.info(`Match ${match.id}: driver ${driverId} picked up shipment ${match.shipmentId}`);
      return picked;
    });
  }

  async reportDeparture(matchId: string, driverId: string): Promise<Match> {
    return this.withMatch(matchId, driverId, async (unit, match) => {
      const departed = await this.advance(
        unit,
        match,
        ExecutionStatus.PICKED_UP,
        ExecutionStatus.IN_TRANSIT,
        { departedAt: this.clock() }
      );
      log.debug(`Match ${match.id}: departed`);
      return departed;
    });
  }

  async reportDelivery(matchId: string, driverId: string): Promise<Match> {
    return this.withMatch(matchId, driverId, async (unit, match) => {
      const now = this.clock();
      let current = match;

      if (current.executionStatus === ExecutionStatus.PICKED_UP) {
        current = await this.advance(unit, current, ExecutionStatus.PICKED_UP, ExecutionStatus.IN_TRANSIT, {
          departedAt: now,
        });
      }

      const shipment = await this.ledger.get(match.shipmentId, unit.session, { forUpdate: true });
      const onTime = now.getTime() <= shipment.deliveryWindowEnd.getTime();

      const delivered = await this.advance(unit, current, ExecutionStatus.IN_TRANSIT, ExecutionStatus.DELIVERED, {
        deliveredAt: now,
        deliveredOnTime: onTime,
      });
      await this.ledger.transition(shipment.id, ShipmentStatus.IN_TRANSIT, ShipmentStatus.DELIVERED, {
        unit,
        reason: onTime ? "delivered" : "delivered_late",
      });
      await this.reputation.recordCompletion(driverId, onTime, {
        session: unit.session,
        shipmentId: shipment.id,
      });

      log.info(`Match ${match.id}: delivered ${onTime ? "on time" : "late"}`);
      return delivered;
    });
  }

  async reportUnableToFulfill(matchId: string, driverId: string, reason: string): Promise<UnableToFulfillResult> {
    if (!reason.trim()) {
      throw new ValidationError("reason is required");
    }

    return this.withMatch(matchId, driverId, (unit, match) => this.dropOut(unit, match, reason));
  }

  /**
   * Pickup-deadline timer callback. A match still ASSIGNED past its
   * deadline is a post-match cancellation by the driver.
   */
  async handlePickupNoShow(matchId: string): Promise<UnableToFulfillResult | null> {
    const existing = await this.store.matches.findById(matchId);
    if (!existing) {
      log.warn(`No-show check for unknown match ${matchId}`);
      return null;
    }

    return this.guard.run(existing.shipmentId, async (unit) => {
      const match = await unit.session.matches.findById(matchId);
      if (!match || match.executionStatus !== ExecutionStatus.ASSIGNED) {
        return null;
      }

      const now = this.clock();
      if (now < match.pickupDeadline) {
        unit.afterCommit(() => this.timers.schedulePickupDeadline(match.id, match.pickupDeadline));
        return null;
      }

      log.warn(`Match ${match.id}: driver ${match.driverId} missed pickup deadline`);
      return this.dropOut(unit, match, "pickup_no_show");
    });
  }

  private async dropOut(unit: UnitOfWork, match: Match, reason: string): Promise<UnableToFulfillResult> {
    const now = this.clock();

    switch (match.executionStatus) {
      case ExecutionStatus.ASSIGNED: {
        const cancelled = await this.advance(unit, match, ExecutionStatus.ASSIGNED, ExecutionStatus.CANCELLED, {
          cancelledAt: now,
          failureReason: reason,
        });
        unit.afterCommit(() => this.timers.cancelPickupDeadline(match.id));

        await this.reputation.recordCancellation(match.driverId, CancellationStage.POST_MATCH, {
          session: unit.session,
          shipmentId: match.shipmentId,
        });

        const shipment = await this.ledger.get(match.shipmentId, unit.session, { forUpdate: true });
        await this.coordinator.reauction(unit, shipment, match.driverId, `driver_dropped_out:${reason}`);
        return { match: cancelled, reauctioned: true };
      }

      case ExecutionStatus.PICKED_UP:
      case ExecutionStatus.IN_TRANSIT: {
        const failed = await this.advance(unit, match, match.executionStatus, ExecutionStatus.FAILED, {
          failedAt: now,
          failureReason: reason,
        });
        await this.ledger.transition(match.shipmentId, ShipmentStatus.IN_TRANSIT, ShipmentStatus.FAILED, {
          unit,
          reason,
        });
        await this.reputation.recordCancellation(match.driverId, CancellationStage.POST_PICKUP, {
          session: unit.session,
          shipmentId: match.shipmentId,
        });

        unit.escalate({
          matchId: match.id,
          shipmentId: match.shipmentId,
          driverId: match.driverId,
          stage: CancellationStage.POST_PICKUP,
          reason,
          failedAt: now,
        });
        log.warn(`Match ${match.id} failed after pickup (${reason}); escalated`);
        return { match: failed, reauctioned: false };
      }

      default:
        throw new ConflictError(`Match ${match.id} is ${match.executionStatus} and can no longer change`);
    }
  }

  private async withMatch<T>(
    matchId: string,
    driverId: string,
    work: (unit: UnitOfWork, match: Match) => Promise<T>
  ): Promise<T> {
    const existing = await this.getMatch(matchId);

    return this.guard.run(existing.shipmentId, async (unit) => {
      const match = await unit.session.matches.findById(matchId);
      if (!match) {
        throw new NotFoundError("Match", matchId);
      }
      if (match.driverId !== driverId) {
        throw new ForbiddenError(`Match ${matchId} is assigned to another driver`);
      }
      return work(unit, match);
    });
  }

  private async advance(
    unit: UnitOfWork,
    match: Match,
    from: ExecutionStatus,
    to: ExecutionStatus,
    patch: MatchPatch
  ): Promise<Match> {
    if (match.executionStatus !== from) {
      throw new ConflictError(`Match ${match.id} is ${match.executionStatus}, expected ${from}`);
    }
    const updated = await unit.session.matches.compareAndSetExecution(match.id, from, to, patch);
    if (!updated) {
      throw new ConflictError(`Match ${match.id} changed concurrently`);
    }
    return updated;
  }
}
