import { AuctionState } from "../../../enums/AuctionState";
import { CancellationStage } from "../../../enums/CancellationStage";
import { CloseTrigger } from "../../../enums/CloseTrigger";
import { ExecutionStatus } from "../../../enums/ExecutionStatus";
import { ShipmentStatus } from "../../../enums/ShipmentStatus";
import { ConflictError, ForbiddenError, NotFoundError } from "../../../errors/marketplace.errors";
import { Match } from "../../../entities/Match";
import {
  buildMarketplace,
  postBiddingShipment,
  shipmentInput,
  TestMarketplace,
  T0,
  MINUTE,
  HOUR,
} from "../../__tests__/support/fixture";

async function matchedShipment(ctx: TestMarketplace): Promise<{ shipmentId: string; match: Match }> {
  const shipmentId = await postBiddingShipment(ctx.marketplace);
  await ctx.marketplace.bids.submit({ shipmentId, driverId: "driver-1", price: 480, etaMinutes: 20 });
  await ctx.marketplace.bids.submit({ shipmentId, driverId: "driver-2", price: 520, etaMinutes: 40 });

  const outcome = await ctx.marketplace.auctions.close(shipmentId, CloseTrigger.SHIPPER);
  if (!outcome.match) {
    throw new Error("expected a committed match");
  }
  return { shipmentId, match: outcome.match };
}

describe("DispatchTracker", () => {
  let ctx: TestMarketplace;
  let shipmentId: string;
  let match: Match;

  beforeEach(async () => {
    ctx = buildMarketplace();
    ({ shipmentId, match } = await matchedShipment(ctx));
  });

  afterEach(async () => {
    await ctx.marketplace.shutdown();
  });

  test("pickup then on-time delivery completes the shipment and lifts reputation", async () => {
    ctx.clock.set(new Date(T0.getTime() + 25 * HOUR));
    const picked = await ctx.marketplace.dispatch.reportPickup(match.id, "driver-1");

    expect(picked).toMatchObject({
      executionStatus: ExecutionStatus.PICKED_UP,
      pickedUpAt: new Date(T0.getTime() + 25 * HOUR),
    });
    expect((await ctx.marketplace.shipments.get(shipmentId)).status).toBe(ShipmentStatus.IN_TRANSIT);
    expect(ctx.marketplace.scheduler.has("pickup", match.id)).toBe(false);

    ctx.clock.set(new Date(T0.getTime() + 35 * HOUR));
    const delivered = await ctx.marketplace.dispatch.reportDelivery(match.id, "driver-1");

    expect(delivered).toMatchObject({
      executionStatus: ExecutionStatus.DELIVERED,
      deliveredOnTime: true,
      departedAt: new Date(T0.getTime() + 35 * HOUR),
      deliveredAt: new Date(T0.getTime() + 35 * HOUR),
    });
    expect((await ctx.marketplace.shipments.get(shipmentId)).status).toBe(ShipmentStatus.DELIVERED);

    const profile = await ctx.marketplace.drivers.getProfile("driver-1");
    expect(profile.completedJobs).toBe(1);
    expect(profile.onTimeJobs).toBe(1);
    expect(profile.reputationScore).toBeCloseTo(0.55, 10);
  });

  test("departure is recorded separately when reported", async () => {
    await ctx.marketplace.dispatch.reportPickup(match.id, "driver-1");
    ctx.clock.advance(10 * MINUTE);

    const departed = await ctx.marketplace.dispatch.reportDeparture(match.id, "driver-1");

    expect(departed.executionStatus).toBe(ExecutionStatus.IN_TRANSIT);
    expect(departed.departedAt).toEqual(new Date(T0.getTime() + 10 * MINUTE));
  });

  test("late delivery counts as completed but not on time", async () => {
    await ctx.marketplace.dispatch.reportPickup(match.id, "driver-1");
    ctx.clock.set(new Date(T0.getTime() + 40 * HOUR));

    const delivered = await ctx.marketplace.dispatch.reportDelivery(match.id, "driver-1");

    expect(delivered.deliveredOnTime).toBe(false);
    const history = await ctx.marketplace.shipments.history(shipmentId);
    expect(history[history.length - 1].reason).toBe("delivered_late");

    const profile = await ctx.marketplace.drivers.getProfile("driver-1");
    expect(profile.onTimeJobs).toBe(0);
    expect(profile.reputationScore).toBeCloseTo(0.51, 10);
  });

  test("delivery before pickup is a conflict", async () => {
    const attempt = ctx.marketplace.dispatch.reportDelivery(match.id, "driver-1");

    await expect(attempt).rejects.toBeInstanceOf(ConflictError);
    await expect(attempt).rejects.toThrow(`Match ${match.id} is assigned, expected in_transit`);
  });

  test("only the matched driver can report progress", async () => {
    await expect(ctx.marketplace.dispatch.reportPickup(match.id, "driver-2")).rejects.toBeInstanceOf(
      ForbiddenError
    );
    await expect(ctx.marketplace.dispatch.reportPickup("missing", "driver-1")).rejects.toBeInstanceOf(
      NotFoundError
    );
  });

  test("dropping out before pickup re-auctions without the driver", async () => {
    const result = await ctx.marketplace.dispatch.reportUnableToFulfill(match.id, "driver-1", "truck_breakdown");

    expect(result.reauctioned).toBe(true);
    expect(result.match).toMatchObject({
      executionStatus: ExecutionStatus.CANCELLED,
      failureReason: "truck_breakdown",
    });

    const shipment = await ctx.marketplace.shipments.get(shipmentId);
    expect(shipment).toMatchObject({
      status: ShipmentStatus.BIDDING,
      auctionRound: 2,
      excludedDriverIds: ["driver-1"],
    });

    const view = await ctx.marketplace.auctions.getAuction(shipmentId);
    expect(view.window).toMatchObject({
      round: 2,
      state: AuctionState.OPEN,
      scheduledCloseAt: new Date(T0.getTime() + 60 * MINUTE),
    });
    expect(ctx.marketplace.scheduler.has("close", shipmentId)).toBe(true);
    expect(ctx.marketplace.scheduler.has("pickup", match.id)).toBe(false);

    const history = await ctx.marketplace.shipments.history(shipmentId);
    expect(history[history.length - 1]).toMatchObject({
      fromStatus: ShipmentStatus.MATCHED,
      toStatus: ShipmentStatus.BIDDING,
      reason: "driver_dropped_out:truck_breakdown",
    });

    const profile = await ctx.marketplace.drivers.getProfile("driver-1");
    expect(profile.cancellationCount).toBe(1);
    expect(profile.reputationScore).toBeCloseTo(0.45, 10);
    expect(ctx.escalation.failures).toEqual([]);
  });

  test("the re-auction can be won by another driver", async () => {
    await ctx.marketplace.dispatch.reportUnableToFulfill(match.id, "driver-1", "truck_breakdown");
    await ctx.marketplace.bids.submit({ shipmentId, driverId: "driver-2", price: 530, etaMinutes: 30 });

    const outcome = await ctx.marketplace.auctions.close(shipmentId, CloseTrigger.SHIPPER);

    expect(outcome.round).toBe(2);
    expect(outcome.match).toMatchObject({ driverId: "driver-2", price: 530, round: 2 });
    expect(ctx.store.stats().matches).toBe(2);
  });

  test("failing after pickup is terminal and escalated", async () => {
    await ctx.marketplace.dispatch.reportPickup(match.id, "driver-1");
    ctx.clock.advance(2 * HOUR);

    const result = await ctx.marketplace.dispatch.reportUnableToFulfill(match.id, "driver-1", "accident");

    expect(result.reauctioned).toBe(false);
    expect(result.match.executionStatus).toBe(ExecutionStatus.FAILED);
    expect((await ctx.marketplace.shipments.get(shipmentId)).status).toBe(ShipmentStatus.FAILED);
    expect(ctx.escalation.failures).toEqual([
      {
        matchId: match.id,
        shipmentId,
        driverId: "driver-1",
        stage: CancellationStage.POST_PICKUP,
        reason: "accident",
        failedAt: new Date(T0.getTime() + 2 * HOUR),
      },
    ]);

    const profile = await ctx.marketplace.drivers.getProfile("driver-1");
    expect(profile.reputationScore).toBeCloseTo(0.375, 10);
  });

  test("a delivered match cannot be abandoned", async () => {
    await ctx.marketplace.dispatch.reportPickup(match.id, "driver-1");
    await ctx.marketplace.dispatch.reportDelivery(match.id, "driver-1");

    await expect(
      ctx.marketplace.dispatch.reportUnableToFulfill(match.id, "driver-1", "changed_mind")
    ).rejects.toThrow(`Match ${match.id} is delivered and can no longer change`);
  });

  test("a blank reason is rejected", async () => {
    await expect(
      ctx.marketplace.dispatch.reportUnableToFulfill(match.id, "driver-1", "  ")
    ).rejects.toThrow("reason is required");
  });

  describe("pickup no-show", () => {
    test("is ignored before the deadline and re-armed", async () => {
      ctx.clock.set(new Date(match.pickupDeadline.getTime() - MINUTE));

      await expect(ctx.marketplace.dispatch.handlePickupNoShow(match.id)).resolves.toBeNull();
      expect(ctx.marketplace.scheduler.has("pickup", match.id)).toBe(true);
      expect((await ctx.marketplace.dispatch.getMatch(match.id)).executionStatus).toBe(
        ExecutionStatus.ASSIGNED
      );
    });

    test("past the deadline it drops the driver and re-auctions", async () => {
      ctx.clock.set(match.pickupDeadline);

      const result = await ctx.marketplace.dispatch.handlePickupNoShow(match.id);

      expect(result?.reauctioned).toBe(true);
      expect(result?.match.failureReason).toBe("pickup_no_show");
      const shipment = await ctx.marketplace.shipments.get(shipmentId);
      expect(shipment.excludedDriverIds).toEqual(["driver-1"]);
    });

    test("does nothing once the load was picked up", async () => {
      await ctx.marketplace.dispatch.reportPickup(match.id, "driver-1");
      ctx.clock.set(new Date(match.pickupDeadline.getTime() + HOUR));

      await expect(ctx.marketplace.dispatch.handlePickupNoShow(match.id)).resolves.toBeNull();
      expect((await ctx.marketplace.shipments.get(shipmentId)).status).toBe(ShipmentStatus.IN_TRANSIT);
    });

    test("unknown matches are ignored", async () => {
      await expect(ctx.marketplace.dispatch.handlePickupNoShow("missing")).resolves.toBeNull();
    });
  });

  test("listForDriver returns the driver's matches", async () => {
    const matches = await ctx.marketplace.dispatch.listForDriver("driver-1");
    expect(matches.map((m) => m.id)).toEqual([match.id]);
    await expect(ctx.marketplace.dispatch.listForDriver("driver-2")).resolves.toEqual([]);
  });
});

describe("scheduler wiring", () => {
  const flush = () => new Promise((resolve) => setImmediate(resolve));

  beforeEach(() => {
    jest.useFakeTimers({ doNotFake: ["setImmediate", "nextTick", "queueMicrotask", "Date"] });
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  test("the pickup deadline timer re-auctions a no-show", async () => {
    const ctx = buildMarketplace();
    try {
      const { shipmentId, match } = await matchedShipment(ctx);

      const wait = match.pickupDeadline.getTime() - T0.getTime();
      ctx.clock.set(match.pickupDeadline);
      jest.advanceTimersByTime(wait);
      await flush();

      const shipment = await ctx.marketplace.shipments.get(shipmentId);
      expect(shipment).toMatchObject({ status: ShipmentStatus.BIDDING, auctionRound: 2 });
      expect((await ctx.marketplace.dispatch.getMatch(match.id)).executionStatus).toBe(
        ExecutionStatus.CANCELLED
      );
    } finally {
      await ctx.marketplace.shutdown();
    }
  });

  test("the close timer commits a timed auction", async () => {
    const ctx = buildMarketplace();
    try {
      const { shipment } = await ctx.marketplace.shipments.post({
        ...shipmentInput(),
        auction: { durationMinutes: 30 },
      });
      await ctx.marketplace.bids.submit({ shipmentId: shipment.id, driverId: "driver-1", price: 400, etaMinutes: 15 });

      ctx.clock.advance(30 * MINUTE);
      jest.advanceTimersByTime(30 * MINUTE);
      await flush();

      const view = await ctx.marketplace.auctions.getAuction(shipment.id);
      expect(view.window).toMatchObject({ state: AuctionState.COMMITTED, closeTrigger: CloseTrigger.TIMER });
      expect(view.match?.driverId).toBe("driver-1");
    } finally {
      await ctx.marketplace.shutdown();
    }
  });
});
