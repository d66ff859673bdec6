import { buildMarketplace, TestMarketplace, MINUTE } from "../../__tests__/support/fixture";
import { CancellationStage } from "../../../enums/CancellationStage";
import { replayReputation, ReputationSignal, toReputationParams } from "../reputationModel";

describe("ReputationScorer", () => {
  let ctx: TestMarketplace;

  beforeEach(() => {
    ctx = buildMarketplace();
  });

  afterEach(async () => {
    await ctx.marketplace.shutdown();
  });

  test("unknown drivers score neutral", async () => {
    await expect(ctx.marketplace.reputation.score("nobody")).resolves.toBe(0.5);
  });

  test("first completion creates the profile and records the event", async () => {
    const profile = await ctx.marketplace.reputation.recordCompletion("driver-1", true, {
      shipmentId: "s-1",
    });

    expect(profile.reputationScore).toBeCloseTo(0.55, 10);
    expect(profile.completedJobs).toBe(1);
    expect(profile.onTimeJobs).toBe(1);
    expect(profile.cancellationCount).toBe(0);

    const history = await ctx.marketplace.reputation.history("driver-1");
    expect(history).toHaveLength(1);
    expect(history[0]).toMatchObject({
      driverId: "driver-1",
      kind: "completion",
      onTime: true,
      shipmentId: "s-1",
      scoreBefore: 0.5,
    });
    expect(history[0].scoreAfter).toBeCloseTo(0.55, 10);
  });

  test("cancellations count separately from completions", async () => {
    await ctx.marketplace.reputation.recordCompletion("driver-1", false);
    const profile = await ctx.marketplace.reputation.recordCancellation(
      "driver-1",
      CancellationStage.POST_MATCH
    );

    expect(profile.completedJobs).toBe(1);
    expect(profile.onTimeJobs).toBe(0);
    expect(profile.cancellationCount).toBe(1);
    // 0.5 -> 0.51 -> 0.459
    expect(profile.reputationScore).toBeCloseTo(0.459, 10);
  });

  test("concurrent updates for one driver all land and match a replay", async () => {
    const signals: ReputationSignal[] = [];
    const updates: Array<Promise<unknown>> = [];

    for (let i = 0; i < 6; i++) {
      const onTime = i % 2 === 0;
      signals.push({ kind: "completion", onTime });
      updates.push(ctx.marketplace.reputation.recordCompletion("driver-1", onTime));
      ctx.clock.advance(MINUTE);
    }
    await Promise.all(updates);

    const profile = await ctx.marketplace.drivers.getProfile("driver-1");
    expect(profile.completedJobs).toBe(6);
    expect(profile.onTimeJobs).toBe(3);
    expect(profile.reputationScore).toBeCloseTo(
      replayReputation(signals, toReputationParams(ctx.config.reputation)),
      10
    );

    const history = await ctx.marketplace.reputation.history("driver-1");
    expect(history).toHaveLength(6);
    for (let i = 1; i < history.length; i++) {
      expect(history[i].scoreBefore).toBeCloseTo(history[i - 1].scoreAfter, 10);
    }
  });
});
