import {
  applyReputationEvent,
  initialReputation,
  replayReputation,
  toReputationParams,
  ReputationSignal,
} from "../reputationModel";
import { DEFAULT_MARKETPLACE_CONFIG } from "../../../config/marketplace.config";
import { CancellationStage } from "../../../enums/CancellationStage";

const params = toReputationParams(DEFAULT_MARKETPLACE_CONFIG.reputation);

describe("reputation model", () => {
  test("new drivers start at the neutral score", () => {
    expect(initialReputation(params)).toBe(0.5);
  });

  test("on-time completion moves a step towards 1", () => {
    expect(applyReputationEvent(0.5, { kind: "completion", onTime: true }, params)).toBeCloseTo(0.55, 10);
  });

  test("late completion moves towards the late target, below an on-time one", () => {
    const late = applyReputationEvent(0.5, { kind: "completion", onTime: false }, params);
    const onTime = applyReputationEvent(0.5, { kind: "completion", onTime: true }, params);

    expect(late).toBeCloseTo(0.51, 10);
    expect(late).toBeLessThan(onTime);
  });

  test("a late completion still lowers a score above the late target", () => {
    expect(applyReputationEvent(0.9, { kind: "completion", onTime: false }, params)).toBeCloseTo(0.87, 10);
  });

  test("cancellation penalties grow with the stage", () => {
    const preMatch = applyReputationEvent(0.5, { kind: "cancellation", stage: CancellationStage.PRE_MATCH }, params);
    const postMatch = applyReputationEvent(0.5, { kind: "cancellation", stage: CancellationStage.POST_MATCH }, params);
    const postPickup = applyReputationEvent(0.5, { kind: "cancellation", stage: CancellationStage.POST_PICKUP }, params);

    expect(preMatch).toBeCloseTo(0.49, 10);
    expect(postMatch).toBeCloseTo(0.45, 10);
    expect(postPickup).toBeCloseTo(0.375, 10);
    expect(postPickup).toBeLessThan(postMatch);
    expect(postMatch).toBeLessThan(preMatch);
  });

  test("scores stay within [0, 1] over long histories", () => {
    let high = 0.5;
    let low = 0.5;
    for (let i = 0; i < 500; i++) {
      high = applyReputationEvent(high, { kind: "completion", onTime: true }, params);
      low = applyReputationEvent(low, { kind: "cancellation", stage: CancellationStage.POST_PICKUP }, params);
      expect(high).toBeLessThanOrEqual(1);
      expect(low).toBeGreaterThanOrEqual(0);
    }
    expect(high).toBeGreaterThan(0.99);
    expect(low).toBeLessThan(0.01);
  });

  test("out-of-range input is clamped before the step", () => {
    expect(applyReputationEvent(1.4, { kind: "cancellation", stage: CancellationStage.POST_MATCH }, params)).toBeCloseTo(0.9, 10);
    expect(applyReputationEvent(-0.2, { kind: "completion", onTime: true }, params)).toBeCloseTo(0.1, 10);
  });

  test("replay folds signals in order from the neutral start", () => {
    const signals: ReputationSignal[] = [
      { kind: "completion", onTime: true },
      { kind: "cancellation", stage: CancellationStage.POST_MATCH },
    ];

    // 0.5 -> 0.55 -> 0.495
    expect(replayReputation(signals, params)).toBeCloseTo(0.495, 10);
    expect(replayReputation([], params)).toBe(0.5);
  });
});
