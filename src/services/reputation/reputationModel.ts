import { CancellationStage } from "../../enums/CancellationStage";
import { ReputationConfig } from "../../config/marketplace.config";

export type ReputationSignal =
  | { kind: "completion"; onTime: boolean }
  | { kind: "cancellation"; stage: CancellationStage };

export interface ReputationParams {
  neutral: number;
  alpha: number;
  lateTarget: number;
  penalties: Record<CancellationStage, number>;
}

export function toReputationParams(config: ReputationConfig): ReputationParams {
  return {
    neutral: config.neutral,
    alpha: config.alpha,
    lateTarget: config.lateTarget,
    penalties: {
      [CancellationStage.PRE_MATCH]: config.penalties.preMatch,
      [CancellationStage.POST_MATCH]: config.penalties.postMatch,
      [CancellationStage.POST_PICKUP]: config.penalties.postPickup,
    },
  };
}

function clamp01(value: number): number {
  return Math.min(1, Math.max(0, value));
}

export function initialReputation(params: ReputationParams): number {
  return clamp01(params.neutral);
}

/**
 * One reputation step. On-time completions pull the score towards 1,
 * late completions towards `lateTarget`, and cancellations shrink it by
 * the stage penalty.
 */
export function applyReputationEvent(
  score: number,
  signal: ReputationSignal,
  params: ReputationParams
): number {
  const s = clamp01(score);

  if (signal.kind === "completion") {
    const target = signal.onTime ? 1 : params.lateTarget;
    return clamp01(s + params.alpha * (target - s));
  }

  return clamp01(s * (1 - params.penalties[signal.stage]));
}

/**
 * Score after folding a driver's full history from the neutral start
 */
export function replayReputation(
  signals: Iterable<ReputationSignal>,
  params: ReputationParams
): number {
  let score = initialReputation(params);
  for (const signal of signals) {
    score = applyReputationEvent(score, signal, params);
  }
  return score;
}
