import Joi from "joi";

export type StorageKind = "postgres" | "memory";

export interface RankingWeights {
  price: number;
  reputation: number;
  proximity: number;
  backhaul: number;
}

export interface RankingConfig {
  weights: RankingWeights;
  proximityHalfLifeMinutes: number;
}

export interface BackhaulConfig {
  radiusKm: number;
  maxResults: number;
}

export interface BiddingConfig {
  priceFloor: number;
  defaultWindowMinutes: number;
}

export interface ReputationConfig {
  neutral: number;
  alpha: number;
  lateTarget: number;
  penalties: {
    preMatch: number;
    postMatch: number;
    postPickup: number;
  };
}

export interface DispatchConfig {
  pickupGraceMinutes: number;
}

export interface NotificationConfig {
  amqpUrl?: string;
  exchange: string;
}

export interface MarketplaceConfig {
  ranking: RankingConfig;
  backhaul: BackhaulConfig;
  bidding: BiddingConfig;
  reputation: ReputationConfig;
  dispatch: DispatchConfig;
  lockTimeoutMs: number;
  storage: StorageKind;
  notifications: NotificationConfig;
  port: number;
}

export const DEFAULT_MARKETPLACE_CONFIG: MarketplaceConfig = {
  ranking: {
    weights: { price: 0.5, reputation: 0.2, proximity: 0.2, backhaul: 0.1 },
    proximityHalfLifeMinutes: 60,
  },
  backhaul: { radiusKm: 80, maxResults: 5 },
  bidding: { priceFloor: 1, defaultWindowMinutes: 60 },
  reputation: {
    neutral: 0.5,
    alpha: 0.1,
    lateTarget: 0.6,
    penalties: { preMatch: 0.02, postMatch: 0.1, postPickup: 0.25 },
  },
  dispatch: { pickupGraceMinutes: 30 },
  lockTimeoutMs: 5000,
  storage: "postgres",
  notifications: { exchange: "haulbid.events" },
  port: 3000,
};

type Env = Record<string, string | undefined>;

interface MarketplaceEnv {
  RANK_WEIGHT_PRICE: number;
  RANK_WEIGHT_REPUTATION: number;
  RANK_WEIGHT_PROXIMITY: number;
  RANK_WEIGHT_BACKHAUL: number;
  PROXIMITY_HALF_LIFE_MINUTES: number;
  BACKHAUL_RADIUS_KM: number;
  BACKHAUL_MAX_RESULTS: number;
  BID_PRICE_FLOOR: number;
  AUCTION_DEFAULT_WINDOW_MINUTES: number;
  REPUTATION_NEUTRAL: number;
  REPUTATION_ALPHA: number;
  REPUTATION_LATE_TARGET: number;
  REPUTATION_PENALTY_PRE_MATCH: number;
  REPUTATION_PENALTY_POST_MATCH: number;
  REPUTATION_PENALTY_POST_PICKUP: number;
  PICKUP_GRACE_MINUTES: number;
  LOCK_TIMEOUT_MS: number;
  STORAGE: StorageKind;
  NOTIFY_AMQP_URL?: string;
  NOTIFY_EXCHANGE: string;
  PORT: number;
}

const defaults = DEFAULT_MARKETPLACE_CONFIG;

// Unset and blank variables fall back to the default
const numeric = () => Joi.number().empty("");
const weight = () => numeric().min(0);
const positive = () => numeric().greater(0);
const unitInterval = () => numeric().min(0).max(1);
const openUnitInterval = () => numeric().greater(0).less(1);

const crossFieldRules: Joi.CustomValidator<MarketplaceEnv> = (env, helpers) => {
  const weightSum =
    env.RANK_WEIGHT_PRICE +
    env.RANK_WEIGHT_REPUTATION +
    env.RANK_WEIGHT_PROXIMITY +
    env.RANK_WEIGHT_BACKHAUL;
  if (weightSum === 0) {
    return helpers.message({ custom: "At least one ranking weight must be greater than 0" });
  }

  if (
    !(
      env.REPUTATION_PENALTY_PRE_MATCH < env.REPUTATION_PENALTY_POST_MATCH &&
      env.REPUTATION_PENALTY_POST_MATCH < env.REPUTATION_PENALTY_POST_PICKUP
    )
  ) {
    return helpers.message({
      custom: "Reputation penalties must increase by stage: pre-match < post-match < post-pickup",
    });
  }

  return env;
};

export const marketplaceEnvSchema = Joi.object<MarketplaceEnv>({
  RANK_WEIGHT_PRICE: weight().default(defaults.ranking.weights.price),
  RANK_WEIGHT_REPUTATION: weight().default(defaults.ranking.weights.reputation),
  RANK_WEIGHT_PROXIMITY: weight().default(defaults.ranking.weights.proximity),
  RANK_WEIGHT_BACKHAUL: weight().default(defaults.ranking.weights.backhaul),
  PROXIMITY_HALF_LIFE_MINUTES: positive().default(defaults.ranking.proximityHalfLifeMinutes),

  BACKHAUL_RADIUS_KM: positive().default(defaults.backhaul.radiusKm),
  BACKHAUL_MAX_RESULTS: numeric().integer().min(1).default(defaults.backhaul.maxResults),

  BID_PRICE_FLOOR: positive().default(defaults.bidding.priceFloor),
  AUCTION_DEFAULT_WINDOW_MINUTES: positive().default(defaults.bidding.defaultWindowMinutes),

  REPUTATION_NEUTRAL: unitInterval().default(defaults.reputation.neutral),
  REPUTATION_ALPHA: openUnitInterval().default(defaults.reputation.alpha),
  REPUTATION_LATE_TARGET: unitInterval().default(defaults.reputation.lateTarget),
  REPUTATION_PENALTY_PRE_MATCH: openUnitInterval().default(defaults.reputation.penalties.preMatch),
  REPUTATION_PENALTY_POST_MATCH: openUnitInterval().default(defaults.reputation.penalties.postMatch),
  REPUTATION_PENALTY_POST_PICKUP: openUnitInterval().default(defaults.reputation.penalties.postPickup),

  PICKUP_GRACE_MINUTES: numeric().min(0).default(defaults.dispatch.pickupGraceMinutes),
  LOCK_TIMEOUT_MS: positive().default(defaults.lockTimeoutMs),

  STORAGE: Joi.string()
    .trim()
    .lowercase()
    .empty("")
    .valid("postgres", "memory")
    .default(defaults.storage),
  NOTIFY_AMQP_URL: Joi.string().trim().empty(""),
  NOTIFY_EXCHANGE: Joi.string().trim().empty("").default(defaults.notifications.exchange),
  PORT: numeric().integer().min(0).max(65535).default(defaults.port),
})
  .unknown(true)
  .custom(crossFieldRules);

/**
 * Throws on the first invalid setting so a misconfigured instance never starts
 */
export function loadMarketplaceConfig(env: Env = process.env): MarketplaceConfig {
  const result = marketplaceEnvSchema.validate(env, {
    errors: { wrap: { label: false } },
  });
  if (result.error) {
    throw new Error(`Invalid marketplace configuration: ${result.error.message}`);
  }
  const value = result.value;

  return {
    ranking: {
      weights: {
        price: value.RANK_WEIGHT_PRICE,
        reputation: value.RANK_WEIGHT_REPUTATION,
        proximity: value.RANK_WEIGHT_PROXIMITY,
        backhaul: value.RANK_WEIGHT_BACKHAUL,
      },
      proximityHalfLifeMinutes: value.PROXIMITY_HALF_LIFE_MINUTES,
    },
    backhaul: {
      radiusKm: value.BACKHAUL_RADIUS_KM,
      maxResults: value.BACKHAUL_MAX_RESULTS,
    },
    bidding: {
      priceFloor: value.BID_PRICE_FLOOR,
      defaultWindowMinutes: value.AUCTION_DEFAULT_WINDOW_MINUTES,
    },
    reputation: {
      neutral: value.REPUTATION_NEUTRAL,
      alpha: value.REPUTATION_ALPHA,
      lateTarget: value.REPUTATION_LATE_TARGET,
      penalties: {
        preMatch: value.REPUTATION_PENALTY_PRE_MATCH,
        postMatch: value.REPUTATION_PENALTY_POST_MATCH,
        postPickup: value.REPUTATION_PENALTY_POST_PICKUP,
      },
    },
    dispatch: {
      pickupGraceMinutes: value.PICKUP_GRACE_MINUTES,
    },
    lockTimeoutMs: value.LOCK_TIMEOUT_MS,
    storage: value.STORAGE,
    notifications: {
      amqpUrl: value.NOTIFY_AMQP_URL,
      exchange: value.NOTIFY_EXCHANGE,
    },
    port: value.PORT,
  };
}
