import { Bid } from "../../entities/Bid";
import { Shipment } from "../../entities/Shipment";
import { DriverProfile } from "../../entities/DriverProfile";
import { RankedBid, ScoreComponents } from "../../interfaces/Ranking";
import { RankingConfig, RankingWeights } from "../../config/marketplace.config";
import { StoreSession } from "../store/marketplaceStore";
import { BackhaulFit, BackhaulMatcher } from "./backhaulMatcher";

function clamp01(value: number): number {
  return Math.min(1, Math.max(0, value));
}

/**
 * Lower price scores higher; equals 0.5 at the reference price
 */
export function priceScore(price: number, reference: number): number {
  if (!(reference > 0)) return 0;
  return clamp01(reference / (reference + price));
}

/**
 * 1 at zero ETA, 0.5 at one half-life
 */
export function proximityScore(etaMinutes: number, halfLifeMinutes: number): number {
  return 1 / (1 + Math.max(0, etaMinutes) / halfLifeMinutes);
}

export function median(values: number[]): number {
  if (values.length === 0) return 0;

  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 1 ? sorted[mid] : (sorted[mid - 1] + sorted[mid]) / 2;
}

/**
 * Reserve price when the shipper set one, otherwise the median bid
 */
export function referencePrice(shipment: Pick<Shipment, "reservePrice">, bids: Bid[]): number {
  if (shipment.reservePrice !== undefined && shipment.reservePrice !== null && shipment.reservePrice > 0) {
    return shipment.reservePrice;
  }
  return median(bids.map((bid) => bid.price));
}

export function compositeScore(components: ScoreComponents, weights: RankingWeights): number {
  return (
    weights.price * components.priceScore +
    weights.reputation * components.reputation +
    weights.proximity * components.proximityScore +
    weights.backhaul * components.backhaulBonus
  );
}

/**
 * Total order: score desc, earliest submission, driver id, bid id
 */
export function compareRanked(a: RankedBid, b: RankedBid): number {
  if (a.score !== b.score) return b.score - a.score;

  const submitted = a.bid.submittedAt.getTime() - b.bid.submittedAt.getTime();
  if (submitted !== 0) return submitted;

  if (a.bid.driverId !== b.bid.driverId) return a.bid.driverId < b.bid.driverId ? -1 : 1;
  if (a.bid.id !== b.bid.id) return a.bid.id < b.bid.id ? -1 : 1;
  return 0;
}

export interface RankingInputs {
  reference: number;
  reputations: ReadonlyMap<string, number>;
  backhaul: ReadonlyMap<string, BackhaulFit>;
  neutralReputation: number;
  config: RankingConfig;
}

/**
 * Pure ranking over already-loaded inputs
 */
export function rankBids(bids: Bid[], inputs: RankingInputs): RankedBid[] {
  return bids
    .map((bid): RankedBid => {
      const fit = inputs.backhaul.get(bid.driverId) ?? { bonus: 0 };
      const components: ScoreComponents = {
        priceScore: priceScore(bid.price, inputs.reference),
        reputation: inputs.reputations.get(bid.driverId) ?? inputs.neutralReputation,
        proximityScore: proximityScore(bid.etaMinutes, inputs.config.proximityHalfLifeMinutes),
        backhaulBonus: fit.bonus,
      };
      return {
        bid,
        score: compositeScore(components, inputs.config.weights),
        components,
        backhaulShipmentId: fit.shipmentId,
      };
    })
    .sort(compareRanked);
}

/**
 * RANKING ENGINE
 *
 * Loads what scoring needs (reputations, backhaul candidates) and ranks
 * the bids of one auction round. Runs inside the shipment's critical
 * section; the backhaul lookup only reads other shipments.
 */
export class RankingEngine {
  constructor(
    private readonly backhaul: BackhaulMatcher,
    private readonly config: RankingConfig,
    private readonly neutralReputation: number
  ) {}

  async rank(session: StoreSession, shipment: Shipment, bids: Bid[]): Promise<RankedBid[]> {
    if (bids.length === 0) return [];

    const driverIds = Array.from(new Set(bids.map((bid) => bid.driverId)));
    const profiles = await session.drivers.findByIds(driverIds);
    const byDriver = new Map<string, DriverProfile>(profiles.map((p) => [p.id, p]));

    const candidates =
      this.config.weights.backhaul > 0 ? await this.backhaul.candidatesOrEmpty(shipment) : [];

    const backhaul = new Map<string, BackhaulFit>();
    for (const driverId of driverIds) {
      backhaul.set(driverId, this.backhaul.fitFor(candidates, byDriver.get(driverId) ?? null));
    }

    return rankBids(bids, {
      reference: referencePrice(shipment, bids),
      reputations: new Map(profiles.map((p) => [p.id, p.reputationScore])),
      backhaul,
      neutralReputation: this.neutralReputation,
      config: this.config,
    });
  }
}
