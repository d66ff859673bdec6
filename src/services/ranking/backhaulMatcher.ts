import { Shipment } from "../../entities/Shipment";
import { DriverProfile } from "../../entities/DriverProfile";
import { ShipmentStatus } from "../../enums/ShipmentStatus";
import { BackhaulCandidate } from "../../interfaces/Ranking";
import { BackhaulConfig } from "../../config/marketplace.config";
import { fromPoint } from "../../utils/geo";
import { componentLogger } from "../../utils/logger";
import { MarketplaceStore } from "../store/marketplaceStore";

const log = componentLogger("backhaul");

const SEARCHABLE = [ShipmentStatus.OPEN, ShipmentStatus.BIDDING];

export interface BackhaulFit {
  bonus: number;
  shipmentId?: string;
}

/**
 * Can the driver's truck haul this load? No declared equipment means any
 * cargo type, no declared capacity means any weight.
 */
export function canCarry(profile: DriverProfile | null, shipment: Pick<Shipment, "cargoType" | "weightKg">): boolean {
  if (!profile) return true;

  const equipmentOk =
    profile.equipmentTypes.length === 0 || profile.equipmentTypes.includes(shipment.cargoType);
  const capacityOk = profile.capacityKg === undefined || profile.capacityKg === null || profile.capacityKg >= shipment.weightKg;

  return equipmentOk && capacityOk;
}

/**
 * BACKHAUL MATCHER
 *
 * Finds loads a driver could chain after delivering a shipment: origins
 * near its destination whose pickup window is still open by the time the
 * delivery window starts. The search is read-only and bounded by radius
 * and result count.
 */
export class BackhaulMatcher {
  constructor(
    private readonly store: MarketplaceStore,
    private readonly config: BackhaulConfig
  ) {}

  get radiusMeters(): number {
    return this.config.radiusKm * 1000;
  }

  /**
   * Chainable loads after `shipment`, nearest first
   */
  async candidates(shipment: Shipment): Promise<BackhaulCandidate[]> {
    const radius = this.radiusMeters;
    const nearby = await this.store.shipments.findOriginsNear(fromPoint(shipment.destination), {
      statuses: SEARCHABLE,
      radiusMeters: radius,
      limit: this.config.maxResults,
      excludeIds: [shipment.id],
    });

    return nearby
      .filter(({ shipment: next }) => next.pickupWindowEnd > shipment.deliveryWindowStart)
      .map(({ shipment: next, distanceMeters }) => ({
        shipmentId: next.id,
        origin: fromPoint(next.origin),
        originAddress: next.originAddress,
        distanceMeters,
        pickupWindowEnd: next.pickupWindowEnd,
        cargoType: next.cargoType,
        weightKg: next.weightKg,
        bonus: Math.min(1, Math.max(0, 1 - distanceMeters / radius)),
      }));
  }

  /**
   * Bonus for the nearest candidate the driver can carry; 0 when none
   */
  fitFor(candidates: BackhaulCandidate[], profile: DriverProfile | null): BackhaulFit {
    const best = candidates.find((candidate) => canCarry(profile, candidate));
    return best ? { bonus: best.bonus, shipmentId: best.shipmentId } : { bonus: 0 };
  }

  /**
   * Candidates for ranking. Search failures degrade to "no backhaul".
   */
  async candidatesOrEmpty(shipment: Shipment): Promise<BackhaulCandidate[]> {
    try {
      return await this.candidates(shipment);
    } catch (error) {
      log.warn(`Backhaul search failed for shipment ${shipment.id}, scoring without bonus`, {
        error: error instanceof Error ? error.message : String(error),
      });
      return [];
    }
  }

  /**
   * Recommendations for a shipment, optionally limited to what one driver can carry
   */
  async recommend(shipment: Shipment, profile?: DriverProfile | null): Promise<BackhaulCandidate[]> {
    const candidates = await this.candidates(shipment);
    if (profile === undefined) {
      return candidates;
    }
    return candidates.filter((candidate) => canCarry(profile, candidate));
  }
}
