import { DriverProfile } from "../../entities/DriverProfile";
import { Location } from "../../interfaces/Location";
import { Clock, systemClock } from "../../interfaces/Collaborators";
import {
  ConflictError,
  NotFoundError,
  ValidationError,
} from "../../errors/marketplace.errors";
import { isValidLocation, toPoint } from "../../utils/geo";
import { componentLogger } from "../../utils/logger";
import { MarketplaceStore } from "../store/marketplaceStore";
import { ShipmentGuard } from "../concurrency/shipmentGuard";

const log = componentLogger("drivers");

export interface EquipmentUpdate {
  equipmentTypes?: string[];
  capacityKg?: number | null;
}

export function newDriverProfile(id: string, reputation: number, now: Date): DriverProfile {
  return {
    id,
    reputationScore: reputation,
    completedJobs: 0,
    onTimeJobs: 0,
    cancellationCount: 0,
    currentLocation: undefined,
    available: true,
    equipmentTypes: [],
    capacityKg: undefined,
    createdAt: now,
    updatedAt: now,
    version: 1,
  };
}

/**
 * Driver-reported state: location, availability and equipment. Reputation
 * fields are left to the reputation scorer.
 */
export class DriverProfileService {
  constructor(
    private readonly store: MarketplaceStore,
    private readonly guard: ShipmentGuard,
    private readonly neutralReputation: number,
    private readonly clock: Clock = systemClock
  ) {}

  async getProfile(driverId: string): Promise<DriverProfile> {
    const profile = await this.store.drivers.findById(driverId);
    if (!profile) {
      throw new NotFoundError("Driver", driverId);
    }
    return profile;
  }

  /**
   * Profile for a driver seen for the first time is created with neutral reputation
   */
  async ensureProfile(driverId: string): Promise<DriverProfile> {
    if (!driverId.trim()) {
      throw new ValidationError("driverId is required");
    }

    return this.guard.withDriver(driverId, async () => {
      const existing = await this.store.drivers.findById(driverId);
      if (existing) {
        return existing;
      }
      log.info(`Registering driver profile ${driverId}`);
      return this.store.drivers.insert(
        newDriverProfile(driverId, this.neutralReputation, this.clock())
      );
    });
  }

  async updateLocation(driverId: string, location: Location): Promise<DriverProfile> {
    if (!isValidLocation(location)) {
      throw new ValidationError("location must be a valid lat/lng");
    }
    return this.mutate(driverId, (profile) => ({
      ...profile,
      currentLocation: toPoint(location),
    }));
  }

  async setAvailability(driverId: string, available: boolean): Promise<DriverProfile> {
    return this.mutate(driverId, (profile) => ({ ...profile, available }));
  }

  async updateEquipment(driverId: string, update: EquipmentUpdate): Promise<DriverProfile> {
    if (update.capacityKg !== undefined && update.capacityKg !== null && !(update.capacityKg > 0)) {
      throw new ValidationError("capacityKg must be greater than 0");
    }

    const equipmentTypes = update.equipmentTypes?.map((type) => type.trim()).filter(Boolean);

    return this.mutate(driverId, (profile) => ({
      ...profile,
      equipmentTypes: equipmentTypes ? Array.from(new Set(equipmentTypes)) : profile.equipmentTypes,
      capacityKg:
        update.capacityKg === undefined
          ? profile.capacityKg
          : update.capacityKg === null
            ? undefined
            : update.capacityKg,
    }));
  }

  private async mutate(
    driverId: string,
    change: (profile: DriverProfile) => DriverProfile
  ): Promise<DriverProfile> {
    await this.ensureProfile(driverId);

    return this.guard.withDriver(driverId, () =>
      this.store.transaction(async (session) => {
        const current = await session.drivers.findById(driverId, { forUpdate: true });
        if (!current) {
          throw new NotFoundError("Driver", driverId);
        }

        const saved = await session.drivers.save(change(current));
        if (!saved) {
          throw new ConflictError(`Driver profile ${driverId} changed concurrently`);
        }
        return saved;
      })
    );
  }
}
