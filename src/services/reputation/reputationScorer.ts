import { v4 as uuidv4 } from "uuid";
import { DriverProfile } from "../../entities/DriverProfile";
import { ReputationEvent } from "../../entities/ReputationEvent";
import { CancellationStage } from "../../enums/CancellationStage";
import { Clock, systemClock } from "../../interfaces/Collaborators";
import { ConflictError } from "../../errors/marketplace.errors";
import { componentLogger } from "../../utils/logger";
import {
  MarketplaceStore,
  StoreSession,
  withSession,
} from "../store/marketplaceStore";
import { ShipmentGuard } from "../concurrency/shipmentGuard";
import { newDriverProfile } from "../driver/driverProfile.service";
import {
  ReputationParams,
  ReputationSignal,
  applyReputationEvent,
  initialReputation,
} from "./reputationModel";

const log = componentLogger("reputation");

export interface ReputationUpdateOptions {
  /**
   * Join the caller's transaction (e.g. the shipment operation that caused it)
   */
  session?: StoreSession;
  shipmentId?: string;
}

/**
 * REPUTATION SCORER
 *
 * Owns the reputation fields of driver profiles. Updates for one driver
 * serialize through the driver lock and each appends a reputation event,
 * so the stored score always equals a replay of the driver's history.
 */
export class ReputationScorer {
  constructor(
    private readonly store: MarketplaceStore,
    private readonly guard: ShipmentGuard,
    private readonly params: ReputationParams,
    private readonly clock: Clock = systemClock
  ) {}

  async score(driverId: string): Promise<number> {
    const profile = await this.store.drivers.findById(driverId);
    return profile ? profile.reputationScore : initialReputation(this.params);
  }

  async recordCompletion(
    driverId: string,
    onTime: boolean,
    options: ReputationUpdateOptions = {}
  ): Promise<DriverProfile> {
    return this.apply(driverId, { kind: "completion", onTime }, options);
  }

  async recordCancellation(
    driverId: string,
    stage: CancellationStage,
    options: ReputationUpdateOptions = {}
  ): Promise<DriverProfile> {
    return this.apply(driverId, { kind: "cancellation", stage }, options);
  }

  async history(driverId: string): Promise<ReputationEvent[]> {
    return this.store.reputationEvents.listByDriver(driverId);
  }

  private apply(
    driverId: string,
    signal: ReputationSignal,
    options: ReputationUpdateOptions
  ): Promise<DriverProfile> {
    return this.guard.withDriver(driverId, () =>
      withSession(this.store, options.session, async (session) => {
        const now = this.clock();
        const profile =
          (await session.drivers.findById(driverId, { forUpdate: true })) ??
          (await session.drivers.insert(
            newDriverProfile(driverId, initialReputation(this.params), now)
          ));

        const before = profile.reputationScore;
        const after = applyReputationEvent(before, signal, this.params);

        const saved = await session.drivers.save({
          ...profile,
          reputationScore: after,
          completedJobs: profile.completedJobs + (signal.kind === "completion" ? 1 : 0),
          onTimeJobs:
            profile.onTimeJobs + (signal.kind === "completion" && signal.onTime ? 1 : 0),
          cancellationCount:
            profile.cancellationCount + (signal.kind === "cancellation" ? 1 : 0),
        });
        if (!saved) {
          throw new ConflictError(`Driver profile ${driverId} changed concurrently`);
        }

        await session.reputationEvents.append({
          id: uuidv4(),
          driverId,
          kind: signal.kind,
          onTime: signal.kind === "completion" ? signal.onTime : undefined,
          stage: signal.kind === "cancellation" ? signal.stage : undefined,
          shipmentId: options.shipmentId,
          scoreBefore: before,
          scoreAfter: after,
          occurredAt: now,
        });

        log.info(
          `Driver ${driverId} reputation ${before.toFixed(3)} -> ${after.toFixed(3)} (${
            signal.kind === "completion"
              ? signal.onTime
                ? "on-time completion"
                : "late completion"
              : `${signal.stage} cancellation`
          })`
        );
        return saved;
      })
    );
  }
}
