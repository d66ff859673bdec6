import { KeyedMutex } from "../../utils/keyedMutex";
import { componentLogger } from "../../utils/logger";
import { MarketplaceStore, StoreSession } from "../store/marketplaceStore";
import { OutboundChannel } from "../notifications/outbound";
import { MarketplaceNotification } from "../../interfaces/Notification";
import {
  ExecutionFailure,
  SettlementInstruction,
} from "../../interfaces/Collaborators";

const log = componentLogger("shipment-guard");

/**
 * Everything one shipment operation did, collected while its transaction
 * is open and released only once it committed. A rolled-back unit leaves
 * no trace outside the store.
 */
export class UnitOfWork {
  readonly notifications: MarketplaceNotification[] = [];
  readonly settlements: SettlementInstruction[] = [];
  readonly escalations: ExecutionFailure[] = [];
  private readonly hooks: Array<() => void> = [];

  constructor(readonly session: StoreSession) {}

  notify(notification: MarketplaceNotification): void {
    this.notifications.push(notification);
  }

  settle(instruction: SettlementInstruction): void {
    this.settlements.push(instruction);
  }

  escalate(failure: ExecutionFailure): void {
    this.escalations.push(failure);
  }

  /**
   * Local side effect (timers) to run after commit
   */
  afterCommit(hook: () => void): void {
    this.hooks.push(hook);
  }

  runHooks(): void {
    for (const hook of this.hooks) {
      try {
        hook();
      } catch (error) {
        log.error("After-commit hook failed", { error });
      }
    }
  }
}

/**
 * Per-shipment critical section: keyed mutex, then one store transaction.
 * Every status change and bid-set change on a shipment goes through here.
 *
 * Driver records use their own mutex. It is only ever taken while the
 * shipment section is held or with no shipment section at all, never the
 * other way round.
 */
export class ShipmentGuard {
  readonly shipmentLocks: KeyedMutex;
  readonly driverLocks: KeyedMutex;

  constructor(
    private readonly store: MarketplaceStore,
    private readonly outbound: OutboundChannel,
    lockTimeoutMs: number
  ) {
    this.shipmentLocks = new KeyedMutex("shipment", lockTimeoutMs);
    this.driverLocks = new KeyedMutex("driver", lockTimeoutMs);
  }

  async run<T>(shipmentId: string, work: (unit: UnitOfWork) => Promise<T>): Promise<T> {
    const [result, unit] = await this.shipmentLocks.runExclusive(shipmentId, () =>
      this.store.transaction(async (session) => {
        const unit = new UnitOfWork(session);
        const result = await work(unit);
        return [result, unit] as const;
      })
    );

    this.flush(unit);
    return result;
  }

  withDriver<T>(driverId: string, work: () => Promise<T>): Promise<T> {
    return this.driverLocks.runExclusive(driverId, work);
  }

  private flush(unit: UnitOfWork): void {
    for (const notification of unit.notifications) {
      this.outbound.notify(notification);
    }
    for (const instruction of unit.settlements) {
      this.outbound.settle(instruction);
    }
    for (const failure of unit.escalations) {
      this.outbound.escalate(failure);
    }
    unit.runHooks();
  }
}
