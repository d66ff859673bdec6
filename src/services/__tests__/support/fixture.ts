/**
 * Shared wiring for service tests: in-process store, fixed clock and
 * recording collaborators.
 */

import {
  DEFAULT_MARKETPLACE_CONFIG,
  MarketplaceConfig,
} from "../../../config/marketplace.config";
import {
  MarketplaceNotification,
  NotificationPublisher,
  NotificationType,
} from "../../../interfaces/Notification";
import {
  EscalationGateway,
  ExecutionFailure,
  SettlementGateway,
  SettlementInstruction,
} from "../../../interfaces/Collaborators";
import { Shipment } from "../../../entities/Shipment";
import { Bid } from "../../../entities/Bid";
import { DriverProfile } from "../../../entities/DriverProfile";
import { ShipmentStatus } from "../../../enums/ShipmentStatus";
import { BidStatus } from "../../../enums/BidStatus";
import { NoBidPolicy } from "../../../enums/NoBidPolicy";
import { toPoint } from "../../../utils/geo";
import { newDriverProfile } from "../../driver/driverProfile.service";
import { InMemoryMarketplaceStore } from "../../store/memoryStore";
import { Marketplace, createMarketplace } from "../../marketplace";
import { NewShipment } from "../../ledger/shipmentLedger";

export const T0 = new Date("2026-11-01T09:00:00.000Z");

export const MINUTE = 60 * 1000;
export const HOUR = 60 * MINUTE;

export class TestClock {
  private current: Date;

  constructor(start: Date = T0) {
    this.current = new Date(start.getTime());
  }

  readonly now = (): Date => new Date(this.current.getTime());

  advance(ms: number): Date {
    this.current = new Date(this.current.getTime() + ms);
    return this.now();
  }

  set(date: Date): void {
    this.current = new Date(date.getTime());
  }
}

export class RecordingPublisher implements NotificationPublisher {
  readonly events: MarketplaceNotification[] = [];

  async publish(notification: MarketplaceNotification): Promise<void> {
    this.events.push(notification);
  }

  ofType<K extends NotificationType>(type: K): Array<Extract<MarketplaceNotification, { type: K }>> {
    return this.events.filter(
      (event): event is Extract<MarketplaceNotification, { type: K }> => event.type === type
    );
  }

  clear(): void {
    this.events.length = 0;
  }
}

export class RecordingSettlement implements SettlementGateway {
  readonly instructions: SettlementInstruction[] = [];

  async matchCommitted(instruction: SettlementInstruction): Promise<void> {
    this.instructions.push(instruction);
  }
}

export class RecordingEscalation implements EscalationGateway {
  readonly failures: ExecutionFailure[] = [];

  async escalate(failure: ExecutionFailure): Promise<void> {
    this.failures.push(failure);
  }
}

export interface TestMarketplace {
  marketplace: Marketplace;
  store: InMemoryMarketplaceStore;
  clock: TestClock;
  publisher: RecordingPublisher;
  settlement: RecordingSettlement;
  escalation: RecordingEscalation;
  config: MarketplaceConfig;
}

export function testConfig(overrides: Partial<MarketplaceConfig> = {}): MarketplaceConfig {
  return { ...DEFAULT_MARKETPLACE_CONFIG, storage: "memory", ...overrides };
}

export function buildMarketplace(overrides: Partial<MarketplaceConfig> = {}): TestMarketplace {
  const config = testConfig(overrides);
  const clock = new TestClock();
  const store = new InMemoryMarketplaceStore(config.lockTimeoutMs);
  const publisher = new RecordingPublisher();
  const settlement = new RecordingSettlement();
  const escalation = new RecordingEscalation();

  const marketplace = createMarketplace({
    store,
    config,
    publisher,
    settlement,
    escalation,
    clock: clock.now,
  });

  return { marketplace, store, clock, publisher, settlement, escalation, config };
}

/**
 * Chicago -> Indianapolis, picked up tomorrow morning, delivered the same evening
 */
export function shipmentInput(overrides: Partial<NewShipment> = {}): NewShipment {
  return {
    shipperId: "shipper-1",
    origin: { lat: 41.8781, lng: -87.6298 },
    originAddress: "Chicago, IL",
    destination: { lat: 39.7684, lng: -86.1581 },
    destinationAddress: "Indianapolis, IN",
    weightKg: 10000,
    cargoType: "dry_van",
    pickupWindowStart: new Date(T0.getTime() + 24 * HOUR),
    pickupWindowEnd: new Date(T0.getTime() + 28 * HOUR),
    deliveryWindowStart: new Date(T0.getTime() + 32 * HOUR),
    deliveryWindowEnd: new Date(T0.getTime() + 38 * HOUR),
    ...overrides,
  };
}

/**
 * Post a shipment and open its auction with an explicit close
 */
export async function postBiddingShipment(
  marketplace: Marketplace,
  overrides: Partial<NewShipment> = {}
): Promise<string> {
  const { shipment } = await marketplace.shipments.post({
    ...shipmentInput(overrides),
    auction: { explicit: true },
  });
  return shipment.id;
}

/**
 * Stored shipment row built from `shipmentInput`, for tests below the service layer
 */
export function makeShipment(id: string, overrides: Partial<Shipment> = {}): Shipment {
  const input = shipmentInput();
  return {
    id,
    shipperId: input.shipperId,
    origin: toPoint(input.origin),
    originAddress: input.originAddress,
    destination: toPoint(input.destination),
    destinationAddress: input.destinationAddress,
    weightKg: input.weightKg,
    cargoType: input.cargoType,
    pickupWindowStart: input.pickupWindowStart,
    pickupWindowEnd: input.pickupWindowEnd,
    deliveryWindowStart: input.deliveryWindowStart,
    deliveryWindowEnd: input.deliveryWindowEnd,
    status: ShipmentStatus.OPEN,
    noBidPolicy: NoBidPolicy.RELIST,
    auctionRound: 0,
    excludedDriverIds: [],
    createdAt: T0,
    updatedAt: T0,
    version: 1,
    ...overrides,
  };
}

export function makeBid(id: string, driverId: string, overrides: Partial<Bid> = {}): Bid {
  return {
    id,
    shipmentId: "s-1",
    round: 1,
    driverId,
    price: 500,
    etaMinutes: 30,
    status: BidStatus.ACTIVE,
    submittedAt: T0,
    version: 1,
    ...overrides,
  };
}

export function makeProfile(id: string, overrides: Partial<DriverProfile> = {}): DriverProfile {
  return { ...newDriverProfile(id, 0.5, T0), ...overrides };
}
