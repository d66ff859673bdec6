import { v4 as uuidv4 } from "uuid";
import { Shipment } from "../../entities/Shipment";
import { ShipmentEvent } from "../../entities/ShipmentEvent";
import { ShipmentStatus } from "../../enums/ShipmentStatus";
import { NoBidPolicy } from "../../enums/NoBidPolicy";
import { Location } from "../../interfaces/Location";
import { Clock, systemClock } from "../../interfaces/Collaborators";
import {
  ConflictError,
  NotFoundError,
  ValidationError,
} from "../../errors/marketplace.errors";
import { isValidLocation, toPoint } from "../../utils/geo";
import { componentLogger } from "../../utils/logger";
import {
  MarketplaceStore,
  ShipmentFilter,
  ShipmentPatch,
  StoreSession,
} from "../store/marketplaceStore";
import { ShipmentGuard, UnitOfWork } from "../concurrency/shipmentGuard";

const log = componentLogger("ledger");

/**
 * Shipment state machine. Anything not listed is rejected.
 */
export const SHIPMENT_TRANSITIONS: Readonly<Record<ShipmentStatus, readonly ShipmentStatus[]>> = {
  [ShipmentStatus.DRAFT]: [ShipmentStatus.OPEN, ShipmentStatus.CANCELLED],
  [ShipmentStatus.OPEN]: [ShipmentStatus.BIDDING, ShipmentStatus.CANCELLED],
  [ShipmentStatus.BIDDING]: [
    ShipmentStatus.MATCHED,
    ShipmentStatus.OPEN, // re-listed after a bid-less close
    ShipmentStatus.CANCELLED,
  ],
  [ShipmentStatus.MATCHED]: [
    ShipmentStatus.IN_TRANSIT,
    ShipmentStatus.BIDDING, // re-auction after the winner dropped out
    ShipmentStatus.CANCELLED,
  ],
  [ShipmentStatus.IN_TRANSIT]: [ShipmentStatus.DELIVERED, ShipmentStatus.FAILED],
  [ShipmentStatus.DELIVERED]: [],
  [ShipmentStatus.CANCELLED]: [],
  [ShipmentStatus.FAILED]: [],
};

export function canTransition(from: ShipmentStatus, to: ShipmentStatus): boolean {
  return SHIPMENT_TRANSITIONS[from].includes(to);
}

export function isTerminal(status: ShipmentStatus): boolean {
  return SHIPMENT_TRANSITIONS[status].length === 0;
}

export interface NewShipment {
  shipperId: string;
  origin: Location;
  originAddress: string;
  destination: Location;
  destinationAddress: string;
  weightKg: number;
  cargoType: string;
  description?: string;
  pickupWindowStart: Date;
  pickupWindowEnd: Date;
  deliveryWindowStart: Date;
  deliveryWindowEnd: Date;
  reservePrice?: number;
  noBidPolicy?: NoBidPolicy;
}

export interface TransitionOptions {
  reason?: string;
  patch?: ShipmentPatch;
  /**
   * Join an operation already inside the shipment's critical section
   */
  unit?: UnitOfWork;
}

function validateNewShipment(input: NewShipment): void {
  if (!input.shipperId.trim()) {
    throw new ValidationError("shipperId is required");
  }
  if (!isValidLocation(input.origin)) {
    throw new ValidationError("origin must be a valid lat/lng");
  }
  if (!isValidLocation(input.destination)) {
    throw new ValidationError("destination must be a valid lat/lng");
  }
  if (!(input.weightKg > 0)) {
    throw new ValidationError("weightKg must be greater than 0");
  }
  if (!input.cargoType.trim()) {
    throw new ValidationError("cargoType is required");
  }

  const windows: Array<[string, Date]> = [
    ["pickupWindowStart", input.pickupWindowStart],
    ["pickupWindowEnd", input.pickupWindowEnd],
    ["deliveryWindowStart", input.deliveryWindowStart],
    ["deliveryWindowEnd", input.deliveryWindowEnd],
  ];
  for (const [name, value] of windows) {
    if (Number.isNaN(value.getTime())) {
      throw new ValidationError(`${name} must be a valid date`);
    }
  }
  if (input.pickupWindowStart > input.pickupWindowEnd) {
    throw new ValidationError("pickup window ends before it starts");
  }
  if (input.deliveryWindowStart > input.deliveryWindowEnd) {
    throw new ValidationError("delivery window ends before it starts");
  }
  if (input.deliveryWindowEnd < input.pickupWindowStart) {
    throw new ValidationError("delivery window ends before pickup can start");
  }
  if (input.reservePrice !== undefined && !(input.reservePrice > 0)) {
    throw new ValidationError("reservePrice must be greater than 0");
  }
}

/**
 * SHIPMENT LEDGER
 *
 * Single source of truth for shipment existence and status. Status only
 * moves through compare-and-swap transitions, and each successful one
 * appends an audit event and a shipment-status-changed notification.
 */
export class ShipmentLedger {
  constructor(
    private readonly store: MarketplaceStore,
    private readonly guard: ShipmentGuard,
    private readonly clock: Clock = systemClock
  ) {}

  async create(input: NewShipment): Promise<Shipment> {
    validateNewShipment(input);

    const now = this.clock();
    const shipment: Shipment = {
      id: uuidv4(),
      shipperId: input.shipperId,
      origin: toPoint(input.origin),
      originAddress: input.originAddress,
      destination: toPoint(input.destination),
      destinationAddress: input.destinationAddress,
      weightKg: input.weightKg,
      cargoType: input.cargoType,
      description: input.description,
      pickupWindowStart: input.pickupWindowStart,
      pickupWindowEnd: input.pickupWindowEnd,
      deliveryWindowStart: input.deliveryWindowStart,
      deliveryWindowEnd: input.deliveryWindowEnd,
      reservePrice: input.reservePrice,
      status: ShipmentStatus.DRAFT,
      noBidPolicy: input.noBidPolicy ?? NoBidPolicy.RELIST,
      auctionRound: 0,
      excludedDriverIds: [],
      createdAt: now,
      updatedAt: now,
      version: 1,
    };

    return this.guard.run(shipment.id, async ({ session }) => {
      const created = await session.shipments.insert(shipment);
      await this.appendEvent(session, created.id, undefined, ShipmentStatus.DRAFT, "created");
      log.info(`Shipment ${created.id} created by shipper ${created.shipperId}`);
      return created;
    });
  }

  async get(id: string, session?: StoreSession, options: { forUpdate?: boolean } = {}): Promise<Shipment> {
    const shipment = await (session ?? this.store).shipments.findById(id, options);
    if (!shipment) {
      throw new NotFoundError("Shipment", id);
    }
    return shipment;
  }

  async transition(
    id: string,
    from: ShipmentStatus,
    to: ShipmentStatus,
    options: TransitionOptions = {}
  ): Promise<Shipment> {
    if (options.unit) {
      return this.transitionIn(options.unit, id, from, to, options);
    }
    return this.guard.run(id, (unit) => this.transitionIn(unit, id, from, to, options));
  }

  async list(filter: ShipmentFilter = {}): Promise<Shipment[]> {
    return this.store.shipments.list({ ...filter, limit: Math.min(filter.limit ?? 100, 100) });
  }

  async history(id: string): Promise<ShipmentEvent[]> {
    await this.get(id);
    return this.store.shipmentEvents.listByShipment(id);
  }

  private async transitionIn(
    unit: UnitOfWork,
    id: string,
    from: ShipmentStatus,
    to: ShipmentStatus,
    options: TransitionOptions
  ): Promise<Shipment> {
    if (!canTransition(from, to)) {
      throw new ConflictError(`Shipment transition ${from} -> ${to} is not allowed`);
    }

    const updated = await unit.session.shipments.compareAndSetStatus(id, from, to, options.patch);
    if (!updated) {
      const current = await unit.session.shipments.findById(id);
      if (!current) {
        throw new NotFoundError("Shipment", id);
      }
      throw new ConflictError(
        `Shipment ${id} is ${current.status}, expected ${from} for transition to ${to}`
      );
    }

    await this.appendEvent(unit.session, id, from, to, options.reason);
    unit.notify({
      type: "shipment-status-changed",
      shipmentId: id,
      shipperId: updated.shipperId,
      from,
      to,
      reason: options.reason,
    });

    log.debug(`Shipment ${id}: ${from} -> ${to}${options.reason ? ` (${options.reason})` : ""}`);
    return updated;
  }

  private async appendEvent(
    session: StoreSession,
    shipmentId: string,
    from: ShipmentStatus | undefined,
    to: ShipmentStatus,
    reason: string | undefined
  ): Promise<void> {
    const event: ShipmentEvent = {
      id: uuidv4(),
      shipmentId,
      sequence: await session.shipmentEvents.nextSequence(shipmentId),
      fromStatus: from,
      toStatus: to,
      reason,
      occurredAt: this.clock(),
    };
    await session.shipmentEvents.append(event);
  }
}
