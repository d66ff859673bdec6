/**
 * MARKETPLACE STORE
 *
 * Repository ports for every aggregate the core persists. Two adapters
 * implement them: TypeORM over PostgreSQL/PostGIS (typeormStore.ts) and an
 * in-process store (memoryStore.ts) used by tests and STORAGE=memory.
 *
 * Every record carries a version column. Status changes go through
 * compare-and-swap methods that return null when the stored state no
 * longer matches what the caller read.
 */

import { Shipment } from "../../entities/Shipment";
import { Bid } from "../../entities/Bid";
import { Match } from "../../entities/Match";
import { AuctionWindow } from "../../entities/AuctionWindow";
import { DriverProfile } from "../../entities/DriverProfile";
import { ShipmentEvent } from "../../entities/ShipmentEvent";
import { ReputationEvent } from "../../entities/ReputationEvent";
import { ShipmentStatus } from "../../enums/ShipmentStatus";
import { BidStatus } from "../../enums/BidStatus";
import { ExecutionStatus } from "../../enums/ExecutionStatus";
import { Location } from "../../interfaces/Location";

/**
 * Mutable shipment fields a status transition may carry along
 */
export type ShipmentPatch = Partial<
  Pick<Shipment, "auctionRound" | "excludedDriverIds">
>;

export type MatchPatch = Partial<
  Pick<
    Match,
    | "pickedUpAt"
    | "departedAt"
    | "deliveredAt"
    | "deliveredOnTime"
    | "cancelledAt"
    | "failedAt"
    | "failureReason"
  >
>;

export interface ShipmentFilter {
  statuses?: ShipmentStatus[];
  shipperId?: string;
  limit?: number;
}

export interface NearbyShipment {
  shipment: Shipment;
  distanceMeters: number;
}

export interface NearbyQuery {
  statuses: ShipmentStatus[];
  radiusMeters: number;
  limit: number;
  excludeIds: string[];
}

export interface ShipmentRepository {
  insert(shipment: Shipment): Promise<Shipment>;
  /**
   * `forUpdate` takes a row lock for the rest of the surrounding transaction
   */
  findById(id: string, options?: { forUpdate?: boolean }): Promise<Shipment | null>;
  /**
   * Set status to `to` only if it is still `from`; null when it is not
   */
  compareAndSetStatus(
    id: string,
    from: ShipmentStatus,
    to: ShipmentStatus,
    patch?: ShipmentPatch
  ): Promise<Shipment | null>;
  list(filter: ShipmentFilter): Promise<Shipment[]>;
  /**
   * Shipments whose ORIGIN lies within the radius of `center`, nearest first
   */
  findOriginsNear(center: Location, query: NearbyQuery): Promise<NearbyShipment[]>;
}

export interface BidListOptions {
  round?: number;
  statuses?: BidStatus[];
}

export interface BidRepository {
  insert(bid: Bid): Promise<Bid>;
  findById(id: string): Promise<Bid | null>;
  findActive(shipmentId: string, driverId: string): Promise<Bid | null>;
  /**
   * Oldest first
   */
  listByShipment(shipmentId: string, options?: BidListOptions): Promise<Bid[]>;
  /**
   * Newest first
   */
  listByDriver(driverId: string, limit: number): Promise<Bid[]>;
  /**
   * Move ACTIVE bids to a resolved status; returns how many moved
   */
  resolve(ids: string[], status: BidStatus, at: Date): Promise<number>;
}

export interface MatchRepository {
  insert(match: Match): Promise<Match>;
  findById(id: string): Promise<Match | null>;
  findByShipmentRound(shipmentId: string, round: number): Promise<Match | null>;
  /**
   * The match that is still executing (ASSIGNED, PICKED_UP, IN_TRANSIT)
   */
  findActiveByShipment(shipmentId: string): Promise<Match | null>;
  listByShipment(shipmentId: string): Promise<Match[]>;
  listByDriver(driverId: string, limit: number): Promise<Match[]>;
  listByExecutionStatus(status: ExecutionStatus): Promise<Match[]>;
  compareAndSetExecution(
    id: string,
    from: ExecutionStatus,
    to: ExecutionStatus,
    patch?: MatchPatch
  ): Promise<Match | null>;
}

export interface AuctionWindowRepository {
  insert(window: AuctionWindow): Promise<AuctionWindow>;
  /**
   * Window of the highest round for the shipment
   */
  findLatest(shipmentId: string): Promise<AuctionWindow | null>;
  /**
   * Full overwrite guarded by version; null when another writer got there first
   */
  save(window: AuctionWindow): Promise<AuctionWindow | null>;
  /**
   * PENDING and OPEN windows (timer recovery after restart)
   */
  listUnresolved(): Promise<AuctionWindow[]>;
}

export interface DriverProfileRepository {
  findById(id: string, options?: { forUpdate?: boolean }): Promise<DriverProfile | null>;
  findByIds(ids: string[]): Promise<DriverProfile[]>;
  insert(profile: DriverProfile): Promise<DriverProfile>;
  /**
   * Full overwrite guarded by version; null when another writer got there first
   */
  save(profile: DriverProfile): Promise<DriverProfile | null>;
}

export interface ShipmentEventRepository {
  append(event: ShipmentEvent): Promise<ShipmentEvent>;
  nextSequence(shipmentId: string): Promise<number>;
  listByShipment(shipmentId: string): Promise<ShipmentEvent[]>;
}

export interface ReputationEventRepository {
  append(event: ReputationEvent): Promise<ReputationEvent>;
  listByDriver(driverId: string): Promise<ReputationEvent[]>;
}

/**
 * Repositories bound to one transaction (or to autocommit on the store)
 */
export interface StoreSession {
  readonly shipments: ShipmentRepository;
  readonly bids: BidRepository;
  readonly matches: MatchRepository;
  readonly windows: AuctionWindowRepository;
  readonly drivers: DriverProfileRepository;
  readonly shipmentEvents: ShipmentEventRepository;
  readonly reputationEvents: ReputationEventRepository;
}

export interface MarketplaceStore extends StoreSession {
  /**
   * Run `work` atomically. Either every write it made is kept, or none is.
   */
  transaction<T>(work: (session: StoreSession) => Promise<T>): Promise<T>;
}

/**
 * Join the caller's transaction when there is one, otherwise open a new one
 */
export function withSession<T>(
  store: MarketplaceStore,
  session: StoreSession | undefined,
  work: (session: StoreSession) => Promise<T>
): Promise<T> {
  return session ? work(session) : store.transaction(work);
}
