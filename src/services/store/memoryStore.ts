/**
 * IN-PROCESS STORE
 *
 * Map-backed implementation of the marketplace repositories. Records are
 * copied on the way in and out so callers never share mutable state with
 * the store.
 *
 * A transaction stages its writes in an overlay that only its own session
 * reads through. The overlay is published to the shared tables in one
 * synchronous step when the work resolves, and dropped when it throws, so
 * other readers see either none or all of a transaction. `forUpdate` reads
 * take a row lock held until the transaction ends, as PostgreSQL does.
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
import { AuctionState } from "../../enums/AuctionState";
import { Location } from "../../interfaces/Location";
import { fromPoint, haversineDistance } from "../../utils/geo";
import {
  AuctionWindowRepository,
  BidListOptions,
  BidRepository,
  DriverProfileRepository,
  MarketplaceStore,
  MatchPatch,
  MatchRepository,
  NearbyQuery,
  NearbyShipment,
  ReputationEventRepository,
  ShipmentEventRepository,
  ShipmentFilter,
  ShipmentPatch,
  ShipmentRepository,
  StoreSession,
} from "./marketplaceStore";
import { ConflictError } from "../../errors/marketplace.errors";
import { KeyedMutex, Release } from "../../utils/keyedMutex";

const EXECUTING = new Set<ExecutionStatus>([
  ExecutionStatus.ASSIGNED,
  ExecutionStatus.PICKED_UP,
  ExecutionStatus.IN_TRANSIT,
]);

type Row = { id: string; version?: number };

/**
 * What a repository reads and writes through
 */
interface TableView<T extends Row> {
  get(id: string): T | null;
  all(): T[];
  put(row: T): T;
}

interface RowLocks {
  lock(key: string): Promise<void>;
}

/**
 * Committed rows of one table, copy-on-read/write
 */
class MemoryTable<T extends Row> implements TableView<T> {
  private readonly rows = new Map<string, T>();

  constructor(readonly name: string) {}

  get(id: string): T | null {
    const row = this.rows.get(id);
    return row ? structuredClone(row) : null;
  }

  has(id: string): boolean {
    return this.rows.has(id);
  }

  /**
   * null when the row does not exist; rows without a version count as 0
   */
  versionOf(id: string): number | null {
    const row = this.rows.get(id);
    return row ? row.version ?? 0 : null;
  }

  all(): T[] {
    return Array.from(this.rows.values(), (row) => structuredClone(row));
  }

  put(row: T): T {
    this.rows.set(row.id, structuredClone(row));
    return structuredClone(row);
  }

  get size(): number {
    return this.rows.size;
  }
}

/**
 * One transaction's pending writes over a committed table
 */
class StagedTable<T extends Row> implements TableView<T> {
  private readonly staged = new Map<string, T>();
  private readonly baseVersions = new Map<string, number | null>();

  constructor(private readonly table: MemoryTable<T>) {}

  get(id: string): T | null {
    const row = this.staged.get(id);
    return row ? structuredClone(row) : this.table.get(id);
  }

  all(): T[] {
    const rows = this.table.all().map((row) => {
      const staged = this.staged.get(row.id);
      return staged ? structuredClone(staged) : row;
    });
    for (const [id, row] of this.staged) {
      if (!this.table.has(id)) {
        rows.push(structuredClone(row));
      }
    }
    return rows;
  }

  put(row: T): T {
    if (!this.baseVersions.has(row.id)) {
      this.baseVersions.set(row.id, this.table.versionOf(row.id));
    }
    this.staged.set(row.id, structuredClone(row));
    return structuredClone(row);
  }

  /**
   * Rows another transaction committed since this one first wrote them
   */
  conflicts(): string[] {
    return Array.from(this.baseVersions)
      .filter(([id, version]) => this.table.versionOf(id) !== version)
      .map(([id]) => `${this.table.name} ${id}`);
  }

  publish(): void {
    for (const row of this.staged.values()) {
      this.table.put(row);
    }
  }
}

interface Tables {
  shipments: MemoryTable<Shipment>;
  bids: MemoryTable<Bid>;
  matches: MemoryTable<Match>;
  windows: MemoryTable<AuctionWindow>;
  drivers: MemoryTable<DriverProfile>;
  shipmentEvents: MemoryTable<ShipmentEvent>;
  reputationEvents: MemoryTable<ReputationEvent>;
}

class MemoryShipmentRepository implements ShipmentRepository {
  constructor(
    private readonly table: TableView<Shipment>,
    private readonly locks: RowLocks | null
  ) {}

  async insert(shipment: Shipment): Promise<Shipment> {
    if (this.table.get(shipment.id)) {
      throw new Error(`Duplicate shipment id ${shipment.id}`);
    }
    return this.table.put({ ...shipment, version: 1 });
  }

  async findById(id: string, options: { forUpdate?: boolean } = {}): Promise<Shipment | null> {
    if (options.forUpdate) {
      await this.locks?.lock(`shipment:${id}`);
    }
    return this.table.get(id);
  }

  async compareAndSetStatus(
    id: string,
    from: ShipmentStatus,
    to: ShipmentStatus,
    patch: ShipmentPatch = {}
  ): Promise<Shipment | null> {
    const current = this.table.get(id);
    if (!current || current.status !== from) {
      return null;
    }

    return this.table.put({
      ...current,
      ...patch,
      status: to,
      updatedAt: new Date(),
      version: current.version + 1,
    });
  }

  async list(filter: ShipmentFilter): Promise<Shipment[]> {
    const statuses = filter.statuses ? new Set(filter.statuses) : null;

    return this.table
      .all()
      .filter((s) => (statuses ? statuses.has(s.status) : true))
      .filter((s) => (filter.shipperId ? s.shipperId === filter.shipperId : true))
      .sort(
        (a, b) =>
          b.createdAt.getTime() - a.createdAt.getTime() || a.id.localeCompare(b.id)
      )
      .slice(0, filter.limit ?? 100);
  }

  async findOriginsNear(center: Location, query: NearbyQuery): Promise<NearbyShipment[]> {
    const statuses = new Set(query.statuses);
    const excluded = new Set(query.excludeIds);

    return this.table
      .all()
      .filter((s) => statuses.has(s.status) && !excluded.has(s.id))
      .map((shipment) => ({
        shipment,
        distanceMeters: haversineDistance(center, fromPoint(shipment.origin)),
      }))
      .filter((candidate) => candidate.distanceMeters <= query.radiusMeters)
      .sort(
        (a, b) =>
          a.distanceMeters - b.distanceMeters ||
          a.shipment.id.localeCompare(b.shipment.id)
      )
      .slice(0, query.limit);
  }
}

class MemoryBidRepository implements BidRepository {
  constructor(private readonly table: TableView<Bid>) {}

  async insert(bid: Bid): Promise<Bid> {
    if (this.table.get(bid.id)) {
      throw new Error(`Duplicate bid id ${bid.id}`);
    }
    // Same guarantee as the partial unique index in PostgreSQL
    if (bid.status === BidStatus.ACTIVE && (await this.findActive(bid.shipmentId, bid.driverId))) {
      throw new Error(
        `Driver ${bid.driverId} already holds an active bid on shipment ${bid.shipmentId}`
      );
    }
    return this.table.put({ ...bid, version: 1 });
  }

  async findById(id: string): Promise<Bid | null> {
    return this.table.get(id);
  }

  async findActive(shipmentId: string, driverId: string): Promise<Bid | null> {
    return (
      this.table
        .all()
        .find(
          (b) =>
            b.shipmentId === shipmentId &&
            b.driverId === driverId &&
            b.status === BidStatus.ACTIVE
        ) ?? null
    );
  }

  async listByShipment(shipmentId: string, options: BidListOptions = {}): Promise<Bid[]> {
    const statuses = options.statuses ? new Set(options.statuses) : null;

    return this.table
      .all()
      .filter((b) => b.shipmentId === shipmentId)
      .filter((b) => (options.round !== undefined ? b.round === options.round : true))
      .filter((b) => (statuses ? statuses.has(b.status) : true))
      .sort(
        (a, b) =>
          a.submittedAt.getTime() - b.submittedAt.getTime() || a.id.localeCompare(b.id)
      );
  }

  async listByDriver(driverId: string, limit: number): Promise<Bid[]> {
    return this.table
      .all()
      .filter((b) => b.driverId === driverId)
      .sort(
        (a, b) =>
          b.submittedAt.getTime() - a.submittedAt.getTime() || a.id.localeCompare(b.id)
      )
      .slice(0, limit);
  }

  async resolve(ids: string[], status: BidStatus, at: Date): Promise<number> {
    let moved = 0;
    for (const id of ids) {
      const bid = this.table.get(id);
      if (!bid || bid.status !== BidStatus.ACTIVE) continue;

      this.table.put({ ...bid, status, resolvedAt: at, version: bid.version + 1 });
      moved += 1;
    }
    return moved;
  }
}

class MemoryMatchRepository implements MatchRepository {
  constructor(private readonly table: TableView<Match>) {}

  async insert(match: Match): Promise<Match> {
    if (await this.findByShipmentRound(match.shipmentId, match.round)) {
      throw new Error(
        `Shipment ${match.shipmentId} already has a match for round ${match.round}`
      );
    }
    return this.table.put({ ...match, version: 1 });
  }

  async findById(id: string): Promise<Match | null> {
    return this.table.get(id);
  }

  async findByShipmentRound(shipmentId: string, round: number): Promise<Match | null> {
    return (
      this.table.all().find((m) => m.shipmentId === shipmentId && m.round === round) ??
      null
    );
  }

  async findActiveByShipment(shipmentId: string): Promise<Match | null> {
    return (
      this.table
        .all()
        .find((m) => m.shipmentId === shipmentId && EXECUTING.has(m.executionStatus)) ??
      null
    );
  }

  async listByShipment(shipmentId: string): Promise<Match[]> {
    return this.table
      .all()
      .filter((m) => m.shipmentId === shipmentId)
      .sort((a, b) => a.round - b.round);
  }

  async listByDriver(driverId: string, limit: number): Promise<Match[]> {
    return this.table
      .all()
      .filter((m) => m.driverId === driverId)
      .sort((a, b) => b.committedAt.getTime() - a.committedAt.getTime())
      .slice(0, limit);
  }

  async listByExecutionStatus(status: ExecutionStatus): Promise<Match[]> {
    return this.table
      .all()
      .filter((m) => m.executionStatus === status)
      .sort((a, b) => a.committedAt.getTime() - b.committedAt.getTime());
  }

  async compareAndSetExecution(
    id: string,
    from: ExecutionStatus,
    to: ExecutionStatus,
    patch: MatchPatch = {}
  ): Promise<Match | null> {
    const current = this.table.get(id);
    if (!current || current.executionStatus !== from) {
      return null;
    }

    return this.table.put({ ...current, ...patch, executionStatus: to, version: current.version + 1 });
  }
}

class MemoryAuctionWindowRepository implements AuctionWindowRepository {
  constructor(private readonly table: TableView<AuctionWindow>) {}

  async insert(window: AuctionWindow): Promise<AuctionWindow> {
    const clash = this.table
      .all()
      .some((w) => w.shipmentId === window.shipmentId && w.round === window.round);
    if (clash) {
      throw new Error(
        `Shipment ${window.shipmentId} already has an auction window for round ${window.round}`
      );
    }
    return this.table.put({ ...window, version: 1 });
  }

  async findLatest(shipmentId: string): Promise<AuctionWindow | null> {
    const windows = this.table
      .all()
      .filter((w) => w.shipmentId === shipmentId)
      .sort((a, b) => b.round - a.round);
    return windows[0] ?? null;
  }

  async save(window: AuctionWindow): Promise<AuctionWindow | null> {
    const current = this.table.get(window.id);
    if (!current || current.version !== window.version) {
      return null;
    }
    return this.table.put({ ...window, version: window.version + 1 });
  }

  async listUnresolved(): Promise<AuctionWindow[]> {
    return this.table
      .all()
      .filter((w) => w.state === AuctionState.PENDING || w.state === AuctionState.OPEN)
      .sort((a, b) => a.opensAt.getTime() - b.opensAt.getTime());
  }
}

class MemoryDriverProfileRepository implements DriverProfileRepository {
  constructor(
    private readonly table: TableView<DriverProfile>,
    private readonly locks: RowLocks | null
  ) {}

  async findById(id: string, options: { forUpdate?: boolean } = {}): Promise<DriverProfile | null> {
    if (options.forUpdate) {
      await this.locks?.lock(`driver:${id}`);
    }
    return this.table.get(id);
  }

  async findByIds(ids: string[]): Promise<DriverProfile[]> {
    return ids
      .map((id) => this.table.get(id))
      .filter((profile): profile is DriverProfile => profile !== null);
  }

  async insert(profile: DriverProfile): Promise<DriverProfile> {
    if (this.table.get(profile.id)) {
      throw new Error(`Duplicate driver profile ${profile.id}`);
    }
    return this.table.put({ ...profile, version: 1 });
  }

  async save(profile: DriverProfile): Promise<DriverProfile | null> {
    const current = this.table.get(profile.id);
    if (!current || current.version !== profile.version) {
      return null;
    }
    return this.table.put({ ...profile, updatedAt: new Date(), version: profile.version + 1 });
  }
}

class MemoryShipmentEventRepository implements ShipmentEventRepository {
  constructor(private readonly table: TableView<ShipmentEvent>) {}

  async append(event: ShipmentEvent): Promise<ShipmentEvent> {
    return this.table.put(event);
  }

  async nextSequence(shipmentId: string): Promise<number> {
    const events = await this.listByShipment(shipmentId);
    return events.length + 1;
  }

  async listByShipment(shipmentId: string): Promise<ShipmentEvent[]> {
    return this.table
      .all()
      .filter((e) => e.shipmentId === shipmentId)
      .sort((a, b) => a.sequence - b.sequence);
  }
}

class MemoryReputationEventRepository implements ReputationEventRepository {
  constructor(private readonly table: TableView<ReputationEvent>) {}

  async append(event: ReputationEvent): Promise<ReputationEvent> {
    return this.table.put(event);
  }

  async listByDriver(driverId: string): Promise<ReputationEvent[]> {
    // Stable sort: same-instant events stay in append order
    return this.table
      .all()
      .filter((e) => e.driverId === driverId)
      .sort((a, b) => a.occurredAt.getTime() - b.occurredAt.getTime());
  }
}

type StagedTables = { [K in keyof Tables]: Tables[K] extends MemoryTable<infer T> ? StagedTable<T> : never };

function bindSession(tables: Tables | StagedTables, locks: RowLocks | null): StoreSession {
  return {
    shipments: new MemoryShipmentRepository(tables.shipments, locks),
    bids: new MemoryBidRepository(tables.bids),
    matches: new MemoryMatchRepository(tables.matches),
    windows: new MemoryAuctionWindowRepository(tables.windows),
    drivers: new MemoryDriverProfileRepository(tables.drivers, locks),
    shipmentEvents: new MemoryShipmentEventRepository(tables.shipmentEvents),
    reputationEvents: new MemoryReputationEventRepository(tables.reputationEvents),
  };
}

/**
 * Overlay and row locks of one open transaction
 */
class MemoryTransaction implements RowLocks {
  readonly tables: StagedTables;
  readonly session: StoreSession;
  private readonly held = new Map<string, Promise<void>>();
  private readonly releases: Release[] = [];
  private ended = false;

  constructor(
    committed: Tables,
    private readonly rowLocks: KeyedMutex
  ) {
    this.tables = {
      shipments: new StagedTable(committed.shipments),
      bids: new StagedTable(committed.bids),
      matches: new StagedTable(committed.matches),
      windows: new StagedTable(committed.windows),
      drivers: new StagedTable(committed.drivers),
      shipmentEvents: new StagedTable(committed.shipmentEvents),
      reputationEvents: new StagedTable(committed.reputationEvents),
    };
    this.session = bindSession(this.tables, this);
  }

  lock(key: string): Promise<void> {
    let pending = this.held.get(key);
    if (!pending) {
      pending = this.rowLocks.acquire(key).then((release) => {
        // granted after the transaction already ended
        if (this.ended) release();
        else this.releases.push(release);
      });
      this.held.set(key, pending);
    }
    return pending;
  }

  /**
   * Publish every staged write at once, or none if another transaction
   * committed over a row this one changed
   */
  commit(): void {
    const staged = Object.values(this.tables);
    const conflicts = staged.flatMap((table) => table.conflicts());
    if (conflicts.length > 0) {
      throw new ConflictError(`Concurrent write to ${conflicts.join(", ")}`);
    }
    for (const table of staged) {
      table.publish();
    }
  }

  releaseLocks(): void {
    this.ended = true;
    while (this.releases.length > 0) {
      const release = this.releases.pop();
      if (release) release();
    }
    this.held.clear();
  }
}

export class InMemoryMarketplaceStore implements MarketplaceStore {
  private readonly tables: Tables = {
    shipments: new MemoryTable<Shipment>("shipment"),
    bids: new MemoryTable<Bid>("bid"),
    matches: new MemoryTable<Match>("match"),
    windows: new MemoryTable<AuctionWindow>("auction window"),
    drivers: new MemoryTable<DriverProfile>("driver profile"),
    shipmentEvents: new MemoryTable<ShipmentEvent>("shipment event"),
    reputationEvents: new MemoryTable<ReputationEvent>("reputation event"),
  };

  private readonly rowLocks: KeyedMutex;
  private readonly autocommit = bindSession(this.tables, null);

  readonly shipments = this.autocommit.shipments;
  readonly bids = this.autocommit.bids;
  readonly matches = this.autocommit.matches;
  readonly windows = this.autocommit.windows;
  readonly drivers = this.autocommit.drivers;
  readonly shipmentEvents = this.autocommit.shipmentEvents;
  readonly reputationEvents = this.autocommit.reputationEvents;

  constructor(lockTimeoutMs = 5000) {
    this.rowLocks = new KeyedMutex("row", lockTimeoutMs);
  }

  async transaction<T>(work: (session: StoreSession) => Promise<T>): Promise<T> {
    const transaction = new MemoryTransaction(this.tables, this.rowLocks);
    try {
      const result = await work(transaction.session);
      transaction.commit();
      return result;
    } finally {
      transaction.releaseLocks();
    }
  }

  /**
   * Row counts per table (diagnostics and tests)
   */
  stats(): Record<keyof Tables, number> {
    return {
      shipments: this.tables.shipments.size,
      bids: this.tables.bids.size,
      matches: this.tables.matches.size,
      windows: this.tables.windows.size,
      drivers: this.tables.drivers.size,
      shipmentEvents: this.tables.shipmentEvents.size,
      reputationEvents: this.tables.reputationEvents.size,
    };
  }
}
