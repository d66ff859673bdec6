/**
 * TYPEORM STORE
 *
 * PostgreSQL/PostGIS implementation of the marketplace repositories.
 *
 * - Transactions map 1:1 onto `DataSource.transaction`.
 * - `forUpdate` reads take `SELECT ... FOR UPDATE` so two service
 *   instances cannot work on the same shipment or driver at once.
 * - Compare-and-swap updates put the expected status (or version) in the
 *   WHERE clause and treat `affected === 0` as a lost race.
 * - Spatial search uses ST_DWithin on geography, like the driver radius
 *   query it was modelled on.
 */

import { DataSource, EntityManager, In } from "typeorm";
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

const EXECUTING = [
  ExecutionStatus.ASSIGNED,
  ExecutionStatus.PICKED_UP,
  ExecutionStatus.IN_TRANSIT,
];

interface NearbyRow {
  id: string;
  distance: number;
}

export class TypeOrmShipmentRepository implements ShipmentRepository {
  constructor(private readonly manager: EntityManager) {}

  async insert(shipment: Shipment): Promise<Shipment> {
    return await this.manager.save(Shipment, { ...shipment, version: 1 });
  }

  async findById(id: string, options: { forUpdate?: boolean } = {}): Promise<Shipment | null> {
    return await this.manager.findOne(Shipment, {
      where: { id },
      lock: options.forUpdate ? { mode: "pessimistic_write" } : undefined,
    });
  }

  async compareAndSetStatus(
    id: string,
    from: ShipmentStatus,
    to: ShipmentStatus,
    patch: ShipmentPatch = {}
  ): Promise<Shipment | null> {
    // Version and updatedAt are bumped by the query builder
    const result = await this.manager
      .createQueryBuilder()
      .update(Shipment)
      .set({ ...patch, status: to })
      .where("id = :id AND status = :from", { id, from })
      .execute();

    if (!result.affected) {
      return null;
    }
    return await this.findById(id);
  }

  async list(filter: ShipmentFilter): Promise<Shipment[]> {
    return await this.manager.find(Shipment, {
      where: {
        ...(filter.statuses ? { status: In(filter.statuses) } : {}),
        ...(filter.shipperId ? { shipperId: filter.shipperId } : {}),
      },
      order: { createdAt: "DESC", id: "ASC" },
      take: filter.limit ?? 100,
    });
  }

  async findOriginsNear(center: Location, query: NearbyQuery): Promise<NearbyShipment[]> {
    const hasExclusions = query.excludeIds.length > 0;

    const params = hasExclusions
      ? [center.lng, center.lat, query.radiusMeters, query.statuses, query.excludeIds]
      : [center.lng, center.lat, query.radiusMeters, query.statuses];

    const sqlQuery = `
        SELECT
            s.id,
            ST_Distance(
                ST_SetSRID(ST_MakePoint($1, $2), 4326)::geography,
                s.origin::geography
            ) as distance
        FROM shipments s
        WHERE s.status::text = ANY($4)
        AND ST_DWithin(
            ST_SetSRID(ST_MakePoint($1, $2), 4326)::geography,
            s.origin::geography,
            $3
        )
        ${hasExclusions ? `AND s.id::text <> ALL($5)` : ""}
        ORDER BY distance ASC, s.id ASC
        LIMIT ${Math.max(0, Math.floor(query.limit))}
    `;

    const rows: NearbyRow[] = await this.manager.query(sqlQuery, params);
    if (rows.length === 0) {
      return [];
    }

    const shipments = await this.manager.find(Shipment, {
      where: { id: In(rows.map((row) => row.id)) },
    });
    const byId = new Map(shipments.map((s) => [s.id, s]));

    return rows.flatMap((row) => {
      const shipment = byId.get(row.id);
      return shipment ? [{ shipment, distanceMeters: Number(row.distance) }] : [];
    });
  }
}

export class TypeOrmBidRepository implements BidRepository {
  constructor(private readonly manager: EntityManager) {}

  async insert(bid: Bid): Promise<Bid> {
    return await this.manager.save(Bid, { ...bid, version: 1 });
  }

  async findById(id: string): Promise<Bid | null> {
    return await this.manager.findOne(Bid, { where: { id } });
  }

  async findActive(shipmentId: string, driverId: string): Promise<Bid | null> {
    return await this.manager.findOne(Bid, {
      where: { shipmentId, driverId, status: BidStatus.ACTIVE },
    });
  }

  async listByShipment(shipmentId: string, options: BidListOptions = {}): Promise<Bid[]> {
    return await this.manager.find(Bid, {
      where: {
        shipmentId,
        ...(options.round !== undefined ? { round: options.round } : {}),
        ...(options.statuses ? { status: In(options.statuses) } : {}),
      },
      order: { submittedAt: "ASC", id: "ASC" },
    });
  }

  async listByDriver(driverId: string, limit: number): Promise<Bid[]> {
    return await this.manager.find(Bid, {
      where: { driverId },
      order: { submittedAt: "DESC", id: "ASC" },
      take: limit,
    });
  }

  async resolve(ids: string[], status: BidStatus, at: Date): Promise<number> {
    if (ids.length === 0) {
      return 0;
    }

    const result = await this.manager
      .createQueryBuilder()
      .update(Bid)
      .set({ status, resolvedAt: at })
      .where("id IN (:...ids) AND status = :active", { ids, active: BidStatus.ACTIVE })
      .execute();

    return result.affected ?? 0;
  }
}

export class TypeOrmMatchRepository implements MatchRepository {
  constructor(private readonly manager: EntityManager) {}

  async insert(match: Match): Promise<Match> {
    return await this.manager.save(Match, { ...match, version: 1 });
  }

  async findById(id: string): Promise<Match | null> {
    return await this.manager.findOne(Match, { where: { id } });
  }

  async findByShipmentRound(shipmentId: string, round: number): Promise<Match | null> {
    return await this.manager.findOne(Match, { where: { shipmentId, round } });
  }

  async findActiveByShipment(shipmentId: string): Promise<Match | null> {
    return await this.manager.findOne(Match, {
      where: { shipmentId, executionStatus: In(EXECUTING) },
    });
  }

  async listByShipment(shipmentId: string): Promise<Match[]> {
    return await this.manager.find(Match, {
      where: { shipmentId },
      order: { round: "ASC" },
    });
  }

  async listByDriver(driverId: string, limit: number): Promise<Match[]> {
    return await this.manager.find(Match, {
      where: { driverId },
      order: { committedAt: "DESC" },
      take: limit,
    });
  }

  async listByExecutionStatus(status: ExecutionStatus): Promise<Match[]> {
    return await this.manager.find(Match, {
      where: { executionStatus: status },
      order: { committedAt: "ASC" },
    });
  }

  async compareAndSetExecution(
    id: string,
    from: ExecutionStatus,
    to: ExecutionStatus,
    patch: MatchPatch = {}
  ): Promise<Match | null> {
    const result = await this.manager
      .createQueryBuilder()
      .update(Match)
      .set({ ...patch, executionStatus: to })
      .where('id = :id AND "executionStatus" = :from', { id, from })
      .execute();

    if (!result.affected) {
      return null;
    }
    return await this.findById(id);
  }
}

export class TypeOrmAuctionWindowRepository implements AuctionWindowRepository {
  constructor(private readonly manager: EntityManager) {}

  async insert(window: AuctionWindow): Promise<AuctionWindow> {
    return await this.manager.save(AuctionWindow, { ...window, version: 1 });
  }

  async findLatest(shipmentId: string): Promise<AuctionWindow | null> {
    return await this.manager.findOne(AuctionWindow, {
      where: { shipmentId },
      order: { round: "DESC" },
    });
  }

  async save(window: AuctionWindow): Promise<AuctionWindow | null> {
    const { id, version, ...changes } = window;
    const result = await this.manager
      .createQueryBuilder()
      .update(AuctionWindow)
      .set(changes)
      .where("id = :id AND version = :version", { id, version })
      .execute();

    if (!result.affected) {
      return null;
    }
    return await this.manager.findOne(AuctionWindow, { where: { id } });
  }

  async listUnresolved(): Promise<AuctionWindow[]> {
    return await this.manager.find(AuctionWindow, {
      where: { state: In([AuctionState.PENDING, AuctionState.OPEN]) },
      order: { opensAt: "ASC" },
    });
  }
}

export class TypeOrmDriverProfileRepository implements DriverProfileRepository {
  constructor(private readonly manager: EntityManager) {}

  async findById(id: string, options: { forUpdate?: boolean } = {}): Promise<DriverProfile | null> {
    return await this.manager.findOne(DriverProfile, {
      where: { id },
      lock: options.forUpdate ? { mode: "pessimistic_write" } : undefined,
    });
  }

  async findByIds(ids: string[]): Promise<DriverProfile[]> {
    if (ids.length === 0) {
      return [];
    }
    return await this.manager.find(DriverProfile, { where: { id: In(ids) } });
  }

  async insert(profile: DriverProfile): Promise<DriverProfile> {
    return await this.manager.save(DriverProfile, { ...profile, version: 1 });
  }

  async save(profile: DriverProfile): Promise<DriverProfile | null> {
    const { id, version, createdAt, updatedAt, ...changes } = profile;
    const result = await this.manager
      .createQueryBuilder()
      .update(DriverProfile)
      .set(changes)
      .where("id = :id AND version = :version", { id, version })
      .execute();

    if (!result.affected) {
      return null;
    }
    return await this.findById(id);
  }
}

export class TypeOrmShipmentEventRepository implements ShipmentEventRepository {
  constructor(private readonly manager: EntityManager) {}

  async append(event: ShipmentEvent): Promise<ShipmentEvent> {
    return await this.manager.save(ShipmentEvent, event);
  }

  async nextSequence(shipmentId: string): Promise<number> {
    const count = await this.manager.count(ShipmentEvent, { where: { shipmentId } });
    return count + 1;
  }

  async listByShipment(shipmentId: string): Promise<ShipmentEvent[]> {
    return await this.manager.find(ShipmentEvent, {
      where: { shipmentId },
      order: { sequence: "ASC" },
    });
  }
}

export class TypeOrmReputationEventRepository implements ReputationEventRepository {
  constructor(private readonly manager: EntityManager) {}

  async append(event: ReputationEvent): Promise<ReputationEvent> {
    return await this.manager.save(ReputationEvent, event);
  }

  async listByDriver(driverId: string): Promise<ReputationEvent[]> {
    return await this.manager.find(ReputationEvent, {
      where: { driverId },
      order: { occurredAt: "ASC" },
    });
  }
}

export function createTypeOrmSession(manager: EntityManager): StoreSession {
  return {
    shipments: new TypeOrmShipmentRepository(manager),
    bids: new TypeOrmBidRepository(manager),
    matches: new TypeOrmMatchRepository(manager),
    windows: new TypeOrmAuctionWindowRepository(manager),
    drivers: new TypeOrmDriverProfileRepository(manager),
    shipmentEvents: new TypeOrmShipmentEventRepository(manager),
    reputationEvents: new TypeOrmReputationEventRepository(manager),
  };
}

export class TypeOrmMarketplaceStore implements MarketplaceStore {
  readonly shipments: ShipmentRepository;
  readonly bids: BidRepository;
  readonly matches: MatchRepository;
  readonly windows: AuctionWindowRepository;
  readonly drivers: DriverProfileRepository;
  readonly shipmentEvents: ShipmentEventRepository;
  readonly reputationEvents: ReputationEventRepository;

  constructor(private readonly dataSource: DataSource) {
    const autocommit = createTypeOrmSession(dataSource.manager);
    this.shipments = autocommit.shipments;
    this.bids = autocommit.bids;
    this.matches = autocommit.matches;
    this.windows = autocommit.windows;
    this.drivers = autocommit.drivers;
    this.shipmentEvents = autocommit.shipmentEvents;
    this.reputationEvents = autocommit.reputationEvents;
  }

  async transaction<T>(work: (session: StoreSession) => Promise<T>): Promise<T> {
    return await this.dataSource.transaction((manager) => work(createTypeOrmSession(manager)));
  }
}
