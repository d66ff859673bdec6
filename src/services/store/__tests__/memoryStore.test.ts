import { InMemoryMarketplaceStore } from "../memoryStore";
import { Shipment } from "../../../entities/Shipment";
import { Bid } from "../../../entities/Bid";
import { ShipmentStatus } from "../../../enums/ShipmentStatus";
import { BidStatus } from "../../../enums/BidStatus";
import { NoBidPolicy } from "../../../enums/NoBidPolicy";
import { AuctionState } from "../../../enums/AuctionState";
import { ConflictError, LockTimeoutError } from "../../../errors/marketplace.errors";
import { toPoint } from "../../../utils/geo";

const NOW = new Date("2026-11-01T09:00:00.000Z");

function makeShipment(id: string, overrides: Partial<Shipment> = {}): Shipment {
  return {
    id,
    shipperId: "shipper-1",
    origin: toPoint({ lat: 40, lng: -86 }),
    originAddress: "A",
    destination: toPoint({ lat: 41, lng: -87 }),
    destinationAddress: "B",
    weightKg: 1000,
    cargoType: "dry_van",
    pickupWindowStart: NOW,
    pickupWindowEnd: NOW,
    deliveryWindowStart: NOW,
    deliveryWindowEnd: NOW,
    status: ShipmentStatus.OPEN,
    noBidPolicy: NoBidPolicy.RELIST,
    auctionRound: 0,
    excludedDriverIds: [],
    createdAt: NOW,
    updatedAt: NOW,
    version: 0,
    ...overrides,
  };
}

function makeBid(id: string, driverId: string, overrides: Partial<Bid> = {}): Bid {
  return {
    id,
    shipmentId: "s-1",
    round: 1,
    driverId,
    price: 500,
    etaMinutes: 30,
    status: BidStatus.ACTIVE,
    submittedAt: NOW,
    version: 0,
    ...overrides,
  };
}

/**
 * A promise the test resolves by hand, to park a transaction mid-flight
 */
function gate(): { passed: Promise<void>; open: () => void } {
  let open = (): void => undefined;
  const passed = new Promise<void>((resolve) => {
    open = resolve;
  });
  return { passed, open };
}

const nextTurn = () => new Promise<void>((resolve) => setImmediate(resolve));

describe("InMemoryMarketplaceStore", () => {
  let store: InMemoryMarketplaceStore;

  beforeEach(() => {
    store = new InMemoryMarketplaceStore();
  });

  test("insert starts at version 1 and returns copies", async () => {
    const inserted = await store.shipments.insert(makeShipment("s-1"));
    expect(inserted.version).toBe(1);

    inserted.excludedDriverIds.push("mutated");
    const reread = await store.shipments.findById("s-1");
    expect(reread?.excludedDriverIds).toEqual([]);
  });

  test("compareAndSetStatus only moves from the expected status", async () => {
    await store.shipments.insert(makeShipment("s-1"));

    const moved = await store.shipments.compareAndSetStatus(
      "s-1",
      ShipmentStatus.OPEN,
      ShipmentStatus.BIDDING,
      { auctionRound: 1 }
    );
    expect(moved?.status).toBe(ShipmentStatus.BIDDING);
    expect(moved?.auctionRound).toBe(1);
    expect(moved?.version).toBe(2);

    const stale = await store.shipments.compareAndSetStatus(
      "s-1",
      ShipmentStatus.OPEN,
      ShipmentStatus.CANCELLED
    );
    expect(stale).toBeNull();
  });

  test("a failed transaction rolls back every write it made", async () => {
    await store.shipments.insert(makeShipment("s-1"));

    await expect(
      store.transaction(async (session) => {
        await session.shipments.compareAndSetStatus("s-1", ShipmentStatus.OPEN, ShipmentStatus.BIDDING);
        await session.bids.insert(makeBid("b-1", "d-1"));
        throw new Error("abort");
      })
    ).rejects.toThrow("abort");

    expect((await store.shipments.findById("s-1"))?.status).toBe(ShipmentStatus.OPEN);
    expect(await store.bids.findById("b-1")).toBeNull();
    expect(store.stats().bids).toBe(0);
  });

  test("a second active bid for the same driver and shipment is refused", async () => {
    await store.bids.insert(makeBid("b-1", "d-1"));

    await expect(store.bids.insert(makeBid("b-2", "d-1"))).rejects.toThrow(
      "Driver d-1 already holds an active bid on shipment s-1"
    );

    await store.bids.resolve(["b-1"], BidStatus.WITHDRAWN, NOW);
    await expect(store.bids.insert(makeBid("b-2", "d-1"))).resolves.toMatchObject({ id: "b-2" });
  });

  test("resolve only moves active bids", async () => {
    await store.bids.insert(makeBid("b-1", "d-1"));
    await store.bids.insert(makeBid("b-2", "d-2", { status: BidStatus.WITHDRAWN }));

    const moved = await store.bids.resolve(["b-1", "b-2", "missing"], BidStatus.LOST, NOW);

    expect(moved).toBe(1);
    expect((await store.bids.findById("b-1"))?.status).toBe(BidStatus.LOST);
    expect((await store.bids.findById("b-2"))?.status).toBe(BidStatus.WITHDRAWN);
  });

  test("window save is guarded by version", async () => {
    const window = await store.windows.insert({
      id: "w-1",
      shipmentId: "s-1",
      round: 1,
      state: AuctionState.OPEN,
      opensAt: NOW,
      closed: false,
      version: 0,
    });

    const saved = await store.windows.save({ ...window, closed: true });
    expect(saved?.version).toBe(2);

    // Second writer still holds version 1
    expect(await store.windows.save({ ...window, closed: false })).toBeNull();
  });

  test("findOriginsNear filters by status and radius, nearest first", async () => {
    const center = { lat: 40, lng: -86 };
    await store.shipments.insert(makeShipment("far", { origin: toPoint({ lat: 41, lng: -86 }) }));
    await store.shipments.insert(makeShipment("near", { origin: toPoint({ lat: 40.1, lng: -86 }) }));
    await store.shipments.insert(
      makeShipment("closed", { origin: toPoint({ lat: 40.05, lng: -86 }), status: ShipmentStatus.DELIVERED })
    );
    await store.shipments.insert(makeShipment("self", { origin: toPoint(center) }));

    const nearby = await store.shipments.findOriginsNear(center, {
      statuses: [ShipmentStatus.OPEN, ShipmentStatus.BIDDING],
      radiusMeters: 50000,
      limit: 5,
      excludeIds: ["self"],
    });

    expect(nearby.map((n) => n.shipment.id)).toEqual(["near"]);
    expect(nearby[0].distanceMeters).toBeCloseTo(11119.49, 0);
  });

  describe("transactions", () => {
    beforeEach(async () => {
      await store.shipments.insert(makeShipment("s-1"));
    });

    test("writes stay invisible to other readers until commit", async () => {
      const staged = gate();
      const resume = gate();
      let seenInside: ShipmentStatus | undefined;

      const running = store.transaction(async (session) => {
        await session.shipments.compareAndSetStatus("s-1", ShipmentStatus.OPEN, ShipmentStatus.BIDDING);
        await session.bids.insert(makeBid("b-1", "d-1"));
        seenInside = (await session.shipments.findById("s-1"))?.status;
        staged.open();
        await resume.passed;
      });

      await staged.passed;
      expect(seenInside).toBe(ShipmentStatus.BIDDING);
      expect((await store.shipments.findById("s-1"))?.status).toBe(ShipmentStatus.OPEN);
      expect(await store.bids.listByShipment("s-1")).toEqual([]);
      expect(store.stats().bids).toBe(0);

      resume.open();
      await running;

      expect((await store.shipments.findById("s-1"))?.status).toBe(ShipmentStatus.BIDDING);
      expect((await store.bids.findById("b-1"))?.status).toBe(BidStatus.ACTIVE);
    });

    test("a row read for update blocks other transactions until the holder ends", async () => {
      const locked = gate();
      const resume = gate();
      const order: string[] = [];

      const first = store.transaction(async (session) => {
        await session.shipments.findById("s-1", { forUpdate: true });
        order.push("first locked");
        locked.open();
        await resume.passed;
        order.push("first done");
      });
      await locked.passed;

      const second = store.transaction(async (session) => {
        await session.shipments.findById("s-1", { forUpdate: true });
        order.push("second locked");
      });
      await nextTurn();
      expect(order).toEqual(["first locked"]);

      resume.open();
      await Promise.all([first, second]);
      expect(order).toEqual(["first locked", "first done", "second locked"]);
    });

    test("a transaction can lock the same row twice", async () => {
      await store.transaction(async (session) => {
        const [a, b] = await Promise.all([
          session.shipments.findById("s-1", { forUpdate: true }),
          session.shipments.findById("s-1", { forUpdate: true }),
        ]);
        expect(a?.id).toBe("s-1");
        expect(b?.id).toBe("s-1");
      });

      await expect(
        store.transaction((session) => session.shipments.findById("s-1", { forUpdate: true }))
      ).resolves.toMatchObject({ id: "s-1" });
    });

    test("waiting on a row lock is bounded", async () => {
      const quick = new InMemoryMarketplaceStore(10);
      await quick.shipments.insert(makeShipment("s-1"));
      const locked = gate();
      const resume = gate();

      const holder = quick.transaction(async (session) => {
        await session.shipments.findById("s-1", { forUpdate: true });
        locked.open();
        await resume.passed;
      });
      await locked.passed;

      const waiter = quick.transaction((session) =>
        session.shipments.findById("s-1", { forUpdate: true })
      );
      await expect(waiter).rejects.toBeInstanceOf(LockTimeoutError);
      await expect(waiter).rejects.toThrow(
        "Timed out after 10 ms waiting for lock on row:shipment:s-1"
      );

      resume.open();
      await holder;
    });

    test("a commit over a row changed since it was read is refused as a whole", async () => {
      const staged = gate();
      const resume = gate();

      const running = store.transaction(async (session) => {
        await session.shipments.compareAndSetStatus("s-1", ShipmentStatus.OPEN, ShipmentStatus.BIDDING);
        await session.bids.insert(makeBid("b-1", "d-1"));
        staged.open();
        await resume.passed;
      });
      await staged.passed;

      await store.shipments.compareAndSetStatus("s-1", ShipmentStatus.OPEN, ShipmentStatus.CANCELLED);
      resume.open();

      await expect(running).rejects.toBeInstanceOf(ConflictError);
      await expect(running).rejects.toThrow("Concurrent write to shipment s-1");
      expect((await store.shipments.findById("s-1"))?.status).toBe(ShipmentStatus.CANCELLED);
      expect(await store.bids.findById("b-1")).toBeNull();
    });
  });
});
