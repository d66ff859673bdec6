import { BackhaulMatcher, canCarry } from "../backhaulMatcher";
import { InMemoryMarketplaceStore } from "../../store/memoryStore";
import { ShipmentStatus } from "../../../enums/ShipmentStatus";
import { haversineDistance, toPoint } from "../../../utils/geo";
import { T0, HOUR, makeProfile, makeShipment } from "../../__tests__/support/fixture";

// Indianapolis, the destination of the default shipment
const DEST = { lat: 39.7684, lng: -86.1581 };
const NORTH_OF_DEST = { lat: 39.8684, lng: -86.1581 };

describe("canCarry", () => {
  const load = { cargoType: "dry_van", weightKg: 10000 };

  test("unknown drivers and undeclared equipment carry anything", () => {
    expect(canCarry(null, load)).toBe(true);
    expect(canCarry(makeProfile("d-1"), load)).toBe(true);
  });

  test("equipment type and capacity both have to fit", () => {
    expect(canCarry(makeProfile("d-1", { equipmentTypes: ["reefer"] }), load)).toBe(false);
    expect(canCarry(makeProfile("d-1", { equipmentTypes: ["reefer", "dry_van"] }), load)).toBe(true);
    expect(canCarry(makeProfile("d-1", { capacityKg: 9999 }), load)).toBe(false);
    expect(canCarry(makeProfile("d-1", { capacityKg: 10000 }), load)).toBe(true);
  });
});

describe("BackhaulMatcher", () => {
  let store: InMemoryMarketplaceStore;
  let matcher: BackhaulMatcher;
  const shipment = makeShipment("s-1", { status: ShipmentStatus.BIDDING });

  beforeEach(async () => {
    store = new InMemoryMarketplaceStore();
    matcher = new BackhaulMatcher(store, { radiusKm: 80, maxResults: 5 });

    const later = new Date(T0.getTime() + 48 * HOUR);
    await store.shipments.insert(shipment);
    await store.shipments.insert(
      makeShipment("at-dest", { origin: toPoint(DEST), pickupWindowEnd: later })
    );
    await store.shipments.insert(
      makeShipment("north", {
        origin: toPoint(NORTH_OF_DEST),
        pickupWindowEnd: later,
        cargoType: "reefer",
        status: ShipmentStatus.BIDDING,
      })
    );
    // pickup closes before the delivery window opens
    await store.shipments.insert(
      makeShipment("too-early", {
        origin: toPoint(DEST),
        pickupWindowEnd: new Date(T0.getTime() + 30 * HOUR),
      })
    );
    await store.shipments.insert(
      makeShipment("matched", { origin: toPoint(DEST), pickupWindowEnd: later, status: ShipmentStatus.MATCHED })
    );
    // Chicago origin, far outside the radius
    await store.shipments.insert(makeShipment("far", { pickupWindowEnd: later }));
  });

  test("finds open loads near the destination, nearest first", async () => {
    const candidates = await matcher.candidates(shipment);

    expect(candidates.map((c) => c.shipmentId)).toEqual(["at-dest", "north"]);
    expect(candidates[0]).toMatchObject({
      origin: DEST,
      distanceMeters: 0,
      bonus: 1,
      cargoType: "dry_van",
      weightKg: 10000,
    });

    const distance = haversineDistance(DEST, NORTH_OF_DEST);
    expect(candidates[1].distanceMeters).toBeCloseTo(distance, 6);
    expect(candidates[1].bonus).toBeCloseTo(1 - distance / 80000, 10);
  });

  test("respects the result limit", async () => {
    const limited = new BackhaulMatcher(store, { radiusKm: 80, maxResults: 1 });
    const candidates = await limited.candidates(shipment);
    expect(candidates.map((c) => c.shipmentId)).toEqual(["at-dest"]);
  });

  test("fitFor picks the nearest load the driver can carry", async () => {
    const candidates = await matcher.candidates(shipment);

    expect(matcher.fitFor(candidates, null)).toEqual({ bonus: 1, shipmentId: "at-dest" });
    expect(matcher.fitFor(candidates, makeProfile("d-1", { equipmentTypes: ["reefer"] }))).toEqual({
      bonus: candidates[1].bonus,
      shipmentId: "north",
    });
    expect(matcher.fitFor(candidates, makeProfile("d-1", { equipmentTypes: ["flatbed"] }))).toEqual({
      bonus: 0,
    });
  });

  test("recommend filters by what the driver can carry", async () => {
    const all = await matcher.recommend(shipment);
    const forReefer = await matcher.recommend(shipment, makeProfile("d-1", { equipmentTypes: ["reefer"] }));

    expect(all).toHaveLength(2);
    expect(forReefer.map((c) => c.shipmentId)).toEqual(["north"]);
  });

  test("a failed search degrades to no candidates", async () => {
    const failing: any = {
      shipments: { findOriginsNear: jest.fn().mockRejectedValue(new Error("postgis unavailable")) },
    };

    const degraded = new BackhaulMatcher(failing, { radiusKm: 80, maxResults: 5 });

    await expect(degraded.candidates(shipment)).rejects.toThrow("postgis unavailable");
    await expect(degraded.candidatesOrEmpty(shipment)).resolves.toEqual([]);
  });
});
