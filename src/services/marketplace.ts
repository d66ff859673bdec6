import { MarketplaceConfig } from "../config/marketplace.config";
import { NotificationPublisher } from "../interfaces/Notification";
import {
  Clock,
  EscalationGateway,
  SettlementGateway,
  systemClock,
} from "../interfaces/Collaborators";
import { MarketplaceStore } from "./store/marketplaceStore";
import { ShipmentGuard } from "./concurrency/shipmentGuard";
import { OutboundChannel } from "./notifications/outbound";
import {
  LoggingEscalationGateway,
  LoggingNotificationPublisher,
  LoggingSettlementGateway,
} from "./notifications/loggingCollaborators";
import { RabbitMqNotificationPublisher } from "./notifications/rabbitmqPublisher";
import { ShipmentLedger } from "./ledger/shipmentLedger";
import { ReputationScorer } from "./reputation/reputationScorer";
import { toReputationParams } from "./reputation/reputationModel";
import { DriverProfileService } from "./driver/driverProfile.service";
import { BackhaulMatcher } from "./ranking/backhaulMatcher";
import { RankingEngine } from "./ranking/rankingEngine";
import { AuctionScheduler } from "./auction/auctionScheduler";
import { AuctionCoordinator } from "./auction/auctionCoordinator";
import { BidIntake } from "./bidding/bidIntake";
import { DispatchTracker } from "./dispatch/dispatchTracker";
import { ShipmentService } from "./shipment/shipment.service";
import { CloseTrigger } from "../enums/CloseTrigger";

export interface MarketplaceDependencies {
  store: MarketplaceStore;
  config: MarketplaceConfig;
  publisher?: NotificationPublisher;
  settlement?: SettlementGateway;
  escalation?: EscalationGateway;
  clock?: Clock;
}

export interface Marketplace {
  config: MarketplaceConfig;
  store: MarketplaceStore;
  guard: ShipmentGuard;
  outbound: OutboundChannel;
  ledger: ShipmentLedger;
  reputation: ReputationScorer;
  drivers: DriverProfileService;
  backhaul: BackhaulMatcher;
  ranking: RankingEngine;
  scheduler: AuctionScheduler;
  auctions: AuctionCoordinator;
  bids: BidIntake;
  dispatch: DispatchTracker;
  shipments: ShipmentService;
  shutdown(): Promise<void>;
}

export function createPublisher(config: MarketplaceConfig): NotificationPublisher {
  const { amqpUrl, exchange } = config.notifications;
  return amqpUrl
    ? new RabbitMqNotificationPublisher(amqpUrl, exchange)
    : new LoggingNotificationPublisher();
}

/**
 * Wire every marketplace service around one store
 */
export function createMarketplace(deps: MarketplaceDependencies): Marketplace {
  const { store, config } = deps;
  const clock = deps.clock ?? systemClock;

  const outbound = new OutboundChannel(
    deps.publisher ?? createPublisher(config),
    deps.settlement ?? new LoggingSettlementGateway(),
    deps.escalation ?? new LoggingEscalationGateway()
  );
  const guard = new ShipmentGuard(store, outbound, config.lockTimeoutMs);

  const reputationParams = toReputationParams(config.reputation);
  const ledger = new ShipmentLedger(store, guard, clock);
  const reputation = new ReputationScorer(store, guard, reputationParams, clock);
  const drivers = new DriverProfileService(store, guard, reputationParams.neutral, clock);
  const backhaul = new BackhaulMatcher(store, config.backhaul);
  const ranking = new RankingEngine(backhaul, config.ranking, reputationParams.neutral);
  const scheduler = new AuctionScheduler(store, clock);

  const auctions = new AuctionCoordinator(
    store,
    guard,
    ledger,
    ranking,
    scheduler,
    { bidding: config.bidding, dispatch: config.dispatch },
    clock
  );
  const bids = new BidIntake(store, guard, ledger, drivers, reputation, config.bidding, clock);
  const dispatch = new DispatchTracker(store, guard, ledger, auctions, reputation, scheduler, clock);
  const shipments = new ShipmentService(store, ledger, auctions, backhaul, config.bidding, clock);

  scheduler.setHandlers({
    openAuction: (shipmentId, round) => auctions.openScheduled(shipmentId, round),
    closeAuction: (shipmentId, round) => auctions.close(shipmentId, CloseTrigger.TIMER, { round }),
    pickupNoShow: (matchId) => dispatch.handlePickupNoShow(matchId),
  });

  return {
    config,
    store,
    guard,
    outbound,
    ledger,
    reputation,
    drivers,
    backhaul,
    ranking,
    scheduler,
    auctions,
    bids,
    dispatch,
    shipments,
    async shutdown() {
      scheduler.shutdown();
      await outbound.close();
    },
  };
}

let current: Marketplace | null = null;

/**
 * Process-wide instance used by the HTTP controllers
 */
export function setMarketplace(marketplace: Marketplace | null): void {
  current = marketplace;
}

export function getMarketplace(): Marketplace {
  if (!current) {
    throw new Error("Marketplace has not been initialised");
  }
  return current;
}
