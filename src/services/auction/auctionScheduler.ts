import { AuctionState } from "../../enums/AuctionState";
import { ExecutionStatus } from "../../enums/ExecutionStatus";
import { ConflictError } from "../../errors/marketplace.errors";
import { Clock, systemClock } from "../../interfaces/Collaborators";
import { componentLogger } from "../../utils/logger";
import { MarketplaceStore } from "../store/marketplaceStore";
import { AuctionTimers, SchedulerHandlers } from "./auctionTimers";

const log = componentLogger("scheduler");

// setTimeout overflows above this; longer waits are chained
const MAX_TIMER_DELAY_MS = 2_147_483_647;

// Backoff for handlers that lost a lock race: 1s, 2s, 4s ... capped at 30s
const RETRY_BASE_MS = 1000;
const RETRY_MAX_MS = 30_000;
const MAX_RETRIES = 8;

type TimerKind = "open" | "close" | "pickup";

export interface RecoveryReport {
  opens: number;
  closes: number;
  pickupDeadlines: number;
}

/**
 * AUCTION SCHEDULER
 *
 * In-process timers for window opening, window closing and pickup
 * deadlines. One timer per (kind, key); scheduling again replaces it.
 * Timers are advisory: the handlers they call are idempotent, and
 * `recover()` rebuilds them from the store after a restart.
 *
 * A handler that fails with a ConflictError (a lock wait that timed out,
 * a concurrent write) is re-armed for the same kind and key with
 * exponential backoff, unless the timer was replaced or cancelled while
 * it ran. Other failures are logged and dropped.
 */
export class AuctionScheduler implements AuctionTimers {
  private readonly timers = new Map<string, NodeJS.Timeout>();
  // Latest arm per timer id; a settling handler only retries if it is still current
  private readonly tokens = new Map<string, symbol>();
  private handlers: SchedulerHandlers | null = null;
  private stopped = false;

  constructor(
    private readonly store: MarketplaceStore,
    private readonly clock: Clock = systemClock
  ) {}

  /**
   * Wired after construction; the handlers depend on services that depend on this scheduler
   */
  setHandlers(handlers: SchedulerHandlers): void {
    this.handlers = handlers;
  }

  scheduleOpen(shipmentId: string, round: number, at: Date): void {
    this.arm("open", shipmentId, at, (handlers) => handlers.openAuction(shipmentId, round));
  }

  scheduleClose(shipmentId: string, round: number, at: Date): void {
    this.arm("close", shipmentId, at, (handlers) => handlers.closeAuction(shipmentId, round));
  }

  cancelAuctionTimers(shipmentId: string): void {
    this.disarm(timerKey("open", shipmentId));
    this.disarm(timerKey("close", shipmentId));
  }

  schedulePickupDeadline(matchId: string, at: Date): void {
    this.arm("pickup", matchId, at, (handlers) => handlers.pickupNoShow(matchId));
  }

  cancelPickupDeadline(matchId: string): void {
    this.disarm(timerKey("pickup", matchId));
  }

  has(kind: TimerKind, key: string): boolean {
    return this.timers.has(timerKey(kind, key));
  }

  get pending(): number {
    return this.timers.size;
  }

  /**
   * Re-arm every timer the store says should exist. Overdue ones fire at once.
   */
  async recover(): Promise<RecoveryReport> {
    const report: RecoveryReport = { opens: 0, closes: 0, pickupDeadlines: 0 };

    for (const window of await this.store.windows.listUnresolved()) {
      if (window.state === AuctionState.PENDING) {
        this.scheduleOpen(window.shipmentId, window.round, window.opensAt);
        report.opens += 1;
      } else if (window.state === AuctionState.OPEN && window.scheduledCloseAt) {
        this.scheduleClose(window.shipmentId, window.round, window.scheduledCloseAt);
        report.closes += 1;
      }
    }

    for (const match of await this.store.matches.listByExecutionStatus(ExecutionStatus.ASSIGNED)) {
      this.schedulePickupDeadline(match.id, match.pickupDeadline);
      report.pickupDeadlines += 1;
    }

    log.info(
      `Recovered timers: ${report.opens} open, ${report.closes} close, ${report.pickupDeadlines} pickup deadline`
    );
    return report;
  }

  shutdown(): void {
    this.stopped = true;
    for (const timer of this.timers.values()) {
      clearTimeout(timer);
    }
    this.timers.clear();
    this.tokens.clear();
  }

  private arm(
    kind: TimerKind,
    key: string,
    at: Date,
    fire: (handlers: SchedulerHandlers) => Promise<unknown>,
    attempt = 0
  ): void {
    if (this.stopped) return;

    const id = timerKey(kind, key);
    this.disarm(id);
    const token = Symbol(id);
    this.tokens.set(id, token);

    const delay = Math.max(0, at.getTime() - this.clock().getTime());
    const timer = setTimeout(() => {
      this.timers.delete(id);
      if (delay > MAX_TIMER_DELAY_MS) {
        this.arm(kind, key, at, fire, attempt);
        return;
      }
      this.fire(kind, key, token, fire, attempt);
    }, Math.min(delay, MAX_TIMER_DELAY_MS));

    this.timers.set(id, timer);
  }

  private fire(
    kind: TimerKind,
    key: string,
    token: symbol,
    fire: (handlers: SchedulerHandlers) => Promise<unknown>,
    attempt: number
  ): void {
    const id = timerKey(kind, key);
    const handlers = this.handlers;
    if (!handlers) {
      log.error(`Timer ${id} fired before handlers were set`);
      this.settle(id, token);
      return;
    }

    fire(handlers)
      .then(() => this.settle(id, token))
      .catch((error: unknown) => {
        const message = error instanceof Error ? error.message : String(error);
        const current = this.tokens.get(id) === token;
        if (current && error instanceof ConflictError && attempt < MAX_RETRIES) {
          const backoff = Math.min(RETRY_BASE_MS * 2 ** attempt, RETRY_MAX_MS);
          log.warn(`Timer ${id} handler hit a conflict, retrying in ${backoff}ms`, {
            error: message,
            attempt: attempt + 1,
          });
          this.arm(kind, key, new Date(this.clock().getTime() + backoff), fire, attempt + 1);
          return;
        }

        log.error(`Timer ${id} handler failed`, { error: message, attempt });
        this.settle(id, token);
      });
  }

  private settle(id: string, token: symbol): void {
    if (this.tokens.get(id) === token) {
      this.tokens.delete(id);
    }
  }

  private disarm(id: string): void {
    this.tokens.delete(id);
    const timer = this.timers.get(id);
    if (timer) {
      clearTimeout(timer);
      this.timers.delete(id);
    }
  }
}

function timerKey(kind: TimerKind, key: string): string {
  return `${kind}:${key}`;
}
