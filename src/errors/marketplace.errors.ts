import { BidRejectionReason } from "../enums/BidRejectionReason";

/**
 * Base class for every error the marketplace core raises on purpose.
 * Carries the HTTP status the API layer answers with and a stable code
 * clients can branch on.
 */
export class MarketplaceError extends Error {
  constructor(
    message: string,
    readonly status: number,
    readonly code: string
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Malformed or out-of-policy input. Not retryable.
 */
export class ValidationError extends MarketplaceError {
  constructor(message: string) {
    super(message, 400, "VALIDATION_ERROR");
  }
}

/**
 * Referenced record does not exist. Not retryable.
 */
export class NotFoundError extends MarketplaceError {
  constructor(
    readonly entity: string,
    readonly id: string
  ) {
    super(`${entity} ${id} not found`, 404, "NOT_FOUND");
  }
}

/**
 * A compare-and-swap lost a race, or the record moved to a state the
 * operation cannot start from. Retry the whole operation with fresh state.
 */
export class ConflictError extends MarketplaceError {
  constructor(message: string) {
    super(message, 409, "CONFLICT");
  }
}

/**
 * Actor is not allowed to act on the record (another shipper's shipment,
 * another driver's bid).
 */
export class ForbiddenError extends MarketplaceError {
  constructor(message: string) {
    super(message, 403, "FORBIDDEN");
  }
}

/**
 * Bid Intake refused a submission or withdrawal.
 */
export class BidRejectedError extends MarketplaceError {
  constructor(
    readonly reason: BidRejectionReason,
    message: string,
    status: number = 409
  ) {
    super(message, status, "BID_REJECTED");
  }
}

/**
 * Bid arrived after the auction window closed ("too late").
 */
export class AuctionClosedError extends BidRejectedError {
  constructor(readonly shipmentId: string) {
    super(
      BidRejectionReason.WINDOW_CLOSED,
      `Auction for shipment ${shipmentId} is closed`,
      410
    );
  }
}

/**
 * Waiting for a shipment or driver critical section took too long.
 * Surfaces as a conflict so callers retry.
 */
export class LockTimeoutError extends ConflictError {
  constructor(
    readonly key: string,
    readonly timeoutMs: number
  ) {
    super(`Timed out after ${timeoutMs} ms waiting for lock on ${key}`);
  }
}
