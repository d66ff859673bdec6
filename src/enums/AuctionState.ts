export enum AuctionState {
  PENDING = 'pending',     // Window scheduled, not yet accepting bids
  OPEN = 'open',           // Accepting bids
  CLOSING = 'closing',     // No new bids, ranking in progress
  COMMITTED = 'committed', // Winner selected
  VOID = 'void',           // No bids, or shipper cancelled
}
