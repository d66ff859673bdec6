export enum ShipmentStatus {
  DRAFT = 'draft',           // Created, not yet visible to drivers
  OPEN = 'open',             // Listed, auction not running (scheduled or re-listed)
  BIDDING = 'bidding',       // Auction window accepting bids
  MATCHED = 'matched',       // Winner committed, awaiting pickup
  IN_TRANSIT = 'in_transit', // Picked up by the matched driver
  DELIVERED = 'delivered',   // Terminal success
  CANCELLED = 'cancelled',   // Terminal, withdrawn by shipper or no bids
  FAILED = 'failed',         // Terminal, irrecoverable failure after pickup
}
