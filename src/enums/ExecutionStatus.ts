export enum ExecutionStatus {
  ASSIGNED = 'assigned',
  PICKED_UP = 'picked_up',
  IN_TRANSIT = 'in_transit',
  DELIVERED = 'delivered',
  CANCELLED = 'cancelled', // Driver or shipper cancelled before pickup
  FAILED = 'failed',       // Irrecoverable after pickup, escalated to ops
}
