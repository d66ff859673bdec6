/**
 * Committed match and its execution progress
 * @example {
 *   "id": "880e8400-e29b-41d4-a716-446655440003",
 *   "shipmentId": "550e8400-e29b-41d4-a716-446655440000",
 *   "round": 1,
 *   "bidId": "770e8400-e29b-41d4-a716-446655440002",
 *   "driverId": "driver-7",
 *   "price": 850,
 *   "committedAt": "2026-11-01T10:00:00.000Z",
 *   "executionStatus": "assigned",
 *   "pickupDeadline": "2026-11-02T12:30:00.000Z"
 * }
 */
export interface MatchResponse {
  id: string;
  shipmentId: string;
  round: number;
  bidId: string;
  driverId: string;
  price: number;
  committedAt: Date;
  /** 'assigned' | 'picked_up' | 'in_transit' | 'delivered' | 'cancelled' | 'failed' */
  executionStatus: string;
  pickupDeadline: Date;
  pickedUpAt?: Date;
  departedAt?: Date;
  deliveredAt?: Date;
  deliveredOnTime?: boolean;
  cancelledAt?: Date;
  failedAt?: Date;
  failureReason?: string;
}

export interface UnableToFulfillRequest {
  /** Why the driver cannot complete the job */
  reason: string;
}

export interface UnableToFulfillResponse {
  match: MatchResponse;
  /** True when the shipment went back to auction, false when the failure was escalated */
  reauctioned: boolean;
}
