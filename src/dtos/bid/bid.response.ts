/**
 * Bid information response
 * @example {
 *   "id": "770e8400-e29b-41d4-a716-446655440002",
 *   "shipmentId": "550e8400-e29b-41d4-a716-446655440000",
 *   "round": 1,
 *   "driverId": "driver-7",
 *   "price": 850,
 *   "etaMinutes": 45,
 *   "status": "active",
 *   "submittedAt": "2026-11-01T09:05:00.000Z"
 * }
 */
export interface BidResponse {
  id: string;
  shipmentId: string;
  round: number;
  driverId: string;
  price: number;
  etaMinutes: number;
  location?: { lat: number; lng: number };
  message?: string;
  /** 'active' | 'withdrawn' | 'lost' | 'won' */
  status: string;
  submittedAt: Date;
  resolvedAt?: Date;
}
