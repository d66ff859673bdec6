/**
 * Driver profile response
 * @example {
 *   "id": "driver-7",
 *   "reputationScore": 0.55,
 *   "completedJobs": 1,
 *   "onTimeJobs": 1,
 *   "cancellationCount": 0,
 *   "available": true,
 *   "equipmentTypes": ["dry_van"],
 *   "capacityKg": 20000
 * }
 */
export interface DriverProfileResponse {
  id: string;
  /** Trust score in [0, 1], 0.5 for new drivers */
  reputationScore: number;
  completedJobs: number;
  onTimeJobs: number;
  cancellationCount: number;
  currentLocation?: { lat: number; lng: number };
  available: boolean;
  equipmentTypes: string[];
  capacityKg?: number;
}

export interface ReputationEventResponse {
  /** 'completion' | 'cancellation' */
  kind: string;
  onTime?: boolean;
  stage?: string;
  shipmentId?: string;
  scoreBefore: number;
  scoreAfter: number;
  occurredAt: Date;
}

export interface ReputationResponse {
  driverId: string;
  score: number;
  history: ReputationEventResponse[];
}
