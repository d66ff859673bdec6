/**
 * Timer side of the auction lifecycle. The coordinator and dispatch
 * tracker only schedule; the scheduler calls back into them when due.
 */
export interface AuctionTimers {
  scheduleOpen(shipmentId: string, round: number, at: Date): void;
  scheduleClose(shipmentId: string, round: number, at: Date): void;
  cancelAuctionTimers(shipmentId: string): void;
  schedulePickupDeadline(matchId: string, at: Date): void;
  cancelPickupDeadline(matchId: string): void;
}

export interface SchedulerHandlers {
  openAuction(shipmentId: string, round: number): Promise<unknown>;
  closeAuction(shipmentId: string, round: number): Promise<unknown>;
  pickupNoShow(matchId: string): Promise<unknown>;
}
