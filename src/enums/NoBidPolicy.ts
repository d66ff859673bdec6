export enum NoBidPolicy {
  RELIST = 'relist', // Back to OPEN so the shipper can run another auction
  CANCEL = 'cancel', // Cancel the shipment outright
}
