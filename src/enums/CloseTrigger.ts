export enum CloseTrigger {
  TIMER = 'timer',
  SHIPPER = 'shipper',
  ACCEPTANCE = 'acceptance',     // Shipper accepted a specific bid
  CANCELLATION = 'cancellation', // Shipper cancelled the shipment mid-auction
}
