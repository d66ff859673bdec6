export enum BidRejectionReason {
  NOT_BIDDING = 'not_bidding',
  WINDOW_CLOSED = 'window_closed',
  DUPLICATE_ACTIVE_BID = 'duplicate_active_bid',
  PRICE_NOT_POSITIVE = 'price_not_positive',
  PRICE_BELOW_FLOOR = 'price_below_floor',
  DRIVER_EXCLUDED = 'driver_excluded',
  DRIVER_UNAVAILABLE = 'driver_unavailable',
}
