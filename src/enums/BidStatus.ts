export enum BidStatus {
  ACTIVE = 'active',
  WITHDRAWN = 'withdrawn',
  LOST = 'lost',
  WON = 'won',
}
