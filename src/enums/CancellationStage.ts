export enum CancellationStage {
  PRE_MATCH = 'pre_match',     // Bid withdrawn while the auction is open
  POST_MATCH = 'post_match',   // Won, then cancelled or no-show before pickup
  POST_PICKUP = 'post_pickup', // Failed after the load was picked up
}
