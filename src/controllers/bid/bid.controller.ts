import {
  Controller,
  Post,
  Get,
  Route,
  Body,
  Path,
  Query,
  Header,
  Response,
  Tags,
} from "tsoa";
import { getMarketplace } from "../../services/marketplace";
import { SubmitBidRequest } from "../../dtos/bid/submit-bid.request";
import { BidResponse } from "../../dtos/bid/bid.response";
import { AuctionOutcomeResponse } from "../../dtos/bid/auction.response";
import { toAuctionOutcomeResponse, toBidResponse } from "../../dtos/mappers";

@Route("bids")
@Tags("Bids")
export class BidController extends Controller {
  /**
   * Bid on a shipment whose auction is open
   */
  @Post()
  @Response<BidResponse>(201, "Bid accepted")
  @Response<{ error: string; code: string; reason: string }>(409, "Bid rejected")
  @Response<{ error: string; code: string; reason: string }>(410, "Auction closed")
  async submitBid(
    @Header("x-driver-id") driverId: string,
    @Body() body: SubmitBidRequest
  ): Promise<BidResponse> {
    const bid = await getMarketplace().bids.submit({
      shipmentId: body.shipmentId,
      driverId,
      price: body.price,
      etaMinutes: body.etaMinutes,
      location: body.location,
      message: body.message,
    });

    this.setStatus(201);
    return toBidResponse(bid);
  }

  /**
   * The calling driver's bids, newest first
   */
  @Get("mine")
  async listMyBids(
    @Header("x-driver-id") driverId: string,
    @Query() limit?: number
  ): Promise<BidResponse[]> {
    const bids = await getMarketplace().bids.listForDriver(driverId, limit);
    return bids.map(toBidResponse);
  }

  @Post("{id}/withdraw")
  async withdrawBid(
    @Path() id: string,
    @Header("x-driver-id") driverId: string
  ): Promise<BidResponse> {
    return toBidResponse(await getMarketplace().bids.withdraw(id, driverId));
  }

  /**
   * Shipper accepts this bid, closing the auction with it as the winner
   */
  @Post("{id}/accept")
  async acceptBid(
    @Path() id: string,
    @Header("x-shipper-id") shipperId: string
  ): Promise<AuctionOutcomeResponse> {
    return toAuctionOutcomeResponse(await getMarketplace().auctions.accept(id, shipperId));
  }
}
