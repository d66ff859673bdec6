import {
  Controller,
  Post,
  Get,
  Route,
  Body,
  Path,
  Query,
  Header,
  Tags,
} from "tsoa";
import { getMarketplace } from "../../services/marketplace";
import {
  MatchResponse,
  UnableToFulfillRequest,
  UnableToFulfillResponse,
} from "../../dtos/dispatch/match.response";
import { toMatchResponse } from "../../dtos/mappers";

@Route("dispatch")
@Tags("Dispatch")
export class DispatchController extends Controller {
  /**
   * The calling driver's matches, newest first
   */
  @Get("matches/mine")
  async listMyMatches(
    @Header("x-driver-id") driverId: string,
    @Query() limit?: number
  ): Promise<MatchResponse[]> {
    const matches = await getMarketplace().dispatch.listForDriver(driverId, limit);
    return matches.map(toMatchResponse);
  }

  @Get("matches/{id}")
  async getMatch(@Path() id: string): Promise<MatchResponse> {
    return toMatchResponse(await getMarketplace().dispatch.getMatch(id));
  }

  @Post("matches/{id}/pickup")
  async reportPickup(
    @Path() id: string,
    @Header("x-driver-id") driverId: string
  ): Promise<MatchResponse> {
    return toMatchResponse(await getMarketplace().dispatch.reportPickup(id, driverId));
  }

  @Post("matches/{id}/departure")
  async reportDeparture(
    @Path() id: string,
    @Header("x-driver-id") driverId: string
  ): Promise<MatchResponse> {
    return toMatchResponse(await getMarketplace().dispatch.reportDeparture(id, driverId));
  }

  @Post("matches/{id}/delivery")
  async reportDelivery(
    @Path() id: string,
    @Header("x-driver-id") driverId: string
  ): Promise<MatchResponse> {
    return toMatchResponse(await getMarketplace().dispatch.reportDelivery(id, driverId));
  }

  /**
   * Driver cannot complete the job. Before pickup the load is re-auctioned;
   * after pickup the match fails and ops are alerted.
   */
  @Post("matches/{id}/unable")
  async reportUnableToFulfill(
    @Path() id: string,
    @Header("x-driver-id") driverId: string,
    @Body() body: UnableToFulfillRequest
  ): Promise<UnableToFulfillResponse> {
    const result = await getMarketplace().dispatch.reportUnableToFulfill(id, driverId, body.reason);
    return { match: toMatchResponse(result.match), reauctioned: result.reauctioned };
  }
}
