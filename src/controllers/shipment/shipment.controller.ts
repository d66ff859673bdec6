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
import { AuctionRequest } from "../../services/shipment/shipment.service";
import { ShipmentStatus } from "../../enums/ShipmentStatus";
import { NoBidPolicy } from "../../enums/NoBidPolicy";
import { CloseTrigger } from "../../enums/CloseTrigger";
import { ValidationError } from "../../errors/marketplace.errors";
import {
  CancelShipmentRequest,
  CreateShipmentRequest,
  StartAuctionRequest,
} from "../../dtos/shipment/create-shipment.request";
import {
  BackhaulResponse,
  PostShipmentResponse,
  ShipmentEventResponse,
  ShipmentResponse,
  ShipmentWithBidsResponse,
} from "../../dtos/shipment/shipment.response";
import {
  AuctionOutcomeResponse,
  AuctionViewResponse,
  AuctionWindowResponse,
} from "../../dtos/bid/auction.response";
import {
  toAuctionOutcomeResponse,
  toAuctionViewResponse,
  toAuctionWindowResponse,
  toBackhaulResponse,
  toShipmentEventResponse,
  toShipmentResponse,
  toShipmentWithBidsResponse,
} from "../../dtos/mappers";

const STATUSES = new Set<string>(Object.values(ShipmentStatus));

function isShipmentStatus(value: string): value is ShipmentStatus {
  return STATUSES.has(value);
}

/**
 * Parse "open,bidding" into statuses
 */
export function parseStatuses(raw?: string): ShipmentStatus[] | undefined {
  if (!raw) return undefined;

  return raw
    .split(",")
    .map((part) => part.trim())
    .filter(Boolean)
    .map((part) => {
      if (!isShipmentStatus(part)) {
        throw new ValidationError(`Unknown shipment status "${part}"`);
      }
      return part;
    });
}

@Route("shipments")
@Tags("Shipments")
export class ShipmentController extends Controller {
  /**
   * Post a shipment. Unless kept as draft it is listed and its auction starts.
   */
  @Post()
  @Response<PostShipmentResponse>(201, "Shipment posted")
  @Response<{ error: string }>(400, "Invalid shipment")
  async postShipment(
    @Header("x-shipper-id") shipperId: string,
    @Body() body: CreateShipmentRequest
  ): Promise<PostShipmentResponse> {
    const { shipments } = getMarketplace();
    const posted = await shipments.post({
      shipperId,
      origin: body.origin,
      originAddress: body.originAddress,
      destination: body.destination,
      destinationAddress: body.destinationAddress,
      weightKg: body.weightKg,
      cargoType: body.cargoType,
      description: body.description,
      pickupWindowStart: new Date(body.pickupWindowStart),
      pickupWindowEnd: new Date(body.pickupWindowEnd),
      deliveryWindowStart: new Date(body.deliveryWindowStart),
      deliveryWindowEnd: new Date(body.deliveryWindowEnd),
      reservePrice: body.reservePrice,
      noBidPolicy: body.noBidPolicy === "cancel" ? NoBidPolicy.CANCEL : NoBidPolicy.RELIST,
      draft: body.draft,
      auction: toAuctionRequest(body.auction),
    });

    this.setStatus(201);
    return {
      shipment: toShipmentResponse(posted.shipment),
      auction: posted.window ? toAuctionWindowResponse(posted.window) : undefined,
    };
  }

  /**
   * List shipments, newest first
   * @param status Comma-separated statuses, e.g. "open,bidding"
   */
  @Get()
  async listShipments(
    @Query() status?: string,
    @Query() limit?: number
  ): Promise<ShipmentResponse[]> {
    const shipments = await getMarketplace().shipments.list(parseStatuses(status), limit);
    return shipments.map(toShipmentResponse);
  }

  /**
   * The calling shipper's shipments with their bids
   */
  @Get("mine")
  async listMyShipments(
    @Header("x-shipper-id") shipperId: string
  ): Promise<ShipmentWithBidsResponse[]> {
    const entries = await getMarketplace().shipments.listForShipper(shipperId);
    return entries.map(toShipmentWithBidsResponse);
  }

  @Get("{id}")
  @Response<{ error: string }>(404, "Shipment not found")
  async getShipment(@Path() id: string): Promise<ShipmentWithBidsResponse> {
    return toShipmentWithBidsResponse(await getMarketplace().shipments.getWithBids(id));
  }

  /**
   * Current auction window with the live ranking
   */
  @Get("{id}/auction")
  async getAuction(@Path() id: string): Promise<AuctionViewResponse> {
    return toAuctionViewResponse(await getMarketplace().auctions.getAuction(id));
  }

  /**
   * List a draft shipment and start its first auction
   */
  @Post("{id}/publish")
  async publishShipment(
    @Path() id: string,
    @Header("x-shipper-id") shipperId: string,
    @Body() body: StartAuctionRequest
  ): Promise<PostShipmentResponse> {
    const posted = await getMarketplace().shipments.publish(id, shipperId, toAuctionRequest(body));
    return {
      shipment: toShipmentResponse(posted.shipment),
      auction: posted.window ? toAuctionWindowResponse(posted.window) : undefined,
    };
  }

  /**
   * Start another auction on an open (re-listed) shipment
   */
  @Post("{id}/auction")
  @Response<AuctionWindowResponse>(201, "Auction started")
  async startAuction(
    @Path() id: string,
    @Header("x-shipper-id") shipperId: string,
    @Body() body: StartAuctionRequest
  ): Promise<AuctionWindowResponse> {
    const window = await getMarketplace().shipments.startAuction(id, shipperId, toAuctionRequest(body));
    this.setStatus(201);
    return toAuctionWindowResponse(window);
  }

  /**
   * Close the auction now and commit the best bid
   */
  @Post("{id}/close")
  async closeAuction(
    @Path() id: string,
    @Header("x-shipper-id") shipperId: string
  ): Promise<AuctionOutcomeResponse> {
    const outcome = await getMarketplace().auctions.close(id, CloseTrigger.SHIPPER, { shipperId });
    return toAuctionOutcomeResponse(outcome);
  }

  @Post("{id}/cancel")
  async cancelShipment(
    @Path() id: string,
    @Header("x-shipper-id") shipperId: string,
    @Body() body: CancelShipmentRequest
  ): Promise<ShipmentResponse> {
    const { shipment } = await getMarketplace().auctions.cancelShipment(id, shipperId, body.reason);
    return toShipmentResponse(shipment);
  }

  /**
   * Audit trail of status changes
   */
  @Get("{id}/history")
  async getHistory(
    @Path() id: string,
    @Header("x-shipper-id") shipperId: string
  ): Promise<ShipmentEventResponse[]> {
    const events = await getMarketplace().shipments.history(id, shipperId);
    return events.map(toShipmentEventResponse);
  }

  /**
   * Loads that could be chained after delivering this one
   */
  @Get("{id}/backhauls")
  async getBackhauls(
    @Path() id: string,
    @Query() driverId?: string
  ): Promise<BackhaulResponse[]> {
    const candidates = await getMarketplace().shipments.backhauls(id, driverId);
    return candidates.map(toBackhaulResponse);
  }
}

function toAuctionRequest(body?: StartAuctionRequest): AuctionRequest | undefined {
  if (!body) return undefined;
  return {
    durationMinutes: body.durationMinutes,
    opensAt: body.opensAt ? new Date(body.opensAt) : undefined,
    explicit: body.explicit,
  };
}
