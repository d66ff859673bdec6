import {
  Controller,
  Put,
  Get,
  Route,
  Body,
  Path,
  Header,
  Response,
  Tags,
} from "tsoa";
import { getMarketplace } from "../../services/marketplace";
import {
  UpdateAvailabilityRequest,
  UpdateEquipmentRequest,
  UpdateLocationRequest,
} from "../../dtos/driver/driver-profile.request";
import {
  DriverProfileResponse,
  ReputationResponse,
} from "../../dtos/driver/driver-profile.response";
import {
  toDriverProfileResponse,
  toReputationEventResponse,
} from "../../dtos/mappers";

@Route("drivers")
@Tags("Drivers")
export class DriverController extends Controller {
  @Get("me")
  async getMyProfile(@Header("x-driver-id") driverId: string): Promise<DriverProfileResponse> {
    return toDriverProfileResponse(await getMarketplace().drivers.ensureProfile(driverId));
  }

  @Put("me/location")
  async updateLocation(
    @Header("x-driver-id") driverId: string,
    @Body() body: UpdateLocationRequest
  ): Promise<DriverProfileResponse> {
    const profile = await getMarketplace().drivers.updateLocation(driverId, {
      lat: body.lat,
      lng: body.lng,
    });
    return toDriverProfileResponse(profile);
  }

  @Put("me/availability")
  async updateAvailability(
    @Header("x-driver-id") driverId: string,
    @Body() body: UpdateAvailabilityRequest
  ): Promise<DriverProfileResponse> {
    return toDriverProfileResponse(
      await getMarketplace().drivers.setAvailability(driverId, body.available)
    );
  }

  @Put("me/equipment")
  async updateEquipment(
    @Header("x-driver-id") driverId: string,
    @Body() body: UpdateEquipmentRequest
  ): Promise<DriverProfileResponse> {
    return toDriverProfileResponse(
      await getMarketplace().drivers.updateEquipment(driverId, {
        equipmentTypes: body.equipmentTypes,
        capacityKg: body.capacityKg,
      })
    );
  }

  @Get("{id}")
  @Response<{ error: string }>(404, "Driver not found")
  async getDriver(@Path() id: string): Promise<DriverProfileResponse> {
    return toDriverProfileResponse(await getMarketplace().drivers.getProfile(id));
  }

  /**
   * Reputation score with its full history
   */
  @Get("{id}/reputation")
  async getReputation(@Path() id: string): Promise<ReputationResponse> {
    const { reputation } = getMarketplace();
    const [score, history] = await Promise.all([reputation.score(id), reputation.history(id)]);
    return { driverId: id, score, history: history.map(toReputationEventResponse) };
  }
}
