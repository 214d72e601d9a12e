import {
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Post,
  Put,
  UploadedFile,
  UseGuards,
  UseInterceptors,
} from "@nestjs/common";
import { FileInterceptor } from "@nestjs/platform-express";
import { ZodBody, ZodIdParam, ZodQuery } from "../../common/decorators/zod-validation.decorator";
import { MANAGER, STAFF } from "../auth/auth.types";
import { Roles } from "../auth/decorators/roles.decorator";
import { RoleGuard } from "../auth/guards/role.guard";
import { SessionGuard } from "../auth/guards/session.guard";
import {
  ImageUploadPipe,
  type UploadedImage,
  VEHICLE_IMAGE_MAX_BYTES,
} from "../storage/image-upload.pipe";
import { CarManagementService } from "./car-management.service";
import {
  type VehicleBodyDto,
  type VehicleListQueryDto,
  vehicleBodySchema,
  vehicleListQuerySchema,
} from "./dto/car-management.dto";

@Controller("api/staff/vehicles")
@UseGuards(SessionGuard, RoleGuard)
@Roles(STAFF, MANAGER)
export class CarManagementController {
  constructor(private readonly carManagementService: CarManagementService) {}

  @Get()
  async listVehicles(@ZodQuery(vehicleListQuerySchema) query: VehicleListQueryDto) {
    return this.carManagementService.listVehicles(query);
  }

  @Get(":id")
  async getVehicle(@ZodIdParam() id: number) {
    return this.carManagementService.getVehicle(id);
  }

  @Post()
  @UseInterceptors(FileInterceptor("imageFile"))
  async createVehicle(
    @ZodBody(vehicleBodySchema) body: VehicleBodyDto,
    @UploadedFile(new ImageUploadPipe({ maxSizeBytes: VEHICLE_IMAGE_MAX_BYTES }))
    image: UploadedImage | undefined,
  ) {
    return this.carManagementService.createVehicle(body, image);
  }

  @Put(":id")
  async updateVehicle(
    @ZodIdParam() id: number,
    @ZodBody(vehicleBodySchema) body: VehicleBodyDto,
  ) {
    return this.carManagementService.updateVehicle(id, body);
  }

  @Post(":id/toggle-availability")
  @HttpCode(HttpStatus.OK)
  async toggleAvailability(@ZodIdParam() id: number) {
    return this.carManagementService.toggleAvailability(id);
  }
}
