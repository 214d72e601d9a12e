import {
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Post,
  Put,
  UseGuards,
} from "@nestjs/common";
import { ZodBody, ZodIdParam } from "../../common/decorators/zod-validation.decorator";
import { MANAGER, STAFF } from "../auth/auth.types";
import { Roles } from "../auth/decorators/roles.decorator";
import { RoleGuard } from "../auth/guards/role.guard";
import { SessionGuard } from "../auth/guards/session.guard";
import { type PromotionBodyDto, promotionBodySchema } from "./dto/promotion.dto";
import { PromotionNotFoundException } from "./promotion.error";
import { PromotionService } from "./promotion.service";

@Controller("api/promotions")
export class PromotionController {
  constructor(private readonly promotionService: PromotionService) {}

  @Get("active")
  async getActivePromotions() {
    return this.promotionService.getActive();
  }

  @Get()
  @UseGuards(SessionGuard, RoleGuard)
  @Roles(STAFF, MANAGER)
  async getAllPromotions() {
    return this.promotionService.getAll();
  }

  @Get(":id")
  @UseGuards(SessionGuard, RoleGuard)
  @Roles(STAFF, MANAGER)
  async getPromotion(@ZodIdParam() id: number) {
    return this.promotionService.getByIdOrThrow(id);
  }

  @Post()
  @HttpCode(HttpStatus.CREATED)
  @UseGuards(SessionGuard, RoleGuard)
  @Roles(STAFF, MANAGER)
  async createPromotion(@ZodBody(promotionBodySchema) body: PromotionBodyDto) {
    return this.promotionService.create(body);
  }

  @Put(":id")
  @UseGuards(SessionGuard, RoleGuard)
  @Roles(STAFF, MANAGER)
  async updatePromotion(
    @ZodIdParam() id: number,
    @ZodBody(promotionBodySchema) body: PromotionBodyDto,
  ) {
    return this.promotionService.update(id, body);
  }

  @Delete(":id")
  @UseGuards(SessionGuard, RoleGuard)
  @Roles(STAFF, MANAGER)
  async deletePromotion(@ZodIdParam() id: number) {
    const deleted = await this.promotionService.delete(id);
    if (!deleted) {
      throw new PromotionNotFoundException();
    }
    return { success: true, message: "Promotion deleted successfully!" };
  }

  @Post(":id/toggle")
  @HttpCode(HttpStatus.OK)
  @UseGuards(SessionGuard, RoleGuard)
  @Roles(STAFF, MANAGER)
  async togglePromotion(@ZodIdParam() id: number) {
    const promotion = await this.promotionService.toggleStatus(id);
    return {
      success: true,
      isActive: promotion.isActive,
      message: `Promotion ${promotion.isActive ? "activated" : "deactivated"} successfully!`,
    };
  }
}
