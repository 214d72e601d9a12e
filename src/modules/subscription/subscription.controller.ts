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
import { type SubscriptionBodyDto, subscriptionBodySchema } from "./dto/subscription.dto";
import { SubscriptionNotFoundException } from "./subscription.error";
import { SubscriptionService } from "./subscription.service";

@Controller("api/subscriptions")
export class SubscriptionController {
  constructor(private readonly subscriptionService: SubscriptionService) {}

  @Get()
  async getActivePlans() {
    return this.subscriptionService.getActive();
  }

  @Get("manage")
  @UseGuards(SessionGuard, RoleGuard)
  @Roles(STAFF, MANAGER)
  async getAllPlans() {
    return this.subscriptionService.getAll();
  }

  @Get(":id")
  async getPlan(@ZodIdParam() id: number) {
    return this.subscriptionService.getByIdOrThrow(id);
  }

  @Get(":id/details")
  async getPlanDetails(@ZodIdParam() id: number) {
    return this.subscriptionService.getDetails(id);
  }

  @Post()
  @HttpCode(HttpStatus.CREATED)
  @UseGuards(SessionGuard, RoleGuard)
  @Roles(STAFF, MANAGER)
  async createPlan(@ZodBody(subscriptionBodySchema) body: SubscriptionBodyDto) {
    return this.subscriptionService.create(body);
  }

  @Put(":id")
  @UseGuards(SessionGuard, RoleGuard)
  @Roles(STAFF, MANAGER)
  async updatePlan(
    @ZodIdParam() id: number,
    @ZodBody(subscriptionBodySchema) body: SubscriptionBodyDto,
  ) {
    return this.subscriptionService.update(id, body);
  }

  @Delete(":id")
  @UseGuards(SessionGuard, RoleGuard)
  @Roles(STAFF, MANAGER)
  async deletePlan(@ZodIdParam() id: number) {
    if (!(await this.subscriptionService.delete(id))) {
      throw new SubscriptionNotFoundException();
    }
    return { success: true, message: "Subscription plan deleted successfully!" };
  }

  @Post(":id/toggle")
  @HttpCode(HttpStatus.OK)
  @UseGuards(SessionGuard, RoleGuard)
  @Roles(STAFF, MANAGER)
  async togglePlan(@ZodIdParam() id: number) {
    const subscription = await this.subscriptionService.toggleStatus(id);
    return {
      success: true,
      isActive: subscription.isActive,
      message: `Subscription plan ${subscription.isActive ? "activated" : "deactivated"} successfully!`,
    };
  }
}
