import { Controller, Get, UseGuards } from "@nestjs/common";
import { ZodQuery } from "../../common/decorators/zod-validation.decorator";
import { MANAGER, STAFF } from "../auth/auth.types";
import { Roles } from "../auth/decorators/roles.decorator";
import { RoleGuard } from "../auth/guards/role.guard";
import { SessionGuard } from "../auth/guards/session.guard";
import { type RevenueRangeQueryDto, revenueRangeQuerySchema } from "./dto/analytics.dto";
import { AnalyticsService } from "./analytics.service";

@Controller("api/analytics")
@UseGuards(SessionGuard, RoleGuard)
@Roles(STAFF, MANAGER)
export class AnalyticsController {
  constructor(private readonly analyticsService: AnalyticsService) {}

  @Get("dashboard")
  async getDashboard() {
    return this.analyticsService.getDashboard();
  }

  @Get("revenue")
  async getRevenueSeries(@ZodQuery(revenueRangeQuerySchema) query: RevenueRangeQueryDto) {
    return this.analyticsService.getRevenueSeries(query);
  }
}
