import { Controller, Get, HttpCode, HttpStatus, Post, UseGuards } from "@nestjs/common";
import {
  ZodBody,
  ZodIdParam,
  ZodParam,
  ZodQuery,
} from "../../common/decorators/zod-validation.decorator";
import { MANAGER, STAFF } from "../auth/auth.types";
import { CurrentUser } from "../auth/decorators/current-user.decorator";
import { Roles } from "../auth/decorators/roles.decorator";
import { RoleGuard } from "../auth/guards/role.guard";
import { type AuthSession, SessionGuard } from "../auth/guards/session.guard";
import {
  type BatchUpdateOrderStatusDto,
  batchUpdateOrderStatusSchema,
  type CalendarQueryDto,
  calendarQuerySchema,
  type OrderListQueryDto,
  orderListQuerySchema,
  type StaffReportQueryDto,
  staffReportQuerySchema,
  type UpdateOrderStatusDto,
  type UserListQueryDto,
  updateOrderStatusSchema,
  userIdParamSchema,
  userListQuerySchema,
} from "./dto/staff.dto";
import { StaffDashboardService } from "./staff-dashboard.service";
import { StaffOrdersService } from "./staff-orders.service";
import { StaffUsersService } from "./staff-users.service";

@Controller("api/staff")
@UseGuards(SessionGuard, RoleGuard)
@Roles(STAFF, MANAGER)
export class StaffController {
  constructor(
    private readonly staffDashboardService: StaffDashboardService,
    private readonly staffOrdersService: StaffOrdersService,
    private readonly staffUsersService: StaffUsersService,
  ) {}

  @Get("dashboard")
  async getDashboard() {
    return this.staffDashboardService.getDashboard();
  }

  @Get("orders")
  async listOrders(@ZodQuery(orderListQuerySchema) query: OrderListQueryDto) {
    return this.staffOrdersService.listOrders(query);
  }

  @Post("orders/batch-status")
  @HttpCode(HttpStatus.OK)
  async batchUpdateOrderStatus(
    @ZodBody(batchUpdateOrderStatusSchema) body: BatchUpdateOrderStatusDto,
  ) {
    return this.staffOrdersService.batchUpdateOrderStatus(body.orderIds, body.status);
  }

  @Get("orders/:id")
  async getOrderDetails(@ZodIdParam() id: number) {
    return this.staffOrdersService.getOrderDetails(id);
  }

  @Post("orders/:id/status")
  @HttpCode(HttpStatus.OK)
  async updateOrderStatus(
    @ZodIdParam() id: number,
    @ZodBody(updateOrderStatusSchema) body: UpdateOrderStatusDto,
  ) {
    return this.staffOrdersService.updateOrderStatus(id, body.status);
  }

  @Get("reports")
  async getReport(@ZodQuery(staffReportQuerySchema) query: StaffReportQueryDto) {
    return this.staffDashboardService.getReport(query);
  }

  @Get("calendar/events")
  async getCalendarEvents(@ZodQuery(calendarQuerySchema) query: CalendarQueryDto) {
    return this.staffDashboardService.getCalendarEvents(query);
  }

  @Get("users")
  async listUsers(@ZodQuery(userListQuerySchema) query: UserListQueryDto) {
    return this.staffUsersService.listUsers(query);
  }

  @Get("users/:id")
  async getUserDetails(@ZodParam("id", userIdParamSchema) id: string) {
    return this.staffUsersService.getUserDetails(id);
  }

  @Post("users/:id/toggle-status")
  @HttpCode(HttpStatus.OK)
  async toggleUserStatus(
    @ZodParam("id", userIdParamSchema) id: string,
    @CurrentUser() user: AuthSession["user"],
  ) {
    return this.staffUsersService.toggleUserStatus(id, user);
  }
}
