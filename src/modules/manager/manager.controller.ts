import { Controller, Delete, Get, HttpCode, HttpStatus, Post, UseGuards } from "@nestjs/common";
import { ZodBody, ZodParam, ZodQuery } from "../../common/decorators/zod-validation.decorator";
import { MANAGER } from "../auth/auth.types";
import { CurrentUser } from "../auth/decorators/current-user.decorator";
import { Roles } from "../auth/decorators/roles.decorator";
import { RoleGuard } from "../auth/guards/role.guard";
import { type AuthSession, SessionGuard } from "../auth/guards/session.guard";
import {
  type UserListQueryDto,
  userIdParamSchema,
  userListQuerySchema,
} from "../staff/dto/staff.dto";
import { StaffUsersService } from "../staff/staff-users.service";
import { type CreateStaffDto, createStaffSchema } from "./dto/manager.dto";
import { ManagerService } from "./manager.service";

@Controller("api/manager")
@UseGuards(SessionGuard, RoleGuard)
@Roles(MANAGER)
export class ManagerController {
  constructor(
    private readonly managerService: ManagerService,
    private readonly staffUsersService: StaffUsersService,
  ) {}

  @Get("dashboard")
  async getDashboard() {
    return this.managerService.getDashboard();
  }

  @Get("statistics")
  async getSystemStatistics() {
    return this.managerService.getSystemStatistics();
  }

  @Get("staff")
  async listStaff() {
    return this.managerService.listStaff();
  }

  @Post("staff")
  async createStaff(@ZodBody(createStaffSchema) body: CreateStaffDto) {
    return this.managerService.createStaff(body);
  }

  @Post("staff/:id/toggle-status")
  @HttpCode(HttpStatus.OK)
  async toggleStaffStatus(@ZodParam("id", userIdParamSchema) id: string) {
    return this.managerService.toggleStaffStatus(id);
  }

  @Delete("staff/:id")
  async deleteStaff(@ZodParam("id", userIdParamSchema) id: string) {
    return this.managerService.deleteStaff(id);
  }

  @Get("users")
  async listUsers(@ZodQuery(userListQuerySchema) query: UserListQueryDto) {
    return this.staffUsersService.listUsers(query);
  }

  @Delete("users/customers")
  async deleteAllCustomers() {
    return this.managerService.deleteAllCustomers();
  }

  @Post("users/:id/toggle-status")
  @HttpCode(HttpStatus.OK)
  async toggleUserStatus(
    @ZodParam("id", userIdParamSchema) id: string,
    @CurrentUser() user: AuthSession["user"],
  ) {
    return this.managerService.toggleUserStatus(id, user.id);
  }

  @Delete("users/:id")
  async deleteUser(
    @ZodParam("id", userIdParamSchema) id: string,
    @CurrentUser() user: AuthSession["user"],
  ) {
    return this.managerService.deleteUser(id, user.id);
  }
}
