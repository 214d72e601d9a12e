import { Module } from "@nestjs/common";
import { AnalyticsModule } from "../analytics/analytics.module";
import { NotificationModule } from "../notification/notification.module";
import { StaffController } from "./staff.controller";
import { StaffDashboardService } from "./staff-dashboard.service";
import { StaffOrdersService } from "./staff-orders.service";
import { StaffUsersService } from "./staff-users.service";

@Module({
  imports: [AnalyticsModule, NotificationModule],
  controllers: [StaffController],
  providers: [StaffDashboardService, StaffOrdersService, StaffUsersService],
  exports: [StaffUsersService],
})
export class StaffModule {}
