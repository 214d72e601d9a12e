import { Module } from "@nestjs/common";
import { AnalyticsModule } from "../analytics/analytics.module";
import { StaffModule } from "../staff/staff.module";
import { ManagerController } from "./manager.controller";
import { ManagerService } from "./manager.service";

@Module({
  imports: [AnalyticsModule, StaffModule],
  controllers: [ManagerController],
  providers: [ManagerService],
})
export class ManagerModule {}
