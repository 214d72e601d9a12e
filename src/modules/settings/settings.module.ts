import { Module } from "@nestjs/common";
import { NotificationModule } from "../notification/notification.module";
import { SettingsController } from "./settings.controller";
import { SettingsService } from "./settings.service";

@Module({
  imports: [NotificationModule],
  controllers: [SettingsController],
  providers: [SettingsService],
})
export class SettingsModule {}
