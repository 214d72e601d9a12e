import { Module } from "@nestjs/common";
import { AnalyticsModule } from "../analytics/analytics.module";
import { StorageModule } from "../storage/storage.module";
import { AccountController } from "./account.controller";
import { AccountService } from "./account.service";

@Module({
  imports: [AnalyticsModule, StorageModule],
  controllers: [AccountController],
  providers: [AccountService],
})
export class AccountModule {}
