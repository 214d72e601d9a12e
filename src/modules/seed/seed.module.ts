import { Module } from "@nestjs/common";
import { SeedService } from "./seed.service";
import { SeedStartupService } from "./seed-startup.service";

@Module({
  providers: [SeedService, SeedStartupService],
  exports: [SeedService],
})
export class SeedModule {}
