import { Injectable, Logger, OnApplicationBootstrap } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { SchedulerRegistry } from "@nestjs/schedule";
import { SEED_STARTUP_TIMEOUT } from "../../config/constants";
import type { EnvConfig } from "../../config/env.config";
import { SeedService } from "./seed.service";

@Injectable()
export class SeedStartupService implements OnApplicationBootstrap {
  private readonly logger = new Logger(SeedStartupService.name);

  constructor(
    private readonly configService: ConfigService<EnvConfig, true>,
    private readonly schedulerRegistry: SchedulerRegistry,
    private readonly seedService: SeedService,
  ) {}

  onApplicationBootstrap(): void {
    if (!this.configService.get("SEED_ON_STARTUP", { infer: true })) {
      this.logger.log("Startup seeding disabled");
      return;
    }

    const delay = this.configService.get("SEED_DELAY_MS", { infer: true });
    const timeout = setTimeout(() => {
      this.schedulerRegistry.deleteTimeout(SEED_STARTUP_TIMEOUT);
      void this.seed();
    }, delay);

    this.schedulerRegistry.addTimeout(SEED_STARTUP_TIMEOUT, timeout);
    this.logger.log(`Startup seeding scheduled in ${delay}ms`);
  }

  private async seed(): Promise<void> {
    const results = await this.seedService.run();
    const failed = results.filter((result) => !result.ok).map((result) => result.step);

    if (failed.length > 0) {
      this.logger.warn("Startup seeding finished with failures", { failed });
      return;
    }
    this.logger.log("Startup seeding finished");
  }
}
