import { Injectable, Logger } from "@nestjs/common";
import { Command, CommandRunner } from "nest-commander";
import { SeedService } from "./seed.service";

@Injectable()
@Command({
  name: "seed",
  description: "Patch the schema, seed an empty catalog and ensure the default staff logins",
})
export class SeedCommand extends CommandRunner {
  private readonly logger = new Logger(SeedCommand.name);

  constructor(private readonly seedService: SeedService) {
    super();
  }

  async run(): Promise<void> {
    const results = await this.seedService.run();
    const failed = results.filter((result) => !result.ok);

    if (failed.length > 0) {
      throw new Error(
        `Seeding failed: ${failed.map((result) => `${result.step} (${result.error})`).join(", ")}`,
      );
    }
    this.logger.log("Seeding complete");
  }
}
