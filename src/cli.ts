import "reflect-metadata";
import { Logger } from "@nestjs/common";
import { CommandFactory } from "nest-commander";
import { CliModule } from "./cli.module";

const logger = new Logger("Cli");

async function bootstrap(): Promise<void> {
  await CommandFactory.run(CliModule, {
    logger: ["log", "warn", "error"],
    serviceErrorHandler: (error) => {
      logger.error(`Command failed: ${error.message}`);
      process.exit(1);
    },
  });
}

bootstrap().catch((error: unknown) => {
  logger.error(`Failed to start CLI: ${error instanceof Error ? error.message : String(error)}`);
  process.exit(1);
});
