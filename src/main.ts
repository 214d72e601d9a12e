import "reflect-metadata";
import { Logger } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { NestFactory } from "@nestjs/core";
import { AppModule } from "./app.module";
import { createBodyParser } from "./common/http/body-parser.middleware";
import type { EnvConfig } from "./config/env.config";

async function bootstrap() {
  const logger = new Logger("Bootstrap");

  try {
    logger.log("Starting application...");

    const app = await NestFactory.create(AppModule, { bodyParser: false });
    const configService = app.get<ConfigService<EnvConfig, true>>(ConfigService);

    app.use(createBodyParser());
    app.enableCors({
      origin: configService.get("TRUSTED_ORIGINS", { infer: true }),
      credentials: true,
    });
    app.enableShutdownHooks();

    const port = configService.get("PORT", { infer: true });
    const host = configService.get("HOST", { infer: true });

    await app.listen(port, host);

    logger.log(`Application started on ${host}:${port}`);
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : String(error);
    logger.error(`Failed to start application: ${errorMessage}`);
    process.exit(1);
  }
}

void bootstrap();
