import { Module } from "@nestjs/common";
import { ConfigModule } from "@nestjs/config";
import { validateEnvironment } from "./config/env.config";
import { AuthModule } from "./modules/auth/auth.module";
import { DatabaseModule } from "./modules/database/database.module";
import { SeedCommand } from "./modules/seed/seed.command";
import { SeedService } from "./modules/seed/seed.service";

/** Operator commands; no HTTP server and no scheduled tasks. */
@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      validate: validateEnvironment,
    }),
    DatabaseModule,
    AuthModule,
  ],
  providers: [SeedService, SeedCommand],
})
export class CliModule {}
