import { Injectable, Logger, OnModuleDestroy, OnModuleInit } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import type { ExtractTablesWithRelations } from "drizzle-orm";
import type { Logger as DrizzleLogger } from "drizzle-orm/logger";
import { drizzle, type NodePgDatabase, type NodePgTransaction } from "drizzle-orm/node-postgres";
import { Pool } from "pg";
import type { EnvConfig } from "../../config/env.config";
import * as schema from "./schema";

export type Database = NodePgDatabase<typeof schema>;

export type Transaction = NodePgTransaction<typeof schema, ExtractTablesWithRelations<typeof schema>>;

class QueryLogger implements DrizzleLogger {
  constructor(private readonly logger: Logger) {}

  logQuery(query: string, params: unknown[]): void {
    this.logger.debug(`[Drizzle] ${query} -- Params: ${JSON.stringify(params)}`);
  }
}

@Injectable()
export class DatabaseService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(DatabaseService.name);
  readonly pool: Pool;
  readonly db: Database;

  constructor(configService: ConfigService<EnvConfig, true>) {
    const connectionString = configService.get("DATABASE_URL", { infer: true });
    const isDevelopment = configService.get("NODE_ENV", { infer: true }) === "development";

    this.pool = new Pool({ connectionString, max: 10 });
    this.pool.on("error", (error) => {
      this.logger.error("Idle database client error", { error: error.message });
    });

    this.db = drizzle(this.pool, {
      schema,
      logger: isDevelopment ? new QueryLogger(this.logger) : false,
    });
  }

  async onModuleInit() {
    const client = await this.pool.connect();
    client.release();
    this.logger.log("Database connected successfully");
  }

  async onModuleDestroy() {
    this.logger.log("Closing database pool...");
    await this.pool.end();
  }
}
