import { Injectable } from "@nestjs/common";
import { HealthIndicatorResult, HealthIndicatorService } from "@nestjs/terminus";
import { sql } from "drizzle-orm";
import { DatabaseService } from "../../database/database.service";

@Injectable()
export class DatabaseHealthIndicator {
  constructor(
    private readonly databaseService: DatabaseService,
    private readonly healthIndicatorService: HealthIndicatorService,
  ) {}

  async isHealthy(key = "database"): Promise<HealthIndicatorResult<"database">> {
    const indicator = this.healthIndicatorService.check(key);
    try {
      await this.databaseService.db.execute(sql`select 1`);
      return indicator.up();
    } catch (error) {
      return indicator.down({
        message: error instanceof Error ? error.message : "Unknown error",
      });
    }
  }
}
