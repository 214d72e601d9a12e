import { Injectable, Logger } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { addDays } from "date-fns";
import { sql } from "drizzle-orm";
import type { EnvConfig } from "../../config/env.config";
import { getPasswordComplexityError } from "../auth/auth.config";
import { AuthService } from "../auth/auth.service";
import { DatabaseService } from "../database/database.service";
import { cars, categories, promotions, subscriptions } from "../database/schema";
import { DEFAULT_ACCOUNTS, SCHEMA_PATCH_STATEMENTS } from "./seed.const";
import type { SeedStepName, SeedStepResult } from "./seed.interface";
import { seedDataSchema } from "./seed.schema";
import seedData from "./seed-data.json";

@Injectable()
export class SeedService {
  private readonly logger = new Logger(SeedService.name);

  constructor(
    private readonly databaseService: DatabaseService,
    private readonly authService: AuthService,
    private readonly configService: ConfigService<EnvConfig, true>,
  ) {}

  /** Runs every step in order; a failed step is logged and the rest still run. */
  async run(now = new Date()): Promise<SeedStepResult[]> {
    return [
      await this.runStep("schema", () => this.applySchemaPatch()),
      await this.runStep("catalog", () => this.seedCatalog(now)),
      await this.runStep("accounts", () => this.ensureDefaultAccounts()),
    ];
  }

  async applySchemaPatch(): Promise<void> {
    for (const statement of SCHEMA_PATCH_STATEMENTS) {
      await this.databaseService.db.execute(sql.raw(statement));
    }
    this.logger.log("Schema patch applied", { statements: SCHEMA_PATCH_STATEMENTS.length });
  }

  /** Seeds categories, cars, subscriptions and promotions into an empty catalog. */
  async seedCatalog(now = new Date()): Promise<boolean> {
    const db = this.databaseService.db;
    const [carCount, subscriptionCount, promotionCount] = await Promise.all([
      db.$count(cars),
      db.$count(subscriptions),
      db.$count(promotions),
    ]);

    if (carCount + subscriptionCount + promotionCount > 0) {
      this.logger.log("Catalog already seeded, skipping");
      return false;
    }

    const data = seedDataSchema.parse(seedData);

    await db.transaction(async (tx) => {
      await tx.insert(categories).values(data.categories).onConflictDoNothing();
      const categoryRows = await tx
        .select({ id: categories.id, name: categories.name })
        .from(categories);
      const categoryIds = new Map(categoryRows.map((row) => [row.name, row.id]));

      await tx.insert(cars).values(
        data.cars.map(({ category, ...car }) => ({
          ...car,
          isElectric: car.fuelType === "Electric",
          categoryId: categoryIds.get(category) ?? null,
        })),
      );
      await tx.insert(subscriptions).values(data.subscriptions);
      await tx.insert(promotions).values(
        data.promotions.map(({ startOffsetDays, endOffsetDays, ...promotion }) => ({
          ...promotion,
          startDate: addDays(now, startOffsetDays),
          endDate: addDays(now, endOffsetDays),
        })),
      );
    });

    this.logger.log("Catalog seeded", {
      categories: data.categories.length,
      cars: data.cars.length,
      subscriptions: data.subscriptions.length,
      promotions: data.promotions.length,
    });
    return true;
  }

  /** Creates the default Manager and Staff logins that do not exist yet. */
  async ensureDefaultAccounts(): Promise<number> {
    const password = this.configService.get("SEED_DEFAULT_PASSWORD", { infer: true });
    if (!password) {
      this.logger.warn("SEED_DEFAULT_PASSWORD is not set, skipping default accounts");
      return 0;
    }

    const complexityError = getPasswordComplexityError(password);
    if (complexityError) {
      throw new Error(`SEED_DEFAULT_PASSWORD rejected: ${complexityError}`);
    }

    const domain = this.configService.get("SEED_ACCOUNT_DOMAIN", { infer: true });
    let created = 0;

    for (const { localPart, ...account } of DEFAULT_ACCOUNTS) {
      const email = `${localPart}@${domain}`;
      if (await this.authService.isEmailTaken(email)) continue;

      await this.authService.createUserWithPassword({ ...account, email, password });
      created++;
    }

    this.logger.log("Default accounts ensured", { created });
    return created;
  }

  private async runStep(step: SeedStepName, task: () => Promise<unknown>): Promise<SeedStepResult> {
    try {
      await task();
      return { step, ok: true };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(`Seed step "${step}" failed`, { error: message });
      return { step, ok: false, error: message };
    }
  }
}
