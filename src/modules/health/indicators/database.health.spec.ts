import { HealthIndicatorService } from "@nestjs/terminus";
import { Test, TestingModule } from "@nestjs/testing";
import { beforeEach, describe, expect, it } from "vitest";
import { createMockDatabase, type MockDatabase } from "../../../shared/helper.fixtures";
import { DatabaseService } from "../../database/database.service";
import { DatabaseHealthIndicator } from "./database.health";

describe("DatabaseHealthIndicator", () => {
  let indicator: DatabaseHealthIndicator;
  let db: MockDatabase;

  beforeEach(async () => {
    db = createMockDatabase();

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        DatabaseHealthIndicator,
        HealthIndicatorService,
        { provide: DatabaseService, useValue: { db } },
      ],
    }).compile();

    indicator = module.get<DatabaseHealthIndicator>(DatabaseHealthIndicator);
  });

  it("is up when the database answers", async () => {
    await expect(indicator.isHealthy()).resolves.toEqual({
      database: { status: "up" },
    });
  });

  it("is down with the driver error", async () => {
    db.execute.mockRejectedValueOnce(new Error("connect ECONNREFUSED"));

    await expect(indicator.isHealthy()).resolves.toEqual({
      database: { status: "down", message: "connect ECONNREFUSED" },
    });
  });
});
