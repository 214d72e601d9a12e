import { Test, TestingModule } from "@nestjs/testing";
import { beforeEach, describe, expect, it } from "vitest";
import {
  createCar,
  createMockDatabase,
  createPromotion,
  type MockDatabase,
} from "../../shared/helper.fixtures";
import { DatabaseService } from "../database/database.service";
import { promotions } from "../database/schema";
import type { PromotionBodyDto } from "./dto/promotion.dto";
import {
  PromotionCodeTakenException,
  PromotionFetchFailedException,
  PromotionInvalidWindowException,
  PromotionNotFoundException,
} from "./promotion.error";
import { PromotionService } from "./promotion.service";

const body = (overrides: Partial<PromotionBodyDto> = {}): PromotionBodyDto => ({
  name: "Summer Sale",
  code: " summer20 ",
  discountPercentage: 20,
  maxDiscountAmount: 100,
  startDate: new Date("2025-06-01T00:00:00Z"),
  endDate: new Date("2025-08-31T00:00:00Z"),
  isActive: true,
  isEVOnly: false,
  ...overrides,
});

describe("PromotionService", () => {
  let service: PromotionService;
  let db: MockDatabase;

  beforeEach(async () => {
    db = createMockDatabase();
    const module: TestingModule = await Test.createTestingModule({
      providers: [PromotionService, { provide: DatabaseService, useValue: { db } }],
    }).compile();

    service = module.get<PromotionService>(PromotionService);
  });

  describe("getById", () => {
    it("returns null when the promotion does not exist", async () => {
      db.query.promotions.findFirst.mockResolvedValue(undefined);

      expect(await service.getById(99)).toBeNull();
    });

    it("throws from getByIdOrThrow when the promotion does not exist", async () => {
      db.query.promotions.findFirst.mockResolvedValue(undefined);

      await expect(service.getByIdOrThrow(99)).rejects.toThrow(PromotionNotFoundException);
    });
  });

  describe("getActive", () => {
    it("returns the redeemable promotions from the query", async () => {
      const rows = [createPromotion({ id: 2, discountPercentage: "30.00" }), createPromotion()];
      db.query.promotions.findMany.mockResolvedValue(rows);

      expect(await service.getActive()).toEqual(rows);
      expect(db.query.promotions.findMany).toHaveBeenCalledOnce();
    });
  });

  describe("create", () => {
    it("upper-cases the code and stores money columns with two decimals", async () => {
      const created = createPromotion({ description: null });
      db.queueResult([created]);

      const result = await service.create(body());

      expect(db.insert).toHaveBeenCalledWith(promotions);
      expect(db.builder.values).toHaveBeenCalledWith({
        name: "Summer Sale",
        description: null,
        code: "SUMMER20",
        discountPercentage: "20.00",
        maxDiscountAmount: "100.00",
        startDate: new Date("2025-06-01T00:00:00Z"),
        endDate: new Date("2025-08-31T00:00:00Z"),
        isActive: true,
        isEVOnly: false,
        maxUses: null,
      });
      expect(result).toEqual(created);
    });

    it("rejects an end date on or before the start date", async () => {
      await expect(
        service.create(body({ endDate: new Date("2025-06-01T00:00:00Z") })),
      ).rejects.toThrow(PromotionInvalidWindowException);
      expect(db.insert).not.toHaveBeenCalled();
    });

    it("rejects a code that is already used", async () => {
      db.query.promotions.findFirst.mockResolvedValue(createPromotion({ id: 2 }));

      await expect(service.create(body())).rejects.toThrow(PromotionCodeTakenException);
    });

    it("wraps unexpected insert failures", async () => {
      db.insert.mockImplementationOnce(() => {
        throw new Error("connection lost");
      });

      await expect(service.create(body())).rejects.toThrow(PromotionFetchFailedException);
    });
  });

  describe("update", () => {
    it("keeps the same code without a uniqueness check and sets updatedAt", async () => {
      db.query.promotions.findFirst.mockResolvedValueOnce(createPromotion());
      db.queueResult([createPromotion({ name: "Summer Sale" })]);

      await service.update(1, body({ maxUses: 50 }));

      expect(db.query.promotions.findFirst).toHaveBeenCalledTimes(1);
      expect(db.builder.set).toHaveBeenCalledWith(
        expect.objectContaining({ code: "SUMMER20", maxUses: 50, updatedAt: expect.any(Date) }),
      );
    });

    it("rejects a new code owned by another promotion", async () => {
      db.query.promotions.findFirst
        .mockResolvedValueOnce(createPromotion())
        .mockResolvedValueOnce(createPromotion({ id: 5, code: "WINTER10" }));

      await expect(service.update(1, body({ code: "winter10" }))).rejects.toThrow(
        PromotionCodeTakenException,
      );
    });

    it("throws when the promotion does not exist", async () => {
      db.query.promotions.findFirst.mockResolvedValue(undefined);

      await expect(service.update(1, body())).rejects.toThrow(PromotionNotFoundException);
    });
  });

  describe("delete", () => {
    it("returns true when a row was removed", async () => {
      db.queueResult([{ id: 1 }]);

      expect(await service.delete(1)).toBe(true);
    });

    it("returns false when nothing matched", async () => {
      expect(await service.delete(1)).toBe(false);
    });
  });

  describe("toggleStatus", () => {
    it("flips the active flag", async () => {
      db.query.promotions.findFirst.mockResolvedValue(createPromotion({ isActive: true }));
      db.queueResult([createPromotion({ isActive: false })]);

      const result = await service.toggleStatus(1);

      expect(db.builder.set).toHaveBeenCalledWith({ isActive: false, updatedAt: expect.any(Date) });
      expect(result.isActive).toBe(false);
    });
  });

  describe("validate", () => {
    const now = new Date("2025-07-01T00:00:00Z");

    it("accepts a redeemable code", async () => {
      db.query.promotions.findFirst.mockResolvedValue(createPromotion());

      expect(await service.validate("summer20", false, now)).toBe(true);
    });

    it("rejects an unknown code", async () => {
      db.query.promotions.findFirst.mockResolvedValue(undefined);

      expect(await service.validate("NOPE", true, now)).toBe(false);
    });

    it("rejects an EV-only code for a non-electric car", async () => {
      db.query.promotions.findFirst.mockResolvedValue(createPromotion({ isEVOnly: true }));

      expect(await service.validate("summer20", false, now)).toBe(false);
    });

    it("rejects a code at its usage cap", async () => {
      db.query.promotions.findFirst.mockResolvedValue(
        createPromotion({ maxUses: 10, currentUses: 10 }),
      );

      expect(await service.validate("summer20", true, now)).toBe(false);
    });
  });

  describe("validatePromotionCode", () => {
    it("requires a code", async () => {
      expect(await service.validatePromotionCode("  ", 1)).toEqual({
        valid: false,
        message: "Code is required",
      });
    });

    it("reports a missing car", async () => {
      db.query.cars.findFirst.mockResolvedValue(undefined);

      expect(await service.validatePromotionCode("SUMMER20", 42)).toEqual({
        valid: false,
        message: "Car not found",
      });
    });

    it("reports an unknown code", async () => {
      db.query.cars.findFirst.mockResolvedValue(createCar());
      db.query.promotions.findFirst.mockResolvedValue(undefined);

      expect(await service.validatePromotionCode("NOPE", 1)).toEqual({
        valid: false,
        message: "Invalid code",
      });
    });

    it("reports an expired code", async () => {
      db.query.cars.findFirst.mockResolvedValue(createCar());
      db.query.promotions.findFirst.mockResolvedValue(
        createPromotion({ endDate: new Date("2020-01-01T00:00:00Z") }),
      );

      expect(await service.validatePromotionCode("SUMMER20", 1)).toEqual({
        valid: false,
        message: "Invalid or expired code",
      });
    });

    it("returns the discount for a valid code", async () => {
      db.query.cars.findFirst.mockResolvedValue(createCar({ isElectric: false }));
      db.query.promotions.findFirst.mockResolvedValue(createPromotion({ id: 7 }));

      expect(await service.validatePromotionCode("summer20", 1)).toEqual({
        valid: true,
        discount: 20,
        promotionId: 7,
        message: "Valid! 20% discount applied.",
      });
    });

    it("answers with a generic message when the lookup fails", async () => {
      db.query.cars.findFirst.mockRejectedValue(new Error("connection lost"));

      expect(await service.validatePromotionCode("SUMMER20", 1)).toEqual({
        valid: false,
        message: "Error validating code",
      });
    });
  });

  describe("incrementUsage", () => {
    it("updates through the given transaction", async () => {
      const tx = createMockDatabase();

      await service.incrementUsage(
        1,
        tx as unknown as Parameters<PromotionService["incrementUsage"]>[1],
      );

      expect(tx.update).toHaveBeenCalledWith(promotions);
      expect(db.update).not.toHaveBeenCalled();
    });
  });
});
