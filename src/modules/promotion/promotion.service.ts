import { Injectable, Logger } from "@nestjs/common";
import { and, desc, eq, gte, isNull, lt, lte, or, sql } from "drizzle-orm";
import { toMoney } from "../../shared/helper";
import { DatabaseService, type Transaction } from "../database/database.service";
import { cars, type NewPromotion, type Promotion, promotions } from "../database/schema";
import type { PromotionBodyDto } from "./dto/promotion.dto";
import {
  PromotionCodeTakenException,
  PromotionFetchFailedException,
  PromotionInvalidWindowException,
  PromotionNotFoundException,
} from "./promotion.error";
import { isPromotionValidForCar, normalizePromotionCode } from "./promotion.helper";
import type { PromotionValidationResult } from "./promotion.interface";

@Injectable()
export class PromotionService {
  private readonly logger = new Logger(PromotionService.name);

  constructor(private readonly databaseService: DatabaseService) {}

  async getById(id: number): Promise<Promotion | null> {
    const promotion = await this.databaseService.db.query.promotions.findFirst({
      where: eq(promotions.id, id),
    });
    return promotion ?? null;
  }

  async getByIdOrThrow(id: number): Promise<Promotion> {
    const promotion = await this.getById(id);
    if (!promotion) {
      throw new PromotionNotFoundException();
    }
    return promotion;
  }

  /** Case-insensitive code lookup. */
  async getByCode(code: string): Promise<Promotion | null> {
    const promotion = await this.databaseService.db.query.promotions.findFirst({
      where: sql`upper(${promotions.code}) = ${normalizePromotionCode(code)}`,
    });
    return promotion ?? null;
  }

  async getAll(): Promise<Promotion[]> {
    return this.databaseService.db.query.promotions.findMany({
      orderBy: [desc(promotions.createdAt)],
    });
  }

  /** Redeemable right now, best discount first. */
  async getActive(now = new Date()): Promise<Promotion[]> {
    return this.databaseService.db.query.promotions.findMany({
      where: and(
        eq(promotions.isActive, true),
        lte(promotions.startDate, now),
        gte(promotions.endDate, now),
        or(isNull(promotions.maxUses), lt(promotions.currentUses, promotions.maxUses)),
      ),
      orderBy: [desc(promotions.discountPercentage)],
    });
  }

  async create(body: PromotionBodyDto): Promise<Promotion> {
    const values = this.toRow(body);
    await this.ensureCodeAvailable(values.code);

    try {
      const [promotion] = await this.databaseService.db
        .insert(promotions)
        .values(values)
        .returning();
      this.logger.log("Promotion created", { promotionId: promotion.id, code: promotion.code });
      return promotion;
    } catch (error) {
      this.logger.error("Failed to create promotion", {
        code: values.code,
        error: error instanceof Error ? error.message : String(error),
      });
      throw new PromotionFetchFailedException();
    }
  }

  async update(id: number, body: PromotionBodyDto): Promise<Promotion> {
    const existing = await this.getByIdOrThrow(id);
    const values = this.toRow(body);
    if (values.code !== existing.code) {
      await this.ensureCodeAvailable(values.code, id);
    }

    const [promotion] = await this.databaseService.db
      .update(promotions)
      .set({ ...values, updatedAt: new Date() })
      .where(eq(promotions.id, id))
      .returning();
    return promotion;
  }

  async delete(id: number): Promise<boolean> {
    const deleted = await this.databaseService.db
      .delete(promotions)
      .where(eq(promotions.id, id))
      .returning({ id: promotions.id });
    return deleted.length > 0;
  }

  async toggleStatus(id: number): Promise<Promotion> {
    const existing = await this.getByIdOrThrow(id);
    const [promotion] = await this.databaseService.db
      .update(promotions)
      .set({ isActive: !existing.isActive, updatedAt: new Date() })
      .where(eq(promotions.id, id))
      .returning();
    return promotion;
  }

  /**
   * False when the code is unknown, inactive, outside its window, EV-only for
   * a non-electric car or at its usage cap.
   */
  async validate(code: string, isElectric: boolean, now = new Date()): Promise<boolean> {
    const promotion = await this.getByCode(code);
    return promotion !== null && isPromotionValidForCar(promotion, isElectric, now);
  }

  async validatePromotionCode(code: string, carId: number): Promise<PromotionValidationResult> {
    if (!code.trim()) {
      return { valid: false, message: "Code is required" };
    }

    try {
      const car = await this.databaseService.db.query.cars.findFirst({
        where: eq(cars.id, carId),
        columns: { isElectric: true },
      });
      if (!car) {
        return { valid: false, message: "Car not found" };
      }

      const promotion = await this.getByCode(code);
      if (!promotion) {
        return { valid: false, message: "Invalid code" };
      }

      if (!isPromotionValidForCar(promotion, car.isElectric)) {
        return { valid: false, message: "Invalid or expired code" };
      }

      const discount = Number(promotion.discountPercentage);
      return {
        valid: true,
        discount,
        promotionId: promotion.id,
        message: `Valid! ${discount}% discount applied.`,
      };
    } catch (error) {
      this.logger.error("Error validating promotion code", {
        carId,
        error: error instanceof Error ? error.message : String(error),
      });
      return { valid: false, message: "Error validating code" };
    }
  }

  async incrementUsage(id: number, tx?: Transaction): Promise<void> {
    const executor = tx ?? this.databaseService.db;
    await executor
      .update(promotions)
      .set({ currentUses: sql`${promotions.currentUses} + 1`, updatedAt: new Date() })
      .where(eq(promotions.id, id));
  }

  private async ensureCodeAvailable(code: string, excludeId?: number): Promise<void> {
    const existing = await this.getByCode(code);
    if (existing && existing.id !== excludeId) {
      throw new PromotionCodeTakenException(code);
    }
  }

  private toRow(body: PromotionBodyDto): NewPromotion {
    if (body.endDate <= body.startDate) {
      throw new PromotionInvalidWindowException();
    }

    return {
      name: body.name,
      description: body.description ?? null,
      code: normalizePromotionCode(body.code),
      discountPercentage: toMoney(body.discountPercentage),
      maxDiscountAmount:
        body.maxDiscountAmount === undefined ? null : toMoney(body.maxDiscountAmount),
      startDate: body.startDate,
      endDate: body.endDate,
      isActive: body.isActive,
      isEVOnly: body.isEVOnly,
      maxUses: body.maxUses ?? null,
    };
  }
}
