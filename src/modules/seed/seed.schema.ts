import { z } from "zod";
import { FUEL_TYPES } from "../database/enums";

const decimalString = z.string().regex(/^\d+(\.\d{1,2})?$/);

export const seedDataSchema = z.object({
  categories: z.array(
    z.object({
      name: z.string().min(1),
      description: z.string().optional(),
    }),
  ),
  cars: z.array(
    z.object({
      make: z.string().min(1),
      model: z.string().min(1),
      year: z.number().int(),
      licensePlate: z.string().min(1),
      color: z.string().min(1),
      dailyRate: decimalString,
      fuelType: z.enum(FUEL_TYPES),
      batteryCapacity: z.number().int().optional(),
      range: z.number().int().optional(),
      chargingTime: z.number().int().optional(),
      description: z.string().optional(),
      state: z.string().min(1),
      city: z.string().optional(),
      category: z.string().min(1),
    }),
  ),
  subscriptions: z.array(
    z.object({
      name: z.string().min(1),
      description: z.string().optional(),
      monthlyPrice: decimalString,
      discountPercentage: decimalString,
      maxRentalsPerMonth: z.number().int().positive(),
      maxDaysPerRental: z.number().int().positive(),
      includesEVPriority: z.boolean(),
    }),
  ),
  promotions: z.array(
    z.object({
      name: z.string().min(1),
      description: z.string().optional(),
      code: z.string().min(1),
      discountPercentage: decimalString,
      maxDiscountAmount: decimalString.optional(),
      startOffsetDays: z.number().int(),
      endOffsetDays: z.number().int(),
      isEVOnly: z.boolean(),
      maxUses: z.number().int().positive().nullable(),
    }),
  ),
});

export type SeedData = z.infer<typeof seedDataSchema>;
