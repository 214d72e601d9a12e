import { z } from "zod";

export const promotionBodySchema = z.object({
  name: z.string().trim().min(1, "Promotion name is required").max(100),
  description: z.string().trim().max(500).optional(),
  code: z.string().trim().min(1, "Promotion code is required").max(50),
  discountPercentage: z.coerce.number().min(0).max(100),
  maxDiscountAmount: z.coerce.number().min(0).optional(),
  startDate: z.coerce.date(),
  endDate: z.coerce.date(),
  isActive: z.boolean().default(true),
  isEVOnly: z.boolean().default(false),
  maxUses: z.coerce.number().int().min(1).optional(),
});

export type PromotionBodyDto = z.infer<typeof promotionBodySchema>;

export const validatePromotionSchema = z.object({
  code: z.string().trim().default(""),
  carId: z.coerce.number().int(),
});

export type ValidatePromotionDto = z.infer<typeof validatePromotionSchema>;
