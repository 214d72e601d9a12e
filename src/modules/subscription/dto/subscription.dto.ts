import { z } from "zod";

export const subscriptionBodySchema = z.object({
  name: z.string().trim().min(1, "Plan name is required").max(100),
  description: z.string().trim().max(500).optional(),
  monthlyPrice: z.coerce.number().min(0),
  discountPercentage: z.coerce.number().min(0).max(100),
  maxRentalsPerMonth: z.coerce.number().int().min(1),
  maxDaysPerRental: z.coerce.number().int().min(1),
  includesEVPriority: z.boolean().default(false),
  isActive: z.boolean().default(true),
});

export type SubscriptionBodyDto = z.infer<typeof subscriptionBodySchema>;
