import { z } from "zod";

export const revenueRangeQuerySchema = z
  .object({
    startDate: z.coerce.date().optional(),
    endDate: z.coerce.date().optional(),
  })
  .refine((value) => !value.startDate || !value.endDate || value.endDate >= value.startDate, {
    message: "End date must be on or after start date",
    path: ["endDate"],
  });

export type RevenueRangeQueryDto = z.infer<typeof revenueRangeQuerySchema>;
