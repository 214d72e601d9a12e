import { z } from "zod";
import { CAR_SORT_OPTIONS, DEFAULT_CAR_SORT, FUEL_FILTERS } from "../car.const";

const optionalText = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

/** Unknown fuel or sort values fall back to the defaults. */
export const catalogQuerySchema = z.object({
  searchQuery: optionalText,
  fuelType: z.enum(FUEL_FILTERS).catch("All"),
  state: optionalText,
  categoryId: z.coerce.number().int().positive().optional(),
  minPrice: z.coerce.number().min(0).optional(),
  maxPrice: z.coerce.number().min(0).optional(),
  sortBy: z.enum(CAR_SORT_OPTIONS).catch(DEFAULT_CAR_SORT),
  startDate: z.coerce.date().optional(),
  endDate: z.coerce.date().optional(),
});

export type CatalogQueryDto = z.infer<typeof catalogQuerySchema>;

export const homeQuerySchema = catalogQuerySchema.pick({
  searchQuery: true,
  state: true,
  categoryId: true,
  startDate: true,
  endDate: true,
});

export type HomeQueryDto = z.infer<typeof homeQuerySchema>;

export const compareQuerySchema = z.object({
  id1: z.coerce.number().int().positive().optional(),
  id2: z.coerce.number().int().positive().optional(),
  id3: z.coerce.number().int().positive().optional(),
});

export type CompareQueryDto = z.infer<typeof compareQuerySchema>;
