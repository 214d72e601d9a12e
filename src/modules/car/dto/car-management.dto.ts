import { z } from "zod";
import { DEFAULT_CAR_STATE } from "../../../config/constants";
import { FUEL_TYPES } from "../../database/enums";
import { VEHICLE_STATUS_FILTERS } from "../car.const";

/** Multipart forms send booleans as "true"/"false". */
const formBoolean = z
  .union([z.boolean(), z.enum(["true", "false"])])
  .transform((value) => (typeof value === "boolean" ? value : value === "true"));

const optionalText = (max: number) =>
  z
    .string()
    .trim()
    .max(max)
    .optional()
    .transform((value) => (value ? value : undefined));

const optionalPositiveInt = z.preprocess(
  (value) => (value === "" ? undefined : value),
  z.coerce.number().int().min(0).optional(),
);

export const vehicleBodySchema = z.object({
  make: z.string().trim().min(1, "Make is required").max(100),
  model: z.string().trim().min(1, "Model is required").max(100),
  year: z.coerce.number().int().min(1900).max(2100),
  licensePlate: z.string().trim().min(1, "License plate is required").max(20),
  color: z.string().trim().min(1, "Color is required").max(50),
  dailyRate: z.coerce.number().min(0),
  fuelType: z.enum(FUEL_TYPES),
  description: optionalText(500),
  imageUrl: optionalText(200),
  isElectric: formBoolean.optional(),
  state: z.string().trim().min(1).max(50).default(DEFAULT_CAR_STATE),
  city: optionalText(100),
  locationAddress: optionalText(200),
  categoryId: z.preprocess(
    (value) => (value === "" ? undefined : value),
    z.coerce.number().int().positive().optional(),
  ),
  batteryCapacity: optionalPositiveInt,
  range: optionalPositiveInt,
  chargingTime: optionalPositiveInt,
});

export type VehicleBodyDto = z.infer<typeof vehicleBodySchema>;

export const vehicleListQuerySchema = z.object({
  searchTerm: optionalText(100),
  status: z.enum(VEHICLE_STATUS_FILTERS).catch("All"),
  state: optionalText(50),
});

export type VehicleListQueryDto = z.infer<typeof vehicleListQuerySchema>;
