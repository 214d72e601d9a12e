import { z } from "zod";

/** Blank form fields clear the stored value. */
const optionalText = (max: number) =>
  z
    .string()
    .trim()
    .max(max)
    .optional()
    .transform((value) => value || null);

export const emailAvailabilityQuerySchema = z.object({
  email: z.string().trim().default(""),
});

export type EmailAvailabilityQueryDto = z.infer<typeof emailAvailabilityQuerySchema>;

export const phoneAvailabilityQuerySchema = z.object({
  phoneNumber: z.string().trim().default(""),
});

export type PhoneAvailabilityQueryDto = z.infer<typeof phoneAvailabilityQuerySchema>;

export const nameAvailabilityQuerySchema = z.object({
  firstName: z.string().trim().default(""),
  lastName: z.string().trim().default(""),
});

export type NameAvailabilityQueryDto = z.infer<typeof nameAvailabilityQuerySchema>;

export const updateProfileSchema = z.object({
  firstName: z.string().trim().min(1, "First name is required").max(100),
  lastName: z.string().trim().min(1, "Last name is required").max(100),
  phoneNumber: optionalText(20),
  dateOfBirth: z
    .preprocess((value) => (value === "" ? undefined : value), z.coerce.date().optional())
    .transform((value) => value ?? null),
  address: optionalText(500),
  city: optionalText(100),
  state: optionalText(50),
  zipCode: optionalText(20),
  licenseNumber: optionalText(50),
});

export type UpdateProfileDto = z.infer<typeof updateProfileSchema>;
