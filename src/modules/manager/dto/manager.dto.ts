import { z } from "zod";
import { PASSWORD_MIN_LENGTH } from "../../auth/auth.config";

export const createStaffSchema = z.object({
  email: z.email().max(100),
  password: z.string().min(PASSWORD_MIN_LENGTH).max(100),
  firstName: z.string().trim().min(1).max(100),
  lastName: z.string().trim().min(1).max(100),
  phoneNumber: z
    .string()
    .trim()
    .max(20)
    .optional()
    .transform((value) => value || undefined),
});

export type CreateStaffDto = z.infer<typeof createStaffSchema>;
