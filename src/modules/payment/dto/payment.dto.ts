import { z } from "zod";
import { PAYMENT_STATUSES } from "../../database/enums";
import { PAYMENT_METHODS } from "../payment.const";

export const createPaymentSchema = z.object({
  appointmentId: z.coerce.number().int().positive(),
  paymentMethod: z.enum(PAYMENT_METHODS).default("Credit Card"),
  transactionId: z
    .string()
    .trim()
    .max(100)
    .optional()
    .transform((value) => (value ? value : undefined)),
});

export type CreatePaymentDto = z.infer<typeof createPaymentSchema>;

export const updatePaymentStatusSchema = z.object({
  status: z.enum(PAYMENT_STATUSES),
});

export type UpdatePaymentStatusDto = z.infer<typeof updatePaymentStatusSchema>;
