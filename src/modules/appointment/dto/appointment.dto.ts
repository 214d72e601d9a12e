import { z } from "zod";
import { APPOINTMENT_STATUSES } from "../../database/enums";
import { MY_APPOINTMENT_VIEWS } from "../appointment.interface";

const optionalId = z.coerce.number().int().positive().optional();

/**
 * Booking form. Everything is optional here so that missing values surface as
 * the booking form's own messages rather than generic schema errors.
 */
export const createBookingSchema = z.object({
  carId: z.coerce.number().int().optional(),
  startDate: z.coerce.date().optional(),
  endDate: z.coerce.date().optional(),
  specialRequests: z.string().trim().max(500).optional(),
  subscriptionId: optionalId,
  promotionCode: z.string().trim().optional(),
  promotionId: optionalId,
});

export type CreateBookingDto = z.infer<typeof createBookingSchema>;

export const myAppointmentsQuerySchema = z.object({
  view: z.enum(MY_APPOINTMENT_VIEWS).default("Active"),
});

export type MyAppointmentsQueryDto = z.infer<typeof myAppointmentsQuerySchema>;

export const availableSlotsQuerySchema = z
  .object({
    carId: z.coerce.number().int().default(0),
    startDate: z.coerce.date().optional(),
    endDate: z.coerce.date().optional(),
  })
  .refine((value) => !value.startDate || !value.endDate || value.endDate > value.startDate, {
    message: "End date must be after start date",
    path: ["endDate"],
  });

export type AvailableSlotsQueryDto = z.infer<typeof availableSlotsQuerySchema>;

export const calculatePriceQuerySchema = z
  .object({
    carId: z.coerce.number().int().positive(),
    startDate: z.coerce.date(),
    endDate: z.coerce.date(),
    subscriptionId: optionalId,
    promotionId: optionalId,
  })
  .refine((value) => value.endDate > value.startDate, {
    message: "Return date must be after pickup date.",
    path: ["endDate"],
  });

export type CalculatePriceQueryDto = z.infer<typeof calculatePriceQuerySchema>;

export const dateRangeQuerySchema = z
  .object({
    startDate: z.coerce.date(),
    endDate: z.coerce.date(),
  })
  .refine((value) => value.endDate >= value.startDate, {
    message: "End date must be on or after start date",
    path: ["endDate"],
  });

export type DateRangeQueryDto = z.infer<typeof dateRangeQuerySchema>;

/** Back-office create/edit of an appointment. */
export const appointmentBodySchema = z
  .object({
    carId: z.coerce.number().int().positive(),
    userId: z.string().min(1).optional(),
    customerName: z.string().trim().max(100).optional(),
    customerEmail: z.email().max(100).optional(),
    customerPhone: z.string().trim().max(20).optional(),
    startDate: z.coerce.date(),
    endDate: z.coerce.date(),
    specialRequests: z.string().trim().max(500).optional(),
    status: z.enum(APPOINTMENT_STATUSES).default("Pending"),
    promotionId: optionalId,
    subscriptionId: optionalId,
  })
  .refine((value) => value.endDate > value.startDate, {
    message: "Return date must be after pickup date.",
    path: ["endDate"],
  });

export type AppointmentBodyDto = z.infer<typeof appointmentBodySchema>;
