import { z } from "zod";
import { APPOINTMENT_STATUSES } from "../../database/enums";
import { ORDER_STATUS_FILTERS, USER_ROLE_FILTERS, USER_STATUS_FILTERS } from "../staff.const";

export const orderListQuerySchema = z.object({
  status: z.enum(ORDER_STATUS_FILTERS).catch("All"),
  searchTerm: z.string().trim().default(""),
});

export type OrderListQueryDto = z.infer<typeof orderListQuerySchema>;

export const updateOrderStatusSchema = z.object({
  status: z.enum(APPOINTMENT_STATUSES),
});

export type UpdateOrderStatusDto = z.infer<typeof updateOrderStatusSchema>;

// An empty selection is reported by the service rather than as a schema error.
export const batchUpdateOrderStatusSchema = z.object({
  orderIds: z.array(z.coerce.number().int().positive()).default([]),
  status: z.enum(APPOINTMENT_STATUSES),
});

export type BatchUpdateOrderStatusDto = z.infer<typeof batchUpdateOrderStatusSchema>;

export const staffReportQuerySchema = z
  .object({
    startDate: z.coerce.date().optional(),
    endDate: z.coerce.date().optional(),
  })
  .refine((value) => !value.startDate || !value.endDate || value.endDate >= value.startDate, {
    message: "End date must be on or after start date",
    path: ["endDate"],
  });

export type StaffReportQueryDto = z.infer<typeof staffReportQuerySchema>;

export const calendarQuerySchema = z.object({
  start: z.coerce.date().optional(),
  end: z.coerce.date().optional(),
});

export type CalendarQueryDto = z.infer<typeof calendarQuerySchema>;

export const userListQuerySchema = z.object({
  searchTerm: z.string().trim().default(""),
  statusFilter: z.enum(USER_STATUS_FILTERS).catch("All"),
  roleFilter: z.enum(USER_ROLE_FILTERS).catch("All"),
});

export type UserListQueryDto = z.infer<typeof userListQuerySchema>;

export const userIdParamSchema = z.string().trim().min(1);
