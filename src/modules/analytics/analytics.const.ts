import { AppointmentStatus } from "../database/enums";

/** Bookings that count towards revenue. */
export const REVENUE_STATUSES: AppointmentStatus[] = [
  AppointmentStatus.CONFIRMED,
  AppointmentStatus.COMPLETED,
];

export const TOP_CARS_LIMIT = 5;
