import { UTCDate } from "@date-fns/utc";
import { format } from "date-fns";
import { eq, gt, lt, ne, type SQL, type SQLWrapper, sql } from "drizzle-orm";
import { AppointmentStatus } from "../database/enums";
import { appointments } from "../database/schema";

export interface BookedRange {
  startDate: Date;
  endDate: Date;
}

export interface TimeSlot {
  start: Date;
  end: Date;
}

export const SLOT_DATE_FORMAT = "yyyy-MM-dd'T'HH:mm";

/**
 * Appointments of `carId` that block [startDate, endDate). Overlap is
 * half-open, so back-to-back bookings do not conflict, and cancelled
 * bookings never block. `carId` may be a column for correlated subqueries.
 */
export function blockingAppointmentCondition(
  carId: number | SQLWrapper,
  startDate: Date,
  endDate: Date,
  excludeAppointmentId?: number,
): SQL {
  const conditions = [
    eq(appointments.carId, carId),
    ne(appointments.status, AppointmentStatus.CANCELLED),
    lt(appointments.startDate, endDate),
    gt(appointments.endDate, startDate),
  ];
  if (excludeAppointmentId !== undefined) {
    conditions.push(ne(appointments.id, excludeAppointmentId));
  }
  return sql`(${sql.join(conditions, sql` and `)})`;
}

/**
 * Free gaps inside [windowStart, windowEnd] around the given bookings. Bookings
 * may overlap each other and spill over either edge of the window. An empty
 * or inverted window has no slots.
 */
export function computeAvailableSlots(
  windowStart: Date,
  windowEnd: Date,
  bookings: BookedRange[],
): TimeSlot[] {
  if (windowStart >= windowEnd) {
    return [];
  }

  if (bookings.length === 0) {
    return [{ start: windowStart, end: windowEnd }];
  }

  const sorted = [...bookings].sort((a, b) => a.startDate.getTime() - b.startDate.getTime());
  const slots: TimeSlot[] = [];
  let cursor = windowStart;

  for (const booking of sorted) {
    if (cursor < booking.startDate) {
      slots.push({ start: cursor, end: booking.startDate });
    }
    if (booking.endDate > cursor) {
      cursor = booking.endDate;
    }
  }

  if (cursor < windowEnd) {
    slots.push({ start: cursor, end: windowEnd });
  }

  return slots;
}

export function formatSlot(slot: TimeSlot): { start: string; end: string } {
  return {
    start: format(new UTCDate(slot.start), SLOT_DATE_FORMAT),
    end: format(new UTCDate(slot.end), SLOT_DATE_FORMAT),
  };
}
