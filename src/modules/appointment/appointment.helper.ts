import { subMinutes } from "date-fns";
import type { FieldError } from "../../common/errors/problem-details.interface";
import {
  BOOKING_PAST_TOLERANCE_MINUTES,
  FREE_CANCELLATION_HOURS,
  MIN_RENTAL_HOURS,
} from "../../config/constants";
import { formatBookingDate } from "../../shared/helper";
import { PaymentStatus } from "../database/enums";
import type { Appointment } from "../database/schema";
import { hoursBetween } from "./appointment-pricing.helper";

/**
 * Pickup/return checks of the booking form. Pickup and return may lie up to a
 * few minutes in the past to absorb clock drift between browser and server.
 */
export function validateBookingDates(
  startDate: Date | undefined,
  endDate: Date | undefined,
  now = new Date(),
): FieldError[] {
  const errors: FieldError[] = [];

  if (!startDate || !endDate) {
    if (!startDate) errors.push({ field: "startDate", message: "Pickup date is required." });
    if (!endDate) errors.push({ field: "endDate", message: "Return date is required." });
    return errors;
  }

  if (endDate <= startDate) {
    errors.push({ field: "endDate", message: "Return date must be after pickup date." });
  }

  const earliest = subMinutes(now, BOOKING_PAST_TOLERANCE_MINUTES);
  if (startDate < earliest) {
    errors.push({ field: "startDate", message: "Pickup date cannot be in the past." });
  }
  if (endDate < earliest) {
    errors.push({ field: "endDate", message: "Return date cannot be in the past." });
  }

  if (hoursBetween(startDate, endDate) < MIN_RENTAL_HOURS) {
    errors.push({ field: "endDate", message: "Rental duration must be at least 1 hour." });
  }

  return errors;
}

export function buildConflictMessage(
  carName: string,
  conflict?: Pick<Appointment, "startDate" | "endDate">,
): string {
  if (!conflict) {
    return `${carName} is not available for the chosen dates. Please select different dates or choose another vehicle.`;
  }

  return (
    `${carName} is not available for the selected dates. ` +
    `It's already booked from ${formatBookingDate(conflict.startDate)} to ${formatBookingDate(conflict.endDate)}. ` +
    "Please choose different dates or select another vehicle."
  );
}

/** Free cancellation while pickup is at least 48 hours away. */
export function isFreeCancellation(startDate: Date, now = new Date()): boolean {
  return hoursBetween(now, startDate) >= FREE_CANCELLATION_HOURS;
}

export function refundStatusFor(freeCancellation: boolean): PaymentStatus {
  return freeCancellation ? PaymentStatus.REFUNDED : PaymentStatus.PARTIALLY_REFUNDED;
}
