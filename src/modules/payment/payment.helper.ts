import { AppointmentStatus, NotificationType, PaymentStatus } from "../database/enums";
import type { Appointment } from "../database/schema";
import type { BookingTransition } from "./payment.interface";

/**
 * How a staff payment update moves the booking along:
 *
 * - Completed: Pending -> Confirmed; Confirmed with the rental over -> Completed
 * - Failed or Refunded: Confirmed -> Pending
 *
 * Any other combination leaves the booking alone.
 */
export function resolveBookingTransition(
  paymentStatus: PaymentStatus,
  appointment: Pick<Appointment, "status" | "endDate">,
  carName: string,
  now = new Date(),
): BookingTransition | null {
  if (paymentStatus === PaymentStatus.COMPLETED) {
    if (appointment.status === AppointmentStatus.PENDING) {
      return {
        status: AppointmentStatus.CONFIRMED,
        notification: {
          title: "Booking Confirmed",
          message: `Your booking for ${carName} has been confirmed. Payment received.`,
          type: NotificationType.SUCCESS,
        },
      };
    }
    if (appointment.status === AppointmentStatus.CONFIRMED && appointment.endDate < now) {
      return {
        status: AppointmentStatus.COMPLETED,
        notification: {
          title: "Booking Completed",
          message: `Your booking for ${carName} has been completed. Share your experience by leaving a review!`,
          type: NotificationType.SUCCESS,
        },
      };
    }
    return null;
  }

  if (
    (paymentStatus === PaymentStatus.FAILED || paymentStatus === PaymentStatus.REFUNDED) &&
    appointment.status === AppointmentStatus.CONFIRMED
  ) {
    return {
      status: AppointmentStatus.PENDING,
      notification: {
        title: "Payment Issue",
        message: `There was an issue with your payment for booking ${carName}. Please update your payment method.`,
        type: NotificationType.WARNING,
      },
    };
  }

  return null;
}
