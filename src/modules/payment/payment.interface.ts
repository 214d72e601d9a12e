import type { InAppNotificationInput } from "../notification/notification.interface";
import type { Appointment, Car, Payment } from "../database/schema";
import type { AppointmentStatus } from "../database/enums";

export type PaymentWithAppointment = Payment & { appointment: Appointment & { car: Car } };

export interface PaymentActionResult {
  payment: Payment;
  message: string;
}

/** Booking status change caused by a payment update, with the customer notice. */
export interface BookingTransition {
  status: AppointmentStatus;
  notification: Omit<InAppNotificationInput, "userId">;
}
