import type { AppointmentStatus } from "../database/enums";
import type { Appointment, Car, Payment, Promotion, Subscription } from "../database/schema";

export interface AppointmentInput {
  carId: number;
  userId?: string | null;
  customerName?: string | null;
  customerEmail?: string | null;
  customerPhone?: string | null;
  startDate: Date;
  endDate: Date;
  specialRequests?: string | null;
  status?: AppointmentStatus;
  promotionId?: number | null;
  subscriptionId?: number | null;
}

export type AppointmentWithCar = Appointment & { car: Car };

export type AppointmentWithRelations = AppointmentWithCar & {
  promotion: Promotion | null;
  subscription: Subscription | null;
};

export type AppointmentWithPayment = AppointmentWithRelations & { payment: Payment | null };

export const MY_APPOINTMENT_VIEWS = ["Active", "History", "All"] as const;
export type MyAppointmentsView = (typeof MY_APPOINTMENT_VIEWS)[number];

export interface PriceQuote {
  carId: number;
  days: number;
  basePrice: string;
  subscriptionDiscount: string;
  promotionDiscount: string;
  discountAmount: string;
  totalPrice: string;
}

export interface BookingCreatedResponse {
  appointment: Appointment;
  message: string;
}

export interface BookingCancelledResponse {
  appointment: Appointment;
  freeCancellation: boolean;
  message: string;
}

export interface FormattedSlot {
  start: string;
  end: string;
}
