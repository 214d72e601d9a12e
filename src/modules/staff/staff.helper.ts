import { UTCDate } from "@date-fns/utc";
import { format } from "date-fns";
import { averageOf, getCarDisplayName, sumMoney, toMoney } from "../../shared/helper";
import { AppointmentStatus, NotificationType } from "../database/enums";
import type { Appointment, Review } from "../database/schema";
import type { AppointmentWithCar } from "../appointment/appointment.interface";
import { REVENUE_STATUSES } from "../analytics/analytics.const";
import type { InAppNotificationInput } from "../notification/notification.interface";
import { CALENDAR_COLORS, CALENDAR_DATE_FORMAT } from "./staff.const";
import type { CalendarEvent, UserDetails } from "./staff.interface";

export function orderStatusNotification(
  status: AppointmentStatus,
  carName: string,
): Omit<InAppNotificationInput, "userId"> {
  const message =
    status === AppointmentStatus.COMPLETED
      ? `Your booking for ${carName} has been completed. Share your experience by leaving a review!`
      : `Your booking for ${carName} has been ${status.toLowerCase()}.`;

  let type: NotificationType = NotificationType.INFO;
  if (status === AppointmentStatus.CONFIRMED || status === AppointmentStatus.COMPLETED) {
    type = NotificationType.SUCCESS;
  } else if (status === AppointmentStatus.CANCELLED) {
    type = NotificationType.DANGER;
  }

  return { title: `Booking ${status}`, message, type };
}

export function toCalendarEvent(appointment: AppointmentWithCar): CalendarEvent {
  const carName = getCarDisplayName(appointment.car);

  return {
    id: appointment.id,
    title: appointment.customerName ? `${carName} - ${appointment.customerName}` : carName,
    start: format(new UTCDate(appointment.startDate), CALENDAR_DATE_FORMAT),
    end: format(new UTCDate(appointment.endDate), CALENDAR_DATE_FORMAT),
    status: appointment.status,
    color: CALENDAR_COLORS[appointment.status],
  };
}

type BookingSummary = Pick<
  UserDetails,
  | "totalSpent"
  | "totalBookings"
  | "completedBookings"
  | "pendingBookings"
  | "cancelledBookings"
  | "averageRating"
>;

export function summarizeCustomerActivity(
  bookings: Pick<Appointment, "status" | "totalPrice">[],
  reviews: Pick<Review, "rating">[],
): BookingSummary {
  const countOf = (status: AppointmentStatus) =>
    bookings.filter((booking) => booking.status === status).length;

  return {
    totalSpent: toMoney(
      sumMoney(
        bookings
          .filter((booking) => REVENUE_STATUSES.includes(booking.status))
          .map((booking) => booking.totalPrice),
      ),
    ),
    totalBookings: bookings.length,
    completedBookings: countOf(AppointmentStatus.COMPLETED),
    pendingBookings: countOf(AppointmentStatus.PENDING),
    cancelledBookings: countOf(AppointmentStatus.CANCELLED),
    averageRating: averageOf(reviews.map((review) => review.rating)),
  };
}
