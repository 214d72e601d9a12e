import { APPOINTMENT_STATUSES, type AppointmentStatus, ROLES } from "../database/enums";

export const ORDER_STATUS_FILTERS = ["All", ...APPOINTMENT_STATUSES] as const;
export const USER_STATUS_FILTERS = ["All", "Active", "Inactive"] as const;
export const USER_ROLE_FILTERS = ["All", ...ROLES] as const;

export const RECENT_BOOKINGS_LIMIT = 5;

export const CALENDAR_COLORS: Record<AppointmentStatus, string> = {
  Pending: "#ffc107",
  Confirmed: "#28a745",
  Completed: "#17a2b8",
  Cancelled: "#6c757d",
};

export const CALENDAR_DATE_FORMAT = "yyyy-MM-dd'T'HH:mm:ss";
