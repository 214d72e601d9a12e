export const ROLES = ["Customer", "Staff", "Manager"] as const;
export type RoleName = (typeof ROLES)[number];

export const APPOINTMENT_STATUSES = ["Pending", "Confirmed", "Completed", "Cancelled"] as const;
export type AppointmentStatus = (typeof APPOINTMENT_STATUSES)[number];

export const AppointmentStatus = {
  PENDING: "Pending",
  CONFIRMED: "Confirmed",
  COMPLETED: "Completed",
  CANCELLED: "Cancelled",
} as const satisfies Record<string, AppointmentStatus>;

export const PAYMENT_STATUSES = [
  "Pending",
  "Completed",
  "Failed",
  "Refunded",
  "PartiallyRefunded",
] as const;
export type PaymentStatus = (typeof PAYMENT_STATUSES)[number];

export const PaymentStatus = {
  PENDING: "Pending",
  COMPLETED: "Completed",
  FAILED: "Failed",
  REFUNDED: "Refunded",
  PARTIALLY_REFUNDED: "PartiallyRefunded",
} as const satisfies Record<string, PaymentStatus>;

export const NOTIFICATION_TYPES = ["Info", "Success", "Warning", "Error", "Danger"] as const;
export type NotificationType = (typeof NOTIFICATION_TYPES)[number];

export const NotificationType = {
  INFO: "Info",
  SUCCESS: "Success",
  WARNING: "Warning",
  ERROR: "Error",
  DANGER: "Danger",
} as const satisfies Record<string, NotificationType>;

export const FUEL_TYPES = ["Gas", "Electric", "Hybrid"] as const;
export type FuelType = (typeof FUEL_TYPES)[number];
