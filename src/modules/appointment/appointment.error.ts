import { HttpStatus } from "@nestjs/common";
import { AppException } from "../../common/errors/app.exception";
import type { FieldError } from "../../common/errors/problem-details.interface";

export const AppointmentErrorCode = {
  BOOKING_VALIDATION_ERROR: "BOOKING_VALIDATION_ERROR",
  APPOINTMENT_NOT_FOUND: "APPOINTMENT_NOT_FOUND",
  APPOINTMENT_ACCESS_DENIED: "APPOINTMENT_ACCESS_DENIED",
  APPOINTMENT_ALREADY_CANCELLED: "APPOINTMENT_ALREADY_CANCELLED",
  APPOINTMENT_ALREADY_COMPLETED: "APPOINTMENT_ALREADY_COMPLETED",
  CAR_NOT_FOUND: "CAR_NOT_FOUND",
  CAR_UNAVAILABLE: "CAR_UNAVAILABLE",
  BOOKING_CONFLICT: "BOOKING_CONFLICT",
  INVALID_PROMOTION_CODE: "INVALID_PROMOTION_CODE",
  APPOINTMENT_RATE_LIMIT_EXCEEDED: "APPOINTMENT_RATE_LIMIT_EXCEEDED",
  APPOINTMENT_FETCH_FAILED: "APPOINTMENT_FETCH_FAILED",
} as const;

export class AppointmentException extends AppException {
  // Intentionally empty: inherits AppException constructor.
}

/**
 * Field errors from the booking form. The detail repeats the first message so
 * clients that only show `detail` still say something useful.
 */
export class BookingValidationException extends AppointmentException {
  constructor(errors: FieldError[]) {
    super(
      AppointmentErrorCode.BOOKING_VALIDATION_ERROR,
      errors[0]?.message ?? "One or more validation errors occurred",
      HttpStatus.BAD_REQUEST,
      { title: "Invalid Booking", errors },
    );
  }
}

export class AppointmentNotFoundException extends AppointmentException {
  constructor() {
    super(AppointmentErrorCode.APPOINTMENT_NOT_FOUND, "Booking not found.", HttpStatus.NOT_FOUND, {
      title: "Booking Not Found",
    });
  }
}

export class AppointmentAccessDeniedException extends AppointmentException {
  constructor(action: "view" | "cancel") {
    super(
      AppointmentErrorCode.APPOINTMENT_ACCESS_DENIED,
      `You don't have permission to ${action} this booking.`,
      HttpStatus.FORBIDDEN,
      { title: "Access Denied" },
    );
  }
}

export class AppointmentAlreadyCancelledException extends AppointmentException {
  constructor() {
    super(
      AppointmentErrorCode.APPOINTMENT_ALREADY_CANCELLED,
      "This booking is already cancelled.",
      HttpStatus.CONFLICT,
      { title: "Booking Already Cancelled" },
    );
  }
}

export class AppointmentAlreadyCompletedException extends AppointmentException {
  constructor() {
    super(
      AppointmentErrorCode.APPOINTMENT_ALREADY_COMPLETED,
      "Cannot cancel a completed booking.",
      HttpStatus.CONFLICT,
      { title: "Booking Completed" },
    );
  }
}

export class CarNotFoundException extends AppointmentException {
  constructor() {
    super(
      AppointmentErrorCode.CAR_NOT_FOUND,
      "The selected vehicle does not exist. Please select another vehicle.",
      HttpStatus.NOT_FOUND,
      { title: "Vehicle Not Found" },
    );
  }
}

export class CarUnavailableException extends AppointmentException {
  constructor(carName: string) {
    super(
      AppointmentErrorCode.CAR_UNAVAILABLE,
      `The vehicle '${carName}' is currently unavailable. Please select another vehicle.`,
      HttpStatus.CONFLICT,
      { title: "Vehicle Unavailable" },
    );
  }
}

export class BookingConflictException extends AppointmentException {
  constructor(detail: string, conflict?: { startDate: Date; endDate: Date }) {
    super(AppointmentErrorCode.BOOKING_CONFLICT, detail, HttpStatus.CONFLICT, {
      title: "Dates Unavailable",
      ...(conflict && {
        details: {
          conflictStart: conflict.startDate.toISOString(),
          conflictEnd: conflict.endDate.toISOString(),
        },
      }),
    });
  }
}

export class InvalidPromotionCodeException extends AppointmentException {
  constructor(code: string) {
    super(
      AppointmentErrorCode.INVALID_PROMOTION_CODE,
      `The promotion code '${code}' is invalid or expired. Please check and try again.`,
      HttpStatus.BAD_REQUEST,
      { title: "Invalid Promotion Code" },
    );
  }
}

export class AppointmentRateLimitExceededException extends AppointmentException {
  constructor(retryAfter: number) {
    super(
      AppointmentErrorCode.APPOINTMENT_RATE_LIMIT_EXCEEDED,
      "Too many booking attempts. Please wait before trying again.",
      HttpStatus.TOO_MANY_REQUESTS,
      { title: "Too Many Requests", details: { retryAfter } },
    );
  }
}

export class AppointmentFetchFailedException extends AppointmentException {
  constructor() {
    super(
      AppointmentErrorCode.APPOINTMENT_FETCH_FAILED,
      "An error occurred while processing your booking. Please try again later.",
      HttpStatus.INTERNAL_SERVER_ERROR,
      { title: "Booking Request Failed" },
    );
  }
}
