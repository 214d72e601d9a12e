import { HttpStatus } from "@nestjs/common";
import { AppException } from "../../common/errors/app.exception";

export const PaymentErrorCode = {
  PAYMENT_NOT_FOUND: "PAYMENT_NOT_FOUND",
  PAYMENT_ACCESS_DENIED: "PAYMENT_ACCESS_DENIED",
  PAYMENT_APPOINTMENT_NOT_FOUND: "PAYMENT_APPOINTMENT_NOT_FOUND",
  PAYMENT_ALREADY_COMPLETED: "PAYMENT_ALREADY_COMPLETED",
  PAYMENT_FETCH_FAILED: "PAYMENT_FETCH_FAILED",
} as const;

export class PaymentException extends AppException {
  // Intentionally empty: inherits AppException constructor.
}

export class PaymentNotFoundException extends PaymentException {
  constructor() {
    super(PaymentErrorCode.PAYMENT_NOT_FOUND, "Payment not found.", HttpStatus.NOT_FOUND, {
      title: "Payment Not Found",
    });
  }
}

export class PaymentAccessDeniedException extends PaymentException {
  constructor() {
    super(
      PaymentErrorCode.PAYMENT_ACCESS_DENIED,
      "You don't have permission to access this payment.",
      HttpStatus.FORBIDDEN,
      { title: "Payment Access Denied" },
    );
  }
}

export class PaymentAppointmentNotFoundException extends PaymentException {
  constructor() {
    super(PaymentErrorCode.PAYMENT_APPOINTMENT_NOT_FOUND, "Booking not found.", HttpStatus.NOT_FOUND, {
      title: "Booking Not Found",
    });
  }
}

export class PaymentAlreadyCompletedException extends PaymentException {
  constructor(paymentId: number) {
    super(
      PaymentErrorCode.PAYMENT_ALREADY_COMPLETED,
      "Payment already completed for this appointment.",
      HttpStatus.CONFLICT,
      { title: "Payment Already Completed", details: { paymentId } },
    );
  }
}

export class PaymentFetchFailedException extends PaymentException {
  constructor() {
    super(
      PaymentErrorCode.PAYMENT_FETCH_FAILED,
      "Unable to load payments. Please try again later.",
      HttpStatus.INTERNAL_SERVER_ERROR,
      { title: "Payment Fetch Failed" },
    );
  }
}
