import { HttpStatus } from "@nestjs/common";
import { AppException } from "../../common/errors/app.exception";

export const ReviewErrorCode = {
  REVIEW_CAR_NOT_FOUND: "REVIEW_CAR_NOT_FOUND",
  BOOKING_NOT_COMPLETED: "BOOKING_NOT_COMPLETED",
  REVIEW_OWNERSHIP_REQUIRED: "REVIEW_OWNERSHIP_REQUIRED",
  REVIEW_ALREADY_EXISTS: "REVIEW_ALREADY_EXISTS",
  REVIEW_NOT_FOUND: "REVIEW_NOT_FOUND",
  REVIEW_FETCH_FAILED: "REVIEW_FETCH_FAILED",
} as const;

export class ReviewException extends AppException {
  // Intentionally empty: inherits AppException constructor.
}

export class ReviewCarNotFoundException extends ReviewException {
  constructor() {
    super(ReviewErrorCode.REVIEW_CAR_NOT_FOUND, "Vehicle not found.", HttpStatus.NOT_FOUND, {
      title: "Vehicle Not Found",
    });
  }
}

export class ReviewBookingNotCompletedException extends ReviewException {
  constructor() {
    super(
      ReviewErrorCode.BOOKING_NOT_COMPLETED,
      "You can only review cars you have completed bookings for.",
      HttpStatus.BAD_REQUEST,
      { title: "Completed Booking Required" },
    );
  }
}

export class ReviewOwnershipRequiredException extends ReviewException {
  constructor(detail = "You can only change your own reviews.") {
    super(ReviewErrorCode.REVIEW_OWNERSHIP_REQUIRED, detail, HttpStatus.FORBIDDEN, {
      title: "Review Ownership Required",
    });
  }
}

export class ReviewAlreadyExistsException extends ReviewException {
  constructor(reviewId: number) {
    super(
      ReviewErrorCode.REVIEW_ALREADY_EXISTS,
      "You have already reviewed this car.",
      HttpStatus.CONFLICT,
      { title: "Review Already Exists", details: { reviewId } },
    );
  }
}

export class ReviewNotFoundException extends ReviewException {
  constructor() {
    super(ReviewErrorCode.REVIEW_NOT_FOUND, "Review not found.", HttpStatus.NOT_FOUND, {
      title: "Review Not Found",
    });
  }
}

export class ReviewFetchFailedException extends ReviewException {
  constructor() {
    super(
      ReviewErrorCode.REVIEW_FETCH_FAILED,
      "An unexpected error occurred while loading reviews",
      HttpStatus.INTERNAL_SERVER_ERROR,
      { title: "Review Fetch Failed" },
    );
  }
}
