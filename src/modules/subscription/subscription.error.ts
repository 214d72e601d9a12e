import { HttpStatus } from "@nestjs/common";
import { AppException } from "../../common/errors/app.exception";

export const SubscriptionErrorCode = {
  SUBSCRIPTION_NOT_FOUND: "SUBSCRIPTION_NOT_FOUND",
  SUBSCRIPTION_FETCH_FAILED: "SUBSCRIPTION_FETCH_FAILED",
} as const;

export class SubscriptionException extends AppException {
  // Intentionally empty: inherits AppException constructor.
}

export class SubscriptionNotFoundException extends SubscriptionException {
  constructor() {
    super(
      SubscriptionErrorCode.SUBSCRIPTION_NOT_FOUND,
      "Subscription plan not found.",
      HttpStatus.NOT_FOUND,
      { title: "Subscription Not Found" },
    );
  }
}

export class SubscriptionFetchFailedException extends SubscriptionException {
  constructor() {
    super(
      SubscriptionErrorCode.SUBSCRIPTION_FETCH_FAILED,
      "An unexpected error occurred while processing subscription plans.",
      HttpStatus.INTERNAL_SERVER_ERROR,
      { title: "Subscription Request Failed" },
    );
  }
}
