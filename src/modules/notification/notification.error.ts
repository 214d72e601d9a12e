import { HttpStatus } from "@nestjs/common";
import { AppException } from "../../common/errors/app.exception";

export const NotificationErrorCode = {
  NOTIFICATION_NOT_FOUND: "NOTIFICATION_NOT_FOUND",
  NOTIFICATION_FETCH_FAILED: "NOTIFICATION_FETCH_FAILED",
} as const;

export class NotificationException extends AppException {
  // Intentionally empty: inherits AppException constructor.
}

export class NotificationNotFoundException extends NotificationException {
  constructor() {
    super(NotificationErrorCode.NOTIFICATION_NOT_FOUND, "Notification not found", HttpStatus.NOT_FOUND, {
      title: "Notification Not Found",
    });
  }
}

export class NotificationFetchFailedException extends NotificationException {
  constructor() {
    super(
      NotificationErrorCode.NOTIFICATION_FETCH_FAILED,
      "An unexpected error occurred while loading notifications",
      HttpStatus.INTERNAL_SERVER_ERROR,
      { title: "Notification Fetch Failed" },
    );
  }
}
