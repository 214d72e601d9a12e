import { HttpStatus } from "@nestjs/common";
import { AppException } from "../../common/errors/app.exception";

export const AnalyticsErrorCode = {
  ANALYTICS_FETCH_FAILED: "ANALYTICS_FETCH_FAILED",
} as const;

export class AnalyticsException extends AppException {
  // Intentionally empty: inherits AppException constructor.
}

export class AnalyticsFetchFailedException extends AnalyticsException {
  constructor() {
    super(
      AnalyticsErrorCode.ANALYTICS_FETCH_FAILED,
      "Unable to load analytics data. Please try again later.",
      HttpStatus.INTERNAL_SERVER_ERROR,
      { title: "Analytics Fetch Failed" },
    );
  }
}
