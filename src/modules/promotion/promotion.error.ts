import { HttpStatus } from "@nestjs/common";
import { AppException } from "../../common/errors/app.exception";

export const PromotionErrorCode = {
  PROMOTION_NOT_FOUND: "PROMOTION_NOT_FOUND",
  PROMOTION_CODE_TAKEN: "PROMOTION_CODE_TAKEN",
  PROMOTION_INVALID_WINDOW: "PROMOTION_INVALID_WINDOW",
  PROMOTION_FETCH_FAILED: "PROMOTION_FETCH_FAILED",
} as const;

export class PromotionException extends AppException {
  // Intentionally empty: inherits AppException constructor.
}

export class PromotionNotFoundException extends PromotionException {
  constructor() {
    super(PromotionErrorCode.PROMOTION_NOT_FOUND, "Promotion not found.", HttpStatus.NOT_FOUND, {
      title: "Promotion Not Found",
    });
  }
}

export class PromotionCodeTakenException extends PromotionException {
  constructor(code: string) {
    super(
      PromotionErrorCode.PROMOTION_CODE_TAKEN,
      `A promotion with the code '${code}' already exists.`,
      HttpStatus.CONFLICT,
      { title: "Promotion Code Taken" },
    );
  }
}

export class PromotionInvalidWindowException extends PromotionException {
  constructor() {
    super(
      PromotionErrorCode.PROMOTION_INVALID_WINDOW,
      "End date must be after start date.",
      HttpStatus.BAD_REQUEST,
      { title: "Invalid Promotion Window" },
    );
  }
}

export class PromotionFetchFailedException extends PromotionException {
  constructor() {
    super(
      PromotionErrorCode.PROMOTION_FETCH_FAILED,
      "An unexpected error occurred while processing promotions.",
      HttpStatus.INTERNAL_SERVER_ERROR,
      { title: "Promotion Request Failed" },
    );
  }
}
