import { HttpException, HttpStatus } from "@nestjs/common";
import type { FieldError } from "./problem-details.interface";

export interface AppExceptionOptions {
  title?: string;
  errors?: FieldError[];
  details?: Record<string, unknown>;
}

/**
 * Base exception for application errors.
 *
 * Renders an RFC 7807 problem document. Each module defines its own error
 * codes (e.g. AppointmentErrorCode, PaymentErrorCode) next to its domain logic.
 */
export class AppException extends HttpException {
  public readonly title: string;
  public readonly errors?: FieldError[];
  public readonly details?: Record<string, unknown>;

  constructor(
    public readonly errorCode: string,
    detail: string,
    status: HttpStatus,
    options: AppExceptionOptions = {},
  ) {
    const title = options.title ?? errorCode;
    super(
      {
        type: errorCode,
        title,
        status,
        detail,
        errorCode,
        ...(options.errors && { errors: options.errors }),
        ...(options.details && { details: options.details }),
      },
      status,
    );
    this.title = title;
    this.errors = options.errors;
    this.details = options.details;
  }

  getErrorCode(): string {
    return this.errorCode;
  }

  getDetails(): Record<string, unknown> | undefined {
    return this.details;
  }
}
