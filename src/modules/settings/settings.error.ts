import { HttpStatus } from "@nestjs/common";
import { AppException } from "../../common/errors/app.exception";

export const SettingsErrorCode = {
  TEST_EMAIL_FAILED: "TEST_EMAIL_FAILED",
} as const;

export class SettingsException extends AppException {
  // Intentionally empty: inherits AppException constructor.
}

export class TestEmailFailedException extends SettingsException {
  constructor(reason: string) {
    super(
      SettingsErrorCode.TEST_EMAIL_FAILED,
      `Error sending test email: ${reason}`,
      HttpStatus.BAD_GATEWAY,
      { title: "Test Email Failed" },
    );
  }
}
