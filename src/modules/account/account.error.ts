import { HttpStatus } from "@nestjs/common";
import { AppException } from "../../common/errors/app.exception";
import { DUPLICATE_NAME_MESSAGE, DUPLICATE_PHONE_MESSAGE } from "../auth/auth.config";

export const AccountErrorCode = {
  ACCOUNT_USER_NOT_FOUND: "ACCOUNT_USER_NOT_FOUND",
  ACCOUNT_PHONE_TAKEN: "ACCOUNT_PHONE_TAKEN",
  ACCOUNT_NAME_TAKEN: "ACCOUNT_NAME_TAKEN",
  PROFILE_PICTURE_UPLOAD_FAILED: "PROFILE_PICTURE_UPLOAD_FAILED",
  ACCOUNT_UPDATE_FAILED: "ACCOUNT_UPDATE_FAILED",
} as const;

export class AccountException extends AppException {
  // Intentionally empty: inherits AppException constructor.
}

export class AccountUserNotFoundException extends AccountException {
  constructor() {
    super(AccountErrorCode.ACCOUNT_USER_NOT_FOUND, "User not found.", HttpStatus.NOT_FOUND, {
      title: "User Not Found",
    });
  }
}

export class AccountPhoneTakenException extends AccountException {
  constructor() {
    super(AccountErrorCode.ACCOUNT_PHONE_TAKEN, DUPLICATE_PHONE_MESSAGE, HttpStatus.CONFLICT, {
      title: "Phone Number Taken",
    });
  }
}

export class AccountNameTakenException extends AccountException {
  constructor() {
    super(AccountErrorCode.ACCOUNT_NAME_TAKEN, DUPLICATE_NAME_MESSAGE, HttpStatus.CONFLICT, {
      title: "Name Taken",
    });
  }
}

export class ProfilePictureUploadFailedException extends AccountException {
  constructor() {
    super(
      AccountErrorCode.PROFILE_PICTURE_UPLOAD_FAILED,
      "Failed to upload profile picture. Please try again.",
      HttpStatus.INTERNAL_SERVER_ERROR,
      {
        title: "Profile Picture Upload Failed",
      },
    );
  }
}

export class AccountUpdateFailedException extends AccountException {
  constructor() {
    super(
      AccountErrorCode.ACCOUNT_UPDATE_FAILED,
      "Failed to update profile",
      HttpStatus.INTERNAL_SERVER_ERROR,
      {
        title: "Profile Update Failed",
      },
    );
  }
}
