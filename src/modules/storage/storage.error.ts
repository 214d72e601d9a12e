import { HttpStatus } from "@nestjs/common";
import { AppException } from "../../common/errors/app.exception";

export const StorageErrorCode = {
  INVALID_UPLOAD: "INVALID_UPLOAD",
} as const;

export class StorageException extends AppException {
  // Intentionally empty: inherits AppException constructor.
}

export class InvalidUploadException extends StorageException {
  constructor(detail: string) {
    super(StorageErrorCode.INVALID_UPLOAD, detail, HttpStatus.BAD_REQUEST, {
      title: "Invalid Upload",
    });
  }
}
