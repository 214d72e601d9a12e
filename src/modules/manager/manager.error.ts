import { HttpStatus } from "@nestjs/common";
import { AppException } from "../../common/errors/app.exception";

export const ManagerErrorCode = {
  MANAGER_USER_NOT_FOUND: "MANAGER_USER_NOT_FOUND",
  MANAGER_SELF_ACTION: "MANAGER_SELF_ACTION",
  STAFF_CREATE_FAILED: "STAFF_CREATE_FAILED",
  MANAGER_OPERATION_FAILED: "MANAGER_OPERATION_FAILED",
} as const;

export class ManagerException extends AppException {
  // Intentionally empty: inherits AppException constructor.
}

export class ManagerUserNotFoundException extends ManagerException {
  constructor(detail = "User not found.") {
    super(ManagerErrorCode.MANAGER_USER_NOT_FOUND, detail, HttpStatus.NOT_FOUND, {
      title: "User Not Found",
    });
  }
}

export class ManagerSelfActionException extends ManagerException {
  constructor(detail: string) {
    super(ManagerErrorCode.MANAGER_SELF_ACTION, detail, HttpStatus.BAD_REQUEST, {
      title: "Own Account",
    });
  }
}

export class StaffCreateFailedException extends ManagerException {
  constructor(detail: string) {
    super(ManagerErrorCode.STAFF_CREATE_FAILED, detail, HttpStatus.BAD_REQUEST, {
      title: "Staff Account Not Created",
    });
  }
}

export class ManagerOperationFailedException extends ManagerException {
  constructor(detail: string) {
    super(ManagerErrorCode.MANAGER_OPERATION_FAILED, detail, HttpStatus.INTERNAL_SERVER_ERROR, {
      title: "Manager Operation Failed",
    });
  }
}
