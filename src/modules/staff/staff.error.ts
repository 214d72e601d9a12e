import { HttpStatus } from "@nestjs/common";
import { AppException } from "../../common/errors/app.exception";

export const StaffErrorCode = {
  ORDER_NOT_FOUND: "ORDER_NOT_FOUND",
  NO_ORDERS_SELECTED: "NO_ORDERS_SELECTED",
  STAFF_USER_NOT_FOUND: "STAFF_USER_NOT_FOUND",
  CANNOT_MODIFY_OWN_ACCOUNT: "CANNOT_MODIFY_OWN_ACCOUNT",
  MANAGER_ACCOUNT_PROTECTED: "MANAGER_ACCOUNT_PROTECTED",
  STAFF_FETCH_FAILED: "STAFF_FETCH_FAILED",
} as const;

export class StaffException extends AppException {
  // Intentionally empty: inherits AppException constructor.
}

export class OrderNotFoundException extends StaffException {
  constructor(orderId: number) {
    super(StaffErrorCode.ORDER_NOT_FOUND, "Order not found.", HttpStatus.NOT_FOUND, {
      title: "Order Not Found",
      details: { orderId },
    });
  }
}

export class NoOrdersSelectedException extends StaffException {
  constructor() {
    super(StaffErrorCode.NO_ORDERS_SELECTED, "No orders selected.", HttpStatus.BAD_REQUEST, {
      title: "No Orders Selected",
    });
  }
}

export class StaffUserNotFoundException extends StaffException {
  constructor() {
    super(StaffErrorCode.STAFF_USER_NOT_FOUND, "User not found.", HttpStatus.NOT_FOUND, {
      title: "User Not Found",
    });
  }
}

export class CannotModifyOwnAccountException extends StaffException {
  constructor() {
    super(
      StaffErrorCode.CANNOT_MODIFY_OWN_ACCOUNT,
      "You cannot modify your own account status.",
      HttpStatus.BAD_REQUEST,
      { title: "Cannot Modify Own Account" },
    );
  }
}

export class ManagerAccountProtectedException extends StaffException {
  constructor() {
    super(
      StaffErrorCode.MANAGER_ACCOUNT_PROTECTED,
      "You don't have permission to modify Manager account status.",
      HttpStatus.FORBIDDEN,
      { title: "Manager Account Protected" },
    );
  }
}

export class StaffFetchFailedException extends StaffException {
  constructor(detail = "Unable to load data. Please try again later.") {
    super(StaffErrorCode.STAFF_FETCH_FAILED, detail, HttpStatus.INTERNAL_SERVER_ERROR, {
      title: "Staff Fetch Failed",
    });
  }
}
