import { HttpStatus } from "@nestjs/common";
import { AppException } from "../../common/errors/app.exception";

export const CarErrorCode = {
  CAR_NOT_FOUND: "CAR_NOT_FOUND",
  CAR_FETCH_FAILED: "CAR_FETCH_FAILED",
  CAR_CREATE_FAILED: "CAR_CREATE_FAILED",
  CAR_UPDATE_FAILED: "CAR_UPDATE_FAILED",
  LICENSE_PLATE_ALREADY_EXISTS: "LICENSE_PLATE_ALREADY_EXISTS",
  CATEGORY_NOT_FOUND: "CATEGORY_NOT_FOUND",
} as const;

export class CarException extends AppException {
  // Intentionally empty: inherits AppException constructor.
}

export class CarNotFoundException extends CarException {
  constructor() {
    super(CarErrorCode.CAR_NOT_FOUND, "Vehicle not found.", HttpStatus.NOT_FOUND, {
      title: "Vehicle Not Found",
    });
  }
}

export class CarFetchFailedException extends CarException {
  constructor() {
    super(
      CarErrorCode.CAR_FETCH_FAILED,
      "Unable to load vehicles. Please try again later.",
      HttpStatus.INTERNAL_SERVER_ERROR,
      { title: "Car Fetch Failed" },
    );
  }
}

export class CarCreateFailedException extends CarException {
  constructor(detail = "An unexpected error occurred while creating the vehicle") {
    super(CarErrorCode.CAR_CREATE_FAILED, detail, HttpStatus.INTERNAL_SERVER_ERROR, {
      title: "Car Create Failed",
    });
  }
}

export class CarUpdateFailedException extends CarException {
  constructor() {
    super(
      CarErrorCode.CAR_UPDATE_FAILED,
      "An unexpected error occurred while updating the vehicle",
      HttpStatus.INTERNAL_SERVER_ERROR,
      { title: "Car Update Failed" },
    );
  }
}

export class LicensePlateAlreadyExistsException extends CarException {
  constructor(licensePlate: string) {
    super(
      CarErrorCode.LICENSE_PLATE_ALREADY_EXISTS,
      `A vehicle with license plate ${licensePlate} already exists`,
      HttpStatus.CONFLICT,
      { title: "License Plate Already Exists" },
    );
  }
}

export class CategoryNotFoundException extends CarException {
  constructor() {
    super(CarErrorCode.CATEGORY_NOT_FOUND, "Category not found.", HttpStatus.BAD_REQUEST, {
      title: "Category Not Found",
    });
  }
}
