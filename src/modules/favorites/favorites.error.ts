import { HttpStatus } from "@nestjs/common";
import { AppException } from "../../common/errors/app.exception";

export const FavoriteErrorCode = {
  FAVORITE_CAR_NOT_FOUND: "FAVORITE_CAR_NOT_FOUND",
  FAVORITE_FETCH_FAILED: "FAVORITE_FETCH_FAILED",
} as const;

export class FavoriteException extends AppException {
  // Intentionally empty: inherits AppException constructor.
}

export class FavoriteCarNotFoundException extends FavoriteException {
  constructor() {
    super(FavoriteErrorCode.FAVORITE_CAR_NOT_FOUND, "Vehicle not found.", HttpStatus.NOT_FOUND, {
      title: "Vehicle Not Found",
    });
  }
}

export class FavoriteFetchFailedException extends FavoriteException {
  constructor() {
    super(
      FavoriteErrorCode.FAVORITE_FETCH_FAILED,
      "An unexpected error occurred while loading favorites",
      HttpStatus.INTERNAL_SERVER_ERROR,
      { title: "Favorites Fetch Failed" },
    );
  }
}
