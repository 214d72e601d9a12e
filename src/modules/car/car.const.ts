export const CAR_SORT_OPTIONS = [
  "price_asc",
  "price_desc",
  "name_asc",
  "name_desc",
  "year_desc",
  "rating_desc",
] as const;
export type CarSortOption = (typeof CAR_SORT_OPTIONS)[number];
export const DEFAULT_CAR_SORT: CarSortOption = "price_asc";

export const FUEL_FILTERS = ["All", "Electric", "Gas"] as const;
export type FuelFilter = (typeof FUEL_FILTERS)[number];

/** Price slider bounds when no car is listed. */
export const EMPTY_PRICE_RANGE = { min: 0, max: 1000 } as const;

export const FEATURED_CAR_LIMIT = 12;
export const ELECTRIC_SHOWCASE_LIMIT = 6;
export const CAR_DETAIL_REVIEW_LIMIT = 5;
export const MAX_COMPARED_CARS = 3;

export const RECOMMENDATION_LIMIT = 6;
export const RECOMMENDATION_SCORE_MIN = 75;
export const RECOMMENDATION_SCORE_MAX = 99;
export const DEFAULT_RECOMMENDATION_CATEGORY = "Sedan";

export const VEHICLE_STATUS_FILTERS = ["All", "Available", "Unavailable"] as const;
export type VehicleStatusFilter = (typeof VEHICLE_STATUS_FILTERS)[number];
