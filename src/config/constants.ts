export const SEED_STARTUP_TIMEOUT = "seed-startup";

export const DEFAULT_CAR_STATE = "Kuala Lumpur";
export const CURRENCY_LABEL = "RM";

export const FREE_CANCELLATION_HOURS = 48;
export const BOOKING_PAST_TOLERANCE_MINUTES = 5;
export const MIN_RENTAL_HOURS = 1;
export const SLOT_WINDOW_DAYS = 30;

/** Requests per client IP per minute across the API. */
export const GLOBAL_THROTTLE = { ttl: 60_000, limit: 120 };
