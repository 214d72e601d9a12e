/**
 * Problem document returned for every failed request.
 *
 * @see https://datatracker.ietf.org/doc/html/rfc7807
 */
export interface ProblemDetails {
  /** Machine-readable problem type, e.g. "CAR_UNAVAILABLE". */
  type: string;
  /** Short summary, e.g. "Vehicle Unavailable". */
  title: string;
  status: number;
  /** Explanation of this occurrence, shown to the customer. */
  detail: string;
  /** Request path that produced the problem. */
  instance?: string;
  /** Echo of the x-request-id header, for correlating with server logs. */
  requestId?: string;
  errorCode?: string;
  errors?: FieldError[];
  details?: Record<string, unknown>;
}

export interface FieldError {
  /** Dot path of the offending field, "_root" for the whole payload. */
  field: string;
  code?: string;
  message: string;
}
