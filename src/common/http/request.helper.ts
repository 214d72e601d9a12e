import type { IncomingHttpHeaders } from "node:http";

/**
 * Converts Express IncomingHttpHeaders to a fetch Headers object.
 * string[] values are joined with ", " and undefined values are skipped.
 */
export function toHeaders(incomingHeaders: IncomingHttpHeaders): Headers {
  const headers = new Headers();
  for (const [key, value] of Object.entries(incomingHeaders)) {
    if (value === undefined) continue;
    headers.set(key, Array.isArray(value) ? value.join(", ") : value);
  }
  return headers;
}

/**
 * True when the request carries a bearer token or a better-auth session cookie
 * (with or without the __Secure-/__Host- prefix).
 */
export function hasAuthCredentials(incomingHeaders: IncomingHttpHeaders): boolean {
  if (incomingHeaders.authorization) {
    return true;
  }

  const cookieHeader = incomingHeaders.cookie;
  return (
    cookieHeader !== undefined &&
    (cookieHeader.includes("session_token") || cookieHeader.includes("session_data"))
  );
}
