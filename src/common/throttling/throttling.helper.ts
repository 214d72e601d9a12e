export interface HttpRequestLike {
  ip?: string;
  headers?: Record<string, string | string[] | undefined>;
}

export function getClientIp(request: HttpRequestLike): string {
  const forwardedFor = request.headers?.["x-forwarded-for"];

  if (Array.isArray(forwardedFor) && forwardedFor.length > 0) {
    return forwardedFor[0].split(",")[0].trim();
  }

  if (typeof forwardedFor === "string" && forwardedFor.length > 0) {
    return forwardedFor.split(",")[0].trim();
  }

  const realIp = request.headers?.["x-real-ip"];
  if (typeof realIp === "string" && realIp.length > 0) {
    return realIp.trim();
  }

  return request.ip || "unknown";
}

/**
 * @nestjs/throttler hands ttl over in milliseconds; whole-second values below 1000
 * are treated as seconds already.
 */
export function toTtlSeconds(ttl: number | undefined, fallbackSeconds: number): number {
  if (typeof ttl !== "number" || ttl <= 0) {
    return fallbackSeconds;
  }

  if (ttl >= 1000 && ttl % 1000 === 0) {
    return ttl / 1000;
  }

  return Math.ceil(ttl);
}

export function computeRetryAfterEpoch(ttlSeconds: number): number {
  return Math.ceil(Date.now() / 1000) + ttlSeconds;
}
