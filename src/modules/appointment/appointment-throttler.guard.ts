import { ExecutionContext, Injectable } from "@nestjs/common";
import { ThrottlerGuard } from "@nestjs/throttler";
import {
  computeRetryAfterEpoch,
  getClientIp,
  toTtlSeconds,
} from "../../common/throttling/throttling.helper";
import { AUTH_SESSION_KEY, type AuthenticatedRequest } from "../auth/guards/session.guard";
import { AppointmentRateLimitExceededException } from "./appointment.error";

/** Booking attempts allowed per customer per minute. */
export const APPOINTMENT_THROTTLE = { default: { limit: 5, ttl: 60_000 } };

/**
 * Tracks booking attempts per signed-in customer, falling back to the client
 * IP. Must run after SessionGuard.
 */
@Injectable()
export class AppointmentThrottlerGuard extends ThrottlerGuard {
  protected async getTracker(request: AuthenticatedRequest): Promise<string> {
    const userId = request[AUTH_SESSION_KEY]?.user.id;
    return userId ? `user:${userId}` : `ip:${getClientIp(request)}`;
  }

  protected async throwThrottlingException(
    _context: ExecutionContext,
    throttlerConfig?: { ttl: number },
  ): Promise<void> {
    const retryAfter = computeRetryAfterEpoch(toTtlSeconds(throttlerConfig?.ttl, 60));
    throw new AppointmentRateLimitExceededException(retryAfter);
  }
}
