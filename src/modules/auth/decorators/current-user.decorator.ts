import { createParamDecorator, ExecutionContext } from "@nestjs/common";
import { AUTH_SESSION_KEY, type AuthenticatedRequest } from "../guards/session.guard";

/**
 * Injects the user that SessionGuard or OptionalSessionGuard attached to the
 * request, or null for guests on optional routes.
 */
export const CurrentUser = createParamDecorator((_data: unknown, ctx: ExecutionContext) => {
  const request = ctx.switchToHttp().getRequest<AuthenticatedRequest>();
  return request[AUTH_SESSION_KEY]?.user ?? null;
});
