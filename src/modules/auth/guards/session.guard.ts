import {
  CanActivate,
  ExecutionContext,
  Injectable,
  ServiceUnavailableException,
  UnauthorizedException,
} from "@nestjs/common";
import type { Session, User } from "better-auth";
import type { Request } from "express";
import { toHeaders } from "../../../common/http/request.helper";
import { ACCOUNT_DEACTIVATED_MESSAGE } from "../auth.config";
import { AuthService } from "../auth.service";
import type { RoleName } from "../auth.types";

export const AUTH_SESSION_KEY = "authSession";

export interface AuthSession {
  user: User & { role: RoleName; isActive: boolean };
  session: Session;
}

export type AuthenticatedRequest = Request & { [AUTH_SESSION_KEY]?: AuthSession };

/**
 * Resolves the better-auth session for a request and merges in the user's
 * current role. Returns null when there is no valid session; throws when the
 * account has been deactivated.
 */
export async function resolveAuthSession(
  authService: AuthService,
  request: Request,
): Promise<AuthSession | null> {
  let session: Awaited<ReturnType<AuthService["auth"]["api"]["getSession"]>> = null;
  try {
    session = await authService.auth.api.getSession({ headers: toHeaders(request.headers) });
  } catch {
    throw new UnauthorizedException("Invalid or expired session");
  }

  if (!session) {
    return null;
  }

  const access = await authService.getUserAccess(session.user.id);
  if (!access) {
    return null;
  }

  if (!access.isActive) {
    throw new UnauthorizedException(ACCOUNT_DEACTIVATED_MESSAGE);
  }

  return {
    user: { ...session.user, role: access.role, isActive: access.isActive },
    session: session.session,
  };
}

export function attachAuthSession(request: Request, authSession: AuthSession): void {
  Object.assign(request, { [AUTH_SESSION_KEY]: authSession });
}

/**
 * Guard that validates the user session via better-auth and attaches it to the
 * request for the @CurrentUser decorator.
 *
 * Usage:
 * ```typescript
 * @UseGuards(SessionGuard)
 * @Get('profile')
 * getProfile(@CurrentUser() user: AuthSession["user"]) {
 *   return user;
 * }
 * ```
 */
@Injectable()
export class SessionGuard implements CanActivate {
  constructor(private readonly authService: AuthService) {}

  async canActivate(context: ExecutionContext): Promise<boolean> {
    if (!this.authService.isInitialized) {
      throw new ServiceUnavailableException(
        "Authentication service is not configured. Contact support.",
      );
    }

    const request = context.switchToHttp().getRequest<Request>();
    const authSession = await resolveAuthSession(this.authService, request);

    if (!authSession) {
      throw new UnauthorizedException("Invalid or expired session");
    }

    attachAuthSession(request, authSession);
    return true;
  }
}
