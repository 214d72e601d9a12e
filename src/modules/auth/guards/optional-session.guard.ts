import {
  CanActivate,
  ExecutionContext,
  Injectable,
  Logger,
  UnauthorizedException,
} from "@nestjs/common";
import type { Request } from "express";
import { hasAuthCredentials } from "../../../common/http/request.helper";
import { AuthService } from "../auth.service";
import { attachAuthSession, resolveAuthSession } from "./session.guard";

/**
 * Guard for public pages that personalise their response when a user is
 * signed in (favorite flags, review eligibility).
 *
 * - No credentials: request continues as a guest, @CurrentUser returns null
 * - Valid session: session is attached to the request
 * - Credentials present but invalid or expired: UnauthorizedException
 */
@Injectable()
export class OptionalSessionGuard implements CanActivate {
  private readonly logger = new Logger(OptionalSessionGuard.name);

  constructor(private readonly authService: AuthService) {}

  async canActivate(context: ExecutionContext): Promise<boolean> {
    if (!this.authService.isInitialized) {
      this.logger.warn(
        "Authentication service not initialized. All requests will be treated as guest requests.",
      );
      return true;
    }

    const request = context.switchToHttp().getRequest<Request>();
    if (!hasAuthCredentials(request.headers)) {
      return true;
    }

    const authSession = await resolveAuthSession(this.authService, request);
    if (!authSession) {
      throw new UnauthorizedException(
        "Your session has expired or is invalid. Please log in again.",
      );
    }

    attachAuthSession(request, authSession);
    return true;
  }
}
