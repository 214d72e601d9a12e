import { CanActivate, ExecutionContext, ForbiddenException, Injectable } from "@nestjs/common";
import { Reflector } from "@nestjs/core";
import type { RoleName } from "../auth.types";
import { ROLES_KEY } from "../decorators/roles.decorator";
import { AUTH_SESSION_KEY, type AuthenticatedRequest } from "./session.guard";

/**
 * Role-based access control. Must run after SessionGuard.
 *
 * Without @Roles() the route only requires authentication; with it the user's
 * role must be one of the listed roles.
 */
@Injectable()
export class RoleGuard implements CanActivate {
  constructor(private readonly reflector: Reflector) {}

  canActivate(context: ExecutionContext): boolean {
    const requiredRoles = this.reflector.getAllAndOverride<RoleName[] | undefined>(ROLES_KEY, [
      context.getHandler(),
      context.getClass(),
    ]);

    if (!requiredRoles || requiredRoles.length === 0) {
      return true;
    }

    const request = context.switchToHttp().getRequest<AuthenticatedRequest>();
    const authSession = request[AUTH_SESSION_KEY];

    if (!authSession) {
      throw new ForbiddenException(
        "Session not found. Ensure SessionGuard is used before RoleGuard.",
      );
    }

    if (!requiredRoles.includes(authSession.user.role)) {
      throw new ForbiddenException(`Access denied. Required roles: ${requiredRoles.join(", ")}`);
    }

    return true;
  }
}
