import { SetMetadata } from "@nestjs/common";
import type { RoleName } from "../auth.types";

export const ROLES_KEY = "roles";

/**
 * Roles allowed to access a route. Enforced by RoleGuard, which must run after
 * SessionGuard:
 *
 * ```typescript
 * @UseGuards(SessionGuard, RoleGuard)
 * @Roles(STAFF, MANAGER)
 * @Get('dashboard')
 * getDashboard() {}
 * ```
 */
export const Roles = (...roles: RoleName[]) => SetMetadata(ROLES_KEY, roles);
