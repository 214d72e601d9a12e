import type { RoleName } from "../database/enums";

export type { RoleName };

/** Self-registered renter. */
export const CUSTOMER = "Customer" as const;

/** Counter staff: orders, vehicles, reviews, reports. */
export const STAFF = "Staff" as const;

/** Full administration, including staff accounts. */
export const MANAGER = "Manager" as const;

/** Roles allowed into the back office. */
export const BACK_OFFICE_ROLES = [STAFF, MANAGER] as const satisfies readonly RoleName[];

export function isBackOfficeRole(role: RoleName): boolean {
  return role === STAFF || role === MANAGER;
}

export interface UserAccess {
  role: RoleName;
  isActive: boolean;
}
