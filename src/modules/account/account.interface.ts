import type { User } from "../database/schema";
import type { MALAYSIAN_STATES } from "./account.const";

export interface AvailabilityResponse {
  exists: boolean;
}

export interface CustomerStats {
  totalBookings: number;
  completedBookings: number;
  totalSpent: string;
}

export interface AccountProfile {
  user: User;
  /** Only customers get booking stats. */
  stats: CustomerStats | null;
  states: typeof MALAYSIAN_STATES;
}

export interface ProfileUpdateResponse {
  user: User;
  message: string;
}
