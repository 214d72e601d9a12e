import type { User } from "../database/schema";

export interface ManagerDashboard {
  totalUsers: number;
  totalStaff: number;
  totalCustomers: number;
  totalAppointments: number;
  totalRevenue: string;
  totalCars: number;
}

export interface SystemStatistics {
  totalUsers: number;
  totalCustomers: number;
  totalStaff: number;
  totalManagers: number;
  totalCars: number;
  availableCars: number;
  totalBookings: number;
  totalRevenue: string;
  thisMonthRevenue: string;
  totalReviews: number;
  approvedReviews: number;
  totalPromotions: number;
  activePromotions: number;
  totalSubscriptions: number;
  activeSubscriptions: number;
}

export interface ManagerActionResult {
  message: string;
}

export interface ManagedUserResult extends ManagerActionResult {
  user: User;
}

export interface CreateStaffResult extends ManagerActionResult {
  userId: string;
}

export interface DeleteCustomersResult extends ManagerActionResult {
  deletedCount: number;
}
