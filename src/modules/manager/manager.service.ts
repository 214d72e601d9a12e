import { Injectable, Logger } from "@nestjs/common";
import { APIError } from "better-auth/api";
import { and, desc, eq, gte, inArray } from "drizzle-orm";
import { CUSTOMER, MANAGER, STAFF } from "../auth/auth.types";
import { AuthService } from "../auth/auth.service";
import { DatabaseService } from "../database/database.service";
import {
  appointments,
  cars,
  favorites,
  notifications,
  payments,
  promotions,
  reviews,
  subscriptions,
  type User,
  users,
} from "../database/schema";
import { getAnalyticsPeriods } from "../analytics/analytics.helper";
import { AnalyticsService } from "../analytics/analytics.service";
import type { CreateStaffDto } from "./dto/manager.dto";
import {
  ManagerOperationFailedException,
  ManagerSelfActionException,
  ManagerUserNotFoundException,
  StaffCreateFailedException,
} from "./manager.error";
import type {
  CreateStaffResult,
  DeleteCustomersResult,
  ManagedUserResult,
  ManagerActionResult,
  ManagerDashboard,
  SystemStatistics,
} from "./manager.interface";

@Injectable()
export class ManagerService {
  private readonly logger = new Logger(ManagerService.name);

  constructor(
    private readonly databaseService: DatabaseService,
    private readonly authService: AuthService,
    private readonly analyticsService: AnalyticsService,
  ) {}

  async getDashboard(): Promise<ManagerDashboard> {
    const db = this.databaseService.db;

    try {
      const [totalUsers, totalStaff, totalCustomers, totalAppointments, totalRevenue, totalCars] =
        await Promise.all([
          db.$count(users),
          db.$count(users, eq(users.role, STAFF)),
          db.$count(users, eq(users.role, CUSTOMER)),
          db.$count(appointments),
          this.analyticsService.sumRevenue(),
          db.$count(cars),
        ]);

      return { totalUsers, totalStaff, totalCustomers, totalAppointments, totalRevenue, totalCars };
    } catch (error) {
      this.logger.error("Failed to load manager dashboard", {
        error: error instanceof Error ? error.message : String(error),
      });
      throw new ManagerOperationFailedException(
        "Unable to load dashboard data. Please try again later.",
      );
    }
  }

  async listStaff(): Promise<User[]> {
    return this.databaseService.db.query.users.findMany({
      where: eq(users.role, STAFF),
      orderBy: [desc(users.createdAt)],
    });
  }

  /** Goes through the regular sign-up path, so password and duplicate rules still apply. */
  async createStaff(body: CreateStaffDto): Promise<CreateStaffResult> {
    try {
      const userId = await this.authService.createUserWithPassword({ ...body, role: STAFF });
      return { userId, message: `Staff account for ${body.email} created successfully.` };
    } catch (error) {
      if (error instanceof APIError) {
        throw new StaffCreateFailedException(error.message);
      }
      this.logger.error("Failed to create staff account", {
        email: body.email,
        error: error instanceof Error ? error.message : String(error),
      });
      throw new ManagerOperationFailedException("Unable to create the staff account.");
    }
  }

  async toggleStaffStatus(userId: string): Promise<ManagedUserResult> {
    const staff = await this.findStaff(userId);
    const user = await this.setActive(staff.id, !staff.isActive);

    return {
      user,
      message: `Staff account ${user.isActive ? "activated" : "deactivated"} successfully.`,
    };
  }

  async deleteStaff(userId: string): Promise<ManagerActionResult> {
    const staff = await this.findStaff(userId);
    await this.databaseService.db.delete(users).where(eq(users.id, staff.id));

    this.logger.log("Staff account deleted", { userId: staff.id });
    return { message: "Staff account deleted successfully." };
  }

  /**
   * Removes every Customer account with the bookings, payments, favorites,
   * reviews and notifications that belong to it. Staff and Manager accounts
   * are untouched.
   */
  async deleteAllCustomers(): Promise<DeleteCustomersResult> {
    try {
      const deleted = await this.databaseService.db.transaction(async (tx) => {
        const customerIds = tx.select({ id: users.id }).from(users).where(eq(users.role, CUSTOMER));
        const customerBookings = tx
          .select({ id: appointments.id })
          .from(appointments)
          .where(inArray(appointments.userId, customerIds));

        await tx.delete(payments).where(inArray(payments.appointmentId, customerBookings));
        await tx.delete(appointments).where(inArray(appointments.userId, customerIds));
        await tx.delete(favorites).where(inArray(favorites.userId, customerIds));
        await tx.delete(reviews).where(inArray(reviews.userId, customerIds));
        await tx.delete(notifications).where(inArray(notifications.userId, customerIds));

        return tx.delete(users).where(eq(users.role, CUSTOMER)).returning({ id: users.id });
      });

      this.logger.warn("Deleted all customer accounts", { deletedCount: deleted.length });

      return {
        deletedCount: deleted.length,
        message: `Successfully deleted ${deleted.length} customer account(s). Staff and Manager accounts were preserved.`,
      };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error("Failed to delete customer accounts", { error: message });
      throw new ManagerOperationFailedException(`Error deleting customers: ${message}`);
    }
  }

  async toggleUserStatus(userId: string, actorId: string): Promise<ManagedUserResult> {
    const target = await this.findUser(userId);
    if (target.id === actorId) {
      throw new ManagerSelfActionException("You cannot modify your own account status.");
    }

    const user = await this.setActive(target.id, !target.isActive);
    return {
      user,
      message: `User account ${user.isActive ? "activated" : "deactivated"} successfully.`,
    };
  }

  async deleteUser(userId: string, actorId: string): Promise<ManagerActionResult> {
    const target = await this.findUser(userId);
    if (target.id === actorId) {
      throw new ManagerSelfActionException("You cannot delete your own account!");
    }

    await this.databaseService.db.delete(users).where(eq(users.id, target.id));

    this.logger.log("User deleted", { userId: target.id, actorId });
    return { message: "User deleted successfully." };
  }

  async getSystemStatistics(now = new Date()): Promise<SystemStatistics> {
    const db = this.databaseService.db;
    const { monthStart } = getAnalyticsPeriods(now);

    try {
      const [
        totalUsers,
        totalCustomers,
        totalStaff,
        totalManagers,
        totalCars,
        availableCars,
        totalBookings,
        totalRevenue,
        thisMonthRevenue,
        totalReviews,
        approvedReviews,
        totalPromotions,
        activePromotions,
        totalSubscriptions,
        activeSubscriptions,
      ] = await Promise.all([
        db.$count(users),
        db.$count(users, eq(users.role, CUSTOMER)),
        db.$count(users, eq(users.role, STAFF)),
        db.$count(users, eq(users.role, MANAGER)),
        db.$count(cars),
        db.$count(cars, eq(cars.isAvailable, true)),
        db.$count(appointments),
        this.analyticsService.sumRevenue(),
        this.analyticsService.sumRevenue(gte(appointments.createdAt, monthStart)),
        db.$count(reviews),
        db.$count(reviews, eq(reviews.isApproved, true)),
        db.$count(promotions),
        db.$count(promotions, eq(promotions.isActive, true)),
        db.$count(subscriptions),
        db.$count(subscriptions, eq(subscriptions.isActive, true)),
      ]);

      return {
        totalUsers,
        totalCustomers,
        totalStaff,
        totalManagers,
        totalCars,
        availableCars,
        totalBookings,
        totalRevenue,
        thisMonthRevenue,
        totalReviews,
        approvedReviews,
        totalPromotions,
        activePromotions,
        totalSubscriptions,
        activeSubscriptions,
      };
    } catch (error) {
      this.logger.error("Failed to load system statistics", {
        error: error instanceof Error ? error.message : String(error),
      });
      throw new ManagerOperationFailedException(
        "Unable to load system statistics. Please try again later.",
      );
    }
  }

  private async findUser(userId: string): Promise<User> {
    const user = await this.databaseService.db.query.users.findFirst({
      where: eq(users.id, userId),
    });
    if (!user) {
      throw new ManagerUserNotFoundException();
    }
    return user;
  }

  private async findStaff(userId: string): Promise<User> {
    const staff = await this.databaseService.db.query.users.findFirst({
      where: and(eq(users.id, userId), eq(users.role, STAFF)),
    });
    if (!staff) {
      throw new ManagerUserNotFoundException("Staff member not found.");
    }
    return staff;
  }

  private async setActive(userId: string, isActive: boolean): Promise<User> {
    const [user] = await this.databaseService.db
      .update(users)
      .set({ isActive, updatedAt: new Date() })
      .where(eq(users.id, userId))
      .returning();

    this.logger.log("User active flag changed", { userId, isActive });
    return user;
  }
}
