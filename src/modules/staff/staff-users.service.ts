import { Injectable, Logger } from "@nestjs/common";
import { and, count, desc, eq, ilike, inArray, max, or, type SQL, sql } from "drizzle-orm";
import { toContainsPattern, toMoney } from "../../shared/helper";
import { MANAGER } from "../auth/auth.types";
import type { AuthSession } from "../auth/guards/session.guard";
import { DatabaseService } from "../database/database.service";
import { appointments, payments, reviews, users } from "../database/schema";
import { REVENUE_STATUSES } from "../analytics/analytics.const";
import type { UserListQueryDto } from "./dto/staff.dto";
import {
  CannotModifyOwnAccountException,
  ManagerAccountProtectedException,
  StaffException,
  StaffFetchFailedException,
  StaffUserNotFoundException,
} from "./staff.error";
import { summarizeCustomerActivity } from "./staff.helper";
import type { UserDetails, UserStats, UserToggleResult, UserWithStats } from "./staff.interface";

const EMPTY_USER_STATS: UserStats = { appointmentCount: 0, totalSpent: "0.00", lastBookingDate: null };

@Injectable()
export class StaffUsersService {
  private readonly logger = new Logger(StaffUsersService.name);

  constructor(private readonly databaseService: DatabaseService) {}

  async listUsers(query: UserListQueryDto): Promise<UserWithStats[]> {
    try {
      const rows = await this.databaseService.db.query.users.findMany({
        where: and(
          query.roleFilter === "All" ? undefined : eq(users.role, query.roleFilter),
          this.buildStatusFilter(query.statusFilter),
          this.buildSearchFilter(query.searchTerm),
        ),
        orderBy: [desc(users.createdAt)],
      });

      const stats = await this.getUserStats(rows.map((user) => user.id));
      return rows.map((user) => ({ ...user, stats: stats.get(user.id) ?? { ...EMPTY_USER_STATS } }));
    } catch (error) {
      this.logger.error("Failed to load users", {
        roleFilter: query.roleFilter,
        statusFilter: query.statusFilter,
        error: error instanceof Error ? error.message : String(error),
      });
      throw new StaffFetchFailedException("Unable to load users. Please try again later.");
    }
  }

  /** Booking count, confirmed/completed spend and latest booking per user. */
  async getUserStats(userIds: string[]): Promise<Map<string, UserStats>> {
    const stats = new Map<string, UserStats>();
    if (userIds.length === 0) {
      return stats;
    }

    const spent = sql<string | null>`sum(${appointments.totalPrice}) filter (where ${inArray(
      appointments.status,
      REVENUE_STATUSES,
    )})`;
    const rows = await this.databaseService.db
      .select({
        userId: appointments.userId,
        appointmentCount: count(),
        totalSpent: spent,
        lastBookingDate: max(appointments.createdAt),
      })
      .from(appointments)
      .where(inArray(appointments.userId, userIds))
      .groupBy(appointments.userId);

    for (const row of rows) {
      if (row.userId) {
        stats.set(row.userId, {
          appointmentCount: row.appointmentCount,
          totalSpent: toMoney(row.totalSpent ?? 0),
          lastBookingDate: row.lastBookingDate,
        });
      }
    }
    return stats;
  }

  /**
   * Flips a user's active flag. Nobody can change their own account, and only
   * a manager can change another manager's.
   */
  async toggleUserStatus(userId: string, actor: AuthSession["user"]): Promise<UserToggleResult> {
    const target = await this.databaseService.db.query.users.findFirst({
      where: eq(users.id, userId),
    });

    if (!target) {
      throw new StaffUserNotFoundException();
    }
    if (target.id === actor.id) {
      throw new CannotModifyOwnAccountException();
    }
    if (target.role === MANAGER && actor.role !== MANAGER) {
      throw new ManagerAccountProtectedException();
    }

    const [user] = await this.databaseService.db
      .update(users)
      .set({ isActive: !target.isActive, updatedAt: new Date() })
      .where(eq(users.id, target.id))
      .returning();

    this.logger.log("User status toggled", {
      userId: target.id,
      actorId: actor.id,
      isActive: user.isActive,
    });

    return {
      user,
      message: `${target.role} account ${user.isActive ? "activated" : "deactivated"} successfully.`,
    };
  }

  async getUserDetails(userId: string): Promise<UserDetails> {
    try {
      const db = this.databaseService.db;
      const user = await db.query.users.findFirst({ where: eq(users.id, userId) });
      if (!user) {
        throw new StaffUserNotFoundException();
      }

      const [bookings, userPayments, userReviews] = await Promise.all([
        db.query.appointments.findMany({
          where: eq(appointments.userId, userId),
          with: { car: true, promotion: true },
          orderBy: [desc(appointments.createdAt)],
        }),
        db.query.payments.findMany({
          where: inArray(
            payments.appointmentId,
            db.select({ id: appointments.id }).from(appointments).where(eq(appointments.userId, userId)),
          ),
          with: { appointment: { with: { car: true } } },
          orderBy: [desc(payments.paymentDate)],
        }),
        db.query.reviews.findMany({
          where: eq(reviews.userId, userId),
          with: { car: true },
          orderBy: [desc(reviews.createdAt)],
        }),
      ]);

      return {
        user,
        appointments: bookings,
        payments: userPayments,
        reviews: userReviews,
        ...summarizeCustomerActivity(bookings, userReviews),
      };
    } catch (error) {
      if (error instanceof StaffException) {
        throw error;
      }
      this.logger.error("Failed to load user details", {
        userId,
        error: error instanceof Error ? error.message : String(error),
      });
      throw new StaffFetchFailedException("Unable to load user details. Please try again later.");
    }
  }

  private buildStatusFilter(statusFilter: UserListQueryDto["statusFilter"]): SQL | undefined {
    if (statusFilter === "Active") return eq(users.isActive, true);
    if (statusFilter === "Inactive") return eq(users.isActive, false);
    return undefined;
  }

  private buildSearchFilter(term: string): SQL | undefined {
    if (!term) {
      return undefined;
    }

    const pattern = toContainsPattern(term);
    return or(
      ilike(users.email, pattern),
      ilike(users.firstName, pattern),
      ilike(users.lastName, pattern),
      ilike(users.phoneNumber, pattern),
      sql`concat_ws(' ', ${users.firstName}, ${users.lastName}) ilike ${pattern}`,
      ilike(users.city, pattern),
      ilike(users.state, pattern),
    );
  }
}
