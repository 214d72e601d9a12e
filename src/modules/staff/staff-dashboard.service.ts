import { Injectable, Logger } from "@nestjs/common";
import { addMonths, subMonths } from "date-fns";
import { and, asc, count, desc, eq, gte, lt, lte, ne, sum } from "drizzle-orm";
import { toMoney } from "../../shared/helper";
import { CUSTOMER } from "../auth/auth.types";
import { DatabaseService } from "../database/database.service";
import { AppointmentStatus } from "../database/enums";
import { appointments, cars, users } from "../database/schema";
import { createdWithin, getAnalyticsPeriods, utcDay } from "../analytics/analytics.helper";
import { AnalyticsService } from "../analytics/analytics.service";
import type { CalendarQueryDto, StaffReportQueryDto } from "./dto/staff.dto";
import { RECENT_BOOKINGS_LIMIT } from "./staff.const";
import { StaffFetchFailedException } from "./staff.error";
import { toCalendarEvent } from "./staff.helper";
import type { CalendarEvent, StaffDashboard, StaffReport } from "./staff.interface";

@Injectable()
export class StaffDashboardService {
  private readonly logger = new Logger(StaffDashboardService.name);

  constructor(
    private readonly databaseService: DatabaseService,
    private readonly analyticsService: AnalyticsService,
  ) {}

  /** Booking counts other than `cancelledAppointments` leave cancelled orders out. */
  async getDashboard(now = new Date()): Promise<StaffDashboard> {
    const db = this.databaseService.db;
    const { today, tomorrow, monthStart } = getAnalyticsPeriods(now);
    const active = ne(appointments.status, AppointmentStatus.CANCELLED);

    try {
      const [
        totalAppointments,
        todayAppointments,
        pendingAppointments,
        confirmedAppointments,
        completedAppointments,
        cancelledAppointments,
        totalRevenue,
        thisMonthRevenue,
        availableCars,
        totalCars,
        totalCustomers,
        recentBookings,
      ] = await Promise.all([
        db.$count(appointments, active),
        db.$count(
          appointments,
          and(active, gte(appointments.startDate, today), lt(appointments.startDate, tomorrow)),
        ),
        db.$count(appointments, eq(appointments.status, AppointmentStatus.PENDING)),
        db.$count(appointments, eq(appointments.status, AppointmentStatus.CONFIRMED)),
        db.$count(appointments, eq(appointments.status, AppointmentStatus.COMPLETED)),
        db.$count(appointments, eq(appointments.status, AppointmentStatus.CANCELLED)),
        this.analyticsService.sumRevenue(),
        this.analyticsService.sumRevenue(gte(appointments.createdAt, monthStart)),
        db.$count(cars, eq(cars.isAvailable, true)),
        db.$count(cars),
        db.$count(users, eq(users.role, CUSTOMER)),
        db.query.appointments.findMany({
          where: active,
          with: { car: true },
          orderBy: [desc(appointments.createdAt)],
          limit: RECENT_BOOKINGS_LIMIT,
        }),
      ]);

      return {
        totalAppointments,
        todayAppointments,
        pendingAppointments,
        confirmedAppointments,
        completedAppointments,
        cancelledAppointments,
        totalRevenue,
        thisMonthRevenue,
        availableCars,
        totalCars,
        totalCustomers,
        recentBookings,
      };
    } catch (error) {
      this.logger.error("Failed to load staff dashboard", {
        error: error instanceof Error ? error.message : String(error),
      });
      throw new StaffFetchFailedException("Unable to load dashboard data. Please try again later.");
    }
  }

  /** Bookings made within the range; defaults to the month up to now. */
  async getReport(query: StaffReportQueryDto, now = new Date()): Promise<StaffReport> {
    const db = this.databaseService.db;
    const range = { start: query.startDate ?? subMonths(now, 1), end: query.endDate ?? now };
    const inRange = createdWithin(range);
    const day = utcDay(appointments.createdAt);

    try {
      const [totalBookings, totalRevenue, revenueByStatus, topCars, bookingsByDay] =
        await Promise.all([
          db.$count(appointments, inRange),
          this.analyticsService.sumRevenue(inRange),
          db
            .select({ status: appointments.status, revenue: sum(appointments.totalPrice) })
            .from(appointments)
            .where(inRange)
            .groupBy(appointments.status),
          this.analyticsService.getTopCars(range),
          db
            .select({ date: day, count: count() })
            .from(appointments)
            .where(inRange)
            .groupBy(day)
            .orderBy(day),
        ]);

      return {
        startDate: range.start,
        endDate: range.end,
        totalBookings,
        totalRevenue,
        revenueByStatus: revenueByStatus.map((row) => ({
          status: row.status,
          revenue: toMoney(row.revenue ?? 0),
        })),
        topCars: topCars.map(({ car, count: bookings }) => ({ car, count: bookings })),
        bookingsByDay,
      };
    } catch (error) {
      this.logger.error("Failed to build staff report", {
        start: range.start.toISOString(),
        end: range.end.toISOString(),
        error: error instanceof Error ? error.message : String(error),
      });
      throw new StaffFetchFailedException("Unable to generate report. Please try again later.");
    }
  }

  /** Non-cancelled bookings overlapping the window, one month either side of now by default. */
  async getCalendarEvents(query: CalendarQueryDto, now = new Date()): Promise<CalendarEvent[]> {
    const start = query.start ?? subMonths(now, 1);
    const end = query.end ?? addMonths(now, 1);

    const bookings = await this.databaseService.db.query.appointments.findMany({
      where: and(
        ne(appointments.status, AppointmentStatus.CANCELLED),
        lte(appointments.startDate, end),
        gte(appointments.endDate, start),
      ),
      with: { car: true },
      orderBy: [asc(appointments.startDate)],
    });

    return bookings.map(toCalendarEvent);
  }
}
