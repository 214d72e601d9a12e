import { Injectable, Logger } from "@nestjs/common";
import { subMonths } from "date-fns";
import { and, count, desc, eq, gte, inArray, lt, type SQL, sum } from "drizzle-orm";
import { getCarLabel, toMoney } from "../../shared/helper";
import { DatabaseService } from "../database/database.service";
import { appointments, cars } from "../database/schema";
import type { RevenueRangeQueryDto } from "./dto/analytics.dto";
import { REVENUE_STATUSES, TOP_CARS_LIMIT } from "./analytics.const";
import { AnalyticsFetchFailedException } from "./analytics.error";
import { createdWithin, getAnalyticsPeriods, utcDay } from "./analytics.helper";
import type { AnalyticsDashboard, DailyRevenue, DateRange, TopCar } from "./analytics.interface";

@Injectable()
export class AnalyticsService {
  private readonly logger = new Logger(AnalyticsService.name);

  constructor(private readonly databaseService: DatabaseService) {}

  /**
   * Revenue and booking counts for today, this month and last month (UTC).
   * "Today" revenue is keyed on the rental start date; every other figure is
   * keyed on when the booking was made.
   */
  async getDashboard(now = new Date()): Promise<AnalyticsDashboard> {
    const { today, tomorrow, monthStart, lastMonthStart } = getAnalyticsPeriods(now);
    const db = this.databaseService.db;
    const lastMonth = and(
      gte(appointments.createdAt, lastMonthStart),
      lt(appointments.createdAt, monthStart),
    );

    try {
      const [
        revenueToday,
        revenueThisMonth,
        revenueLastMonth,
        bookingsToday,
        bookingsThisMonth,
        bookingsLastMonth,
        topCars,
        revenueByDay,
      ] = await Promise.all([
        this.sumRevenue(
          and(gte(appointments.startDate, today), lt(appointments.startDate, tomorrow)),
        ),
        this.sumRevenue(gte(appointments.createdAt, monthStart)),
        this.sumRevenue(lastMonth),
        db.$count(
          appointments,
          and(gte(appointments.createdAt, today), lt(appointments.createdAt, tomorrow)),
        ),
        db.$count(appointments, gte(appointments.createdAt, monthStart)),
        db.$count(appointments, lastMonth),
        this.getTopCars({ start: monthStart }),
        this.getDailyRevenue(gte(appointments.createdAt, monthStart)),
      ]);

      return {
        revenue: { today: revenueToday, thisMonth: revenueThisMonth, lastMonth: revenueLastMonth },
        bookings: { today: bookingsToday, thisMonth: bookingsThisMonth, lastMonth: bookingsLastMonth },
        topCars,
        revenueByDay,
      };
    } catch (error) {
      this.logger.error("Failed to load analytics dashboard", {
        error: error instanceof Error ? error.message : String(error),
      });
      throw new AnalyticsFetchFailedException();
    }
  }

  /** Daily revenue between two dates, defaulting to the last month. */
  async getRevenueSeries(query: RevenueRangeQueryDto, now = new Date()): Promise<DailyRevenue[]> {
    const range = { start: query.startDate ?? subMonths(now, 1), end: query.endDate ?? now };

    try {
      return await this.getDailyRevenue(createdWithin(range));
    } catch (error) {
      this.logger.error("Failed to load revenue series", {
        start: range.start.toISOString(),
        end: range.end.toISOString(),
        error: error instanceof Error ? error.message : String(error),
      });
      throw new AnalyticsFetchFailedException();
    }
  }

  async sumRevenue(condition?: SQL): Promise<string> {
    const [row] = await this.databaseService.db
      .select({ total: sum(appointments.totalPrice) })
      .from(appointments)
      .where(and(inArray(appointments.status, REVENUE_STATUSES), condition));

    return toMoney(row?.total ?? 0);
  }

  /** Most booked make/model pairs in the range, regardless of booking status. */
  async getTopCars(range: DateRange, limit = TOP_CARS_LIMIT): Promise<TopCar[]> {
    const bookings = count();
    const rows = await this.databaseService.db
      .select({
        make: cars.make,
        model: cars.model,
        count: bookings,
        revenue: sum(appointments.totalPrice),
      })
      .from(appointments)
      .innerJoin(cars, eq(appointments.carId, cars.id))
      .where(createdWithin(range))
      .groupBy(cars.make, cars.model)
      .orderBy(desc(bookings))
      .limit(limit);

    return rows.map((row) => ({
      car: getCarLabel(row),
      count: row.count,
      revenue: toMoney(row.revenue ?? 0),
    }));
  }

  private async getDailyRevenue(condition?: SQL): Promise<DailyRevenue[]> {
    const day = utcDay(appointments.createdAt);
    const rows = await this.databaseService.db
      .select({ date: day, revenue: sum(appointments.totalPrice), bookings: count() })
      .from(appointments)
      .where(and(inArray(appointments.status, REVENUE_STATUSES), condition))
      .groupBy(day)
      .orderBy(day);

    return rows.map((row) => ({
      date: row.date,
      revenue: toMoney(row.revenue ?? 0),
      bookings: row.bookings,
    }));
  }
}
