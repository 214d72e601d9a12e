import { UTCDate } from "@date-fns/utc";
import { addDays, startOfDay, startOfMonth, subMonths } from "date-fns";
import { and, gte, lte, type SQL, sql } from "drizzle-orm";
import type { PgColumn } from "drizzle-orm/pg-core";
import { appointments } from "../database/schema";
import type { AnalyticsPeriods, DateRange } from "./analytics.interface";

/** UTC calendar boundaries around `now`. */
export function getAnalyticsPeriods(now: Date): AnalyticsPeriods {
  const today = startOfDay(new UTCDate(now));
  const monthStart = startOfMonth(today);

  return {
    today,
    tomorrow: addDays(today, 1),
    monthStart,
    lastMonthStart: subMonths(monthStart, 1),
  };
}

/** Groups a timestamp column by its UTC calendar day, as "yyyy-MM-dd". */
export function utcDay(column: PgColumn) {
  return sql<string>`to_char(${column} at time zone 'UTC', 'YYYY-MM-DD')`;
}

/** Bookings created in `range`; the end bound is inclusive and optional. */
export function createdWithin(range: DateRange): SQL | undefined {
  return and(
    gte(appointments.createdAt, range.start),
    range.end ? lte(appointments.createdAt, range.end) : undefined,
  );
}
