import { UTCDate } from "@date-fns/utc";
import { format } from "date-fns";
import { Decimal } from "decimal.js";
import type { Car } from "../modules/database/schema";

type CarNameFields = Pick<Car, "year" | "make" | "model" | "licensePlate">;

export function getCarDisplayName(car: CarNameFields): string {
  return `${car.year} ${car.make} ${car.model} - ${car.licensePlate}`;
}

/** "Tesla Model 3" style label used in reports. */
export function getCarLabel(car: Pick<Car, "make" | "model">): string {
  return `${car.make} ${car.model}`;
}

/** `%term%` for LIKE/ILIKE with the term's own wildcards escaped. */
export function toContainsPattern(term: string): string {
  return `%${term.replaceAll(/[\\%_]/g, (char) => `\\${char}`)}%`;
}

export function normalizePhoneNumber(phoneNumber: string): string {
  return phoneNumber.replaceAll(/\D/g, "");
}

/** Two-decimal string used for numeric(10,2) columns. */
export function toMoney(value: Decimal.Value): string {
  return new Decimal(value).toFixed(2);
}

/** Grouped two-decimal amount, e.g. 1234.5 -> "1,234.50". */
export function formatAmount(value: Decimal.Value): string {
  const [whole, fraction] = new Decimal(value).toFixed(2).split(".");
  const negative = whole.startsWith("-");
  const digits = negative ? whole.slice(1) : whole;
  const grouped = digits.replaceAll(/\B(?=(\d{3})+(?!\d))/g, ",");
  return `${negative ? "-" : ""}${grouped}.${fraction}`;
}

export function sumMoney(values: Decimal.Value[]): Decimal {
  return values.reduce<Decimal>((total, value) => total.plus(value), new Decimal(0));
}

export function averageOf(values: number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((total, value) => total + value, 0) / values.length;
}

/** UTC, e.g. "Jun 01, 2025 09:30". */
export function formatBookingDate(date: Date): string {
  return format(new UTCDate(date), "MMM dd, yyyy HH:mm");
}

export function maskEmail(email: string): string {
  const [local, domain] = email.split("@");
  if (!domain) return "***";
  const visible = local.slice(0, Math.min(2, local.length));
  return `${visible}***@${domain}`;
}
