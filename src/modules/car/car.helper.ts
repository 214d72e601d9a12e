import { getCarDisplayName } from "../../shared/helper";
import { DEFAULT_RECOMMENDATION_CATEGORY } from "./car.const";
import type { CarRecommendation, CarSummary, CarWithCategory } from "./car.interface";
import type { Car } from "../database/schema";

/** Only a range whose start precedes its end filters by availability. */
export function toAvailabilityWindow(
  startDate?: Date,
  endDate?: Date,
): { startDate: Date; endDate: Date } | null {
  if (!startDate || !endDate || startDate >= endDate) {
    return null;
  }
  return { startDate, endDate };
}

/** Highest average first; ties keep their incoming order. */
export function sortByRating<T extends Pick<Car, "id">>(
  cars: T[],
  averages: ReadonlyMap<number, number>,
): T[] {
  return [...cars].sort((a, b) => (averages.get(b.id) ?? 0) - (averages.get(a.id) ?? 0));
}

export function rankRecommendations(
  cars: CarWithCategory[],
  scoreCar: () => number,
  limit: number,
): CarRecommendation[] {
  return cars
    .map((car) => ({
      id: car.id,
      displayName: getCarDisplayName(car),
      categoryName: car.category?.name ?? DEFAULT_RECOMMENDATION_CATEGORY,
      dailyRate: Number(car.dailyRate),
      city: car.city,
      state: car.state,
      imageUrl: car.imageUrl,
      isElectric: car.isElectric,
      categoryId: car.categoryId,
      recommendationScore: scoreCar(),
    }))
    .sort((a, b) => b.recommendationScore - a.recommendationScore)
    .slice(0, limit);
}

export function toCarSummary(car: Car): CarSummary {
  return {
    id: car.id,
    make: car.make,
    model: car.model,
    year: car.year,
    dailyRate: Number(car.dailyRate),
    isElectric: car.isElectric,
    range: car.range,
    batteryCapacity: car.batteryCapacity,
    city: car.city,
    state: car.state,
    imageUrl: car.imageUrl,
    displayName: getCarDisplayName(car),
  };
}

/** Rows from a cars/categories left join, shaped like a relational query result. */
export function withCategory(row: {
  cars: Car;
  categories: CarWithCategory["category"];
}): CarWithCategory {
  return { ...row.cars, category: row.categories };
}
