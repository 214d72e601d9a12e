import { randomInt } from "node:crypto";
import { UTCDate } from "@date-fns/utc";
import { Injectable, Logger } from "@nestjs/common";
import { addDays, startOfDay } from "date-fns";
import { and, asc, eq, inArray } from "drizzle-orm";
import { SLOT_WINDOW_DAYS } from "../../config/constants";
import { getCarDisplayName } from "../../shared/helper";
import { formatSlot } from "../appointment/appointment-availability.helper";
import { AppointmentService } from "../appointment/appointment.service";
import { DatabaseService } from "../database/database.service";
import { cars } from "../database/schema";
import { FavoritesService } from "../favorites/favorites.service";
import type { RatingSummary, ReviewWithAuthor } from "../reviews/reviews.interface";
import { ReviewsReadService } from "../reviews/reviews-read.service";
import {
  CAR_DETAIL_REVIEW_LIMIT,
  MAX_COMPARED_CARS,
  RECOMMENDATION_LIMIT,
  RECOMMENDATION_SCORE_MAX,
  RECOMMENDATION_SCORE_MIN,
} from "./car.const";
import { CarNotFoundException } from "./car.error";
import { rankRecommendations, toCarSummary } from "./car.helper";
import type {
  CarDetailsResult,
  CarRecommendation,
  CarSummary,
  CarWithCategory,
} from "./car.interface";

@Injectable()
export class CarService {
  private readonly logger = new Logger(CarService.name);

  constructor(
    private readonly databaseService: DatabaseService,
    private readonly appointmentService: AppointmentService,
    private readonly reviewsReadService: ReviewsReadService,
    private readonly favoritesService: FavoritesService,
  ) {}

  /**
   * Everything the vehicle page shows: the latest approved reviews, the
   * viewer's review/favorite state and free slots for the next 30 days
   * starting at today's UTC midnight.
   */
  async getCarDetails(carId: number, userId: string | null): Promise<CarDetailsResult> {
    const car = await this.databaseService.db.query.cars.findFirst({
      where: eq(cars.id, carId),
      with: { category: true },
    });
    if (!car) {
      throw new CarNotFoundException();
    }

    const windowStart = startOfDay(new UTCDate());
    const windowEnd = addDays(windowStart, SLOT_WINDOW_DAYS);

    const [{ reviews, ratings }, viewer, slots] = await Promise.all([
      this.loadReviews(carId),
      this.loadViewerState(carId, userId),
      this.appointmentService.getAvailableTimeSlots(carId, windowStart, windowEnd),
    ]);

    return {
      car,
      displayName: getCarDisplayName(car),
      reviews,
      averageRating: ratings.averageRating,
      totalReviews: ratings.totalReviews,
      canReview: viewer.canReview,
      isFavorited: viewer.isFavorited,
      availableSlots: slots.map(formatSlot),
      slotWindow: formatSlot({ start: windowStart, end: windowEnd }),
    };
  }

  async getCarSummary(carId: number): Promise<CarSummary | { error: string }> {
    const car = await this.databaseService.db.query.cars.findFirst({
      where: eq(cars.id, carId),
    });
    if (!car) {
      return { error: "Car not found" };
    }
    return toCarSummary(car);
  }

  /** Scores are simulated; the top six available cars by score are returned. */
  async getRecommendations(): Promise<CarRecommendation[]> {
    const available = await this.databaseService.db.query.cars.findMany({
      where: eq(cars.isAvailable, true),
      with: { category: true },
    });

    return rankRecommendations(
      available,
      () => randomInt(RECOMMENDATION_SCORE_MIN, RECOMMENDATION_SCORE_MAX),
      RECOMMENDATION_LIMIT,
    );
  }

  async getElectricCars(): Promise<CarWithCategory[]> {
    return this.databaseService.db.query.cars.findMany({
      where: and(eq(cars.isElectric, true), eq(cars.isAvailable, true)),
      with: { category: true },
      orderBy: [asc(cars.dailyRate)],
    });
  }

  /** Up to three electric cars in the order requested; unknown and gas ids are skipped. */
  async compareElectricCars(carIds: number[]): Promise<CarWithCategory[]> {
    const requested = [...new Set(carIds)].slice(0, MAX_COMPARED_CARS);
    if (requested.length === 0) {
      return [];
    }

    const found = await this.databaseService.db.query.cars.findMany({
      where: and(inArray(cars.id, requested), eq(cars.isElectric, true)),
      with: { category: true },
    });
    const byId = new Map(found.map((car) => [car.id, car]));

    return requested.flatMap((carId) => {
      const car = byId.get(carId);
      return car ? [car] : [];
    });
  }

  private async loadReviews(
    carId: number,
  ): Promise<{ reviews: ReviewWithAuthor[]; ratings: RatingSummary }> {
    try {
      const [reviews, ratings] = await Promise.all([
        this.reviewsReadService.getLatestApprovedReviews(carId, CAR_DETAIL_REVIEW_LIMIT),
        this.reviewsReadService.getCarRatings(carId),
      ]);
      return { reviews, ratings };
    } catch (error) {
      this.logger.warn("Reviews unavailable for car details", {
        carId,
        error: error instanceof Error ? error.message : String(error),
      });
      return { reviews: [], ratings: { averageRating: 0, totalReviews: 0 } };
    }
  }

  private async loadViewerState(
    carId: number,
    userId: string | null,
  ): Promise<{ canReview: boolean; isFavorited: boolean }> {
    if (!userId) {
      return { canReview: false, isFavorited: false };
    }

    try {
      const [canReview, isFavorited] = await Promise.all([
        this.reviewsReadService.hasCompletedBooking(userId, carId),
        this.favoritesService.isFavorited(userId, carId),
      ]);
      return { canReview, isFavorited };
    } catch (error) {
      this.logger.warn("Viewer state unavailable for car details", {
        carId,
        userId,
        error: error instanceof Error ? error.message : String(error),
      });
      return { canReview: false, isFavorited: false };
    }
  }
}
