import { Injectable, Logger } from "@nestjs/common";
import { and, avg, count, desc, eq, inArray } from "drizzle-orm";
import { DatabaseService } from "../database/database.service";
import { AppointmentStatus } from "../database/enums";
import { appointments, cars, reviews } from "../database/schema";
import { ReviewFetchFailedException } from "./reviews.error";
import { REVIEW_AUTHOR_COLUMNS, roundRating } from "./reviews.helper";
import type {
  RatingSummary,
  ReviewListResult,
  ReviewWithAuthor,
  ReviewWithCarAndAuthor,
} from "./reviews.interface";

@Injectable()
export class ReviewsReadService {
  private readonly logger = new Logger(ReviewsReadService.name);

  constructor(private readonly databaseService: DatabaseService) {}

  /**
   * Published reviews, newest first. With a car filter the result also
   * carries the car and its rating summary.
   */
  async getApprovedReviews(carId?: number): Promise<ReviewListResult> {
    try {
      const approvedReviews: ReviewWithCarAndAuthor[] =
        await this.databaseService.db.query.reviews.findMany({
          where: and(
            eq(reviews.isApproved, true),
            carId === undefined ? undefined : eq(reviews.carId, carId),
          ),
          with: { car: true, user: { columns: REVIEW_AUTHOR_COLUMNS } },
          orderBy: [desc(reviews.createdAt)],
        });

      if (carId === undefined) {
        return { reviews: approvedReviews };
      }

      const [car, ratings] = await Promise.all([
        this.databaseService.db.query.cars.findFirst({ where: eq(cars.id, carId) }),
        this.getCarRatings(carId),
      ]);

      return { reviews: approvedReviews, car: car ?? null, ratings };
    } catch (error) {
      this.logger.error("Failed to fetch reviews", {
        carId,
        error: error instanceof Error ? error.message : String(error),
      });
      throw new ReviewFetchFailedException();
    }
  }

  async getLatestApprovedReviews(carId: number, limit: number): Promise<ReviewWithAuthor[]> {
    return this.databaseService.db.query.reviews.findMany({
      where: and(eq(reviews.carId, carId), eq(reviews.isApproved, true)),
      with: { user: { columns: REVIEW_AUTHOR_COLUMNS } },
      orderBy: [desc(reviews.createdAt)],
      limit,
    });
  }

  async getCarRatings(carId: number): Promise<RatingSummary> {
    const [row] = await this.databaseService.db
      .select({ average: avg(reviews.rating), total: count() })
      .from(reviews)
      .where(and(eq(reviews.carId, carId), eq(reviews.isApproved, true)));

    return {
      averageRating: roundRating(row?.average),
      totalReviews: row?.total ?? 0,
    };
  }

  /** Approved-review average per car; cars without reviews map to 0. */
  async getAverageRatings(carIds: number[]): Promise<Map<number, number>> {
    const averages = new Map<number, number>(carIds.map((carId) => [carId, 0]));
    if (carIds.length === 0) {
      return averages;
    }

    const rows = await this.databaseService.db
      .select({ carId: reviews.carId, average: avg(reviews.rating) })
      .from(reviews)
      .where(and(inArray(reviews.carId, carIds), eq(reviews.isApproved, true)))
      .groupBy(reviews.carId);

    for (const row of rows) {
      averages.set(row.carId, roundRating(row.average));
    }
    return averages;
  }

  /** A completed booking of the car is the ticket to review it. */
  async hasCompletedBooking(userId: string, carId: number): Promise<boolean> {
    const completed = await this.databaseService.db.$count(
      appointments,
      and(
        eq(appointments.carId, carId),
        eq(appointments.userId, userId),
        eq(appointments.status, AppointmentStatus.COMPLETED),
      ),
    );
    return completed > 0;
  }
}
