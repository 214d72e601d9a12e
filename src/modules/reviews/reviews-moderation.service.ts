import { Injectable, Logger } from "@nestjs/common";
import { avg, desc, eq } from "drizzle-orm";
import { DatabaseService } from "../database/database.service";
import { reviews } from "../database/schema";
import type { ReviewModerationQueryDto } from "./dto/reviews.dto";
import { ReviewNotFoundException } from "./reviews.error";
import { REVIEW_AUTHOR_COLUMNS, roundRating } from "./reviews.helper";
import type {
  ReviewActionResult,
  ReviewModerationStats,
  ReviewWithCarAndAuthor,
} from "./reviews.interface";

@Injectable()
export class ReviewsModerationService {
  private readonly logger = new Logger(ReviewsModerationService.name);

  constructor(private readonly databaseService: DatabaseService) {}

  async getModerationQueue(
    status: ReviewModerationQueryDto["status"],
  ): Promise<{ reviews: ReviewWithCarAndAuthor[]; stats: ReviewModerationStats }> {
    const filter =
      status === "Pending"
        ? eq(reviews.isApproved, false)
        : status === "Approved"
          ? eq(reviews.isApproved, true)
          : undefined;

    const [queue, stats] = await Promise.all([
      this.databaseService.db.query.reviews.findMany({
        where: filter,
        with: { car: true, user: { columns: REVIEW_AUTHOR_COLUMNS } },
        orderBy: [desc(reviews.createdAt)],
      }),
      this.getStats(),
    ]);

    return { reviews: queue, stats };
  }

  async approveReview(reviewId: number, moderatorId: string): Promise<ReviewActionResult> {
    const approved = await this.databaseService.db
      .update(reviews)
      .set({ isApproved: true, updatedAt: new Date() })
      .where(eq(reviews.id, reviewId))
      .returning({ id: reviews.id });

    if (approved.length === 0) {
      throw new ReviewNotFoundException();
    }

    this.logger.log("Review approved", { reviewId, moderatorId });
    return { success: true, message: "Review approved successfully!" };
  }

  /** Rejection removes the review outright. */
  async rejectReview(reviewId: number, moderatorId: string): Promise<ReviewActionResult> {
    const removed = await this.databaseService.db
      .delete(reviews)
      .where(eq(reviews.id, reviewId))
      .returning({ id: reviews.id });

    if (removed.length === 0) {
      throw new ReviewNotFoundException();
    }

    this.logger.log("Review rejected", { reviewId, moderatorId });
    return { success: true, message: "Review rejected and removed." };
  }

  private async getStats(): Promise<ReviewModerationStats> {
    const [totalReviews, pendingReviews, approvedReviews, [approvedAverage]] = await Promise.all([
      this.databaseService.db.$count(reviews),
      this.databaseService.db.$count(reviews, eq(reviews.isApproved, false)),
      this.databaseService.db.$count(reviews, eq(reviews.isApproved, true)),
      this.databaseService.db
        .select({ average: avg(reviews.rating) })
        .from(reviews)
        .where(eq(reviews.isApproved, true)),
    ]);

    return {
      totalReviews,
      pendingReviews,
      approvedReviews,
      averageRating: roundRating(approvedAverage?.average),
    };
  }
}
