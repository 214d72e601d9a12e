import { Injectable, Logger } from "@nestjs/common";
import { and, eq, inArray } from "drizzle-orm";
import { getCarDisplayName } from "../../shared/helper";
import { BACK_OFFICE_ROLES, isBackOfficeRole } from "../auth/auth.types";
import type { AuthSession } from "../auth/guards/session.guard";
import { DatabaseService } from "../database/database.service";
import { NotificationType } from "../database/enums";
import { type Car, type Review, cars, reviews, users } from "../database/schema";
import { NotificationService } from "../notification/notification.service";
import type { CreateReviewDto, UpdateReviewDto } from "./dto/reviews.dto";
import {
  ReviewAlreadyExistsException,
  ReviewBookingNotCompletedException,
  ReviewCarNotFoundException,
  ReviewNotFoundException,
  ReviewOwnershipRequiredException,
} from "./reviews.error";
import type { ReviewActionResult } from "./reviews.interface";
import { ReviewsReadService } from "./reviews-read.service";

@Injectable()
export class ReviewsWriteService {
  private readonly logger = new Logger(ReviewsWriteService.name);

  constructor(
    private readonly databaseService: DatabaseService,
    private readonly reviewsReadService: ReviewsReadService,
    private readonly notificationService: NotificationService,
  ) {}

  /**
   * New reviews wait for moderation. One review per car per user; the
   * existing review id travels in the conflict so clients can open it.
   */
  async createReview(
    userId: string,
    input: CreateReviewDto,
  ): Promise<{ review: Review; message: string }> {
    const car = await this.databaseService.db.query.cars.findFirst({
      where: eq(cars.id, input.carId),
    });
    if (!car) {
      throw new ReviewCarNotFoundException();
    }

    if (!(await this.reviewsReadService.hasCompletedBooking(userId, input.carId))) {
      throw new ReviewBookingNotCompletedException();
    }

    const existing = await this.databaseService.db.query.reviews.findFirst({
      where: and(eq(reviews.carId, input.carId), eq(reviews.userId, userId)),
      columns: { id: true },
    });
    if (existing) {
      throw new ReviewAlreadyExistsException(existing.id);
    }

    const [review] = await this.databaseService.db
      .insert(reviews)
      .values({
        carId: input.carId,
        userId,
        rating: input.rating,
        comment: input.comment ?? null,
        isApproved: false,
      })
      .returning();

    this.logger.log("Review submitted", { reviewId: review.id, carId: input.carId, userId });

    try {
      await this.notifyReviewers(car);
    } catch (error) {
      this.logger.warn("Failed to notify reviewers", {
        reviewId: review.id,
        error: error instanceof Error ? error.message : String(error),
      });
    }

    return {
      review,
      message: "Review submitted successfully! It will be reviewed before publication.",
    };
  }

  /** Edits send the review back to moderation. */
  async updateReview(
    userId: string,
    reviewId: number,
    input: UpdateReviewDto,
  ): Promise<{ review: Review; message: string }> {
    const existing = await this.databaseService.db.query.reviews.findFirst({
      where: eq(reviews.id, reviewId),
      columns: { id: true, userId: true },
    });
    if (!existing) {
      throw new ReviewNotFoundException();
    }
    if (existing.userId !== userId) {
      throw new ReviewOwnershipRequiredException("You can only edit your own reviews.");
    }

    const [review] = await this.databaseService.db
      .update(reviews)
      .set({
        rating: input.rating,
        ...(input.comment !== undefined && { comment: input.comment }),
        isApproved: false,
        updatedAt: new Date(),
      })
      .where(eq(reviews.id, reviewId))
      .returning();

    return { review, message: "Review updated successfully!" };
  }

  async deleteReview(reviewId: number, user: AuthSession["user"]): Promise<ReviewActionResult> {
    const existing = await this.databaseService.db.query.reviews.findFirst({
      where: eq(reviews.id, reviewId),
      columns: { id: true, userId: true },
    });
    if (!existing) {
      throw new ReviewNotFoundException();
    }
    if (existing.userId !== user.id && !isBackOfficeRole(user.role)) {
      throw new ReviewOwnershipRequiredException("You can only delete your own reviews.");
    }

    await this.databaseService.db.delete(reviews).where(eq(reviews.id, reviewId));
    this.logger.log("Review deleted", { reviewId, deletedBy: user.id });

    return { success: true, message: "Review deleted successfully!" };
  }

  private async notifyReviewers(car: Car): Promise<void> {
    const reviewers = await this.databaseService.db
      .select({ id: users.id })
      .from(users)
      .where(inArray(users.role, [...BACK_OFFICE_ROLES]));

    await this.notificationService.notifyUsers(
      reviewers.map((reviewer) => reviewer.id),
      "New Review Pending Approval",
      `A new review for ${getCarDisplayName(car)} is waiting for approval.`,
      NotificationType.INFO,
    );
  }
}
