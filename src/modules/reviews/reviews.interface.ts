import type { Car, Review, User } from "../database/schema";

export type ReviewAuthor = Pick<User, "id" | "firstName" | "lastName" | "profilePictureUrl">;

export type ReviewWithAuthor = Review & { user: ReviewAuthor };

export type ReviewWithCarAndAuthor = ReviewWithAuthor & { car: Car };

export interface RatingSummary {
  averageRating: number;
  totalReviews: number;
}

export interface ReviewListResult {
  reviews: ReviewWithCarAndAuthor[];
  car?: Car | null;
  ratings?: RatingSummary;
}

export interface ReviewModerationStats {
  totalReviews: number;
  pendingReviews: number;
  approvedReviews: number;
  averageRating: number;
}

export interface ReviewActionResult {
  success: true;
  message: string;
}
