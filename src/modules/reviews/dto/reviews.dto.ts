import { z } from "zod";

const ratingSchema = z.coerce.number().int().min(1).max(5);

export const createReviewSchema = z.object({
  carId: z.coerce.number().int().positive(),
  rating: ratingSchema,
  comment: z.string().trim().max(1000).optional(),
});

export type CreateReviewDto = z.infer<typeof createReviewSchema>;

export const updateReviewSchema = z.object({
  rating: ratingSchema,
  comment: z.string().trim().max(1000).nullable().optional(),
});

export type UpdateReviewDto = z.infer<typeof updateReviewSchema>;

export const reviewListQuerySchema = z.object({
  carId: z.coerce.number().int().positive().optional(),
});

export type ReviewListQueryDto = z.infer<typeof reviewListQuerySchema>;

export const REVIEW_MODERATION_FILTERS = ["All", "Pending", "Approved"] as const;

export const reviewModerationQuerySchema = z.object({
  status: z.enum(REVIEW_MODERATION_FILTERS).default("All"),
});

export type ReviewModerationQueryDto = z.infer<typeof reviewModerationQuerySchema>;
