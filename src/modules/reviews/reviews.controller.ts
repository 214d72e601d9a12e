import {
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Post,
  Put,
  UseGuards,
} from "@nestjs/common";
import { ZodBody, ZodIdParam, ZodQuery } from "../../common/decorators/zod-validation.decorator";
import { CUSTOMER, MANAGER, STAFF } from "../auth/auth.types";
import { CurrentUser } from "../auth/decorators/current-user.decorator";
import { Roles } from "../auth/decorators/roles.decorator";
import { RoleGuard } from "../auth/guards/role.guard";
import { type AuthSession, SessionGuard } from "../auth/guards/session.guard";
import {
  type CreateReviewDto,
  createReviewSchema,
  type ReviewListQueryDto,
  type ReviewModerationQueryDto,
  reviewListQuerySchema,
  reviewModerationQuerySchema,
  type UpdateReviewDto,
  updateReviewSchema,
} from "./dto/reviews.dto";
import { ReviewsModerationService } from "./reviews-moderation.service";
import { ReviewsReadService } from "./reviews-read.service";
import { ReviewsWriteService } from "./reviews-write.service";

@Controller("api/reviews")
export class ReviewsController {
  constructor(
    private readonly reviewsWriteService: ReviewsWriteService,
    private readonly reviewsReadService: ReviewsReadService,
    private readonly reviewsModerationService: ReviewsModerationService,
  ) {}

  @Get()
  async getReviews(@ZodQuery(reviewListQuerySchema) query: ReviewListQueryDto) {
    return this.reviewsReadService.getApprovedReviews(query.carId);
  }

  @Post()
  @HttpCode(HttpStatus.CREATED)
  @UseGuards(SessionGuard, RoleGuard)
  @Roles(CUSTOMER)
  async createReview(
    @ZodBody(createReviewSchema) body: CreateReviewDto,
    @CurrentUser() user: AuthSession["user"],
  ) {
    return this.reviewsWriteService.createReview(user.id, body);
  }

  @Get("moderation")
  @UseGuards(SessionGuard, RoleGuard)
  @Roles(STAFF, MANAGER)
  async getModerationQueue(@ZodQuery(reviewModerationQuerySchema) query: ReviewModerationQueryDto) {
    return this.reviewsModerationService.getModerationQueue(query.status);
  }

  @Put(":id")
  @UseGuards(SessionGuard, RoleGuard)
  @Roles(CUSTOMER)
  async updateReview(
    @ZodIdParam() id: number,
    @ZodBody(updateReviewSchema) body: UpdateReviewDto,
    @CurrentUser() user: AuthSession["user"],
  ) {
    return this.reviewsWriteService.updateReview(user.id, id, body);
  }

  @Delete(":id")
  @UseGuards(SessionGuard)
  async deleteReview(
    @ZodIdParam() id: number,
    @CurrentUser() user: AuthSession["user"],
  ) {
    return this.reviewsWriteService.deleteReview(id, user);
  }

  @Post(":id/approve")
  @HttpCode(HttpStatus.OK)
  @UseGuards(SessionGuard, RoleGuard)
  @Roles(STAFF, MANAGER)
  async approveReview(
    @ZodIdParam() id: number,
    @CurrentUser() user: AuthSession["user"],
  ) {
    return this.reviewsModerationService.approveReview(id, user.id);
  }

  @Post(":id/reject")
  @HttpCode(HttpStatus.OK)
  @UseGuards(SessionGuard, RoleGuard)
  @Roles(STAFF, MANAGER)
  async rejectReview(
    @ZodIdParam() id: number,
    @CurrentUser() user: AuthSession["user"],
  ) {
    return this.reviewsModerationService.rejectReview(id, user.id);
  }
}
