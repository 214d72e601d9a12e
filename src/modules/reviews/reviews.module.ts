import { Module } from "@nestjs/common";
import { NotificationModule } from "../notification/notification.module";
import { ReviewsController } from "./reviews.controller";
import { ReviewsModerationService } from "./reviews-moderation.service";
import { ReviewsReadService } from "./reviews-read.service";
import { ReviewsWriteService } from "./reviews-write.service";

@Module({
  imports: [NotificationModule],
  controllers: [ReviewsController],
  providers: [ReviewsWriteService, ReviewsReadService, ReviewsModerationService],
  exports: [ReviewsReadService],
})
export class ReviewsModule {}
