import { Module } from "@nestjs/common";
import { NotificationModule } from "../notification/notification.module";
import { PromotionModule } from "../promotion/promotion.module";
import { SubscriptionModule } from "../subscription/subscription.module";
import { AppointmentBookingService } from "./appointment-booking.service";
import { AppointmentController } from "./appointment.controller";
import { AppointmentService } from "./appointment.service";
import { AppointmentThrottlerGuard } from "./appointment-throttler.guard";

@Module({
  imports: [NotificationModule, PromotionModule, SubscriptionModule],
  controllers: [AppointmentController],
  providers: [AppointmentService, AppointmentBookingService, AppointmentThrottlerGuard],
  exports: [AppointmentService],
})
export class AppointmentModule {}
