import { MiddlewareConsumer, Module, NestModule } from "@nestjs/common";
import { ConfigModule } from "@nestjs/config";
import { APP_FILTER, APP_GUARD } from "@nestjs/core";
import { ScheduleModule } from "@nestjs/schedule";
import { ThrottlerModule } from "@nestjs/throttler";
import { GlobalExceptionFilter } from "./common/filters/global-exception.filter";
import { RequestIdMiddleware } from "./common/middlewares/request-id.middleware";
import { GlobalThrottlerGuard } from "./common/throttling/global-throttler.guard";
import { GLOBAL_THROTTLE } from "./config/constants";
import { validateEnvironment } from "./config/env.config";
import { AccountModule } from "./modules/account/account.module";
import { AnalyticsModule } from "./modules/analytics/analytics.module";
import { AppointmentModule } from "./modules/appointment/appointment.module";
import { AuthModule } from "./modules/auth/auth.module";
import { CarModule } from "./modules/car/car.module";
import { DatabaseModule } from "./modules/database/database.module";
import { FavoritesModule } from "./modules/favorites/favorites.module";
import { HealthModule } from "./modules/health/health.module";
import { ManagerModule } from "./modules/manager/manager.module";
import { NotificationModule } from "./modules/notification/notification.module";
import { PaymentModule } from "./modules/payment/payment.module";
import { PromotionModule } from "./modules/promotion/promotion.module";
import { ReviewsModule } from "./modules/reviews/reviews.module";
import { SeedModule } from "./modules/seed/seed.module";
import { SettingsModule } from "./modules/settings/settings.module";
import { StaffModule } from "./modules/staff/staff.module";
import { StorageModule } from "./modules/storage/storage.module";
import { SubscriptionModule } from "./modules/subscription/subscription.module";

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      validate: validateEnvironment,
    }),
    ScheduleModule.forRoot(),
    ThrottlerModule.forRoot([GLOBAL_THROTTLE]),
    DatabaseModule,
    AuthModule,
    NotificationModule,
    StorageModule,
    AccountModule,
    CarModule,
    AppointmentModule,
    PaymentModule,
    PromotionModule,
    SubscriptionModule,
    ReviewsModule,
    FavoritesModule,
    AnalyticsModule,
    StaffModule,
    ManagerModule,
    SettingsModule,
    HealthModule,
    SeedModule,
  ],
  providers: [
    { provide: APP_FILTER, useClass: GlobalExceptionFilter },
    { provide: APP_GUARD, useClass: GlobalThrottlerGuard },
  ],
})
export class AppModule implements NestModule {
  configure(consumer: MiddlewareConsumer): void {
    consumer.apply(RequestIdMiddleware).forRoutes("*path");
  }
}
