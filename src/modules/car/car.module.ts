import { Module } from "@nestjs/common";
import { AppointmentModule } from "../appointment/appointment.module";
import { FavoritesModule } from "../favorites/favorites.module";
import { PromotionModule } from "../promotion/promotion.module";
import { ReviewsModule } from "../reviews/reviews.module";
import { StorageModule } from "../storage/storage.module";
import { CarController } from "./car.controller";
import { CarService } from "./car.service";
import { CarCategoriesService } from "./car-categories.service";
import { CarManagementController } from "./car-management.controller";
import { CarManagementService } from "./car-management.service";
import { CarSearchService } from "./car-search.service";

@Module({
  imports: [AppointmentModule, FavoritesModule, PromotionModule, ReviewsModule, StorageModule],
  controllers: [CarController, CarManagementController],
  providers: [CarService, CarCategoriesService, CarSearchService, CarManagementService],
  exports: [CarCategoriesService, CarManagementService],
})
export class CarModule {}
