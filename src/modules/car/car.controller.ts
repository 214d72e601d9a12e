import { Controller, Get, UseGuards } from "@nestjs/common";
import { ZodIdParam, ZodQuery } from "../../common/decorators/zod-validation.decorator";
import { CurrentUser } from "../auth/decorators/current-user.decorator";
import { OptionalSessionGuard } from "../auth/guards/optional-session.guard";
import type { AuthSession } from "../auth/guards/session.guard";
import { CarSearchService } from "./car-search.service";
import { CarService } from "./car.service";
import {
  type CatalogQueryDto,
  type CompareQueryDto,
  catalogQuerySchema,
  compareQuerySchema,
  type HomeQueryDto,
  homeQuerySchema,
} from "./dto/car.dto";

@Controller("api/cars")
export class CarController {
  constructor(
    private readonly carService: CarService,
    private readonly carSearchService: CarSearchService,
  ) {}

  @Get()
  @UseGuards(OptionalSessionGuard)
  async searchCatalog(
    @ZodQuery(catalogQuerySchema) query: CatalogQueryDto,
    @CurrentUser() user: AuthSession["user"] | null,
  ) {
    return this.carSearchService.searchCatalog(query, user?.id);
  }

  @Get("home")
  async getHomePage(@ZodQuery(homeQuerySchema) query: HomeQueryDto) {
    return this.carSearchService.getHomePage(query);
  }

  @Get("recommendations")
  async getRecommendations() {
    return this.carService.getRecommendations();
  }

  @Get("electric")
  async getElectricCars() {
    return this.carService.getElectricCars();
  }

  @Get("electric/compare")
  async compareElectricCars(@ZodQuery(compareQuerySchema) query: CompareQueryDto) {
    const carIds = [query.id1, query.id2, query.id3].filter(
      (carId): carId is number => carId !== undefined,
    );
    return this.carService.compareElectricCars(carIds);
  }

  @Get(":id/summary")
  async getCarSummary(@ZodIdParam() id: number) {
    return this.carService.getCarSummary(id);
  }

  @Get(":id")
  @UseGuards(OptionalSessionGuard)
  async getCarDetails(
    @ZodIdParam() id: number,
    @CurrentUser() user: AuthSession["user"] | null,
  ) {
    return this.carService.getCarDetails(id, user?.id ?? null);
  }
}
