import { Reflector } from "@nestjs/core";
import { Test, type TestingModule } from "@nestjs/testing";
import { beforeEach, describe, expect, it, vi } from "vitest";
import { ZodValidationPipe } from "../../common/pipes/zod-validation.pipe";
import { createAuthSession } from "../../shared/helper.fixtures";
import { AuthService } from "../auth/auth.service";
import { CarController } from "./car.controller";
import { CarService } from "./car.service";
import { CarSearchService } from "./car-search.service";
import { catalogQuerySchema, compareQuerySchema } from "./dto/car.dto";

describe("CarController", () => {
  let controller: CarController;
  let carService: CarService;
  let carSearchService: CarSearchService;

  const customer = createAuthSession("Customer").user;

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      controllers: [CarController],
      providers: [
        {
          provide: CarService,
          useValue: {
            getCarDetails: vi.fn(),
            getCarSummary: vi.fn(),
            getRecommendations: vi.fn(),
            getElectricCars: vi.fn(),
            compareElectricCars: vi.fn(),
          },
        },
        {
          provide: CarSearchService,
          useValue: { searchCatalog: vi.fn(), getHomePage: vi.fn() },
        },
        {
          provide: AuthService,
          useValue: {
            isInitialized: true,
            auth: { api: { getSession: vi.fn().mockResolvedValue(null) } },
            getUserAccess: vi.fn(),
          },
        },
        Reflector,
      ],
    }).compile();

    controller = module.get<CarController>(CarController);
    carService = module.get<CarService>(CarService);
    carSearchService = module.get<CarSearchService>(CarSearchService);
  });

  it("normalizes catalog filters before searching", async () => {
    const query = new ZodValidationPipe(catalogQuerySchema).transform({
      searchQuery: "  tesla ",
      fuelType: "Diesel",
      sortBy: "cheapest",
      minPrice: "50",
      categoryId: "2",
    });

    await controller.searchCatalog(query, customer);

    expect(carSearchService.searchCatalog).toHaveBeenCalledWith(
      {
        searchQuery: "tesla",
        fuelType: "All",
        state: undefined,
        categoryId: 2,
        minPrice: 50,
        sortBy: "price_asc",
      },
      "user-123",
    );
  });

  it("searches anonymously for guests", async () => {
    const query = new ZodValidationPipe(catalogQuerySchema).transform({});

    await controller.searchCatalog(query, null);

    expect(carSearchService.searchCatalog).toHaveBeenCalledWith(query, undefined);
  });

  it("collects the compared ids in order", async () => {
    const query = new ZodValidationPipe(compareQuerySchema).transform({ id1: "4", id3: "2" });

    await controller.compareElectricCars(query);

    expect(carService.compareElectricCars).toHaveBeenCalledWith([4, 2]);
  });

  it("passes the viewer to the details page", async () => {
    await controller.getCarDetails(1, customer);
    await controller.getCarDetails(1, null);

    expect(carService.getCarDetails).toHaveBeenNthCalledWith(1, 1, "user-123");
    expect(carService.getCarDetails).toHaveBeenNthCalledWith(2, 1, null);
  });
});
