import { randomInt } from "node:crypto";
import { Test, type TestingModule } from "@nestjs/testing";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  createCar,
  createCategory,
  createMockDatabase,
  createReview,
  createUser,
  type MockDatabase,
} from "../../shared/helper.fixtures";
import { AppointmentService } from "../appointment/appointment.service";
import { DatabaseService } from "../database/database.service";
import { FavoritesService } from "../favorites/favorites.service";
import { ReviewsReadService } from "../reviews/reviews-read.service";
import { CarNotFoundException } from "./car.error";
import { CarService } from "./car.service";

vi.mock("node:crypto", async (importOriginal) => ({
  ...(await importOriginal<typeof import("node:crypto")>()),
  randomInt: vi.fn(),
}));

describe("CarService", () => {
  let service: CarService;
  let db: MockDatabase;

  const appointmentServiceMock = {
    getAvailableTimeSlots: vi.fn(),
  };
  const reviewsReadServiceMock = {
    getLatestApprovedReviews: vi.fn(),
    getCarRatings: vi.fn(),
    hasCompletedBooking: vi.fn(),
  };
  const favoritesServiceMock = {
    isFavorited: vi.fn(),
  };

  const sedan = createCategory();
  const tesla = { ...createCar(), category: sedan };

  beforeEach(async () => {
    vi.clearAllMocks();
    db = createMockDatabase();
    appointmentServiceMock.getAvailableTimeSlots.mockResolvedValue([]);
    reviewsReadServiceMock.getLatestApprovedReviews.mockResolvedValue([]);
    reviewsReadServiceMock.getCarRatings.mockResolvedValue({ averageRating: 0, totalReviews: 0 });
    reviewsReadServiceMock.hasCompletedBooking.mockResolvedValue(false);
    favoritesServiceMock.isFavorited.mockResolvedValue(false);

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        CarService,
        { provide: DatabaseService, useValue: { db } },
        { provide: AppointmentService, useValue: appointmentServiceMock },
        { provide: ReviewsReadService, useValue: reviewsReadServiceMock },
        { provide: FavoritesService, useValue: favoritesServiceMock },
      ],
    }).compile();

    service = module.get<CarService>(CarService);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe("getCarDetails", () => {
    it("assembles reviews, viewer state and the next 30 days of free slots", async () => {
      vi.useFakeTimers({ toFake: ["Date"] });
      vi.setSystemTime(new Date("2025-06-10T15:30:00.000Z"));

      const author = createUser();
      const reviews = [
        {
          ...createReview(),
          user: {
            id: author.id,
            firstName: author.firstName,
            lastName: author.lastName,
            profilePictureUrl: null,
          },
        },
      ];
      db.query.cars.findFirst.mockResolvedValue(tesla);
      reviewsReadServiceMock.getLatestApprovedReviews.mockResolvedValue(reviews);
      reviewsReadServiceMock.getCarRatings.mockResolvedValue({ averageRating: 4.5, totalReviews: 2 });
      reviewsReadServiceMock.hasCompletedBooking.mockResolvedValue(true);
      favoritesServiceMock.isFavorited.mockResolvedValue(true);
      appointmentServiceMock.getAvailableTimeSlots.mockResolvedValue([
        { start: new Date("2025-06-10T00:00:00Z"), end: new Date("2025-06-12T09:00:00Z") },
        { start: new Date("2025-06-14T17:00:00Z"), end: new Date("2025-07-10T00:00:00Z") },
      ]);

      const result = await service.getCarDetails(1, "user-123");

      expect(reviewsReadServiceMock.getLatestApprovedReviews).toHaveBeenCalledWith(1, 5);
      const [carId, start, end] = appointmentServiceMock.getAvailableTimeSlots.mock.calls[0];
      expect(carId).toBe(1);
      expect(start.toISOString()).toBe("2025-06-10T00:00:00.000Z");
      expect(end.toISOString()).toBe("2025-07-10T00:00:00.000Z");
      expect(result).toEqual({
        car: tesla,
        displayName: "2023 Tesla Model 3 - EV-001",
        reviews,
        averageRating: 4.5,
        totalReviews: 2,
        canReview: true,
        isFavorited: true,
        availableSlots: [
          { start: "2025-06-10T00:00", end: "2025-06-12T09:00" },
          { start: "2025-06-14T17:00", end: "2025-07-10T00:00" },
        ],
        slotWindow: { start: "2025-06-10T00:00", end: "2025-07-10T00:00" },
      });
    });

    it("skips viewer checks for guests", async () => {
      db.query.cars.findFirst.mockResolvedValue(tesla);

      const result = await service.getCarDetails(1, null);

      expect(reviewsReadServiceMock.hasCompletedBooking).not.toHaveBeenCalled();
      expect(favoritesServiceMock.isFavorited).not.toHaveBeenCalled();
      expect(result.canReview).toBe(false);
      expect(result.isFavorited).toBe(false);
    });

    it("shows the page without reviews when they cannot be loaded", async () => {
      db.query.cars.findFirst.mockResolvedValue(tesla);
      reviewsReadServiceMock.getCarRatings.mockRejectedValue(new Error("timeout"));

      const result = await service.getCarDetails(1, null);

      expect(result.reviews).toEqual([]);
      expect(result.averageRating).toBe(0);
      expect(result.totalReviews).toBe(0);
    });

    it("ignores failures of the viewer checks", async () => {
      db.query.cars.findFirst.mockResolvedValue(tesla);
      favoritesServiceMock.isFavorited.mockRejectedValue(new Error("timeout"));

      const result = await service.getCarDetails(1, "user-123");

      expect(result.canReview).toBe(false);
      expect(result.isFavorited).toBe(false);
    });

    it("throws when the car does not exist", async () => {
      db.query.cars.findFirst.mockResolvedValue(undefined);

      await expect(service.getCarDetails(99, null)).rejects.toBeInstanceOf(CarNotFoundException);
    });
  });

  describe("getCarSummary", () => {
    it("returns the quick-view fields", async () => {
      db.query.cars.findFirst.mockResolvedValue(createCar());

      expect(await service.getCarSummary(1)).toEqual({
        id: 1,
        make: "Tesla",
        model: "Model 3",
        year: 2023,
        dailyRate: 89.99,
        isElectric: true,
        range: 358,
        batteryCapacity: 75,
        city: "Kuala Lumpur",
        state: "Kuala Lumpur",
        imageUrl: null,
        displayName: "2023 Tesla Model 3 - EV-001",
      });
    });

    it("returns an error payload for an unknown car", async () => {
      db.query.cars.findFirst.mockResolvedValue(undefined);

      expect(await service.getCarSummary(99)).toEqual({ error: "Car not found" });
    });
  });

  describe("getRecommendations", () => {
    it("ranks available cars by their simulated score", async () => {
      vi.mocked(randomInt).mockReturnValueOnce(80).mockReturnValueOnce(95).mockReturnValueOnce(77);
      db.query.cars.findMany.mockResolvedValue([
        tesla,
        { ...createCar({ id: 2, make: "BYD", model: "Atto 3", categoryId: null }), category: null },
        { ...createCar({ id: 3, make: "Honda", model: "City" }), category: sedan },
      ]);

      const result = await service.getRecommendations();

      expect(randomInt).toHaveBeenCalledWith(75, 99);
      expect(result.map((car) => [car.id, car.recommendationScore, car.categoryName])).toEqual([
        [2, 95, "Sedan"],
        [1, 80, "Sedan"],
        [3, 77, "Sedan"],
      ]);
    });
  });

  describe("compareElectricCars", () => {
    it("keeps the requested order and drops duplicates and missing cars", async () => {
      const ioniq = { ...createCar({ id: 5, make: "Hyundai", model: "Ioniq 5" }), category: sedan };
      db.query.cars.findMany.mockResolvedValue([tesla, ioniq]);

      const result = await service.compareElectricCars([5, 5, 7, 1]);

      expect(result.map((car) => car.id)).toEqual([5, 1]);
    });

    it("ignores ids beyond the third", async () => {
      db.query.cars.findMany.mockResolvedValue([tesla]);

      const result = await service.compareElectricCars([7, 9, 11, 1]);

      expect(result).toEqual([]);
    });

    it("does not query without ids", async () => {
      expect(await service.compareElectricCars([])).toEqual([]);
      expect(db.query.cars.findMany).not.toHaveBeenCalled();
    });
  });
});
