import { Test, type TestingModule } from "@nestjs/testing";
import { beforeEach, describe, expect, it } from "vitest";
import {
  createCar,
  createMockDatabase,
  createReview,
  type MockDatabase,
} from "../../shared/helper.fixtures";
import { DatabaseService } from "../database/database.service";
import { ReviewFetchFailedException } from "./reviews.error";
import { ReviewsReadService } from "./reviews-read.service";

describe("ReviewsReadService", () => {
  let service: ReviewsReadService;
  let db: MockDatabase;

  beforeEach(async () => {
    db = createMockDatabase();
    const module: TestingModule = await Test.createTestingModule({
      providers: [ReviewsReadService, { provide: DatabaseService, useValue: { db } }],
    }).compile();

    service = module.get<ReviewsReadService>(ReviewsReadService);
  });

  describe("getApprovedReviews", () => {
    const rows = [
      {
        ...createReview(),
        car: createCar(),
        user: { id: "user-123", firstName: "Aisha", lastName: "Rahman", profilePictureUrl: null },
      },
    ];

    it("lists every approved review without a car filter", async () => {
      db.query.reviews.findMany.mockResolvedValue(rows);

      expect(await service.getApprovedReviews()).toEqual({ reviews: rows });
      expect(db.query.cars.findFirst).not.toHaveBeenCalled();
    });

    it("adds the car and its ratings for a car filter", async () => {
      const car = createCar();
      db.query.reviews.findMany.mockResolvedValue(rows);
      db.query.cars.findFirst.mockResolvedValue(car);
      db.queueResult([{ average: "4.5000000000000000", total: 2 }]);

      expect(await service.getApprovedReviews(1)).toEqual({
        reviews: rows,
        car,
        ratings: { averageRating: 4.5, totalReviews: 2 },
      });
    });

    it("wraps database failures", async () => {
      db.query.reviews.findMany.mockRejectedValue(new Error("timeout"));

      await expect(service.getApprovedReviews()).rejects.toBeInstanceOf(
        ReviewFetchFailedException,
      );
    });
  });

  it("reports zero ratings for a car without approved reviews", async () => {
    db.queueResult([{ average: null, total: 0 }]);

    expect(await service.getCarRatings(1)).toEqual({ averageRating: 0, totalReviews: 0 });
  });

  it("maps averages per car and defaults unrated cars to zero", async () => {
    db.queueResult([{ carId: 1, average: "4.3333333333333333" }]);

    const averages = await service.getAverageRatings([1, 2]);

    expect(averages.get(1)).toBe(4.3);
    expect(averages.get(2)).toBe(0);
  });

  it("detects a completed booking", async () => {
    db.$count.mockResolvedValue(1);

    expect(await service.hasCompletedBooking("user-123", 1)).toBe(true);
  });
});
