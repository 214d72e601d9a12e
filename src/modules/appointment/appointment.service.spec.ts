import { Test, TestingModule } from "@nestjs/testing";
import { beforeEach, describe, expect, it } from "vitest";
import {
  createAppointment,
  createCar,
  createMockDatabase,
  createPromotion,
  createSubscription,
  type MockDatabase,
} from "../../shared/helper.fixtures";
import { DatabaseService } from "../database/database.service";
import { appointments } from "../database/schema";
import {
  AppointmentNotFoundException,
  BookingConflictException,
  CarNotFoundException,
  CarUnavailableException,
} from "./appointment.error";
import { AppointmentService } from "./appointment.service";

const at = (iso: string) => new Date(iso);

describe("AppointmentService", () => {
  let service: AppointmentService;
  let db: MockDatabase;

  beforeEach(async () => {
    db = createMockDatabase();
    const module: TestingModule = await Test.createTestingModule({
      providers: [AppointmentService, { provide: DatabaseService, useValue: { db } }],
    }).compile();

    service = module.get<AppointmentService>(AppointmentService);
  });

  describe("calculatePrice", () => {
    it("returns zero when the car does not exist", async () => {
      db.query.cars.findFirst.mockResolvedValue(undefined);

      const total = await service.calculatePrice(
        99,
        at("2025-06-10T10:00:00Z"),
        at("2025-06-12T10:00:00Z"),
      );

      expect(total.toNumber()).toBe(0);
    });

    it("applies subscription and promotion discounts", async () => {
      db.query.cars.findFirst.mockResolvedValue({ dailyRate: "100.00" });
      db.query.subscriptions.findFirst.mockResolvedValue(
        createSubscription({ discountPercentage: "10.00" }),
      );
      db.query.promotions.findFirst.mockResolvedValue(
        createPromotion({ discountPercentage: "20.00", maxDiscountAmount: "100.00" }),
      );

      const total = await service.calculatePrice(
        1,
        at("2025-06-10T10:00:00Z"),
        at("2025-06-12T10:00:00Z"),
        1,
        1,
      );

      expect(total.toFixed(2)).toBe("140.00");
    });

    it("ignores an EV-only promotion for a car that is not electric", async () => {
      db.query.cars.findFirst.mockResolvedValue({ dailyRate: "100.00", isElectric: false });
      db.query.promotions.findFirst.mockResolvedValue(
        createPromotion({ discountPercentage: "20.00", isEVOnly: true }),
      );

      const total = await service.calculatePrice(
        1,
        at("2025-06-10T10:00:00Z"),
        at("2025-06-12T10:00:00Z"),
        undefined,
        1,
      );

      expect(total.toFixed(2)).toBe("200.00");
    });

    it("applies an EV-only promotion to an electric car", async () => {
      db.query.cars.findFirst.mockResolvedValue({ dailyRate: "100.00", isElectric: true });
      db.query.promotions.findFirst.mockResolvedValue(
        createPromotion({ discountPercentage: "20.00", isEVOnly: true }),
      );

      const total = await service.calculatePrice(
        1,
        at("2025-06-10T10:00:00Z"),
        at("2025-06-12T10:00:00Z"),
        undefined,
        1,
      );

      expect(total.toFixed(2)).toBe("160.00");
    });

    it("skips the discount lookups without ids", async () => {
      db.query.cars.findFirst.mockResolvedValue({ dailyRate: "50.00" });

      const total = await service.calculatePrice(
        1,
        at("2025-06-10T10:00:00Z"),
        at("2025-06-10T12:00:00Z"),
      );

      expect(total.toFixed(2)).toBe("50.00");
      expect(db.query.subscriptions.findFirst).not.toHaveBeenCalled();
      expect(db.query.promotions.findFirst).not.toHaveBeenCalled();
    });
  });

  describe("createAppointment", () => {
    it("stores the computed total and no discount amount without discounts", async () => {
      db.query.cars.findFirst.mockResolvedValue({ dailyRate: "89.99" });
      const created = createAppointment();
      db.queueResult([created]);

      const result = await service.createAppointment({
        carId: 1,
        userId: "user-123",
        startDate: at("2025-06-01T10:00:00Z"),
        endDate: at("2025-06-03T10:00:00Z"),
      });

      expect(db.insert).toHaveBeenCalledWith(appointments);
      expect(db.builder.values).toHaveBeenCalledWith(
        expect.objectContaining({
          carId: 1,
          userId: "user-123",
          status: "Pending",
          totalPrice: "179.98",
          discountAmount: null,
        }),
      );
      expect(result).toEqual(created);
    });

    it("stores the discount amount when a subscription applies", async () => {
      db.query.cars.findFirst.mockResolvedValue({ dailyRate: "100.00" });
      db.query.subscriptions.findFirst.mockResolvedValue(
        createSubscription({ discountPercentage: "15.00" }),
      );
      db.queueResult([createAppointment()]);

      await service.createAppointment({
        carId: 1,
        startDate: at("2025-06-01T10:00:00Z"),
        endDate: at("2025-06-02T10:00:00Z"),
        subscriptionId: 1,
      });

      expect(db.builder.values).toHaveBeenCalledWith(
        expect.objectContaining({ totalPrice: "85.00", discountAmount: "15.00", subscriptionId: 1 }),
      );
    });

    it("stores no discount for an EV-only promotion on a gas car", async () => {
      db.query.cars.findFirst.mockResolvedValue({ dailyRate: "100.00", isElectric: false });
      db.query.promotions.findFirst.mockResolvedValue(createPromotion({ isEVOnly: true }));
      db.queueResult([createAppointment()]);

      await service.createAppointment({
        carId: 1,
        startDate: at("2025-06-01T10:00:00Z"),
        endDate: at("2025-06-02T10:00:00Z"),
        promotionId: 1,
      });

      expect(db.builder.values).toHaveBeenCalledWith(
        expect.objectContaining({ totalPrice: "100.00", discountAmount: null, promotionId: 1 }),
      );
    });

    it("rejects a missing car", async () => {
      db.query.cars.findFirst.mockResolvedValue(undefined);

      await expect(
        service.createAppointment({
          carId: 99,
          startDate: at("2025-06-01T10:00:00Z"),
          endDate: at("2025-06-02T10:00:00Z"),
        }),
      ).rejects.toThrow(CarNotFoundException);
      expect(db.insert).not.toHaveBeenCalled();
    });
  });

  describe("updateAppointment", () => {
    it("recomputes the price and sets updatedAt", async () => {
      db.query.cars.findFirst.mockResolvedValue({ dailyRate: "89.99" });
      db.queueResult([createAppointment({ status: "Confirmed" })]);

      await service.updateAppointment(10, {
        carId: 1,
        startDate: at("2025-06-01T10:00:00Z"),
        endDate: at("2025-06-02T09:00:00Z"),
        status: "Confirmed",
      });

      expect(db.builder.set).toHaveBeenCalledWith(
        expect.objectContaining({
          status: "Confirmed",
          totalPrice: "89.99",
          updatedAt: expect.any(Date),
        }),
      );
    });

    it("throws when the appointment does not exist", async () => {
      db.query.cars.findFirst.mockResolvedValue({ dailyRate: "89.99" });

      await expect(
        service.updateAppointment(404, {
          carId: 1,
          startDate: at("2025-06-01T10:00:00Z"),
          endDate: at("2025-06-02T10:00:00Z"),
        }),
      ).rejects.toThrow(AppointmentNotFoundException);
    });
  });

  describe("scheduleAppointment", () => {
    const input = {
      carId: 1,
      startDate: at("2025-06-01T10:00:00Z"),
      endDate: at("2025-06-03T10:00:00Z"),
    };

    it("rejects dates held by another booking", async () => {
      db.query.cars.findFirst.mockResolvedValue(createCar());
      db.$count.mockResolvedValue(1);
      db.query.appointments.findMany.mockResolvedValue([createAppointment()]);

      await expect(service.scheduleAppointment(input)).rejects.toThrow(BookingConflictException);
      expect(db.insert).not.toHaveBeenCalled();
    });

    it("rejects a car marked unavailable", async () => {
      db.query.cars.findFirst.mockResolvedValue(createCar({ isAvailable: false }));

      await expect(service.scheduleAppointment(input)).rejects.toThrow(CarUnavailableException);
    });

    it("skips the availability check for a cancelled entry", async () => {
      db.query.cars.findFirst.mockResolvedValue(createCar({ isAvailable: false }));
      db.queueResult([createAppointment({ status: "Cancelled" })]);

      await service.scheduleAppointment({ ...input, status: "Cancelled" });

      expect(db.$count).not.toHaveBeenCalled();
      expect(db.insert).toHaveBeenCalledWith(appointments);
    });
  });

  describe("deleteAppointment", () => {
    it("reports whether a row was removed", async () => {
      db.queueResult([{ id: 10 }], []);

      expect(await service.deleteAppointment(10)).toBe(true);
      expect(await service.deleteAppointment(11)).toBe(false);
    });
  });

  describe("isCarAvailable", () => {
    const start = at("2025-06-01T10:00:00Z");
    const end = at("2025-06-03T10:00:00Z");

    it("is false for a missing car", async () => {
      db.query.cars.findFirst.mockResolvedValue(undefined);

      expect(await service.isCarAvailable(1, start, end)).toBe(false);
      expect(db.$count).not.toHaveBeenCalled();
    });

    it("is false for a car marked unavailable", async () => {
      db.query.cars.findFirst.mockResolvedValue({ isAvailable: false });

      expect(await service.isCarAvailable(1, start, end)).toBe(false);
    });

    it("is false when an overlapping booking exists", async () => {
      db.query.cars.findFirst.mockResolvedValue({ isAvailable: true });
      db.$count.mockResolvedValue(1);

      expect(await service.isCarAvailable(1, start, end)).toBe(false);
    });

    it("is true without overlapping bookings", async () => {
      db.query.cars.findFirst.mockResolvedValue({ isAvailable: true });
      db.$count.mockResolvedValue(0);

      expect(await service.isCarAvailable(1, start, end, 10)).toBe(true);
      expect(db.$count).toHaveBeenCalledWith(appointments, expect.anything());
    });
  });

  describe("getAvailableTimeSlots", () => {
    const windowStart = at("2025-06-01T00:00:00Z");
    const windowEnd = at("2025-06-10T00:00:00Z");

    it("returns nothing for an unavailable car", async () => {
      db.query.cars.findFirst.mockResolvedValue({ isAvailable: false });

      expect(await service.getAvailableTimeSlots(1, windowStart, windowEnd)).toEqual([]);
      expect(db.query.appointments.findMany).not.toHaveBeenCalled();
    });

    it("returns the gaps around booked ranges", async () => {
      db.query.cars.findFirst.mockResolvedValue({ isAvailable: true });
      db.query.appointments.findMany.mockResolvedValue([
        createAppointment({
          startDate: at("2025-06-03T00:00:00Z"),
          endDate: at("2025-06-05T00:00:00Z"),
        }),
      ]);

      expect(await service.getAvailableTimeSlots(1, windowStart, windowEnd)).toEqual([
        { start: windowStart, end: at("2025-06-03T00:00:00Z") },
        { start: at("2025-06-05T00:00:00Z"), end: windowEnd },
      ]);
    });

    it("returns one slot for the whole window when nothing is booked", async () => {
      db.query.cars.findFirst.mockResolvedValue({ isAvailable: true });

      expect(await service.getAvailableTimeSlots(1, windowStart, windowEnd)).toEqual([
        { start: windowStart, end: windowEnd },
      ]);
    });
  });

  describe("getAppointmentsByDateRange", () => {
    it("returns the bookings with their car", async () => {
      const rows = [{ ...createAppointment(), car: createCar() }];
      db.query.appointments.findMany.mockResolvedValue(rows);

      const result = await service.getAppointmentsByDateRange(
        at("2025-06-01T00:00:00Z"),
        at("2025-06-30T00:00:00Z"),
      );

      expect(result).toEqual(rows);
      expect(db.query.appointments.findMany).toHaveBeenCalledWith(
        expect.objectContaining({ with: { car: true } }),
      );
    });
  });
});
