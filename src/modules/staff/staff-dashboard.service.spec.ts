import { Test, type TestingModule } from "@nestjs/testing";
import { beforeEach, describe, expect, it, vi } from "vitest";
import {
  createAppointment,
  createCar,
  createMockDatabase,
  type MockDatabase,
} from "../../shared/helper.fixtures";
import { AnalyticsService } from "../analytics/analytics.service";
import { DatabaseService } from "../database/database.service";
import { StaffFetchFailedException } from "./staff.error";
import { StaffDashboardService } from "./staff-dashboard.service";

describe("StaffDashboardService", () => {
  let service: StaffDashboardService;
  let db: MockDatabase;

  const analyticsServiceMock = {
    sumRevenue: vi.fn(),
    getTopCars: vi.fn(),
  };

  beforeEach(async () => {
    vi.clearAllMocks();
    db = createMockDatabase();

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        StaffDashboardService,
        { provide: DatabaseService, useValue: { db } },
        { provide: AnalyticsService, useValue: analyticsServiceMock },
      ],
    }).compile();

    service = module.get<StaffDashboardService>(StaffDashboardService);
  });

  describe("getDashboard", () => {
    it("collects booking, revenue, fleet and customer figures", async () => {
      const recent = { ...createAppointment(), car: createCar() };
      for (const value of [12, 2, 4, 5, 3, 1, 8, 10, 40]) {
        db.$count.mockResolvedValueOnce(value);
      }
      analyticsServiceMock.sumRevenue
        .mockResolvedValueOnce("1500.00")
        .mockResolvedValueOnce("320.50");
      db.query.appointments.findMany.mockResolvedValue([recent]);

      const result = await service.getDashboard(new Date("2025-06-15T12:00:00Z"));

      expect(result).toEqual({
        totalAppointments: 12,
        todayAppointments: 2,
        pendingAppointments: 4,
        confirmedAppointments: 5,
        completedAppointments: 3,
        cancelledAppointments: 1,
        totalRevenue: "1500.00",
        thisMonthRevenue: "320.50",
        availableCars: 8,
        totalCars: 10,
        totalCustomers: 40,
        recentBookings: [recent],
      });
      expect(db.query.appointments.findMany).toHaveBeenCalledWith(
        expect.objectContaining({ limit: 5 }),
      );
    });

    it("wraps failures", async () => {
      analyticsServiceMock.sumRevenue.mockRejectedValueOnce(new Error("timeout"));

      await expect(service.getDashboard()).rejects.toBeInstanceOf(StaffFetchFailedException);
    });
  });

  describe("getReport", () => {
    it("defaults to the month before now", async () => {
      const now = new Date("2025-06-15T12:00:00Z");
      db.$count.mockResolvedValueOnce(4);
      analyticsServiceMock.sumRevenue.mockResolvedValueOnce("300.00");
      analyticsServiceMock.getTopCars.mockResolvedValueOnce([
        { car: "Tesla Model 3", count: 3, revenue: "269.97" },
      ]);
      db.queueResult(
        [
          { status: "Confirmed", revenue: "300" },
          { status: "Cancelled", revenue: null },
        ],
        [{ date: "2025-06-01", count: 4 }],
      );

      const result = await service.getReport({}, now);

      expect(result).toEqual({
        startDate: new Date("2025-05-15T12:00:00Z"),
        endDate: now,
        totalBookings: 4,
        totalRevenue: "300.00",
        revenueByStatus: [
          { status: "Confirmed", revenue: "300.00" },
          { status: "Cancelled", revenue: "0.00" },
        ],
        topCars: [{ car: "Tesla Model 3", count: 3 }],
        bookingsByDay: [{ date: "2025-06-01", count: 4 }],
      });
      expect(analyticsServiceMock.getTopCars).toHaveBeenCalledWith({
        start: new Date("2025-05-15T12:00:00Z"),
        end: now,
      });
    });
  });

  describe("getCalendarEvents", () => {
    it("maps bookings to calendar events", async () => {
      db.query.appointments.findMany.mockResolvedValue([
        { ...createAppointment({ status: "Completed" }), car: createCar() },
      ]);

      const events = await service.getCalendarEvents({
        start: new Date("2025-06-01T00:00:00Z"),
        end: new Date("2025-06-30T00:00:00Z"),
      });

      expect(events).toEqual([
        {
          id: 10,
          title: "2023 Tesla Model 3 - EV-001 - Aisha Rahman",
          start: "2025-06-01T10:00:00",
          end: "2025-06-03T10:00:00",
          status: "Completed",
          color: "#17a2b8",
        },
      ]);
    });
  });
});
