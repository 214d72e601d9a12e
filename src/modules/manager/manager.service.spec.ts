import { Test, type TestingModule } from "@nestjs/testing";
import { APIError } from "better-auth/api";
import { beforeEach, describe, expect, it, vi } from "vitest";
import { createMockDatabase, createUser, type MockDatabase } from "../../shared/helper.fixtures";
import { AnalyticsService } from "../analytics/analytics.service";
import { AuthService } from "../auth/auth.service";
import { DatabaseService } from "../database/database.service";
import { payments, users } from "../database/schema";
import {
  ManagerOperationFailedException,
  ManagerSelfActionException,
  ManagerUserNotFoundException,
  StaffCreateFailedException,
} from "./manager.error";
import { ManagerService } from "./manager.service";

describe("ManagerService", () => {
  let service: ManagerService;
  let db: MockDatabase;

  const authServiceMock = {
    createUserWithPassword: vi.fn(),
  };

  const analyticsServiceMock = {
    sumRevenue: vi.fn(),
  };

  beforeEach(async () => {
    vi.clearAllMocks();
    db = createMockDatabase();

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        ManagerService,
        { provide: DatabaseService, useValue: { db } },
        { provide: AuthService, useValue: authServiceMock },
        { provide: AnalyticsService, useValue: analyticsServiceMock },
      ],
    }).compile();

    service = module.get<ManagerService>(ManagerService);
  });

  it("builds the dashboard totals", async () => {
    for (const value of [50, 4, 45, 120, 10]) {
      db.$count.mockResolvedValueOnce(value);
    }
    analyticsServiceMock.sumRevenue.mockResolvedValueOnce("9800.00");

    await expect(service.getDashboard()).resolves.toEqual({
      totalUsers: 50,
      totalStaff: 4,
      totalCustomers: 45,
      totalAppointments: 120,
      totalRevenue: "9800.00",
      totalCars: 10,
    });
  });

  describe("createStaff", () => {
    const body = {
      email: "nadia@example.com",
      password: "Test-secret1",
      firstName: "Nadia",
      lastName: "Hassan",
      phoneNumber: undefined,
    };

    it("creates the account with the Staff role", async () => {
      authServiceMock.createUserWithPassword.mockResolvedValue("staff-1");

      const result = await service.createStaff(body);

      expect(authServiceMock.createUserWithPassword).toHaveBeenCalledWith({ ...body, role: "Staff" });
      expect(result).toEqual({
        userId: "staff-1",
        message: "Staff account for nadia@example.com created successfully.",
      });
    });

    it("surfaces sign-up rule failures", async () => {
      authServiceMock.createUserWithPassword.mockRejectedValue(
        new APIError("BAD_REQUEST", { message: "Password must contain at least one digit." }),
      );

      const error = await service.createStaff(body).catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(StaffCreateFailedException);
      expect(error).toHaveProperty("response.detail", "Password must contain at least one digit.");
    });
  });

  describe("staff accounts", () => {
    it("reactivates an inactive staff member", async () => {
      db.query.users.findFirst.mockResolvedValue(
        createUser({ id: "staff-1", role: "Staff", isActive: false }),
      );
      db.queueResult([createUser({ id: "staff-1", role: "Staff", isActive: true })]);

      const result = await service.toggleStaffStatus("staff-1");

      expect(db.builder.set).toHaveBeenCalledWith({ isActive: true, updatedAt: expect.any(Date) });
      expect(result.message).toBe("Staff account activated successfully.");
    });

    it("only deletes staff accounts", async () => {
      db.query.users.findFirst.mockResolvedValue(undefined);

      const error = await service.deleteStaff("user-123").catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(ManagerUserNotFoundException);
      expect(error).toHaveProperty("response.detail", "Staff member not found.");
      expect(db.delete).not.toHaveBeenCalled();
    });

    it("deletes a staff member", async () => {
      db.query.users.findFirst.mockResolvedValue(createUser({ id: "staff-1", role: "Staff" }));

      await expect(service.deleteStaff("staff-1")).resolves.toEqual({
        message: "Staff account deleted successfully.",
      });
      expect(db.delete).toHaveBeenCalledWith(users);
    });
  });

  describe("deleteAllCustomers", () => {
    it("removes customer data before the accounts", async () => {
      db.queueResult([], [], [], [], [], [{ id: "user-123" }, { id: "user-456" }]);

      const result = await service.deleteAllCustomers();

      expect(result).toEqual({
        deletedCount: 2,
        message:
          "Successfully deleted 2 customer account(s). Staff and Manager accounts were preserved.",
      });
      expect(db.delete).toHaveBeenCalledTimes(6);
      expect(db.delete).toHaveBeenNthCalledWith(1, payments);
      expect(db.delete).toHaveBeenLastCalledWith(users);
    });

    it("reports the underlying failure", async () => {
      db.delete.mockImplementationOnce(() => {
        throw new Error("lock timeout");
      });

      const error = await service.deleteAllCustomers().catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(ManagerOperationFailedException);
      expect(error).toHaveProperty("response.detail", "Error deleting customers: lock timeout");
    });
  });

  describe("user accounts", () => {
    it("refuses to toggle the caller's own account", async () => {
      db.query.users.findFirst.mockResolvedValue(createUser({ role: "Manager" }));

      await expect(service.toggleUserStatus("user-123", "user-123")).rejects.toBeInstanceOf(
        ManagerSelfActionException,
      );
    });

    it("deactivates another user", async () => {
      db.query.users.findFirst.mockResolvedValue(createUser({ id: "user-456" }));
      db.queueResult([createUser({ id: "user-456", isActive: false })]);

      const result = await service.toggleUserStatus("user-456", "user-123");

      expect(result.message).toBe("User account deactivated successfully.");
    });

    it("refuses to delete the caller's own account", async () => {
      db.query.users.findFirst.mockResolvedValue(createUser({ role: "Manager" }));

      const error = await service
        .deleteUser("user-123", "user-123")
        .catch((caught: unknown) => caught);

      expect(error).toHaveProperty("response.detail", "You cannot delete your own account!");
      expect(db.delete).not.toHaveBeenCalled();
    });

    it("deletes another user", async () => {
      db.query.users.findFirst.mockResolvedValue(createUser({ id: "user-456" }));

      await expect(service.deleteUser("user-456", "user-123")).resolves.toEqual({
        message: "User deleted successfully.",
      });
    });

    it("throws for an unknown user", async () => {
      db.query.users.findFirst.mockResolvedValue(undefined);

      await expect(service.deleteUser("missing", "user-123")).rejects.toBeInstanceOf(
        ManagerUserNotFoundException,
      );
    });
  });

  it("collects system statistics", async () => {
    for (const value of [50, 45, 4, 1, 10, 8, 120, 30, 25, 3, 2, 4, 3]) {
      db.$count.mockResolvedValueOnce(value);
    }
    analyticsServiceMock.sumRevenue
      .mockResolvedValueOnce("9800.00")
      .mockResolvedValueOnce("1200.00");

    const result = await service.getSystemStatistics(new Date("2025-06-15T12:00:00Z"));

    expect(result).toEqual({
      totalUsers: 50,
      totalCustomers: 45,
      totalStaff: 4,
      totalManagers: 1,
      totalCars: 10,
      availableCars: 8,
      totalBookings: 120,
      totalRevenue: "9800.00",
      thisMonthRevenue: "1200.00",
      totalReviews: 30,
      approvedReviews: 25,
      totalPromotions: 3,
      activePromotions: 2,
      totalSubscriptions: 4,
      activeSubscriptions: 3,
    });
  });
});
