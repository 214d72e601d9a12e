import { Test, type TestingModule } from "@nestjs/testing";
import { beforeEach, describe, expect, it, vi } from "vitest";
import {
  createAuthSession,
  createMockDatabase,
  createUser,
  type MockDatabase,
} from "../../shared/helper.fixtures";
import { AnalyticsService } from "../analytics/analytics.service";
import { AuthService } from "../auth/auth.service";
import { DatabaseService } from "../database/database.service";
import type { UploadedImage } from "../storage/image-upload.pipe";
import { StorageService } from "../storage/storage.service";
import {
  AccountNameTakenException,
  AccountPhoneTakenException,
  AccountUpdateFailedException,
  AccountUserNotFoundException,
  ProfilePictureUploadFailedException,
} from "./account.error";
import { AccountService } from "./account.service";
import { updateProfileSchema } from "./dto/account.dto";

describe("AccountService", () => {
  let service: AccountService;
  let db: MockDatabase;

  const authService = {
    isEmailTaken: vi.fn(),
    isPhoneNumberTaken: vi.fn(),
    isNameTaken: vi.fn(),
  };
  const analyticsService = { sumRevenue: vi.fn() };
  const storageService = { uploadBuffer: vi.fn(), deleteByUrl: vi.fn() };

  const customer = createAuthSession("Customer").user;
  const picture: UploadedImage = {
    buffer: Buffer.from("image-bytes"),
    mimetype: "image/png",
    extension: ".png",
    size: 11,
  };

  beforeEach(async () => {
    vi.clearAllMocks();
    db = createMockDatabase();

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        AccountService,
        { provide: DatabaseService, useValue: { db } },
        { provide: AuthService, useValue: authService },
        { provide: AnalyticsService, useValue: analyticsService },
        { provide: StorageService, useValue: storageService },
      ],
    }).compile();

    service = module.get<AccountService>(AccountService);
  });

  describe("availability checks", () => {
    it("reports a blank email as free without querying", async () => {
      await expect(service.checkEmail({ email: "" })).resolves.toEqual({ exists: false });
      expect(authService.isEmailTaken).not.toHaveBeenCalled();
    });

    it("reports a registered phone number", async () => {
      authService.isPhoneNumberTaken.mockResolvedValueOnce(true);

      await expect(service.checkPhone({ phoneNumber: "012-345 6789" })).resolves.toEqual({
        exists: true,
      });
      expect(authService.isPhoneNumberTaken).toHaveBeenCalledWith("012-345 6789");
    });

    it("needs both name parts to check a name", async () => {
      await expect(service.checkName({ firstName: "Aisha", lastName: "" })).resolves.toEqual({
        exists: false,
      });
      expect(authService.isNameTaken).not.toHaveBeenCalled();
    });
  });

  describe("getProfile", () => {
    it("includes booking stats for customers", async () => {
      db.query.users.findFirst.mockResolvedValueOnce(createUser());
      db.$count.mockResolvedValueOnce(4).mockResolvedValueOnce(2);
      analyticsService.sumRevenue.mockResolvedValueOnce("359.96");

      const result = await service.getProfile(customer);

      expect(result.stats).toEqual({
        totalBookings: 4,
        completedBookings: 2,
        totalSpent: "359.96",
      });
      expect(result.states).toHaveLength(16);
      expect(result.states[0]).toBe("Johor");
    });

    it("omits stats for back office users", async () => {
      db.query.users.findFirst.mockResolvedValueOnce(createUser({ id: "staff-1", role: "Staff" }));

      const result = await service.getProfile(createAuthSession("Staff", { id: "staff-1" }).user);

      expect(result.stats).toBeNull();
      expect(db.$count).not.toHaveBeenCalled();
      expect(analyticsService.sumRevenue).not.toHaveBeenCalled();
    });

    it("throws when the user no longer exists", async () => {
      db.query.users.findFirst.mockResolvedValueOnce(undefined);

      await expect(service.getProfile(customer)).rejects.toThrow(AccountUserNotFoundException);
    });
  });

  describe("updateProfile", () => {
    const body = updateProfileSchema.parse({
      firstName: "Aisha",
      lastName: "Binti Rahman",
      phoneNumber: "0129876543",
      state: "Selangor",
      city: "",
    });

    it("rejects a phone number owned by another user", async () => {
      db.query.users.findFirst.mockResolvedValueOnce(createUser());
      authService.isPhoneNumberTaken.mockResolvedValueOnce(true);

      await expect(service.updateProfile(customer, body)).rejects.toThrow(
        AccountPhoneTakenException,
      );
      expect(authService.isPhoneNumberTaken).toHaveBeenCalledWith("0129876543", "user-123");
      expect(db.update).not.toHaveBeenCalled();
    });

    it("rejects a name owned by another user", async () => {
      db.query.users.findFirst.mockResolvedValueOnce(createUser());
      authService.isPhoneNumberTaken.mockResolvedValueOnce(false);
      authService.isNameTaken.mockResolvedValueOnce(true);

      await expect(service.updateProfile(customer, body)).rejects.toThrow(
        AccountNameTakenException,
      );
      expect(authService.isNameTaken).toHaveBeenCalledWith("Aisha", "Binti Rahman", "user-123");
    });

    it("saves the profile and keeps the current picture", async () => {
      const updated = createUser({ lastName: "Binti Rahman", name: "Aisha Binti Rahman" });
      db.query.users.findFirst.mockResolvedValueOnce(createUser());
      authService.isPhoneNumberTaken.mockResolvedValueOnce(false);
      authService.isNameTaken.mockResolvedValueOnce(false);
      db.queueResult([updated]);

      const result = await service.updateProfile(customer, body);

      expect(db.builder.set).toHaveBeenCalledWith({
        firstName: "Aisha",
        lastName: "Binti Rahman",
        phoneNumber: "0129876543",
        dateOfBirth: null,
        address: null,
        city: null,
        state: "Selangor",
        zipCode: null,
        licenseNumber: null,
        name: "Aisha Binti Rahman",
        profilePictureUrl: null,
        updatedAt: expect.any(Date),
      });
      expect(result).toEqual({ user: updated, message: "Profile updated successfully." });
      expect(storageService.uploadBuffer).not.toHaveBeenCalled();
      expect(storageService.deleteByUrl).not.toHaveBeenCalled();
    });

    it("replaces the previous picture after saving a new one", async () => {
      const oldUrl = "https://rentals.s3.amazonaws.com/profiles/user-123_20250101000000.jpg";
      const newUrl = "https://rentals.s3.amazonaws.com/profiles/user-123_20250601000000.png";
      db.query.users.findFirst.mockResolvedValueOnce(createUser({ profilePictureUrl: oldUrl }));
      authService.isPhoneNumberTaken.mockResolvedValueOnce(false);
      authService.isNameTaken.mockResolvedValueOnce(false);
      storageService.uploadBuffer.mockResolvedValueOnce(newUrl);
      db.queueResult([createUser({ profilePictureUrl: newUrl })]);

      await service.updateProfile(customer, body, picture);

      expect(storageService.uploadBuffer).toHaveBeenCalledWith(
        picture.buffer,
        expect.stringMatching(/^profiles\/user-123_\d{14}\.png$/),
        "image/png",
      );
      expect(db.builder.set).toHaveBeenCalledWith(
        expect.objectContaining({ profilePictureUrl: newUrl }),
      );
      expect(storageService.deleteByUrl).toHaveBeenCalledWith(oldUrl);
    });

    it("leaves the profile untouched when the upload fails", async () => {
      db.query.users.findFirst.mockResolvedValueOnce(createUser());
      authService.isPhoneNumberTaken.mockResolvedValueOnce(false);
      authService.isNameTaken.mockResolvedValueOnce(false);
      storageService.uploadBuffer.mockRejectedValueOnce(new Error("Access Denied"));

      await expect(service.updateProfile(customer, body, picture)).rejects.toThrow(
        ProfilePictureUploadFailedException,
      );
      expect(db.update).not.toHaveBeenCalled();
    });

    it("wraps database failures", async () => {
      db.query.users.findFirst.mockResolvedValueOnce(createUser());
      authService.isPhoneNumberTaken.mockResolvedValueOnce(false);
      authService.isNameTaken.mockResolvedValueOnce(false);
      db.update.mockImplementationOnce(() => {
        throw new Error("connection reset");
      });

      await expect(service.updateProfile(customer, body)).rejects.toThrow(
        AccountUpdateFailedException,
      );
    });
  });
});
