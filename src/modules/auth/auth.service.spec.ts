import { ConfigService } from "@nestjs/config";
import { Test, TestingModule } from "@nestjs/testing";
import { beforeEach, describe, expect, it, vi } from "vitest";
import { createMockDatabase, type MockDatabase } from "../../shared/helper.fixtures";
import { DatabaseService } from "../database/database.service";
import { createAuth } from "./auth.config";
import { AuthService } from "./auth.service";
import { AuthEmailService } from "./auth-email.service";

const { mockSignUpEmail } = vi.hoisted(() => ({ mockSignUpEmail: vi.fn() }));

vi.mock("./auth.config", () => ({
  createAuth: vi.fn().mockReturnValue({
    api: {
      getSession: vi.fn(),
      signUpEmail: mockSignUpEmail,
    },
  }),
}));

type AuthConfig = {
  SESSION_SECRET?: string;
  AUTH_BASE_URL?: string;
  TRUSTED_ORIGINS?: string[];
  NODE_ENV?: string;
  REQUIRE_EMAIL_VERIFICATION?: boolean;
};

const completeConfig: AuthConfig = {
  SESSION_SECRET: "test-secret-at-least-32-characters-long",
  AUTH_BASE_URL: "https://api.example.com",
  TRUSTED_ORIGINS: ["https://example.com"],
  NODE_ENV: "production",
  REQUIRE_EMAIL_VERIFICATION: true,
};

describe("AuthService", () => {
  let service: AuthService;
  let db: MockDatabase;

  const mockAuthEmailService = {
    sendVerificationEmail: vi.fn(),
    sendPasswordResetEmail: vi.fn(),
  };

  const setupTestModule = async (config: AuthConfig = {}) => {
    db = createMockDatabase();
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        AuthService,
        { provide: DatabaseService, useValue: { db } },
        { provide: AuthEmailService, useValue: mockAuthEmailService },
        {
          provide: ConfigService,
          useValue: { get: vi.fn((key: string) => config[key as keyof AuthConfig]) },
        },
      ],
    }).compile();

    service = module.get<AuthService>(AuthService);
    service.onModuleInit();
  };

  beforeEach(() => {
    vi.clearAllMocks();
  });

  describe("when auth config is complete", () => {
    beforeEach(async () => {
      await setupTestModule(completeConfig);
    });

    it("should be initialized", () => {
      expect(service.isInitialized).toBe(true);
      expect(service.auth.api).toBeDefined();
    });

    it("should pass configuration through to createAuth", () => {
      expect(createAuth).toHaveBeenCalledWith(
        expect.objectContaining({
          db,
          sessionSecret: "test-secret-at-least-32-characters-long",
          authBaseUrl: "https://api.example.com",
          trustedOrigins: ["https://example.com"],
          secureCookies: true,
          enableRateLimit: true,
          requireEmailVerification: true,
        }),
      );
    });
  });

  describe("when auth config is incomplete", () => {
    beforeEach(async () => {
      await setupTestModule({ SESSION_SECRET: "test-secret" });
    });

    it("should not be initialized", () => {
      expect(service.isInitialized).toBe(false);
    });

    it("should throw when accessing auth instance", () => {
      expect(() => service.auth).toThrow(
        "Auth service not initialized. Ensure SESSION_SECRET, AUTH_BASE_URL, and TRUSTED_ORIGINS are configured.",
      );
    });
  });

  describe("account lookups", () => {
    beforeEach(async () => {
      await setupTestModule(completeConfig);
    });

    it("getUserAccess should return role and activation flag", async () => {
      db.query.users.findFirst.mockResolvedValueOnce({ role: "Staff", isActive: true });

      await expect(service.getUserAccess("user-123")).resolves.toEqual({
        role: "Staff",
        isActive: true,
      });
    });

    it("getUserAccess should return null for unknown users", async () => {
      db.query.users.findFirst.mockResolvedValueOnce(undefined);

      await expect(service.getUserAccess("missing")).resolves.toBeNull();
    });

    it("isPhoneNumberTaken should count matching users", async () => {
      db.$count.mockResolvedValueOnce(1);

      await expect(service.isPhoneNumberTaken("012-345 6789")).resolves.toBe(true);
      expect(db.$count).toHaveBeenCalledTimes(1);
    });

    it("isPhoneNumberTaken should skip the query when there are no digits", async () => {
      await expect(service.isPhoneNumberTaken("n/a")).resolves.toBe(false);
      expect(db.$count).not.toHaveBeenCalled();
    });

    it("isNameTaken should return false when nobody has the name", async () => {
      await expect(service.isNameTaken("Aisha", "Rahman")).resolves.toBe(false);
    });

    it("isEmailTaken should return true when a user has the email", async () => {
      db.$count.mockResolvedValueOnce(1);

      await expect(service.isEmailTaken("Aisha@Example.com")).resolves.toBe(true);
    });

    it("isUserInactive should be true only for deactivated accounts", async () => {
      db.query.users.findFirst.mockResolvedValueOnce({ isActive: false });
      await expect(service.isUserInactive("aisha@example.com")).resolves.toBe(true);

      db.query.users.findFirst.mockResolvedValueOnce(undefined);
      await expect(service.isUserInactive("nobody@example.com")).resolves.toBe(false);
    });
  });

  describe("createUserWithPassword", () => {
    beforeEach(async () => {
      await setupTestModule(completeConfig);
    });

    it("should sign the user up and then set the role and verified flag", async () => {
      mockSignUpEmail.mockResolvedValueOnce({ user: { id: "user-456" }, token: null });

      const userId = await service.createUserWithPassword({
        email: "staff@example.com",
        password: "Password1",
        firstName: "Daniel",
        lastName: "Tan",
        role: "Staff",
      });

      expect(userId).toBe("user-456");
      expect(mockSignUpEmail).toHaveBeenCalledWith({
        body: {
          email: "staff@example.com",
          password: "Password1",
          name: "Daniel Tan",
          firstName: "Daniel",
          lastName: "Tan",
        },
      });
      expect(db.builder.set).toHaveBeenCalledWith(
        expect.objectContaining({ role: "Staff", emailVerified: true }),
      );
    });
  });
});
