import { ConfigService } from "@nestjs/config";
import { Test, TestingModule } from "@nestjs/testing";
import { beforeEach, describe, expect, it, vi } from "vitest";
import type { EnvConfig } from "../../config/env.config";
import { renderEmailVerificationEmail, renderPasswordResetEmail } from "../../templates/emails";
import { EmailService } from "../notification/email.service";
import { AuthEmailService } from "./auth-email.service";

vi.mock("../../templates/emails", () => ({
  renderEmailVerificationEmail: vi.fn().mockResolvedValue("<html>Verify</html>"),
  renderPasswordResetEmail: vi.fn().mockResolvedValue("<html>Reset</html>"),
}));

describe("AuthEmailService", () => {
  let service: AuthEmailService;
  let nodeEnv: string;

  const mockEmailService = {
    sendEmail: vi.fn(),
  };

  const mockConfigService = {
    get: vi.fn((key: keyof EnvConfig) => {
      if (key === "NODE_ENV") return nodeEnv;
      if (key === "APP_NAME") return "Car Rental";
      return undefined;
    }),
  };

  const testEmail = "user@example.com";
  const testUrl = "https://app.example.com/auth/api/verify-email?token=test-token";

  beforeEach(async () => {
    vi.clearAllMocks();
    nodeEnv = "production";

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        AuthEmailService,
        { provide: EmailService, useValue: mockEmailService },
        { provide: ConfigService, useValue: mockConfigService },
      ],
    }).compile();

    service = module.get<AuthEmailService>(AuthEmailService);
  });

  describe("sendVerificationEmail", () => {
    it("should send the rendered verification email", async () => {
      mockEmailService.sendEmail.mockResolvedValueOnce({ id: "email-123" });

      await service.sendVerificationEmail(testEmail, testUrl);

      expect(renderEmailVerificationEmail).toHaveBeenCalledWith({ url: testUrl });
      expect(mockEmailService.sendEmail).toHaveBeenCalledWith({
        to: testEmail,
        subject: "Confirm Your Email - Car Rental",
        html: "<html>Verify</html>",
      });
    });

    it("should log the link and skip sending in development", async () => {
      nodeEnv = "development";

      await service.sendVerificationEmail(testEmail, testUrl);

      expect(mockEmailService.sendEmail).not.toHaveBeenCalled();
      expect(renderEmailVerificationEmail).not.toHaveBeenCalled();
    });
  });

  describe("sendPasswordResetEmail", () => {
    it("should send the rendered password reset email", async () => {
      mockEmailService.sendEmail.mockResolvedValueOnce({ id: "email-456" });

      await service.sendPasswordResetEmail(testEmail, testUrl);

      expect(renderPasswordResetEmail).toHaveBeenCalledWith({ url: testUrl });
      expect(mockEmailService.sendEmail).toHaveBeenCalledWith({
        to: testEmail,
        subject: "Password Reset - Car Rental",
        html: "<html>Reset</html>",
      });
    });

    it("should propagate email service failures", async () => {
      const error = new Error("Email sending failed");
      mockEmailService.sendEmail.mockRejectedValueOnce(error);

      await expect(service.sendPasswordResetEmail(testEmail, testUrl)).rejects.toThrow(error);
    });
  });
});
