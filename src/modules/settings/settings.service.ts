import { Injectable, Logger } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import type { EnvConfig } from "../../config/env.config";
import { renderTestEmail } from "../../templates/emails";
import { EmailService } from "../notification/email.service";
import type { TestEmailDto } from "./dto/settings.dto";
import { TestEmailFailedException } from "./settings.error";
import type { SiteSettings, TestEmailResult } from "./settings.interface";

@Injectable()
export class SettingsService {
  private readonly logger = new Logger(SettingsService.name);

  constructor(
    private readonly configService: ConfigService<EnvConfig, true>,
    private readonly emailService: EmailService,
  ) {}

  /** Settings are environment-driven; changing them needs a restart. */
  getSettings(): SiteSettings {
    return {
      siteName: this.configService.get("APP_NAME", { infer: true }),
      senderName: this.configService.get("SENDER_NAME", { infer: true }),
      senderEmail: this.configService.get("RESEND_FROM_EMAIL", { infer: true }),
      supportEmail: this.configService.get("SUPPORT_EMAIL", { infer: true }) ?? null,
      supportPhone: this.configService.get("SUPPORT_PHONE", { infer: true }) ?? null,
      requireEmailVerification: this.configService.get("REQUIRE_EMAIL_VERIFICATION", {
        infer: true,
      }),
      storageBucket: this.configService.get("AWS_BUCKET_NAME", { infer: true }),
      storageRegion: this.configService.get("AWS_REGION", { infer: true }),
    };
  }

  async sendTestEmail({ testEmail }: TestEmailDto, now = new Date()): Promise<TestEmailResult> {
    const siteName = this.configService.get("APP_NAME", { infer: true });

    try {
      const html = await renderTestEmail({ recipient: testEmail, sentAt: now.toISOString() });
      await this.emailService.sendEmail({
        to: testEmail,
        subject: `Email Configuration Test - ${siteName}`,
        html,
      });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.logger.error("Failed to send test email", { to: testEmail, error: reason });
      throw new TestEmailFailedException(reason);
    }

    return {
      success: true,
      message: `Test email sent successfully to ${testEmail}. Please check your inbox.`,
    };
  }
}
