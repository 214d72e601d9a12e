import { Injectable, Logger } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import type { EnvConfig } from "../../config/env.config";
import { maskEmail } from "../../shared/helper";
import { renderEmailVerificationEmail, renderPasswordResetEmail } from "../../templates/emails";
import { EmailService } from "../notification/email.service";

@Injectable()
export class AuthEmailService {
  private readonly logger = new Logger(AuthEmailService.name);

  constructor(
    private readonly emailService: EmailService,
    private readonly configService: ConfigService<EnvConfig, true>,
  ) {}

  async sendVerificationEmail(email: string, url: string): Promise<void> {
    const appName = this.configService.get("APP_NAME", { infer: true });
    await this.deliver(email, url, "verification", async () => ({
      subject: `Confirm Your Email - ${appName}`,
      html: await renderEmailVerificationEmail({ url }),
    }));
  }

  async sendPasswordResetEmail(email: string, url: string): Promise<void> {
    const appName = this.configService.get("APP_NAME", { infer: true });
    await this.deliver(email, url, "password reset", async () => ({
      subject: `Password Reset - ${appName}`,
      html: await renderPasswordResetEmail({ url }),
    }));
  }

  private async deliver(
    email: string,
    url: string,
    kind: string,
    build: () => Promise<{ subject: string; html: string }>,
  ): Promise<void> {
    const isDevelopment = this.configService.get("NODE_ENV", { infer: true }) === "development";
    const maskedEmail = isDevelopment ? email : maskEmail(email);

    if (isDevelopment) {
      this.logger.log(`Dev ${kind} link for ${maskedEmail}: ${url}`);
      return;
    }

    this.logger.log(`Sending ${kind} email to ${maskedEmail}`);
    const { subject, html } = await build();
    await this.emailService.sendEmail({ to: email, subject, html });
    this.logger.log(`${kind} email sent successfully to ${maskedEmail}`);
  }
}
