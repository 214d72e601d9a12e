import { Injectable, Logger } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { Resend } from "resend";
import type { EnvConfig } from "../../config/env.config";
import type { EmailNotificationData } from "./notification.interface";

@Injectable()
export class EmailService {
  private readonly logger = new Logger(EmailService.name);
  private readonly resend: Resend;
  private readonly from: string;

  constructor(private readonly configService: ConfigService<EnvConfig, true>) {
    const apiKey = this.configService.get("RESEND_API_KEY", { infer: true });
    const appName = this.configService.get("APP_NAME", { infer: true });
    const fromEmail = this.configService.get("RESEND_FROM_EMAIL", { infer: true });
    const senderName = this.configService.get("SENDER_NAME", { infer: true });

    this.resend = new Resend(apiKey);
    this.from = `${senderName} from ${appName} <${fromEmail}>`;
  }

  async sendEmail({ to, subject, html }: EmailNotificationData): Promise<{ id: string | null }> {
    try {
      const result = await this.resend.emails.send({ from: this.from, to, subject, html });

      if (result.error) {
        this.logger.error("Email API returned error", { subject, error: result.error.message });
        throw new Error(`Resend API error: ${result.error.message}`);
      }

      const id = result.data?.id ?? null;
      this.logger.log("Email sent successfully", { subject, messageId: id });
      return { id };
    } catch (error) {
      this.logger.error("Failed to send email", {
        subject,
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }
  }
}
