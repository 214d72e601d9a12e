import type { NotificationType } from "../database/enums";

export interface EmailNotificationData {
  to: string;
  subject: string;
  html: string;
}

export interface InAppNotificationInput {
  userId: string;
  title: string;
  message: string;
  type?: NotificationType;
}
