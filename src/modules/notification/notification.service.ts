import { Injectable, Logger } from "@nestjs/common";
import { and, desc, eq } from "drizzle-orm";
import { DatabaseService, type Transaction } from "../database/database.service";
import { NotificationType } from "../database/enums";
import { type Notification, notifications } from "../database/schema";
import {
  NotificationException,
  NotificationFetchFailedException,
  NotificationNotFoundException,
} from "./notification.error";
import type { InAppNotificationInput } from "./notification.interface";

@Injectable()
export class NotificationService {
  private readonly logger = new Logger(NotificationService.name);

  constructor(private readonly databaseService: DatabaseService) {}

  /**
   * Stores an in-app notification. Pass `tx` to write it inside the caller's transaction.
   */
  async createNotification(input: InAppNotificationInput, tx?: Transaction): Promise<Notification> {
    const executor = tx ?? this.databaseService.db;
    const [notification] = await executor
      .insert(notifications)
      .values({
        userId: input.userId,
        title: input.title,
        message: input.message,
        type: input.type ?? NotificationType.INFO,
      })
      .returning();

    this.logger.log("Notification created", {
      userId: input.userId,
      title: input.title,
    });

    return notification;
  }

  async notifyUsers(
    userIds: string[],
    title: string,
    message: string,
    type: InAppNotificationInput["type"] = NotificationType.INFO,
  ): Promise<number> {
    if (userIds.length === 0) {
      return 0;
    }

    await this.databaseService.db
      .insert(notifications)
      .values(userIds.map((userId) => ({ userId, title, message, type })));

    this.logger.log("Notifications broadcast", { title, recipients: userIds.length });
    return userIds.length;
  }

  async getUserNotifications(userId: string): Promise<Notification[]> {
    try {
      return await this.databaseService.db.query.notifications.findMany({
        where: eq(notifications.userId, userId),
        orderBy: [desc(notifications.createdAt)],
      });
    } catch (error) {
      this.logger.error("Failed to fetch notifications", {
        userId,
        error: error instanceof Error ? error.message : String(error),
      });
      throw new NotificationFetchFailedException();
    }
  }

  async markAsRead(userId: string, notificationId: number): Promise<{ success: true }> {
    try {
      const notification = await this.databaseService.db.query.notifications.findFirst({
        where: and(eq(notifications.id, notificationId), eq(notifications.userId, userId)),
      });

      if (!notification) {
        throw new NotificationNotFoundException();
      }

      await this.databaseService.db
        .update(notifications)
        .set({ isRead: true })
        .where(eq(notifications.id, notificationId));

      return { success: true };
    } catch (error) {
      if (error instanceof NotificationException) {
        throw error;
      }
      this.logger.error("Failed to mark notification as read", {
        userId,
        notificationId,
        error: error instanceof Error ? error.message : String(error),
      });
      throw new NotificationFetchFailedException();
    }
  }

  async markAllAsRead(userId: string): Promise<{ success: true }> {
    await this.databaseService.db
      .update(notifications)
      .set({ isRead: true })
      .where(and(eq(notifications.userId, userId), eq(notifications.isRead, false)));

    return { success: true };
  }

  async getUnreadCount(userId: string): Promise<{ count: number }> {
    const count = await this.databaseService.db.$count(
      notifications,
      and(eq(notifications.userId, userId), eq(notifications.isRead, false)),
    );
    return { count };
  }
}
