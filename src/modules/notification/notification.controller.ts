import { Controller, Get, HttpCode, HttpStatus, Post, UseGuards } from "@nestjs/common";
import { ZodIdParam } from "../../common/decorators/zod-validation.decorator";
import { CurrentUser } from "../auth/decorators/current-user.decorator";
import { type AuthSession, SessionGuard } from "../auth/guards/session.guard";
import { NotificationService } from "./notification.service";

@Controller("api/notifications")
@UseGuards(SessionGuard)
export class NotificationController {
  constructor(private readonly notificationService: NotificationService) {}

  @Get()
  async getNotifications(@CurrentUser() user: AuthSession["user"]) {
    return this.notificationService.getUserNotifications(user.id);
  }

  @Get("unread-count")
  async getUnreadCount(@CurrentUser() user: AuthSession["user"]) {
    return this.notificationService.getUnreadCount(user.id);
  }

  @Post("read-all")
  @HttpCode(HttpStatus.OK)
  async markAllAsRead(@CurrentUser() user: AuthSession["user"]) {
    return this.notificationService.markAllAsRead(user.id);
  }

  @Post(":id/read")
  @HttpCode(HttpStatus.OK)
  async markAsRead(
    @ZodIdParam() id: number,
    @CurrentUser() user: AuthSession["user"],
  ) {
    return this.notificationService.markAsRead(user.id, id);
  }
}
