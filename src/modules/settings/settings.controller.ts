import { Controller, Get, HttpCode, HttpStatus, Post, UseGuards } from "@nestjs/common";
import { ZodBody } from "../../common/decorators/zod-validation.decorator";
import { MANAGER } from "../auth/auth.types";
import { Roles } from "../auth/decorators/roles.decorator";
import { RoleGuard } from "../auth/guards/role.guard";
import { SessionGuard } from "../auth/guards/session.guard";
import { type TestEmailDto, testEmailSchema } from "./dto/settings.dto";
import { SettingsService } from "./settings.service";

@Controller("api/settings")
@UseGuards(SessionGuard, RoleGuard)
@Roles(MANAGER)
export class SettingsController {
  constructor(private readonly settingsService: SettingsService) {}

  @Get()
  getSettings() {
    return this.settingsService.getSettings();
  }

  @Post("test-email")
  @HttpCode(HttpStatus.OK)
  async sendTestEmail(@ZodBody(testEmailSchema) body: TestEmailDto) {
    return this.settingsService.sendTestEmail(body);
  }
}
