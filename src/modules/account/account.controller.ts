import { Controller, Get, Put, UploadedFile, UseGuards, UseInterceptors } from "@nestjs/common";
import { FileInterceptor } from "@nestjs/platform-express";
import { CurrentUser } from "../auth/decorators/current-user.decorator";
import { ZodBody, ZodQuery } from "../../common/decorators/zod-validation.decorator";
import { type AuthSession, SessionGuard } from "../auth/guards/session.guard";
import {
  ImageUploadPipe,
  PROFILE_PICTURE_MAX_BYTES,
  type UploadedImage,
} from "../storage/image-upload.pipe";
import { MALAYSIAN_STATES } from "./account.const";
import { AccountService } from "./account.service";
import {
  type EmailAvailabilityQueryDto,
  emailAvailabilityQuerySchema,
  type NameAvailabilityQueryDto,
  nameAvailabilityQuerySchema,
  type PhoneAvailabilityQueryDto,
  phoneAvailabilityQuerySchema,
  type UpdateProfileDto,
  updateProfileSchema,
} from "./dto/account.dto";

@Controller("api/account")
export class AccountController {
  constructor(private readonly accountService: AccountService) {}

  @Get("check-email")
  async checkEmail(@ZodQuery(emailAvailabilityQuerySchema) query: EmailAvailabilityQueryDto) {
    return this.accountService.checkEmail(query);
  }

  @Get("check-phone")
  async checkPhone(@ZodQuery(phoneAvailabilityQuerySchema) query: PhoneAvailabilityQueryDto) {
    return this.accountService.checkPhone(query);
  }

  @Get("check-name")
  async checkName(@ZodQuery(nameAvailabilityQuerySchema) query: NameAvailabilityQueryDto) {
    return this.accountService.checkName(query);
  }

  @Get("states")
  getStates() {
    return MALAYSIAN_STATES;
  }

  @Get("profile")
  @UseGuards(SessionGuard)
  async getProfile(@CurrentUser() user: AuthSession["user"]) {
    return this.accountService.getProfile(user);
  }

  @Put("profile")
  @UseGuards(SessionGuard)
  @UseInterceptors(FileInterceptor("profilePicture"))
  async updateProfile(
    @CurrentUser() user: AuthSession["user"],
    @ZodBody(updateProfileSchema) body: UpdateProfileDto,
    @UploadedFile(new ImageUploadPipe({ maxSizeBytes: PROFILE_PICTURE_MAX_BYTES }))
    picture: UploadedImage | undefined,
  ) {
    return this.accountService.updateProfile(user, body, picture);
  }
}
