import { Injectable, Logger } from "@nestjs/common";
import { and, eq, ne } from "drizzle-orm";
import { AnalyticsService } from "../analytics/analytics.service";
import { AuthService } from "../auth/auth.service";
import { isBackOfficeRole } from "../auth/auth.types";
import type { AuthSession } from "../auth/guards/session.guard";
import { DatabaseService } from "../database/database.service";
import { AppointmentStatus } from "../database/enums";
import { appointments, type User, users } from "../database/schema";
import { buildProfilePictureKey, type UploadedImage } from "../storage/image-upload.pipe";
import { StorageService } from "../storage/storage.service";
import { MALAYSIAN_STATES } from "./account.const";
import {
  AccountNameTakenException,
  AccountPhoneTakenException,
  AccountUpdateFailedException,
  AccountUserNotFoundException,
  ProfilePictureUploadFailedException,
} from "./account.error";
import type {
  AccountProfile,
  AvailabilityResponse,
  CustomerStats,
  ProfileUpdateResponse,
} from "./account.interface";
import type {
  EmailAvailabilityQueryDto,
  NameAvailabilityQueryDto,
  PhoneAvailabilityQueryDto,
  UpdateProfileDto,
} from "./dto/account.dto";

@Injectable()
export class AccountService {
  private readonly logger = new Logger(AccountService.name);

  constructor(
    private readonly databaseService: DatabaseService,
    private readonly authService: AuthService,
    private readonly analyticsService: AnalyticsService,
    private readonly storageService: StorageService,
  ) {}

  async checkEmail(query: EmailAvailabilityQueryDto): Promise<AvailabilityResponse> {
    if (!query.email) return { exists: false };
    return { exists: await this.authService.isEmailTaken(query.email) };
  }

  async checkPhone(query: PhoneAvailabilityQueryDto): Promise<AvailabilityResponse> {
    if (!query.phoneNumber) return { exists: false };
    return { exists: await this.authService.isPhoneNumberTaken(query.phoneNumber) };
  }

  async checkName(query: NameAvailabilityQueryDto): Promise<AvailabilityResponse> {
    if (!query.firstName || !query.lastName) return { exists: false };
    return { exists: await this.authService.isNameTaken(query.firstName, query.lastName) };
  }

  async getProfile(sessionUser: AuthSession["user"]): Promise<AccountProfile> {
    const user = await this.findUser(sessionUser.id);
    const stats = isBackOfficeRole(user.role) ? null : await this.getCustomerStats(user.id);
    return { user, stats, states: MALAYSIAN_STATES };
  }

  async updateProfile(
    sessionUser: AuthSession["user"],
    body: UpdateProfileDto,
    picture?: UploadedImage,
  ): Promise<ProfileUpdateResponse> {
    const user = await this.findUser(sessionUser.id);

    if (body.phoneNumber && (await this.authService.isPhoneNumberTaken(body.phoneNumber, user.id))) {
      throw new AccountPhoneTakenException();
    }
    if (await this.authService.isNameTaken(body.firstName, body.lastName, user.id)) {
      throw new AccountNameTakenException();
    }

    const profilePictureUrl = picture
      ? await this.uploadProfilePicture(user.id, picture)
      : user.profilePictureUrl;

    try {
      const [updated] = await this.databaseService.db
        .update(users)
        .set({
          ...body,
          name: `${body.firstName} ${body.lastName}`,
          profilePictureUrl,
          updatedAt: new Date(),
        })
        .where(eq(users.id, user.id))
        .returning();

      if (picture && user.profilePictureUrl) {
        await this.storageService.deleteByUrl(user.profilePictureUrl);
      }

      return { user: updated, message: "Profile updated successfully." };
    } catch (error) {
      this.logger.error("Failed to update profile", {
        userId: user.id,
        error: error instanceof Error ? error.message : String(error),
      });
      throw new AccountUpdateFailedException();
    }
  }

  private async findUser(userId: string): Promise<User> {
    const user = await this.databaseService.db.query.users.findFirst({
      where: eq(users.id, userId),
    });
    if (!user) {
      throw new AccountUserNotFoundException();
    }
    return user;
  }

  private async getCustomerStats(userId: string): Promise<CustomerStats> {
    const db = this.databaseService.db;
    const ownBookings = eq(appointments.userId, userId);

    const [totalBookings, completedBookings, totalSpent] = await Promise.all([
      db.$count(appointments, and(ownBookings, ne(appointments.status, AppointmentStatus.CANCELLED))),
      db.$count(appointments, and(ownBookings, eq(appointments.status, AppointmentStatus.COMPLETED))),
      this.analyticsService.sumRevenue(ownBookings),
    ]);

    return { totalBookings, completedBookings, totalSpent };
  }

  private async uploadProfilePicture(userId: string, picture: UploadedImage): Promise<string> {
    try {
      return await this.storageService.uploadBuffer(
        picture.buffer,
        buildProfilePictureKey(userId, picture.extension),
        picture.mimetype,
      );
    } catch (error) {
      this.logger.error("Failed to upload profile picture", {
        userId,
        error: error instanceof Error ? error.message : String(error),
      });
      throw new ProfilePictureUploadFailedException();
    }
  }
}
