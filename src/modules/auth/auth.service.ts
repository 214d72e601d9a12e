import { Injectable, Logger, OnModuleInit } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { and, eq, ne, sql } from "drizzle-orm";
import type { EnvConfig } from "../../config/env.config";
import { normalizePhoneNumber } from "../../shared/helper";
import { DatabaseService } from "../database/database.service";
import { users } from "../database/schema";
import { type Auth, createAuth } from "./auth.config";
import { CUSTOMER, type RoleName, type UserAccess } from "./auth.types";
import { AuthEmailService } from "./auth-email.service";

export interface CreateUserWithPasswordInput {
  email: string;
  password: string;
  firstName: string;
  lastName: string;
  phoneNumber?: string;
  address?: string;
  city?: string;
  state?: string;
  zipCode?: string;
  role?: RoleName;
}

@Injectable()
export class AuthService implements OnModuleInit {
  private readonly logger = new Logger(AuthService.name);
  private _auth: Auth | null = null;

  constructor(
    private readonly databaseService: DatabaseService,
    private readonly configService: ConfigService<EnvConfig, true>,
    private readonly authEmailService: AuthEmailService,
  ) {}

  onModuleInit() {
    const sessionSecret = this.configService.get("SESSION_SECRET", { infer: true });
    const authBaseUrl = this.configService.get("AUTH_BASE_URL", { infer: true });
    const trustedOrigins = this.configService.get("TRUSTED_ORIGINS", { infer: true });
    const nodeEnv = this.configService.get("NODE_ENV", { infer: true });
    const requireEmailVerification = this.configService.get("REQUIRE_EMAIL_VERIFICATION", {
      infer: true,
    });

    if (!sessionSecret || !authBaseUrl || !trustedOrigins?.length) {
      this.logger.warn(
        "Auth configuration incomplete. AuthService will not be initialized. " +
          "Set SESSION_SECRET, AUTH_BASE_URL, and TRUSTED_ORIGINS to enable auth.",
      );
      return;
    }

    this._auth = createAuth({
      db: this.databaseService.db,
      sessionSecret,
      authBaseUrl,
      trustedOrigins,
      secureCookies: nodeEnv !== "development",
      enableRateLimit: nodeEnv !== "test",
      requireEmailVerification: requireEmailVerification === true,
      sendVerificationEmail: this.authEmailService.sendVerificationEmail.bind(
        this.authEmailService,
      ),
      sendResetPasswordEmail: this.authEmailService.sendPasswordResetEmail.bind(
        this.authEmailService,
      ),
      accountRules: {
        isPhoneNumberTaken: (phoneNumber) => this.isPhoneNumberTaken(phoneNumber),
        isNameTaken: (firstName, lastName) => this.isNameTaken(firstName, lastName),
        isAccountDeactivated: (email) => this.isUserInactive(email),
      },
    });

    this.logger.log("Auth service initialized successfully");
  }

  get auth(): Auth {
    if (!this._auth) {
      throw new Error(
        "Auth service not initialized. Ensure SESSION_SECRET, AUTH_BASE_URL, and TRUSTED_ORIGINS are configured.",
      );
    }
    return this._auth;
  }

  get isInitialized(): boolean {
    return this._auth !== null;
  }

  /**
   * Role and activation flag for a user, read fresh on every request so that
   * role changes and deactivation take effect without waiting for the session.
   */
  async getUserAccess(userId: string): Promise<UserAccess | null> {
    const user = await this.databaseService.db.query.users.findFirst({
      where: eq(users.id, userId),
      columns: { role: true, isActive: true },
    });

    return user ? { role: user.role, isActive: user.isActive } : null;
  }

  /**
   * Compares digits only, so "012-345 6789" and "0123456789" collide.
   */
  async isPhoneNumberTaken(phoneNumber: string, excludeUserId?: string): Promise<boolean> {
    const digits = normalizePhoneNumber(phoneNumber);
    if (!digits) return false;

    const samePhone = sql`regexp_replace(${users.phoneNumber}, '\\D', '', 'g') = ${digits}`;
    const count = await this.databaseService.db.$count(
      users,
      excludeUserId ? and(samePhone, ne(users.id, excludeUserId)) : samePhone,
    );
    return count > 0;
  }

  async isNameTaken(firstName: string, lastName: string, excludeUserId?: string): Promise<boolean> {
    const sameName = and(
      sql`lower(${users.firstName}) = ${firstName.trim().toLowerCase()}`,
      sql`lower(${users.lastName}) = ${lastName.trim().toLowerCase()}`,
    );
    const count = await this.databaseService.db.$count(
      users,
      excludeUserId ? and(sameName, ne(users.id, excludeUserId)) : sameName,
    );
    return count > 0;
  }

  async isEmailTaken(email: string): Promise<boolean> {
    const count = await this.databaseService.db.$count(
      users,
      sql`lower(${users.email}) = ${email.trim().toLowerCase()}`,
    );
    return count > 0;
  }

  async isUserInactive(email: string): Promise<boolean> {
    const user = await this.databaseService.db.query.users.findFirst({
      where: sql`lower(${users.email}) = ${email.trim().toLowerCase()}`,
      columns: { isActive: true },
    });
    return user ? !user.isActive : false;
  }

  async setUserRole(userId: string, role: RoleName): Promise<void> {
    await this.databaseService.db
      .update(users)
      .set({ role, updatedAt: new Date() })
      .where(eq(users.id, userId));
    this.logger.log(`Assigned role "${role}" to user ${userId}`);
  }

  /**
   * Creates a confirmed account through better-auth so the password is hashed
   * the same way as self-registered users. Used by seeding and staff creation.
   */
  async createUserWithPassword(input: CreateUserWithPasswordInput): Promise<string> {
    const { email, password, firstName, lastName, role = CUSTOMER, ...profile } = input;

    const result = await this.auth.api.signUpEmail({
      body: {
        email,
        password,
        name: `${firstName} ${lastName}`,
        firstName,
        lastName,
        ...profile,
      },
    });

    const userId = result.user.id;
    await this.databaseService.db
      .update(users)
      .set({ role, emailVerified: true, updatedAt: new Date() })
      .where(eq(users.id, userId));

    this.logger.log("Created user account", { userId, role });
    return userId;
  }
}
