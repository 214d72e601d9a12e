import { betterAuth } from "better-auth";
import { drizzleAdapter } from "better-auth/adapters/drizzle";
import { APIError, createAuthMiddleware } from "better-auth/api";
import type { Database } from "../database/database.service";
import { accounts, sessions, users, verifications } from "../database/schema";
import { CUSTOMER } from "./auth.types";

/**
 * Lookups the sign-up and sign-in hooks need; provided by AuthService.
 */
export interface AccountRuleCallbacks {
  isPhoneNumberTaken: (phoneNumber: string) => Promise<boolean>;
  isNameTaken: (firstName: string, lastName: string) => Promise<boolean>;
  isAccountDeactivated: (email: string) => Promise<boolean>;
}

export interface AuthConfigOptions {
  db: Database;
  sessionSecret: string;
  authBaseUrl: string;
  trustedOrigins: string[];
  secureCookies: boolean;
  enableRateLimit: boolean;
  requireEmailVerification: boolean;
  sendVerificationEmail: (email: string, url: string) => Promise<void>;
  sendResetPasswordEmail: (email: string, url: string) => Promise<void>;
  accountRules: AccountRuleCallbacks;
}

export const PASSWORD_MIN_LENGTH = 6;

export const DUPLICATE_PHONE_MESSAGE =
  "This phone number is already registered. Please use a different phone number.";
export const DUPLICATE_NAME_MESSAGE =
  "A user with this first name and last name combination already exists. Please use a different name.";
export const ACCOUNT_DEACTIVATED_MESSAGE =
  "Your account has been deactivated. Please contact support.";

/**
 * Returns the first complexity rule the password breaks, or null.
 */
export function getPasswordComplexityError(password: string): string | null {
  if (!/\d/.test(password)) return "Password must contain at least one digit.";
  if (!/[A-Z]/.test(password)) return "Password must contain at least one uppercase letter.";
  if (!/[a-z]/.test(password)) return "Password must contain at least one lowercase letter.";
  return null;
}

function readStringField(body: unknown, field: string): string | undefined {
  if (body && typeof body === "object" && field in body) {
    const value: unknown = Reflect.get(body, field);
    return typeof value === "string" ? value.trim() : undefined;
  }
  return undefined;
}

/**
 * Account rules enforced before better-auth handles sign-up and sign-in.
 */
export async function enforceAccountRules(
  path: string,
  body: unknown,
  rules: AccountRuleCallbacks,
): Promise<void> {
  if (path === "/sign-up/email") {
    const password = readStringField(body, "password");
    const complexityError = password === undefined ? null : getPasswordComplexityError(password);
    if (complexityError) {
      throw new APIError("BAD_REQUEST", { message: complexityError });
    }

    const phoneNumber = readStringField(body, "phoneNumber");
    if (phoneNumber && (await rules.isPhoneNumberTaken(phoneNumber))) {
      throw new APIError("BAD_REQUEST", { message: DUPLICATE_PHONE_MESSAGE });
    }

    const firstName = readStringField(body, "firstName");
    const lastName = readStringField(body, "lastName");
    if (firstName && lastName && (await rules.isNameTaken(firstName, lastName))) {
      throw new APIError("BAD_REQUEST", { message: DUPLICATE_NAME_MESSAGE });
    }
    return;
  }

  if (path === "/sign-in/email") {
    const email = readStringField(body, "email");
    if (email && (await rules.isAccountDeactivated(email))) {
      throw new APIError("FORBIDDEN", { message: ACCOUNT_DEACTIVATED_MESSAGE });
    }
  }
}

export function createAuth(options: AuthConfigOptions) {
  const {
    db,
    sessionSecret,
    authBaseUrl,
    trustedOrigins,
    secureCookies,
    enableRateLimit,
    requireEmailVerification,
    sendVerificationEmail,
    sendResetPasswordEmail,
    accountRules,
  } = options;

  return betterAuth({
    database: drizzleAdapter(db, {
      provider: "pg",
      usePlural: true,
      schema: { users, sessions, accounts, verifications },
    }),
    secret: sessionSecret,
    baseURL: authBaseUrl,
    basePath: "/auth/api",
    trustedOrigins,
    emailAndPassword: {
      enabled: true,
      minPasswordLength: PASSWORD_MIN_LENGTH,
      requireEmailVerification,
      async sendResetPassword({ user, url }) {
        await sendResetPasswordEmail(user.email, url);
      },
    },
    emailVerification: {
      sendOnSignUp: requireEmailVerification,
      async sendVerificationEmail({ user, url }) {
        await sendVerificationEmail(user.email, url);
      },
    },
    user: {
      additionalFields: {
        firstName: { type: "string", required: true },
        lastName: { type: "string", required: true },
        phoneNumber: { type: "string", required: false },
        dateOfBirth: { type: "date", required: false },
        address: { type: "string", required: false },
        city: { type: "string", required: false },
        state: { type: "string", required: false },
        zipCode: { type: "string", required: false },
        licenseNumber: { type: "string", required: false },
        profilePictureUrl: { type: "string", required: false, input: false },
        isActive: { type: "boolean", required: false, input: false, defaultValue: true },
        role: { type: "string", required: false, input: false, defaultValue: CUSTOMER },
      },
    },
    session: {
      expiresIn: 60 * 60 * 24 * 7, // 7 days
      cookieCache: {
        enabled: true,
        maxAge: 60 * 5,
      },
    },
    hooks: {
      before: createAuthMiddleware(async (ctx) => {
        await enforceAccountRules(ctx.path, ctx.body, accountRules);
      }),
    },
    rateLimit: {
      enabled: enableRateLimit,
      window: 60,
      max: 100,
      customRules: {
        "/sign-in/email": { window: 60, max: 5 },
        "/forget-password": { window: 60, max: 3 },
      },
    },
    advanced: {
      defaultCookieAttributes: {
        httpOnly: true,
        secure: secureCookies,
        sameSite: "lax",
      },
    },
  });
}

export type Auth = ReturnType<typeof createAuth>;
