import { z } from "zod";

const booleanString = z
  .enum(["true", "false"])
  .default("false")
  .transform((value) => value === "true");

export const envSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  PORT: z.coerce.number().default(3000),
  HOST: z.string().default("0.0.0.0"),
  DATABASE_URL: z.string().min(1, "DATABASE_URL is required"),
  APP_NAME: z.string().min(1, "APP_NAME is required"),

  SESSION_SECRET: z.string().min(32, "SESSION_SECRET must be at least 32 characters").optional(),
  AUTH_BASE_URL: z.url("AUTH_BASE_URL must be a valid URL").optional(),
  TRUSTED_ORIGINS: z
    .string()
    .optional()
    .transform((value) =>
      value
        ? value
            .split(",")
            .map((origin) => origin.trim())
            .filter((origin) => origin.length > 0)
        : [],
    ),
  REQUIRE_EMAIL_VERIFICATION: booleanString,

  RESEND_API_KEY: z.string().min(1, "RESEND_API_KEY is required"),
  RESEND_FROM_EMAIL: z.email("RESEND_FROM_EMAIL must be a valid email"),
  SENDER_NAME: z.string().default("Bookings"),
  SUPPORT_EMAIL: z.email().optional(),
  SUPPORT_PHONE: z.string().optional(),

  AWS_BUCKET_NAME: z.string().min(1, "AWS_BUCKET_NAME is required"),
  AWS_REGION: z.string().min(1, "AWS_REGION is required"),
  AWS_ACCESS_KEY_ID: z.string().min(1, "AWS_ACCESS_KEY_ID is required"),
  AWS_SECRET_ACCESS_KEY: z.string().min(1, "AWS_SECRET_ACCESS_KEY is required"),

  SEED_ON_STARTUP: z
    .enum(["true", "false"])
    .default("true")
    .transform((value) => value === "true"),
  SEED_DELAY_MS: z.coerce.number().int().min(0).default(5000),
  SEED_DEFAULT_PASSWORD: z.string().min(6).optional(),
  SEED_ACCOUNT_DOMAIN: z.string().default("example.com"),
});

export type EnvConfig = z.infer<typeof envSchema>;

export function validateEnvironment(config: Record<string, unknown>): EnvConfig {
  const result = envSchema.safeParse(config);

  if (!result.success) {
    const errors = result.error.flatten().fieldErrors;
    console.error("❌ Environment validation failed:");

    for (const [field, messages] of Object.entries(errors)) {
      console.error(`  ${field}: ${messages?.join(", ")}`);
    }

    throw new Error("Invalid environment configuration. Please check your .env file.");
  }

  console.log("✅ Environment variables validated successfully");
  return result.data;
}
