import { z } from "zod";

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .transform((v) => v === "true" || v === "1");

export const envSchema = z
  .object({
    NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
    PORT: z.coerce.number().int().positive().default(5000),
    DATABASE_URL: z.string().min(1).optional(),
    ADMIN_TOKEN: z.string().min(1).default("change-me"),
    PAYSTACK_SECRET_KEY: z.string().min(1).optional(),
    PAYSTACK_BASE_URL: z.string().url().default("https://api.paystack.co"),
    TELEGRAM_BOT_TOKEN: z.string().min(1).optional(),

    AVIATOR_ENGINE_ENABLED: booleanFlag.default("true"),
    AVIATOR_ROUND_INTERVAL_SEC: z.coerce.number().int().positive().default(30),
    AVIATOR_ROUND_DURATION_SEC: z.coerce.number().int().positive().default(20),
    AVIATOR_GROWTH_PER_SEC: z.coerce.number().positive().default(0.25),
    AVIATOR_ERROR_PAUSE_MS: z.coerce.number().int().nonnegative().default(1000),
  })
  .refine((env) => env.NODE_ENV !== "production" || env.DATABASE_URL !== undefined, {
    message: "DATABASE_URL is required in production",
    path: ["DATABASE_URL"],
  });

export type Env = z.infer<typeof envSchema>;

export interface AviatorTiming {
  roundDurationMs: number;
  gapMs: number;
  growthPerSec: number;
  errorPauseMs: number;
}

export interface AppConfig {
  env: Env["NODE_ENV"];
  port: number;
  databaseUrl?: string;
  adminToken: string;
  paystack: { secretKey?: string; baseUrl: string };
  telegramBotToken?: string;
  aviator: AviatorTiming & { enabled: boolean };
}

export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new Error(`Invalid environment: ${issues}`);
  }
  const env = parsed.data;

  return {
    env: env.NODE_ENV,
    port: env.PORT,
    databaseUrl: env.DATABASE_URL,
    adminToken: env.ADMIN_TOKEN,
    paystack: { secretKey: env.PAYSTACK_SECRET_KEY, baseUrl: env.PAYSTACK_BASE_URL },
    telegramBotToken: env.TELEGRAM_BOT_TOKEN,
    aviator: {
      enabled: env.AVIATOR_ENGINE_ENABLED,
      roundDurationMs: env.AVIATOR_ROUND_DURATION_SEC * 1000,
      gapMs: Math.max(0, env.AVIATOR_ROUND_INTERVAL_SEC - env.AVIATOR_ROUND_DURATION_SEC) * 1000,
      growthPerSec: env.AVIATOR_GROWTH_PER_SEC,
      errorPauseMs: env.AVIATOR_ERROR_PAUSE_MS,
    },
  };
}
