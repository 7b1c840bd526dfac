import { z } from "zod";

const commaList = z
  .string()
  .default("")
  .transform((val) =>
    val
      .split(",")
      .map((item) => item.trim())
      .filter((item) => item.length > 0)
  );

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  PORT: z.coerce.number().min(1).max(65535).default(8080),

  // Logging
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error", "silent"]).default("info"),
  LOG_PRETTY: z.string().transform((val) => val === "true").default("false"),

  // CORS
  CORS_ORIGIN: z.string().default("*"),

  // State layer
  STATUS_CACHE_TTL_MINUTES: z.coerce.number().positive().default(5),
  HISTORY_MAX_MESSAGES: z.coerce.number().int().positive().default(5),
  HISTORY_EXPIRY_HOURS: z.coerce.number().positive().default(1),

  // Access
  AUTHORIZED_USERS: commaList.pipe(
    z.array(z.coerce.number().int({ message: "User ids must be integers" }))
  ),

  // Website probes
  MONITORED_WEBSITES: commaList.pipe(z.array(z.string().url())),
  WEBSITE_CHECK_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),

  // Issue tracker
  SENTRY_TOKEN: z.string().optional(),
  SENTRY_ORG: z.string().optional(),
  SENTRY_DOMAIN: z.string().default("sentry.io"),
  SENTRY_PROJECTS: commaList,
  SENTRY_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),

  // Language model
  ANTHROPIC_API_KEY: z.string().optional(),
  LLM_MODEL: z.string().default("claude-3-5-sonnet-latest"),
  LLM_MAX_TOKENS: z.coerce.number().int().positive().default(1024),

  // Rate limiting
  CHAT_RATE_WINDOW_MS: z.coerce.number().int().positive().default(60_000),
  CHAT_RATE_MAX: z.coerce.number().int().positive().default(30),
});

export type Env = z.infer<typeof envSchema>;

let env: Env | undefined;

export function parseEnv(source: Record<string, string | undefined>): Env {
  const result = envSchema.safeParse(source);

  if (!result.success) {
    console.error("Invalid environment variables:");
    console.error(result.error.flatten().fieldErrors);
    throw new Error("Invalid environment configuration");
  }

  return result.data;
}

export function getEnv(): Env {
  if (env) {
    return env;
  }

  env = parseEnv(process.env);
  return env;
}

export function initEnv(): Env {
  const e = getEnv();

  if (e.NODE_ENV === "development") {
    console.log("Running in development mode");
    console.log("Port:", e.PORT);
  }

  return e;
}
