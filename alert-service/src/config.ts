import { z } from "zod";

const booleanFlag = z
  .union([z.string(), z.boolean()])
  .optional()
  .transform((value) => {
    if (typeof value === "boolean") return value;
    if (typeof value !== "string") return true;
    return value === "1" || value.toLowerCase() === "true";
  });

const envSchema = z.object({
  NODE_ENV: z.string().optional(),
  PORT: z.coerce.number().optional(),
  HOST: z.string().optional(),
  PURPLEAIR_API_KEY: z.string().min(1),
  PURPLEAIR_API_URL: z.string().url().default("https://api.purpleair.com/v1/"),
  SPIKE_THRESHOLD: z.coerce.number().nonnegative().default(35),
  PROXIMITY_METERS: z.coerce.number().positive().default(1000),
  LOCAL_TIME_ZONE: z.string().min(1).default("America/Chicago"),
  LAST_SEEN_OFFSET_HOURS: z.coerce.number().default(5),
  STALE_AFTER_MINUTES: z.coerce.number().positive().default(60),
  READING_CEILING: z.coerce.number().positive().default(1000),
  UTM_ZONE: z.coerce.number().int().min(1).max(60).default(15),
  API_TIMEOUT_MS: z.coerce.number().positive().default(30_000),
  CRON_SCHEDULE: z.string().default("*/10 * * * *"),
  RUN_ON_START: booleanFlag,
  FIRESTORE_PROJECT_ID: z.string().optional(),
  TWILIO_ACCOUNT_SID: z.string().optional(),
  TWILIO_AUTH_TOKEN: z.string().optional(),
  TWILIO_FROM_NUMBER: z.string().optional(),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info")
});

export type ServiceConfig = z.infer<typeof envSchema> & {
  port: number;
  host: string;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServiceConfig {
  const parsed = envSchema.parse({
    ...env,
    PORT: env.PORT ?? env.ALERT_SERVICE_PORT
  });

  return {
    ...parsed,
    port: parsed.PORT ?? 4020,
    host: parsed.HOST ?? "0.0.0.0"
  };
}
