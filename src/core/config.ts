import { config as dotenvConfig } from "dotenv";
import { z } from "zod";

dotenvConfig();

const envSchema = z.object({
  DATABASE_PATH: z.string().default("./data/app.db"),
  LOG_LEVEL: z.enum(["trace", "debug", "info", "warn", "error", "fatal"]).default("info"),
  LOG_PRETTY: z.string().default("true").transform((v) => v === "true"),
  API_ENABLED: z.string().default("true").transform((v) => v === "true"),
  API_HOST: z.string().default("127.0.0.1"),
  API_PORT: z.coerce.number().int().positive().default(3030),
  SCREEN_PROVIDER_MODULE: z.string().optional(),
  WORKFLOW_STUCK_THRESHOLD: z.coerce.number().int().min(2).default(3),
  WORKFLOW_MAX_ERRORS: z.coerce.number().int().min(0).default(5),
  WORKFLOW_RECOVERY_SETTLE_MS: z.coerce.number().int().min(0).default(4000),
  WORKFLOW_INTERACTION_WINDOW_HOURS: z.coerce.number().positive().default(168),
  WORKFLOW_DEFAULT_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
  WORKFLOW_POLL_INTERVAL_MS: z.coerce.number().int().positive().default(250),
});

export const env = envSchema.parse(process.env);
export type Env = typeof env;
