import path from "node:path";
import dotenv from "dotenv";
import { z } from "zod";
import { isIanaTimeZone } from "./importer/timezones.js";

dotenv.config();

const DATE_REGEX = /^\d{4}-\d{2}-\d{2}$/;

const ConfigSchema = z.object({
  GOOGLE_CLIENT_ID: z.string().min(1),
  GOOGLE_CLIENT_SECRET: z.string().min(1),
  TOKEN_ENCRYPTION_KEY: z.string().min(16),
  SQLITE_PATH: z.string().min(1).default("./data/import.db"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  GOOGLE_OAUTH_REDIRECT_PORT: z.coerce.number().int().positive().default(53682),

  IMPORT_BATCH_SIZE: z.coerce.number().int().positive().max(1000).default(50),
  IMPORT_BATCH_DELAY_MS: z.coerce.number().int().nonnegative().default(1000),
  IMPORT_MAX_ATTEMPTS: z.coerce.number().int().positive().default(5),
  IMPORT_RETRY_BASE_DELAY_MS: z.coerce.number().int().positive().default(1000),
  IMPORT_RETRY_MAX_DELAY_MS: z.coerce.number().int().positive().default(60_000),
  IMPORT_MAX_ATTENDEES: z.coerce.number().int().positive().default(200),
  FALLBACK_TIME_ZONE: z
    .string()
    .min(1)
    .refine(isIanaTimeZone, { message: "must be an IANA time zone such as Europe/Berlin or UTC" })
    .optional(),
  PROGRESS_LOG_INTERVAL: z.coerce.number().int().positive().default(100),
});

export interface AppConfig {
  googleClientId: string;
  googleClientSecret: string;
  tokenEncryptionKey: string;
  sqlitePath: string;
  logLevel: string;
  googleOAuthRedirectPort: number;

  batchSize: number;
  batchDelayMs: number;
  maxAttempts: number;
  retryBaseDelayMs: number;
  retryMaxDelayMs: number;
  maxAttendees: number;
  /** When unset, the target calendar's own zone is the fallback. */
  fallbackTimeZone?: string;
  progressLogInterval: number;
}

const CONFIG_KEYS = Object.keys(ConfigSchema.shape);

export function parseConfig(env: NodeJS.ProcessEnv): AppConfig {
  const raw = Object.fromEntries(CONFIG_KEYS.map((key) => [key, env[key] === "" ? undefined : env[key]]));
  const parsed = ConfigSchema.parse(raw);

  if (parsed.IMPORT_RETRY_MAX_DELAY_MS < parsed.IMPORT_RETRY_BASE_DELAY_MS) {
    throw new Error("IMPORT_RETRY_MAX_DELAY_MS must not be smaller than IMPORT_RETRY_BASE_DELAY_MS.");
  }

  return {
    googleClientId: parsed.GOOGLE_CLIENT_ID,
    googleClientSecret: parsed.GOOGLE_CLIENT_SECRET,
    tokenEncryptionKey: parsed.TOKEN_ENCRYPTION_KEY,
    sqlitePath: parsed.SQLITE_PATH === ":memory:" ? parsed.SQLITE_PATH : path.resolve(parsed.SQLITE_PATH),
    logLevel: parsed.LOG_LEVEL,
    googleOAuthRedirectPort: parsed.GOOGLE_OAUTH_REDIRECT_PORT,

    batchSize: parsed.IMPORT_BATCH_SIZE,
    batchDelayMs: parsed.IMPORT_BATCH_DELAY_MS,
    maxAttempts: parsed.IMPORT_MAX_ATTEMPTS,
    retryBaseDelayMs: parsed.IMPORT_RETRY_BASE_DELAY_MS,
    retryMaxDelayMs: parsed.IMPORT_RETRY_MAX_DELAY_MS,
    maxAttendees: parsed.IMPORT_MAX_ATTENDEES,
    fallbackTimeZone: parsed.FALLBACK_TIME_ZONE,
    progressLogInterval: parsed.PROGRESS_LOG_INTERVAL,
  };
}

export function loadConfig(): AppConfig {
  return parseConfig(process.env);
}

function isCalendarDate(value: string): boolean {
  if (!DATE_REGEX.test(value)) {
    return false;
  }
  const parsed = new Date(`${value}T00:00:00Z`);
  return !Number.isNaN(parsed.getTime()) && parsed.toISOString().slice(0, 10) === value;
}

const DateSchema = z.string().refine(isCalendarDate, "expected a YYYY-MM-DD calendar date");

export const ImportOptionsSchema = z
  .object({
    dryRun: z.boolean().default(false),
    calendarId: z.string().min(1).default("primary"),
    includeAttendees: z.boolean().default(true),
    skipDuplicates: z.boolean().default(true),
    startDate: DateSchema.optional(),
    endDate: DateSchema.optional(),
    limit: z.number().int().positive().optional(),
    addSelf: z.string().email().optional(),
    batchSize: z.number().int().positive().max(1000).default(50),
    maxAttendees: z.number().int().positive().default(200),
    excludeResources: z.boolean().default(true),
  })
  .refine((options) => !options.startDate || !options.endDate || options.endDate > options.startDate, {
    message: "endDate must be after startDate",
    path: ["endDate"],
  });

export type ImportOptions = z.infer<typeof ImportOptionsSchema>;
export type ImportOptionsInput = z.input<typeof ImportOptionsSchema>;

export function parseImportOptions(input: ImportOptionsInput): ImportOptions {
  return ImportOptionsSchema.parse(input);
}
