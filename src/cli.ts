#!/usr/bin/env node

import path from "node:path";
import { Command, InvalidArgumentError } from "commander";
import type pino from "pino";
import { authenticateGoogleOAuth, getGoogleAccessToken, type GoogleAuthConfig } from "./auth/google.js";
import { TokenStore } from "./auth/token-store.js";
import { GoogleCalendarClient } from "./clients/google-calendar.js";
import { loadConfig, parseImportOptions, type AppConfig, type ImportOptions } from "./config.js";
import { DbClient } from "./db.js";
import { AuthError, classifyError } from "./errors.js";
import { HttpError } from "./http.js";
import { findIcsFiles, readIcsFile } from "./ics/reader.js";
import { runImport } from "./importer/controller.js";
import { GoogleImportTarget } from "./importer/google-target.js";
import { ImportRecord, SqliteImportRecordPersistence } from "./importer/import-record.js";
import {
  exitCodeFor,
  mergeSummaries,
  type ProgressListener,
  type RunSummary,
} from "./importer/summary.js";
import type { ImportTarget } from "./importer/target.js";
import { TimezoneResolver, isIanaTimeZone, loadTimezoneMap } from "./importer/timezones.js";
import { createLogger } from "./logger.js";
import { RetryPolicy } from "./retry.js";

const DEFAULT_ACCOUNT = "default";
const EXIT_ABORTED = 2;

interface GlobalOptions {
  account: string;
}

interface Runtime {
  account: string;
  config: AppConfig;
  db: DbClient;
  logger: pino.Logger;
  tokenStore: TokenStore;
  googleClient: GoogleCalendarClient;
  retryPolicy: RetryPolicy;
}

interface ImportCommandOptions {
  calendar: string;
  attendees: boolean;
  skipDuplicates: boolean;
  dryRun: boolean;
  startDate?: string;
  endDate?: string;
  limit?: number;
  addSelf?: string;
  batchSize?: number;
  maxAttendees?: number;
  keepResources: boolean;
}

function toGoogleAuthConfig(config: AppConfig): GoogleAuthConfig {
  return {
    googleClientId: config.googleClientId,
    googleClientSecret: config.googleClientSecret,
    googleOAuthRedirectPort: config.googleOAuthRedirectPort,
  };
}

function createRetryPolicy(config: AppConfig): RetryPolicy {
  return new RetryPolicy({
    maxAttempts: config.maxAttempts,
    baseDelayMs: config.retryBaseDelayMs,
    maxDelayMs: config.retryMaxDelayMs,
  });
}

async function withRuntime<T>(fn: (runtime: Runtime) => Promise<T>): Promise<T> {
  const { account } = program.opts<GlobalOptions>();
  const config = loadConfig();
  const logger = createLogger(config.logLevel);
  const db = new DbClient(config.sqlitePath);
  const tokenStore = new TokenStore(db, config.tokenEncryptionKey, logger);
  const retryPolicy = createRetryPolicy(config);
  const googleClient = new GoogleCalendarClient(
    () => getGoogleAccessToken(toGoogleAuthConfig(config), tokenStore, account),
    logger,
    retryPolicy,
  );

  try {
    return await fn({ account, config, db, logger, tokenStore, googleClient, retryPolicy });
  } finally {
    db.close();
  }
}

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return parsed;
}

function createProgressLogger(logger: pino.Logger, interval: number): ProgressListener {
  return ({ processed, total, counts }) => {
    if (processed % interval === 0 || processed === total) {
      logger.info({ processed, total, ...counts }, "Import progress");
    }
  };
}

async function resolveFallbackTimeZone(
  config: AppConfig,
  target: ImportTarget,
  calendarId: string,
  logger: pino.Logger,
): Promise<string> {
  if (config.fallbackTimeZone) {
    return config.fallbackTimeZone;
  }

  try {
    const zone = await target.getDefaultTimeZone(calendarId);
    if (zone && isIanaTimeZone(zone)) {
      return zone;
    }
  } catch (error) {
    if (classifyError(error) === "fatal") {
      throw error;
    }
    logger.warn({ err: error, calendarId }, "Could not read calendar time zone; falling back to UTC");
  }
  return "UTC";
}

async function importFiles(runtime: Runtime, inputPath: string, options: ImportOptions): Promise<RunSummary> {
  const { config, db, logger, googleClient, retryPolicy } = runtime;
  const files = await findIcsFiles(path.resolve(inputPath));
  if (files.length === 0) {
    throw new Error(`No .ics files found at ${inputPath}`);
  }

  const target = new GoogleImportTarget(googleClient);
  const resolver = new TimezoneResolver(loadTimezoneMap());
  const fallbackTimeZone = await resolveFallbackTimeZone(config, target, options.calendarId, logger);
  logger.info(
    { calendarId: options.calendarId, files: files.length, dryRun: options.dryRun, fallbackTimeZone },
    "Starting import",
  );

  const stop = new AbortController();
  const onSignal = (signal: NodeJS.Signals) => {
    if (stop.signal.aborted) {
      return;
    }
    logger.warn({ signal }, "Stop requested; finishing the current event");
    stop.abort();
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);

  const summaries: RunSummary[] = [];
  let remaining = options.limit;

  try {
    for (const file of files) {
      const parsed = await readIcsFile(file);
      const fileLogger = logger.child({ file: path.basename(file) });
      fileLogger.info(
        { entries: parsed.entries.length, calendarTimeZone: parsed.calendarTimeZone },
        "Importing calendar file",
      );

      const record = new ImportRecord(
        { sourceFile: file, calendarId: options.calendarId },
        new SqliteImportRecordPersistence(db),
      );
      const startedAt = new Date().toISOString();
      const summary = await runImport(
        parsed.entries,
        {
          target,
          record,
          resolver,
          retryPolicy,
          policy: {
            startDate: options.startDate,
            endDate: options.endDate,
            includeAttendees: options.includeAttendees,
            addSelf: options.addSelf,
            excludeResources: options.excludeResources,
            maxAttendees: options.maxAttendees,
            fallbackTimeZone,
          },
          options: {
            calendarId: options.calendarId,
            dryRun: options.dryRun,
            skipDuplicates: options.skipDuplicates,
            batchSize: options.batchSize,
            batchDelayMs: config.batchDelayMs,
            limit: remaining,
            signal: stop.signal,
            onProgress: createProgressLogger(fileLogger, config.progressLogInterval),
          },
          logger: fileLogger,
        },
        parsed.entries.length,
      );

      db.insertImportRun({
        sourceFile: file,
        calendarId: options.calendarId,
        dryRun: options.dryRun,
        startedAt,
        finishedAt: new Date().toISOString(),
        summaryJson: JSON.stringify(summary),
      });
      fileLogger.info({ ...summary.counts, stopReason: summary.stopReason }, "Calendar file finished");
      summaries.push(summary);

      if (remaining !== undefined) {
        remaining -= summary.processed;
      }
      if (summary.stopReason === "aborted" || summary.stopReason === "signal" || remaining === 0) {
        break;
      }
    }
  } finally {
    process.off("SIGINT", onSignal);
    process.off("SIGTERM", onSignal);
  }

  return mergeSummaries(summaries);
}

const program = new Command();
program
  .name("ics-calendar-import")
  .description("Import .ics calendar exports into Google Calendar without notifying attendees")
  .version("0.1.0")
  .option("-a, --account <key>", "stored Google account to authenticate or use", DEFAULT_ACCOUNT);

program
  .command("auth:google")
  .description("Authenticate Google account via OAuth redirect")
  .action(async () => {
    await withRuntime(async ({ account, config, tokenStore, logger }) => {
      await authenticateGoogleOAuth(toGoogleAuthConfig(config), tokenStore, logger, account);
    });
  });

program
  .command("calendars")
  .description("List calendars the authenticated account can see")
  .action(async () => {
    await withRuntime(async ({ googleClient }) => {
      const calendars = await googleClient.listCalendars();
      console.log(
        JSON.stringify(
          calendars.map((calendar) => ({
            id: calendar.id,
            summary: calendar.summary ?? null,
            primary: calendar.primary ?? false,
            timeZone: calendar.timeZone ?? null,
            accessRole: calendar.accessRole ?? null,
          })),
          null,
          2,
        ),
      );
    });
  });

program
  .command("health")
  .description("Verify database, stored token and target calendar access")
  .option("-c, --calendar <id>", "target calendar id", "primary")
  .action(async (options: { calendar: string }) => {
    await withRuntime(async ({ account, db, tokenStore, googleClient }) => {
      if (!db.ping()) {
        throw new Error("Database ping failed.");
      }
      if (!tokenStore.get(account)) {
        throw new Error(`Google token for account '${account}' not found. Run auth:google first.`);
      }

      const calendar = await googleClient.getCalendar(options.calendar);
      const timeZones = new TimezoneResolver(loadTimezoneMap());

      console.log(
        JSON.stringify(
          {
            database: "ok",
            google: "ok",
            calendarId: calendar.id,
            calendarTimeZone: calendar.timeZone ?? null,
            legacyTimeZones: timeZones.size,
          },
          null,
          2,
        ),
      );
    });
  });

program
  .command("import")
  .description("Import an .ics file, or every .ics file in a directory, into a Google calendar")
  .argument("<path>", ".ics file or directory of .ics files")
  .option("-c, --calendar <id>", "target calendar id", "primary")
  .option("--no-attendees", "import events without attendees")
  .option("--no-skip-duplicates", "import events even when already recorded as imported")
  .option("--dry-run", "normalize and count without writing to the calendar", false)
  .option("--start-date <date>", "only events starting on or after this date (YYYY-MM-DD)")
  .option("--end-date <date>", "only events starting before this date (YYYY-MM-DD)")
  .option("--limit <count>", "stop after this many events across all files", parsePositiveInt)
  .option("--add-self <email>", "add this address as an accepted attendee")
  .option("--batch-size <count>", "events per batch", parsePositiveInt)
  .option("--max-attendees <count>", "skip events with more attendees than this", parsePositiveInt)
  .option("--keep-resources", "keep room and resource attendees", false)
  .action(async (inputPath: string, options: ImportCommandOptions) => {
    await withRuntime(async (runtime) => {
      const importOptions = parseImportOptions({
        dryRun: options.dryRun,
        calendarId: options.calendar,
        includeAttendees: options.attendees,
        skipDuplicates: options.skipDuplicates,
        startDate: options.startDate,
        endDate: options.endDate,
        limit: options.limit,
        addSelf: options.addSelf,
        batchSize: options.batchSize ?? runtime.config.batchSize,
        maxAttendees: options.maxAttendees ?? runtime.config.maxAttendees,
        excludeResources: !options.keepResources,
      });

      const summary = await importFiles(runtime, inputPath, importOptions);
      console.log(JSON.stringify(summary, null, 2));
      process.exitCode = exitCodeFor(summary);
    });
  });

program
  .command("records:clear")
  .description("Forget which events were imported into a calendar")
  .option("-c, --calendar <id>", "target calendar id", "primary")
  .option("--yes", "confirm deleting the stored import records", false)
  .action(async (options: { calendar: string; yes: boolean }) => {
    await withRuntime(async ({ db, logger }) => {
      if (!options.yes) {
        throw new Error("Refusing to clear import records without --yes.");
      }
      const deletedRecords = db.deleteImportRecords(options.calendar);
      logger.info({ calendarId: options.calendar, deletedRecords }, "Import records cleared");
      console.log(JSON.stringify({ calendarId: options.calendar, deletedRecords }, null, 2));
    });
  });

program.parseAsync(process.argv).catch((error) => {
  if (error instanceof HttpError) {
    console.error(`HTTP ${error.status}: ${error.message}`);
    console.error(
      typeof error.body === "string" ? error.body : JSON.stringify(error.body, null, 2),
    );
    process.exitCode = 1;
    return;
  }

  const message = error instanceof Error ? error.message : String(error);
  console.error(message);
  process.exitCode = error instanceof AuthError ? EXIT_ABORTED : 1;
});
