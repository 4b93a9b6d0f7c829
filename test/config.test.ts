import { describe, expect, it } from "vitest";
import { parseConfig, parseImportOptions } from "../src/config.js";

const requiredEnv = {
  GOOGLE_CLIENT_ID: "test-client-id",
  GOOGLE_CLIENT_SECRET: "test-secret",
  TOKEN_ENCRYPTION_KEY: "test-encryption-key",
  SQLITE_PATH: ":memory:",
};

describe("parseConfig", () => {
  it("applies defaults", () => {
    expect(parseConfig(requiredEnv)).toEqual({
      googleClientId: "test-client-id",
      googleClientSecret: "test-secret",
      tokenEncryptionKey: "test-encryption-key",
      sqlitePath: ":memory:",
      logLevel: "info",
      googleOAuthRedirectPort: 53682,
      batchSize: 50,
      batchDelayMs: 1000,
      maxAttempts: 5,
      retryBaseDelayMs: 1000,
      retryMaxDelayMs: 60_000,
      maxAttendees: 200,
      fallbackTimeZone: undefined,
      progressLogInterval: 100,
    });
  });

  it("reads numeric settings and treats empty values as unset", () => {
    const config = parseConfig({
      ...requiredEnv,
      IMPORT_BATCH_SIZE: "25",
      IMPORT_MAX_ATTEMPTS: "",
      FALLBACK_TIME_ZONE: "Europe/Berlin",
    });

    expect(config.batchSize).toBe(25);
    expect(config.maxAttempts).toBe(5);
    expect(config.fallbackTimeZone).toBe("Europe/Berlin");
  });

  it("rejects a short encryption key", () => {
    expect(() => parseConfig({ ...requiredEnv, TOKEN_ENCRYPTION_KEY: "short" })).toThrow();
  });

  it("rejects fallback zones that are not IANA names", () => {
    expect(() => parseConfig({ ...requiredEnv, FALLBACK_TIME_ZONE: "Eastern Standard Time" })).toThrow();
  });

  it("rejects a retry ceiling below the base delay", () => {
    expect(() =>
      parseConfig({ ...requiredEnv, IMPORT_RETRY_BASE_DELAY_MS: "5000", IMPORT_RETRY_MAX_DELAY_MS: "1000" }),
    ).toThrow("IMPORT_RETRY_MAX_DELAY_MS must not be smaller than IMPORT_RETRY_BASE_DELAY_MS.");
  });
});

describe("parseImportOptions", () => {
  it("fills in defaults", () => {
    expect(parseImportOptions({})).toEqual({
      dryRun: false,
      calendarId: "primary",
      includeAttendees: true,
      skipDuplicates: true,
      batchSize: 50,
      maxAttendees: 200,
      excludeResources: true,
    });
  });

  it("accepts a date window", () => {
    const options = parseImportOptions({ startDate: "2024-03-01", endDate: "2024-04-01", limit: 10 });

    expect(options.startDate).toBe("2024-03-01");
    expect(options.endDate).toBe("2024-04-01");
    expect(options.limit).toBe(10);
  });

  it("rejects impossible or reversed dates", () => {
    expect(() => parseImportOptions({ startDate: "2024-02-30" })).toThrow("expected a YYYY-MM-DD calendar date");
    expect(() => parseImportOptions({ startDate: "03/01/2024" })).toThrow("expected a YYYY-MM-DD calendar date");
    expect(() => parseImportOptions({ startDate: "2024-04-01", endDate: "2024-04-01" })).toThrow(
      "endDate must be after startDate",
    );
  });

  it("rejects a non-positive limit and a malformed address", () => {
    expect(() => parseImportOptions({ limit: 0 })).toThrow();
    expect(() => parseImportOptions({ addSelf: "not-an-address" })).toThrow();
  });
});
