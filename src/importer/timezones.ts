import fs from "node:fs";
import { z } from "zod";

export const DEFAULT_TIMEZONE_MAP_URL = new URL("../../data/legacy-timezones.json", import.meta.url);

export class TimezoneUnresolvedError extends Error {
  readonly timeZoneName: string;

  constructor(timeZoneName: string) {
    super(`No IANA zone known for legacy time zone '${timeZoneName}'`);
    this.name = "TimezoneUnresolvedError";
    this.timeZoneName = timeZoneName;
  }
}

const TimezoneTableSchema = z.record(z.string().min(1), z.string().min(1));

export function loadTimezoneMap(source: string | URL = DEFAULT_TIMEZONE_MAP_URL): ReadonlyMap<string, string> {
  const raw = fs.readFileSync(source, "utf8");
  let parsedJson: unknown;
  try {
    parsedJson = JSON.parse(raw);
  } catch (error) {
    throw new Error(
      `Failed to parse time zone table at ${String(source)}: ${error instanceof Error ? error.message : String(error)}`,
    );
  }
  return new Map(Object.entries(TimezoneTableSchema.parse(parsedJson)));
}

const ianaValidity = new Map<string, boolean>();

export function isIanaTimeZone(name: string): boolean {
  const cached = ianaValidity.get(name);
  if (cached !== undefined) {
    return cached;
  }

  let valid: boolean;
  try {
    new Intl.DateTimeFormat("en-US", { timeZone: name });
    // Intl also accepts bare abbreviations like "EST"; only area/location ids and UTC count.
    valid = name === "UTC" || name.includes("/");
  } catch {
    valid = false;
  }
  ianaValidity.set(name, valid);
  return valid;
}

/** Exact, case-sensitive lookup of legacy (Windows/Outlook) zone names. */
export class TimezoneResolver {
  private readonly table: ReadonlyMap<string, string>;

  constructor(table: ReadonlyMap<string, string>) {
    this.table = new Map(table);
  }

  get size(): number {
    return this.table.size;
  }

  has(legacyName: string): boolean {
    return this.table.has(legacyName);
  }

  resolve(legacyName: string): string {
    const zone = this.table.get(legacyName);
    if (zone === undefined) {
      throw new TimezoneUnresolvedError(legacyName);
    }
    return zone;
  }

  entries(): IterableIterator<[string, string]> {
    return this.table.entries();
  }
}
