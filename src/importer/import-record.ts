import type { DbClient } from "../db.js";

export interface ImportRecordScope {
  sourceFile: string;
  calendarId: string;
}

export interface ImportRecordEntry {
  stableId: string;
  remoteEventId: string | null;
}

export interface ImportRecordPersistence {
  load(scope: ImportRecordScope): ImportRecordEntry[];
  save(scope: ImportRecordScope, entry: ImportRecordEntry): void;
}

export class SqliteImportRecordPersistence implements ImportRecordPersistence {
  constructor(private readonly db: DbClient) {}

  load(scope: ImportRecordScope): ImportRecordEntry[] {
    return this.db
      .listImportRecords(scope.sourceFile, scope.calendarId)
      .map((row) => ({ stableId: row.stableId, remoteEventId: row.remoteEventId }));
  }

  save(scope: ImportRecordScope, entry: ImportRecordEntry): void {
    this.db.insertImportRecord({
      sourceFile: scope.sourceFile,
      calendarId: scope.calendarId,
      stableId: entry.stableId,
      remoteEventId: entry.remoteEventId,
      importedAt: new Date().toISOString(),
    });
  }
}

/**
 * Stable id → remote event id for one (source file, calendar) pair. Entries are
 * only ever added. Registered entries are written through to the persistence
 * layer; seeded entries (found on the calendar itself) stay in memory.
 */
export class ImportRecord {
  private readonly entries = new Map<string, string | null>();

  constructor(
    readonly scope: ImportRecordScope,
    private readonly persistence?: ImportRecordPersistence,
  ) {
    for (const entry of persistence?.load(scope) ?? []) {
      this.entries.set(entry.stableId, entry.remoteEventId);
    }
  }

  get size(): number {
    return this.entries.size;
  }

  has(stableId: string): boolean {
    return this.entries.has(stableId);
  }

  seed(remote: Iterable<[string, string]>): number {
    let added = 0;
    for (const [stableId, remoteEventId] of remote) {
      if (!this.entries.has(stableId)) {
        this.entries.set(stableId, remoteEventId);
        added += 1;
      }
    }
    return added;
  }

  register(stableId: string, remoteEventId: string | null) {
    if (this.entries.has(stableId)) {
      return;
    }
    this.entries.set(stableId, remoteEventId);
    this.persistence?.save(this.scope, { stableId, remoteEventId });
  }
}
