import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";

export interface TokenRow {
  provider: string;
  token_key: string;
  access_token: string;
  refresh_token: string;
  expiry_ts: number;
  scopes: string | null;
  updated_at: string;
}

export interface ImportRecordRow {
  sourceFile: string;
  calendarId: string;
  stableId: string;
  remoteEventId: string | null;
  importedAt: string;
}

export interface ImportRunRow {
  sourceFile: string;
  calendarId: string;
  dryRun: boolean;
  startedAt: string;
  finishedAt: string;
  summaryJson: string;
}

const MIGRATIONS: string[] = [
  `
    CREATE TABLE oauth_tokens (
      provider TEXT NOT NULL,
      token_key TEXT NOT NULL,
      access_token TEXT NOT NULL,
      refresh_token TEXT NOT NULL,
      expiry_ts INTEGER NOT NULL,
      scopes TEXT,
      updated_at TEXT NOT NULL,
      PRIMARY KEY (provider, token_key)
    );

    CREATE TABLE import_records (
      source_file TEXT NOT NULL,
      calendar_id TEXT NOT NULL,
      stable_id TEXT NOT NULL,
      remote_event_id TEXT,
      imported_at TEXT NOT NULL,
      PRIMARY KEY (source_file, calendar_id, stable_id)
    );

    CREATE INDEX idx_import_records_calendar
      ON import_records(calendar_id);
  `,
  `
    CREATE TABLE import_runs (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      source_file TEXT NOT NULL,
      calendar_id TEXT NOT NULL,
      dry_run INTEGER NOT NULL DEFAULT 0,
      started_at TEXT NOT NULL,
      finished_at TEXT NOT NULL,
      summary_json TEXT NOT NULL
    );
  `,
];

export class DbClient {
  private readonly db: Database.Database;

  constructor(sqlitePath: string) {
    if (sqlitePath !== ":memory:") {
      fs.mkdirSync(path.dirname(sqlitePath), { recursive: true });
    }
    this.db = new Database(sqlitePath);
    this.db.pragma("journal_mode = WAL");
    this.migrate();
  }

  private migrate() {
    const current = Number(this.db.pragma("user_version", { simple: true }));

    this.db.exec("BEGIN");
    try {
      for (let version = current; version < MIGRATIONS.length; version += 1) {
        this.db.exec(MIGRATIONS[version]);
      }
      this.db.pragma(`user_version = ${MIGRATIONS.length}`);
      this.db.exec("COMMIT");
    } catch (error) {
      this.db.exec("ROLLBACK");
      throw error;
    }
  }

  close() {
    this.db.close();
  }

  ping(): boolean {
    const row = this.db.prepare("SELECT 1 AS ok").get() as { ok: number } | undefined;
    return row?.ok === 1;
  }

  getToken(provider: string, tokenKey = "default"): TokenRow | undefined {
    const stmt = this.db.prepare(`
      SELECT provider, token_key, access_token, refresh_token, expiry_ts, scopes, updated_at
      FROM oauth_tokens
      WHERE provider = ? AND token_key = ?
    `);
    return stmt.get(provider, tokenKey) as TokenRow | undefined;
  }

  upsertToken(row: TokenRow) {
    const stmt = this.db.prepare(`
      INSERT INTO oauth_tokens (
        provider, token_key, access_token, refresh_token, expiry_ts, scopes, updated_at
      )
      VALUES (
        @provider, @token_key, @access_token, @refresh_token, @expiry_ts, @scopes, @updated_at
      )
      ON CONFLICT(provider, token_key) DO UPDATE SET
        access_token = excluded.access_token,
        refresh_token = excluded.refresh_token,
        expiry_ts = excluded.expiry_ts,
        scopes = excluded.scopes,
        updated_at = excluded.updated_at
    `);
    stmt.run(row);
  }

  listImportRecords(sourceFile: string, calendarId: string): ImportRecordRow[] {
    const stmt = this.db.prepare(`
      SELECT
        source_file AS sourceFile,
        calendar_id AS calendarId,
        stable_id AS stableId,
        remote_event_id AS remoteEventId,
        imported_at AS importedAt
      FROM import_records
      WHERE source_file = ? AND calendar_id = ?
      ORDER BY imported_at, rowid
    `);
    return stmt.all(sourceFile, calendarId) as ImportRecordRow[];
  }

  insertImportRecord(row: ImportRecordRow) {
    const stmt = this.db.prepare(`
      INSERT INTO import_records (source_file, calendar_id, stable_id, remote_event_id, imported_at)
      VALUES (@sourceFile, @calendarId, @stableId, @remoteEventId, @importedAt)
      ON CONFLICT(source_file, calendar_id, stable_id) DO NOTHING
    `);
    stmt.run(row);
  }

  deleteImportRecords(calendarId: string): number {
    const stmt = this.db.prepare(`DELETE FROM import_records WHERE calendar_id = ?`);
    return stmt.run(calendarId).changes;
  }

  insertImportRun(row: ImportRunRow): number {
    const stmt = this.db.prepare(`
      INSERT INTO import_runs (source_file, calendar_id, dry_run, started_at, finished_at, summary_json)
      VALUES (@sourceFile, @calendarId, @dryRun, @startedAt, @finishedAt, @summaryJson)
    `);
    const result = stmt.run({ ...row, dryRun: row.dryRun ? 1 : 0 });
    return Number(result.lastInsertRowid);
  }
}
