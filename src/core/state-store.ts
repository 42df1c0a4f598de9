import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import {
  FirmwareRecordSchema,
  UpdateLogEntrySchema,
  type FirmwareRecord,
  type FirmwareStatus,
  type NewUpdateLogEntry,
  type UpdateLogEntry,
} from "../schemas/firmware.schema.js";
import { FleetError, StoreUnavailableError, errorMessage } from "../utils/errors.js";

export interface FirmwareFilter {
  device?: string;
  component?: string;
  status?: FirmwareStatus;
}

export interface LogFilter {
  device?: string;
  component?: string;
}

/**
 * Per-(device, component) firmware belief plus the append-only update log.
 * Every failure surfaces as StoreUnavailableError.
 */
export interface FirmwareStateStore {
  get(device: string, component: string): FirmwareRecord | null;
  /** Ordered by (device, component) */
  list(filter?: FirmwareFilter): FirmwareRecord[];
  /** Replace the record for (device, component) */
  upsert(record: FirmwareRecord): void;
  appendLog(entry: NewUpdateLogEntry): UpdateLogEntry;
  /** Most recent first */
  recentLog(limit: number, filter?: LogFilter): UpdateLogEntry[];
  /** upsert + appendLog as one unit */
  recordUpdate(record: FirmwareRecord, entry: NewUpdateLogEntry): UpdateLogEntry;
  /** Insert records whose key is absent. Returns how many were created. */
  seed(records: FirmwareRecord[]): number;
  close(): void;
}

interface FirmwareRow {
  device: string;
  component: string;
  version: string;
  release_date: string;
  checksum: string;
  status: string;
  download_url: string;
  notes: string;
  created_at: string;
}

interface LogRow {
  id: number;
  device: string;
  component: string;
  from_version: string;
  to_version: string;
  status: string;
  applied_at: string;
  error: string;
}

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS firmware_records (
    device        TEXT NOT NULL,
    component     TEXT NOT NULL,
    version       TEXT NOT NULL,
    release_date  TEXT NOT NULL DEFAULT '',
    checksum      TEXT NOT NULL DEFAULT '',
    status        TEXT NOT NULL DEFAULT 'current'
                  CHECK (status IN ('current', 'available', 'deprecated', 'pending')),
    download_url  TEXT NOT NULL DEFAULT '',
    notes         TEXT NOT NULL DEFAULT '',
    created_at    TEXT NOT NULL,
    PRIMARY KEY (device, component)
  );

  CREATE TABLE IF NOT EXISTS update_log (
    id            INTEGER PRIMARY KEY AUTOINCREMENT,
    device        TEXT NOT NULL,
    component     TEXT NOT NULL,
    from_version  TEXT NOT NULL,
    to_version    TEXT NOT NULL,
    status        TEXT NOT NULL CHECK (status IN ('success', 'failed')),
    applied_at    TEXT NOT NULL,
    error         TEXT NOT NULL DEFAULT ''
  );

  CREATE INDEX IF NOT EXISTS idx_update_log_device ON update_log(device, component);

  CREATE TRIGGER IF NOT EXISTS update_log_no_update
    BEFORE UPDATE ON update_log
    BEGIN SELECT RAISE(ABORT, 'update_log is append-only'); END;

  CREATE TRIGGER IF NOT EXISTS update_log_no_delete
    BEFORE DELETE ON update_log
    BEGIN SELECT RAISE(ABORT, 'update_log is append-only'); END;
`;

/** Open (creating if needed) the state database and apply the schema */
export function openStateDatabase(dbPath: string): Database.Database {
  if (dbPath !== ":memory:") {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  }
  const db = new Database(dbPath);
  db.pragma("journal_mode = WAL");
  db.pragma("busy_timeout = 5000");
  db.exec(SCHEMA);
  return db;
}

function toRecord(row: FirmwareRow): FirmwareRecord {
  return FirmwareRecordSchema.parse({
    device: row.device,
    component: row.component,
    version: row.version,
    releaseDate: row.release_date,
    checksum: row.checksum,
    status: row.status,
    downloadUrl: row.download_url,
    notes: row.notes,
    createdAt: row.created_at,
  });
}

function toEntry(row: LogRow): UpdateLogEntry {
  return UpdateLogEntrySchema.parse({
    id: row.id,
    device: row.device,
    component: row.component,
    fromVersion: row.from_version,
    toVersion: row.to_version,
    status: row.status,
    appliedAt: row.applied_at,
    error: row.error,
  });
}

export class SqliteStateStore implements FirmwareStateStore {
  private readonly db: Database.Database;

  constructor(db: Database.Database) {
    this.db = db;
  }

  /** Open a store at dbPath (":memory:" for an ephemeral one) */
  static open(dbPath: string): SqliteStateStore {
    try {
      return new SqliteStateStore(openStateDatabase(dbPath));
    } catch (err) {
      throw new StoreUnavailableError("open", `${dbPath}: ${errorMessage(err)}`);
    }
  }

  get(device: string, component: string): FirmwareRecord | null {
    return this.guard("get", () => {
      const row = this.db
        .prepare<[string, string], FirmwareRow>(
          "SELECT * FROM firmware_records WHERE device = ? AND component = ?",
        )
        .get(device, component);
      return row ? toRecord(row) : null;
    });
  }

  list(filter: FirmwareFilter = {}): FirmwareRecord[] {
    return this.guard("list", () => {
      let sql = "SELECT * FROM firmware_records WHERE 1=1";
      const params: string[] = [];
      if (filter.device) {
        sql += " AND device = ?";
        params.push(filter.device);
      }
      if (filter.component) {
        sql += " AND component = ?";
        params.push(filter.component);
      }
      if (filter.status) {
        sql += " AND status = ?";
        params.push(filter.status);
      }
      sql += " ORDER BY device, component";
      return this.db.prepare<string[], FirmwareRow>(sql).all(...params).map(toRecord);
    });
  }

  upsert(record: FirmwareRecord): void {
    this.guard("upsert", () => this.writeRecord(record));
  }

  appendLog(entry: NewUpdateLogEntry): UpdateLogEntry {
    return this.guard("appendLog", () => this.writeLog(entry));
  }

  recentLog(limit: number, filter: LogFilter = {}): UpdateLogEntry[] {
    return this.guard("recentLog", () => {
      let sql = "SELECT * FROM update_log WHERE 1=1";
      const params: (string | number)[] = [];
      if (filter.device) {
        sql += " AND device = ?";
        params.push(filter.device);
      }
      if (filter.component) {
        sql += " AND component = ?";
        params.push(filter.component);
      }
      sql += " ORDER BY id DESC LIMIT ?";
      params.push(Math.max(0, Math.floor(limit)));
      return this.db.prepare<(string | number)[], LogRow>(sql).all(...params).map(toEntry);
    });
  }

  recordUpdate(record: FirmwareRecord, entry: NewUpdateLogEntry): UpdateLogEntry {
    return this.guard("recordUpdate", () =>
      this.db.transaction(() => {
        this.writeRecord(record);
        return this.writeLog(entry);
      })(),
    );
  }

  seed(records: FirmwareRecord[]): number {
    return this.guard("seed", () => {
      const insert = this.db.prepare(`
        INSERT OR IGNORE INTO firmware_records
          (device, component, version, release_date, checksum, status, download_url, notes, created_at)
        VALUES (@device, @component, @version, @releaseDate, @checksum, @status, @downloadUrl, @notes, @createdAt)
      `);
      return this.db.transaction(() => {
        let created = 0;
        for (const r of records) created += insert.run(r).changes;
        return created;
      })();
    });
  }

  close(): void {
    this.guard("close", () => this.db.close());
  }

  private writeRecord(record: FirmwareRecord): void {
    this.db
      .prepare(`
        INSERT INTO firmware_records
          (device, component, version, release_date, checksum, status, download_url, notes, created_at)
        VALUES (@device, @component, @version, @releaseDate, @checksum, @status, @downloadUrl, @notes, @createdAt)
        ON CONFLICT (device, component) DO UPDATE SET
          version = excluded.version,
          release_date = excluded.release_date,
          checksum = excluded.checksum,
          status = excluded.status,
          download_url = excluded.download_url,
          notes = excluded.notes,
          created_at = excluded.created_at
      `)
      .run(record);
  }

  private writeLog(entry: NewUpdateLogEntry): UpdateLogEntry {
    const result = this.db
      .prepare(`
        INSERT INTO update_log (device, component, from_version, to_version, status, applied_at, error)
        VALUES (@device, @component, @fromVersion, @toVersion, @status, @appliedAt, @error)
      `)
      .run(entry);
    return { id: Number(result.lastInsertRowid), ...entry };
  }

  private guard<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      if (err instanceof FleetError) throw err;
      throw new StoreUnavailableError(operation, errorMessage(err));
    }
  }
}
