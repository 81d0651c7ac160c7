import fs from "node:fs";
import path from "node:path";

import Database from "better-sqlite3";

import { toMetricEntry } from "../../schema/src/records";
import type { EventRecord } from "../../schema/src/types";
import { validateMetricEntry } from "../../schema/src/validators";
import type { SqliteMetricSinkOptions, StructuredMetricSink } from "./persistence-types";

const DEFAULT_TABLE_NAME = "metric_entries";
const READ_PAGE_SIZE = 500;

function buildSchemaSql(tableName: string): string {
  return `
CREATE TABLE IF NOT EXISTS ${tableName} (
  seq INTEGER PRIMARY KEY AUTOINCREMENT,
  kind TEXT NOT NULL,
  subject TEXT NOT NULL DEFAULT '',
  timestamp TEXT NOT NULL,
  duration_seconds REAL NOT NULL,
  device TEXT,
  input_size INTEGER,
  output_size INTEGER,
  extra TEXT NOT NULL DEFAULT '{}'
);

CREATE INDEX IF NOT EXISTS idx_${tableName}_kind_subject ON ${tableName}(kind, subject);
`;
}

type UnknownRecord = Record<string, unknown>;

function isRecord(value: unknown): value is UnknownRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseExtra(value: unknown): unknown {
  if (typeof value !== "string") return undefined;
  try {
    const parsed: unknown = JSON.parse(value);
    return parsed;
  } catch {
    return undefined;
  }
}

function toEntryCandidate(row: UnknownRecord): UnknownRecord {
  const candidate: UnknownRecord = {
    kind: row["kind"],
    subject: row["subject"],
    timestamp: row["timestamp"],
    duration_seconds: row["duration_seconds"],
    extra: parseExtra(row["extra"])
  };
  if (row["device"] !== null && row["device"] !== undefined) candidate["device"] = row["device"];
  if (row["input_size"] !== null && row["input_size"] !== undefined) candidate["input_size"] = row["input_size"];
  if (row["output_size"] !== null && row["output_size"] !== undefined) candidate["output_size"] = row["output_size"];
  return candidate;
}

export class SqliteMetricSink implements StructuredMetricSink {
  public readonly name: string;
  private readonly db: Database.Database;
  private readonly insertStatement: Database.Statement;
  private readonly selectStatement: Database.Statement;
  private readonly countStatement: Database.Statement;

  public constructor(dbPath: string, options: SqliteMetricSinkOptions = {}) {
    const tableName = options.tableName ?? DEFAULT_TABLE_NAME;
    if (!/^[A-Za-z_][A-Za-z0-9_]*$/.test(tableName)) {
      throw new Error(`invalid sqlite table name: ${tableName}`);
    }
    if (dbPath !== ":memory:") {
      fs.mkdirSync(path.dirname(dbPath), { recursive: true });
    }

    this.name = `sqlite_${tableName}`;
    this.db = new Database(dbPath);
    this.db.pragma("journal_mode = WAL");
    this.db.pragma("synchronous = NORMAL");
    this.db.exec(buildSchemaSql(tableName));

    this.insertStatement = this.db.prepare(`
      INSERT INTO ${tableName}
        (kind, subject, timestamp, duration_seconds, device, input_size, output_size, extra)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?)
    `);
    this.selectStatement = this.db.prepare(`
      SELECT seq, kind, subject, timestamp, duration_seconds, device, input_size, output_size, extra
      FROM ${tableName}
      WHERE seq > ?
      ORDER BY seq ASC
      LIMIT ?
    `);
    this.countStatement = this.db.prepare(`SELECT COUNT(*) AS total FROM ${tableName}`);
  }

  public append(record: EventRecord): void {
    const entry = toMetricEntry(record);
    this.insertStatement.run(
      entry.kind,
      entry.subject,
      entry.timestamp,
      entry.duration_seconds,
      entry.device ?? null,
      entry.input_size ?? null,
      entry.output_size ?? null,
      JSON.stringify(entry.extra)
    );
  }

  // Reads page by page so no cursor stays open between yields and appends can interleave.
  public *records(): IterableIterator<EventRecord> {
    let lastSeq = 0;
    for (;;) {
      const rows: unknown[] = this.selectStatement.all(lastSeq, READ_PAGE_SIZE);
      for (const row of rows) {
        if (!isRecord(row)) {
          throw new Error(`${this.name} returned a non-object row`);
        }
        const seq = row["seq"];
        if (typeof seq !== "number") {
          throw new Error(`${this.name} returned a row without seq`);
        }
        lastSeq = seq;
        const result = validateMetricEntry(toEntryCandidate(row));
        if (!result.ok) {
          throw new Error(`${this.name} row ${String(lastSeq)} is malformed: ${result.errors.join("; ")}`);
        }
        yield result.value;
      }
      if (rows.length < READ_PAGE_SIZE) {
        return;
      }
    }
  }

  public count(): number {
    const row: unknown = this.countStatement.get();
    if (!isRecord(row)) return 0;
    const total = row["total"];
    return typeof total === "number" ? total : 0;
  }

  public close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }
}
