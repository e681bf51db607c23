/**
 * SQLite Task Store
 * Default durable store. Structured fields are kept as JSON text columns.
 */

import Database from "better-sqlite3";
import type BetterSqlite3 from "better-sqlite3";
import { mkdirSync } from "fs";
import path from "path";
import type { Task } from "../types/task.js";
import { decodeTaskRecords, toTaskRecord, type TaskStore } from "./taskStore.js";

const LOG_PREFIX = "[store:sqlite]";
const JSON_COLUMNS = ["progress", "result", "error"] as const;

export class SqliteTaskStore implements TaskStore {
  private db: BetterSqlite3.Database | null = null;

  /** @param filename database file, or ":memory:" */
  constructor(private readonly filename: string) {}

  async init(): Promise<void> {
    if (this.db) return;

    if (this.filename !== ":memory:") {
      mkdirSync(path.dirname(path.resolve(this.filename)), { recursive: true });
    }

    const db = new Database(this.filename);
    db.pragma("journal_mode = WAL");
    db.exec(`
      CREATE TABLE IF NOT EXISTS tasks (
        id TEXT PRIMARY KEY,
        url TEXT NOT NULL,
        output_path TEXT NOT NULL,
        format TEXT NOT NULL,
        status TEXT NOT NULL,
        progress TEXT,
        result TEXT,
        error TEXT,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL
      )
    `);
    this.db = db;

    console.log(`${LOG_PREFIX} ✓ Opened ${this.filename}`);
  }

  async loadAll(): Promise<Task[]> {
    const rows: unknown[] = this.connection()
      .prepare("SELECT * FROM tasks ORDER BY created_at ASC")
      .all();

    const decodable: unknown[] = [];
    for (const row of rows) {
      const record = parseJsonColumns(row);
      if (record) decodable.push(record);
    }

    return decodeTaskRecords(decodable, LOG_PREFIX);
  }

  async upsert(task: Task): Promise<void> {
    const record = toTaskRecord(task);

    this.connection()
      .prepare(
        `INSERT INTO tasks (id, url, output_path, format, status, progress, result, error, created_at, updated_at)
         VALUES (@id, @url, @output_path, @format, @status, @progress, @result, @error, @created_at, @updated_at)
         ON CONFLICT(id) DO UPDATE SET
           url = excluded.url,
           output_path = excluded.output_path,
           format = excluded.format,
           status = excluded.status,
           progress = excluded.progress,
           result = excluded.result,
           error = excluded.error,
           updated_at = excluded.updated_at`
      )
      .run({
        ...record,
        progress: record.progress ? JSON.stringify(record.progress) : null,
        result: record.result ? JSON.stringify(record.result) : null,
        error: record.error ? JSON.stringify(record.error) : null,
      });
  }

  async close(): Promise<void> {
    this.db?.close();
    this.db = null;
  }

  private connection(): BetterSqlite3.Database {
    if (!this.db) {
      throw new Error("SQLite task store used before init()");
    }
    return this.db;
  }
}

/**
 * Replaces the JSON text columns of a raw row with their decoded values.
 * Returns null (after logging) when a column holds invalid JSON.
 */
function parseJsonColumns(row: unknown): Record<string, unknown> | null {
  if (typeof row !== "object" || row === null) {
    console.warn(`${LOG_PREFIX} Skipping non-object row`);
    return null;
  }

  const record: Record<string, unknown> = { ...row };
  for (const column of JSON_COLUMNS) {
    const raw = record[column];
    if (typeof raw !== "string") continue;
    try {
      record[column] = JSON.parse(raw);
    } catch (error) {
      console.warn(`${LOG_PREFIX} Skipping task row with unreadable ${column} column:`, error);
      return null;
    }
  }
  return record;
}
