/**
 * Converge — SQLite State Store
 *
 * WAL-mode SQLite database holding one row per managed resource. Attribute
 * maps are stored as JSON and validated when read back.
 */

import Database from "better-sqlite3";
import { z } from "zod";
import type { ResourceKey, StateRecord, StateStore } from "./types.js";
import { ProvisionError, formatErrorMessage } from "./errors.js";
import { attributeMapSchema, formatIssues } from "./schemas.js";

const SCHEMA_DDL = `
CREATE TABLE IF NOT EXISTS state_records (
  kind TEXT NOT NULL,
  name TEXT NOT NULL,
  handle TEXT NOT NULL,
  attributes TEXT NOT NULL DEFAULT '{}',
  computed TEXT NOT NULL DEFAULT '{}',
  dependencies TEXT NOT NULL DEFAULT '[]',
  updated_at TEXT NOT NULL,
  PRIMARY KEY (kind, name)
);

CREATE TABLE IF NOT EXISTS state_meta (
  key TEXT PRIMARY KEY,
  value TEXT NOT NULL
);
`;

const rowSchema = z.object({
  kind: z.string(),
  name: z.string(),
  handle: z.string(),
  attributes: z.string(),
  computed: z.string(),
  dependencies: z.string(),
  updated_at: z.string(),
});

type StateRow = z.infer<typeof rowSchema>;

function recordToRow(record: StateRecord): StateRow {
  return {
    kind: record.kind,
    name: record.name,
    handle: record.handle,
    attributes: JSON.stringify(record.attributes),
    computed: JSON.stringify(record.computed),
    dependencies: JSON.stringify(record.dependencies),
    updated_at: record.updatedAt,
  };
}

function parseColumn(row: StateRow, column: "attributes" | "computed" | "dependencies"): unknown {
  try {
    return JSON.parse(row[column]);
  } catch (err) {
    throw new ProvisionError(
      `Corrupt ${column} for "${row.kind}.${row.name}": ${formatErrorMessage(err)}`,
      "CORRUPT_STATE",
    );
  }
}

function rowToRecord(raw: unknown): StateRecord {
  const parsed = rowSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ProvisionError(`Corrupt state row: ${formatIssues(parsed.error)}`, "CORRUPT_STATE");
  }
  const row = parsed.data;
  const decode = (column: "attributes" | "computed") => {
    const result = attributeMapSchema.safeParse(parseColumn(row, column));
    if (!result.success) {
      throw new ProvisionError(
        `Corrupt ${column} for "${row.kind}.${row.name}": ${formatIssues(result.error)}`,
        "CORRUPT_STATE",
      );
    }
    return result.data;
  };
  const dependencies = z.array(z.string()).safeParse(parseColumn(row, "dependencies"));
  if (!dependencies.success) {
    throw new ProvisionError(
      `Corrupt dependencies for "${row.kind}.${row.name}": ${formatIssues(dependencies.error)}`,
      "CORRUPT_STATE",
    );
  }
  return {
    kind: row.kind,
    name: row.name,
    handle: row.handle,
    attributes: decode("attributes"),
    computed: decode("computed"),
    dependencies: dependencies.data,
    updatedAt: row.updated_at,
  };
}

export class SqliteStateStore implements StateStore {
  private db: Database.Database | null = null;
  private readonly dbPath: string;

  constructor(dbPath: string) {
    this.dbPath = dbPath;
  }

  async open(): Promise<void> {
    if (this.db) return;
    const db = new Database(this.dbPath);
    db.pragma("journal_mode = WAL");
    db.pragma("synchronous = NORMAL");
    db.exec(SCHEMA_DDL);
    db.prepare("INSERT OR IGNORE INTO state_meta (key, value) VALUES ('schema_version', '1')").run();
    this.db = db;
  }

  async close(): Promise<void> {
    this.db?.close();
    this.db = null;
  }

  async get(key: ResourceKey): Promise<StateRecord | undefined> {
    const row = this.connection()
      .prepare("SELECT * FROM state_records WHERE kind = ? AND name = ?")
      .get(key.kind, key.name);
    return row === undefined ? undefined : rowToRecord(row);
  }

  async put(record: StateRecord): Promise<void> {
    this.connection()
      .prepare(`
        INSERT OR REPLACE INTO state_records
          (kind, name, handle, attributes, computed, dependencies, updated_at)
        VALUES
          (@kind, @name, @handle, @attributes, @computed, @dependencies, @updated_at)
      `)
      .run(recordToRow(record));
  }

  async delete(key: ResourceKey): Promise<void> {
    this.connection()
      .prepare("DELETE FROM state_records WHERE kind = ? AND name = ?")
      .run(key.kind, key.name);
  }

  async list(): Promise<StateRecord[]> {
    return this.connection()
      .prepare("SELECT * FROM state_records ORDER BY kind, name")
      .all()
      .map(rowToRecord);
  }

  private connection(): Database.Database {
    if (!this.db) {
      throw new ProvisionError(`State store "${this.dbPath}" is not open`, "STORE_CLOSED");
    }
    return this.db;
  }
}
