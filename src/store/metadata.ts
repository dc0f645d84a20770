import Database from "better-sqlite3";
import { FingerprintRecordSchema } from "../schemas.js";
import type { FingerprintRecord, MetadataTable } from "./types.js";

/** Metadata table backed by SQLite. Pass ":memory:" for a throwaway table. */
export class SqliteMetadataTable implements MetadataTable {
  private db: Database.Database;

  constructor(dbPath: string) {
    this.db = new Database(dbPath);
    this.db.pragma("journal_mode = WAL");
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS nodes (
        node_id      TEXT PRIMARY KEY,
        task_name    TEXT NOT NULL,
        kind         TEXT NOT NULL,
        fingerprint  TEXT NOT NULL,
        code_hash    TEXT NOT NULL,
        input_hashes TEXT NOT NULL DEFAULT '{}',
        value_hash   TEXT,
        format       TEXT NOT NULL,
        duration_ms  REAL NOT NULL DEFAULT 0,
        bytes        INTEGER NOT NULL DEFAULT 0,
        warnings     TEXT NOT NULL DEFAULT '[]',
        error        TEXT,
        invalidated  INTEGER NOT NULL DEFAULT 0,
        built_at     INTEGER NOT NULL,
        branches     TEXT
      );
      CREATE INDEX IF NOT EXISTS idx_nodes_task ON nodes(task_name);
    `);
  }

  upsert(record: FingerprintRecord): void {
    this.db.prepare(`
      INSERT OR REPLACE INTO nodes (
        node_id, task_name, kind, fingerprint, code_hash, input_hashes, value_hash, format,
        duration_ms, bytes, warnings, error, invalidated, built_at, branches
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `).run(
      record.nodeId,
      record.taskName,
      record.kind,
      record.fingerprint,
      record.codeHash,
      JSON.stringify(record.inputHashes),
      record.valueHash,
      record.format,
      record.durationMs,
      record.bytes,
      JSON.stringify(record.warnings),
      record.error,
      record.invalidated ? 1 : 0,
      record.builtAt,
      record.branches ? JSON.stringify(record.branches) : null,
    );
  }

  get(nodeId: string): FingerprintRecord | undefined {
    const row: unknown = this.db.prepare("SELECT * FROM nodes WHERE node_id = ?").get(nodeId);
    return row === undefined ? undefined : rowToRecord(row);
  }

  list(): FingerprintRecord[] {
    const rows: unknown[] = this.db.prepare("SELECT * FROM nodes ORDER BY node_id").all();
    return rows.map(rowToRecord);
  }

  setInvalidated(nodeIds: string[], invalidated: boolean): number {
    const stmt = this.db.prepare("UPDATE nodes SET invalidated = ? WHERE node_id = ?");
    const apply = this.db.transaction((ids: string[]) => {
      let changed = 0;
      for (const id of ids) changed += stmt.run(invalidated ? 1 : 0, id).changes;
      return changed;
    });
    return apply(nodeIds);
  }

  delete(nodeIds: string[]): number {
    const stmt = this.db.prepare("DELETE FROM nodes WHERE node_id = ?");
    const remove = this.db.transaction((ids: string[]) => {
      let changed = 0;
      for (const id of ids) changed += stmt.run(id).changes;
      return changed;
    });
    return remove(nodeIds);
  }

  close(): void {
    this.db.close();
  }
}

type NodeRow = {
  node_id: string;
  task_name: string;
  kind: string;
  fingerprint: string;
  code_hash: string;
  input_hashes: string;
  value_hash: string | null;
  format: string;
  duration_ms: number;
  bytes: number;
  warnings: string;
  error: string | null;
  invalidated: number;
  built_at: number;
  branches: string | null;
};

function isNodeRow(row: unknown): row is NodeRow {
  return typeof row === "object" && row !== null && "node_id" in row && "input_hashes" in row;
}

function rowToRecord(row: unknown): FingerprintRecord {
  if (!isNodeRow(row)) {
    throw new Error("Unexpected row shape in metadata table");
  }
  return FingerprintRecordSchema.parse({
    nodeId: row.node_id,
    taskName: row.task_name,
    kind: row.kind,
    fingerprint: row.fingerprint,
    codeHash: row.code_hash,
    inputHashes: JSON.parse(row.input_hashes),
    valueHash: row.value_hash,
    format: row.format,
    durationMs: row.duration_ms,
    bytes: row.bytes,
    warnings: JSON.parse(row.warnings),
    error: row.error,
    invalidated: row.invalidated === 1,
    builtAt: row.built_at,
    branches: row.branches === null ? null : JSON.parse(row.branches),
  });
}
