import {
  IntentLabelSchema,
  PatchOperationSchema,
  ToxicologyRecordSchema,
  normalizeIngredientTag,
  type RecordChange,
  type RecordVersion,
  type VersionSummary,
} from "@toxedit/contracts";
import Database from "better-sqlite3";
import { z } from "zod";
import { diffRecords } from "../domain/record-diff.js";
import type { RecordStore, SaveVersionParams } from "../types/record-store.js";

type SqliteRecordStoreOptions = {
  now?: () => Date;
};

type VersionRow = {
  thread_id: string;
  version: number;
  record_json: string;
  summary: string;
  created_at: string;
  patch_ops_json: string | null;
  batch_id: string | null;
  ingredient_tag: string | null;
  is_batch_item: number;
  path_taken: string | null;
  fallback_used: number;
};

type HistoryRow = Pick<VersionRow, "version" | "summary" | "created_at" | "path_taken" | "fallback_used"> & {
  patch_op_count: number;
};

const PatchOperationListSchema = z.array(PatchOperationSchema);

const VERSION_COLUMNS = `thread_id, version, record_json, summary, created_at, patch_ops_json,
  batch_id, ingredient_tag, is_batch_item, path_taken, fallback_used`;

function applySchema(db: Database.Database): void {
  db.pragma("journal_mode = WAL");
  db.pragma("synchronous = FULL");
  db.exec(`
    CREATE TABLE IF NOT EXISTS record_versions (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      thread_id TEXT NOT NULL,
      version INTEGER NOT NULL CHECK (version >= 1),
      record_json TEXT NOT NULL,
      summary TEXT NOT NULL,
      created_at TEXT NOT NULL,
      patch_ops_json TEXT,
      batch_id TEXT,
      ingredient_tag TEXT,
      is_batch_item INTEGER NOT NULL,
      path_taken TEXT,
      fallback_used INTEGER NOT NULL,
      UNIQUE (thread_id, version)
    );
    CREATE INDEX IF NOT EXISTS record_versions_batch_idx ON record_versions (batch_id, id);
    CREATE INDEX IF NOT EXISTS record_versions_ingredient_idx ON record_versions (ingredient_tag, id);
  `);
}

function rowToVersion(row: VersionRow): RecordVersion {
  const entry: RecordVersion = {
    threadId: row.thread_id,
    version: row.version,
    record: ToxicologyRecordSchema.parse(JSON.parse(row.record_json)),
    summary: row.summary,
    createdAt: row.created_at,
    isBatchItem: row.is_batch_item === 1,
    fallbackUsed: row.fallback_used === 1,
  };
  if (row.patch_ops_json !== null) {
    entry.patchOps = PatchOperationListSchema.parse(JSON.parse(row.patch_ops_json));
  }
  if (row.batch_id !== null) {
    entry.batchId = row.batch_id;
  }
  if (row.ingredient_tag !== null) {
    entry.ingredientTag = row.ingredient_tag;
  }
  if (row.path_taken !== null) {
    entry.pathTaken = IntentLabelSchema.parse(row.path_taken);
  }
  return entry;
}

/**
 * Append-only version table on SQLite. Version numbers are assigned inside an
 * immediate transaction and the (thread_id, version) key rejects any second
 * writer that races past it.
 */
export class SqliteRecordStore implements RecordStore {
  private readonly db: Database.Database;
  private readonly now: () => Date;
  private readonly insertVersion: (params: SaveVersionParams) => RecordVersion;

  constructor(filename: string, options: SqliteRecordStoreOptions = {}) {
    this.db = new Database(filename);
    this.now = options.now ?? (() => new Date());
    applySchema(this.db);

    const latestVersion = this.db.prepare<[string], { latest: number }>(
      `SELECT COALESCE(MAX(version), 0) AS latest FROM record_versions WHERE thread_id = ?`,
    );
    const insert = this.db.prepare<[VersionRow]>(
      `INSERT INTO record_versions (${VERSION_COLUMNS}) VALUES (
        @thread_id, @version, @record_json, @summary, @created_at, @patch_ops_json,
        @batch_id, @ingredient_tag, @is_batch_item, @path_taken, @fallback_used
      )`,
    );

    const transaction = this.db.transaction((params: SaveVersionParams): RecordVersion => {
      const latest = latestVersion.get(params.threadId)?.latest ?? 0;
      const ingredientTag = params.ingredientTag ?? normalizeIngredientTag(params.record.inci);
      const row: VersionRow = {
        thread_id: params.threadId,
        version: latest + 1,
        record_json: JSON.stringify(params.record),
        summary: params.summary,
        created_at: this.now().toISOString(),
        patch_ops_json: params.patchOps ? JSON.stringify(params.patchOps) : null,
        batch_id: params.batchId || null,
        ingredient_tag: ingredientTag.length > 0 ? ingredientTag : null,
        is_batch_item: (params.isBatchItem ?? params.batchId !== undefined) ? 1 : 0,
        path_taken: params.pathTaken ?? null,
        fallback_used: params.fallbackUsed ? 1 : 0,
      };
      insert.run(row);
      return rowToVersion(row);
    });
    this.insertVersion = (params) => transaction.immediate(params);
  }

  save(params: SaveVersionParams): RecordVersion {
    return this.insertVersion(params);
  }

  current(threadId: string): RecordVersion | null {
    const row = this.db
      .prepare<[string], VersionRow>(
        `SELECT ${VERSION_COLUMNS} FROM record_versions WHERE thread_id = ? ORDER BY version DESC LIMIT 1`,
      )
      .get(threadId);
    return row ? rowToVersion(row) : null;
  }

  getVersion(threadId: string, version: number): RecordVersion | null {
    const row = this.findVersion(threadId, version);
    return row ? rowToVersion(row) : null;
  }

  history(threadId: string): VersionSummary[] | null {
    const rows = this.db
      .prepare<[string], HistoryRow>(
        `SELECT version, summary, created_at, path_taken, fallback_used,
          COALESCE(json_array_length(patch_ops_json), 0) AS patch_op_count
        FROM record_versions WHERE thread_id = ? ORDER BY version`,
      )
      .all(threadId);
    if (rows.length === 0) {
      return null;
    }
    return rows.map((row) => {
      const summary: VersionSummary = {
        version: row.version,
        summary: row.summary,
        createdAt: row.created_at,
        fallbackUsed: row.fallback_used === 1,
        patchOpCount: row.patch_op_count,
      };
      if (row.path_taken !== null) {
        summary.pathTaken = IntentLabelSchema.parse(row.path_taken);
      }
      return summary;
    });
  }

  diff(threadId: string, fromVersion: number, toVersion: number): RecordChange[] | null {
    const from = this.getVersion(threadId, fromVersion);
    const to = this.getVersion(threadId, toVersion);
    if (!from || !to) {
      return null;
    }
    return diffRecords(from.record, to.record);
  }

  byBatch(batchId: string): RecordVersion[] {
    return this.db
      .prepare<[string], VersionRow>(`SELECT ${VERSION_COLUMNS} FROM record_versions WHERE batch_id = ? ORDER BY id`)
      .all(batchId)
      .map(rowToVersion);
  }

  byIngredient(inciName: string): RecordVersion[] {
    return this.db
      .prepare<[string], VersionRow>(
        `SELECT ${VERSION_COLUMNS} FROM record_versions WHERE ingredient_tag = ? ORDER BY id`,
      )
      .all(normalizeIngredientTag(inciName))
      .map(rowToVersion);
  }

  close(): void {
    this.db.close();
  }

  private findVersion(threadId: string, version: number): VersionRow | undefined {
    return this.db
      .prepare<[string, number], VersionRow>(
        `SELECT ${VERSION_COLUMNS} FROM record_versions WHERE thread_id = ? AND version = ?`,
      )
      .get(threadId, version);
  }
}
