// src/state-store.ts
import { getDb, type Database } from "./db.js";
import { StoreWriteError, describeError } from "./errors.js";
import {
  isItemStatus,
  sameContent,
  sameFiles,
  toSnapshot,
  type DescriptorKind,
  type Item,
  type ItemFile,
  type ItemSnapshot,
  type ItemStatus,
} from "./item.js";
import { parseOutageState, type OutageState } from "./outage.js";

const OUTAGE_KEY = "outage_state";

type ItemRow = {
  id: string;
  name: string;
  status: string;
  descriptor_path: string | null;
  descriptor_kind: string | null;
  descriptor_present: number;
  source_metadata_hash: string | null;
  gateway_status: string | null;
  total_size: number;
  missing_streak: number;
  visible_files: number;
  matched_files: number;
  mount_path: string | null;
  needs_inspection: number;
  last_error: string | null;
  created_at: number;
  last_seen_at: number;
  last_checked_at: number | null;
  status_changed_at: number;
  removed_at: number | null;
};

type FileRow = { item_id: string; path: string; size: number };

export interface ListOptions {
  status?: ItemStatus | ItemStatus[];
  needsInspection?: boolean;
  limit?: number;
}

export interface UpsertResult {
  created: boolean;
  changed: boolean;
  previousStatus: ItemStatus | null;
}

export interface DescriptorIndexEntry {
  id: string;
  hash: string;
}

export interface PassRecord {
  startedAt: number;
  finishedAt: number;
  reason: string | null;
  mountState: "healthy" | "unknown";
  mountReason: string | null;
  paused: boolean;
  descriptors: number;
  warnings: number;
  evaluated: number;
  transitions: number;
  writeErrors: number;
  skipped: number;
  interrupted: boolean;
}

export interface StoredPass extends PassRecord {
  id: number;
}

type PassRow = {
  id: number;
  started_at: number;
  finished_at: number;
  reason: string | null;
  mount_state: string;
  mount_reason: string | null;
  paused: number;
  descriptors: number;
  warnings: number;
  evaluated: number;
  transitions: number;
  write_errors: number;
  skipped: number;
  interrupted: number;
};

function toDescriptorKind(raw: string | null): DescriptorKind | null {
  return raw === "zurginfo" || raw === "zurgtorrent" ? raw : null;
}

function rowToItem(row: ItemRow, files: ItemFile[]): Item {
  if (!isItemStatus(row.status)) {
    throw new Error(`item ${row.id} has unknown status '${row.status}'`);
  }
  return {
    id: row.id,
    name: row.name,
    files,
    status: row.status,
    descriptorPath: row.descriptor_path,
    descriptorKind: toDescriptorKind(row.descriptor_kind),
    descriptorPresent: row.descriptor_present === 1,
    sourceMetadataHash: row.source_metadata_hash,
    gatewayStatus: row.gateway_status,
    totalSize: row.total_size,
    missingStreak: row.missing_streak,
    visibleFiles: row.visible_files,
    matchedFiles: row.matched_files,
    mountPath: row.mount_path,
    needsInspection: row.needs_inspection === 1,
    lastError: row.last_error,
    createdAt: row.created_at,
    lastSeenAt: row.last_seen_at,
    lastCheckedAt: row.last_checked_at,
    statusChangedAt: row.status_changed_at,
    removedAt: row.removed_at,
  };
}

/**
 * Persistent record of every known item.
 *
 * better-sqlite3 runs each statement synchronously, so two writes from this
 * process never interleave; every per-item write runs in its own
 * `BEGIN IMMEDIATE` transaction, which also gives single-writer semantics
 * against other processes sharing the file (with busy_timeout).
 */
export class StateStore {
  private readonly selectItem;
  private readonly selectFiles;
  private readonly insertItem;
  private readonly updateItem;
  private readonly deleteFiles;
  private readonly insertFile;
  private readonly touchStmt;
  private readonly removeStmt;
  private readonly metaSelect;
  private readonly metaUpsert;
  private readonly insertPass;
  private readonly writeItemTx;

  constructor(private readonly db: Database) {
    this.selectItem = db.prepare(`SELECT * FROM items WHERE id = ?`);
    this.selectFiles = db.prepare(
      `SELECT item_id, path, size FROM item_files WHERE item_id = ? ORDER BY idx`,
    );
    this.insertItem = db.prepare(`
      INSERT INTO items(id, name, status, descriptor_path, descriptor_kind, descriptor_present,
        source_metadata_hash, gateway_status, total_size, missing_streak, visible_files,
        matched_files, mount_path, needs_inspection, last_error, created_at, last_seen_at,
        last_checked_at, status_changed_at, removed_at)
      VALUES (@id, @name, @status, @descriptor_path, @descriptor_kind, @descriptor_present,
        @source_metadata_hash, @gateway_status, @total_size, @missing_streak, @visible_files,
        @matched_files, @mount_path, @needs_inspection, @last_error, @now, @now,
        @last_checked_at, @now, @removed_at)
    `);
    this.updateItem = db.prepare(`
      UPDATE items SET
        name = @name,
        status = @status,
        descriptor_path = @descriptor_path,
        descriptor_kind = @descriptor_kind,
        descriptor_present = @descriptor_present,
        source_metadata_hash = @source_metadata_hash,
        gateway_status = @gateway_status,
        total_size = @total_size,
        missing_streak = @missing_streak,
        visible_files = @visible_files,
        matched_files = @matched_files,
        mount_path = @mount_path,
        needs_inspection = @needs_inspection,
        last_error = @last_error,
        last_seen_at = @now,
        last_checked_at = COALESCE(@last_checked_at, last_checked_at),
        status_changed_at = CASE WHEN status = @status THEN status_changed_at ELSE @now END,
        removed_at = @removed_at
      WHERE id = @id
    `);
    this.deleteFiles = db.prepare(`DELETE FROM item_files WHERE item_id = ?`);
    this.insertFile = db.prepare(
      `INSERT INTO item_files(item_id, idx, path, size) VALUES (?, ?, ?, ?)`,
    );
    this.touchStmt = db.prepare(
      `UPDATE items SET last_checked_at = ? WHERE id = ?`,
    );
    this.removeStmt = db.prepare(`
      UPDATE items SET status = 'REMOVED', removed_at = @now, last_seen_at = @now,
        status_changed_at = @now
      WHERE id = @id AND status != 'REMOVED'
    `);
    this.metaSelect = db.prepare(`SELECT value FROM meta WHERE key = ?`);
    this.metaUpsert = db.prepare(
      `INSERT INTO meta(key, value) VALUES (@key, @value) ON CONFLICT(key) DO UPDATE SET value = excluded.value`,
    );
    this.insertPass = db.prepare(`
      INSERT INTO passes(started_at, finished_at, reason, mount_state, mount_reason, paused,
        descriptors, warnings, evaluated, transitions, write_errors, skipped, interrupted)
      VALUES (@started_at, @finished_at, @reason, @mount_state, @mount_reason, @paused,
        @descriptors, @warnings, @evaluated, @transitions, @write_errors, @skipped, @interrupted)
    `);

    this.writeItemTx = db.transaction(
      (
        snapshot: ItemSnapshot,
        now: number,
        checkedAt: number | null,
      ): UpsertResult => {
        const existing = this.readItem(snapshot.id);
        if (existing && sameContent(toSnapshot(existing), snapshot)) {
          if (checkedAt != null) this.touchStmt.run(checkedAt, snapshot.id);
          return {
            created: false,
            changed: false,
            previousStatus: existing.status,
          };
        }
        const params = {
          id: snapshot.id,
          name: snapshot.name,
          status: snapshot.status,
          descriptor_path: snapshot.descriptorPath,
          descriptor_kind: snapshot.descriptorKind,
          descriptor_present: snapshot.descriptorPresent ? 1 : 0,
          source_metadata_hash: snapshot.sourceMetadataHash,
          gateway_status: snapshot.gatewayStatus,
          total_size: snapshot.totalSize,
          missing_streak: snapshot.missingStreak,
          visible_files: snapshot.visibleFiles,
          matched_files: snapshot.matchedFiles,
          mount_path: snapshot.mountPath,
          needs_inspection: snapshot.needsInspection ? 1 : 0,
          last_error: snapshot.lastError,
          last_checked_at: checkedAt,
          removed_at:
            snapshot.status === "REMOVED" ? (existing?.removedAt ?? now) : null,
          now,
        };
        if (existing) {
          this.updateItem.run(params);
        } else {
          this.insertItem.run(params);
        }
        if (!existing || !sameFiles(existing.files, snapshot.files)) {
          this.deleteFiles.run(snapshot.id);
          snapshot.files.forEach((f, idx) =>
            this.insertFile.run(snapshot.id, idx, f.path, f.size),
          );
        }
        return {
          created: !existing,
          changed: true,
          previousStatus: existing?.status ?? null,
        };
      },
    );
  }

  static open(dbPath: string): StateStore {
    return new StateStore(getDb(dbPath));
  }

  close() {
    this.db.close();
  }

  private readItem(id: string): Item | undefined {
    const row = this.selectItem.get(id) as ItemRow | undefined;
    if (!row) return undefined;
    const files = (this.selectFiles.all(id) as FileRow[]).map((f) => ({
      path: f.path,
      size: f.size,
    }));
    return rowToItem(row, files);
  }

  get(id: string): Item | undefined {
    return this.readItem(id);
  }

  /**
   * Writes `snapshot` atomically (row and full file list).  When nothing but
   * bookkeeping differs from the stored row, only `last_checked_at` moves and
   * `last_seen_at` is left alone.
   */
  upsert(
    snapshot: ItemSnapshot,
    now: number = Date.now(),
    { checkedAt = now }: { checkedAt?: number | null } = {},
  ): UpsertResult {
    try {
      return this.writeItemTx.immediate(snapshot, now, checkedAt);
    } catch (err) {
      throw new StoreWriteError(
        `failed to write item ${snapshot.id}: ${describeError(err)}`,
        snapshot.id,
        { cause: err },
      );
    }
  }

  touchChecked(id: string, now: number = Date.now()) {
    this.touchStmt.run(now, id);
  }

  /** Soft delete; the row and its file list are retained. */
  markRemoved(id: string, now: number = Date.now()): boolean {
    try {
      return this.removeStmt.run({ id, now }).changes > 0;
    } catch (err) {
      throw new StoreWriteError(
        `failed to mark ${id} removed: ${describeError(err)}`,
        id,
        { cause: err },
      );
    }
  }

  list({ status, needsInspection, limit }: ListOptions = {}): Item[] {
    const where: string[] = [];
    const params: (string | number)[] = [];
    const statuses = status == null ? [] : Array.isArray(status) ? status : [status];
    if (statuses.length) {
      where.push(`status IN (${statuses.map(() => "?").join(", ")})`);
      params.push(...statuses);
    }
    if (needsInspection != null) {
      where.push(`needs_inspection = ?`);
      params.push(needsInspection ? 1 : 0);
    }
    let sql = `SELECT * FROM items`;
    if (where.length) sql += ` WHERE ${where.join(" AND ")}`;
    sql += ` ORDER BY name COLLATE NOCASE, id`;
    if (limit != null && limit > 0) {
      sql += ` LIMIT ?`;
      params.push(limit);
    }
    const rows = this.db.prepare(sql).all(...params) as ItemRow[];
    if (!rows.length) return [];
    const filesById = this.filesFor(rows.map((r) => r.id));
    return rows.map((row) => rowToItem(row, filesById.get(row.id) ?? []));
  }

  private filesFor(ids: string[]): Map<string, ItemFile[]> {
    const out = new Map<string, ItemFile[]>();
    const CHUNK = 500;
    for (let i = 0; i < ids.length; i += CHUNK) {
      const chunk = ids.slice(i, i + CHUNK);
      const rows = this.db
        .prepare(
          `SELECT item_id, path, size FROM item_files
            WHERE item_id IN (${chunk.map(() => "?").join(", ")})
            ORDER BY item_id, idx`,
        )
        .all(...chunk) as FileRow[];
      for (const row of rows) {
        let files = out.get(row.item_id);
        if (!files) {
          files = [];
          out.set(row.item_id, files);
        }
        files.push({ path: row.path, size: row.size });
      }
    }
    return out;
  }

  /** descriptor path -> {id, raw hash}, for skipping unchanged descriptors */
  descriptorIndex(): Map<string, DescriptorIndexEntry> {
    const rows = this.db
      .prepare(
        `SELECT descriptor_path, id, source_metadata_hash FROM items
          WHERE descriptor_path IS NOT NULL
            AND source_metadata_hash IS NOT NULL
            AND needs_inspection = 0
            AND status != 'REMOVED'`,
      )
      .all() as {
      descriptor_path: string;
      id: string;
      source_metadata_hash: string;
    }[];
    const out = new Map<string, DescriptorIndexEntry>();
    for (const row of rows) {
      out.set(row.descriptor_path, {
        id: row.id,
        hash: row.source_metadata_hash,
      });
    }
    return out;
  }

  counts(): Record<ItemStatus, number> {
    const out: Record<ItemStatus, number> = {
      PENDING: 0,
      AVAILABLE: 0,
      PARTIAL: 0,
      MISSING: 0,
      REMOVED: 0,
    };
    const rows = this.db
      .prepare(`SELECT status, COUNT(*) AS n FROM items GROUP BY status`)
      .all() as { status: string; n: number }[];
    for (const row of rows) {
      if (isItemStatus(row.status)) out[row.status] = row.n;
    }
    return out;
  }

  /** Hard-deletes REMOVED rows whose removal is older than `olderThanMs`. */
  purgeRemoved(olderThanMs: number, now: number = Date.now()): number {
    const cutoff = now - olderThanMs;
    return this.db
      .prepare(
        `DELETE FROM items WHERE status = 'REMOVED' AND removed_at IS NOT NULL AND removed_at <= ?`,
      )
      .run(cutoff).changes;
  }

  readMeta(key: string): string | null {
    const row = this.metaSelect.get(key) as
      | { value: string | null }
      | undefined;
    return row?.value ?? null;
  }

  writeMeta(key: string, value: string) {
    this.metaUpsert.run({ key, value });
  }

  readOutageState(): OutageState {
    return parseOutageState(this.readMeta(OUTAGE_KEY));
  }

  writeOutageState(state: OutageState) {
    this.writeMeta(OUTAGE_KEY, JSON.stringify(state));
  }

  recordPass(pass: PassRecord): number {
    const info = this.insertPass.run({
      started_at: pass.startedAt,
      finished_at: pass.finishedAt,
      reason: pass.reason,
      mount_state: pass.mountState,
      mount_reason: pass.mountReason,
      paused: pass.paused ? 1 : 0,
      descriptors: pass.descriptors,
      warnings: pass.warnings,
      evaluated: pass.evaluated,
      transitions: pass.transitions,
      write_errors: pass.writeErrors,
      skipped: pass.skipped,
      interrupted: pass.interrupted ? 1 : 0,
    });
    return Number(info.lastInsertRowid);
  }

  listPasses(limit = 20): StoredPass[] {
    const rows = this.db
      .prepare(`SELECT * FROM passes ORDER BY id DESC LIMIT ?`)
      .all(limit) as PassRow[];
    return rows.map((row) => ({
      id: row.id,
      startedAt: row.started_at,
      finishedAt: row.finished_at,
      reason: row.reason,
      mountState: row.mount_state === "healthy" ? "healthy" : "unknown",
      mountReason: row.mount_reason,
      paused: row.paused === 1,
      descriptors: row.descriptors,
      warnings: row.warnings,
      evaluated: row.evaluated,
      transitions: row.transitions,
      writeErrors: row.write_errors,
      skipped: row.skipped,
      interrupted: row.interrupted === 1,
    }));
  }
}
