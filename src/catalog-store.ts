// src/catalog-store.ts
import type BetterSqlite3 from "better-sqlite3";
import { getDb, type Database } from "./db.js";
import { CatalogMismatchError, StorageError } from "./errors.js";
import type { Logger } from "./logger.js";

export type RecordId =
  | { kind: "assigned"; value: number }
  | { kind: "unassigned" };

export type AssignedId = Extract<RecordId, { kind: "assigned" }>;

export const UNASSIGNED: RecordId = { kind: "unassigned" };

export function assignedId(value: number): AssignedId {
  return { kind: "assigned", value };
}

/** One row per distinct piece of content seen at a live path. Times are epoch ms. */
export interface CatalogRecord {
  id: RecordId;
  name: string;
  path: string;
  sizeBytes: number;
  width: number;
  height: number;
  contentHash: string;
  fileCreatedAt: number;
  fileModifiedAt: number;
  dateTaken: number | null;
  cameraModel: string | null;
  extraMetadata: string | null;
  scannedAt: number;
}

export type PersistedRecord = CatalogRecord & { id: AssignedId };

export interface ProcessedMarker {
  path: string;
  contentHash: string;
  lastProcessed: number;
}

export interface CatalogStats {
  records: number;
  markers: number;
  totalBytes: number;
  hashAlg: string | null;
  lastScanStart: number | null;
  lastScanEnd: number | null;
  lastScanStatus: string | null;
}

export interface CatalogStore {
  findMarkerByPath(path: string): ProcessedMarker | null;
  findRecordByPath(path: string): PersistedRecord | null;
  findRecordByHash(hash: string): PersistedRecord | null;
  findRecordById(id: number): PersistedRecord | null;
  /** All-or-nothing. Unassigned ids are inserted, assigned ids updated. */
  upsertRecordsBatch(records: readonly CatalogRecord[]): PersistedRecord[];
  upsertMarker(marker: ProcessedMarker): void;
  /** All-or-nothing. */
  upsertMarkers(markers: readonly ProcessedMarker[]): void;
  maxScannedAt(): number | null;
  /** Records `alg` on first use; throws CatalogMismatchError if it differs from the stored one. */
  bindHashAlgorithm(alg: string): void;
  readMeta(key: string): string | null;
  writeMeta(key: string, value: string): void;
  stats(): CatalogStats;
  close(): void;
}

export const META_HASH_ALG = "hash_alg";
export const META_LAST_SCAN_START = "last_scan_start";
export const META_LAST_SCAN_END = "last_scan_end";
export const META_LAST_SCAN_STATUS = "last_scan_status";

/** Scanned paths are absolute, so nothing real starts with this. */
const PARKED_PATH_PREFIX = ":moving:";

type ImageRow = {
  id: number;
  name: string;
  path: string;
  size_bytes: number;
  width: number;
  height: number;
  content_hash: string;
  file_created_at: number;
  file_modified_at: number;
  date_taken: number | null;
  camera_model: string | null;
  extra_metadata: string | null;
  scanned_at: number;
};

type ImageParams = Omit<ImageRow, "id">;

type MarkerRow = {
  path: string;
  content_hash: string;
  last_processed: number;
};

function toRecord(row: ImageRow): PersistedRecord {
  return {
    id: assignedId(row.id),
    name: row.name,
    path: row.path,
    sizeBytes: row.size_bytes,
    width: row.width,
    height: row.height,
    contentHash: row.content_hash,
    fileCreatedAt: row.file_created_at,
    fileModifiedAt: row.file_modified_at,
    dateTaken: row.date_taken,
    cameraModel: row.camera_model,
    extraMetadata: row.extra_metadata,
    scannedAt: row.scanned_at,
  };
}

function toParams(record: CatalogRecord): ImageParams {
  return {
    name: record.name,
    path: record.path,
    size_bytes: record.sizeBytes,
    width: record.width,
    height: record.height,
    content_hash: record.contentHash,
    file_created_at: record.fileCreatedAt,
    file_modified_at: record.fileModifiedAt,
    date_taken: record.dateTaken,
    camera_model: record.cameraModel,
    extra_metadata: record.extraMetadata,
    scanned_at: record.scannedAt,
  };
}

function toMarker(row: MarkerRow): ProcessedMarker {
  return {
    path: row.path,
    contentHash: row.content_hash,
    lastProcessed: row.last_processed,
  };
}

function numberOrNull(raw: string | null): number | null {
  if (raw == null) return null;
  const n = Number(raw);
  return Number.isFinite(n) ? n : null;
}

export class SqliteCatalogStore implements CatalogStore {
  private readonly selectMarkerByPath: BetterSqlite3.Statement<[string], MarkerRow>;
  private readonly selectByPath: BetterSqlite3.Statement<[string], ImageRow>;
  private readonly selectByHash: BetterSqlite3.Statement<[string], ImageRow>;
  private readonly selectById: BetterSqlite3.Statement<[number], ImageRow>;
  private readonly insertImage: BetterSqlite3.Statement<[ImageParams]>;
  private readonly updateImage: BetterSqlite3.Statement<[ImageParams & { id: number }]>;
  private readonly parkImage: BetterSqlite3.Statement<[{ id: number; path: string }]>;
  private readonly markerUpsert: BetterSqlite3.Statement<[MarkerRow]>;
  private readonly metaSelect: BetterSqlite3.Statement<[string], { value: string | null }>;
  private readonly metaUpsert: BetterSqlite3.Statement<[{ key: string; value: string }]>;

  constructor(
    private readonly db: Database,
    private readonly logger?: Logger,
  ) {
    this.selectMarkerByPath = db.prepare<[string], MarkerRow>(
      `SELECT path, content_hash, last_processed FROM processed_files WHERE path = ?`,
    );
    this.selectByPath = db.prepare<[string], ImageRow>(
      `SELECT * FROM images WHERE path = ?`,
    );
    // several live rows can share content; prefer the most recently scanned one
    this.selectByHash = db.prepare<[string], ImageRow>(
      `SELECT * FROM images WHERE content_hash = ? ORDER BY scanned_at DESC, id DESC LIMIT 1`,
    );
    this.selectById = db.prepare<[number], ImageRow>(
      `SELECT * FROM images WHERE id = ?`,
    );
    this.insertImage = db.prepare<[ImageParams]>(`
      INSERT INTO images(name, path, size_bytes, width, height, content_hash, file_created_at, file_modified_at, date_taken, camera_model, extra_metadata, scanned_at)
      VALUES (@name, @path, @size_bytes, @width, @height, @content_hash, @file_created_at, @file_modified_at, @date_taken, @camera_model, @extra_metadata, @scanned_at)
    `);
    this.updateImage = db.prepare<[ImageParams & { id: number }]>(`
      UPDATE images SET
        name = @name,
        path = @path,
        size_bytes = @size_bytes,
        width = @width,
        height = @height,
        content_hash = @content_hash,
        file_created_at = @file_created_at,
        file_modified_at = @file_modified_at,
        date_taken = @date_taken,
        camera_model = @camera_model,
        extra_metadata = @extra_metadata,
        scanned_at = @scanned_at
      WHERE id = @id
    `);
    this.parkImage = db.prepare<[{ id: number; path: string }]>(
      `UPDATE images SET path = @path WHERE id = @id`,
    );
    this.markerUpsert = db.prepare<[MarkerRow]>(`
      INSERT INTO processed_files(path, content_hash, last_processed)
      VALUES (@path, @content_hash, @last_processed)
      ON CONFLICT(path) DO UPDATE SET
        content_hash = excluded.content_hash,
        last_processed = excluded.last_processed
    `);
    this.metaSelect = db.prepare<[string], { value: string | null }>(
      `SELECT value FROM meta WHERE key = ?`,
    );
    this.metaUpsert = db.prepare<[{ key: string; value: string }]>(
      `INSERT INTO meta(key, value) VALUES (@key, @value) ON CONFLICT(key) DO UPDATE SET value = excluded.value`,
    );
  }

  static open(dbPath: string, { logger }: { logger?: Logger } = {}): SqliteCatalogStore {
    try {
      return new SqliteCatalogStore(getDb(dbPath, { logger }), logger);
    } catch (err) {
      throw new StorageError(`failed to open catalog '${dbPath}'`, err);
    }
  }

  findMarkerByPath(path: string): ProcessedMarker | null {
    const row = this.read(() => this.selectMarkerByPath.get(path));
    return row ? toMarker(row) : null;
  }

  findRecordByPath(path: string): PersistedRecord | null {
    const row = this.read(() => this.selectByPath.get(path));
    return row ? toRecord(row) : null;
  }

  findRecordByHash(hash: string): PersistedRecord | null {
    const row = this.read(() => this.selectByHash.get(hash));
    return row ? toRecord(row) : null;
  }

  findRecordById(id: number): PersistedRecord | null {
    const row = this.read(() => this.selectById.get(id));
    return row ? toRecord(row) : null;
  }

  upsertRecordsBatch(records: readonly CatalogRecord[]): PersistedRecord[] {
    if (!records.length) return [];
    const apply = this.db.transaction((batch: readonly CatalogRecord[]) => {
      // A record may move onto a path that another record in the same batch
      // is vacating. Park every updated row on a path no file can have first.
      for (const record of batch) {
        if (record.id.kind === "assigned") {
          const id = record.id.value;
          this.parkImage.run({ id, path: `${PARKED_PATH_PREFIX}${id}` });
        }
      }
      return batch.map((record): PersistedRecord => {
        const params = toParams(record);
        if (record.id.kind === "assigned") {
          const id = record.id.value;
          const res = this.updateImage.run({ ...params, id });
          if (res.changes === 0) {
            throw new StorageError(`record ${id} no longer exists`);
          }
          return { ...record, id: assignedId(id) };
        }
        const res = this.insertImage.run(params);
        return { ...record, id: assignedId(Number(res.lastInsertRowid)) };
      });
    });
    try {
      const written = apply(records);
      this.logger?.debug("records committed", { count: written.length });
      return written;
    } catch (err) {
      if (err instanceof StorageError) throw err;
      throw new StorageError(
        `failed to write batch of ${records.length} records; batch rolled back`,
        err,
      );
    }
  }

  upsertMarker(marker: ProcessedMarker): void {
    this.write(`failed to write marker for '${marker.path}'`, () => {
      this.markerUpsert.run({
        path: marker.path,
        content_hash: marker.contentHash,
        last_processed: marker.lastProcessed,
      });
    });
  }

  upsertMarkers(markers: readonly ProcessedMarker[]): void {
    if (!markers.length) return;
    const apply = this.db.transaction((batch: readonly ProcessedMarker[]) => {
      for (const marker of batch) {
        this.markerUpsert.run({
          path: marker.path,
          content_hash: marker.contentHash,
          last_processed: marker.lastProcessed,
        });
      }
    });
    this.write(`failed to write ${markers.length} markers`, () => apply(markers));
  }

  maxScannedAt(): number | null {
    const row = this.read(() =>
      this.db
        .prepare<[], { max_scanned: number | null }>(
          `SELECT MAX(scanned_at) AS max_scanned FROM images`,
        )
        .get(),
    );
    return row?.max_scanned ?? null;
  }

  bindHashAlgorithm(alg: string): void {
    const stored = this.readMeta(META_HASH_ALG);
    if (stored == null) {
      this.writeMeta(META_HASH_ALG, alg);
      return;
    }
    if (stored !== alg) {
      throw new CatalogMismatchError(stored, alg);
    }
  }

  readMeta(key: string): string | null {
    const row = this.read(() => this.metaSelect.get(key));
    return row?.value ?? null;
  }

  writeMeta(key: string, value: string): void {
    this.write(`failed to write meta '${key}'`, () => {
      this.metaUpsert.run({ key, value });
    });
  }

  stats(): CatalogStats {
    const counts = this.read(() =>
      this.db
        .prepare<[], { records: number; total_bytes: number | null; markers: number }>(
          `SELECT
             (SELECT COUNT(*) FROM images) AS records,
             (SELECT SUM(size_bytes) FROM images) AS total_bytes,
             (SELECT COUNT(*) FROM processed_files) AS markers`,
        )
        .get(),
    );
    return {
      records: counts?.records ?? 0,
      markers: counts?.markers ?? 0,
      totalBytes: counts?.total_bytes ?? 0,
      hashAlg: this.readMeta(META_HASH_ALG),
      lastScanStart: numberOrNull(this.readMeta(META_LAST_SCAN_START)),
      lastScanEnd: numberOrNull(this.readMeta(META_LAST_SCAN_END)),
      lastScanStatus: this.readMeta(META_LAST_SCAN_STATUS),
    };
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }

  private read<T>(fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      throw new StorageError("catalog read failed", err);
    }
  }

  private write(message: string, fn: () => void): void {
    try {
      fn();
    } catch (err) {
      throw new StorageError(message, err);
    }
  }
}
