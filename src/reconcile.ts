// src/reconcile.ts
import path from "node:path";
import { stat } from "node:fs/promises";
import type { BatchCommitter, ResolvedRecord } from "./batch.js";
import {
  UNASSIGNED,
  type CatalogRecord,
  type CatalogStore,
} from "./catalog-store.js";
import {
  CancelledError,
  HashUnavailableError,
  ImgLedgerError,
  IoError,
  MetadataUnavailableError,
  isCancellation,
  throwIfCancelled,
} from "./errors.js";
import type { Hasher } from "./hash.js";
import type { LogicalClock } from "./logical-clock.js";
import { NullLogger, type Logger } from "./logger.js";
import {
  parseDateTaken,
  tagValue,
  type ExtractedMetadata,
  type MetadataExtractor,
} from "./metadata.js";

export interface FileFacts {
  name: string;
  size: number;
  createdAt: number;
  modifiedAt: number;
}

export type Probe =
  | { kind: "skipped"; path: string; size: number }
  | { kind: "failed"; path: string; error: ImgLedgerError }
  | { kind: "hashed"; path: string; facts: FileFacts; hash: string };

export type Outcome =
  | { kind: "skipped"; path: string; size: number }
  | { kind: "failed"; path: string; error: ImgLedgerError }
  | { kind: "unchanged"; path: string; size: number }
  | { kind: "new"; path: string; size: number; record: CatalogRecord }
  | { kind: "modified"; path: string; size: number; record: CatalogRecord }
  | {
      kind: "moved";
      path: string;
      size: number;
      record: CatalogRecord;
      from: string;
    };

export type OutcomeKind = Outcome["kind"];

export interface ReconcilerOptions {
  store: CatalogStore;
  committer: BatchCommitter;
  hasher: Hasher;
  extractor: MetadataExtractor;
  clock: LogicalClock;
  metadataFields: readonly string[];
  minSize?: number;
  /** 0 means no upper bound. */
  maxSize?: number;
  logger?: Logger;
}

export function withinSizeLimits(
  size: number,
  minSize: number,
  maxSize: number,
): boolean {
  if (size < minSize) return false;
  return maxSize <= 0 || size <= maxSize;
}

// birthtime is 0 on filesystems that do not record it
function createdAt(birthtimeMs: number, ctimeMs: number): number {
  return Math.floor(birthtimeMs > 0 ? birthtimeMs : ctimeMs);
}

type Derived = {
  dateTaken: number | null;
  cameraModel: string | null;
  extraMetadata: string | null;
};

function derive(meta: ExtractedMetadata): Derived {
  const tags = meta.tags;
  return {
    dateTaken: parseDateTaken(tagValue(tags, "DateTimeOriginal")),
    cameraModel: tagValue(tags, "Model"),
    extraMetadata: Object.keys(tags).length ? JSON.stringify(tags) : null,
  };
}

/**
 * Classifies one file at a time against the catalog. `probe` only touches the
 * filesystem and may run ahead of `classify`, which must be called in order
 * because it reads and stages pending records.
 */
export class Reconciler {
  private readonly store: CatalogStore;
  private readonly committer: BatchCommitter;
  private readonly hasher: Hasher;
  private readonly extractor: MetadataExtractor;
  private readonly clock: LogicalClock;
  private readonly fields: readonly string[];
  private readonly minSize: number;
  private readonly maxSize: number;
  private readonly logger: Logger;

  constructor(opts: ReconcilerOptions) {
    this.store = opts.store;
    this.committer = opts.committer;
    this.hasher = opts.hasher;
    this.extractor = opts.extractor;
    this.clock = opts.clock;
    this.fields = opts.metadataFields;
    this.minSize = opts.minSize ?? 0;
    this.maxSize = opts.maxSize ?? 0;
    this.logger = opts.logger ?? new NullLogger();
  }

  /** Stat, size filter and hash. Rejects with CancelledError when aborted. */
  async probe(file: string, signal?: AbortSignal): Promise<Probe> {
    throwIfCancelled(signal);
    let facts: FileFacts;
    try {
      const st = await stat(file);
      facts = {
        name: path.basename(file),
        size: st.size,
        createdAt: createdAt(st.birthtimeMs, st.ctimeMs),
        modifiedAt: Math.floor(st.mtimeMs),
      };
    } catch (err) {
      return { kind: "failed", path: file, error: new IoError(file, err) };
    }

    if (!withinSizeLimits(facts.size, this.minSize, this.maxSize)) {
      this.logger.debug("skipped by size", { path: file, size: facts.size });
      return { kind: "skipped", path: file, size: facts.size };
    }

    try {
      const hash = await this.hasher.hash(file, signal);
      return { kind: "hashed", path: file, facts, hash };
    } catch (err) {
      if (isCancellation(err)) throw err;
      return {
        kind: "failed",
        path: file,
        error: new HashUnavailableError(file, err),
      };
    }
  }

  /**
   * Decide what a hashed file is. Unchanged files have their marker refreshed
   * at once; everything else is staged on the committer. Store failures
   * propagate as StorageError.
   */
  async classify(
    probe: Extract<Probe, { kind: "hashed" }>,
    signal?: AbortSignal,
  ): Promise<Outcome> {
    const { path: file, facts, hash } = probe;

    const marker = this.store.findMarkerByPath(file);
    if (marker && marker.contentHash === hash) {
      this.store.upsertMarker({
        path: file,
        contentHash: hash,
        lastProcessed: this.clock.next(),
      });
      this.logger.debug("unchanged", { path: file });
      return { kind: "unchanged", path: file, size: facts.size };
    }

    let meta: ExtractedMetadata | null;
    try {
      meta = await this.extractor.extract(file, this.fields, signal);
    } catch (err) {
      if (isCancellation(err)) throw err;
      return {
        kind: "failed",
        path: file,
        error: new MetadataUnavailableError(file, err),
      };
    }
    if (signal?.aborted) {
      throw new CancelledError(`cancelled while reading metadata: ${file}`);
    }
    if (meta == null) {
      return {
        kind: "failed",
        path: file,
        error: new MetadataUnavailableError(file),
      };
    }

    return this.resolve(file, facts, hash, meta);
  }

  private resolve(
    file: string,
    facts: FileFacts,
    hash: string,
    meta: ExtractedMetadata,
  ): Outcome {
    const scannedAt = this.clock.next();
    const derived = derive(meta);
    const marker = { path: file, contentHash: hash, lastProcessed: scannedAt };
    const fresh = {
      name: facts.name,
      path: file,
      sizeBytes: facts.size,
      width: meta.width,
      height: meta.height,
      contentHash: hash,
      fileCreatedAt: facts.createdAt,
      fileModifiedAt: facts.modifiedAt,
      ...derived,
      scannedAt,
    };

    const byHash = this.committer.resolveByHash(hash);
    const samePath =
      byHash && byHash.record.path === file
        ? byHash
        : this.committer.resolveByPath(file);

    if (samePath) {
      const record: CatalogRecord = { ...fresh, id: samePath.record.id };
      this.stage(record, marker, facts.size, samePath);
      this.logger.debug("modified", { path: file });
      return { kind: "modified", path: file, size: facts.size, record };
    }

    if (byHash) {
      const prior = byHash.record;
      const record: CatalogRecord = {
        ...prior,
        name: facts.name,
        path: file,
        sizeBytes: facts.size,
        fileCreatedAt: facts.createdAt,
        fileModifiedAt: facts.modifiedAt,
        scannedAt,
        width: meta.width || prior.width,
        height: meta.height || prior.height,
        dateTaken: derived.dateTaken ?? prior.dateTaken,
        cameraModel: derived.cameraModel ?? prior.cameraModel,
        extraMetadata: derived.extraMetadata ?? prior.extraMetadata,
      };
      this.stage(record, marker, facts.size, byHash);
      this.logger.info("moved/renamed", { from: prior.path, to: file });
      return {
        kind: "moved",
        path: file,
        size: facts.size,
        record,
        from: prior.path,
      };
    }

    const record: CatalogRecord = { ...fresh, id: UNASSIGNED };
    this.stage(record, marker, facts.size, null);
    this.logger.debug("new", { path: file });
    return { kind: "new", path: file, size: facts.size, record };
  }

  private stage(
    record: CatalogRecord,
    marker: { path: string; contentHash: string; lastProcessed: number },
    size: number,
    resolved: ResolvedRecord | null,
  ): void {
    this.committer.stage(record, marker, size, resolved?.slot ?? null);
  }
}
