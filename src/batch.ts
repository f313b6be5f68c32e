// src/batch.ts
import type {
  CatalogRecord,
  CatalogStore,
  PersistedRecord,
  ProcessedMarker,
} from "./catalog-store.js";
import { NullLogger, type Logger } from "./logger.js";

/** A record as the reconciler sees it, plus the pending slot it lives in (if any). */
export interface ResolvedRecord {
  record: CatalogRecord;
  slot: number | null;
}

export interface FlushResult {
  records: PersistedRecord[];
  /** Size of every file staged since the previous flush. */
  bytes: number;
}

type PendingEntry = {
  slot: number;
  record: CatalogRecord;
};

/**
 * Holds New/Modified/Moved records until `batchSize` of them accumulate and
 * writes them in one transaction, followed by their markers in a second one.
 *
 * Lookups consult pending entries before the store, so a file later in the
 * run sees records staged earlier. A store row whose id is also pending is
 * only returned when the pending version still matches the query.
 */
export class BatchCommitter {
  private readonly entries = new Map<number, PendingEntry>();
  private markers: ProcessedMarker[] = [];
  private stagedBytes = 0;
  private nextSlot = 0;
  private readonly logger: Logger;

  constructor(
    private readonly store: CatalogStore,
    private readonly batchSize: number,
    { logger }: { logger?: Logger } = {},
  ) {
    if (!Number.isInteger(batchSize) || batchSize < 1) {
      throw new RangeError(`batch size must be a positive integer, got ${batchSize}`);
    }
    this.logger = logger ?? new NullLogger();
  }

  get size(): number {
    return this.entries.size;
  }

  get full(): boolean {
    return this.entries.size >= this.batchSize;
  }

  /**
   * Queue `record`. Passing the slot returned by a resolve call replaces that
   * pending entry instead of adding a second one for the same identity.
   */
  stage(
    record: CatalogRecord,
    marker: ProcessedMarker,
    fileBytes: number,
    slot: number | null = null,
  ): number {
    const target = slot != null && this.entries.has(slot) ? slot : this.nextSlot++;
    this.entries.set(target, { slot: target, record });
    this.markers.push(marker);
    this.stagedBytes += fileBytes;
    return target;
  }

  resolveByHash(hash: string): ResolvedRecord | null {
    const pending = this.latestPending((r) => r.contentHash === hash);
    if (pending) return pending;
    return this.fresh(this.store.findRecordByHash(hash), (r) => r.contentHash === hash);
  }

  resolveByPath(path: string): ResolvedRecord | null {
    const pending = this.latestPending((r) => r.path === path);
    if (pending) return pending;
    return this.fresh(this.store.findRecordByPath(path), (r) => r.path === path);
  }

  /**
   * Write everything pending. The pending state is cleared whether or not
   * the write succeeds; a StorageError propagates.
   */
  flush(): FlushResult {
    if (!this.entries.size) {
      return { records: [], bytes: 0 };
    }
    const records = Array.from(this.entries.values(), (e) => e.record);
    const markers = this.markers;
    const bytes = this.stagedBytes;
    this.clear();
    const written = this.store.upsertRecordsBatch(records);
    this.store.upsertMarkers(markers);
    this.logger.debug("batch flushed", {
      records: written.length,
      markers: markers.length,
    });
    return { records: written, bytes };
  }

  private clear(): void {
    this.entries.clear();
    this.markers = [];
    this.stagedBytes = 0;
  }

  private latestPending(
    match: (record: CatalogRecord) => boolean,
  ): ResolvedRecord | null {
    let found: PendingEntry | null = null;
    for (const entry of this.entries.values()) {
      if (match(entry.record)) found = entry;
    }
    return found ? { record: found.record, slot: found.slot } : null;
  }

  private pendingById(id: number): ResolvedRecord | null {
    return this.latestPending(
      (r) => r.id.kind === "assigned" && r.id.value === id,
    );
  }

  private fresh(
    stored: PersistedRecord | null,
    stillMatches: (record: CatalogRecord) => boolean,
  ): ResolvedRecord | null {
    if (!stored) return null;
    const overlay = this.pendingById(stored.id.value);
    if (overlay) {
      return stillMatches(overlay.record) ? overlay : null;
    }
    return { record: stored, slot: null };
  }
}
