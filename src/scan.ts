// src/scan.ts
import { Command, Option } from "commander";
import { BatchCommitter } from "./batch.js";
import {
  META_LAST_SCAN_END,
  META_LAST_SCAN_START,
  META_LAST_SCAN_STATUS,
  type CatalogStore,
} from "./catalog-store.js";
import { collectListOption, parseIntegerOption } from "./cli-util.js";
import {
  DEFAULT_BATCH_SIZE,
  DEFAULT_EXTENSIONS,
  DEFAULT_METADATA_FIELDS,
  ENV_PREFIX,
} from "./constants.js";
import { checkRoot, discoverFiles } from "./discover.js";
import {
  ConfigError,
  ImgLedgerError,
  StorageError,
  describeError,
  isCancellation,
} from "./errors.js";
import {
  createHasher,
  listSupportedHashes,
  normalizeHashAlg,
  type Hasher,
} from "./hash.js";
import { createLogicalClock } from "./logical-clock.js";
import { NullLogger, type Logger } from "./logger.js";
import { ImageMetadataExtractor, type MetadataExtractor } from "./metadata.js";
import { readAhead } from "./prefetch.js";
import { Reconciler, type Outcome, type Probe } from "./reconcile.js";

const DEFAULT_PROGRESS_INTERVAL_MS = 3000;

function progressIntervalFromEnv(): number {
  const raw = Number(process.env[`${ENV_PREFIX}PROGRESS_MS`]);
  return Number.isFinite(raw) && raw >= 0 ? raw : DEFAULT_PROGRESS_INTERVAL_MS;
}

export type ScanStatus = "completed" | "cancelled" | "failed";

export interface FileFailure {
  path: string;
  /** Error code, e.g. HASH_UNAVAILABLE. */
  kind: string;
  message: string;
}

export interface ScanResult {
  found: number;
  unchanged: number;
  new: number;
  modified: number;
  moved: number;
  skipped: number;
  errors: number;
  bytesCounted: number;
  elapsedMs: number;
  status: ScanStatus;
  cancelled: boolean;
  error?: ImgLedgerError;
  failures: FileFailure[];
}

export interface ScanOptions {
  root: string;
  store: CatalogStore;
  extensions?: readonly string[];
  recursive?: boolean;
  minSize?: number;
  maxSize?: number;
  batchSize?: number;
  metadataFields?: readonly string[];
  hash?: string;
  /** Takes precedence over `hash`. */
  hasher?: Hasher;
  extractor?: MetadataExtractor;
  ignore?: readonly string[];
  /** How many files may be stat'ed and hashed ahead of classification. */
  concurrency?: number;
  logger?: Logger;
  signal?: AbortSignal;
  now?: () => number;
  progressIntervalMs?: number;
  onOutcome?: (outcome: Outcome) => void;
}

export function emptyScanResult(): ScanResult {
  return {
    found: 0,
    unchanged: 0,
    new: 0,
    modified: 0,
    moved: 0,
    skipped: 0,
    errors: 0,
    bytesCounted: 0,
    elapsedMs: 0,
    status: "completed",
    cancelled: false,
    failures: [],
  };
}

function asLedgerError(err: unknown): ImgLedgerError {
  if (err instanceof ImgLedgerError) return err;
  return new ImgLedgerError(describeError(err), "UNEXPECTED", { cause: err });
}

/**
 * Reconcile every matching file under `root` with the catalog.
 *
 * Per-file problems are counted and the run continues. A StorageError ends
 * the run with status "failed" and is reported on the result rather than
 * thrown. An invalid root or a catalog built with another hash algorithm
 * throws before anything is written.
 */
export async function runScan(opts: ScanOptions): Promise<ScanResult> {
  const {
    store,
    signal,
    recursive = true,
    minSize = 0,
    maxSize = 0,
    batchSize = DEFAULT_BATCH_SIZE,
    extensions = DEFAULT_EXTENSIONS,
    metadataFields = DEFAULT_METADATA_FIELDS,
    concurrency = 1,
    onOutcome,
  } = opts;
  const logger = (opts.logger ?? new NullLogger()).child("scan");
  const now = opts.now ?? Date.now;
  const progressIntervalMs = opts.progressIntervalMs ?? progressIntervalFromEnv();
  const t0 = Date.now();

  const rootCheck = await checkRoot(opts.root);
  if (!rootCheck.ok) {
    throw new ConfigError(`cannot scan '${rootCheck.root}': ${rootCheck.reason}`);
  }
  const root = rootCheck.root;
  const hasher = opts.hasher ?? createHasher(normalizeHashAlg(opts.hash));
  store.bindHashAlgorithm(hasher.algorithm);
  store.writeMeta(META_LAST_SCAN_START, String(now()));

  const clock = createLogicalClock([store.maxScannedAt()], now);
  const committer = new BatchCommitter(store, batchSize, {
    logger: logger.child("batch"),
  });
  const reconciler = new Reconciler({
    store,
    committer,
    hasher,
    extractor:
      opts.extractor ??
      new ImageMetadataExtractor({ logger: logger.child("metadata") }),
    clock,
    metadataFields,
    minSize,
    maxSize,
    logger: logger.child("reconcile"),
  });

  const result = emptyScanResult();
  let fatal: StorageError | undefined;
  let lastProgress = Date.now();

  logger.info("scan start", {
    root,
    hash: hasher.algorithm,
    batchSize,
    concurrency,
  });

  const tally = (outcome: Outcome) => {
    switch (outcome.kind) {
      case "skipped":
        result.skipped += 1;
        break;
      case "failed":
        // errored files count as skipped too
        result.skipped += 1;
        result.errors += 1;
        result.failures.push({
          path: outcome.path,
          kind: outcome.error.code,
          message: outcome.error.message,
        });
        logger.warn("file skipped with error", {
          path: outcome.path,
          code: outcome.error.code,
          error: outcome.error.message,
        });
        break;
      case "unchanged":
        result.unchanged += 1;
        result.bytesCounted += outcome.size;
        break;
      case "new":
        result.new += 1;
        break;
      case "modified":
        result.modified += 1;
        break;
      case "moved":
        result.moved += 1;
        break;
    }
    onOutcome?.(outcome);
  };

  const flush = () => {
    const { bytes } = committer.flush();
    result.bytesCounted += bytes;
  };

  const emitProgress = () => {
    const t = Date.now();
    if (progressIntervalMs <= 0 || t - lastProgress < progressIntervalMs) return;
    lastProgress = t;
    logger.info("progress", {
      found: result.found,
      unchanged: result.unchanged,
      new: result.new,
      modified: result.modified,
      moved: result.moved,
      skipped: result.skipped,
      errors: result.errors,
      pending: committer.size,
    });
  };

  const files = discoverFiles({
    root,
    extensions,
    recursive,
    ignore: opts.ignore,
    signal,
    logger: logger.child("discover"),
  });
  const probes = readAhead(files, concurrency, (file) =>
    reconciler.probe(file, signal),
  );

  try {
    for await (const [file, probed] of probes) {
      result.found += 1;
      if (signal?.aborted) break;
      try {
        if (!probed.ok) throw probed.error;
        const probe: Probe = probed.value;
        tally(
          probe.kind === "hashed"
            ? await reconciler.classify(probe, signal)
            : probe,
        );
      } catch (err) {
        if (err instanceof StorageError) throw err;
        if (isCancellation(err)) {
          logger.debug("file abandoned", { path: file });
          break;
        }
        tally({ kind: "failed", path: file, error: asLedgerError(err) });
      }
      if (committer.full) flush();
      emitProgress();
    }
  } catch (err) {
    if (!(err instanceof StorageError)) throw err;
    fatal = err;
  }

  if (!fatal) {
    try {
      flush();
    } catch (err) {
      if (!(err instanceof StorageError)) throw err;
      fatal = err;
    }
  }

  if (fatal) {
    result.status = "failed";
    result.error = fatal;
    logger.error("scan aborted by storage failure", { error: fatal.message });
  } else if (signal?.aborted) {
    result.status = "cancelled";
    result.cancelled = true;
    logger.warn("scan cancelled", { found: result.found });
  }
  result.elapsedMs = Date.now() - t0;

  try {
    store.writeMeta(META_LAST_SCAN_END, String(now()));
    store.writeMeta(META_LAST_SCAN_STATUS, result.status);
  } catch (err) {
    logger.warn("could not record scan window", { error: describeError(err) });
  }

  logger.info("scan complete", {
    status: result.status,
    found: result.found,
    new: result.new,
    modified: result.modified,
    moved: result.moved,
    unchanged: result.unchanged,
    skipped: result.skipped,
    errors: result.errors,
    durationMs: result.elapsedMs,
  });
  return result;
}

export interface ScanCommandOptions {
  folder: string;
  extensions?: string[];
  minSize?: number;
  maxSize?: number;
  subdirs: boolean;
  batchSize?: number;
  hash?: string;
  ignore: string[];
  concurrency?: number;
  summary: boolean;
}

export function configureScanCommand(command: Command): Command {
  return command
    .description("Reconcile a folder of images with the catalog")
    .requiredOption("--folder <dir>", "directory to scan")
    .option(
      "--extensions <list>",
      "file extensions to include (repeat or comma-separated)",
      collectListOption,
    )
    .option(
      "--min-size <bytes>",
      "skip files smaller than this",
      parseIntegerOption({ min: 0 }),
    )
    .option(
      "--max-size <bytes>",
      "skip files larger than this (0 = no limit)",
      parseIntegerOption({ min: 0 }),
    )
    .option("--no-subdirs", "only scan the top level of the folder")
    .option(
      "--batch-size <n>",
      "records per database transaction",
      parseIntegerOption({ min: 1 }),
    )
    .addOption(
      new Option("--hash <algorithm>", "content hash algorithm").choices(
        listSupportedHashes(),
      ),
    )
    .option(
      "-i, --ignore <pattern>",
      "gitignore-style ignore rule (repeat or comma-separated)",
      collectListOption,
      [] as string[],
    )
    .option(
      "--concurrency <n>",
      "files hashed ahead of classification",
      parseIntegerOption({ min: 1 }),
    )
    .option("--summary", "print the summary table after the scan", false);
}
