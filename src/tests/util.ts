import fsp from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { UNASSIGNED, type CatalogRecord } from "../catalog-store.js";
import { throwIfCancelled } from "../errors.js";
import { createHasher, type HashAlg, type Hasher } from "../hash.js";
import type { ExtractedMetadata, MetadataExtractor } from "../metadata.js";

export function mkTmp(prefix: string): Promise<string> {
  return fsp.mkdtemp(path.join(os.tmpdir(), prefix));
}

/** Write `content` at root/rel, creating parent directories. Returns the absolute path. */
export async function put(
  root: string,
  rel: string,
  content: string | Buffer,
): Promise<string> {
  const file = path.join(root, rel);
  await fsp.mkdir(path.dirname(file), { recursive: true });
  await fsp.writeFile(file, content);
  return file;
}

export async function move(root: string, from: string, to: string): Promise<string> {
  const dest = path.join(root, to);
  await fsp.mkdir(path.dirname(dest), { recursive: true });
  await fsp.rename(path.join(root, from), dest);
  return dest;
}

type FakeResult = ExtractedMetadata | null | Error;

/**
 * Answers by file name: an entry of null means "not an image", an Error is
 * thrown, anything else is returned. Unlisted files get `fallback`.
 */
export class FakeExtractor implements MetadataExtractor {
  readonly calls: string[] = [];

  constructor(
    private readonly byName: Record<string, FakeResult> = {},
    private readonly fallback: ExtractedMetadata = {
      width: 640,
      height: 480,
      tags: { Model: "Test Camera" },
    },
  ) {}

  async extract(
    file: string,
    _fields: readonly string[],
    signal?: AbortSignal,
  ): Promise<ExtractedMetadata | null> {
    this.calls.push(file);
    throwIfCancelled(signal);
    const name = path.basename(file);
    if (!(name in this.byName)) return this.fallback;
    const result = this.byName[name];
    if (result instanceof Error) throw result;
    return result;
  }
}

export class CountingHasher implements Hasher {
  readonly calls: string[] = [];
  private readonly inner: Hasher;

  constructor(alg: HashAlg = "sha256") {
    this.inner = createHasher(alg);
  }

  get algorithm(): HashAlg {
    return this.inner.algorithm;
  }

  hash(file: string, signal?: AbortSignal): Promise<string> {
    this.calls.push(file);
    return this.inner.hash(file, signal);
  }
}

let seq = 0;

/** A record for store-level tests; unassigned unless `id` is given. */
export function makeRecord(overrides: Partial<CatalogRecord> = {}): CatalogRecord {
  seq += 1;
  return {
    id: UNASSIGNED,
    name: `img-${seq}.jpg`,
    path: `/photos/img-${seq}.jpg`,
    sizeBytes: 100,
    width: 640,
    height: 480,
    contentHash: `hash-${seq}`,
    fileCreatedAt: 1_000,
    fileModifiedAt: 2_000,
    dateTaken: null,
    cameraModel: null,
    extraMetadata: null,
    scannedAt: 10_000 + seq,
    ...overrides,
  };
}
