import fsp from "node:fs/promises";
import path from "node:path";
import { SqliteCatalogStore } from "../catalog-store.js";
import { getDb } from "../db.js";
import { CatalogMismatchError, ConfigError, StorageError } from "../errors.js";
import { runScan, type ScanOptions, type ScanResult } from "../scan.js";
import { CountingHasher, FakeExtractor, mkTmp, move, put } from "./util.js";

describe("runScan", () => {
  let tmp: string;
  let root: string;
  let dbPath: string;
  let store: SqliteCatalogStore;
  let n = 0;

  beforeEach(async () => {
    tmp = await mkTmp("imgledger-scan-");
    root = path.join(tmp, "photos");
    dbPath = path.join(tmp, `catalog-${n++}.db`);
    await fsp.mkdir(root, { recursive: true });
    store = SqliteCatalogStore.open(dbPath);
  });

  afterEach(async () => {
    store.close();
    await fsp.rm(tmp, { recursive: true, force: true });
  });

  function scan(extra: Partial<ScanOptions> = {}): Promise<ScanResult> {
    return runScan({
      root,
      store,
      extractor: new FakeExtractor(),
      progressIntervalMs: 0,
      ...extra,
    });
  }

  test("a second run over an untouched tree finds everything unchanged", async () => {
    await put(root, "a.jpg", "aaaa");
    await put(root, "b.png", "bbbbbb");
    await put(root, "nested/c.gif", "cc");

    const first = await scan();
    expect(first).toMatchObject({
      found: 3,
      new: 3,
      modified: 0,
      moved: 0,
      unchanged: 0,
      errors: 0,
      bytesCounted: 12,
      status: "completed",
      cancelled: false,
      failures: [],
    });

    const second = await scan();
    expect(second).toMatchObject({
      found: 3,
      unchanged: 3,
      new: 0,
      modified: 0,
      moved: 0,
      bytesCounted: 12,
      status: "completed",
    });
    expect(store.stats()).toMatchObject({
      records: 3,
      markers: 3,
      hashAlg: "sha256",
      lastScanStatus: "completed",
    });
  });

  test("a moved file keeps its record id", async () => {
    const oldPath = await put(root, "a.jpg", "moving bytes");
    await scan();
    const before = store.findRecordByPath(oldPath);
    expect(before).not.toBeNull();

    const newPath = await move(root, "a.jpg", "albums/renamed.jpg");
    const result = await scan();
    expect(result).toMatchObject({ found: 1, moved: 1, new: 0, modified: 0 });

    const after = store.findRecordByPath(newPath);
    expect(after?.id).toEqual(before?.id);
    expect(after?.name).toBe("renamed.jpg");
    expect(after?.contentHash).toBe(before?.contentHash);
    expect(store.findRecordByPath(oldPath)).toBeNull();
  });

  test("rewriting a file is a modification of the same record", async () => {
    const file = await put(root, "a.jpg", "version one");
    await scan();
    const before = store.findRecordByPath(file);

    await fsp.writeFile(file, "version two, longer");
    const result = await scan();
    expect(result).toMatchObject({ found: 1, modified: 1, new: 0, moved: 0 });

    const after = store.findRecordByPath(file);
    expect(after?.id).toEqual(before?.id);
    expect(after?.contentHash).not.toBe(before?.contentHash);
    expect(after?.sizeBytes).toBe(19);
    expect(after?.scannedAt ?? 0).toBeGreaterThan(before?.scannedAt ?? 0);
    expect(store.findMarkerByPath(file)?.contentHash).toBe(after?.contentHash);
  });

  test("files below minSize are skipped and never hashed", async () => {
    const small = await put(root, "small.jpg", "123456789");
    const big = await put(root, "big.jpg", "1234567890");
    const hasher = new CountingHasher();
    const result = await scan({ minSize: 10, hasher });
    expect(result).toMatchObject({ found: 2, skipped: 1, new: 1 });
    expect(hasher.calls).toEqual([big]);
    expect(hasher.calls).not.toContain(small);
    expect(store.findMarkerByPath(small)).toBeNull();
  });

  test("new, unchanged and moved in one run", async () => {
    await put(root, "b.png", "bee");
    await put(root, "old/c.gif", "sea");
    await scan();

    await move(root, "old/c.gif", "c.gif");
    await put(root, "a.jpg", "ay");
    const result = await scan();
    expect(result).toMatchObject({
      found: 3,
      new: 1,
      moved: 1,
      unchanged: 1,
      modified: 0,
      errors: 0,
    });
  });

  test("cancelling after two files commits those two", async () => {
    for (const name of ["1.jpg", "2.jpg", "3.jpg", "4.jpg", "5.jpg"]) {
      await put(root, name, `content of ${name}`);
    }
    const ac = new AbortController();
    let seen = 0;
    const result = await scan({
      signal: ac.signal,
      onOutcome: () => {
        seen += 1;
        if (seen === 2) ac.abort();
      },
    });
    expect(result).toMatchObject({
      status: "cancelled",
      cancelled: true,
      found: 2,
      new: 2,
    });
    expect(store.stats()).toMatchObject({
      records: 2,
      markers: 2,
      lastScanStatus: "cancelled",
    });

    const next = await scan();
    expect(next).toMatchObject({
      status: "completed",
      found: 5,
      unchanged: 2,
      new: 3,
    });
  });

  test("a storage failure rolls back the whole batch", async () => {
    for (let i = 1; i <= 6; i++) {
      await put(root, `f${i}.jpg`, `file number ${i}`);
    }
    store.close();
    const db = getDb(dbPath);
    db.exec(`
      CREATE TRIGGER reject_f3 BEFORE INSERT ON images
      WHEN NEW.name = 'f3.jpg'
      BEGIN SELECT RAISE(ABORT, 'simulated failure'); END;
    `);
    db.close();
    store = SqliteCatalogStore.open(dbPath);

    const result = await scan({ batchSize: 10 });
    expect(result.status).toBe("failed");
    expect(result.error).toBeInstanceOf(StorageError);
    expect(result.error?.message).toContain("simulated failure");
    expect(store.stats()).toMatchObject({
      records: 0,
      markers: 0,
      lastScanStatus: "failed",
    });
  });

  test("identical content in one run yields a single record", async () => {
    await put(root, "one.jpg", "same");
    await put(root, "two.jpg", "same");
    const result = await scan();
    expect(result).toMatchObject({ found: 2, new: 1, moved: 1 });
    expect(store.stats()).toMatchObject({ records: 1, markers: 2 });

    const again = await scan();
    expect(again).toMatchObject({ unchanged: 2, new: 0, moved: 0 });
  });

  test("content replaced by a copy of another file stays with its path", async () => {
    const a = await put(root, "a.jpg", "alpha");
    const b = await put(root, "b.jpg", "bravo");
    await scan();
    const aBefore = store.findRecordByPath(a);
    const bBefore = store.findRecordByPath(b);

    await fsp.writeFile(a, "bravo");
    const result = await scan();
    expect(result).toMatchObject({ modified: 1, unchanged: 1, moved: 0, new: 0 });
    expect(store.findRecordByPath(a)?.id).toEqual(aBefore?.id);
    expect(store.findRecordByPath(a)?.contentHash).toBe(bBefore?.contentHash);
    expect(store.findRecordByPath(b)?.id).toEqual(bBefore?.id);
  });

  test("per-file metadata failures are counted and retried next run", async () => {
    await put(root, "good.jpg", "good");
    const bad = await put(root, "bad.jpg", "bad");
    const extractor = new FakeExtractor({ "bad.jpg": null });
    const result = await scan({ extractor });
    expect(result).toMatchObject({ found: 2, new: 1, skipped: 1, errors: 1 });
    expect(result.failures).toEqual([
      {
        path: bad,
        kind: "METADATA_UNAVAILABLE",
        message: `Could not extract metadata for '${bad}'`,
      },
    ]);
    expect(store.findMarkerByPath(bad)).toBeNull();

    const again = await scan({ extractor });
    expect(again).toMatchObject({ unchanged: 1, skipped: 1, errors: 1 });
  });

  test("read-ahead gives the same classification", async () => {
    for (let i = 0; i < 8; i++) {
      await put(root, `r${i}.jpg`, `read ahead ${i}`);
    }
    await put(root, "dup.jpg", "read ahead 3");
    const result = await scan({ concurrency: 4, batchSize: 3 });
    expect(result).toMatchObject({ found: 9, new: 8, moved: 1, errors: 0 });
    expect(store.stats().records).toBe(8);
  });

  test("a catalog built with another hash is refused", async () => {
    await put(root, "a.jpg", "x");
    await scan();
    await expect(scan({ hash: "sha512" })).rejects.toBeInstanceOf(
      CatalogMismatchError,
    );
  });

  test("a missing root is a configuration error", async () => {
    await expect(
      scan({ root: path.join(tmp, "missing") }),
    ).rejects.toBeInstanceOf(ConfigError);
  });
});
