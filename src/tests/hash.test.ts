import { Hash, createHash } from "node:crypto";
import fsp from "node:fs/promises";
import path from "node:path";
import {
  createHasher,
  defaultHashAlg,
  fileDigest,
  normalizeHashAlg,
  STREAM_HWM,
} from "../hash.js";
import { CancelledError, ConfigError, IoError } from "../errors.js";
import { mkTmp } from "./util.js";

describe("fileDigest", () => {
  let tmp: string;

  beforeAll(async () => {
    tmp = await mkTmp("imgledger-hash-");
  });

  afterAll(async () => {
    await fsp.rm(tmp, { recursive: true, force: true });
  });

  test("sha256 of a small file is its lowercase hex digest", async () => {
    const file = path.join(tmp, "hello.txt");
    await fsp.writeFile(file, "hello");
    await expect(fileDigest("sha256", file)).resolves.toBe(
      "2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824",
    );
  });

  test("identical bytes give identical digests whatever the name", async () => {
    const a = path.join(tmp, "a.bin");
    const b = path.join(tmp, "b.bin");
    const bytes = Buffer.alloc(3 * 1024 * 1024, 7);
    await fsp.writeFile(a, bytes);
    await fsp.writeFile(b, bytes);
    const hasher = createHasher();
    expect(await hasher.hash(a)).toBe(await hasher.hash(b));
  });

  test("a missing file rejects with IoError", async () => {
    const missing = path.join(tmp, "nope.jpg");
    const err = await fileDigest("sha256", missing).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(IoError);
    expect(err).toMatchObject({ code: "IO_ERROR", path: missing });
  });

  test("an aborted signal rejects with CancelledError", async () => {
    const file = path.join(tmp, "hello.txt");
    const ac = new AbortController();
    ac.abort();
    await expect(fileDigest("sha256", file, ac.signal)).rejects.toBeInstanceOf(
      CancelledError,
    );
  });

  test("aborting after the first chunk rejects instead of digesting", async () => {
    const file = path.join(tmp, "large.bin");
    await fsp.writeFile(file, Buffer.alloc(STREAM_HWM * 3, 1));
    const ac = new AbortController();
    const spare = createHash("sha256");
    const update = jest
      .spyOn(Hash.prototype, "update")
      .mockImplementationOnce(() => {
        ac.abort();
        return spare;
      });
    try {
      await expect(fileDigest("sha256", file, ac.signal)).rejects.toBeInstanceOf(
        CancelledError,
      );
      expect(update).toHaveBeenCalledTimes(1);
    } finally {
      update.mockRestore();
    }
  });
});

describe("normalizeHashAlg", () => {
  test("defaults to sha256", () => {
    expect(defaultHashAlg()).toBe("sha256");
    expect(normalizeHashAlg()).toBe("sha256");
    expect(createHasher().algorithm).toBe("sha256");
  });

  test("accepts case variations and blake2 shorthands", () => {
    expect(normalizeHashAlg(" SHA512 ")).toBe("sha512");
    expect(normalizeHashAlg("blake2b")).toBe("blake2b512");
  });

  test("rejects algorithms outside the curated set", () => {
    expect(() => normalizeHashAlg("md5")).toThrow(ConfigError);
  });
});
