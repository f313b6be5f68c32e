// src/hash.ts
import { createHash, getHashes } from "node:crypto";
import { createReadStream } from "node:fs";
import { pipeline } from "node:stream/promises";
import {
  CancelledError,
  ConfigError,
  IoError,
  isCancellation,
  throwIfCancelled,
} from "./errors.js";

/** Read size per chunk while hashing. */
export const STREAM_HWM = 1 << 20;

/** Algorithms a catalog may be built with, when the runtime has them. */
export const CURATED_HASH_ALGOS = [
  "sha1",
  "sha256",
  "sha512",
  "blake2b512",
  "blake2s256",
  "sha3-256",
  "sha3-512",
] as const;

export type HashAlg = (typeof CURATED_HASH_ALGOS)[number];

const ALIASES: Record<string, HashAlg> = {
  blake2b: "blake2b512",
  blake2s: "blake2s256",
};

export const defaultHashAlg = (): HashAlg => "sha256";

let available: readonly HashAlg[] | undefined;

export function listSupportedHashes(): HashAlg[] {
  if (!available) {
    const runtime = new Set(getHashes().map((name) => name.toLowerCase()));
    available = CURATED_HASH_ALGOS.filter((alg) => runtime.has(alg));
  }
  return [...available];
}

/** Case-insensitive; "blake2b" and "blake2s" name their 512/256-bit forms. */
export function normalizeHashAlg(requested?: string): HashAlg {
  if (!requested) return defaultHashAlg();
  const key = requested.trim().toLowerCase();
  const wanted = ALIASES[key] ?? key;
  const supported = listSupportedHashes();
  const match = supported.find((alg) => alg === wanted);
  if (!match) {
    throw new ConfigError(
      `unsupported hash algorithm '${requested}' (supported: ${supported.join(", ")})`,
    );
  }
  return match;
}

/**
 * Hash a file as a stream of STREAM_HWM sized chunks. The signal is checked
 * per chunk; an aborted read rejects with CancelledError and never yields a
 * partial digest.
 */
export async function fileDigest(
  alg: HashAlg,
  path: string,
  signal?: AbortSignal,
): Promise<string> {
  throwIfCancelled(signal);
  const digest = createHash(alg);
  const rs = createReadStream(path, { flags: "r", highWaterMark: STREAM_HWM });

  try {
    await pipeline(
      rs,
      async (src: AsyncIterable<Buffer>) => {
        for await (const chunk of src) {
          throwIfCancelled(signal);
          digest.update(chunk);
        }
      },
      { signal },
    );
  } catch (err) {
    if (isCancellation(err) || signal?.aborted) {
      throw new CancelledError(`hashing cancelled: ${path}`);
    }
    throw new IoError(path, err);
  }

  return digest.digest("hex");
}

export interface Hasher {
  readonly algorithm: HashAlg;
  hash(path: string, signal?: AbortSignal): Promise<string>;
}

export function createHasher(alg: HashAlg = defaultHashAlg()): Hasher {
  return {
    algorithm: alg,
    hash: (path, signal) => fileDigest(alg, path, signal),
  };
}
