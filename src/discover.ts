// src/discover.ts
import path from "node:path";
import { stat } from "node:fs/promises";
import * as walk from "@nodelib/fs.walk";
import { createIgnorer } from "./ignore.js";
import { describeError } from "./errors.js";
import { NullLogger, type Logger } from "./logger.js";

export interface DiscoverOptions {
  root: string;
  extensions: readonly string[];
  recursive: boolean;
  ignore?: readonly string[];
  signal?: AbortSignal;
  logger?: Logger;
}

export type RootCheck =
  | { ok: true; root: string }
  | { ok: false; root: string; reason: string };

/** Lowercase, dot-prefixed and deduplicated: ["JPG", " .png "] -> [".jpg", ".png"] */
export function normalizeExtensions(extensions: readonly string[]): string[] {
  const out = new Set<string>();
  for (const raw of extensions) {
    const ext = raw.trim().toLowerCase();
    if (!ext || ext === ".") continue;
    out.add(ext.startsWith(".") ? ext : `.${ext}`);
  }
  return Array.from(out);
}

/**
 * Lets callers tell an empty folder apart from one that does not exist, since
 * discoverFiles yields nothing in both cases.
 */
export async function checkRoot(root: string): Promise<RootCheck> {
  const abs = path.resolve(root);
  try {
    const st = await stat(abs);
    if (!st.isDirectory()) {
      return { ok: false, root: abs, reason: "not a directory" };
    }
    return { ok: true, root: abs };
  } catch (err) {
    return { ok: false, root: abs, reason: describeError(err) };
  }
}

function toRel(abs: string, root: string): string {
  return path.relative(root, abs).split(path.sep).join("/");
}

/**
 * Lazily walk `root` yielding absolute paths of files whose extension is in
 * `extensions`. Unreadable directories (the root included) end their branch
 * with a warning instead of failing the walk. Nothing is yielded once the
 * signal is aborted.
 */
export async function* discoverFiles(
  opts: DiscoverOptions,
): AsyncGenerator<string, void, undefined> {
  const { recursive, signal } = opts;
  const logger = opts.logger ?? new NullLogger();
  const absRoot = path.resolve(opts.root);
  const extensions = new Set(normalizeExtensions(opts.extensions));
  const ig = createIgnorer(opts.ignore);

  if (signal?.aborted || extensions.size === 0) return;

  const stream = walk.walkStream(absRoot, {
    followSymbolicLinks: false,
    // Do not descend at all unless recursive, nor into ignored directories
    deepFilter: (e) => recursive && !ig.ignoresDir(toRel(e.path, absRoot)),
    entryFilter: (e) =>
      e.dirent.isFile() &&
      extensions.has(path.extname(e.name).toLowerCase()) &&
      !ig.ignoresFile(toRel(e.path, absRoot)),
    errorFilter: (err) => {
      logger.warn("directory unreadable; skipping", {
        root: absRoot,
        path: err.path,
        code: err.code,
        error: err.message,
      });
      return true;
    },
  });

  // The walker's stream never emits "close", so async iteration over it
  // never settles after the last entry. Drain it through its events instead.
  const pending: walk.Entry[] = [];
  const state: { ended: boolean; failure: { error: unknown } | null } = {
    ended: false,
    failure: null,
  };
  let wake: (() => void) | null = null;
  const notify = () => {
    const resolve = wake;
    wake = null;
    resolve?.();
  };
  stream.on("data", (entry: walk.Entry) => {
    pending.push(entry);
    notify();
  });
  stream.once("end", () => {
    state.ended = true;
    notify();
  });
  stream.once("error", (error: unknown) => {
    state.failure = { error };
    notify();
  });
  signal?.addEventListener("abort", notify, { once: true });

  try {
    while (!signal?.aborted) {
      const entry = pending.shift();
      if (entry) {
        yield entry.path;
        continue;
      }
      if (state.failure) throw state.failure.error;
      if (state.ended) return;
      await new Promise<void>((resolve) => {
        wake = resolve;
      });
    }
  } finally {
    signal?.removeEventListener("abort", notify);
    if (!state.ended) stream.destroy();
  }
}
