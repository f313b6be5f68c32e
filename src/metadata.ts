// src/metadata.ts
import { open } from "node:fs/promises";
import { imageSize } from "image-size";
import * as exifr from "exifr";
import { describeError, throwIfCancelled } from "./errors.js";
import { NullLogger, type Logger } from "./logger.js";

export interface ExtractedMetadata {
  width: number;
  height: number;
  tags: Record<string, string>;
}

export interface MetadataExtractor {
  /** Resolves null when the file cannot be read as an image. */
  extract(
    path: string,
    fields: readonly string[],
    signal?: AbortSignal,
  ): Promise<ExtractedMetadata | null>;
}

export const WILDCARD_FIELD = "*";

// enough for the dimensions of every format image-size knows, and for
// jpegs with large embedded thumbnails ahead of the frame header
const HEADER_BYTES = 512 * 1024;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function stringifyTag(value: unknown): string | null {
  if (value == null) return null;
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : value.toISOString();
  }
  if (typeof value === "string") {
    const trimmed = value.replace(/\0+$/, "").trim();
    return trimmed || null;
  }
  if (typeof value === "number" || typeof value === "boolean") {
    return String(value);
  }
  if (typeof value === "bigint") return value.toString();
  if (Array.isArray(value)) {
    const parts = value
      .map(stringifyTag)
      .filter((v): v is string => v != null);
    return parts.length ? parts.join(", ") : null;
  }
  // binary blobs (thumbnails, maker notes) are not catalogued
  return null;
}

/**
 * Pick `fields` out of raw tags, matching names case-insensitively. A field
 * of "*" keeps every tag that has a printable value. Output keys use the
 * spelling requested in `fields`.
 */
export function selectTags(
  raw: Record<string, unknown>,
  fields: readonly string[],
): Record<string, string> {
  const out: Record<string, string> = {};
  if (fields.includes(WILDCARD_FIELD)) {
    for (const [key, value] of Object.entries(raw)) {
      const text = stringifyTag(value);
      if (text != null) out[key] = text;
    }
    return out;
  }
  const byLower = new Map<string, unknown>();
  for (const [key, value] of Object.entries(raw)) {
    byLower.set(key.toLowerCase(), value);
  }
  for (const field of fields) {
    const text = stringifyTag(byLower.get(field.toLowerCase()));
    if (text != null) out[field] = text;
  }
  return out;
}

/** Case-insensitive lookup in an extracted tag map. */
export function tagValue(
  tags: Record<string, string>,
  name: string,
): string | null {
  const want = name.toLowerCase();
  for (const [key, value] of Object.entries(tags)) {
    if (key.toLowerCase() === want) return value;
  }
  return null;
}

const EXIF_DATE = /^(\d{4}):(\d{2}):(\d{2})[ T](\d{2}):(\d{2}):(\d{2})/;

/**
 * EXIF writes "YYYY:MM:DD HH:mm:ss" without a zone; it is read as UTC.
 * Anything Date.parse understands (ISO 8601) is accepted too.
 */
export function parseDateTaken(raw: string | null | undefined): number | null {
  if (!raw) return null;
  const m = EXIF_DATE.exec(raw.trim());
  if (m) {
    const [, y, mo, d, h, mi, s] = m.map(Number);
    const ms = Date.UTC(y, mo - 1, d, h, mi, s);
    return Number.isFinite(ms) && mo >= 1 && mo <= 12 ? ms : null;
  }
  const ms = Date.parse(raw);
  return Number.isFinite(ms) ? ms : null;
}

async function readHeader(path: string): Promise<Buffer> {
  const fh = await open(path, "r");
  try {
    const buf = Buffer.alloc(HEADER_BYTES);
    const { bytesRead } = await fh.read(buf, 0, HEADER_BYTES, 0);
    return buf.subarray(0, bytesRead);
  } finally {
    await fh.close();
  }
}

/** Raw tags of a file, or null/undefined when it carries none. */
export type TagReader = (path: string) => Promise<unknown>;

/**
 * Dates stay as the strings the camera wrote; a revived Date would be read
 * in the local zone, while parseDateTaken reads them as UTC.
 */
export const EXIF_OPTIONS = { reviveValues: false } as const;

export const readExif: TagReader = (path) => exifr.parse(path, EXIF_OPTIONS);

/**
 * Dimensions come from image-size over the file header; tags from exifr.
 * Formats exifr cannot parse (bmp, gif) still yield dimensions with an empty
 * tag map.
 */
export class ImageMetadataExtractor implements MetadataExtractor {
  private readonly logger: Logger;
  private readonly parseTags: TagReader;

  constructor({ logger, readTags }: { logger?: Logger; readTags?: TagReader } = {}) {
    this.logger = logger ?? new NullLogger();
    this.parseTags = readTags ?? readExif;
  }

  async extract(
    path: string,
    fields: readonly string[],
    signal?: AbortSignal,
  ): Promise<ExtractedMetadata | null> {
    throwIfCancelled(signal);
    let width: number;
    let height: number;
    try {
      const dims = imageSize(await readHeader(path));
      if (dims.width == null || dims.height == null) {
        this.logger.debug("image dimensions missing", { path });
        return null;
      }
      width = dims.width;
      height = dims.height;
    } catch (err) {
      this.logger.debug("image header unreadable", {
        path,
        error: describeError(err),
      });
      return null;
    }

    throwIfCancelled(signal);
    const tags = fields.length ? await this.readTags(path, fields) : {};
    for (const [field, value] of [
      ["ImageWidth", width],
      ["ImageHeight", height],
    ] as const) {
      const requested = fields.find(
        (f) => f.toLowerCase() === field.toLowerCase(),
      );
      if (requested && tagValue(tags, field) == null) {
        tags[requested] = String(value);
      }
    }
    throwIfCancelled(signal);
    return { width, height, tags };
  }

  private async readTags(
    path: string,
    fields: readonly string[],
  ): Promise<Record<string, string>> {
    try {
      const parsed = await this.parseTags(path);
      return isRecord(parsed) ? selectTags(parsed, fields) : {};
    } catch (err) {
      this.logger.debug("no readable exif", {
        path,
        error: describeError(err),
      });
      return {};
    }
  }
}
