// src/config.ts
import { existsSync, readFileSync } from "node:fs";
import path from "node:path";
import {
  DEFAULT_BATCH_SIZE,
  DEFAULT_CONFIG_FILE,
  DEFAULT_DB_FILE,
  DEFAULT_EXTENSIONS,
  DEFAULT_METADATA_FIELDS,
  ENV_PREFIX,
} from "./constants.js";
import { normalizeExtensions } from "./discover.js";
import { ConfigError, describeError } from "./errors.js";
import { defaultHashAlg, normalizeHashAlg, type HashAlg } from "./hash.js";
import { normalizeIgnorePatterns } from "./ignore.js";
import { isLogLevel, type LogLevel } from "./logger.js";

export interface ScannerSettings {
  extensions: string[];
  batchSize: number;
  databasePath: string;
  logFile: string | null;
  logLevel: LogLevel;
  metadataFields: string[];
  minSize: number;
  /** 0 means no upper bound. */
  maxSize: number;
  hash: HashAlg;
  ignore: string[];
  concurrency: number;
}

export type SettingsOverrides = Partial<ScannerSettings>;

export const DEFAULT_SETTINGS: Readonly<ScannerSettings> = {
  extensions: [...DEFAULT_EXTENSIONS],
  batchSize: DEFAULT_BATCH_SIZE,
  databasePath: DEFAULT_DB_FILE,
  logFile: null,
  logLevel: "info",
  metadataFields: [...DEFAULT_METADATA_FIELDS],
  minSize: 0,
  maxSize: 0,
  hash: defaultHashAlg(),
  ignore: [],
  concurrency: 1,
};

export const ENV_KEYS = {
  databasePath: `${ENV_PREFIX}DB`,
  logFile: `${ENV_PREFIX}LOG_FILE`,
  logLevel: `${ENV_PREFIX}LOG_LEVEL`,
  batchSize: `${ENV_PREFIX}BATCH_SIZE`,
} as const;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function stringList(key: string, value: unknown, source: string): string[] {
  if (typeof value === "string") {
    return value
      .split(",")
      .map((v) => v.trim())
      .filter(Boolean);
  }
  if (Array.isArray(value)) {
    const strings = value.filter((v): v is string => typeof v === "string");
    if (strings.length === value.length) {
      return strings.map((v) => v.trim()).filter(Boolean);
    }
  }
  throw new ConfigError(`${source}: '${key}' must be a list of strings`);
}

function integer(
  key: string,
  value: unknown,
  source: string,
  { min }: { min: number },
): number {
  const n =
    typeof value === "number"
      ? value
      : typeof value === "string" && value.trim() !== ""
        ? Number(value)
        : Number.NaN;
  if (!Number.isInteger(n) || n < min) {
    throw new ConfigError(
      `${source}: '${key}' must be an integer >= ${min}, got ${JSON.stringify(value)}`,
    );
  }
  return n;
}

function text(key: string, value: unknown, source: string): string {
  if (typeof value !== "string" || !value.trim()) {
    throw new ConfigError(`${source}: '${key}' must be a non-empty string`);
  }
  return value.trim();
}

function hashAlg(value: unknown, source: string): HashAlg {
  const raw = text("hash", value, source);
  try {
    return normalizeHashAlg(raw);
  } catch (err) {
    throw new ConfigError(`${source}: ${describeError(err)}`);
  }
}

function logLevel(value: unknown, source: string): LogLevel {
  const raw = text("logLevel", value, source).toLowerCase();
  if (!isLogLevel(raw)) {
    throw new ConfigError(`${source}: '${raw}' is not a log level`);
  }
  return raw;
}

/** Validate a parsed settings document. Unknown keys are rejected. */
export function parseSettingsObject(
  raw: unknown,
  source = "settings",
): SettingsOverrides {
  if (!isRecord(raw)) {
    throw new ConfigError(`${source}: expected a JSON object`);
  }
  const out: SettingsOverrides = {};
  for (const [key, value] of Object.entries(raw)) {
    switch (key) {
      case "extensions":
        out.extensions = stringList(key, value, source);
        break;
      case "metadataFields":
        out.metadataFields = stringList(key, value, source);
        break;
      case "ignore":
        out.ignore = stringList(key, value, source);
        break;
      case "batchSize":
        out.batchSize = integer(key, value, source, { min: 1 });
        break;
      case "concurrency":
        out.concurrency = integer(key, value, source, { min: 1 });
        break;
      case "minSize":
        out.minSize = integer(key, value, source, { min: 0 });
        break;
      case "maxSize":
        out.maxSize = integer(key, value, source, { min: 0 });
        break;
      case "databasePath":
        out.databasePath = text(key, value, source);
        break;
      case "logFile":
        out.logFile = value === null ? null : text(key, value, source);
        break;
      case "logLevel":
        out.logLevel = logLevel(value, source);
        break;
      case "hash":
        out.hash = hashAlg(value, source);
        break;
      default:
        throw new ConfigError(`${source}: unknown setting '${key}'`);
    }
  }
  return out;
}

export function settingsFromEnv(
  env: NodeJS.ProcessEnv = process.env,
): SettingsOverrides {
  const out: SettingsOverrides = {};
  const db = env[ENV_KEYS.databasePath]?.trim();
  if (db) out.databasePath = db;
  const logFile = env[ENV_KEYS.logFile]?.trim();
  if (logFile) out.logFile = logFile;
  const level = env[ENV_KEYS.logLevel]?.trim();
  if (level) out.logLevel = logLevel(level, ENV_KEYS.logLevel);
  const batch = env[ENV_KEYS.batchSize]?.trim();
  if (batch) {
    out.batchSize = integer("batchSize", batch, ENV_KEYS.batchSize, { min: 1 });
  }
  return out;
}

/**
 * Read a JSON settings file. With `required` unset a missing file yields no
 * overrides; a file that exists but does not parse is always an error.
 */
export function readSettingsFile(
  file: string,
  { required }: { required: boolean },
): SettingsOverrides {
  if (!existsSync(file)) {
    if (required) throw new ConfigError(`settings file not found: ${file}`);
    return {};
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(file, "utf8"));
  } catch (err) {
    throw new ConfigError(`${file}: ${describeError(err)}`);
  }
  return parseSettingsObject(parsed, file);
}

function definedOnly(overrides: SettingsOverrides): SettingsOverrides {
  const out: SettingsOverrides = {};
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) Object.assign(out, { [key]: value });
  }
  return out;
}

/** Cross-field checks and normalization of a merged settings object. */
export function validateSettings(settings: ScannerSettings): ScannerSettings {
  const extensions = normalizeExtensions(settings.extensions);
  if (!extensions.length) {
    throw new ConfigError("'extensions' must name at least one extension");
  }
  for (const key of ["batchSize", "concurrency"] as const) {
    integer(key, settings[key], "settings", { min: 1 });
  }
  for (const key of ["minSize", "maxSize"] as const) {
    integer(key, settings[key], "settings", { min: 0 });
  }
  if (settings.maxSize > 0 && settings.maxSize < settings.minSize) {
    throw new ConfigError(
      `'maxSize' (${settings.maxSize}) must be 0 or at least 'minSize' (${settings.minSize})`,
    );
  }
  return {
    ...settings,
    extensions,
    metadataFields: Array.from(new Set(settings.metadataFields)),
    ignore: normalizeIgnorePatterns(settings.ignore),
  };
}

export interface LoadSettingsOptions {
  /** Explicit settings file; must exist. */
  configFile?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** Highest precedence, usually from command line flags. */
  overrides?: SettingsOverrides;
}

/** defaults < settings file < environment < overrides */
export function loadSettings({
  configFile,
  cwd = process.cwd(),
  env = process.env,
  overrides = {},
}: LoadSettingsOptions = {}): ScannerSettings {
  const fromFile = configFile
    ? readSettingsFile(path.resolve(cwd, configFile), { required: true })
    : readSettingsFile(path.join(cwd, DEFAULT_CONFIG_FILE), { required: false });

  const merged = validateSettings({
    ...DEFAULT_SETTINGS,
    ...fromFile,
    ...settingsFromEnv(env),
    ...definedOnly(overrides),
  });
  return {
    ...merged,
    databasePath:
      merged.databasePath === ":memory:"
        ? merged.databasePath
        : path.resolve(cwd, merged.databasePath),
    logFile: merged.logFile ? path.resolve(cwd, merged.logFile) : null,
  };
}
