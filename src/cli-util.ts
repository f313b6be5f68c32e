// src/cli-util.ts
import { InvalidArgumentError, type Command } from "commander";
import type { ScannerSettings, SettingsOverrides } from "./config.js";
import type { Logger } from "./logger.js";

/** Accumulate repeatable, comma-separated option values. */
export function collectListOption(
  value: string,
  previous: string[] = [],
): string[] {
  if (!value) return previous;
  const parts = value
    .split(",")
    .map((p) => p.trim())
    .filter(Boolean);
  if (!parts.length) return previous;
  return previous.concat(parts);
}

export function parseIntegerOption({
  min,
}: {
  min: number;
}): (value: string) => number {
  return (value) => {
    const trimmed = value.trim();
    const n = /^[+-]?\d+$/.test(trimmed) ? Number(trimmed) : Number.NaN;
    if (!Number.isSafeInteger(n) || n < min) {
      throw new InvalidArgumentError(`Expected an integer >= ${min}.`);
    }
    return n;
  };
}

/** What command actions need from the process that runs them. */
export interface CommandContext {
  cwd: string;
  write(text: string): void;
  writeErr(text: string): void;
  setExitCode(code: number): void;
  resolve(
    command: Command,
    overrides?: SettingsOverrides,
  ): { settings: ScannerSettings; logger: Logger };
}
