#!/usr/bin/env node
// src/cli.ts
import fs from "node:fs";
import path from "node:path";
import readline from "node:readline";
import { Command, CommanderError, Option } from "commander";
import { registerCatalogCommands } from "./catalog-cli.js";
import { SqliteCatalogStore } from "./catalog-store.js";
import type { CommandContext } from "./cli-util.js";
import { loadSettings, type SettingsOverrides } from "./config.js";
import { CLI_NAME } from "./constants.js";
import { checkRoot } from "./discover.js";
import { ImgLedgerError, describeError } from "./errors.js";
import { normalizeHashAlg } from "./hash.js";
import {
  LOG_LEVELS,
  createLogger,
  isLogLevel,
  type Logger,
} from "./logger.js";
import type { MetadataExtractor } from "./metadata.js";
import {
  configureScanCommand,
  runScan,
  type ScanCommandOptions,
  type ScanStatus,
} from "./scan.js";
import { formatScanSummary } from "./summary.js";

export interface CliDeps {
  write?: (text: string) => void;
  writeErr?: (text: string) => void;
  extractor?: MetadataExtractor;
  signal?: AbortSignal;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  logger?: Logger;
  /** Where interactive mode reads commands from; stdin by default. */
  input?: NodeJS.ReadableStream;
}

type GlobalOptions = {
  db?: string;
  config?: string;
  logLevel?: string;
  logFile?: string;
};

export const EXIT_CODES: Record<ScanStatus, number> = {
  completed: 0,
  failed: 1,
  cancelled: 2,
};

function readVersion(): string {
  try {
    const raw: unknown = JSON.parse(
      fs.readFileSync(path.join(__dirname, "..", "package.json"), "utf8"),
    );
    if (typeof raw === "object" && raw !== null && "version" in raw) {
      return String(raw.version);
    }
  } catch {
    // running from an unusual layout; report no version
  }
  return "0.0.0";
}

export function buildProgram(ctx: CommandContext, deps: CliDeps = {}): Command {
  const program = new Command()
    .name(CLI_NAME)
    .description("Catalog image folders in SQLite, tracking files by content")
    .version(readVersion())
    .exitOverride()
    .configureOutput({
      writeOut: (s) => ctx.write(s),
      writeErr: (s) => ctx.writeErr(s),
    })
    .option("--db <file>", "path to the catalog database")
    .option("--config <file>", "JSON settings file")
    .addOption(
      new Option("--log-level <level>", "log verbosity").choices(LOG_LEVELS),
    )
    .option("--log-file <file>", "append JSON log lines to this file");

  configureScanCommand(program.command("scan")).action(
    async (opts: ScanCommandOptions, command: Command) => {
      const { settings, logger } = ctx.resolve(command, {
        extensions: opts.extensions,
        minSize: opts.minSize,
        maxSize: opts.maxSize,
        batchSize: opts.batchSize,
        hash: opts.hash ? normalizeHashAlg(opts.hash) : undefined,
        ignore: opts.ignore.length ? opts.ignore : undefined,
        concurrency: opts.concurrency,
      });
      const check = await checkRoot(path.resolve(ctx.cwd, opts.folder));
      if (!check.ok) {
        ctx.writeErr(`scan: folder '${check.root}' is not usable: ${check.reason}\n`);
        ctx.setExitCode(EXIT_CODES.failed);
        return;
      }
      const store = SqliteCatalogStore.open(settings.databasePath, {
        logger: logger.child("catalog"),
      });
      try {
        const result = await runScan({
          root: check.root,
          store,
          extensions: settings.extensions,
          recursive: opts.subdirs,
          minSize: settings.minSize,
          maxSize: settings.maxSize,
          batchSize: settings.batchSize,
          metadataFields: settings.metadataFields,
          hash: settings.hash,
          ignore: settings.ignore,
          concurrency: settings.concurrency,
          extractor: deps.extractor,
          logger,
          signal: deps.signal,
        });
        if (opts.summary || result.status !== "completed") {
          ctx.write(formatScanSummary(result) + "\n");
        }
        ctx.setExitCode(EXIT_CODES[result.status]);
      } finally {
        store.close();
      }
    },
  );

  registerCatalogCommands(program, ctx);
  return program;
}

type RunContext = CommandContext & { exitCode: number };

function createContext(deps: CliDeps): RunContext {
  const cwd = deps.cwd ?? process.cwd();
  const env = deps.env ?? process.env;
  const ctx: RunContext = {
    cwd,
    exitCode: 0,
    write: deps.write ?? ((text) => void process.stdout.write(text)),
    writeErr: deps.writeErr ?? ((text) => void process.stderr.write(text)),
    setExitCode(code) {
      ctx.exitCode = code;
    },
    resolve(command, overrides: SettingsOverrides = {}) {
      const globals = command.optsWithGlobals<GlobalOptions>();
      const settings = loadSettings({
        configFile: globals.config,
        cwd,
        env,
        overrides: {
          ...overrides,
          databasePath: globals.db,
          logFile: globals.logFile,
          logLevel:
            globals.logLevel && isLogLevel(globals.logLevel)
              ? globals.logLevel
              : undefined,
        },
      });
      const logger =
        deps.logger ??
        createLogger({ level: settings.logLevel, file: settings.logFile });
      return { settings, logger };
    },
  };
  return ctx;
}

export type InteractiveLine =
  | { kind: "blank" }
  | { kind: "exit" }
  | { kind: "run"; args: string[] };

/** `help` and `help <command>` become `--help` requests; words split on whitespace. */
export function parseInteractiveLine(line: string): InteractiveLine {
  const words = line.trim().split(/\s+/).filter(Boolean);
  if (!words.length) return { kind: "blank" };
  const [head, ...rest] = words;
  switch (head.toLowerCase()) {
    case "exit":
      return { kind: "exit" };
    case "help":
      return { kind: "run", args: rest.length ? [rest[0], "--help"] : ["--help"] };
    default:
      return { kind: "run", args: words };
  }
}

/**
 * Read commands line by line until `exit` or end of input, running each one
 * as its own invocation. Ctrl-C cancels the running command; the outer signal
 * cancels it and ends the session.
 */
export async function runInteractive(deps: CliDeps = {}): Promise<number> {
  const write = deps.write ?? ((text: string) => void process.stdout.write(text));
  const writeErr = deps.writeErr ?? ((text: string) => void process.stderr.write(text));
  const rl = readline.createInterface({ input: deps.input ?? process.stdin });
  let running: AbortController | null = null;
  const stop = () => {
    running?.abort();
    rl.close();
  };
  deps.signal?.addEventListener("abort", stop, { once: true });
  rl.on("SIGINT", () => {
    if (running) running.abort();
    else rl.close();
  });

  write(
    `${CLI_NAME}: type 'help' for commands, '<command> --help' for details, 'exit' to quit.\n> `,
  );
  try {
    for await (const raw of rl) {
      const line = parseInteractiveLine(raw);
      if (line.kind === "exit") {
        write(`Exiting ${CLI_NAME}.\n`);
        break;
      }
      if (line.kind === "run") {
        running = new AbortController();
        try {
          await main(["node", CLI_NAME, ...line.args], {
            ...deps,
            signal: running.signal,
          });
        } catch (err) {
          writeErr(`${CLI_NAME}: ${describeError(err)}\n`);
        } finally {
          running = null;
        }
      }
      write("> ");
    }
  } finally {
    deps.signal?.removeEventListener("abort", stop);
    rl.close();
  }
  return 0;
}

/**
 * Parse `argv` and run one command; resolves to the process exit code.
 * Without a command, reads commands interactively.
 */
export async function main(
  argv: string[] = process.argv,
  deps: CliDeps = {},
): Promise<number> {
  if (argv.length <= 2) {
    return runInteractive(deps);
  }
  const ctx = createContext(deps);
  const program = buildProgram(ctx, deps);
  try {
    await program.parseAsync(argv);
  } catch (err) {
    if (err instanceof CommanderError) return err.exitCode;
    if (err instanceof ImgLedgerError) {
      ctx.writeErr(`${CLI_NAME}: ${err.message}\n`);
      return 1;
    }
    throw err;
  }
  return ctx.exitCode;
}

if (require.main === module) {
  const controller = new AbortController();
  const cancel = () => controller.abort();
  process.once("SIGINT", cancel);
  process.once("SIGTERM", cancel);
  main(process.argv, { signal: controller.signal }).then(
    (code) => {
      process.exitCode = code;
    },
    (err: unknown) => {
      console.error(`${CLI_NAME} fatal:`, err);
      process.exitCode = 1;
    },
  );
}
