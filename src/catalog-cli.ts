// src/catalog-cli.ts
import path from "node:path";
import type { Command } from "commander";
import { SqliteCatalogStore, type CatalogStore } from "./catalog-store.js";
import { parseIntegerOption, type CommandContext } from "./cli-util.js";
import { formatCatalogStats, formatRecord } from "./summary.js";

function withStore<T>(
  ctx: CommandContext,
  command: Command,
  fn: (store: CatalogStore) => T,
): T {
  const { settings, logger } = ctx.resolve(command);
  const store = SqliteCatalogStore.open(settings.databasePath, {
    logger: logger.child("catalog"),
  });
  try {
    return fn(store);
  } finally {
    store.close();
  }
}

type LookupOptions = { path?: string; hash?: string; id?: number };

export function registerCatalogCommands(program: Command, ctx: CommandContext) {
  program
    .command("stats")
    .description("Show catalog counts and the last scan window")
    .action((_opts: Record<string, never>, command: Command) => {
      withStore(ctx, command, (store) => {
        ctx.write(formatCatalogStats(store.stats()) + "\n");
      });
    });

  program
    .command("lookup")
    .description("Show the catalog record for a file path, content hash or id")
    .option("--path <file>", "path of an image")
    .option("--hash <digest>", "content hash (hex)")
    .option("--id <n>", "record id", parseIntegerOption({ min: 1 }))
    .action((opts: LookupOptions, command: Command) => {
      const keys = [opts.path, opts.hash, opts.id].filter((k) => k !== undefined);
      if (keys.length !== 1) {
        ctx.writeErr("lookup: give exactly one of --path, --hash or --id\n");
        ctx.setExitCode(1);
        return;
      }
      withStore(ctx, command, (store) => {
        const record =
          opts.id !== undefined
            ? store.findRecordById(opts.id)
            : opts.path !== undefined
              ? store.findRecordByPath(path.resolve(ctx.cwd, opts.path))
              : store.findRecordByHash((opts.hash ?? "").trim().toLowerCase());
        if (!record) {
          ctx.writeErr("no matching record\n");
          ctx.setExitCode(1);
          return;
        }
        ctx.write(formatRecord(record) + "\n");
      });
    });
}
