import fsp from "node:fs/promises";
import path from "node:path";
import {
  ConsoleLogger,
  NullLogger,
  StructuredLogger,
  createFileSink,
  isLogLevel,
  type LogEntry,
} from "../logger.js";
import { mkTmp } from "./util.js";

describe("StructuredLogger", () => {
  test("sends entries with nested scopes to the sink", () => {
    const entries: LogEntry[] = [];
    const logger = new StructuredLogger({
      scope: "scan",
      sink: (e) => entries.push(e),
      clock: () => 42,
    });
    logger.child("batch").info("flushed", { records: 3 });
    logger.warn("plain", {});
    expect(entries).toEqual([
      { ts: 42, level: "info", scope: "scan.batch", message: "flushed", meta: { records: 3 } },
      { ts: 42, level: "warn", scope: "scan", message: "plain", meta: undefined },
    ]);
  });

  test("echoes only at or above the echo level", () => {
    const echoed: string[] = [];
    const logger = new StructuredLogger({
      echo: { minLevel: "warn", writer: (e) => echoed.push(e.message) },
    });
    logger.info("quiet");
    logger.error("loud");
    expect(echoed).toEqual(["loud"]);
  });
});

test("ConsoleLogger passes every entry to its sink", () => {
  const entries: LogEntry[] = [];
  const spy = jest.spyOn(console, "error").mockImplementation(() => {});
  try {
    const logger = new ConsoleLogger("error", (e) => entries.push(e));
    logger.child("scan").debug("detail");
    expect(entries.map((e) => [e.level, e.scope, e.message])).toEqual([
      ["debug", "scan", "detail"],
    ]);
    expect(spy).not.toHaveBeenCalled();
  } finally {
    spy.mockRestore();
  }
});

test("NullLogger children are the same no-op logger", () => {
  const logger = new NullLogger();
  expect(logger.child("scan")).toBe(logger);
  expect(() => logger.error("ignored", { path: "/a.jpg" })).not.toThrow();
});

test("isLogLevel accepts only exact level names", () => {
  expect(isLogLevel("warn")).toBe(true);
  expect(isLogLevel("WARN")).toBe(false);
  expect(isLogLevel("chatty")).toBe(false);
});

describe("createFileSink", () => {
  let tmp: string;

  beforeAll(async () => {
    tmp = await mkTmp("imgledger-log-");
  });

  afterAll(async () => {
    await fsp.rm(tmp, { recursive: true, force: true });
  });

  test("appends one JSON line per entry at or above its level", async () => {
    const file = path.join(tmp, "logs", "scan.log");
    const sink = createFileSink(file, "info");
    const logger = new StructuredLogger({ sink, clock: () => 7 });
    logger.debug("dropped");
    logger.info("kept", { path: "/a.jpg" });
    logger.error("also kept");
    const lines = (await fsp.readFile(file, "utf8")).trim().split("\n");
    expect(lines.map((l) => JSON.parse(l))).toEqual([
      { ts: 7, level: "info", message: "kept", meta: { path: "/a.jpg" } },
      { ts: 7, level: "error", message: "also kept" },
    ]);
  });
});
