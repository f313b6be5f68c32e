import { StorageError } from "../errors.js";
import { emptyScanResult } from "../scan.js";
import {
  SUMMARY_TITLE,
  formatMegabytes,
  formatScanSummary,
  formatSeconds,
  summaryRows,
} from "../summary.js";

describe("summary", () => {
  const result = {
    ...emptyScanResult(),
    found: 3,
    new: 1,
    moved: 1,
    unchanged: 1,
    bytesCounted: 1_572_864,
    elapsedMs: 1_234,
  };

  test("units use two decimals", () => {
    expect(formatMegabytes(1_572_864)).toBe("1.50");
    expect(formatSeconds(1_234)).toBe("1.23");
  });

  test("rows follow the run result", () => {
    expect(summaryRows(result)).toEqual([
      ["Files found", "3"],
      ["New", "1"],
      ["Modified", "0"],
      ["Moved", "1"],
      ["Unchanged", "1"],
      ["Skipped", "0"],
      ["Errors", "0"],
      ["MB counted", "1.50"],
      ["Time (s)", "1.23"],
      ["Status", "completed"],
    ]);
  });

  test("the table carries the title and each row", () => {
    const text = formatScanSummary(result);
    expect(text).toContain(SUMMARY_TITLE);
    expect(text).toMatch(/Files found\s+│\s+3\s+│/);
    expect(text).toMatch(/MB counted\s+│\s+1\.50\s+│/);
  });

  test("a failed run appends the error", () => {
    const failed = {
      ...result,
      status: "failed" as const,
      error: new StorageError("disk full"),
    };
    expect(formatScanSummary(failed)).toMatch(/\nerror: disk full\n$/);
  });
});
