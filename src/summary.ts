// src/summary.ts
import { AsciiTable3, AlignmentEnum } from "ascii-table3";
import type { CatalogRecord, CatalogStats } from "./catalog-store.js";
import type { ScanResult } from "./scan.js";

export const SUMMARY_TITLE = "Scan Summary";

const MB = 1024 * 1024;

export function formatMegabytes(bytes: number): string {
  return (bytes / MB).toFixed(2);
}

export function formatSeconds(ms: number): string {
  return (ms / 1000).toFixed(2);
}

function formatTime(ms: number | null): string {
  return ms == null ? "-" : new Date(ms).toISOString();
}

export function summaryRows(result: ScanResult): Array<[string, string]> {
  return [
    ["Files found", String(result.found)],
    ["New", String(result.new)],
    ["Modified", String(result.modified)],
    ["Moved", String(result.moved)],
    ["Unchanged", String(result.unchanged)],
    ["Skipped", String(result.skipped)],
    ["Errors", String(result.errors)],
    ["MB counted", formatMegabytes(result.bytesCounted)],
    ["Time (s)", formatSeconds(result.elapsedMs)],
    ["Status", result.status],
  ];
}

function twoColumn(title: string, rows: Array<[string, string]>): string {
  const table = new AsciiTable3(title)
    .setHeading("Field", "Value")
    .setStyle("unicode-round")
    .setAlign(1, AlignmentEnum.LEFT)
    .setAlign(2, AlignmentEnum.RIGHT);
  for (const [k, v] of rows) {
    table.addRow(k, v === "" ? "-" : v);
  }
  return table.toString();
}

export function formatScanSummary(result: ScanResult): string {
  let out = twoColumn(SUMMARY_TITLE, summaryRows(result));
  if (result.error) {
    out += `\nerror: ${result.error.message}\n`;
  }
  return out;
}

export function formatCatalogStats(stats: CatalogStats): string {
  return twoColumn("Catalog", [
    ["Records", String(stats.records)],
    ["Markers", String(stats.markers)],
    ["MB catalogued", formatMegabytes(stats.totalBytes)],
    ["Hash", stats.hashAlg ?? "-"],
    ["Last scan start", formatTime(stats.lastScanStart)],
    ["Last scan end", formatTime(stats.lastScanEnd)],
    ["Last scan status", stats.lastScanStatus ?? "-"],
  ]);
}

export function recordRows(record: CatalogRecord): Array<[string, string]> {
  return [
    ["id", record.id.kind === "assigned" ? String(record.id.value) : "-"],
    ["name", record.name],
    ["path", record.path],
    ["size", String(record.sizeBytes)],
    ["dimensions", `${record.width}x${record.height}`],
    ["hash", record.contentHash],
    ["created", formatTime(record.fileCreatedAt)],
    ["modified", formatTime(record.fileModifiedAt)],
    ["date taken", formatTime(record.dateTaken)],
    ["camera", record.cameraModel ?? "-"],
    ["metadata", record.extraMetadata ?? "-"],
    ["scanned", formatTime(record.scannedAt)],
  ];
}

export function formatRecord(record: CatalogRecord): string {
  const table = new AsciiTable3(record.name)
    .setHeading("Field", "Value")
    .setStyle("unicode-round")
    .setAlign(1, AlignmentEnum.LEFT)
    .setAlign(2, AlignmentEnum.LEFT);
  for (const [k, v] of recordRows(record)) {
    table.addRow(k, v);
  }
  return table.toString();
}
