// src/report.ts
import { AsciiTable3, AlignmentEnum } from "ascii-table3";
import type { ChangeReport, ScanError, ScanReport } from "./types.js";

export const DEFAULT_HEADING = "Modified or new files detected.";

export function formatScanError(err: ScanError): string {
  return err.kind === "walk"
    ? `can't read ${err.path}: ${err.reason}`
    : `can't checksum ${err.path}: ${err.reason}`;
}

export function toChangeReport(report: ScanReport): ChangeReport {
  return {
    newFiles: report.newFiles,
    changedFiles: report.changedFiles,
    deletedFiles: report.deletedFiles,
    errors: report.errors.map(formatScanError),
  };
}

export function hasChanges(report: ChangeReport): boolean {
  return (
    report.newFiles.length > 0 ||
    report.changedFiles.length > 0 ||
    report.deletedFiles.length > 0
  );
}

/**
 * Message body for notifiers: a heading, then one line per non-empty list.
 * Errors stay out of the message; they go to the log.
 */
export function formatMessage(
  report: ChangeReport,
  heading: string = DEFAULT_HEADING,
): string {
  const lines = [heading];
  if (report.changedFiles.length) {
    lines.push(`Changed files/folders: ${report.changedFiles.join(", ")}`);
  }
  if (report.newFiles.length) {
    lines.push(`New files/folders: ${report.newFiles.join(", ")}`);
  }
  if (report.deletedFiles.length) {
    lines.push(`Deleted files/folders: ${report.deletedFiles.join(", ")}`);
  }
  return lines.join("\n") + "\n";
}

export function renderReportTable(report: ScanReport): string {
  const rows: [string, string][] = [
    ...report.changedFiles.map((p): [string, string] => [p, "changed"]),
    ...report.newFiles.map((p): [string, string] => [p, "new"]),
    ...report.deletedFiles.map((p): [string, string] => [p, "deleted"]),
    ...report.errors.map((e): [string, string] => [e.path, `error: ${e.reason}`]),
  ];
  if (!rows.length) {
    return `no changes (${report.stats.files} files checked)`;
  }
  const table = new AsciiTable3(
    report.complete ? "Integrity Changes" : "Integrity Changes (incomplete)",
  )
    .setHeading("Path", "Status")
    .setStyle("unicode-round");
  [0, 1].forEach((idx) => table.setAlign(idx, AlignmentEnum.LEFT));
  for (const [p, status] of rows.sort((a, b) => a[0].localeCompare(b[0]))) {
    table.addRow(p, status);
  }
  return table.toString();
}
