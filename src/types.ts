// src/types.ts

/** One regular file discovered by the walker. */
export interface FileDescriptor {
  /** Where the file is read from (under the resolved root). */
  path: string;
  /** Snapshot key; equals `path` unless keys follow the configured root. */
  key: string;
  size: number;
  mode: number;
  /** Captured for diagnostics only; checksums decide what changed. */
  modTime: number;
}

export type ChecksumOutcome =
  | { ok: true; digest: string }
  | { ok: false; reason: string };

export interface ChecksumResult {
  file: string;
  outcome: ChecksumOutcome;
}

export type ChecksumFunction = (
  file: FileDescriptor,
) => Promise<ChecksumOutcome>;

/** File path -> checksum. */
export type Snapshot = Record<string, string>;

export type ScanErrorKind = "walk" | "read";

export interface ScanError {
  kind: ScanErrorKind;
  path: string;
  reason: string;
}

export type KeyBy = "resolved" | "configured";

export interface ScanStats {
  roots: number;
  files: number;
  workers: number;
  durationMs: number;
}

export interface ScanReport {
  snapshot: Snapshot;
  newFiles: string[];
  changedFiles: string[];
  /** Only filled when deletion detection is on and the scan completed. */
  deletedFiles: string[];
  errors: ScanError[];
  /** False when the scan was cancelled before every root was walked. */
  complete: boolean;
  stats: ScanStats;
}

/** Payload handed to notifiers. */
export interface ChangeReport {
  newFiles: string[];
  changedFiles: string[];
  deletedFiles: string[];
  errors: string[];
}
