// src/aggregator.ts
import type { Channel } from "./channel.js";
import { isUnder } from "./path-rel.js";
import { DRAINED, type ResultItem } from "./worker-pool.js";
import type { ChecksumResult, ScanError, ScanReport, Snapshot } from "./types.js";

/**
 * Stored in place of a digest when a file could not be read. It can never
 * equal a hex digest, so the file keeps being reported as changed until a
 * read succeeds.
 */
export const UNREADABLE_PREFIX = "!unreadable: ";

export function isUnreadableMarker(checksum: string): boolean {
  return checksum.startsWith(UNREADABLE_PREFIX);
}

export interface FinalizeOptions {
  complete: boolean;
  detectDeleted?: boolean;
}

export type AggregateReport = Omit<ScanReport, "stats">;

/**
 * Single consumer that folds checksum results into the next snapshot and
 * classifies each path against the prior one. All mutation happens here, one
 * result at a time, so no locking is needed.
 */
export class Aggregator {
  private readonly prior: ReadonlyMap<string, string>;
  private readonly next = new Map<string, string>();
  private readonly newFiles: string[] = [];
  private readonly changedFiles: string[] = [];
  private readonly errors: ScanError[] = [];
  private readonly walked: string[] = [];
  private readonly unsettled: string[] = [];

  constructor(prior: Snapshot = {}) {
    this.prior = new Map(Object.entries(prior));
  }

  get processed(): number {
    return this.next.size;
  }

  add({ file, outcome }: ChecksumResult): void {
    // overlapping roots deliver the same key twice; the first result stands
    if (this.next.has(file)) return;
    let checksum: string;
    if (outcome.ok) {
      checksum = outcome.digest;
    } else {
      checksum = UNREADABLE_PREFIX + outcome.reason;
      this.errors.push({ kind: "read", path: file, reason: outcome.reason });
    }
    const previous = this.prior.get(file);
    if (previous === undefined) {
      this.newFiles.push(file);
    } else if (!outcome.ok || previous !== checksum) {
      this.changedFiles.push(file);
    }
    this.next.set(file, checksum);
  }

  recordError(err: ScanError): void {
    this.errors.push(err);
  }

  /** Keys under `prefix` were walked; missing ones may count as deleted. */
  markWalked(prefix: string): void {
    this.walked.push(prefix);
  }

  /** Part of the tree under `prefix` could not be read; keep its prior keys. */
  markUnsettled(prefix: string): void {
    this.unsettled.push(prefix);
  }

  /** Drain `results` until the coordinator sends DRAINED. */
  async run(results: Channel<ResultItem>): Promise<void> {
    for (;;) {
      const item = await results.receive();
      if (item === DRAINED) return;
      this.add(item);
    }
  }

  /**
   * Prior entries that were not revisited are carried forward. With deletion
   * detection on and a completed scan, those under a walked prefix (and not
   * under an unsettled one) are reported as deleted and dropped instead.
   */
  finalize({ complete, detectDeleted = false }: FinalizeOptions): AggregateReport {
    const merged = new Map(this.next);
    const deletedFiles: string[] = [];
    for (const [file, checksum] of this.prior) {
      if (merged.has(file)) continue;
      if (detectDeleted && complete && this.wasWalked(file)) {
        deletedFiles.push(file);
      } else {
        merged.set(file, checksum);
      }
    }
    const snapshot: Snapshot = {};
    for (const file of [...merged.keys()].sort()) {
      const checksum = merged.get(file);
      if (checksum !== undefined) snapshot[file] = checksum;
    }
    return {
      snapshot,
      newFiles: [...this.newFiles],
      changedFiles: [...this.changedFiles],
      deletedFiles: deletedFiles.sort(),
      errors: [...this.errors],
      complete,
    };
  }

  private wasWalked(file: string): boolean {
    return (
      this.walked.some((p) => isUnder(file, p)) &&
      !this.unsettled.some((p) => isUnder(file, p))
    );
  }
}
