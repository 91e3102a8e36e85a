// src/scan.ts
import { Aggregator } from "./aggregator.js";
import { Channel } from "./channel.js";
import { QUEUE_SLOTS_PER_WORKER } from "./constants.js";
import { describeError } from "./errors.js";
import type { HashAlg } from "./hash.js";
import { HashThreadPool } from "./hash-worker.js";
import { createIgnorer } from "./ignore.js";
import { NullLogger, type Logger } from "./logger.js";
import { isUnder, reroot } from "./path-rel.js";
import type {
  ChecksumFunction,
  KeyBy,
  ScanError,
  ScanReport,
  Snapshot,
} from "./types.js";
import { resolveRoot, walkRoot, type ResolvedRoot } from "./walker.js";
import {
  DRAINED,
  STOP,
  resolveParallelism,
  startWorkers,
  type ResultItem,
  type WorkItem,
} from "./worker-pool.js";

export interface ScanTreesOptions {
  roots: readonly string[];
  /** Last known good state; read only. */
  prior?: Snapshot;
  /** Exact full paths to skip (with their subtrees). */
  ignored?: readonly string[];
  /** gitignore-style rules, relative to each root. */
  ignorePatterns?: readonly string[];
  /** Worker count; 0 or absent means one per available CPU. */
  parallelism?: number;
  /**
   * Replaces the threaded checksum; `algorithm` and `chunkSize` are then
   * ignored.
   */
  checksum?: ChecksumFunction;
  algorithm?: HashAlg;
  chunkSize?: number;
  keyBy?: KeyBy;
  detectDeleted?: boolean;
  /** Slots in each queue; defaults to a few per worker. */
  queueCapacity?: number;
  signal?: AbortSignal;
  logger?: Logger;
}

/**
 * Walk every root, checksum every regular file on a pool of workers and diff
 * the results against `prior`.
 *
 * Shutdown runs in a fixed order: all roots walked, then one STOP per
 * worker, then join the workers, then DRAINED to the aggregator, then join
 * the aggregator, then finalize. Nothing is finalized while a result could
 * still be in flight.
 */
export async function scanTrees(opts: ScanTreesOptions): Promise<ScanReport> {
  const {
    roots,
    prior = {},
    ignored = [],
    ignorePatterns = [],
    keyBy = "resolved",
    detectDeleted = false,
    signal,
    logger = new NullLogger(),
  } = opts;
  const t0 = Date.now();
  const workerCount = resolveParallelism(opts.parallelism);
  const capacity = opts.queueCapacity ?? workerCount * QUEUE_SLOTS_PER_WORKER;
  const ignorer = createIgnorer({ entries: ignored, patterns: ignorePatterns });

  const work = new Channel<WorkItem>(capacity);
  const results = new Channel<ResultItem>(capacity);
  const aggregator = new Aggregator(prior);
  let threads: HashThreadPool | undefined;
  let checksum: ChecksumFunction;
  if (opts.checksum) {
    checksum = opts.checksum;
  } else {
    threads = new HashThreadPool({
      threads: workerCount,
      algorithm: opts.algorithm,
      chunkSize: opts.chunkSize,
    });
    checksum = threads.checksum;
  }

  const draining = aggregator.run(results);
  const workers = startWorkers({
    count: workerCount,
    work,
    results,
    checksum,
    logger: logger.child("worker"),
  });
  logger.debug("scan started", {
    roots: roots.length,
    workers: workerCount,
    threads: threads?.size ?? 0,
  });

  let complete = false;
  let walked = 0;
  try {
    for (const configured of roots) {
      if (signal?.aborted) break;
      let root: ResolvedRoot;
      try {
        root = await resolveRoot(configured);
      } catch (err) {
        // prior keys under this root stay as they were
        aggregator.recordError({
          kind: "walk",
          path: configured,
          reason: describeError(err),
        });
        continue;
      }
      if (ignorer.ignores([root.configured, root.resolved], "", true)) {
        logger.debug("root ignored", { root: root.configured });
        continue;
      }
      if (root.resolved !== root.configured) {
        logger.debug("root is a symlink", {
          root: root.configured,
          target: root.resolved,
        });
      }
      aggregator.markWalked(keyRootOf(root, keyBy));
      for await (const file of walkRoot(root, {
        ignorer,
        keyBy,
        signal,
        onError: (err) => {
          aggregator.recordError(err);
          aggregator.markUnsettled(errorKeyPath(err, root, keyBy));
        },
      })) {
        await work.send(file);
      }
      walked += 1;
    }
    complete = !signal?.aborted;
    logger.debug("walk finished", { roots: walked, complete });
  } finally {
    for (let i = 0; i < workers.length; i++) {
      await work.send(STOP);
    }
    await Promise.all(workers);
    await results.send(DRAINED);
    await draining;
    await threads?.close();
  }

  const report = aggregator.finalize({ complete, detectDeleted });
  const stats = {
    roots: walked,
    files: aggregator.processed,
    workers: workerCount,
    durationMs: Date.now() - t0,
  };
  logger.info("scan complete", {
    ...stats,
    newFiles: report.newFiles.length,
    changedFiles: report.changedFiles.length,
    deletedFiles: report.deletedFiles.length,
    errors: report.errors.length,
    complete,
  });
  if (!complete) {
    logger.warn("scan cancelled before all roots were walked");
  }
  return { ...report, stats };
}

function keyRootOf(root: ResolvedRoot, keyBy: KeyBy): string {
  return keyBy === "configured" ? root.configured : root.resolved;
}

/** Where a walk error sits among the snapshot keys. */
function errorKeyPath(err: ScanError, root: ResolvedRoot, keyBy: KeyBy): string {
  if (err.path === root.configured || err.path === root.resolved) {
    return keyRootOf(root, keyBy);
  }
  if (keyBy === "configured" && isUnder(err.path, root.resolved)) {
    return reroot(err.path, root.resolved, root.configured);
  }
  return err.path;
}
