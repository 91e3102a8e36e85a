// src/worker-pool.ts
import os from "node:os";
import type { Channel } from "./channel.js";
import { describeError } from "./errors.js";
import type { Logger } from "./logger.js";
import type {
  ChecksumFunction,
  ChecksumOutcome,
  ChecksumResult,
  FileDescriptor,
} from "./types.js";

/** Sentinel on the work queue: the receiving worker exits. */
export const STOP = Symbol("stop");

/** Closed marker on the result queue: no worker will send again. */
export const DRAINED = Symbol("drained");

export type WorkItem = FileDescriptor | typeof STOP;
export type ResultItem = ChecksumResult | typeof DRAINED;

export function resolveParallelism(requested?: number): number {
  if (requested && requested > 0) return Math.floor(requested);
  return Math.max(1, os.availableParallelism());
}

export interface WorkerPoolOptions {
  count: number;
  work: Channel<WorkItem>;
  results: Channel<ResultItem>;
  checksum: ChecksumFunction;
  logger?: Logger;
}

/**
 * Start `count` interchangeable workers. Each returned promise settles with
 * the number of files that worker checksummed, once it has received its
 * STOP; awaiting all of them is the join.
 */
export function startWorkers({
  count,
  work,
  results,
  checksum,
  logger,
}: WorkerPoolOptions): Promise<number>[] {
  return Array.from({ length: count }, (_, id) =>
    runWorker(id, work, results, checksum, logger),
  );
}

async function runWorker(
  id: number,
  work: Channel<WorkItem>,
  results: Channel<ResultItem>,
  checksum: ChecksumFunction,
  logger?: Logger,
): Promise<number> {
  let processed = 0;
  for (;;) {
    const item = await work.receive();
    if (item === STOP) {
      logger?.debug("worker stopped", { worker: id, processed });
      return processed;
    }
    const outcome = await safeChecksum(checksum, item);
    await results.send({ file: item.key, outcome });
    processed += 1;
  }
}

async function safeChecksum(
  checksum: ChecksumFunction,
  file: FileDescriptor,
): Promise<ChecksumOutcome> {
  try {
    return await checksum(file);
  } catch (err) {
    return { ok: false, reason: describeError(err) };
  }
}
