// src/hash-worker.ts
import { Worker } from "node:worker_threads";
import { z } from "zod";
import { DEFAULT_CHUNK_SIZE } from "./constants.js";
import { ConfigError } from "./errors.js";
import { defaultHashAlg, type HashAlg } from "./hash.js";
import type { ChecksumFunction, ChecksumOutcome, FileDescriptor } from "./types.js";

/**
 * Body of every hashing thread. It is started from its own source text
 * (`eval: true`) so the same code runs under ts-jest and from dist/; it may
 * only use what it requires itself.
 */
function hashWorkerMain(): void {
  const threads: typeof import("node:worker_threads") = require("node:worker_threads");
  const fs: typeof import("node:fs") = require("node:fs");
  const crypto: typeof import("node:crypto") = require("node:crypto");

  const port = threads.parentPort;
  if (!port) {
    throw new Error("hash worker must run in a worker thread");
  }
  const { algorithm, chunkSize }: { algorithm: string; chunkSize: number } =
    threads.workerData;
  const buf = Buffer.allocUnsafe(chunkSize);

  const messageOf = (err: unknown): string =>
    typeof err === "object" &&
    err !== null &&
    "message" in err &&
    typeof err.message === "string"
      ? err.message
      : String(err);

  const digest = (
    file: string,
    size: number,
  ): { ok: true; digest: string } | { ok: false; reason: string } => {
    let fd: number;
    try {
      fd = fs.openSync(file, "r");
    } catch (err) {
      return { ok: false, reason: messageOf(err) };
    }
    try {
      const hash = crypto.createHash(algorithm);
      for (let offset = 0; offset < size; offset += chunkSize) {
        const length = Math.min(chunkSize, size - offset);
        let got = 0;
        while (got < length) {
          const n = fs.readSync(fd, buf, got, length - got, offset + got);
          if (n === 0) break;
          got += n;
        }
        if (got < length) {
          return {
            ok: false,
            reason: `file ended at ${offset + got} bytes, expected ${size}`,
          };
        }
        hash.update(buf.subarray(0, length));
      }
      return { ok: true, digest: hash.digest("hex") };
    } catch (err) {
      return { ok: false, reason: messageOf(err) };
    } finally {
      fs.closeSync(fd);
    }
  };

  port.on("message", (job: { id: number; path: string; size: number }) => {
    port.postMessage({ id: job.id, outcome: digest(job.path, job.size) });
  });
}

const WORKER_SOURCE = `(${hashWorkerMain.toString()})();`;

const ReplySchema = z.object({
  id: z.number(),
  outcome: z.discriminatedUnion("ok", [
    z.object({ ok: z.literal(true), digest: z.string() }),
    z.object({ ok: z.literal(false), reason: z.string() }),
  ]),
});

type PendingJob = {
  id: number;
  resolve: (outcome: ChecksumOutcome) => void;
  reject: (err: Error) => void;
};

/** One thread, one job at a time. Respawned if it dies mid-scan. */
class HashThread {
  private worker: Worker;
  private current: PendingJob | null = null;
  private nextId = 0;
  private closing = false;

  constructor(
    private readonly algorithm: string,
    private readonly chunkSize: number,
  ) {
    this.worker = this.spawn();
  }

  private spawn(): Worker {
    const worker = new Worker(WORKER_SOURCE, {
      eval: true,
      workerData: { algorithm: this.algorithm, chunkSize: this.chunkSize },
    });
    worker.on("message", (msg: unknown) => {
      const job = this.current;
      if (!job) return;
      this.current = null;
      const reply = ReplySchema.safeParse(msg);
      if (!reply.success || reply.data.id !== job.id) {
        job.reject(new Error("unexpected reply from hash worker"));
        return;
      }
      job.resolve(reply.data.outcome);
    });
    worker.on("error", (err) => this.fail(err));
    worker.on("exit", (code) => {
      this.fail(new Error(`hash worker exited with code ${code}`));
      if (!this.closing) this.worker = this.spawn();
    });
    return worker;
  }

  private fail(err: Error): void {
    const job = this.current;
    this.current = null;
    job?.reject(err);
  }

  run(file: FileDescriptor): Promise<ChecksumOutcome> {
    return new Promise((resolve, reject) => {
      const id = this.nextId++;
      this.current = { id, resolve, reject };
      this.worker.postMessage({ id, path: file.path, size: file.size });
    });
  }

  async terminate(): Promise<void> {
    this.closing = true;
    await this.worker.terminate();
  }
}

export interface HashThreadPoolOptions {
  threads: number;
  algorithm?: HashAlg;
  chunkSize?: number;
}

/**
 * Chunked checksums computed on `worker_threads`, so digesting runs on every
 * core instead of the main event loop. Reads follow the same rules as
 * `createChunkedChecksum`.
 */
export class HashThreadPool {
  private readonly threads: HashThread[];
  private readonly free: HashThread[];
  private readonly waiters: ((thread: HashThread) => void)[] = [];

  constructor({
    threads,
    algorithm = defaultHashAlg(),
    chunkSize = DEFAULT_CHUNK_SIZE,
  }: HashThreadPoolOptions) {
    if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
      throw new ConfigError(`chunk size must be a positive integer, got ${chunkSize}`);
    }
    if (!Number.isInteger(threads) || threads < 1) {
      throw new ConfigError(`thread count must be at least 1, got ${threads}`);
    }
    this.threads = Array.from(
      { length: threads },
      () => new HashThread(algorithm, chunkSize),
    );
    this.free = [...this.threads];
  }

  get size(): number {
    return this.threads.length;
  }

  readonly checksum: ChecksumFunction = async (file) => {
    const thread = await this.acquire();
    try {
      return await thread.run(file);
    } finally {
      this.release(thread);
    }
  };

  async close(): Promise<void> {
    await Promise.all(this.threads.map((t) => t.terminate()));
  }

  private acquire(): Promise<HashThread> {
    const thread = this.free.pop();
    if (thread) return Promise.resolve(thread);
    return new Promise((resolve) => this.waiters.push(resolve));
  }

  private release(thread: HashThread): void {
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(thread);
    } else {
      this.free.push(thread);
    }
  }
}
