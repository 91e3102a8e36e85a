import { Channel } from "../channel.js";
import type { ChecksumFunction, ChecksumResult, FileDescriptor } from "../types.js";
import {
  DRAINED,
  STOP,
  resolveParallelism,
  startWorkers,
  type ResultItem,
  type WorkItem,
} from "../worker-pool.js";

function file(n: number): FileDescriptor {
  return { path: `/src/${n}`, key: `/key/${n}`, size: n, mode: 0o100644, modTime: 0 };
}

async function collect(results: Channel<ResultItem>): Promise<ChecksumResult[]> {
  const out: ChecksumResult[] = [];
  for (;;) {
    const item = await results.receive();
    if (item === DRAINED) return out;
    out.push(item);
  }
}

describe("worker pool", () => {
  test("every descriptor is checksummed exactly once", async () => {
    const work = new Channel<WorkItem>(2);
    const results = new Channel<ResultItem>(2);
    const seen: string[] = [];
    const checksum: ChecksumFunction = async (f) => {
      seen.push(f.path);
      await new Promise((r) => setTimeout(r, f.size % 3));
      return { ok: true, digest: `d${f.size}` };
    };
    const collecting = collect(results);
    const workers = startWorkers({ count: 4, work, results, checksum });
    for (let i = 0; i < 25; i++) await work.send(file(i));
    for (let i = 0; i < workers.length; i++) await work.send(STOP);
    const counts = await Promise.all(workers);
    await results.send(DRAINED);
    const got = await collecting;

    expect(counts.reduce((a, b) => a + b, 0)).toBe(25);
    expect(seen).toHaveLength(25);
    expect(new Set(seen).size).toBe(25);
    expect(got.map((r) => r.file).sort()).toEqual(
      Array.from({ length: 25 }, (_, i) => `/key/${i}`).sort(),
    );
  });

  test("a throwing checksum becomes a failed outcome", async () => {
    const work = new Channel<WorkItem>();
    const results = new Channel<ResultItem>();
    const checksum: ChecksumFunction = async () => {
      throw new Error("boom");
    };
    const workers = startWorkers({ count: 1, work, results, checksum });
    await work.send(file(1));
    await work.send(STOP);
    await Promise.all(workers);
    await expect(results.receive()).resolves.toEqual({
      file: "/key/1",
      outcome: { ok: false, reason: "boom" },
    });
  });

  test("each worker exits on its own STOP", async () => {
    const work = new Channel<WorkItem>();
    const results = new Channel<ResultItem>();
    const checksum: ChecksumFunction = async () => ({ ok: true, digest: "x" });
    const workers = startWorkers({ count: 3, work, results, checksum });
    let finished = 0;
    for (const w of workers) void w.then(() => (finished += 1));
    await work.send(STOP);
    await work.send(STOP);
    await new Promise((r) => setImmediate(r));
    expect(finished).toBe(2);
    await work.send(STOP);
    await Promise.all(workers);
    expect(finished).toBe(3);
  });

  test("parallelism falls back to the CPU count", () => {
    expect(resolveParallelism(3)).toBe(3);
    expect(resolveParallelism(0)).toBeGreaterThanOrEqual(1);
    expect(resolveParallelism(undefined)).toBe(resolveParallelism(0));
  });
});
