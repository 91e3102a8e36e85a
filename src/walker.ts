// src/walker.ts
import * as walk from "@nodelib/fs.walk";
import { lstat, realpath, stat } from "node:fs/promises";
import path from "node:path";
import type { Stats } from "node:fs";
import type { Readable } from "node:stream";
import { ENTRY_BUFFER, WALK_CONCURRENCY } from "./constants.js";
import { describeError } from "./errors.js";
import type { Ignorer } from "./ignore.js";
import { reroot, toRel } from "./path-rel.js";
import type { FileDescriptor, KeyBy, ScanError } from "./types.js";

export interface ResolvedRoot {
  /** The root as configured (absolute, not dereferenced). */
  configured: string;
  /** Where the walk actually runs; differs when the root is a symlink. */
  resolved: string;
}

/**
 * Only the top-level root may be a symlink; it is dereferenced once here,
 * before the walk starts. Throws when the root cannot be stat'd.
 */
export async function resolveRoot(root: string): Promise<ResolvedRoot> {
  const configured = path.resolve(root);
  const st = await lstat(configured);
  if (!st.isSymbolicLink()) {
    return { configured, resolved: configured };
  }
  return { configured, resolved: await realpath(configured) };
}

export interface WalkOptions {
  ignorer: Ignorer;
  onError: (err: ScanError) => void;
  keyBy?: KeyBy;
  signal?: AbortSignal;
  concurrency?: number;
  /** Stats each walked entry; `fs.promises.lstat` unless replaced. */
  lstat?: (path: string) => Promise<Stats>;
}

/**
 * Yields every regular file under `root`. Directories are descended but not
 * yielded, symlinks are never followed, and ignored entries (with everything
 * beneath them) are skipped. Entries that cannot be read are reported
 * through `onError` and the walk carries on with their siblings.
 */
export async function* walkRoot(
  root: ResolvedRoot,
  {
    ignorer,
    onError,
    keyBy = "resolved",
    signal,
    concurrency = WALK_CONCURRENCY,
    lstat: lstatImpl = lstat,
  }: WalkOptions,
): AsyncGenerator<FileDescriptor> {
  const keyFor = (abs: string) =>
    keyBy === "configured" ? reroot(abs, root.resolved, root.configured) : abs;
  const isIgnored = (abs: string, isDir: boolean) =>
    ignorer.ignores(
      identities(abs, root),
      toRel(abs, root.resolved),
      isDir,
    );

  let rootStat: Stats;
  try {
    rootStat = await stat(root.resolved);
  } catch (err) {
    onError({ kind: "walk", path: root.configured, reason: describeError(err) });
    return;
  }
  if (rootStat.isFile()) {
    yield describe(root.resolved, keyFor(root.resolved), rootStat);
    return;
  }
  if (!rootStat.isDirectory()) {
    onError({
      kind: "walk",
      path: root.configured,
      reason: "not a directory or regular file",
    });
    return;
  }

  const stream = walk.walkStream(root.resolved, {
    followSymbolicLinks: false,
    stats: false,
    concurrency,
    // Do not descend into ignored directories
    deepFilter: (e) => !isIgnored(e.path, true),
    // Do not emit directories or ignored entries
    entryFilter: (e) =>
      !e.dirent.isDirectory() && !isIgnored(e.path, false),
    errorFilter: (err) => {
      onError({
        kind: "walk",
        path: err.path ?? root.resolved,
        reason: err.message,
      });
      return true;
    },
  });

  for await (const entry of drainEntries(stream)) {
    if (signal?.aborted) return;
    let st: Stats;
    try {
      st = await lstatImpl(entry.path);
    } catch (err) {
      onError({ kind: "walk", path: entry.path, reason: describeError(err) });
      continue;
    }
    // symlinks, sockets, fifos, devices
    if (!st.isFile()) continue;
    yield describe(entry.path, keyFor(entry.path), st);
  }
}

/**
 * Reads the walk stream through its events. Its async iterator is not used:
 * fs.walk's stream never finishes destroying, so the iterator would not
 * settle after `end`.
 */
async function* drainEntries(stream: Readable): AsyncGenerator<walk.Entry> {
  const buffered: walk.Entry[] = [];
  let ended = false;
  let failure: unknown;
  let wake: (() => void) | null = null;
  const notify = () => {
    const resume = wake;
    wake = null;
    resume?.();
  };
  const onData = (entry: walk.Entry) => {
    buffered.push(entry);
    if (buffered.length >= ENTRY_BUFFER) stream.pause();
    notify();
  };
  const onEnd = () => {
    ended = true;
    notify();
  };
  const onFailure = (err: unknown) => {
    failure = err ?? new Error("walk failed");
    ended = true;
    notify();
  };
  stream.on("data", onData);
  stream.once("end", onEnd);
  stream.once("error", onFailure);
  try {
    for (;;) {
      const entry = buffered.shift();
      if (entry) {
        if (stream.isPaused() && buffered.length < ENTRY_BUFFER / 2) {
          stream.resume();
        }
        yield entry;
        continue;
      }
      if (failure !== undefined) throw failure;
      if (ended) return;
      await new Promise<void>((resolve) => (wake = resolve));
    }
  } finally {
    stream.off("data", onData);
    stream.off("end", onEnd);
    stream.off("error", onFailure);
    if (!ended) stream.destroy();
  }
}

function identities(abs: string, root: ResolvedRoot): string[] {
  if (root.configured === root.resolved) return [abs];
  return [abs, reroot(abs, root.resolved, root.configured)];
}

function describe(abs: string, key: string, st: Stats): FileDescriptor {
  return {
    path: abs,
    key,
    size: st.size,
    mode: st.mode,
    modTime: st.mtimeMs,
  };
}
