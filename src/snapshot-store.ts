// src/snapshot-store.ts
import { existsSync } from "node:fs";
import { mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { getDb } from "./db.js";
import {
  ConfigError,
  PersistenceError,
  describeError,
  errorCode,
} from "./errors.js";
import type { Snapshot } from "./types.js";

export interface SnapshotStore {
  readonly location: string;
  /** Prior state; empty on first run. */
  load(): Promise<Snapshot>;
  save(snapshot: Snapshot): Promise<void>;
}

const SnapshotSchema = z.record(z.string());
const SnapshotRowsSchema = z.array(
  z.object({ path: z.string(), checksum: z.string() }),
);

function sortedSnapshot(snapshot: Snapshot): Snapshot {
  const out: Snapshot = {};
  for (const key of Object.keys(snapshot).sort()) {
    out[key] = snapshot[key];
  }
  return out;
}

/**
 * Flat `{ path: checksum }` JSON document, keys sorted so successive
 * snapshots diff cleanly.
 */
export class JsonSnapshotStore implements SnapshotStore {
  constructor(readonly location: string) {}

  async load(): Promise<Snapshot> {
    let text: string;
    try {
      text = await readFile(this.location, "utf8");
    } catch (err) {
      if (errorCode(err) === "ENOENT") return {};
      throw new ConfigError(
        `cannot read snapshot '${this.location}': ${describeError(err)}`,
        err,
      );
    }
    if (!text.trim()) return {};
    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (err) {
      throw new ConfigError(
        `snapshot '${this.location}' is not valid JSON: ${describeError(err)}`,
        err,
      );
    }
    const parsed = SnapshotSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ConfigError(
        `snapshot '${this.location}' must map paths to checksum strings`,
        parsed.error,
      );
    }
    return parsed.data;
  }

  async save(snapshot: Snapshot): Promise<void> {
    // write to a sibling temp file and rename, so a failed write never
    // leaves a truncated snapshot behind
    const tmp = `${this.location}.${process.pid}.tmp`;
    try {
      await mkdir(path.dirname(this.location), { recursive: true });
    } catch (err) {
      throw new PersistenceError(
        `cannot write snapshot '${this.location}': ${describeError(err)}`,
        err,
      );
    }
    try {
      await writeFile(
        tmp,
        JSON.stringify(sortedSnapshot(snapshot), null, 2) + "\n",
        "utf8",
      );
      await rename(tmp, this.location);
    } catch (err) {
      await rm(tmp, { force: true });
      throw new PersistenceError(
        `cannot write snapshot '${this.location}': ${describeError(err)}`,
        err,
      );
    }
  }
}

/** Same mapping kept in a sqlite table; replaced wholesale in one transaction. */
export class SqliteSnapshotStore implements SnapshotStore {
  constructor(readonly location: string) {}

  async load(): Promise<Snapshot> {
    if (!existsSync(this.location)) return {};
    try {
      const db = getDb(this.location);
      try {
        const rows = SnapshotRowsSchema.parse(
          db.prepare(`SELECT path, checksum FROM snapshot`).all(),
        );
        const out: Snapshot = {};
        for (const row of rows) out[row.path] = row.checksum;
        return out;
      } finally {
        db.close();
      }
    } catch (err) {
      throw new ConfigError(
        `cannot read snapshot '${this.location}': ${describeError(err)}`,
        err,
      );
    }
  }

  async save(snapshot: Snapshot): Promise<void> {
    try {
      const db = getDb(this.location);
      try {
        const clear = db.prepare(`DELETE FROM snapshot`);
        const insert = db.prepare(
          `INSERT INTO snapshot(path, checksum) VALUES (?, ?)`,
        );
        const stamp = db.prepare(
          `INSERT INTO meta(key, value) VALUES ('saved_at', ?)
             ON CONFLICT(key) DO UPDATE SET value = excluded.value`,
        );
        const replaceAll = db.transaction((entries: [string, string][]) => {
          clear.run();
          for (const [file, checksum] of entries) insert.run(file, checksum);
          stamp.run(String(Date.now()));
        });
        replaceAll(Object.entries(snapshot));
      } finally {
        db.close();
      }
    } catch (err) {
      throw new PersistenceError(
        `cannot write snapshot '${this.location}': ${describeError(err)}`,
        err,
      );
    }
  }
}

const SQLITE_EXTENSIONS = new Set([".db", ".sqlite", ".sqlite3"]);

export function openSnapshotStore(location: string): SnapshotStore {
  const abs = path.resolve(location);
  return SQLITE_EXTENSIONS.has(path.extname(abs).toLowerCase())
    ? new SqliteSnapshotStore(abs)
    : new JsonSnapshotStore(abs);
}
