import fsp from "node:fs/promises";
import os from "node:os";
import { dirname, join } from "node:path";
import { digestBuffer } from "../hash.js";

export async function mkTmp(prefix: string): Promise<string> {
  // realpath so expectations match what the walker reports on macOS (/private/var)
  return fsp.realpath(await fsp.mkdtemp(join(os.tmpdir(), prefix)));
}

/** Write `{ "rel/path": contents }` under `root`, creating parents. */
export async function writeTree(
  root: string,
  files: Record<string, string | Buffer>,
): Promise<void> {
  for (const [rel, contents] of Object.entries(files)) {
    const abs = join(root, rel);
    await fsp.mkdir(dirname(abs), { recursive: true });
    await fsp.writeFile(abs, contents);
  }
}

export function sha1(contents: string | Buffer): string {
  return digestBuffer("sha1", contents);
}

export async function fileExists(p: string) {
  try {
    await fsp.stat(p);
    return true;
  } catch {
    return false;
  }
}
