import fsp from "node:fs/promises";
import { join } from "node:path";
import { createIgnorer } from "../ignore.js";
import type { FileDescriptor, ScanError } from "../types.js";
import { resolveRoot, walkRoot, type WalkOptions } from "../walker.js";
import { mkTmp, writeTree } from "./util.js";

async function collect(
  root: string,
  opts: Partial<WalkOptions> = {},
): Promise<{ files: FileDescriptor[]; errors: ScanError[] }> {
  const errors: ScanError[] = [];
  const files: FileDescriptor[] = [];
  for await (const f of walkRoot(await resolveRoot(root), {
    ignorer: createIgnorer(),
    onError: (e) => errors.push(e),
    ...opts,
  })) {
    files.push(f);
  }
  files.sort((a, b) => a.key.localeCompare(b.key));
  return { files, errors };
}

describe("walkRoot", () => {
  let tmp: string;
  let root: string;

  beforeAll(async () => {
    tmp = await mkTmp("sumwatch-walk-");
    root = join(tmp, "root");
    await writeTree(root, {
      "a.txt": "alpha",
      "sub/b.txt": "beta",
      "sub/deep/c.txt": "gamma",
      "skip/d.txt": "delta",
    });
    await fsp.symlink(join(root, "a.txt"), join(root, "link.txt"));
    await fsp.symlink(join(root, "sub"), join(root, "linkdir"));
    await fsp.symlink(root, join(tmp, "alias"));
  });

  afterAll(async () => {
    await fsp.rm(tmp, { recursive: true, force: true });
  });

  test("yields regular files only and never follows symlinks", async () => {
    const { files, errors } = await collect(root);
    expect(errors).toEqual([]);
    expect(files.map((f) => f.key)).toEqual([
      join(root, "a.txt"),
      join(root, "skip/d.txt"),
      join(root, "sub/b.txt"),
      join(root, "sub/deep/c.txt"),
    ]);
    const a = files[0];
    expect(a.path).toBe(join(root, "a.txt"));
    expect(a.size).toBe(5);
  });

  test("an ignored directory prunes its whole subtree", async () => {
    const { files } = await collect(root, {
      ignorer: createIgnorer({ entries: [join(root, "sub")] }),
    });
    expect(files.map((f) => f.key)).toEqual([
      join(root, "a.txt"),
      join(root, "skip/d.txt"),
    ]);
  });

  test("ignore entries are exact paths, not prefixes", async () => {
    const { files } = await collect(root, {
      ignorer: createIgnorer({ entries: [join(root, "su")] }),
    });
    expect(files).toHaveLength(4);
  });

  test("gitignore-style patterns match root-relative paths", async () => {
    const { files } = await collect(root, {
      ignorer: createIgnorer({ patterns: ["deep/", "skip"] }),
    });
    expect(files.map((f) => f.key)).toEqual([
      join(root, "a.txt"),
      join(root, "sub/b.txt"),
    ]);
  });

  test("a symlinked root is walked at its target", async () => {
    const alias = join(tmp, "alias");
    expect(await resolveRoot(alias)).toEqual({ configured: alias, resolved: root });

    const resolved = await collect(alias);
    expect(resolved.files.map((f) => f.key)).toContain(join(root, "a.txt"));

    const configured = await collect(alias, { keyBy: "configured" });
    expect(configured.files.map((f) => f.key)).toEqual([
      join(alias, "a.txt"),
      join(alias, "skip/d.txt"),
      join(alias, "sub/b.txt"),
      join(alias, "sub/deep/c.txt"),
    ]);
    expect(configured.files[0].path).toBe(join(root, "a.txt"));
  });

  test("ignore entries written against a symlinked root still apply", async () => {
    const alias = join(tmp, "alias");
    const { files } = await collect(alias, {
      ignorer: createIgnorer({ entries: [join(alias, "skip"), join(alias, "sub")] }),
    });
    expect(files.map((f) => f.key)).toEqual([join(root, "a.txt")]);
  });

  test("a root that is a file yields just that file", async () => {
    const { files } = await collect(join(root, "a.txt"));
    expect(files.map((f) => f.key)).toEqual([join(root, "a.txt")]);
  });

  test("a missing root cannot be resolved", async () => {
    await expect(resolveRoot(join(tmp, "nope"))).rejects.toThrow(/ENOENT/);
  });

  test("an entry that cannot be stat'd is reported and its siblings still walked", async () => {
    const broken = join(root, "sub/b.txt");
    const lstat = (p: string) =>
      p === broken
        ? Promise.reject(Object.assign(new Error("EIO: i/o error, lstat"), { code: "EIO" }))
        : fsp.lstat(p);
    const { files, errors } = await collect(root, { lstat });
    expect(files.map((f) => f.key)).toEqual([
      join(root, "a.txt"),
      join(root, "skip/d.txt"),
      join(root, "sub/deep/c.txt"),
    ]);
    expect(errors).toEqual([
      { kind: "walk", path: broken, reason: "EIO: i/o error, lstat" },
    ]);
  });

  test("a root that disappears after resolving is a walk error", async () => {
    const gone = join(tmp, "gone");
    await fsp.mkdir(gone);
    const resolved = await resolveRoot(gone);
    await fsp.rmdir(gone);
    const errors: ScanError[] = [];
    const files: FileDescriptor[] = [];
    for await (const f of walkRoot(resolved, {
      ignorer: createIgnorer(),
      onError: (e) => errors.push(e),
    })) {
      files.push(f);
    }
    expect(files).toEqual([]);
    expect(errors).toHaveLength(1);
    expect(errors[0]).toMatchObject({ kind: "walk", path: gone });
    expect(errors[0].reason).toMatch(/^ENOENT/);
  });

  test("runs to completion on a tree larger than the entry buffer", async () => {
    const big = join(tmp, "big");
    const files: Record<string, string> = {};
    for (let d = 0; d < 6; d++) {
      for (let f = 0; f < 120; f++) files[`d${d}/f${f}.txt`] = `${d}:${f}`;
    }
    await writeTree(big, files);
    const walked = await collect(big);
    expect(walked.errors).toEqual([]);
    expect(walked.files).toHaveLength(720);
    expect(new Set(walked.files.map((f) => f.key)).size).toBe(720);
  }, 30000);

  test("stops early when the signal is aborted", async () => {
    const controller = new AbortController();
    const keys: string[] = [];
    for await (const f of walkRoot(await resolveRoot(root), {
      ignorer: createIgnorer(),
      onError: () => {},
      signal: controller.signal,
    })) {
      keys.push(f.key);
      controller.abort();
    }
    expect(keys).toHaveLength(1);
  });
});
