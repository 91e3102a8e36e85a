import fsp from "node:fs/promises";
import { join } from "node:path";
import { loadConfig, parseConfig } from "../config.js";
import { ConfigError } from "../errors.js";
import { mkTmp } from "./util.js";

describe("parseConfig", () => {
  const base = { folders: ["data", "/srv/www"], storage: "state/sums.json" };

  test("resolves paths against the config directory and fills defaults", () => {
    const config = parseConfig(base, { baseDir: "/etc/sumwatch", env: {} });
    expect(config).toEqual({
      folders: ["/etc/sumwatch/data", "/srv/www"],
      storage: "/etc/sumwatch/state/sums.json",
      ignored: [],
      ignorePatterns: [],
      logFile: undefined,
      slack: undefined,
      webhookUrl: undefined,
      heading: undefined,
      parallelism: 0,
      hash: undefined,
      chunkSize: undefined,
      detectDeleted: false,
      keyBy: "resolved",
    });
  });

  test("maps the snake_case fields", () => {
    const config = parseConfig(
      {
        ...base,
        ignored: ["data/cache"],
        ignore_patterns: ["*.tmp"],
        logfile: "sumwatch.log",
        slack_token: "test-secret",
        slack_chat_id: "C0123",
        webhook_url: "https://hooks.example.test/sumwatch",
        heading: "Files changed on web01",
        parallelism: 4,
        hash: "sha256",
        chunk_size: 4096,
        detect_deleted: true,
        key_by: "configured",
      },
      { baseDir: "/etc/sumwatch", env: {} },
    );
    expect(config.ignored).toEqual(["/etc/sumwatch/data/cache"]);
    expect(config.ignorePatterns).toEqual(["*.tmp"]);
    expect(config.logFile).toBe("/etc/sumwatch/sumwatch.log");
    expect(config.slack).toEqual({ token: "test-secret", channel: "C0123" });
    expect(config.webhookUrl).toBe("https://hooks.example.test/sumwatch");
    expect(config.parallelism).toBe(4);
    expect(config.chunkSize).toBe(4096);
    expect(config.detectDeleted).toBe(true);
    expect(config.keyBy).toBe("configured");
  });

  test("the environment can override parallelism", () => {
    const env = { SUMWATCH_PARALLELISM: "3" };
    expect(parseConfig(base, { baseDir: "/", env }).parallelism).toBe(3);
    const bogus = { SUMWATCH_PARALLELISM: "lots" };
    expect(parseConfig(base, { baseDir: "/", env: bogus }).parallelism).toBe(0);
  });

  test("reports every invalid field", () => {
    expect(() =>
      parseConfig({ folders: [], parallelism: -1 }, { env: {} }),
    ).toThrow(ConfigError);
    try {
      parseConfig({ folders: [], parallelism: -1 }, { env: {} });
    } catch (err) {
      const message = err instanceof Error ? err.message : "";
      expect(message).toMatch(/^invalid config: /);
      expect(message).toContain("folders: at least one folder is required");
      expect(message).toContain("storage: Required");
      expect(message).toContain("parallelism:");
    }
  });

  test("slack needs both the token and the chat id", () => {
    expect(() =>
      parseConfig({ ...base, slack_token: "test-secret" }, { env: {} }),
    ).toThrow("invalid config: slack_token and slack_chat_id must be set together");
  });

  test("rejects a config that is not an object", () => {
    expect(() => parseConfig(["nope"], { env: {} })).toThrow(/^invalid config: <root>/);
  });
});

describe("loadConfig", () => {
  let tmp: string;

  beforeAll(async () => {
    tmp = await mkTmp("sumwatch-config-");
  });

  afterAll(async () => {
    await fsp.rm(tmp, { recursive: true, force: true });
  });

  test("reads a JSON file relative to its own directory", async () => {
    const file = join(tmp, "sumwatch.json");
    await fsp.writeFile(
      file,
      JSON.stringify({ folders: ["www"], storage: "sums.json" }),
    );
    const config = await loadConfig(file, {});
    expect(config.folders).toEqual([join(tmp, "www")]);
    expect(config.storage).toBe(join(tmp, "sums.json"));
  });

  test("a missing file is a config error", async () => {
    await expect(loadConfig(join(tmp, "absent.json"), {})).rejects.toThrow(
      /^cannot read config '.*absent\.json': ENOENT/,
    );
  });

  test("malformed JSON is a config error", async () => {
    const file = join(tmp, "broken.json");
    await fsp.writeFile(file, "{ folders: ");
    await expect(loadConfig(file, {})).rejects.toBeInstanceOf(ConfigError);
    await expect(loadConfig(file, {})).rejects.toThrow(/is not valid JSON/);
  });
});
