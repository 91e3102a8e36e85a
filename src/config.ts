// src/config.ts
import { readFile } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { ConfigError, describeError } from "./errors.js";
import type { KeyBy } from "./types.js";

const ConfigSchema = z.object({
  folders: z.array(z.string().min(1)).min(1, "at least one folder is required"),
  storage: z.string().min(1, "storage path is required"),
  ignored: z.array(z.string()).default([]),
  ignore_patterns: z.array(z.string()).default([]),
  logfile: z.string().min(1).optional(),
  slack_chat_id: z.string().optional(),
  slack_token: z.string().optional(),
  webhook_url: z.string().url().optional(),
  heading: z.string().optional(),
  parallelism: z.number().int().min(0).default(0),
  hash: z.string().optional(),
  chunk_size: z.number().int().positive().optional(),
  detect_deleted: z.boolean().default(false),
  key_by: z.enum(["resolved", "configured"]).default("resolved"),
});

export type RawConfig = z.input<typeof ConfigSchema>;

export interface SlackConfig {
  token: string;
  channel: string;
}

export interface ScanConfig {
  folders: string[];
  storage: string;
  ignored: string[];
  ignorePatterns: string[];
  logFile?: string;
  slack?: SlackConfig;
  webhookUrl?: string;
  heading?: string;
  parallelism: number;
  hash?: string;
  chunkSize?: number;
  detectDeleted: boolean;
  keyBy: KeyBy;
}

function envNumber(
  env: NodeJS.ProcessEnv,
  key: string,
): number | undefined {
  const raw = env[key];
  if (!raw) return undefined;
  const n = Number(raw);
  return Number.isInteger(n) && n >= 0 ? n : undefined;
}

/**
 * Validate a parsed config object. Relative paths are resolved against
 * `baseDir` (the config file's directory).
 */
export function parseConfig(
  raw: unknown,
  { baseDir = process.cwd(), env = process.env }: {
    baseDir?: string;
    env?: NodeJS.ProcessEnv;
  } = {},
): ScanConfig {
  const parsed = ConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join(".") || "<root>"}: ${i.message}`)
      .join("; ");
    throw new ConfigError(`invalid config: ${issues}`, parsed.error);
  }
  const c = parsed.data;
  const abs = (p: string) => path.resolve(baseDir, p);
  if (!!c.slack_token !== !!c.slack_chat_id) {
    throw new ConfigError(
      "invalid config: slack_token and slack_chat_id must be set together",
    );
  }
  return {
    folders: c.folders.map(abs),
    storage: abs(c.storage),
    ignored: c.ignored.map(abs),
    ignorePatterns: c.ignore_patterns,
    logFile: c.logfile ? abs(c.logfile) : undefined,
    slack:
      c.slack_token && c.slack_chat_id
        ? { token: c.slack_token, channel: c.slack_chat_id }
        : undefined,
    webhookUrl: c.webhook_url,
    heading: c.heading,
    parallelism: envNumber(env, "SUMWATCH_PARALLELISM") ?? c.parallelism,
    hash: c.hash,
    chunkSize: c.chunk_size,
    detectDeleted: c.detect_deleted,
    keyBy: c.key_by,
  };
}

export async function loadConfig(
  file: string,
  env: NodeJS.ProcessEnv = process.env,
): Promise<ScanConfig> {
  const abs = path.resolve(file);
  let text: string;
  try {
    text = await readFile(abs, "utf8");
  } catch (err) {
    throw new ConfigError(
      `cannot read config '${abs}': ${describeError(err)}`,
      err,
    );
  }
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new ConfigError(
      `config '${abs}' is not valid JSON: ${describeError(err)}`,
      err,
    );
  }
  return parseConfig(raw, { baseDir: path.dirname(abs), env });
}
