#!/usr/bin/env node
// src/cli.ts
import { readFileSync } from "node:fs";
import path from "node:path";
import { buildProgram, runCheck, type CheckCliOptions } from "./check.js";
import { cliEntrypoint } from "./cli-util.js";

function packageVersion(): string {
  try {
    const raw: unknown = JSON.parse(
      readFileSync(path.join(__dirname, "..", "package.json"), "utf8"),
    );
    if (raw && typeof raw === "object" && "version" in raw) {
      return String(raw.version);
    }
  } catch {
    // running from an unusual layout; fall through
  }
  return "unknown";
}

const program = buildProgram().version(packageVersion());

cliEntrypoint(
  program,
  async (cmd) => {
    const [configPath] = cmd.args;
    const controller = new AbortController();
    const abort = () => controller.abort();
    process.once("SIGINT", abort);
    process.once("SIGTERM", abort);
    try {
      return await runCheck(configPath, cmd.opts<CheckCliOptions>(), {
        signal: controller.signal,
      });
    } finally {
      process.off("SIGINT", abort);
      process.off("SIGTERM", abort);
    }
  },
  { label: "check" },
);
