// src/check.ts
import { Command, Option } from "commander";
import { loadConfig, type ScanConfig } from "./config.js";
import { CLI_NAME } from "./constants.js";
import { ConfigError, describeError } from "./errors.js";
import {
  listSupportedHashes,
  normalizeHashAlg,
  type HashAlg,
} from "./hash.js";
import { collectIgnoreOption } from "./ignore.js";
import {
  ConsoleLogger,
  LOG_LEVELS,
  StructuredLogger,
  fileSink,
  parseLogLevel,
  type Logger,
} from "./logger.js";
import {
  LogNotifier,
  SlackNotifier,
  WebhookNotifier,
  notifyIfChanged,
  type FetchLike,
  type Notifier,
} from "./notify.js";
import { formatScanError, renderReportTable, toChangeReport } from "./report.js";
import { scanTrees } from "./scan.js";
import { openSnapshotStore, type SnapshotStore } from "./snapshot-store.js";
import type { ScanReport, Snapshot } from "./types.js";

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_CANCELLED = 130;

export function configureCheckCommand(command: Command): Command {
  return command
    .description(
      "Checksum every file under the configured folders and report new or modified files",
    )
    .argument("<config>", "path to the JSON config file")
    .option(
      "--cpu-limit <n>",
      "number of checksum workers (0 = one per CPU)",
    )
    .option(
      "--hash <algorithm>",
      `content hash algorithm (${listSupportedHashes().join(", ")})`,
    )
    .option("--chunk-size <bytes>", "bytes per read while checksumming")
    .option(
      "-i, --ignore <path>",
      "extra path to skip (repeat or comma-separated)",
      collectIgnoreOption,
      [] as string[],
    )
    .option("--detect-deleted", "report and drop files that disappeared", false)
    .option("--json", "print the report as JSON on stdout", false)
    .option("--dry-run", "do not save the snapshot or send notifications", false)
    .addOption(
      new Option("--log-level <level>", "log verbosity")
        .choices(LOG_LEVELS)
        .default("info"),
    );
}

export function buildProgram(): Command {
  return configureCheckCommand(new Command().name(CLI_NAME));
}

export type CheckCliOptions = {
  cpuLimit?: string;
  hash?: string;
  chunkSize?: string;
  ignore?: string[];
  detectDeleted?: boolean;
  json?: boolean;
  dryRun?: boolean;
  logLevel?: string;
};

export interface CheckDeps {
  logger?: Logger;
  store?: SnapshotStore;
  notifiers?: Notifier[];
  fetch?: FetchLike;
  signal?: AbortSignal;
  out?: (text: string) => void;
  env?: NodeJS.ProcessEnv;
}

function parseCount(
  raw: string | undefined,
  flag: string,
  min = 0,
): number | undefined {
  if (raw === undefined) return undefined;
  const n = Number(raw);
  if (!Number.isInteger(n) || n < min) {
    throw new ConfigError(`${flag} must be an integer >= ${min}, got '${raw}'`);
  }
  return n;
}

export function notifiersFor(
  config: ScanConfig,
  logger: Logger,
  fetchImpl?: FetchLike,
): Notifier[] {
  const notifiers: Notifier[] = [];
  if (config.slack) {
    notifiers.push(
      new SlackNotifier({ ...config.slack, heading: config.heading, fetch: fetchImpl }),
    );
  }
  if (config.webhookUrl) {
    notifiers.push(
      new WebhookNotifier({ url: config.webhookUrl, heading: config.heading, fetch: fetchImpl }),
    );
  }
  if (!notifiers.length) {
    notifiers.push(new LogNotifier(logger.child("notify"), config.heading));
  }
  return notifiers;
}

/** Append the run's findings to the configured change log. */
export function appendChangeLog(file: string, report: ScanReport): void {
  const log = new StructuredLogger({ scope: "changes", sink: fileSink(file) });
  if (report.errors.length) {
    log.error("errors", { errors: report.errors.map(formatScanError) });
  }
  if (report.changedFiles.length) {
    log.warn("changed files/folders", { files: report.changedFiles });
  }
  if (report.newFiles.length) {
    log.warn("new files/folders", { files: report.newFiles });
  }
  if (report.deletedFiles.length) {
    log.warn("deleted files/folders", { files: report.deletedFiles });
  }
  if (!report.complete) {
    log.warn("scan cancelled; snapshot not saved");
  }
}

/**
 * One full run: load config and prior snapshot, scan, persist, report.
 * Returns the process exit code. Change detection is not a failure; only an
 * unusable config/snapshot or a failed save is.
 */
export async function runCheck(
  configPath: string,
  opts: CheckCliOptions = {},
  deps: CheckDeps = {},
): Promise<number> {
  const logger = deps.logger ?? new ConsoleLogger(parseLogLevel(opts.logLevel));
  const out = deps.out ?? ((text: string) => process.stdout.write(text + "\n"));

  let config: ScanConfig;
  let store: SnapshotStore;
  let prior: Snapshot;
  let algorithm: HashAlg;
  let parallelism: number;
  let chunkSize: number | undefined;
  try {
    config = await loadConfig(configPath, deps.env);
    parallelism = parseCount(opts.cpuLimit, "--cpu-limit") ?? config.parallelism;
    chunkSize = parseCount(opts.chunkSize, "--chunk-size", 1) ?? config.chunkSize;
    algorithm = normalizeHashAlg(opts.hash ?? config.hash);
    store = deps.store ?? openSnapshotStore(config.storage);
    prior = await store.load();
  } catch (err) {
    logger.error("cannot start scan", { error: describeError(err) });
    return EXIT_FAILURE;
  }
  logger.info("loaded prior snapshot", {
    location: store.location,
    entries: Object.keys(prior).length,
    hash: algorithm,
  });

  let report: ScanReport;
  try {
    report = await scanTrees({
      roots: config.folders,
      prior,
      ignored: [...config.ignored, ...(opts.ignore ?? [])],
      ignorePatterns: config.ignorePatterns,
      parallelism,
      algorithm,
      chunkSize,
      keyBy: config.keyBy,
      detectDeleted: opts.detectDeleted || config.detectDeleted,
      signal: deps.signal,
      logger: logger.child("scan"),
    });
  } catch (err) {
    logger.error("scan failed", { error: describeError(err) });
    return EXIT_FAILURE;
  }

  out(opts.json ? JSON.stringify(report, null, 2) : renderReportTable(report));
  for (const err of report.errors) {
    logger.warn(formatScanError(err));
  }
  if (config.logFile) {
    try {
      appendChangeLog(config.logFile, report);
    } catch (err) {
      logger.warn("cannot append to change log", {
        logfile: config.logFile,
        error: describeError(err),
      });
    }
  }

  if (!report.complete) {
    logger.warn("scan was cancelled; snapshot left untouched");
    return EXIT_CANCELLED;
  }
  if (opts.dryRun) {
    logger.info("dry run; snapshot not saved and nobody notified");
    return EXIT_OK;
  }

  try {
    await store.save(report.snapshot);
  } catch (err) {
    logger.error("cannot save snapshot", { error: describeError(err) });
    return EXIT_FAILURE;
  }

  await notifyIfChanged(
    deps.notifiers ?? notifiersFor(config, logger, deps.fetch),
    toChangeReport(report),
    logger.child("notify"),
  );
  return EXIT_OK;
}
