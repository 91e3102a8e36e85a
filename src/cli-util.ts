// src/cli-util.ts
import type { Command } from "commander";
import { describeError } from "./errors.js";

/**
 * Parse argv with `program`, run the action it was given, and exit with the
 * code it returns. Anything thrown is fatal (exit 1).
 */
export function cliEntrypoint(
  program: Command,
  run: (program: Command) => Promise<void | number>,
  opts?: { label?: string },
): void {
  void (async () => {
    program.parse(process.argv);
    try {
      const code = await run(program);
      if (typeof code === "number") process.exit(code);
    } catch (err) {
      const label = opts?.label || program.name() || "command";
      const stack =
        typeof err === "object" && err !== null && "stack" in err
          ? err.stack
          : undefined;
      const msg = typeof stack === "string" ? stack : describeError(err);
      console.error(`${label} fatal:\n${msg}`);
      process.exit(1);
    }
  })();
}

/** Handy for tests: parse a custom argv without exiting the process */
export function parseArgs(program: Command, argv: string[]): Command {
  program.exitOverride();
  return program.parse(argv, { from: "user" });
}
