// src/errors.ts

export class SumwatchError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = "SumwatchError";
  }
}

/** Config missing/invalid or prior snapshot unreadable: fatal before scanning. */
export class ConfigError extends SumwatchError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "ConfigError";
  }
}

/** New snapshot could not be written: the run fails even though the scan worked. */
export class PersistenceError extends SumwatchError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "PersistenceError";
  }
}

export class NotifyError extends SumwatchError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "NotifyError";
  }
}

// Node errors may come from another realm (Jest's sandbox): no instanceof.
export function describeError(err: unknown): string {
  if (
    typeof err === "object" &&
    err !== null &&
    "message" in err &&
    typeof err.message === "string"
  ) {
    return err.message;
  }
  return String(err);
}

export function errorCode(err: unknown): string | undefined {
  if (
    typeof err === "object" &&
    err !== null &&
    "code" in err &&
    typeof err.code === "string"
  ) {
    return err.code;
  }
  return undefined;
}
