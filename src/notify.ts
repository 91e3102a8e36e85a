// src/notify.ts
import { z } from "zod";
import { NotifyError, describeError } from "./errors.js";
import type { Logger } from "./logger.js";
import { DEFAULT_HEADING, formatMessage, hasChanges } from "./report.js";
import type { ChangeReport } from "./types.js";

export interface Notifier {
  readonly name: string;
  notify(report: ChangeReport): Promise<void>;
}

export type FetchLike = typeof fetch;

const SLACK_POST_MESSAGE = "https://slack.com/api/chat.postMessage";

const SlackResponseSchema = z.object({
  ok: z.boolean(),
  error: z.string().optional(),
});

/** Posts the message body to a channel through `chat.postMessage`. */
export class SlackNotifier implements Notifier {
  readonly name = "slack";
  private readonly fetchImpl: FetchLike;

  constructor(
    private readonly opts: {
      token: string;
      channel: string;
      heading?: string;
      fetch?: FetchLike;
    },
  ) {
    this.fetchImpl = opts.fetch ?? fetch;
  }

  async notify(report: ChangeReport): Promise<void> {
    let res: Response;
    try {
      res = await this.fetchImpl(SLACK_POST_MESSAGE, {
        method: "POST",
        headers: {
          authorization: `Bearer ${this.opts.token}`,
          "content-type": "application/json; charset=utf-8",
        },
        body: JSON.stringify({
          channel: this.opts.channel,
          text: formatMessage(report, this.opts.heading),
        }),
      });
    } catch (err) {
      throw new NotifyError(`slack request failed: ${describeError(err)}`, err);
    }
    if (!res.ok) {
      throw new NotifyError(`slack responded ${res.status}`);
    }
    const body = SlackResponseSchema.safeParse(await res.json());
    if (!body.success) {
      throw new NotifyError("slack returned an unexpected response", body.error);
    }
    if (!body.data.ok) {
      throw new NotifyError(`slack rejected message: ${body.data.error ?? "unknown error"}`);
    }
  }
}

/** POSTs the structured report plus the rendered text as JSON. */
export class WebhookNotifier implements Notifier {
  readonly name = "webhook";
  private readonly fetchImpl: FetchLike;

  constructor(
    private readonly opts: { url: string; heading?: string; fetch?: FetchLike },
  ) {
    this.fetchImpl = opts.fetch ?? fetch;
  }

  async notify(report: ChangeReport): Promise<void> {
    let res: Response;
    try {
      res = await this.fetchImpl(this.opts.url, {
        method: "POST",
        headers: { "content-type": "application/json" },
        body: JSON.stringify({
          text: formatMessage(report, this.opts.heading),
          ...report,
        }),
      });
    } catch (err) {
      throw new NotifyError(
        `webhook request failed: ${describeError(err)}`,
        err,
      );
    }
    if (!res.ok) {
      throw new NotifyError(`webhook responded ${res.status}`);
    }
  }
}

/** Writes the message to a logger; used when no remote notifier is set up. */
export class LogNotifier implements Notifier {
  readonly name = "log";

  constructor(
    private readonly logger: Logger,
    private readonly heading: string = DEFAULT_HEADING,
  ) {}

  async notify(report: ChangeReport): Promise<void> {
    this.logger.warn(this.heading, {
      changedFiles: report.changedFiles,
      newFiles: report.newFiles,
      deletedFiles: report.deletedFiles,
    });
  }
}

/**
 * Deliver `report` through every notifier unless nothing changed. Delivery
 * failures are logged and do not fail the run. Returns the names of the
 * notifiers that delivered.
 */
export async function notifyIfChanged(
  notifiers: readonly Notifier[],
  report: ChangeReport,
  logger?: Logger,
): Promise<string[]> {
  if (!hasChanges(report)) return [];
  const delivered: string[] = [];
  for (const notifier of notifiers) {
    try {
      await notifier.notify(report);
      delivered.push(notifier.name);
      logger?.debug("notification sent", { notifier: notifier.name });
    } catch (err) {
      logger?.warn("notification failed", {
        notifier: notifier.name,
        error: describeError(err),
      });
    }
  }
  return delivered;
}
