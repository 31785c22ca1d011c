// ============================================================================
// DAILY SUMMARY
// ============================================================================
// Groups a chat's pending tasks into today / overdue / undated and sends one
// combined message per chat once a day.

import { ITaskStore } from "../storage/index.js";
import { ChatId, DailyTime, TaskDigest } from "../types/index.js";
import { dayBounds } from "../time/index.js";
import { formatTaskList } from "../bot/format.js";
import type { ChatSender } from "../bot/sender.js";
import type { Scheduler } from "../scheduler/index.js";
import { createLogger, describeError, Logger } from "../logger/index.js";

export const DAILY_SUMMARY_JOB = "daily-summary";

// ---- Categorization ----

/**
 * Pending tasks of one chat, split into disjoint groups:
 * today is [now, end of local day), overdue is before now, undated has no due date.
 */
export async function collectDigest(
  store: ITaskStore,
  chatId: ChatId,
  now: Date,
  timezone: string
): Promise<TaskDigest> {
  const { end } = dayBounds(now, timezone);

  const [today, overdue, undated] = await Promise.all([
    store.listDueBetween(chatId, now, end),
    store.listOverdue(chatId, now),
    store.listUndated(chatId),
  ]);

  return { today, overdue, undated };
}

export function isDigestEmpty(digest: TaskDigest): boolean {
  return digest.today.length === 0 && digest.overdue.length === 0 && digest.undated.length === 0;
}

export function formatDigest(digest: TaskDigest, timezone: string): string {
  return [
    "<b>Daily summary</b>",
    "",
    "<b>Due today</b>",
    formatTaskList(digest.today, timezone, "Nothing due today."),
    "",
    "<b>Overdue</b>",
    formatTaskList(digest.overdue, timezone, "Nothing overdue."),
    "",
    "<b>No due date</b>",
    formatTaskList(digest.undated, timezone, "No undated tasks."),
  ].join("\n");
}

// ---- Job ----

export interface SummaryReport {
  sent: number;
  skipped: number;
  failed: number;
}

export interface DailySummaryJobOptions {
  store: ITaskStore;
  sender: ChatSender;
  timezone: string;
  logger?: Logger;
}

export class DailySummaryJob {
  private store: ITaskStore;
  private sender: ChatSender;
  private timezone: string;
  private logger: Logger;

  constructor(options: DailySummaryJobOptions) {
    this.store = options.store;
    this.sender = options.sender;
    this.timezone = options.timezone;
    this.logger = options.logger ?? createLogger("summary");
  }

  /**
   * Send the summary to every known chat. One chat failing does not stop the rest.
   */
  async run(now: Date = new Date()): Promise<SummaryReport> {
    const report: SummaryReport = { sent: 0, skipped: 0, failed: 0 };
    const chatIds = await this.store.listChatIds();

    for (const chatId of chatIds) {
      try {
        const digest = await collectDigest(this.store, chatId, now, this.timezone);
        if (isDigestEmpty(digest)) {
          report.skipped++;
          continue;
        }

        await this.sender.send(chatId, formatDigest(digest, this.timezone));
        report.sent++;
      } catch (error) {
        report.failed++;
        this.logger.error(`Summary for chat ${chatId} failed`, describeError(error));
      }
    }

    this.logger.info(
      `Daily summary done: ${report.sent} sent, ${report.skipped} skipped, ${report.failed} failed`
    );
    return report;
  }

  attach(scheduler: Scheduler, time: DailyTime): void {
    scheduler.daily(DAILY_SUMMARY_JOB, time, () => this.run(new Date()));
  }
}
