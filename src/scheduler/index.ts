// ============================================================================
// SCHEDULER
// ============================================================================
// Named daily jobs on node-cron. Owned by the entry point and handed to the
// components that register jobs.

import cron from "node-cron";
import type { ScheduledTask } from "node-cron";

import { DailyTime } from "../types/index.js";
import { formatDailyTime } from "../time/index.js";
import { createLogger, describeError, Logger } from "../logger/index.js";

export type ScheduledJob = () => Promise<unknown>;

export class Scheduler {
  private tasks = new Map<string, ScheduledTask>();
  private logger: Logger;

  constructor(
    private readonly timezone: string,
    logger?: Logger
  ) {
    this.logger = logger ?? createLogger("scheduler");
  }

  /**
   * Run `job` every day at `time` in the scheduler's timezone.
   * Registering an existing name replaces the previous job.
   */
  daily(name: string, time: DailyTime, job: ScheduledJob): void {
    this.cancel(name);

    const expression = `${time.minute} ${time.hour} * * *`;
    const task = cron.schedule(expression, () => void this.runJob(name, job), {
      timezone: this.timezone,
    });

    this.tasks.set(name, task);
    this.logger.info(`Scheduled "${name}" daily at ${formatDailyTime(time)} (${this.timezone})`);
  }

  cancel(name: string): boolean {
    const task = this.tasks.get(name);
    if (!task) return false;

    task.stop();
    this.tasks.delete(name);
    return true;
  }

  jobNames(): string[] {
    return [...this.tasks.keys()];
  }

  stopAll(): void {
    for (const task of this.tasks.values()) {
      task.stop();
    }
    this.tasks.clear();
  }

  /**
   * Run a job once, logging instead of throwing
   */
  async runJob(name: string, job: ScheduledJob): Promise<void> {
    try {
      this.logger.debug(`Running "${name}"`);
      await job();
    } catch (error) {
      this.logger.error(`Job "${name}" failed`, describeError(error));
    }
  }
}
