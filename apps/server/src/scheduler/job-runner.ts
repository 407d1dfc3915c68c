import { JobStore } from "../jobs/job-store";
import { ErrorReporter } from "../notify/error-reporter";
import { deliverSafely, Notifier } from "../notify/notifier";
import { ProbeExecutor } from "../probe/executor";
import { formatReport, formatSkippedNotice } from "../probe/report";
import { Job, JobRunOutcome } from "../types";

export interface JobRunnerOptions {
  store: JobStore;
  executor: ProbeExecutor;
  notifier: Notifier;
  recipient: string;
  errorReporter: ErrorReporter;
  now?: () => Date;
}

// Never rejects: anything unexpected becomes a `failed` outcome.
export class JobRunner {
  private readonly store: JobStore;
  private readonly executor: ProbeExecutor;
  private readonly notifier: Notifier;
  private readonly recipient: string;
  private readonly errorReporter: ErrorReporter;
  private readonly now: () => Date;

  constructor(options: JobRunnerOptions) {
    this.store = options.store;
    this.executor = options.executor;
    this.notifier = options.notifier;
    this.recipient = options.recipient;
    this.errorReporter = options.errorReporter;
    this.now = options.now ?? (() => new Date());
  }

  notify(text: string): Promise<boolean> {
    return deliverSafely(this.notifier, this.recipient, text);
  }

  async execute(job: Job): Promise<JobRunOutcome> {
    try {
      if (!job.target.trim()) {
        await this.notify(formatSkippedNotice(job.name));
        return { status: "skipped", jobName: job.name, reason: "missing target" };
      }

      const result = await this.executor.run(job.target, job.count, job.intervalSec);
      const delivered = await this.notify(formatReport(job.name, result));
      // Advances even when the probe failed, so an unreachable target waits for its schedule.
      await this.store.update(job.name, { lastRunAt: this.now().toISOString() });

      return { status: "completed", jobName: job.name, result, delivered };
    } catch (error) {
      await this.errorReporter.report(error, `job runner: execute name=${job.name}`);
      return {
        status: "failed",
        jobName: job.name,
        reason: error instanceof Error ? error.message : String(error)
      };
    }
  }
}
