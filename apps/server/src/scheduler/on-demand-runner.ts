import { JobStore } from "../jobs/job-store";
import { ErrorReporter } from "../notify/error-reporter";
import { formatNotFoundNotice, formatRunningNotice } from "../probe/report";
import { OnDemandOutcome } from "../types";
import { JobRunner } from "./job-runner";

export interface OnDemandRunnerOptions {
  store: JobStore;
  runner: JobRunner;
  errorReporter: ErrorReporter;
}

export interface RunNowOptions {
  skipProgress?: boolean;
}

const nextTurn = (): Promise<void> => new Promise((resolve) => setImmediate(resolve));

export class OnDemandRunner {
  private readonly store: JobStore;
  private readonly runner: JobRunner;
  private readonly errorReporter: ErrorReporter;

  constructor(options: OnDemandRunnerOptions) {
    this.store = options.store;
    this.runner = options.runner;
    this.errorReporter = options.errorReporter;
  }

  dispatch(name: string, options: RunNowOptions = {}): Promise<OnDemandOutcome> {
    return nextTurn().then(() => this.run(name, options));
  }

  private async run(name: string, options: RunNowOptions): Promise<OnDemandOutcome> {
    try {
      const job = await this.store.getByName(name);
      if (!job) {
        await this.runner.notify(formatNotFoundNotice(name));
        return { status: "not_found", jobName: name };
      }

      if (!options.skipProgress) {
        await this.runner.notify(formatRunningNotice(name));
      }

      return await this.runner.execute(job);
    } catch (error) {
      await this.errorReporter.report(error, `on-demand runner: run name=${name}`);
      return {
        status: "failed",
        jobName: name,
        reason: error instanceof Error ? error.message : String(error)
      };
    }
  }
}
