import { JobStore } from "../jobs/job-store";
import { ErrorReporter } from "../notify/error-reporter";
import { JobRunOutcome } from "../types";
import { JobRunner } from "./job-runner";
import { computeNextRun, isDue } from "./schedule";

export const defaultTickIntervalMs = 10_000;

export interface SchedulerTickOptions {
  store: JobStore;
  runner: JobRunner;
  errorReporter: ErrorReporter;
  tickIntervalMs?: number;
  now?: () => Date;
}

/**
 * Polls the job store on a fixed period and runs every due job, one after
 * another, inside the tick. A slow probe delays the jobs behind it; precision
 * is bounded by the tick period. Replacing the poll with a min-heap keyed by
 * next-due time is the upgrade path if job counts grow.
 */
export class SchedulerTick {
  private readonly store: JobStore;
  private readonly runner: JobRunner;
  private readonly errorReporter: ErrorReporter;
  private readonly tickIntervalMs: number;
  private readonly now: () => Date;
  private timer: NodeJS.Timeout | null = null;
  private ticking = false;

  constructor(options: SchedulerTickOptions) {
    this.store = options.store;
    this.runner = options.runner;
    this.errorReporter = options.errorReporter;
    this.tickIntervalMs = options.tickIntervalMs ?? defaultTickIntervalMs;
    this.now = options.now ?? (() => new Date());
  }

  start(): void {
    if (this.timer) {
      return;
    }

    void this.tick();
    this.timer = setInterval(() => {
      void this.tick();
    }, this.tickIntervalMs);
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  get running(): boolean {
    return this.timer !== null;
  }

  async tick(): Promise<JobRunOutcome[]> {
    if (this.ticking) {
      console.warn("[ping-status] previous tick still running, skipping this one");
      return [];
    }

    this.ticking = true;
    const outcomes: JobRunOutcome[] = [];

    try {
      const now = this.now();
      const jobs = await this.store.loadAll();

      for (const job of jobs) {
        if (isDue(job, now)) {
          outcomes.push(await this.runner.execute(job));
        }
      }
    } catch (error) {
      await this.errorReporter.report(error, "scheduler: tick");
    } finally {
      this.ticking = false;
    }

    return outcomes;
  }

  async nextRunTimes(): Promise<Map<string, Date>> {
    const now = this.now();
    const jobs = await this.store.loadAll();
    return new Map(jobs.map((job) => [job.name, computeNextRun(job, now)]));
  }
}
