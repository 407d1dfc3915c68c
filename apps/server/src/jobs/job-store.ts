import { readFile } from "node:fs/promises";
import { ErrorReporter } from "../notify/error-reporter";
import { Job, JobPatch } from "../types";
import { isMissingFile, writeJsonAtomic } from "./json-file";
import { jobsDocumentSchema } from "./schemas";

export interface JobStoreOptions {
  filePath: string;
  errorReporter: ErrorReporter;
}

interface Commit<T> {
  result: T;
  next?: Job[];
}

type CommitAttempt<T> = { written: true; result: T } | { written: false; error: unknown };

// Errors are reported only after the exclusive section is released.
export class JobStore {
  private readonly filePath: string;
  private readonly errorReporter: ErrorReporter;
  private tail: Promise<void> = Promise.resolve();

  constructor(options: JobStoreOptions) {
    this.filePath = options.filePath;
    this.errorReporter = options.errorReporter;
  }

  async loadAll(): Promise<Job[]> {
    try {
      return await this.exclusive(() => this.read());
    } catch (error) {
      await this.errorReporter.report(error, "job store: loadAll");
      return [];
    }
  }

  saveAll(jobs: Job[]): Promise<void> {
    return this.commit(async () => ({ result: undefined, next: jobs }));
  }

  async getByName(name: string): Promise<Job | undefined> {
    const jobs = await this.loadAll();
    return jobs.find((job) => job.name === name);
  }

  add(job: Job): Promise<boolean> {
    return this.commit(async (): Promise<Commit<boolean>> => {
      const jobs = await this.read();
      if (jobs.some((existing) => existing.name === job.name)) {
        return { result: false };
      }

      return { result: true, next: [...jobs, { ...job }] };
    });
  }

  update(name: string, patch: JobPatch): Promise<boolean> {
    return this.commit(async (): Promise<Commit<boolean>> => {
      const jobs = await this.read();
      const index = jobs.findIndex((job) => job.name === name);
      if (index === -1) {
        return { result: false };
      }

      const next = [...jobs];
      next[index] = mergeJob(jobs[index], patch);
      return { result: true, next };
    });
  }

  delete(name: string): Promise<boolean> {
    return this.commit(async (): Promise<Commit<boolean>> => {
      const jobs = await this.read();
      const remaining = jobs.filter((job) => job.name !== name);
      if (remaining.length === jobs.length) {
        return { result: false };
      }

      return { result: true, next: remaining };
    });
  }

  private exclusive<T>(task: () => Promise<T>): Promise<T> {
    const result = this.tail.then(task);
    this.tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }

  private async commit<T>(plan: () => Promise<Commit<T>>): Promise<T> {
    const attempt = await this.exclusive(async (): Promise<CommitAttempt<T>> => {
      const { result, next } = await plan();
      if (next) {
        try {
          await writeJsonAtomic(this.filePath, { jobs: next });
        } catch (error) {
          return { written: false, error };
        }
      }
      return { written: true, result };
    });

    if (!attempt.written) {
      await this.errorReporter.report(attempt.error, "job store: write");
      throw attempt.error;
    }
    return attempt.result;
  }

  private async read(): Promise<Job[]> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, "utf8");
    } catch (error) {
      if (isMissingFile(error)) {
        await writeJsonAtomic(this.filePath, { jobs: [] });
        return [];
      }
      throw error;
    }

    const document = jobsDocumentSchema.parse(JSON.parse(raw));
    return document.jobs.map(({ lastRunAt, ...job }) => (lastRunAt ? { ...job, lastRunAt } : job));
  }
}

const mergeJob = (job: Job, patch: JobPatch): Job => {
  const merged: Job = { ...job };
  if (patch.target !== undefined) {
    merged.target = patch.target;
  }
  if (patch.intervalSec !== undefined) {
    merged.intervalSec = patch.intervalSec;
  }
  if (patch.count !== undefined) {
    merged.count = patch.count;
  }
  if (patch.scheduleMinutes !== undefined) {
    merged.scheduleMinutes = patch.scheduleMinutes;
  }
  if (patch.lastRunAt !== undefined) {
    merged.lastRunAt = patch.lastRunAt;
  }
  return merged;
};
