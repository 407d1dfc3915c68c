import { Job } from "../types";

const zonePattern = /(?:Z|[+-]\d{2}:?\d{2})$/i;

const parseLastRun = (value?: string): Date | null => {
  if (!value) {
    return null;
  }

  // Timestamps without a zone are UTC.
  const normalized = value.trim().replace(" ", "T");
  const zoned = normalized.includes("T") && !zonePattern.test(normalized) ? `${normalized}Z` : normalized;
  const parsed = new Date(zoned);
  return Number.isNaN(parsed.getTime()) ? null : parsed;
};

export const computeNextRun = (job: Job, now: Date): Date => {
  const lastRun = parseLastRun(job.lastRunAt);
  if (!lastRun) {
    return now;
  }

  const scheduleMinutes = Math.max(1, Math.trunc(job.scheduleMinutes));
  return new Date(lastRun.getTime() + scheduleMinutes * 60_000);
};

export const isDue = (job: Job, now: Date): boolean => now.getTime() >= computeNextRun(job, now).getTime();
