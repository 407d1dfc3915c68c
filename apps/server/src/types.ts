export interface Job {
  name: string;
  target: string;
  intervalSec: number;
  count: number;
  scheduleMinutes: number;
  lastRunAt?: string;
}

export type JobInput = Omit<Job, "lastRunAt">;

export type JobEditableFields = Pick<Job, "target" | "intervalSec" | "count" | "scheduleMinutes">;

export type JobPatch = Partial<JobEditableFields> & { lastRunAt?: string };

export interface ProbeMetrics {
  transmitted: number;
  received: number;
  lossPct: number;
  rttMin?: number;
  rttAvg?: number;
  rttMax?: number;
  rttMdev?: number;
  rawSummary: string;
  error?: string;
}

export interface ProbeResult extends ProbeMetrics {
  target: string;
  count: number;
  intervalSec: number;
}

export type JobRunOutcome =
  | { status: "completed"; jobName: string; result: ProbeResult; delivered: boolean }
  | { status: "skipped"; jobName: string; reason: string }
  | { status: "failed"; jobName: string; reason: string };

export type OnDemandOutcome = JobRunOutcome | { status: "not_found"; jobName: string };

export interface ProbeDefaults {
  intervalSec: number;
  count: number;
}
