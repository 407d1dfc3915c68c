import { mkdtemp, rm } from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";

import { JobStore } from "../../apps/server/src/jobs/job-store";
import { ErrorReporter } from "../../apps/server/src/notify/error-reporter";
import { Notifier } from "../../apps/server/src/notify/notifier";
import { ProbeExecutor } from "../../apps/server/src/probe/executor";
import { Job, ProbeResult } from "../../apps/server/src/types";

export class RecordingErrorReporter extends ErrorReporter {
  readonly reports: { error: unknown; context: string }[] = [];

  async report(error: unknown, context = ""): Promise<void> {
    this.reports.push({ error, context });
  }
}

export class RecordingNotifier implements Notifier {
  readonly messages: { recipient: string; text: string }[] = [];
  result: boolean | Error = true;

  async deliver(recipient: string, text: string): Promise<boolean> {
    this.messages.push({ recipient, text });
    if (this.result instanceof Error) {
      throw this.result;
    }
    return this.result;
  }
}

type ProbeBehaviour = (target: string, count: number, intervalSec: number) => Promise<ProbeResult>;

export const okResult = (target: string, count: number, intervalSec: number): ProbeResult => ({
  target,
  count,
  intervalSec,
  transmitted: count,
  received: count,
  lossPct: 0,
  rttMin: 1,
  rttAvg: 2,
  rttMax: 3,
  rttMdev: 0.5,
  rawSummary: "rtt min/avg/max/mdev = 1.000/2.000/3.000/0.500 ms"
});

export class FakeExecutor implements ProbeExecutor {
  readonly calls: { target: string; count: number; intervalSec: number }[] = [];
  behaviour: ProbeBehaviour = async (target, count, intervalSec) => okResult(target, count, intervalSec);

  run(target: string, count: number, intervalSec: number): Promise<ProbeResult> {
    this.calls.push({ target, count, intervalSec });
    return this.behaviour(target, count, intervalSec);
  }
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
}

export const deferred = <T>(): Deferred<T> => {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((settle) => {
    resolve = settle;
  });
  return { promise, resolve };
};

export class StalledNotifier implements Notifier {
  readonly release = deferred<boolean>();
  delivering = 0;

  deliver(): Promise<boolean> {
    this.delivering += 1;
    return this.release.promise;
  }
}

export const makeJob = (patch: Partial<Job> = {}): Job => ({
  name: "edge-gw",
  target: "10.0.0.1",
  intervalSec: 0.2,
  count: 3,
  scheduleMinutes: 5,
  ...patch
});

export interface TempStore {
  store: JobStore;
  filePath: string;
  reporter: RecordingErrorReporter;
  cleanup: () => Promise<void>;
}

export const createTempStore = async (): Promise<TempStore> => {
  const dir = await mkdtemp(path.join(os.tmpdir(), "ping-status-"));
  const filePath = path.join(dir, "jobs.json");
  const reporter = new RecordingErrorReporter();
  return {
    store: new JobStore({ filePath, errorReporter: reporter }),
    filePath,
    reporter,
    cleanup: () => rm(dir, { recursive: true, force: true })
  };
};

export const waitFor = async (predicate: () => boolean, attempts = 200): Promise<void> => {
  for (let attempt = 0; attempt < attempts; attempt += 1) {
    if (predicate()) {
      return;
    }
    await new Promise((resolve) => setTimeout(resolve, 5));
  }
  throw new Error("condition not met in time");
};
