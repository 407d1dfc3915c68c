import { spawn } from "node:child_process";
import { EventEmitter } from "node:events";
import { Readable } from "node:stream";
import { ErrorReporter } from "../notify/error-reporter";
import { ProbeMetrics, ProbeResult } from "../types";
import { parseProbeOutput } from "./parser";

export interface ProbeExecutor {
  run(target: string, count: number, intervalSec: number): Promise<ProbeResult>;
}

export interface ProbeProcess extends EventEmitter {
  stdout: Readable | null;
  stderr: Readable | null;
  kill(signal?: NodeJS.Signals): boolean;
}

export type SpawnProbe = (command: string, args: string[]) => ProbeProcess;

export interface PingExecutorOptions {
  command?: string;
  timeoutGraceSeconds?: number;
  spawnProcess?: SpawnProbe;
  errorReporter?: ErrorReporter;
}

export const defaultTimeoutGraceSeconds = 60;

export const buildPingArgs = (target: string, count: number, intervalSec: number): string[] => [
  "-c",
  String(count),
  "-i",
  String(intervalSec),
  target
];

// Rounded to the microsecond first so 3 × 0.2 s stays 600 ms.
export const probeTimeoutMs = (count: number, intervalSec: number, graceSeconds = defaultTimeoutGraceSeconds): number =>
  Math.ceil(Math.round((count * intervalSec + graceSeconds) * 1e6) / 1e3);

// Largest delay setTimeout honours; longer deadlines are re-armed in steps.
export const maxTimerDelayMs = 2_147_483_647;

const spawnChild: SpawnProbe = (command, args) => spawn(command, args, { windowsHide: true });

const isMissingCommand = (error: Error): boolean => "code" in error && error.code === "ENOENT";

type Settlement =
  | { kind: "exited"; stdout: string; stderr: string }
  | { kind: "timed_out" }
  | { kind: "spawn_failed"; error: Error };

export class PingExecutor implements ProbeExecutor {
  private readonly command: string;
  private readonly timeoutGraceSeconds: number;
  private readonly spawnProcess: SpawnProbe;
  private readonly errorReporter?: ErrorReporter;

  constructor(options: PingExecutorOptions = {}) {
    this.command = options.command ?? "ping";
    this.timeoutGraceSeconds = options.timeoutGraceSeconds ?? defaultTimeoutGraceSeconds;
    this.spawnProcess = options.spawnProcess ?? spawnChild;
    this.errorReporter = options.errorReporter;
  }

  async run(target: string, count: number, intervalSec: number): Promise<ProbeResult> {
    const args = buildPingArgs(target, count, intervalSec);
    const timeoutMs = probeTimeoutMs(count, intervalSec, this.timeoutGraceSeconds);
    const settlement = await this.execute(args, timeoutMs);
    const base = { target, count, intervalSec };

    if (settlement.kind === "exited") {
      return { ...base, ...parseProbeOutput(settlement.stdout, settlement.stderr, count) };
    }

    if (settlement.kind === "timed_out") {
      await this.errorReporter?.report(
        new Error(`${this.command} ${args.join(" ")} exceeded ${timeoutMs}ms`),
        "probe executor: timeout"
      );
      return { ...base, ...failedMetrics(count, "timed out") };
    }

    const { error } = settlement;
    if (isMissingCommand(error)) {
      await this.errorReporter?.report(error, "probe executor: command not found");
      return { ...base, ...failedMetrics(0, `${this.command} command not found`) };
    }

    await this.errorReporter?.report(error, "probe executor: spawn failed");
    return { ...base, ...failedMetrics(0, error.message) };
  }

  private spawn(args: string[]): ProbeProcess | Error {
    try {
      return this.spawnProcess(this.command, args);
    } catch (error) {
      return error instanceof Error ? error : new Error(String(error));
    }
  }

  private execute(args: string[], timeoutMs: number): Promise<Settlement> {
    return new Promise((resolve) => {
      const child = this.spawn(args);
      if (child instanceof Error) {
        resolve({ kind: "spawn_failed", error: child });
        return;
      }

      const stdoutChunks: Buffer[] = [];
      const stderrChunks: Buffer[] = [];
      let settled = false;

      const finish = (settlement: Settlement): void => {
        if (settled) {
          return;
        }

        settled = true;
        clearTimeout(timeoutHandle);
        resolve(settlement);
      };

      const deadline = Date.now() + timeoutMs;
      let timeoutHandle: NodeJS.Timeout | undefined;
      const armTimeout = (): void => {
        const remaining = Math.max(0, deadline - Date.now());
        timeoutHandle = setTimeout(() => {
          if (settled) {
            return;
          }
          if (Date.now() < deadline) {
            armTimeout();
            return;
          }
          child.kill();
          finish({ kind: "timed_out" });
        }, Math.min(remaining, maxTimerDelayMs));
      };
      armTimeout();

      child.stdout?.on("data", (chunk: Buffer) => {
        stdoutChunks.push(chunk);
      });

      child.stderr?.on("data", (chunk: Buffer) => {
        stderrChunks.push(chunk);
      });

      child.on("error", (error: Error) => {
        finish({ kind: "spawn_failed", error });
      });

      child.on("close", () => {
        finish({
          kind: "exited",
          stdout: Buffer.concat(stdoutChunks).toString("utf8"),
          stderr: Buffer.concat(stderrChunks).toString("utf8")
        });
      });
    });
  }
}

const failedMetrics = (transmitted: number, error: string): ProbeMetrics => ({
  transmitted,
  received: 0,
  lossPct: 100,
  rawSummary: "",
  error
});
