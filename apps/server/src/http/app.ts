import cors from "cors";
import express, { Response } from "express";
import { z } from "zod";
import { maskToken } from "../config";
import { DefaultsStore } from "../jobs/defaults-store";
import { JobStore } from "../jobs/job-store";
import { createJobSchema, defaultsSchema, runNowSchema, updateJobSchema } from "../jobs/schemas";
import { OnDemandRunner } from "../scheduler/on-demand-runner";
import { computeNextRun } from "../scheduler/schedule";
import { SchedulerTick } from "../scheduler/scheduler-tick";
import { Job, ProbeDefaults } from "../types";

export const defaultScheduleMinutes = 5;

export interface AppDependencies {
  store: JobStore;
  scheduler: SchedulerTick;
  onDemand: OnDemandRunner;
  defaults: ProbeDefaults;
  defaultsStore: DefaultsStore;
  telegramBotToken?: string;
  recipient: string;
  tickIntervalMs: number;
  now?: () => Date;
}

const serializeJob = (job: Job, now: Date) => ({
  ...job,
  nextRunAt: computeNextRun(job, now).toISOString()
});

const rejectInvalid = (res: Response, error: z.ZodError): void => {
  res.status(400).json({
    message: "Invalid request.",
    errors: error.issues
  });
};

const respondWithFailure = (res: Response, error: unknown): void => {
  const message = error instanceof Error ? error.message : "Unknown error.";
  res.status(500).json({ message });
};

export const createApp = (deps: AppDependencies): express.Express => {
  const { store, scheduler, onDemand, defaults, defaultsStore } = deps;
  const now = deps.now ?? (() => new Date());
  const app = express();

  app.use(cors());
  app.use(express.json());

  app.get("/api/health", (_req, res) => {
    res.json({
      status: "ok",
      service: "ping-status",
      scheduler: scheduler.running ? "polling" : "stopped",
      now: now().toISOString()
    });
  });

  app.get("/api/jobs", async (_req, res) => {
    try {
      const jobs = await store.loadAll();
      const current = now();
      res.json({ jobs: jobs.map((job) => serializeJob(job, current)) });
    } catch (error) {
      respondWithFailure(res, error);
    }
  });

  app.get("/api/jobs/:name", async (req, res) => {
    try {
      const job = await store.getByName(req.params.name);
      if (!job) {
        res.status(404).json({ message: "Job not found." });
        return;
      }
      res.json({ job: serializeJob(job, now()) });
    } catch (error) {
      respondWithFailure(res, error);
    }
  });

  app.post("/api/jobs", async (req, res) => {
    const parsed = createJobSchema.safeParse(req.body);
    if (!parsed.success) {
      rejectInvalid(res, parsed.error);
      return;
    }

    const payload = parsed.data;
    const job: Job = {
      name: payload.name,
      target: payload.target,
      intervalSec: payload.intervalSec ?? defaults.intervalSec,
      count: payload.count ?? defaults.count,
      scheduleMinutes: payload.scheduleMinutes ?? defaultScheduleMinutes
    };

    try {
      const added = await store.add(job);
      if (!added) {
        res.status(409).json({ message: `A job named "${job.name}" already exists.` });
        return;
      }
      res.status(201).json({ job: serializeJob(job, now()) });
    } catch (error) {
      respondWithFailure(res, error);
    }
  });

  app.patch("/api/jobs/:name", async (req, res) => {
    const parsed = updateJobSchema.safeParse(req.body);
    if (!parsed.success) {
      rejectInvalid(res, parsed.error);
      return;
    }

    try {
      const { name } = req.params;
      const updated = await store.update(name, parsed.data);
      if (!updated) {
        res.status(404).json({ message: "Job not found." });
        return;
      }

      const job = await store.getByName(name);
      res.json({ job: job ? serializeJob(job, now()) : null });
    } catch (error) {
      respondWithFailure(res, error);
    }
  });

  app.delete("/api/jobs/:name", async (req, res) => {
    try {
      const removed = await store.delete(req.params.name);
      if (!removed) {
        res.status(404).json({ message: "Job not found." });
        return;
      }
      res.status(204).end();
    } catch (error) {
      respondWithFailure(res, error);
    }
  });

  app.post("/api/jobs/:name/run", async (req, res) => {
    const parsed = runNowSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      rejectInvalid(res, parsed.error);
      return;
    }

    try {
      const { name } = req.params;
      const job = await store.getByName(name);
      if (!job) {
        res.status(404).json({ message: "Job not found." });
        return;
      }

      void onDemand.dispatch(name, parsed.data).then((outcome) => {
        console.log(`[ping-status] on-demand run of "${name}" finished: ${outcome.status}`);
      });
      res.status(202).json({ jobName: name, status: "dispatched" });
    } catch (error) {
      respondWithFailure(res, error);
    }
  });

  app.get("/api/schedule", async (_req, res) => {
    try {
      const nextRuns = await scheduler.nextRunTimes();
      res.json({
        schedule: [...nextRuns.entries()].map(([name, nextRunAt]) => ({
          name,
          nextRunAt: nextRunAt.toISOString()
        }))
      });
    } catch (error) {
      respondWithFailure(res, error);
    }
  });

  app.get("/api/config", (_req, res) => {
    res.json({
      telegramBotToken: maskToken(deps.telegramBotToken),
      recipient: deps.recipient,
      tickIntervalSeconds: deps.tickIntervalMs / 1000,
      defaults
    });
  });

  app.patch("/api/config/defaults", async (req, res) => {
    const parsed = defaultsSchema.safeParse(req.body);
    if (!parsed.success) {
      rejectInvalid(res, parsed.error);
      return;
    }

    const next: ProbeDefaults = {
      intervalSec: parsed.data.intervalSec ?? defaults.intervalSec,
      count: parsed.data.count ?? defaults.count
    };

    try {
      await defaultsStore.save(next);
      Object.assign(defaults, next);
      res.json({ defaults });
    } catch (error) {
      respondWithFailure(res, error);
    }
  });

  return app;
};
