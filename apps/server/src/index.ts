import * as path from "node:path";
import { loadConfig } from "./config";
import { createApp } from "./http/app";
import { DefaultsStore } from "./jobs/defaults-store";
import { JobStore } from "./jobs/job-store";
import { ErrorReporter } from "./notify/error-reporter";
import { ConsoleNotifier, Notifier, TelegramNotifier } from "./notify/notifier";
import { PingExecutor } from "./probe/executor";
import { JobRunner } from "./scheduler/job-runner";
import { OnDemandRunner } from "./scheduler/on-demand-runner";
import { SchedulerTick } from "./scheduler/scheduler-tick";

const config = loadConfig();

const errorReporter = new ErrorReporter();
let notifier: Notifier;
let recipient: string;

if (config.telegramBotToken && config.adminUserId) {
  notifier = new TelegramNotifier({ botToken: config.telegramBotToken });
  recipient = config.adminUserId;
  errorReporter.attach(notifier, recipient);
} else {
  console.warn("[ping-status] TELEGRAM_BOT_TOKEN not set, reports are printed to stdout");
  notifier = new ConsoleNotifier();
  recipient = "console";
}

const store = new JobStore({
  filePath: path.resolve(config.jobsFile),
  errorReporter
});
const executor = new PingExecutor({ command: config.pingCommand, errorReporter });
const runner = new JobRunner({ store, executor, notifier, recipient, errorReporter });
const scheduler = new SchedulerTick({
  store,
  runner,
  errorReporter,
  tickIntervalMs: config.tickIntervalMs
});
const onDemand = new OnDemandRunner({ store, runner, errorReporter });

const defaultsStore = new DefaultsStore({
  filePath: path.resolve(config.defaultsFile),
  errorReporter
});

const start = async () => {
  const defaults = await defaultsStore.load(config.defaults);
  const app = createApp({
    store,
    scheduler,
    onDemand,
    defaults,
    defaultsStore,
    telegramBotToken: config.telegramBotToken,
    recipient,
    tickIntervalMs: config.tickIntervalMs
  });

  return app.listen(config.port, () => {
    console.log(`[ping-status] listening on http://localhost:${config.port}`);
    console.log(`[ping-status] polling ${config.jobsFile} every ${config.tickIntervalMs / 1000}s`);
    scheduler.start();
  });
};

start()
  .then((server) => {
    const shutdown = (): void => {
      scheduler.stop();
      server.close(() => {
        process.exit(0);
      });
    };

    process.on("SIGINT", shutdown);
    process.on("SIGTERM", shutdown);
  })
  .catch((error: unknown) => {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`[ping-status] failed to start: ${message}`);
    process.exit(1);
  });

process.on("unhandledRejection", (reason) => {
  void errorReporter.report(reason, "process: unhandledRejection");
});
