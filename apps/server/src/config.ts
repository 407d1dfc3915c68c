import { z } from "zod";
import { ProbeDefaults } from "./types";

const blankToUndefined = (value: unknown): unknown =>
  typeof value === "string" && value.trim().length === 0 ? undefined : value;

const optionalEnv = <T extends z.ZodTypeAny>(schema: T) => z.preprocess(blankToUndefined, schema);

const envSchema = z
  .object({
    PORT: optionalEnv(z.coerce.number().int().min(1).max(65535).default(8787)),
    JOBS_FILE: optionalEnv(z.string().trim().min(1).default("data/jobs.json")),
    DEFAULTS_FILE: optionalEnv(z.string().trim().min(1).default("data/defaults.json")),
    TELEGRAM_BOT_TOKEN: optionalEnv(z.string().trim().optional()),
    ADMIN_USER_ID: optionalEnv(
      z
        .string()
        .trim()
        .regex(/^-?\d+$/, "ADMIN_USER_ID must be a numeric Telegram chat id")
        .optional()
    ),
    PING_COMMAND: optionalEnv(z.string().trim().min(1).default("ping")),
    PING_DEFAULT_INTERVAL: optionalEnv(z.coerce.number().gt(0).max(3600).default(0.2)),
    PING_DEFAULT_COUNT: optionalEnv(z.coerce.number().int().min(1).max(100000).default(10)),
    SCHEDULER_TICK_SECONDS: optionalEnv(z.coerce.number().int().min(1).default(10))
  })
  .superRefine((env, context) => {
    if (env.TELEGRAM_BOT_TOKEN && !env.ADMIN_USER_ID) {
      context.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["ADMIN_USER_ID"],
        message: "ADMIN_USER_ID is required when TELEGRAM_BOT_TOKEN is set"
      });
    }
  });

export interface AppConfig {
  port: number;
  jobsFile: string;
  defaultsFile: string;
  telegramBotToken?: string;
  adminUserId?: string;
  pingCommand: string;
  defaults: ProbeDefaults;
  tickIntervalMs: number;
}

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new Error(`Invalid configuration:\n  - ${details.join("\n  - ")}`);
  }

  const values = parsed.data;
  return {
    port: values.PORT,
    jobsFile: values.JOBS_FILE,
    defaultsFile: values.DEFAULTS_FILE,
    telegramBotToken: values.TELEGRAM_BOT_TOKEN,
    adminUserId: values.ADMIN_USER_ID,
    pingCommand: values.PING_COMMAND,
    defaults: {
      intervalSec: values.PING_DEFAULT_INTERVAL,
      count: values.PING_DEFAULT_COUNT
    },
    tickIntervalMs: values.SCHEDULER_TICK_SECONDS * 1000
  };
};

export const maskToken = (token?: string): string => {
  if (!token || token.length < 12) {
    return "****";
  }
  return `${token.slice(0, 4)}...${token.slice(-4)}`;
};
