import { z } from "zod";

export const jobNamePattern = /^[a-zA-Z0-9_. -]+$/;

export const jobNameSchema = z
  .string()
  .trim()
  .min(1)
  .max(32)
  .regex(jobNamePattern, "Use letters, digits, spaces, _ - or . (max 32 characters).");

export const targetSchema = z
  .string()
  .trim()
  .min(1)
  .max(253)
  .regex(/^[a-zA-Z0-9.:][a-zA-Z0-9._:-]*$/, "Target must be a hostname or IP address.");

export const intervalSecSchema = z.number().gt(0).max(3600);
export const countSchema = z.number().int().min(1).max(100000);
export const scheduleMinutesSchema = z.number().int().min(1).max(10080);

export const createJobSchema = z.object({
  name: jobNameSchema,
  target: targetSchema,
  intervalSec: intervalSecSchema.optional(),
  count: countSchema.optional(),
  scheduleMinutes: scheduleMinutesSchema.optional()
});

export const updateJobSchema = z
  .object({
    target: targetSchema,
    intervalSec: intervalSecSchema,
    count: countSchema,
    scheduleMinutes: scheduleMinutesSchema
  })
  .partial()
  .strict()
  .refine((patch) => Object.keys(patch).length > 0, "Provide at least one field to update.");

export const runNowSchema = z
  .object({
    skipProgress: z.boolean().optional()
  })
  .strict();

export const defaultsSchema = z
  .object({
    intervalSec: intervalSecSchema,
    count: countSchema
  })
  .partial()
  .strict();

// Hand-edited records: missing fields take defaults, an empty target is kept.
export const storedJobSchema = z.object({
  name: z.string(),
  target: z.string().default(""),
  intervalSec: z.number().default(0.2),
  count: z.number().int().default(10),
  scheduleMinutes: z.number().int().default(5),
  lastRunAt: z.string().nullish()
});

export const jobsDocumentSchema = z.object({
  jobs: z.array(storedJobSchema).default([])
});

export const storedDefaultsSchema = z
  .object({
    intervalSec: intervalSecSchema,
    count: countSchema
  })
  .partial();
