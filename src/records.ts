import { z } from "zod";
import { logger } from "./logger";

// Persisted shapes. Timestamps are unix seconds (UTC).

export const STORE_VERSION = 1;

/**
 * An array whose invalid items are dropped with a warning instead of failing
 * the whole file.
 */
export function lenientArray<T extends z.ZodTypeAny>(item: T, label: string) {
  return z.array(z.unknown()).transform((items) => {
    const result: z.output<T>[] = [];
    for (const raw of items) {
      const parsed = item.safeParse(raw);
      if (parsed.success) {
        result.push(parsed.data);
      } else {
        logger.warn(
          `skipping invalid ${label} record`,
          parsed.error.issues[0]?.message
        );
      }
    }
    return result;
  });
}

export const entityKeySchema = z.discriminatedUnion("source", [
  z.object({ source: z.literal("local"), id: z.string() }),
  z.object({ source: z.literal("remote"), id: z.number().int() }),
]);

export const activityRecordSchema = z.object({
  key: entityKeySchema,
  name: z.string(),
  desc: z.string().default(""),
  project: entityKeySchema,
  alias: z.string().nullable().default(null),
});

export type ActivityRecord = z.output<typeof activityRecordSchema>;

export const roleRecordSchema = z.object({
  id: z.number().int(),
  name: z.string(),
  fullName: z.string().default(""),
  type: z.string().default(""),
  status: z.string().default(""),
  parentId: z.number().int().nullable().default(null),
});

export type RoleRecord = z.output<typeof roleRecordSchema>;

export const frameRecordSchema = z.object({
  uuid: z.string().min(1),
  start: z.number().int(),
  stop: z.number().int().nullable(),
  activity: activityRecordSchema,
  isIndividual: z.boolean(),
  role: roleRecordSchema.nullable(),
  issues: z.array(z.string()).default([]),
  desc: z.string().default(""),
  updatedAt: z.number().int(),
});

export type FrameRecord = z.output<typeof frameRecordSchema>;

export const framesFileSchema = z.object({
  version: z.number().int().default(STORE_VERSION),
  frames: lenientArray(frameRecordSchema, "frame").default([]),
  current: frameRecordSchema.nullable().catch(null).default(null),
});

export type FramesFile = z.output<typeof framesFileSchema>;

export const timesheetRecordSchema = z.object({
  uuid: z.string().min(1),
  activity: activityRecordSchema,
  description: z.string(),
  clientDescription: z.string().nullable().default(null),
  time: z.number(),
  date: z.string(),
  role: roleRecordSchema.nullable(),
  individualAction: z.boolean(),
  frameUuids: z.array(z.string()).default([]),
  remoteId: z.number().int().nullable().default(null),
  updatedAt: z.number().int(),
  doNotSync: z.boolean().default(false),
});

export type TimesheetRecord = z.output<typeof timesheetRecordSchema>;

export const timesheetsFileSchema = z.object({
  version: z.number().int().default(STORE_VERSION),
  timesheets: lenientArray(timesheetRecordSchema, "timesheet").default([]),
});

export type TimesheetsFile = z.output<typeof timesheetsFileSchema>;

export const projectStatusSchema = z.union([
  z.literal(0),
  z.literal(1),
  z.literal(2),
]);

export const projectRecordSchema = z.object({
  key: entityKeySchema,
  name: z.string(),
  description: z.string().default(""),
  status: projectStatusSchema.default(1),
  activities: z.array(activityRecordSchema).default([]),
});

export type ProjectRecord = z.output<typeof projectRecordSchema>;

export const projectsFileSchema = z.object({
  version: z.number().int().default(STORE_VERSION),
  fetchedAt: z.number().int().nullable().default(null),
  projects: lenientArray(projectRecordSchema, "project").default([]),
});

export type ProjectsFile = z.output<typeof projectsFileSchema>;

export const userRecordSchema = z.object({
  id: z.number().int(),
  username: z.string().default(""),
  firstname: z.string().default(""),
  lastname: z.string().default(""),
  name: z.string().default(""),
  email: z.string().default(""),
  roles: z.array(roleRecordSchema).default([]),
});

export const userFileSchema = z.object({
  version: z.number().int().default(STORE_VERSION),
  fetchedAt: z.number().int().nullable().default(null),
  user: userRecordSchema.nullable().default(null),
});

export type UserFile = z.output<typeof userFileSchema>;

export const configFileSchema = z.record(z.unknown());

export type ConfigFile = z.output<typeof configFileSchema>;
