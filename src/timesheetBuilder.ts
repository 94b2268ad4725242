import { FrameRepository } from "./frameRepository";
import { LocalTimesheetRepository } from "./localTimesheetRepository";
import { createTimesheet } from "./timesheet";
import {
  Frame,
  RemoteActivity,
  Role,
  RoleAssignment,
  Timesheet,
  isRemoteActivity,
} from "./types";
import { formatEntityKey } from "./entityKey";
import { Clock, remoteDayBounds, systemClock } from "./dates";
import { Logger, logger as rootLogger } from "./logger";

export const DEFAULT_TIMESHEET_DESCRIPTION = "Time entry";
const NO_ISSUE_KEY = "(no issue key)";
const MINIMUM_HOURS = 0.25;

export interface FromFramesOptions {
  dryRun?: boolean;
}

export interface FromFramesResult {
  created: Timesheet[];
  updated: Timesheet[];
}

interface FrameGroup {
  activity: RemoteActivity;
  frames: Frame[];
}

/**
 * Hours booked for `seconds` of work. Anything up to a quarter hour counts
 * as one; an activity alias starting with `_` rounds down instead of to the
 * nearest quarter.
 */
export function roundHours(seconds: number, alias: string | null): number {
  const hours = seconds / 3600;
  if (hours <= MINIMUM_HOURS) {
    return MINIMUM_HOURS;
  }
  const quarters = alias?.startsWith("_")
    ? Math.floor(hours * 4)
    : Math.round(hours * 4);
  return Math.max(quarters, 1) / 4;
}

/** Most used role, ties going to the first seen; individual only if no frame has a role. */
export function pickAssignment(frames: Frame[]): RoleAssignment {
  const counts = new Map<number, { role: Role; count: number }>();
  for (const frame of frames) {
    if (frame.assignment.kind !== "role") {
      continue;
    }
    const { role } = frame.assignment;
    const entry = counts.get(role.id);
    if (entry) {
      entry.count += 1;
    } else {
      counts.set(role.id, { role, count: 1 });
    }
  }
  let best: { role: Role; count: number } | null = null;
  for (const entry of counts.values()) {
    if (!best || entry.count > best.count) {
      best = entry;
    }
  }
  return best ? { kind: "role", role: best.role } : { kind: "individual" };
}

export function joinDescriptions(frames: Frame[]): string {
  const descriptions = [
    ...new Set(
      frames
        .map((frame) => frame.description.trim())
        .filter((text) => text !== "")
    ),
  ];
  return descriptions.length > 0
    ? descriptions.join(" ")
    : DEFAULT_TIMESHEET_DESCRIPTION;
}

/** Turns a day of tracked frames into local timesheets. */
export class TimesheetBuilder {
  private readonly logger: Logger;

  constructor(
    private readonly frames: FrameRepository,
    private readonly timesheets: LocalTimesheetRepository,
    private readonly clock: Clock = systemClock,
    logger: Logger = rootLogger
  ) {
    this.logger = logger.child("from-frames");
  }

  async fromFrames(
    date: string,
    options: FromFramesOptions = {}
  ): Promise<FromFramesResult> {
    const { start, end } = remoteDayBounds(date);
    const dayFrames = (await this.frames.getByDateRange(start, end)).filter(
      (frame) => frame.stopTime !== null && frame.startTime >= start
    );

    const existing = await this.timesheets.getByDateRange(date);
    const result: FromFramesResult = { created: [], updated: [] };

    for (const group of groupFrames(dayFrames)) {
      const frameUuids = group.frames.map((frame) => frame.uuid);
      const linked = existing.find((timesheet) =>
        timesheet.frameUuids.some((uuid) => frameUuids.includes(uuid))
      );

      if (linked) {
        const missing = frameUuids.filter(
          (uuid) => !linked.frameUuids.includes(uuid)
        );
        if (missing.length === 0) {
          this.logger.debug(`timesheet ${linked.uuid} already covers its frames`);
          continue;
        }
        const updated: Timesheet = {
          ...linked,
          frameUuids: [...linked.frameUuids, ...missing],
        };
        if (!options.dryRun) {
          await this.timesheets.update(updated);
        }
        result.updated.push(updated);
        continue;
      }

      const seconds = group.frames.reduce(
        (sum, frame) => sum + ((frame.stopTime ?? frame.startTime) - frame.startTime),
        0
      );
      const timesheet = createTimesheet({
        activity: group.activity,
        description: joinDescriptions(group.frames),
        time: roundHours(seconds, group.activity.alias),
        date,
        assignment: pickAssignment(group.frames),
        frameUuids,
        updatedAt: this.clock(),
      });
      if (!options.dryRun) {
        await this.timesheets.save(timesheet);
      }
      result.created.push(timesheet);
    }

    return result;
  }
}

/** Groups by sorted issue keys and activity, in order of the first frame. */
function groupFrames(frames: Frame[]): FrameGroup[] {
  const groups = new Map<string, FrameGroup>();
  for (const frame of frames) {
    const { activity } = frame;
    if (!isRemoteActivity(activity)) {
      continue;
    }
    const issues =
      frame.issueKeys.length > 0 ? [...frame.issueKeys].sort() : [NO_ISSUE_KEY];
    const key = `${JSON.stringify(issues)}|${formatEntityKey(activity.key)}`;
    const group = groups.get(key);
    if (group) {
      group.frames.push(frame);
    } else {
      groups.set(key, { activity, frames: [frame] });
    }
  }
  return [...groups.values()];
}
