import { Activity, RoleAssignment, Timesheet, isRemoteActivity } from "./types";
import { TimesheetRecord } from "./records";
import {
  activityFromRecord,
  activityToRecord,
  assignmentFromRecord,
  assignmentToRecord,
} from "./frame";
import { isCalendarDate } from "./dates";
import { InvalidOperationError } from "./errors";
import { generateLocalId } from "./entityKey";

const QUARTER_HOUR_TOLERANCE = 0.0001;

/** True for positive multiples of 0.25 hours. */
export function isValidTime(time: number): boolean {
  if (!Number.isFinite(time) || time <= 0) {
    return false;
  }
  return Math.abs((time * 100) % 25) <= QUARTER_HOUR_TOLERANCE;
}

export function assertValidTime(time: number): void {
  if (!isValidTime(time)) {
    throw new InvalidOperationError(
      `Time must be a positive multiple of 0.25, got ${time}`
    );
  }
}

export interface TimesheetInit {
  uuid?: string;
  activity: Activity;
  description: string;
  clientDescription?: string | null;
  time: number;
  date: string;
  assignment: RoleAssignment;
  frameUuids?: string[];
  remoteId?: number | null;
  updatedAt: number;
  doNotSync?: boolean;
}

export function createTimesheet(init: TimesheetInit): Timesheet {
  const { activity } = init;
  if (!isRemoteActivity(activity)) {
    throw new InvalidOperationError(
      `Timesheets need a remote activity; "${activity.name}" is local`
    );
  }
  assertValidTime(init.time);
  if (!isCalendarDate(init.date)) {
    throw new InvalidOperationError(`Invalid timesheet date: ${init.date}`);
  }
  return {
    uuid: init.uuid ?? generateLocalId(),
    activity,
    description: init.description,
    clientDescription: init.clientDescription ?? null,
    time: init.time,
    date: init.date,
    assignment: init.assignment,
    frameUuids: [...new Set(init.frameUuids ?? [])],
    remoteId: init.remoteId ?? null,
    updatedAt: init.updatedAt,
    doNotSync: init.doNotSync ?? false,
  };
}

export type TimesheetChanges = Partial<
  Pick<
    Timesheet,
    | "activity"
    | "description"
    | "clientDescription"
    | "time"
    | "date"
    | "assignment"
    | "frameUuids"
    | "doNotSync"
  >
>;

export function changeTimesheet(
  timesheet: Timesheet,
  changes: TimesheetChanges,
  now: number
): Timesheet {
  return createTimesheet({
    ...timesheet,
    activity: changes.activity ?? timesheet.activity,
    description: changes.description ?? timesheet.description,
    clientDescription:
      changes.clientDescription === undefined
        ? timesheet.clientDescription
        : changes.clientDescription,
    time: changes.time ?? timesheet.time,
    date: changes.date ?? timesheet.date,
    assignment: changes.assignment ?? timesheet.assignment,
    frameUuids: changes.frameUuids ?? timesheet.frameUuids,
    doNotSync: changes.doNotSync ?? timesheet.doNotSync,
    updatedAt: now,
  });
}

export function timesheetToRecord(timesheet: Timesheet): TimesheetRecord {
  const { isIndividual, role } = assignmentToRecord(timesheet.assignment);
  return {
    uuid: timesheet.uuid,
    activity: activityToRecord(timesheet.activity),
    description: timesheet.description,
    clientDescription: timesheet.clientDescription,
    time: timesheet.time,
    date: timesheet.date,
    role,
    individualAction: isIndividual,
    frameUuids: [...timesheet.frameUuids],
    remoteId: timesheet.remoteId,
    updatedAt: timesheet.updatedAt,
    doNotSync: timesheet.doNotSync,
  };
}

export function timesheetFromRecord(record: TimesheetRecord): Timesheet | null {
  const assignment = assignmentFromRecord(record.individualAction, record.role);
  const activity = activityFromRecord(record.activity);
  if (
    !assignment ||
    !isRemoteActivity(activity) ||
    !isValidTime(record.time) ||
    !isCalendarDate(record.date)
  ) {
    return null;
  }
  return {
    uuid: record.uuid,
    activity,
    description: record.description,
    clientDescription: record.clientDescription,
    time: record.time,
    date: record.date,
    assignment,
    frameUuids: [...record.frameUuids],
    remoteId: record.remoteId,
    updatedAt: record.updatedAt,
    doNotSync: record.doNotSync,
  };
}

/** Same billable content, ignoring local bookkeeping (uuid, frames, flags). */
export function sameRemoteContent(a: Timesheet, b: Timesheet): boolean {
  return (
    a.activity.key.id === b.activity.key.id &&
    a.description === b.description &&
    a.clientDescription === b.clientDescription &&
    a.time === b.time &&
    a.date === b.date &&
    assignmentKey(a.assignment) === assignmentKey(b.assignment) &&
    a.remoteId === b.remoteId &&
    a.updatedAt === b.updatedAt
  );
}

function assignmentKey(assignment: RoleAssignment): string {
  return assignment.kind === "role" ? `role:${assignment.role.id}` : "individual";
}
