import { Activity, Frame, Role, RoleAssignment } from "./types";
import { ActivityRecord, FrameRecord, RoleRecord } from "./records";
import { InvalidTimeError } from "./errors";
import { generateLocalId } from "./entityKey";

const ISSUE_KEY_PATTERN = /[A-Z]{2,6}-\d{1,5}/g;

/** Issue keys such as `ABC-123`, unique, in order of first appearance. */
export function extractIssueKeys(description: string): string[] {
  const matches = description.match(ISSUE_KEY_PATTERN) ?? [];
  return [...new Set(matches)];
}

export interface FrameInit {
  uuid?: string;
  startTime: number;
  stopTime?: number | null;
  activity: Activity;
  description?: string;
  assignment: RoleAssignment;
  updatedAt?: number;
}

export function createFrame(init: FrameInit, now: number): Frame {
  const stopTime = init.stopTime ?? null;
  if (stopTime !== null && stopTime < init.startTime) {
    throw new InvalidTimeError("Frame stop time is before its start time");
  }
  const description = init.description ?? "";
  return {
    uuid: init.uuid ?? generateLocalId(),
    startTime: init.startTime,
    stopTime,
    activity: init.activity,
    description,
    assignment: init.assignment,
    issueKeys: extractIssueKeys(description),
    updatedAt: init.updatedAt ?? now,
  };
}

export type FrameChanges = Partial<
  Pick<
    Frame,
    "startTime" | "stopTime" | "activity" | "description" | "assignment"
  >
>;

/** Copy with `changes` applied; uuid is kept, updatedAt moves to `now`. */
export function changeFrame(
  frame: Frame,
  changes: FrameChanges,
  now: number
): Frame {
  return createFrame(
    {
      uuid: frame.uuid,
      startTime: changes.startTime ?? frame.startTime,
      stopTime:
        changes.stopTime === undefined ? frame.stopTime : changes.stopTime,
      activity: changes.activity ?? frame.activity,
      description: changes.description ?? frame.description,
      assignment: changes.assignment ?? frame.assignment,
      updatedAt: now,
    },
    now
  );
}

export function isActive(frame: Frame): boolean {
  return frame.stopTime === null;
}

export function frameDuration(frame: Frame, now: number): number {
  return (frame.stopTime ?? now) - frame.startTime;
}

export function effectiveStop(frame: Frame, now: number): number {
  return frame.stopTime ?? now;
}

// #region Record conversion

export function activityToRecord(activity: Activity): ActivityRecord {
  return {
    key: { ...activity.key },
    name: activity.name,
    desc: activity.description,
    project: { ...activity.projectKey },
    alias: activity.alias,
  };
}

export function activityFromRecord(record: ActivityRecord): Activity {
  return {
    key: record.key,
    name: record.name,
    description: record.desc,
    projectKey: record.project,
    alias: record.alias,
  };
}

export function roleToRecord(role: Role): RoleRecord {
  return { ...role };
}

export function roleFromRecord(record: RoleRecord): Role {
  return { ...record };
}

export function assignmentToRecord(assignment: RoleAssignment): {
  isIndividual: boolean;
  role: RoleRecord | null;
} {
  switch (assignment.kind) {
    case "role":
      return { isIndividual: false, role: roleToRecord(assignment.role) };
    case "individual":
      return { isIndividual: true, role: null };
  }
}

export function assignmentFromRecord(
  isIndividual: boolean,
  role: RoleRecord | null
): RoleAssignment | null {
  if (isIndividual) {
    return { kind: "individual" };
  }
  return role ? { kind: "role", role: roleFromRecord(role) } : null;
}

export function frameToRecord(frame: Frame): FrameRecord {
  const { isIndividual, role } = assignmentToRecord(frame.assignment);
  return {
    uuid: frame.uuid,
    start: frame.startTime,
    stop: frame.stopTime,
    activity: activityToRecord(frame.activity),
    isIndividual,
    role,
    issues: [...frame.issueKeys],
    desc: frame.description,
    updatedAt: frame.updatedAt,
  };
}

/** Null when the record carries neither a role nor the individual flag. */
export function frameFromRecord(record: FrameRecord): Frame | null {
  const assignment = assignmentFromRecord(record.isIndividual, record.role);
  if (!assignment || (record.stop !== null && record.stop < record.start)) {
    return null;
  }
  return {
    uuid: record.uuid,
    startTime: record.start,
    stopTime: record.stop,
    activity: activityFromRecord(record.activity),
    description: record.desc,
    assignment,
    issueKeys: [...record.issues],
    updatedAt: record.updatedAt,
  };
}

// #endregion
