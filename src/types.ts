import { EntityKey, RemoteKey } from "./entityKey";

export const ProjectStatus = {
  Inactive: 0,
  Active: 1,
  Other: 2,
} as const;

export type ProjectStatus = (typeof ProjectStatus)[keyof typeof ProjectStatus];

export interface Role {
  id: number;
  name: string;
  fullName: string;
  type: string;
  status: string;
  parentId: number | null;
}

export interface User {
  id: number;
  username: string;
  firstname: string;
  lastname: string;
  name: string;
  email: string;
  roles: Role[];
}

// "Role required unless individual" lives in the type, not in call sites.
export type RoleAssignment =
  | { kind: "role"; role: Role }
  | { kind: "individual" };

export interface Activity {
  key: EntityKey;
  name: string;
  description: string;
  projectKey: EntityKey;
  alias: string | null;
}

export interface Project {
  key: EntityKey;
  name: string;
  description: string;
  status: ProjectStatus;
  activities: Activity[];
}

export interface RemoteActivity extends Activity {
  key: RemoteKey;
  projectKey: RemoteKey;
}

export interface Frame {
  uuid: string;
  startTime: number; // unix seconds, UTC
  stopTime: number | null;
  activity: Activity;
  description: string;
  assignment: RoleAssignment;
  issueKeys: string[];
  updatedAt: number;
}

export interface Timesheet {
  uuid: string;
  activity: RemoteActivity;
  description: string;
  clientDescription: string | null;
  time: number; // hours, positive multiple of 0.25
  date: string; // YYYY-MM-DD in the remote timezone
  assignment: RoleAssignment;
  frameUuids: string[];
  remoteId: number | null;
  updatedAt: number;
  doNotSync: boolean;
}

export function individual(): RoleAssignment {
  return { kind: "individual" };
}

export function withRole(role: Role): RoleAssignment {
  return { kind: "role", role };
}

export function assignmentRoleId(assignment: RoleAssignment): number | null {
  return assignment.kind === "role" ? assignment.role.id : null;
}

export function sameAssignment(a: RoleAssignment, b: RoleAssignment): boolean {
  return assignmentRoleId(a) === assignmentRoleId(b);
}

export function isRemoteActivity(
  activity: Activity
): activity is RemoteActivity {
  return (
    activity.key.source === "remote" && activity.projectKey.source === "remote"
  );
}
