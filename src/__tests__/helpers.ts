import { promises as fs } from "fs";
import * as os from "os";
import * as path from "path";
import {
  CreatedTimesheet,
  ProjectData,
  RemoteApi,
  TimesheetData,
  TimesheetWriteData,
  UserData,
} from "../apiClient";
import { App, createApp } from "../app";
import { Clock } from "../dates";
import { NotFoundError, RemoteUnavailableError } from "../errors";
import { remoteKey } from "../entityKey";
import { Logger } from "../logger";
import { RemoteActivity, Role } from "../types";

// 2024-03-04 12:00:00 in Zurich (CET, UTC+1).
export const NOON = Date.UTC(2024, 2, 4, 11, 0, 0) / 1000;
export const HOUR = 3600;

export async function makeTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), "frametrack-"));
}

export async function removeDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

export function silentLogger(): Logger {
  return new Logger(undefined, "silent");
}

export class TestClock {
  constructor(public now: number = NOON) {}

  readonly clock: Clock = () => this.now;

  advance(seconds: number): void {
    this.now += seconds;
  }
}

export const developer: Role = {
  id: 7,
  name: "Developer",
  fullName: "Software Developer",
  type: "employee",
  status: "active",
  parentId: null,
};

export const lead: Role = {
  id: 9,
  name: "Lead",
  fullName: "Team Lead",
  type: "employee",
  status: "active",
  parentId: 7,
};

export const development: RemoteActivity = {
  key: remoteKey(101),
  name: "Development",
  description: "",
  projectKey: remoteKey(10),
  alias: "dev",
};

export const support: RemoteActivity = {
  key: remoteKey(102),
  name: "Support",
  description: "",
  projectKey: remoteKey(10),
  alias: "_support",
};

export function sampleProjects(): ProjectData[] {
  return [
    {
      id: 10,
      name: "Customer Portal",
      description: "",
      status: 1,
      activities: [
        { id: 101, name: "Development", description: "", alias: "dev" },
        { id: 102, name: "Support", description: "", alias: "_support" },
      ],
    },
    {
      id: 11,
      name: "Archive",
      description: "",
      status: 0,
      activities: [{ id: 111, name: "Cleanup", description: "", alias: null }],
    },
  ];
}

export function sampleUser(): UserData {
  return {
    user: {
      id: 42,
      username: "jdoe",
      firstname: "Jo",
      lastname: "Doe",
      name: "Jo Doe",
      email: "jo@example.test",
    },
    roles: [
      {
        id: 7,
        parent_id: null,
        name: "Developer",
        full_name: "Software Developer",
        type: "employee",
        status: "active",
      },
      {
        id: 9,
        parent_id: 7,
        name: "Lead",
        full_name: "Team Lead",
        type: "employee",
        status: "active",
      },
    ],
  };
}

/** In-memory stand-in for the remote server. */
export class FakeRemoteApi implements RemoteApi {
  projects: ProjectData[] = sampleProjects();
  users = new Map<number, UserData>([[42, sampleUser()]]);
  timesheets = new Map<number, TimesheetData>();
  modifiedAt = "2024-03-04 12:30:00";
  unavailable = false;
  calls: string[] = [];
  private nextId = 500;

  async fetchProjectsAll(): Promise<ProjectData[]> {
    this.record("fetchProjectsAll");
    return this.projects;
  }

  async fetchUserById(id: number): Promise<UserData> {
    this.record("fetchUserById");
    const user = this.users.get(id);
    if (!user) {
      throw new NotFoundError(`User ${id} not found`);
    }
    return user;
  }

  async fetchTimesheetById(remoteId: number): Promise<TimesheetData> {
    this.record("fetchTimesheetById");
    const timesheet = this.timesheets.get(remoteId);
    if (!timesheet) {
      throw new NotFoundError(`Timesheet ${remoteId} not found remotely`);
    }
    return timesheet;
  }

  async fetchTimesheetsByDateRange(
    from: string,
    to: string
  ): Promise<TimesheetData[]> {
    this.record("fetchTimesheetsByDateRange");
    return [...this.timesheets.values()].filter(
      (timesheet) => timesheet.date >= from && timesheet.date <= to
    );
  }

  async createTimesheet(data: TimesheetWriteData): Promise<CreatedTimesheet> {
    this.record("createTimesheet");
    const id = this.nextId++;
    const timesheet = this.fromWrite(id, data);
    this.timesheets.set(id, timesheet);
    return { id, timesheet };
  }

  async updateTimesheet(
    remoteId: number,
    data: TimesheetWriteData
  ): Promise<void> {
    this.record("updateTimesheet");
    if (!this.timesheets.has(remoteId)) {
      throw new NotFoundError(`Timesheet ${remoteId} not found remotely`);
    }
    this.timesheets.set(remoteId, this.fromWrite(remoteId, data));
  }

  async deleteTimesheet(remoteId: number): Promise<void> {
    this.record("deleteTimesheet");
    this.timesheets.delete(remoteId);
  }

  /** Seeds a timesheet as if someone had booked it on the server. */
  seed(data: Partial<TimesheetData> & { id: number }): TimesheetData {
    const timesheet: TimesheetData = {
      activityId: 101,
      projectId: 10,
      date: "2024-03-04",
      time: 1,
      description: "Remote entry",
      clientDescription: null,
      roleId: 7,
      individualAction: false,
      modifiedAt: this.modifiedAt,
      ...data,
    };
    this.timesheets.set(timesheet.id, timesheet);
    return timesheet;
  }

  private fromWrite(id: number, data: TimesheetWriteData): TimesheetData {
    return {
      id,
      activityId: data.activity_id,
      projectId: data.project_id,
      date: data.date,
      time: data.time,
      description: data.description,
      clientDescription: data.client_description ?? null,
      roleId: data.role_id ?? null,
      individualAction: data.role_id === undefined,
      modifiedAt: this.modifiedAt,
    };
  }

  private record(call: string): void {
    this.calls.push(call);
    if (this.unavailable) {
      throw new RemoteUnavailableError("connection refused");
    }
  }
}

export interface TestApp {
  app: App;
  api: FakeRemoteApi;
  time: TestClock;
  dir: string;
}

/** Full wiring over a temp directory, the fake API and a fixed clock. */
export async function createTestApp(): Promise<TestApp> {
  const dir = await makeTempDir();
  const api = new FakeRemoteApi();
  const time = new TestClock();
  const app = await createApp({
    env: {
      FRAMETRACK_HOME: path.join(dir, "data"),
      FRAMETRACK_CONFIG_DIR: path.join(dir, "config"),
      FRAMETRACK_LOG_LEVEL: "silent",
    },
    clock: time.clock,
    api,
    logger: silentLogger(),
  });
  await app.config.set("user.id", 42);
  await app.config.set("user.defaultRole.id", 7);
  return { app, api, time, dir };
}
