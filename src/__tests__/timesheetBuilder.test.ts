import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { App } from "../app";
import { createFrame } from "../frame";
import {
  DEFAULT_TIMESHEET_DESCRIPTION,
  joinDescriptions,
  pickAssignment,
  roundHours,
} from "../timesheetBuilder";
import { Frame, Role, RoleAssignment } from "../types";
import {
  HOUR,
  NOON,
  createTestApp,
  developer,
  development,
  lead,
  removeDir,
  support,
} from "./helpers";

const MINUTE = 60;

function frameWith(assignment: RoleAssignment, description = ""): Frame {
  return createFrame(
    {
      startTime: NOON - HOUR,
      stopTime: NOON,
      activity: development,
      description,
      assignment,
    },
    NOON
  );
}

function roleFrame(role: Role): Frame {
  return frameWith({ kind: "role", role });
}

describe("timesheet building helpers", () => {
  it("rounds to quarter hours with a quarter hour minimum", () => {
    expect(roundHours(5 * MINUTE, null)).toBe(0.25);
    expect(roundHours(15 * MINUTE, null)).toBe(0.25);
    expect(roundHours(17 * MINUTE, null)).toBe(0.25);
    expect(roundHours(2 * HOUR + 8 * MINUTE, null)).toBe(2.25);
    expect(roundHours(2 * HOUR + 8 * MINUTE, "_fixed")).toBe(2);
    expect(roundHours(50 * MINUTE, "_support")).toBe(0.75);
  });

  it("picks the most used role, ties going to the first seen", () => {
    expect(pickAssignment([roleFrame(lead), roleFrame(developer), roleFrame(developer)])).toEqual({
      kind: "role",
      role: developer,
    });
    expect(pickAssignment([roleFrame(lead), roleFrame(developer)])).toEqual({
      kind: "role",
      role: lead,
    });
    expect(
      pickAssignment([frameWith({ kind: "individual" }), roleFrame(developer)])
    ).toEqual({ kind: "role", role: developer });
    expect(pickAssignment([frameWith({ kind: "individual" })])).toEqual({
      kind: "individual",
    });
  });

  it("joins distinct descriptions", () => {
    const individual: RoleAssignment = { kind: "individual" };
    expect(
      joinDescriptions([
        frameWith(individual, "ABC-1 login"),
        frameWith(individual, " ABC-1 login "),
        frameWith(individual, ""),
        frameWith(individual, "tests"),
      ])
    ).toBe("ABC-1 login tests");
    expect(joinDescriptions([frameWith(individual)])).toBe(
      DEFAULT_TIMESHEET_DESCRIPTION
    );
  });
});

describe("TimesheetBuilder", () => {
  let app: App;
  let dir: string;

  beforeEach(async () => {
    ({ app, dir } = await createTestApp());
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  async function trackDay() {
    const project = await app.projects.create("Internal", "");
    const reading = await app.activities.create("Reading", "", project.key, "read");
    const frames = {
      yesterday: await app.tracker.add(development, NOON - 24 * HOUR, NOON - 23 * HOUR, {
        description: "ABC-1 login",
      }),
      login: await app.tracker.add(development, NOON - 4 * HOUR, NOON - 3 * HOUR, {
        description: "ABC-1 login",
      }),
      loginAgain: await app.tracker.add(development, NOON - 3 * HOUR, NOON - 2.5 * HOUR, {
        description: "ABC-1 login",
      }),
      support: await app.tracker.add(support, NOON - 2 * HOUR, NOON - 2 * HOUR + 50 * MINUTE),
      quickFix: await app.tracker.add(development, NOON - HOUR, NOON - 50 * MINUTE, {
        description: "quick fix",
      }),
      reading: await app.tracker.add(reading, NOON - 40 * MINUTE, NOON - 35 * MINUTE),
    };
    await app.tracker.start(development, { at: NOON - 10 * MINUTE });
    return frames;
  }

  it("groups the day's closed remote frames by issue keys and activity", async () => {
    const frames = await trackDay();

    const result = await app.builder.fromFrames("2024-03-04");

    expect(result.updated).toEqual([]);
    expect(
      result.created.map((timesheet) => ({
        activity: timesheet.activity.name,
        description: timesheet.description,
        time: timesheet.time,
        frameUuids: timesheet.frameUuids,
      }))
    ).toEqual([
      {
        activity: "Development",
        description: "ABC-1 login",
        time: 1.5,
        frameUuids: [frames.login.uuid, frames.loginAgain.uuid],
      },
      {
        activity: "Support",
        description: DEFAULT_TIMESHEET_DESCRIPTION,
        time: 0.75,
        frameUuids: [frames.support.uuid],
      },
      {
        activity: "Development",
        description: "quick fix",
        time: 0.25,
        frameUuids: [frames.quickFix.uuid],
      },
    ]);
    for (const timesheet of result.created) {
      expect(timesheet.date).toBe("2024-03-04");
      expect(timesheet.assignment).toEqual({ kind: "role", role: developer });
      expect(timesheet.remoteId).toBeNull();
      expect(timesheet.updatedAt).toBe(NOON);
    }
    expect(await app.localTimesheets.getByDateRange("2024-03-04")).toHaveLength(3);
  });

  it("does not write on a dry run", async () => {
    await trackDay();
    const result = await app.builder.fromFrames("2024-03-04", { dryRun: true });
    expect(result.created).toHaveLength(3);
    expect(await app.localTimesheets.all()).toEqual([]);
  });

  it("only links new frames to timesheets built before", async () => {
    const frames = await trackDay();
    const first = await app.builder.fromFrames("2024-03-04");
    const login = first.created[0];
    if (!login) {
      throw new Error("expected a timesheet for the login frames");
    }

    const again = await app.builder.fromFrames("2024-03-04");
    expect(again).toEqual({ created: [], updated: [] });

    await app.tracker.cancel();
    const extra = await app.tracker.add(development, NOON - 30 * MINUTE, NOON - 5 * MINUTE, {
      description: "ABC-1 login",
    });
    const third = await app.builder.fromFrames("2024-03-04");

    expect(third.created).toEqual([]);
    expect(third.updated).toEqual([
      {
        ...login,
        frameUuids: [frames.login.uuid, frames.loginAgain.uuid, extra.uuid],
      },
    ]);
    expect((await app.localTimesheets.get(login.uuid))?.time).toBe(1.5);
  });
});
