import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { App } from "../app";
import { changeTimesheet, createTimesheet, TimesheetInit } from "../timesheet";
import { InvalidOperationError, NotFoundError } from "../errors";
import { PushConflict } from "../timesheetSync";
import { Timesheet } from "../types";
import {
  FakeRemoteApi,
  HOUR,
  NOON,
  TestClock,
  createTestApp,
  developer,
  development,
  lead,
  removeDir,
  support,
} from "./helpers";

// "2024-03-04 12:30:00" in Zurich, the fake server's modification stamp.
const REMOTE_MODIFIED = NOON + 1800;

function timesheet(overrides: Partial<TimesheetInit> = {}): Timesheet {
  return createTimesheet({
    activity: development,
    description: "Login form",
    time: 1,
    date: "2024-03-04",
    assignment: { kind: "role", role: developer },
    updatedAt: NOON,
    ...overrides,
  });
}

describe("TimesheetSyncService", () => {
  let app: App;
  let api: FakeRemoteApi;
  let time: TestClock;
  let dir: string;

  beforeEach(async () => {
    ({ app, api, time, dir } = await createTestApp());
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  describe("push", () => {
    it("creates the remote copy and links it locally", async () => {
      const local = timesheet({ frameUuids: ["frame-1"] });
      await app.localTimesheets.save(local);

      const pushed = await app.sync.pushLocalToRemote(local);

      expect(pushed).toEqual({
        ...local,
        remoteId: 500,
        updatedAt: REMOTE_MODIFIED,
      });
      expect(await app.localTimesheets.get(local.uuid)).toEqual(pushed);
      expect(api.timesheets.get(500)).toMatchObject({
        activityId: 101,
        projectId: 10,
        description: "Login form",
        time: 1,
        roleId: 7,
      });
    });

    it("never pushes do-not-sync timesheets", async () => {
      const local = timesheet({ doNotSync: true });
      await app.localTimesheets.save(local);

      expect(await app.sync.pushLocalToRemote(local)).toBeNull();
      expect(api.calls).toEqual([]);
    });

    it("updates a pushed timesheet only once confirmed", async () => {
      const local = timesheet();
      await app.localTimesheets.save(local);
      const pushed = await app.sync.pushLocalToRemote(local);
      if (!pushed) {
        throw new Error("expected the timesheet to be pushed");
      }

      time.now = NOON + HOUR;
      const edited = changeTimesheet(pushed, { time: 2 }, time.now);
      await app.localTimesheets.update(edited);

      expect(await app.sync.pushLocalToRemote(edited)).toBeNull();
      expect(await app.sync.pushLocalToRemote(edited, async () => false)).toBeNull();
      expect(api.calls).not.toContain("updateTimesheet");

      const conflicts: PushConflict[] = [];
      const updated = await app.sync.pushLocalToRemote(edited, async (conflict) => {
        conflicts.push(conflict);
        return true;
      });

      expect(conflicts).toHaveLength(1);
      expect(conflicts[0]?.remoteIsNewer).toBe(false);
      expect(conflicts[0]?.remote.time).toBe(1);
      expect(updated?.time).toBe(2);
      expect(updated?.uuid).toBe(local.uuid);
      expect(api.timesheets.get(500)?.time).toBe(2);
    });

    it("flags a remote copy changed after the local one", async () => {
      const local = timesheet();
      await app.localTimesheets.save(local);
      const pushed = await app.sync.pushLocalToRemote(local);
      if (!pushed) {
        throw new Error("expected the timesheet to be pushed");
      }
      const stale = changeTimesheet(pushed, { description: "Older edit" }, NOON);
      await app.localTimesheets.update(stale);

      let newer: boolean | null = null;
      await app.sync.pushLocalToRemote(stale, async (conflict) => {
        newer = conflict.remoteIsNewer;
        return false;
      });
      expect(newer).toBe(true);
    });

    it("reports a remote copy that disappeared", async () => {
      const local = timesheet({ remoteId: 404 });
      await app.localTimesheets.save(local);
      await expect(
        app.sync.pushLocalToRemote(local, async () => true)
      ).rejects.toBeInstanceOf(NotFoundError);
    });

    it("keeps going when single pushes fail", async () => {
      const skipped = timesheet({ doNotSync: true });
      const failing = timesheet();
      await app.localTimesheets.save(skipped);
      await app.localTimesheets.save(failing);
      api.unavailable = true;

      const outcomes = await app.sync.pushMany([skipped, failing]);

      expect(outcomes.map((outcome) => outcome.status)).toEqual([
        "skipped",
        "failed",
      ]);
      expect(outcomes[1]).toMatchObject({ reason: "connection refused" });
      expect((await app.localTimesheets.get(failing.uuid))?.remoteId).toBeNull();
    });
  });

  describe("pull", () => {
    it("stores remote timesheets that are new locally", async () => {
      api.seed({ id: 900 });

      const written = await app.sync.pullFromRemote("2024-03-04");

      expect(written).toHaveLength(1);
      const stored = await app.localTimesheets.getByRemoteId(900);
      expect(stored).toMatchObject({
        description: "Remote entry",
        time: 1,
        date: "2024-03-04",
        assignment: { kind: "role", role: developer },
        updatedAt: REMOTE_MODIFIED,
        doNotSync: false,
      });
      expect(stored?.activity).toEqual(development);
    });

    it("writes nothing when the local copy already matches", async () => {
      api.seed({ id: 900 });
      await app.sync.pullFromRemote("2024-03-04");
      expect(await app.sync.pullFromRemote("2024-03-04")).toEqual([]);
      expect(await app.localTimesheets.all()).toHaveLength(1);
    });

    it("overwrites an older local copy but keeps its identity", async () => {
      api.seed({ id: 900 });
      await app.sync.pullFromRemote("2024-03-04");
      const before = await app.localTimesheets.getByRemoteId(900);
      if (!before) {
        throw new Error("expected a pulled timesheet");
      }
      await app.localTimesheets.update({
        ...before,
        frameUuids: ["frame-1"],
        doNotSync: true,
      });

      api.seed({ id: 900, description: "Changed remotely", time: 1.5 });
      const written = await app.sync.pullFromRemote("2024-03-04");

      expect(written).toHaveLength(1);
      expect(await app.localTimesheets.get(before.uuid)).toMatchObject({
        uuid: before.uuid,
        description: "Changed remotely",
        time: 1.5,
        frameUuids: ["frame-1"],
        doNotSync: true,
      });
    });

    it("asks before overwriting a newer local copy", async () => {
      api.seed({ id: 900 });
      await app.sync.pullFromRemote("2024-03-04");
      const pulled = await app.localTimesheets.getByRemoteId(900);
      if (!pulled) {
        throw new Error("expected a pulled timesheet");
      }
      const edited = changeTimesheet(
        pulled,
        { description: "Local edit" },
        REMOTE_MODIFIED + HOUR
      );
      await app.localTimesheets.update(edited);

      const warnings: string[] = [];
      const declined = await app.sync.pullFromRemote("2024-03-04", undefined, {
        onWarning: (message) => warnings.push(message),
      });
      expect(declined).toEqual([]);
      expect(warnings).toEqual([
        `Local timesheet ${pulled.uuid} has changes newer than remote 900; pulling overwrites them`,
      ]);
      expect((await app.localTimesheets.get(pulled.uuid))?.description).toBe(
        "Local edit"
      );

      const accepted = await app.sync.pullFromRemote("2024-03-04", "2024-03-04", {
        confirmOverwrite: async () => true,
      });
      expect(accepted.map((entry) => entry.description)).toEqual(["Remote entry"]);
      expect((await app.localTimesheets.get(pulled.uuid))?.description).toBe(
        "Remote entry"
      );
    });

    it("overwrites a newer local copy without asking when forced", async () => {
      api.seed({ id: 900 });
      await app.sync.pullFromRemote("2024-03-04");
      const pulled = await app.localTimesheets.getByRemoteId(900);
      if (!pulled) {
        throw new Error("expected a pulled timesheet");
      }
      await app.localTimesheets.update(
        changeTimesheet(pulled, { time: 3 }, REMOTE_MODIFIED + HOUR)
      );

      const written = await app.sync.pullFromRemote("2024-03-04", "2024-03-04", {
        force: true,
        confirmOverwrite: async () => {
          throw new Error("should not ask");
        },
      });
      expect(written.map((entry) => entry.time)).toEqual([1]);
    });

    it("skips remote timesheets on unknown activities", async () => {
      api.seed({ id: 901, activityId: 999 });
      api.seed({ id: 902, activityId: 102, roleId: null, individualAction: true });

      const written = await app.sync.pullFromRemote("2024-03-04");

      expect(written).toHaveLength(1);
      expect(written[0]?.activity).toEqual(support);
      expect(written[0]?.assignment).toEqual({ kind: "individual" });
    });

    it("keeps unknown remote roles by id", async () => {
      api.seed({ id: 903, roleId: 55 });
      const [pulled] = await app.sync.pullFromRemote("2024-03-04");
      expect(pulled?.assignment).toEqual({
        kind: "role",
        role: { id: 55, name: "", fullName: "", type: "", status: "", parentId: null },
      });
    });
  });

  describe("pull one", () => {
    it("refreshes a single pushed timesheet", async () => {
      const local = timesheet({ remoteId: 900 });
      await app.localTimesheets.save(local);
      api.seed({ id: 900, description: "Changed remotely" });
      api.seed({ id: 901, description: "Someone else's" });

      const result = await app.sync.pullTimesheet(local.uuid);

      expect(result.status).toBe("pulled");
      expect(result.timesheet).toMatchObject({
        uuid: local.uuid,
        remoteId: 900,
        description: "Changed remotely",
        updatedAt: REMOTE_MODIFIED,
      });
      expect(await app.localTimesheets.all()).toHaveLength(1);
      expect(await app.sync.pullTimesheet(local.uuid)).toEqual({
        status: "unchanged",
        timesheet: result.timesheet,
      });
    });

    it("refuses timesheets that were never pushed", async () => {
      const local = timesheet();
      await app.localTimesheets.save(local);
      await expect(app.sync.pullTimesheet(local.uuid)).rejects.toThrow(
        `Timesheet ${local.uuid} was never pushed; there is nothing to pull`
      );
      await expect(app.sync.pullTimesheet("missing")).rejects.toBeInstanceOf(
        NotFoundError
      );
    });

    it("offers to remove the local copy of a remotely deleted timesheet", async () => {
      const local = timesheet({ remoteId: 900 });
      await app.localTimesheets.save(local);
      const warnings: string[] = [];

      const kept = await app.sync.pullTimesheet(local.uuid, {
        onWarning: (message) => warnings.push(message),
        confirmLocalDelete: async () => false,
      });
      expect(kept).toEqual({
        status: "deleted-remotely",
        timesheet: local,
        localDeleted: false,
      });
      expect(warnings).toEqual(["Remote timesheet 900 no longer exists"]);
      expect(await app.localTimesheets.get(local.uuid)).toEqual(local);

      const removed = await app.sync.pullTimesheet(local.uuid, {
        confirmLocalDelete: async () => true,
      });
      expect(removed.status).toBe("deleted-remotely");
      expect(await app.localTimesheets.get(local.uuid)).toBeNull();
    });
  });

  describe("delete", () => {
    it("deletes a never pushed timesheet locally only", async () => {
      const local = timesheet();
      await app.localTimesheets.save(local);

      const result = await app.sync.deleteTimesheet(local.uuid, {
        confirmRemote: async () => true,
      });

      expect(result).toEqual({ timesheet: local, remoteDeleted: false });
      expect(await app.localTimesheets.all()).toEqual([]);
      expect(api.calls).toEqual([]);
    });

    it("deletes the remote copy once confirmed", async () => {
      api.seed({ id: 900 });
      const local = timesheet({ remoteId: 900 });
      await app.localTimesheets.save(local);

      const result = await app.sync.deleteTimesheet(local.uuid, {
        confirmRemote: async (remoteId) => remoteId === 900,
      });

      expect(result.remoteDeleted).toBe(true);
      expect(api.timesheets.has(900)).toBe(false);
    });

    it("keeps the remote copy without confirmation", async () => {
      api.seed({ id: 900 });
      const local = timesheet({ remoteId: 900 });
      await app.localTimesheets.save(local);
      const warnings: string[] = [];

      const result = await app.sync.deleteTimesheet(local.uuid, {
        onWarning: (message) => warnings.push(message),
      });

      expect(result.remoteDeleted).toBe(false);
      expect(warnings).toEqual([
        "Remote timesheet 900 was kept; only the local copy is deleted",
      ]);
      expect(api.timesheets.has(900)).toBe(true);
      expect(await app.localTimesheets.all()).toEqual([]);
    });

    it("still deletes locally when the remote is unreachable", async () => {
      const local = timesheet({ remoteId: 900 });
      await app.localTimesheets.save(local);
      api.unavailable = true;
      const warnings: string[] = [];

      const result = await app.sync.deleteTimesheet(local.uuid, {
        confirmRemote: async () => true,
        onWarning: (message) => warnings.push(message),
      });

      expect(result.remoteDeleted).toBe(false);
      expect(warnings).toEqual([
        "Remote timesheet 900 could not be deleted: connection refused",
      ]);
      expect(await app.localTimesheets.all()).toEqual([]);
    });

    it("reports unknown timesheets", async () => {
      await expect(app.sync.deleteTimesheet("missing")).rejects.toBeInstanceOf(
        NotFoundError
      );
    });
  });

  describe("merge", () => {
    it("folds timesheets into the first one", async () => {
      const first = timesheet({
        description: "A",
        time: 1,
        clientDescription: "visible",
        frameUuids: ["f1"],
        remoteId: 3,
        updatedAt: NOON + 10,
      });
      const second = timesheet({
        description: "B",
        time: 0.75,
        clientDescription: "  ",
        frameUuids: ["f1", "f2"],
        doNotSync: true,
      });
      await app.localTimesheets.save(first);
      await app.localTimesheets.save(second);

      const merged = await app.sync.merge([first.uuid, second.uuid]);

      expect(merged).toEqual({
        ...first,
        description: "A | B",
        clientDescription: "visible",
        time: 1.75,
        frameUuids: ["f1", "f2"],
        remoteId: null,
        updatedAt: NOON,
        doNotSync: false,
      });
      expect(await app.localTimesheets.all()).toEqual([merged]);
    });

    it("only merges the same activity and role", async () => {
      const base = timesheet();
      const otherActivity = timesheet({ activity: support });
      const otherRole = timesheet({ assignment: { kind: "role", role: lead } });
      for (const entry of [base, otherActivity, otherRole]) {
        await app.localTimesheets.save(entry);
      }

      await expect(
        app.sync.merge([base.uuid, otherActivity.uuid])
      ).rejects.toThrow("Only timesheets for the same activity can be merged");
      await expect(app.sync.merge([base.uuid, otherRole.uuid])).rejects.toThrow(
        "Only timesheets with the same role can be merged"
      );
    });

    it("needs two distinct existing timesheets", async () => {
      const base = timesheet();
      await app.localTimesheets.save(base);

      await expect(app.sync.merge([base.uuid])).rejects.toBeInstanceOf(
        InvalidOperationError
      );
      await expect(app.sync.merge([base.uuid, base.uuid])).rejects.toBeInstanceOf(
        InvalidOperationError
      );
      await expect(app.sync.merge([base.uuid, "missing"])).rejects.toBeInstanceOf(
        NotFoundError
      );
    });
  });
});
