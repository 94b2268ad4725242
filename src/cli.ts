#!/usr/bin/env node
import * as readline from "readline/promises";
import { Command } from "commander";
import { App, createApp } from "./app";
import { Activity, Frame, RoleAssignment, Timesheet } from "./types";
import { formatEntityKey, parseEntityKey, tryParseEntityKey } from "./entityKey";
import {
  formatDuration,
  formatLocalDateTime,
  parseDateInput,
  parseTimeInput,
  remoteDayBounds,
  todayInRemoteZone,
} from "./dates";
import { frameDuration } from "./frame";
import { changeTimesheet, createTimesheet } from "./timesheet";
import { PushConflict } from "./timesheetSync";
import {
  describeError,
  InvalidOperationError,
  isTrackError,
  NotFoundError,
} from "./errors";
import { logger } from "./logger";

type AppFactory = () => Promise<App>;

/** Asks a yes/no question; `force` answers yes without asking. */
export type Confirm = (
  question: string,
  force: boolean | undefined
) => Promise<boolean>;

interface RoleFlags {
  role?: string;
  individual?: boolean;
}

interface StartFlags extends RoleFlags {
  description?: string;
  at?: string;
  gap: boolean;
}

interface AddFlags extends RoleFlags {
  from: string;
  to: string;
  description?: string;
}

interface EditFrameFlags extends RoleFlags {
  start?: string;
  stop?: string;
  activity?: string;
  description?: string;
}

interface RangeFlags {
  from?: string;
  to?: string;
}

interface TimesheetFlags extends RoleFlags {
  time?: string;
  date?: string;
  description?: string;
  clientDescription?: string;
  doNotSync?: boolean;
}

interface ForceFlag {
  force?: boolean;
}

// #region Prompts and output

async function ask(question: string): Promise<boolean> {
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });
  // An input that ends before the answer counts as "no".
  const closed = new Promise<string>((resolve) => {
    rl.once("close", () => resolve(""));
  });
  try {
    const answer = await Promise.race([
      rl.question(`${question} [y/N] `),
      closed,
    ]);
    return /^y(es)?$/i.test(answer.trim());
  } finally {
    rl.close();
  }
}

export function createConfirm(interactive: boolean): Confirm {
  return async (question, force) => {
    if (force) {
      return true;
    }
    if (!interactive) {
      throw new InvalidOperationError(
        `"${question}" needs an answer; use --force when not running in a terminal`
      );
    }
    return ask(question);
  };
}

function print(line = ""): void {
  console.log(line);
}

function warn(message: string): void {
  console.error(`Warning: ${message}`);
}

function describeFrame(frame: Frame, now: number): string {
  const stop =
    frame.stopTime === null ? "now" : formatLocalDateTime(frame.stopTime);
  const parts = [
    frame.uuid.slice(0, 8),
    `${formatLocalDateTime(frame.startTime)} - ${stop}`,
    formatDuration(frameDuration(frame, now)),
    frame.activity.name,
  ];
  if (frame.description) {
    parts.push(frame.description);
  }
  return parts.join("  ");
}

function describeTimesheet(timesheet: Timesheet): string {
  const sync =
    timesheet.remoteId !== null
      ? `#${timesheet.remoteId}`
      : timesheet.doNotSync
        ? "local only"
        : "unsynced";
  return [
    timesheet.uuid.slice(0, 8),
    timesheet.date,
    `${timesheet.time.toFixed(2)}h`,
    timesheet.activity.name,
    timesheet.description,
    `(${sync})`,
  ].join("  ");
}

function describeActivity(activity: Activity): string {
  const alias = activity.alias ? ` [${activity.alias}]` : "";
  return `${formatEntityKey(activity.key)}  ${activity.name}${alias}`;
}

// #endregion

// #region Argument resolution

async function resolveActivity(app: App, ref: string): Promise<Activity> {
  const key = tryParseEntityKey(ref);
  const byKey = key ? await app.activities.get(key) : null;
  const activity = byKey ?? (await app.activities.getByAlias(ref));
  if (!activity) {
    throw new NotFoundError(`No activity with key or alias "${ref}"`);
  }
  return activity;
}

async function resolveAssignment(
  app: App,
  flags: RoleFlags
): Promise<RoleAssignment | undefined> {
  if (flags.individual) {
    return { kind: "individual" };
  }
  if (!flags.role) {
    return undefined;
  }
  const role = await app.users.findCurrentUserRoleByName(flags.role);
  if (!role) {
    throw new NotFoundError(`No role matching "${flags.role}"`);
  }
  return { kind: "role", role };
}

function pickUnique<T extends { uuid: string }>(
  matches: T[],
  ref: string,
  label: string
): T {
  const [first, ...rest] = matches;
  if (!first) {
    throw new NotFoundError(`No ${label} matching "${ref}"`);
  }
  if (rest.length > 0) {
    throw new InvalidOperationError(
      `"${ref}" matches ${matches.length} ${label}s; give more of the uuid`
    );
  }
  return first;
}

async function resolveFrame(app: App, ref: string): Promise<Frame> {
  return pickUnique(await app.frames.findByUuidPrefix(ref), ref, "frame");
}

async function resolveTimesheet(app: App, ref: string): Promise<Timesheet> {
  return pickUnique(
    await app.localTimesheets.findByUuidPrefix(ref),
    ref,
    "timesheet"
  );
}

function parseHours(value: string): number {
  const hours = Number(value.replace(",", "."));
  if (!Number.isFinite(hours)) {
    throw new InvalidOperationError(`Invalid number of hours: ${value}`);
  }
  return hours;
}

function dateRange(app: App, flags: RangeFlags): { from: string; to: string } {
  const from = flags.from
    ? parseDateInput(flags.from, app.clock)
    : todayInRemoteZone(app.clock);
  const to = flags.to ? parseDateInput(flags.to, app.clock) : from;
  return { from, to };
}

// #endregion

function registerFrameCommands(
  program: Command,
  getApp: AppFactory,
  confirm: Confirm
): void {
  program
    .command("start <activity>")
    .description("Start tracking an activity (alias or entity key)")
    .option("-d, --description <text>", "frame description")
    .option("--at <time>", "start time (HH:mm or ISO 8601)")
    .option("--no-gap", "start where the previous frame stopped")
    .option("--role <name>", "role to book the frame on")
    .option("--individual", "individual action, no role")
    .action(async (ref: string, flags: StartFlags) => {
      const app = await getApp();
      const frame = await app.tracker.start(await resolveActivity(app, ref), {
        description: flags.description,
        at: flags.at ? parseTimeInput(flags.at, app.clock) : undefined,
        gap: flags.gap,
        assignment: await resolveAssignment(app, flags),
      });
      print(`Started ${frame.activity.name} at ${formatLocalDateTime(frame.startTime)}`);
    });

  program
    .command("stop")
    .description("Stop the current frame")
    .option("--at <time>", "stop time (HH:mm or ISO 8601)")
    .action(async (flags: { at?: string }) => {
      const app = await getApp();
      const frame = await app.tracker.stop(
        flags.at ? parseTimeInput(flags.at, app.clock) : undefined
      );
      print(`Stopped: ${describeFrame(frame, app.clock())}`);
    });

  program
    .command("cancel")
    .description("Discard the current frame")
    .action(async () => {
      const app = await getApp();
      const frame = await app.tracker.cancel();
      print(`Cancelled ${frame.activity.name}`);
    });

  program
    .command("restart [frame]")
    .description("Start again on the last (or the given) frame's activity")
    .option("-d, --description <text>", "replace the description")
    .option("--at <time>", "start time (HH:mm or ISO 8601)")
    .option("--no-gap", "start where the previous frame stopped")
    .action(async (ref: string | undefined, flags: StartFlags) => {
      const app = await getApp();
      const source = ref ? await resolveFrame(app, ref) : null;
      const frame = await app.tracker.restart({
        frameUuid: source?.uuid,
        description: flags.description,
        at: flags.at ? parseTimeInput(flags.at, app.clock) : undefined,
        gap: flags.gap,
      });
      print(`Started ${frame.activity.name} at ${formatLocalDateTime(frame.startTime)}`);
    });

  program
    .command("add <activity>")
    .description("Record a finished frame")
    .requiredOption("--from <time>", "start time")
    .requiredOption("--to <time>", "stop time")
    .option("-d, --description <text>", "frame description")
    .option("--role <name>", "role to book the frame on")
    .option("--individual", "individual action, no role")
    .action(async (ref: string, flags: AddFlags) => {
      const app = await getApp();
      const frame = await app.tracker.add(
        await resolveActivity(app, ref),
        parseTimeInput(flags.from, app.clock),
        parseTimeInput(flags.to, app.clock),
        {
          description: flags.description,
          assignment: await resolveAssignment(app, flags),
        }
      );
      print(`Added: ${describeFrame(frame, app.clock())}`);
    });

  program
    .command("status")
    .description("Show the current frame")
    .action(async () => {
      const app = await getApp();
      const current = await app.tracker.getCurrent();
      print(current ? describeFrame(current, app.clock()) : "No frame started");
    });

  program
    .command("frames")
    .description("List frames of a day or a date range")
    .option("--from <date>", "first day (YYYY-MM-DD, today, yesterday)")
    .option("--to <date>", "last day")
    .option("--issue <keys...>", "only frames mentioning these issue keys")
    .action(async (flags: RangeFlags & { issue?: string[] }) => {
      const app = await getApp();
      const { from, to } = dateRange(app, flags);
      const frames = await app.frames.filter({
        from: remoteDayBounds(from).start,
        to: remoteDayBounds(to).end,
        issueKeys: flags.issue,
        includePartial: true,
      });
      const now = app.clock();
      let total = 0;
      for (const frame of frames) {
        total += frameDuration(frame, now);
        print(describeFrame(frame, now));
      }
      print(`Total: ${formatDuration(total)}`);
    });

  program
    .command("edit <frame>")
    .description("Change a frame")
    .option("--start <time>", "new start time")
    .option("--stop <time>", "new stop time")
    .option("--activity <activity>", "new activity (alias or entity key)")
    .option("-d, --description <text>", "new description")
    .option("--role <name>", "new role")
    .option("--individual", "make it an individual action")
    .action(async (ref: string, flags: EditFrameFlags) => {
      const app = await getApp();
      const frame = await resolveFrame(app, ref);
      const edited = await app.tracker.edit(frame.uuid, {
        startTime: flags.start ? parseTimeInput(flags.start, app.clock) : undefined,
        stopTime: flags.stop ? parseTimeInput(flags.stop, app.clock) : undefined,
        activity: flags.activity
          ? await resolveActivity(app, flags.activity)
          : undefined,
        description: flags.description,
        assignment: await resolveAssignment(app, flags),
      });
      print(`Updated: ${describeFrame(edited, app.clock())}`);
    });

  program
    .command("remove <frame>")
    .description("Delete a frame")
    .option("-f, --force", "do not ask")
    .action(async (ref: string, flags: ForceFlag) => {
      const app = await getApp();
      const frame = await resolveFrame(app, ref);
      if (!(await confirm(`Delete ${describeFrame(frame, app.clock())}?`, flags.force))) {
        return;
      }
      await app.tracker.remove(frame.uuid);
      print(`Removed frame ${frame.uuid}`);
    });
}

function registerCatalogCommands(
  program: Command,
  getApp: AppFactory,
  confirm: Confirm
): void {
  program
    .command("projects")
    .description("List projects, local first")
    .option("--all", "include inactive projects")
    .option("--search <name>", "filter by name")
    .action(async (flags: { all?: boolean; search?: string }) => {
      const app = await getApp();
      const projects = flags.search
        ? await app.projects.getByNameLike(flags.search)
        : await app.projects.all(flags.all ? [] : undefined);
      for (const project of projects) {
        print(`${formatEntityKey(project.key)}  ${project.name}`);
        for (const activity of project.activities) {
          print(`  ${describeActivity(activity)}`);
        }
      }
    });

  program
    .command("project:create <name>")
    .description("Create a local project")
    .option("-d, --description <text>", "project description", "")
    .action(async (name: string, flags: { description: string }) => {
      const app = await getApp();
      const project = await app.projects.create(name, flags.description);
      print(`Created project ${formatEntityKey(project.key)}`);
    });

  program
    .command("project:delete <project>")
    .description("Delete a local project")
    .option("-f, --force", "also delete its activities and their frames")
    .action(async (ref: string, flags: ForceFlag) => {
      const app = await getApp();
      const key = parseEntityKey(ref);
      if (!flags.force) {
        await app.projects.delete(key);
      } else {
        await app.projects.forceDelete(key, async (activity) => {
          const removed = await app.activities.forceDelete(activity.key);
          print(`Removed ${activity.name} and ${removed} frame(s)`);
        });
      }
      print(`Deleted project ${ref}`);
    });

  program
    .command("activities")
    .description("List activities, local first")
    .option("--all", "include activities of inactive projects")
    .option("--search <text>", "filter by name or alias")
    .action(async (flags: { all?: boolean; search?: string }) => {
      const app = await getApp();
      const activeOnly = !flags.all;
      const activities = flags.search
        ? await app.activities.searchByNameOrAlias(flags.search, activeOnly)
        : await app.activities.all(activeOnly);
      for (const activity of activities) {
        print(describeActivity(activity));
      }
    });

  program
    .command("activity:create <name>")
    .description("Create an activity in a local project")
    .requiredOption("--project <key>", "local project key")
    .option("-d, --description <text>", "activity description", "")
    .option("--alias <alias>", "short name to start it by")
    .action(
      async (
        name: string,
        flags: { project: string; description: string; alias?: string }
      ) => {
        const app = await getApp();
        const activity = await app.activities.create(
          name,
          flags.description,
          parseEntityKey(flags.project),
          flags.alias ?? null
        );
        print(`Created activity ${describeActivity(activity)}`);
      }
    );

  program
    .command("activity:delete <activity>")
    .description("Delete a local activity")
    .option("-f, --force", "also delete its frames")
    .action(async (ref: string, flags: ForceFlag) => {
      const app = await getApp();
      const activity = await resolveActivity(app, ref);
      if (flags.force) {
        const removed = await app.activities.forceDelete(activity.key);
        print(`Deleted ${activity.name} and ${removed} frame(s)`);
      } else {
        await app.activities.delete(activity.key);
        print(`Deleted ${activity.name}`);
      }
    });

  program
    .command("roles")
    .description("List the roles of the configured user")
    .action(async () => {
      const app = await getApp();
      const defaultRole = await app.users.getCurrentUserDefaultRole();
      for (const role of await app.users.getCurrentUserRoles()) {
        const marker = role.id === defaultRole?.id ? "*" : " ";
        print(`${marker} ${role.id}  ${role.name}  ${role.fullName}`);
      }
    });

  program
    .command("refresh")
    .description("Re-fetch remote projects and the configured user")
    .action(async () => {
      const app = await getApp();
      const projects = await app.projects.refresh();
      const user = await app.users.refresh();
      print(`Fetched ${projects.length} project(s)`);
      if (user) {
        print(`Fetched user ${user.name} with ${user.roles.length} role(s)`);
      }
    });

  program
    .command("config:set <key> <value>")
    .description("Set a configuration value (e.g. user.id)")
    .action(async (key: string, value: string) => {
      const app = await getApp();
      await app.config.set(key, /^\d+$/.test(value) ? Number(value) : value);
    });

  program
    .command("config:get [key]")
    .description("Show configuration")
    .action(async (key: string | undefined) => {
      const app = await getApp();
      const value = key ? await app.config.get(key) : await app.config.all();
      print(JSON.stringify(value ?? null, null, 2));
    });
}

function registerTimesheetCommands(
  program: Command,
  getApp: AppFactory,
  confirm: Confirm
): void {
  program
    .command("timesheet:list")
    .description("List local timesheets")
    .option("--from <date>", "first day")
    .option("--to <date>", "last day")
    .option("--unsynced", "only timesheets not pushed yet")
    .action(async (flags: RangeFlags & { unsynced?: boolean }) => {
      const app = await getApp();
      const { from, to } = dateRange(app, flags);
      const timesheets = flags.unsynced
        ? await app.localTimesheets.getUnsynced()
        : await app.localTimesheets.getByDateRange(from, to);
      let total = 0;
      for (const timesheet of timesheets) {
        total += timesheet.time;
        print(describeTimesheet(timesheet));
      }
      print(`Total: ${total.toFixed(2)}h`);
    });

  program
    .command("timesheet:create <activity>")
    .description("Create a local timesheet on a remote activity")
    .requiredOption("--time <hours>", "hours, a multiple of 0.25")
    .option("--date <date>", "date (YYYY-MM-DD, today, yesterday)")
    .option("-d, --description <text>", "description", "")
    .option("--client-description <text>", "description shown to the client")
    .option("--role <name>", "role to book on")
    .option("--individual", "individual action, no role")
    .option("--do-not-sync", "keep it local")
    .action(async (ref: string, flags: TimesheetFlags) => {
      const app = await getApp();
      const defaultRole = await app.users.getCurrentUserDefaultRole();
      const assignment: RoleAssignment | undefined =
        (await resolveAssignment(app, flags)) ??
        (defaultRole ? { kind: "role", role: defaultRole } : undefined);
      if (!assignment) {
        throw new InvalidOperationError(
          "No role given and no default role configured"
        );
      }
      const timesheet = createTimesheet({
        activity: await resolveActivity(app, ref),
        description: flags.description ?? "",
        clientDescription: flags.clientDescription,
        time: parseHours(flags.time ?? ""),
        date: flags.date
          ? parseDateInput(flags.date, app.clock)
          : todayInRemoteZone(app.clock),
        assignment,
        updatedAt: app.clock(),
        doNotSync: flags.doNotSync,
      });
      await app.localTimesheets.save(timesheet);
      print(`Created: ${describeTimesheet(timesheet)}`);
    });

  program
    .command("timesheet:edit <timesheet>")
    .description("Change a local timesheet")
    .option("--time <hours>", "hours, a multiple of 0.25")
    .option("--date <date>", "date")
    .option("-d, --description <text>", "description")
    .option("--client-description <text>", "description shown to the client")
    .option("--role <name>", "role to book on")
    .option("--individual", "individual action, no role")
    .option("--do-not-sync", "keep it local")
    .action(async (ref: string, flags: TimesheetFlags) => {
      const app = await getApp();
      const timesheet = await resolveTimesheet(app, ref);
      const edited = changeTimesheet(
        timesheet,
        {
          time: flags.time ? parseHours(flags.time) : undefined,
          date: flags.date ? parseDateInput(flags.date, app.clock) : undefined,
          description: flags.description,
          clientDescription: flags.clientDescription,
          assignment: await resolveAssignment(app, flags),
          doNotSync: flags.doNotSync,
        },
        app.clock()
      );
      await app.localTimesheets.update(edited);
      print(`Updated: ${describeTimesheet(edited)}`);
    });

  program
    .command("timesheet:from-frames [date]")
    .description("Build timesheets from a day's frames")
    .option("--dry-run", "show what would be written")
    .action(async (date: string | undefined, flags: { dryRun?: boolean }) => {
      const app = await getApp();
      const day = date
        ? parseDateInput(date, app.clock)
        : todayInRemoteZone(app.clock);
      const result = await app.builder.fromFrames(day, { dryRun: flags.dryRun });
      for (const timesheet of result.created) {
        print(`Created: ${describeTimesheet(timesheet)}`);
      }
      for (const timesheet of result.updated) {
        print(`Linked frames: ${describeTimesheet(timesheet)}`);
      }
      if (result.created.length + result.updated.length === 0) {
        print(`Nothing to do for ${day}`);
      }
    });

  program
    .command("timesheet:merge <timesheets...>")
    .description("Merge local timesheets into the first one")
    .option("-f, --force", "merge without asking")
    .action(async (refs: string[], flags: ForceFlag) => {
      const app = await getApp();
      const timesheets: Timesheet[] = [];
      for (const ref of refs) {
        timesheets.push(await resolveTimesheet(app, ref));
      }
      print("Merging:");
      for (const timesheet of timesheets) {
        print(`  ${describeTimesheet(timesheet)}`);
      }
      const total = timesheets.reduce((sum, entry) => sum + entry.time, 0);
      print(`Total: ${total.toFixed(2)}h in ${timesheets.length} timesheet(s)`);
      const pushed = timesheets.filter((entry) => entry.remoteId !== null);
      if (pushed.length > 0) {
        const ids = pushed.map((entry) => `#${entry.remoteId}`).join(", ");
        warn(
          `${ids} already pushed; the merged timesheet loses its sync status and those remote copies stay as they are`
        );
      }
      if (!(await confirm(`Merge ${timesheets.length} timesheets?`, flags.force))) {
        print("Nothing merged");
        return;
      }
      const merged = await app.sync.merge(timesheets.map((entry) => entry.uuid));
      print(`Merged: ${describeTimesheet(merged)}`);
    });

  program
    .command("timesheet:push [timesheets...]")
    .description("Push timesheets (default: all unsynced) to the remote")
    .option("-f, --force", "update remote copies without asking")
    .action(async (refs: string[], flags: ForceFlag) => {
      const app = await getApp();
      const timesheets =
        refs.length > 0
          ? await Promise.all(refs.map((ref) => resolveTimesheet(app, ref)))
          : await app.localTimesheets.getUnsynced();
      const outcomes = await app.sync.pushMany(
        timesheets,
        (conflict: PushConflict) => {
          if (conflict.remoteIsNewer) {
            warn(
              `remote timesheet ${conflict.remote.remoteId} changed after the local copy`
            );
          }
          return confirm(
            `Overwrite remote ${describeTimesheet(conflict.remote)}?`,
            flags.force
          );
        }
      );
      for (const outcome of outcomes) {
        switch (outcome.status) {
          case "pushed":
            print(`Pushed: ${describeTimesheet(outcome.timesheet)}`);
            break;
          case "skipped":
            print(`Skipped (${outcome.reason}): ${describeTimesheet(outcome.timesheet)}`);
            break;
          case "failed":
            warn(`${outcome.timesheet.uuid.slice(0, 8)} failed: ${outcome.reason}`);
            process.exitCode = 1;
            break;
        }
      }
    });

  program
    .command("timesheet:pull [timesheet]")
    .description("Fetch remote timesheets (a date range, or one pushed timesheet)")
    .option("--from <date>", "first day")
    .option("--to <date>", "last day")
    .option("-f, --force", "overwrite or remove local copies without asking")
    .action(async (ref: string | undefined, flags: RangeFlags & ForceFlag) => {
      const app = await getApp();
      const confirmOverwrite = (local: Timesheet) =>
        confirm(`Overwrite local ${describeTimesheet(local)}?`, undefined);

      if (ref) {
        const timesheet = await resolveTimesheet(app, ref);
        const result = await app.sync.pullTimesheet(timesheet.uuid, {
          force: flags.force,
          onWarning: warn,
          confirmOverwrite,
          confirmLocalDelete: (local) =>
            confirm(`Delete local ${describeTimesheet(local)}?`, flags.force),
        });
        switch (result.status) {
          case "pulled":
            print(`Pulled: ${describeTimesheet(result.timesheet)}`);
            break;
          case "unchanged":
            print(`Unchanged: ${describeTimesheet(result.timesheet)}`);
            break;
          case "deleted-remotely":
            print(
              result.localDeleted
                ? `Deleted ${result.timesheet.uuid} locally`
                : `Kept ${result.timesheet.uuid} locally`
            );
            break;
        }
        return;
      }

      const { from, to } = dateRange(app, flags);
      const written = await app.sync.pullFromRemote(from, to, {
        force: flags.force,
        onWarning: warn,
        confirmOverwrite,
      });
      for (const timesheet of written) {
        print(`Pulled: ${describeTimesheet(timesheet)}`);
      }
      print(`${written.length} timesheet(s) written`);
    });

  program
    .command("timesheet:delete <timesheet>")
    .description("Delete a local timesheet and, once confirmed, its remote copy")
    .option("-f, --force", "delete the remote copy without asking")
    .action(async (ref: string, flags: ForceFlag) => {
      const app = await getApp();
      const timesheet = await resolveTimesheet(app, ref);
      const result = await app.sync.deleteTimesheet(timesheet.uuid, {
        confirmRemote: (remoteId) =>
          confirm(`Also delete remote timesheet #${remoteId}?`, flags.force),
        onWarning: warn,
      });
      print(
        result.remoteDeleted
          ? `Deleted ${timesheet.uuid} locally and remotely`
          : `Deleted ${timesheet.uuid} locally`
      );
    });
}

export function buildProgram(
  getApp: AppFactory,
  confirm: Confirm = createConfirm(Boolean(process.stdin.isTTY))
): Command {
  const program = new Command();
  program
    .name("frametrack")
    .description("Track time in frames and book it as timesheets")
    .option("-v, --verbose", "log debug output");

  registerFrameCommands(program, getApp, confirm);
  registerCatalogCommands(program, getApp, confirm);
  registerTimesheetCommands(program, getApp, confirm);
  return program;
}

export async function run(argv: string[] = process.argv): Promise<number> {
  let app: Promise<App> | null = null;
  const program = buildProgram(() => {
    app ??= createApp().then((created) => {
      if (program.opts<{ verbose?: boolean }>().verbose) {
        created.logger.setLevel("debug");
      }
      return created;
    });
    return app;
  });
  try {
    await program.parseAsync(argv);
    return typeof process.exitCode === "number" ? process.exitCode : 0;
  } catch (err) {
    if (isTrackError(err)) {
      console.error(`Error: ${err.message}`);
      logger.debug(`${err.kind}`, err.cause);
      return 1;
    }
    logger.error(describeError(err), err);
    return 1;
  }
}

if (require.main === module) {
  run().then((code) => {
    process.exitCode = code;
  }, (err: unknown) => {
    console.error(describeError(err));
    process.exitCode = 1;
  });
}
