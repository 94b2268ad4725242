import { LocalTimesheetRepository } from "./localTimesheetRepository";
import {
  DeleteConfirmation,
  RemoteTimesheetRepository,
} from "./remoteTimesheetRepository";
import { assertValidTime, createTimesheet, sameRemoteContent } from "./timesheet";
import { Timesheet, sameAssignment } from "./types";
import { keysEqual } from "./entityKey";
import {
  InvalidOperationError,
  NotFoundError,
  RemoteUnavailableError,
} from "./errors";
import { Logger, logger as rootLogger } from "./logger";

export const MERGE_SEPARATOR = " | ";

export interface PushConflict {
  local: Timesheet;
  remote: Timesheet;
  // Strictly newer; equal timestamps do not count.
  remoteIsNewer: boolean;
}

export type PushConfirmation = (conflict: PushConflict) => Promise<boolean>;
export type PullConfirmation = (
  local: Timesheet,
  remote: Timesheet
) => Promise<boolean>;
export type WarningSink = (message: string) => void;

export interface PullOptions {
  force?: boolean;
  // Asked when the local copy is newer than the remote one.
  confirmOverwrite?: PullConfirmation;
  onWarning?: WarningSink;
}

export interface PullOneOptions extends PullOptions {
  // Asked when the remote copy is gone; agreeing removes the local one.
  confirmLocalDelete?: (local: Timesheet) => Promise<boolean>;
}

export type PullOneResult =
  | { status: "pulled"; timesheet: Timesheet }
  | { status: "unchanged"; timesheet: Timesheet }
  | { status: "deleted-remotely"; timesheet: Timesheet; localDeleted: boolean };

export interface DeleteOptions {
  confirmRemote?: DeleteConfirmation;
  onWarning?: WarningSink;
}

export interface DeleteResult {
  timesheet: Timesheet;
  remoteDeleted: boolean;
}

export type PushOutcome =
  | { status: "pushed"; timesheet: Timesheet }
  | { status: "skipped"; timesheet: Timesheet; reason: string }
  | { status: "failed"; timesheet: Timesheet; reason: string };

/**
 * Reconciles local and remote timesheets. Conflicts are decided by
 * `updatedAt`; the side with the strictly greater value is newer.
 */
export class TimesheetSyncService {
  private readonly logger: Logger;

  constructor(
    private readonly local: LocalTimesheetRepository,
    private readonly remote: RemoteTimesheetRepository,
    logger: Logger = rootLogger
  ) {
    this.logger = logger.child("sync");
  }

  /**
   * Creates the timesheet remotely, or updates the remote copy once
   * `confirm` agrees. Returns the stored local record, or null when nothing
   * was pushed.
   */
  async pushLocalToRemote(
    timesheet: Timesheet,
    confirm?: PushConfirmation
  ): Promise<Timesheet | null> {
    if (timesheet.doNotSync) {
      this.logger.info(`not pushing ${timesheet.uuid}: marked do-not-sync`);
      return null;
    }

    if (timesheet.remoteId === null) {
      const created = await this.remote.create(timesheet);
      const stored = this.keepLocalIdentity(created, timesheet);
      await this.local.save(stored);
      return stored;
    }

    if (!confirm) {
      return null;
    }
    const current = await this.remote.getByRemoteId(timesheet.remoteId);
    if (!current) {
      throw new NotFoundError(
        `Remote timesheet ${timesheet.remoteId} no longer exists`
      );
    }
    const remoteIsNewer = current.updatedAt > timesheet.updatedAt;
    const updated = await this.remote.update(timesheet, (local) =>
      confirm({ local, remote: current, remoteIsNewer })
    );
    if (!updated) {
      return null;
    }
    const stored = this.keepLocalIdentity(updated, timesheet);
    await this.local.update(stored);
    return stored;
  }

  /**
   * Pushes each timesheet in turn. A remote failure is reported for that
   * record and the rest still go out.
   */
  async pushMany(
    timesheets: Timesheet[],
    confirm?: PushConfirmation
  ): Promise<PushOutcome[]> {
    const outcomes: PushOutcome[] = [];
    for (const timesheet of timesheets) {
      if (timesheet.doNotSync) {
        outcomes.push({ status: "skipped", timesheet, reason: "do-not-sync" });
        continue;
      }
      try {
        const pushed = await this.pushLocalToRemote(timesheet, confirm);
        outcomes.push(
          pushed
            ? { status: "pushed", timesheet: pushed }
            : { status: "skipped", timesheet, reason: "not confirmed" }
        );
      } catch (err) {
        if (
          err instanceof RemoteUnavailableError ||
          err instanceof NotFoundError
        ) {
          this.logger.warn(`push of ${timesheet.uuid} failed: ${err.message}`);
          outcomes.push({ status: "failed", timesheet, reason: err.message });
          continue;
        }
        throw err;
      }
    }
    return outcomes;
  }

  /**
   * Brings remote timesheets dated in [from, to] into the local store and
   * returns the records written. A local copy newer than the remote one is
   * only overwritten with `force` or a confirmation.
   */
  async pullFromRemote(
    from: string,
    to: string = from,
    options: PullOptions = {}
  ): Promise<Timesheet[]> {
    const remoteTimesheets = await this.remote.getByDateRange(from, to);
    const written: Timesheet[] = [];

    for (const remote of remoteTimesheets) {
      const local =
        remote.remoteId === null
          ? null
          : await this.local.getByRemoteId(remote.remoteId);
      const stored = await this.applyRemote(remote, local, options);
      if (stored) {
        written.push(stored);
      }
    }

    return written;
  }

  /**
   * Refreshes one pushed timesheet from its remote copy. When the remote
   * copy is gone the caller may remove the local one.
   */
  async pullTimesheet(
    uuid: string,
    options: PullOneOptions = {}
  ): Promise<PullOneResult> {
    const local = await this.local.get(uuid);
    if (!local) {
      throw new NotFoundError(`Timesheet ${uuid} not found`);
    }
    if (local.remoteId === null) {
      throw new InvalidOperationError(
        `Timesheet ${uuid} was never pushed; there is nothing to pull`
      );
    }

    const remote = await this.remote.getByRemoteId(local.remoteId);
    if (!remote) {
      const message = `Remote timesheet ${local.remoteId} no longer exists`;
      options.onWarning?.(message);
      this.logger.warn(message);
      const remove = options.confirmLocalDelete
        ? await options.confirmLocalDelete(local)
        : false;
      if (remove) {
        await this.local.remove(uuid);
      }
      return { status: "deleted-remotely", timesheet: local, localDeleted: remove };
    }

    const stored = await this.applyRemote(remote, local, options);
    return stored
      ? { status: "pulled", timesheet: stored }
      : { status: "unchanged", timesheet: local };
  }

  /**
   * Deletes locally, and remotely when the record was pushed and
   * `confirmRemote` agrees. A failed remote delete only produces a warning.
   */
  async deleteTimesheet(
    uuid: string,
    options: DeleteOptions = {}
  ): Promise<DeleteResult> {
    const timesheet = await this.local.get(uuid);
    if (!timesheet) {
      throw new NotFoundError(`Timesheet ${uuid} not found`);
    }

    let remoteDeleted = false;
    if (timesheet.remoteId !== null) {
      if (options.confirmRemote) {
        try {
          remoteDeleted = await this.remote.delete(
            timesheet.remoteId,
            options.confirmRemote
          );
        } catch (err) {
          if (!(err instanceof RemoteUnavailableError)) {
            throw err;
          }
          const message = `Remote timesheet ${timesheet.remoteId} could not be deleted: ${err.message}`;
          options.onWarning?.(message);
          this.logger.warn(message);
        }
      } else {
        options.onWarning?.(
          `Remote timesheet ${timesheet.remoteId} was kept; only the local copy is deleted`
        );
      }
    }

    await this.local.remove(uuid);
    return { timesheet, remoteDeleted };
  }

  /**
   * Combines local timesheets for the same activity and role into the first
   * one. The result always needs a fresh push.
   */
  async merge(uuids: string[]): Promise<Timesheet> {
    if (new Set(uuids).size !== uuids.length) {
      throw new InvalidOperationError("The same timesheet was given twice");
    }
    if (uuids.length < 2) {
      throw new InvalidOperationError("Merging needs at least two timesheets");
    }

    const timesheets: Timesheet[] = [];
    for (const uuid of uuids) {
      const timesheet = await this.local.get(uuid);
      if (!timesheet) {
        throw new NotFoundError(`Timesheet ${uuid} not found`);
      }
      timesheets.push(timesheet);
    }

    const [first, ...rest] = timesheets;
    for (const other of rest) {
      if (!keysEqual(other.activity.key, first.activity.key)) {
        throw new InvalidOperationError(
          "Only timesheets for the same activity can be merged"
        );
      }
      if (!sameAssignment(other.assignment, first.assignment)) {
        throw new InvalidOperationError(
          "Only timesheets with the same role can be merged"
        );
      }
    }

    // Rounded to cents so float sums stay on the quarter grid.
    const time =
      Math.round(timesheets.reduce((sum, entry) => sum + entry.time, 0) * 100) /
      100;
    assertValidTime(time);

    const clientDescriptions = timesheets
      .map((entry) => entry.clientDescription)
      .filter((text): text is string => text !== null && text.trim() !== "");

    const merged = createTimesheet({
      uuid: first.uuid,
      activity: first.activity,
      description: timesheets.map((entry) => entry.description).join(MERGE_SEPARATOR),
      clientDescription:
        clientDescriptions.length > 0
          ? clientDescriptions.join(MERGE_SEPARATOR)
          : null,
      time,
      date: first.date,
      assignment: first.assignment,
      frameUuids: timesheets.flatMap((entry) => entry.frameUuids),
      remoteId: null,
      updatedAt: Math.min(...timesheets.map((entry) => entry.updatedAt)),
      doNotSync: false,
    });

    await this.local.save(merged);
    for (const other of rest) {
      await this.local.remove(other.uuid);
    }
    return merged;
  }

  /** Writes `remote` over `local` (or as a new record); null when nothing was written. */
  private async applyRemote(
    remote: Timesheet,
    local: Timesheet | null,
    options: PullOptions
  ): Promise<Timesheet | null> {
    if (!local) {
      await this.local.save(remote);
      return remote;
    }

    if (local.updatedAt > remote.updatedAt && !options.force) {
      const message = `Local timesheet ${local.uuid} has changes newer than remote ${remote.remoteId}; pulling overwrites them`;
      options.onWarning?.(message);
      this.logger.warn(message);
      const confirmed = options.confirmOverwrite
        ? await options.confirmOverwrite(local, remote)
        : false;
      if (!confirmed) {
        return null;
      }
    }

    const replacement = this.keepLocalIdentity(remote, local);
    if (sameRemoteContent(local, replacement)) {
      return null;
    }
    await this.local.update(replacement);
    return replacement;
  }

  private keepLocalIdentity(source: Timesheet, local: Timesheet): Timesheet {
    return {
      ...source,
      uuid: local.uuid,
      frameUuids: [...local.frameUuids],
      doNotSync: local.doNotSync,
    };
  }
}
