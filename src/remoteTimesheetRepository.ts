import { RemoteApi, TimesheetData, TimesheetWriteData } from "./apiClient";
import { ActivityReader } from "./activityRepository";
import { createTimesheet } from "./timesheet";
import { Role, RoleAssignment, Timesheet } from "./types";
import { remoteKey } from "./entityKey";
import { Clock, parseRemoteDateTime, systemClock } from "./dates";
import { InvalidOperationError, NotFoundError, TrackError } from "./errors";
import { Logger, logger as rootLogger } from "./logger";

export type UpdateConfirmation = (timesheet: Timesheet) => Promise<boolean>;
export type DeleteConfirmation = (remoteId: number) => Promise<boolean>;

export interface RoleSource {
  getCurrentUserRoles(): Promise<Role[]>;
}

/**
 * Timesheets as stored by the remote system. Payloads are converted by
 * resolving their activity locally; ones that cannot be resolved are skipped.
 */
export class RemoteTimesheetRepository {
  private readonly logger: Logger;

  constructor(
    private readonly api: RemoteApi,
    private readonly activities: ActivityReader,
    private readonly roles: RoleSource,
    private readonly clock: Clock = systemClock,
    logger: Logger = rootLogger
  ) {
    this.logger = logger.child("remote-timesheets");
  }

  async getByRemoteId(remoteId: number): Promise<Timesheet | null> {
    let data: TimesheetData;
    try {
      data = await this.api.fetchTimesheetById(remoteId);
    } catch (err) {
      if (err instanceof NotFoundError) {
        return null;
      }
      throw err;
    }
    return this.tryConvert(data);
  }

  /** Inclusive range of remote calendar dates. */
  async getByDateRange(from: string, to: string = from): Promise<Timesheet[]> {
    const list = await this.api.fetchTimesheetsByDateRange(from, to);
    const timesheets: Timesheet[] = [];
    for (const data of list) {
      const timesheet = await this.tryConvert(data);
      if (timesheet) {
        timesheets.push(timesheet);
      }
    }
    return timesheets;
  }

  async create(timesheet: Timesheet): Promise<Timesheet> {
    const created = await this.api.createTimesheet(this.toApi(timesheet));
    if (created.timesheet) {
      const converted = await this.tryConvert(created.timesheet);
      if (converted) {
        return converted;
      }
    }
    if (created.id !== null) {
      const fetched = await this.getByRemoteId(created.id);
      if (fetched) {
        return fetched;
      }
    }

    // The API did not say what it created; find it by content.
    const candidates = await this.getByDateRange(timesheet.date);
    const match = candidates.find(
      (candidate) =>
        candidate.activity.projectKey.id === timesheet.activity.projectKey.id &&
        candidate.activity.key.id === timesheet.activity.key.id &&
        candidate.description === timesheet.description
    );
    if (!match) {
      throw new NotFoundError(
        "The timesheet may have been created remotely but could not be fetched back"
      );
    }
    return match;
  }

  /** Null when the update was not confirmed. */
  async update(
    timesheet: Timesheet,
    confirm: UpdateConfirmation
  ): Promise<Timesheet | null> {
    if (timesheet.remoteId === null) {
      throw new InvalidOperationError(
        "Cannot update a timesheet that was never pushed"
      );
    }
    if (!(await confirm(timesheet))) {
      return null;
    }
    await this.api.updateTimesheet(timesheet.remoteId, this.toApi(timesheet));
    const fetched = await this.getByRemoteId(timesheet.remoteId);
    if (!fetched) {
      throw new NotFoundError(
        `Remote timesheet ${timesheet.remoteId} disappeared after the update`
      );
    }
    return fetched;
  }

  async delete(remoteId: number, confirm: DeleteConfirmation): Promise<boolean> {
    if (!(await confirm(remoteId))) {
      return false;
    }
    await this.api.deleteTimesheet(remoteId);
    return true;
  }

  toApi(timesheet: Timesheet): TimesheetWriteData {
    const data: TimesheetWriteData = {
      project_id: timesheet.activity.projectKey.id,
      activity_id: timesheet.activity.key.id,
      description: timesheet.description,
      time: timesheet.time,
      date: timesheet.date,
    };
    if (timesheet.clientDescription !== null) {
      data.client_description = timesheet.clientDescription;
    }
    if (timesheet.assignment.kind === "role") {
      data.role_id = timesheet.assignment.role.id;
    }
    return data;
  }

  async fromApi(data: TimesheetData): Promise<Timesheet> {
    const activity = await this.activities.get(remoteKey(data.activityId));
    if (!activity) {
      throw new NotFoundError(
        `Activity ${data.activityId} of remote timesheet ${data.id} is unknown; refresh the project cache`
      );
    }

    return createTimesheet({
      activity,
      description: data.description,
      clientDescription: data.clientDescription,
      time: data.time,
      date: data.date,
      assignment: await this.resolveAssignment(data),
      remoteId: data.id,
      updatedAt:
        (data.modifiedAt ? parseRemoteDateTime(data.modifiedAt) : null) ??
        this.clock(),
    });
  }

  private async resolveAssignment(data: TimesheetData): Promise<RoleAssignment> {
    if (data.individualAction) {
      return { kind: "individual" };
    }
    if (data.roleId === null) {
      throw new InvalidOperationError(
        `Remote timesheet ${data.id} has neither a role nor the individual flag`
      );
    }
    const roleId = data.roleId;
    const roles = await this.roles.getCurrentUserRoles();
    const role = roles.find((entry) => entry.id === roleId) ?? {
      id: roleId,
      name: "",
      fullName: "",
      type: "",
      status: "",
      parentId: null,
    };
    return { kind: "role", role };
  }

  private async tryConvert(data: TimesheetData): Promise<Timesheet | null> {
    try {
      return await this.fromApi(data);
    } catch (err) {
      if (err instanceof TrackError && err.kind !== "RemoteUnavailable") {
        this.logger.warn(`skipping remote timesheet ${data.id}: ${err.message}`);
        return null;
      }
      throw err;
    }
  }
}
