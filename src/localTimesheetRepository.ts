import * as path from "path";
import { JsonFileStore } from "./fileStore";
import {
  STORE_VERSION,
  TimesheetsFile,
  timesheetsFileSchema,
} from "./records";
import { timesheetFromRecord, timesheetToRecord } from "./timesheet";
import { Timesheet } from "./types";
import { InvalidOperationError, NotFoundError } from "./errors";
import { Logger, logger as rootLogger } from "./logger";

export const TIMESHEETS_FILE_NAME = "timesheets.json";

export class LocalTimesheetRepository {
  private readonly store: JsonFileStore<TimesheetsFile>;
  private readonly logger: Logger;

  constructor(dataDir: string, logger: Logger = rootLogger) {
    this.logger = logger.child("timesheets");
    this.store = new JsonFileStore(
      path.join(dataDir, TIMESHEETS_FILE_NAME),
      timesheetsFileSchema,
      () => ({ version: STORE_VERSION, timesheets: [] }),
      logger
    );
  }

  async all(): Promise<Timesheet[]> {
    const file = await this.store.read();
    const timesheets: Timesheet[] = [];
    for (const record of file.timesheets) {
      const timesheet = timesheetFromRecord(record);
      if (timesheet) {
        timesheets.push(timesheet);
      } else {
        this.logger.warn(`skipping invalid timesheet ${record.uuid}`);
      }
    }
    return timesheets;
  }

  async get(uuid: string): Promise<Timesheet | null> {
    const timesheets = await this.all();
    return timesheets.find((timesheet) => timesheet.uuid === uuid) ?? null;
  }

  async findByUuidPrefix(prefix: string): Promise<Timesheet[]> {
    const needle = prefix.toLowerCase();
    const timesheets = await this.all();
    return timesheets.filter((timesheet) => timesheet.uuid.startsWith(needle));
  }

  async getByRemoteId(remoteId: number): Promise<Timesheet | null> {
    const timesheets = await this.all();
    return (
      timesheets.find((timesheet) => timesheet.remoteId === remoteId) ?? null
    );
  }

  /** Inclusive calendar-date range, ordered by date. */
  async getByDateRange(from: string, to: string = from): Promise<Timesheet[]> {
    const timesheets = await this.all();
    return timesheets
      .filter((timesheet) => timesheet.date >= from && timesheet.date <= to)
      .sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0));
  }

  /** Timesheets built from any of the given frames. */
  async getByFrameUuids(frameUuids: string[]): Promise<Timesheet[]> {
    const wanted = new Set(frameUuids);
    const timesheets = await this.all();
    return timesheets.filter((timesheet) =>
      timesheet.frameUuids.some((uuid) => wanted.has(uuid))
    );
  }

  async getUnsynced(): Promise<Timesheet[]> {
    const timesheets = await this.all();
    return timesheets.filter(
      (timesheet) => timesheet.remoteId === null && !timesheet.doNotSync
    );
  }

  /** Create-or-replace by uuid. */
  async save(timesheet: Timesheet): Promise<void> {
    await this.assertRemoteIdFree(timesheet);
    const record = timesheetToRecord(timesheet);
    await this.store.update((file) => {
      const index = file.timesheets.findIndex(
        (entry) => entry.uuid === timesheet.uuid
      );
      const timesheets = [...file.timesheets];
      if (index === -1) {
        timesheets.push(record);
      } else {
        timesheets[index] = record;
      }
      return { ...file, timesheets };
    });
  }

  async update(timesheet: Timesheet): Promise<void> {
    if (!(await this.get(timesheet.uuid))) {
      throw new NotFoundError(`Timesheet ${timesheet.uuid} not found`);
    }
    await this.save(timesheet);
  }

  async remove(uuid: string): Promise<Timesheet> {
    const existing = await this.get(uuid);
    if (!existing) {
      throw new NotFoundError(`Timesheet ${uuid} not found`);
    }
    await this.store.update((file) => ({
      ...file,
      timesheets: file.timesheets.filter((record) => record.uuid !== uuid),
    }));
    return existing;
  }

  private async assertRemoteIdFree(timesheet: Timesheet): Promise<void> {
    if (timesheet.remoteId === null) {
      return;
    }
    const owner = await this.getByRemoteId(timesheet.remoteId);
    if (owner && owner.uuid !== timesheet.uuid) {
      throw new InvalidOperationError(
        `Remote timesheet ${timesheet.remoteId} is already linked to ${owner.uuid}`
      );
    }
  }
}
