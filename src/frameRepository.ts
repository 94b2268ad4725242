import * as path from "path";
import { JsonFileStore } from "./fileStore";
import { FramesFile, framesFileSchema, STORE_VERSION } from "./records";
import { effectiveStop, frameFromRecord, frameToRecord } from "./frame";
import { Activity, Frame, Role } from "./types";
import { EntityKey, keysEqual } from "./entityKey";
import { Clock, systemClock } from "./dates";
import { InvalidOperationError, InvalidTimeError, NotFoundError } from "./errors";
import { Logger, logger as rootLogger } from "./logger";

export const FRAMES_FILE_NAME = "frames.json";

export interface FrameFilter {
  projectIds?: number[];
  issueKeys?: string[];
  excludeProjectIds?: number[];
  excludeIssueKeys?: string[];
  from?: number;
  to?: number;
  includePartial?: boolean;
}

/**
 * Closed frames plus the single "current" slot, both in frames.json. The slot
 * is a separate field so checking for a running frame never scans.
 */
export class FrameRepository {
  private readonly store: JsonFileStore<FramesFile>;
  private readonly logger: Logger;

  constructor(
    dataDir: string,
    private readonly clock: Clock = systemClock,
    logger: Logger = rootLogger
  ) {
    this.logger = logger.child("frames");
    this.store = new JsonFileStore(
      path.join(dataDir, FRAMES_FILE_NAME),
      framesFileSchema,
      () => ({ version: STORE_VERSION, frames: [], current: null }),
      logger
    );
  }

  // #region Current slot

  async getCurrent(): Promise<Frame | null> {
    const file = await this.store.read();
    return file.current ? frameFromRecord(file.current) : null;
  }

  async saveCurrent(frame: Frame): Promise<void> {
    if (frame.stopTime !== null) {
      throw new InvalidOperationError("The current frame cannot be stopped");
    }
    if (frame.startTime > this.clock()) {
      throw new InvalidTimeError("The current frame cannot start in the future");
    }
    const current = await this.getCurrent();
    if (current && current.uuid !== frame.uuid) {
      throw new InvalidOperationError(
        `Frame ${current.uuid} is already the current frame`
      );
    }
    await this.store.update((file) => ({
      ...file,
      frames: file.frames.filter((record) => record.uuid !== frame.uuid),
      current: frameToRecord(frame),
    }));
  }

  async clearCurrent(): Promise<Frame | null> {
    const current = await this.getCurrent();
    if (!current) {
      return null;
    }
    await this.store.update((file) => ({ ...file, current: null }));
    return current;
  }

  /** Moves the stopped frame out of the slot in a single write. */
  async completeCurrent(frame: Frame): Promise<void> {
    if (frame.stopTime === null) {
      throw new InvalidOperationError("Only a stopped frame can complete");
    }
    const current = await this.getCurrent();
    if (!current || current.uuid !== frame.uuid) {
      throw new InvalidOperationError(
        `Frame ${frame.uuid} is not the current frame`
      );
    }
    await this.store.update((file) => ({
      ...file,
      frames: upsert(file.frames, frameToRecord(frame)),
      current: null,
    }));
  }

  // #endregion

  // #region Closed frames

  async save(frame: Frame): Promise<void> {
    if (frame.stopTime === null) {
      throw new InvalidOperationError(
        "Active frames go through the current slot"
      );
    }
    await this.store.update((file) => ({
      ...file,
      frames: upsert(file.frames, frameToRecord(frame)),
      current: file.current?.uuid === frame.uuid ? null : file.current,
    }));
  }

  /**
   * Replaces an existing frame. A current frame that is now stopped leaves
   * the slot; a closed frame can only become active if the slot is free.
   */
  async update(frame: Frame): Promise<void> {
    const existing = await this.get(frame.uuid);
    if (!existing) {
      throw new NotFoundError(`Frame ${frame.uuid} not found`);
    }
    const current = await this.getCurrent();
    const isCurrent = current?.uuid === frame.uuid;

    if (frame.stopTime === null) {
      if (!isCurrent && current) {
        throw new InvalidOperationError(
          `Frame ${current.uuid} is already the current frame`
        );
      }
      await this.saveCurrent(frame);
      return;
    }

    const record = frameToRecord(frame);
    await this.store.update((file) => ({
      ...file,
      frames: upsert(file.frames, record),
      current: isCurrent ? null : file.current,
    }));
  }

  async remove(uuid: string): Promise<Frame> {
    const existing = await this.get(uuid);
    if (!existing) {
      throw new NotFoundError(`Frame ${uuid} not found`);
    }
    await this.store.update((file) => ({
      ...file,
      frames: file.frames.filter((record) => record.uuid !== uuid),
      current: file.current?.uuid === uuid ? null : file.current,
    }));
    return existing;
  }

  /** Closed frames only. */
  async all(): Promise<Frame[]> {
    const file = await this.store.read();
    const frames: Frame[] = [];
    for (const record of file.frames) {
      const frame = frameFromRecord(record);
      if (frame) {
        frames.push(frame);
      } else {
        this.logger.warn(`skipping frame ${record.uuid} without a role`);
      }
    }
    return frames;
  }

  /** Closed frames followed by the current one, if any. */
  async allWithCurrent(): Promise<Frame[]> {
    const frames = await this.all();
    const current = await this.getCurrent();
    return current ? [...frames, current] : frames;
  }

  async get(uuid: string): Promise<Frame | null> {
    const frames = await this.allWithCurrent();
    return frames.find((frame) => frame.uuid === uuid) ?? null;
  }

  async findByUuidPrefix(prefix: string): Promise<Frame[]> {
    const needle = prefix.toLowerCase();
    const frames = await this.allWithCurrent();
    return frames.filter((frame) => frame.uuid.startsWith(needle));
  }

  // #endregion

  // #region Queries

  /**
   * Frames within [from, to]. With `includePartial` a frame only has to
   * overlap the window; otherwise it must lie entirely inside it. A running
   * frame ends "now". Project filters only match remote project ids.
   */
  async filter(filter: FrameFilter = {}): Promise<Frame[]> {
    const now = this.clock();
    const frames = await this.allWithCurrent();
    const result = frames.filter((frame) => {
      const projectId =
        frame.activity.projectKey.source === "remote"
          ? frame.activity.projectKey.id
          : null;
      if (filter.projectIds && filter.projectIds.length > 0) {
        if (projectId === null || !filter.projectIds.includes(projectId)) {
          return false;
        }
      }
      if (filter.excludeProjectIds && projectId !== null) {
        if (filter.excludeProjectIds.includes(projectId)) {
          return false;
        }
      }
      if (filter.issueKeys && filter.issueKeys.length > 0) {
        const wanted = filter.issueKeys;
        if (!frame.issueKeys.some((key) => wanted.includes(key))) {
          return false;
        }
      }
      if (filter.excludeIssueKeys) {
        const unwanted = filter.excludeIssueKeys;
        if (frame.issueKeys.some((key) => unwanted.includes(key))) {
          return false;
        }
      }

      const stop = effectiveStop(frame, now);
      if (filter.includePartial) {
        if (filter.from !== undefined && stop < filter.from) {
          return false;
        }
        if (filter.to !== undefined && frame.startTime > filter.to) {
          return false;
        }
      } else {
        if (filter.from !== undefined && frame.startTime < filter.from) {
          return false;
        }
        if (filter.to !== undefined && stop > filter.to) {
          return false;
        }
      }
      return true;
    });
    return result.sort((a, b) => a.startTime - b.startTime);
  }

  async getByDateRange(from: number, to: number): Promise<Frame[]> {
    return this.filter({ from, to, includePartial: true });
  }

  async getByActivity(activityKey: EntityKey): Promise<Frame[]> {
    const frames = await this.allWithCurrent();
    return frames.filter((frame) => keysEqual(frame.activity.key, activityKey));
  }

  /** Closed frame with the latest start whose stop is not in the future. */
  async getLastClosed(): Promise<Frame | null> {
    const now = this.clock();
    let last: Frame | null = null;
    for (const frame of await this.all()) {
      if (frame.stopTime === null || frame.stopTime > now) {
        continue;
      }
      if (!last || frame.startTime > last.startTime) {
        last = frame;
      }
    }
    return last;
  }

  async getLastRoleForActivity(activityKey: EntityKey): Promise<Role | null> {
    const frames = (await this.getByActivity(activityKey)).sort(
      (a, b) => b.startTime - a.startTime
    );
    for (const frame of frames) {
      if (frame.assignment.kind === "role") {
        return frame.assignment.role;
      }
    }
    return null;
  }

  /** Most recent activity whose frame carries exactly these issue keys. */
  async getLastActivityForIssueKeys(
    issueKeys: string[]
  ): Promise<Activity | null> {
    if (issueKeys.length === 0) {
      return null;
    }
    const wanted = [...issueKeys].sort().join(",");
    const frames = (await this.allWithCurrent()).sort(
      (a, b) => b.startTime - a.startTime
    );
    const match = frames.find(
      (frame) => [...frame.issueKeys].sort().join(",") === wanted
    );
    return match?.activity ?? null;
  }

  async removeByActivity(activityKey: EntityKey): Promise<number> {
    const frames = await this.getByActivity(activityKey);
    for (const frame of frames) {
      await this.remove(frame.uuid);
    }
    return frames.length;
  }

  // #endregion
}

function upsert<T extends { uuid: string }>(items: T[], item: T): T[] {
  const index = items.findIndex((entry) => entry.uuid === item.uuid);
  if (index === -1) {
    return [...items, item];
  }
  const next = [...items];
  next[index] = item;
  return next;
}
