import { Activity, Frame, Role, RoleAssignment } from "./types";
import { FrameRepository } from "./frameRepository";
import { changeFrame, createFrame, FrameChanges } from "./frame";
import { Clock, systemClock } from "./dates";
import {
  FrameAlreadyStartedError,
  InvalidOperationError,
  InvalidTimeError,
  NoFrameStartedError,
  NotFoundError,
} from "./errors";
import { Logger, logger as rootLogger } from "./logger";

export interface DefaultRoleProvider {
  getCurrentUserDefaultRole(): Promise<Role | null>;
}

export interface StartOptions {
  description?: string;
  at?: number;
  // When false the frame starts where the last closed one stopped.
  gap?: boolean;
  assignment?: RoleAssignment;
}

export interface AddOptions {
  description?: string;
  assignment?: RoleAssignment;
}

export interface RestartOptions extends Omit<StartOptions, "assignment"> {
  frameUuid?: string;
}

/**
 * Frame state machine: Idle (no current frame) or Active (exactly one).
 * This is the only component that opens or closes the current frame.
 */
export class Tracker {
  private readonly logger: Logger;

  constructor(
    private readonly frames: FrameRepository,
    private readonly roles: DefaultRoleProvider,
    private readonly clock: Clock = systemClock,
    logger: Logger = rootLogger
  ) {
    this.logger = logger.child("tracker");
  }

  async isStarted(): Promise<boolean> {
    return (await this.frames.getCurrent()) !== null;
  }

  async getCurrent(): Promise<Frame | null> {
    return this.frames.getCurrent();
  }

  async start(activity: Activity, options: StartOptions = {}): Promise<Frame> {
    const current = await this.frames.getCurrent();
    if (current) {
      throw new FrameAlreadyStartedError(
        `Frame ${current.uuid} on "${current.activity.name}" is already started`
      );
    }

    const now = this.clock();
    const gap = options.gap ?? true;
    const lastStop = (await this.frames.getLastClosed())?.stopTime ?? null;
    let startTime = options.at ?? now;
    if (!gap && lastStop !== null) {
      startTime = lastStop;
    }

    if (startTime > now) {
      throw new InvalidTimeError("A frame cannot start in the future");
    }
    if (gap && lastStop !== null && startTime < lastStop) {
      throw new InvalidTimeError(
        "A frame cannot start before the previous frame stopped"
      );
    }

    const frame = createFrame(
      {
        startTime,
        activity,
        description: options.description,
        assignment: await this.resolveAssignment(options.assignment),
      },
      now
    );
    await this.frames.saveCurrent(frame);
    this.logger.info(`started ${frame.uuid} on ${activity.name}`);
    return frame;
  }

  async stop(at?: number): Promise<Frame> {
    const current = await this.frames.getCurrent();
    if (!current) {
      throw new NoFrameStartedError();
    }
    const now = this.clock();
    const stopTime = at ?? now;
    if (stopTime > now) {
      throw new InvalidTimeError("A frame cannot stop in the future");
    }
    if (stopTime < current.startTime) {
      throw new InvalidTimeError("A frame cannot stop before it started");
    }

    const stopped = changeFrame(current, { stopTime }, now);
    await this.frames.completeCurrent(stopped);
    this.logger.info(`stopped ${stopped.uuid}`);
    return stopped;
  }

  async cancel(): Promise<Frame> {
    const cleared = await this.frames.clearCurrent();
    if (!cleared) {
      throw new NoFrameStartedError();
    }
    this.logger.info(`cancelled ${cleared.uuid}`);
    return cleared;
  }

  async add(
    activity: Activity,
    from: number,
    to: number,
    options: AddOptions = {}
  ): Promise<Frame> {
    const now = this.clock();
    if (to < from) {
      throw new InvalidTimeError("The end of a frame is before its start");
    }
    if (from > now || to > now) {
      throw new InvalidTimeError("A frame cannot end in the future");
    }
    const frame = createFrame(
      {
        startTime: from,
        stopTime: to,
        activity,
        description: options.description,
        assignment: await this.resolveAssignment(options.assignment),
      },
      now
    );
    await this.frames.save(frame);
    return frame;
  }

  /** Starts a new frame that repeats the last (or the given) closed frame. */
  async restart(options: RestartOptions = {}): Promise<Frame> {
    const source = options.frameUuid
      ? await this.frames.get(options.frameUuid)
      : await this.frames.getLastClosed();
    if (!source) {
      throw new NotFoundError(
        options.frameUuid
          ? `Frame ${options.frameUuid} not found`
          : "There is no frame to restart"
      );
    }
    return this.start(source.activity, {
      description: options.description ?? source.description,
      at: options.at,
      gap: options.gap,
      assignment: source.assignment,
    });
  }

  /**
   * Replaces a frame, keeping its uuid. Only the current frame may be left
   * without a stop time.
   */
  async edit(uuid: string, changes: FrameChanges): Promise<Frame> {
    const existing = await this.frames.get(uuid);
    if (!existing) {
      throw new NotFoundError(`Frame ${uuid} not found`);
    }
    const now = this.clock();
    const edited = changeFrame(existing, changes, now);
    if (edited.startTime > now) {
      throw new InvalidTimeError("A frame cannot start in the future");
    }
    if (edited.stopTime !== null && edited.stopTime > now) {
      throw new InvalidTimeError("A frame cannot stop in the future");
    }
    if (edited.stopTime === null) {
      const current = await this.frames.getCurrent();
      if (current && current.uuid !== edited.uuid) {
        throw new FrameAlreadyStartedError(
          `Frame ${current.uuid} is already started`
        );
      }
    }
    await this.frames.update(edited);
    return edited;
  }

  async remove(uuid: string): Promise<Frame> {
    return this.frames.remove(uuid);
  }

  private async resolveAssignment(
    assignment: RoleAssignment | undefined
  ): Promise<RoleAssignment> {
    if (assignment) {
      return assignment;
    }
    const role = await this.roles.getCurrentUserDefaultRole();
    if (!role) {
      throw new InvalidOperationError(
        "No role given and no default role configured"
      );
    }
    return { kind: "role", role };
  }
}
