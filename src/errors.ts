export type TrackErrorKind =
  | "FrameAlreadyStarted"
  | "NoFrameStarted"
  | "InvalidTime"
  | "InvalidOperation"
  | "NotFound"
  | "RemoteUnavailable";

/**
 * Base class for every failure the core reports. Callers branch on `kind`
 * rather than on message text.
 */
export abstract class TrackError extends Error {
  abstract readonly kind: TrackErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class FrameAlreadyStartedError extends TrackError {
  readonly kind = "FrameAlreadyStarted";

  constructor(message = "A frame is already started") {
    super(message);
  }
}

export class NoFrameStartedError extends TrackError {
  readonly kind = "NoFrameStarted";

  constructor(message = "No frame is started") {
    super(message);
  }
}

export class InvalidTimeError extends TrackError {
  readonly kind = "InvalidTime";
}

export class InvalidOperationError extends TrackError {
  readonly kind = "InvalidOperation";
}

export class NotFoundError extends TrackError {
  readonly kind = "NotFound";
}

export class RemoteUnavailableError extends TrackError {
  readonly kind = "RemoteUnavailable";

  constructor(
    message: string,
    readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export function isTrackError(value: unknown): value is TrackError {
  return value instanceof TrackError;
}

export function describeError(err: unknown): string {
  if (err instanceof Error) {
    return err.message;
  }
  return String(err);
}
