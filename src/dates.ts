import dayjs from "dayjs";
import utc from "dayjs/plugin/utc";
import timezone from "dayjs/plugin/timezone";
import { InvalidTimeError } from "./errors";

dayjs.extend(utc);
dayjs.extend(timezone);

// Timesheet dates and remote timestamps are expressed in this zone.
export const REMOTE_TIMEZONE = "Europe/Zurich";

const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;
const TIME_OF_DAY_PATTERN = /^(\d{1,2}):(\d{2})$/;

/** Returns the current time in unix seconds. Injected so tests can pin "now". */
export type Clock = () => number;

export const systemClock: Clock = () => Math.floor(Date.now() / 1000);

export function isCalendarDate(value: string): boolean {
  if (!DATE_PATTERN.test(value)) {
    return false;
  }
  return dayjs.utc(value).format("YYYY-MM-DD") === value;
}

export function remoteDateOf(unixSeconds: number): string {
  return dayjs.unix(unixSeconds).tz(REMOTE_TIMEZONE).format("YYYY-MM-DD");
}

export function remoteDayBounds(date: string): { start: number; end: number } {
  if (!isCalendarDate(date)) {
    throw new InvalidTimeError(`Invalid date: ${date}`);
  }
  const start = dayjs.tz(`${date} 00:00:00`, REMOTE_TIMEZONE);
  return {
    start: start.unix(),
    end: start.add(1, "day").unix() - 1,
  };
}

/** Parses a remote "YYYY-MM-DD HH:MM:SS" wall-clock timestamp. */
export function parseRemoteDateTime(value: string): number | null {
  const parsed = dayjs.tz(value, REMOTE_TIMEZONE);
  return parsed.isValid() ? parsed.unix() : null;
}

export function addDays(date: string, days: number): string {
  return dayjs.utc(date).add(days, "day").format("YYYY-MM-DD");
}

export function todayInRemoteZone(clock: Clock): string {
  return remoteDateOf(clock());
}

/**
 * Reads a user supplied point in time: `HH:mm` (today, local time), a
 * calendar date, or anything ISO 8601.
 */
export function parseTimeInput(value: string, clock: Clock): number {
  const trimmed = value.trim();
  const timeOfDay = TIME_OF_DAY_PATTERN.exec(trimmed);
  if (timeOfDay) {
    const hours = Number(timeOfDay[1]);
    const minutes = Number(timeOfDay[2]);
    if (hours > 23 || minutes > 59) {
      throw new InvalidTimeError(`Invalid time: ${value}`);
    }
    return dayjs
      .unix(clock())
      .hour(hours)
      .minute(minutes)
      .second(0)
      .unix();
  }
  const parsed = dayjs(trimmed);
  if (!parsed.isValid()) {
    throw new InvalidTimeError(`Invalid time: ${value}`);
  }
  return parsed.unix();
}

export function parseDateInput(value: string, clock: Clock): string {
  const trimmed = value.trim();
  switch (trimmed) {
    case "today":
      return todayInRemoteZone(clock);
    case "yesterday":
      return addDays(todayInRemoteZone(clock), -1);
    default:
      if (!isCalendarDate(trimmed)) {
        throw new InvalidTimeError(`Invalid date: ${value}`);
      }
      return trimmed;
  }
}

export function formatLocalDateTime(unixSeconds: number): string {
  return dayjs.unix(unixSeconds).format("YYYY-MM-DD HH:mm");
}

export function formatDuration(seconds: number): string {
  const hours = Math.floor(seconds / 3600);
  const minutes = Math.floor((seconds % 3600) / 60);
  return `${hours}h ${`${minutes}`.padStart(2, "0")}m`;
}
