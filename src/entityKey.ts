import { randomBytes } from "crypto";
import { InvalidOperationError } from "./errors";

export type EntitySource = "local" | "remote";

export interface LocalKey {
  readonly source: "local";
  readonly id: string;
}

export interface RemoteKey {
  readonly source: "remote";
  readonly id: number;
}

export type EntityKey = LocalKey | RemoteKey;

const LOCAL_ID_PATTERN = /^[0-9a-f]{8}$/;
const NUMERIC_PATTERN = /^\d+$/;

export function isLocalId(value: string): boolean {
  const normalized = value.toLowerCase();
  return (
    LOCAL_ID_PATTERN.test(normalized) && !NUMERIC_PATTERN.test(normalized)
  );
}

// Purely numeric ids are reserved for remote entities.
export function generateLocalId(): string {
  let id = randomBytes(4).toString("hex");
  while (NUMERIC_PATTERN.test(id)) {
    id = randomBytes(4).toString("hex");
  }
  return id;
}

export function localKey(id: string = generateLocalId()): LocalKey {
  if (!isLocalId(id)) {
    throw new InvalidOperationError(`Invalid local id: ${id}`);
  }
  return { source: "local", id: id.toLowerCase() };
}

export function remoteKey(id: number | string): RemoteKey {
  const numeric =
    typeof id === "number"
      ? id
      : NUMERIC_PATTERN.test(id.trim())
        ? Number(id.trim())
        : Number.NaN;
  if (!Number.isSafeInteger(numeric) || numeric < 0) {
    throw new InvalidOperationError(`Invalid remote id: ${id}`);
  }
  return { source: "remote", id: numeric };
}

export function keysEqual(a: EntityKey, b: EntityKey): boolean {
  return a.source === b.source && a.id === b.id;
}

export function formatEntityKey(key: EntityKey): string {
  return `${key.source}:${key.id}`;
}

/**
 * Reads `local:<id>` / `remote:<id>`. A bare integer is a remote key and a
 * bare 8-hex id a local one.
 */
export function parseEntityKey(text: string): EntityKey {
  const value = text.trim();
  const separator = value.indexOf(":");
  if (separator === -1) {
    if (NUMERIC_PATTERN.test(value)) {
      return remoteKey(value);
    }
    return localKey(value);
  }

  const source = value.slice(0, separator);
  const id = value.slice(separator + 1);
  switch (source) {
    case "local":
      return localKey(id);
    case "remote":
      return remoteKey(id);
    default:
      throw new InvalidOperationError(`Unknown entity source: ${source}`);
  }
}

export function tryParseEntityKey(text: string): EntityKey | null {
  try {
    return parseEntityKey(text);
  } catch (err) {
    if (err instanceof InvalidOperationError) {
      return null;
    }
    throw err;
  }
}

export function isRemoteKey(key: EntityKey): key is RemoteKey {
  return key.source === "remote";
}

export function isLocalKey(key: EntityKey): key is LocalKey {
  return key.source === "local";
}
