import * as os from "os";
import * as path from "path";
import { JsonFileStore } from "./fileStore";
import { ConfigFile, configFileSchema } from "./records";
import { isLogLevel, Logger, LogLevel } from "./logger";

export const APP_NAME = "frametrack";

export const CONFIG_KEYS = {
  userId: "user.id",
  defaultRoleId: "user.defaultRole.id",
  baseUri: "remote.baseUri",
  logLevel: "log.level",
} as const;

export interface Settings {
  dataDir: string;
  configDir: string;
  baseUri: string | null;
  token: string | null;
  logLevel: LogLevel;
}

type Env = Record<string, string | undefined>;

export function resolvePaths(env: Env = process.env): {
  dataDir: string;
  configDir: string;
} {
  const home = os.homedir();
  return {
    dataDir: env.FRAMETRACK_HOME ?? path.join(home, `.${APP_NAME}`),
    configDir:
      env.FRAMETRACK_CONFIG_DIR ?? path.join(home, ".config", APP_NAME),
  };
}

/**
 * Environment variables win over the config file.
 */
export async function resolveSettings(
  config: ConfigStore,
  env: Env = process.env
): Promise<Settings> {
  const { dataDir, configDir } = resolvePaths(env);
  const configuredLevel = await config.getString(CONFIG_KEYS.logLevel);
  const level = env.FRAMETRACK_LOG_LEVEL ?? configuredLevel ?? "warn";
  return {
    dataDir,
    configDir,
    baseUri:
      env.FRAMETRACK_BASE_URI ??
      (await config.getString(CONFIG_KEYS.baseUri)) ??
      null,
    token: env.FRAMETRACK_TOKEN ?? null,
    logLevel: isLogLevel(level) ? level : "warn",
  };
}

/** Dot-path access to the user's config.json. */
export class ConfigStore {
  private readonly store: JsonFileStore<ConfigFile>;

  constructor(configDir: string, logger?: Logger) {
    this.store = new JsonFileStore(
      path.join(configDir, "config.json"),
      configFileSchema,
      () => ({}),
      logger
    );
  }

  async all(): Promise<ConfigFile> {
    return this.store.read();
  }

  async get(key: string): Promise<unknown> {
    let node: unknown = await this.store.read();
    for (const part of key.split(".")) {
      if (!isRecord(node) || !(part in node)) {
        return undefined;
      }
      node = node[part];
    }
    return node;
  }

  async getString(key: string): Promise<string | undefined> {
    const value = await this.get(key);
    if (typeof value === "string") {
      return value;
    }
    if (typeof value === "number") {
      return String(value);
    }
    return undefined;
  }

  async getInteger(key: string): Promise<number | undefined> {
    const value = await this.get(key);
    if (typeof value === "number" && Number.isInteger(value)) {
      return value;
    }
    if (typeof value === "string" && /^\d+$/.test(value)) {
      return Number(value);
    }
    return undefined;
  }

  async set(key: string, value: unknown): Promise<void> {
    const parts = key.split(".");
    const last = parts.pop();
    if (!last) {
      return;
    }
    const root = structuredClone(await this.store.read());
    let node: Record<string, unknown> = root;
    for (const part of parts) {
      const next = node[part];
      if (isRecord(next)) {
        node = next;
      } else {
        const created: Record<string, unknown> = {};
        node[part] = created;
        node = created;
      }
    }
    node[last] = value;
    await this.store.write(root);
  }

  async delete(key: string): Promise<boolean> {
    const parts = key.split(".");
    const last = parts.pop();
    if (!last) {
      return false;
    }
    const root = structuredClone(await this.store.read());
    let node: unknown = root;
    for (const part of parts) {
      if (!isRecord(node)) {
        return false;
      }
      node = node[part];
    }
    if (!isRecord(node) || !(last in node)) {
      return false;
    }
    delete node[last];
    await this.store.write(root);
    return true;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
