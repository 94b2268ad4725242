import * as path from "path";
import { JsonFileStore } from "./fileStore";
import { STORE_VERSION, UserFile, userFileSchema } from "./records";
import { RemoteApi, UserData } from "./apiClient";
import { CONFIG_KEYS, ConfigStore } from "./config";
import { Role, User } from "./types";
import { Clock, systemClock } from "./dates";
import { Logger, logger as rootLogger } from "./logger";

export function userFromApi(data: UserData): User {
  return {
    ...data.user,
    roles: data.roles.map((role) => ({
      id: role.id,
      name: role.name,
      fullName: role.full_name ?? role.name,
      type: role.type ?? "",
      status: role.status ?? "",
      parentId: role.parent_id ?? null,
    })),
  };
}

/** The configured user and their roles, cached per user in user_<id>.json. */
export class UserRepository {
  private readonly stores = new Map<number, JsonFileStore<UserFile>>();
  private readonly logger: Logger;
  private readonly storeLogger: Logger;

  constructor(
    private readonly dataDir: string,
    private readonly api: RemoteApi,
    private readonly config: ConfigStore,
    private readonly clock: Clock = systemClock,
    logger: Logger = rootLogger
  ) {
    this.logger = logger.child("users");
    this.storeLogger = logger;
  }

  async getCurrentUserId(): Promise<number | null> {
    return (await this.config.getInteger(CONFIG_KEYS.userId)) ?? null;
  }

  async getCurrentUser(): Promise<User | null> {
    const id = await this.getCurrentUserId();
    return id === null ? null : this.getById(id);
  }

  async getById(id: number): Promise<User> {
    const cached = await this.storeFor(id).read();
    if (cached.user) {
      return cached.user;
    }
    return this.fetch(id);
  }

  /** Re-fetches the configured user; null when no user is configured. */
  async refresh(): Promise<User | null> {
    const id = await this.getCurrentUserId();
    return id === null ? null : this.fetch(id);
  }

  async getCurrentUserRoles(): Promise<Role[]> {
    return (await this.getCurrentUser())?.roles ?? [];
  }

  async getCurrentUserDefaultRole(): Promise<Role | null> {
    const roleId = await this.config.getInteger(CONFIG_KEYS.defaultRoleId);
    if (roleId === undefined) {
      return null;
    }
    const roles = await this.getCurrentUserRoles();
    return roles.find((role) => role.id === roleId) ?? null;
  }

  async findCurrentUserRoleByName(name: string): Promise<Role | null> {
    const needle = name.toLowerCase();
    const roles = await this.getCurrentUserRoles();
    return (
      roles.find((role) => role.name.toLowerCase() === needle) ??
      roles.find(
        (role) =>
          role.name.toLowerCase().includes(needle) ||
          role.fullName.toLowerCase().includes(needle)
      ) ??
      null
    );
  }

  private async fetch(id: number): Promise<User> {
    const user = userFromApi(await this.api.fetchUserById(id));
    await this.storeFor(id).write({
      version: STORE_VERSION,
      fetchedAt: this.clock(),
      user,
    });
    this.logger.info(`fetched user ${id} with ${user.roles.length} role(s)`);
    return user;
  }

  private storeFor(id: number): JsonFileStore<UserFile> {
    let store = this.stores.get(id);
    if (!store) {
      store = new JsonFileStore(
        path.join(this.dataDir, "cache", `user_${id}.json`),
        userFileSchema,
        () => ({ version: STORE_VERSION, fetchedAt: null, user: null }),
        this.storeLogger
      );
      this.stores.set(id, store);
    }
    return store;
  }
}
