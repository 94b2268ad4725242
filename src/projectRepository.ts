import {
  LocalProjectRepository,
  ProjectChanges,
  ProjectReader,
} from "./localProjectRepository";
import { RemoteProjectRepository } from "./remoteProjectRepository";
import { rankByName } from "./project";
import { Activity, Project, ProjectStatus } from "./types";
import { EntityKey } from "./entityKey";
import { InvalidOperationError } from "./errors";

/**
 * Routes project lookups by entity source. Listings are local first, then
 * remote; every mutation targets the local store.
 */
export class ProjectRepository implements ProjectReader {
  constructor(
    private readonly local: LocalProjectRepository,
    private readonly remote: RemoteProjectRepository
  ) {}

  async all(
    statuses: ProjectStatus[] = [ProjectStatus.Active]
  ): Promise<Project[]> {
    return [
      ...(await this.local.all(statuses)),
      ...(await this.remote.all(statuses)),
    ];
  }

  async get(key: EntityKey): Promise<Project | null> {
    switch (key.source) {
      case "local":
        return this.local.get(key);
      case "remote":
        return this.remote.get(key);
    }
  }

  // Across both stores, prefix matches win outright over substring matches.
  async getByNameLike(name: string): Promise<Project[]> {
    const { startsWith, contains } = rankByName(
      [
        ...(await this.local.getByNameLike(name)),
        ...(await this.remote.getByNameLike(name)),
      ],
      name,
      (project) => project.name
    );
    return startsWith.length > 0 ? startsWith : contains;
  }

  async getByActivityKey(activityKey: EntityKey): Promise<Project | null> {
    switch (activityKey.source) {
      case "local":
        return this.local.getByActivityKey(activityKey);
      case "remote":
        return this.remote.getByActivityKey(activityKey);
    }
  }

  async getByActivityAlias(alias: string): Promise<Project | null> {
    return (
      (await this.local.getByActivityAlias(alias)) ??
      this.remote.getByActivityAlias(alias)
    );
  }

  async getAllAliases(): Promise<string[]> {
    return [
      ...(await this.local.getAllAliases()),
      ...(await this.remote.getAllAliases()),
    ];
  }

  async create(
    name: string,
    description: string,
    status: ProjectStatus = ProjectStatus.Active
  ): Promise<Project> {
    return this.local.create(name, description, status);
  }

  async update(key: EntityKey, changes: ProjectChanges): Promise<Project> {
    this.requireLocal(key);
    return this.local.update(key, changes);
  }

  async delete(key: EntityKey, force = false): Promise<void> {
    this.requireLocal(key);
    await this.local.delete(key, force);
  }

  async forceDelete(
    key: EntityKey,
    onActivity: (activity: Activity) => Promise<void>
  ): Promise<void> {
    this.requireLocal(key);
    await this.local.forceDelete(key, onActivity);
  }

  async refresh(): Promise<Project[]> {
    return this.remote.refresh();
  }

  private requireLocal(key: EntityKey): void {
    if (key.source !== "local") {
      throw new InvalidOperationError(
        "Only local entities may be edited or deleted"
      );
    }
  }
}
