import { LocalProjectRepository } from "./localProjectRepository";
import { RemoteProjectRepository } from "./remoteProjectRepository";
import { FrameRepository } from "./frameRepository";
import { Activity, Frame, Project, ProjectStatus } from "./types";
import { EntityKey, keysEqual, localKey } from "./entityKey";
import { InvalidOperationError, NotFoundError } from "./errors";

export interface ActivityReader {
  all(activeOnly?: boolean): Promise<Activity[]>;
  get(key: EntityKey): Promise<Activity | null>;
  getByAlias(alias: string, activeOnly?: boolean): Promise<Activity | null>;
  searchByNameOrAlias(search: string, activeOnly?: boolean): Promise<Activity[]>;
  searchByAlias(search: string): Promise<Activity[]>;
}

export interface ActivityChanges {
  name?: string;
  description?: string;
  alias?: string | null;
}

function statusesFor(activeOnly: boolean): ProjectStatus[] {
  return activeOnly ? [ProjectStatus.Active] : [];
}

function matchesNameOrAlias(activity: Activity, search: string): boolean {
  const needle = search.toLowerCase();
  return (
    activity.name.toLowerCase().includes(needle) ||
    (activity.alias ?? "").toLowerCase().includes(needle)
  );
}

function matchesAlias(activity: Activity, search: string): boolean {
  return (
    activity.alias !== null &&
    activity.alias.toLowerCase().includes(search.toLowerCase())
  );
}

function findAlias(
  project: Project | null,
  alias: string,
  activeOnly: boolean
): Activity | null {
  if (!project || (activeOnly && project.status !== ProjectStatus.Active)) {
    return null;
  }
  return project.activities.find((activity) => activity.alias === alias) ?? null;
}

// #region Local

/** Activities nested in local projects; the only ones this client may edit. */
export class LocalActivityRepository implements ActivityReader {
  constructor(
    private readonly projects: LocalProjectRepository,
    private readonly frames: FrameRepository
  ) {}

  async all(activeOnly = true): Promise<Activity[]> {
    const projects = await this.projects.all(statusesFor(activeOnly));
    return projects.flatMap((project) => project.activities);
  }

  async get(key: EntityKey): Promise<Activity | null> {
    const project = await this.projects.getByActivityKey(key);
    return (
      project?.activities.find((activity) => keysEqual(activity.key, key)) ??
      null
    );
  }

  async getByAlias(alias: string, activeOnly = true): Promise<Activity | null> {
    const project = await this.projects.getByActivityAlias(alias);
    return findAlias(project, alias, activeOnly);
  }

  async searchByNameOrAlias(
    search: string,
    activeOnly = true
  ): Promise<Activity[]> {
    const activities = await this.all(activeOnly);
    return activities.filter((activity) => matchesNameOrAlias(activity, search));
  }

  async searchByAlias(search: string): Promise<Activity[]> {
    const activities = await this.all(true);
    return activities.filter((activity) => matchesAlias(activity, search));
  }

  async create(
    name: string,
    description: string,
    projectKey: EntityKey,
    alias: string | null = null
  ): Promise<Activity> {
    if (projectKey.source !== "local") {
      throw new InvalidOperationError(
        "Activities can only be added to local projects"
      );
    }
    const project = await this.projects.get(projectKey);
    if (!project) {
      throw new NotFoundError(`Project ${projectKey.id} not found`);
    }
    if (alias !== null) {
      await this.requireFreeAlias(alias);
    }
    const activity: Activity = {
      key: localKey(),
      name,
      description,
      projectKey,
      alias,
    };
    await this.projects.updateActivities(projectKey, [
      ...project.activities,
      activity,
    ]);
    return activity;
  }

  async update(key: EntityKey, changes: ActivityChanges): Promise<Activity> {
    const { activity, project } = await this.require(key);
    const alias = changes.alias === undefined ? activity.alias : changes.alias;
    if (alias !== null && alias !== activity.alias) {
      await this.requireFreeAlias(alias);
    }
    const updated: Activity = {
      ...activity,
      name: changes.name ?? activity.name,
      description: changes.description ?? activity.description,
      alias,
    };
    await this.projects.updateActivities(
      project.key,
      project.activities.map((entry) =>
        keysEqual(entry.key, key) ? updated : entry
      )
    );
    return updated;
  }

  async delete(key: EntityKey, force = false): Promise<void> {
    const { activity, project } = await this.require(key);
    if (!force && (await this.getFrames(key)).length > 0) {
      throw new InvalidOperationError(
        `Activity "${activity.name}" has frames; force the delete to remove them too`
      );
    }
    await this.projects.updateActivities(
      project.key,
      project.activities.filter((entry) => !keysEqual(entry.key, key))
    );
  }

  async getFrames(key: EntityKey): Promise<Frame[]> {
    return this.frames.getByActivity(key);
  }

  /** Removes the frames referencing the activity, then the activity. */
  async forceDelete(key: EntityKey): Promise<number> {
    await this.require(key);
    const removed = await this.frames.removeByActivity(key);
    await this.delete(key, true);
    return removed;
  }

  private async require(
    key: EntityKey
  ): Promise<{ activity: Activity; project: Project }> {
    if (key.source !== "local") {
      throw new InvalidOperationError(
        "Only local entities may be edited or deleted"
      );
    }
    const project = await this.projects.getByActivityKey(key);
    const activity = project?.activities.find((entry) =>
      keysEqual(entry.key, key)
    );
    if (!project || !activity) {
      throw new NotFoundError(`Activity ${key.id} not found`);
    }
    return { activity, project };
  }

  private async requireFreeAlias(alias: string): Promise<void> {
    const projects = await this.projects.all([]);
    const taken = projects.some((project) =>
      project.activities.some((activity) => activity.alias === alias)
    );
    if (taken) {
      throw new InvalidOperationError(`Alias "${alias}" is already in use`);
    }
  }
}

// #endregion

// #region Remote

export class RemoteActivityRepository implements ActivityReader {
  constructor(private readonly projects: RemoteProjectRepository) {}

  async all(activeOnly = true): Promise<Activity[]> {
    const projects = await this.projects.all(statusesFor(activeOnly));
    return projects.flatMap((project) => project.activities);
  }

  async get(key: EntityKey): Promise<Activity | null> {
    const project = await this.projects.getByActivityKey(key);
    return (
      project?.activities.find((activity) => keysEqual(activity.key, key)) ??
      null
    );
  }

  async getByAlias(alias: string, activeOnly = true): Promise<Activity | null> {
    const project = await this.projects.getByActivityAlias(alias);
    return findAlias(project, alias, activeOnly);
  }

  async searchByNameOrAlias(
    search: string,
    activeOnly = true
  ): Promise<Activity[]> {
    const activities = await this.all(activeOnly);
    return activities.filter((activity) => matchesNameOrAlias(activity, search));
  }

  async searchByAlias(search: string): Promise<Activity[]> {
    const activities = await this.all(true);
    return activities.filter((activity) => matchesAlias(activity, search));
  }
}

// #endregion

/**
 * Routes activity lookups by entity source; listings are local first. Only
 * local activities can be created, edited or deleted.
 */
export class ActivityRepository implements ActivityReader {
  constructor(
    private readonly local: LocalActivityRepository,
    private readonly remote: RemoteActivityRepository
  ) {}

  async all(activeOnly = true): Promise<Activity[]> {
    return [
      ...(await this.local.all(activeOnly)),
      ...(await this.remote.all(activeOnly)),
    ];
  }

  async get(key: EntityKey): Promise<Activity | null> {
    switch (key.source) {
      case "local":
        return this.local.get(key);
      case "remote":
        return this.remote.get(key);
    }
  }

  async getByAlias(alias: string, activeOnly = true): Promise<Activity | null> {
    return (
      (await this.local.getByAlias(alias, activeOnly)) ??
      this.remote.getByAlias(alias, activeOnly)
    );
  }

  async searchByNameOrAlias(
    search: string,
    activeOnly = true
  ): Promise<Activity[]> {
    return [
      ...(await this.local.searchByNameOrAlias(search, activeOnly)),
      ...(await this.remote.searchByNameOrAlias(search, activeOnly)),
    ];
  }

  async searchByAlias(search: string): Promise<Activity[]> {
    return [
      ...(await this.local.searchByAlias(search)),
      ...(await this.remote.searchByAlias(search)),
    ];
  }

  async create(
    name: string,
    description: string,
    projectKey: EntityKey,
    alias: string | null = null
  ): Promise<Activity> {
    return this.local.create(name, description, projectKey, alias);
  }

  async update(key: EntityKey, changes: ActivityChanges): Promise<Activity> {
    return this.local.update(key, changes);
  }

  async delete(key: EntityKey, force = false): Promise<void> {
    await this.local.delete(key, force);
  }

  async getFrames(key: EntityKey): Promise<Frame[]> {
    return this.local.getFrames(key);
  }

  async forceDelete(key: EntityKey): Promise<number> {
    return this.local.forceDelete(key);
  }
}
