import * as path from "path";
import { JsonFileStore } from "./fileStore";
import { ProjectsFile, projectsFileSchema, STORE_VERSION } from "./records";
import { projectFromRecord, projectToRecord, rankByName } from "./project";
import { ProjectReader } from "./localProjectRepository";
import { ProjectData, RemoteApi } from "./apiClient";
import { Project, ProjectStatus } from "./types";
import { EntityKey, keysEqual, remoteKey } from "./entityKey";
import { Clock, systemClock } from "./dates";
import { Logger, logger as rootLogger } from "./logger";

export const REMOTE_PROJECTS_FILE_NAME = "projects.json";

function toProjectStatus(value: number): ProjectStatus {
  switch (value) {
    case ProjectStatus.Inactive:
      return ProjectStatus.Inactive;
    case ProjectStatus.Active:
      return ProjectStatus.Active;
    default:
      return ProjectStatus.Other;
  }
}

export function projectFromApi(data: ProjectData): Project {
  const key = remoteKey(data.id);
  return {
    key,
    name: data.name,
    description: data.description,
    status: toProjectStatus(data.status),
    activities: data.activities.map((activity) => ({
      key: remoteKey(activity.id),
      name: activity.name,
      description: activity.description,
      projectKey: key,
      alias: activity.alias,
    })),
  };
}

/**
 * Read-only view of the remote projects, cached in projects.json. The cache
 * is filled on first use and replaced by `refresh`.
 */
export class RemoteProjectRepository implements ProjectReader {
  private readonly store: JsonFileStore<ProjectsFile>;
  private readonly logger: Logger;

  constructor(
    dataDir: string,
    private readonly api: RemoteApi,
    private readonly clock: Clock = systemClock,
    logger: Logger = rootLogger
  ) {
    this.logger = logger.child("projects");
    this.store = new JsonFileStore(
      path.join(dataDir, "cache", REMOTE_PROJECTS_FILE_NAME),
      projectsFileSchema,
      () => ({ version: STORE_VERSION, fetchedAt: null, projects: [] }),
      logger
    );
  }

  async refresh(): Promise<Project[]> {
    const projects = (await this.api.fetchProjectsAll()).map(projectFromApi);
    await this.store.write({
      version: STORE_VERSION,
      fetchedAt: this.clock(),
      projects: projects.map(projectToRecord),
    });
    this.logger.info(`cached ${projects.length} remote projects`);
    return projects;
  }

  async all(
    statuses: ProjectStatus[] = [ProjectStatus.Active]
  ): Promise<Project[]> {
    const projects = await this.load();
    if (statuses.length === 0) {
      return projects;
    }
    return projects.filter((project) => statuses.includes(project.status));
  }

  async get(key: EntityKey): Promise<Project | null> {
    if (key.source !== "remote") {
      return null;
    }
    const projects = await this.load();
    return projects.find((project) => keysEqual(project.key, key)) ?? null;
  }

  async getByNameLike(name: string): Promise<Project[]> {
    const { startsWith, contains } = rankByName(
      await this.all(),
      name,
      (project) => project.name
    );
    return [...startsWith, ...contains];
  }

  async getByActivityKey(activityKey: EntityKey): Promise<Project | null> {
    if (activityKey.source !== "remote") {
      return null;
    }
    const projects = await this.load();
    return (
      projects.find((project) =>
        project.activities.some((activity) =>
          keysEqual(activity.key, activityKey)
        )
      ) ?? null
    );
  }

  async getByActivityAlias(alias: string): Promise<Project | null> {
    const projects = await this.all();
    return (
      projects.find((project) =>
        project.activities.some((activity) => activity.alias === alias)
      ) ?? null
    );
  }

  async getAllAliases(): Promise<string[]> {
    const projects = await this.all();
    return projects.flatMap((project) =>
      project.activities.flatMap((activity) =>
        activity.alias === null ? [] : [activity.alias]
      )
    );
  }

  private async load(): Promise<Project[]> {
    const file = await this.store.read();
    if (file.fetchedAt === null && file.projects.length === 0) {
      return this.refresh();
    }
    return file.projects
      .map(projectFromRecord)
      .filter((project) => project.key.source === "remote");
  }
}
