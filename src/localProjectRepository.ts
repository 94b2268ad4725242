import * as path from "path";
import { JsonFileStore } from "./fileStore";
import { ProjectsFile, projectsFileSchema, STORE_VERSION } from "./records";
import { projectFromRecord, projectToRecord, rankByName } from "./project";
import { Activity, Project, ProjectStatus } from "./types";
import { EntityKey, keysEqual, localKey } from "./entityKey";
import { InvalidOperationError, NotFoundError } from "./errors";
import { Logger } from "./logger";

export const LOCAL_PROJECTS_FILE_NAME = "local-projects.json";

/** Read side shared by the local store, the remote cache and the facade. */
export interface ProjectReader {
  all(statuses?: ProjectStatus[]): Promise<Project[]>;
  get(key: EntityKey): Promise<Project | null>;
  getByNameLike(name: string): Promise<Project[]>;
  getByActivityKey(activityKey: EntityKey): Promise<Project | null>;
  getByActivityAlias(alias: string): Promise<Project | null>;
  getAllAliases(): Promise<string[]>;
}

export interface ProjectChanges {
  name?: string;
  description?: string;
  status?: ProjectStatus;
}

/** User-owned projects with their nested activities, in local-projects.json. */
export class LocalProjectRepository implements ProjectReader {
  private readonly store: JsonFileStore<ProjectsFile>;

  constructor(dataDir: string, logger?: Logger) {
    this.store = new JsonFileStore(
      path.join(dataDir, LOCAL_PROJECTS_FILE_NAME),
      projectsFileSchema,
      () => ({ version: STORE_VERSION, fetchedAt: null, projects: [] }),
      logger
    );
  }

  // An empty status list means every project.
  async all(
    statuses: ProjectStatus[] = [ProjectStatus.Active]
  ): Promise<Project[]> {
    const file = await this.store.read();
    const projects = file.projects
      .map(projectFromRecord)
      .filter((project) => project.key.source === "local");
    if (statuses.length === 0) {
      return projects;
    }
    return projects.filter((project) => statuses.includes(project.status));
  }

  async get(key: EntityKey): Promise<Project | null> {
    if (key.source !== "local") {
      return null;
    }
    const projects = await this.all([]);
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
    if (activityKey.source !== "local") {
      return null;
    }
    const projects = await this.all([]);
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

  async create(
    name: string,
    description: string,
    status: ProjectStatus = ProjectStatus.Active
  ): Promise<Project> {
    const project: Project = {
      key: localKey(),
      name,
      description,
      status,
      activities: [],
    };
    await this.saveProject(project);
    return project;
  }

  async update(key: EntityKey, changes: ProjectChanges): Promise<Project> {
    const project = await this.require(key);
    const updated: Project = {
      ...project,
      name: changes.name ?? project.name,
      description: changes.description ?? project.description,
      status: changes.status ?? project.status,
    };
    await this.saveProject(updated);
    return updated;
  }

  async delete(key: EntityKey, force = false): Promise<void> {
    const project = await this.require(key);
    if (!force && project.activities.length > 0) {
      throw new InvalidOperationError(
        `Project "${project.name}" has activities; force the delete to remove them too`
      );
    }
    await this.store.update((file) => ({
      ...file,
      projects: file.projects.filter((record) => !keysEqual(record.key, key)),
    }));
  }

  /** Runs `onActivity` for every activity (frames first) before dropping the project. */
  async forceDelete(
    key: EntityKey,
    onActivity: (activity: Activity) => Promise<void>
  ): Promise<void> {
    const project = await this.require(key);
    for (const activity of project.activities) {
      await onActivity(activity);
    }
    await this.delete(key, true);
  }

  async updateActivities(
    key: EntityKey,
    activities: Activity[]
  ): Promise<Project> {
    const project = await this.require(key);
    const updated: Project = { ...project, activities };
    await this.saveProject(updated);
    return updated;
  }

  private async require(key: EntityKey): Promise<Project> {
    if (key.source !== "local") {
      throw new InvalidOperationError(
        "Only local entities may be edited or deleted"
      );
    }
    const project = await this.get(key);
    if (!project) {
      throw new NotFoundError(`Project ${key.id} not found`);
    }
    return project;
  }

  private async saveProject(project: Project): Promise<void> {
    const record = projectToRecord(project);
    await this.store.update((file) => {
      const index = file.projects.findIndex((entry) =>
        keysEqual(entry.key, project.key)
      );
      const projects = [...file.projects];
      if (index === -1) {
        projects.push(record);
      } else {
        projects[index] = record;
      }
      return { ...file, projects };
    });
  }
}
