import { ConfigStore, resolvePaths, resolveSettings, Settings } from "./config";
import { RemoteApi, RemoteApiClient } from "./apiClient";
import { FrameRepository } from "./frameRepository";
import { LocalProjectRepository } from "./localProjectRepository";
import { RemoteProjectRepository } from "./remoteProjectRepository";
import { ProjectRepository } from "./projectRepository";
import {
  ActivityRepository,
  LocalActivityRepository,
  RemoteActivityRepository,
} from "./activityRepository";
import { UserRepository } from "./userRepository";
import { LocalTimesheetRepository } from "./localTimesheetRepository";
import { RemoteTimesheetRepository } from "./remoteTimesheetRepository";
import { TimesheetSyncService } from "./timesheetSync";
import { TimesheetBuilder } from "./timesheetBuilder";
import { Tracker } from "./tracker";
import { Clock, systemClock } from "./dates";
import { Logger, logger as rootLogger } from "./logger";

export interface AppOptions {
  env?: Record<string, string | undefined>;
  clock?: Clock;
  // Replaces the HTTP client, e.g. with an in-process fake.
  api?: RemoteApi;
  logger?: Logger;
}

/** Every service, wired once per process. */
export interface App {
  settings: Settings;
  logger: Logger;
  clock: Clock;
  config: ConfigStore;
  api: RemoteApi;
  frames: FrameRepository;
  projects: ProjectRepository;
  activities: ActivityRepository;
  users: UserRepository;
  localTimesheets: LocalTimesheetRepository;
  remoteTimesheets: RemoteTimesheetRepository;
  tracker: Tracker;
  sync: TimesheetSyncService;
  builder: TimesheetBuilder;
}

export async function createApp(options: AppOptions = {}): Promise<App> {
  const env = options.env ?? process.env;
  const clock = options.clock ?? systemClock;
  const logger = options.logger ?? rootLogger;

  const { configDir } = resolvePaths(env);
  const config = new ConfigStore(configDir, logger);
  const settings = await resolveSettings(config, env);
  logger.setLevel(settings.logLevel);

  const api =
    options.api ??
    new RemoteApiClient({
      baseUri: settings.baseUri,
      token: settings.token,
      logger,
    });

  const frames = new FrameRepository(settings.dataDir, clock, logger);
  const localProjects = new LocalProjectRepository(settings.dataDir, logger);
  const remoteProjects = new RemoteProjectRepository(
    settings.dataDir,
    api,
    clock,
    logger
  );
  const activities = new ActivityRepository(
    new LocalActivityRepository(localProjects, frames),
    new RemoteActivityRepository(remoteProjects)
  );
  const users = new UserRepository(settings.dataDir, api, config, clock, logger);
  const localTimesheets = new LocalTimesheetRepository(settings.dataDir, logger);
  const remoteTimesheets = new RemoteTimesheetRepository(
    api,
    activities,
    users,
    clock,
    logger
  );

  return {
    settings,
    logger,
    clock,
    config,
    api,
    frames,
    projects: new ProjectRepository(localProjects, remoteProjects),
    activities,
    users,
    localTimesheets,
    remoteTimesheets,
    tracker: new Tracker(frames, users, clock, logger),
    sync: new TimesheetSyncService(localTimesheets, remoteTimesheets, logger),
    builder: new TimesheetBuilder(frames, localTimesheets, clock, logger),
  };
}
