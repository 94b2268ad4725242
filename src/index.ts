export * from "./types";
export * from "./errors";
export * from "./entityKey";
export * from "./dates";
export * from "./frame";
export * from "./timesheet";
export { Logger, logger, isLogLevel } from "./logger";
export type { LogLevel } from "./logger";
export { ConfigStore, CONFIG_KEYS, resolvePaths, resolveSettings } from "./config";
export type { Settings } from "./config";
export { FrameRepository } from "./frameRepository";
export type { FrameFilter } from "./frameRepository";
export { LocalProjectRepository } from "./localProjectRepository";
export type { ProjectReader, ProjectChanges } from "./localProjectRepository";
export { RemoteProjectRepository } from "./remoteProjectRepository";
export { ProjectRepository } from "./projectRepository";
export {
  ActivityRepository,
  LocalActivityRepository,
  RemoteActivityRepository,
} from "./activityRepository";
export type { ActivityReader, ActivityChanges } from "./activityRepository";
export { UserRepository } from "./userRepository";
export { RemoteApiClient } from "./apiClient";
export type { RemoteApi, RemoteApiClientOptions } from "./apiClient";
export { LocalTimesheetRepository } from "./localTimesheetRepository";
export { RemoteTimesheetRepository } from "./remoteTimesheetRepository";
export * from "./timesheetSync";
export * from "./timesheetBuilder";
export { Tracker } from "./tracker";
export type { StartOptions, AddOptions, RestartOptions } from "./tracker";
export { createApp } from "./app";
export type { App, AppOptions } from "./app";
