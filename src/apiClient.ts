import { z } from "zod";
import { NotFoundError, RemoteUnavailableError, describeError } from "./errors";
import { Logger, logger as rootLogger } from "./logger";

// #region Wire types

const intLike = z.union([
  z.number().int(),
  z
    .string()
    .regex(/^\d+$/)
    .transform((value) => Number(value)),
]);

const numberLike = z.union([
  z.number(),
  z
    .string()
    .regex(/^-?\d+(\.\d+)?$/)
    .transform((value) => Number(value)),
]);

const textLike = z
  .union([z.string(), z.number()])
  .transform((value) => String(value));

const listSchema = z
  .union([z.array(z.unknown()), z.record(z.unknown())])
  .transform((value) => (Array.isArray(value) ? value : Object.values(value)));

const activityDataSchema = z.object({
  id: intLike,
  name: z.string(),
  description: z.string().nullish(),
  alias: z.string().nullish(),
});

const projectDataSchema = z.object({
  id: intLike,
  name: z.string(),
  description: z.string().nullish(),
  status: intLike.default(1),
  activities: listSchema.default([]),
});

export interface ActivityData {
  id: number;
  name: string;
  description: string;
  alias: string | null;
}

export interface ProjectData {
  id: number;
  name: string;
  description: string;
  status: number;
  activities: ActivityData[];
}

const roleDataSchema = z.object({
  id: intLike,
  parent_id: intLike.nullish(),
  name: z.string(),
  full_name: z.string().nullish(),
  type: textLike.nullish(),
  status: textLike.nullish(),
});

export type RoleData = z.output<typeof roleDataSchema>;

const userDataSchema = z.object({
  user: z.object({
    id: intLike,
    username: z.string().nullish(),
    firstname: z.string().nullish(),
    lastname: z.string().nullish(),
    name: z.string().nullish(),
    email: z.string().nullish(),
  }),
  roles: listSchema.default([]),
});

export interface UserData {
  user: {
    id: number;
    username: string;
    firstname: string;
    lastname: string;
    name: string;
    email: string;
  };
  roles: RoleData[];
}

export interface TimesheetData {
  id: number;
  activityId: number;
  projectId: number | null;
  date: string;
  time: number;
  description: string;
  clientDescription: string | null;
  roleId: number | null;
  individualAction: boolean;
  // "YYYY-MM-DD HH:MM:SS", remote wall-clock time
  modifiedAt: string | null;
}

// GET responses say occupation_id, POST responses occupid.
const timesheetDataSchema = z
  .object({
    id: intLike,
    occupation_id: intLike.nullish(),
    occupid: intLike.nullish(),
    project_id: intLike.nullish(),
    date: z.string(),
    time: numberLike,
    description: z.string(),
    client_description: z.string().nullish(),
    role_id: intLike.nullish(),
    individual_action: z.boolean().nullish(),
    lu_date: z.string().nullish(),
    modified: z.string().nullish(),
  })
  .transform((data, ctx): TimesheetData => {
    const activityId = data.occupation_id ?? data.occupid;
    if (activityId === null || activityId === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "occupation_id or occupid is required",
      });
      return z.NEVER;
    }
    return {
      id: data.id,
      activityId,
      projectId: data.project_id ?? null,
      date: data.date.slice(0, 10),
      time: data.time,
      description: data.description,
      clientDescription: data.client_description ?? null,
      roleId: data.role_id ?? null,
      individualAction: data.individual_action === true,
      modifiedAt: data.lu_date ?? data.modified ?? null,
    };
  });

export interface TimesheetWriteData {
  project_id: number;
  activity_id: number;
  description: string;
  time: number;
  date: string;
  client_description?: string;
  role_id?: number;
}

export interface CreatedTimesheet {
  id: number | null;
  timesheet: TimesheetData | null;
}

const envelopeSchema = z.object({
  success: z.literal(true),
  data: z.unknown().optional(),
});

const listEnvelopeDataSchema = z
  .object({ list: listSchema.optional() })
  .passthrough()
  .nullish();

const createdDataSchema = z
  .object({
    id: intLike.optional(),
    timesheet: z.unknown().optional(),
  })
  .passthrough()
  .nullish();

// #endregion

/** The remote system as the sync engine sees it. */
export interface RemoteApi {
  fetchProjectsAll(): Promise<ProjectData[]>;
  fetchUserById(id: number): Promise<UserData>;
  /** Throws NotFoundError on 404. */
  fetchTimesheetById(remoteId: number): Promise<TimesheetData>;
  fetchTimesheetsByDateRange(from: string, to: string): Promise<TimesheetData[]>;
  createTimesheet(data: TimesheetWriteData): Promise<CreatedTimesheet>;
  updateTimesheet(remoteId: number, data: TimesheetWriteData): Promise<void>;
  deleteTimesheet(remoteId: number): Promise<void>;
}

export interface RemoteApiClientOptions {
  baseUri: string | null;
  token: string | null;
  fetchImpl?: typeof fetch;
  retries?: number;
  retryDelayMs?: number;
  logger?: Logger;
}

type Method = "GET" | "POST" | "PUT" | "DELETE";
type Query = Record<string, string | number | undefined>;

const API_PREFIX = "/api/v2";

class HttpStatusError extends Error {
  constructor(
    readonly status: number,
    readonly path: string
  ) {
    super(`HTTP ${status} for ${path}`);
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export class RemoteApiClient implements RemoteApi {
  private readonly fetchImpl: typeof fetch;
  private readonly retries: number;
  private readonly retryDelayMs: number;
  private readonly logger: Logger;

  constructor(private readonly options: RemoteApiClientOptions) {
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
    this.retries = options.retries ?? 2;
    this.retryDelayMs = options.retryDelayMs ?? 500;
    this.logger = (options.logger ?? rootLogger).child("api");
  }

  async fetchProjectsAll(): Promise<ProjectData[]> {
    const data = await this.request(
      "GET",
      "/projects?statuses[]=0&statuses[]=1&statuses[]=2"
    );
    return this.parseList(data, (item) => {
      const parsed = projectDataSchema.safeParse(item);
      if (!parsed.success) {
        return null;
      }
      const project = parsed.data;
      return {
        id: project.id,
        name: project.name,
        description: project.description ?? "",
        status: project.status,
        activities: project.activities.flatMap((raw) => {
          const activity = activityDataSchema.safeParse(raw);
          if (!activity.success) {
            return [];
          }
          return [
            {
              id: activity.data.id,
              name: activity.data.name,
              description: activity.data.description ?? "",
              alias: activity.data.alias ?? null,
            },
          ];
        }),
      };
    });
  }

  async fetchUserById(id: number): Promise<UserData> {
    const data = await this.request("GET", `/users/${id}`);
    const parsed = userDataSchema.safeParse(data);
    if (!parsed.success) {
      throw new RemoteUnavailableError("User data not found in API response");
    }
    const { user, roles } = parsed.data;
    return {
      user: {
        id: user.id,
        username: user.username ?? "",
        firstname: user.firstname ?? "",
        lastname: user.lastname ?? "",
        name: user.name ?? "",
        email: user.email ?? "",
      },
      roles: roles.flatMap((raw) => {
        const role = roleDataSchema.safeParse(raw);
        return role.success ? [role.data] : [];
      }),
    };
  }

  async fetchTimesheetById(remoteId: number): Promise<TimesheetData> {
    let data: unknown;
    try {
      data = await this.request("GET", `/timesheets/${remoteId}`);
    } catch (err) {
      if (err instanceof RemoteUnavailableError && err.status === 404) {
        throw new NotFoundError(`Timesheet ${remoteId} not found remotely`);
      }
      throw err;
    }
    const parsed = timesheetDataSchema.safeParse(data);
    if (!parsed.success) {
      throw new RemoteUnavailableError(
        `Timesheet ${remoteId} could not be read: ${parsed.error.issues[0]?.message}`
      );
    }
    return parsed.data;
  }

  async fetchTimesheetsByDateRange(
    from: string,
    to: string
  ): Promise<TimesheetData[]> {
    const data = await this.request("GET", "/timesheets", {
      start_date: from,
      end_date: to,
    });
    return this.parseList(data, (item) => {
      const parsed = timesheetDataSchema.safeParse(item);
      return parsed.success ? parsed.data : null;
    });
  }

  async createTimesheet(data: TimesheetWriteData): Promise<CreatedTimesheet> {
    const response = await this.request(
      "POST",
      "/timesheets",
      this.toQuery(data)
    );
    const parsed = createdDataSchema.safeParse(response);
    if (!parsed.success || !parsed.data) {
      return { id: null, timesheet: null };
    }
    const nested = timesheetDataSchema.safeParse(parsed.data.timesheet);
    if (nested.success) {
      return { id: nested.data.id, timesheet: nested.data };
    }
    const flat = timesheetDataSchema.safeParse(parsed.data);
    if (flat.success) {
      return { id: flat.data.id, timesheet: flat.data };
    }
    return { id: parsed.data.id ?? null, timesheet: null };
  }

  async updateTimesheet(
    remoteId: number,
    data: TimesheetWriteData
  ): Promise<void> {
    await this.request("PUT", `/timesheets/${remoteId}`, this.toQuery(data));
  }

  async deleteTimesheet(remoteId: number): Promise<void> {
    await this.request("DELETE", `/timesheets/${remoteId}`);
  }

  // #region Transport

  private toQuery(data: TimesheetWriteData): Query {
    return { ...data };
  }

  private parseList<T>(data: unknown, convert: (item: unknown) => T | null): T[] {
    const parsed = listEnvelopeDataSchema.safeParse(data);
    const items = parsed.success ? parsed.data?.list ?? [] : [];
    const result: T[] = [];
    for (const item of items) {
      const converted = convert(item);
      if (converted === null) {
        this.logger.warn("skipping unreadable item in API response");
      } else {
        result.push(converted);
      }
    }
    return result;
  }

  private buildUrl(path: string, query?: Query): URL {
    const { baseUri } = this.options;
    if (!baseUri) {
      throw new RemoteUnavailableError(
        "No remote base URI configured (set FRAMETRACK_BASE_URI)"
      );
    }
    const url = new URL(`${baseUri.replace(/\/+$/, "")}${API_PREFIX}${path}`);
    for (const [key, value] of Object.entries(query ?? {})) {
      if (value !== undefined) {
        url.searchParams.set(key, String(value));
      }
    }
    return url;
  }

  private async request(
    method: Method,
    path: string,
    query?: Query
  ): Promise<unknown> {
    const url = this.buildUrl(path, query);
    const attempts = method === "GET" ? this.retries + 1 : 1;

    let lastError: unknown = null;
    for (let attempt = 1; attempt <= attempts; attempt++) {
      try {
        return await this.send(method, url, path);
      } catch (err) {
        lastError = err;
        // Transport failures and 5xx are retried; API-level refusals are not.
        const retryable =
          err instanceof HttpStatusError
            ? err.status >= 500
            : !(err instanceof RemoteUnavailableError);
        if (!retryable || attempt === attempts) {
          break;
        }
        this.logger.debug(`retrying ${method} ${path} (attempt ${attempt})`);
        await sleep(this.retryDelayMs * attempt);
      }
    }

    if (lastError instanceof HttpStatusError) {
      throw new RemoteUnavailableError(
        `${method} ${path} failed with HTTP ${lastError.status}`,
        lastError.status,
        { cause: lastError }
      );
    }
    if (lastError instanceof RemoteUnavailableError) {
      throw lastError;
    }
    throw new RemoteUnavailableError(
      `${method} ${path} failed: ${describeError(lastError)}`,
      undefined,
      { cause: lastError }
    );
  }

  private async send(method: Method, url: URL, path: string): Promise<unknown> {
    const headers: Record<string, string> = { Accept: "application/json" };
    if (this.options.token) {
      headers.Authorization = `Bearer ${this.options.token}`;
    }
    this.logger.debug(`${method} ${url.pathname}`);
    const response = await this.fetchImpl(url, { method, headers });
    if (!response.ok) {
      throw new HttpStatusError(response.status, path);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (err) {
      throw new RemoteUnavailableError(
        `Invalid JSON in response to ${method} ${path}`,
        response.status,
        { cause: err }
      );
    }
    const envelope = envelopeSchema.safeParse(body);
    if (!envelope.success) {
      throw new RemoteUnavailableError(
        `${method} ${path} was not successful`,
        response.status
      );
    }
    return envelope.data.data;
  }

  // #endregion
}
