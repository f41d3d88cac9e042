import type { Logger } from "pino";
import { toCredentialSupplier } from "./credentials";
import { decodeResponse } from "./decode";
import { BandCloudError, InvalidPathError } from "./errors";
import { logger as defaultLogger } from "./logger";
import { createOAuth2Refresh } from "./oauth2";
import { withQuery } from "./query";
import type { QueryParams } from "./query";
import { RequestBuilder } from "./request";
import { ACTIVITY_TYPE_NAMES, activitiesSchema, activitySchema } from "./schemas/activities";
import type { Activities, Activity, ActivityKind } from "./schemas/activities";
import { deviceProfilesSchema, deviceSchema } from "./schemas/devices";
import type { Device, DeviceProfiles } from "./schemas/devices";
import { profileSchema } from "./schemas/profile";
import type { Profile } from "./schemas/profile";
import { isPeriod, summariesSchema } from "./schemas/summaries";
import type { Period, Summaries } from "./schemas/summaries";
import { createAuthorizedTransport } from "./transport";
import type { ClientOptions, HttpMethod, RequestOptions, Result, Schema, Transport } from "./types";
import { SDK_VERSION } from "./version";

export const DEFAULT_BASE_URL = "https://api.microsofthealth.net/v1/me";
export const DEFAULT_USER_AGENT = `band-cloud-sdk:v${SDK_VERSION}`;
const DEFAULT_TIMEOUT_MS = 30_000;

export interface SummaryFilters {
  startTime?: Date;
  endTime?: Date;
  maxPageSize?: number;
}

export interface ActivityFilters extends SummaryFilters {
  activityTypes?: Array<Exclude<ActivityKind, "unknown">>;
}

export class BandCloudClient {
  readonly baseUrl: string;
  readonly userAgent: string;
  private readonly builder: RequestBuilder;
  private readonly transport: Transport;
  private readonly logger: Logger;

  constructor(options: ClientOptions) {
    this.baseUrl = options.baseUrl ?? DEFAULT_BASE_URL;
    this.userAgent = [options.userAgent ?? DEFAULT_USER_AGENT, options.userAgentSuffix].filter(Boolean).join(" ");
    this.builder = new RequestBuilder({ baseUrl: this.baseUrl, userAgent: this.userAgent });
    const refresh = options.oauth2 && createOAuth2Refresh({ ...options.oauth2, fetch: options.oauth2.fetch ?? options.fetch });
    this.transport = createAuthorizedTransport({
      credentials: toCredentialSupplier(options.credentials, refresh),
      fetch: options.fetch,
      timeoutMs: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
    });
    this.logger = options.logger ?? defaultLogger;
  }

  static fromToken(token: string, options: Omit<ClientOptions, "credentials"> = {}): BandCloudClient {
    return new BandCloudClient({ ...options, credentials: token });
  }

  /**
   * Runs one build, send and decode round trip. Rejects with a
   * BandCloudError subclass on any failure along the way.
   */
  request(method: HttpMethod, path: string, options?: { body?: unknown }): Promise<void>;
  request<T>(method: HttpMethod, path: string, options: { body?: unknown; schema: Schema<T> }): Promise<T>;
  async request<T>(method: HttpMethod, path: string, options: RequestOptions<T> = {}): Promise<T | void> {
    const request = this.builder.build(method, path, options.body);
    const log = this.logger.child({ method, path });
    log.debug({ action: "band_request" }, "sending request");

    const startedAt = Date.now();
    const response = await this.transport(request);
    log.debug({ action: "band_response", status: response.status, durationMs: Date.now() - startedAt }, "response received");

    if (options.schema) {
      return decodeResponse(response, options.schema);
    }
    return decodeResponse(response);
  }

  periodSummaries(period: Period, filters: SummaryFilters = {}): Promise<Result<Summaries>> {
    if (!isPeriod(period)) {
      return settle(Promise.reject(new InvalidPathError(`/Summaries/${period}`, "unknown summary period")));
    }
    const path = withQuery(`/Summaries/${period}`, summaryQuery(filters));
    return settle(this.request("GET", path, { schema: summariesSchema }));
  }

  profile(): Promise<Result<Profile>> {
    return settle(this.request("GET", "/Profile", { schema: profileSchema }));
  }

  devices(): Promise<Result<DeviceProfiles>> {
    return settle(this.request("GET", "/Devices", { schema: deviceProfilesSchema }));
  }

  device(id: string): Promise<Result<Device>> {
    return settle(this.withId("/Devices", id, (path) => this.request("GET", path, { schema: deviceSchema })));
  }

  activities(filters: ActivityFilters = {}): Promise<Result<Activities>> {
    const query: QueryParams = {
      ...summaryQuery(filters),
      activityTypes: filters.activityTypes?.map((kind) => ACTIVITY_TYPE_NAMES[kind]).join(","),
    };
    return settle(this.request("GET", withQuery("/Activities", query), { schema: activitiesSchema }));
  }

  activity(id: string): Promise<Result<Activity>> {
    return settle(this.withId("/Activities", id, (path) => this.request("GET", path, { schema: activitySchema })));
  }

  private async withId<T>(collection: string, id: string, run: (path: string) => Promise<T>): Promise<T> {
    if (!id) {
      throw new InvalidPathError(`${collection}/`, "identifier is empty");
    }
    return run(`${collection}/${encodeURIComponent(id)}`);
  }
}

function summaryQuery(filters: SummaryFilters): QueryParams {
  return {
    startTime: filters.startTime?.toISOString(),
    endTime: filters.endTime?.toISOString(),
    maxPageSize: filters.maxPageSize,
  };
}

/** Converts a rejected round trip into the failure variant of a Result. */
export async function settle<T>(operation: Promise<T>): Promise<Result<T>> {
  try {
    return { ok: true, value: await operation };
  } catch (error) {
    if (error instanceof BandCloudError) {
      return { ok: false, error };
    }
    throw error;
  }
}
