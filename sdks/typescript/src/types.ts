import type { Logger } from "pino";
import type { ZodType, ZodTypeDef } from "zod";
import type { Credential, CredentialSupplier } from "./credentials";
import type { BandCloudError } from "./errors";
import type { OAuth2RefreshOptions } from "./oauth2";

export type HttpMethod = "GET" | "POST" | "PUT" | "PATCH" | "DELETE";

export interface OutboundRequest {
  readonly method: HttpMethod;
  readonly url: string;
  readonly headers: Readonly<Record<string, string>>;
  readonly body?: string;
}

/**
 * A response whose body can be read once. `close` releases the underlying
 * stream and is safe to call after the body has been read.
 */
export interface InboundResponse {
  readonly status: number;
  readonly statusText: string;
  readonly url: string;
  text(): Promise<string>;
  close(): Promise<void>;
}

export type Transport = (request: OutboundRequest) => Promise<InboundResponse>;

export interface ClientOptions {
  credentials: string | Credential | CredentialSupplier;
  /** Renews an expiring credential record through its refresh token. */
  oauth2?: OAuth2RefreshOptions;
  baseUrl?: string;
  userAgent?: string;
  userAgentSuffix?: string;
  fetch?: typeof fetch;
  timeoutMs?: number;
  logger?: Logger;
}

export type Schema<T> = ZodType<T, ZodTypeDef, unknown>;

export interface RequestOptions<T> {
  body?: unknown;
  schema?: Schema<T>;
}

export type Result<T, E = BandCloudError> = { ok: true; value: T } | { ok: false; error: E };
