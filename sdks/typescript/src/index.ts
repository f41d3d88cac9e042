export { BandCloudClient, DEFAULT_BASE_URL, DEFAULT_USER_AGENT, settle } from "./client";
export type { ActivityFilters, SummaryFilters } from "./client";
export { RefreshingCredentialSupplier, StaticCredentialSupplier, toCredentialSupplier } from "./credentials";
export type { Credential, CredentialSupplier, RefreshFn, RefreshingCredentialOptions } from "./credentials";
export { createOAuth2Refresh } from "./oauth2";
export type { OAuth2RefreshOptions } from "./oauth2";
export { RequestBuilder } from "./request";
export { createAuthorizedTransport, wrapResponse } from "./transport";
export { decodeResponse, isSuccessStatus, parseBody } from "./decode";
export {
  AuthError,
  BandCloudError,
  DecodeError,
  EncodingError,
  HttpStatusError,
  InvalidPathError,
  TransportError,
  isAuthError,
  isBandCloudError,
  isDecodeError,
  isEncodingError,
  isHttpStatusError,
  isInvalidPath,
  isTransportError,
} from "./errors";
export type { BandCloudErrorCode, DecodeIssue } from "./errors";
export { withQuery } from "./query";
export type { QueryParams } from "./query";
export * from "./schemas";
export type { ClientOptions, HttpMethod, InboundResponse, OutboundRequest, RequestOptions, Result, Schema, Transport } from "./types";
export { SDK_VERSION } from "./version";
