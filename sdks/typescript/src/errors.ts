export type BandCloudErrorCode =
  | "INVALID_PATH"
  | "ENCODING_ERROR"
  | "TRANSPORT_ERROR"
  | "HTTP_STATUS_ERROR"
  | "DECODE_ERROR"
  | "AUTH_ERROR";

export class BandCloudError extends Error {
  public readonly code: BandCloudErrorCode;

  constructor(code: BandCloudErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "BandCloudError";
    this.code = code;
  }
}

export class InvalidPathError extends BandCloudError {
  public readonly path: string;

  constructor(path: string, reason: string) {
    super("INVALID_PATH", `Invalid resource path ${JSON.stringify(path)}: ${reason}`);
    this.name = "InvalidPathError";
    this.path = path;
  }
}

export class EncodingError extends BandCloudError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("ENCODING_ERROR", message, options);
    this.name = "EncodingError";
  }
}

export class TransportError extends BandCloudError {
  public readonly timedOut: boolean;

  constructor(options: { message: string; timedOut?: boolean; cause?: unknown }) {
    super("TRANSPORT_ERROR", options.message, { cause: options.cause });
    this.name = "TransportError";
    this.timedOut = options.timedOut ?? false;
  }
}

export class HttpStatusError extends BandCloudError {
  public readonly httpStatus: number;
  public readonly statusText: string;
  public readonly url: string;
  /** Raw text excerpt of the response body, for diagnostics only. */
  public readonly body: string;

  constructor(options: { httpStatus: number; statusText: string; url: string; body: string }) {
    const label = options.statusText ? `${options.httpStatus} ${options.statusText}` : `${options.httpStatus}`;
    super("HTTP_STATUS_ERROR", `HTTP ${label} for ${options.url}`);
    this.name = "HttpStatusError";
    this.httpStatus = options.httpStatus;
    this.statusText = options.statusText;
    this.url = options.url;
    this.body = options.body;
  }
}

export interface DecodeIssue {
  path: string;
  message: string;
}

export class DecodeError extends BandCloudError {
  public readonly issues: DecodeIssue[];

  constructor(options: { message: string; issues?: DecodeIssue[]; cause?: unknown }) {
    super("DECODE_ERROR", options.message, { cause: options.cause });
    this.name = "DecodeError";
    this.issues = options.issues ?? [];
  }
}

export class AuthError extends BandCloudError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("AUTH_ERROR", message, options);
    this.name = "AuthError";
  }
}

export function isBandCloudError(error: unknown): error is BandCloudError {
  return error instanceof BandCloudError;
}

export function isInvalidPath(error: unknown): error is InvalidPathError {
  return error instanceof InvalidPathError;
}

export function isEncodingError(error: unknown): error is EncodingError {
  return error instanceof EncodingError;
}

export function isTransportError(error: unknown): error is TransportError {
  return error instanceof TransportError;
}

export function isHttpStatusError(error: unknown): error is HttpStatusError {
  return error instanceof HttpStatusError;
}

export function isDecodeError(error: unknown): error is DecodeError {
  return error instanceof DecodeError;
}

export function isAuthError(error: unknown): error is AuthError {
  return error instanceof AuthError;
}
