import { EncodingError, InvalidPathError } from "./errors";
import type { HttpMethod, OutboundRequest } from "./types";

// RFC 3986 path and query characters; fragments are not sent.
const PATH_PATTERN = /^(?:[A-Za-z0-9\-._~!$&'()*+,;=:@/?]|%[0-9A-Fa-f]{2})*$/;

export interface RequestBuilderOptions {
  baseUrl: string;
  userAgent: string;
}

/**
 * Builds outbound requests against a fixed base URL. Paths are appended to
 * the base verbatim; there is no reference resolution, so "../" or a second
 * query string are carried through as written.
 */
export class RequestBuilder {
  readonly baseUrl: string;
  readonly userAgent: string;
  private readonly origin: string;

  constructor(options: RequestBuilderOptions) {
    if (!URL.canParse(options.baseUrl)) {
      throw new InvalidPathError(options.baseUrl, "base URL is not an absolute URL");
    }
    this.baseUrl = options.baseUrl;
    this.origin = new URL(options.baseUrl).origin;
    this.userAgent = options.userAgent;
  }

  build(method: HttpMethod, path: string, body?: unknown): OutboundRequest {
    if (!PATH_PATTERN.test(path)) {
      throw new InvalidPathError(path, "contains characters outside a URI path");
    }
    if (path && !path.startsWith("/") && !path.startsWith("?")) {
      throw new InvalidPathError(path, 'must start with "/" or "?"');
    }
    const url = `${this.baseUrl}${path}`;
    if (!URL.canParse(url)) {
      throw new InvalidPathError(path, "does not form a valid URL");
    }
    if (new URL(url).origin !== this.origin) {
      throw new InvalidPathError(path, "leaves the base URL's origin");
    }

    const headers = { "User-Agent": this.userAgent };
    if (body === undefined || body === null) {
      return { method, url, headers };
    }
    return { method, url, headers, body: encodeBody(body) };
  }
}

function encodeBody(body: unknown): string {
  let encoded: string | undefined;
  try {
    encoded = JSON.stringify(body);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new EncodingError(`Request body is not JSON-serializable: ${reason}`, { cause: error });
  }
  if (encoded === undefined) {
    throw new EncodingError(`Request body of type ${typeof body} has no JSON representation`);
  }
  return encoded;
}
