import type { CredentialSupplier, Credential } from "./credentials";
import { AuthError, TransportError } from "./errors";
import type { InboundResponse, OutboundRequest, Transport } from "./types";

export interface AuthorizedTransportOptions {
  credentials: CredentialSupplier;
  fetch?: typeof fetch;
  /** Deadline for the whole exchange, body included. 0 disables it. */
  timeoutMs?: number;
}

/**
 * Wraps `fetch` so every request carries the supplier's bearer credential.
 * A request is never sent when the credential cannot be obtained.
 */
export function createAuthorizedTransport(options: AuthorizedTransportOptions): Transport {
  const send = options.fetch ?? globalThis.fetch.bind(globalThis);
  const timeoutMs = options.timeoutMs ?? 0;

  return async (request) => {
    const credential = await obtainCredential(options.credentials);

    const headers: Record<string, string> = {
      ...request.headers,
      Accept: "application/json",
      Authorization: `Bearer ${credential.accessToken}`,
    };
    if (request.body !== undefined) {
      headers["Content-Type"] = "application/json";
    }

    const controller = new AbortController();
    const timeout = timeoutMs > 0 ? setTimeout(() => controller.abort(), timeoutMs) : undefined;

    let response: Response;
    try {
      response = await send(request.url, {
        method: request.method,
        headers,
        body: request.body,
        signal: controller.signal,
      });
    } catch (error) {
      clearTimeout(timeout);
      throw toTransportError(request, error, controller.signal.aborted);
    }

    return wrapResponse(request, response, controller.signal, () => clearTimeout(timeout));
  };
}

async function obtainCredential(credentials: CredentialSupplier): Promise<Credential> {
  let credential: Credential;
  try {
    credential = await credentials.token();
  } catch (error) {
    if (error instanceof AuthError) {
      throw error;
    }
    const reason = error instanceof Error ? error.message : String(error);
    throw new AuthError(`Unable to obtain a credential: ${reason}`, { cause: error });
  }
  if (!credential.accessToken) {
    throw new AuthError("Credential supplier returned an empty access token");
  }
  return credential;
}

function toTransportError(request: OutboundRequest, error: unknown, timedOut: boolean): TransportError {
  if (timedOut) {
    return new TransportError({
      message: `${request.method} ${request.url} timed out`,
      timedOut: true,
      cause: error,
    });
  }
  const reason = error instanceof Error ? error.message : String(error);
  return new TransportError({ message: `${request.method} ${request.url} failed: ${reason}`, cause: error });
}

/** Adapts a fetch Response to a read-once, close-once inbound response. */
export function wrapResponse(
  request: OutboundRequest,
  response: Response,
  signal?: AbortSignal,
  onClose?: () => void,
): InboundResponse {
  let closed = false;

  return {
    status: response.status,
    statusText: response.statusText,
    url: response.url || request.url,
    async text() {
      try {
        return await response.text();
      } catch (error) {
        throw toTransportError(request, error, signal?.aborted ?? false);
      }
    },
    async close() {
      if (closed) {
        return;
      }
      closed = true;
      onClose?.();
      if (response.body && !response.bodyUsed) {
        // The stream is released whether or not the cancel succeeds.
        await response.body.cancel().catch(() => undefined);
      }
    },
  };
}
