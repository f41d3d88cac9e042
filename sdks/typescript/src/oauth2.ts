import { z } from "zod";
import type { Credential, RefreshFn } from "./credentials";
import { AuthError } from "./errors";

export interface OAuth2RefreshOptions {
  tokenUrl: string;
  clientId: string;
  clientSecret?: string;
  scopes?: string[];
  /** Defaults to the client's `fetch`, then the global one. */
  fetch?: typeof fetch;
  now?: () => number;
}

const DEFAULT_EXPIRES_IN_SECONDS = 3600;

const tokenResponseSchema = z.object({
  access_token: z.string().optional(),
  refresh_token: z.string().optional(),
  expires_in: z.union([z.number(), z.string()]).optional(),
  error: z.string().optional(),
  error_description: z.string().optional(),
});

type TokenResponse = z.infer<typeof tokenResponseSchema>;

/**
 * Builds a refresh function that trades the credential's refresh token for a
 * new access token at an OAuth2 token endpoint (`grant_type=refresh_token`).
 */
export function createOAuth2Refresh(options: OAuth2RefreshOptions): RefreshFn {
  const send = options.fetch ?? globalThis.fetch.bind(globalThis);
  const now = options.now ?? Date.now;

  return async (current) => {
    if (!current.refreshToken) {
      throw new AuthError("Credential has no refresh token");
    }

    const body = new URLSearchParams({
      grant_type: "refresh_token",
      refresh_token: current.refreshToken,
      client_id: options.clientId,
    });
    if (options.clientSecret) {
      body.set("client_secret", options.clientSecret);
    }
    if (options.scopes?.length) {
      body.set("scope", options.scopes.join(" "));
    }

    const response = await send(options.tokenUrl, {
      method: "POST",
      headers: { "Content-Type": "application/x-www-form-urlencoded", Accept: "application/json" },
      body,
    });
    const data = parseTokenBody(await response.text(), response.status);

    if (!response.ok || !data.access_token) {
      const reason = data.error_description ?? data.error ?? `HTTP ${response.status}`;
      throw new AuthError(`Token endpoint rejected the refresh: ${reason}`);
    }
    return toCredential(data, data.access_token, current.refreshToken, now());
  };
}

function parseTokenBody(text: string, status: number): TokenResponse {
  let payload: unknown;
  try {
    payload = JSON.parse(text);
  } catch (error) {
    throw new AuthError(`Token endpoint returned a non-JSON body (HTTP ${status})`, { cause: error });
  }
  const result = tokenResponseSchema.safeParse(payload);
  if (!result.success) {
    throw new AuthError(`Token endpoint returned an unexpected body (HTTP ${status})`, { cause: result.error });
  }
  return result.data;
}

function toCredential(data: TokenResponse, accessToken: string, previousRefreshToken: string, now: number): Credential {
  const raw = data.expires_in;
  const expiresIn =
    typeof raw === "number" ? raw : typeof raw === "string" ? parseInt(raw, 10) || DEFAULT_EXPIRES_IN_SECONDS : DEFAULT_EXPIRES_IN_SECONDS;

  return {
    accessToken,
    // Endpoints that do not rotate refresh tokens leave this out.
    refreshToken: data.refresh_token || previousRefreshToken,
    expiresAt: now + expiresIn * 1000,
  };
}
