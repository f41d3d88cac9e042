import { describe, expect, it, vi } from "vitest";
import { AuthError } from "../src/errors";
import { createOAuth2Refresh } from "../src/oauth2";

const TOKEN_URL = "https://login.example.com/oauth20_token.srf";
const current = { accessToken: "old-token", refreshToken: "test-refresh", expiresAt: 0 };

function tokenEndpoint(body: string, init?: ResponseInit) {
  return vi.fn<typeof fetch>(async () => new Response(body, init));
}

describe("createOAuth2Refresh", () => {
  it("posts a refresh_token grant and maps the response", async () => {
    const fetchMock = tokenEndpoint('{"access_token":"new-token","refresh_token":"rotated-refresh","expires_in":3600}');
    const refresh = createOAuth2Refresh({
      tokenUrl: TOKEN_URL,
      clientId: "test-client",
      clientSecret: "test-secret",
      scopes: ["read", "write"],
      fetch: fetchMock,
      now: () => 1_000,
    });

    await expect(refresh(current)).resolves.toEqual({
      accessToken: "new-token",
      refreshToken: "rotated-refresh",
      expiresAt: 3_601_000,
    });

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe(TOKEN_URL);
    expect(init?.method).toBe("POST");
    expect(new Headers(init?.headers).get("Content-Type")).toBe("application/x-www-form-urlencoded");
    expect(String(init?.body)).toBe(
      "grant_type=refresh_token&refresh_token=test-refresh&client_id=test-client&client_secret=test-secret&scope=read+write",
    );
  });

  it("keeps the old refresh token when none is returned", async () => {
    const refresh = createOAuth2Refresh({
      tokenUrl: TOKEN_URL,
      clientId: "test-client",
      fetch: tokenEndpoint('{"access_token":"new-token","expires_in":"120"}'),
      now: () => 0,
    });
    await expect(refresh(current)).resolves.toEqual({
      accessToken: "new-token",
      refreshToken: "test-refresh",
      expiresAt: 120_000,
    });
  });

  it("assumes an hour when the lifetime is missing", async () => {
    const refresh = createOAuth2Refresh({
      tokenUrl: TOKEN_URL,
      clientId: "test-client",
      fetch: tokenEndpoint('{"access_token":"new-token"}'),
      now: () => 0,
    });
    await expect(refresh(current)).resolves.toMatchObject({ expiresAt: 3_600_000 });
  });

  it("reports the endpoint's error description", async () => {
    const refresh = createOAuth2Refresh({
      tokenUrl: TOKEN_URL,
      clientId: "test-client",
      fetch: tokenEndpoint('{"error":"invalid_grant","error_description":"Refresh token revoked"}', { status: 400 }),
    });
    const error = await refresh(current).catch((reason: unknown) => reason);
    expect(error).toBeInstanceOf(AuthError);
    expect(error).toMatchObject({ message: "Token endpoint rejected the refresh: Refresh token revoked" });
  });

  it("rejects a body that is not JSON", async () => {
    const refresh = createOAuth2Refresh({
      tokenUrl: TOKEN_URL,
      clientId: "test-client",
      fetch: tokenEndpoint("<html>Bad Gateway</html>", { status: 502 }),
    });
    await expect(refresh(current)).rejects.toThrow("Token endpoint returned a non-JSON body (HTTP 502)");
  });

  it("does not call the endpoint without a refresh token", async () => {
    const fetchMock = tokenEndpoint("{}");
    const refresh = createOAuth2Refresh({ tokenUrl: TOKEN_URL, clientId: "test-client", fetch: fetchMock });

    await expect(refresh({ accessToken: "old-token" })).rejects.toThrow("Credential has no refresh token");
    expect(fetchMock).not.toHaveBeenCalled();
  });
});
