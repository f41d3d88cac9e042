import { describe, expect, it } from "vitest";
import { EncodingError, InvalidPathError } from "../src/errors";
import { RequestBuilder } from "../src/request";

const builder = new RequestBuilder({ baseUrl: "https://api.example.com/v1/me", userAgent: "test-agent" });

describe("RequestBuilder", () => {
  it("appends the path to the base URL verbatim", () => {
    const request = builder.build("GET", "/Profile");
    expect(request.url).toBe("https://api.example.com/v1/me/Profile");
    expect(request.method).toBe("GET");
  });

  it("does not resolve dot segments or merge queries", () => {
    expect(builder.build("GET", "/Devices/../Profile").url).toBe("https://api.example.com/v1/me/Devices/../Profile");
    expect(builder.build("GET", "?a=1").url).toBe("https://api.example.com/v1/me?a=1");
  });

  it("uses the base URL itself for an empty path", () => {
    expect(builder.build("GET", "").url).toBe("https://api.example.com/v1/me");
  });

  it("sets only the identification header", () => {
    expect(builder.build("POST", "/Profile", { a: 1 }).headers).toEqual({ "User-Agent": "test-agent" });
  });

  it("omits the body when none is given", () => {
    expect(builder.build("GET", "/Profile").body).toBeUndefined();
    expect(builder.build("GET", "/Profile", null).body).toBeUndefined();
  });

  it("serializes the body as JSON", () => {
    const payload = { name: "Morning run", laps: [1, 2, 3], nested: { ok: true, note: null } };
    const request = builder.build("POST", "/Activities", payload);
    expect(request.body).toBe('{"name":"Morning run","laps":[1,2,3],"nested":{"ok":true,"note":null}}');
    expect(JSON.parse(request.body ?? "")).toEqual(payload);
  });

  it("accepts percent-encoded and query characters", () => {
    expect(builder.build("GET", "/Devices/a%20b?x=1&y=2").url).toBe("https://api.example.com/v1/me/Devices/a%20b?x=1&y=2");
  });

  it.each(["/Profile name", "/Devices#top", "/bad%zz", "/tab\there", "/naïve"])("rejects %j", (path) => {
    expect(() => builder.build("GET", path)).toThrow(InvalidPathError);
  });

  describe("against a base URL without a path", () => {
    const hostOnly = new RequestBuilder({ baseUrl: "https://api.example.com", userAgent: "test-agent" });

    it("still appends rooted paths", () => {
      expect(hostOnly.build("GET", "/Profile").url).toBe("https://api.example.com/Profile");
    });

    it.each(["@evil.example/Profile", ":8443/Profile", "Profile", ".evil.example/Profile"])(
      "rejects %j, which would change the authority",
      (path) => {
        expect(() => hostOnly.build("GET", path)).toThrow(InvalidPathError);
      },
    );
  });

  it("records the offending path", () => {
    try {
      builder.build("GET", "/a b");
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidPathError);
      expect(error).toMatchObject({ code: "INVALID_PATH", path: "/a b" });
    }
  });

  it("rejects a body with no JSON representation", () => {
    expect(() => builder.build("POST", "/Profile", () => 1)).toThrow(EncodingError);
    expect(() => builder.build("POST", "/Profile", { big: 10n })).toThrow(EncodingError);
  });

  it("rejects a circular body", () => {
    const circular: Record<string, unknown> = {};
    circular.self = circular;
    expect(() => builder.build("POST", "/Profile", circular)).toThrow(/not JSON-serializable/);
  });

  it("refuses a base URL that is not absolute", () => {
    expect(() => new RequestBuilder({ baseUrl: "api/v1", userAgent: "test-agent" })).toThrow(InvalidPathError);
  });
});
