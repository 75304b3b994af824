import { describe, expect, it, vi } from "vitest";
import { authorize, derivePartialKey, RADIKO_AUTH_KEY } from "../src/core/auth.js";
import { AuthPhase1Failed, AuthPhase2Failed } from "../src/core/errors.js";
import { authRoutes, routeFetch } from "./helpers.js";

describe("derivePartialKey", () => {
  it("encodes the requested slice of the key", () => {
    expect(derivePartialKey(0, 16)).toBe("YmNkMTUxMDczYzAzYjM1Mg==");
    expect(derivePartialKey(8, 16)).toBe("M2MwM2IzNTJlMWVmMmZkNg==");
  });

  it("reaches the last slice of the key", () => {
    expect(derivePartialKey(RADIKO_AUTH_KEY.length - 16, 16)).toBe(
      Buffer.from(RADIKO_AUTH_KEY.slice(24, 40), "ascii").toString("base64"),
    );
    expect(derivePartialKey(24, 16)).toBe("NmMzMjIwOWRhOWNhMGFmYQ==");
  });

  it("rejects ranges outside the key", () => {
    expect(() => derivePartialKey(30, 16)).toThrow(RangeError);
    expect(() => derivePartialKey(-1, 4)).toThrow(RangeError);
    expect(() => derivePartialKey(0, 0)).toThrow(RangeError);
  });
});

describe("authorize", () => {
  it("returns the token and the area from auth2", async () => {
    const fetchSpy = routeFetch(authRoutes("JP13,東京都,tokyo Japan"));

    await expect(authorize()).resolves.toEqual({ token: "test-token", areaId: "JP13" });

    expect(fetchSpy).toHaveBeenCalledTimes(2);
    const auth1Headers = new Headers(fetchSpy.mock.calls[0]?.[1]?.headers);
    expect(auth1Headers.get("x-radiko-app")).toBe("pc_html5");
    expect(auth1Headers.get("x-radiko-user")).toBe("dummy_user");
    const auth2Headers = new Headers(fetchSpy.mock.calls[1]?.[1]?.headers);
    expect(auth2Headers.get("x-radiko-authtoken")).toBe("test-token");
    expect(auth2Headers.get("x-radiko-partialkey")).toBe("M2MwM2IzNTJlMWVmMmZkNg==");
  });

  it("fails phase 1 when the key range headers are missing", async () => {
    routeFetch([
      [
        "https://radiko.jp/v2/api/auth1",
        () => new Response("", { status: 200, headers: { "x-radiko-authtoken": "test-token" } }),
      ],
    ]);
    await expect(authorize()).rejects.toBeInstanceOf(AuthPhase1Failed);
  });

  it("fails phase 1 on an unusable key range", async () => {
    routeFetch([
      [
        "https://radiko.jp/v2/api/auth1",
        () =>
          new Response("", {
            status: 200,
            headers: {
              "x-radiko-authtoken": "test-token",
              "x-radiko-keyoffset": "30",
              "x-radiko-keylength": "16",
            },
          }),
      ],
    ]);
    await expect(authorize()).rejects.toThrow("unusable key range");
  });

  it("fails phase 1 on a non-2xx status or a network error", async () => {
    routeFetch([["https://radiko.jp/v2/api/auth1", () => new Response("", { status: 500 })]]);
    await expect(authorize()).rejects.toThrow("auth1 failed: 500");

    vi.spyOn(globalThis, "fetch").mockRejectedValue(new TypeError("fetch failed"));
    const error = await authorize().catch((caught: unknown) => caught);
    expect(error).toBeInstanceOf(AuthPhase1Failed);
    expect(error).toMatchObject({ code: "AUTH_PHASE1_FAILED" });
  });

  it("fails phase 2 on a rejected key or an empty area", async () => {
    const [auth1] = authRoutes();
    routeFetch([
      auth1,
      ["https://radiko.jp/v2/api/auth2", () => new Response("", { status: 401 })],
    ]);
    await expect(authorize()).rejects.toBeInstanceOf(AuthPhase2Failed);

    routeFetch(authRoutes(" ,"));
    await expect(authorize()).rejects.toThrow("auth2 returned an empty area");
  });

  it("re-runs the whole handshake under a retry policy", async () => {
    let auth1Calls = 0;
    const [, auth2] = authRoutes();
    const fetchSpy = routeFetch([
      [
        "https://radiko.jp/v2/api/auth1",
        () => {
          auth1Calls += 1;
          if (auth1Calls === 1) {
            return new Response("", { status: 503 });
          }
          return new Response("", {
            status: 200,
            headers: {
              "x-radiko-authtoken": "test-token",
              "x-radiko-keyoffset": "0",
              "x-radiko-keylength": "16",
            },
          });
        },
      ],
      auth2,
    ]);

    await expect(authorize({ retry: { retries: 1, delayMs: 1 } })).resolves.toEqual({
      token: "test-token",
      areaId: "JP13",
    });
    expect(fetchSpy).toHaveBeenCalledTimes(3);
  });

  it("does not retry by default", async () => {
    const fetchSpy = routeFetch([
      ["https://radiko.jp/v2/api/auth1", () => new Response("", { status: 503 })],
    ]);
    await expect(authorize()).rejects.toBeInstanceOf(AuthPhase1Failed);
    expect(fetchSpy).toHaveBeenCalledTimes(1);
  });
});
