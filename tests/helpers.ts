import { writeFile } from "node:fs/promises";
import { vi } from "vitest";
import type { ProcessRunner } from "../src/core/process.js";

export type Route = () => Response | Promise<Response>;

/**
 * Answers `fetch` by URL prefix; anything unrouted fails like a network error.
 */
export function routeFetch(routes: Array<[string, Route]>) {
  return vi.spyOn(globalThis, "fetch").mockImplementation(async (input) => {
    const url = input instanceof Request ? input.url : String(input);
    const route = routes.find(([prefix]) => url.startsWith(prefix));
    if (!route) {
      throw new TypeError(`fetch failed: ${url}`);
    }
    return route[1]();
  });
}

export function authRoutes(areaBody = "JP13,tokyo Japan"): Array<[string, Route]> {
  return [
    [
      "https://radiko.jp/v2/api/auth1",
      () =>
        new Response("", {
          status: 200,
          headers: {
            "x-radiko-authtoken": "test-token",
            "x-radiko-keyoffset": "8",
            "x-radiko-keylength": "16",
          },
        }),
    ],
    ["https://radiko.jp/v2/api/auth2", () => new Response(areaBody, { status: 200 })],
  ];
}

/**
 * Stand-in for ffmpeg: exits with the queued codes in order (0 once they run
 * out) and writes the output file on success.
 */
export function fakeFfmpeg(exitCodes: number[] = []) {
  let call = 0;
  return vi.fn<ProcessRunner>(async (_command, args) => {
    const exitCode = exitCodes[call] ?? 0;
    call += 1;
    if (exitCode === 0) {
      await writeFile(args[args.length - 1] ?? "", "media");
    }
    return {
      exitCode,
      signal: null,
      stdout: "",
      stderr: exitCode === 0 ? "" : "Server returned 404 Not Found",
    };
  });
}

export const SCHEDULE_XML = `<?xml version="1.0" encoding="UTF-8"?>
<radiko>
  <ttl>1800</ttl>
  <stations>
    <station id="TBS">
      <name>TBS RADIO</name>
      <progs>
        <date>20260125</date>
        <prog id="1" ft="20260125093000" to="20260125100000" ftl="0930" tol="1000" dur="1800">
          <title>Morning &amp; Talk</title>
          <url>https://example.test/morning</url>
          <desc>&lt;p&gt;Desc&lt;/p&gt;</desc>
          <info/>
          <pfm>Host A</pfm>
          <img>https://example.test/morning.png</img>
        </prog>
        <prog id="2" ft="20260125100000" to="20260125110000" dur="3600">
          <title>Late Morning</title>
        </prog>
      </progs>
    </station>
  </stations>
</radiko>`;

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json" },
  });
}
