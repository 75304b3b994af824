import { mkdtemp, readdir, readFile, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  AuthPhase1Failed,
  CaptureFailedError,
  InvalidTimeWindowError,
  StreamResolutionFormatError,
} from "../src/core/errors.js";
import type { ProcessRunner } from "../src/core/process.js";
import { Program } from "../src/core/program.js";
import {
  pickLatestEpisode,
  recordNhkLive,
  recordNhkOndemand,
  recordRadikoLive,
  recordRadikoTimefree,
} from "../src/core/recorder.js";
import { authRoutes, fakeFfmpeg, routeFetch, SCHEDULE_XML, type Route } from "./helpers.js";

const WEEKLY_TBS = "https://radiko.jp/v3/program/station/weekly/TBS.xml";
const COVER = "https://example.test/morning.png";
const WINDOW = { ft: "20260125093000", to: "20260125100000" };

const NHK_CONFIG_XML = `<?xml version="1.0" encoding="UTF-8"?>
<radiru_config>
  <stream_url>
    <data>
      <area>tokyo</area>
      <r1hls>https://example.test/r1/master.m3u8</r1hls>
      <r2hls>https://example.test/r2/master.m3u8</r2hls>
      <fmhls>https://example.test/fm/master.m3u8</fmhls>
    </data>
  </stream_url>
</radiru_config>`;

const notFound: Route = () => new Response("", { status: 404 });

function logger() {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

let outputDir: string;

beforeEach(async () => {
  outputDir = await mkdtemp(path.join(os.tmpdir(), "onair-rec-"));
});

afterEach(async () => {
  await rm(outputDir, { recursive: true, force: true });
});

describe("recordRadikoTimefree", () => {
  it("captures the window and tags it with listing metadata", async () => {
    routeFetch([
      ...authRoutes(),
      [WEEKLY_TBS, () => new Response(SCHEDULE_XML)],
      [COVER, notFound],
    ]);
    const run = fakeFfmpeg();

    const result = await recordRadikoTimefree("TBS", WINDOW, { outputDir, runProcess: run });

    expect(result.outputPath).toBe(path.join(outputDir, "TBS_2026-01-25-09_30.mp4"));
    expect(result.program.title).toBe("Morning & Talk");
    expect(result.tagged).toBe(true);
    expect(run).toHaveBeenCalledTimes(2);

    const captureArgs = run.mock.calls[0]?.[1] ?? [];
    expect(captureArgs).toContain(
      "https://radiko.jp/v2/api/ts/playlist.m3u8?station_id=TBS&l=15&ft=20260125093000&to=20260125100000",
    );
    expect(captureArgs).toContain("X-Radiko-AuthToken: test-token\r\n");
    expect(captureArgs[captureArgs.indexOf("-t") + 1]).toBe("1805");
    expect(run.mock.calls[1]?.[1]).toContain("title=Morning & Talk");
    expect(await readFile(result.outputPath, "utf-8")).toBe("media");
  });

  it("rejects a malformed window before authenticating", async () => {
    const fetchSpy = routeFetch(authRoutes());
    const run = fakeFfmpeg();

    await expect(
      recordRadikoTimefree("TBS", { ft: "20260125100000", to: "20260125093000" }, {
        outputDir,
        runProcess: run,
      }),
    ).rejects.toBeInstanceOf(InvalidTimeWindowError);
    expect(fetchSpy).not.toHaveBeenCalled();
    expect(run).not.toHaveBeenCalled();
  });

  it("never starts ffmpeg when authentication fails", async () => {
    routeFetch([["https://radiko.jp/v2/api/auth1", () => new Response("", { status: 403 })]]);
    const run = fakeFfmpeg();

    await expect(
      recordRadikoTimefree("TBS", WINDOW, { outputDir, runProcess: run }),
    ).rejects.toBeInstanceOf(AuthPhase1Failed);
    expect(run).not.toHaveBeenCalled();
  });

  it("surfaces a failed capture without tagging", async () => {
    routeFetch([...authRoutes(), [WEEKLY_TBS, () => new Response(SCHEDULE_XML)]]);
    const run = fakeFfmpeg([1]);

    const failure = recordRadikoTimefree("TBS", WINDOW, { outputDir, runProcess: run });

    await expect(failure).rejects.toBeInstanceOf(CaptureFailedError);
    await expect(failure).rejects.toMatchObject({
      exitCode: 1,
      stderr: "Server returned 404 Not Found",
    });
    expect(run).toHaveBeenCalledTimes(1);
  });

  it("falls back to minimal metadata when the listing is down", async () => {
    routeFetch([...authRoutes(), [WEEKLY_TBS, () => new Response("", { status: 500 })]]);
    const log = logger();

    const result = await recordRadikoTimefree("TBS", WINDOW, {
      outputDir,
      runProcess: fakeFfmpeg(),
      logger: log,
    });

    expect(result.program.title).toBe("TBS");
    expect(result.program.endTime).toBe("20260125100000");
    expect(result.program.streamUrl).toContain("station_id=TBS");
    expect(log.warn).toHaveBeenCalledWith(
      "Listing lookup failed for TBS 20260125093000: [LISTING_HTTP] weekly programs TBS failed: 500",
    );
  });

  it("logs ffmpeg warnings of a successful capture", async () => {
    routeFetch([...authRoutes(), [WEEKLY_TBS, () => new Response(SCHEDULE_XML)], [COVER, notFound]]);
    const log = logger();
    const run = vi.fn<ProcessRunner>(async (_command, args) => {
      await writeFile(args[args.length - 1] ?? "", "media");
      return {
        exitCode: 0,
        signal: null,
        stdout: "",
        stderr: args.includes("-reconnect") ? "[hls] Skip segment 3\n" : "",
      };
    });

    const result = await recordRadikoTimefree("TBS", WINDOW, {
      outputDir,
      runProcess: run,
      logger: log,
    });

    expect(result.tagged).toBe(true);
    expect(log.warn).toHaveBeenCalledWith("ffmpeg: [hls] Skip segment 3");
  });

  it("keeps the recording when tagging fails", async () => {
    routeFetch([...authRoutes(), [WEEKLY_TBS, () => new Response(SCHEDULE_XML)], [COVER, notFound]]);

    const result = await recordRadikoTimefree("TBS", WINDOW, {
      outputDir,
      runProcess: fakeFfmpeg([0, 1]),
    });

    expect(result.tagged).toBe(false);
    expect(await readdir(outputDir)).toEqual(["TBS_2026-01-25-09_30.mp4"]);
  });
});

describe("recordRadikoLive", () => {
  const now = () => new Date(2026, 0, 25, 9, 45, 0);

  it("records the live sub-playlist for the requested minutes", async () => {
    routeFetch([
      ...authRoutes(),
      [
        "https://f-radiko.smartstream.ne.jp/TBS/_definst_/simul-stream.stream/playlist.m3u8",
        () =>
          new Response("#EXTM3U\n#EXT-X-STREAM-INF:BANDWIDTH=52973\nchunklist_w123.m3u8\n"),
      ],
      ["https://radiko.jp/v3/program/now/JP13.xml", () => new Response(SCHEDULE_XML)],
      [COVER, notFound],
    ]);
    const run = fakeFfmpeg();

    const result = await recordRadikoLive("TBS", 30, { outputDir, runProcess: run, now });

    expect(result.outputPath).toBe(path.join(outputDir, "TBS_2026-01-25-09_45.mp4"));
    expect(result.program.title).toBe("Morning & Talk");
    const args = run.mock.calls[0]?.[1] ?? [];
    expect(args).toContain(
      "https://f-radiko.smartstream.ne.jp/TBS/_definst_/simul-stream.stream/chunklist_w123.m3u8",
    );
    expect(args[args.indexOf("-t") + 1]).toBe("1805");
  });

  it("rejects a non-positive length", async () => {
    const fetchSpy = routeFetch([]);
    await expect(
      recordRadikoLive("TBS", 0, { outputDir, runProcess: fakeFfmpeg(), now }),
    ).rejects.toBeInstanceOf(InvalidTimeWindowError);
    expect(fetchSpy).not.toHaveBeenCalled();
  });
});

describe("recordNhkOndemand", () => {
  it("captures up to the ceiling when the episode length is unknown", async () => {
    const episode = new Program({
      source: "nhk",
      title: "Night Jazz",
      station: "FM",
      startTime: "20260118233000",
      endTime: "20260118233000",
      streamUrl: "https://example.test/ondemand/master.m3u8",
    });
    const run = fakeFfmpeg();

    const result = await recordNhkOndemand(episode, { outputDir, runProcess: run });

    expect(result.outputPath).toBe(path.join(outputDir, "FM_2026-01-18-23_30.mp4"));
    const args = run.mock.calls[0]?.[1] ?? [];
    expect(args).not.toContain("-headers");
    expect(args[args.indexOf("-t") + 1]).toBe("10805");
  });

  it("refuses an episode without a stream URL", async () => {
    const episode = Program.synthesize("nhk", "FM", "20260118233000", "20260118233000");
    await expect(
      recordNhkOndemand(episode, { outputDir, runProcess: fakeFfmpeg() }),
    ).rejects.toBeInstanceOf(StreamResolutionFormatError);
  });
});

describe("recordNhkLive", () => {
  it("records the channel stream of the configured area", async () => {
    routeFetch([
      ["https://www.nhk.or.jp/radio/config/config_web.xml", () => new Response(NHK_CONFIG_XML)],
    ]);
    const run = fakeFfmpeg();

    const result = await recordNhkLive("FM", 10, {
      outputDir,
      runProcess: run,
      nhkArea: "tokyo",
      now: () => new Date(2026, 0, 25, 21, 0, 0),
    });

    expect(result.outputPath).toBe(path.join(outputDir, "FM_2026-01-25-21_00.mp4"));
    expect(result.program.title).toBe("FM");
    expect(result.program.endTime).toBe("20260125211000");
    const args = run.mock.calls[0]?.[1] ?? [];
    expect(args).toContain("https://example.test/fm/master.m3u8");
    expect(args[args.indexOf("-t") + 1]).toBe("605");
  });

  it("fails when the area has no stream", async () => {
    routeFetch([
      ["https://www.nhk.or.jp/radio/config/config_web.xml", () => new Response(NHK_CONFIG_XML)],
    ]);
    await expect(
      recordNhkLive("FM", 10, { outputDir, runProcess: fakeFfmpeg(), nhkArea: "sapporo" }),
    ).rejects.toThrow("NHK config has no FM stream for area sapporo");
  });
});

describe("pickLatestEpisode", () => {
  const at = new Date(2026, 0, 20, 12, 0, 0);

  function episode(startTime: string, streamUrl?: string, availableUntil?: string) {
    return new Program({
      source: "nhk",
      title: `Episode ${startTime}`,
      station: "FM",
      startTime,
      endTime: startTime,
      streamUrl,
      availableUntil,
    });
  }

  it("prefers the newest recordable, still available episode", () => {
    const picked = pickLatestEpisode(
      [
        episode("20260111233000", "https://example.test/a.m3u8", "20260125235900"),
        episode("20260118233000", "https://example.test/b.m3u8", "20260201235900"),
        episode("20260119233000"),
      ],
      at,
    );
    expect(picked?.startTime).toBe("20260118233000");
  });

  it("skips episodes whose window has closed", () => {
    const picked = pickLatestEpisode(
      [episode("20260111233000", "https://example.test/a.m3u8", "20260118235900")],
      at,
    );
    expect(picked).toBeUndefined();
  });
});
