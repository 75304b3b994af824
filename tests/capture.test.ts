import { afterEach, describe, expect, it, vi } from "vitest";
import {
  buildCaptureArgs,
  capture,
  CaptureSession,
  FFMPEG_USER_AGENT,
} from "../src/core/capture.js";
import { CaptureFailedError } from "../src/core/errors.js";
import type { ProcessResult, ProcessRunner } from "../src/core/process.js";

const stream = {
  url: "https://radiko.jp/v2/api/ts/playlist.m3u8?station_id=TBS&l=15&ft=20260125093000&to=20260125100000",
  headers: { "X-Radiko-AuthToken": "test-token" },
};

function runner(result: Partial<ProcessResult>) {
  return vi.fn<ProcessRunner>(async () => ({
    exitCode: 0,
    signal: null,
    stdout: "",
    stderr: "",
    ...result,
  }));
}

afterEach(() => {
  vi.useRealTimers();
});

describe("buildCaptureArgs", () => {
  it("builds the reconnecting copy invocation", () => {
    expect(buildCaptureArgs(stream, "/tmp/out.mp4", 1800)).toEqual([
      "-loglevel",
      "warning",
      "-y",
      "-reconnect",
      "1",
      "-reconnect_at_eof",
      "0",
      "-reconnect_streamed",
      "1",
      "-reconnect_delay_max",
      "600",
      "-user_agent",
      FFMPEG_USER_AGENT,
      "-headers",
      "X-Radiko-AuthToken: test-token\r\n",
      "-i",
      stream.url,
      "-t",
      "1805",
      "-acodec",
      "copy",
      "-vn",
      "/tmp/out.mp4",
    ]);
  });

  it("omits -headers when there are none", () => {
    const args = buildCaptureArgs({ url: "https://example.test/live.m3u8", headers: {} }, "out.mp4", 60, "error");
    expect(args).not.toContain("-headers");
    expect(args.slice(0, 2)).toEqual(["-loglevel", "error"]);
    expect(args[args.indexOf("-t") + 1]).toBe("65");
  });
});

describe("CaptureSession", () => {
  it("succeeds on exit code 0", async () => {
    const run = runner({ stdout: "done" });
    const session = new CaptureSession(stream, "/tmp/out.mp4", 1800, { runProcess: run });
    expect(session.state).toBe("NotStarted");

    const result = await session.run();

    expect(result).toMatchObject({ outputPath: "/tmp/out.mp4", exitCode: 0, stdout: "done" });
    expect(session.state).toBe("Succeeded");
    expect(run).toHaveBeenCalledWith("ffmpeg", session.args);
  });

  it("fails on a non-zero exit with the stderr tail", async () => {
    const session = new CaptureSession(stream, "/tmp/out.mp4", 1800, {
      runProcess: runner({ exitCode: 1, stderr: "Opening input\nServer returned 403 Forbidden\n" }),
      ffmpegPath: "/usr/bin/ffmpeg",
    });

    const error = await session.run().catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(CaptureFailedError);
    expect(error).toMatchObject({
      code: "CAPTURE_FAILED",
      message: "ffmpeg exited with code 1",
      exitCode: 1,
      stderr: "Opening input\nServer returned 403 Forbidden",
    });
    expect(session.state).toBe("Failed");
  });

  it("fails when ffmpeg is terminated by a signal", async () => {
    await expect(
      capture(stream, "/tmp/out.mp4", 60, {
        runProcess: runner({ exitCode: null, signal: "SIGTERM" }),
      }),
    ).rejects.toMatchObject({ message: "ffmpeg terminated by SIGTERM", exitCode: null });
  });

  it("fails when ffmpeg cannot be started", async () => {
    const spawnError = Object.assign(new Error("spawn ffmpeg ENOENT"), { code: "ENOENT" });
    const error = await capture(stream, "/tmp/out.mp4", 60, {
      runProcess: vi.fn<ProcessRunner>(async () => {
        throw spawnError;
      }),
    }).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(CaptureFailedError);
    expect(error).toMatchObject({ message: "Could not start ffmpeg", cause: spawnError });
  });

  it("runs only once", async () => {
    const run = runner({});
    const session = new CaptureSession(stream, "/tmp/out.mp4", 60, { runProcess: run });
    await session.run();
    await expect(session.run()).rejects.toThrow("Capture session already Succeeded");
    expect(run).toHaveBeenCalledTimes(1);
  });

  it("requires a positive whole duration", () => {
    expect(() => new CaptureSession(stream, "/tmp/out.mp4", 0)).toThrow(RangeError);
    expect(() => new CaptureSession(stream, "/tmp/out.mp4", 1.5)).toThrow(RangeError);
  });

  it("ticks progress once a second while running", async () => {
    vi.useFakeTimers();
    const onProgress = vi.fn();
    const run = vi.fn<ProcessRunner>(
      () =>
        new Promise((resolve) => {
          setTimeout(() => resolve({ exitCode: 0, signal: null, stdout: "", stderr: "" }), 2500);
        }),
    );

    const pending = capture(stream, "/tmp/out.mp4", 10, { runProcess: run, onProgress });
    await vi.advanceTimersByTimeAsync(2500);
    await pending;
    await vi.advanceTimersByTimeAsync(3000);

    expect(onProgress.mock.calls).toEqual([
      [0, 10],
      [1, 10],
      [2, 10],
    ]);
  });
});
