import { CaptureFailedError } from "./errors.js";
import { silentLogger, type RecorderLogger } from "./log.js";
import type { StreamReference } from "./playlist.js";
import {
  runProcess,
  type ProcessResult,
  type ProcessRunner,
} from "./process.js";

export const FFMPEG_USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 Chrome/117.0.0.0 Safari/537.36";

/** Added to `-t` to absorb startup and reconnect latency. */
export const CAPTURE_MARGIN_SECONDS = 5;

const STDERR_TAIL_LINES = 20;

export type CaptureState = "NotStarted" | "Running" | "Succeeded" | "Failed";

export interface CaptureOptions {
  ffmpegPath?: string;
  /** ffmpeg `-loglevel`; defaults to `warning`. */
  logLevel?: string;
  runProcess?: ProcessRunner;
  /** Called once a second while ffmpeg runs. */
  onProgress?: (elapsedSeconds: number, totalSeconds: number) => void;
  logger?: RecorderLogger;
}

export interface CaptureResult {
  outputPath: string;
  exitCode: number;
  stdout: string;
  stderr: string;
  elapsedMs: number;
}

/**
 * `K: v\r\n` per header, concatenated, as ffmpeg's `-headers` expects.
 */
export function formatHeaderBlock(headers: Record<string, string>): string {
  return Object.entries(headers)
    .map(([key, value]) => `${key}: ${value}\r\n`)
    .join("");
}

export function buildCaptureArgs(
  stream: StreamReference,
  outputPath: string,
  durationSeconds: number,
  logLevel = "warning",
): string[] {
  const args = [
    "-loglevel",
    logLevel,
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
  ];
  const headerBlock = formatHeaderBlock(stream.headers);
  if (headerBlock !== "") {
    args.push("-headers", headerBlock);
  }
  args.push(
    "-i",
    stream.url,
    "-t",
    String(durationSeconds + CAPTURE_MARGIN_SECONDS),
    "-acodec",
    "copy",
    "-vn",
    outputPath,
  );
  return args;
}

/**
 * One ffmpeg invocation: `NotStarted → Running → Succeeded | Failed`.
 * `run()` may be called once; there is no retry.
 */
export class CaptureSession {
  private currentState: CaptureState = "NotStarted";

  constructor(
    readonly stream: StreamReference,
    readonly outputPath: string,
    readonly durationSeconds: number,
    private readonly options: CaptureOptions = {},
  ) {
    if (!Number.isInteger(durationSeconds) || durationSeconds <= 0) {
      throw new RangeError(
        `Capture duration must be a positive whole number of seconds: ${durationSeconds}`,
      );
    }
  }

  get state(): CaptureState {
    return this.currentState;
  }

  get args(): string[] {
    return buildCaptureArgs(
      this.stream,
      this.outputPath,
      this.durationSeconds,
      this.options.logLevel,
    );
  }

  async run(): Promise<CaptureResult> {
    if (this.currentState !== "NotStarted") {
      throw new Error(`Capture session already ${this.currentState}`);
    }
    this.currentState = "Running";

    const ffmpegPath = this.options.ffmpegPath ?? "ffmpeg";
    const execute = this.options.runProcess ?? runProcess;
    const logger = this.options.logger ?? silentLogger;
    logger.info(
      `Capturing ${this.durationSeconds}s (+${CAPTURE_MARGIN_SECONDS}s) to ${this.outputPath}`,
    );
    const startedAt = Date.now();
    const ticker = this.startTicker(startedAt);

    let result: ProcessResult;
    try {
      result = await execute(ffmpegPath, this.args);
    } catch (error) {
      this.currentState = "Failed";
      throw new CaptureFailedError(
        `Could not start ${ffmpegPath}`,
        { exitCode: null },
        { cause: error },
      );
    } finally {
      if (ticker) {
        clearInterval(ticker);
      }
    }

    if (result.exitCode !== 0) {
      this.currentState = "Failed";
      const reason = result.signal
        ? `terminated by ${result.signal}`
        : `exited with code ${result.exitCode}`;
      throw new CaptureFailedError(`ffmpeg ${reason}`, {
        exitCode: result.exitCode,
        stderr: tail(result.stderr),
      });
    }

    this.currentState = "Succeeded";
    return {
      outputPath: this.outputPath,
      exitCode: result.exitCode,
      stdout: result.stdout,
      stderr: result.stderr,
      elapsedMs: Date.now() - startedAt,
    };
  }

  private startTicker(startedAt: number): NodeJS.Timeout | undefined {
    const onProgress = this.options.onProgress;
    if (!onProgress) {
      return undefined;
    }
    const total = this.durationSeconds;
    onProgress(0, total);
    return setInterval(() => {
      const elapsed = Math.floor((Date.now() - startedAt) / 1000);
      onProgress(Math.min(elapsed, total), total);
    }, 1000);
  }
}

export async function capture(
  stream: StreamReference,
  outputPath: string,
  durationSeconds: number,
  options: CaptureOptions = {},
): Promise<CaptureResult> {
  return new CaptureSession(stream, outputPath, durationSeconds, options).run();
}

function tail(text: string): string {
  return text.trimEnd().split("\n").slice(-STDERR_TAIL_LINES).join("\n");
}
