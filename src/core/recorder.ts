import { mkdir } from "node:fs/promises";
import path from "node:path";
import { authorize } from "./auth.js";
import { capture, type CaptureOptions } from "./capture.js";
import {
  formatError,
  InvalidTimeWindowError,
  oneLine,
  RecorderError,
  StreamResolutionFormatError,
} from "./errors.js";
import { buildOutputFileName } from "./filename.js";
import { formatLogLine } from "./formatter.js";
import type { RequestOptions } from "./http.js";
import { silentLogger, type RecorderLogger } from "./log.js";
import {
  assertTimeWindow,
  buildTimefreeStream,
  resolveLiveStream,
  resolveNhkLiveStream,
  type NhkChannel,
  type StreamReference,
  type TimeWindow,
} from "./playlist.js";
import { Program } from "./program.js";
import { fetchNowPrograms, fetchWeeklyPrograms, findProgram } from "./radiko.js";
import { tagRecording } from "./tagger.js";
import { diffSeconds, formatTimestamp, isCanonicalTimestamp, stepTimestamp } from "./time.js";

/** Upper bound for on-demand episodes whose length is unknown; ffmpeg stops at end of stream. */
export const NHK_ONDEMAND_CEILING_SECONDS = 3 * 60 * 60;

export interface RecordOptions
  extends RequestOptions,
    Pick<CaptureOptions, "ffmpegPath" | "logLevel" | "runProcess" | "onProgress"> {
  outputDir: string;
  logger?: RecorderLogger;
  /** NHK live config area (`tokyo`, `osaka`, ...). */
  nhkArea?: string;
  /** Clock used for live start times. */
  now?: () => Date;
}

export interface RecordResult {
  outputPath: string;
  program: Program;
  /** False when tagging failed; the recording itself is kept. */
  tagged: boolean;
}

/**
 * Records a past broadcast from the timefree playlist.
 */
export async function recordRadikoTimefree(
  station: string,
  window: TimeWindow,
  options: RecordOptions,
): Promise<RecordResult> {
  assertTimeWindow(window);
  const logger = options.logger ?? silentLogger;

  const session = await authorize(options);
  logger.info(`Authorized for area ${session.areaId}`);
  const stream = buildTimefreeStream(station, window, session);

  const program = await lookupProgram(
    async () =>
      findProgram(
        await fetchWeeklyPrograms(station, session.areaId, options),
        station,
        window.ft,
      ),
    () => Program.synthesize("radiko", station, window.ft, window.to, session.areaId),
    `${station} ${window.ft}`,
    logger,
  );
  program.attachStreamUrl(stream.url);

  const seconds = diffSeconds(window.ft, window.to) ?? 0;
  return captureAndTag(program, stream, window.ft, seconds, options);
}

export async function recordRadikoLive(
  station: string,
  minutes: number,
  options: RecordOptions,
): Promise<RecordResult> {
  assertMinutes(minutes);
  const logger = options.logger ?? silentLogger;

  const session = await authorize(options);
  logger.info(`Authorized for area ${session.areaId}`);
  const stream = await resolveLiveStream(station, session, options);

  const startTime = formatTimestamp(options.now?.() ?? new Date());
  const endTime = stepTimestamp(startTime, minutes * 60);
  const program = await lookupProgram(
    async () =>
      findProgram(await fetchNowPrograms(session.areaId, options), station, startTime),
    () => Program.synthesize("radiko", station, startTime, endTime, session.areaId),
    `${station} now`,
    logger,
  );
  program.attachStreamUrl(stream.url);

  return captureAndTag(program, stream, startTime, minutes * 60, options);
}

/**
 * Records an on-demand episode whose stream URL came with its listing.
 */
export async function recordNhkOndemand(
  program: Program,
  options: RecordOptions,
): Promise<RecordResult> {
  const url = program.streamUrl;
  if (!program.isNhk() || !url) {
    throw new StreamResolutionFormatError(
      `No on-demand stream URL for ${program.toString()}`,
    );
  }
  const known = program.getDurationSeconds();
  const seconds = known !== null && known > 0 ? known : NHK_ONDEMAND_CEILING_SECONDS;
  const startTime = isCanonicalTimestamp(program.startTime)
    ? program.startTime
    : formatTimestamp(options.now?.() ?? new Date());

  return captureAndTag(program, { url, headers: {} }, startTime, seconds, options);
}

export async function recordNhkLive(
  channel: NhkChannel,
  minutes: number,
  options: RecordOptions,
): Promise<RecordResult> {
  assertMinutes(minutes);
  const stream = await resolveNhkLiveStream(channel, options.nhkArea, options);

  const startTime = formatTimestamp(options.now?.() ?? new Date());
  const program = Program.synthesize(
    "nhk",
    channel,
    startTime,
    stepTimestamp(startTime, minutes * 60),
  );
  program.attachStreamUrl(stream.url);

  return captureAndTag(program, stream, startTime, minutes * 60, options);
}

/**
 * Newest episode that still has a stream and has not closed.
 */
export function pickLatestEpisode(
  episodes: readonly Program[],
  at: Date = new Date(),
): Program | undefined {
  return episodes
    .filter((episode) => episode.isRecordable() && episode.isAvailable(at))
    .reduce<Program | undefined>(
      (latest, episode) =>
        !latest || episode.startTime > latest.startTime ? episode : latest,
      undefined,
    );
}

async function captureAndTag(
  program: Program,
  stream: StreamReference,
  startTime: string,
  seconds: number,
  options: RecordOptions,
): Promise<RecordResult> {
  const logger = options.logger ?? silentLogger;
  const outputPath = path.join(
    options.outputDir,
    buildOutputFileName(program.station, startTime),
  );
  await mkdir(options.outputDir, { recursive: true });

  logger.info(`Recording ${formatLogLine(program)}`);
  const captured = await capture(stream, outputPath, seconds, {
    ffmpegPath: options.ffmpegPath,
    logLevel: options.logLevel,
    runProcess: options.runProcess,
    onProgress: options.onProgress,
    logger,
  });
  if (captured.stderr.trim() !== "") {
    logger.warn(`ffmpeg: ${oneLine(captured.stderr)}`);
  }

  const outcome = await tagRecording(outputPath, program, {
    ffmpegPath: options.ffmpegPath,
    runProcess: options.runProcess,
    logger,
    timeoutMs: options.timeoutMs,
  });
  if (!outcome.ok) {
    logger.warn(`Recorded without full metadata: ${formatError(outcome.error)}`);
  }
  return { outputPath, program, tagged: outcome.ok };
}

async function lookupProgram(
  lookup: () => Promise<Program | undefined>,
  fallback: () => Program,
  label: string,
  logger: RecorderLogger,
): Promise<Program> {
  try {
    const found = await lookup();
    if (found) {
      return found;
    }
    logger.warn(`No listing entry for ${label}; using minimal metadata`);
  } catch (error) {
    if (!(error instanceof RecorderError)) {
      throw error;
    }
    logger.warn(`Listing lookup failed for ${label}: ${formatError(error)}`);
  }
  return fallback();
}

function assertMinutes(minutes: number): void {
  if (!Number.isInteger(minutes) || minutes <= 0) {
    throw new InvalidTimeWindowError(
      `Live recording length must be a positive number of minutes: ${minutes}`,
    );
  }
}
