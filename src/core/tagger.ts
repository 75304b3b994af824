import { rename, rm, writeFile } from "node:fs/promises";
import path from "node:path";
import { TaggingFailedError } from "./errors.js";
import { fetchWithRetry, type RequestOptions } from "./http.js";
import { silentLogger, type RecorderLogger } from "./log.js";
import { runProcess, type ProcessRunner } from "./process.js";
import type { Program } from "./program.js";
import { formatDisplayDate, isCanonicalTimestamp } from "./time.js";

export const GENRE = "Radio";

export interface TagOptions extends RequestOptions {
  ffmpegPath?: string;
  runProcess?: ProcessRunner;
  logger?: RecorderLogger;
  trackNumber?: number;
}

export type TagOutcome =
  | { ok: true; coverArt: boolean }
  | { ok: false; error: TaggingFailedError };

/** Description and info joined with ` / `, absent parts skipped. */
export function metadataComment(description?: string, info?: string): string {
  return [description, info]
    .filter((part): part is string => !!part && part.trim() !== "")
    .join(" / ");
}

/**
 * Container tags for `program`, in the order they are written. Empty values
 * are left out.
 */
export function buildTagMetadata(
  program: Program,
  trackNumber?: number,
): Array<[string, string]> {
  const entries: Array<[string, string]> = [
    ["title", program.title],
    ["album", program.station],
    ["artist", program.performer ?? ""],
    ["album_artist", program.performer ?? ""],
    ["comment", metadataComment(program.description, program.info)],
    ["genre", GENRE],
    ["track", trackNumber === undefined ? "" : String(trackNumber)],
    ["disc", "1/1"],
    [
      "date",
      isCanonicalTimestamp(program.startTime)
        ? formatDisplayDate(program.startTime)
        : "",
    ],
  ];
  return entries.filter(([, value]) => value !== "");
}

export function buildTagArgs(
  inputPath: string,
  outputPath: string,
  metadata: ReadonlyArray<[string, string]>,
  coverPath?: string,
): string[] {
  const args = ["-loglevel", "error", "-y", "-i", inputPath];
  if (coverPath) {
    args.push(
      "-i",
      coverPath,
      "-map",
      "0:a",
      "-map",
      "1:0",
      "-disposition:v:0",
      "attached_pic",
    );
  }
  for (const [key, value] of metadata) {
    args.push("-metadata", `${key}=${value}`);
  }
  args.push("-codec", "copy", outputPath);
  return args;
}

/**
 * Writes tags (and cover art, when it can be fetched) by remuxing into a
 * sibling temp file and renaming it over the recording. Never throws: a
 * failure leaves the recording as it was and is reported in the outcome.
 */
export async function tagRecording(
  filePath: string,
  program: Program,
  options: TagOptions = {},
): Promise<TagOutcome> {
  const logger = options.logger ?? silentLogger;
  const parsed = path.parse(filePath);
  const tempPath = path.join(parsed.dir, `${parsed.name}.tagging${parsed.ext}`);
  let coverPath: string | undefined;

  try {
    coverPath = await downloadCover(program, parsed, options, logger);
    const execute = options.runProcess ?? runProcess;
    const ffmpegPath = options.ffmpegPath ?? "ffmpeg";
    const args = buildTagArgs(
      filePath,
      tempPath,
      buildTagMetadata(program, options.trackNumber),
      coverPath,
    );

    const result = await execute(ffmpegPath, args);
    if (result.exitCode !== 0) {
      await rm(tempPath, { force: true });
      const detail = result.stderr.trim().split("\n").pop() ?? "";
      return {
        ok: false,
        error: new TaggingFailedError(
          `ffmpeg exited with code ${result.exitCode} while tagging ${filePath}${detail ? `: ${detail}` : ""}`,
        ),
      };
    }
    await rename(tempPath, filePath);
    return { ok: true, coverArt: coverPath !== undefined };
  } catch (error) {
    await removeQuietly(tempPath, logger);
    return {
      ok: false,
      error: new TaggingFailedError(`Tagging failed for ${filePath}`, {
        cause: error,
      }),
    };
  } finally {
    if (coverPath) {
      await removeQuietly(coverPath, logger);
    }
  }
}

async function downloadCover(
  program: Program,
  target: path.ParsedPath,
  options: RequestOptions,
  logger: RecorderLogger,
): Promise<string | undefined> {
  if (!program.imageUrl) {
    return undefined;
  }
  try {
    const resp = await fetchWithRetry(program.imageUrl, undefined, options);
    if (!resp.ok) {
      logger.warn(`Cover art skipped (${resp.status}): ${program.imageUrl}`);
      return undefined;
    }
    const ext = coverExtension(resp.headers.get("content-type"), program.imageUrl);
    const coverPath = path.join(target.dir, `${target.name}.cover${ext}`);
    await writeFile(coverPath, Buffer.from(await resp.arrayBuffer()));
    return coverPath;
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    logger.warn(`Cover art skipped: ${program.imageUrl} (${reason})`);
    return undefined;
  }
}

async function removeQuietly(
  filePath: string,
  logger: RecorderLogger,
): Promise<void> {
  try {
    await rm(filePath, { force: true });
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    logger.warn(`Could not remove ${filePath}: ${reason}`);
  }
}

function coverExtension(contentType: string | null, url: string): string {
  if (contentType?.includes("png")) {
    return ".png";
  }
  if (contentType?.includes("jpeg") || contentType?.includes("jpg")) {
    return ".jpg";
  }
  return /\.png(?:$|\?)/i.test(url) ? ".png" : ".jpg";
}
