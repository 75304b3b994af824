#!/usr/bin/env node
import path from "node:path";
import { parseCliArgs, USAGE } from "./cli/args.js";
import { describeJob, loadConfig, type Job, type RecorderConfig } from "./cli/config.js";
import { findPrograms, type FindQuery } from "./cli/find.js";
import { Logger } from "./cli/logger.js";
import { CaptureProgress } from "./cli/progress.js";
import { formatError } from "./core/errors.js";
import { formatProgramList } from "./core/formatter.js";
import { classifyRadikoLink, extractStationFromLiveUrl } from "./core/link.js";
import { getSeries } from "./core/nhk.js";
import { resolveProgramWindow } from "./core/radiko.js";
import {
  pickLatestEpisode,
  recordNhkLive,
  recordNhkOndemand,
  recordRadikoLive,
  recordRadikoTimefree,
  type RecordOptions,
  type RecordResult,
} from "./core/recorder.js";
import { resolveRadikoLink } from "./core/search.js";

async function main(): Promise<void> {
  const logger = new Logger();
  const command = parseCliArgs(process.argv.slice(2));
  switch (command.command) {
    case "help":
      logger.plain(USAGE);
      return;
    case "find":
      await runFind(command.query, logger);
      return;
    case "record":
      await runJobs(path.resolve(command.configPath), logger);
      return;
  }
}

async function runJobs(configPath: string, logger: Logger): Promise<void> {
  const config = await loadConfig(configPath);
  const baseOptions = recordOptions(config, logger);

  const failures: Array<{ job: string; error: string }> = [];
  let successCount = 0;
  for (const job of config.jobs) {
    const label = describeJob(job);
    const progress = new CaptureProgress(progressLabel(job));
    try {
      logger.info(`Job: ${label}`);
      const result = await runJob(job, {
        ...baseOptions,
        onProgress: (elapsed, total) => progress.update(elapsed, total),
      });
      progress.stop();
      logger.success(`Saved: ${result.outputPath}`);
      if (!result.tagged) {
        logger.warn(`Metadata incomplete: ${result.outputPath}`);
      }
      successCount += 1;
    } catch (error) {
      progress.stop();
      const message = formatError(error);
      failures.push({ job: label, error: message });
      logger.failure(`${label} -> ${message}`);
    }
  }

  logger.info(`Completed. success=${successCount} failed=${failures.length}`);
  if (failures.length > 0) {
    failures.forEach((item) => {
      logger.warn(`Failure detail: ${item.job} :: ${item.error}`);
    });
    process.exitCode = 2;
  }
}

async function runJob(job: Job, options: RecordOptions): Promise<RecordResult> {
  switch (job.kind) {
    case "radiko-timefree":
      return recordRadikoTimefree(job.station, { ft: job.ft, to: job.to }, options);
    case "radiko-live":
      return recordRadikoLive(job.station, job.minutes, options);
    case "radiko-link": {
      if (classifyRadikoLink(job.link) === "live") {
        if (job.minutes === undefined) {
          throw new Error(`Live link needs minutes: ${job.link}`);
        }
        return recordRadikoLive(extractStationFromLiveUrl(job.link), job.minutes, options);
      }
      const ref = await resolveRadikoLink(job.link, options);
      options.logger?.info(`Resolved: ${ref.station} ${ref.ft}`);
      const window = await resolveProgramWindow(ref.station, ref.ft, options);
      return recordRadikoTimefree(ref.station, window, options);
    }
    case "nhk-live":
      return recordNhkLive(job.channel, job.minutes, options);
    case "nhk-series": {
      const episode = pickLatestEpisode(await getSeries(job.series, job.corner, options));
      if (!episode) {
        throw new Error(`No recordable episode for series ${job.series}-${job.corner}`);
      }
      return recordNhkOndemand(episode, options);
    }
  }
}

function progressLabel(job: Job): string {
  switch (job.kind) {
    case "radiko-timefree":
    case "radiko-live":
      return job.station;
    case "nhk-live":
      return job.channel;
    case "nhk-series":
      return job.series;
    case "radiko-link":
      return "radiko";
  }
}

async function runFind(query: FindQuery, logger: Logger): Promise<void> {
  logger.info(
    `Searching ${query.service} programs area=${query.area}` +
      (query.station ? ` station=${query.station}` : "") +
      (query.keyword ? ` keyword=${query.keyword}` : ""),
  );
  const programs = await findPrograms(query, { logger });
  if (programs.length === 0) {
    logger.info("No programs found.");
    return;
  }
  logger.info(`Programs found: ${programs.length}`);
  logger.plain(formatProgramList(programs));
}

function recordOptions(config: RecorderConfig, logger: Logger): RecordOptions {
  return {
    outputDir: path.resolve(config.outputDir),
    logger,
    nhkArea: config.nhkArea,
    ffmpegPath: config.ffmpegPath,
    logLevel: config.logLevel,
    retry: config.retry,
    timeoutMs: config.timeoutMs,
  };
}

main().catch((err) => {
  const logger = new Logger();
  logger.error(formatError(err));
  process.exitCode = 1;
});
