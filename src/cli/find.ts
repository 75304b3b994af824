import { formatError, RecorderError } from "../core/errors.js";
import type { RequestOptions } from "../core/http.js";
import { silentLogger, type RecorderLogger } from "../core/log.js";
import { getNewArrivals, getSeries } from "../core/nhk.js";
import type { Program } from "../core/program.js";
import { fetchAreaPrograms } from "../core/radiko.js";
import { pickLatestEpisode } from "../core/recorder.js";

export interface FindQuery {
  service: "radiko" | "nhk";
  area: string;
  station?: string;
  keyword?: string;
}

export interface FindOptions extends RequestOptions {
  logger?: RecorderLogger;
}

/** Case-insensitive; titles only. */
export function compileKeyword(keyword: string): RegExp {
  try {
    return new RegExp(keyword, "iu");
  } catch (error) {
    throw new Error(`Invalid keyword pattern: ${keyword}`, { cause: error });
  }
}

export function filterByKeyword(
  programs: readonly Program[],
  pattern: RegExp | undefined,
): Program[] {
  if (!pattern) {
    return [...programs];
  }
  return programs.filter((program) => pattern.test(program.title));
}

/**
 * radiko: today's listing for one station or the whole area. nhk: new
 * on-demand arrivals; keyword matches are replaced by their latest episode.
 */
export async function findPrograms(
  query: FindQuery,
  options: FindOptions = {},
): Promise<Program[]> {
  const pattern = query.keyword ? compileKeyword(query.keyword) : undefined;
  if (query.service === "radiko") {
    const programs = await fetchAreaPrograms(query.area, query.station, options);
    return filterByKeyword(programs, pattern);
  }

  const arrivals = (await getNewArrivals({ ...options, area: query.area })).filter(
    (program) => !query.station || program.station === query.station,
  );
  const matches = filterByKeyword(arrivals, pattern);
  if (!pattern) {
    return matches;
  }
  const enriched: Program[] = [];
  for (const corner of matches) {
    enriched.push(await latestEpisodeOf(corner, query.area, options));
  }
  return enriched;
}

async function latestEpisodeOf(
  corner: Program,
  area: string,
  options: FindOptions,
): Promise<Program> {
  if (!corner.seriesSiteId || !corner.cornerSiteId) {
    return corner;
  }
  const logger = options.logger ?? silentLogger;
  try {
    const episodes = await getSeries(corner.seriesSiteId, corner.cornerSiteId, {
      ...options,
      area,
    });
    return pickLatestEpisode(episodes) ?? corner;
  } catch (error) {
    if (!(error instanceof RecorderError)) {
      throw error;
    }
    logger.warn(`Episode details unavailable for ${corner.title}: ${formatError(error)}`);
    return corner;
  }
}
