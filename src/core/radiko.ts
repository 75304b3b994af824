import { ListingHttpError, StreamResolutionFormatError } from "./errors.js";
import { dig, isRecord } from "./guards.js";
import { fetchWithRetry, type RequestOptions } from "./http.js";
import { silentLogger, type RecorderLogger } from "./log.js";
import { normalizeRadikoSchedule, parseXml } from "./normalizer.js";
import type { TimeWindow } from "./playlist.js";
import { DEFAULT_AREA_ID, type Program } from "./program.js";
import { formatTimestamp, isCanonicalTimestamp } from "./time.js";

const RADIKO_V3 = "https://radiko.jp/v3";

export interface Station {
  id: string;
  name: string;
}

export interface ProgramListOptions extends RequestOptions {
  logger?: RecorderLogger;
  /** `YYYYMMDD`; defaults to today. */
  date?: string;
}

export function stationListUrl(area: string): string {
  return `${RADIKO_V3}/station/list/${encodeURIComponent(area)}.xml`;
}

export function nowProgramsUrl(area: string): string {
  return `${RADIKO_V3}/program/now/${encodeURIComponent(area)}.xml`;
}

export function dateProgramsUrl(station: string, date: string): string {
  return `${RADIKO_V3}/program/station/date/${date}/${encodeURIComponent(station)}.xml`;
}

export function weeklyProgramsUrl(station: string): string {
  return `${RADIKO_V3}/program/station/weekly/${encodeURIComponent(station)}.xml`;
}

export async function fetchStationList(
  area: string = DEFAULT_AREA_ID,
  options: RequestOptions = {},
): Promise<Station[]> {
  const xml = await fetchListing(stationListUrl(area), `station list ${area}`, options);
  const doc = parseXml(xml, ["station"]);
  const stations: Station[] = [];
  const entries = dig(doc, ["stations", "station"]);
  if (!Array.isArray(entries)) {
    return stations;
  }
  for (const entry of entries) {
    if (!isRecord(entry) || typeof entry.id !== "string" || entry.id === "") {
      continue;
    }
    stations.push({
      id: entry.id,
      name: typeof entry.name === "string" ? entry.name : entry.id,
    });
  }
  return stations;
}

export async function isStationAvailable(
  station: string,
  area: string = DEFAULT_AREA_ID,
  options: RequestOptions = {},
): Promise<boolean> {
  const stations = await fetchStationList(area, options);
  return stations.some((entry) => entry.id === station);
}

/** What is on air right now across every station of `area`. */
export async function fetchNowPrograms(
  area: string = DEFAULT_AREA_ID,
  options: RequestOptions = {},
): Promise<Program[]> {
  const xml = await fetchListing(nowProgramsUrl(area), `now programs ${area}`, options);
  return normalizeRadikoSchedule(xml, area);
}

export async function fetchProgramsByDate(
  station: string,
  date: string,
  area?: string,
  options: RequestOptions = {},
): Promise<Program[]> {
  const xml = await fetchListing(
    dateProgramsUrl(station, date),
    `programs ${station} ${date}`,
    options,
  );
  return normalizeRadikoSchedule(xml, area);
}

export async function fetchWeeklyPrograms(
  station: string,
  area?: string,
  options: RequestOptions = {},
): Promise<Program[]> {
  const xml = await fetchListing(
    weeklyProgramsUrl(station),
    `weekly programs ${station}`,
    options,
  );
  return normalizeRadikoSchedule(xml, area);
}

/**
 * The program of `station` starting at `ft`; failing an exact start match,
 * the one whose window contains `ft`.
 */
export function findProgram(
  programs: readonly Program[],
  station: string,
  ft: string,
): Program | undefined {
  const candidates = programs.filter((program) => program.station === station);
  const exact = candidates.find((program) => program.startTime === ft);
  if (exact) {
    return exact;
  }
  if (!isCanonicalTimestamp(ft)) {
    return undefined;
  }
  return candidates.find(
    (program) =>
      isCanonicalTimestamp(program.startTime) &&
      isCanonicalTimestamp(program.endTime) &&
      program.startTime <= ft &&
      ft < program.endTime,
  );
}

/**
 * Full window of the broadcast that starts at (or spans) `ft`, looked up in
 * the station's weekly listing.
 */
export async function resolveProgramWindow(
  station: string,
  ft: string,
  options: RequestOptions = {},
): Promise<TimeWindow> {
  const programs = await fetchWeeklyPrograms(station, undefined, options);
  const program = findProgram(programs, station, ft);
  if (!program || !isCanonicalTimestamp(program.endTime)) {
    throw new StreamResolutionFormatError(
      `Cannot find program range for station=${station} ft=${ft}`,
    );
  }
  return { ft: program.startTime, to: program.endTime };
}

/**
 * Day listing for one station, or for every station in the area when none is
 * given. A station whose listing fails is logged and skipped.
 */
export async function fetchAreaPrograms(
  area: string = DEFAULT_AREA_ID,
  station?: string,
  options: ProgramListOptions = {},
): Promise<Program[]> {
  const date = options.date ?? formatTimestamp(new Date()).slice(0, 8);
  if (station) {
    return fetchProgramsByDate(station, date, area, options);
  }

  const logger = options.logger ?? silentLogger;
  const programs: Program[] = [];
  for (const entry of await fetchStationList(area, options)) {
    try {
      programs.push(...(await fetchProgramsByDate(entry.id, date, area, options)));
    } catch (error) {
      if (!(error instanceof ListingHttpError)) {
        throw error;
      }
      logger.warn(`Skipping ${entry.id}: ${error.message}`);
    }
  }
  return programs;
}

async function fetchListing(
  url: string,
  label: string,
  options: RequestOptions,
): Promise<string> {
  let resp: Response;
  try {
    resp = await fetchWithRetry(url, undefined, options);
  } catch (error) {
    throw new ListingHttpError(`${label} request failed`, undefined, {
      cause: error,
    });
  }
  if (!resp.ok) {
    throw new ListingHttpError(`${label} failed: ${resp.status}`, resp.status);
  }
  return resp.text();
}
