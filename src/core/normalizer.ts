import { XMLParser } from "fast-xml-parser";
import { z } from "zod";
import { NormalizationError } from "./errors.js";
import { dig, isRecord } from "./guards.js";
import { Program } from "./program.js";
import {
  normalizeTimestamp,
  type NormalizeTimeOptions,
} from "./time-normalizer.js";
import { isCanonicalTimestamp, stepTimestamp } from "./time.js";

/** Timefree playback stays open for a week after the broadcast ends. */
const TIMEFREE_WINDOW_SECONDS = 7 * 24 * 60 * 60;

// Leaf fields never fail a record: missing or oddly typed values become "".
const text = z
  .union([z.string(), z.number()])
  .transform((value) => String(value).trim())
  .catch("");

const radikoProgSchema = z.object({
  "@_ft": text,
  "@_to": text,
  title: text,
  pfm: text,
  desc: text,
  info: text,
  img: text,
  url: text,
});

const radikoSearchItemSchema = z.object({
  station_id: text,
  title: text,
  start_time: text,
  end_time: text,
  performer: text,
  description: text,
  info: text,
  img: text,
  url: text,
});

const nhkRecordSchema = z.object({
  title: text,
  program_title: text,
  program_sub_title: text,
  onair_date: text,
  closed_at: text,
  stream_url: text,
  radio_broadcast: text,
  corner_name: text,
  series_description: text,
  thumbnail_url: text,
  series_site_id: text,
  corner_site_id: text,
});

type NhkRecord = z.infer<typeof nhkRecordSchema>;

export interface RadikoRecordContext {
  station: string;
  area?: string;
}

export interface NhkRecordOptions extends NormalizeTimeOptions {
  area?: string;
  /** Air date of the enclosing listing, used when a record has none. */
  listingDate?: string;
}

/**
 * The three NHK on-demand endpoints, told apart by shape: a series detail
 * carries `episodes`; new arrivals and by-date listings carry `corners`.
 */
export type NhkPayload =
  | {
      kind: "series";
      series: Record<string, unknown>;
      episodes: Record<string, unknown>[];
    }
  | {
      kind: "corners";
      onairDate: string;
      corners: Record<string, unknown>[];
    };

/**
 * One parsed `<prog>` element (attributes under `@_`).
 */
export function fromRadikoRecord(
  raw: unknown,
  context: RadikoRecordContext,
): Program {
  const parsed = radikoProgSchema.safeParse(raw);
  if (!parsed.success) {
    throw new NormalizationError(
      `radiko program record is not a mapping (station=${context.station})`,
      { cause: parsed.error },
    );
  }
  const prog = parsed.data;
  return new Program({
    source: "radiko",
    title: prog.title,
    station: context.station,
    area: context.area,
    startTime: prog["@_ft"],
    endTime: prog["@_to"],
    performer: prog.pfm || undefined,
    description: prog.desc || undefined,
    info: prog.info || undefined,
    imageUrl: prog.img || undefined,
    url: prog.url || undefined,
    availableUntil: timefreeDeadline(prog["@_to"]),
  });
}

export function fromRadikoSearchRecord(raw: unknown, area?: string): Program {
  const parsed = radikoSearchItemSchema.safeParse(raw);
  if (!parsed.success) {
    throw new NormalizationError("radiko search record is not a mapping", {
      cause: parsed.error,
    });
  }
  const item = parsed.data;
  const endTime = normalizeTimestamp(item.end_time, "radiko");
  return new Program({
    source: "radiko",
    title: item.title,
    station: item.station_id,
    area,
    startTime: normalizeTimestamp(item.start_time, "radiko"),
    endTime,
    performer: item.performer || undefined,
    description: item.description || undefined,
    info: item.info || undefined,
    imageUrl: item.img || undefined,
    url: item.url || undefined,
    availableUntil: timefreeDeadline(endTime),
  });
}

/**
 * An NHK episode merged with its series, or a listing corner on its own.
 */
export function fromNhkRecord(
  raw: unknown,
  parent?: unknown,
  options: NhkRecordOptions = {},
): Program {
  const record = decodeNhkRecord(raw, "episode");
  const series = parent === undefined ? undefined : decodeNhkRecord(parent, "series");

  const seriesTitle = series?.title || record.title;
  const subtitle = record.program_sub_title || undefined;
  const title = uniqueJoin([seriesTitle, record.program_title, subtitle ?? ""]);

  const onairDate =
    record.onair_date || series?.onair_date || options.listingDate || "";
  const startTime = onairDate === "" ? "" : normalizeTimestamp(onairDate, "nhk", options);
  const closedAt = record.closed_at
    ? normalizeTimestamp(record.closed_at, "nhk", options)
    : "";

  return new Program({
    source: "nhk",
    title,
    station: stationFromBroadcast(
      record.radio_broadcast || series?.radio_broadcast || "",
    ),
    area: options.area,
    startTime,
    // No end time is published for on-demand episodes.
    endTime: startTime,
    subtitle,
    description: series?.series_description || record.series_description || undefined,
    info: record.corner_name || series?.corner_name || undefined,
    imageUrl: record.thumbnail_url || series?.thumbnail_url || undefined,
    streamUrl: record.stream_url || undefined,
    availableUntil: isCanonicalTimestamp(closedAt) ? closedAt : undefined,
    seriesSiteId: record.series_site_id || series?.series_site_id || undefined,
    cornerSiteId: record.corner_site_id || series?.corner_site_id || undefined,
    onairDate: onairDate || undefined,
  });
}

export function decodeNhkResponse(raw: unknown): NhkPayload {
  if (!isRecord(raw)) {
    throw new NormalizationError(
      `NHK response must be a mapping, got ${describe(raw)}`,
    );
  }
  if (Array.isArray(raw.episodes)) {
    return {
      kind: "series",
      series: raw,
      episodes: raw.episodes.filter(isRecord),
    };
  }
  const corners = Array.isArray(raw.corners) ? raw.corners.filter(isRecord) : [];
  const onairDate = typeof raw.onair_date === "string" ? raw.onair_date : "";
  return { kind: "corners", onairDate, corners };
}

export function normalizeNhkResponse(
  raw: unknown,
  options: NhkRecordOptions = {},
): Program[] {
  const payload = decodeNhkResponse(raw);
  if (payload.kind === "series") {
    return payload.episodes.map((episode) =>
      fromNhkRecord(episode, payload.series, options),
    );
  }
  const cornerOptions = {
    ...options,
    listingDate: payload.onairDate || options.listingDate,
  };
  return payload.corners.map((corner) =>
    fromNhkRecord(corner, undefined, cornerOptions),
  );
}

/**
 * Schedule XML from the `now`, `date` and `weekly` endpoints.
 */
export function normalizeRadikoSchedule(xml: string, area?: string): Program[] {
  const doc = parseXml(xml, ["station", "progs", "prog"]);
  const root = dig(doc, ["radiko"]);
  if (!isRecord(root)) {
    throw new NormalizationError("schedule XML has no <radiko> root element");
  }
  const stations = asArray(dig(root, ["stations", "station"]));
  const programs: Program[] = [];
  for (const station of stations) {
    if (!isRecord(station) || typeof station["@_id"] !== "string") {
      continue;
    }
    const context = { station: station["@_id"], area };
    for (const progs of asArray(station.progs)) {
      for (const prog of asArray(dig(progs, ["prog"])).filter(isRecord)) {
        programs.push(fromRadikoRecord(prog, context));
      }
    }
  }
  return programs;
}

export function normalizeRadikoSearchResponse(
  raw: unknown,
  area?: string,
): Program[] {
  if (!isRecord(raw)) {
    throw new NormalizationError(
      `radiko search response must be a mapping, got ${describe(raw)}`,
    );
  }
  return asArray(raw.data)
    .filter(isRecord)
    .map((item) => fromRadikoSearchRecord(item, area));
}

/**
 * Parses well-formed XML; tags listed in `arrayTags` always come back as
 * arrays so single-child documents have the same shape as larger ones.
 */
export function parseXml(xml: string, arrayTags: readonly string[] = []): unknown {
  const parser = new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: "@_",
    parseTagValue: false,
    parseAttributeValue: false,
    isArray: (name) => arrayTags.includes(name),
  });
  try {
    const doc: unknown = parser.parse(xml, true);
    return doc;
  } catch (error) {
    throw new NormalizationError("response is not well-formed XML", {
      cause: error,
    });
  }
}

function decodeNhkRecord(raw: unknown, label: string): NhkRecord {
  const parsed = nhkRecordSchema.safeParse(raw);
  if (!parsed.success) {
    throw new NormalizationError(
      `NHK ${label} record must be a mapping, got ${describe(raw)}`,
      { cause: parsed.error },
    );
  }
  return parsed.data;
}

function stationFromBroadcast(broadcast: string): string {
  const first = broadcast.split(",")[0]?.trim().toUpperCase() ?? "";
  switch (first) {
    case "R1":
      return "NHK1";
    case "R2":
      return "NHK2";
    case "FM":
      return "FM";
    default:
      return "NHK";
  }
}

function timefreeDeadline(end: string): string | undefined {
  return isCanonicalTimestamp(end)
    ? stepTimestamp(end, TIMEFREE_WINDOW_SECONDS)
    : undefined;
}

function uniqueJoin(parts: string[]): string {
  const seen: string[] = [];
  for (const part of parts) {
    if (part !== "" && !seen.includes(part)) {
      seen.push(part);
    }
  }
  return seen.join(" ");
}

function asArray(value: unknown): unknown[] {
  if (value === undefined || value === null || value === "") {
    return [];
  }
  return Array.isArray(value) ? value : [value];
}

function describe(value: unknown): string {
  if (Array.isArray(value)) {
    return "an array";
  }
  return value === null ? "null" : typeof value;
}
