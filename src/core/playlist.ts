import { XMLParser } from "fast-xml-parser";
import type { AuthSession } from "./auth.js";
import {
  InvalidTimeWindowError,
  StreamResolutionFormatError,
  StreamResolutionHttpError,
} from "./errors.js";
import { dig, isRecord } from "./guards.js";
import { fetchWithRetry, type RequestOptions } from "./http.js";
import { diffSeconds, isCanonicalTimestamp } from "./time.js";

export type StreamMode = "live" | "timefree";

export interface TimeWindow {
  ft: string;
  to: string;
}

/** Resolved URL plus whatever headers dereferencing it needs. */
export interface StreamReference {
  url: string;
  headers: Record<string, string>;
}

/**
 * Line markers taken to identify a sub-playlist. This is a heuristic against
 * the live master playlist, not a documented contract.
 */
export const SUB_PLAYLIST_MARKERS: readonly string[] = ["chunklist", ".m3u8"];

export const TIMEFREE_PLAYLIST_URL = "https://radiko.jp/v2/api/ts/playlist.m3u8";
export const NHK_CONFIG_URL = "https://www.nhk.or.jp/radio/config/config_web.xml";

export type NhkChannel = "NHK1" | "NHK2" | "FM";

const NHK_CHANNEL_TAGS: Record<NhkChannel, string> = {
  NHK1: "r1hls",
  NHK2: "r2hls",
  FM: "fmhls",
};

export function livePlaylistUrl(station: string): string {
  return `https://f-radiko.smartstream.ne.jp/${encodeURIComponent(station)}/_definst_/simul-stream.stream/playlist.m3u8`;
}

export function authHeaders(session: AuthSession): Record<string, string> {
  return { "X-Radiko-AuthToken": session.token };
}

/**
 * First non-comment line carrying a sub-playlist marker, made absolute
 * against the directory of `playlistUrl`. Null when there is none.
 */
export function pickSubPlaylist(body: string, playlistUrl: string): string | null {
  const line = allDataLines(body).find((candidate) =>
    SUB_PLAYLIST_MARKERS.some((marker) => candidate.includes(marker)),
  );
  if (!line) {
    return null;
  }
  if (/^https?:\/\//i.test(line)) {
    return line;
  }
  const baseDir = playlistUrl.split("/").slice(0, -1).join("/");
  return `${baseDir}/${line}`;
}

export async function resolveLiveStream(
  station: string,
  session: AuthSession,
  options: RequestOptions = {},
): Promise<StreamReference> {
  const playlistUrl = livePlaylistUrl(station);
  const headers = authHeaders(session);
  let resp: Response;
  try {
    resp = await fetchWithRetry(playlistUrl, { headers }, options);
  } catch (error) {
    throw new StreamResolutionHttpError(
      `live playlist request failed for ${station}`,
      undefined,
      { cause: error },
    );
  }
  if (!resp.ok) {
    throw new StreamResolutionHttpError(
      `live playlist failed for ${station}: ${resp.status}`,
      resp.status,
    );
  }
  const body = await resp.text();
  const url = pickSubPlaylist(body, playlistUrl);
  if (!url) {
    throw new StreamResolutionFormatError(
      `live playlist for ${station} has no sub-playlist line`,
    );
  }
  return { url, headers };
}

export function assertTimeWindow(window: TimeWindow): void {
  if (!isCanonicalTimestamp(window.ft) || !isCanonicalTimestamp(window.to)) {
    throw new InvalidTimeWindowError(
      `Window must be YYYYMMDDHHMMSS: ft=${window.ft} to=${window.to}`,
    );
  }
  const seconds = diffSeconds(window.ft, window.to);
  if (seconds === null || seconds <= 0) {
    throw new InvalidTimeWindowError(
      `Window end must be after its start: ft=${window.ft} to=${window.to}`,
    );
  }
}

/**
 * Timefree playlist URL. It is playable as-is with the token header, so
 * nothing is fetched here.
 */
export function buildTimefreeStream(
  station: string,
  window: TimeWindow,
  session: AuthSession,
): StreamReference {
  assertTimeWindow(window);
  const url = new URL(TIMEFREE_PLAYLIST_URL);
  url.searchParams.set("station_id", station);
  url.searchParams.set("l", "15");
  url.searchParams.set("ft", window.ft);
  url.searchParams.set("to", window.to);
  return { url: url.toString(), headers: authHeaders(session) };
}

export async function resolveStream(
  station: string,
  mode: StreamMode,
  session: AuthSession,
  window?: TimeWindow,
  options: RequestOptions = {},
): Promise<StreamReference> {
  if (mode === "live") {
    return resolveLiveStream(station, session, options);
  }
  if (!window) {
    throw new InvalidTimeWindowError("Timefree playback needs a time window");
  }
  return buildTimefreeStream(station, window, session);
}

/**
 * Live HLS URL of an NHK channel for one area, from the player config XML.
 * No authentication is involved.
 */
export async function resolveNhkLiveStream(
  channel: NhkChannel,
  area = "tokyo",
  options: RequestOptions = {},
): Promise<StreamReference> {
  let resp: Response;
  try {
    resp = await fetchWithRetry(NHK_CONFIG_URL, undefined, options);
  } catch (error) {
    throw new StreamResolutionHttpError("NHK config request failed", undefined, {
      cause: error,
    });
  }
  if (!resp.ok) {
    throw new StreamResolutionHttpError(
      `NHK config failed: ${resp.status}`,
      resp.status,
    );
  }
  const url = pickNhkStreamUrl(await resp.text(), channel, area);
  if (!url) {
    throw new StreamResolutionFormatError(
      `NHK config has no ${channel} stream for area ${area}`,
    );
  }
  return { url, headers: {} };
}

export function pickNhkStreamUrl(
  xml: string,
  channel: NhkChannel,
  area: string,
): string | null {
  const parser = new XMLParser({
    parseTagValue: false,
    isArray: (name) => name === "data",
  });
  let doc: unknown;
  try {
    doc = parser.parse(xml, true);
  } catch (error) {
    throw new StreamResolutionFormatError("NHK config is not valid XML", {
      cause: error,
    });
  }
  const blocks = dig(doc, ["radiru_config", "stream_url", "data"]);
  if (!Array.isArray(blocks)) {
    return null;
  }
  const tag = NHK_CHANNEL_TAGS[channel];
  for (const block of blocks) {
    if (!isRecord(block) || block.area !== area) {
      continue;
    }
    const url = block[tag];
    return typeof url === "string" && url !== "" ? url : null;
  }
  return null;
}

function allDataLines(m3u8: string): string[] {
  return m3u8
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line !== "" && !line.startsWith("#"));
}
