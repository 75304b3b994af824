import { InvalidLinkError, StreamResolutionFormatError } from "./errors.js";
import { formatTimestamp } from "./time.js";

const SEARCH_MARKER = "#!/search/";
const DETAIL_PREFIX = "#!/ts/";
const LIVE_PREFIX = "#!/live/";

/**
 * Routing for radiko web player hash URLs given as jobs.
 */
export type RadikoLinkKind = "search" | "detail" | "live" | "unsupported";

export interface DetailRef {
  station: string;
  ft: string;
}

export function classifyRadikoLink(url: string): RadikoLinkKind {
  if (url.includes(SEARCH_MARKER)) {
    return "search";
  }
  if (url.includes(DETAIL_PREFIX)) {
    return "detail";
  }
  if (url.includes(LIVE_PREFIX)) {
    return "live";
  }
  return "unsupported";
}

export function buildDetailUrl(ref: DetailRef): string {
  return `https://radiko.jp/#!/ts/${ref.station}/${ref.ft}`;
}

export function extractDetailFromDetailUrl(url: string): DetailRef {
  const segments = hashSegments(url);
  if (segments.length < 3 || segments[0] !== "ts") {
    throw new InvalidLinkError(`Invalid detail URL: ${url}`);
  }

  const station = segments[1] ?? "";
  const ft = segments[2] ?? "";
  if (!/^\d{14}$/.test(ft)) {
    throw new InvalidLinkError(`Invalid ft timestamp in detail URL: ${url}`);
  }

  return { station, ft };
}

export function extractStationFromLiveUrl(url: string): string {
  const segments = hashSegments(url);
  const station = segments[1];
  if (segments[0] !== "live" || !station) {
    throw new InvalidLinkError(`Invalid live URL: ${url}`);
  }
  return station;
}

/** The `key` query of a search page hash, or null. */
export function extractSearchKeyword(url: string): string | null {
  let hash: string;
  try {
    hash = new URL(url).hash;
  } catch {
    return null;
  }
  const queryIndex = hash.indexOf("?");
  if (queryIndex < 0) {
    return null;
  }
  const key = new URLSearchParams(hash.slice(queryIndex + 1)).get("key");
  return key && key.length > 0 ? key : null;
}

/**
 * Most recent entry that has already started.
 */
export function pickLatestDetail(
  refs: readonly DetailRef[],
  now: Date = new Date(),
): DetailRef {
  const nowTs = formatTimestamp(now);
  const [latest] = refs
    .filter((ref) => ref.ft <= nowTs)
    .sort((a, b) => b.ft.localeCompare(a.ft));

  if (!latest) {
    throw new StreamResolutionFormatError(
      "No usable detail found in search results.",
    );
  }
  return latest;
}

function hashSegments(url: string): string[] {
  let normalized: URL;
  try {
    normalized = new URL(url);
  } catch (error) {
    throw new InvalidLinkError(`Not a URL: ${url}`, { cause: error });
  }
  const hash = normalized.hash.startsWith("#!")
    ? normalized.hash.slice(2)
    : normalized.hash.slice(1);
  return hash.split("?")[0]?.split("/").filter(Boolean) ?? [];
}
