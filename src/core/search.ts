import {
  InvalidLinkError,
  ListingHttpError,
  NormalizationError,
  StreamResolutionFormatError,
} from "./errors.js";
import { fetchWithRetry, type RequestOptions } from "./http.js";
import {
  classifyRadikoLink,
  extractDetailFromDetailUrl,
  extractSearchKeyword,
  pickLatestDetail,
  type DetailRef,
} from "./link.js";
import { normalizeRadikoSearchResponse } from "./normalizer.js";
import { DEFAULT_AREA_ID, type Program } from "./program.js";
import { isCanonicalTimestamp } from "./time.js";

export const SEARCH_API_URL = "https://radiko.jp/v3/api/program/search";

export type SearchTimeFilter = "past" | "today" | "future";

export interface SearchOptions extends RequestOptions {
  area?: string;
  timeFilter?: SearchTimeFilter;
}

export function buildSearchUrl(keyword: string, options: SearchOptions = {}): string {
  const url = new URL(SEARCH_API_URL);
  url.searchParams.set("keyword", keyword);
  url.searchParams.set("time_filter", options.timeFilter ?? "past");
  url.searchParams.set("area_id", options.area ?? DEFAULT_AREA_ID);
  return url.toString();
}

export async function searchRadikoPrograms(
  keyword: string,
  options: SearchOptions = {},
): Promise<Program[]> {
  let resp: Response;
  try {
    resp = await fetchWithRetry(buildSearchUrl(keyword, options), undefined, options);
  } catch (error) {
    throw new ListingHttpError(`search request failed for "${keyword}"`, undefined, {
      cause: error,
    });
  }
  if (!resp.ok) {
    throw new ListingHttpError(
      `search failed for "${keyword}": ${resp.status}`,
      resp.status,
    );
  }
  let body: unknown;
  try {
    body = await resp.json();
  } catch (error) {
    throw new NormalizationError("search response is not valid JSON", {
      cause: error,
    });
  }
  return normalizeRadikoSearchResponse(body, options.area);
}

/**
 * Detail links resolve directly; search links resolve to the latest past
 * broadcast among the search results.
 */
export async function resolveRadikoLink(
  url: string,
  options: SearchOptions = {},
  now: Date = new Date(),
): Promise<DetailRef> {
  const kind = classifyRadikoLink(url);
  if (kind === "detail") {
    return extractDetailFromDetailUrl(url);
  }
  if (kind !== "search") {
    throw new InvalidLinkError(`Unsupported link: ${url}`);
  }

  const keyword = extractSearchKeyword(url);
  if (!keyword) {
    throw new InvalidLinkError(`Search link has no keyword: ${url}`);
  }
  const programs = await searchRadikoPrograms(keyword, options);
  const refs = programs
    .filter((program) => isCanonicalTimestamp(program.startTime))
    .map((program) => ({ station: program.station, ft: program.startTime }));
  if (refs.length === 0) {
    throw new StreamResolutionFormatError(
      `No programs found for search link: ${url}`,
    );
  }
  return pickLatestDetail(refs, now);
}
