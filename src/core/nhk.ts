import { ListingHttpError, NormalizationError } from "./errors.js";
import { fetchWithRetry, type RequestOptions } from "./http.js";
import { normalizeNhkResponse, type NhkRecordOptions } from "./normalizer.js";
import type { Program } from "./program.js";

export const NHK_ONDEMAND_BASE_URL = "https://www.nhk.or.jp/radioondemand/json";

export interface NhkListingOptions extends RequestOptions, NhkRecordOptions {}

export function newArrivalsUrl(): string {
  return `${NHK_ONDEMAND_BASE_URL}/new_arrivals.json`;
}

export function cornersByDateUrl(onairDate: string): string {
  return `${NHK_ONDEMAND_BASE_URL}/corners-${onairDate}.json`;
}

/** Corner ids are two digits in the URL (`1` → `01`). */
export function seriesUrl(siteId: string, cornerSiteId: string): string {
  const corner = /^\d$/.test(cornerSiteId) ? `0${cornerSiteId}` : cornerSiteId;
  return `${NHK_ONDEMAND_BASE_URL}/${encodeURIComponent(siteId)}-${encodeURIComponent(corner)}.json`;
}

export async function getNewArrivals(
  options: NhkListingOptions = {},
): Promise<Program[]> {
  return normalizeNhkResponse(
    await fetchJson(newArrivalsUrl(), "new arrivals", options),
    options,
  );
}

/** `onairDate` as `YYYYMMDD`. */
export async function getCornersByDate(
  onairDate: string,
  options: NhkListingOptions = {},
): Promise<Program[]> {
  return normalizeNhkResponse(
    await fetchJson(cornersByDateUrl(onairDate), `corners ${onairDate}`, options),
    options,
  );
}

/** Every episode of a series, each carrying its on-demand stream URL. */
export async function getSeries(
  siteId: string,
  cornerSiteId: string,
  options: NhkListingOptions = {},
): Promise<Program[]> {
  return normalizeNhkResponse(
    await fetchJson(
      seriesUrl(siteId, cornerSiteId),
      `series ${siteId}-${cornerSiteId}`,
      options,
    ),
    options,
  );
}

async function fetchJson(
  url: string,
  label: string,
  options: RequestOptions,
): Promise<unknown> {
  let resp: Response;
  try {
    resp = await fetchWithRetry(url, undefined, options);
  } catch (error) {
    throw new ListingHttpError(`NHK ${label} request failed`, undefined, {
      cause: error,
    });
  }
  if (!resp.ok) {
    throw new ListingHttpError(`NHK ${label} failed: ${resp.status}`, resp.status);
  }
  try {
    const body: unknown = await resp.json();
    return body;
  } catch (error) {
    throw new NormalizationError(`NHK ${label} is not valid JSON`, {
      cause: error,
    });
  }
}
