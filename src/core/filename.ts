import { InvalidTimeWindowError } from "./errors.js";
import { formatFileStamp, isCanonicalTimestamp } from "./time.js";

/**
 * `<station>_<YYYY-MM-DD-HH_MM><ext>`, e.g. `TBS_2026-01-25-09_30.mp4`.
 */
export function buildOutputFileName(
  station: string,
  startTime: string,
  ext = ".mp4",
): string {
  if (!isCanonicalTimestamp(startTime)) {
    throw new InvalidTimeWindowError(
      `Output name needs a canonical start time: ${startTime}`,
    );
  }
  const prefix = sanitizeFileNamePart(station, "station");
  return `${prefix}_${formatFileStamp(startTime)}${ext}`;
}

export function sanitizeFileNamePart(value: string, fallback = "program"): string {
  const sanitized = value
    .replace(/[\\/:*?"<>|]/g, "_")
    .replace(/_+/g, "_")
    .replace(/\s+/g, " ")
    .trim();
  return sanitized === "" ? fallback : sanitized;
}
