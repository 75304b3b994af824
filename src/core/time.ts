import { InvalidTimeWindowError } from "./errors.js";

/**
 * Helpers for the canonical `YYYYMMDDHHMMSS` timestamp used across programs,
 * stream windows and output names. Broadcast times are wall-clock JST values.
 * `parseTimestamp` and `formatTimestamp` convert through the host zone, so
 * `Date` values line up with the listings only on a JST host; stepping and
 * diffing use UTC fields and are zone-independent.
 */
const CANONICAL = /^(\d{4})(\d{2})(\d{2})(\d{2})(\d{2})(\d{2})$/;

export function isCanonicalTimestamp(value: string): boolean {
  const m = CANONICAL.exec(value);
  if (!m) {
    return false;
  }
  const [, y, mo, d, h, mi, s] = m.map(Number);
  const date = new Date(Date.UTC(y, mo - 1, d, h, mi, s));
  return (
    date.getUTCFullYear() === y &&
    date.getUTCMonth() === mo - 1 &&
    date.getUTCDate() === d &&
    h < 24 &&
    mi < 60 &&
    s < 60
  );
}

export function parseTimestamp(ts: string): Date {
  const m = CANONICAL.exec(ts);
  if (!m) {
    throw new InvalidTimeWindowError(`Invalid timestamp: ${ts}`);
  }
  const [, y, mo, d, h, mi, s] = m;
  return new Date(
    Number(y),
    Number(mo) - 1,
    Number(d),
    Number(h),
    Number(mi),
    Number(s),
    0,
  );
}

export function formatTimestamp(date: Date): string {
  const y = date.getFullYear().toString().padStart(4, "0");
  const m = (date.getMonth() + 1).toString().padStart(2, "0");
  const d = date.getDate().toString().padStart(2, "0");
  const h = date.getHours().toString().padStart(2, "0");
  const mi = date.getMinutes().toString().padStart(2, "0");
  const s = date.getSeconds().toString().padStart(2, "0");
  return `${y}${m}${d}${h}${mi}${s}`;
}

export function stepTimestamp(ts: string, seconds: number): string {
  const epoch = toEpochSeconds(ts);
  return fromEpochSeconds(epoch + seconds);
}

/**
 * Seconds between two canonical timestamps (`to - ft`), or null when either
 * side is not canonical.
 */
export function diffSeconds(ft: string, to: string): number | null {
  if (!isCanonicalTimestamp(ft) || !isCanonicalTimestamp(to)) {
    return null;
  }
  return toEpochSeconds(to) - toEpochSeconds(ft);
}

/** `20260125093000` -> `2026-01-25-09_30` */
export function formatFileStamp(ts: string): string {
  return `${ts.slice(0, 4)}-${ts.slice(4, 6)}-${ts.slice(6, 8)}-${ts.slice(8, 10)}_${ts.slice(10, 12)}`;
}

/** `20260125093000` -> `2026-01-25` */
export function formatDisplayDate(ts: string): string {
  if (ts.length < 8) {
    return ts;
  }
  return `${ts.slice(0, 4)}-${ts.slice(4, 6)}-${ts.slice(6, 8)}`;
}

/** `20260125093000` -> `09:30` */
export function formatDisplayTime(ts: string): string {
  if (ts.length < 12) {
    return ts;
  }
  return `${ts.slice(8, 10)}:${ts.slice(10, 12)}`;
}

function toEpochSeconds(ts: string): number {
  const m = CANONICAL.exec(ts);
  if (!m) {
    throw new InvalidTimeWindowError(`Invalid timestamp: ${ts}`);
  }
  const [, y, mo, d, h, mi, s] = m.map(Number);
  return Date.UTC(y, mo - 1, d, h, mi, s) / 1000;
}

function fromEpochSeconds(epoch: number): string {
  const date = new Date(epoch * 1000);
  const y = date.getUTCFullYear().toString().padStart(4, "0");
  const m = (date.getUTCMonth() + 1).toString().padStart(2, "0");
  const d = date.getUTCDate().toString().padStart(2, "0");
  const h = date.getUTCHours().toString().padStart(2, "0");
  const mi = date.getUTCMinutes().toString().padStart(2, "0");
  const s = date.getUTCSeconds().toString().padStart(2, "0");
  return `${y}${m}${d}${h}${mi}${s}`;
}
