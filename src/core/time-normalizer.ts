import type { ProgramSource } from "./program.js";

export interface NormalizeTimeOptions {
  /** Year used when the text carries none. Defaults to the current year. */
  referenceYear?: number;
}

interface Parts {
  year?: number;
  month: number;
  day: number;
  hour?: number;
  minute?: number;
  second?: number;
  meridiem?: string;
}

interface TimeFormat {
  name: string;
  services: readonly ProgramSource[];
  pattern: RegExp;
  parts: (match: RegExpExecArray) => Parts;
}

const BOTH: readonly ProgramSource[] = ["radiko", "nhk"];
const NHK_ONLY: readonly ProgramSource[] = ["nhk"];

/**
 * Tried in order; the first pattern that matches and yields an in-range date
 * wins. New upstream formats get a new row here.
 */
export const TIME_FORMATS: readonly TimeFormat[] = [
  {
    name: "canonical",
    services: BOTH,
    pattern: /^(\d{4})(\d{2})(\d{2})(\d{2})(\d{2})(\d{2})$/,
    parts: (m) => ({
      year: Number(m[1]),
      month: Number(m[2]),
      day: Number(m[3]),
      hour: Number(m[4]),
      minute: Number(m[5]),
      second: Number(m[6]),
    }),
  },
  {
    name: "compact-date",
    services: BOTH,
    pattern: /^(\d{4})(\d{2})(\d{2})$/,
    parts: (m) => ({
      year: Number(m[1]),
      month: Number(m[2]),
      day: Number(m[3]),
    }),
  },
  {
    name: "iso-like",
    services: BOTH,
    pattern:
      /^(\d{4})[-/](\d{1,2})[-/](\d{1,2})(?:[ T](\d{1,2}):(\d{2})(?::(\d{2}))?(?:\.\d+)?(?:Z|[+-]\d{2}:?\d{2})?)?$/,
    parts: (m) => ({
      year: Number(m[1]),
      month: Number(m[2]),
      day: Number(m[3]),
      hour: optionalNumber(m[4]),
      minute: optionalNumber(m[5]),
      second: optionalNumber(m[6]),
    }),
  },
  {
    // 2026-01-18(日)午後11:30放送 / 2026年1月18日(日)午後11:30放送 / 1月18日(日)午前9:00放送
    name: "broadcast-phrase",
    services: NHK_ONLY,
    pattern:
      /^(?:(\d{4})\s*[-年/])?\s*(\d{1,2})\s*[-月/]\s*(\d{1,2})\s*日?\s*(?:[(（][^)）]*[)）])?\s*(午前|午後)?\s*(\d{1,2})[:：時](\d{2})?分?/,
    parts: (m) => ({
      year: optionalNumber(m[1]),
      month: Number(m[2]),
      day: Number(m[3]),
      meridiem: m[4],
      hour: Number(m[5]),
      minute: optionalNumber(m[6]) ?? 0,
    }),
  },
  {
    name: "broadcast-date",
    services: NHK_ONLY,
    pattern: /^(?:(\d{4})\s*年)?\s*(\d{1,2})\s*月\s*(\d{1,2})\s*日/,
    parts: (m) => ({
      year: optionalNumber(m[1]),
      month: Number(m[2]),
      day: Number(m[3]),
    }),
  },
];

/**
 * Converts service-specific date/time text into `YYYYMMDDHHMMSS`. Text that
 * matches no known format is returned unchanged.
 */
export function normalizeTimestamp(
  raw: string,
  service: ProgramSource,
  options: NormalizeTimeOptions = {},
): string {
  const text = raw.trim();
  const referenceYear = options.referenceYear ?? new Date().getFullYear();

  for (const format of TIME_FORMATS) {
    if (!format.services.includes(service)) {
      continue;
    }
    const match = format.pattern.exec(text);
    if (!match) {
      continue;
    }
    const built = build(format.parts(match), referenceYear);
    if (built) {
      return built;
    }
  }
  return raw;
}

/**
 * 午後 adds twelve hours except at 12; 午前 maps 12 to 0.
 */
export function applyMeridiem(hour: number, meridiem: string | undefined): number {
  if (meridiem === "午後") {
    return hour === 12 ? 12 : hour + 12;
  }
  if (meridiem === "午前") {
    return hour === 12 ? 0 : hour;
  }
  return hour;
}

function build(parts: Parts, referenceYear: number): string | null {
  const year = parts.year ?? referenceYear;
  const hour = applyMeridiem(parts.hour ?? 0, parts.meridiem);
  const minute = parts.minute ?? 0;
  const second = parts.second ?? 0;
  if (hour > 23 || minute > 59 || second > 59) {
    return null;
  }
  const check = new Date(Date.UTC(year, parts.month - 1, parts.day));
  if (
    check.getUTCFullYear() !== year ||
    check.getUTCMonth() !== parts.month - 1 ||
    check.getUTCDate() !== parts.day
  ) {
    return null;
  }
  return (
    pad(year, 4) +
    pad(parts.month) +
    pad(parts.day) +
    pad(hour) +
    pad(minute) +
    pad(second)
  );
}

function optionalNumber(value: string | undefined): number | undefined {
  return value === undefined ? undefined : Number(value);
}

function pad(value: number, width = 2): string {
  return value.toString().padStart(width, "0");
}
