import type { Program } from "./program.js";
import { formatDisplayDate, formatDisplayTime } from "./time.js";

/** `[TBS] Title (09:30-10:00) JP13` */
export function formatLogLine(program: Program): string {
  return `${program.toString()} ${program.area}`;
}

export function formatTitleWithPerformer(title: string, performer?: string): string {
  return performer ? `${title} (${performer})` : title;
}

/**
 * One block per program for the `find` listing, each followed by the job
 * entry that records it.
 */
export function formatProgramList(programs: readonly Program[]): string {
  return programs.map(formatProgramEntry).join("\n\n");
}

export function formatProgramEntry(program: Program): string {
  const lines = [
    `${formatDisplayDate(program.startTime)} ${formatDisplayTime(program.startTime)}` +
      (program.endTime !== program.startTime
        ? `-${formatDisplayTime(program.endTime)}`
        : "") +
      ` [${program.station}] ${formatTitleWithPerformer(program.title, program.performer)}`,
  ];
  if (program.availableUntil) {
    lines.push(
      `  available until ${formatDisplayDate(program.availableUntil)} ${formatDisplayTime(program.availableUntil)}`,
    );
  }
  const job = formatJobEntry(program);
  if (job) {
    lines.push(`  job: ${job}`);
  }
  return lines.join("\n");
}

/**
 * The jobs-file entry that records `program`, or null when it lacks the ids.
 */
export function formatJobEntry(program: Program): string | null {
  if (program.isRadiko()) {
    return `{ service: radiko, station: ${program.station}, ft: "${program.startTime}", to: "${program.endTime}" }`;
  }
  if (program.seriesSiteId && program.cornerSiteId) {
    return `{ service: nhk, series: ${program.seriesSiteId}, corner: "${program.cornerSiteId}" }`;
  }
  return null;
}
