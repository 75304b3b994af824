import {
  diffSeconds,
  formatDisplayTime,
  isCanonicalTimestamp,
  parseTimestamp,
} from "./time.js";

export type ProgramSource = "radiko" | "nhk";

export const DEFAULT_AREA_ID = "JP13";

const DAY_SECONDS = 24 * 60 * 60;

export interface ProgramInit {
  title: string;
  station: string;
  startTime: string;
  endTime: string;
  source: ProgramSource;
  area?: string;
  streamUrl?: string;
  /** Minutes; overrides the value derived from start/end. */
  durationMinutes?: number;
  performer?: string;
  description?: string;
  subtitle?: string;
  imageUrl?: string;
  info?: string;
  url?: string;
  availableUntil?: string;
  seriesSiteId?: string;
  cornerSiteId?: string;
  onairDate?: string;
}

/**
 * One broadcast program, whichever service it came from. Built once by the
 * normalizer; the only later mutation is the stream URL back-fill.
 */
export class Program {
  readonly source: ProgramSource;
  readonly title: string;
  readonly station: string;
  readonly area: string;
  readonly startTime: string;
  readonly endTime: string;
  readonly durationMinutes: number | undefined;
  readonly performer: string | undefined;
  readonly description: string | undefined;
  readonly subtitle: string | undefined;
  readonly imageUrl: string | undefined;
  readonly info: string | undefined;
  readonly url: string | undefined;
  readonly availableUntil: string | undefined;
  readonly seriesSiteId: string | undefined;
  readonly cornerSiteId: string | undefined;
  readonly onairDate: string | undefined;
  private resolvedStreamUrl: string | undefined;

  constructor(init: ProgramInit) {
    this.source = init.source;
    this.title = init.title;
    this.station = init.station;
    this.area = init.area || DEFAULT_AREA_ID;
    this.startTime = init.startTime;
    this.endTime = init.endTime;
    this.durationMinutes = init.durationMinutes;
    this.performer = init.performer;
    this.description = init.description;
    this.subtitle = init.subtitle;
    this.imageUrl = init.imageUrl;
    this.info = init.info;
    this.url = init.url;
    this.availableUntil = init.availableUntil;
    this.seriesSiteId = init.seriesSiteId;
    this.cornerSiteId = init.cornerSiteId;
    this.onairDate = init.onairDate;
    this.resolvedStreamUrl = init.streamUrl || undefined;
  }

  /** Minimal stand-in when no listing data could be fetched. */
  static synthesize(
    source: ProgramSource,
    station: string,
    startTime: string,
    endTime: string,
    area?: string,
  ): Program {
    return new Program({
      source,
      title: station,
      station,
      startTime,
      endTime,
      area,
    });
  }

  get streamUrl(): string | undefined {
    return this.resolvedStreamUrl;
  }

  attachStreamUrl(url: string): void {
    if (this.resolvedStreamUrl) {
      throw new Error(
        `Stream URL already resolved for ${this.station} ${this.startTime}`,
      );
    }
    this.resolvedStreamUrl = url;
  }

  isRecordable(): boolean {
    return (this.resolvedStreamUrl ?? "") !== "";
  }

  isRadiko(): boolean {
    return this.source === "radiko";
  }

  isNhk(): boolean {
    return this.source === "nhk";
  }

  /**
   * False once the on-demand / timefree window has closed. Programs without a
   * known window are treated as available.
   */
  isAvailable(at: Date = new Date()): boolean {
    if (!this.availableUntil || !isCanonicalTimestamp(this.availableUntil)) {
      return true;
    }
    return parseTimestamp(this.availableUntil).getTime() > at.getTime();
  }

  getDurationSeconds(): number | null {
    if (this.durationMinutes !== undefined) {
      return this.durationMinutes * 60;
    }
    const seconds = diffSeconds(this.startTime, this.endTime);
    if (seconds === null) {
      return null;
    }
    // An end clock earlier than the start means the window wrapped midnight.
    if (seconds < 0) {
      return ((seconds % DAY_SECONDS) + DAY_SECONDS) % DAY_SECONDS;
    }
    return seconds;
  }

  getDurationMinutes(): number | null {
    const seconds = this.getDurationSeconds();
    return seconds === null ? null : Math.floor(seconds / 60);
  }

  toString(): string {
    return `[${this.station}] ${this.title} (${formatDisplayTime(this.startTime)}-${formatDisplayTime(this.endTime)})`;
  }
}
