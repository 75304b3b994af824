import chalk from "chalk";
import cliProgress from "cli-progress";

/** `75` -> `01:15`, `3725` -> `1:02:05` */
export function formatClock(totalSeconds: number): string {
  const seconds = Math.max(0, Math.floor(totalSeconds));
  const h = Math.floor(seconds / 3600);
  const m = Math.floor((seconds % 3600) / 60);
  const s = seconds % 60;
  const mmss = `${String(m).padStart(2, "0")}:${String(s).padStart(2, "0")}`;
  return h > 0 ? `${h}:${mmss}` : mmss;
}

/**
 * Recorded-time bar for one capture, fed by the capture's once-a-second tick.
 */
export class CaptureProgress {
  private readonly bar: cliProgress.SingleBar;
  private started = false;

  constructor(private readonly station: string) {
    this.bar = new cliProgress.SingleBar(
      {
        format:
          `${chalk.blueBright("REC {station}")} ` +
          `${chalk.red("{bar}")} ` +
          `${chalk.green("{recorded} / {length}")}`,
        barCompleteChar: "█",
        barIncompleteChar: "░",
        hideCursor: true,
      },
      cliProgress.Presets.shades_classic,
    );
  }

  update(elapsedSeconds: number, totalSeconds: number): void {
    const payload = {
      station: this.station,
      recorded: formatClock(elapsedSeconds),
      length: formatClock(totalSeconds),
    };
    if (!this.started) {
      this.bar.start(totalSeconds, elapsedSeconds, payload);
      this.started = true;
      return;
    }
    this.bar.setTotal(totalSeconds);
    this.bar.update(elapsedSeconds, payload);
  }

  stop(): void {
    if (this.started) {
      this.bar.stop();
      this.started = false;
    }
  }
}
