/**
 * What core modules need from a logger. The CLI `Logger` satisfies this
 * structurally; library callers can pass `console`.
 */
export interface RecorderLogger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export const silentLogger: RecorderLogger = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
