/**
 * Error taxonomy for the recording pipeline.
 *
 * Every failure that leaves a core module is one of these, so callers can
 * tell an authentication problem from a resolution or capture problem without
 * parsing messages.
 */
export type RecorderErrorCode =
  | "AUTH_PHASE1_FAILED"
  | "AUTH_PHASE2_FAILED"
  | "STREAM_RESOLUTION_HTTP"
  | "STREAM_RESOLUTION_FORMAT"
  | "INVALID_TIME_WINDOW"
  | "INVALID_LINK"
  | "NORMALIZATION"
  | "LISTING_HTTP"
  | "CAPTURE_FAILED"
  | "TAGGING_FAILED";

export class RecorderError extends Error {
  readonly code: RecorderErrorCode;

  constructor(code: RecorderErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class AuthPhase1Failed extends RecorderError {
  constructor(message: string, options?: ErrorOptions) {
    super("AUTH_PHASE1_FAILED", message, options);
  }
}

export class AuthPhase2Failed extends RecorderError {
  constructor(message: string, options?: ErrorOptions) {
    super("AUTH_PHASE2_FAILED", message, options);
  }
}

export class StreamResolutionHttpError extends RecorderError {
  readonly status: number | undefined;

  constructor(message: string, status?: number, options?: ErrorOptions) {
    super("STREAM_RESOLUTION_HTTP", message, options);
    this.status = status;
  }
}

export class StreamResolutionFormatError extends RecorderError {
  constructor(message: string, options?: ErrorOptions) {
    super("STREAM_RESOLUTION_FORMAT", message, options);
  }
}

export class InvalidTimeWindowError extends RecorderError {
  constructor(message: string) {
    super("INVALID_TIME_WINDOW", message);
  }
}

/** A player URL that is not a detail, search or live link. */
export class InvalidLinkError extends RecorderError {
  constructor(message: string, options?: ErrorOptions) {
    super("INVALID_LINK", message, options);
  }
}

export class NormalizationError extends RecorderError {
  constructor(message: string, options?: ErrorOptions) {
    super("NORMALIZATION", message, options);
  }
}

/** Program/station listing endpoint failed (network or non-2xx). */
export class ListingHttpError extends RecorderError {
  readonly status: number | undefined;

  constructor(message: string, status?: number, options?: ErrorOptions) {
    super("LISTING_HTTP", message, options);
    this.status = status;
  }
}

export class CaptureFailedError extends RecorderError {
  readonly exitCode: number | null;
  readonly stderr: string;

  constructor(
    message: string,
    details: { exitCode: number | null; stderr?: string },
    options?: ErrorOptions,
  ) {
    super("CAPTURE_FAILED", message, options);
    this.exitCode = details.exitCode;
    this.stderr = details.stderr ?? "";
  }
}

export class TaggingFailedError extends RecorderError {
  constructor(message: string, options?: ErrorOptions) {
    super("TAGGING_FAILED", message, options);
  }
}

/**
 * Flattens an error and its `cause` chain into one diagnostic line.
 */
export function formatError(error: unknown): string {
  if (!(error instanceof Error)) {
    return String(error);
  }
  const parts: string[] = [
    error instanceof RecorderError
      ? `[${error.code}] ${error.message}`
      : error.message,
  ];
  if (error instanceof CaptureFailedError && error.stderr.trim() !== "") {
    parts.push(`stderr=${oneLine(error.stderr)}`);
  }
  let current: unknown = error.cause;
  let guard = 0;
  while (current !== undefined && current !== null && guard < 4) {
    guard += 1;
    if (current instanceof Error) {
      parts.push(`cause=${current.message}`);
      const code = readErrorCode(current);
      if (code) {
        parts.push(`code=${code}`);
      }
      current = current.cause;
    } else {
      parts.push(`cause=${String(current)}`);
      break;
    }
  }
  return parts.join(" | ");
}

/** Tool output folded onto one line, ` / ` between lines. */
export function oneLine(text: string): string {
  return text
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line !== "")
    .join(" / ");
}

function readErrorCode(error: Error): string | undefined {
  if ("code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}
