// errors.ts — Error taxonomy for a song search run
// Only NoTranscript, LaunchFailed and PageLoadFailed stop a run; the rest are
// reported next to a still-open session.

export type ErrorCode =
  | "NoTranscript"
  | "LaunchFailed"
  | "PageLoadFailed"
  | "ElementNotFound"
  | "PlaybackUnavailable"
  | "TranscriptionFailed"
  | "InvalidConfig";

const RUN_STOPPING: ReadonlySet<ErrorCode> = new Set<ErrorCode>([
  "NoTranscript",
  "LaunchFailed",
  "PageLoadFailed",
]);

export class SongWhisperError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "SongWhisperError";
    this.code = code;
  }

  get stopsRun(): boolean {
    return RUN_STOPPING.has(this.code);
  }
}

export function isSongWhisperError(error: unknown, code?: ErrorCode): error is SongWhisperError {
  return error instanceof SongWhisperError && (code === undefined || error.code === code);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Wrap any throwable in a SongWhisperError, keeping an existing one as is. */
export function toSongWhisperError(error: unknown, fallback: ErrorCode): SongWhisperError {
  if (error instanceof SongWhisperError) return error;
  return new SongWhisperError(fallback, errorMessage(error), { cause: error });
}

/**
 * Map a failed locate/click to a short message, in the manner of Playwright's
 * own error text ("Timeout 5000ms exceeded", "intercepts pointer events").
 */
export function describeInteractionError(error: unknown, selector: string): string {
  const message = errorMessage(error);
  if (message.includes("Timeout") || message.includes("waiting for")) {
    return `Element "${selector}" did not become actionable in time`;
  }
  if (message.includes("intercepts pointer events") || message.includes("not receive pointer events")) {
    return `Element "${selector}" is covered by another element`;
  }
  return message;
}
