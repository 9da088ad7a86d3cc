// Shared CLI output helpers

import { isSongWhisperError } from "./errors.js";
import type { ActionResult } from "./types.js";

export function jsonOutput(data: unknown): void {
  process.stdout.write(JSON.stringify(data, null, 2) + "\n");
}

export function textOutput(text: string): void {
  process.stdout.write(text + "\n");
}

/**
 * Format an ActionResult based on --json flag.
 *
 * Without --json: human-readable text (message, then data)
 * With --json:    the result as one JSON line on stdout
 * Error:          message (and suggestion) on stderr
 */
export function formatOutput(result: ActionResult, jsonMode: boolean): void {
  if (jsonMode) {
    process.stdout.write(JSON.stringify(result) + "\n");
    return;
  }

  if (!result.ok) {
    process.stderr.write((result.error ?? result.message ?? "Error") + "\n");
    if (result.suggestion) process.stderr.write(`Suggestion: ${result.suggestion}\n`);
    return;
  }

  if (result.message) {
    process.stdout.write(result.message + "\n");
  }
  if (result.data !== undefined) {
    if (typeof result.data === "string") {
      process.stdout.write(result.data + "\n");
    } else if (typeof result.data === "boolean" || typeof result.data === "number") {
      process.stdout.write(String(result.data) + "\n");
    } else {
      process.stdout.write(JSON.stringify(result.data, null, 2) + "\n");
    }
  }
}

const SUGGESTIONS: Record<string, string> = {
  NoTranscript: "Record again and sing the lyrics slowly and clearly.",
  LaunchFailed: "Install Chrome or set CHROME_PATH; close other Chrome windows using the same profile.",
  PageLoadFailed: "Check the network connection and try again.",
  TranscriptionFailed: "Set GOOGLE_SPEECH_API_KEY or run: songwhisper config set speech-api-key <key>",
  InvalidConfig: "Run: songwhisper config list",
};

/**
 * Wrap an error in ActionResult format, with a suggestion for known codes.
 */
export function errorResult(error: unknown, suggestion?: string): ActionResult {
  const msg = error instanceof Error ? error.message : String(error);
  const code = isSongWhisperError(error) ? error.code : undefined;
  const hint = suggestion ?? (code ? SUGGESTIONS[code] : undefined);
  return { ok: false, error: msg, ...(code ? { code } : {}), ...(hint ? { suggestion: hint } : {}) };
}
