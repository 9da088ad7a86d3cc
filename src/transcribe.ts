// transcribe.ts — Speech-to-text for a recorded WAV snippet
// Google Cloud Speech-to-Text v1 REST; WAV headers carry encoding and sample rate.

import { readFile } from "node:fs/promises";
import { SongWhisperError, errorMessage } from "./errors.js";
import { createLogger, type Logger } from "./logger.js";

export const SPEECH_ENDPOINT = "https://speech.googleapis.com/v1/speech:recognize";

export interface TranscribeOptions {
  apiKey: string;
  language: string;
  endpoint?: string;
  log?: Logger;
}

type RecognizeResponse = {
  results?: Array<{
    alternatives?: Array<{ transcript?: string; confidence?: number }>;
  }>;
};

function isRecognizeResponse(body: unknown): body is RecognizeResponse {
  if (typeof body !== "object" || body === null || Array.isArray(body)) return false;
  const results: unknown = Reflect.get(body, "results");
  return results === undefined || (Array.isArray(results) && results.every((r) => typeof r === "object" && r !== null));
}

export function extractTranscript(body: RecognizeResponse): string {
  const parts: string[] = [];
  for (const result of body.results ?? []) {
    const best = result.alternatives?.[0]?.transcript?.trim();
    if (best) parts.push(best);
  }
  return parts.join(" ");
}

/**
 * Recognize speech in `audio`. Returns "" when nothing was recognized or the
 * service could not be reached; that case is logged, not thrown.
 */
export async function transcribeAudio(audio: Buffer, opts: TranscribeOptions): Promise<string> {
  if (!opts.apiKey) {
    throw new SongWhisperError(
      "TranscriptionFailed",
      "No speech API key. Set GOOGLE_SPEECH_API_KEY or the speech-api-key config key.",
    );
  }
  const log = opts.log ?? createLogger("transcribe");
  const url = `${opts.endpoint ?? SPEECH_ENDPOINT}?key=${encodeURIComponent(opts.apiKey)}`;

  let resp: Response;
  try {
    resp = await fetch(url, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({
        config: { languageCode: opts.language },
        audio: { content: audio.toString("base64") },
      }),
    });
  } catch (err) {
    log.error("speech API request failed", { reason: errorMessage(err) });
    return "";
  }

  if (!resp.ok) {
    const text = await resp.text().catch(() => "");
    log.error(`speech API returned ${resp.status}`, { body: text.slice(0, 200) });
    return "";
  }

  let body: unknown;
  try {
    body = await resp.json();
  } catch (err) {
    log.error("speech API returned a body that is not JSON", { reason: errorMessage(err) });
    return "";
  }
  if (!isRecognizeResponse(body)) {
    log.error("speech API returned an unexpected body", { body: JSON.stringify(body).slice(0, 200) });
    return "";
  }

  const transcript = extractTranscript(body);
  if (!transcript) {
    log.warn("no speech recognized");
  } else {
    log.info("recognized lyrics", { transcript });
  }
  return transcript;
}

export async function transcribeFile(filePath: string, opts: TranscribeOptions): Promise<string> {
  let audio: Buffer;
  try {
    audio = await readFile(filePath);
  } catch (err) {
    throw new SongWhisperError("TranscriptionFailed", `Cannot read ${filePath}: ${errorMessage(err)}`, {
      cause: err,
    });
  }
  return transcribeAudio(audio, opts);
}
