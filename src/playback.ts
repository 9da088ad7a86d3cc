// playback.ts — Last-resort playback through the page's media element
// Runs a single play() call; no confirmation polling afterwards.

import { SongWhisperError, errorMessage } from "./errors.js";
import type { MediaTag, SessionWindow } from "./types.js";

export type FallbackResult =
  | { ok: true }
  | { ok: false; error: SongWhisperError };

export async function invokeMediaPlayback(
  window: SessionWindow,
  tag: MediaTag,
): Promise<FallbackResult> {
  try {
    await window.playMedia(tag);
    return { ok: true };
  } catch (err) {
    return {
      ok: false,
      error: new SongWhisperError(
        "PlaybackUnavailable",
        `${tag}.play() failed: ${errorMessage(err)}`,
        { cause: err },
      ),
    };
  }
}
