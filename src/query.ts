// query.ts — Turn a transcript into a search URL and a display title

import type { SiteProfile } from "./profiles.js";
import type { SearchTarget } from "./types.js";

export const TITLE_MAX_CHARS = 50;
export const TITLE_ELLIPSIS = "...";

export type BuildResult =
  | { ok: true; target: SearchTarget }
  | { ok: false; error: "NoTranscript"; message: string };

/**
 * Display title: the transcript itself, or its first 50 code points plus "..."
 * when longer. The text is not trimmed or otherwise normalized.
 */
export function buildTitle(transcript: string): string {
  const chars = Array.from(transcript);
  if (chars.length <= TITLE_MAX_CHARS) return transcript;
  return chars.slice(0, TITLE_MAX_CHARS).join("") + TITLE_ELLIPSIS;
}

/** `endpoint?param=<form-encoded transcript>` */
export function buildSearchUrl(endpoint: string, queryParam: string, transcript: string): string {
  const query = new URLSearchParams([[queryParam, transcript]]).toString();
  return `${endpoint}?${query}`;
}

export function buildSearchTarget(
  transcript: string,
  profile: Pick<SiteProfile, "searchEndpoint" | "queryParam">,
): BuildResult {
  if (!transcript) {
    return { ok: false, error: "NoTranscript", message: "No lyrics were recognized" };
  }
  return {
    ok: true,
    target: {
      url: buildSearchUrl(profile.searchEndpoint, profile.queryParam, transcript),
      title: buildTitle(transcript),
    },
  };
}
