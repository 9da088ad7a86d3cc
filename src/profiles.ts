// profiles.ts — Destination site profiles
// A profile holds everything that differs between music sites: the search
// endpoint, the selectors for each navigation stage, and the settle delays.

import type { FailurePolicy, MediaTag } from "./types.js";

export type SiteName = "youtube" | "bugs";

export interface SettleDelays {
  /** After the search page is opened. */
  openMs: number;
  /** After the primary result is clicked. */
  resultsMs: number;
  /** After switching to the player window. */
  contextSwitchMs: number;
  /** After the interstitial dismiss attempt. */
  interstitialMs: number;
}

export interface SiteProfile {
  name: SiteName;
  description: string;
  searchEndpoint: string;
  queryParam: string;
  /** Omitted for sites whose search page already hosts the player. */
  primaryResult?: {
    selector: string;
    onFailure: FailurePolicy;
  };
  switchWindow: boolean;
  interstitialSelector?: string;
  playControlSelector?: string;
  mediaTag: MediaTag;
  delays: SettleDelays;
}

const YOUTUBE: SiteProfile = {
  name: "youtube",
  description: "YouTube search, opens the first Shorts result",
  searchEndpoint: "https://www.youtube.com/results",
  queryParam: "search_query",
  primaryResult: {
    selector: 'a[href*="/shorts/"]',
    onFailure: "abort",
  },
  switchWindow: false,
  mediaTag: "video",
  delays: { openMs: 5000, resultsMs: 5000, contextSwitchMs: 0, interstitialMs: 0 },
};

const BUGS: SiteProfile = {
  name: "bugs",
  description: "Bugs Music lyrics search, plays the top result in the web player",
  searchEndpoint: "https://music.bugs.co.kr/search/lyrics",
  queryParam: "q",
  primaryResult: {
    selector: 'xpath=//a[contains(@class,"btn play")]',
    onFailure: "abort",
  },
  switchWindow: true,
  interstitialSelector:
    'xpath=//button[contains(@class,"btnClose") and (contains(text(),"닫기") or contains(@aria-label,"닫기"))]',
  playControlSelector: 'xpath=//button[contains(@class,"btnPlay") or contains(text(),"재생")]',
  mediaTag: "audio",
  delays: { openMs: 5000, resultsMs: 7000, contextSwitchMs: 4000, interstitialMs: 2000 },
};

const PROFILES: Record<SiteName, SiteProfile> = {
  youtube: YOUTUBE,
  bugs: BUGS,
};

export function isSiteName(value: string): value is SiteName {
  return Object.prototype.hasOwnProperty.call(PROFILES, value);
}

export function getProfile(name: SiteName): SiteProfile {
  return PROFILES[name];
}

export function listProfiles(): SiteProfile[] {
  return Object.values(PROFILES);
}

/** Multiply every settle delay by `scale` (0 disables waiting). */
export function scaleDelays(delays: SettleDelays, scale: number): SettleDelays {
  const s = Math.max(0, scale);
  return {
    openMs: Math.round(delays.openMs * s),
    resultsMs: Math.round(delays.resultsMs * s),
    contextSwitchMs: Math.round(delays.contextSwitchMs * s),
    interstitialMs: Math.round(delays.interstitialMs * s),
  };
}
