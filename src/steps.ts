// steps.ts — Navigation steps for a site profile
// Opened → ResultsVisible → [ContextSwitch] → [InterstitialDismiss] → PlaybackEngage

import { SongWhisperError, errorMessage } from "./errors.js";
import { invokeMediaPlayback } from "./playback.js";
import type { SettleDelays, SiteProfile } from "./profiles.js";
import type { NavigationStep, StepContext, StepRun } from "./sequencer.js";
import type { FailurePolicy, MediaTag } from "./types.js";

export function openStep(settleMs: number): NavigationStep {
  return {
    name: "Opened",
    onFailure: "abort",
    settleMs,
    teardownOnAbort: true,
    async run(ctx: StepContext): Promise<StepRun> {
      const url = ctx.target.url;
      try {
        await ctx.session.activeWindow().navigate(url);
      } catch (err) {
        throw new SongWhisperError("PageLoadFailed", `Could not open ${url}: ${errorMessage(err)}`, {
          cause: err,
        });
      }
      return { outcome: "ok", detail: url };
    },
  };
}

export function primaryResultStep(
  selector: string,
  onFailure: FailurePolicy,
  settleMs: number,
): NavigationStep {
  return {
    name: "ResultsVisible",
    onFailure,
    settleMs,
    async run(ctx: StepContext): Promise<StepRun> {
      const result = await ctx.session.activeWindow().locate(selector);
      if (!result) {
        throw new SongWhisperError("ElementNotFound", `No result matched ${selector}`);
      }
      await result.click();
      return { outcome: "ok" };
    },
  };
}

export function contextSwitchStep(settleMs: number): NavigationStep {
  return {
    name: "ContextSwitch",
    onFailure: "skip",
    settleMs,
    async run(ctx: StepContext): Promise<StepRun> {
      const current = ctx.session.activeWindow();
      const windows = ctx.session.windows();
      if (windows.length <= 1) {
        return { outcome: "ok", detail: "single window" };
      }
      // First window that is not the current one; no further disambiguation.
      const other = windows.find((w) => w.handle !== current.handle);
      if (!other) {
        return { outcome: "ok", detail: "single window" };
      }
      await ctx.session.activate(other);
      return { outcome: "ok", detail: `switched to ${other.handle}` };
    },
  };
}

export function interstitialStep(selector: string, settleMs: number): NavigationStep {
  return {
    name: "InterstitialDismiss",
    onFailure: "skip",
    settleMs,
    async run(ctx: StepContext): Promise<StepRun> {
      const close = await ctx.session.activeWindow().locate(selector);
      if (!close) {
        return { outcome: "skipped", detail: "no overlay" };
      }
      await close.click();
      return { outcome: "ok", detail: "overlay dismissed" };
    },
  };
}

export function playbackStep(playControlSelector: string | undefined, mediaTag: MediaTag): NavigationStep {
  return {
    name: "PlaybackEngage",
    onFailure: "skip",
    settleMs: 0,
    async run(ctx: StepContext): Promise<StepRun> {
      const window = ctx.session.activeWindow();

      // Profiles without a player control go straight to the media element.
      if (!playControlSelector) {
        const direct = await invokeMediaPlayback(window, mediaTag);
        if (!direct.ok) throw direct.error;
        ctx.playback = "media";
        return { outcome: "ok", detail: `${mediaTag}.play() invoked` };
      }

      let controlError: string;
      try {
        const control = await window.locate(playControlSelector);
        if (control) {
          await control.click();
          ctx.playback = "control";
          return { outcome: "ok", detail: "play control clicked" };
        }
        controlError = "play control not found";
      } catch (err) {
        controlError = errorMessage(err);
      }

      ctx.log.info(`play control unavailable (${controlError}), trying ${mediaTag}.play()`);
      const fallback = await invokeMediaPlayback(window, mediaTag);
      if (!fallback.ok) {
        throw new SongWhisperError(
          "PlaybackUnavailable",
          `${controlError}; ${fallback.error.message}`,
          { cause: fallback.error },
        );
      }
      ctx.playback = "media";
      return { outcome: "fallback", detail: `${mediaTag}.play() invoked` };
    },
  };
}

/** Ordered step list for a profile; delays are passed in already scaled. */
export function buildSteps(profile: SiteProfile, delays: SettleDelays = profile.delays): NavigationStep[] {
  const steps: NavigationStep[] = [openStep(delays.openMs)];
  if (profile.primaryResult) {
    steps.push(primaryResultStep(profile.primaryResult.selector, profile.primaryResult.onFailure, delays.resultsMs));
  }
  if (profile.switchWindow) {
    steps.push(contextSwitchStep(delays.contextSwitchMs));
  }
  if (profile.interstitialSelector) {
    steps.push(interstitialStep(profile.interstitialSelector, delays.interstitialMs));
  }
  steps.push(playbackStep(profile.playControlSelector, profile.mediaTag));
  return steps;
}
