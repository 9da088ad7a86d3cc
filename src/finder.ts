// finder.ts — transcript → search target → browser session → navigation sequence

import { SongWhisperError, toSongWhisperError } from "./errors.js";
import { createLogger, type Logger } from "./logger.js";
import { scaleDelays, type SiteProfile } from "./profiles.js";
import { buildSearchTarget } from "./query.js";
import { runSequence, type Sleep } from "./sequencer.js";
import { buildSteps } from "./steps.js";
import type { LaunchOptions } from "./browser.js";
import type { SearchTarget, SequenceStatus, Session, StepReport } from "./types.js";

export interface FindSongOptions {
  profile: SiteProfile;
  launch: LaunchOptions;
  /** Multiplier for the profile's settle delays. */
  settleScale?: number;
}

export interface FindSongDeps {
  launchSession: (opts: LaunchOptions) => Promise<Session>;
  sleep?: Sleep;
  log?: Logger;
}

export type FindSongResult =
  | {
      ok: true;
      target: SearchTarget;
      status: SequenceStatus;
      steps: StepReport[];
      /** Left open; the caller owns the browser from here on. */
      session: Session;
    }
  | {
      ok: false;
      error: SongWhisperError;
      target?: SearchTarget;
      steps?: StepReport[];
    };

export async function findSong(
  transcript: string,
  opts: FindSongOptions,
  deps: FindSongDeps,
): Promise<FindSongResult> {
  const log = deps.log ?? createLogger("finder");

  const built = buildSearchTarget(transcript, opts.profile);
  if (!built.ok) {
    return { ok: false, error: new SongWhisperError("NoTranscript", built.message) };
  }
  const target = built.target;
  log.info(`searching ${opts.profile.name}`, { title: target.title, url: target.url });

  let session: Session;
  try {
    session = await deps.launchSession(opts.launch);
  } catch (err) {
    return { ok: false, error: toSongWhisperError(err, "LaunchFailed"), target };
  }

  const delays = scaleDelays(opts.profile.delays, opts.settleScale ?? 1);
  const result = await runSequence(session, target, buildSteps(opts.profile, delays), {
    sleep: deps.sleep,
    log: deps.log,
  });

  if (result.status.kind === "Aborted" && result.status.stage === "Opened") {
    return {
      ok: false,
      error: new SongWhisperError("PageLoadFailed", result.status.reason),
      target,
      steps: result.steps,
    };
  }

  return { ok: true, target, status: result.status, steps: result.steps, session };
}
