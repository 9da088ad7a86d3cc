// find-cmd.ts — Handlers for find, listen, url and profiles

import { launchSession, type LaunchOptions } from "../browser.js";
import { resolveSpeechApiKey, type RuntimeConfig } from "../config.js";
import { findSong, type FindSongDeps } from "../finder.js";
import { getProfile, listProfiles, type SiteName } from "../profiles.js";
import { buildSearchTarget } from "../query.js";
import { describeStatus } from "../sequencer.js";
import { transcribeFile, type TranscribeOptions } from "../transcribe.js";
import type { ActionResult, Session } from "../types.js";

export type FindOutcome = {
  result: ActionResult;
  /** Present when the browser was left open for the user. */
  session?: Session;
};

export type Transcriber = (filePath: string, opts: TranscribeOptions) => Promise<string>;

export function launchOptionsFrom(config: RuntimeConfig): LaunchOptions {
  return {
    userDataDir: config["user-data-dir"],
    profileDirectory: config["profile-directory"],
    executablePath: config["chrome-path"] || undefined,
    navigationTimeoutMs: config["navigation-timeout-ms"],
    actionTimeoutMs: config["action-timeout-ms"],
  };
}

export async function handleFind(
  params: { transcript: string; site?: SiteName },
  config: RuntimeConfig,
  deps: FindSongDeps = { launchSession },
): Promise<FindOutcome> {
  const profile = getProfile(params.site ?? config.site);
  const found = await findSong(
    params.transcript,
    { profile, launch: launchOptionsFrom(config), settleScale: config["settle-scale"] },
    deps,
  );

  if (!found.ok) {
    throw found.error;
  }
  return {
    result: {
      ok: true,
      message: describeStatus(found.status),
      site: profile.name,
      title: found.target.title,
      url: found.target.url,
      status: found.status,
      steps: found.steps,
    },
    session: found.session,
  };
}

export async function handleTranscribe(
  params: { file: string; language?: string },
  config: RuntimeConfig,
  transcribe: Transcriber = transcribeFile,
): Promise<ActionResult> {
  const transcript = await transcribe(params.file, {
    apiKey: resolveSpeechApiKey(config),
    language: params.language ?? config.language,
  });
  return { ok: transcript !== "", data: transcript, ...(transcript ? {} : { error: "No lyrics were recognized" }) };
}

/** Transcribe a recording, then search and play it. */
export async function handleListen(
  params: { file: string; site?: SiteName; language?: string },
  config: RuntimeConfig,
  deps: FindSongDeps = { launchSession },
  transcribe: Transcriber = transcribeFile,
): Promise<FindOutcome> {
  const transcript = await transcribe(params.file, {
    apiKey: resolveSpeechApiKey(config),
    language: params.language ?? config.language,
    log: deps.log,
  });
  const outcome = await handleFind({ transcript, site: params.site }, config, deps);
  return { ...outcome, result: { ...outcome.result, transcript } };
}

export function handleUrl(params: { transcript: string; site?: SiteName }, config: RuntimeConfig): ActionResult {
  const profile = getProfile(params.site ?? config.site);
  const built = buildSearchTarget(params.transcript, profile);
  if (!built.ok) {
    return { ok: false, error: built.message, code: built.error };
  }
  return { ok: true, message: built.target.title, data: built.target.url, site: profile.name };
}

export function handleProfiles(): ActionResult {
  return {
    ok: true,
    data: listProfiles().map((p) => ({
      name: p.name,
      description: p.description,
      searchEndpoint: p.searchEndpoint,
      switchWindow: p.switchWindow,
      interstitial: p.interstitialSelector !== undefined,
      playControl: p.playControlSelector !== undefined,
      mediaTag: p.mediaTag,
    })),
  };
}
