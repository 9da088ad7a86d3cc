// Unit tests for finder.ts

import { vi, describe, it, expect } from "vitest";
import { findSong, type FindSongDeps } from "../../src/finder.js";
import { getProfile } from "../../src/profiles.js";
import { silentLogger } from "../../src/logger.js";
import { SongWhisperError } from "../../src/errors.js";
import type { LaunchOptions } from "../../src/browser.js";
import { FakeSession, recordingSleep } from "../helpers/fake-session.js";

const youtube = getProfile("youtube");
const launch: LaunchOptions = { userDataDir: "/tmp/songwhisper-test-profile", profileDirectory: "Default" };
const SHORTS = 'a[href*="/shorts/"]';

function depsFor(session: FakeSession, sleep?: (ms: number) => Promise<void>): FindSongDeps {
  return { launchSession: vi.fn().mockResolvedValue(session), sleep, log: silentLogger };
}

describe("findSong", () => {
  it("fails with NoTranscript before launching a browser", async () => {
    const deps = depsFor(new FakeSession());
    const result = await findSong("", { profile: youtube, launch }, deps);
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.code).toBe("NoTranscript");
    expect(deps.launchSession).not.toHaveBeenCalled();
  });

  it("reports LaunchFailed when Chrome cannot start", async () => {
    const deps: FindSongDeps = {
      launchSession: vi.fn().mockRejectedValue(new Error("spawn ENOENT")),
      log: silentLogger,
    };
    const result = await findSong("안녕", { profile: youtube, launch }, deps);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe("LaunchFailed");
      expect(result.error.message).toBe("spawn ENOENT");
      expect(result.target?.title).toBe("안녕");
    }
  });

  it("keeps the code of a SongWhisperError thrown by the launcher", async () => {
    const deps: FindSongDeps = {
      launchSession: vi.fn().mockRejectedValue(new SongWhisperError("LaunchFailed", "Chrome/Chromium not found")),
      log: silentLogger,
    };
    const result = await findSong("안녕", { profile: youtube, launch }, deps);
    expect(!result.ok && result.error.message).toBe("Chrome/Chromium not found");
  });

  it("reports PageLoadFailed and closes the session when the search page fails", async () => {
    const session = new FakeSession();
    session.main.navigateError = new Error("net::ERR_INTERNET_DISCONNECTED");
    const result = await findSong("안녕", { profile: youtube, launch }, depsFor(session));
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe("PageLoadFailed");
      expect(result.steps).toHaveLength(1);
    }
    expect(session.closeCalls).toBe(1);
  });

  it("passes the launch options through and returns the open session", async () => {
    const session = new FakeSession();
    session.main.add(SHORTS);
    const deps = depsFor(session);
    const result = await findSong("안녕", { profile: youtube, launch, settleScale: 0 }, deps);

    expect(deps.launchSession).toHaveBeenCalledWith(launch);
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.session).toBe(session);
      expect(result.status).toEqual({ kind: "FullSuccess", playback: "media" });
      expect(result.target.url).toBe("https://www.youtube.com/results?search_query=%EC%95%88%EB%85%95");
    }
    expect(session.closeCalls).toBe(0);
  });

  it("scales the settle delays", async () => {
    const session = new FakeSession();
    session.main.add(SHORTS);
    const { sleep, calls } = recordingSleep();
    await findSong("안녕", { profile: youtube, launch, settleScale: 0.1 }, depsFor(session, sleep));
    expect(calls).toEqual([500, 500]);
  });

  it("returns an Aborted status with the session open when no result is found", async () => {
    const session = new FakeSession();
    const result = await findSong("안녕", { profile: youtube, launch, settleScale: 0 }, depsFor(session));
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.status).toEqual({
        kind: "Aborted",
        stage: "ResultsVisible",
        reason: `No result matched ${SHORTS}`,
      });
    }
    expect(session.closeCalls).toBe(0);
  });
});
