// Unit tests for browser.ts — playwright-core is mocked, no Chrome is started

import { vi, describe, it, expect, beforeEach } from "vitest";

const mocks = vi.hoisted(() => ({ launchPersistentContext: vi.fn() }));

vi.mock("playwright-core", () => ({
  chromium: { launchPersistentContext: mocks.launchPersistentContext },
}));

import {
  BrowserSession,
  SUPPRESSED_DEFAULT_ARGS,
  buildChromeArgs,
  findChrome,
  launchSession,
} from "../../src/browser.js";
import { isSongWhisperError } from "../../src/errors.js";

function fakePage(matchCount = 0, clickError?: Error) {
  const click = vi.fn(async () => {
    if (clickError) throw clickError;
  });
  return {
    click,
    url: vi.fn().mockReturnValue("about:blank"),
    isClosed: vi.fn().mockReturnValue(false),
    bringToFront: vi.fn().mockResolvedValue(undefined),
    goto: vi.fn().mockResolvedValue(null),
    evaluate: vi.fn().mockResolvedValue(undefined),
    locator: vi.fn(() => ({
      count: vi.fn().mockResolvedValue(matchCount),
      first: () => ({ click }),
    })),
  };
}

function fakeContext(pages: ReturnType<typeof fakePage>[]) {
  let onClose: (() => void) | undefined;
  return {
    pages: vi.fn(() => pages),
    newPage: vi.fn(async () => {
      const page = fakePage();
      pages.push(page);
      return page;
    }),
    close: vi.fn(async () => {
      onClose?.();
    }),
    once: vi.fn((event: string, cb: () => void) => {
      if (event === "close") onClose = cb;
    }),
  };
}

const timeouts = { navigationMs: 30000, actionMs: 5000 };

beforeEach(() => {
  vi.clearAllMocks();
});

describe("buildChromeArgs", () => {
  it("sets the profile, autoplay and automation-marker switches", () => {
    const args = buildChromeArgs("Profile 2");
    expect(args).toContain("--profile-directory=Profile 2");
    expect(args).toContain("--autoplay-policy=no-user-gesture-required");
    expect(args).toContain("--disable-blink-features=AutomationControlled");
  });

  it("suppresses the enable-automation default switch", () => {
    expect(SUPPRESSED_DEFAULT_ARGS).toEqual(["--enable-automation"]);
  });
});

describe("findChrome", () => {
  it("returns the first existing candidate", () => {
    expect(findChrome(["/nonexistent/chrome", process.execPath])).toBe(process.execPath);
  });

  it("throws when no candidate exists", () => {
    expect(() => findChrome(["/nonexistent/chrome"])).toThrow("Chrome/Chromium not found");
  });
});

describe("launchSession", () => {
  it("launches a headed persistent context with the fixed switches", async () => {
    const page = fakePage();
    mocks.launchPersistentContext.mockResolvedValue(fakeContext([page]));

    const session = await launchSession({
      userDataDir: "/tmp/songwhisper-test-profile",
      profileDirectory: "Default",
      executablePath: "/opt/chrome/chrome",
    });

    expect(mocks.launchPersistentContext).toHaveBeenCalledWith(
      "/tmp/songwhisper-test-profile",
      expect.objectContaining({
        executablePath: "/opt/chrome/chrome",
        headless: false,
        args: buildChromeArgs("Default"),
        ignoreDefaultArgs: ["--enable-automation"],
      }),
    );
    expect(session.windows()).toHaveLength(1);
    expect(session.activeWindow().handle).toBe("w1");
    expect(session.activeWindow().url()).toBe("about:blank");
  });

  it("opens a window when the context starts without one", async () => {
    const ctx = fakeContext([]);
    mocks.launchPersistentContext.mockResolvedValue(ctx);
    const session = await launchSession({ userDataDir: "/tmp/p", profileDirectory: "Default", executablePath: "/opt/c" });
    expect(ctx.newPage).toHaveBeenCalledOnce();
    expect(session.windows()).toHaveLength(1);
  });

  it("throws LaunchFailed when Chrome cannot start", async () => {
    mocks.launchPersistentContext.mockRejectedValue(new Error("Executable doesn't exist at /opt/c"));
    const err = await launchSession({ userDataDir: "/tmp/p", profileDirectory: "Default", executablePath: "/opt/c" }).catch(
      (e: unknown) => e,
    );
    expect(isSongWhisperError(err, "LaunchFailed")).toBe(true);
    expect(err instanceof Error && err.message).toBe("Chrome failed to launch: Executable doesn't exist at /opt/c");
  });
});

describe("BrowserSession", () => {
  it("navigates with the configured timeout", async () => {
    const page = fakePage();
    const session = new BrowserSession(fakeContext([page]) as never, page as never, timeouts);
    await session.activeWindow().navigate("https://example.com/?q=1");
    expect(page.goto).toHaveBeenCalledWith("https://example.com/?q=1", {
      timeout: 30000,
      waitUntil: "domcontentloaded",
    });
  });

  it("returns null from locate when nothing matches", async () => {
    const page = fakePage(0);
    const session = new BrowserSession(fakeContext([page]) as never, page as never, timeouts);
    await expect(session.activeWindow().locate("a.play")).resolves.toBeNull();
  });

  it("clicks the first match once, without waiting for actionability", async () => {
    const page = fakePage(3);
    const session = new BrowserSession(fakeContext([page]) as never, page as never, timeouts);
    const el = await session.activeWindow().locate("a.play");
    await el?.click();
    expect(page.click).toHaveBeenCalledOnce();
    expect(page.click).toHaveBeenCalledWith({ force: true, timeout: 5000 });
  });

  it("wraps click failures as ElementNotFound", async () => {
    const page = fakePage(1, new Error("locator.click: Timeout 5000ms exceeded."));
    const session = new BrowserSession(fakeContext([page]) as never, page as never, timeouts);
    const el = await session.activeWindow().locate("a.play");
    const err = await el?.click().catch((e: unknown) => e);
    expect(isSongWhisperError(err, "ElementNotFound")).toBe(true);
    expect(err instanceof Error && err.message).toBe('Element "a.play" did not become actionable in time');
  });

  it("passes the media tag to the page script", async () => {
    const page = fakePage();
    const session = new BrowserSession(fakeContext([page]) as never, page as never, timeouts);
    await session.activeWindow().playMedia("audio");
    expect(page.evaluate).toHaveBeenCalledWith(expect.any(Function), { tag: "audio", graceMs: 2000 });
  });

  it("activates another window and brings it to front", async () => {
    const first = fakePage();
    const second = fakePage();
    const session = new BrowserSession(fakeContext([first, second]) as never, first as never, timeouts);
    const windows = session.windows();
    expect(windows.map((w) => w.handle)).toEqual(["w1", "w2"]);

    const player = windows[1];
    if (!player) throw new Error("expected two windows");
    await session.activate(player);
    expect(second.bringToFront).toHaveBeenCalledOnce();
    expect(session.activeWindow().handle).toBe("w2");
  });

  it("closes the context once and resolves waitForClose", async () => {
    const page = fakePage();
    const ctx = fakeContext([page]);
    const session = new BrowserSession(ctx as never, page as never, timeouts);
    await session.close();
    await session.close();
    await expect(session.waitForClose()).resolves.toBeUndefined();
    expect(ctx.close).toHaveBeenCalledOnce();
  });
});
