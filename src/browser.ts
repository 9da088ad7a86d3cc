// Browser session management
// Launches Chrome with a persistent profile through playwright-core and exposes
// it to the sequencer as a Session of windows.

import { chromium, type BrowserContext, type Page } from "playwright-core";
import { existsSync } from "node:fs";
import { SongWhisperError, describeInteractionError, errorMessage } from "./errors.js";
import { createLogger } from "./logger.js";
import type { LocatedElement, MediaTag, Session, SessionWindow } from "./types.js";

const log = createLogger("browser");

// --- Constants ---

const NAVIGATION_TIMEOUT_MS = 30_000;
const ACTION_TIMEOUT_MS = 5_000;
const LAUNCH_TIMEOUT_MS = 30_000;
/** How long the page script waits on play() before treating playback as started. */
const PLAY_GRACE_MS = 2_000;

// --- Chrome executable discovery ---

const CHROME_PATHS = [
  "/Applications/Google Chrome.app/Contents/MacOS/Google Chrome",
  "/Applications/Chromium.app/Contents/MacOS/Chromium",
  "/usr/bin/google-chrome",
  "/usr/bin/google-chrome-stable",
  "/usr/bin/chromium-browser",
  "/usr/bin/chromium",
];

export function findChrome(candidates: readonly string[] = CHROME_PATHS): string {
  for (const p of candidates) {
    if (existsSync(p)) return p;
  }
  throw new Error("Chrome/Chromium not found. Set CHROME_PATH or the chrome-path config key.");
}

// --- Launch configuration ---

export interface LaunchOptions {
  userDataDir: string;
  profileDirectory: string;
  executablePath?: string;
  navigationTimeoutMs?: number;
  actionTimeoutMs?: number;
  headless?: boolean;
}

/** Switches Chrome must be started with; none of them can change mid-session. */
export function buildChromeArgs(profileDirectory: string): string[] {
  return [
    `--profile-directory=${profileDirectory}`,
    "--autoplay-policy=no-user-gesture-required",
    "--disable-blink-features=AutomationControlled",
    "--no-first-run",
    "--no-default-browser-check",
    "--hide-crash-restore-bubble",
  ];
}

/** Default switches Playwright adds that would mark the window as automated. */
export const SUPPRESSED_DEFAULT_ARGS = ["--enable-automation"];

// --- Session over a persistent BrowserContext ---

type Timeouts = { navigationMs: number; actionMs: number };

class PageWindow implements SessionWindow {
  constructor(
    readonly page: Page,
    readonly handle: string,
    private readonly timeouts: Timeouts,
  ) {}

  url(): string {
    return this.page.url();
  }

  async navigate(url: string): Promise<void> {
    await this.page.goto(url, { timeout: this.timeouts.navigationMs, waitUntil: "domcontentloaded" });
  }

  async locate(selector: string): Promise<LocatedElement | null> {
    const matches = this.page.locator(selector);
    if ((await matches.count()) === 0) return null;
    const first = matches.first();
    const timeout = this.timeouts.actionMs;
    return {
      async click(): Promise<void> {
        try {
          // One click on the element as found; no actionability wait.
          await first.click({ force: true, timeout });
        } catch (err) {
          throw new SongWhisperError("ElementNotFound", describeInteractionError(err, selector), { cause: err });
        }
      },
    };
  }

  async playMedia(tag: MediaTag): Promise<void> {
    await this.page.evaluate(
      async ({ tag, graceMs }) => {
        const media = document.querySelector<HTMLMediaElement>(tag);
        if (!media) throw new Error(`no <${tag}> element on the page`);
        await Promise.race([
          media.play(),
          new Promise<void>((resolve) => setTimeout(resolve, graceMs)),
        ]);
      },
      { tag, graceMs: PLAY_GRACE_MS },
    );
  }
}

export class BrowserSession implements Session {
  private readonly handles = new WeakMap<Page, PageWindow>();
  private nextHandle = 1;
  private active: Page;
  private closed = false;
  private readonly closedPromise: Promise<void>;

  constructor(
    private readonly context: BrowserContext,
    initial: Page,
    private readonly timeouts: Timeouts,
  ) {
    this.active = initial;
    this.closedPromise = new Promise<void>((resolve) => {
      context.once("close", () => {
        this.closed = true;
        resolve();
      });
    });
  }

  private wrap(page: Page): PageWindow {
    let win = this.handles.get(page);
    if (!win) {
      win = new PageWindow(page, `w${this.nextHandle++}`, this.timeouts);
      this.handles.set(page, win);
    }
    return win;
  }

  activeWindow(): SessionWindow {
    if (this.active.isClosed()) {
      const open = this.context.pages()[0];
      if (!open) throw new Error("All browser windows are closed");
      this.active = open;
    }
    return this.wrap(this.active);
  }

  windows(): SessionWindow[] {
    return this.context.pages().map((p) => this.wrap(p));
  }

  async activate(window: SessionWindow): Promise<void> {
    const page = this.context.pages().find((p) => this.wrap(p).handle === window.handle);
    if (!page) throw new Error(`Window ${window.handle} is not part of this session`);
    await page.bringToFront();
    this.active = page;
  }

  async close(): Promise<void> {
    if (this.closed) return;
    await this.context.close();
  }

  waitForClose(): Promise<void> {
    return this.closedPromise;
  }
}

// --- Launch ---

export async function launchSession(opts: LaunchOptions): Promise<BrowserSession> {
  let executablePath: string;
  try {
    executablePath = opts.executablePath || process.env.CHROME_PATH || findChrome();
  } catch (err) {
    throw new SongWhisperError("LaunchFailed", errorMessage(err), { cause: err });
  }

  let context: BrowserContext;
  try {
    context = await chromium.launchPersistentContext(opts.userDataDir, {
      executablePath,
      headless: opts.headless ?? false,
      args: buildChromeArgs(opts.profileDirectory),
      ignoreDefaultArgs: SUPPRESSED_DEFAULT_ARGS,
      viewport: null,
      timeout: LAUNCH_TIMEOUT_MS,
    });
  } catch (err) {
    throw new SongWhisperError("LaunchFailed", `Chrome failed to launch: ${errorMessage(err)}`, { cause: err });
  }

  try {
    const initial = context.pages()[0] ?? (await context.newPage());
    log.info("Chrome started", { executablePath, userDataDir: opts.userDataDir });
    return new BrowserSession(context, initial, {
      navigationMs: opts.navigationTimeoutMs ?? NAVIGATION_TIMEOUT_MS,
      actionMs: opts.actionTimeoutMs ?? ACTION_TIMEOUT_MS,
    });
  } catch (err) {
    await context.close().catch(() => {});
    throw new SongWhisperError("LaunchFailed", `Chrome started without a window: ${errorMessage(err)}`, { cause: err });
  }
}
