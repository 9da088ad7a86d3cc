// songwhisper types

export type SearchTarget = {
  url: string;
  title: string;
};

export type StageName =
  | "Opened"
  | "ResultsVisible"
  | "ContextSwitch"
  | "InterstitialDismiss"
  | "PlaybackEngage";

export type FailurePolicy = "skip" | "abort";

export type MediaTag = "video" | "audio";

// --- Browser session seam ---
// The sequencer only talks to these interfaces; browser.ts backs them with
// playwright-core and the tests back them with an in-memory fake.

export interface LocatedElement {
  click(): Promise<void>;
}

export interface SessionWindow {
  readonly handle: string;
  url(): string;
  navigate(url: string): Promise<void>;
  /** Single lookup, no waiting for the element to appear. */
  locate(selector: string): Promise<LocatedElement | null>;
  /** Call play() on the first media element of the given tag via a page script. */
  playMedia(tag: MediaTag): Promise<void>;
}

export interface Session {
  activeWindow(): SessionWindow;
  windows(): SessionWindow[];
  activate(window: SessionWindow): Promise<void>;
  close(): Promise<void>;
  /** Resolves when the user closes the browser. */
  waitForClose(): Promise<void>;
}

// --- Sequencer outcome ---

export type StepOutcome = "ok" | "skipped" | "failed" | "fallback";

export type StepReport = {
  name: StageName;
  outcome: StepOutcome;
  detail?: string;
};

export type PlaybackMethod = "control" | "media";

export type SequenceStatus =
  | { kind: "FullSuccess"; playback: PlaybackMethod }
  | { kind: "PartialSuccess"; stageReached: StageName; detail: "PlaybackUnavailable" }
  | { kind: "Aborted"; stage: StageName; reason: string };

export type ActionResult = {
  ok: boolean;
  message?: string;
  data?: unknown;
  error?: string;
  suggestion?: string;
  [key: string]: unknown;
};
