// sequencer.ts — Runs navigation steps in order against a browser session
// One pass, no retries: a failed "abort" step ends the run, a failed "skip"
// step is logged and the next step runs anyway.

import { errorMessage } from "./errors.js";
import { createLogger, type Logger } from "./logger.js";
import type {
  FailurePolicy,
  PlaybackMethod,
  SearchTarget,
  SequenceStatus,
  Session,
  StageName,
  StepOutcome,
  StepReport,
} from "./types.js";

export interface StepContext {
  session: Session;
  target: SearchTarget;
  log: Logger;
  /** Set by the playback step once play() has been triggered. */
  playback?: PlaybackMethod;
}

export type StepRun = {
  outcome: Exclude<StepOutcome, "failed">;
  detail?: string;
};

export interface NavigationStep {
  name: StageName;
  onFailure: FailurePolicy;
  /** Fixed wait after the step, unless the run aborts on it. */
  settleMs: number;
  /** Close the session when this step aborts the run. */
  teardownOnAbort?: boolean;
  /** One locate followed by one act. Throwing marks the step failed. */
  run(ctx: StepContext): Promise<StepRun>;
}

export interface SequenceResult {
  session: Session;
  status: SequenceStatus;
  steps: StepReport[];
}

export type Sleep = (ms: number) => Promise<void>;

export const realSleep: Sleep = (ms) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export interface SequencerOptions {
  sleep?: Sleep;
  log?: Logger;
}

export async function runSequence(
  session: Session,
  target: SearchTarget,
  steps: readonly NavigationStep[],
  opts: SequencerOptions = {},
): Promise<SequenceResult> {
  const sleep = opts.sleep ?? realSleep;
  const log = opts.log ?? createLogger("sequencer");
  const ctx: StepContext = { session, target, log };
  const reports: StepReport[] = [];
  let stageReached: StageName | null = null;

  for (const step of steps) {
    log.debug(`step ${step.name} started`, { policy: step.onFailure });
    try {
      const run = await step.run(ctx);
      reports.push({ name: step.name, outcome: run.outcome, ...(run.detail ? { detail: run.detail } : {}) });
      stageReached = step.name;
      log.info(`step ${step.name}: ${run.outcome}`, run.detail ? { detail: run.detail } : undefined);
    } catch (err) {
      const reason = errorMessage(err);
      reports.push({ name: step.name, outcome: "failed", detail: reason });

      if (step.onFailure === "abort") {
        log.error(`step ${step.name} failed, aborting`, { reason });
        if (step.teardownOnAbort) {
          await session.close().catch((closeErr: unknown) => {
            log.warn("session teardown failed", { reason: errorMessage(closeErr) });
          });
        }
        return { session, status: { kind: "Aborted", stage: step.name, reason }, steps: reports };
      }
      log.warn(`step ${step.name} failed, skipping`, { reason });
    }

    if (step.settleMs > 0) {
      log.debug(`settling ${step.settleMs}ms after ${step.name}`);
      await sleep(step.settleMs);
    }
  }

  if (ctx.playback) {
    return { session, status: { kind: "FullSuccess", playback: ctx.playback }, steps: reports };
  }
  return {
    session,
    status: {
      kind: "PartialSuccess",
      stageReached: stageReached ?? "Opened",
      detail: "PlaybackUnavailable",
    },
    steps: reports,
  };
}

export function describeStatus(status: SequenceStatus): string {
  switch (status.kind) {
    case "FullSuccess":
      return status.playback === "control"
        ? "Playing (player control clicked)"
        : "Playing (media element started)";
    case "PartialSuccess":
      return `Page open at ${status.stageReached}, playback unavailable`;
    case "Aborted":
      return `Aborted at ${status.stage}: ${status.reason}`;
  }
}
