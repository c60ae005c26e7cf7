import { setTimeout as delay } from "node:timers/promises";
import type { TranslationEvent } from "../domain/types.js";
import { describeError, type Logger } from "../logger.js";
import type { CommitDecision, CommitState, IntervalAdjustment } from "./commit-state.js";

/** The slice of the streaming session the scheduler drives. */
export interface CommitTarget {
  readonly isOpen: boolean;
  commit(): void;
  requestResponse(): void;
  clearInputBuffer(): void;
}

export type TickOutcome = CommitDecision | { readonly kind: "disconnected" };

export type SchedulerCounters = {
  commits: number;
  silentSkips: number;
  overloadSkips: number;
  deferrals: number;
  responsesCompleted: number;
  responsesFailed: number;
  lastLatencyMs?: number;
};

export type SchedulerDeps = {
  readonly state: CommitState;
  readonly target: CommitTarget;
  readonly logger: Logger;
  readonly now?: () => number;
  readonly sleep?: (ms: number, signal: AbortSignal) => Promise<void>;
};

const defaultSleep = (ms: number, signal: AbortSignal): Promise<void> => delay(ms, undefined, { signal });

/**
 * Paces commits against observed response latency. The loop sleeps for the
 * current interval, runs one tick, then re-reads the interval, so a tick never
 * overlaps the next one.
 */
export class AdaptiveCommitScheduler {
  private abort: AbortController | null = null;
  private loop: Promise<void> | null = null;
  private readonly counters: SchedulerCounters = {
    commits: 0,
    silentSkips: 0,
    overloadSkips: 0,
    deferrals: 0,
    responsesCompleted: 0,
    responsesFailed: 0,
  };
  private readonly now: () => number;
  private readonly sleep: (ms: number, signal: AbortSignal) => Promise<void>;
  private readonly logger: Logger;

  public constructor(private readonly deps: SchedulerDeps) {
    this.now = deps.now ?? Date.now;
    this.sleep = deps.sleep ?? defaultSleep;
    this.logger = deps.logger.child({ component: "commit-scheduler" });
  }

  public get isRunning(): boolean {
    return this.loop !== null;
  }

  public get stats(): Readonly<SchedulerCounters> {
    return { ...this.counters };
  }

  public start(): void {
    if (this.loop) {
      this.logger.warn("commit scheduler already running");
      return;
    }
    const abort = new AbortController();
    this.abort = abort;
    this.loop = this.run(abort.signal);
    this.logger.info("commit scheduler started", {
      intervalMs: this.deps.state.currentCommitIntervalMs,
    });
  }

  public async stop(): Promise<void> {
    const loop = this.loop;
    if (!loop) return;
    this.abort?.abort();
    await loop;
    this.loop = null;
    this.abort = null;
    this.logger.info("commit scheduler stopped", { ...this.counters });
  }

  public tick(): TickOutcome {
    const { state, target } = this.deps;
    if (!target.isOpen) {
      return { kind: "disconnected" };
    }

    const decision = state.beginCommitAttempt(this.now());
    switch (decision.kind) {
      case "overloaded":
        this.counters.overloadSkips += 1;
        this.logger.warn("skipping commit: responses pending", {
          pending: decision.pending,
          max: state.tuning.maxPendingResponses,
          discardedBytes: decision.discardedBytes,
        });
        this.send("clear", () => target.clearInputBuffer());
        break;

      case "commit": {
        const sent = this.send("commit", () => {
          target.commit();
          target.requestResponse();
        });
        if (!sent) {
          state.abortCommit();
          break;
        }
        this.counters.commits += 1;
        this.logger.debug("committed audio and requested response", {
          audioBytes: decision.audioBytes,
          pending: decision.pending,
        });
        break;
      }

      case "silent":
        this.counters.silentSkips += 1;
        this.logger.debug("skipping commit: no audio activity", {
          sinceLastAudioMs: decision.sinceLastAudioMs,
        });
        break;

      case "defer":
        this.counters.deferrals += 1;
        break;
    }
    return decision;
  }

  /** Response feedback from the session; other event types are ignored. */
  public handleEvent(event: TranslationEvent): IntervalAdjustment | undefined {
    if (event.type === "response.completed") {
      return this.onResponseCompleted();
    }
    if (event.type === "protocol.error") {
      this.onResponseFailed();
    }
    return undefined;
  }

  public onResponseCompleted(): IntervalAdjustment | undefined {
    const { state } = this.deps;
    this.counters.responsesCompleted += 1;
    const adjustment = state.resolveResponse("completed", this.now());
    if (!adjustment) return undefined;

    this.counters.lastLatencyMs = adjustment.latencyMs;
    const ctx = {
      latencyMs: adjustment.latencyMs,
      pending: state.pendingResponseCount,
      intervalMs: adjustment.nextIntervalMs,
    };
    if (adjustment.nextIntervalMs > adjustment.previousIntervalMs) {
      this.logger.warn("increased commit interval", ctx);
    } else if (adjustment.nextIntervalMs < adjustment.previousIntervalMs) {
      this.logger.info("decreased commit interval", ctx);
    } else {
      this.logger.info("translation completed", ctx);
    }
    return adjustment;
  }

  public onResponseFailed(): void {
    this.counters.responsesFailed += 1;
    this.deps.state.resolveResponse("failed", this.now());
  }

  private send(label: string, action: () => void): boolean {
    try {
      action();
      return true;
    } catch (error) {
      this.logger.error("commit scheduler send failed", { action: label, error: describeError(error) });
      return false;
    }
  }

  private async run(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      try {
        await this.sleep(this.deps.state.currentCommitIntervalMs, signal);
      } catch (error) {
        if (!signal.aborted) {
          this.logger.error("commit scheduler halted", { error: describeError(error) });
        }
        return;
      }
      if (signal.aborted) return;
      try {
        this.tick();
      } catch (error) {
        this.logger.error("commit tick failed", { error: describeError(error) });
      }
    }
  }
}
