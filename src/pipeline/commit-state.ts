import { DEFAULT_COMMIT_TUNING, type CommitTuning } from "../domain/types.js";

export type CommitDecision =
  | { readonly kind: "commit"; readonly audioBytes: number; readonly pending: number }
  | { readonly kind: "overloaded"; readonly pending: number; readonly discardedBytes: number }
  | { readonly kind: "silent"; readonly sinceLastAudioMs: number | undefined }
  | { readonly kind: "defer"; readonly audioBytes: number };

export type ResponseOutcome = "completed" | "failed";

export type IntervalAdjustment = {
  readonly direction: "increase" | "decrease" | "none";
  readonly latencyMs: number;
  readonly previousIntervalMs: number;
  readonly nextIntervalMs: number;
};

export type CommitSnapshot = {
  readonly hasNewAudioSinceLastCommit: boolean;
  readonly audioBytesSinceLastCommit: number;
  readonly lastAudioReceivedAt: number | undefined;
  readonly pendingResponseCount: number;
  readonly currentCommitIntervalMs: number;
  readonly lastCommitAt: number | undefined;
  readonly lastResponseAt: number | undefined;
};

export interface AudioActivityTracker {
  recordAudio(bytes: number, nowMs: number): void;
}

function validateTuning(tuning: CommitTuning): void {
  if (tuning.minCommitIntervalMs > tuning.maxCommitIntervalMs) {
    throw new Error(
      `Invalid commit tuning: min interval ${tuning.minCommitIntervalMs} exceeds max ${tuning.maxCommitIntervalMs}`,
    );
  }
  if (tuning.maxPendingResponses < 1) {
    throw new Error(`Invalid commit tuning: maxPendingResponses ${tuning.maxPendingResponses}`);
  }
}

/**
 * Shared state of the commit loop. Capture, scheduler and response handling
 * only touch it through these methods; each runs to completion without
 * yielding, so no caller ever observes a half-applied update.
 */
export class CommitState implements AudioActivityTracker {
  private hasNewAudio = false;
  private audioBytes = 0;
  private lastAudioAt: number | undefined;
  private pending = 0;
  private intervalMs: number;
  private lastCommitAt: number | undefined;
  private lastResponseAt: number | undefined;

  public constructor(public readonly tuning: CommitTuning = DEFAULT_COMMIT_TUNING) {
    validateTuning(tuning);
    this.intervalMs = this.clampInterval(tuning.initialCommitIntervalMs);
  }

  public get currentCommitIntervalMs(): number {
    return this.intervalMs;
  }

  public get pendingResponseCount(): number {
    return this.pending;
  }

  public recordAudio(bytes: number, nowMs: number): void {
    if (bytes <= 0) return;
    this.hasNewAudio = true;
    this.audioBytes += bytes;
    this.lastAudioAt = nowMs;
  }

  /**
   * Decides what this tick does and applies the bookkeeping for that decision.
   * A "commit" counts as pending immediately; undo it with abortCommit if the
   * send fails.
   */
  public beginCommitAttempt(nowMs: number): CommitDecision {
    const t = this.tuning;

    if (this.pending >= t.maxPendingResponses) {
      const discardedBytes = this.audioBytes;
      this.resetActivity();
      return { kind: "overloaded", pending: this.pending, discardedBytes };
    }

    if (this.hasNewAudio && this.audioBytes >= t.minAudioBytesForCommit) {
      const audioBytes = this.audioBytes;
      this.pending += 1;
      this.lastCommitAt = nowMs;
      this.resetActivity();
      return { kind: "commit", audioBytes, pending: this.pending };
    }

    const sinceLastAudioMs = this.lastAudioAt === undefined ? undefined : nowMs - this.lastAudioAt;
    if (
      !this.hasNewAudio ||
      sinceLastAudioMs === undefined ||
      sinceLastAudioMs > t.audioSilenceThresholdMs
    ) {
      return { kind: "silent", sinceLastAudioMs };
    }

    return { kind: "defer", audioBytes: this.audioBytes };
  }

  public abortCommit(): void {
    this.pending = Math.max(0, this.pending - 1);
  }

  /**
   * Settles one outstanding response. Only completed responses feed the
   * latency controller; failures just release the pending slot.
   */
  public resolveResponse(outcome: ResponseOutcome, nowMs: number): IntervalAdjustment | undefined {
    this.pending = Math.max(0, this.pending - 1);
    if (outcome === "failed") return undefined;

    this.lastResponseAt = nowMs;
    if (this.lastCommitAt === undefined) return undefined;
    return this.adjustInterval(this.lastResponseAt - this.lastCommitAt);
  }

  public reset(): void {
    this.resetActivity();
    this.lastAudioAt = undefined;
    this.pending = 0;
    this.intervalMs = this.clampInterval(this.tuning.initialCommitIntervalMs);
    this.lastCommitAt = undefined;
    this.lastResponseAt = undefined;
  }

  public snapshot(): CommitSnapshot {
    return {
      hasNewAudioSinceLastCommit: this.hasNewAudio,
      audioBytesSinceLastCommit: this.audioBytes,
      lastAudioReceivedAt: this.lastAudioAt,
      pendingResponseCount: this.pending,
      currentCommitIntervalMs: this.intervalMs,
      lastCommitAt: this.lastCommitAt,
      lastResponseAt: this.lastResponseAt,
    };
  }

  private adjustInterval(latencyMs: number): IntervalAdjustment {
    const t = this.tuning;
    const previousIntervalMs = this.intervalMs;
    let direction: IntervalAdjustment["direction"] = "none";

    if (latencyMs > previousIntervalMs * 1.2) {
      this.intervalMs = this.clampInterval(previousIntervalMs + t.intervalAdjustmentMs);
      direction = "increase";
    } else if (latencyMs < previousIntervalMs * 0.8) {
      this.intervalMs = this.clampInterval(previousIntervalMs - t.intervalAdjustmentMs);
      direction = "decrease";
    }

    return { direction, latencyMs, previousIntervalMs, nextIntervalMs: this.intervalMs };
  }

  private clampInterval(value: number): number {
    return Math.min(this.tuning.maxCommitIntervalMs, Math.max(this.tuning.minCommitIntervalMs, value));
  }

  private resetActivity(): void {
    this.hasNewAudio = false;
    this.audioBytes = 0;
  }
}
