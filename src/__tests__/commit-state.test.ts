import assert from "node:assert/strict";
import test from "node:test";
import { DEFAULT_COMMIT_TUNING } from "../domain/types.js";
import { CommitState } from "../pipeline/commit-state.js";

// 60ms of 16kHz 16-bit mono
const SIXTY_MS_BYTES = 1920;

test("commit takes all buffered audio and counts a pending response", () => {
  const state = new CommitState();
  state.recordAudio(SIXTY_MS_BYTES, 100);

  const decision = state.beginCommitAttempt(200);

  assert.deepEqual(decision, { kind: "commit", audioBytes: SIXTY_MS_BYTES, pending: 1 });
  const snapshot = state.snapshot();
  assert.equal(snapshot.pendingResponseCount, 1);
  assert.equal(snapshot.lastCommitAt, 200);
  assert.equal(snapshot.hasNewAudioSinceLastCommit, false);
  assert.equal(snapshot.audioBytesSinceLastCommit, 0);
});

test("no audio at all is silence", () => {
  const state = new CommitState();
  assert.deepEqual(state.beginCommitAttempt(4000), { kind: "silent", sinceLastAudioMs: undefined });
  assert.equal(state.pendingResponseCount, 0);
});

test("a small amount of stale audio is silence, fresh audio is deferred", () => {
  const state = new CommitState();
  state.recordAudio(800, 1000);

  assert.deepEqual(state.beginCommitAttempt(2000), { kind: "defer", audioBytes: 800 });
  assert.deepEqual(state.beginCommitAttempt(4500), { kind: "silent", sinceLastAudioMs: 3500 });
  // Silence keeps the partial audio; it commits once enough arrives.
  state.recordAudio(800, 4600);
  assert.deepEqual(state.beginCommitAttempt(4700), { kind: "commit", audioBytes: 1600, pending: 1 });
});

test("overload discards buffered audio without committing", () => {
  const state = new CommitState();
  state.recordAudio(SIXTY_MS_BYTES, 0);
  state.beginCommitAttempt(10);
  state.recordAudio(SIXTY_MS_BYTES, 20);
  state.beginCommitAttempt(30);
  assert.equal(state.pendingResponseCount, 2);

  state.recordAudio(SIXTY_MS_BYTES, 40);
  const decision = state.beginCommitAttempt(50);

  assert.deepEqual(decision, { kind: "overloaded", pending: 2, discardedBytes: SIXTY_MS_BYTES });
  assert.equal(state.pendingResponseCount, 2);
  assert.equal(state.snapshot().audioBytesSinceLastCommit, 0);
  assert.equal(state.snapshot().hasNewAudioSinceLastCommit, false);
});

test("slow responses back the interval off by one step", () => {
  const state = new CommitState();
  state.recordAudio(SIXTY_MS_BYTES, 0);
  state.beginCommitAttempt(0);

  const adjustment = state.resolveResponse("completed", 2900);

  assert.deepEqual(adjustment, {
    direction: "increase",
    latencyMs: 2900,
    previousIntervalMs: 2000,
    nextIntervalMs: 2500,
  });
  assert.equal(state.currentCommitIntervalMs, 2500);
  assert.equal(state.pendingResponseCount, 0);
  assert.equal(state.snapshot().lastResponseAt, 2900);
});

test("fast responses tighten the interval by one step", () => {
  const state = new CommitState();
  state.recordAudio(SIXTY_MS_BYTES, 0);
  state.beginCommitAttempt(1000);

  const adjustment = state.resolveResponse("completed", 2200);

  assert.equal(adjustment?.direction, "decrease");
  assert.equal(adjustment?.latencyMs, 1200);
  assert.equal(state.currentCommitIntervalMs, 1500);
});

test("latency inside the tolerance band leaves the interval alone", () => {
  const state = new CommitState();
  state.recordAudio(SIXTY_MS_BYTES, 0);
  state.beginCommitAttempt(0);

  assert.equal(state.resolveResponse("completed", 2400)?.direction, "none");
  assert.equal(state.currentCommitIntervalMs, 2000);
});

test("the interval stays within its bounds", () => {
  const state = new CommitState();
  for (let i = 0; i < 10; i += 1) {
    const t = i * 100_000;
    state.recordAudio(SIXTY_MS_BYTES, t);
    state.beginCommitAttempt(t);
    state.resolveResponse("completed", t + 60_000);
  }
  assert.equal(state.currentCommitIntervalMs, DEFAULT_COMMIT_TUNING.maxCommitIntervalMs);

  for (let i = 0; i < 10; i += 1) {
    const t = 2_000_000 + i * 100_000;
    state.recordAudio(SIXTY_MS_BYTES, t);
    state.beginCommitAttempt(t);
    state.resolveResponse("completed", t + 1);
  }
  assert.equal(state.currentCommitIntervalMs, DEFAULT_COMMIT_TUNING.minCommitIntervalMs);
});

test("failed responses and extra completions never push pending below zero", () => {
  const state = new CommitState();
  assert.equal(state.resolveResponse("failed", 10), undefined);
  assert.equal(state.resolveResponse("completed", 20), undefined);
  assert.equal(state.pendingResponseCount, 0);
  assert.equal(state.currentCommitIntervalMs, 2000);

  state.recordAudio(SIXTY_MS_BYTES, 30);
  state.beginCommitAttempt(40);
  state.abortCommit();
  state.abortCommit();
  assert.equal(state.pendingResponseCount, 0);
});

test("non-positive byte counts are not activity", () => {
  const state = new CommitState();
  state.recordAudio(0, 10);
  state.recordAudio(-5, 20);
  assert.equal(state.snapshot().hasNewAudioSinceLastCommit, false);
  assert.equal(state.snapshot().lastAudioReceivedAt, undefined);
});

test("reset restores the initial interval and clears counters", () => {
  const state = new CommitState({ ...DEFAULT_COMMIT_TUNING, initialCommitIntervalMs: 3000 });
  state.recordAudio(SIXTY_MS_BYTES, 0);
  state.beginCommitAttempt(0);
  state.resolveResponse("completed", 9000);
  assert.equal(state.currentCommitIntervalMs, 3500);

  state.reset();
  assert.deepEqual(state.snapshot(), {
    hasNewAudioSinceLastCommit: false,
    audioBytesSinceLastCommit: 0,
    lastAudioReceivedAt: undefined,
    pendingResponseCount: 0,
    currentCommitIntervalMs: 3000,
    lastCommitAt: undefined,
    lastResponseAt: undefined,
  });
});

test("inconsistent tuning is rejected", () => {
  assert.throws(
    () => new CommitState({ ...DEFAULT_COMMIT_TUNING, minCommitIntervalMs: 6000 }),
    /min interval 6000 exceeds max 5000/,
  );
  assert.throws(
    () => new CommitState({ ...DEFAULT_COMMIT_TUNING, maxPendingResponses: 0 }),
    /maxPendingResponses 0/,
  );
});
