import assert from "node:assert/strict";
import test from "node:test";
import { AudioSink } from "../audio/audio-sink.js";
import { AudioSource } from "../audio/audio-source.js";
import { CaptureError, PlaybackError } from "../domain/errors.js";
import type {
  AudioCaptureProvider,
  AudioPlaybackProvider,
  CaptureHandlers,
  PlaybackDevice,
} from "../domain/providers.js";
import type { AudioChunk, AudioFormat, CaptureMode } from "../domain/types.js";
import { makeLogger } from "../logger.js";
import { CommitState } from "../pipeline/commit-state.js";

const inputFormat: AudioFormat = { sampleRateHz: 16000, channels: 1, encoding: "pcm_s16le" };
const outputFormat: AudioFormat = { sampleRateHz: 24000, channels: 1, encoding: "pcm_s16le" };
const logger = makeLogger("error");

class FakeCapture implements AudioCaptureProvider {
  public readonly name = "fake-capture";
  public handlers: CaptureHandlers | undefined;
  public stops = 0;

  public start(_format: AudioFormat, mode: CaptureMode, handlers: CaptureHandlers): void {
    if (mode.kind === "application" && !mode.capabilityToken) {
      throw new Error("no capture permission");
    }
    this.handlers = handlers;
  }

  public async stop(): Promise<void> {
    this.stops += 1;
  }
}

class FakeSpeaker implements AudioPlaybackProvider, PlaybackDevice {
  public readonly name = "fake-speaker";
  public readonly written: Buffer[] = [];
  public failWrites = false;
  public closed = false;

  public open(): PlaybackDevice {
    return this;
  }

  public async write(pcm: Buffer): Promise<void> {
    if (this.failWrites) throw new Error("device unplugged");
    this.written.push(pcm);
  }

  public async close(): Promise<void> {
    this.closed = true;
  }
}

function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

test("AudioSource re-frames provider data into fixed chunks and tracks activity", () => {
  const capture = new FakeCapture();
  const activity = new CommitState();
  let clock = 500;
  const source = new AudioSource({
    provider: capture,
    format: inputFormat,
    mode: { kind: "microphone" },
    chunkSizeBytes: 4,
    logger,
    activity,
    now: () => clock,
  });
  const chunks: AudioChunk[] = [];
  source.onChunk((chunk) => chunks.push(chunk));

  source.start();
  capture.handlers?.onData(Buffer.from([1, 2, 3]));
  assert.equal(chunks.length, 0);

  clock = 600;
  capture.handlers?.onData(Buffer.from([4, 5, 6, 7, 8, 9, 10, 11, 12]));

  assert.deepEqual(chunks, [
    { sequence: 1, timestampMs: 600, payload: Buffer.from([1, 2, 3, 4]) },
    { sequence: 2, timestampMs: 600, payload: Buffer.from([5, 6, 7, 8]) },
    { sequence: 3, timestampMs: 600, payload: Buffer.from([9, 10, 11, 12]) },
  ]);
  assert.equal(activity.snapshot().audioBytesSinceLastCommit, 12);
  assert.equal(activity.snapshot().lastAudioReceivedAt, 600);
});

test("AudioSource chunks never alias the provider's buffer", () => {
  const capture = new FakeCapture();
  const source = new AudioSource({
    provider: capture,
    format: inputFormat,
    mode: { kind: "microphone" },
    chunkSizeBytes: 2,
    logger,
  });
  const chunks: AudioChunk[] = [];
  source.onChunk((chunk) => chunks.push(chunk));
  source.start();

  const reused = Buffer.from([1, 2]);
  capture.handlers?.onData(reused);
  reused.fill(0);

  assert.deepEqual(chunks[0]?.payload, Buffer.from([1, 2]));
});

test("AudioSource start fails with CaptureError when the provider refuses", () => {
  const source = new AudioSource({
    provider: new FakeCapture(),
    format: inputFormat,
    mode: { kind: "application", capabilityToken: "", usages: ["media", "game"] },
    chunkSizeBytes: 3200,
    logger,
  });

  assert.throws(() => source.start(), (error: unknown) => {
    assert.ok(error instanceof CaptureError);
    assert.equal(error.message, "cannot open capture device: no capture permission");
    return true;
  });
  assert.equal(source.isCapturing, false);
});

test("AudioSource forwards provider errors and stops idempotently", async () => {
  const capture = new FakeCapture();
  const source = new AudioSource({
    provider: capture,
    format: inputFormat,
    mode: { kind: "microphone" },
    chunkSizeBytes: 4,
    logger,
  });
  const errors: CaptureError[] = [];
  const chunks: AudioChunk[] = [];
  source.onError((error) => errors.push(error));
  source.onChunk((chunk) => chunks.push(chunk));
  source.start();

  capture.handlers?.onError(new Error("buffer overrun"));
  assert.equal(errors.length, 1);
  assert.equal(errors[0]?.message, "buffer overrun");

  await source.stop();
  await source.stop();
  assert.equal(capture.stops, 1);

  capture.handlers?.onData(Buffer.alloc(8));
  assert.equal(chunks.length, 0);
});

test("AudioSink plays queued chunks in order", async () => {
  const speaker = new FakeSpeaker();
  const sink = new AudioSink({ provider: speaker, format: outputFormat, logger });
  sink.start();

  sink.enqueue(Buffer.from([1]));
  sink.enqueue(Buffer.from([2]));
  sink.enqueue(Buffer.from([3]));
  await flush();

  assert.deepEqual(speaker.written, [Buffer.from([1]), Buffer.from([2]), Buffer.from([3])]);
  assert.equal(sink.playedChunks, 3);
  assert.equal(sink.queuedChunks, 0);

  await sink.stop();
  assert.equal(speaker.closed, true);
  assert.equal(sink.isPlaying, false);
});

test("AudioSink drops audio before start", async () => {
  const speaker = new FakeSpeaker();
  const sink = new AudioSink({ provider: speaker, format: outputFormat, logger });

  sink.enqueue(Buffer.from([1, 2]));
  await flush();

  assert.equal(sink.queuedChunks, 0);
  assert.deepEqual(speaker.written, []);
});

test("AudioSink reports write failures and ends playback", async () => {
  const speaker = new FakeSpeaker();
  speaker.failWrites = true;
  const sink = new AudioSink({ provider: speaker, format: outputFormat, logger });
  const errors: PlaybackError[] = [];
  sink.onError((error) => errors.push(error));
  sink.start();

  sink.enqueue(Buffer.from([1, 2]));
  await flush();

  assert.equal(errors.length, 1);
  assert.equal(errors[0]?.message, "playback device write failed: device unplugged");
  assert.equal(sink.isPlaying, false);

  await sink.stop();
  assert.equal(speaker.closed, true);
});

class StalledSpeaker implements AudioPlaybackProvider, PlaybackDevice {
  public readonly name = "stalled-speaker";
  public writes = 0;
  public closed = false;
  private failPending: ((error: Error) => void) | undefined;

  public open(): PlaybackDevice {
    return this;
  }

  /** Never completes on its own, like a player that stopped reading its pipe. */
  public write(): Promise<void> {
    this.writes += 1;
    return new Promise((_resolve, reject) => {
      this.failPending = reject;
    });
  }

  public async close(): Promise<void> {
    this.closed = true;
    this.failPending?.(new Error("pipe closed"));
  }
}

test("AudioSink stop closes the device even when a write never finishes", async () => {
  const speaker = new StalledSpeaker();
  const sink = new AudioSink({ provider: speaker, format: outputFormat, logger, stopGraceMs: 50 });
  const errors: PlaybackError[] = [];
  sink.onError((error) => errors.push(error));
  sink.start();

  sink.enqueue(Buffer.from([1, 2]));
  sink.enqueue(Buffer.from([3, 4]));
  await flush();
  assert.equal(speaker.writes, 1);
  assert.equal(sink.queuedChunks, 1);

  await sink.stop();
  await flush();

  assert.equal(speaker.closed, true);
  assert.equal(speaker.writes, 1);
  assert.equal(sink.isPlaying, false);
  assert.equal(sink.queuedChunks, 0);
  assert.equal(sink.playedChunks, 0);
  assert.deepEqual(errors, []);
});
