import { PlaybackError } from "../domain/errors.js";
import type { AudioPlaybackProvider, PlaybackDevice } from "../domain/providers.js";
import type { AudioFormat } from "../domain/types.js";
import { describeError, type Logger } from "../logger.js";

const STOP_GRACE_MS = 2000;

export type AudioSinkOptions = {
  readonly provider: AudioPlaybackProvider;
  readonly format: AudioFormat;
  readonly logger: Logger;
  /** How long stop() waits for an in-flight device write before closing anyway. */
  readonly stopGraceMs?: number;
};

export type PlaybackErrorListener = (error: PlaybackError) => void;

/** Resolves true when `work` settles in time, false once `timeoutMs` elapses first. */
function settlesWithin(work: Promise<void>, timeoutMs: number): Promise<boolean> {
  return new Promise<boolean>((resolve) => {
    const timer = setTimeout(() => resolve(false), timeoutMs);
    void work.then(() => {
      clearTimeout(timer);
      resolve(true);
    });
  });
}

/**
 * Plays translated speech in arrival order. The queue is unbounded: producers
 * are never held back, pacing comes from the commit scheduler upstream.
 */
export class AudioSink {
  private readonly queue: Buffer[] = [];
  private device: PlaybackDevice | null = null;
  private playing = false;
  private loop: Promise<void> | null = null;
  private wake: (() => void) | null = null;
  private played = 0;
  private readonly errorListeners = new Set<PlaybackErrorListener>();
  private readonly logger: Logger;

  public constructor(private readonly opts: AudioSinkOptions) {
    this.logger = opts.logger.child({ component: "audio-sink", provider: opts.provider.name });
  }

  public get isPlaying(): boolean {
    return this.playing;
  }

  public get queuedChunks(): number {
    return this.queue.length;
  }

  public get playedChunks(): number {
    return this.played;
  }

  public onError(listener: PlaybackErrorListener): () => void {
    this.errorListeners.add(listener);
    return () => this.errorListeners.delete(listener);
  }

  /** Throws PlaybackError when the output device cannot be opened. */
  public start(): void {
    if (this.playing) {
      this.logger.warn("audio playback already active");
      return;
    }
    try {
      this.device = this.opts.provider.open(this.opts.format);
    } catch (error) {
      this.logger.error("failed to start audio playback", { error: describeError(error) });
      throw error instanceof PlaybackError
        ? error
        : new PlaybackError(`cannot open playback device: ${describeError(error)}`, { cause: error });
    }
    this.playing = true;
    this.loop = this.run(this.device);
    this.logger.info("audio playback started", { sampleRateHz: this.opts.format.sampleRateHz });
  }

  public enqueue(chunk: Buffer): void {
    if (!this.playing) {
      this.logger.warn("cannot enqueue audio: playback not started", { bytes: chunk.length });
      return;
    }
    if (chunk.length === 0) return;
    this.queue.push(chunk);
    this.signal();
  }

  public async stop(): Promise<void> {
    const device = this.device;
    const loop = this.loop;
    if (!device && !loop) return;

    this.playing = false;
    this.signal();
    if (loop && !(await settlesWithin(loop, this.opts.stopGraceMs ?? STOP_GRACE_MS))) {
      this.logger.warn("playback device write did not finish, closing device anyway");
    }
    const discarded = this.queue.length;
    this.queue.length = 0;
    this.loop = null;
    this.device = null;

    try {
      await device?.close();
      this.logger.info("audio playback stopped", { played: this.played, discarded });
    } catch (error) {
      this.logger.error("error stopping audio playback", { error: describeError(error) });
    }
  }

  private signal(): void {
    const wake = this.wake;
    this.wake = null;
    wake?.();
  }

  private waitForAudio(): Promise<void> {
    return new Promise((resolve) => {
      this.wake = resolve;
    });
  }

  private async run(device: PlaybackDevice): Promise<void> {
    while (this.playing && this.device === device) {
      const next = this.queue.shift();
      if (!next) {
        await this.waitForAudio();
        continue;
      }
      try {
        await device.write(next);
        this.played += 1;
      } catch (error) {
        if (this.device !== device) {
          this.logger.debug("write failed after playback stopped", { error: describeError(error) });
          return;
        }
        this.playing = false;
        this.reportError(
          new PlaybackError(`playback device write failed: ${describeError(error)}`, { cause: error }),
        );
        return;
      }
    }
  }

  private reportError(error: PlaybackError): void {
    this.logger.error("audio playback error", { error: error.message });
    for (const listener of this.errorListeners) {
      try {
        listener(error);
      } catch (listenerError) {
        this.logger.warn("playback error listener failed", { error: describeError(listenerError) });
      }
    }
  }
}
