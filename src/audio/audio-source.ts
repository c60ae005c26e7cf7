import { CaptureError } from "../domain/errors.js";
import type { AudioCaptureProvider } from "../domain/providers.js";
import type { AudioChunk, AudioFormat, CaptureMode } from "../domain/types.js";
import { describeError, type Logger } from "../logger.js";
import type { AudioActivityTracker } from "../pipeline/commit-state.js";

export type AudioSourceOptions = {
  readonly provider: AudioCaptureProvider;
  readonly format: AudioFormat;
  readonly mode: CaptureMode;
  readonly chunkSizeBytes: number;
  readonly logger: Logger;
  readonly activity?: AudioActivityTracker;
  readonly now?: () => number;
};

export type ChunkListener = (chunk: AudioChunk) => void;
export type CaptureErrorListener = (error: CaptureError) => void;

export class AudioSource {
  private capturing = false;
  private pendingBytes: Buffer[] = [];
  private pendingLength = 0;
  private sequence = 0;
  private readonly chunkListeners = new Set<ChunkListener>();
  private readonly errorListeners = new Set<CaptureErrorListener>();
  private readonly now: () => number;
  private readonly logger: Logger;

  public constructor(private readonly opts: AudioSourceOptions) {
    if (!Number.isInteger(opts.chunkSizeBytes) || opts.chunkSizeBytes <= 0) {
      throw new Error(`Invalid chunkSizeBytes: ${opts.chunkSizeBytes}`);
    }
    this.now = opts.now ?? Date.now;
    this.logger = opts.logger.child({ component: "audio-source", provider: opts.provider.name });
  }

  public get isCapturing(): boolean {
    return this.capturing;
  }

  public get mode(): CaptureMode {
    return this.opts.mode;
  }

  public onChunk(listener: ChunkListener): () => void {
    this.chunkListeners.add(listener);
    return () => this.chunkListeners.delete(listener);
  }

  public onError(listener: CaptureErrorListener): () => void {
    this.errorListeners.add(listener);
    return () => this.errorListeners.delete(listener);
  }

  /** Throws CaptureError when the provider cannot open the device. */
  public start(): void {
    if (this.capturing) {
      this.logger.warn("audio capture already active");
      return;
    }

    this.pendingBytes = [];
    this.pendingLength = 0;
    this.capturing = true;
    try {
      this.opts.provider.start(this.opts.format, this.opts.mode, {
        onData: (data) => this.handleData(data),
        onError: (error) => this.handleError(error),
      });
    } catch (error) {
      this.capturing = false;
      this.logger.error("failed to start audio capture", { error: describeError(error) });
      throw error instanceof CaptureError
        ? error
        : new CaptureError(`cannot open capture device: ${describeError(error)}`, { cause: error });
    }

    this.logger.info("audio capture started", {
      mode: this.opts.mode.kind,
      sampleRateHz: this.opts.format.sampleRateHz,
      channels: this.opts.format.channels,
      chunkSizeBytes: this.opts.chunkSizeBytes,
    });
  }

  public async stop(): Promise<void> {
    if (!this.capturing) return;
    this.capturing = false;
    this.pendingBytes = [];
    this.pendingLength = 0;
    try {
      await this.opts.provider.stop();
      this.logger.info("audio capture stopped", { chunks: this.sequence });
    } catch (error) {
      this.logger.error("error stopping audio capture", { error: describeError(error) });
    }
  }

  private handleData(data: Buffer): void {
    if (!this.capturing || data.length === 0) return;

    this.pendingBytes.push(data);
    this.pendingLength += data.length;
    const size = this.opts.chunkSizeBytes;
    if (this.pendingLength < size) return;

    let joined = Buffer.concat(this.pendingBytes, this.pendingLength);
    while (joined.length >= size) {
      // Copy so the chunk never aliases a buffer the provider may reuse.
      this.deliver(Buffer.from(joined.subarray(0, size)));
      joined = joined.subarray(size);
    }
    this.pendingBytes = joined.length > 0 ? [Buffer.from(joined)] : [];
    this.pendingLength = joined.length;
  }

  private deliver(payload: Buffer): void {
    const timestampMs = this.now();
    this.opts.activity?.recordAudio(payload.length, timestampMs);
    this.sequence += 1;
    const chunk: AudioChunk = { sequence: this.sequence, timestampMs, payload };
    for (const listener of this.chunkListeners) {
      try {
        listener(chunk);
      } catch (error) {
        this.logger.warn("audio chunk listener failed", { error: describeError(error) });
      }
    }
  }

  private handleError(error: Error): void {
    if (!this.capturing) return;
    this.logger.error("audio capture error", { error: error.message });
    const captureError =
      error instanceof CaptureError ? error : new CaptureError(error.message, { cause: error });
    for (const listener of this.errorListeners) {
      try {
        listener(captureError);
      } catch (listenerError) {
        this.logger.warn("capture error listener failed", { error: describeError(listenerError) });
      }
    }
  }
}
