import type { AudioFormat, CaptureMode } from "./types.js";

export interface CaptureHandlers {
  readonly onData: (data: Buffer) => void;
  readonly onError: (error: Error) => void;
}

/**
 * Platform audio input. `start` throws when the device cannot be opened at all
 * (missing permission or capability); later failures go to `onError`.
 */
export interface AudioCaptureProvider {
  readonly name: string;
  start(format: AudioFormat, mode: CaptureMode, handlers: CaptureHandlers): void;
  stop(): Promise<void>;
}

export interface PlaybackDevice {
  /** Resolves once the device accepted the bytes. */
  write(pcm: Buffer): Promise<void>;
  close(): Promise<void>;
}

export interface AudioPlaybackProvider {
  readonly name: string;
  open(format: AudioFormat): PlaybackDevice;
}

export interface TranslationSettings {
  readonly endpoint?: string;
  readonly apiKey?: string;
  readonly deployment?: string;
  readonly apiVersion?: string;
  readonly targetLanguage?: string;
  readonly sourceLanguage?: string;
}

export interface SettingsProvider {
  load(): TranslationSettings;
}
