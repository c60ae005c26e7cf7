export type PcmEncoding = "pcm_s16le";

export interface AudioFormat {
  readonly sampleRateHz: number;
  readonly channels: number;
  readonly encoding: PcmEncoding;
}

export interface AudioChunk {
  readonly sequence: number;
  readonly timestampMs: number;
  readonly payload: Buffer;
}

/** Playback categories application capture may pick up; system and UI sounds are never wanted. */
export const CAPTURE_USAGES = ["media", "game"] as const;

export type CaptureUsage = (typeof CAPTURE_USAGES)[number];

export function isCaptureUsage(value: string): value is CaptureUsage {
  return CAPTURE_USAGES.some((usage) => usage === value);
}

export type CaptureMode =
  | { readonly kind: "microphone"; readonly device?: string }
  | {
      readonly kind: "application";
      /** Grants access to other applications' playback (a monitor device name for process capture). */
      readonly capabilityToken: string;
      readonly usages: readonly CaptureUsage[];
    };

export interface SessionConfig {
  readonly sampleRateHz: number;
  readonly channels: number;
  readonly bufferSizeBytes: number;
  /** null lets the remote detect the spoken language. */
  readonly sourceLanguage: string | null;
  readonly targetLanguage: string;
  readonly maxResponseOutputTokens: number;
  readonly temperature: number;
  readonly voice: string;
  readonly transcriptionModel: string;
}

export type SessionState =
  | "idle"
  | "connecting"
  | "configuring"
  | "active"
  | "stopping"
  | "closed"
  | "failed";

export type RemoteSessionAck = "session.created" | "session.updated";

export interface RateLimit {
  readonly name: string;
  readonly limit: number;
  readonly remaining: number;
  readonly resetSeconds: number;
}

export type TranslationEvent =
  | { readonly type: "text.delta"; readonly text: string }
  | { readonly type: "audio.delta"; readonly audio: Buffer }
  | { readonly type: "input.transcript"; readonly text: string }
  | { readonly type: "response.completed"; readonly latencyMs: number }
  | { readonly type: "protocol.error"; readonly code: string; readonly message: string }
  | { readonly type: "session.lifecycle"; readonly state: SessionState | RemoteSessionAck }
  | { readonly type: "rate_limits"; readonly limits: readonly RateLimit[] };

export interface CommitTuning {
  readonly initialCommitIntervalMs: number;
  readonly minCommitIntervalMs: number;
  readonly maxCommitIntervalMs: number;
  readonly maxPendingResponses: number;
  readonly minAudioBytesForCommit: number;
  readonly audioSilenceThresholdMs: number;
  readonly intervalAdjustmentMs: number;
}

export const DEFAULT_COMMIT_TUNING: CommitTuning = {
  initialCommitIntervalMs: 2000,
  minCommitIntervalMs: 1000,
  maxCommitIntervalMs: 5000,
  maxPendingResponses: 2,
  // ~50ms of 16kHz 16-bit mono
  minAudioBytesForCommit: 1600,
  audioSilenceThresholdMs: 3000,
  intervalAdjustmentMs: 500,
};

export interface EngineStats {
  readonly commits: number;
  readonly silentSkips: number;
  readonly overloadSkips: number;
  readonly deferrals: number;
  readonly responsesCompleted: number;
  readonly responsesFailed: number;
  readonly chunksCaptured: number;
  readonly chunksPlayed: number;
  readonly pendingResponses: number;
  readonly currentCommitIntervalMs: number;
  readonly lastLatencyMs?: number;
}
