import { isLogLevel, type LogLevel } from "./logger.js";
import {
  CAPTURE_USAGES,
  DEFAULT_COMMIT_TUNING,
  isCaptureUsage,
  type CaptureUsage,
  type CommitTuning,
} from "./domain/types.js";

export type CaptureModeName = "microphone" | "application";

export interface AppConfig {
  readonly logLevel: LogLevel;
  readonly connectTimeoutMs: number;
  readonly inputSampleRateHz: number;
  readonly inputChannels: number;
  readonly bufferSizeBytes: number;
  readonly outputSampleRateHz: number;
  readonly commit: CommitTuning;
  readonly maxResponseOutputTokens: number;
  readonly temperature: number;
  readonly voice: string;
  readonly transcriptionModel: string;
  readonly captureMode: CaptureModeName;
  readonly captureDevice?: string;
  readonly captureUsages: readonly CaptureUsage[];
  readonly captureCommand?: string;
  readonly playbackCommand?: string;
}

/** Parses a comma-separated usage list such as "media,game"; throws `Invalid <label>: <raw>`. */
export function parseCaptureUsages(raw: string, label: string): CaptureUsage[] {
  const usages: CaptureUsage[] = [];
  for (const part of raw.split(",")) {
    const value = part.trim();
    if (!isCaptureUsage(value)) {
      throw new Error(`Invalid ${label}: ${raw} (expected ${CAPTURE_USAGES.join(", ")})`);
    }
    if (!usages.includes(value)) usages.push(value);
  }
  return usages;
}

function readNumber(
  env: NodeJS.ProcessEnv,
  name: string,
  fallback: number,
  isValid: (value: number) => boolean,
): number {
  const raw = env[name];
  const value = Number(raw ?? String(fallback));
  if (!Number.isFinite(value) || !isValid(value)) {
    throw new Error(`Invalid ${name}: ${raw}`);
  }
  return value;
}

const positiveInt = (value: number): boolean => Number.isInteger(value) && value > 0;

export function loadConfig(env: NodeJS.ProcessEnv): AppConfig {
  const logLevel = env.LOG_LEVEL ?? "info";
  if (!isLogLevel(logLevel)) {
    throw new Error(`Invalid LOG_LEVEL: ${env.LOG_LEVEL}`);
  }

  const connectTimeoutMs = readNumber(env, "REALTIME_CONNECT_TIMEOUT_MS", 30_000, (v) => v >= 100);
  const inputSampleRateHz = readNumber(env, "AUDIO_SAMPLE_RATE_HZ", 16_000, positiveInt);
  const inputChannels = readNumber(env, "AUDIO_CHANNELS", 1, positiveInt);
  const bufferSizeBytes = readNumber(env, "AUDIO_BUFFER_SIZE_BYTES", 3200, positiveInt);
  if (bufferSizeBytes % (2 * inputChannels) !== 0) {
    throw new Error(`Invalid AUDIO_BUFFER_SIZE_BYTES: ${bufferSizeBytes} is not whole 16-bit frames`);
  }
  const outputSampleRateHz = readNumber(env, "OUTPUT_SAMPLE_RATE_HZ", 24_000, positiveInt);

  const minCommitIntervalMs = readNumber(
    env,
    "COMMIT_MIN_INTERVAL_MS",
    DEFAULT_COMMIT_TUNING.minCommitIntervalMs,
    positiveInt,
  );
  const maxCommitIntervalMs = readNumber(
    env,
    "COMMIT_MAX_INTERVAL_MS",
    DEFAULT_COMMIT_TUNING.maxCommitIntervalMs,
    (v) => positiveInt(v) && v >= minCommitIntervalMs,
  );
  const initialCommitIntervalMs = readNumber(
    env,
    "COMMIT_INITIAL_INTERVAL_MS",
    Math.min(
      Math.max(DEFAULT_COMMIT_TUNING.initialCommitIntervalMs, minCommitIntervalMs),
      maxCommitIntervalMs,
    ),
    (v) => v >= minCommitIntervalMs && v <= maxCommitIntervalMs,
  );
  const commit: CommitTuning = {
    initialCommitIntervalMs,
    minCommitIntervalMs,
    maxCommitIntervalMs,
    maxPendingResponses: readNumber(
      env,
      "COMMIT_MAX_PENDING_RESPONSES",
      DEFAULT_COMMIT_TUNING.maxPendingResponses,
      positiveInt,
    ),
    minAudioBytesForCommit: readNumber(
      env,
      "COMMIT_MIN_AUDIO_BYTES",
      DEFAULT_COMMIT_TUNING.minAudioBytesForCommit,
      positiveInt,
    ),
    audioSilenceThresholdMs: readNumber(
      env,
      "COMMIT_SILENCE_THRESHOLD_MS",
      DEFAULT_COMMIT_TUNING.audioSilenceThresholdMs,
      positiveInt,
    ),
    intervalAdjustmentMs: readNumber(
      env,
      "COMMIT_INTERVAL_STEP_MS",
      DEFAULT_COMMIT_TUNING.intervalAdjustmentMs,
      positiveInt,
    ),
  };

  const maxResponseOutputTokens = readNumber(env, "RESPONSE_MAX_OUTPUT_TOKENS", 150, positiveInt);
  const temperature = readNumber(env, "RESPONSE_TEMPERATURE", 0.7, (v) => v >= 0 && v <= 2);

  const captureMode = env.CAPTURE_MODE ?? "microphone";
  if (captureMode !== "microphone" && captureMode !== "application") {
    throw new Error(`Invalid CAPTURE_MODE: ${env.CAPTURE_MODE}`);
  }

  return {
    logLevel,
    connectTimeoutMs,
    inputSampleRateHz,
    inputChannels,
    bufferSizeBytes,
    outputSampleRateHz,
    commit,
    maxResponseOutputTokens,
    temperature,
    voice: env.REALTIME_VOICE ?? "alloy",
    transcriptionModel: env.TRANSCRIPTION_MODEL ?? "whisper-1",
    captureMode,
    captureDevice: env.CAPTURE_DEVICE,
    captureUsages: parseCaptureUsages(env.CAPTURE_USAGES ?? CAPTURE_USAGES.join(","), "CAPTURE_USAGES"),
    captureCommand: env.CAPTURE_COMMAND,
    playbackCommand: env.PLAYBACK_COMMAND,
  };
}
