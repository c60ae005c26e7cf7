export { AudioSink, type AudioSinkOptions } from "./audio/audio-sink.js";
export { AudioSource, type AudioSourceOptions } from "./audio/audio-source.js";
export {
  buildCommand,
  DEFAULT_CAPTURE_COMMAND,
  DEFAULT_PLAYBACK_COMMAND,
  ProcessCaptureProvider,
  ProcessPlaybackProvider,
  type DeviceProcess,
  type SpawnProcess,
} from "./audio/process-devices.js";
export { loadConfig, parseCaptureUsages, type AppConfig } from "./config.js";
export * from "./domain/errors.js";
export type * from "./domain/providers.js";
export * from "./domain/types.js";
export {
  DEFAULT_ENGINE_CONFIG,
  TranslationEngine,
  type EngineConfig,
  type EngineState,
  type TranslationEngineDeps,
} from "./engine/translation-engine.js";
export { parseEnvFile, readEnvFile } from "./env-file.js";
export { describeError, makeLogger, type Logger, type LogLevel } from "./logger.js";
export { AdaptiveCommitScheduler, type CommitTarget } from "./pipeline/commit-scheduler.js";
export { CommitState, type CommitDecision, type IntervalAdjustment } from "./pipeline/commit-state.js";
export { buildRealtimeHeaders, buildRealtimeUrl } from "./protocol/endpoint.js";
export { decodeServerMessage, sessionUpdate } from "./protocol/messages.js";
export { RealtimeSession, type RealtimeSessionOptions } from "./session/realtime-session.js";
export { EnvSettingsProvider, StaticSettingsProvider, validateSettings } from "./settings.js";
