import { AudioSink } from "../audio/audio-sink.js";
import { AudioSource } from "../audio/audio-source.js";
import type { AppConfig } from "../config.js";
import {
  ConfigurationError,
  ConnectionError,
  EngineError,
  ProtocolError,
  toError,
} from "../domain/errors.js";
import type {
  AudioCaptureProvider,
  AudioPlaybackProvider,
  SettingsProvider,
  TranslationSettings,
} from "../domain/providers.js";
import {
  DEFAULT_COMMIT_TUNING,
  type AudioChunk,
  type CaptureMode,
  type EngineStats,
  type SessionConfig,
  type TranslationEvent,
} from "../domain/types.js";
import { describeError, type Logger } from "../logger.js";
import { AdaptiveCommitScheduler, type SchedulerCounters } from "../pipeline/commit-scheduler.js";
import { CommitState } from "../pipeline/commit-state.js";
import { DEFAULT_CONNECT_TIMEOUT_MS, RealtimeSession, type WebSocketFactory } from "../session/realtime-session.js";
import { DEFAULT_API_VERSION, DEFAULT_TARGET_LANGUAGE, validateSettings } from "../settings.js";

export type EngineConfig = Pick<
  AppConfig,
  | "connectTimeoutMs"
  | "inputSampleRateHz"
  | "inputChannels"
  | "bufferSizeBytes"
  | "outputSampleRateHz"
  | "commit"
  | "maxResponseOutputTokens"
  | "temperature"
  | "voice"
  | "transcriptionModel"
>;

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  connectTimeoutMs: DEFAULT_CONNECT_TIMEOUT_MS,
  inputSampleRateHz: 16_000,
  inputChannels: 1,
  bufferSizeBytes: 3200,
  outputSampleRateHz: 24_000,
  commit: DEFAULT_COMMIT_TUNING,
  maxResponseOutputTokens: 150,
  temperature: 0.7,
  voice: "alloy",
  transcriptionModel: "whisper-1",
};

export type EngineState = "idle" | "starting" | "active" | "stopping";

export type TranslationEngineDeps = {
  readonly logger: Logger;
  readonly settings: SettingsProvider;
  readonly capture: AudioCaptureProvider;
  readonly playback: AudioPlaybackProvider;
  readonly captureMode: CaptureMode;
  readonly config?: Partial<EngineConfig>;
  readonly now?: () => number;
  readonly sleep?: (ms: number, signal: AbortSignal) => Promise<void>;
  readonly wsFactory?: WebSocketFactory;
};

export type TextListener = (text: string) => void;
export type AudioListener = (audio: Buffer) => void;
export type EngineErrorListener = (error: EngineError) => void;
export type CompletionListener = (latencyMs: number) => void;

/** Everything that lives exactly as long as one translation run. */
type Run = {
  readonly session: RealtimeSession;
  readonly commitState: CommitState;
  readonly scheduler: AdaptiveCommitScheduler;
  readonly source: AudioSource;
  readonly sink: AudioSink;
  readonly unsubscribe: Array<() => void>;
};

const EMPTY_COUNTERS: SchedulerCounters = {
  commits: 0,
  silentSkips: 0,
  overloadSkips: 0,
  deferrals: 0,
  responsesCompleted: 0,
  responsesFailed: 0,
};

function emit<T>(listeners: Set<(value: T) => void>, value: T, logger: Logger, label: string): void {
  for (const listener of listeners) {
    try {
      listener(value);
    } catch (error) {
      logger.warn("engine listener failed", { listener: label, error: describeError(error) });
    }
  }
}

/**
 * Captures speech, streams it to the realtime service and plays back the
 * translation. One engine runs at most one session at a time.
 */
export class TranslationEngine {
  private stateValue: EngineState = "idle";
  private settings: TranslationSettings = {};
  private problems: string[] = [];
  private run: Run | null = null;
  private stopRequested = false;
  private starting: Promise<void> | null = null;
  private stopping: Promise<void> | null = null;
  private chunksCaptured = 0;
  private lastStats: EngineStats | null = null;
  private readonly config: EngineConfig;
  private readonly textListeners = new Set<TextListener>();
  private readonly audioListeners = new Set<AudioListener>();
  private readonly errorListeners = new Set<EngineErrorListener>();
  private readonly transcriptListeners = new Set<TextListener>();
  private readonly completionListeners = new Set<CompletionListener>();
  private readonly logger: Logger;

  public constructor(private readonly deps: TranslationEngineDeps) {
    this.config = { ...DEFAULT_ENGINE_CONFIG, ...deps.config };
    this.logger = deps.logger.child({ component: "translation-engine" });
    this.loadSettings();
  }

  public get state(): EngineState {
    return this.stateValue;
  }

  public get isActive(): boolean {
    return this.stateValue === "active";
  }

  public get isConfigured(): boolean {
    return this.problems.length === 0;
  }

  public get configurationProblems(): readonly string[] {
    return [...this.problems];
  }

  public onTranslatedText(listener: TextListener): () => void {
    this.textListeners.add(listener);
    return () => this.textListeners.delete(listener);
  }

  public onTranslatedAudio(listener: AudioListener): () => void {
    this.audioListeners.add(listener);
    return () => this.audioListeners.delete(listener);
  }

  public onError(listener: EngineErrorListener): () => void {
    this.errorListeners.add(listener);
    return () => this.errorListeners.delete(listener);
  }

  public onInputTranscript(listener: TextListener): () => void {
    this.transcriptListeners.add(listener);
    return () => this.transcriptListeners.delete(listener);
  }

  public onResponseCompleted(listener: CompletionListener): () => void {
    this.completionListeners.add(listener);
    return () => this.completionListeners.delete(listener);
  }

  /** Reloads settings; a running session keeps the settings it started with. */
  public reinitialize(): void {
    this.logger.info("reinitializing translation settings");
    this.loadSettings();
    if (this.stateValue !== "idle") {
      this.logger.info("settings apply from the next start", { state: this.stateValue });
    }
  }

  public async start(sourceLanguage?: string | null, targetLanguage?: string): Promise<void> {
    if (this.stateValue !== "idle") {
      this.logger.warn("translation engine already active", { state: this.stateValue });
      return;
    }
    if (!this.isConfigured) {
      this.logger.warn("translation engine not configured", { problems: this.problems });
      throw new ConfigurationError(this.problems);
    }

    const sessionConfig = this.buildSessionConfig(sourceLanguage, targetLanguage);
    this.stateValue = "starting";
    this.stopRequested = false;
    this.chunksCaptured = 0;
    this.logger.info("starting translation", {
      sourceLanguage: sessionConfig.sourceLanguage ?? "auto",
      targetLanguage: sessionConfig.targetLanguage,
      captureMode: this.deps.captureMode.kind,
    });

    const run = this.createRun();
    this.run = run;
    this.starting = this.launch(run, sessionConfig);
    try {
      await this.starting;
    } finally {
      this.starting = null;
    }
  }

  public async stop(): Promise<void> {
    switch (this.stateValue) {
      case "idle":
        return;
      case "starting":
        this.logger.info("stop requested while starting");
        this.stopRequested = true;
        this.run?.session.abortConnect();
        await this.starting?.catch((error: unknown) => {
          this.logger.debug("start failed while stopping", { error: describeError(error) });
        });
        return;
      case "stopping":
        return this.stopping ?? undefined;
      case "active":
        await this.teardown();
        return;
    }
  }

  public getStats(): EngineStats {
    const run = this.run;
    if (!run) {
      return this.lastStats ?? this.buildStats(EMPTY_COUNTERS, 0, 0, this.config.commit.initialCommitIntervalMs, 0);
    }
    return this.buildStats(
      run.scheduler.stats,
      run.sink.playedChunks,
      run.commitState.pendingResponseCount,
      run.commitState.currentCommitIntervalMs,
      this.chunksCaptured,
    );
  }

  private async launch(run: Run, sessionConfig: SessionConfig): Promise<void> {
    try {
      await run.session.connect(sessionConfig);
      run.sink.start();
      run.source.start();
    } catch (error) {
      if (this.stopRequested) {
        this.logger.info("start cancelled by stop", { error: describeError(error) });
        await this.teardown();
        return;
      }
      const engineError =
        error instanceof EngineError
          ? error
          : new ConnectionError(`start failed: ${describeError(error)}`, "network", { cause: error });
      this.logger.error("failed to start translation", { error: engineError.message });
      emit(this.errorListeners, engineError, this.logger, "error");
      await this.teardown();
      throw engineError;
    }

    run.scheduler.start();
    this.stateValue = "active";
    this.logger.info("translation started", { intervalMs: run.commitState.currentCommitIntervalMs });

    if (this.stopRequested) {
      await this.teardown();
    }
  }

  private loadSettings(): void {
    this.settings = this.deps.settings.load();
    this.problems = validateSettings(this.settings);
    if (this.problems.length > 0) {
      this.logger.warn("translation settings incomplete", { problems: this.problems });
    }
  }

  private buildSessionConfig(sourceLanguage?: string | null, targetLanguage?: string): SessionConfig {
    const source = sourceLanguage === undefined ? this.settings.sourceLanguage : sourceLanguage;
    return {
      sampleRateHz: this.config.inputSampleRateHz,
      channels: this.config.inputChannels,
      bufferSizeBytes: this.config.bufferSizeBytes,
      sourceLanguage: source && source.trim().length > 0 ? source.trim() : null,
      targetLanguage:
        targetLanguage?.trim() || this.settings.targetLanguage || DEFAULT_TARGET_LANGUAGE,
      maxResponseOutputTokens: this.config.maxResponseOutputTokens,
      temperature: this.config.temperature,
      voice: this.config.voice,
      transcriptionModel: this.config.transcriptionModel,
    };
  }

  private createRun(): Run {
    const { logger, now } = this.deps;
    const session = new RealtimeSession({
      endpoint: {
        endpoint: this.settings.endpoint ?? "",
        deployment: this.settings.deployment ?? "",
        apiVersion: this.settings.apiVersion ?? DEFAULT_API_VERSION,
      },
      apiKey: this.settings.apiKey ?? "",
      logger,
      connectTimeoutMs: this.config.connectTimeoutMs,
      now,
      wsFactory: this.deps.wsFactory,
    });
    const commitState = new CommitState(this.config.commit);
    const scheduler = new AdaptiveCommitScheduler({
      state: commitState,
      target: session,
      logger,
      now,
      sleep: this.deps.sleep,
    });
    const source = new AudioSource({
      provider: this.deps.capture,
      format: {
        sampleRateHz: this.config.inputSampleRateHz,
        channels: this.config.inputChannels,
        encoding: "pcm_s16le",
      },
      mode: this.deps.captureMode,
      chunkSizeBytes: this.config.bufferSizeBytes,
      logger,
      activity: commitState,
      now,
    });
    const sink = new AudioSink({
      provider: this.deps.playback,
      format: { sampleRateHz: this.config.outputSampleRateHz, channels: 1, encoding: "pcm_s16le" },
      logger,
    });

    const unsubscribe = [
      session.onEvent((event) => this.handleSessionEvent(event, scheduler, sink)),
      session.onError((error) => this.handleSessionError(error)),
      source.onChunk((chunk) => this.forwardAudio(chunk, session)),
      source.onError((error) => this.reportError(error)),
      sink.onError((error) => this.reportError(error)),
    ];
    return { session, commitState, scheduler, source, sink, unsubscribe };
  }

  private forwardAudio(chunk: AudioChunk, session: RealtimeSession): void {
    this.chunksCaptured += 1;
    if (!session.isOpen) return;
    try {
      session.sendAudio(chunk);
    } catch (error) {
      this.logger.debug("dropped captured audio", { sequence: chunk.sequence, error: describeError(error) });
    }
  }

  private handleSessionEvent(event: TranslationEvent, scheduler: AdaptiveCommitScheduler, sink: AudioSink): void {
    switch (event.type) {
      case "text.delta":
        emit(this.textListeners, event.text, this.logger, "text");
        break;
      case "audio.delta":
        sink.enqueue(event.audio);
        emit(this.audioListeners, event.audio, this.logger, "audio");
        break;
      case "input.transcript":
        this.logger.debug("input transcript", { text: event.text });
        emit(this.transcriptListeners, event.text, this.logger, "transcript");
        break;
      case "response.completed":
        scheduler.handleEvent(event);
        emit(this.completionListeners, event.latencyMs, this.logger, "completion");
        break;
      case "protocol.error":
        scheduler.handleEvent(event);
        this.logger.error("realtime service error", { code: event.code, message: event.message });
        this.reportError(new ProtocolError(event.code, event.message));
        break;
      case "session.lifecycle":
        this.logger.debug("session lifecycle", { state: event.state });
        break;
      case "rate_limits":
        this.logger.debug("rate limits updated", {
          limits: event.limits.map((limit) => `${limit.name}=${limit.remaining}/${limit.limit}`),
        });
        break;
    }
  }

  private handleSessionError(error: EngineError): void {
    this.reportError(error);
    if (error instanceof ConnectionError && this.stateValue === "active") {
      this.logger.warn("connection lost, stopping translation", { reason: error.reason });
      void this.teardown();
    }
  }

  private reportError(error: EngineError): void {
    emit(this.errorListeners, error, this.logger, "error");
  }

  private teardown(): Promise<void> {
    if (this.stopping) return this.stopping;
    this.stopping = this.runTeardown().finally(() => {
      this.stopping = null;
    });
    return this.stopping;
  }

  private async runTeardown(): Promise<void> {
    const run = this.run;
    this.stateValue = "stopping";
    this.logger.info("stopping translation");
    if (run) {
      await this.guard("cancel receive loop", () => run.session.cancelReceive());
      await this.guard("stop commit scheduler", () => run.scheduler.stop());
      await this.guard("stop audio capture", () => run.source.stop());
      await this.guard("stop audio playback", () => run.sink.stop());
      await this.guard("close connection", () => run.session.disconnect());
      for (const unsubscribe of run.unsubscribe) unsubscribe();

      this.lastStats = this.buildStats(
        run.scheduler.stats,
        run.sink.playedChunks,
        run.commitState.pendingResponseCount,
        run.commitState.currentCommitIntervalMs,
        this.chunksCaptured,
      );
      run.commitState.reset();
    }
    this.run = null;
    this.stateValue = "idle";
    this.logger.info("translation stopped", { ...this.lastStats });
  }

  private async guard(step: string, action: () => Promise<void>): Promise<void> {
    try {
      await action();
    } catch (error) {
      this.logger.error("teardown step failed", { step, error: toError(error).message });
    }
  }

  private buildStats(
    counters: Readonly<SchedulerCounters>,
    chunksPlayed: number,
    pendingResponses: number,
    currentCommitIntervalMs: number,
    chunksCaptured: number,
  ): EngineStats {
    return {
      commits: counters.commits,
      silentSkips: counters.silentSkips,
      overloadSkips: counters.overloadSkips,
      deferrals: counters.deferrals,
      responsesCompleted: counters.responsesCompleted,
      responsesFailed: counters.responsesFailed,
      chunksCaptured,
      chunksPlayed,
      pendingResponses,
      currentCommitIntervalMs,
      lastLatencyMs: counters.lastLatencyMs,
    };
  }
}
