import { spawn } from "node:child_process";
import { EventEmitter } from "node:events";
import type { Readable, Writable } from "node:stream";
import { CaptureError, PlaybackError } from "../domain/errors.js";
import type {
  AudioCaptureProvider,
  AudioPlaybackProvider,
  CaptureHandlers,
  PlaybackDevice,
} from "../domain/providers.js";
import type { AudioFormat, CaptureMode } from "../domain/types.js";
import type { Logger } from "../logger.js";

export const DEFAULT_CAPTURE_COMMAND =
  "parec --raw --format=s16le --rate={rate} --channels={channels} --device={device}";
export const DEFAULT_PLAYBACK_COMMAND =
  "pacat --playback --raw --format=s16le --rate={rate} --channels={channels}";

const EXIT_GRACE_MS = 2000;

/** The part of a spawned child the device providers rely on. */
export interface DeviceProcess extends EventEmitter {
  readonly stdin: Writable | null;
  readonly stdout: Readable | null;
  readonly stderr: Readable | null;
  kill(signal?: NodeJS.Signals): boolean;
}

export type SpawnProcess = (command: string, args: readonly string[]) => DeviceProcess;

export type CommandValues = {
  readonly rate: number;
  readonly channels: number;
  readonly device?: string;
  /** Comma-separated capture usages, application capture only. */
  readonly usages?: string;
};

const defaultSpawn: SpawnProcess = (command, args) =>
  spawn(command, [...args], { stdio: ["pipe", "pipe", "pipe"] });

/**
 * Expands a whitespace-separated command template. Arguments that mention
 * `{device}` or `{usages}` are left out entirely when that value is absent.
 */
export function buildCommand(template: string, values: CommandValues): { command: string; args: string[] } {
  const tokens = template.trim().split(/\s+/).filter((token) => token.length > 0);
  const expanded: string[] = [];
  for (const token of tokens) {
    if (token.includes("{device}") && !values.device) continue;
    if (token.includes("{usages}") && !values.usages) continue;
    expanded.push(
      token
        .replaceAll("{rate}", String(values.rate))
        .replaceAll("{channels}", String(values.channels))
        .replaceAll("{device}", values.device ?? "")
        .replaceAll("{usages}", values.usages ?? ""),
    );
  }
  const [command, ...args] = expanded;
  if (!command) {
    throw new Error(`Invalid command template: "${template}"`);
  }
  return { command, args };
}

function waitForExit(child: DeviceProcess, exited: Promise<void>, timeoutMs: number): Promise<void> {
  return new Promise<void>((resolve) => {
    const timer = setTimeout(() => {
      child.kill("SIGKILL");
      resolve();
    }, timeoutMs);
    void exited.then(() => {
      clearTimeout(timer);
      resolve();
    });
  });
}

function exitPromise(child: DeviceProcess): Promise<void> {
  return new Promise<void>((resolve) => {
    child.once("exit", () => resolve());
    child.once("error", () => resolve());
  });
}

export type ProcessCaptureOptions = {
  readonly logger: Logger;
  readonly command?: string;
  readonly spawnProcess?: SpawnProcess;
};

/**
 * Records raw PCM from a PulseAudio-compatible recorder. Application capture
 * reads other applications' mixed playback through the monitor device named
 * by the capability token; the requested usages reach the recorder through
 * `{usages}` for commands that filter by playback category.
 */
export class ProcessCaptureProvider implements AudioCaptureProvider {
  public readonly name = "process-capture";
  private child: DeviceProcess | null = null;
  private exited: Promise<void> | null = null;
  private stopping = false;
  private readonly spawnProcess: SpawnProcess;
  private readonly logger: Logger;

  public constructor(private readonly opts: ProcessCaptureOptions) {
    this.spawnProcess = opts.spawnProcess ?? defaultSpawn;
    this.logger = opts.logger.child({ component: this.name });
  }

  public start(format: AudioFormat, mode: CaptureMode, handlers: CaptureHandlers): void {
    if (this.child) {
      throw new CaptureError("capture process already running");
    }
    const { command, args } = buildCommand(this.opts.command ?? DEFAULT_CAPTURE_COMMAND, {
      rate: format.sampleRateHz,
      channels: format.channels,
      ...this.resolveSource(mode),
    });

    let child: DeviceProcess;
    try {
      child = this.spawnProcess(command, args);
    } catch (error) {
      throw new CaptureError(`cannot spawn ${command}`, { cause: error });
    }
    if (!child.stdout) {
      child.kill("SIGKILL");
      throw new CaptureError(`${command} has no stdout pipe`);
    }

    this.child = child;
    this.stopping = false;
    this.exited = exitPromise(child);
    this.logger.debug("capture process spawned", { command, args });

    child.stdout.on("data", (data: Buffer) => handlers.onData(data));
    child.stderr?.on("data", (data: Buffer) => {
      const msg = data.toString().trim();
      if (msg) this.logger.debug("capture process stderr", { msg });
    });
    child.once("error", (error: Error) => {
      this.child = null;
      handlers.onError(new CaptureError(`capture process failed: ${error.message}`, { cause: error }));
    });
    child.once("exit", (code: number | null, signal: NodeJS.Signals | null) => {
      this.child = null;
      if (this.stopping) return;
      handlers.onError(
        new CaptureError(`capture process exited unexpectedly (code=${code}, signal=${signal})`),
      );
    });
  }

  public async stop(): Promise<void> {
    const child = this.child;
    const exited = this.exited;
    if (!child || !exited) return;
    this.stopping = true;
    child.kill("SIGTERM");
    await waitForExit(child, exited, EXIT_GRACE_MS);
    this.child = null;
    this.exited = null;
  }

  private resolveSource(mode: CaptureMode): Pick<CommandValues, "device" | "usages"> {
    if (mode.kind === "microphone") return { device: mode.device };
    const device = mode.capabilityToken.trim();
    if (device.length === 0) {
      throw new CaptureError("application capture requires a capability token (monitor device)");
    }
    const usages = [...new Set(mode.usages)];
    if (usages.length === 0) {
      throw new CaptureError("application capture requires at least one usage (media, game)");
    }
    this.logger.info("capturing application playback", { device, usages });
    return { device, usages: usages.join(",") };
  }
}

class ProcessPlaybackDevice implements PlaybackDevice {
  private failure: Error | null = null;
  private readonly exited: Promise<void>;

  public constructor(
    private readonly child: DeviceProcess,
    private readonly stdin: Writable,
  ) {
    this.exited = exitPromise(child);
    // EPIPE after the player died surfaces here and through the write callback.
    stdin.on("error", (error: Error) => {
      this.failure = error;
    });
    child.once("error", (error: Error) => {
      this.failure = error;
    });
  }

  public write(pcm: Buffer): Promise<void> {
    if (this.failure) {
      return Promise.reject(new PlaybackError(this.failure.message, { cause: this.failure }));
    }
    return new Promise<void>((resolve, reject) => {
      this.stdin.write(pcm, (error) => {
        if (error) reject(new PlaybackError(error.message, { cause: error }));
        else resolve();
      });
    });
  }

  public async close(): Promise<void> {
    this.stdin.end();
    await waitForExit(this.child, this.exited, EXIT_GRACE_MS);
  }
}

export type ProcessPlaybackOptions = {
  readonly logger: Logger;
  readonly command?: string;
  readonly spawnProcess?: SpawnProcess;
};

export class ProcessPlaybackProvider implements AudioPlaybackProvider {
  public readonly name = "process-playback";
  private readonly spawnProcess: SpawnProcess;
  private readonly logger: Logger;

  public constructor(private readonly opts: ProcessPlaybackOptions) {
    this.spawnProcess = opts.spawnProcess ?? defaultSpawn;
    this.logger = opts.logger.child({ component: this.name });
  }

  public open(format: AudioFormat): PlaybackDevice {
    const { command, args } = buildCommand(this.opts.command ?? DEFAULT_PLAYBACK_COMMAND, {
      rate: format.sampleRateHz,
      channels: format.channels,
    });
    let child: DeviceProcess;
    try {
      child = this.spawnProcess(command, args);
    } catch (error) {
      throw new PlaybackError(`cannot spawn ${command}`, { cause: error });
    }
    if (!child.stdin) {
      child.kill("SIGKILL");
      throw new PlaybackError(`${command} has no stdin pipe`);
    }
    child.stderr?.on("data", (data: Buffer) => {
      const msg = data.toString().trim();
      if (msg) this.logger.debug("playback process stderr", { msg });
    });
    this.logger.debug("playback process spawned", { command, args });
    return new ProcessPlaybackDevice(child, child.stdin);
  }
}
