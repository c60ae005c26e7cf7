export type EngineErrorKind = "configuration" | "connection" | "capture" | "playback" | "protocol";

export abstract class EngineError extends Error {
  public abstract readonly kind: EngineErrorKind;

  public constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigurationError extends EngineError {
  public readonly kind = "configuration";

  public constructor(public readonly problems: readonly string[]) {
    super(`engine not configured: ${problems.join("; ")}`);
  }
}

export type ConnectionFailureReason = "timeout" | "rejected" | "network" | "closed" | "aborted";

export class ConnectionError extends EngineError {
  public readonly kind = "connection";
  /** HTTP status of a rejected upgrade. */
  public readonly status?: number;

  public constructor(
    message: string,
    public readonly reason: ConnectionFailureReason,
    options?: { cause?: unknown; status?: number },
  ) {
    super(message, options);
    this.status = options?.status;
  }
}

export class CaptureError extends EngineError {
  public readonly kind = "capture";
}

export class PlaybackError extends EngineError {
  public readonly kind = "playback";
}

export class ProtocolError extends EngineError {
  public readonly kind = "protocol";

  public constructor(
    public readonly code: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(`[${code}] ${message}`, options);
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
