import { on } from "node:events";
import type { ClientRequest, IncomingMessage } from "node:http";
import WebSocket from "ws";
import { ConnectionError, ProtocolError, type EngineError } from "../domain/errors.js";
import type { AudioChunk, SessionConfig, SessionState, TranslationEvent } from "../domain/types.js";
import { describeError, type Logger } from "../logger.js";
import { buildRealtimeHeaders, buildRealtimeUrl, type RealtimeEndpoint } from "../protocol/endpoint.js";
import {
  audioAppend,
  decodeServerMessage,
  encodeMessage,
  inputClear,
  inputCommit,
  responseCreate,
  sessionUpdate,
  type OutboundMessage,
} from "../protocol/messages.js";
import { OutboundQueue } from "./outbound-queue.js";

export const DEFAULT_CONNECT_TIMEOUT_MS = 30_000;
const CLOSE_GRACE_MS = 2000;

export type WebSocketFactory = (url: string, headers: Record<string, string>) => WebSocket;

export type RealtimeSessionOptions = {
  readonly endpoint: RealtimeEndpoint;
  readonly apiKey: string;
  readonly logger: Logger;
  readonly connectTimeoutMs?: number;
  readonly now?: () => number;
  readonly wsFactory?: WebSocketFactory;
};

export type SessionEventListener = (event: TranslationEvent) => void;
export type SessionErrorListener = (error: EngineError) => void;

function rawToText(data: unknown): string | undefined {
  if (typeof data === "string") return data;
  if (Buffer.isBuffer(data)) return data.toString("utf8");
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString("utf8");
  if (Array.isArray(data)) {
    // Fragmented delivery: one message split over several buffers.
    const parts: Buffer[] = [];
    for (const part of data) {
      if (!Buffer.isBuffer(part)) return undefined;
      parts.push(part);
    }
    return Buffer.concat(parts).toString("utf8");
  }
  return undefined;
}

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
 * One persistent connection to the realtime translation service.
 * A session is single-use: once closed or failed, create a new one.
 */
export class RealtimeSession {
  private ws: WebSocket | null = null;
  private stateValue: SessionState = "idle";
  private queue: OutboundQueue | null = null;
  private receiveAbort: AbortController | null = null;
  private connectAbort: AbortController | null = null;
  private receiveLoop: Promise<void> | null = null;
  private lastCommitSentAtMs: number | undefined;
  private readonly eventListeners = new Set<SessionEventListener>();
  private readonly errorListeners = new Set<SessionErrorListener>();
  private readonly now: () => number;
  private readonly wsFactory: WebSocketFactory;
  private readonly logger: Logger;

  public constructor(private readonly opts: RealtimeSessionOptions) {
    this.now = opts.now ?? Date.now;
    this.wsFactory = opts.wsFactory ?? ((url, headers) => new WebSocket(url, { headers }));
    this.logger = opts.logger.child({ component: "realtime-session" });
  }

  public get state(): SessionState {
    return this.stateValue;
  }

  public get isOpen(): boolean {
    return this.stateValue === "active" && this.ws?.readyState === WebSocket.OPEN;
  }

  public onEvent(listener: SessionEventListener): () => void {
    this.eventListeners.add(listener);
    return () => this.eventListeners.delete(listener);
  }

  public onError(listener: SessionErrorListener): () => void {
    this.errorListeners.add(listener);
    return () => this.errorListeners.delete(listener);
  }

  public async connect(config: SessionConfig): Promise<void> {
    if (this.stateValue !== "idle") {
      throw new ConnectionError(`session cannot connect from state ${this.stateValue}`, "closed");
    }
    this.transition("connecting");

    const url = buildRealtimeUrl(this.opts.endpoint);
    let ws: WebSocket;
    try {
      ws = this.wsFactory(url, buildRealtimeHeaders(this.opts.apiKey));
    } catch (error) {
      this.transition("failed");
      throw new ConnectionError(`cannot open realtime socket: ${describeError(error)}`, "network", {
        cause: error,
      });
    }
    this.ws = ws;
    // Kept for the socket's whole life so late errors never go unhandled.
    ws.on("error", (error) => {
      this.logger.debug("realtime socket error", { error: error.message, state: this.stateValue });
    });

    const abort = new AbortController();
    this.connectAbort = abort;
    try {
      await this.waitForOpen(ws, this.opts.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS, abort.signal);
      this.transition("configuring");
      this.startReceiveLoop(ws);
      await this.sendRaw(ws, encodeMessage(sessionUpdate(config)));
      if (abort.signal.aborted) {
        throw new ConnectionError("connection aborted during session configuration", "aborted");
      }
      if (this.state !== "configuring") {
        throw new ConnectionError("connection closed during session configuration", "closed");
      }
    } catch (error) {
      this.transition("failed");
      await this.cancelReceive();
      ws.terminate();
      this.ws = null;
      if (error instanceof ConnectionError) throw error;
      throw new ConnectionError(`session configuration failed: ${describeError(error)}`, "network", {
        cause: error,
      });
    } finally {
      this.connectAbort = null;
    }

    this.queue = new OutboundQueue({
      send: (data) => this.sendRaw(ws, data),
      onSendError: (error, label) => {
        this.logger.warn("realtime send failed", { type: label, error: error.message });
      },
    });
    this.logger.info("realtime session connected", {
      url,
      sourceLanguage: config.sourceLanguage ?? "auto",
      targetLanguage: config.targetLanguage,
    });
    this.transition("active");
  }

  /** Makes a pending connect() fail fast with reason "aborted"; no effect once connected. */
  public abortConnect(): void {
    this.connectAbort?.abort();
  }

  public sendAudio(chunk: AudioChunk): void {
    this.enqueue(audioAppend(chunk));
  }

  public commit(): void {
    this.enqueue(inputCommit);
    this.lastCommitSentAtMs = this.now();
  }

  public requestResponse(): void {
    this.enqueue(responseCreate);
  }

  public clearInputBuffer(): void {
    this.enqueue(inputClear);
  }

  /** Stops consuming server messages and waits for the receive loop to exit. */
  public async cancelReceive(): Promise<void> {
    if (this.stateValue === "active" || this.stateValue === "configuring") {
      this.transition("stopping");
    }
    this.receiveAbort?.abort();
    const loop = this.receiveLoop;
    this.receiveLoop = null;
    this.receiveAbort = null;
    if (loop) await loop;
  }

  public async disconnect(): Promise<void> {
    const ws = this.ws;
    if (!ws && this.receiveLoop === null) return;

    const queue = this.queue;
    this.queue = null;
    this.ws = null;
    await this.cancelReceive();
    const flushable = queue !== null && ws?.readyState === WebSocket.OPEN;
    if (flushable && !(await settlesWithin(queue.whenIdle(), CLOSE_GRACE_MS))) {
      this.logger.warn("pending sends did not flush before close", { pending: queue.size });
    }
    const dropped = queue?.close() ?? 0;
    if (dropped > 0) {
      this.logger.debug("dropped unsent messages on disconnect", { dropped });
    }

    if (ws) {
      await this.closeSocket(ws);
    }
    if (this.stateValue === "stopping") {
      this.transition("closed");
    }
    this.logger.info("realtime session disconnected", { state: this.stateValue });
  }

  private enqueue(message: OutboundMessage): void {
    if (this.stateValue !== "active" || !this.queue) {
      throw new ConnectionError(
        `cannot send ${message.type} while session is ${this.stateValue}`,
        "closed",
      );
    }
    this.queue.push(message.type, encodeMessage(message));
  }

  private waitForOpen(ws: WebSocket, timeoutMs: number, signal: AbortSignal): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      let settled = false;
      const settle = (error?: ConnectionError): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        signal.removeEventListener("abort", onAbort);
        ws.off("open", onOpen);
        ws.off("error", onError);
        ws.off("unexpected-response", onUnexpectedResponse);
        ws.off("close", onClose);
        if (error) reject(error);
        else resolve();
      };
      const onOpen = (): void => settle();
      const onError = (error: Error): void =>
        settle(new ConnectionError(`connection failed: ${error.message}`, "network", { cause: error }));
      const onUnexpectedResponse = (_req: ClientRequest, res: IncomingMessage): void => {
        const status = res.statusCode ?? 0;
        res.resume();
        settle(
          new ConnectionError(`server rejected the websocket upgrade (HTTP ${status})`, "rejected", {
            status,
          }),
        );
      };
      const onClose = (code: number): void =>
        settle(new ConnectionError(`connection closed during handshake (code ${code})`, "rejected"));
      const onAbort = (): void => settle(new ConnectionError("connection aborted", "aborted"));
      const timer = setTimeout(
        () => settle(new ConnectionError(`connection timed out after ${timeoutMs}ms`, "timeout")),
        timeoutMs,
      );
      if (signal.aborted) {
        onAbort();
        return;
      }
      signal.addEventListener("abort", onAbort, { once: true });

      ws.once("open", onOpen);
      ws.on("error", onError);
      ws.once("unexpected-response", onUnexpectedResponse);
      ws.once("close", onClose);
    });
  }

  private startReceiveLoop(ws: WebSocket): void {
    const abort = new AbortController();
    this.receiveAbort = abort;
    const messages = on(ws, "message", { signal: abort.signal });
    ws.once("close", (code: number, reason: Buffer) => this.handleRemoteClose(code, reason.toString()));
    this.receiveLoop = this.runReceiveLoop(messages, abort.signal);
  }

  private async runReceiveLoop(messages: AsyncIterable<unknown[]>, signal: AbortSignal): Promise<void> {
    try {
      for await (const args of messages) {
        this.handleFrame(args[0], args[1] === true);
      }
    } catch (error) {
      if (signal.aborted) return;
      this.fail(
        new ConnectionError(`realtime socket error: ${describeError(error)}`, "network", { cause: error }),
      );
    }
  }

  private handleFrame(data: unknown, isBinary: boolean): void {
    if (isBinary) {
      this.logger.debug("ignoring binary server frame");
      return;
    }
    const text = rawToText(data);
    if (text === undefined) {
      this.logger.warn("unreadable server frame");
      return;
    }

    let result: ReturnType<typeof decodeServerMessage>;
    try {
      result = decodeServerMessage(text, { responseLatencyMs: () => this.latencySinceCommit() });
    } catch (error) {
      const protocolError =
        error instanceof ProtocolError
          ? error
          : new ProtocolError("decode_error", describeError(error), { cause: error });
      this.logger.warn("undecodable server message", {
        error: protocolError.message,
        preview: text.slice(0, 120),
      });
      this.emitError(protocolError);
      return;
    }

    if (result.kind === "ignored") {
      this.logger.debug("unhandled server message", { type: result.type });
      return;
    }
    this.emitEvent(result.event);
  }

  private handleRemoteClose(code: number, reason: string): void {
    if (this.stateValue !== "active" && this.stateValue !== "configuring") return;
    this.logger.warn("realtime connection closed by server", { code, reason });
    this.transition("closed");
    this.receiveAbort?.abort();
    this.queue?.close();
    this.emitError(new ConnectionError(`connection closed by server (code ${code})`, "closed"));
  }

  private fail(error: EngineError): void {
    if (this.stateValue === "closed" || this.stateValue === "failed") return;
    this.logger.error("realtime session failed", { error: error.message });
    this.transition("failed");
    this.queue?.close();
    this.emitError(error);
  }

  private latencySinceCommit(): number {
    if (this.lastCommitSentAtMs === undefined) return 0;
    return Math.max(0, this.now() - this.lastCommitSentAtMs);
  }

  private sendRaw(ws: WebSocket, data: string): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      ws.send(data, (error) => {
        if (error) reject(error);
        else resolve();
      });
    });
  }

  private closeSocket(ws: WebSocket): Promise<void> {
    if (ws.readyState === WebSocket.CLOSED) return Promise.resolve();
    if (ws.readyState !== WebSocket.OPEN) {
      ws.terminate();
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      const timer = setTimeout(() => {
        ws.terminate();
        resolve();
      }, CLOSE_GRACE_MS);
      ws.once("close", () => {
        clearTimeout(timer);
        resolve();
      });
      ws.close(1000, "client stopping");
    });
  }

  private transition(next: SessionState): void {
    if (this.stateValue === next) return;
    this.logger.debug("session state", { from: this.stateValue, to: next });
    this.stateValue = next;
    this.emitEvent({ type: "session.lifecycle", state: next });
  }

  private emitEvent(event: TranslationEvent): void {
    for (const listener of this.eventListeners) {
      try {
        listener(event);
      } catch (error) {
        this.logger.warn("session event listener failed", { type: event.type, error: describeError(error) });
      }
    }
  }

  private emitError(error: EngineError): void {
    for (const listener of this.errorListeners) {
      try {
        listener(error);
      } catch (listenerError) {
        this.logger.warn("session error listener failed", { error: describeError(listenerError) });
      }
    }
  }
}
