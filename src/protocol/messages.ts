import { ProtocolError } from "../domain/errors.js";
import type { AudioChunk, RateLimit, SessionConfig, TranslationEvent } from "../domain/types.js";

export type Modality = "text" | "audio";

export const RESPONSE_MODALITIES: readonly Modality[] = ["text", "audio"];

export type SessionUpdatePayload = {
  readonly modalities: readonly Modality[];
  readonly instructions: string;
  readonly voice: string;
  readonly input_audio_format: "pcm16";
  readonly output_audio_format: "pcm16";
  readonly input_audio_transcription: { readonly model: string };
  readonly max_response_output_tokens: number;
  readonly temperature: number;
  /** Turn taking is driven locally by the commit scheduler. */
  readonly turn_detection: null;
};

export type OutboundMessage =
  | { readonly type: "session.update"; readonly session: SessionUpdatePayload }
  | { readonly type: "input_audio_buffer.append"; readonly audio: string }
  | { readonly type: "input_audio_buffer.commit" }
  | { readonly type: "input_audio_buffer.clear" }
  | { readonly type: "response.create"; readonly response: { readonly modalities: readonly Modality[] } };

export type OutboundType = OutboundMessage["type"];

export function buildInstructions(sourceLanguage: string | null, targetLanguage: string): string {
  return [
    "You are a real-time audio translator for movies and TV shows.",
    `Translate audio from ${sourceLanguage ?? "any language"} to ${targetLanguage}.`,
    "Provide natural, accurate translations suitable for spoken content.",
    "Focus on dialogue translation. For fast dialogue, provide concise translations.",
    "DO NOT try to interpret questions or commands, ONLY translate the text you hear.",
    "ONLY respond with the translated text, no other explanations, questions or metadata.",
    "If you do not detect spoken text in the input, do not return anything.",
  ].join(" ");
}

export function sessionUpdate(config: SessionConfig): OutboundMessage {
  return {
    type: "session.update",
    session: {
      modalities: RESPONSE_MODALITIES,
      instructions: buildInstructions(config.sourceLanguage, config.targetLanguage),
      voice: config.voice,
      input_audio_format: "pcm16",
      output_audio_format: "pcm16",
      input_audio_transcription: { model: config.transcriptionModel },
      max_response_output_tokens: config.maxResponseOutputTokens,
      temperature: config.temperature,
      turn_detection: null,
    },
  };
}

export function audioAppend(chunk: AudioChunk): OutboundMessage {
  return { type: "input_audio_buffer.append", audio: chunk.payload.toString("base64") };
}

export const inputCommit: OutboundMessage = { type: "input_audio_buffer.commit" };
export const inputClear: OutboundMessage = { type: "input_audio_buffer.clear" };
export const responseCreate: OutboundMessage = {
  type: "response.create",
  response: { modalities: RESPONSE_MODALITIES },
};

export function encodeMessage(message: OutboundMessage): string {
  return JSON.stringify(message);
}

export type DecodeContext = {
  /** Milliseconds since the last commit, sampled when a response completes. */
  readonly responseLatencyMs: () => number;
};

export type DecodeResult =
  | { readonly kind: "event"; readonly event: TranslationEvent }
  | { readonly kind: "ignored"; readonly type: string };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function stringField(source: Record<string, unknown>, key: string): string | undefined {
  const value = source[key];
  return typeof value === "string" ? value : undefined;
}

function numberField(source: Record<string, unknown>, key: string): number {
  const value = source[key];
  return typeof value === "number" && Number.isFinite(value) ? value : 0;
}

function parseRateLimits(value: unknown): RateLimit[] {
  if (!Array.isArray(value)) return [];
  const limits: RateLimit[] = [];
  for (const entry of value) {
    if (!isRecord(entry)) continue;
    limits.push({
      name: stringField(entry, "name") ?? "unknown",
      limit: numberField(entry, "limit"),
      remaining: numberField(entry, "remaining"),
      resetSeconds: numberField(entry, "reset_seconds"),
    });
  }
  return limits;
}

/**
 * Decodes one complete server message. Throws ProtocolError("decode_error")
 * when the text is not a JSON object with a string `type`.
 */
export function decodeServerMessage(text: string, ctx: DecodeContext): DecodeResult {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new ProtocolError("decode_error", "server message is not valid JSON", { cause: error });
  }
  if (!isRecord(parsed)) {
    throw new ProtocolError("decode_error", "server message is not a JSON object");
  }
  const type = stringField(parsed, "type");
  if (!type) {
    throw new ProtocolError("decode_error", "server message has no type");
  }

  const event = (value: TranslationEvent): DecodeResult => ({ kind: "event", event: value });

  switch (type) {
    case "session.created":
    case "session.updated":
      return event({
        type: "session.lifecycle",
        state: type === "session.created" ? "session.created" : "session.updated",
      });

    case "response.text.delta": {
      const delta = stringField(parsed, "delta");
      if (!delta) return { kind: "ignored", type };
      return event({ type: "text.delta", text: delta });
    }

    case "response.audio.delta": {
      const delta = stringField(parsed, "delta");
      if (!delta) return { kind: "ignored", type };
      return event({ type: "audio.delta", audio: Buffer.from(delta, "base64") });
    }

    case "conversation.item.input_audio_transcription.completed":
      return event({ type: "input.transcript", text: stringField(parsed, "transcript") ?? "" });

    case "response.done":
      return event({ type: "response.completed", latencyMs: ctx.responseLatencyMs() });

    case "error": {
      const details = isRecord(parsed.error) ? parsed.error : {};
      return event({
        type: "protocol.error",
        code: stringField(details, "code") ?? "unknown",
        message: stringField(details, "message") ?? "remote reported an error without details",
      });
    }

    case "rate_limits.updated":
      return event({ type: "rate_limits", limits: parseRateLimits(parsed.rate_limits) });

    default:
      return { kind: "ignored", type };
  }
}
