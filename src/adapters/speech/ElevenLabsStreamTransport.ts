import { randomUUID } from "crypto";
import WebSocket from "ws";
import type { SourceAudioFormat } from "../../ports/audio/AudioNormalizerPort";
import type {
  SynthesisConnection,
  SynthesisEvent,
  SynthesisTransport,
} from "../../ports/speech/SynthesisTransportPort";
import type { LoggerPort } from "../../ports/sys/LoggerPort";
import { AsyncChannel } from "../../domain/concurrency/AsyncChannel";
import { describeError, MalformedFrameError } from "../../domain/speech/errors";

export interface ElevenLabsVoiceSettings {
  stability: number;
  similarityBoost: number;
}

export interface ElevenLabsStreamOptions {
  apiKey: string;
  voiceId: string;
  model?: string;
  /** Request 8 kHz G.711 mu-law instead of PCM. */
  useMulaw?: boolean;
  /** PCM output rate; ignored with `useMulaw`. */
  sampleRate?: number;
  endpoint?: string;
  inactivityTimeoutSec?: number;
  voiceSettings?: ElevenLabsVoiceSettings;
  maxChunkChars?: number;
}

const DEFAULT_ENDPOINT = "wss://api.elevenlabs.io/v1/text-to-speech";
const DEFAULT_MODEL = "eleven_turbo_v2_5";

export class ElevenLabsStreamTransport implements SynthesisTransport {
  readonly name = "ElevenLabs";
  readonly voice: string;
  readonly model: string;
  readonly outputFormat: SourceAudioFormat;
  readonly maxChunkChars?: number;
  private readonly voiceSettings: ElevenLabsVoiceSettings;

  constructor(
    private readonly options: ElevenLabsStreamOptions,
    private readonly logger: LoggerPort
  ) {
    this.voice = options.voiceId;
    this.model = options.model ?? DEFAULT_MODEL;
    this.outputFormat = options.useMulaw
      ? { encoding: "mulaw", sampleRate: 8000 }
      : { encoding: "pcm", sampleRate: options.sampleRate ?? 16000 };
    this.maxChunkChars = options.maxChunkChars;
    this.voiceSettings = options.voiceSettings ?? { stability: 0.5, similarityBoost: 0.8 };
  }

  /** Provider name of the output format, e.g. `ulaw_8000` or `pcm_16000`. */
  get providerOutputFormat(): string {
    const { encoding, sampleRate } = this.outputFormat;
    return encoding === "mulaw" ? `ulaw_${sampleRate}` : `pcm_${sampleRate}`;
  }

  get url(): string {
    const endpoint = this.options.endpoint ?? DEFAULT_ENDPOINT;
    const params = new URLSearchParams({
      model_id: this.model,
      output_format: this.providerOutputFormat,
      inactivity_timeout: String(this.options.inactivityTimeoutSec ?? 60),
    });
    return `${endpoint}/${encodeURIComponent(this.voice)}/stream-input?${params.toString()}`;
  }

  async open(): Promise<SynthesisConnection> {
    if (!this.options.apiKey) {
      throw new Error("ELEVENLABS_API_KEY is not set for streaming synthesis.");
    }
    if (!this.voice) {
      throw new Error("ELEVENLABS_VOICE_ID is not configured.");
    }

    const ws = new WebSocket(this.url);
    await onceOpen(ws);

    const connection = new ElevenLabsStreamConnection(ws, this.logger);
    await connection.sendJson({
      text: " ",
      voice_settings: {
        stability: this.voiceSettings.stability,
        similarity_boost: this.voiceSettings.similarityBoost,
      },
      xi_api_key: this.options.apiKey,
    });
    return connection;
  }
}

export class ElevenLabsStreamConnection implements SynthesisConnection {
  readonly id = randomUUID();
  private readonly messages = new AsyncChannel<string>();

  constructor(
    private readonly ws: WebSocket,
    private readonly logger: LoggerPort
  ) {
    ws.on("message", (data: WebSocket.RawData) => {
      this.messages.push(data.toString());
    });
    ws.on("error", (err: Error) => {
      this.logger.warn("ElevenLabs socket error", { connection: this.id, error: describeError(err) });
    });
    ws.on("close", (code: number) => {
      this.logger.info("ElevenLabs socket closed", { connection: this.id, code });
      this.messages.close();
    });
  }

  isAlive(): boolean {
    return this.ws.readyState === WebSocket.OPEN;
  }

  sendText(text: string): Promise<void> {
    return this.sendJson({ text });
  }

  flush(): Promise<void> {
    return this.sendJson({ text: "", flush: true });
  }

  endInput(): Promise<void> {
    return this.sendJson({ text: "" });
  }

  async receive(signal: AbortSignal): Promise<SynthesisEvent[]> {
    const next = await this.messages.next(signal);
    if (next.done) {
      throw new Error("ElevenLabs stream is closed");
    }
    return decodeFrame(next.value);
  }

  async close(): Promise<void> {
    if (this.ws.readyState === WebSocket.CLOSED) return;
    this.ws.close();
  }

  sendJson(payload: Record<string, unknown>): Promise<void> {
    return new Promise((resolve, reject) => {
      this.ws.send(JSON.stringify(payload), (err?: Error) => (err ? reject(err) : resolve()));
    });
  }
}

export function decodeFrame(raw: string): SynthesisEvent[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new MalformedFrameError(`Invalid JSON frame: ${describeError(err)}`, raw);
  }
  if (!isRecord(parsed)) {
    throw new MalformedFrameError("Frame is not a JSON object", raw);
  }

  const events: SynthesisEvent[] = [];
  const audio = parsed.audio;
  if (typeof audio === "string" && audio.length > 0) {
    events.push({ type: "audio", audio: Buffer.from(audio, "base64") });
  }
  if (parsed.isFinal === true) {
    events.push({ type: "final" });
  }
  return events;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function onceOpen(ws: WebSocket): Promise<void> {
  return new Promise((resolve, reject) => {
    ws.once("open", () => resolve());
    ws.once("error", (err) => reject(err));
  });
}
