import { randomUUID } from "crypto";
import { AssemblyAI, type StreamingTranscriber } from "assemblyai";
import type {
  RecognitionConnection,
  RecognitionEvent,
  RecognitionTransport,
} from "../../ports/speech/RecognitionTransportPort";
import type { LoggerPort } from "../../ports/sys/LoggerPort";
import { AsyncChannel } from "../../domain/concurrency/AsyncChannel";
import type { AudioProfile } from "../../domain/speech/audioProfile";
import { describeError } from "../../domain/speech/errors";
import { toArrayBuffer } from "../audio/buffers";

export interface AssemblyAiRecognitionOptions {
  apiKey: string;
  maxTurnSilence?: number;
  minEndOfTurnSilenceWhenConfident?: number;
}

interface TurnUpdate {
  turn_order: number;
  turn_is_formatted: boolean;
  end_of_turn: boolean;
  transcript?: string;
}

export class AssemblyAiRecognitionTransport implements RecognitionTransport {
  readonly name = "AssemblyAI";
  private readonly client: AssemblyAI;

  constructor(
    private readonly options: AssemblyAiRecognitionOptions,
    readonly profile: AudioProfile,
    private readonly logger: LoggerPort
  ) {
    this.client = new AssemblyAI({ apiKey: options.apiKey });
  }

  async open(): Promise<RecognitionConnection> {
    if (!this.options.apiKey) {
      throw new Error("ASSEMBLYAI_API_KEY is not set for streaming transcription.");
    }
    const transcriber = this.client.streaming.transcriber({
      sampleRate: this.profile.sampleRate,
      formatTurns: true,
      encoding: this.profile.encoding === "mulaw" ? "pcm_mulaw" : "pcm_s16le",
      maxTurnSilence: this.options.maxTurnSilence ?? 10000,
      minEndOfTurnSilenceWhenConfident: this.options.minEndOfTurnSilenceWhenConfident ?? 2000,
    });
    const connection = new AssemblyAiRecognitionConnection(transcriber, this.profile, this.logger);
    try {
      await transcriber.connect();
    } catch (err) {
      await connection.close();
      throw err;
    }
    return connection;
  }
}

export class AssemblyAiRecognitionConnection implements RecognitionConnection {
  readonly id = randomUUID();
  private readonly events = new AsyncChannel<RecognitionEvent>();
  private readonly minChunkBytes: number;
  private pendingAudio = Buffer.alloc(0);
  private currentTurn: number | null = null;
  private inputEnded = false;
  private sessionClosed = false;
  private closed = false;

  constructor(
    private readonly transcriber: StreamingTranscriber,
    profile: AudioProfile,
    private readonly logger: LoggerPort
  ) {
    const bytesPerSample = profile.encoding === "mulaw" ? 1 : 2;
    this.minChunkBytes = Math.max(1, Math.round((profile.sampleRate / 20) * bytesPerSample)); // 50ms chunks

    transcriber.on("open", ({ id }) => {
      this.logger.info("AssemblyAI session started", { sessionId: id });
    });
    transcriber.on("turn", (turn) => this.onTurn(turn));
    transcriber.on("error", (err) => {
      this.logger.warn("AssemblyAI transcriber error", { error: describeError(err) });
    });
    transcriber.on("close", (code, reason) => {
      this.logger.info("AssemblyAI session closed", { code, reason });
      this.sessionClosed = true;
      this.events.push({ type: "transcriber_connection_closed" });
    });
  }

  isAlive(): boolean {
    if (this.closed) return false;
    return !this.sessionClosed || this.events.buffered > 0;
  }

  write(audio: Buffer): void {
    if (this.inputEnded || this.sessionClosed) return;
    this.pendingAudio = this.pendingAudio.length ? Buffer.concat([this.pendingAudio, audio]) : Buffer.from(audio);

    while (this.pendingAudio.length >= this.minChunkBytes) {
      const slice = this.pendingAudio.subarray(0, this.minChunkBytes);
      this.pendingAudio = this.pendingAudio.subarray(this.minChunkBytes);
      this.transcriber.sendAudio(toArrayBuffer(slice));
    }
  }

  endInput(): void {
    if (this.inputEnded) return;
    this.inputEnded = true;
    if (this.pendingAudio.length && !this.sessionClosed) {
      this.transcriber.sendAudio(toArrayBuffer(this.pendingAudio));
    }
    this.pendingAudio = Buffer.alloc(0);
    this.transcriber.close(true).catch((err: unknown) => {
      this.logger.warn("Failed to terminate AssemblyAI session", { error: describeError(err) });
    });
  }

  async receive(signal: AbortSignal): Promise<RecognitionEvent> {
    const next = await this.events.next(signal);
    if (next.done) {
      throw new Error("AssemblyAI session is closed");
    }
    return next.value;
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.inputEnded = true;
    this.pendingAudio = Buffer.alloc(0);
    try {
      await this.transcriber.close(false);
    } finally {
      this.events.close();
    }
  }

  private onTurn(turn: TurnUpdate) {
    if (turn.turn_order !== this.currentTurn) {
      this.currentTurn = turn.turn_order;
      this.events.push({ type: "speech_started" });
    }
    const text = (turn.transcript || "").trim();
    if (turn.end_of_turn && turn.turn_is_formatted) {
      if (text) this.events.push({ type: "transcript", content: text });
      return;
    }
    if (text) this.events.push({ type: "interim_transcript_received", content: text });
  }
}
