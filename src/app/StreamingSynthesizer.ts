import { createHash } from "crypto";
import type { AudioNormalizerPort } from "../ports/audio/AudioNormalizerPort";
import type { ScalarCachePort } from "../ports/cache/ScalarCachePort";
import type { SynthesisConnection, SynthesisTransport } from "../ports/speech/SynthesisTransportPort";
import type { LoggerPort } from "../ports/sys/LoggerPort";
import { createAbortError } from "../domain/speech/errors";
import {
  createMetadata,
  type AudioFormat,
  type MetadataInput,
  type ResultUnit,
  type UnitMetadata,
} from "../domain/speech/metadata";
import type { InboundEvent, RenderedPayload } from "../domain/speech/ResultSequencer";
import { chunkText, DEFAULT_MAX_CHUNK_CHARS } from "../domain/speech/textChunker";
import { DuplexSpeechAdapter, type DuplexAdapterOptions } from "./DuplexSpeechAdapter";

/** Payload standing for "no more audio for this unit". */
export const END_OF_UNIT_SENTINEL: Buffer = Buffer.from([0]);

export interface StreamingSynthesizerOptions extends DuplexAdapterOptions {
  normalizer: AudioNormalizerPort;
  /** Container used when a unit's metadata names no format. */
  defaultFormat?: AudioFormat;
  /** Sample rate of the audio handed to the caller. */
  sampleRate?: number;
  /** Raw provider chunks per text; leave out to disable caching. */
  cache?: ScalarCachePort<Buffer[]>;
}

export class StreamingSynthesizer extends DuplexSpeechAdapter<SynthesisConnection, Buffer, Buffer> {
  private readonly normalizer: AudioNormalizerPort;
  private readonly defaultFormat: AudioFormat;
  private readonly targetSampleRate: number;
  private readonly cache?: ScalarCachePort<Buffer[]>;
  private readonly maxChunkChars: number;
  private readonly collected = new Map<string, Buffer[]>();
  private characters = 0;
  private cacheHits = 0;

  constructor(
    private readonly transport: SynthesisTransport,
    logger: LoggerPort,
    options: StreamingSynthesizerOptions
  ) {
    super(
      `${transport.name} synthesizer`,
      {
        name: transport.name,
        open: () => transport.open(),
        isAlive: (connection) => connection.isAlive(),
        close: (connection) => connection.close(),
      },
      logger,
      options
    );
    this.normalizer = options.normalizer;
    this.defaultFormat = options.defaultFormat ?? "wav";
    this.targetSampleRate = options.sampleRate ?? transport.outputFormat.sampleRate;
    this.cache = options.cache;
    this.maxChunkChars = transport.maxChunkChars ?? DEFAULT_MAX_CHUNK_CHARS;
  }

  get synthesizedCharacters(): number {
    return this.characters;
  }

  get engine(): string {
    return this.transport.model;
  }

  get cacheHitCount(): number {
    return this.cacheHits;
  }

  push(text: string, input: MetadataInput = {}): void {
    if (this.state === "stopped") {
      this.logger.warn(`${this.label} is stopped; ignoring text`, { requestId: input.requestId });
      return;
    }

    this.characters += text.length;
    const meta = createMetadata(input, { text });

    const cached = this.cache?.get(this.cacheKey(text));
    if (cached && this.isIdle()) {
      this.cacheHits += 1;
      this.logger.debug("Serving synthesis from cache", { requestId: meta.requestId, chunks: cached.length });
      this.pendingUnits.enqueue(meta);
      for (const audio of cached) this.injectLocal({ payload: audio, endOfUnit: false });
      this.injectLocal({ payload: END_OF_UNIT_SENTINEL, endOfUnit: true });
      return;
    }

    this.pendingUnits.enqueue(meta);
    const chunks = chunkText(text, this.maxChunkChars);
    this.sender.schedule(`Synthesis of ${meta.requestId}`, async (signal) => {
      for (const chunk of chunks) {
        const connection = await this.liveConnection(signal);
        await connection.sendText(chunk);
      }
      const connection = await this.liveConnection(signal);
      await connection.flush();
      if (meta.endOfUpstream) await connection.endInput();
      this.logger.debug("Submitted text for synthesis", {
        requestId: meta.requestId,
        chunks: chunks.length,
        endOfUpstream: meta.endOfUpstream,
      });
    });
  }

  protected async receive(
    connection: SynthesisConnection,
    signal: AbortSignal
  ): Promise<InboundEvent<Buffer>[]> {
    const events = await connection.receive(signal);
    return events.map((event) =>
      event.type === "audio"
        ? { payload: event.audio, endOfUnit: false }
        : { payload: END_OF_UNIT_SENTINEL, endOfUnit: true }
    );
  }

  protected render(payload: Buffer, meta: UnitMetadata): RenderedPayload<Buffer> {
    const source = this.transport.outputFormat;
    const format = meta.format ?? this.defaultFormat;
    // 0x00 is a full-scale mu-law sample; the sentinel must not decode into audio.
    const audio =
      payload === END_OF_UNIT_SENTINEL && source.encoding === "mulaw" && format !== "mulaw"
        ? Buffer.alloc(0)
        : payload;
    const normalized = this.normalizer.normalize(audio, source, {
      format,
      sampleRate: this.targetSampleRate,
    });
    return { data: normalized.audio, format: normalized.format };
  }

  protected override observe(event: InboundEvent<Buffer>, unit: ResultUnit<Buffer>): void {
    if (!this.cache) return;
    const { requestId, text } = unit.meta;
    if (unit.meta.isFirstChunk) {
      // A unit that never saw its sentinel is not cacheable; drop its audio.
      this.collected.clear();
      this.collected.set(requestId, []);
    }

    if (!event.endOfUnit) {
      this.collected.get(requestId)?.push(event.payload);
      return;
    }

    const chunks = this.collected.get(requestId);
    this.collected.delete(requestId);
    if (text === undefined || !chunks || chunks.length === 0) return;
    const key = this.cacheKey(text);
    if (!this.cache.has(key)) this.cache.set(key, chunks);
  }

  private isIdle(): boolean {
    return this.pendingUnits.size === 0 && this.sequencer.idle && this.sender.inFlight === 0;
  }

  private async liveConnection(signal: AbortSignal): Promise<SynthesisConnection> {
    if (signal.aborted) throw createAbortError(`${this.label} send cancelled`);
    return this.connections.waitForLive(signal, this.connectionPollMs);
  }

  private cacheKey(text: string): string {
    const { encoding, sampleRate } = this.transport.outputFormat;
    return createHash("sha256")
      .update(JSON.stringify([text, this.transport.voice, this.transport.model, encoding, sampleRate]))
      .digest("hex");
  }
}
