import type {
  RecognitionConnection,
  RecognitionEvent,
  RecognitionTransport,
} from "../ports/speech/RecognitionTransportPort";
import type { LoggerPort } from "../ports/sys/LoggerPort";
import type { AudioProfile } from "../domain/speech/audioProfile";
import { createAbortError } from "../domain/speech/errors";
import { createMetadata, type MetadataInput, type UnitMetadata } from "../domain/speech/metadata";
import type { InboundEvent, RenderedPayload } from "../domain/speech/ResultSequencer";
import { DuplexSpeechAdapter, type DuplexAdapterOptions } from "./DuplexSpeechAdapter";

export type StreamingTranscriberOptions = DuplexAdapterOptions;

/**
 * Streams caller audio frames to a recognition session. All frames up to the
 * one flagged `endOfUpstream` form a single unit; the session-stopped
 * notification that follows the end of input closes it.
 */
export class StreamingTranscriber extends DuplexSpeechAdapter<
  RecognitionConnection,
  RecognitionEvent,
  RecognitionEvent
> {
  private unit: UnitMetadata | null = null;
  private inputEnded = false;
  private bytes = 0;
  private firstAudioAt: number | null = null;

  constructor(
    private readonly transport: RecognitionTransport,
    logger: LoggerPort,
    options: StreamingTranscriberOptions = {}
  ) {
    super(
      `${transport.name} transcriber`,
      {
        name: transport.name,
        open: () => transport.open(),
        isAlive: (connection) => connection.isAlive(),
        close: (connection) => connection.close(),
      },
      logger,
      options
    );
  }

  get submittedBytes(): number {
    return this.bytes;
  }

  /** Epoch milliseconds of the first frame pushed, or null before any audio. */
  get audioSubmittedAt(): number | null {
    return this.firstAudioAt;
  }

  get profile(): AudioProfile {
    return this.transport.profile;
  }

  get activeRequestId(): string | null {
    return this.unit?.requestId ?? null;
  }

  push(frame: Buffer, input: MetadataInput = {}): void {
    if (this.state === "stopped") {
      this.logger.warn(`${this.label} is stopped; ignoring audio`, { bytes: frame.length });
      return;
    }
    if (this.inputEnded) {
      this.logger.warn("Audio input already ended; dropping frame", { bytes: frame.length });
      return;
    }

    this.bytes += frame.length;
    if (this.unit === null) {
      const submittedAt = Date.now();
      this.firstAudioAt = submittedAt;
      this.unit = createMetadata(input, { submittedAt });
      this.pendingUnits.enqueue(this.unit);
      this.logger.debug("Started transcription unit", { requestId: this.unit.requestId });
    }

    const requestId = this.unit.requestId;
    const endOfUpstream = input.endOfUpstream === true;
    if (endOfUpstream) this.inputEnded = true;

    this.sender.schedule(`Audio for ${requestId}`, async (signal) => {
      if (signal.aborted) throw createAbortError(`${this.label} send cancelled`);
      const connection = await this.connections.waitForLive(signal, this.connectionPollMs);
      if (frame.length > 0) connection.write(frame);
      if (endOfUpstream) {
        connection.endInput();
        this.logger.info("End of audio input", { requestId, bytes: this.bytes });
      }
    });
  }

  protected override shouldMaintain(): boolean {
    return !this.inputEnded;
  }

  protected async receive(
    connection: RecognitionConnection,
    signal: AbortSignal
  ): Promise<InboundEvent<RecognitionEvent>[]> {
    const event = await connection.receive(signal);
    if (event.type !== "transcriber_connection_closed") {
      return [{ payload: event, endOfUnit: false }];
    }
    // Only the close that follows end of input ends the unit; earlier ones are reconnected.
    if (!this.inputEnded) {
      this.logger.warn(`${this.label} session closed before end of input; reconnecting`, {
        requestId: this.unit?.requestId ?? null,
      });
      return [];
    }
    return [{ payload: event, endOfUnit: true }];
  }

  protected render(payload: RecognitionEvent): RenderedPayload<RecognitionEvent> {
    return { data: payload };
  }
}
