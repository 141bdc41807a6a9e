import type { SourceAudioFormat } from "../audio/AudioNormalizerPort";

export type SynthesisEvent = { type: "audio"; audio: Buffer } | { type: "final" };

export interface SynthesisConnection {
  readonly id: string;
  isAlive(): boolean;
  sendText(text: string): Promise<void>;
  /** Asks the service to emit audio for everything buffered so far. */
  flush(): Promise<void>;
  /** Declares that no more text follows; the service answers with a final frame. */
  endInput(): Promise<void>;
  /** Rejects with `MalformedFrameError` when a frame cannot be decoded. */
  receive(signal: AbortSignal): Promise<SynthesisEvent[]>;
  close(): Promise<void>;
}

export interface SynthesisTransport {
  readonly name: string;
  readonly voice: string;
  readonly model: string;
  readonly outputFormat: SourceAudioFormat;
  readonly maxChunkChars?: number;
  open(): Promise<SynthesisConnection>;
}
