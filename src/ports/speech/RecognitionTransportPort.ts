import type { AudioProfile } from "../../domain/speech/audioProfile";

export type RecognitionEvent =
  | { type: "speech_started"; sessionId?: string }
  | { type: "interim_transcript_received"; content: string }
  | { type: "transcript"; content: string }
  | { type: "transcriber_connection_closed"; sessionId?: string };

export interface RecognitionConnection {
  readonly id: string;
  isAlive(): boolean;
  write(audio: Buffer): void;
  /** Closes the audio input; the session stops once pending audio is recognized. */
  endInput(): void;
  receive(signal: AbortSignal): Promise<RecognitionEvent>;
  close(): Promise<void>;
}

export interface RecognitionTransport {
  readonly name: string;
  readonly profile: AudioProfile;
  open(): Promise<RecognitionConnection>;
}
