import { randomUUID } from "crypto";
import * as sdk from "microsoft-cognitiveservices-speech-sdk";
import type {
  RecognitionConnection,
  RecognitionEvent,
  RecognitionTransport,
} from "../../ports/speech/RecognitionTransportPort";
import type { LoggerPort } from "../../ports/sys/LoggerPort";
import { AsyncChannel } from "../../domain/concurrency/AsyncChannel";
import type { AudioProfile } from "../../domain/speech/audioProfile";
import { toArrayBuffer } from "../audio/buffers";

export interface AzureRecognitionOptions {
  subscriptionKey: string;
  region: string;
  language?: string;
}

export class AzureRecognitionTransport implements RecognitionTransport {
  readonly name = "Azure Speech";

  constructor(
    private readonly options: AzureRecognitionOptions,
    readonly profile: AudioProfile,
    private readonly logger: LoggerPort
  ) {}

  async open(): Promise<RecognitionConnection> {
    if (!this.options.subscriptionKey) {
      throw new Error("AZURE_SPEECH_KEY is not set for streaming transcription.");
    }
    if (!this.options.region) {
      throw new Error("AZURE_SPEECH_REGION is not configured.");
    }

    const speechConfig = sdk.SpeechConfig.fromSubscription(this.options.subscriptionKey, this.options.region);
    speechConfig.speechRecognitionLanguage = this.options.language ?? "en-US";

    const { sampleRate, bitsPerSample, channels, encoding } = this.profile;
    const format = sdk.AudioStreamFormat.getWaveFormat(
      sampleRate,
      bitsPerSample,
      channels,
      encoding === "mulaw" ? sdk.AudioFormatTag.MuLaw : sdk.AudioFormatTag.PCM
    );
    const pushStream = sdk.AudioInputStream.createPushStream(format);
    const recognizer = new sdk.SpeechRecognizer(speechConfig, sdk.AudioConfig.fromStreamInput(pushStream));

    const connection = new AzureRecognitionConnection(recognizer, pushStream, this.logger);
    await connection.begin();
    return connection;
  }
}

export class AzureRecognitionConnection implements RecognitionConnection {
  readonly id = randomUUID();
  private readonly events = new AsyncChannel<RecognitionEvent>();
  private inputEnded = false;
  private sessionStopped = false;
  private closed = false;

  constructor(
    private readonly recognizer: sdk.SpeechRecognizer,
    private readonly pushStream: sdk.PushAudioInputStream,
    private readonly logger: LoggerPort
  ) {
    recognizer.sessionStarted = (_sender, e) => {
      this.logger.info("Azure session started", { sessionId: e.sessionId });
    };
    recognizer.speechStartDetected = (_sender, e) => {
      this.events.push({ type: "speech_started", sessionId: e.sessionId });
    };
    recognizer.recognizing = (_sender, e) => {
      this.logger.debug("Intermediate result", { text: e.result.text });
      this.events.push({ type: "interim_transcript_received", content: e.result.text });
    };
    recognizer.recognized = (_sender, e) => {
      if (e.result.reason === sdk.ResultReason.RecognizedSpeech) {
        this.events.push({ type: "transcript", content: e.result.text });
      } else if (e.result.reason === sdk.ResultReason.NoMatch) {
        this.logger.debug("No speech could be recognized");
      }
    };
    recognizer.canceled = (_sender, e) => {
      if (e.reason === sdk.CancellationReason.Error) {
        this.logger.warn("Azure recognition canceled", { error: e.errorDetails, code: e.errorCode });
      } else {
        this.logger.info("Azure recognition canceled", { reason: e.reason });
      }
    };
    recognizer.sessionStopped = (_sender, e) => {
      this.logger.info("Azure session stopped", { sessionId: e.sessionId });
      this.sessionStopped = true;
      this.events.push({ type: "transcriber_connection_closed", sessionId: e.sessionId });
    };
  }

  /** Alive until closed; after the session stops, only while events remain to be read. */
  isAlive(): boolean {
    if (this.closed) return false;
    return !this.sessionStopped || this.events.buffered > 0;
  }

  begin(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.recognizer.startContinuousRecognitionAsync(
        () => resolve(),
        (error: string) => reject(new Error(`Failed to start Azure recognition: ${error}`))
      );
    });
  }

  write(audio: Buffer): void {
    if (this.inputEnded) return;
    this.pushStream.write(toArrayBuffer(audio));
  }

  endInput(): void {
    if (this.inputEnded) return;
    this.inputEnded = true;
    this.pushStream.close();
  }

  async receive(signal: AbortSignal): Promise<RecognitionEvent> {
    const next = await this.events.next(signal);
    if (next.done) {
      throw new Error("Azure recognition session is closed");
    }
    return next.value;
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.endInput();
    try {
      await new Promise<void>((resolve, reject) => {
        this.recognizer.stopContinuousRecognitionAsync(
          () => resolve(),
          (error: string) => reject(new Error(error))
        );
      });
    } finally {
      this.recognizer.close();
      this.events.close();
    }
  }
}
