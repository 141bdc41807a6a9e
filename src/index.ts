export { DuplexSpeechAdapter, type AdapterStatus, type DuplexAdapterOptions } from "./app/DuplexSpeechAdapter";
export {
  StreamingSynthesizer,
  END_OF_UNIT_SENTINEL,
  type StreamingSynthesizerOptions,
} from "./app/StreamingSynthesizer";
export { StreamingTranscriber, type StreamingTranscriberOptions } from "./app/StreamingTranscriber";
export { buildSpeechAdapters, type SpeechAdapters, type BuildOptions } from "./composition/container";
export { loadConfig, normalizeConfig, type SpeechConfig, type LoadedConfig } from "./config";

export { ConnectionManager, type ConnectionFactory } from "./domain/connection/ConnectionManager";
export { CorrelationQueue } from "./domain/speech/CorrelationQueue";
export { ResultSequencer, type InboundEvent, type UnitState } from "./domain/speech/ResultSequencer";
export { chunkText, DEFAULT_MAX_CHUNK_CHARS } from "./domain/speech/textChunker";
export { resolveAudioProfile, type AudioProfile } from "./domain/speech/audioProfile";
export { MalformedFrameError } from "./domain/speech/errors";
export {
  createMetadata,
  type AudioFormat,
  type MetadataInput,
  type ResultUnit,
  type UnitMetadata,
} from "./domain/speech/metadata";

export { ConsoleLogger } from "./adapters/sys/ConsoleLogger";
export { PcmAudioNormalizer } from "./adapters/audio/PcmAudioNormalizer";
export { InMemoryScalarCache } from "./adapters/cache/InMemoryScalarCache";
export { ElevenLabsStreamTransport } from "./adapters/speech/ElevenLabsStreamTransport";
export { AzureRecognitionTransport } from "./adapters/speech/AzureRecognitionTransport";
export { AssemblyAiRecognitionTransport } from "./adapters/speech/AssemblyAiRecognitionTransport";

export type { LoggerPort, LogLevel } from "./ports/sys/LoggerPort";
export type { ScalarCachePort } from "./ports/cache/ScalarCachePort";
export type { AudioNormalizerPort } from "./ports/audio/AudioNormalizerPort";
export type { SynthesisTransport, SynthesisConnection, SynthesisEvent } from "./ports/speech/SynthesisTransportPort";
export type {
  RecognitionTransport,
  RecognitionConnection,
  RecognitionEvent,
} from "./ports/speech/RecognitionTransportPort";
