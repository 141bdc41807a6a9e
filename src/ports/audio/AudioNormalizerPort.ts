import type { AudioEncoding, AudioFormat } from "../../domain/speech/metadata";

export interface SourceAudioFormat {
  encoding: AudioEncoding;
  sampleRate: number;
}

export interface TargetAudioFormat {
  format: AudioFormat;
  sampleRate: number;
}

export interface NormalizedAudio {
  audio: Buffer;
  format: AudioFormat;
}

/**
 * Converts provider audio into the caller's requested container and rate.
 * Implementations must be pure: the same chunk always yields the same output.
 */
export interface AudioNormalizerPort {
  normalize(chunk: Buffer, source: SourceAudioFormat, target: TargetAudioFormat): NormalizedAudio;
}
