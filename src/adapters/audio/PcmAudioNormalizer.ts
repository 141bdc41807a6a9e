import type {
  AudioNormalizerPort,
  NormalizedAudio,
  SourceAudioFormat,
  TargetAudioFormat,
} from "../../ports/audio/AudioNormalizerPort";
import { pcmToWav } from "./wav";

const MULAW_BIAS = 0x84;
const MULAW_CLIP = 32635;

export function mulawToLinear(value: number): number {
  const inverted = ~value & 0xff;
  const sign = inverted & 0x80;
  const exponent = (inverted >> 4) & 0x07;
  const mantissa = inverted & 0x0f;
  const magnitude = (((mantissa << 3) + MULAW_BIAS) << exponent) - MULAW_BIAS;
  return sign ? -magnitude : magnitude;
}

export function linearToMulaw(sample: number): number {
  const sign = sample < 0 ? 0x80 : 0;
  let magnitude = Math.min(Math.abs(sample), MULAW_CLIP) + MULAW_BIAS;
  let exponent = 7;
  for (let mask = 0x4000; (magnitude & mask) === 0 && exponent > 0; mask >>= 1) {
    exponent -= 1;
  }
  const mantissa = (magnitude >> (exponent + 3)) & 0x0f;
  magnitude = sign | (exponent << 4) | mantissa;
  return ~magnitude & 0xff;
}

export function decodeMulaw(input: Buffer): Buffer {
  const out = Buffer.alloc(input.length * 2);
  for (let i = 0; i < input.length; i++) {
    out.writeInt16LE(mulawToLinear(input[i]), i * 2);
  }
  return out;
}

export function encodeMulaw(pcm: Buffer): Buffer {
  const samples = Math.floor(pcm.length / 2);
  const out = Buffer.alloc(samples);
  for (let i = 0; i < samples; i++) {
    out[i] = linearToMulaw(pcm.readInt16LE(i * 2));
  }
  return out;
}

/** Linear interpolation over 16-bit mono samples; a trailing odd byte is dropped. */
export function resamplePcm16(pcm: Buffer, fromRate: number, toRate: number): Buffer {
  const inSamples = Math.floor(pcm.length / 2);
  if (fromRate === toRate) return pcm.subarray(0, inSamples * 2);
  if (inSamples === 0) return Buffer.alloc(0);

  const outSamples = Math.max(1, Math.round((inSamples * toRate) / fromRate));
  const out = Buffer.alloc(outSamples * 2);
  const step = fromRate / toRate;
  for (let i = 0; i < outSamples; i++) {
    const position = i * step;
    const index = Math.min(Math.floor(position), inSamples - 1);
    const next = Math.min(index + 1, inSamples - 1);
    const fraction = position - Math.floor(position);
    const a = pcm.readInt16LE(index * 2);
    const b = pcm.readInt16LE(next * 2);
    out.writeInt16LE(Math.round(a + (b - a) * fraction), i * 2);
  }
  return out;
}

export class PcmAudioNormalizer implements AudioNormalizerPort {
  normalize(chunk: Buffer, source: SourceAudioFormat, target: TargetAudioFormat): NormalizedAudio {
    if (
      target.format === "mulaw" &&
      source.encoding === "mulaw" &&
      source.sampleRate === target.sampleRate
    ) {
      return { audio: chunk, format: "mulaw" };
    }

    const pcm = source.encoding === "mulaw" ? decodeMulaw(chunk) : chunk;
    const resampled = resamplePcm16(pcm, source.sampleRate, target.sampleRate);

    switch (target.format) {
      case "pcm":
        return { audio: resampled, format: "pcm" };
      case "wav":
        return { audio: pcmToWav(resampled, target.sampleRate), format: "wav" };
      case "mulaw":
        return { audio: encodeMulaw(resampled), format: "mulaw" };
    }
  }
}
