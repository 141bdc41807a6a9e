import type { AudioEncoding } from "./metadata";

export interface AudioProfile {
  encoding: AudioEncoding;
  sampleRate: number;
  bitsPerSample: number;
  channels: number;
}

/** Input format of the audio a telephony provider delivers to the transcriber. */
export function resolveAudioProfile(telephonyProvider?: string): AudioProfile {
  switch (telephonyProvider) {
    case "twilio":
      return { encoding: "mulaw", sampleRate: 8000, bitsPerSample: 8, channels: 1 };
    case "exotel":
    case "plivo":
      return { encoding: "pcm", sampleRate: 8000, bitsPerSample: 16, channels: 1 };
    case "web_based_call":
      return { encoding: "pcm", sampleRate: 16000, bitsPerSample: 16, channels: 1 };
    default:
      return { encoding: "pcm", sampleRate: 8000, bitsPerSample: 16, channels: 1 };
  }
}
