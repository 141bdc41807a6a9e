import fs from "fs";
import path from "path";
import type { LoggerPort } from "./ports/sys/LoggerPort";
import type { AudioFormat } from "./domain/speech/metadata";
import { ConsoleLogger } from "./adapters/sys/ConsoleLogger";

export type TranscriberProvider = "azure" | "assemblyai";

export interface SynthesizerConfig {
  voiceId?: string;
  model?: string;
  useMulaw: boolean;
  /** Provider PCM rate; the caller receives audio at this rate too. */
  sampleRate?: number;
  format: AudioFormat;
  cache: boolean;
  maxChunkChars?: number;
  stability?: number;
  similarityBoost?: number;
  supervisorIntervalMs?: number;
}

export interface TranscriberConfig {
  provider: TranscriberProvider;
  telephonyProvider?: string;
  language?: string;
  supervisorIntervalMs?: number;
}

export interface SpeechConfig {
  synthesizer: SynthesizerConfig;
  transcriber: TranscriberConfig;
}

export interface LoadedConfig {
  config: SpeechConfig;
  path?: string;
}

const DEFAULT_CONFIG_FILENAMES = ["speech.config.json"];

export const DEFAULT_SPEECH_CONFIG: SpeechConfig = {
  synthesizer: { useMulaw: false, format: "wav", cache: true },
  transcriber: { provider: "azure" },
};

export function loadConfig(configPath?: string, logger: LoggerPort = new ConsoleLogger()): LoadedConfig {
  const searchPaths = configPath
    ? [configPath]
    : DEFAULT_CONFIG_FILENAMES.map((name) => path.resolve(process.cwd(), name));

  for (const candidate of searchPaths) {
    try {
      const resolved = path.resolve(candidate);
      if (!fs.existsSync(resolved)) continue;
      const parsed: unknown = JSON.parse(fs.readFileSync(resolved, "utf8"));
      return { config: normalizeConfig(parsed, logger), path: resolved };
    } catch (err) {
      logger.warn(`Failed to load config from ${candidate}`, {
        error: err instanceof Error ? err.message : String(err),
      });
    }
  }

  return { config: normalizeConfig({}, logger) };
}

export function normalizeConfig(input: unknown, logger: LoggerPort = new ConsoleLogger()): SpeechConfig {
  const root = isRecord(input) ? input : {};
  return {
    synthesizer: normalizeSynthesizer(root.synthesizer, logger),
    transcriber: normalizeTranscriber(root.transcriber, logger),
  };
}

function normalizeSynthesizer(input: unknown, logger: LoggerPort): SynthesizerConfig {
  const out: SynthesizerConfig = { ...DEFAULT_SPEECH_CONFIG.synthesizer };
  if (!isRecord(input)) return out;

  out.voiceId = readString(input, "voiceId", "synthesizer", logger);
  out.model = readString(input, "model", "synthesizer", logger);
  out.useMulaw = readBoolean(input, "useMulaw", "synthesizer", logger) ?? out.useMulaw;
  out.cache = readBoolean(input, "cache", "synthesizer", logger) ?? out.cache;
  out.sampleRate = readPositive(input, "sampleRate", "synthesizer", logger);
  out.maxChunkChars = readPositive(input, "maxChunkChars", "synthesizer", logger);
  out.supervisorIntervalMs = readPositive(input, "supervisorIntervalMs", "synthesizer", logger);
  out.stability = readUnit(input, "stability", logger);
  out.similarityBoost = readUnit(input, "similarityBoost", logger);

  // Mu-law output is handed through as mu-law unless another format is asked for.
  if (out.useMulaw) out.format = "mulaw";
  const format = input.format;
  if (format === "wav" || format === "pcm" || format === "mulaw") {
    out.format = format;
  } else if (format !== undefined) {
    logger.warn(`Invalid synthesizer format ${JSON.stringify(format)}; expected wav, pcm or mulaw.`);
  }
  return out;
}

function normalizeTranscriber(input: unknown, logger: LoggerPort): TranscriberConfig {
  const out: TranscriberConfig = { ...DEFAULT_SPEECH_CONFIG.transcriber };
  if (!isRecord(input)) return out;

  const provider = input.provider;
  if (provider === "azure" || provider === "assemblyai") {
    out.provider = provider;
  } else if (provider !== undefined) {
    logger.warn(`Invalid transcriber provider ${JSON.stringify(provider)}; using ${out.provider}.`);
  }
  out.telephonyProvider = readString(input, "telephonyProvider", "transcriber", logger);
  out.language = readString(input, "language", "transcriber", logger);
  out.supervisorIntervalMs = readPositive(input, "supervisorIntervalMs", "transcriber", logger);
  return out;
}

function readString(
  input: Record<string, unknown>,
  key: string,
  section: string,
  logger: LoggerPort
): string | undefined {
  const value = input[key];
  if (value === undefined) return undefined;
  if (typeof value === "string" && value.trim()) return value.trim();
  logger.warn(`Invalid ${section}.${key}; expected a non-empty string.`);
  return undefined;
}

function readBoolean(
  input: Record<string, unknown>,
  key: string,
  section: string,
  logger: LoggerPort
): boolean | undefined {
  const value = input[key];
  if (value === undefined) return undefined;
  if (typeof value === "boolean") return value;
  logger.warn(`Invalid ${section}.${key}; expected true or false.`);
  return undefined;
}

function readPositive(
  input: Record<string, unknown>,
  key: string,
  section: string,
  logger: LoggerPort
): number | undefined {
  const value = input[key];
  if (value === undefined) return undefined;
  if (typeof value === "number" && Number.isFinite(value) && value > 0) return value;
  logger.warn(`Invalid ${section}.${key}; expected a positive number.`);
  return undefined;
}

function readUnit(input: Record<string, unknown>, key: string, logger: LoggerPort): number | undefined {
  const value = input[key];
  if (value === undefined) return undefined;
  if (typeof value === "number" && value >= 0 && value <= 1) return value;
  logger.warn(`Invalid synthesizer.${key}; expected a number between 0 and 1.`);
  return undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
