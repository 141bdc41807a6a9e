import { loadConfig, type SpeechConfig } from '../config';
import {
  CONFIG_PATH,
  ELEVENLABS_API_KEY,
  ELEVENLABS_VOICE_ID,
  ELEVENLABS_MODEL,
  AZURE_SPEECH_KEY,
  AZURE_SPEECH_REGION,
  ASSEMBLYAI_API_KEY,
  LOG_LEVEL,
} from '../env';
import type { RecognitionTransport } from '../ports/speech/RecognitionTransportPort';
import { ConsoleLogger, parseLogLevel } from '../adapters/sys/ConsoleLogger';
import { PcmAudioNormalizer } from '../adapters/audio/PcmAudioNormalizer';
import { InMemoryScalarCache } from '../adapters/cache/InMemoryScalarCache';
import { ElevenLabsStreamTransport } from '../adapters/speech/ElevenLabsStreamTransport';
import { AzureRecognitionTransport } from '../adapters/speech/AzureRecognitionTransport';
import { AssemblyAiRecognitionTransport } from '../adapters/speech/AssemblyAiRecognitionTransport';
import { resolveAudioProfile } from '../domain/speech/audioProfile';
import { StreamingSynthesizer } from '../app/StreamingSynthesizer';
import { StreamingTranscriber } from '../app/StreamingTranscriber';

export interface SpeechAdapters {
  synthesizer: StreamingSynthesizer;
  transcriber: StreamingTranscriber;
  config: SpeechConfig;
  start(): Promise<void>;
  shutdown(): Promise<void>;
}

export interface BuildOptions {
  /** Overrides the config file lookup. */
  config?: SpeechConfig;
  logger?: ConsoleLogger;
}

export function buildSpeechAdapters(options: BuildOptions = {}): SpeechAdapters {
  const logger = options.logger ?? new ConsoleLogger({ level: parseLogLevel(LOG_LEVEL) });
  let config = options.config;
  if (!config) {
    const loaded = loadConfig(CONFIG_PATH, logger.child('config'));
    if (loaded.path) {
      logger.info(`Loaded config from ${loaded.path}`);
    }
    config = loaded.config;
  }

  const synthConfig = config.synthesizer;
  const synthLogger = logger.child('synthesizer');
  const synthTransport = new ElevenLabsStreamTransport(
    {
      apiKey: ELEVENLABS_API_KEY,
      voiceId: synthConfig.voiceId ?? ELEVENLABS_VOICE_ID,
      model: synthConfig.model ?? ELEVENLABS_MODEL,
      useMulaw: synthConfig.useMulaw,
      sampleRate: synthConfig.sampleRate,
      maxChunkChars: synthConfig.maxChunkChars,
      voiceSettings: {
        stability: synthConfig.stability ?? 0.5,
        similarityBoost: synthConfig.similarityBoost ?? 0.8,
      },
    },
    synthLogger
  );
  const synthesizer = new StreamingSynthesizer(synthTransport, synthLogger, {
    normalizer: new PcmAudioNormalizer(),
    defaultFormat: synthConfig.format,
    cache: synthConfig.cache ? new InMemoryScalarCache<Buffer[]>() : undefined,
    supervisorIntervalMs: synthConfig.supervisorIntervalMs,
  });

  const transConfig = config.transcriber;
  const transLogger = logger.child('transcriber');
  const profile = resolveAudioProfile(transConfig.telephonyProvider);
  const recognition: RecognitionTransport =
    transConfig.provider === 'assemblyai'
      ? new AssemblyAiRecognitionTransport({ apiKey: ASSEMBLYAI_API_KEY }, profile, transLogger)
      : new AzureRecognitionTransport(
          {
            subscriptionKey: AZURE_SPEECH_KEY,
            region: AZURE_SPEECH_REGION,
            language: transConfig.language,
          },
          profile,
          transLogger
        );
  const transcriber = new StreamingTranscriber(recognition, transLogger, {
    supervisorIntervalMs: transConfig.supervisorIntervalMs,
  });

  return {
    synthesizer,
    transcriber,
    config,
    async start() {
      await Promise.all([synthesizer.start(), transcriber.start()]);
    },
    async shutdown() {
      await Promise.all([synthesizer.stop(), transcriber.stop()]);
    },
  };
}
