import { config } from 'dotenv';

config();

export const ELEVENLABS_API_KEY = process.env.ELEVENLABS_API_KEY ?? '';
export const ELEVENLABS_VOICE_ID = process.env.ELEVENLABS_VOICE_ID ?? '';
export const ELEVENLABS_MODEL = process.env.ELEVENLABS_MODEL || 'eleven_turbo_v2_5';
export const AZURE_SPEECH_KEY = process.env.AZURE_SPEECH_KEY ?? '';
export const AZURE_SPEECH_REGION = process.env.AZURE_SPEECH_REGION ?? '';
export const ASSEMBLYAI_API_KEY = process.env.ASSEMBLYAI_API_KEY ?? '';
export let LOG_LEVEL = process.env.LOG_LEVEL || 'info';

const cliArgs = process.argv.slice(2);
let configPathArg: string | undefined;

for (let i = 0; i < cliArgs.length; i++) {
  const arg = cliArgs[i];
  switch (arg) {
    case '--config':
      if (cliArgs[i + 1]) {
        configPathArg = cliArgs[++i];
      }
      break;
    case '--debug':
      LOG_LEVEL = 'debug';
      break;
    case '--no-debug':
      if (LOG_LEVEL === 'debug') LOG_LEVEL = 'info';
      break;
    default:
      break;
  }
}

export const CONFIG_PATH = configPathArg;
