/**
 * @jest-environment node
 */
import path from 'node:path';

// We'll mock dotenv so importing the module doesn't read the real .env
jest.mock('dotenv', () => ({ config: jest.fn() }));

const SPEECH_KEYS = [
  'ELEVENLABS_API_KEY',
  'ELEVENLABS_VOICE_ID',
  'ELEVENLABS_MODEL',
  'AZURE_SPEECH_KEY',
  'AZURE_SPEECH_REGION',
  'ASSEMBLYAI_API_KEY',
  'LOG_LEVEL',
];

// Helper to (re)load the module with controlled env/argv
const loadEnvModule = (opts?: { env?: Record<string, string | undefined>; argv?: string[] }) => {
  const originalEnv = process.env;
  const originalArgv = process.argv;

  process.env = { ...originalEnv } as NodeJS.ProcessEnv;
  for (const key of SPEECH_KEYS) delete process.env[key];
  if (opts?.env) {
    for (const [key, value] of Object.entries(opts.env)) {
      if (value !== undefined) process.env[key] = value;
    }
  }
  process.argv = [
    process.execPath,
    path.join(process.cwd(), 'fake-script.js'),
    ...(opts?.argv ?? []),
  ];

  jest.resetModules();

  const mod = require('../src/env');

  // restore
  process.env = originalEnv;
  process.argv = originalArgv;

  return mod;
};

describe('env.ts', () => {
  test('reads provider credentials from the environment', () => {
    const mod = loadEnvModule({
      env: {
        ELEVENLABS_API_KEY: 'test-secret',
        ELEVENLABS_VOICE_ID: 'voice-1',
        AZURE_SPEECH_KEY: 'test-secret',
        AZURE_SPEECH_REGION: 'westus',
        ASSEMBLYAI_API_KEY: 'test-secret',
      },
    });

    expect(mod.ELEVENLABS_API_KEY).toBe('test-secret');
    expect(mod.ELEVENLABS_VOICE_ID).toBe('voice-1');
    expect(mod.AZURE_SPEECH_KEY).toBe('test-secret');
    expect(mod.AZURE_SPEECH_REGION).toBe('westus');
    expect(mod.ASSEMBLYAI_API_KEY).toBe('test-secret');
    expect(mod.CONFIG_PATH).toBeUndefined();
  });

  test('missing values default to empty strings and the turbo model', () => {
    const mod = loadEnvModule();
    expect(mod.ELEVENLABS_API_KEY).toBe('');
    expect(mod.AZURE_SPEECH_KEY).toBe('');
    expect(mod.ELEVENLABS_MODEL).toBe('eleven_turbo_v2_5');
    expect(mod.LOG_LEVEL).toBe('info');
  });

  test('--config sets CONFIG_PATH', () => {
    const mod = loadEnvModule({ argv: ['--config', './conf/speech.json'] });
    expect(mod.CONFIG_PATH).toBe('./conf/speech.json');
  });

  test('LOG_LEVEL precedence: env then CLI (last wins)', () => {
    expect(loadEnvModule({ env: { LOG_LEVEL: 'warn' } }).LOG_LEVEL).toBe('warn');
    expect(loadEnvModule({ env: { LOG_LEVEL: 'warn' }, argv: ['--debug'] }).LOG_LEVEL).toBe('debug');
    expect(loadEnvModule({ env: { LOG_LEVEL: 'debug' }, argv: ['--no-debug'] }).LOG_LEVEL).toBe('info');
    expect(loadEnvModule({ argv: ['--debug', '--no-debug'] }).LOG_LEVEL).toBe('info');
    expect(loadEnvModule({ env: { LOG_LEVEL: 'error' }, argv: ['--no-debug'] }).LOG_LEVEL).toBe('error');
  });

  test('unknown CLI args are ignored', () => {
    const mod = loadEnvModule({ argv: ['--wat', 'lol'] });
    expect(mod.CONFIG_PATH).toBeUndefined();
    expect(mod.LOG_LEVEL).toBe('info');
  });
});
