import { AssemblyAiRecognitionTransport } from '../../../src/adapters/speech/AssemblyAiRecognitionTransport';
import { resolveAudioProfile } from '../../../src/domain/speech/audioProfile';
import { RecordingLogger } from '../../helpers/fakes';

// Simple EventEmitter mock
class Emitter {
  private listeners: Record<string, Function[]> = {};
  on(evt: string, cb: Function) { (this.listeners[evt] ||= []).push(cb); }
  emit(evt: string, ...args: any[]) { for (const f of (this.listeners[evt] || [])) { (f as any)(...args); } }
}

let lastTranscriber: any;
let lastEmitter: Emitter;
let lastOptions: any;

jest.mock('assemblyai', () => {
  return {
    AssemblyAI: jest.fn().mockImplementation(() => ({
      streaming: {
        transcriber: jest.fn((opts: any) => {
          const em = new Emitter();
          lastEmitter = em;
          lastOptions = opts;
          lastTranscriber = {
            connect: jest.fn(async () => { em.emit('open', { id: 'session-1' }); }),
            close: jest.fn(async (_wait?: boolean) => { em.emit('close', 1000, 'done'); }),
            sendAudio: jest.fn(),
            on: (evt: string, cb: Function) => em.on(evt, cb),
          };
          return lastTranscriber;
        }),
      },
    })),
    StreamingTranscriber: class {},
  };
});

function makeTransport(provider?: string) {
  return new AssemblyAiRecognitionTransport({ apiKey: 'test-secret' }, resolveAudioProfile(provider), new RecordingLogger());
}

describe('AssemblyAiRecognitionTransport', () => {
  test('opens a streaming session matching the input profile', async () => {
    await makeTransport('twilio').open();
    expect(lastOptions).toEqual({
      sampleRate: 8000,
      formatTurns: true,
      encoding: 'pcm_mulaw',
      maxTurnSilence: 10000,
      minEndOfTurnSilenceWhenConfident: 2000,
    });
    expect(lastTranscriber.connect).toHaveBeenCalledTimes(1);
  });

  test('sends audio in 50ms slices and flushes the remainder on endInput', async () => {
    const connection = await makeTransport('web_based_call').open();
    // 16 kHz linear16: 50ms = 1600 bytes
    connection.write(Buffer.alloc(1000, 1));
    expect(lastTranscriber.sendAudio).not.toHaveBeenCalled();
    connection.write(Buffer.alloc(1000, 2));
    expect(lastTranscriber.sendAudio).toHaveBeenCalledTimes(1);
    expect(lastTranscriber.sendAudio.mock.calls[0][0].byteLength).toBe(1600);

    connection.endInput();
    expect(lastTranscriber.sendAudio).toHaveBeenCalledTimes(2);
    expect(lastTranscriber.sendAudio.mock.calls[1][0].byteLength).toBe(400);
    expect(lastTranscriber.close).toHaveBeenCalledWith(true);
  });

  test('turns become speech, interim and final transcript events', async () => {
    const connection = await makeTransport().open();
    const signal = new AbortController().signal;

    lastEmitter.emit('turn', { turn_order: 0, turn_is_formatted: false, end_of_turn: false, transcript: 'hel' });
    lastEmitter.emit('turn', { turn_order: 0, turn_is_formatted: false, end_of_turn: true, transcript: 'hello' });
    lastEmitter.emit('turn', { turn_order: 0, turn_is_formatted: true, end_of_turn: true, transcript: 'Hello.' });

    expect(await connection.receive(signal)).toEqual({ type: 'speech_started' });
    expect(await connection.receive(signal)).toEqual({ type: 'interim_transcript_received', content: 'hel' });
    expect(await connection.receive(signal)).toEqual({ type: 'interim_transcript_received', content: 'hello' });
    expect(await connection.receive(signal)).toEqual({ type: 'transcript', content: 'Hello.' });
  });

  test('session close yields the closing event, then the connection goes down', async () => {
    const connection = await makeTransport().open();
    lastEmitter.emit('close', 1000, 'normal');
    expect(connection.isAlive()).toBe(true);
    expect(await connection.receive(new AbortController().signal)).toEqual({ type: 'transcriber_connection_closed' });
    expect(connection.isAlive()).toBe(false);
  });

  test('close shuts the transcriber without waiting for termination', async () => {
    const connection = await makeTransport().open();
    await connection.close();
    expect(lastTranscriber.close).toHaveBeenCalledWith(false);
    expect(connection.isAlive()).toBe(false);
  });

  test('open requires an API key', async () => {
    const transport = new AssemblyAiRecognitionTransport({ apiKey: '' }, resolveAudioProfile(), new RecordingLogger());
    await expect(transport.open()).rejects.toThrow('ASSEMBLYAI_API_KEY is not set for streaming transcription.');
  });
});
