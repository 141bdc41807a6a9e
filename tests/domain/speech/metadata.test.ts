import { createMetadata, reviseMetadata } from '../../../src/domain/speech/metadata';

describe('metadata', () => {
  test('createMetadata keeps caller fields and defaults flags', () => {
    const meta = createMetadata(
      { requestId: 'req-1', sequenceId: 3, format: 'pcm', extra: { turn: 2 } },
      { text: 'hi', submittedAt: 1000 }
    );
    expect(meta).toEqual({
      requestId: 'req-1',
      sequenceId: 3,
      format: 'pcm',
      text: 'hi',
      endOfUpstream: false,
      isFirstChunk: false,
      endOfStream: false,
      submittedAt: 1000,
      version: 0,
      extra: { turn: 2 },
    });
  });

  test('generates a request id when none is given', () => {
    const a = createMetadata();
    const b = createMetadata({ requestId: '  ' });
    expect(a.requestId).toMatch(/^[0-9a-f-]{36}$/);
    expect(b.requestId).not.toBe(a.requestId);
  });

  test('reviseMetadata returns a new record with a bumped version', () => {
    const meta = createMetadata({ requestId: 'x' });
    const revised = reviseMetadata(meta, { isFirstChunk: true });
    expect(revised.isFirstChunk).toBe(true);
    expect(revised.version).toBe(1);
    expect(meta.isFirstChunk).toBe(false);
    expect(meta.version).toBe(0);
  });
});
