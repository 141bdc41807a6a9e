import { chunkText, DEFAULT_MAX_CHUNK_CHARS } from '../../../src/domain/speech/textChunker';

describe('chunkText', () => {
  test('keeps short text in one chunk with a trailing space', () => {
    expect(chunkText('Hello world')).toEqual(['Hello world ']);
  });

  test('splits after clause punctuation', () => {
    expect(chunkText('Hi, there. How are you?')).toEqual(['Hi, ', 'there. ', 'How are you? ']);
  });

  test('never breaks words when the limit is reached', () => {
    expect(chunkText('alpha beta gamma delta', 11)).toEqual(['alpha beta ', 'gamma delta ']);
  });

  test('a single word longer than the limit becomes its own chunk', () => {
    expect(chunkText('a supercalifragilistic b', 5)).toEqual(['a ', 'supercalifragilistic ', 'b ']);
  });

  test('empty or whitespace-only text yields no chunks', () => {
    expect(chunkText('')).toEqual([]);
    expect(chunkText('   \n ')).toEqual([]);
  });

  test('collapses runs of whitespace', () => {
    expect(chunkText('one   two\nthree')).toEqual(['one two three ']);
  });

  test('default limit is 250 characters', () => {
    expect(DEFAULT_MAX_CHUNK_CHARS).toBe(250);
    const words = Array.from({ length: 60 }, () => 'word').join(' ');
    const chunks = chunkText(words);
    expect(chunks).toHaveLength(2);
    expect(chunks[0].length).toBeLessThanOrEqual(251);
  });
});
