export const DEFAULT_MAX_CHUNK_CHARS = 250;

const CLAUSE_ENDINGS = new Set([".", ",", "?", "!", ";", ":", "—", "-", "(", ")", "[", "]", "}"]);

/**
 * Splits text into word-aligned chunks for incremental synthesis. A chunk ends
 * after clause punctuation or before it would exceed `maxChars`; words are
 * never broken, so a single word longer than the limit becomes its own chunk.
 * Every chunk carries one trailing space.
 */
export function chunkText(text: string, maxChars = DEFAULT_MAX_CHUNK_CHARS): string[] {
  const words = text.split(/\s+/).filter((word) => word.length > 0);
  const chunks: string[] = [];
  let current = "";

  for (const word of words) {
    const candidate = current ? `${current} ${word}` : word;
    if (current && candidate.length > maxChars) {
      chunks.push(`${current} `);
      current = word;
    } else {
      current = candidate;
    }

    if (CLAUSE_ENDINGS.has(current.charAt(current.length - 1))) {
      chunks.push(`${current} `);
      current = "";
    }
  }

  if (current) chunks.push(`${current} `);
  return chunks;
}
