import { ValidationError } from '../errors';

/**
 * - `fixed`: consecutive slices of exactly `maxLength` characters, the last
 *   one holding the remainder. May split words and sentences.
 * - `boundary`: like `fixed`, but each chunk ends just after the last
 *   whitespace in its window when the window has one.
 */
export type ChunkStrategy = 'fixed' | 'boundary';

export const CHUNK_STRATEGIES: readonly ChunkStrategy[] = ['fixed', 'boundary'];

export function isChunkStrategy(value: string): value is ChunkStrategy {
  return (CHUNK_STRATEGIES as readonly string[]).includes(value);
}

function assertMaxLength(maxLength: number): void {
  if (!Number.isInteger(maxLength) || maxLength <= 0) {
    throw new ValidationError(`maxLength must be a positive integer, got ${maxLength}`);
  }
}

function lastWhitespaceEnd(window: string): number {
  for (let i = window.length - 1; i > 0; i--) {
    if (/\s/.test(window[i])) {
      return i + 1;
    }
  }
  return -1;
}

/**
 * Split `text` into ordered, non-overlapping pieces no longer than
 * `maxLength`. Joining the pieces gives back `text`; empty text gives no
 * pieces. Lengths are in UTF-16 code units.
 */
export function chunkText(
  text: string,
  maxLength: number,
  strategy: ChunkStrategy = 'fixed'
): string[] {
  assertMaxLength(maxLength);

  const chunks: string[] = [];

  if (strategy === 'fixed') {
    for (let start = 0; start < text.length; start += maxLength) {
      chunks.push(text.slice(start, start + maxLength));
    }
    return chunks;
  }

  let start = 0;
  while (start < text.length) {
    let end = Math.min(start + maxLength, text.length);
    if (end < text.length) {
      const cut = lastWhitespaceEnd(text.slice(start, end));
      if (cut > 0) end = start + cut;
    }
    chunks.push(text.slice(start, end));
    start = end;
  }
  return chunks;
}
