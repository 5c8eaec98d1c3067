/**
 * Whitespace-aware text chunking with overlap
 */

export interface ChunkOptions {
  chunkSize: number;
  chunkOverlap: number;
}

function lastWhitespace(text: string, from: number, notBefore: number): number {
  for (let i = from; i > notBefore; i--) {
    if (/\s/.test(text[i])) return i;
  }
  return -1;
}

function nextWordStart(text: string, from: number, limit: number): number {
  for (let i = from; i < limit; i++) {
    if (/\s/.test(text[i])) return i + 1;
  }
  return from;
}

/**
 * Split text into chunks of at most chunkSize characters. Breaks fall on
 * whitespace in the second half of a window when possible; consecutive
 * chunks share roughly chunkOverlap characters. chunkSize 0 disables.
 */
export function chunkText(text: string, { chunkSize, chunkOverlap }: ChunkOptions): string[] {
  if (chunkSize <= 0 || text.length <= chunkSize) {
    return [text];
  }

  const chunks: string[] = [];
  let start = 0;

  while (start < text.length) {
    let end = Math.min(start + chunkSize, text.length);
    if (end < text.length) {
      const breakAt = lastWhitespace(text, end, start + Math.floor(chunkSize / 2));
      if (breakAt !== -1) end = breakAt;
    }

    const chunk = text.slice(start, end).trim();
    if (chunk) chunks.push(chunk);
    if (end >= text.length) break;

    let next = end - chunkOverlap;
    if (next <= start) next = end;
    start = nextWordStart(text, next, end);
  }

  return chunks;
}
