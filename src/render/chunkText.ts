export const MAX_MESSAGE_LENGTH = 4096;

/**
 * Splits by code points into consecutive chunks of at most `limit`, with no
 * regard for word or sentence boundaries. Surrogate pairs are never cut.
 */
export function chunkText(text: string, limit: number = MAX_MESSAGE_LENGTH): string[] {
  if (!Number.isInteger(limit) || limit <= 0) {
    throw new Error(`invalid chunk limit: ${limit}`);
  }

  const codePoints = Array.from(text);
  if (codePoints.length <= limit) {
    return [text];
  }

  const chunks: string[] = [];
  for (let i = 0; i < codePoints.length; i += limit) {
    chunks.push(codePoints.slice(i, i + limit).join(""));
  }
  return chunks;
}
