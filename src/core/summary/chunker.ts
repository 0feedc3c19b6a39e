interface Piece {
  text: string;
  /** Whitespace that joins this piece to the one before it inside a chunk. */
  separator: string;
}

const PARAGRAPH_BREAK = /\n\s*\n/;
const SENTENCE_BREAK = /(?<=[.!?…])\s+/;
const WORD_BREAK = /\s+/;

/**
 * Splits transcript text into chunks of at most `limit` characters, preferring
 * paragraph, then sentence, then word boundaries. Only a single word longer than
 * `limit` is cut. Chunks never overlap, and only whitespace between them is lost.
 */
export function splitInChunks(text: string, limit: number): string[] {
  if (!Number.isInteger(limit) || limit < 1) {
    throw new RangeError(`Chunk limit must be a positive integer, got ${limit}`);
  }

  const trimmed = text.trim();
  if (!trimmed) return [];
  if (trimmed.length <= limit) return [trimmed];

  const chunks: string[] = [];
  let current = '';

  for (const piece of toPieces(trimmed, limit)) {
    if (!current) {
      current = piece.text;
      continue;
    }

    const candidate = current + piece.separator + piece.text;
    if (candidate.length <= limit) {
      current = candidate;
    } else {
      chunks.push(current);
      current = piece.text;
    }
  }

  if (current) chunks.push(current);
  return chunks;
}

function toPieces(text: string, limit: number): Piece[] {
  const pieces: Piece[] = [];

  const paragraphs = text
    .split(PARAGRAPH_BREAK)
    .map((paragraph) => paragraph.trim())
    .filter(Boolean);

  paragraphs.forEach((paragraph, paragraphIndex) => {
    const paragraphSeparator = paragraphIndex === 0 ? '' : '\n\n';
    if (paragraph.length <= limit) {
      pieces.push({ text: paragraph, separator: paragraphSeparator });
      return;
    }

    const sentences = paragraph.split(SENTENCE_BREAK).filter(Boolean);
    sentences.forEach((sentence, sentenceIndex) => {
      const sentenceSeparator = sentenceIndex === 0 ? paragraphSeparator : ' ';
      if (sentence.length <= limit) {
        pieces.push({ text: sentence, separator: sentenceSeparator });
        return;
      }

      const words = sentence.split(WORD_BREAK).filter(Boolean);
      words.forEach((word, wordIndex) => {
        const wordSeparator = wordIndex === 0 ? sentenceSeparator : ' ';
        if (word.length <= limit) {
          pieces.push({ text: word, separator: wordSeparator });
          return;
        }

        for (let start = 0; start < word.length; start += limit) {
          pieces.push({
            text: word.slice(start, start + limit),
            separator: start === 0 ? wordSeparator : '',
          });
        }
      });
    });
  });

  return pieces;
}
