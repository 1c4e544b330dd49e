/**
 * Block Normalization
 *
 * Report PDFs interleave labels and values across separate text blocks in no
 * guaranteed order. Every extraction rule reads one of two views built from the
 * same filtered block sequence: a line-oriented one and a flat one.
 */

/**
 * A positioned run of text from a PDF page
 */
export interface TextBlock {
  x: number;
  y: number;
  text: string;
}

export interface NormalizedText {
  /** Blocks joined by newlines */
  structured: string;
  /** Blocks joined by single spaces; offsets line up with `structured` */
  flat: string;
  structuredLower: string;
  flatLower: string;
  blockCount: number;
}

/** Blocks with this many trimmed characters or fewer are layout noise */
export const MIN_BLOCK_LENGTH = 3;

export function normalizeBlocks(blocks: readonly TextBlock[]): NormalizedText {
  const texts = blocks
    .map((block) => block.text.trim())
    .filter((text) => text.length > MIN_BLOCK_LENGTH);

  const structured = texts.join('\n');
  const flat = texts.join(' ');

  return {
    structured,
    flat,
    structuredLower: structured.toLowerCase(),
    flatLower: flat.toLowerCase(),
    blockCount: texts.length,
  };
}
