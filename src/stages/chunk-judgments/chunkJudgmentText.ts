import type { ChunkDraft } from '../../models/judgment.js';
import { ConfigurationError } from '../../utils/errors.js';

export interface ChunkingOptions {
  chunkSize: number;
  overlap: number;
}

export function validateChunkingOptions(options: ChunkingOptions): void {
  if (!Number.isInteger(options.chunkSize) || options.chunkSize <= 0) {
    throw new ConfigurationError(`chunk size must be a positive integer, got ${options.chunkSize}`);
  }
  if (!Number.isInteger(options.overlap) || options.overlap < 0) {
    throw new ConfigurationError(`overlap must be a non-negative integer, got ${options.overlap}`);
  }
  if (options.overlap >= options.chunkSize) {
    throw new ConfigurationError(
      `overlap (${options.overlap}) must be smaller than chunk size (${options.chunkSize})`
    );
  }
}

/**
 * Pull a proposed chunk end back to a paragraph or line break when one falls
 * in the last 70% of the window
 */
function adjustBoundary(text: string, proposedEnd: number, start: number): number {
  if (proposedEnd >= text.length) {
    return text.length;
  }

  const segment = text.slice(start, proposedEnd);
  const doubleNewline = segment.lastIndexOf('\n\n');
  if (doubleNewline !== -1 && doubleNewline > segment.length * 0.3) {
    return start + doubleNewline + 2;
  }

  const singleNewline = segment.lastIndexOf('\n');
  if (singleNewline !== -1 && singleNewline > segment.length * 0.3) {
    return start + singleNewline + 1;
  }

  return proposedEnd;
}

/**
 * Split judgment text into overlapping chunks
 *
 * Consecutive chunks share at most `overlap` characters, every start is
 * strictly after the previous one, and together the chunks cover the whole
 * text. Indices run 0..n-1.
 */
export function chunkJudgmentText(text: string, options: ChunkingOptions): ChunkDraft[] {
  validateChunkingOptions(options);
  const { chunkSize, overlap } = options;

  if (text.length === 0) {
    return [];
  }

  const chunks: ChunkDraft[] = [];
  const totalLength = text.length;
  let start = 0;

  while (start < totalLength) {
    const end = adjustBoundary(text, Math.min(start + chunkSize, totalLength), start);

    chunks.push({
      index: chunks.length,
      start,
      end,
      text: text.slice(start, end),
    });

    if (end === totalLength) {
      break;
    }

    const nextStart = end - Math.min(overlap, end - start);
    start = nextStart > start ? nextStart : end;
  }

  return chunks;
}
