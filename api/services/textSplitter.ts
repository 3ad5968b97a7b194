import { DocumentChunk } from '../types/shared';
import { CHUNK_OVERLAP, CHUNK_SIZE } from '../config';

export interface TextSplitterOptions {
  chunkSize?: number;
  chunkOverlap?: number;
  separators?: string[];
}

export interface PageInput {
  text: string;
  source: string;
  page: number;
}

/**
 * Recursive character splitter: tries paragraph breaks first, then lines,
 * then words, then single characters, and merges the pieces into windows
 * of at most `chunkSize` characters that overlap by up to `chunkOverlap`.
 */
export class RecursiveTextSplitter {
  readonly chunkSize: number;
  readonly chunkOverlap: number;
  private readonly separators: string[];

  constructor(options: TextSplitterOptions = {}) {
    this.chunkSize = options.chunkSize ?? CHUNK_SIZE;
    this.chunkOverlap = options.chunkOverlap ?? CHUNK_OVERLAP;
    this.separators = options.separators ?? ['\n\n', '\n', ' ', ''];

    if (this.chunkOverlap >= this.chunkSize) {
      throw new Error(`Chunk overlap (${this.chunkOverlap}) must be smaller than chunk size (${this.chunkSize})`);
    }
  }

  splitText(text: string): string[] {
    return this.split(text, this.separators);
  }

  splitPages(pages: PageInput[]): DocumentChunk[] {
    const chunks: DocumentChunk[] = [];
    for (const page of pages) {
      for (const text of this.splitText(page.text)) {
        chunks.push({
          text,
          metadata: { source: page.source, page: page.page, chunkIndex: chunks.length },
        });
      }
    }
    return chunks;
  }

  private split(text: string, separators: string[]): string[] {
    let separator = separators[separators.length - 1] ?? '';
    let remaining: string[] = [];
    for (let i = 0; i < separators.length; i++) {
      const candidate = separators[i];
      if (candidate === '' || text.includes(candidate)) {
        separator = candidate;
        remaining = separators.slice(i + 1);
        break;
      }
    }

    const pieces = (separator === '' ? Array.from(text) : text.split(separator)).filter(piece => piece !== '');
    const finalChunks: string[] = [];
    let pending: string[] = [];

    for (const piece of pieces) {
      if (piece.length < this.chunkSize) {
        pending.push(piece);
        continue;
      }
      if (pending.length > 0) {
        finalChunks.push(...this.merge(pending, separator));
        pending = [];
      }
      if (remaining.length === 0) {
        finalChunks.push(piece);
      } else {
        finalChunks.push(...this.split(piece, remaining));
      }
    }

    if (pending.length > 0) {
      finalChunks.push(...this.merge(pending, separator));
    }
    return finalChunks;
  }

  private merge(pieces: string[], separator: string): string[] {
    const chunks: string[] = [];
    const current: string[] = [];
    let total = 0;

    const joinedLength = (length: number) => total + length + (current.length > 0 ? separator.length : 0);

    for (const piece of pieces) {
      if (joinedLength(piece.length) > this.chunkSize && current.length > 0) {
        const chunk = current.join(separator).trim();
        if (chunk) chunks.push(chunk);

        // Drop from the front until what is left fits as overlap
        while (total > this.chunkOverlap || (joinedLength(piece.length) > this.chunkSize && total > 0)) {
          const removed = current.shift();
          if (removed === undefined) break;
          total -= removed.length + (current.length > 0 ? separator.length : 0);
        }
      }
      total = joinedLength(piece.length);
      current.push(piece);
    }

    const chunk = current.join(separator).trim();
    if (chunk) chunks.push(chunk);
    return chunks;
  }
}
