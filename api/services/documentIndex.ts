import path from 'path';
import { DocumentChunk } from '../types/shared';
import { DocumentLoadError } from '../errors';
import { RETRIEVER_TOP_K } from '../config';
import { DocumentLoader } from './pdfParser';
import { Embedder } from './embeddings';
import { RecursiveTextSplitter } from './textSplitter';

export interface IndexEntry {
  vector: number[];
  chunk: DocumentChunk;
}

export interface SearchResult {
  chunk: DocumentChunk;
  score: number;
}

/** Cosine similarity between two vectors */
export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length !== b.length) return 0;
  let dot = 0, magA = 0, magB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    magA += a[i] * a[i];
    magB += b[i] * b[i];
  }
  const denom = Math.sqrt(magA) * Math.sqrt(magB);
  return denom === 0 ? 0 : dot / denom;
}

function copyChunk(chunk: DocumentChunk): DocumentChunk {
  return { text: chunk.text, metadata: { ...chunk.metadata } };
}

/**
 * In-memory similarity index over one document's chunks. Read-only once built.
 */
export class DocumentIndex {
  private readonly entries: readonly IndexEntry[];

  constructor(
    entries: IndexEntry[],
    private readonly embedder: Embedder,
    readonly documentName: string,
  ) {
    this.entries = entries.map(entry => ({ vector: [...entry.vector], chunk: copyChunk(entry.chunk) }));
  }

  get size(): number {
    return this.entries.length;
  }

  /** Copies of the indexed chunks; changing them does not touch the index */
  get chunks(): DocumentChunk[] {
    return this.entries.map(entry => copyChunk(entry.chunk));
  }

  /** Nearest chunks to a vector, best first */
  query(vector: number[], k: number = RETRIEVER_TOP_K): SearchResult[] {
    return this.entries
      .map(entry => ({ entry, score: cosineSimilarity(vector, entry.vector) }))
      .sort((a, b) => b.score - a.score)
      .slice(0, Math.max(0, k))
      .map(({ entry, score }) => ({ chunk: copyChunk(entry.chunk), score }));
  }

  async search(text: string, k: number = RETRIEVER_TOP_K): Promise<SearchResult[]> {
    const [vector] = await this.embedder.embed([text]);
    if (!vector) return [];
    return this.query(vector, k);
  }
}

export interface DocumentIndexerDeps {
  loader: DocumentLoader;
  splitter: RecursiveTextSplitter;
  embedder: Embedder;
}

export class DocumentIndexer {
  constructor(private readonly deps: DocumentIndexerDeps) {}

  /**
   * Load, split and embed a document. Rejects on any failure; never returns a partial index.
   */
  async buildIndex(documentPath: string, documentName: string = path.basename(documentPath)): Promise<DocumentIndex> {
    const pages = await this.deps.loader.load(documentPath);

    const chunks = this.deps.splitter.splitPages(
      pages.map((text, page) => ({ text, source: documentName, page }))
    );
    if (chunks.length === 0) {
      throw new DocumentLoadError('Document contains no extractable text', documentName);
    }

    const vectors = await this.deps.embedder.embed(chunks.map(chunk => chunk.text));
    if (vectors.length !== chunks.length) {
      throw new DocumentLoadError(
        'Embedding count does not match chunk count',
        `${chunks.length} chunks, ${vectors.length} vectors`
      );
    }

    console.log('Document indexed:', {
      document: documentName,
      pages: pages.length,
      chunks: chunks.length,
      embeddingModel: this.deps.embedder.model,
    });

    return new DocumentIndex(
      chunks.map((chunk, i) => ({ chunk, vector: vectors[i] })),
      this.deps.embedder,
      documentName,
    );
  }
}
