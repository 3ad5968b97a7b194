import OpenAI from 'openai';
import type { CreateEmbeddingResponse } from 'openai/resources/embeddings';
import { EmbeddingError } from '../errors';

export interface Embedder {
  readonly model: string;
  embed(texts: string[]): Promise<number[][]>;
}

export interface OpenAIEmbedderOptions {
  apiKey: string;
  baseURL?: string;
  model: string;
  batchSize?: number;
}

export class OpenAIEmbedder implements Embedder {
  private readonly openai: OpenAI;
  readonly model: string;
  private readonly batchSize: number;

  constructor(options: OpenAIEmbedderOptions) {
    this.openai = new OpenAI({ apiKey: options.apiKey, baseURL: options.baseURL, maxRetries: 0 });
    this.model = options.model;
    this.batchSize = options.batchSize ?? 64;
  }

  async embed(texts: string[]): Promise<number[][]> {
    const vectors: number[][] = [];

    // Batches are sent one after another
    for (let i = 0; i < texts.length; i += this.batchSize) {
      const batch = texts.slice(i, i + this.batchSize);
      let response: CreateEmbeddingResponse;
      try {
        response = await this.openai.embeddings.create({ model: this.model, input: batch });
      } catch (error) {
        throw new EmbeddingError('Embedding request failed', error instanceof Error ? error.message : String(error));
      }

      if (response.data.length !== batch.length) {
        throw new EmbeddingError(
          'Embedding response size mismatch',
          `Sent ${batch.length} inputs, received ${response.data.length} vectors`
        );
      }

      const ordered = [...response.data].sort((a, b) => a.index - b.index);
      vectors.push(...ordered.map(item => item.embedding));
    }

    return vectors;
  }
}
