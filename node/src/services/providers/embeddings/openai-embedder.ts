import OpenAI from 'openai';
import type { Embedder, Embedding } from '@/services/providers/retrieval-vector-utils';
import { RetrievalError, errorMessage } from '@/utils/errors';

export interface OpenAIEmbedderConfig {
  apiKey: string;
  model?: string; // e.g. 'text-embedding-3-small', 'text-embedding-3-large'
  /** Must match the vector index dimension when set. */
  dimensions?: number;
}

/**
 * Single-text embedder. Does not retry; callers wrap it in the retry policy.
 */
export class OpenAIEmbedder implements Embedder {
  private readonly client: OpenAI;
  private readonly model: string;

  constructor(private readonly config: OpenAIEmbedderConfig) {
    this.client = new OpenAI({ apiKey: config.apiKey, maxRetries: 0 });
    this.model = config.model ?? 'text-embedding-3-small';
  }

  async embed(text: string): Promise<Embedding> {
    const input = text.trim();
    if (!input) {
      throw new RetrievalError('embedding', 'Cannot embed an empty query', { retryable: false });
    }

    let vector: Embedding | undefined;
    try {
      const res = await this.client.embeddings.create({
        model: this.model,
        input,
        ...(this.config.dimensions !== undefined && { dimensions: this.config.dimensions }),
      });
      vector = res.data[0]?.embedding;
    } catch (err) {
      const retryable =
        !(err instanceof OpenAI.APIError) || err.status === undefined || err.status === 429 || err.status >= 500;
      throw new RetrievalError('embedding', `Embedding request failed: ${errorMessage(err)}`, {
        cause: err,
        retryable,
      });
    }

    if (!vector || vector.length === 0) {
      throw new RetrievalError('embedding', 'Embedding response contained no vector', { retryable: false });
    }
    return vector;
  }
}
