// node/src/services/providers/vector/pinecone-index.ts — Pinecone-backed VectorIndex
import { Pinecone } from '@pinecone-database/pinecone';
import { stringifyMetadata, type VectorIndex, type VectorMatch, type VectorQuery } from './vector-index';
import { RetrievalError, errorMessage } from '@/utils/errors';

export interface PineconeIndexConfig {
  apiKey: string;
  indexName: string;
}

export class PineconeVectorIndex implements VectorIndex {
  private readonly pinecone: Pinecone;

  constructor(private readonly config: PineconeIndexConfig) {
    this.pinecone = new Pinecone({ apiKey: config.apiKey });
  }

  async query({ vector, topK, namespace }: VectorQuery): Promise<VectorMatch[]> {
    try {
      const res = await this.pinecone
        .index(this.config.indexName)
        .namespace(namespace)
        .query({ vector, topK, includeMetadata: true });

      return (res.matches ?? []).map((m) => ({
        id: m.id,
        score: m.score ?? 0,
        metadata: stringifyMetadata(m.metadata),
      }));
    } catch (err) {
      throw new RetrievalError('vector_search', `Pinecone query failed: ${errorMessage(err)}`, { cause: err });
    }
  }
}
