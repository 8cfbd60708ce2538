import { cosineSimilarity, type Embedding } from '@/services/providers/retrieval-vector-utils';
import type { VectorIndex, VectorMatch, VectorQuery } from './vector-index';

export interface VectorEntry {
  id: string;
  vector: Embedding;
  metadata: Record<string, string>;
}

export class InMemoryVectorIndex implements VectorIndex {
  private readonly namespaces = new Map<string, VectorEntry[]>();

  upsert(namespace: string, entries: VectorEntry[]): void {
    const existing = this.namespaces.get(namespace) ?? [];
    const byId = new Map(existing.map((e) => [e.id, e]));
    for (const entry of entries) byId.set(entry.id, entry);
    this.namespaces.set(namespace, Array.from(byId.values()));
  }

  size(namespace: string): number {
    return this.namespaces.get(namespace)?.length ?? 0;
  }

  async query({ vector, topK, namespace }: VectorQuery): Promise<VectorMatch[]> {
    const entries = this.namespaces.get(namespace) ?? [];
    return entries
      .map((e) => ({ id: e.id, score: cosineSimilarity(vector, e.vector), metadata: e.metadata }))
      .sort((a, b) => b.score - a.score)
      .slice(0, Math.max(0, topK));
  }
}
