// node/src/services/providers/embeddings/simple-embedder.ts
// Deterministic hashing embedder: offline mode and tests. Not semantically meaningful.

import type { Embedder, Embedding } from '@/services/providers/retrieval-vector-utils';
import { tokenize } from '@/services/providers/retrieval-vector-utils';

export class SimpleEmbedder implements Embedder {
  constructor(private readonly dim = 256) {}

  async embed(text: string): Promise<Embedding> {
    const vec: number[] = new Array<number>(this.dim).fill(0);

    for (const token of tokenize(text)) {
      let hash = 0;
      for (let i = 0; i < token.length; i++) {
        hash = (hash * 31 + token.charCodeAt(i)) >>> 0;
      }
      vec[hash % this.dim] += 1;
    }

    const norm = Math.sqrt(vec.reduce((s, x) => s + x * x, 0));
    if (norm === 0) return vec;
    return vec.map((x) => x / norm);
  }
}
