import type { Embedding } from '@/services/providers/retrieval-vector-utils';

export interface VectorQuery {
  vector: Embedding;
  topK: number;
  namespace: string;
}

export interface VectorMatch {
  id: string;
  score: number;
  metadata: Record<string, string>;
}

export interface VectorIndex {
  query(request: VectorQuery): Promise<VectorMatch[]>;
}

/** Flattens index metadata to strings; lists are joined, other values dropped. */
export function stringifyMetadata(raw: Record<string, unknown> | undefined): Record<string, string> {
  const out: Record<string, string> = {};
  if (!raw) return out;
  for (const [key, value] of Object.entries(raw)) {
    if (typeof value === 'string') out[key] = value;
    else if (typeof value === 'number' || typeof value === 'boolean') out[key] = String(value);
    else if (Array.isArray(value)) out[key] = value.filter((v) => typeof v === 'string').join(', ');
  }
  return out;
}
