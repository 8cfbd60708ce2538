import type { ProgramRecord } from '@/types/funding';
import { fusedName, present } from '@/services/program-fields';

export interface ScoredItem<T> {
  item: T;
  score: number;
}

export function normalizeString(s: string | undefined | null): string {
  if (!s) return '';
  return s
    .toLowerCase()
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .replace(/[^a-z0-9\s]/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

/** Trimmed, trailing slashes removed, lowercased. */
export function normalizeUrl(url: string): string {
  return url.trim().replace(/\/+$/, '').toLowerCase();
}

export function normalizeName(name: string): string {
  return name.trim().toLowerCase().replace(/\s+/g, ' ');
}

/**
 * Identity of a program: its normalized URL, else its normalized fused name.
 * Empty when the record has neither; empty keys never collide.
 */
export function programDedupKey(record: ProgramRecord): string {
  const url = present(record.url);
  if (url) {
    const normalized = normalizeUrl(url);
    if (normalized) return `url:${normalized}`;
  }
  const name = fusedName(record);
  return name ? `name:${normalizeName(name)}` : '';
}

/** Keeps the best-scoring item per key, in first-seen order. Items with an empty key are all kept. */
export function dedupByKey<T>(
  items: ScoredItem<T>[],
  getKey: (item: T) => string,
): ScoredItem<T>[] {
  const bestByKey = new Map<string, ScoredItem<T>>();
  let unkeyed = 0;

  for (const si of items) {
    const key = getKey(si.item) || `\u0000unkeyed:${unkeyed++}`;
    const existing = bestByKey.get(key);
    if (!existing || si.score > existing.score) {
      bestByKey.set(key, si);
    }
  }

  return Array.from(bestByKey.values());
}
