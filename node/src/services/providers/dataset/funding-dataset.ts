// node/src/services/providers/dataset/funding-dataset.ts — canonical program table loaded from CSV
import fs from 'node:fs';
import path from 'node:path';
import { parse } from 'csv-parse/sync';
import type { ProgramRecord } from '@/types/funding';
import { fusedName, present, toProgramRecord } from '@/services/program-fields';
import { normalizeName, normalizeUrl } from '@/services/dedup-utils';
import { logger } from '@/services/logger';
import { RetrievalError, errorMessage } from '@/utils/errors';

function isRow(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Read-only table of funding programs, indexed by normalized URL and name.
 * The first row wins when several share a URL or name.
 */
export class FundingDataset {
  private readonly byUrl = new Map<string, ProgramRecord>();
  private readonly byName = new Map<string, ProgramRecord>();

  constructor(readonly rows: readonly ProgramRecord[]) {
    for (const row of rows) {
      const url = present(row.url);
      if (url) {
        const key = normalizeUrl(url);
        if (key && !this.byUrl.has(key)) this.byUrl.set(key, row);
      }
      const name = fusedName(row);
      if (name) {
        const key = normalizeName(name);
        if (!this.byName.has(key)) this.byName.set(key, row);
      }
    }
  }

  static empty(): FundingDataset {
    return new FundingDataset([]);
  }

  /** Parses CSV text with a header row. Header names are trimmed and lowercased. */
  static fromCsv(text: string): FundingDataset {
    const parsed: unknown = parse(text, {
      columns: (header: string[]) => header.map((h) => h.trim().toLowerCase()),
      skip_empty_lines: true,
      bom: true,
      relax_column_count: true,
      trim: true,
    });
    const records = Array.isArray(parsed) ? parsed.filter(isRow) : [];
    return new FundingDataset(records.map((r) => toProgramRecord(r)));
  }

  /**
   * Loads the dataset from disk. A missing file yields an empty dataset;
   * an unreadable or malformed one is a retrieval failure.
   */
  static load(filePath: string): FundingDataset {
    const resolved = path.resolve(process.cwd(), filePath);
    if (!fs.existsSync(resolved)) {
      logger.warn('dataset:missing', { path: resolved });
      return FundingDataset.empty();
    }
    try {
      const dataset = FundingDataset.fromCsv(fs.readFileSync(resolved, 'utf8'));
      logger.info('dataset:loaded', { path: resolved, rows: dataset.rows.length });
      return dataset;
    } catch (err) {
      throw new RetrievalError('dataset', `Failed to load funding dataset: ${errorMessage(err)}`, {
        cause: err,
        retryable: false,
      });
    }
  }

  get size(): number {
    return this.rows.length;
  }

  findByUrl(url: string): ProgramRecord | undefined {
    return this.byUrl.get(normalizeUrl(url));
  }

  findByName(name: string): ProgramRecord | undefined {
    return this.byName.get(normalizeName(name));
  }

  /** URL match first, then name match. */
  lookup(record: ProgramRecord): ProgramRecord | undefined {
    const url = present(record.url);
    const byUrl = url ? this.findByUrl(url) : undefined;
    if (byUrl) return byUrl;
    const name = fusedName(record);
    return name ? this.findByName(name) : undefined;
  }
}
