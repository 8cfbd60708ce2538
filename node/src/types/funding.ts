/** Fields a program record may carry, as stored in vector metadata and dataset rows. */
export const PROGRAM_FIELDS = [
  'name',
  'title',
  'program',
  'call',
  'call_title',
  'funding_title',
  'display_name',
  'domain',
  'description',
  'eligibility',
  'amount',
  'deadline',
  'location',
  'contact',
  'procedure',
  'url',
  'source',
] as const;

export type ProgramField = (typeof PROGRAM_FIELDS)[number];

export type ProgramRecord = { [K in ProgramField]?: string };

export type ProgramOrigin = 'vector' | 'keyword' | 'source';

export interface FundingProgram extends ProgramRecord {
  /** ISO-8601 UTC timestamp of the parsed deadline. */
  deadlineDate: string | null;
  daysLeft: number | null;
  /** 0..100 */
  relevanceScore: number;
  similarity?: number;
  origin: ProgramOrigin;
}

/** Ordered candidates; a program's id is its 1-based position. */
export type Shortlist = FundingProgram[];

export interface SelectionResult {
  ids: number[];
  reasons: Record<number, string>;
  /** True when the positional fallback replaced the model's picks. */
  fallback: boolean;
}

export interface EnrichmentEntry {
  brief: string;
  nextSteps: string[];
}

export type Enrichment = Record<number, EnrichmentEntry>;

/** Caller-owned conversation state. Plain JSON so stores can serialize it. */
export interface SessionContext {
  lastQuery: string | null;
  lastShortlist: Shortlist;
  lastSelection: SelectionResult | null;
  lastEnrichment: Enrichment;
  updatedAt: string | null;
}

/** Inputs to the relevance score besides the program itself. */
export interface ScoringContext {
  query: string;
  targetDomain?: string;
  userLocation?: string;
  fundingNeed?: number;
  now: Date;
}

export type SearchMode = 'standard' | 'comprehensive';
