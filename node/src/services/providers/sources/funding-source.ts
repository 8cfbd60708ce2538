import type { ProgramOrigin, ProgramRecord, ScoringContext } from '@/types/funding';

export interface SourceHit {
  record: ProgramRecord;
  similarity?: number;
}

export interface FundingSource {
  readonly name: string;
  readonly origin: ProgramOrigin;
  search(ctx: ScoringContext): Promise<SourceHit[]>;
}
