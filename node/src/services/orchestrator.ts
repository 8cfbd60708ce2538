// node/src/services/orchestrator.ts — one conversational turn: follow-up or full recommendation pipeline
import type {
  Enrichment,
  FundingProgram,
  ScoringContext,
  SearchMode,
  SelectionResult,
  SessionContext,
  Shortlist,
} from '@/types/funding';
import type { FundingDataset } from '@/services/providers/dataset/funding-dataset';
import type { ProgramSelector } from '@/services/program-selector';
import type { ProgramEnricher } from '@/services/program-enricher';
import type { GenerativeFailureKind } from '@/utils/errors';
import type { RequestableField } from '@/followup/fieldRequests';
import { resolveFollowUp, type FollowUpMatch } from '@/followup/followupResolver';
import { backfillShortlist } from '@/services/field-backfill';
import { isExpired } from '@/services/deadline';
import {
  NO_MATCHES_MESSAGE,
  buildProgramCard,
  buildProgramCards,
  renderFollowUpFields,
  type CardField,
  type ProgramCard,
} from '@/format/programCards';
import { emptySessionContext } from '@/memory/sessionContext';
import { logger } from '@/services/logger';

/** Anything that turns a scored query into a shortlist of at most `want` programs. */
export interface ProgramSearch {
  searchPrograms(ctx: ScoringContext, want?: number): Promise<FundingProgram[]>;
}

export interface OrchestratorDeps {
  search: ProgramSearch;
  comprehensiveSearch?: ProgramSearch;
  dataset: FundingDataset;
  selector: ProgramSelector;
  enricher: ProgramEnricher;
  defaults: { want: number; wanted: number };
  clock?: () => Date;
}

export interface FundingTurnOptions {
  location?: string;
  fundingNeed?: number;
  domain?: string;
  want?: number;
  wanted?: number;
  mode?: SearchMode;
}

export type FundingTurnResult =
  | {
      kind: 'followup';
      query: string;
      match: FollowUpMatch;
      rank: number;
      id: number;
      card: ProgramCard;
      requestedFields: RequestableField[];
      fields: CardField[];
    }
  | {
      kind: 'recommendations';
      query: string;
      mode: SearchMode;
      shortlist: Shortlist;
      selection: SelectionResult;
      enrichment: Enrichment;
      cards: ProgramCard[];
      degraded: { selection?: GenerativeFailureKind; enrichment?: GenerativeFailureKind };
    }
  | { kind: 'empty'; query: string; mode: SearchMode; message: string };

export interface FundingTurn {
  result: FundingTurnResult;
  context: SessionContext;
}

export function resetSession(): SessionContext {
  return emptySessionContext();
}

/**
 * Handles one user message. A message that refers back to the last selection
 * is answered from the context, which is returned unchanged. Any other
 * message runs the pipeline and returns a fresh context. Retrieval failures
 * propagate; generative failures degrade to fallbacks.
 */
export async function runFundingTurn(
  message: string,
  context: SessionContext,
  deps: OrchestratorDeps,
  options: FundingTurnOptions = {},
): Promise<FundingTurn> {
  const query = message.trim();
  const now = deps.clock?.() ?? new Date();

  const followUp = resolveFollowUp(query, context);
  if (followUp.kind === 'resolved') {
    const { id, rank, program } = followUp;
    logger.info('flow:followup', { match: followUp.match, id, rank });
    return {
      result: {
        kind: 'followup',
        query,
        match: followUp.match,
        rank,
        id,
        card: buildProgramCard(program, id, rank, context.lastSelection?.reasons[id], context.lastEnrichment[id]),
        requestedFields: followUp.requestedFields,
        fields: renderFollowUpFields(program, followUp.requestedFields),
      },
      context,
    };
  }

  const mode: SearchMode = options.mode === 'comprehensive' && deps.comprehensiveSearch ? 'comprehensive' : 'standard';
  const want = options.want ?? deps.defaults.want;
  const wanted = options.wanted ?? deps.defaults.wanted;
  const scoring: ScoringContext = {
    query,
    targetDomain: options.domain,
    userLocation: options.location,
    fundingNeed: options.fundingNeed,
    now,
  };

  const started = Date.now();
  const search = mode === 'comprehensive' && deps.comprehensiveSearch ? deps.comprehensiveSearch : deps.search;
  const candidates = await search.searchPrograms(scoring, want);
  const shortlist = backfillShortlist(candidates, deps.dataset, now).filter((p) => !isExpired(p.daysLeft));

  if (shortlist.length === 0) {
    logger.info('flow:no_matches', { mode, ms: Date.now() - started });
    return {
      result: { kind: 'empty', query, mode, message: NO_MATCHES_MESSAGE },
      context: { ...emptySessionContext(), lastQuery: query, updatedAt: now.toISOString() },
    };
  }

  const selected = await deps.selector.select(query, shortlist, wanted);
  const enriched = await deps.enricher.enrich(shortlist, selected.selection.ids);
  const cards = buildProgramCards(shortlist, selected.selection, enriched.enrichment);

  logger.info('flow:turn_done', {
    mode,
    shortlist: shortlist.length,
    picks: selected.selection.ids,
    fallback: selected.selection.fallback,
    ms: Date.now() - started,
  });

  return {
    result: {
      kind: 'recommendations',
      query,
      mode,
      shortlist,
      selection: selected.selection,
      enrichment: enriched.enrichment,
      cards,
      degraded: {
        ...(selected.failure && { selection: selected.failure.kind }),
        ...(enriched.failure && { enrichment: enriched.failure.kind }),
      },
    },
    context: {
      lastQuery: query,
      lastShortlist: shortlist,
      lastSelection: selected.selection,
      lastEnrichment: enriched.enrichment,
      updatedAt: now.toISOString(),
    },
  };
}
