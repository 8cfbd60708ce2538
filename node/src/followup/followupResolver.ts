// node/src/followup/followupResolver.ts — map an utterance back to a program of the last selection
import type { FundingProgram, SessionContext } from '@/types/funding';
import { programName } from '@/services/program-fields';
import { extractRequestedFields, type RequestableField } from '@/followup/fieldRequests';

export type FollowUpMatch = 'ordinal' | 'name' | 'generic';

export type FollowUpResolution =
  | {
      kind: 'resolved';
      match: FollowUpMatch;
      /** Shortlist id (1-based). */
      id: number;
      /** Position within the last selection (1-based). */
      rank: number;
      program: FundingProgram;
      requestedFields: RequestableField[];
    }
  | { kind: 'none' };

interface OrdinalWord {
  word: string;
  rank: number;
  /** "second"/"2nd" rather than the number word "two". */
  ordinal: boolean;
}

const ORDINAL_WORDS: readonly OrdinalWord[] = [
  { word: 'first', rank: 1, ordinal: true },
  { word: '1st', rank: 1, ordinal: true },
  { word: 'one', rank: 1, ordinal: false },
  { word: 'second', rank: 2, ordinal: true },
  { word: '2nd', rank: 2, ordinal: true },
  { word: 'two', rank: 2, ordinal: false },
  { word: 'third', rank: 3, ordinal: true },
  { word: '3rd', rank: 3, ordinal: true },
  { word: 'three', rank: 3, ordinal: false },
  { word: 'fourth', rank: 4, ordinal: true },
  { word: '4th', rank: 4, ordinal: true },
  { word: 'four', rank: 4, ordinal: false },
  { word: 'fifth', rank: 5, ordinal: true },
  { word: '5th', rank: 5, ordinal: true },
  { word: 'five', rank: 5, ordinal: false },
];

const GENERIC_FOLLOW_UP = /(tell me more|details|more info|expand|elaborate)/;
const MIN_NAME_TOKEN_LENGTH = 4;

/**
 * Rank named by an ordinal word, limited to `maxRank`. Ordinal forms beat
 * number words ("the second one" is rank 2); otherwise the earliest wins.
 */
export function ordinalRank(utterance: string, maxRank: number): number | null {
  const q = utterance.toLowerCase();
  let best: { rank: number; ordinal: boolean; index: number } | null = null;

  for (const { word, rank, ordinal } of ORDINAL_WORDS) {
    if (rank > maxRank) continue;
    const m = new RegExp(`\\b${word}\\b`).exec(q);
    if (!m) continue;
    const better =
      !best || (ordinal && !best.ordinal) || (ordinal === best.ordinal && m.index < best.index);
    if (better) best = { rank, ordinal, index: m.index };
  }
  return best ? best.rank : null;
}

function nameTokens(program: FundingProgram): string[] {
  const tokens = programName(program).toLowerCase().match(/[\p{L}\p{N}_]+/gu) ?? [];
  return tokens.filter((t) => t.length >= MIN_NAME_TOKEN_LENGTH);
}

/**
 * Resolves a follow-up against the last selection: ordinal reference first,
 * then a program-name token in the utterance, then a generic "tell me more"
 * which targets the top pick. Returns `none` when nothing applies.
 */
export function resolveFollowUp(
  utterance: string,
  context: Pick<SessionContext, 'lastShortlist' | 'lastSelection'>,
): FollowUpResolution {
  const shortlist = context.lastShortlist;
  const chosen = (context.lastSelection?.ids ?? []).filter((id) => id >= 1 && id <= shortlist.length);
  if (chosen.length === 0) return { kind: 'none' };

  const q = utterance.toLowerCase().trim();
  if (!q) return { kind: 'none' };

  const resolved = (match: FollowUpMatch, rank: number): FollowUpResolution => {
    const id = chosen[rank - 1];
    return {
      kind: 'resolved',
      match,
      id,
      rank,
      program: shortlist[id - 1],
      requestedFields: extractRequestedFields(q),
    };
  };

  const rank = ordinalRank(q, chosen.length);
  if (rank !== null) return resolved('ordinal', rank);

  for (let i = 0; i < chosen.length; i++) {
    const program = shortlist[chosen[i] - 1];
    if (nameTokens(program).some((t) => q.includes(t))) return resolved('name', i + 1);
  }

  if (GENERIC_FOLLOW_UP.test(q)) return resolved('generic', 1);

  return { kind: 'none' };
}
