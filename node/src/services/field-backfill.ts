// node/src/services/field-backfill.ts — fill missing program fields from the canonical dataset
import type { FundingProgram, ProgramField } from '@/types/funding';
import type { FundingDataset } from '@/services/providers/dataset/funding-dataset';
import { isMissing } from '@/services/program-fields';
import { deadlineFields } from '@/services/deadline';

export const BACKFILL_FIELDS: readonly ProgramField[] = [
  'description',
  'eligibility',
  'procedure',
  'contact',
  'amount',
  'deadline',
  'location',
  'source',
  'domain',
  'name',
  'title',
  'program',
  'call',
  'url',
];

const IDENTITY_FIELDS: readonly ProgramField[] = ['name', 'title', 'program', 'call', 'url'];

/**
 * Returns a copy of the program with each missing field taken from the
 * matching dataset row, when the row has it. Present fields are never
 * overwritten. Identity fields are only filled when the filled program
 * still looks up the same row, so applying it twice changes nothing.
 */
export function backfillProgram(program: FundingProgram, dataset: FundingDataset, now: Date): FundingProgram {
  const row = dataset.lookup(program);
  if (!row) return program;

  const filled: FundingProgram = { ...program };
  let deadlineFilled = false;
  for (const field of BACKFILL_FIELDS) {
    const fromRow = row[field];
    if (isMissing(filled[field]) && fromRow !== undefined && !isMissing(fromRow)) {
      filled[field] = fromRow;
      if (field === 'deadline') deadlineFilled = true;
    }
  }

  if (dataset.lookup(filled) !== row) {
    for (const field of IDENTITY_FIELDS) {
      if (program[field] === undefined) delete filled[field];
      else filled[field] = program[field];
    }
  }

  if (deadlineFilled) Object.assign(filled, deadlineFields(filled.deadline, now));
  return filled;
}

export function backfillShortlist(
  programs: readonly FundingProgram[],
  dataset: FundingDataset,
  now: Date,
): FundingProgram[] {
  if (dataset.size === 0) return [...programs];
  return programs.map((p) => backfillProgram(p, dataset, now));
}
