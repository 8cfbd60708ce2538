// node/src/format/programCards.ts — renderable cards for selected programs and follow-up answers
import type {
  Enrichment,
  EnrichmentEntry,
  FundingProgram,
  ProgramField,
  SelectionResult,
  Shortlist,
} from '@/types/funding';
import type { RequestableField } from '@/followup/fieldRequests';
import { present, programName } from '@/services/program-fields';

export const NO_MATCHES_MESSAGE =
  'No matching funding programs found. Try broader keywords, a different region or another funding domain.';

export const GENERIC_NEXT_STEPS: readonly string[] = [
  'Visit the official page',
  'Prepare a 1–2 page project summary & budget',
  'Contact the program office for clarifications',
];

const MAX_STEPS = 3;

export interface CardField {
  field: ProgramField;
  label: string;
  value: string;
}

export interface ProgramCard {
  rank: number;
  id: number;
  name: string;
  /** "Name (Source)" when the source is known. */
  title: string;
  reason: string;
  description: string;
  fields: CardField[];
  deadline: string | null;
  url: string | null;
  nextSteps: string[];
}

const FIELD_LABELS: Partial<Record<ProgramField, string>> = {
  domain: 'Domain',
  eligibility: 'Eligibility',
  amount: 'Amount',
  location: 'Location',
  contact: 'Contact',
  url: 'Link',
  deadline: 'Deadline',
  procedure: 'Procedure',
  source: 'Source',
};

const CARD_FIELDS: readonly ProgramField[] = ['domain', 'eligibility', 'amount', 'location', 'contact'];

/** At most `max` sentences of the text, whitespace collapsed. */
export function twoSentences(text: string | undefined, max = 2): string {
  const clean = (text ?? '').replace(/\s+/g, ' ').trim();
  if (!clean) return '';
  const sentences = clean.split(/(?<=[.!?])\s+/);
  return sentences.slice(0, max).join(' ');
}

export function deadlineWithBadge(program: FundingProgram): string | null {
  const deadline = present(program.deadline);
  if (!deadline) return null;
  if (program.daysLeft === null || program.daysLeft < 0) return deadline;
  const unit = program.daysLeft === 1 ? 'day' : 'days';
  return `${deadline} (${program.daysLeft} ${unit} left)`;
}

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** Drops a leading restatement of the program name and keeps two sentences. */
export function cleanReason(reason: string | undefined, name: string): string {
  let text = (reason ?? '').trim();
  if (!text) return '';
  if (name && name !== 'Unnamed') {
    text = text.replace(new RegExp(`^${escapeRegExp(name)}\\s*[:\\-–]\\s*`, 'i'), '');
  }
  text = text.replace(/^(this program|it)\s+(is a good fit|fits)\s+because\s+/i, '');
  text = text.charAt(0).toUpperCase() + text.slice(1);
  return twoSentences(text);
}

/** Next steps that follow from the dataset fields alone. */
export function stepsFromDataset(program: FundingProgram): string[] {
  const steps: string[] = [];
  if (present(program.url)) steps.push('Visit the official page');
  if (present(program.eligibility)) steps.push('Confirm you meet eligibility requirements');
  if (present(program.procedure)) steps.push('Follow the described application procedure');
  const deadline = present(program.deadline);
  if (deadline && steps.length < MAX_STEPS) steps.push(`Note the deadline: ${deadline}`);
  return steps;
}

function isVisitStep(step: string): boolean {
  return /^(visit|go to|open|check)\b.*\b(page|website|site|portal|link)\b/i.test(step);
}

/**
 * Official-page step first (when there is a URL), then model steps without
 * duplicates or a second "visit" step, topped up from the dataset; three at
 * most. Falls back to generic steps.
 */
export function buildNextSteps(program: FundingProgram, enrichment?: EnrichmentEntry): string[] {
  const steps: string[] = [];
  const seen = new Set<string>();
  let hasVisit = false;

  const add = (step: string): void => {
    const s = step.trim();
    const key = s.toLowerCase();
    if (!s || seen.has(key) || steps.length >= MAX_STEPS) return;
    if (isVisitStep(s)) {
      if (hasVisit) return;
      hasVisit = true;
    }
    seen.add(key);
    steps.push(s);
  };

  if (present(program.url)) add('Visit the official page');
  for (const step of enrichment?.nextSteps ?? []) add(step);
  for (const step of stepsFromDataset(program)) add(step);

  return steps.length > 0 ? steps : [...GENERIC_NEXT_STEPS];
}

function cardFields(program: FundingProgram, fields: readonly ProgramField[]): CardField[] {
  const out: CardField[] = [];
  for (const field of fields) {
    const value = field === 'deadline' ? deadlineWithBadge(program) : present(program[field]);
    if (value) out.push({ field, label: FIELD_LABELS[field] ?? field, value });
  }
  return out;
}

export function buildProgramCard(
  program: FundingProgram,
  id: number,
  rank: number,
  reason: string | undefined,
  enrichment: EnrichmentEntry | undefined,
): ProgramCard {
  const name = programName(program);
  const source = present(program.source);
  const brief = present(enrichment?.brief);

  return {
    rank,
    id,
    name,
    title: source ? `${name} (${source})` : name,
    reason: cleanReason(reason, name),
    description: twoSentences(brief ?? present(program.description)),
    fields: cardFields(program, CARD_FIELDS),
    deadline: deadlineWithBadge(program),
    url: present(program.url) ?? null,
    nextSteps: buildNextSteps(program, enrichment),
  };
}

/** One card per selected id, in selection order. */
export function buildProgramCards(
  shortlist: Shortlist,
  selection: SelectionResult,
  enrichment: Enrichment,
): ProgramCard[] {
  return selection.ids
    .filter((id) => id >= 1 && id <= shortlist.length)
    .map((id, i) => buildProgramCard(shortlist[id - 1], id, i + 1, selection.reasons[id], enrichment[id]));
}

/** The requested fields of one program, present values only. */
export function renderFollowUpFields(program: FundingProgram, fields: readonly RequestableField[]): CardField[] {
  return cardFields(program, fields);
}
