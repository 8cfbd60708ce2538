import type { ProgramField } from '@/types/funding';

export type RequestableField = Extract<
  ProgramField,
  'contact' | 'url' | 'deadline' | 'amount' | 'eligibility' | 'procedure' | 'location' | 'source'
>;

const FIELD_SYNONYMS: Record<RequestableField, readonly string[]> = {
  contact: ['contact', 'email', 'e-mail', 'phone', 'telephone', 'reach', 'kontakt'],
  url: ['url', 'link', 'website', 'webpage', 'page', 'apply link'],
  deadline: ['deadline', 'due', 'closing', 'close date', 'until when', 'frist'],
  amount: ['amount', 'how much', 'budget', 'funding size', 'grant size', 'money', 'betrag'],
  eligibility: ['eligibility', 'eligible', 'who can apply', 'requirements', 'criteria', 'qualify'],
  procedure: ['procedure', 'process', 'how to apply', 'application steps', 'steps', 'submit'],
  location: ['location', 'where', 'region', 'country', 'state'],
  source: ['source', 'provider', 'funder', 'agency', 'ministry', 'who funds'],
};

const FIELD_ORDER: readonly RequestableField[] = [
  'contact',
  'url',
  'deadline',
  'amount',
  'eligibility',
  'procedure',
  'location',
  'source',
];

function mentions(utterance: string, phrase: string): boolean {
  const escaped = phrase.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
  return new RegExp(`(^|[^\\p{L}])${escaped}($|[^\\p{L}])`, 'u').test(utterance);
}

/**
 * Fields the utterance asks about, in a fixed order. A request for only the
 * contact also returns the url.
 */
export function extractRequestedFields(utterance: string): RequestableField[] {
  const q = utterance.toLowerCase();
  const fields = FIELD_ORDER.filter((field) => FIELD_SYNONYMS[field].some((s) => mentions(q, s)));
  if (fields.length === 1 && fields[0] === 'contact') fields.push('url');
  return fields;
}
