import { z } from 'zod';
import type { SessionContext } from '@/types/funding';

export function emptySessionContext(): SessionContext {
  return {
    lastQuery: null,
    lastShortlist: [],
    lastSelection: null,
    lastEnrichment: {},
    updatedAt: null,
  };
}

const text = z.string().optional();

const fundingProgramSchema = z.object({
  name: text,
  title: text,
  program: text,
  call: text,
  call_title: text,
  funding_title: text,
  display_name: text,
  domain: text,
  description: text,
  eligibility: text,
  amount: text,
  deadline: text,
  location: text,
  contact: text,
  procedure: text,
  url: text,
  source: text,
  deadlineDate: z.string().nullable(),
  daysLeft: z.number().nullable(),
  relevanceScore: z.number(),
  similarity: z.number().optional(),
  origin: z.enum(['vector', 'keyword', 'source']),
});

// JSON object keys are strings; ids are restored to numbers.
const idRecord = <T extends z.ZodTypeAny>(value: T) =>
  z.record(z.string(), value).transform((rec) => {
    const out: Record<number, z.infer<T>> = {};
    for (const [key, v] of Object.entries(rec)) {
      const id = Number(key);
      if (Number.isInteger(id)) out[id] = v;
    }
    return out;
  });

export const sessionContextSchema = z.object({
  lastQuery: z.string().nullable(),
  lastShortlist: z.array(fundingProgramSchema),
  lastSelection: z
    .object({
      ids: z.array(z.number().int()),
      reasons: idRecord(z.string()),
      fallback: z.boolean(),
    })
    .nullable(),
  lastEnrichment: idRecord(z.object({ brief: z.string(), nextSteps: z.array(z.string()) })),
  updatedAt: z.string().nullable(),
});

/** Parses serialized context; null when it does not match the current shape. */
export function parseSessionContext(raw: string): SessionContext | null {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch {
    return null;
  }
  const parsed = sessionContextSchema.safeParse(data);
  return parsed.success ? parsed.data : null;
}
