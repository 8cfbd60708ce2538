/**
 * Shared JSON parse that strips markdown fences and normalizes quotes.
 * Used by the program selector and enricher on model output.
 */
import { logger } from '@/services/logger';

export type JsonObject = { [key: string]: unknown };

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stripFences(raw: string): string {
  let txt = raw.trim();
  if (!txt.startsWith('```')) return txt;

  const firstNewline = txt.indexOf('\n');
  const lastFence = txt.lastIndexOf('```');
  if (firstNewline !== -1 && lastFence !== -1 && lastFence > firstNewline) {
    txt = txt.slice(firstNewline + 1, lastFence).trim();
  } else {
    txt = txt.replace(/^```\w*\n?/, '').replace(/\n?```$/, '').trim();
  }
  return txt;
}

function tryParse(txt: string): unknown {
  try {
    return JSON.parse(txt);
  } catch {
    return undefined;
  }
}

/** Parses a JSON object out of model output; null when none can be read. */
export function safeParseJson(raw: string, context: string): JsonObject | null {
  const txt = stripFences(raw);

  const parsed = tryParse(txt) ?? tryParse(txt.replace(/'/g, '"'));
  if (isJsonObject(parsed)) return parsed;

  logger.warn('safeParseJson:parse_error', {
    context,
    error: parsed === undefined ? 'Invalid JSON after stripping fences' : 'Not a JSON object',
    raw: txt.slice(0, 300),
  });
  return null;
}
