import type { z } from 'zod';

/**
 * Parse JSON out of an LLM reply, repairing the usual damage
 * (markdown fences, trailing commas, unquoted keys, single-quoted values)
 * and validating the result against `schema`. Returns null when nothing usable is found.
 */
export function parseJsonReply<S extends z.ZodTypeAny>(text: string, schema: S): z.infer<S> | null {
  const unfenced = text.replace(/```json\s*/g, '').replace(/```\s*/g, '');
  const jsonMatch = unfenced.match(/\{[\s\S]*\}|\[[\s\S]*\]/);
  if (!jsonMatch) {
    return null;
  }

  const candidates = [jsonMatch[0], repair(jsonMatch[0])];
  for (const candidate of candidates) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(candidate);
    } catch {
      continue;
    }
    const result = schema.safeParse(parsed);
    if (result.success) {
      return result.data;
    }
  }
  return null;
}

function repair(raw: string): string {
  return raw
    .replace(/,\s*([}\]])/g, '$1')               // Trailing commas
    .replace(/([{,]\s*)([A-Za-z_]\w*)\s*:/g, '$1"$2":') // Unquoted keys
    .replace(/:\s*'([^']*)'/g, ': "$1"')         // Single-quoted values
    .replace(/[\x00-\x08\x0B\x0C\x0E-\x1F\x7F]/g, ' ');
}
