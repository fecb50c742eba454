import { isRecord } from '../council/coerce.js';

/**
 * Pull a JSON object out of an LLM reply.
 * Strips markdown code fences, then falls back to the outermost `{...}`
 * block. Anything that is not an object yields null.
 */
export function extractJsonObject(content: string): Record<string, unknown> | null {
  let jsonStr = (content ?? '').trim();
  const fenced = jsonStr.match(/```(?:json)?\s*([\s\S]*?)\s*```/i);
  if (fenced) {
    jsonStr = fenced[1].trim();
  } else if (jsonStr.startsWith('```')) {
    // Truncated reply: opening fence without a closing one
    jsonStr = jsonStr.replace(/^```(?:json)?\s*/i, '').trim();
  }

  const parsed = parseJson(jsonStr);
  if (isRecord(parsed)) return parsed;

  const match = jsonStr.match(/\{[\s\S]*\}/);
  if (!match) return null;
  const inner = parseJson(match[0]);
  return isRecord(inner) ? inner : null;
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}
