const FENCE_PATTERN = /^```[a-z]*\s*\n|\n?```\s*$/gi;

function parseObject(text: string): Record<string, unknown> | null {
  try {
    const parsed: unknown = JSON.parse(text);
    if (parsed && typeof parsed === 'object' && !Array.isArray(parsed)) {
      return Object.fromEntries(Object.entries(parsed));
    }
  } catch {
    // not JSON
  }
  return null;
}

/**
 * Pull a JSON object out of a model reply: bare JSON, fenced JSON,
 * or JSON surrounded by prose.
 */
export function extractJsonObject(reply: string): Record<string, unknown> | null {
  const cleaned = reply.trim().replace(FENCE_PATTERN, '').trim();
  const direct = parseObject(cleaned);
  if (direct) return direct;

  const start = cleaned.indexOf('{');
  const end = cleaned.lastIndexOf('}');
  if (start >= 0 && end > start) {
    return parseObject(cleaned.slice(start, end + 1));
  }
  return null;
}
