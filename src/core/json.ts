// ── JSON extraction from oracle output ───────────────────────

/**
 * Strip a markdown code fence if present, otherwise cut the outermost
 * bracketed span (`open`…`close`). Returns trimmed text either way; the
 * caller still has to parse it.
 */
export function extractJSON(raw: string, open: '[' | '{'): string {
  const fenced = /```(?:json)?\s*\n?([\s\S]*?)```/i.exec(raw);
  if (fenced?.[1]) return fenced[1].trim();

  const close = open === '[' ? ']' : '}';
  const start = raw.indexOf(open);
  const end = raw.lastIndexOf(close);
  if (start !== -1 && end > start) return raw.slice(start, end + 1);

  return raw.trim();
}

export type JSONParseResult =
  | { ok: true; value: unknown }
  | { ok: false; error: string };

export function tryParseJSON(text: string): JSONParseResult {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch (e) {
    const message = e instanceof Error ? e.message : String(e);
    return { ok: false, error: `Invalid JSON: ${message}` };
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
