/**
 * Outcome of reading structured data out of model text. A degraded result
 * still carries a usable value: the safe default.
 */
export type ParseResult<T> =
  | { kind: "parsed"; value: T }
  | { kind: "degraded"; value: T; reason: string };

export function parsed<T>(value: T): ParseResult<T> {
  return { kind: "parsed", value };
}

export function degraded<T>(value: T, reason: string): ParseResult<T> {
  return { kind: "degraded", value, reason };
}

const FENCED_BLOCK = /```(?:json)?\s*([\s\S]*?)```/i;

function tryParse(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(text) as unknown };
  } catch {
    return { ok: false };
  }
}

/**
 * Pulls the first JSON document out of a model reply: the whole text, a
 * ```json fenced block, or the outermost [...] / {...} span.
 * Returns undefined when nothing parses.
 */
export function extractJson(text: string): unknown {
  const trimmed = text.trim();
  if (trimmed.length === 0) return undefined;

  const whole = tryParse(trimmed);
  if (whole.ok) return whole.value;

  const fenced = trimmed.match(FENCED_BLOCK)?.[1];
  if (fenced) {
    const result = tryParse(fenced.trim());
    if (result.ok) return result.value;
  }

  const spans = (
    [
      ["[", "]"],
      ["{", "}"],
    ] as const
  )
    .map(([open, close]) => ({ start: trimmed.indexOf(open), end: trimmed.lastIndexOf(close) }))
    .filter((span) => span.start !== -1 && span.end > span.start)
    .sort((a, b) => a.start - b.start);

  // Outermost first: an object wrapping an array is read as the object
  for (const span of spans) {
    const result = tryParse(trimmed.slice(span.start, span.end + 1));
    if (result.ok) return result.value;
  }

  return undefined;
}
