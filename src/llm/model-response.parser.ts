export type ModelSummary = Record<string, unknown>;

export interface ModelSummaryFallback {
  error: string;
  raw_response: string;
}

export const PARSE_FAILURE_MESSAGE = 'Failed to parse AI summary.';

const fallback = (raw: string): ModelSummaryFallback => ({ error: PARSE_FAILURE_MESSAGE, raw_response: raw });

/**
 * Pulls the JSON object out of a model reply by taking everything from the
 * first `{` to the last `}`. Braces in prose before the real object will
 * produce the wrong slice; that case falls back like any other parse failure.
 */
export function parseModelResponse(raw: string): ModelSummary | ModelSummaryFallback {
  const start = raw.indexOf('{');
  const end = raw.lastIndexOf('}');
  if (start === -1 || end < start) {
    return fallback(raw);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw.slice(start, end + 1));
  } catch {
    return fallback(raw);
  }
  return isPlainObject(parsed) ? parsed : fallback(raw);
}

function isPlainObject(value: unknown): value is ModelSummary {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
