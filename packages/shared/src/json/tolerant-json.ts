function tryParse(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}

/** Remove one pair of surrounding ``` fences and an optional leading "json" tag. */
export function stripCodeFence(raw: string): string {
  let text = raw.trim();
  if (text.length >= 6 && text.startsWith('```') && text.endsWith('```')) {
    text = text.slice(3, -3).trim();
    if (text.toLowerCase().startsWith('json')) {
      text = text.slice(4).trim();
    }
  }
  return text;
}

/**
 * Slice out the first balanced `{...}` block. Braces inside string literals
 * are skipped so a `}` in a value does not close the object early.
 */
export function extractFirstJsonObject(text: string): string | null {
  const start = text.indexOf('{');
  if (start === -1) return null;

  let depth = 0;
  let inString = false;
  let escaped = false;
  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (ch === '\\') escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') inString = true;
    else if (ch === '{') depth++;
    else if (ch === '}') {
      depth--;
      if (depth === 0) return text.slice(start, i + 1);
    }
  }
  return null;
}

/**
 * Recover a JSON value from model output: fenced or bare JSON parses
 * directly, otherwise the first balanced object embedded in prose is tried.
 * Returns null when nothing usable is found.
 */
export function parseModelJson(raw: string | null | undefined): unknown {
  if (!raw) return null;

  const text = stripCodeFence(raw);
  const direct = tryParse(text);
  if (direct.ok) return direct.value;

  const candidate = extractFirstJsonObject(text);
  if (!candidate) return null;

  const embedded = tryParse(candidate);
  return embedded.ok ? embedded.value : null;
}

export function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
