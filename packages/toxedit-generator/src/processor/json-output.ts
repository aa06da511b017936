/**
 * Reads JSON from model output that may be wrapped in prose or a fenced
 * block. Returns undefined when nothing parses.
 */
export function parseJsonOutput(raw: string | null): unknown {
  if (raw === null) {
    return undefined;
  }

  const trimmed = stripCodeFence(raw.trim());
  if (trimmed.length === 0) {
    return undefined;
  }

  const direct = tryParse(trimmed);
  if (direct !== undefined) {
    return direct;
  }

  for (const [open, close] of [
    ["{", "}"],
    ["[", "]"],
  ] as const) {
    const start = trimmed.indexOf(open);
    const end = trimmed.lastIndexOf(close);
    if (start >= 0 && end > start) {
      const candidate = tryParse(trimmed.slice(start, end + 1));
      if (candidate !== undefined) {
        return candidate;
      }
    }
  }

  return undefined;
}

function stripCodeFence(text: string): string {
  const match = text.match(/^```(?:json)?\s*\n([\s\S]*?)\n?```$/i);
  return match?.[1]?.trim() ?? text;
}

function tryParse(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}
