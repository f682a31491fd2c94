/**
 * Finds the first balanced `{...}` span in free text.
 * Braces inside JSON string literals (including escaped quotes) are ignored.
 *
 * @returns The span, or null when no opening brace is ever closed.
 */
export function extractFirstJsonObject(text: string): string | null {
  for (let start = text.indexOf('{'); start !== -1; start = text.indexOf('{', start + 1)) {
    const end = findClosingBrace(text, start);
    if (end !== -1) return text.slice(start, end + 1);
  }
  return null;
}

function findClosingBrace(text: string, start: number): number {
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
      if (depth === 0) return i;
    }
  }
  return -1;
}

/** JSON.parse that reports failure as undefined instead of throwing. */
export function tryParseJson(raw: string): unknown {
  try {
    return JSON.parse(raw) as unknown;
  } catch {
    return undefined;
  }
}
