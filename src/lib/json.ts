/**
 * Pulls the first JSON object out of free-form model output. Handles a
 * surrounding markdown fence and trailing prose.
 */

export type ExtractResult =
  | { found: true; json: string }
  | { found: false; reason: string };

const CODE_BLOCK_PATTERN = /```(?:json)?\s*\n?([\s\S]*?)\n?```/;

function stripMarkdownCodeBlock(content: string): string {
  const trimmed = content.trim();
  const match = CODE_BLOCK_PATTERN.exec(trimmed);
  const inner = match?.[1];
  return inner !== undefined ? inner.trim() : trimmed;
}

function findObjectEnd(text: string, start: number): number {
  let depth = 0;
  let inString = false;
  for (let i = start; i < text.length; i++) {
    const c = text[i];
    if (inString) {
      if (c === '\\') {
        i++;
      } else if (c === '"') {
        inString = false;
      }
      continue;
    }
    if (c === '"') {
      inString = true;
    } else if (c === '{') {
      depth++;
    } else if (c === '}') {
      depth--;
      if (depth === 0) {
        return i;
      }
    }
  }
  return -1;
}

export function extractJson(content: string): ExtractResult {
  const text = stripMarkdownCodeBlock(content);
  if (text.length === 0) {
    return { found: false, reason: 'Empty content' };
  }
  const start = text.indexOf('{');
  if (start < 0) {
    return { found: false, reason: 'No JSON object found' };
  }
  const end = findObjectEnd(text, start);
  if (end < 0) {
    return { found: false, reason: 'Unclosed JSON object' };
  }
  return { found: true, json: text.slice(start, end + 1) };
}

/** Parses the first embedded JSON object, or returns undefined. */
export function parseEmbeddedJson(content: string): unknown {
  const extracted = extractJson(content);
  if (!extracted.found) {
    return undefined;
  }
  try {
    return JSON.parse(extracted.json);
  } catch {
    return undefined;
  }
}
