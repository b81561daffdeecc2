import { readFileSync } from 'node:fs';

const INSTRUCTIONS_URL_CANDIDATES = [
  new URL('../instructions.md', import.meta.url),
  new URL('../../src/instructions.md', import.meta.url),
];
const DEFAULT_INSTRUCTIONS_FALLBACK = '(Instructions not available)';
let cachedInstructionsText: string | null | undefined;

function readFirstAvailable(candidates: readonly URL[]): string | null {
  for (const candidate of candidates) {
    try {
      const text = readFileSync(candidate, 'utf8').trim();
      if (text.length > 0) {
        return text;
      }
    } catch {
      continue;
    }
  }
  return null;
}

/** Reads instructions.md once; missing or empty files yield `fallback`. */
export function loadInstructions(
  fallback = DEFAULT_INSTRUCTIONS_FALLBACK
): string {
  if (cachedInstructionsText === undefined) {
    cachedInstructionsText = readFirstAvailable(INSTRUCTIONS_URL_CANDIDATES);
  }
  return cachedInstructionsText ?? fallback;
}
