import { countWords } from '../lib/text.js';

const CONTEXT_SWITCH_PHRASES = [
  'forget about',
  'never mind',
  'nevermind',
  "let's talk about",
  'change the subject',
  'different question',
  'something else',
] as const;

const MAX_PARAMETER_VALUE_WORDS = 5;
const TRAILING_PUNCTUATION = /[.!\s]+$/u;

const AFFIRMATIVE_ANSWERS = new Set([
  'y',
  'yes',
  'yeah',
  'yep',
  'sure',
  'ok',
  'okay',
  'continue',
  'go on',
  'go ahead',
  'extend',
]);
const NEGATIVE_ANSWERS = new Set([
  'n',
  'no',
  'nope',
  'nah',
  'stop',
  'cancel',
  'abort',
]);

export type YesNo = 'yes' | 'no';

function normalize(text: string): string {
  return text.trim().toLowerCase();
}

/** True when the message explicitly abandons the current topic. */
export function matchesContextSwitchPhrase(text: string): boolean {
  const lower = normalize(text).replaceAll('’', "'");
  return CONTEXT_SWITCH_PHRASES.some((phrase) => lower.includes(phrase));
}

/**
 * Short, non-question input while a parameter is outstanding is taken as the
 * answer without consulting the collaborator.
 */
export function looksLikeParameterValue(text: string): boolean {
  const trimmed = text.trim();
  if (trimmed.length === 0 || trimmed.endsWith('?')) {
    return false;
  }
  return countWords(trimmed) <= MAX_PARAMETER_VALUE_WORDS;
}

export function parseYesNo(text: string): YesNo | undefined {
  const answer = normalize(text).replace(TRAILING_PUNCTUATION, '');
  if (AFFIRMATIVE_ANSWERS.has(answer)) {
    return 'yes';
  }
  if (NEGATIVE_ANSWERS.has(answer)) {
    return 'no';
  }
  return undefined;
}
